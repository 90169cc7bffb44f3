/**
 * Copyright 2025 GoodRx, Inc.
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import { nanoid } from 'nanoid';
import { ConversationState } from './state';
import { getLogger } from 'server/lib/logger';
import { AssistantError } from 'server/lib/errors/assistantErrors';

export type SessionStatus = 'AwaitingUserInput' | 'ModelInference' | 'ExecutingTools';

export interface SessionSummary {
  id: string;
  createdAt: Date;
  lastActivity: Date;
  status: SessionStatus;
  turns: number;
  pendingRounds: number;
}

export class Session {
  readonly id: string;
  readonly createdAt: Date;
  readonly conversation = new ConversationState();
  /** Maximum model/tool round-trips per submitted message */
  readonly loopBudget: number;
  status: SessionStatus = 'AwaitingUserInput';
  lastActivity: Date;

  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;
  private readonly lifetime = new AbortController();

  constructor(loopBudget: number, id: string = nanoid()) {
    this.id = id;
    this.loopBudget = loopBudget;
    this.createdAt = new Date();
    this.lastActivity = this.createdAt;
  }

  get ended(): boolean {
    return this.lifetime.signal.aborted;
  }

  /** Aborted when the session ends */
  get signal(): AbortSignal {
    return this.lifetime.signal;
  }

  /** Rounds submitted but not yet started */
  get pendingRounds(): number {
    return this.waiting;
  }

  /**
   * Runs rounds one at a time in submission order. A message that arrives
   * while a round is in flight waits until the session is back to
   * AwaitingUserInput.
   */
  enqueue(round: () => Promise<void>): Promise<void> {
    if (this.ended) {
      return Promise.reject(new AssistantError('SESSION_NOT_FOUND', `Session '${this.id}' has ended`));
    }

    this.waiting++;
    const run = this.tail.then(async () => {
      this.waiting--;
      this.lastActivity = new Date();
      await round();
    });
    this.tail = run.catch((error) => {
      getLogger().error({ error }, `Session: round failed session=${this.id}`);
    });
    return run;
  }

  end(): void {
    this.lifetime.abort();
    this.conversation.reset();
    this.status = 'AwaitingUserInput';
  }

  summary(): SessionSummary {
    return {
      id: this.id,
      createdAt: this.createdAt,
      lastActivity: this.lastActivity,
      status: this.status,
      turns: this.conversation.length,
      pendingRounds: this.waiting,
    };
  }
}

export class SessionManager {
  private sessions: Map<string, Session> = new Map();

  constructor(private loopBudget: number) {}

  create(): Session {
    const session = new Session(this.loopBudget);
    this.sessions.set(session.id, session);
    getLogger().info(`Session: created session=${session.id} loopBudget=${this.loopBudget}`);
    return session;
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  require(id: string): Session {
    const session = this.sessions.get(id);
    if (!session) {
      throw new AssistantError('SESSION_NOT_FOUND', `Session '${id}' not found`);
    }
    return session;
  }

  end(id: string): boolean {
    const session = this.sessions.get(id);
    if (!session) return false;

    session.end();
    this.sessions.delete(id);
    getLogger().info(`Session: ended session=${id}`);
    return true;
  }

  list(): SessionSummary[] {
    return Array.from(this.sessions.values()).map((s) => s.summary());
  }
}
