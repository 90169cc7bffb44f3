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

import { Turn } from '../types/turn';

/**
 * Ordered turn history of one session. Turns are only ever appended; an open
 * round stages its turns so an unfinished unit can be discarded as a whole.
 */
export class ConversationState {
  private turns: Turn[] = [];
  private checkpoint: number | null = null;

  append(turn: Turn): void {
    this.turns.push(Object.freeze({ ...turn }));
  }

  appendAll(turns: readonly Turn[]): void {
    for (const turn of turns) {
      this.append(turn);
    }
  }

  snapshot(): readonly Turn[] {
    return this.turns.slice();
  }

  get length(): number {
    return this.turns.length;
  }

  get inRound(): boolean {
    return this.checkpoint !== null;
  }

  beginRound(): void {
    if (this.checkpoint !== null) {
      throw new Error('Conversation: a round is already open');
    }
    this.checkpoint = this.turns.length;
  }

  commitRound(): void {
    if (this.checkpoint === null) {
      throw new Error('Conversation: no open round to commit');
    }
    this.checkpoint = null;
  }

  /** Drops the turns staged since beginRound. Returns how many were dropped. */
  rollbackRound(): number {
    if (this.checkpoint === null) return 0;
    const dropped = this.turns.length - this.checkpoint;
    this.turns.splice(this.checkpoint);
    this.checkpoint = null;
    return dropped;
  }

  /** Ids of tool calls that have no result yet, in request order. */
  unmatchedToolCalls(): string[] {
    const requested: string[] = [];
    const answered = new Set<string>();
    for (const turn of this.turns) {
      if (turn.type === 'tool_call') requested.push(turn.id);
      if (turn.type === 'tool_result') answered.add(turn.id);
    }
    return requested.filter((id) => !answered.has(id));
  }

  reset(): void {
    this.turns = [];
    this.checkpoint = null;
  }
}
