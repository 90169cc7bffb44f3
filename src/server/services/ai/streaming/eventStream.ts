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

import { AgentEvent, AgentEventHandler, isTerminalEvent } from '../types/stream';
import { getLogger } from 'server/lib/logger';

export interface SubscribeOptions {
  /** Deliver events emitted before subscribing first (default: true) */
  replay?: boolean;
}

/**
 * Ordered events of one submitted message. Consumers either iterate it or
 * subscribe a handler; both see events in emission order. The stream closes
 * after the first final_answer or error event.
 */
export class AgentEventStream implements AsyncIterable<AgentEvent> {
  private history: AgentEvent[] = [];
  private handlers: Set<AgentEventHandler> = new Set();
  private waiters: Array<() => void> = [];
  private closed = false;
  private readonly controller = new AbortController();

  /** Aborted once the consumer cancels */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get events(): readonly AgentEvent[] {
    return this.history;
  }

  emit(event: AgentEvent): void {
    if (this.closed) {
      getLogger().debug(`Stream: dropped event after close type=${event.type}`);
      return;
    }

    this.history.push(event);
    if (isTerminalEvent(event)) {
      this.closed = true;
    }

    for (const handler of this.handlers) {
      this.deliver(handler, event);
    }
    if (this.closed) {
      this.handlers.clear();
    }

    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) wake();
  }

  subscribe(handler: AgentEventHandler, options: SubscribeOptions = {}): () => void {
    if (options.replay !== false) {
      for (const event of this.history) {
        this.deliver(handler, event);
      }
    }
    if (!this.closed) {
      this.handlers.add(handler);
    }
    return () => {
      this.handlers.delete(handler);
    };
  }

  /** Requests cancellation; the loop stops at its next suspension point. */
  cancel(): void {
    if (this.closed || this.controller.signal.aborted) return;
    getLogger().info('Stream: cancellation requested');
    this.controller.abort();
  }

  /** Resolves with the terminal event. */
  done(): Promise<AgentEvent> {
    return new Promise((resolve) => {
      this.subscribe((event) => {
        if (isTerminalEvent(event)) resolve(event);
      });
    });
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<AgentEvent, void, undefined> {
    let index = 0;
    while (true) {
      while (index < this.history.length) {
        yield this.history[index++];
      }
      if (this.closed) return;
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }

  private deliver(handler: AgentEventHandler, event: AgentEvent): void {
    try {
      handler(event);
    } catch (error) {
      getLogger().warn({ error }, `Stream: subscriber threw type=${event.type}`);
    }
  }
}
