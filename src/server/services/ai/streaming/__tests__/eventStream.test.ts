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

jest.mock('server/lib/logger', () => ({
  getLogger: () => ({
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  }),
}));

import { AgentEventStream } from '../eventStream';
import { AgentEvent } from '../../types/stream';

const token: AgentEvent = { type: 'token', text: 'Hel' };
const started: AgentEvent = { type: 'tool_started', id: 't1', name: 'sqs_list_queues', arguments: {} };
const final: AgentEvent = { type: 'final_answer', text: 'Hello', degraded: false };

describe('AgentEventStream', () => {
  it('delivers events to subscribers in emission order', () => {
    const stream = new AgentEventStream();
    const seen: string[] = [];
    stream.subscribe((e) => seen.push(e.type));

    stream.emit(token);
    stream.emit(started);
    stream.emit(final);

    expect(seen).toEqual(['token', 'tool_started', 'final_answer']);
  });

  it('replays earlier events to late subscribers unless asked not to', () => {
    const stream = new AgentEventStream();
    stream.emit(token);

    const replayed: string[] = [];
    const live: string[] = [];
    stream.subscribe((e) => replayed.push(e.type));
    stream.subscribe((e) => live.push(e.type), { replay: false });
    stream.emit(final);

    expect(replayed).toEqual(['token', 'final_answer']);
    expect(live).toEqual(['final_answer']);
  });

  it('closes after the terminal event and drops later ones', () => {
    const stream = new AgentEventStream();
    stream.emit(final);
    stream.emit(token);

    expect(stream.isClosed).toBe(true);
    expect(stream.events).toEqual([final]);
  });

  it('stops delivering to an unsubscribed handler', () => {
    const stream = new AgentEventStream();
    const handler = jest.fn();
    const unsubscribe = stream.subscribe(handler);

    stream.emit(token);
    unsubscribe();
    stream.emit(final);

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('keeps delivering when one subscriber throws', () => {
    const stream = new AgentEventStream();
    const other = jest.fn();
    stream.subscribe(() => {
      throw new Error('render failed');
    });
    stream.subscribe(other);

    stream.emit(token);

    expect(other).toHaveBeenCalledWith(token);
  });

  it('is async-iterable until the terminal event', async () => {
    const stream = new AgentEventStream();
    stream.emit(token);
    setTimeout(() => {
      stream.emit(started);
      stream.emit(final);
    }, 1);

    const collected: AgentEvent[] = [];
    for await (const event of stream) {
      collected.push(event);
    }

    expect(collected).toEqual([token, started, final]);
  });

  it('done resolves with the terminal event, even after close', async () => {
    const stream = new AgentEventStream();
    const pending = stream.done();
    stream.emit(token);
    stream.emit(final);

    await expect(pending).resolves.toEqual(final);
    await expect(stream.done()).resolves.toEqual(final);
  });

  it('cancel aborts the signal once', () => {
    const stream = new AgentEventStream();
    const onAbort = jest.fn();
    stream.signal.addEventListener('abort', onAbort);

    stream.cancel();
    stream.cancel();

    expect(stream.signal.aborted).toBe(true);
    expect(onAbort).toHaveBeenCalledTimes(1);
  });

  it('ignores cancel after the stream closed', () => {
    const stream = new AgentEventStream();
    stream.emit(final);
    stream.cancel();
    expect(stream.signal.aborted).toBe(false);
  });
});
