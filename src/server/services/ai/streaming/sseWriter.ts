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

import { AgentEvent } from '../types/stream';
import { AgentEventStream } from './eventStream';

export interface EventWriter {
  write(chunk: string): void;
  end(): void;
}

export function formatServerSentEvent(event: AgentEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

/**
 * Frames each event as a text/event-stream `data:` line and ends the writer
 * after the terminal event. Works with an http.ServerResponse or any writer
 * of the same shape.
 */
export async function writeServerSentEvents(stream: AgentEventStream, writer: EventWriter): Promise<void> {
  try {
    for await (const event of stream) {
      writer.write(formatServerSentEvent(event));
    }
  } finally {
    writer.end();
  }
}
