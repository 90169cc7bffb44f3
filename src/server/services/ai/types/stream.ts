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

export type AgentEvent =
  | { type: 'token'; text: string }
  | { type: 'tool_started'; id: string; name: string; arguments: Record<string, unknown> }
  | { type: 'tool_finished'; id: string; name: string; ok: boolean; durationMs: number }
  | { type: 'final_answer'; text: string; degraded: boolean }
  | { type: 'error'; code: string; message: string; recoverable: boolean };

export type AgentEventType = AgentEvent['type'];

export type AgentEventHandler = (event: AgentEvent) => void;

export function isTerminalEvent(event: AgentEvent): boolean {
  return event.type === 'final_answer' || event.type === 'error';
}
