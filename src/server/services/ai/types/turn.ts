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

export interface UserTurn {
  type: 'user';
  text: string;
}

export interface AssistantTurn {
  type: 'assistant';
  text: string | null;
  degraded?: boolean;
}

export interface ToolCallRequest {
  type: 'tool_call';
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export type ToolResult =
  | {
      type: 'tool_result';
      id: string;
      name: string;
      ok: true;
      payload: string;
    }
  | {
      type: 'tool_result';
      id: string;
      name: string;
      ok: false;
      code: string;
      errorSummary: string;
    };

export type Turn = UserTurn | AssistantTurn | ToolCallRequest | ToolResult;

export function userTurn(text: string): UserTurn {
  return { type: 'user', text };
}

export function assistantTurn(text: string | null, degraded = false): AssistantTurn {
  return degraded ? { type: 'assistant', text, degraded } : { type: 'assistant', text };
}

/** Text the model sees for a tool result, success or failure */
export function toolResultContent(result: ToolResult): string {
  return result.ok ? result.payload : `Error (${result.code}): ${result.errorSummary}`;
}

export interface TranscriptEntry {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * Collapses a turn sequence to the user/assistant exchange an operator sees.
 * Tool traffic is dropped.
 */
export function toTranscript(turns: readonly Turn[]): TranscriptEntry[] {
  const transcript: TranscriptEntry[] = [];
  for (const turn of turns) {
    if (turn.type === 'user') {
      transcript.push({ role: 'user', content: turn.text });
    } else if (turn.type === 'assistant' && turn.text) {
      transcript.push({ role: 'assistant', content: turn.text });
    }
  }
  return transcript;
}
