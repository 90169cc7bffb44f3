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

import { ToolDescriptor } from './tool';
import { Turn } from './turn';

export interface CompletionOptions {
  systemPrompt: string;
  tools?: readonly ToolDescriptor[];
  maxTokens?: number;
  temperature?: number;
}

export interface RequestedToolCall {
  id?: string;
  name: string;
  arguments: Record<string, unknown>;
}

export type StreamChunk = { type: 'text'; content: string } | { type: 'tool_call'; toolCalls: RequestedToolCall[] };

export interface ModelInfo {
  model: string;
  maxTokens: number;
}

/**
 * The model capability: given the conversation and the tools on offer, streams
 * text and/or a batch of tool-call requests.
 */
export interface LLMProvider {
  name: string;

  streamCompletion(turns: readonly Turn[], options: CompletionOptions, signal?: AbortSignal): AsyncIterable<StreamChunk>;

  getModelInfo(): ModelInfo;
}
