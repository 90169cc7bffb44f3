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
import { LLMProvider, ModelInfo, CompletionOptions, StreamChunk, RequestedToolCall } from '../types/provider';
import { ToolDescriptor } from '../types/tool';
import { Turn } from '../types/turn';
import { getLogger } from 'server/lib/logger';
import { AssistantError } from 'server/lib/errors/assistantErrors';

export const DEFAULT_MAX_TOKENS = 4096;

/** A tool call whose name and JSON arguments arrive in pieces */
export interface PartialToolCall {
  id: string;
  name: string;
  arguments: string;
}

export abstract class BaseLLMProvider implements LLMProvider {
  abstract name: string;

  constructor(protected modelId: string) {}

  abstract streamCompletion(
    turns: readonly Turn[],
    options: CompletionOptions,
    signal?: AbortSignal
  ): AsyncIterable<StreamChunk>;

  abstract getModelInfo(): ModelInfo;
  abstract formatToolDefinition(tool: ToolDescriptor): unknown;

  protected finishToolCalls(partials: Iterable<PartialToolCall>): RequestedToolCall[] {
    return Array.from(partials).map((call) => ({
      id: call.id || `call_${nanoid(12)}`,
      name: call.name,
      arguments: this.parseArguments(call.arguments, call.name),
    }));
  }

  /**
   * Arguments the model produced that are not a JSON object become `{}`; the
   * dispatcher's schema check then tells the model what is missing.
   */
  protected parseArguments(raw: string, toolName: string): Record<string, unknown> {
    if (raw.trim() === '') return {};
    try {
      const parsed: unknown = JSON.parse(raw);
      if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
        return Object.fromEntries(Object.entries(parsed));
      }
    } catch (error) {
      getLogger().warn({ error }, `${this.name}: unparseable tool arguments tool=${toolName}`);
      return {};
    }
    getLogger().warn(`${this.name}: tool arguments are not an object tool=${toolName}`);
    return {};
  }

  protected requireApiKey(apiKey: string | undefined, providerName: string, envNames: string[]): string {
    if (!apiKey) {
      throw new AssistantError(
        'CONFIGURATION_GAP',
        `${providerName} API key is not configured. Set ${envNames.join(' or ')}.`,
        { provider: providerName }
      );
    }
    return apiKey;
  }
}
