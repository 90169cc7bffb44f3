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

import OpenAI from 'openai';
import {
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import { BaseLLMProvider, DEFAULT_MAX_TOKENS, PartialToolCall } from './base';
import { ModelInfo, CompletionOptions, StreamChunk } from '../types/provider';
import { ToolDescriptor } from '../types/tool';
import { toolResultContent, Turn } from '../types/turn';

export class OpenAIProvider extends BaseLLMProvider {
  name = 'openai';
  private client: OpenAI;

  constructor(modelId?: string, apiKey?: string) {
    super(modelId || 'gpt-4o');
    const key = this.requireApiKey(apiKey, 'OpenAI', ['OPENAI_API_KEY']);
    this.client = new OpenAI({ apiKey: key });
  }

  async *streamCompletion(
    turns: readonly Turn[],
    options: CompletionOptions,
    signal?: AbortSignal
  ): AsyncGenerator<StreamChunk> {
    const tools = options.tools?.map((t) => this.formatToolDefinition(t));

    const stream = await this.client.chat.completions.create(
      {
        model: this.modelId,
        max_tokens: options.maxTokens || DEFAULT_MAX_TOKENS,
        temperature: options.temperature ?? 0,
        stream: true,
        messages: this.formatHistory(turns, options.systemPrompt),
        tools: tools && tools.length > 0 ? tools : undefined,
      },
      { signal }
    );

    // tool call deltas arrive keyed by index; id and name only on the first one
    const toolCalls = new Map<number, PartialToolCall>();

    for await (const chunk of stream) {
      const delta = chunk.choices[0]?.delta;

      if (delta?.content) {
        yield {
          type: 'text',
          content: delta.content,
        };
      }

      for (const toolCallDelta of delta?.tool_calls ?? []) {
        const existing = toolCalls.get(toolCallDelta.index);
        if (!existing) {
          toolCalls.set(toolCallDelta.index, {
            id: toolCallDelta.id ?? '',
            name: toolCallDelta.function?.name ?? '',
            arguments: toolCallDelta.function?.arguments ?? '',
          });
          continue;
        }
        if (toolCallDelta.function?.name) {
          existing.name += toolCallDelta.function.name;
        }
        if (toolCallDelta.function?.arguments) {
          existing.arguments += toolCallDelta.function.arguments;
        }
      }
    }

    if (toolCalls.size > 0) {
      const ordered = Array.from(toolCalls.entries())
        .sort(([a], [b]) => a - b)
        .map(([, call]) => call);
      yield {
        type: 'tool_call',
        toolCalls: this.finishToolCalls(ordered),
      };
    }
  }

  getModelInfo(): ModelInfo {
    return {
      model: this.modelId,
      maxTokens: 128000,
    };
  }

  formatToolDefinition(tool: ToolDescriptor): ChatCompletionTool {
    return {
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: { ...tool.parameters },
      },
    };
  }

  /** Consecutive tool calls share one assistant message; each result is its own tool message. */
  formatHistory(turns: readonly Turn[], systemPrompt?: string): ChatCompletionMessageParam[] {
    const messages: ChatCompletionMessageParam[] = systemPrompt ? [{ role: 'system', content: systemPrompt }] : [];
    let openCalls: ChatCompletionMessageToolCall[] | null = null;

    for (const turn of turns) {
      if (turn.type !== 'tool_call') {
        openCalls = null;
      }

      switch (turn.type) {
        case 'user':
          messages.push({ role: 'user', content: turn.text });
          break;
        case 'assistant':
          if (turn.text) messages.push({ role: 'assistant', content: turn.text });
          break;
        case 'tool_call': {
          const call: ChatCompletionMessageToolCall = {
            id: turn.id,
            type: 'function',
            function: { name: turn.name, arguments: JSON.stringify(turn.arguments) },
          };
          if (openCalls) {
            openCalls.push(call);
          } else {
            openCalls = [call];
            messages.push({ role: 'assistant', content: null, tool_calls: openCalls });
          }
          break;
        }
        case 'tool_result':
          messages.push({ role: 'tool', tool_call_id: turn.id, content: toolResultContent(turn) });
          break;
      }
    }

    return messages;
  }
}
