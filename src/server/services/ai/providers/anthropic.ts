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

import Anthropic from '@anthropic-ai/sdk';
import { BaseLLMProvider, DEFAULT_MAX_TOKENS, PartialToolCall } from './base';
import { ModelInfo, CompletionOptions, StreamChunk } from '../types/provider';
import { ToolDescriptor } from '../types/tool';
import { toolResultContent, Turn } from '../types/turn';

type AnthropicBlock = Anthropic.TextBlockParam | Anthropic.ToolUseBlockParam | Anthropic.ToolResultBlockParam;

interface PendingMessage {
  role: 'user' | 'assistant';
  blocks: AnthropicBlock[];
}

export class AnthropicProvider extends BaseLLMProvider {
  name = 'anthropic';
  private client: Anthropic;

  constructor(modelId?: string, apiKey?: string) {
    super(modelId || 'claude-sonnet-4-5-20250929');
    const key = this.requireApiKey(apiKey, 'Anthropic', ['ANTHROPIC_API_KEY', 'CLAUDE_API_KEY']);
    this.client = new Anthropic({ apiKey: key });
  }

  async *streamCompletion(
    turns: readonly Turn[],
    options: CompletionOptions,
    signal?: AbortSignal
  ): AsyncGenerator<StreamChunk> {
    const stream = await this.client.messages.create(
      {
        model: this.modelId,
        max_tokens: options.maxTokens || DEFAULT_MAX_TOKENS,
        temperature: options.temperature ?? 0,
        system: options.systemPrompt
          ? [{ type: 'text', text: options.systemPrompt, cache_control: { type: 'ephemeral' } }]
          : undefined,
        messages: this.formatHistory(turns),
        tools: options.tools?.map((t) => this.formatToolDefinition(t)),
        stream: true,
      },
      { signal }
    );

    const toolCalls = new Map<number, PartialToolCall>();

    for await (const event of stream) {
      switch (event.type) {
        case 'content_block_start':
          if (event.content_block.type === 'tool_use') {
            toolCalls.set(event.index, { id: event.content_block.id, name: event.content_block.name, arguments: '' });
          }
          break;
        case 'content_block_delta':
          if (event.delta.type === 'text_delta' && event.delta.text) {
            yield { type: 'text', content: event.delta.text };
          } else if (event.delta.type === 'input_json_delta') {
            const call = toolCalls.get(event.index);
            if (call) call.arguments += event.delta.partial_json;
          }
          break;
        default:
          break;
      }
    }

    if (toolCalls.size > 0) {
      yield { type: 'tool_call', toolCalls: this.finishToolCalls(toolCalls.values()) };
    }
  }

  getModelInfo(): ModelInfo {
    return {
      model: this.modelId,
      maxTokens: 200000,
    };
  }

  formatToolDefinition(tool: ToolDescriptor): Anthropic.Tool {
    return {
      name: tool.name,
      description: tool.description,
      input_schema: { ...tool.parameters, type: 'object' },
    };
  }

  /**
   * Consecutive turns of the same role are merged into one message: parallel
   * tool calls become several tool_use blocks in one assistant message and
   * their results several tool_result blocks in the next user message.
   */
  formatHistory(turns: readonly Turn[]): Anthropic.MessageParam[] {
    const merged: PendingMessage[] = [];
    const push = (role: PendingMessage['role'], block: AnthropicBlock) => {
      const last = merged[merged.length - 1];
      if (last && last.role === role) {
        last.blocks.push(block);
      } else {
        merged.push({ role, blocks: [block] });
      }
    };

    for (const turn of turns) {
      switch (turn.type) {
        case 'user':
          push('user', { type: 'text', text: turn.text });
          break;
        case 'assistant':
          if (turn.text) push('assistant', { type: 'text', text: turn.text });
          break;
        case 'tool_call':
          push('assistant', { type: 'tool_use', id: turn.id, name: turn.name, input: turn.arguments });
          break;
        case 'tool_result':
          push('user', {
            type: 'tool_result',
            tool_use_id: turn.id,
            content: toolResultContent(turn),
            ...(turn.ok ? {} : { is_error: true }),
          });
          break;
      }
    }

    return merged.map(({ role, blocks }) => {
      const [only] = blocks;
      if (blocks.length === 1 && only.type === 'text') {
        return { role, content: only.text };
      }
      return { role, content: blocks };
    });
  }
}
