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

const mockCreate = jest.fn();
jest.mock('@anthropic-ai/sdk', () =>
  jest.fn().mockImplementation(() => ({
    messages: { create: mockCreate },
  }))
);
jest.mock('server/lib/logger', () => ({ getLogger: () => ({ info: jest.fn(), error: jest.fn(), warn: jest.fn() }) }));

import { AnthropicProvider } from '../anthropic';
import { StreamChunk } from '../../types/provider';
import { ToolDescriptor } from '../../types/tool';
import { Turn, assistantTurn, userTurn } from '../../types/turn';

async function* eventStream(events: unknown[]) {
  for (const event of events) {
    yield event;
  }
}

async function collect(iterable: AsyncIterable<StreamChunk>): Promise<StreamChunk[]> {
  const chunks: StreamChunk[] = [];
  for await (const chunk of iterable) {
    chunks.push(chunk);
  }
  return chunks;
}

const QUEUE_TOOL: ToolDescriptor = {
  name: 'sqs_get_queue_attributes',
  family: 'queue',
  description: 'Queue attributes',
  parameters: { type: 'object', properties: { queue_name: { type: 'string' } } },
  readOnly: true,
};

describe('AnthropicProvider.formatHistory', () => {
  let provider: AnthropicProvider;

  beforeEach(() => {
    provider = new AnthropicProvider('test-model', 'test-key');
  });

  it('formats text turns as plain string content', () => {
    expect(provider.formatHistory([userTurn('What is wrong?'), assistantTurn('Let me check.')])).toEqual([
      { role: 'user', content: 'What is wrong?' },
      { role: 'assistant', content: 'Let me check.' },
    ]);
  });

  it('skips assistant turns without text', () => {
    expect(provider.formatHistory([userTurn('hi'), assistantTurn(null), assistantTurn('')])).toEqual([
      { role: 'user', content: 'hi' },
    ]);
  });

  it('merges parallel tool calls and their results into single messages', () => {
    const turns: Turn[] = [
      userTurn('Any incidents?'),
      { type: 'tool_call', id: 'toolu_1', name: 'pagerduty_list_incidents', arguments: {} },
      { type: 'tool_call', id: 'toolu_2', name: 'pagerduty_get_oncall', arguments: { schedule_ids: ['S1'] } },
      { type: 'tool_result', id: 'toolu_1', name: 'pagerduty_list_incidents', ok: true, payload: '{"count":0}' },
      { type: 'tool_result', id: 'toolu_2', name: 'pagerduty_get_oncall', ok: false, code: 'BACKEND_ERROR', errorSummary: 'boom' },
    ];

    expect(provider.formatHistory(turns)).toEqual([
      { role: 'user', content: 'Any incidents?' },
      {
        role: 'assistant',
        content: [
          { type: 'tool_use', id: 'toolu_1', name: 'pagerduty_list_incidents', input: {} },
          { type: 'tool_use', id: 'toolu_2', name: 'pagerduty_get_oncall', input: { schedule_ids: ['S1'] } },
        ],
      },
      {
        role: 'user',
        content: [
          { type: 'tool_result', tool_use_id: 'toolu_1', content: '{"count":0}' },
          { type: 'tool_result', tool_use_id: 'toolu_2', content: 'Error (BACKEND_ERROR): boom', is_error: true },
        ],
      },
    ]);
  });

  it('keeps a follow-up question in the same user message as earlier tool results', () => {
    const turns: Turn[] = [
      userTurn('q1'),
      { type: 'tool_call', id: 't1', name: 'sqs_list_queues', arguments: {} },
      { type: 'tool_result', id: 't1', name: 'sqs_list_queues', ok: true, payload: '[]' },
      userTurn('q2'),
    ];

    const formatted = provider.formatHistory(turns);

    expect(formatted).toHaveLength(3);
    expect(formatted[2]).toEqual({
      role: 'user',
      content: [
        { type: 'tool_result', tool_use_id: 't1', content: '[]' },
        { type: 'text', text: 'q2' },
      ],
    });
  });
});

describe('AnthropicProvider.streamCompletion', () => {
  let provider: AnthropicProvider;

  beforeEach(() => {
    mockCreate.mockReset();
    provider = new AnthropicProvider('test-model', 'test-key');
  });

  it('streams text deltas and assembles tool_use input from json deltas', async () => {
    mockCreate.mockResolvedValue(
      eventStream([
        { type: 'message_start', message: {} },
        { type: 'content_block_start', index: 0, content_block: { type: 'text', text: '' } },
        { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'Checking the queue' } },
        { type: 'content_block_stop', index: 0 },
        {
          type: 'content_block_start',
          index: 1,
          content_block: { type: 'tool_use', id: 'toolu_1', name: 'sqs_get_queue_attributes', input: {} },
        },
        { type: 'content_block_delta', index: 1, delta: { type: 'input_json_delta', partial_json: '{"queue_' } },
        { type: 'content_block_delta', index: 1, delta: { type: 'input_json_delta', partial_json: 'name":"orders"}' } },
        { type: 'content_block_stop', index: 1 },
        { type: 'message_stop' },
      ])
    );

    const chunks = await collect(provider.streamCompletion([userTurn('hi')], { systemPrompt: 'sys' }));

    expect(chunks).toEqual([
      { type: 'text', content: 'Checking the queue' },
      {
        type: 'tool_call',
        toolCalls: [{ id: 'toolu_1', name: 'sqs_get_queue_attributes', arguments: { queue_name: 'orders' } }],
      },
    ]);
  });

  it('turns unparseable tool input into empty arguments', async () => {
    mockCreate.mockResolvedValue(
      eventStream([
        {
          type: 'content_block_start',
          index: 0,
          content_block: { type: 'tool_use', id: 'toolu_9', name: 'sqs_list_queues', input: {} },
        },
        { type: 'content_block_delta', index: 0, delta: { type: 'input_json_delta', partial_json: '{"broken' } },
      ])
    );

    const chunks = await collect(provider.streamCompletion([userTurn('hi')], { systemPrompt: 'sys' }));

    expect(chunks).toEqual([
      { type: 'tool_call', toolCalls: [{ id: 'toolu_9', name: 'sqs_list_queues', arguments: {} }] },
    ]);
  });

  it('sends the system prompt with cache_control, the tools and the abort signal', async () => {
    mockCreate.mockResolvedValue(eventStream([]));
    const controller = new AbortController();

    await collect(
      provider.streamCompletion([userTurn('hi')], { systemPrompt: 'You are helpful.', tools: [QUEUE_TOOL] }, controller.signal)
    );

    expect(mockCreate).toHaveBeenCalledWith(
      expect.objectContaining({
        model: 'test-model',
        max_tokens: 4096,
        temperature: 0,
        stream: true,
        system: [{ type: 'text', text: 'You are helpful.', cache_control: { type: 'ephemeral' } }],
        tools: [
          {
            name: 'sqs_get_queue_attributes',
            description: 'Queue attributes',
            input_schema: { type: 'object', properties: { queue_name: { type: 'string' } } },
          },
        ],
      }),
      { signal: controller.signal }
    );
  });

  it('sends system as undefined when the prompt is empty', async () => {
    mockCreate.mockResolvedValue(eventStream([]));

    await collect(provider.streamCompletion([userTurn('hi')], { systemPrompt: '' }));

    expect(mockCreate).toHaveBeenCalledWith(expect.objectContaining({ system: undefined }), { signal: undefined });
  });
});

describe('AnthropicProvider construction', () => {
  it('fails with CONFIGURATION_GAP when no API key is given', () => {
    expect(() => new AnthropicProvider('test-model')).toThrow(
      expect.objectContaining({
        code: 'CONFIGURATION_GAP',
        message: 'Anthropic API key is not configured. Set ANTHROPIC_API_KEY or CLAUDE_API_KEY.',
      })
    );
  });

  it('reports model info', () => {
    expect(new AnthropicProvider(undefined, 'test-key').getModelInfo()).toEqual({
      model: 'claude-sonnet-4-5-20250929',
      maxTokens: 200000,
    });
  });
});
