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

import { BaseTool } from '../baseTool';
import { ToolExecutionContext, ToolOutput } from '../../types/tool';
import { QueueClient } from '../shared/sqsClient';
import { clamp, numberArg } from '../shared/args';
import { QUEUE_TARGET_PROPERTIES, queueNameFromUrl, resolveQueueUrl } from './queueUrl';

const MAX_RAW_BODY = 1000;

function parseBody(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return body;
  }
}

export class PeekMessagesTool extends BaseTool {
  static readonly Name = 'sqs_peek_messages';

  constructor(private client: QueueClient) {
    super(
      'Look at up to 10 messages in an SQS queue without consuming them (visibility timeout 0; nothing is deleted).',
      {
        type: 'object',
        properties: {
          ...QUEUE_TARGET_PROPERTIES,
          max_messages: { type: 'number', description: 'Messages to peek at, 1-10 (default: 10)', minimum: 1 },
          wait_time_seconds: { type: 'number', description: 'Long-poll wait, 0-20 seconds (default: 0)', minimum: 0 },
        },
      },
      'queue'
    );
  }

  async execute(args: Record<string, unknown>, context: ToolExecutionContext): Promise<ToolOutput> {
    if (this.checkAborted(context)) {
      return this.createErrorResult('Operation cancelled', 'CANCELLED', false);
    }

    try {
      const queueUrl = await resolveQueueUrl(this.client, args);
      const maxMessages = clamp(numberArg(args, 'max_messages', 10), 1, 10);
      const waitTime = clamp(numberArg(args, 'wait_time_seconds', 0), 0, 20);
      const messages = await this.client.peekMessages(queueUrl, maxMessages, waitTime);

      return this.createSuccessResult({
        queue_url: queueUrl,
        queue_name: queueNameFromUrl(queueUrl),
        messages: messages.map((message) => ({
          message_id: message.messageId,
          body: parseBody(message.body),
          body_raw: message.body.length > MAX_RAW_BODY ? `${message.body.slice(0, MAX_RAW_BODY)}...` : message.body,
          sent_timestamp: message.attributes.SentTimestamp ?? null,
          approximate_receive_count: parseInt(message.attributes.ApproximateReceiveCount ?? '0', 10),
          message_attributes: message.messageAttributes,
        })),
        count: messages.length,
        note: 'Messages peeked with visibility timeout 0 (not removed from queue)',
      });
    } catch (error) {
      return this.createFailureResult(error, 'peek messages');
    }
  }
}
