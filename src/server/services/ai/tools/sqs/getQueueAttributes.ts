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
import { getLogger } from 'server/lib/logger';
import { QUEUE_TARGET_PROPERTIES, queueNameFromUrl, resolveQueueUrl } from './queueUrl';

function intAttr(attrs: Record<string, string>, key: string): number {
  const value = parseInt(attrs[key] ?? '0', 10);
  return Number.isNaN(value) ? 0 : value;
}

function parseRedrivePolicy(raw: string) {
  try {
    const policy: unknown = JSON.parse(raw);
    if (policy === null || typeof policy !== 'object') return undefined;
    return {
      target_arn: Reflect.get(policy, 'deadLetterTargetArn'),
      max_receive_count: Reflect.get(policy, 'maxReceiveCount'),
    };
  } catch (error) {
    getLogger().debug({ error }, 'SQS: unparseable RedrivePolicy');
    return undefined;
  }
}

export class GetQueueAttributesTool extends BaseTool {
  static readonly Name = 'sqs_get_queue_attributes';

  constructor(private client: QueueClient) {
    super(
      'Get message counts, oldest message age, configuration and dead-letter settings of an SQS queue.',
      {
        type: 'object',
        properties: { ...QUEUE_TARGET_PROPERTIES },
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
      const attrs = await this.client.getQueueAttributes(queueUrl);

      const metrics: Record<string, number> = {
        approximate_messages: intAttr(attrs, 'ApproximateNumberOfMessages'),
        approximate_messages_delayed: intAttr(attrs, 'ApproximateNumberOfMessagesDelayed'),
        approximate_messages_not_visible: intAttr(attrs, 'ApproximateNumberOfMessagesNotVisible'),
      };
      if (attrs.ApproximateAgeOfOldestMessage !== undefined) {
        const ageSeconds = intAttr(attrs, 'ApproximateAgeOfOldestMessage');
        metrics.oldest_message_age_seconds = ageSeconds;
        metrics.oldest_message_age_minutes = Math.round((ageSeconds / 60) * 100) / 100;
      }

      const isFifo = (attrs.FifoQueue ?? 'false').toLowerCase() === 'true';
      const data: Record<string, unknown> = {
        queue_url: queueUrl,
        queue_name: queueNameFromUrl(queueUrl),
        metrics,
        configuration: {
          visibility_timeout_seconds: intAttr(attrs, 'VisibilityTimeout'),
          message_retention_seconds: intAttr(attrs, 'MessageRetentionPeriod'),
          max_message_size_bytes: intAttr(attrs, 'MaximumMessageSize'),
          delay_seconds: intAttr(attrs, 'DelaySeconds'),
        },
        timestamps: {
          created: attrs.CreatedTimestamp ?? null,
          last_modified: attrs.LastModifiedTimestamp ?? null,
        },
        is_fifo: isFifo,
      };

      if (attrs.RedrivePolicy) {
        const deadLetter = parseRedrivePolicy(attrs.RedrivePolicy);
        if (deadLetter) data.dead_letter_queue = deadLetter;
      }
      if (isFifo) {
        data.fifo_config = {
          content_based_deduplication: (attrs.ContentBasedDeduplication ?? 'false').toLowerCase() === 'true',
          deduplication_scope: attrs.DeduplicationScope ?? null,
          fifo_throughput_limit: attrs.FifoThroughputLimit ?? null,
        };
      }

      return this.createSuccessResult(data);
    } catch (error) {
      return this.createFailureResult(error, 'get queue attributes');
    }
  }
}
