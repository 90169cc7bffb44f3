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
import { optionalStringArg, stringArg } from '../shared/args';

export class GetQueueUrlTool extends BaseTool {
  static readonly Name = 'sqs_get_queue_url';

  constructor(private client: QueueClient) {
    super(
      'Resolve an SQS queue name to its URL.',
      {
        type: 'object',
        properties: {
          queue_name: { type: 'string', description: 'Queue name' },
          account_id: { type: 'string', description: 'Owning AWS account ID for cross-account queues' },
        },
        required: ['queue_name'],
      },
      'queue'
    );
  }

  async execute(args: Record<string, unknown>, context: ToolExecutionContext): Promise<ToolOutput> {
    if (this.checkAborted(context)) {
      return this.createErrorResult('Operation cancelled', 'CANCELLED', false);
    }

    try {
      const queueName = stringArg(args, 'queue_name');
      const queueUrl = await this.client.getQueueUrl(queueName, optionalStringArg(args, 'account_id'));
      return this.createSuccessResult({ queue_name: queueName, queue_url: queueUrl ?? null });
    } catch (error) {
      return this.createFailureResult(error, 'get queue URL');
    }
  }
}
