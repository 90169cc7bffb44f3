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
import { clamp, numberArg, optionalStringArg } from '../shared/args';
import { queueNameFromUrl } from './queueUrl';

export class ListQueuesTool extends BaseTool {
  static readonly Name = 'sqs_list_queues';

  constructor(private client: QueueClient) {
    super(
      'List SQS queues, optionally by name prefix. Use this to discover queue names and URLs.',
      {
        type: 'object',
        properties: {
          queue_name_prefix: { type: 'string', description: 'Only queues whose name starts with this prefix' },
          max_results: { type: 'number', description: 'Maximum queues to return (default: 100)', minimum: 1 },
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
      const prefix = optionalStringArg(args, 'queue_name_prefix');
      const maxResults = clamp(numberArg(args, 'max_results', 100), 1, 1000);
      const urls = await this.client.listQueueUrls(prefix, maxResults);
      return this.createSuccessResult({
        queues: urls.map((url) => ({ url, name: queueNameFromUrl(url) })),
        count: urls.length,
      });
    } catch (error) {
      return this.createFailureResult(error, 'list queues');
    }
  }
}
