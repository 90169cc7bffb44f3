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

import { AssistantError } from 'server/lib/errors/assistantErrors';
import { QueueClient } from '../shared/sqsClient';
import { optionalStringArg } from '../shared/args';

export function queueNameFromUrl(url: string): string {
  return url.split('/').pop() ?? url;
}

/** Tools accept either `queue_url` or `queue_name`; a name costs one GetQueueUrl call. */
export async function resolveQueueUrl(client: QueueClient, args: Record<string, unknown>): Promise<string> {
  const queueUrl = optionalStringArg(args, 'queue_url');
  if (queueUrl) return queueUrl;

  const queueName = optionalStringArg(args, 'queue_name');
  if (!queueName) {
    throw new AssistantError('VALIDATION_ERROR', "Provide either 'queue_url' or 'queue_name'");
  }
  const resolved = await client.getQueueUrl(queueName);
  if (!resolved) {
    throw new Error(`Queue '${queueName}' not found`);
  }
  return resolved;
}

export const QUEUE_TARGET_PROPERTIES = {
  queue_url: { type: 'string', description: 'Full SQS queue URL' },
  queue_name: { type: 'string', description: 'Queue name; resolved to a URL when queue_url is not given' },
};
