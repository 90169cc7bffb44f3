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

import {
  SQSClient,
  ListQueuesCommand,
  GetQueueUrlCommand,
  GetQueueAttributesCommand,
  ReceiveMessageCommand,
  type Message,
} from '@aws-sdk/client-sqs';

export interface QueueMessage {
  messageId?: string;
  body: string;
  md5OfBody?: string;
  attributes: Record<string, string>;
  messageAttributes: Record<string, string>;
}

export interface QueueClient {
  listQueueUrls(prefix: string | undefined, maxResults: number): Promise<string[]>;
  getQueueUrl(queueName: string, accountId?: string): Promise<string | undefined>;
  getQueueAttributes(queueUrl: string): Promise<Record<string, string>>;
  /** Receives with visibility timeout 0, so messages stay available to consumers. */
  peekMessages(queueUrl: string, maxMessages: number, waitTimeSeconds: number): Promise<QueueMessage[]>;
}

function stringEntries(record: object | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(record ?? {})) {
    if (typeof value === 'string') result[key] = value;
  }
  return result;
}

function toQueueMessage(message: Message): QueueMessage {
  const messageAttributes: Record<string, string> = {};
  for (const [key, value] of Object.entries(message.MessageAttributes ?? {})) {
    if (value.StringValue !== undefined) {
      messageAttributes[key] = value.StringValue;
    } else if (value.BinaryValue !== undefined) {
      messageAttributes[key] = `<binary ${value.BinaryValue.length} bytes>`;
    }
  }
  return {
    messageId: message.MessageId,
    body: message.Body ?? '',
    md5OfBody: message.MD5OfBody,
    attributes: stringEntries(message.Attributes),
    messageAttributes,
  };
}

export class SqsClient implements QueueClient {
  private readonly client: SQSClient;

  constructor(region: string) {
    // credentials come from the SDK's default chain (env, AWS_PROFILE, instance role)
    this.client = new SQSClient({ region });
  }

  async listQueueUrls(prefix: string | undefined, maxResults: number): Promise<string[]> {
    const response = await this.client.send(
      new ListQueuesCommand({ QueueNamePrefix: prefix, MaxResults: maxResults })
    );
    return response.QueueUrls ?? [];
  }

  async getQueueUrl(queueName: string, accountId?: string): Promise<string | undefined> {
    const response = await this.client.send(
      new GetQueueUrlCommand({ QueueName: queueName, QueueOwnerAWSAccountId: accountId })
    );
    return response.QueueUrl;
  }

  async getQueueAttributes(queueUrl: string): Promise<Record<string, string>> {
    const response = await this.client.send(
      new GetQueueAttributesCommand({ QueueUrl: queueUrl, AttributeNames: ['All'] })
    );
    return stringEntries(response.Attributes);
  }

  async peekMessages(queueUrl: string, maxMessages: number, waitTimeSeconds: number): Promise<QueueMessage[]> {
    const response = await this.client.send(
      new ReceiveMessageCommand({
        QueueUrl: queueUrl,
        MaxNumberOfMessages: maxMessages,
        WaitTimeSeconds: waitTimeSeconds,
        VisibilityTimeout: 0,
        MessageSystemAttributeNames: ['All'],
        MessageAttributeNames: ['All'],
      })
    );
    return (response.Messages ?? []).map(toQueueMessage);
  }
}
