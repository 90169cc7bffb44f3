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

export const QUEUE_SECTION = `# AWS SQS (read-only)

Tools: sqs_list_queues, sqs_get_queue_url, sqs_get_queue_attributes, sqs_peek_messages

- Queue depth, oldest message age and dead-letter settings: sqs_get_queue_attributes. It accepts queue_name directly.
- sqs_peek_messages looks at messages with visibility timeout 0; nothing is consumed or deleted.
- To inspect a dead-letter queue, read its name from the dead_letter_queue target ARN and peek at it.`;
