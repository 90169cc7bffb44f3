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

export { AssistantCore } from './service';
export type { AssistantConfig, AssistantDependencies, AssistantStatus, SubmitOptions } from './service';
export { AgentEventStream } from './streaming/eventStream';
export { formatServerSentEvent, writeServerSentEvents } from './streaming/sseWriter';
export type { EventWriter } from './streaming/sseWriter';
export type { AgentEvent } from './types/stream';
export type { Turn, TranscriptEntry } from './types/turn';
export type { ToolFamily } from './types/tool';
export type { SessionSummary } from './conversation/session';
export type { ClusterSelection } from './prompts/operatorContext';
