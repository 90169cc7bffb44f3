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
  CLUSTER_SECTION,
  FOUNDATIONS_SECTION,
  INCIDENTS_SECTION,
  METRICS_SECTION,
  QUEUE_SECTION,
  SAFETY_SECTION,
} from './sections';
import { ToolFamily } from '../types/tool';
import { CapabilitySet } from '../types/capability';

export interface PromptSection {
  id: string;
  content: string;
  order: number;
  /** Included only when this integration family is enabled */
  family?: ToolFamily;
}

export const PROMPT_SECTIONS: PromptSection[] = [
  { id: 'foundations', content: FOUNDATIONS_SECTION, order: 1 },
  { id: 'metrics', content: METRICS_SECTION, order: 2, family: 'metrics' },
  { id: 'incidents', content: INCIDENTS_SECTION, order: 3, family: 'incidents' },
  { id: 'cluster', content: CLUSTER_SECTION, order: 4, family: 'cluster' },
  { id: 'queue', content: QUEUE_SECTION, order: 5, family: 'queue' },
  // last, closest to the conversation
  { id: 'safety', content: SAFETY_SECTION, order: 6 },
];

export function selectSections(capabilities: CapabilitySet): PromptSection[] {
  return PROMPT_SECTIONS.slice()
    .sort((a, b) => a.order - b.order)
    .filter((s) => s.family === undefined || capabilities.has(s.family));
}
