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

import { CapabilitySet } from '../types/capability';
import { selectSections } from './sectionRegistry';

const NO_TOOLS_NOTE = `# No Integrations

No monitoring, incident, cluster or queue integration is configured. Answer from the conversation only and tell the user which integration would be needed.`;

/**
 * Same capability set, same prompt: sections are fixed text in a fixed order,
 * so repeated runs produce identical prompts.
 */
export function buildSystemPrompt(capabilities: CapabilitySet): string {
  const sections = selectSections(capabilities).map((s) => s.content);
  if (capabilities.size === 0) {
    sections.splice(sections.length - 1, 0, NO_TOOLS_NOTE);
  }
  return sections.join('\n\n');
}
