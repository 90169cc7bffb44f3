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

import { Tool, ToolDescriptor, ToolFamily, TOOL_FAMILIES } from '../types/tool';
import { CapabilitySet } from '../types/capability';

export type ToolLookup =
  | { kind: 'tool'; tool: Tool }
  | { kind: 'unsupported'; name: string; reason: 'unknown' | 'disabled' };

function familyRank(family: ToolFamily): number {
  return TOOL_FAMILIES.indexOf(family);
}

function compareDescriptors(a: ToolDescriptor, b: ToolDescriptor): number {
  const byFamily = familyRank(a.family) - familyRank(b.family);
  if (byFamily !== 0) return byFamily;
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

export class ToolRegistry {
  private tools: Map<string, Tool> = new Map();
  private descriptors: Map<string, ToolDescriptor> = new Map();

  register(tool: Tool): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool ${tool.name} already registered`);
    }
    this.tools.set(tool.name, tool);
    this.descriptors.set(
      tool.name,
      Object.freeze({
        name: tool.name,
        family: tool.family,
        description: tool.description,
        parameters: tool.parameters,
        readOnly: tool.readOnly,
      })
    );
  }

  registerMultiple(tools: Tool[]): void {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  getAll(): Tool[] {
    return Array.from(this.tools.values());
  }

  /** Descriptors the model may see for a capability set, ordered by family then name. */
  listAvailable(capabilities: CapabilitySet): ToolDescriptor[] {
    return Array.from(this.descriptors.values())
      .filter((d) => capabilities.has(d.family))
      .sort(compareDescriptors);
  }

  resolve(name: string, capabilities: CapabilitySet): ToolLookup {
    const tool = this.tools.get(name);
    if (!tool) {
      return { kind: 'unsupported', name, reason: 'unknown' };
    }
    if (!capabilities.has(tool.family)) {
      return { kind: 'unsupported', name, reason: 'disabled' };
    }
    return { kind: 'tool', tool };
  }
}
