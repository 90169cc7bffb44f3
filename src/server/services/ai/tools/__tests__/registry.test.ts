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

import { ToolRegistry } from '../registry';
import { Tool, ToolOutput } from '../../types/tool';
import { capabilitySet, ALL_CAPABILITIES, EMPTY_CAPABILITIES } from '../../types/capability';

function makeTool(overrides: Partial<Tool> = {}): Tool {
  return {
    name: 'test_tool',
    family: 'metrics',
    description: 'test',
    parameters: { type: 'object' },
    readOnly: true,
    execute: jest.fn<Promise<ToolOutput>, []>().mockResolvedValue({ success: true, data: null }),
    ...overrides,
  };
}

describe('ToolRegistry', () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry();
  });

  it('register() adds tool and get() returns it', () => {
    const tool = makeTool();
    registry.register(tool);
    expect(registry.get('test_tool')).toBe(tool);
  });

  it('register() throws if duplicate name', () => {
    registry.register(makeTool());
    expect(() => registry.register(makeTool())).toThrow('Tool test_tool already registered');
  });

  it('registerMultiple() registers array of tools', () => {
    registry.registerMultiple([makeTool({ name: 'a' }), makeTool({ name: 'b' })]);
    expect(registry.getAll()).toHaveLength(2);
  });

  it('get() returns undefined for unknown tool', () => {
    expect(registry.get('nonexistent')).toBeUndefined();
  });

  describe('listAvailable', () => {
    beforeEach(() => {
      registry.registerMultiple([
        makeTool({ name: 'sqs_list_queues', family: 'queue' }),
        makeTool({ name: 'pagerduty_list_incidents', family: 'incidents' }),
        makeTool({ name: 'k8s_list_pods', family: 'cluster' }),
        makeTool({ name: 'datadog_search_traces', family: 'metrics' }),
        makeTool({ name: 'pagerduty_get_oncall', family: 'incidents' }),
        makeTool({ name: 'datadog_get_apm_services', family: 'metrics' }),
      ]);
    });

    it('orders by family then name', () => {
      expect(registry.listAvailable(ALL_CAPABILITIES).map((d) => d.name)).toEqual([
        'datadog_get_apm_services',
        'datadog_search_traces',
        'pagerduty_get_oncall',
        'pagerduty_list_incidents',
        'k8s_list_pods',
        'sqs_list_queues',
      ]);
    });

    it('returns only descriptors of enabled families', () => {
      const available = registry.listAvailable(capabilitySet(['incidents']));
      expect(available.map((d) => d.name)).toEqual(['pagerduty_get_oncall', 'pagerduty_list_incidents']);
      expect(available.every((d) => d.family === 'incidents')).toBe(true);
    });

    it('is stable across repeated calls', () => {
      const caps = capabilitySet(['queue', 'metrics']);
      expect(registry.listAvailable(caps)).toEqual(registry.listAvailable(caps));
    });

    it('returns nothing for an empty capability set', () => {
      expect(registry.listAvailable(EMPTY_CAPABILITIES)).toEqual([]);
    });

    it('returns frozen descriptors without the handler', () => {
      const [descriptor] = registry.listAvailable(capabilitySet(['cluster']));
      expect(descriptor).toEqual({
        name: 'k8s_list_pods',
        family: 'cluster',
        description: 'test',
        parameters: { type: 'object' },
        readOnly: true,
      });
      expect(Object.isFrozen(descriptor)).toBe(true);
    });
  });

  describe('resolve', () => {
    it('finds a tool whose family is enabled', () => {
      const tool = makeTool({ name: 'k8s_list_pods', family: 'cluster' });
      registry.register(tool);
      expect(registry.resolve('k8s_list_pods', capabilitySet(['cluster']))).toEqual({ kind: 'tool', tool });
    });

    it('reports unknown names as unsupported', () => {
      expect(registry.resolve('rm_rf', ALL_CAPABILITIES)).toEqual({
        kind: 'unsupported',
        name: 'rm_rf',
        reason: 'unknown',
      });
    });

    it('reports tools of disabled families as unsupported', () => {
      registry.register(makeTool({ name: 'datadog_search_traces', family: 'metrics' }));
      expect(registry.resolve('datadog_search_traces', capabilitySet(['incidents']))).toEqual({
        kind: 'unsupported',
        name: 'datadog_search_traces',
        reason: 'disabled',
      });
    });
  });
});
