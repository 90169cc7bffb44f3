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

import { buildSystemPrompt } from '../systemPrompt';
import { selectSections } from '../sectionRegistry';
import { ALL_CAPABILITIES, EMPTY_CAPABILITIES, capabilitySet } from '../../types/capability';

describe('selectSections', () => {
  it('keeps foundations first and safety last around the enabled families', () => {
    expect(selectSections(ALL_CAPABILITIES).map((s) => s.id)).toEqual([
      'foundations',
      'metrics',
      'incidents',
      'cluster',
      'queue',
      'safety',
    ]);
  });

  it('drops sections of disabled families', () => {
    expect(selectSections(capabilitySet(['queue', 'incidents'])).map((s) => s.id)).toEqual([
      'foundations',
      'incidents',
      'queue',
      'safety',
    ]);
  });
});

describe('buildSystemPrompt', () => {
  it('is identical for equal capability sets regardless of insertion order', () => {
    expect(buildSystemPrompt(capabilitySet(['cluster', 'metrics']))).toBe(
      buildSystemPrompt(capabilitySet(['metrics', 'cluster']))
    );
  });

  it('only mentions tools of enabled families', () => {
    const prompt = buildSystemPrompt(capabilitySet(['incidents']));
    expect(prompt).toContain('# PagerDuty');
    expect(prompt).not.toContain('datadog_search_traces');
    expect(prompt).not.toContain('k8s_get_pod_logs');
    expect(prompt).not.toContain('sqs_peek_messages');
  });

  it('adds a note before the safety section when nothing is configured', () => {
    const prompt = buildSystemPrompt(EMPTY_CAPABILITIES);
    expect(prompt.indexOf('# No Integrations')).toBeGreaterThan(0);
    expect(prompt.indexOf('# No Integrations')).toBeLessThan(prompt.indexOf('# Safety'));
  });

  it('does not add the note when some family is enabled', () => {
    expect(buildSystemPrompt(capabilitySet(['queue']))).not.toContain('# No Integrations');
  });
});
