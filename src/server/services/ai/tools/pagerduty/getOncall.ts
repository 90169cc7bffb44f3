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
import { IncidentsClient, PdReference } from '../shared/pagerDutyClient';
import { stringArrayArg } from '../shared/args';

function namedRef(ref: PdReference | null | undefined) {
  return ref ? { id: ref.id, name: ref.summary } : null;
}

export class GetOncallTool extends BaseTool {
  static readonly Name = 'pagerduty_get_oncall';

  constructor(private client: IncidentsClient) {
    super(
      'Show who is on call right now, per schedule and escalation level.',
      {
        type: 'object',
        properties: {
          schedule_ids: { type: 'array', items: { type: 'string' }, description: 'Schedule ID filter' },
          escalation_policy_ids: {
            type: 'array',
            items: { type: 'string' },
            description: 'Escalation policy ID filter',
          },
        },
      },
      'incidents'
    );
  }

  async execute(args: Record<string, unknown>, context: ToolExecutionContext): Promise<ToolOutput> {
    if (this.checkAborted(context)) {
      return this.createErrorResult('Operation cancelled', 'CANCELLED', false);
    }

    try {
      const scheduleIds = stringArrayArg(args, 'schedule_ids');
      const policyIds = stringArrayArg(args, 'escalation_policy_ids');
      const oncalls = await this.client.listOncalls(
        {
          scheduleIds: scheduleIds.length > 0 ? scheduleIds : undefined,
          escalationPolicyIds: policyIds.length > 0 ? policyIds : undefined,
        },
        context.signal
      );

      // the API repeats a user once per escalation policy that references the schedule
      const seen = new Set<string>();
      const results = [];
      for (const oncall of oncalls) {
        const key = `${oncall.user?.id}:${oncall.schedule?.id}:${oncall.escalation_level}`;
        if (seen.has(key)) continue;
        seen.add(key);
        results.push({
          user: { id: oncall.user?.id, name: oncall.user?.summary, email: oncall.user?.email },
          schedule: namedRef(oncall.schedule),
          escalation_policy: namedRef(oncall.escalation_policy),
          escalation_level: oncall.escalation_level,
          start: oncall.start ?? null,
          end: oncall.end ?? null,
        });
      }

      return this.createSuccessResult({ oncalls: results, count: results.length });
    } catch (error) {
      return this.createFailureResult(error, 'fetch on-call information');
    }
  }
}
