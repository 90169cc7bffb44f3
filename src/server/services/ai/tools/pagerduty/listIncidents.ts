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
import { IncidentsClient } from '../shared/pagerDutyClient';
import { clamp, numberArg, optionalStringArg, stringArrayArg } from '../shared/args';
import { incidentSummary } from './format';

const ACTIVE_STATUSES = ['triggered', 'acknowledged'];

export class ListIncidentsTool extends BaseTool {
  static readonly Name = 'pagerduty_list_incidents';

  constructor(private client: IncidentsClient) {
    super(
      'List PagerDuty incidents with urgency, service and assignees. Defaults to active (triggered and acknowledged) incidents.',
      {
        type: 'object',
        properties: {
          statuses: {
            type: 'array',
            items: { type: 'string', enum: ['triggered', 'acknowledged', 'resolved'] },
            description: "Statuses to include (default: ['triggered', 'acknowledged'])",
          },
          urgency: { type: 'string', enum: ['high', 'low'], description: 'Urgency filter' },
          service_ids: { type: 'array', items: { type: 'string' }, description: 'Service ID filter' },
          limit: { type: 'number', description: 'Maximum incidents to return (default: 25)', minimum: 1 },
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
      const statuses = stringArrayArg(args, 'statuses');
      const urgency = optionalStringArg(args, 'urgency');
      const serviceIds = stringArrayArg(args, 'service_ids');
      const limit = clamp(numberArg(args, 'limit', 25), 1, 100);

      const incidents = await this.client.listIncidents(
        {
          statuses: statuses.length > 0 ? statuses : ACTIVE_STATUSES,
          urgencies: urgency ? [urgency] : undefined,
          serviceIds: serviceIds.length > 0 ? serviceIds : undefined,
          limit,
        },
        context.signal
      );

      const statusSummary: Record<string, number> = { triggered: 0, acknowledged: 0, resolved: 0 };
      const results = incidents.slice(0, limit).map((incident) => {
        if (incident.status && incident.status in statusSummary) {
          statusSummary[incident.status] += 1;
        }
        return incidentSummary(incident);
      });

      return this.createSuccessResult({
        incidents: results,
        total_count: results.length,
        status_summary: statusSummary,
      });
    } catch (error) {
      return this.createFailureResult(error, 'fetch incidents');
    }
  }
}
