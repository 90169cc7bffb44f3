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
import { clamp, numberArg, optionalStringArg } from '../shared/args';
import { refName } from './format';

const ALERT_ENTRY_TYPES = new Set(['trigger_log_entry', 'alert_log_entry']);

export class GetRecentAlertsTool extends BaseTool {
  static readonly Name = 'pagerduty_get_recent_alerts';

  constructor(private client: IncidentsClient) {
    super(
      'List alerts that triggered recently, optionally for one service.',
      {
        type: 'object',
        properties: {
          service_id: { type: 'string', description: 'Only alerts for this service ID' },
          since_hours: { type: 'number', description: 'Look-back window in hours (default: 24)', minimum: 1 },
          limit: { type: 'number', description: 'Maximum alerts to return (default: 50)', minimum: 1 },
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
      const serviceId = optionalStringArg(args, 'service_id');
      const sinceHours = clamp(numberArg(args, 'since_hours', 24), 1, 24 * 90);
      const limit = clamp(numberArg(args, 'limit', 50), 1, 100);
      const since = new Date(Date.now() - sinceHours * 3600 * 1000).toISOString();

      const entries = await this.client.listLogEntries({ serviceId, since, limit }, context.signal);
      const alerts = entries
        .filter((entry) => entry.type !== undefined && ALERT_ENTRY_TYPES.has(entry.type))
        .slice(0, limit)
        .map((entry) => ({
          id: entry.id,
          type: entry.type,
          created_at: entry.created_at,
          summary: entry.summary,
          service: refName(entry.service),
          incident: entry.incident ? { id: entry.incident.id, summary: entry.incident.summary } : null,
        }));

      return this.createSuccessResult({ alerts, count: alerts.length, since });
    } catch (error) {
      return this.createFailureResult(error, 'fetch alerts');
    }
  }
}
