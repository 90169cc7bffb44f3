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

export class ListServicesTool extends BaseTool {
  static readonly Name = 'pagerduty_list_services';

  constructor(private client: IncidentsClient) {
    super(
      'List PagerDuty services and their current status (active, warning, critical, maintenance, disabled).',
      {
        type: 'object',
        properties: {
          name_filter: { type: 'string', description: 'Filter services by name' },
          limit: { type: 'number', description: 'Maximum services to return (default: 50)', minimum: 1 },
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
      const nameFilter = optionalStringArg(args, 'name_filter');
      const limit = clamp(numberArg(args, 'limit', 50), 1, 100);
      const services = await this.client.listServices(nameFilter, limit, context.signal);

      const statusSummary: Record<string, number> = { active: 0, warning: 0, critical: 0, maintenance: 0, disabled: 0 };
      const results = services.slice(0, limit).map((service) => {
        if (service.status && service.status in statusSummary) {
          statusSummary[service.status] += 1;
        }
        return {
          id: service.id,
          name: service.name,
          description: service.description ? service.description.slice(0, 200) : null,
          status: service.status ?? 'unknown',
          escalation_policy: refName(service.escalation_policy),
          created_at: service.created_at,
          html_url: service.html_url,
          incident_urgency_rule: service.incident_urgency_rule?.type ?? null,
        };
      });

      return this.createSuccessResult({
        services: results,
        total_count: results.length,
        status_summary: statusSummary,
      });
    } catch (error) {
      return this.createFailureResult(error, 'fetch services');
    }
  }
}
