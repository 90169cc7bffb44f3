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
import { optionalStringArg, stringArg } from '../shared/args';

export class AcknowledgeIncidentTool extends BaseTool {
  static readonly Name = 'pagerduty_acknowledge_incident';

  constructor(private client: IncidentsClient) {
    super(
      'Acknowledge a triggered PagerDuty incident. This changes incident state; only call it when the user asks to acknowledge.',
      {
        type: 'object',
        properties: {
          incident_id: { type: 'string', description: 'PagerDuty incident ID' },
        },
        required: ['incident_id'],
      },
      'incidents',
      false
    );
  }

  async execute(args: Record<string, unknown>, context: ToolExecutionContext): Promise<ToolOutput> {
    if (this.checkAborted(context)) {
      return this.createErrorResult('Operation cancelled', 'CANCELLED', false);
    }

    try {
      const incidentId = stringArg(args, 'incident_id');
      const incident = await this.client.updateIncidentStatus(
        incidentId,
        'acknowledged',
        context,
        undefined,
        context.signal
      );
      return this.createSuccessResult({
        incident_id: incidentId,
        new_status: incident.status ?? 'acknowledged',
        message: `Incident ${incidentId} acknowledged`,
      });
    } catch (error) {
      return this.createFailureResult(error, 'acknowledge incident');
    }
  }
}

export class ResolveIncidentTool extends BaseTool {
  static readonly Name = 'pagerduty_resolve_incident';

  constructor(private client: IncidentsClient) {
    super(
      'Resolve a PagerDuty incident, with an optional resolution note. This changes incident state; only call it when the user asks to resolve.',
      {
        type: 'object',
        properties: {
          incident_id: { type: 'string', description: 'PagerDuty incident ID' },
          resolution: { type: 'string', description: 'Resolution note' },
        },
        required: ['incident_id'],
      },
      'incidents',
      false
    );
  }

  async execute(args: Record<string, unknown>, context: ToolExecutionContext): Promise<ToolOutput> {
    if (this.checkAborted(context)) {
      return this.createErrorResult('Operation cancelled', 'CANCELLED', false);
    }

    try {
      const incidentId = stringArg(args, 'incident_id');
      const resolution = optionalStringArg(args, 'resolution');
      const incident = await this.client.updateIncidentStatus(
        incidentId,
        'resolved',
        context,
        resolution,
        context.signal
      );
      return this.createSuccessResult({
        incident_id: incidentId,
        new_status: incident.status ?? 'resolved',
        message: `Incident ${incidentId} resolved`,
      });
    } catch (error) {
      return this.createFailureResult(error, 'resolve incident');
    }
  }
}
