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
import { IncidentsClient, PdLogEntry, PdNote } from '../shared/pagerDutyClient';
import { stringArg } from '../shared/args';
import { getLogger } from 'server/lib/logger';
import { errorMessage } from 'server/lib/errors/assistantErrors';
import { incidentSummary, refName } from './format';

export class GetIncidentDetailsTool extends BaseTool {
  static readonly Name = 'pagerduty_get_incident_details';

  constructor(private client: IncidentsClient) {
    super(
      'Get one PagerDuty incident with its description, latest notes and timeline.',
      {
        type: 'object',
        properties: {
          incident_id: { type: 'string', description: 'PagerDuty incident ID' },
        },
        required: ['incident_id'],
      },
      'incidents'
    );
  }

  async execute(args: Record<string, unknown>, context: ToolExecutionContext): Promise<ToolOutput> {
    if (this.checkAborted(context)) {
      return this.createErrorResult('Operation cancelled', 'CANCELLED', false);
    }

    try {
      const incidentId = stringArg(args, 'incident_id');
      const incident = await this.client.getIncident(incidentId, context.signal);

      // notes and timeline are extras; the incident itself is the answer
      const [notes, timeline] = await Promise.all([
        this.client.listIncidentNotes(incidentId, context.signal).catch((error: unknown): PdNote[] => {
          getLogger().warn(`PagerDuty: notes unavailable incident=${incidentId} error=${errorMessage(error)}`);
          return [];
        }),
        this.client.listIncidentLogEntries(incidentId, 20, context.signal).catch((error: unknown): PdLogEntry[] => {
          getLogger().warn(`PagerDuty: timeline unavailable incident=${incidentId} error=${errorMessage(error)}`);
          return [];
        }),
      ]);

      return this.createSuccessResult({
        ...incidentSummary(incident),
        resolved_at: incident.resolved_at ?? null,
        description: incident.description,
        notes: notes.slice(0, 10).map((note) => ({
          content: note.content,
          created_at: note.created_at,
          user: refName(note.user),
        })),
        timeline: timeline.slice(0, 20).map((entry) => ({
          type: entry.type,
          created_at: entry.created_at,
          summary: entry.summary,
          agent: refName(entry.agent),
        })),
      });
    } catch (error) {
      return this.createFailureResult(error, 'fetch incident details');
    }
  }
}
