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

import { buildQuery, requestJson, QueryValue } from './httpClient';
import { assertMutationAllowed, MutationGuard } from './mutationGuard';

const PAGERDUTY_API = 'https://api.pagerduty.com';

export interface PdReference {
  id?: string;
  summary?: string;
  email?: string;
}

export interface PdIncident {
  id?: string;
  incident_number?: number;
  title?: string;
  status?: string;
  urgency?: string;
  created_at?: string;
  resolved_at?: string | null;
  description?: string;
  service?: PdReference;
  assignments?: Array<{ assignee?: PdReference }>;
  escalation_policy?: PdReference;
  html_url?: string;
}

export interface PdNote {
  content?: string;
  created_at?: string;
  user?: PdReference;
}

export interface PdLogEntry {
  id?: string;
  type?: string;
  created_at?: string;
  summary?: string;
  agent?: PdReference;
  service?: PdReference;
  incident?: PdReference;
}

export interface PdOncall {
  user?: PdReference;
  schedule?: PdReference | null;
  escalation_policy?: PdReference | null;
  escalation_level?: number;
  start?: string | null;
  end?: string | null;
}

export interface PdService {
  id?: string;
  name?: string;
  description?: string | null;
  status?: string;
  escalation_policy?: PdReference;
  created_at?: string;
  html_url?: string;
  incident_urgency_rule?: { type?: string };
}

export interface IncidentFilter {
  statuses: string[];
  urgencies?: string[];
  serviceIds?: string[];
  limit: number;
}

export interface OncallFilter {
  scheduleIds?: string[];
  escalationPolicyIds?: string[];
}

export interface LogEntryFilter {
  serviceId?: string;
  since: string;
  limit: number;
}

export type IncidentStatusUpdate = 'acknowledged' | 'resolved';

export interface IncidentsClient {
  listIncidents(filter: IncidentFilter, signal?: AbortSignal): Promise<PdIncident[]>;
  getIncident(id: string, signal?: AbortSignal): Promise<PdIncident>;
  listIncidentNotes(id: string, signal?: AbortSignal): Promise<PdNote[]>;
  listIncidentLogEntries(id: string, limit: number, signal?: AbortSignal): Promise<PdLogEntry[]>;
  listOncalls(filter: OncallFilter, signal?: AbortSignal): Promise<PdOncall[]>;
  listServices(query: string | undefined, limit: number, signal?: AbortSignal): Promise<PdService[]>;
  listLogEntries(filter: LogEntryFilter, signal?: AbortSignal): Promise<PdLogEntry[]>;
  updateIncidentStatus(
    id: string,
    status: IncidentStatusUpdate,
    guard: MutationGuard,
    resolution?: string,
    signal?: AbortSignal
  ): Promise<PdIncident>;
}

export interface PagerDutyClientConfig {
  apiKey: string;
  fromEmail: string;
}

export class PagerDutyClient implements IncidentsClient {
  private readonly headers: Record<string, string>;

  constructor(config: PagerDutyClientConfig) {
    this.headers = {
      Authorization: `Token token=${config.apiKey}`,
      Accept: 'application/vnd.pagerduty+json;version=2',
      From: config.fromEmail,
    };
  }

  private get<T>(path: string, params: Record<string, QueryValue>, signal?: AbortSignal): Promise<T> {
    return requestJson<T>('PagerDuty', `${PAGERDUTY_API}${path}${buildQuery(params)}`, {
      headers: this.headers,
      signal,
    });
  }

  async listIncidents(filter: IncidentFilter, signal?: AbortSignal) {
    const response = await this.get<{ incidents?: PdIncident[] }>(
      '/incidents',
      {
        'statuses[]': filter.statuses,
        'urgencies[]': filter.urgencies,
        'service_ids[]': filter.serviceIds,
        limit: filter.limit,
      },
      signal
    );
    return response.incidents ?? [];
  }

  async getIncident(id: string, signal?: AbortSignal) {
    const response = await this.get<{ incident?: PdIncident }>(`/incidents/${encodeURIComponent(id)}`, {}, signal);
    return response.incident ?? {};
  }

  async listIncidentNotes(id: string, signal?: AbortSignal) {
    const response = await this.get<{ notes?: PdNote[] }>(`/incidents/${encodeURIComponent(id)}/notes`, {}, signal);
    return response.notes ?? [];
  }

  async listIncidentLogEntries(id: string, limit: number, signal?: AbortSignal) {
    const response = await this.get<{ log_entries?: PdLogEntry[] }>(
      `/incidents/${encodeURIComponent(id)}/log_entries`,
      { limit },
      signal
    );
    return response.log_entries ?? [];
  }

  async listOncalls(filter: OncallFilter, signal?: AbortSignal) {
    const response = await this.get<{ oncalls?: PdOncall[] }>(
      '/oncalls',
      {
        'schedule_ids[]': filter.scheduleIds,
        'escalation_policy_ids[]': filter.escalationPolicyIds,
      },
      signal
    );
    return response.oncalls ?? [];
  }

  async listServices(query: string | undefined, limit: number, signal?: AbortSignal) {
    const response = await this.get<{ services?: PdService[] }>('/services', { query, limit }, signal);
    return response.services ?? [];
  }

  async listLogEntries(filter: LogEntryFilter, signal?: AbortSignal) {
    const path = filter.serviceId ? `/services/${encodeURIComponent(filter.serviceId)}/log_entries` : '/log_entries';
    const response = await this.get<{ log_entries?: PdLogEntry[] }>(
      path,
      {
        since: filter.since,
        limit: filter.limit,
        is_overview: filter.serviceId ? undefined : true,
      },
      signal
    );
    return response.log_entries ?? [];
  }

  async updateIncidentStatus(
    id: string,
    status: IncidentStatusUpdate,
    guard: MutationGuard,
    resolution?: string,
    signal?: AbortSignal
  ) {
    assertMutationAllowed(guard, `set incident ${id} to ${status}`);
    const response = await requestJson<{ incident?: PdIncident }>(
      'PagerDuty',
      `${PAGERDUTY_API}/incidents/${encodeURIComponent(id)}`,
      {
        method: 'PUT',
        headers: this.headers,
        signal,
        body: {
          incident: {
            type: 'incident_reference',
            status,
            ...(resolution ? { resolution } : {}),
          },
        },
      }
    );
    return response.incident ?? {};
  }
}
