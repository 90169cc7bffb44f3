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

import { PdIncident, PdReference } from '../shared/pagerDutyClient';

export function refName(ref: PdReference | null | undefined): string | null {
  return ref?.summary ?? null;
}

export function incidentSummary(incident: PdIncident) {
  return {
    id: incident.id,
    incident_number: incident.incident_number,
    title: incident.title,
    status: incident.status,
    urgency: incident.urgency,
    created_at: incident.created_at,
    service: {
      id: incident.service?.id ?? null,
      name: refName(incident.service),
    },
    assigned_to: (incident.assignments ?? []).map((a) => refName(a.assignee)),
    escalation_policy: refName(incident.escalation_policy),
    html_url: incident.html_url,
  };
}
