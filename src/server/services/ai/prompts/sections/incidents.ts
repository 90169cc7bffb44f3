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

export const INCIDENTS_SECTION = `# PagerDuty

Tools: pagerduty_list_incidents, pagerduty_get_incident_details, pagerduty_get_oncall, pagerduty_list_services, pagerduty_get_recent_alerts, pagerduty_acknowledge_incident, pagerduty_resolve_incident

- Active incidents: pagerduty_list_incidents (triggered and acknowledged by default).
- Who is on call: pagerduty_get_oncall.
- Notes and timeline of one incident: pagerduty_get_incident_details.
- Acknowledging or resolving changes the incident for everyone. Only do it when the user asked for that exact incident.`;
