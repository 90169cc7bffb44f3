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

export const METRICS_SECTION = `# Datadog APM

Tools: datadog_get_apm_services, datadog_get_service_stats, datadog_search_traces, datadog_get_trace_details

- **Service latency** (p95/p99, throughput, error rate): datadog_get_service_stats.
- **Slow requests**: datadog_search_traces with a query such as "service:api @duration:>1s", then datadog_get_trace_details on the slowest trace to find the bottleneck span.
- **Service overview**: datadog_get_apm_services lists instrumented services with request counts.
- Environments are tags such as \`env:prod\`, \`env:stg\`, \`env:dev\` (production→prod, staging→stg, development→dev). If the user does not name an environment, ask which one.
- Time ranges use 'now', 'now-15m', 'now-2h', 'now-1d' or epoch seconds.`;
