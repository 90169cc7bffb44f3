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
import { MetricsClient } from '../shared/datadogClient';
import { numberArg, optionalStringArg, clamp } from '../shared/args';
import { APM_SPAN_TYPES, normalizeEnv, scopeTag, seriesValues } from './metricQueries';

interface ServiceHits {
  service: string;
  requests_last_hour: number;
  span_types: string[];
}

export class GetApmServicesTool extends BaseTool {
  static readonly Name = 'datadog_get_apm_services';

  constructor(private client: MetricsClient) {
    super(
      'List APM services that served traffic in the last hour, busiest first. Use this to discover service names before asking for service stats.',
      {
        type: 'object',
        properties: {
          env: { type: 'string', description: 'Environment filter (e.g. "prod", "staging")' },
          limit: { type: 'number', description: 'Maximum services to return (default: 50)', minimum: 1 },
        },
      },
      'metrics'
    );
  }

  async execute(args: Record<string, unknown>, context: ToolExecutionContext): Promise<ToolOutput> {
    if (this.checkAborted(context)) {
      return this.createErrorResult('Operation cancelled', 'CANCELLED', false);
    }

    const env = optionalStringArg(args, 'env');
    const limit = clamp(numberArg(args, 'limit', 50), 1, 500);
    const envTag = normalizeEnv(env);
    const envFilter = envTag ? `,env:${envTag}` : '';
    const now = Math.floor(Date.now() / 1000);

    const byService = new Map<string, ServiceHits>();
    const failures: unknown[] = [];

    for (const spanType of APM_SPAN_TYPES) {
      const query = `sum:trace.${spanType}.hits{*${envFilter}} by {service}.as_count()`;
      try {
        const series = await this.client.queryMetrics(query, now - 3600, now, context.signal);
        for (const s of series) {
          const service = scopeTag(s.scope, 'service');
          const hits = seriesValues(s).reduce((sum, v) => sum + v, 0);
          if (!service || hits <= 0) continue;

          const entry = byService.get(service) ?? { service, requests_last_hour: 0, span_types: [] };
          entry.requests_last_hour += Math.round(hits);
          if (!entry.span_types.includes(spanType)) entry.span_types.push(spanType);
          byService.set(service, entry);
        }
      } catch (error) {
        failures.push(error);
      }
    }

    if (failures.length === APM_SPAN_TYPES.length) {
      return this.createFailureResult(failures[0], 'fetch APM services');
    }

    const services = [...byService.values()].sort((a, b) => b.requests_last_hour - a.requests_last_hour);
    return this.createSuccessResult({
      services: services.slice(0, limit),
      count: Math.min(services.length, limit),
      total_discovered: services.length,
      env_filter: env ?? null,
    });
  }
}
