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
import { optionalStringArg, stringArg } from '../shared/args';
import { APM_SPAN_TYPES, ValueSummary, normalizeEnv, parseRelativeTime, seriesValues, summarize } from './metricQueries';

type StatName = 'latency_avg' | 'latency_p95' | 'latency_p99' | 'requests' | 'errors';

const STAT_NAMES: StatName[] = ['latency_avg', 'latency_p95', 'latency_p99', 'requests', 'errors'];

function round3(value: number | undefined): number | null {
  return value === undefined ? null : Math.round(value * 1000) / 1000;
}

export class GetServiceStatsTool extends BaseTool {
  static readonly Name = 'datadog_get_service_stats';

  constructor(private client: MetricsClient) {
    super(
      'Get latency (avg/p95/p99), throughput and error rate for one APM service over a time window.',
      {
        type: 'object',
        properties: {
          service: { type: 'string', description: 'APM service name' },
          env: { type: 'string', description: 'Environment filter (e.g. "prod")' },
          from_time: { type: 'string', description: 'Window start, e.g. "now-1h" (default), "now-30m" or epoch seconds' },
          to_time: { type: 'string', description: 'Window end (default: "now")' },
        },
        required: ['service'],
      },
      'metrics'
    );
  }

  async execute(args: Record<string, unknown>, context: ToolExecutionContext): Promise<ToolOutput> {
    if (this.checkAborted(context)) {
      return this.createErrorResult('Operation cancelled', 'CANCELLED', false);
    }

    try {
      const service = stringArg(args, 'service');
      const env = optionalStringArg(args, 'env');
      const fromTime = optionalStringArg(args, 'from_time') ?? 'now-1h';
      const toTime = optionalStringArg(args, 'to_time') ?? 'now';
      const now = Math.floor(Date.now() / 1000);
      const from = parseRelativeTime(fromTime, now);
      const to = parseRelativeTime(toTime, now);
      const envTag = normalizeEnv(env);
      const scope = `{service:${service}${envTag ? `,env:${envTag}` : ''}}`;

      let stats: Partial<Record<StatName, ValueSummary>> = {};
      let spanType: string | undefined;

      for (const candidate of APM_SPAN_TYPES) {
        const queries: Record<StatName, string> = {
          latency_avg: `avg:trace.${candidate}.duration${scope}`,
          latency_p95: `avg:trace.${candidate}.duration.by.service.95p${scope}`,
          latency_p99: `avg:trace.${candidate}.duration.by.service.99p${scope}`,
          requests: `sum:trace.${candidate}.hits${scope}.as_rate()`,
          errors: `sum:trace.${candidate}.errors${scope}.as_rate()`,
        };

        const found: Partial<Record<StatName, ValueSummary>> = {};
        for (const name of STAT_NAMES) {
          const series = await this.client.queryMetrics(queries[name], from, to, context.signal);
          const summary = series.length > 0 ? summarize(seriesValues(series[0])) : undefined;
          if (summary) found[name] = summary;
        }

        if (Object.keys(found).length > 0) {
          stats = found;
          spanType = candidate;
          break;
        }
      }

      const requestsAvg = stats.requests?.avg;
      const errorsAvg = stats.errors?.avg;
      const errorRate =
        requestsAvg !== undefined && errorsAvg !== undefined && requestsAvg > 0 ? (errorsAvg / requestsAvg) * 100 : null;

      // duration is reported in ms, the percentile rollups in seconds
      const p95 = stats.latency_p95?.avg;
      const p99 = stats.latency_p99?.avg;

      const data: Record<string, unknown> = {
        service,
        env: envTag ?? null,
        from: fromTime,
        to: toTime,
        latency: {
          avg_ms: round3(stats.latency_avg?.avg),
          p95_ms: round3(p95 === undefined ? undefined : p95 * 1000),
          p99_ms: round3(p99 === undefined ? undefined : p99 * 1000),
        },
        throughput: {
          requests_per_sec: requestsAvg ?? null,
          peak_requests_per_sec: stats.requests?.max ?? null,
        },
        errors: {
          errors_per_sec: errorsAvg ?? null,
          error_rate_percent: errorRate,
        },
        url: `https://app.${this.client.site}/apm/service/${service}`,
      };

      if (spanType) {
        data.span_type = spanType;
      } else {
        data.warning =
          `No APM data found for service '${service}'${env ? ` in env '${env}'` : ''}. ` +
          'The service may not be instrumented, may use a different name, or had no recent traffic.';
        data.tried_span_types = [...APM_SPAN_TYPES];
      }

      return this.createSuccessResult(data);
    } catch (error) {
      return this.createFailureResult(error, 'fetch service stats');
    }
  }
}

