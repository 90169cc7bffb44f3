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
import { clamp, numberArg, optionalStringArg, stringArg } from '../shared/args';
import { spanAttribute, spanDurationMs } from './metricQueries';

export class SearchTracesTool extends BaseTool {
  static readonly Name = 'datadog_search_traces';

  constructor(private client: MetricsClient) {
    super(
      'Search APM spans, newest first, one entry per trace. Query uses span search syntax, e.g. "service:checkout @duration:>1s status:error".',
      {
        type: 'object',
        properties: {
          query: { type: 'string', description: 'Span search query' },
          from_time: { type: 'string', description: 'Window start (default: "now-15m")' },
          to_time: { type: 'string', description: 'Window end (default: "now")' },
          limit: { type: 'number', description: 'Maximum spans to fetch (default: 50)', minimum: 1 },
        },
        required: ['query'],
      },
      'metrics'
    );
  }

  async execute(args: Record<string, unknown>, context: ToolExecutionContext): Promise<ToolOutput> {
    if (this.checkAborted(context)) {
      return this.createErrorResult('Operation cancelled', 'CANCELLED', false);
    }

    try {
      const query = stringArg(args, 'query');
      const from = optionalStringArg(args, 'from_time') ?? 'now-15m';
      const to = optionalStringArg(args, 'to_time') ?? 'now';
      const limit = clamp(numberArg(args, 'limit', 50), 1, 1000);

      const spans = await this.client.searchSpans({ query, from, to, limit, newestFirst: true }, context.signal);

      const seenTraces = new Set<string>();
      const traces = [];
      for (const span of spans) {
        const traceId = spanAttribute(span, 'trace_id');
        if (typeof traceId === 'string') {
          if (seenTraces.has(traceId)) continue;
          seenTraces.add(traceId);
        }
        traces.push({
          span_id: span.id,
          trace_id: traceId ?? null,
          service: span.attributes?.service,
          resource: span.attributes?.resource_name,
          operation: spanAttribute(span, 'operation_name'),
          duration_ms: spanDurationMs(span) ?? null,
          status: spanAttribute(span, 'status'),
          error: spanAttribute(span, 'error'),
          timestamp: span.attributes?.timestamp,
          host: span.attributes?.host,
        });
      }

      return this.createSuccessResult({ query, from, to, traces, count: traces.length });
    } catch (error) {
      return this.createFailureResult(error, 'search traces');
    }
  }
}
