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
import { stringArg } from '../shared/args';
import { spanAttribute, spanDurationMs } from './metricQueries';

export class GetTraceDetailsTool extends BaseTool {
  static readonly Name = 'datadog_get_trace_details';

  constructor(private client: MetricsClient) {
    super(
      'Get every span of one trace (last 24h), slowest first, with errors and HTTP details.',
      {
        type: 'object',
        properties: {
          trace_id: { type: 'string', description: 'The trace ID' },
        },
        required: ['trace_id'],
      },
      'metrics'
    );
  }

  async execute(args: Record<string, unknown>, context: ToolExecutionContext): Promise<ToolOutput> {
    if (this.checkAborted(context)) {
      return this.createErrorResult('Operation cancelled', 'CANCELLED', false);
    }

    try {
      const traceId = stringArg(args, 'trace_id');
      const records = await this.client.searchSpans(
        { query: `trace_id:${traceId}`, from: 'now-24h', to: 'now', limit: 100 },
        context.signal
      );

      const services = new Set<string>();
      let hasError = false;
      let longestMs = 0;

      const spans = records.map((span) => {
        const durationMs = spanDurationMs(span);
        if (span.attributes?.service) services.add(span.attributes.service);
        if (spanAttribute(span, 'error')) hasError = true;
        if (durationMs !== undefined && durationMs > longestMs) longestMs = durationMs;
        return {
          span_id: span.id,
          parent_id: spanAttribute(span, 'parent_id'),
          service: span.attributes?.service,
          resource: span.attributes?.resource_name,
          operation: spanAttribute(span, 'operation_name'),
          duration_ms: durationMs ?? null,
          status: spanAttribute(span, 'status'),
          error: spanAttribute(span, 'error'),
          error_message: spanAttribute(span, 'error.message'),
          http_method: spanAttribute(span, 'http.method'),
          http_url: spanAttribute(span, 'http.url'),
          http_status: spanAttribute(span, 'http.status_code'),
        };
      });

      spans.sort((a, b) => (b.duration_ms ?? 0) - (a.duration_ms ?? 0));

      return this.createSuccessResult({
        trace_id: traceId,
        total_duration_ms: longestMs > 0 ? longestMs : null,
        span_count: spans.length,
        services: [...services],
        has_error: hasError,
        spans,
        url: `https://app.${this.client.site}/apm/trace/${traceId}`,
      });
    } catch (error) {
      return this.createFailureResult(error, 'fetch trace details');
    }
  }
}
