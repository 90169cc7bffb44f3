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

import { GetApmServicesTool } from '../getApmServices';
import { GetServiceStatsTool } from '../getServiceStats';
import { SearchTracesTool } from '../searchTraces';
import { GetTraceDetailsTool } from '../getTraceDetails';
import { parseRelativeTime, normalizeEnv } from '../metricQueries';
import { MetricSeries, MetricsClient, SpanRecord, SpanSearch } from '../../shared/datadogClient';
import { HttpError } from '../../shared/httpClient';
import { ToolExecutionContext } from '../../../types/tool';

const queryMetrics = jest.fn<Promise<MetricSeries[]>, [string, number, number, AbortSignal?]>();
const searchSpans = jest.fn<Promise<SpanRecord[]>, [SpanSearch, AbortSignal?]>();
const client: MetricsClient = { site: 'datadoghq.com', queryMetrics, searchSpans };

function context(): ToolExecutionContext {
  return { signal: new AbortController().signal, allowMutation: false };
}

beforeEach(() => {
  jest.resetAllMocks();
});

describe('metricQueries', () => {
  it('parses relative and epoch times', () => {
    expect(parseRelativeTime('now', 10_000)).toBe(10_000);
    expect(parseRelativeTime('now-15m', 10_000)).toBe(9_100);
    expect(parseRelativeTime('now-2h', 10_000)).toBe(2_800);
    expect(parseRelativeTime('now-1d', 100_000)).toBe(13_600);
    expect(parseRelativeTime('1700000000', 10_000)).toBe(1_700_000_000);
  });

  it('rejects unknown time formats', () => {
    expect(() => parseRelativeTime('yesterday', 10_000)).toThrow("Unrecognized time 'yesterday'");
  });

  it('maps env aliases to reported tags', () => {
    expect(normalizeEnv('PROD')).toBe('production');
    expect(normalizeEnv('staging')).toBe('stg');
    expect(normalizeEnv('qa')).toBe('qa');
    expect(normalizeEnv(undefined)).toBeUndefined();
  });
});

describe('GetApmServicesTool', () => {
  const tool = new GetApmServicesTool(client);

  it('merges hits across span types and sorts busiest first', async () => {
    queryMetrics.mockImplementation(async (query) => {
      if (query.startsWith('sum:trace.web.request.hits')) {
        return [
          { scope: 'service:checkout,env:production', pointlist: [[1, 10], [2, null], [3, 5]] },
          { scope: 'service:cart,env:production', pointlist: [[1, 2]] },
        ];
      }
      if (query.startsWith('sum:trace.grpc.request.hits')) {
        return [{ scope: 'env:production,service:cart', pointlist: [[1, 30]] }];
      }
      return [];
    });

    const result = await tool.execute({ env: 'prod' }, context());

    expect(queryMetrics.mock.calls[0][0]).toBe('sum:trace.web.request.hits{*,env:production} by {service}.as_count()');
    expect(result).toEqual({
      success: true,
      data: {
        services: [
          { service: 'cart', requests_last_hour: 32, span_types: ['web.request', 'grpc.request'] },
          { service: 'checkout', requests_last_hour: 15, span_types: ['web.request'] },
        ],
        count: 2,
        total_discovered: 2,
        env_filter: 'prod',
      },
    });
  });

  it('fails when every query fails', async () => {
    queryMetrics.mockRejectedValue(new HttpError('Datadog', 403, 'Forbidden'));

    const result = await tool.execute({}, context());

    expect(result).toEqual({
      success: false,
      error: {
        message: 'Datadog permission denied. Check that the API key has the required permissions.',
        code: 'BACKEND_ERROR',
        recoverable: false,
      },
    });
  });

  it('returns a cancelled error without calling the backend when aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const result = await tool.execute({}, { signal: controller.signal, allowMutation: false });
    expect(result.success).toBe(false);
    expect(queryMetrics).not.toHaveBeenCalled();
  });
});

describe('GetServiceStatsTool', () => {
  const tool = new GetServiceStatsTool(client);

  it('reports stats from the first span type with data', async () => {
    queryMetrics.mockImplementation(async (query) => {
      if (!query.includes('trace.servlet.request.')) return [];
      if (query.includes('.duration{')) return [{ pointlist: [[1, 100], [2, 200]] }];
      if (query.includes('.95p{')) return [{ pointlist: [[1, 0.5]] }];
      if (query.includes('.99p{')) return [{ pointlist: [[1, 2]] }];
      if (query.includes('.hits{')) return [{ pointlist: [[1, 10], [2, 30]] }];
      if (query.includes('.errors{')) return [{ pointlist: [[1, 4], [2, 6]] }];
      return [];
    });

    const result = await tool.execute({ service: 'api', env: 'prod' }, context());

    expect(queryMetrics).toHaveBeenCalledWith(
      'avg:trace.servlet.request.duration{service:api,env:production}',
      expect.any(Number),
      expect.any(Number),
      expect.any(AbortSignal)
    );
    expect(result).toEqual({
      success: true,
      data: {
        service: 'api',
        env: 'production',
        from: 'now-1h',
        to: 'now',
        latency: { avg_ms: 150, p95_ms: 500, p99_ms: 2000 },
        throughput: { requests_per_sec: 20, peak_requests_per_sec: 30 },
        errors: { errors_per_sec: 5, error_rate_percent: 25 },
        url: 'https://app.datadoghq.com/apm/service/api',
        span_type: 'servlet.request',
      },
    });
  });

  it('warns when no span type has data', async () => {
    queryMetrics.mockResolvedValue([]);

    const result = await tool.execute({ service: 'ghost' }, context());

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data).toMatchObject({
      service: 'ghost',
      warning:
        "No APM data found for service 'ghost'. The service may not be instrumented, may use a different name, or had no recent traffic.",
      tried_span_types: [
        'web.request',
        'servlet.request',
        'http.request',
        'flask.request',
        'grpc.request',
        'graphql.request',
      ],
    });
  });

  it('rejects an unparseable window as a validation error', async () => {
    const result = await tool.execute({ service: 'api', from_time: 'yesterday' }, context());
    expect(result).toEqual({
      success: false,
      error: {
        message: "Unrecognized time 'yesterday'. Use 'now', 'now-15m', 'now-2h', 'now-1d' or epoch seconds",
        code: 'VALIDATION_ERROR',
        recoverable: true,
      },
    });
    expect(queryMetrics).not.toHaveBeenCalled();
  });
});

describe('SearchTracesTool', () => {
  const tool = new SearchTracesTool(client);

  it('returns one entry per trace, newest first', async () => {
    searchSpans.mockResolvedValue([
      {
        id: 's1',
        attributes: {
          service: 'api',
          resource_name: 'GET /orders',
          host: 'web-1',
          timestamp: '2026-01-01T00:00:02Z',
          attributes: { trace_id: 't1', duration: 3_000_000, status: 'error', error: 1 },
        },
      },
      { id: 's2', attributes: { service: 'api', attributes: { trace_id: 't1', duration: 1_000_000 } } },
      { id: 's3', attributes: { service: 'db', attributes: { trace_id: 't2' } } },
    ]);

    const result = await tool.execute({ query: 'service:api status:error' }, context());

    expect(searchSpans).toHaveBeenCalledWith(
      { query: 'service:api status:error', from: 'now-15m', to: 'now', limit: 50, newestFirst: true },
      expect.any(AbortSignal)
    );
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data).toEqual({
      query: 'service:api status:error',
      from: 'now-15m',
      to: 'now',
      count: 2,
      traces: [
        {
          span_id: 's1',
          trace_id: 't1',
          service: 'api',
          resource: 'GET /orders',
          operation: undefined,
          duration_ms: 3,
          status: 'error',
          error: 1,
          timestamp: '2026-01-01T00:00:02Z',
          host: 'web-1',
        },
        {
          span_id: 's3',
          trace_id: 't2',
          service: 'db',
          resource: undefined,
          operation: undefined,
          duration_ms: null,
          status: undefined,
          error: undefined,
          timestamp: undefined,
          host: undefined,
        },
      ],
    });
  });

  it('reports backend errors as tool failures', async () => {
    searchSpans.mockRejectedValue(new Error('socket hang up'));
    const result = await tool.execute({ query: 'service:api' }, context());
    expect(result).toEqual({
      success: false,
      error: { message: 'Failed to search traces: socket hang up', code: 'BACKEND_ERROR', recoverable: true },
    });
  });
});

describe('GetTraceDetailsTool', () => {
  const tool = new GetTraceDetailsTool(client);

  it('lists spans slowest first with trace summary', async () => {
    searchSpans.mockResolvedValue([
      { id: 'a', attributes: { service: 'api', attributes: { duration: 2_000_000, parent_id: '0' } } },
      {
        id: 'b',
        attributes: {
          service: 'db',
          resource_name: 'SELECT',
          attributes: { duration: 5_000_000, error: 1, 'error.message': 'deadlock', parent_id: 'a' },
        },
      },
    ]);

    const result = await tool.execute({ trace_id: 'abc' }, context());

    expect(searchSpans).toHaveBeenCalledWith(
      { query: 'trace_id:abc', from: 'now-24h', to: 'now', limit: 100 },
      expect.any(AbortSignal)
    );
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data).toMatchObject({
      trace_id: 'abc',
      total_duration_ms: 5,
      span_count: 2,
      services: ['api', 'db'],
      has_error: true,
      url: 'https://app.datadoghq.com/apm/trace/abc',
      spans: [
        { span_id: 'b', parent_id: 'a', duration_ms: 5, error_message: 'deadlock' },
        { span_id: 'a', parent_id: '0', duration_ms: 2 },
      ],
    });
  });
});
