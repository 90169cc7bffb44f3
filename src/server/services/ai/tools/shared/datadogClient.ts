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

import { buildQuery, requestJson } from './httpClient';

export interface MetricSeries {
  scope?: string;
  pointlist?: Array<[number, number | null]>;
}

export interface SpanRecord {
  id?: string;
  attributes?: {
    service?: string;
    resource_name?: string;
    host?: string;
    timestamp?: string;
    attributes?: Record<string, unknown>;
  };
}

export interface SpanSearch {
  query: string;
  from: string;
  to: string;
  limit: number;
  newestFirst?: boolean;
}

/** The slice of Datadog the metrics tools need; faked in tests. */
export interface MetricsClient {
  readonly site: string;
  queryMetrics(query: string, fromSeconds: number, toSeconds: number, signal?: AbortSignal): Promise<MetricSeries[]>;
  searchSpans(search: SpanSearch, signal?: AbortSignal): Promise<SpanRecord[]>;
}

export interface DatadogClientConfig {
  apiKey: string;
  appKey: string;
  site: string;
}

export class DatadogClient implements MetricsClient {
  readonly site: string;
  private readonly headers: Record<string, string>;

  constructor(config: DatadogClientConfig) {
    this.site = config.site;
    this.headers = {
      'DD-API-KEY': config.apiKey,
      'DD-APPLICATION-KEY': config.appKey,
    };
  }

  private url(apiVersion: 'v1' | 'v2', endpoint: string): string {
    return `https://api.${this.site}/api/${apiVersion}${endpoint}`;
  }

  async queryMetrics(query: string, fromSeconds: number, toSeconds: number, signal?: AbortSignal) {
    const response = await requestJson<{ series?: MetricSeries[] }>(
      'Datadog',
      this.url('v1', `/query${buildQuery({ from: fromSeconds, to: toSeconds, query })}`),
      { headers: this.headers, signal }
    );
    return response.series ?? [];
  }

  async searchSpans(search: SpanSearch, signal?: AbortSignal) {
    const response = await requestJson<{ data?: SpanRecord[] }>('Datadog', this.url('v2', '/spans/events/search'), {
      method: 'POST',
      headers: this.headers,
      signal,
      body: {
        data: {
          type: 'search_request',
          attributes: {
            filter: { query: search.query, from: search.from, to: search.to },
            sort: search.newestFirst ? '-timestamp' : undefined,
            page: { limit: search.limit },
          },
        },
      },
    });
    return response.data ?? [];
  }
}
