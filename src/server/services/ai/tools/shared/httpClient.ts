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

export class HttpError extends Error {
  readonly service: string;
  readonly status: number;
  readonly body: string;

  constructor(service: string, status: number, body: string) {
    super(`${service} API error (${status}): ${body}`);
    this.name = 'HttpError';
    this.service = service;
    this.status = status;
    this.body = body;
  }
}

export type QueryValue = string | number | boolean | string[] | undefined;

export function buildQuery(params: Record<string, QueryValue>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) search.append(key, item);
    } else {
      search.append(key, String(value));
    }
  }
  const query = search.toString();
  return query ? `?${query}` : '';
}

export interface JsonRequest {
  method?: 'GET' | 'POST' | 'PUT';
  headers: Record<string, string>;
  body?: unknown;
  signal?: AbortSignal;
}

/**
 * JSON round-trip over global fetch. The response is trusted to match T;
 * fields vendors leave out when empty are optional in T.
 */
export async function requestJson<T>(service: string, url: string, request: JsonRequest): Promise<T> {
  const headers: Record<string, string> = { Accept: 'application/json', ...request.headers };
  if (request.body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }

  const response = await fetch(url, {
    method: request.method ?? 'GET',
    headers,
    body: request.body !== undefined ? JSON.stringify(request.body) : undefined,
    signal: request.signal,
  });

  if (!response.ok) {
    const errorText = await response.text().catch(() => 'Unknown error');
    throw new HttpError(service, response.status, errorText);
  }

  return (await response.json()) as T;
}
