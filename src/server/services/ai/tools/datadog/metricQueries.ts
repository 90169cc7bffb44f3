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

import { AssistantError } from 'server/lib/errors/assistantErrors';
import { MetricSeries, SpanRecord } from '../shared/datadogClient';

export const APM_SPAN_TYPES = [
  'web.request',
  'servlet.request',
  'http.request',
  'flask.request',
  'grpc.request',
  'graphql.request',
] as const;

const ENV_ALIASES: Record<string, string> = {
  prod: 'production',
  prd: 'production',
  stage: 'stg',
  staging: 'stg',
  development: 'dev',
};

/** Maps the env names operators type to the tags the services report. */
export function normalizeEnv(env: string | undefined): string | undefined {
  if (!env) return undefined;
  return ENV_ALIASES[env.toLowerCase()] ?? env;
}

const UNIT_SECONDS: Record<string, number> = { m: 60, h: 3600, d: 86400 };

/** Accepts `now`, `now-<n>[m|h|d]` or epoch seconds. */
export function parseRelativeTime(value: string, nowSeconds: number): number {
  if (value === 'now') return nowSeconds;
  const match = /^now-(\d+)([mhd])$/.exec(value);
  if (match) {
    return nowSeconds - Number(match[1]) * UNIT_SECONDS[match[2]];
  }
  const epoch = Number(value);
  if (Number.isInteger(epoch) && epoch > 0) return epoch;
  throw new AssistantError(
    'VALIDATION_ERROR',
    `Unrecognized time '${value}'. Use 'now', 'now-15m', 'now-2h', 'now-1d' or epoch seconds`
  );
}

export function seriesValues(series: MetricSeries): number[] {
  return (series.pointlist ?? []).map(([, value]) => value).filter((value): value is number => value !== null);
}

export function scopeTag(scope: string | undefined, tag: string): string | undefined {
  const prefix = `${tag}:`;
  return scope
    ?.split(',')
    .find((part) => part.startsWith(prefix))
    ?.slice(prefix.length);
}

export interface ValueSummary {
  avg: number;
  min: number;
  max: number;
  latest: number;
}

export function summarize(values: number[]): ValueSummary | undefined {
  if (values.length === 0) return undefined;
  return {
    avg: values.reduce((sum, v) => sum + v, 0) / values.length,
    min: Math.min(...values),
    max: Math.max(...values),
    latest: values[values.length - 1],
  };
}

export function spanAttribute(span: SpanRecord, key: string): unknown {
  return span.attributes?.attributes?.[key];
}

/** Span durations are reported in nanoseconds. */
export function spanDurationMs(span: SpanRecord): number | undefined {
  const duration = spanAttribute(span, 'duration');
  return typeof duration === 'number' && duration > 0 ? duration / 1_000_000 : undefined;
}
