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

import OpenAI from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import { BrokenCircuitError, TaskCancelledError } from 'cockatiel';
import { readErrorProp } from 'server/lib/errors/assistantErrors';
import { ErrorCategory, ClassifiedError, isRetryable, isRateLimitError } from './classification';

const MAX_RETRY_AFTER_SECONDS = 300;

function readHeader(error: unknown, name: string): string | undefined {
  const headers = readErrorProp(error, 'headers');
  if (headers === null || typeof headers !== 'object') return undefined;

  if (headers instanceof Headers) {
    return headers.get(name) ?? undefined;
  }

  const value = Reflect.get(headers, name);
  return value != null ? String(value) : undefined;
}

export function extractRetryAfter(error: unknown): number | null {
  const raw = readHeader(error, 'retry-after');
  if (raw == null) return null;

  const seconds = Number(raw);
  if (!isNaN(seconds) && seconds >= 0) {
    return Math.min(seconds, MAX_RETRY_AFTER_SECONDS);
  }

  const date = Date.parse(raw);
  if (!isNaN(date)) {
    const delta = Math.ceil((date - Date.now()) / 1000);
    if (delta > 0) return Math.min(delta, MAX_RETRY_AFTER_SECONDS);
    return 0;
  }

  return null;
}

/** Timeouts and caller aborts. These say nothing about provider health. */
export function isCancellationError(error: unknown): boolean {
  if (error instanceof TaskCancelledError) return true;
  if (error instanceof OpenAI.APIUserAbortError || error instanceof Anthropic.APIUserAbortError) return true;
  return readErrorProp(error, 'name') === 'AbortError';
}

export function classifyOpenAIError(error: unknown): ErrorCategory {
  if (error instanceof OpenAI.RateLimitError) return ErrorCategory.RATE_LIMITED;
  if (error instanceof OpenAI.InternalServerError) return ErrorCategory.TRANSIENT;
  if (error instanceof OpenAI.APIConnectionError) return ErrorCategory.TRANSIENT;
  if (error instanceof OpenAI.ConflictError) return ErrorCategory.TRANSIENT;
  if (error instanceof OpenAI.BadRequestError) return ErrorCategory.DETERMINISTIC;
  if (error instanceof OpenAI.AuthenticationError) return ErrorCategory.DETERMINISTIC;
  if (error instanceof OpenAI.PermissionDeniedError) return ErrorCategory.DETERMINISTIC;
  if (error instanceof OpenAI.NotFoundError) return ErrorCategory.DETERMINISTIC;
  if (error instanceof OpenAI.UnprocessableEntityError) return ErrorCategory.DETERMINISTIC;
  return ErrorCategory.AMBIGUOUS;
}

export function classifyAnthropicError(error: unknown): ErrorCategory {
  if (error instanceof Anthropic.RateLimitError) return ErrorCategory.RATE_LIMITED;
  if (error instanceof Anthropic.InternalServerError) return ErrorCategory.TRANSIENT;
  if (error instanceof Anthropic.APIConnectionError) return ErrorCategory.TRANSIENT;
  if (error instanceof Anthropic.ConflictError) return ErrorCategory.TRANSIENT;
  if (error instanceof Anthropic.BadRequestError) return ErrorCategory.DETERMINISTIC;
  if (error instanceof Anthropic.AuthenticationError) return ErrorCategory.DETERMINISTIC;
  if (error instanceof Anthropic.PermissionDeniedError) return ErrorCategory.DETERMINISTIC;
  if (error instanceof Anthropic.NotFoundError) return ErrorCategory.DETERMINISTIC;
  if (error instanceof Anthropic.UnprocessableEntityError) return ErrorCategory.DETERMINISTIC;
  return ErrorCategory.AMBIGUOUS;
}

function classifyGenericError(error: unknown): ErrorCategory {
  if (isRateLimitError(error)) return ErrorCategory.RATE_LIMITED;
  const status = readErrorProp(error, 'status');
  if (typeof status === 'number') {
    if (status >= 500) return ErrorCategory.TRANSIENT;
    if (status >= 400) return ErrorCategory.DETERMINISTIC;
  }
  return ErrorCategory.AMBIGUOUS;
}

export function classifyError(providerName: string, error: unknown): ErrorCategory {
  // an open breaker fails fast; retrying it only burns the budget
  if (error instanceof BrokenCircuitError) return ErrorCategory.DETERMINISTIC;
  if (error instanceof TaskCancelledError) return ErrorCategory.TRANSIENT;

  switch (providerName) {
    case 'openai':
      return classifyOpenAIError(error);
    case 'anthropic':
      return classifyAnthropicError(error);
    default:
      return classifyGenericError(error);
  }
}

export function createClassifiedError(providerName: string, error: unknown): ClassifiedError {
  const category = classifyError(providerName, error);
  const original = error instanceof Error ? error : new Error(String(error));
  const status = readErrorProp(error, 'status') ?? readErrorProp(error, 'statusCode');
  return {
    category,
    original,
    retryable: isRetryable(category),
    providerName,
    httpStatus: typeof status === 'number' ? status : undefined,
    retryAfter: extractRetryAfter(error),
  };
}
