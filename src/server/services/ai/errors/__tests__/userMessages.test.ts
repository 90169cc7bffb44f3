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

import Anthropic from '@anthropic-ai/sdk';
import { BrokenCircuitError, TaskCancelledError } from 'cockatiel';
import { ClassifiedError, ErrorCategory } from '../classification';
import { getUserErrorMessage, isAuthError } from '../userMessages';

const emptyHeaders: Record<string, string> = {};

function classified(overrides: Partial<ClassifiedError> = {}): ClassifiedError {
  return {
    category: ErrorCategory.AMBIGUOUS,
    original: new Error('boom'),
    retryable: true,
    providerName: 'anthropic',
    ...overrides,
  };
}

describe('getUserErrorMessage', () => {
  it('includes Retry-After when rate limited', () => {
    const msg = getUserErrorMessage(classified({ category: ErrorCategory.RATE_LIMITED, retryAfter: 20 }), 'claude');
    expect(msg).toBe('claude is rate limited. Try again in 20s.');
  });

  it('asks to wait when rate limited without Retry-After', () => {
    const msg = getUserErrorMessage(classified({ category: ErrorCategory.RATE_LIMITED }), 'claude');
    expect(msg).toBe('claude is rate limited. Please wait and try again.');
  });

  it('reports transient outages', () => {
    const msg = getUserErrorMessage(classified({ category: ErrorCategory.TRANSIENT }), 'gpt');
    expect(msg).toBe('gpt is temporarily unavailable. Please try again.');
  });

  it('points at configuration on auth failures', () => {
    const err = new Anthropic.AuthenticationError(401, undefined, 'invalid x-api-key', emptyHeaders);
    const msg = getUserErrorMessage(classified({ category: ErrorCategory.DETERMINISTIC, original: err }), 'claude');
    expect(msg).toBe('anthropic API key is invalid. Check the assistant configuration.');
  });

  it('explains an oversized conversation', () => {
    const err = new Error('prompt is too long: 210000 tokens > 200000 maximum');
    const msg = getUserErrorMessage(classified({ category: ErrorCategory.DETERMINISTIC, original: err }), 'claude');
    expect(msg).toBe('This conversation is too long for the model. Start a new session to continue.');
  });

  it('reports an open circuit breaker', () => {
    const msg = getUserErrorMessage(classified({ original: new BrokenCircuitError() }), 'claude');
    expect(msg).toBe('claude failed repeatedly and is paused. Try again in a minute.');
  });

  it('reports a model timeout', () => {
    const msg = getUserErrorMessage(classified({ original: new TaskCancelledError() }), 'claude');
    expect(msg).toBe('claude did not respond in time. Please try again.');
  });
});

describe('isAuthError', () => {
  it('detects auth errors by name or status', () => {
    expect(isAuthError({ name: 'PermissionDeniedError' })).toBe(true);
    expect(isAuthError({ status: 401 })).toBe(true);
    expect(isAuthError({ status: 500 })).toBe(false);
    expect(isAuthError(undefined)).toBe(false);
  });
});
