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
import { ErrorCategory } from '../classification';
import {
  classifyOpenAIError,
  classifyAnthropicError,
  classifyError,
  createClassifiedError,
  extractRetryAfter,
  isCancellationError,
} from '../providerErrors';

// SDK v4 error constructors take the raw response headers as a plain record.
const emptyHeaders: Record<string, string> = {};

describe('classifyOpenAIError', () => {
  it('maps RateLimitError to RATE_LIMITED', () => {
    const err = new OpenAI.RateLimitError(429, undefined, 'rate limited', emptyHeaders);
    expect(classifyOpenAIError(err)).toBe(ErrorCategory.RATE_LIMITED);
  });

  it('maps InternalServerError to TRANSIENT', () => {
    const err = new OpenAI.InternalServerError(500, undefined, 'internal', emptyHeaders);
    expect(classifyOpenAIError(err)).toBe(ErrorCategory.TRANSIENT);
  });

  it('maps APIConnectionError to TRANSIENT', () => {
    const err = new OpenAI.APIConnectionError({ message: 'connection error' });
    expect(classifyOpenAIError(err)).toBe(ErrorCategory.TRANSIENT);
  });

  it('maps AuthenticationError to DETERMINISTIC', () => {
    const err = new OpenAI.AuthenticationError(401, undefined, 'auth error', emptyHeaders);
    expect(classifyOpenAIError(err)).toBe(ErrorCategory.DETERMINISTIC);
  });

  it('maps unknown Error to AMBIGUOUS', () => {
    expect(classifyOpenAIError(new Error('something unexpected'))).toBe(ErrorCategory.AMBIGUOUS);
  });
});

describe('classifyAnthropicError', () => {
  it('maps RateLimitError to RATE_LIMITED', () => {
    const err = new Anthropic.RateLimitError(429, undefined, 'rate limited', emptyHeaders);
    expect(classifyAnthropicError(err)).toBe(ErrorCategory.RATE_LIMITED);
  });

  it('maps InternalServerError to TRANSIENT', () => {
    const err = new Anthropic.InternalServerError(500, undefined, 'internal', emptyHeaders);
    expect(classifyAnthropicError(err)).toBe(ErrorCategory.TRANSIENT);
  });

  it('maps BadRequestError to DETERMINISTIC', () => {
    const err = new Anthropic.BadRequestError(400, undefined, 'bad request', emptyHeaders);
    expect(classifyAnthropicError(err)).toBe(ErrorCategory.DETERMINISTIC);
  });

  it('maps unknown Error to AMBIGUOUS', () => {
    expect(classifyAnthropicError(new Error('something unexpected'))).toBe(ErrorCategory.AMBIGUOUS);
  });
});

describe('classifyError', () => {
  it('routes to the provider-specific classifier', () => {
    const err = new Anthropic.RateLimitError(429, undefined, 'rate limited', emptyHeaders);
    expect(classifyError('anthropic', err)).toBe(ErrorCategory.RATE_LIMITED);
  });

  it('treats an open circuit as DETERMINISTIC', () => {
    expect(classifyError('anthropic', new BrokenCircuitError())).toBe(ErrorCategory.DETERMINISTIC);
  });

  it('treats a timed-out attempt as TRANSIENT', () => {
    expect(classifyError('openai', new TaskCancelledError())).toBe(ErrorCategory.TRANSIENT);
  });

  it('falls back to status codes for unknown providers', () => {
    expect(classifyError('fake', Object.assign(new Error('busy'), { status: 503 }))).toBe(ErrorCategory.TRANSIENT);
    expect(classifyError('fake', Object.assign(new Error('nope'), { status: 404 }))).toBe(
      ErrorCategory.DETERMINISTIC
    );
    expect(classifyError('fake', Object.assign(new Error('slow down'), { status: 429 }))).toBe(
      ErrorCategory.RATE_LIMITED
    );
    expect(classifyError('fake', new Error('??'))).toBe(ErrorCategory.AMBIGUOUS);
  });
});

describe('extractRetryAfter', () => {
  it('reads numeric seconds from a headers record', () => {
    expect(extractRetryAfter({ headers: { 'retry-after': '12' } })).toBe(12);
  });

  it('reads from a Headers instance', () => {
    expect(extractRetryAfter({ headers: new Headers({ 'retry-after': '7' }) })).toBe(7);
  });

  it('caps the delay at 300 seconds', () => {
    expect(extractRetryAfter({ headers: { 'retry-after': '9000' } })).toBe(300);
  });

  it('reads the header an SDK error carries', () => {
    const err = new Anthropic.RateLimitError(429, undefined, 'rate limited', { 'retry-after': '12' });
    expect(extractRetryAfter(err)).toBe(12);
  });

  it('returns null when the header is absent', () => {
    expect(extractRetryAfter(new Error('x'))).toBeNull();
    expect(extractRetryAfter({ headers: {} })).toBeNull();
  });

  it('returns null for unparseable values', () => {
    expect(extractRetryAfter({ headers: { 'retry-after': 'soon' } })).toBeNull();
  });
});

describe('isCancellationError', () => {
  it('recognises attempt timeouts and caller aborts', () => {
    expect(isCancellationError(new TaskCancelledError('Operation timed out after 10ms'))).toBe(true);
    expect(isCancellationError(new OpenAI.APIUserAbortError())).toBe(true);
    expect(isCancellationError(Object.assign(new Error('aborted'), { name: 'AbortError' }))).toBe(true);
  });

  it('does not treat provider failures as cancellations', () => {
    expect(isCancellationError(new OpenAI.InternalServerError(500, undefined, 'internal', emptyHeaders))).toBe(false);
    expect(isCancellationError(new BrokenCircuitError())).toBe(false);
    expect(isCancellationError('aborted')).toBe(false);
  });
});

describe('createClassifiedError', () => {
  it('builds a ClassifiedError with status and retryability', () => {
    const err = new OpenAI.RateLimitError(429, undefined, 'rate limited', emptyHeaders);
    const classified = createClassifiedError('openai', err);
    expect(classified.category).toBe(ErrorCategory.RATE_LIMITED);
    expect(classified.retryable).toBe(true);
    expect(classified.providerName).toBe('openai');
    expect(classified.httpStatus).toBe(429);
    expect(classified.original).toBe(err);
  });

  it('wraps non-Error values', () => {
    const classified = createClassifiedError('anthropic', 'plain failure');
    expect(classified.original).toBeInstanceOf(Error);
    expect(classified.original.message).toBe('plain failure');
    expect(classified.httpStatus).toBeUndefined();
  });
});
