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

jest.mock('server/lib/logger', () => ({
  getLogger: () => ({
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

import { BrokenCircuitError, ConstantBackoff, TaskCancelledError, type IRetryBackoffContext } from 'cockatiel';
import { ErrorCategory } from '../../errors/classification';
import { RetryBudget } from '../../errors/retryBudget';

const mockClassifyError = jest.fn();
jest.mock('../../errors', () => ({
  ...jest.requireActual('../../errors/classification'),
  ...jest.requireActual('../../errors/retryBudget'),
  classifyError: (...args: unknown[]) => mockClassifyError(...args),
  isRetryable: jest.requireActual('../../errors/classification').isRetryable,
  RetryBudget: jest.requireActual('../../errors/retryBudget').RetryBudget,
  ErrorCategory: jest.requireActual('../../errors/classification').ErrorCategory,
  extractRetryAfter: jest.requireActual('../../errors/providerErrors').extractRetryAfter,
  isCancellationError: jest.requireActual('../../errors/providerErrors').isCancellationError,
}));

import { createProviderPolicy, RetryAfterBackoff } from '../policies';
import { getProviderCircuitBreaker, resetAllCircuitBreakers } from '../circuitState';

const fastBackoff = new ConstantBackoff(1);

function policyFor(budget: RetryBudget, extra: { canRetryAttempt?: () => boolean; timeoutMs?: number } = {}) {
  return createProviderPolicy('openai', {
    retryBudget: budget,
    timeoutMs: extra.timeoutMs ?? 5_000,
    canRetryAttempt: extra.canRetryAttempt,
    backoff: fastBackoff,
  });
}

beforeEach(() => {
  mockClassifyError.mockReset();
  resetAllCircuitBreakers();
});

describe('createProviderPolicy', () => {
  it('returns the result of a succeeding function without retry', async () => {
    const budget = new RetryBudget(3);
    const result = await policyFor(budget).execute(() => 'success');
    expect(result).toBe('success');
    expect(budget.used).toBe(0);
  });

  it('retries on transient error and succeeds on second attempt', async () => {
    mockClassifyError.mockReturnValue(ErrorCategory.TRANSIENT);
    const budget = new RetryBudget(3);

    let callCount = 0;
    const result = await policyFor(budget).execute(() => {
      callCount++;
      if (callCount === 1) {
        throw new Error('transient failure');
      }
      return 'recovered';
    });

    expect(result).toBe('recovered');
    expect(callCount).toBe(2);
    expect(budget.used).toBe(1);
  });

  it('does not retry deterministic errors', async () => {
    mockClassifyError.mockReturnValue(ErrorCategory.DETERMINISTIC);
    const budget = new RetryBudget(3);

    let callCount = 0;
    await expect(
      policyFor(budget).execute(() => {
        callCount++;
        throw new Error('bad request');
      })
    ).rejects.toThrow('bad request');

    expect(callCount).toBe(1);
    expect(budget.used).toBe(0);
  });

  it('consumes retry budget on each retry', async () => {
    mockClassifyError.mockReturnValue(ErrorCategory.TRANSIENT);
    const budget = new RetryBudget(2);

    let callCount = 0;
    const result = await policyFor(budget).execute(() => {
      callCount++;
      if (callCount <= 2) {
        throw new Error('transient');
      }
      return 'ok';
    });

    expect(result).toBe('ok');
    expect(budget.used).toBe(2);
    expect(budget.exhausted).toBe(true);
  });

  it('stops retrying when budget is exhausted', async () => {
    mockClassifyError.mockReturnValue(ErrorCategory.TRANSIENT);
    const budget = new RetryBudget(1);
    budget.consume();

    let callCount = 0;
    await expect(
      policyFor(budget).execute(() => {
        callCount++;
        throw new Error('transient');
      })
    ).rejects.toThrow('transient');

    expect(callCount).toBe(1);
  });

  it('does not retry an attempt the caller vetoes', async () => {
    mockClassifyError.mockReturnValue(ErrorCategory.TRANSIENT);
    const budget = new RetryBudget(3);

    let callCount = 0;
    await expect(
      policyFor(budget, { canRetryAttempt: () => false }).execute(() => {
        callCount++;
        throw new Error('stream broke');
      })
    ).rejects.toThrow('stream broke');

    expect(callCount).toBe(1);
    expect(budget.used).toBe(0);
  });

  it('fails an attempt that exceeds the timeout', async () => {
    mockClassifyError.mockReturnValue(ErrorCategory.DETERMINISTIC);
    const budget = new RetryBudget(3);

    await expect(
      policyFor(budget, { timeoutMs: 10 }).execute(() => new Promise<string>(() => undefined))
    ).rejects.toBeInstanceOf(TaskCancelledError);
  });
});

describe('RetryAfterBackoff', () => {
  function failedAttempt(error: Error): IRetryBackoffContext<unknown> {
    return { attempt: 1, result: { error }, signal: new AbortController().signal };
  }

  it('waits as long as the Retry-After header asks', () => {
    const error = Object.assign(new Error('slow down'), { headers: { 'retry-after': '3' } });

    expect(new RetryAfterBackoff({ initialDelay: 50 }).next(failedAttempt(error)).duration).toBe(3000);
  });

  it('falls back to exponential delays within the cap', () => {
    const first = new RetryAfterBackoff({ initialDelay: 50, maxDelay: 400 }).next(failedAttempt(new Error('503')));
    const second = first.next(failedAttempt(new Error('503')));

    for (const backoff of [first, second]) {
      expect(backoff.duration).toBeGreaterThanOrEqual(0);
      expect(backoff.duration).toBeLessThanOrEqual(400);
    }
  });
});

describe('getProviderCircuitBreaker', () => {
  it('returns the same instance for the same provider', () => {
    const a = getProviderCircuitBreaker('openai');
    const b = getProviderCircuitBreaker('openai');
    expect(a).toBe(b);
  });

  it('returns different instances for different providers', () => {
    const a = getProviderCircuitBreaker('openai');
    const b = getProviderCircuitBreaker('anthropic');
    expect(a).not.toBe(b);
  });

  it('opens after five consecutive transient failures', async () => {
    mockClassifyError.mockReturnValue(ErrorCategory.TRANSIENT);
    const breaker = getProviderCircuitBreaker('openai');

    for (let i = 0; i < 5; i++) {
      await expect(breaker.execute(() => Promise.reject(new Error('upstream 503')))).rejects.toThrow('upstream 503');
    }

    await expect(breaker.execute(() => 'ok')).rejects.toBeInstanceOf(BrokenCircuitError);
  });

  it('does not count timed-out or aborted attempts as provider failures', async () => {
    mockClassifyError.mockReturnValue(ErrorCategory.TRANSIENT);
    const breaker = getProviderCircuitBreaker('openai');
    const aborted = Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });

    for (let i = 0; i < 6; i++) {
      await expect(
        breaker.execute(() => Promise.reject(new TaskCancelledError('Operation timed out after 10ms')))
      ).rejects.toBeInstanceOf(TaskCancelledError);
      await expect(breaker.execute(() => Promise.reject(aborted))).rejects.toBe(aborted);
    }

    await expect(breaker.execute(() => 'ok')).resolves.toBe('ok');
  });

  it('clears all instances on resetAllCircuitBreakers', () => {
    const before = getProviderCircuitBreaker('openai');
    resetAllCircuitBreakers();
    const after = getProviderCircuitBreaker('openai');
    expect(before).not.toBe(after);
  });
});
