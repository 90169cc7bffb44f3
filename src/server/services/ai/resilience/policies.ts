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

import {
  retry,
  handleWhen,
  wrap,
  timeout,
  TimeoutStrategy,
  ExponentialBackoff,
  type IBackoffFactory,
  type IBackoff,
  type IRetryBackoffContext,
} from 'cockatiel';
import { isRetryable, classifyError, RetryBudget, extractRetryAfter } from '../errors';
import { getProviderCircuitBreaker } from './circuitState';
import { getLogger } from 'server/lib/logger';

class RetryAfterBackoffInstance implements IBackoff<IRetryBackoffContext<unknown>> {
  readonly duration: number;
  private readonly fallback: IBackoff<unknown>;

  constructor(duration: number, fallback: IBackoff<unknown>) {
    this.duration = duration;
    this.fallback = fallback;
  }

  next(context: IRetryBackoffContext<unknown>): IBackoff<IRetryBackoffContext<unknown>> {
    return nextBackoff(context, this.fallback.next(context));
  }
}

function nextBackoff(
  context: IRetryBackoffContext<unknown>,
  fallback: IBackoff<unknown>
): IBackoff<IRetryBackoffContext<unknown>> {
  const error = 'error' in context.result ? context.result.error : undefined;
  const retryAfterSeconds = error != null ? extractRetryAfter(error) : null;
  if (retryAfterSeconds != null && retryAfterSeconds > 0) {
    return new RetryAfterBackoffInstance(retryAfterSeconds * 1000, fallback);
  }
  return new RetryAfterBackoffInstance(fallback.duration, fallback);
}

/** Exponential backoff that yields to the provider's Retry-After header when one is sent. */
export class RetryAfterBackoff implements IBackoffFactory<IRetryBackoffContext<unknown>> {
  private readonly fallbackFactory: ExponentialBackoff<unknown>;

  constructor(fallbackOptions?: { initialDelay?: number; maxDelay?: number; exponent?: number }) {
    this.fallbackFactory = new ExponentialBackoff({
      initialDelay: fallbackOptions?.initialDelay ?? 500,
      maxDelay: fallbackOptions?.maxDelay ?? 10_000,
      exponent: fallbackOptions?.exponent ?? 2,
    });
  }

  next(context: IRetryBackoffContext<unknown>): IBackoff<IRetryBackoffContext<unknown>> {
    return nextBackoff(context, this.fallbackFactory.next());
  }
}

export interface ProviderPolicyOptions {
  retryBudget: RetryBudget;
  /** Per-attempt deadline; an attempt past it fails with TaskCancelledError. */
  timeoutMs: number;
  /**
   * Consulted before each retry. A streamed attempt that already forwarded
   * tokens to the caller cannot be replayed, so the orchestrator vetoes it here.
   */
  canRetryAttempt?: () => boolean;
  maxAttempts?: number;
  backoff?: IBackoffFactory<IRetryBackoffContext<unknown>>;
}

export function createProviderPolicy(providerName: string, options: ProviderPolicyOptions) {
  const { retryBudget, timeoutMs, canRetryAttempt } = options;

  const shouldHandle = handleWhen((err) => {
    if (!retryBudget.canRetry()) return false;
    if (canRetryAttempt && !canRetryAttempt()) return false;
    return isRetryable(classifyError(providerName, err));
  });

  const retryPolicy = retry(shouldHandle, {
    maxAttempts: options.maxAttempts ?? 3,
    backoff: options.backoff ?? new RetryAfterBackoff({ initialDelay: 500, maxDelay: 10_000, exponent: 2 }),
  });

  retryPolicy.onRetry((reason) => {
    retryBudget.consume();
    const errorMessage = 'error' in reason ? reason.error.message : 'unknown';
    getLogger().warn(
      `AI: retrying provider=${providerName} error=${errorMessage} budgetRemaining=${
        retryBudget.canRetry() ? 'yes' : 'exhausted'
      }`
    );
  });

  const breakerPolicy = getProviderCircuitBreaker(providerName);
  const timeoutPolicy = timeout(timeoutMs, TimeoutStrategy.Aggressive);

  return wrap(retryPolicy, breakerPolicy, timeoutPolicy);
}
