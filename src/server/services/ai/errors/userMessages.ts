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

import { BrokenCircuitError, TaskCancelledError } from 'cockatiel';
import { readErrorProp } from 'server/lib/errors/assistantErrors';
import { ClassifiedError, ErrorCategory } from './classification';

const AUTH_ERROR_NAMES = new Set(['AuthenticationError', 'PermissionDeniedError']);
const AUTH_STATUS_CODES = new Set([401, 403]);

export function isAuthError(error: unknown): boolean {
  const name = readErrorProp(error, 'name');
  const status = readErrorProp(error, 'status');
  if (typeof name === 'string' && AUTH_ERROR_NAMES.has(name)) return true;
  if (typeof status === 'number' && AUTH_STATUS_CODES.has(status)) return true;
  return false;
}

function isContextOverflow(error: Error): boolean {
  const message = error.message.toLowerCase();
  return message.includes('prompt is too long') || (message.includes('tokens') && message.includes('maximum'));
}

const messageBuilders: Record<ErrorCategory, (err: ClassifiedError, modelName: string) => string> = {
  [ErrorCategory.RATE_LIMITED]: (err, modelName) =>
    err.retryAfter
      ? `${modelName} is rate limited. Try again in ${err.retryAfter}s.`
      : `${modelName} is rate limited. Please wait and try again.`,
  [ErrorCategory.TRANSIENT]: (_err, modelName) => `${modelName} is temporarily unavailable. Please try again.`,
  [ErrorCategory.DETERMINISTIC]: (err) =>
    isAuthError(err.original)
      ? `${err.providerName} API key is invalid. Check the assistant configuration.`
      : 'The model rejected the request. Try rephrasing the question.',
  [ErrorCategory.AMBIGUOUS]: () => 'Something went wrong. Please try again.',
};

export function getUserErrorMessage(err: ClassifiedError, modelName: string): string {
  if (err.original instanceof BrokenCircuitError) {
    return `${modelName} failed repeatedly and is paused. Try again in a minute.`;
  }
  if (err.original instanceof TaskCancelledError) {
    return `${modelName} did not respond in time. Please try again.`;
  }
  if (isContextOverflow(err.original)) {
    return 'This conversation is too long for the model. Start a new session to continue.';
  }
  return messageBuilders[err.category](err, modelName);
}
