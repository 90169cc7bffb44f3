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

export const ASSISTANT_ERRORS = {
  VALIDATION_ERROR: {
    code: 'VALIDATION_ERROR',
    message: 'Tool arguments do not match the tool schema',
  },
  BACKEND_ERROR: {
    code: 'BACKEND_ERROR',
    message: 'The backend call behind this tool failed',
  },
  MODEL_ERROR: {
    code: 'MODEL_ERROR',
    message: 'The language model call failed',
  },
  BUDGET_EXCEEDED: {
    code: 'BUDGET_EXCEEDED',
    message: 'Tool round-trip limit reached for this question',
  },
  CONFIGURATION_GAP: {
    code: 'CONFIGURATION_GAP',
    message: 'Integration is not configured',
  },
  UNSUPPORTED_TOOL: {
    code: 'UNSUPPORTED_TOOL',
    message: 'Tool is not available in this session',
  },
  TIMEOUT: {
    code: 'TIMEOUT',
    message: 'Operation timed out',
  },
  CANCELLED: {
    code: 'CANCELLED',
    message: 'Operation cancelled by user',
  },
  LOOP_DETECTED: {
    code: 'LOOP_DETECTED',
    message: 'Repeated identical tool call',
  },
  READ_ONLY_VIOLATION: {
    code: 'READ_ONLY_VIOLATION',
    message: 'A read-only tool attempted a mutating backend call',
  },
  SESSION_NOT_FOUND: {
    code: 'SESSION_NOT_FOUND',
    message: 'Session not found or already ended',
  },
} as const;

export type AssistantErrorCode = keyof typeof ASSISTANT_ERRORS;

export class AssistantError extends Error {
  code: AssistantErrorCode;
  details?: Record<string, unknown>;

  constructor(code: AssistantErrorCode, message?: string, details?: Record<string, unknown>) {
    super(message || ASSISTANT_ERRORS[code].message);
    this.code = code;
    this.details = details;
    this.name = 'AssistantError';
  }
}

export function isAssistantError(error: unknown, code?: AssistantErrorCode): error is AssistantError {
  return error instanceof AssistantError && (code === undefined || error.code === code);
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Reads an own property off an unknown thrown value without trusting its shape */
export function readErrorProp(error: unknown, key: string): unknown {
  if (error === null || typeof error !== 'object') return undefined;
  return Reflect.get(error, key);
}
