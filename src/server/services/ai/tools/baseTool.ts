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

import { Tool, ToolOutput, ToolFamily, JSONSchema, ToolExecutionContext } from '../types/tool';
import { errorMessage, isAssistantError } from 'server/lib/errors/assistantErrors';
import { HttpError } from './shared/httpClient';

export abstract class BaseTool implements Tool {
  static readonly Name: string;

  get name(): string {
    const toolClass = this.constructor as typeof BaseTool;
    if (!toolClass.Name) {
      throw new Error(`Tool class ${toolClass.name} must define static Name property`);
    }
    return toolClass.Name;
  }

  public readonly description: string;
  public readonly parameters: JSONSchema;
  public readonly family: ToolFamily;
  public readonly readOnly: boolean;

  constructor(description: string, parameters: JSONSchema, family: ToolFamily, readOnly: boolean = true) {
    this.description = description;
    this.parameters = parameters;
    this.family = family;
    this.readOnly = readOnly;
  }

  abstract execute(args: Record<string, unknown>, context: ToolExecutionContext): Promise<ToolOutput>;

  protected createSuccessResult(data: unknown, text?: string): ToolOutput {
    return { success: true, data, text };
  }

  protected createErrorResult(
    message: string,
    code: string,
    recoverable: boolean = true,
    suggestedAction?: string
  ): ToolOutput {
    return {
      success: false,
      error: {
        message,
        code,
        recoverable,
        suggestedAction,
      },
    };
  }

  /**
   * Turns a thrown backend failure into a tool error. Auth and permission
   * failures are flagged unrecoverable so the model stops retrying them.
   */
  protected createFailureResult(error: unknown, operation: string): ToolOutput {
    if (isAssistantError(error)) {
      return this.createErrorResult(error.message, error.code, error.code === 'VALIDATION_ERROR');
    }
    if (error instanceof HttpError) {
      if (error.status === 401) {
        return this.createErrorResult(
          `${error.service} authentication failed. Check that the API key is valid.`,
          'BACKEND_ERROR',
          false
        );
      }
      if (error.status === 403) {
        return this.createErrorResult(
          `${error.service} permission denied. Check that the API key has the required permissions.`,
          'BACKEND_ERROR',
          false
        );
      }
    }
    return this.createErrorResult(`Failed to ${operation}: ${errorMessage(error)}`, 'BACKEND_ERROR');
  }

  protected checkAborted(context: ToolExecutionContext): boolean {
    return context.signal.aborted;
  }
}
