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

export const TOOL_FAMILIES = ['metrics', 'incidents', 'cluster', 'queue'] as const;

export type ToolFamily = (typeof TOOL_FAMILIES)[number];

export interface JSONSchema {
  type: string;
  description?: string;
  properties?: Record<string, JSONSchema>;
  required?: string[];
  items?: JSONSchema;
  enum?: Array<string | number>;
  minimum?: number;
  maximum?: number;
  default?: unknown;
  additionalProperties?: boolean;
}

/**
 * What the model is shown about a tool. Immutable once the registry is built.
 */
export interface ToolDescriptor {
  readonly name: string;
  readonly family: ToolFamily;
  readonly description: string;
  readonly parameters: JSONSchema;
  readonly readOnly: boolean;
}

export interface ToolError {
  message: string;
  code: string;
  details?: unknown;
  recoverable: boolean;
  suggestedAction?: string;
}

export type ToolOutput =
  | {
      success: true;
      data: unknown;
      /** Pre-rendered text (e.g. raw log lines) that should reach the model as-is */
      text?: string;
    }
  | {
      success: false;
      error: ToolError;
    };

export interface ToolExecutionContext {
  signal: AbortSignal;
  /** False for read-only tools; mutating backend calls check it */
  allowMutation: boolean;
}

export interface Tool extends ToolDescriptor {
  execute(args: Record<string, unknown>, context: ToolExecutionContext): Promise<ToolOutput>;
}
