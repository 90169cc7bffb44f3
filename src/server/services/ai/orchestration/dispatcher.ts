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

import JsonSchema from 'jsonschema';
import { bulkhead, TaskCancelledError, timeout, TimeoutPolicy, TimeoutStrategy } from 'cockatiel';
import { JSONSchema, Tool, ToolOutput } from '../types/tool';
import { ToolCallRequest, ToolResult } from '../types/turn';
import { CapabilitySet } from '../types/capability';
import { ToolRegistry } from '../tools/registry';
import { OutputLimiter } from '../tools/outputLimiter';
import { LoopDetector } from './loopProtection';
import { getLogger } from 'server/lib/logger';
import { errorMessage } from 'server/lib/errors/assistantErrors';

export interface DispatcherOptions {
  toolTimeoutMs: number;
  toolOutputMaxChars: number;
  concurrency: number;
}

/** Per-round inputs: the capability snapshot, the cancel signal and the round's loop history. */
export interface DispatchScope {
  capabilities: CapabilitySet;
  signal: AbortSignal;
  loopDetector?: LoopDetector;
  iteration?: number;
}

export interface BatchObserver {
  onStart?(request: ToolCallRequest): void;
  onFinish?(request: ToolCallRequest, result: ToolResult, durationMs: number): void;
}

function succeeded(request: ToolCallRequest, payload: string): ToolResult {
  return { type: 'tool_result', id: request.id, name: request.name, ok: true, payload };
}

function failed(request: ToolCallRequest, code: string, errorSummary: string): ToolResult {
  return { type: 'tool_result', id: request.id, name: request.name, ok: false, code, errorSummary };
}

export class ToolDispatcher {
  private validator: JsonSchema.Validator;
  private timeoutPolicy: TimeoutPolicy;
  private options: DispatcherOptions;

  constructor(private toolRegistry: ToolRegistry, options: Partial<DispatcherOptions> = {}) {
    this.validator = new JsonSchema.Validator();
    this.options = {
      toolTimeoutMs: options.toolTimeoutMs || 30000,
      toolOutputMaxChars: options.toolOutputMaxChars || 30000,
      concurrency: options.concurrency || 4,
    };
    this.timeoutPolicy = timeout(this.options.toolTimeoutMs, TimeoutStrategy.Aggressive);
  }

  /** Never rejects: every failure comes back as an ok:false result. */
  async invoke(request: ToolCallRequest, scope: DispatchScope): Promise<ToolResult> {
    try {
      return await this.dispatch(request, scope);
    } catch (error) {
      getLogger().error({ error }, `Dispatcher: unexpected failure tool=${request.name} id=${request.id}`);
      return failed(request, 'BACKEND_ERROR', errorMessage(error));
    }
  }

  /**
   * Runs a round's calls with bounded concurrency. Results line up with
   * `requests` by index whatever order the calls finish in.
   */
  async invokeBatch(
    requests: readonly ToolCallRequest[],
    scope: DispatchScope,
    observer: BatchObserver = {}
  ): Promise<ToolResult[]> {
    const limiter = bulkhead(this.options.concurrency, requests.length);

    return Promise.all(
      requests.map((request) =>
        limiter.execute(async () => {
          if (scope.signal.aborted) {
            return failed(request, 'CANCELLED', 'Cancelled before the tool started');
          }
          observer.onStart?.(request);
          const startedAt = Date.now();
          const result = await this.invoke(request, scope);
          observer.onFinish?.(request, result, Date.now() - startedAt);
          return result;
        })
      )
    );
  }

  private async dispatch(request: ToolCallRequest, scope: DispatchScope): Promise<ToolResult> {
    if (scope.signal.aborted) {
      return failed(request, 'CANCELLED', 'Cancelled before the tool started');
    }

    const lookup = this.toolRegistry.resolve(request.name, scope.capabilities);
    if (lookup.kind === 'unsupported') {
      getLogger().warn(`Dispatcher: unsupported tool=${request.name} reason=${lookup.reason}`);
      return failed(
        request,
        'UNSUPPORTED_TOOL',
        lookup.reason === 'disabled'
          ? `Tool '${request.name}' is not available: its integration is not configured`
          : `Unsupported tool '${request.name}'`
      );
    }
    const tool = lookup.tool;

    const errors = this.validateArgs(tool.parameters, request.arguments);
    if (errors.length > 0) {
      getLogger().warn(`Dispatcher: validation failed tool=${tool.name} errors=${errors.join(', ')}`);
      return failed(request, 'VALIDATION_ERROR', `Invalid arguments: ${errors.join(', ')}`);
    }

    const { loopDetector, iteration = 0 } = scope;
    if (loopDetector) {
      if (loopDetector.isRepeated(tool.name, request.arguments, iteration)) {
        const repeats = loopDetector.countRepeatedCalls(tool.name, request.arguments, iteration);
        getLogger().warn(`Dispatcher: loop detected tool=${tool.name} repeats=${repeats}`);
        return failed(
          request,
          'LOOP_DETECTED',
          `This tool has already been called ${repeats} times with the same arguments. ` +
            loopDetector.getLoopHint(tool.name, request.arguments)
        );
      }
      loopDetector.recordCall(tool.name, request.arguments, iteration);
    }

    let output: ToolOutput;
    try {
      output = await this.timeoutPolicy.execute(
        ({ signal }) => tool.execute(request.arguments, { signal, allowMutation: !tool.readOnly }),
        scope.signal
      );
    } catch (error) {
      return this.executionFailure(request, tool, error, scope.signal);
    }

    return this.normalize(request, output);
  }

  private executionFailure(request: ToolCallRequest, tool: Tool, error: unknown, signal: AbortSignal): ToolResult {
    if (error instanceof TaskCancelledError) {
      if (signal.aborted) {
        return failed(request, 'CANCELLED', `${tool.name} was cancelled`);
      }
      getLogger().warn(`Dispatcher: tool timeout tool=${tool.name} timeout=${this.options.toolTimeoutMs}ms`);
      return failed(
        request,
        'TIMEOUT',
        `${tool.name} timed out after ${this.options.toolTimeoutMs / 1000} seconds. Try narrowing your query.`
      );
    }

    getLogger().error({ error }, `Dispatcher: tool execution failed tool=${tool.name}`);
    return failed(request, 'BACKEND_ERROR', errorMessage(error) || 'Unknown error');
  }

  private normalize(request: ToolCallRequest, output: ToolOutput): ToolResult {
    if (!output.success) {
      const { error } = output;
      const level = error.recoverable ? 'warn' : 'error';
      getLogger()[level](
        `Dispatcher: tool error tool=${request.name} code=${error.code} recoverable=${error.recoverable} error=${error.message}`
      );
      const summary = error.suggestedAction ? `${error.message}. ${error.suggestedAction}` : error.message;
      return failed(request, error.code, OutputLimiter.truncate(summary, this.options.toolOutputMaxChars));
    }

    const raw = output.text ?? JSON.stringify(output.data ?? null);
    return succeeded(request, OutputLimiter.truncate(raw, this.options.toolOutputMaxChars));
  }

  private validateArgs(schema: JSONSchema, args: Record<string, unknown>): string[] {
    const validationResult = this.validator.validate(args, schema);
    return validationResult.valid ? [] : validationResult.errors.map((e) => e.message || 'Validation error');
  }
}
