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

export interface ToolCallRecord {
  tool: string;
  key: string;
  iteration: number;
  timestamp: number;
}

export interface LoopProtection {
  maxRepeatedCalls: number;
  /** Only calls made within this many iterations of the current one count as repeats */
  windowIterations: number;
  toolCallHistory: ToolCallRecord[];
}

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

export function callKey(toolName: string, args: Record<string, unknown>): string {
  return `${toolName}:${stableStringify(args)}`;
}

/**
 * Tracks the tool calls of one user round. A fresh detector is used per round,
 * so history never leaks across questions.
 */
export class LoopDetector {
  private protection: LoopProtection;

  constructor(options?: Partial<Omit<LoopProtection, 'toolCallHistory'>>) {
    this.protection = {
      maxRepeatedCalls: options?.maxRepeatedCalls || 3,
      windowIterations: options?.windowIterations || 5,
      toolCallHistory: [],
    };
  }

  recordCall(toolName: string, args: Record<string, unknown>, iteration: number): void {
    this.protection.toolCallHistory.push({
      tool: toolName,
      key: callKey(toolName, args),
      iteration,
      timestamp: Date.now(),
    });
  }

  countRepeatedCalls(toolName: string, args: Record<string, unknown>, currentIteration: number): number {
    const key = callKey(toolName, args);
    return this.protection.toolCallHistory.filter(
      (record) => currentIteration - record.iteration <= this.protection.windowIterations && record.key === key
    ).length;
  }

  isRepeated(toolName: string, args: Record<string, unknown>, currentIteration: number): boolean {
    return this.countRepeatedCalls(toolName, args, currentIteration) >= this.protection.maxRepeatedCalls;
  }

  getLoopHint(toolName: string, args: Record<string, unknown>): string {
    if (toolName === 'k8s_get_pod_logs') {
      return (
        "Repeatedly fetching logs suggests the pattern isn't found. " +
        'Try a different pod, the previous container, or check the service metrics.'
      );
    }

    if (toolName === 'datadog_search_traces') {
      return 'The same trace search keeps coming back. Widen the time range or search for errors instead.';
    }

    if (toolName === 'k8s_list_pods' && !args.label_selector) {
      return (
        'You keep listing the same pods. ' + 'Use the result you already have or narrow with a label_selector.'
      );
    }

    return 'Consider trying a different tool or different arguments.';
  }

  getProtection(): LoopProtection {
    return this.protection;
  }

  reset(): void {
    this.protection.toolCallHistory = [];
  }
}
