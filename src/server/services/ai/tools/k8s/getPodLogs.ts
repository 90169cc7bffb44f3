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

import { BaseTool } from '../baseTool';
import { ToolExecutionContext, ToolOutput } from '../../types/tool';
import { ClusterClient } from '../shared/k8sClient';
import { OutputLimiter } from '../outputLimiter';
import { clamp, numberArg, optionalStringArg, stringArg } from '../shared/args';

export class GetPodLogsTool extends BaseTool {
  static readonly Name = 'k8s_get_pod_logs';

  constructor(private k8sClient: ClusterClient) {
    super(
      'Fetch recent logs from a specific pod. Use this to diagnose application errors.',
      {
        type: 'object',
        properties: {
          pod_name: { type: 'string', description: 'The pod name' },
          namespace: { type: 'string', description: 'The Kubernetes namespace' },
          context: { type: 'string', description: 'Kubeconfig context to use (default: current context)' },
          container: { type: 'string', description: 'Optional specific container name' },
          tail_lines: { type: 'number', description: 'Number of log lines to fetch (default: 100)', minimum: 1 },
          previous: { type: 'boolean', description: 'Logs of the previous (crashed) container instance' },
        },
        required: ['pod_name', 'namespace'],
      },
      'cluster'
    );
  }

  async execute(args: Record<string, unknown>, context: ToolExecutionContext): Promise<ToolOutput> {
    if (this.checkAborted(context)) {
      return this.createErrorResult('Operation cancelled', 'CANCELLED', false);
    }

    try {
      const podName = stringArg(args, 'pod_name');
      const namespace = stringArg(args, 'namespace');
      const container = optionalStringArg(args, 'container');
      const tailLines = clamp(numberArg(args, 'tail_lines', 100), 1, 5000);

      const logs = await this.k8sClient.readPodLog(podName, namespace, {
        context: optionalStringArg(args, 'context'),
        container,
        tailLines,
        previous: args.previous === true,
      });

      const lineCount = logs === '' ? 0 : logs.split('\n').length;
      const header = `Logs for ${namespace}/${podName}${container ? ` (${container})` : ''}, ${lineCount} lines:`;
      return this.createSuccessResult(
        { pod: podName, namespace, container: container ?? null, lines: lineCount },
        `${header}\n${OutputLimiter.truncateLogOutput(logs)}`
      );
    } catch (error) {
      return this.createFailureResult(error, 'fetch pod logs');
    }
  }
}
