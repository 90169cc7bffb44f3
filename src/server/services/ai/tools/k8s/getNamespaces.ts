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
import { optionalStringArg } from '../shared/args';

export class GetNamespacesTool extends BaseTool {
  static readonly Name = 'k8s_get_namespaces';

  constructor(private k8sClient: ClusterClient) {
    super(
      'List namespaces in a Kubernetes cluster with their phase.',
      {
        type: 'object',
        properties: {
          context: { type: 'string', description: 'Kubeconfig context to use (default: current context)' },
        },
      },
      'cluster'
    );
  }

  async execute(args: Record<string, unknown>, context: ToolExecutionContext): Promise<ToolOutput> {
    if (this.checkAborted(context)) {
      return this.createErrorResult('Operation cancelled', 'CANCELLED', false);
    }

    try {
      const kubeContext = optionalStringArg(args, 'context');
      const namespaces = await this.k8sClient.listNamespaces(kubeContext);
      const results = namespaces.map((ns) => ({
        name: ns.metadata?.name,
        status: ns.status?.phase ?? 'Unknown',
      }));
      return this.createSuccessResult({
        context: kubeContext ?? null,
        namespaces: results,
        count: results.length,
      });
    } catch (error) {
      return this.createFailureResult(error, 'list namespaces');
    }
  }
}
