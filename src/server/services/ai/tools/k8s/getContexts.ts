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

export class GetContextsTool extends BaseTool {
  static readonly Name = 'k8s_get_contexts';

  constructor(private k8sClient: ClusterClient) {
    super(
      'List the Kubernetes contexts (clusters) in the kubeconfig and which one is current.',
      { type: 'object', properties: {} },
      'cluster'
    );
  }

  async execute(_args: Record<string, unknown>, context: ToolExecutionContext): Promise<ToolOutput> {
    if (this.checkAborted(context)) {
      return this.createErrorResult('Operation cancelled', 'CANCELLED', false);
    }

    try {
      const contexts = this.k8sClient.getContexts();
      return this.createSuccessResult({
        contexts,
        current: contexts.find((c) => c.isCurrent)?.name ?? null,
        count: contexts.length,
      });
    } catch (error) {
      return this.createFailureResult(error, 'read kubeconfig contexts');
    }
  }
}
