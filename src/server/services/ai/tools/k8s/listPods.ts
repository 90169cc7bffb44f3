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

import * as k8s from '@kubernetes/client-node';
import { BaseTool } from '../baseTool';
import { ToolExecutionContext, ToolOutput } from '../../types/tool';
import { ClusterClient } from '../shared/k8sClient';
import { optionalStringArg, stringArg } from '../shared/args';

function summarizePod(pod: k8s.V1Pod) {
  const statuses = pod.status?.containerStatuses ?? [];
  const ready = statuses.filter((s) => s.ready).length;
  const restarts = statuses.reduce((sum, s) => sum + s.restartCount, 0);
  const problems = statuses
    .map((s) => {
      const reason = s.state?.waiting?.reason ?? s.state?.terminated?.reason;
      return reason ? `${s.name}: ${reason}` : undefined;
    })
    .filter((p): p is string => p !== undefined);

  return {
    name: pod.metadata?.name,
    phase: pod.status?.phase ?? 'Unknown',
    ready: `${ready}/${statuses.length}`,
    restarts,
    node: pod.spec?.nodeName ?? null,
    started_at: pod.status?.startTime?.toISOString() ?? null,
    problems,
  };
}

export class ListPodsTool extends BaseTool {
  static readonly Name = 'k8s_list_pods';

  constructor(private k8sClient: ClusterClient) {
    super(
      'List pods in a namespace with phase, readiness, restart counts and container problems (CrashLoopBackOff, OOMKilled, ...).',
      {
        type: 'object',
        properties: {
          namespace: { type: 'string', description: 'The Kubernetes namespace' },
          context: { type: 'string', description: 'Kubeconfig context to use (default: current context)' },
          label_selector: { type: 'string', description: 'Label selector, e.g. "app=checkout"' },
          field_selector: { type: 'string', description: 'Field selector, e.g. "status.phase=Running"' },
        },
        required: ['namespace'],
      },
      'cluster'
    );
  }

  async execute(args: Record<string, unknown>, context: ToolExecutionContext): Promise<ToolOutput> {
    if (this.checkAborted(context)) {
      return this.createErrorResult('Operation cancelled', 'CANCELLED', false);
    }

    try {
      const namespace = stringArg(args, 'namespace');
      const pods = await this.k8sClient.listPods(namespace, {
        context: optionalStringArg(args, 'context'),
        labelSelector: optionalStringArg(args, 'label_selector'),
        fieldSelector: optionalStringArg(args, 'field_selector'),
      });

      const summaries = pods.map(summarizePod);
      const phaseCounts: Record<string, number> = {};
      for (const pod of summaries) {
        phaseCounts[pod.phase] = (phaseCounts[pod.phase] ?? 0) + 1;
      }

      return this.createSuccessResult({
        namespace,
        pods: summaries,
        count: summaries.length,
        phase_summary: phaseCounts,
      });
    } catch (error) {
      return this.createFailureResult(error, 'list pods');
    }
  }
}
