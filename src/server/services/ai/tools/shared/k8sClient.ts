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
import { AssistantError } from 'server/lib/errors/assistantErrors';

export interface ClusterContext {
  name: string;
  cluster: string;
  namespace?: string;
  isCurrent: boolean;
}

export interface PodListOptions {
  context?: string;
  labelSelector?: string;
  fieldSelector?: string;
}

export interface PodLogOptions {
  context?: string;
  container?: string;
  tailLines?: number;
  sinceSeconds?: number;
  previous?: boolean;
}

export interface ClusterClient {
  getContexts(): ClusterContext[];
  listNamespaces(context?: string): Promise<k8s.V1Namespace[]>;
  listPods(namespace: string, options: PodListOptions): Promise<k8s.V1Pod[]>;
  readPodLog(name: string, namespace: string, options: PodLogOptions): Promise<string>;
}

/**
 * Kubeconfig-backed client. The file is read on first use so the catalog can be
 * built on hosts without a kubeconfig; one CoreV1Api is kept per context.
 */
export class K8sClient implements ClusterClient {
  private kc?: k8s.KubeConfig;
  private readonly apis = new Map<string, k8s.CoreV1Api>();

  constructor(private readonly kubeconfigPath: string) {}

  private config(): k8s.KubeConfig {
    if (!this.kc) {
      const kc = new k8s.KubeConfig();
      kc.loadFromFile(this.kubeconfigPath);
      this.kc = kc;
    }
    return this.kc;
  }

  private coreApi(context?: string): k8s.CoreV1Api {
    const name = context || this.config().getCurrentContext();
    const cached = this.apis.get(name);
    if (cached) return cached;

    const kc = new k8s.KubeConfig();
    kc.loadFromFile(this.kubeconfigPath);
    if (!kc.getContextObject(name)) {
      throw new AssistantError('VALIDATION_ERROR', `Unknown Kubernetes context '${name}'`);
    }
    kc.setCurrentContext(name);
    const api = kc.makeApiClient(k8s.CoreV1Api);
    this.apis.set(name, api);
    return api;
  }

  getContexts(): ClusterContext[] {
    const kc = this.config();
    const current = kc.getCurrentContext();
    return kc.getContexts().map((ctx) => ({
      name: ctx.name,
      cluster: ctx.cluster,
      namespace: ctx.namespace,
      isCurrent: ctx.name === current,
    }));
  }

  async listNamespaces(context?: string): Promise<k8s.V1Namespace[]> {
    const response = await this.coreApi(context).listNamespace();
    return response.body.items;
  }

  async listPods(namespace: string, options: PodListOptions): Promise<k8s.V1Pod[]> {
    const response = await this.coreApi(options.context).listNamespacedPod(
      namespace,
      undefined,
      undefined,
      undefined,
      options.fieldSelector,
      options.labelSelector
    );
    return response.body.items;
  }

  async readPodLog(name: string, namespace: string, options: PodLogOptions): Promise<string> {
    const response = await this.coreApi(options.context).readNamespacedPodLog(
      name,
      namespace,
      options.container,
      undefined,
      undefined,
      undefined,
      undefined,
      options.previous,
      options.sinceSeconds,
      options.tailLines
    );
    return response.body;
  }
}
