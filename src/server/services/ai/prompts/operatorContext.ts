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

export interface ClusterSelection {
  context?: string;
  namespace?: string;
}

const CLUSTER_KEYWORDS = ['pod', 'namespace', 'cluster', 'k8s', 'kubernetes', 'container', 'log'];

export function mentionsCluster(text: string): boolean {
  const lower = text.toLowerCase();
  return CLUSTER_KEYWORDS.some((keyword) => lower.includes(keyword));
}

/**
 * Appends the operator's selected cluster context and namespace to a message
 * that is about the cluster. Other messages are returned unchanged.
 */
export function withClusterSelection(text: string, selection?: ClusterSelection): string {
  if (!selection?.context || !selection.namespace || !mentionsCluster(text)) {
    return text;
  }
  return `${text}\n\n[User has selected Kubernetes context: '${selection.context}' and namespace: '${selection.namespace}']`;
}
