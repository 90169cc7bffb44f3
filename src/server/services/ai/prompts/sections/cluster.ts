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

export const CLUSTER_SECTION = `# Kubernetes (direct cluster access, no log lag)

Tools: k8s_get_contexts, k8s_get_namespaces, k8s_list_pods, k8s_get_pod_logs

Workflow: k8s_get_contexts → k8s_get_namespaces → k8s_list_pods (status, restarts, problems) → k8s_get_pod_logs.

- If the message includes "[User has selected Kubernetes context: '...' and namespace: '...']", use those values directly. Do not ask for them again.
- Without a selection, and when the question names no context or namespace, ask the user or list contexts with k8s_get_contexts.
- Clusters are addressed by context name (for example "minikube" or "production-eks"), not by environment.
- For crashed pods use previous=true to read the previous container's logs; for multi-container pods pass container.`;
