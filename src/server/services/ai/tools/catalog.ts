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

import { IntegrationEnv } from 'shared/config';
import { Tool } from '../types/tool';
import { ToolRegistry } from './registry';
import { DatadogClient, MetricsClient } from './shared/datadogClient';
import { PagerDutyClient, IncidentsClient } from './shared/pagerDutyClient';
import { K8sClient, ClusterClient } from './shared/k8sClient';
import { SqsClient, QueueClient } from './shared/sqsClient';
import { GetApmServicesTool } from './datadog/getApmServices';
import { GetServiceStatsTool } from './datadog/getServiceStats';
import { SearchTracesTool } from './datadog/searchTraces';
import { GetTraceDetailsTool } from './datadog/getTraceDetails';
import { ListIncidentsTool } from './pagerduty/listIncidents';
import { GetIncidentDetailsTool } from './pagerduty/getIncidentDetails';
import { GetOncallTool } from './pagerduty/getOncall';
import { ListServicesTool } from './pagerduty/listServices';
import { GetRecentAlertsTool } from './pagerduty/getRecentAlerts';
import { AcknowledgeIncidentTool, ResolveIncidentTool } from './pagerduty/updateIncidentStatus';
import { GetContextsTool } from './k8s/getContexts';
import { GetNamespacesTool } from './k8s/getNamespaces';
import { ListPodsTool } from './k8s/listPods';
import { GetPodLogsTool } from './k8s/getPodLogs';
import { ListQueuesTool } from './sqs/listQueues';
import { GetQueueUrlTool } from './sqs/getQueueUrl';
import { GetQueueAttributesTool } from './sqs/getQueueAttributes';
import { PeekMessagesTool } from './sqs/peekMessages';

export interface BackendClients {
  metrics: MetricsClient;
  incidents: IncidentsClient;
  cluster: ClusterClient;
  queue: QueueClient;
}

/** Constructing clients does no I/O, so this is safe with missing credentials. */
export function createBackendClients(env: IntegrationEnv): BackendClients {
  return {
    metrics: new DatadogClient({ apiKey: env.datadogApiKey, appKey: env.datadogAppKey, site: env.datadogSite }),
    incidents: new PagerDutyClient({ apiKey: env.pagerDutyApiKey, fromEmail: env.pagerDutyFromEmail }),
    cluster: new K8sClient(env.kubeconfigPath),
    queue: new SqsClient(env.awsRegion),
  };
}

export function buildToolCatalog(clients: BackendClients): Tool[] {
  return [
    new GetApmServicesTool(clients.metrics),
    new GetServiceStatsTool(clients.metrics),
    new SearchTracesTool(clients.metrics),
    new GetTraceDetailsTool(clients.metrics),
    new ListIncidentsTool(clients.incidents),
    new GetIncidentDetailsTool(clients.incidents),
    new GetOncallTool(clients.incidents),
    new ListServicesTool(clients.incidents),
    new GetRecentAlertsTool(clients.incidents),
    new AcknowledgeIncidentTool(clients.incidents),
    new ResolveIncidentTool(clients.incidents),
    new GetContextsTool(clients.cluster),
    new GetNamespacesTool(clients.cluster),
    new ListPodsTool(clients.cluster),
    new GetPodLogsTool(clients.cluster),
    new ListQueuesTool(clients.queue),
    new GetQueueUrlTool(clients.queue),
    new GetQueueAttributesTool(clients.queue),
    new PeekMessagesTool(clients.queue),
  ];
}

export function createToolRegistry(clients: BackendClients): ToolRegistry {
  const registry = new ToolRegistry();
  registry.registerMultiple(buildToolCatalog(clients));
  return registry;
}
