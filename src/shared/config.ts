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

import 'dotenv/config';
import os from 'os';
import path from 'path';

const getProp = (env: NodeJS.ProcessEnv, key: string, fallback?: string): string => {
  const value = env[key];
  if (value !== undefined && value !== '') {
    return value;
  }
  if (fallback !== undefined) {
    return fallback;
  }

  throw new Error(`Required config missing: '${key}'`);
};

export const getEnv = (key: string, fallback?: string): string => getProp(process.env, key, fallback);

const firstIn = (env: NodeJS.ProcessEnv, names: string[]): string => names.map((n) => env[n]).find((v) => !!v) || '';

/* Several integrations accept more than one variable name for the same secret */
export const firstEnv = (...names: string[]): string => firstIn(process.env, names);

export const expandHome = (filePath: string): string =>
  filePath.startsWith('~') ? path.join(os.homedir(), filePath.slice(1)) : filePath;

const isTrue = (value: string): boolean => value.toLowerCase() === 'true';

export const LOG_LEVEL = getEnv('LOG_LEVEL', 'info');

export const AI_PROVIDER = getEnv('AI_PROVIDER', 'anthropic');
export const AI_MODEL = getEnv('AI_MODEL', '');

export interface IntegrationEnv {
  datadogApiKey: string;
  datadogAppKey: string;
  datadogSite: string;
  pagerDutyApiKey: string;
  pagerDutyFromEmail: string;
  kubeconfigPath: string;
  k8sEnabled: boolean;
  awsRegion: string;
  sqsEnabled: boolean;
}

export function loadIntegrationEnv(env: NodeJS.ProcessEnv = process.env): IntegrationEnv {
  const pick = (...names: string[]) => firstIn(env, names);
  return {
    datadogApiKey: pick('DATADOG_API_KEY', 'DD_API_KEY'),
    datadogAppKey: pick('DATADOG_APP_KEY', 'DD_APP_KEY'),
    datadogSite: getProp(env, 'DATADOG_SITE', 'datadoghq.com'),
    pagerDutyApiKey: pick('PAGERDUTY_API_KEY'),
    pagerDutyFromEmail: getProp(env, 'PAGERDUTY_FROM_EMAIL', 'oncall-assistant@example.com'),
    kubeconfigPath: expandHome(getProp(env, 'KUBECONFIG', '~/.kube/config')),
    k8sEnabled: isTrue(getProp(env, 'K8S_ENABLED', 'true')),
    awsRegion: getProp(env, 'AWS_REGION', 'us-east-1'),
    sqsEnabled: isTrue(getProp(env, 'SQS_ENABLED', 'true')),
  };
}
