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

import { getLogger } from 'server/lib/logger';

export interface AgentSettings {
  /** Maximum model/tool round-trips within a single user round */
  loopBudget: number;
  toolConcurrency: number;
  toolTimeoutMs: number;
  modelTimeoutMs: number;
  toolOutputMaxChars: number;
  maxRepeatedCalls: number;
  maxModelRetries: number;
}

export const DEFAULT_AGENT_SETTINGS: AgentSettings = {
  loopBudget: 10,
  toolConcurrency: 4,
  toolTimeoutMs: 30_000,
  modelTimeoutMs: 120_000,
  toolOutputMaxChars: 30_000,
  maxRepeatedCalls: 3,
  maxModelRetries: 10,
};

const SETTING_ENV: Array<[keyof AgentSettings, string]> = [
  ['loopBudget', 'AGENT_LOOP_BUDGET'],
  ['toolConcurrency', 'AGENT_TOOL_CONCURRENCY'],
  ['toolTimeoutMs', 'AGENT_TOOL_TIMEOUT_MS'],
  ['modelTimeoutMs', 'AGENT_MODEL_TIMEOUT_MS'],
  ['toolOutputMaxChars', 'AGENT_TOOL_OUTPUT_MAX_CHARS'],
  ['maxRepeatedCalls', 'AGENT_MAX_REPEATED_CALLS'],
  ['maxModelRetries', 'AGENT_MAX_MODEL_RETRIES'],
];

export function loadAgentSettings(env: NodeJS.ProcessEnv = process.env): AgentSettings {
  const settings: AgentSettings = { ...DEFAULT_AGENT_SETTINGS };

  for (const [key, name] of SETTING_ENV) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') continue;

    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
      getLogger().warn(`Config: ignoring invalid ${name}=${raw} default=${settings[key]}`);
      continue;
    }
    settings[key] = value;
  }

  return settings;
}
