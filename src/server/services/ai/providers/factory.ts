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

import { LLMProvider } from '../types/provider';
import { AnthropicProvider } from './anthropic';
import { OpenAIProvider } from './openai';
import { AssistantError } from 'server/lib/errors/assistantErrors';

export const PROVIDER_TYPES = ['anthropic', 'openai'] as const;

export type ProviderType = (typeof PROVIDER_TYPES)[number];

export interface ProviderConfig {
  provider: ProviderType;
  modelId?: string;
  apiKey?: string;
}

const API_KEY_ENV: Record<ProviderType, string[]> = {
  anthropic: ['ANTHROPIC_API_KEY', 'CLAUDE_API_KEY', 'AI_API_KEY'],
  openai: ['OPENAI_API_KEY', 'AI_API_KEY'],
};

export function isProviderType(value: string): value is ProviderType {
  return PROVIDER_TYPES.some((p) => p === value);
}

export class ProviderFactory {
  /** Throws CONFIGURATION_GAP when no API key can be found. */
  static create(config: ProviderConfig, env: NodeJS.ProcessEnv = process.env): LLMProvider {
    const apiKey = config.apiKey || this.getDefaultApiKey(config.provider, env);

    switch (config.provider) {
      case 'anthropic':
        return new AnthropicProvider(config.modelId, apiKey);
      case 'openai':
        return new OpenAIProvider(config.modelId, apiKey);
    }
  }

  static fromSetting(provider: string, modelId?: string, env: NodeJS.ProcessEnv = process.env): LLMProvider {
    if (!isProviderType(provider)) {
      throw new AssistantError('CONFIGURATION_GAP', `Unknown AI provider '${provider}'`, { provider });
    }
    return this.create({ provider, modelId: modelId || undefined }, env);
  }

  private static getDefaultApiKey(provider: ProviderType, env: NodeJS.ProcessEnv): string | undefined {
    return API_KEY_ENV[provider].map((name) => env[name]).find((value) => !!value);
  }
}
