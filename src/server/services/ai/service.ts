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

import { nanoid } from 'nanoid';
import { LLMProvider } from './types/provider';
import { ToolFamily } from './types/tool';
import { CapabilitySet } from './types/capability';
import { toTranscript, TranscriptEntry } from './types/turn';
import { ProviderFactory } from './providers/factory';
import { CapabilityGate, integrationProbes } from './capabilities/gate';
import { BackendClients, createBackendClients, createToolRegistry } from './tools/catalog';
import { ToolRegistry } from './tools/registry';
import { ToolDispatcher } from './orchestration/dispatcher';
import { AgentOrchestrator } from './orchestration/orchestrator';
import { Session, SessionManager, SessionSummary } from './conversation/session';
import { AgentEventStream } from './streaming/eventStream';
import { ClusterSelection, withClusterSelection } from './prompts/operatorContext';
import { AgentSettings, loadAgentSettings } from 'shared/agentSettings';
import { AI_MODEL, AI_PROVIDER, loadIntegrationEnv } from 'shared/config';
import { getLogger, withLogContext } from 'server/lib/logger';
import { errorMessage, isAssistantError } from 'server/lib/errors/assistantErrors';

export interface AssistantConfig {
  provider?: string;
  modelId?: string;
  settings?: Partial<AgentSettings>;
  env?: NodeJS.ProcessEnv;
}

/** Replaceable collaborators; each defaults to the environment-driven one. */
export interface AssistantDependencies {
  gate?: CapabilityGate;
  createClients?: () => BackendClients;
  createProvider?: () => LLMProvider;
}

export interface SubmitOptions {
  /** Kubernetes context and namespace picked by the operator in the UI */
  clusterSelection?: ClusterSelection;
}

export interface AssistantStatus {
  modelConfigured: boolean;
  provider: string;
  model: string | null;
  modelError?: string;
  integrations: Record<ToolFamily, boolean>;
  toolCount: number;
  activeSessions: number;
}

interface Runtime {
  capabilities: CapabilitySet;
  registry: ToolRegistry;
  orchestrator: AgentOrchestrator | null;
  model: string | null;
  modelError?: string;
}

/**
 * Entry point for the boundary layer. Owns the sessions and the wiring from
 * configuration to a running orchestrator; a capability recheck rebuilds the
 * wiring while rounds already in flight finish on what they started with.
 */
export class AssistantCore {
  private readonly settings: AgentSettings;
  private readonly providerName: string;
  private readonly sessions: SessionManager;
  private readonly gate: CapabilityGate;
  private readonly createClients: () => BackendClients;
  private readonly createProvider: () => LLMProvider;
  private runtime: Runtime;

  constructor(config: AssistantConfig = {}, deps: AssistantDependencies = {}) {
    const env = config.env ?? process.env;
    this.settings = { ...loadAgentSettings(env), ...config.settings };
    this.providerName = config.provider ?? AI_PROVIDER;
    const modelId = config.modelId ?? AI_MODEL;

    this.gate = deps.gate ?? new CapabilityGate(integrationProbes(() => loadIntegrationEnv(env)));
    this.createClients = deps.createClients ?? (() => createBackendClients(loadIntegrationEnv(env)));
    this.createProvider = deps.createProvider ?? (() => ProviderFactory.fromSetting(this.providerName, modelId, env));
    this.sessions = new SessionManager(this.settings.loopBudget);

    this.runtime = this.buildRuntime(this.gate.current());
  }

  createSession(): SessionSummary {
    return this.sessions.create().summary();
  }

  /**
   * Queues a message on the session and returns its event stream at once.
   * Throws SESSION_NOT_FOUND for an unknown session; every other failure
   * arrives on the stream as an error event.
   */
  submit(sessionId: string, text: string, options: SubmitOptions = {}): AgentEventStream {
    const session = this.sessions.require(sessionId);
    const stream = new AgentEventStream();
    const message = withClusterSelection(text, options.clusterSelection);

    const cancelOnEnd = () => stream.cancel();
    session.signal.addEventListener('abort', cancelOnEnd, { once: true });

    session
      .enqueue(() =>
        withLogContext({ correlationId: nanoid(), sessionId: session.id, provider: this.providerName }, () =>
          this.runRound(session, message, stream)
        )
      )
      .finally(() => session.signal.removeEventListener('abort', cancelOnEnd))
      .catch((error) => {
        getLogger().error({ error }, `Assistant: round failed session=${session.id}`);
        if (!stream.isClosed) {
          stream.emit({
            type: 'error',
            code: isAssistantError(error) ? error.code : 'MODEL_ERROR',
            message: errorMessage(error),
            recoverable: false,
          });
        }
      });

    return stream;
  }

  endSession(sessionId: string): boolean {
    return this.sessions.end(sessionId);
  }

  listSessions(): SessionSummary[] {
    return this.sessions.list();
  }

  getHistory(sessionId: string): TranscriptEntry[] {
    return toTranscript(this.sessions.require(sessionId).conversation.snapshot());
  }

  getStatus(): AssistantStatus {
    const { capabilities, registry, orchestrator, model, modelError } = this.runtime;
    return {
      modelConfigured: orchestrator !== null,
      provider: this.providerName,
      model,
      ...(modelError ? { modelError } : {}),
      integrations: {
        metrics: capabilities.has('metrics'),
        incidents: capabilities.has('incidents'),
        cluster: capabilities.has('cluster'),
        queue: capabilities.has('queue'),
      },
      toolCount: registry.listAvailable(capabilities).length,
      activeSessions: this.sessions.list().length,
    };
  }

  recheckCapabilities(): AssistantStatus {
    this.runtime = this.buildRuntime(this.gate.recheck());
    const status = this.getStatus();
    getLogger().info(
      `Assistant: capabilities rechecked tools=${status.toolCount} modelConfigured=${status.modelConfigured}`
    );
    return status;
  }

  private async runRound(session: Session, text: string, stream: AgentEventStream): Promise<void> {
    const { orchestrator, capabilities, modelError } = this.runtime;
    if (!orchestrator) {
      stream.emit({
        type: 'error',
        code: 'CONFIGURATION_GAP',
        message: modelError ?? 'The language model is not configured',
        recoverable: false,
      });
      return;
    }
    await orchestrator.runRound({ session, text, stream, capabilities });
  }

  private buildRuntime(capabilities: CapabilitySet): Runtime {
    const { toolTimeoutMs, toolOutputMaxChars, toolConcurrency, maxRepeatedCalls, modelTimeoutMs, maxModelRetries } =
      this.settings;
    const registry = createToolRegistry(this.createClients());
    const dispatcher = new ToolDispatcher(registry, {
      toolTimeoutMs,
      toolOutputMaxChars,
      concurrency: toolConcurrency,
    });

    let provider: LLMProvider;
    try {
      provider = this.createProvider();
    } catch (error) {
      if (!isAssistantError(error, 'CONFIGURATION_GAP')) throw error;
      getLogger().warn(`Assistant: model not configured provider=${this.providerName} reason=${error.message}`);
      return { capabilities, registry, orchestrator: null, model: null, modelError: error.message };
    }

    const orchestrator = new AgentOrchestrator(provider, registry, dispatcher, {
      maxRepeatedCalls,
      modelTimeoutMs,
      maxModelRetries,
    });
    return { capabilities, registry, orchestrator, model: provider.getModelInfo().model };
  }
}
