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
import type { IBackoffFactory, IRetryBackoffContext } from 'cockatiel';
import { LLMProvider, RequestedToolCall } from '../types/provider';
import { ToolDescriptor } from '../types/tool';
import { CapabilitySet } from '../types/capability';
import { assistantTurn, ToolCallRequest, ToolResult, userTurn } from '../types/turn';
import { Session } from '../conversation/session';
import { AgentEventStream } from '../streaming/eventStream';
import { ToolRegistry } from '../tools/registry';
import { buildSystemPrompt } from '../prompts/systemPrompt';
import { createClassifiedError, getUserErrorMessage, RetryBudget } from '../errors';
import { createProviderPolicy } from '../resilience';
import { ToolDispatcher } from './dispatcher';
import { LoopDetector } from './loopProtection';
import { getLogger, updateLogContext } from 'server/lib/logger';

export interface OrchestratorOptions {
  maxRepeatedCalls: number;
  modelTimeoutMs: number;
  maxModelRetries: number;
  maxTokens?: number;
  retryBackoff?: IBackoffFactory<IRetryBackoffContext<unknown>>;
}

export interface RoundInput {
  session: Session;
  text: string;
  stream: AgentEventStream;
  capabilities: CapabilitySet;
}

export type RoundOutcome = 'answered' | 'degraded' | 'model_error' | 'cancelled';

export interface RoundMetrics {
  iterations: number;
  toolCalls: number;
  durationMs: number;
  outcome: RoundOutcome;
}

interface Inference {
  text: string;
  toolCalls: RequestedToolCall[];
}

interface RoundContext {
  session: Session;
  stream: AgentEventStream;
  capabilities: CapabilitySet;
  tools: ToolDescriptor[];
  systemPrompt: string;
  retryBudget: RetryBudget;
  loopDetector: LoopDetector;
}

const DEFAULT_OPTIONS: OrchestratorOptions = {
  maxRepeatedCalls: 3,
  modelTimeoutMs: 120_000,
  maxModelRetries: 10,
};

class RoundCancelled extends Error {
  constructor() {
    super('Round cancelled');
    this.name = 'RoundCancelled';
  }
}

/**
 * Drives one user round through model inference and tool execution until the
 * model answers, the round budget runs out, the model fails or the consumer
 * cancels. Every exit emits exactly one terminal event and leaves the session
 * awaiting input.
 */
export class AgentOrchestrator {
  private options: OrchestratorOptions;

  constructor(
    private provider: LLMProvider,
    private toolRegistry: ToolRegistry,
    private dispatcher: ToolDispatcher,
    options: Partial<OrchestratorOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  get modelName(): string {
    return this.provider.getModelInfo().model;
  }

  async runRound(input: RoundInput): Promise<RoundMetrics> {
    const { session, stream, capabilities } = input;
    const budget = session.loopBudget;
    const startTime = Date.now();
    const logger = getLogger();
    let iterations = 0;
    let toolCalls = 0;

    const finish = (outcome: RoundOutcome): RoundMetrics => {
      session.status = 'AwaitingUserInput';
      session.lastActivity = new Date();
      const metrics = { iterations, toolCalls, durationMs: Date.now() - startTime, outcome };
      logger.info(
        `Agent: round complete session=${session.id} outcome=${outcome} iterations=${iterations} toolCalls=${toolCalls} duration=${metrics.durationMs}ms`
      );
      return metrics;
    };

    if (stream.signal.aborted) {
      this.emitCancelled(stream);
      return finish('cancelled');
    }

    const tools = this.toolRegistry.listAvailable(capabilities);
    const ctx: RoundContext = {
      session,
      stream,
      capabilities,
      tools,
      systemPrompt: buildSystemPrompt(capabilities),
      retryBudget: new RetryBudget(this.options.maxModelRetries),
      loopDetector: new LoopDetector({ maxRepeatedCalls: this.options.maxRepeatedCalls }),
    };

    session.conversation.append(userTurn(input.text));
    logger.info(`Agent: round started session=${session.id} tools=${tools.length} budget=${budget}`);

    const outcomes: ToolResult[] = [];

    try {
      while (iterations < budget) {
        this.throwIfCancelled(stream);
        iterations++;
        updateLogContext({ round: iterations });

        const inference = await this.infer(ctx);

        if (inference.toolCalls.length === 0) {
          session.conversation.append(assistantTurn(inference.text));
          stream.emit({ type: 'final_answer', text: inference.text, degraded: false });
          return finish('answered');
        }

        const results = await this.executeTools(ctx, inference, iterations);
        toolCalls += results.length;
        outcomes.push(...results);
      }
    } catch (error) {
      if (error instanceof RoundCancelled || stream.signal.aborted) {
        this.emitCancelled(stream);
        return finish('cancelled');
      }

      const classified = createClassifiedError(this.provider.name, error);
      logger.error({ error }, `Agent: model call failed session=${session.id} category=${classified.category}`);
      stream.emit({
        type: 'error',
        code: 'MODEL_ERROR',
        message: getUserErrorMessage(classified, this.modelName),
        recoverable: true,
      });
      return finish('model_error');
    }

    logger.warn(`Agent: loop budget exhausted session=${session.id} budget=${budget}`);
    const text = this.degradedAnswer(budget, outcomes);
    session.conversation.append(assistantTurn(text, true));
    stream.emit({ type: 'final_answer', text, degraded: true });
    return finish('degraded');
  }

  /**
   * One model call. Retries are only attempted while nothing has been
   * forwarded to the consumer, since streamed tokens cannot be taken back.
   */
  private async infer(ctx: RoundContext): Promise<Inference> {
    const { session, stream } = ctx;
    session.status = 'ModelInference';

    let streamed = false;
    const policy = createProviderPolicy(this.provider.name, {
      retryBudget: ctx.retryBudget,
      timeoutMs: this.options.modelTimeoutMs,
      canRetryAttempt: () => !streamed && !stream.signal.aborted,
      backoff: this.options.retryBackoff,
    });

    const turns = session.conversation.snapshot();

    return policy.execute(async ({ signal }) => {
      let text = '';
      const toolCalls: RequestedToolCall[] = [];

      for await (const chunk of this.provider.streamCompletion(
        turns,
        { systemPrompt: ctx.systemPrompt, tools: ctx.tools, maxTokens: this.options.maxTokens },
        signal
      )) {
        if (chunk.type === 'text') {
          if (!chunk.content) continue;
          streamed = true;
          text += chunk.content;
          stream.emit({ type: 'token', text: chunk.content });
        } else {
          toolCalls.push(...chunk.toolCalls);
        }
      }

      return { text, toolCalls };
    }, stream.signal);
  }

  /**
   * Appends the batch of requests and their results as one unit. A cancel that
   * lands mid-batch discards the whole unit, so no request is left without its
   * result.
   */
  private async executeTools(ctx: RoundContext, inference: Inference, iteration: number): Promise<ToolResult[]> {
    const { session, stream } = ctx;
    const conversation = session.conversation;
    const requests = inference.toolCalls.map(toRequest);

    conversation.beginRound();
    if (inference.text.trim()) {
      conversation.append(assistantTurn(inference.text));
    }
    conversation.appendAll(requests);
    session.status = 'ExecutingTools';

    getLogger().info(
      `Agent: executing tools session=${session.id} iteration=${iteration} tools=${requests.map((r) => r.name).join(',')}`
    );

    const results = await this.dispatcher.invokeBatch(
      requests,
      {
        capabilities: ctx.capabilities,
        signal: stream.signal,
        loopDetector: ctx.loopDetector,
        iteration,
      },
      {
        onStart: (request) =>
          stream.emit({ type: 'tool_started', id: request.id, name: request.name, arguments: request.arguments }),
        onFinish: (request, result, durationMs) =>
          stream.emit({ type: 'tool_finished', id: request.id, name: request.name, ok: result.ok, durationMs }),
      }
    );

    if (stream.signal.aborted) {
      const dropped = conversation.rollbackRound();
      getLogger().info(`Agent: cancelled mid-batch session=${session.id} discarded=${dropped}`);
      throw new RoundCancelled();
    }

    conversation.appendAll(results);
    conversation.commitRound();
    return results;
  }

  private throwIfCancelled(stream: AgentEventStream): void {
    if (stream.signal.aborted) {
      throw new RoundCancelled();
    }
  }

  private emitCancelled(stream: AgentEventStream): void {
    stream.emit({ type: 'error', code: 'CANCELLED', message: 'Operation cancelled by user', recoverable: true });
  }

  private degradedAnswer(budget: number, results: ToolResult[]): string {
    const lines = [
      `I reached the limit of ${budget} tool round-trips for this question before reaching a conclusion.`,
    ];
    if (results.length > 0) {
      lines.push('', 'Tool calls made:');
      for (const result of results) {
        lines.push(result.ok ? `- ${result.name}: ok` : `- ${result.name}: failed (${result.code})`);
      }
    }
    lines.push('', 'Try narrowing the question, for example to a single service, namespace or queue.');
    return lines.join('\n');
  }
}

function toRequest(call: RequestedToolCall): ToolCallRequest {
  return {
    type: 'tool_call',
    id: call.id || `call_${nanoid(12)}`,
    name: call.name,
    arguments: call.arguments,
  };
}
