import { randomUUID } from 'node:crypto';
import { elapsedMs } from '../../shared/async/resilience';
import { describeError } from '../../shared/errors/app-error';
import { childLogger, type Logger } from '../../shared/logging/logger';
import { Handler, HandlerResult, Query } from '../handlers/handler-types';
import { HandlerRegistry } from '../handlers/handlerRegistry';
import { EMPTY_REPLY, isBlank, preview } from '../handlers/specialistHandler';
import { tryChat } from '../llm';
import { LLMClient, LLMToolCall } from '../llm/llm-types';
import type { ToolName } from '../tools/tool-types';
import {
  ROUTING_SYSTEM_PROMPT,
  ROUTING_TARGETS,
  RoutingDecision,
  buildRoutingTools,
  fallbackDecision,
  isRoutingFunctionName,
  routingArgsSchema,
} from './routingFunctions';

const COORDINATOR_NAME = 'Tutor Coordinator';
const ROUTER_CONFIDENCE = 0.95;
const DIRECT_CONFIDENCE = 0.7;
const FAILURE_CONFIDENCE = 0.1;
const ROUTING_TEMPERATURE = 0.1;

export interface CoordinatorDeps {
  registry: HandlerRegistry;
  /** Answers general questions directly. */
  chatClient: LLMClient;
  /** Picks the route; defaults to `chatClient`. */
  routerClient?: LLMClient;
}

/**
 * Top-level handler: asks the model for a route, then delegates to a specialist or answers itself.
 */
export class CoordinatorHandler implements Handler {
  readonly key = 'coordinator';
  readonly name = COORDINATOR_NAME;
  readonly description = 'Routes student questions to subject tutors and answers general questions directly';

  private readonly registry: HandlerRegistry;
  private readonly chatClient: LLMClient;
  private readonly routerClient: LLMClient;

  constructor(deps: CoordinatorDeps) {
    this.registry = deps.registry;
    this.chatClient = deps.chatClient;
    this.routerClient = deps.routerClient ?? deps.chatClient;
  }

  estimateConfidence(_text: string): number {
    return ROUTER_CONFIDENCE;
  }

  listTools(): ToolName[] {
    return [];
  }

  async handle(query: Query): Promise<HandlerResult> {
    const startedAt = performance.now();
    const flowId = randomUUID();
    const log = childLogger({ handler: this.name, flowId });
    log.info({ queryPreview: preview(query.text) }, 'Coordinator started');

    try {
      const decision = await this.decide(query, log);
      log.info({ decision }, 'Routing decision');

      if (decision.action === 'delegate') {
        return await this.delegate(decision.handlerKey, query, flowId, startedAt, log);
      }
      return await this.answerDirectly(query, decision.reasoning, flowId, startedAt, log);
    } catch (error) {
      const message = describeError(error);
      log.error({ err: error }, 'Coordinator failed');
      return {
        content: `I encountered an error while processing your request: ${message}. Please try rephrasing your question.`,
        confidence: FAILURE_CONFIDENCE,
        sources: [this.name],
        metadata: { handler: this.name, flowId, error: message },
        executionTimeMs: elapsedMs(startedAt),
      };
    }
  }

  /** Routing decision for a query without acting on it. */
  async previewRoute(text: string, context?: string): Promise<RoutingDecision> {
    const log = childLogger({ handler: this.name, flowId: randomUUID() });
    return this.decide({ text, context }, log);
  }

  private async decide(query: Query, log: Logger): Promise<RoutingDecision> {
    const prompt = `Analyze this student query and decide how to handle it:

Student Query: "${query.text}"

Context: ${query.context || 'None provided'}

Use the appropriate function to route this query. Consider the subject matter and the student's likely learning needs.`;

    log.debug({ promptPreview: preview(prompt) }, 'Routing request');
    const outcome = await tryChat(this.routerClient, {
      messages: [
        { role: 'system', content: ROUTING_SYSTEM_PROMPT },
        { role: 'user', content: prompt },
      ],
      tools: buildRoutingTools(),
      toolChoice: 'required',
      temperature: ROUTING_TEMPERATURE,
    });

    if (!outcome.ok) {
      log.warn({ err: outcome.error }, 'Routing call failed, using keyword fallback');
      return fallbackDecision(query.text, `error: ${outcome.error.message}`);
    }

    const decision = outcome.response.toolCalls
      .map((call) => this.toDecision(call))
      .find((candidate): candidate is RoutingDecision => candidate !== undefined);
    if (decision) {
      return decision;
    }

    log.warn({ contentPreview: preview(outcome.response.content) }, 'No routing function call, using keyword fallback');
    return fallbackDecision(query.text, 'no routing function call');
  }

  private toDecision(call: LLMToolCall): RoutingDecision | undefined {
    if (!isRoutingFunctionName(call.name)) return undefined;

    const parsed = routingArgsSchema.partial().safeParse(call.args);
    const reasoning = parsed.success && parsed.data.reasoning ? parsed.data.reasoning : `Model selected ${call.name}`;
    const handlerKey = ROUTING_TARGETS[call.name];

    return handlerKey === undefined
      ? { action: 'handle_directly', reasoning, source: 'model' }
      : { action: 'delegate', handlerKey, reasoning, source: 'model' };
  }

  private async delegate(
    handlerKey: string,
    query: Query,
    flowId: string,
    startedAt: number,
    log: Logger,
  ): Promise<HandlerResult> {
    const handler = this.registry.get(handlerKey);
    if (!handler) {
      log.error({ handlerKey }, 'Routed to an unregistered handler');
      return {
        content: `Sorry, I couldn't find the right specialist (${handlerKey}) for your query.`,
        confidence: FAILURE_CONFIDENCE,
        sources: [this.name],
        metadata: { handler: this.name, flowId, error: 'HandlerNotFound', handlerKey },
        executionTimeMs: elapsedMs(startedAt),
      };
    }

    log.info({ delegate: handler.name }, 'Delegating to specialist');
    const result = await handler.handle(query);
    log.info({ delegate: handler.name, confidence: result.confidence }, 'Specialist responded');
    return result;
  }

  private async answerDirectly(
    query: Query,
    reasoning: string,
    flowId: string,
    startedAt: number,
    log: Logger,
  ): Promise<HandlerResult> {
    const specialists = this.registry
      .list()
      .map((summary) => summary.name)
      .join(', ');
    const prompt = `You are the ${this.name}.
Student Question: ${query.text}
Context: ${query.context || 'None provided'}
Routing Decision: You've decided to handle this query directly. Reasoning: ${reasoning}
Available Specialists (for the student's future reference, not for you to use now): ${specialists}.

Provide a comprehensive, educational response directly to the student.`;

    const metadata: Record<string, unknown> = {
      handler: this.name,
      flowId,
      mode: 'general_tutor',
      routingReasoning: reasoning,
    };

    const outcome = await tryChat(this.chatClient, { messages: [{ role: 'user', content: prompt }] });
    let content: string;
    if (outcome.ok && !isBlank(outcome.response.content)) {
      content = outcome.response.content;
    } else {
      const error = outcome.ok ? EMPTY_REPLY : outcome.error.message;
      log.error({ err: error }, 'Direct answer failed');
      metadata.error = error;
      content = `I'd be happy to help with your question: ${query.text}. However, I encountered a technical issue while preparing your answer. Could you please rephrase your question?`;
    }

    const executionTimeMs = elapsedMs(startedAt);
    log.info({ executionTimeMs, confidence: DIRECT_CONFIDENCE }, 'Coordinator answered directly');
    return {
      content,
      confidence: DIRECT_CONFIDENCE,
      sources: [this.name, this.chatClient.defaultModel],
      metadata,
      executionTimeMs,
    };
  }
}
