import { randomUUID } from 'node:crypto';
import { elapsedMs } from '../../shared/async/resilience';
import { AppError, describeError } from '../../shared/errors/app-error';
import { childLogger, type Logger } from '../../shared/logging/logger';
import { tryChat } from '../llm';
import { LLMClient } from '../llm/llm-types';
import type { ToolName } from '../tools/tool-types';
import { ToolRegistry } from '../tools/toolRegistry';
import { Handler, HandlerResult, Query, SpecialistKey } from './handler-types';
import { ToolPlan } from './toolTriggers';

const SUCCESS_CONFIDENCE = 0.85;
const FAILURE_CONFIDENCE = 0.1;
const PREVIEW_CHARS = 200;

export interface SpecialistProfile {
  key: SpecialistKey;
  name: string;
  description: string;
  instruction: string;
  /** Subject as it reads in fallback sentences, e.g. "math". */
  subject: string;
  /** Adjective for the explanation prompt, e.g. "mathematical". */
  conceptAdjective: string;
  /** Noun for what a tool produced, e.g. "solution". */
  toolResultNoun: string;
}

export const EMPTY_REPLY = 'Model returned an empty response';

export function isBlank(text: string): boolean {
  return text.trim().length === 0;
}

export function preview(text: string, max = PREVIEW_CHARS): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/**
 * Shared flow for subject tutors: optional deterministic tool, then one model call.
 *
 * Subclasses supply the confidence heuristic, the tool trigger and the tools they own.
 */
export abstract class SpecialistHandler implements Handler {
  protected readonly tools = new ToolRegistry();

  constructor(
    protected readonly profile: SpecialistProfile,
    protected readonly llm: LLMClient,
  ) {}

  get key(): SpecialistKey {
    return this.profile.key;
  }

  get name(): string {
    return this.profile.name;
  }

  get description(): string {
    return this.profile.description;
  }

  abstract estimateConfidence(text: string): number;

  /** Deterministic tool to run before asking the model, if the text calls for one. */
  protected planTool(_text: string): ToolPlan | undefined {
    return undefined;
  }

  listTools(): ToolName[] {
    return this.tools.listNames();
  }

  async handle(query: Query): Promise<HandlerResult> {
    const startedAt = performance.now();
    const flowId = randomUUID();
    const log = childLogger({ handler: this.name, flowId });
    log.info({ queryPreview: preview(query.text), tools: this.listTools() }, 'Handler started');

    const baseMetadata = { handler: this.name, handlerKey: this.key, flowId };

    try {
      const toolsUsed: ToolName[] = [];
      let content: string | undefined;

      const plan = this.planTool(query.text);
      if (plan) {
        const run = this.tools.executeValidated({ name: plan.tool, args: plan.args });
        if (run.success) {
          log.info({ tool: run.toolName, args: plan.args, result: preview(run.display) }, 'Tool call succeeded');
          toolsUsed.push(run.toolName);
          content = await this.explainToolResult(query, run.toolName, run.display, log);
        } else {
          log.warn({ tool: run.toolName, args: plan.args, error: run.error }, 'Tool call failed, answering with the model');
        }
      }

      if (content === undefined) {
        const userPrompt = this.buildUserPrompt(query);
        log.debug({ promptPreview: preview(userPrompt) }, 'Model request');
        const outcome = await tryChat(this.llm, {
          messages: [
            { role: 'system', content: this.buildSystemPrompt() },
            { role: 'user', content: userPrompt },
          ],
        });
        if (!outcome.ok) {
          return this.failure(outcome.error, baseMetadata, startedAt, log);
        }
        if (isBlank(outcome.response.content)) {
          return this.failure(new AppError('EXTERNAL_CALL_FAILED', EMPTY_REPLY), baseMetadata, startedAt, log);
        }
        content = outcome.response.content;
      }

      log.debug({ responsePreview: preview(content) }, 'Model response');
      const executionTimeMs = elapsedMs(startedAt);
      log.info({ executionTimeMs, confidence: SUCCESS_CONFIDENCE }, 'Handler completed');

      return {
        content,
        confidence: SUCCESS_CONFIDENCE,
        sources: [this.name, this.llm.defaultModel, ...toolsUsed],
        metadata: { ...baseMetadata, toolsUsed, toolCallsCount: toolsUsed.length },
        executionTimeMs,
      };
    } catch (error) {
      return this.failure(error, baseMetadata, startedAt, log);
    }
  }

  protected buildSystemPrompt(): string {
    return `You are ${this.name}.

${this.profile.instruction}

${this.description}

Remember to:
- Provide clear, educational explanations
- Show your reasoning step by step
- Always aim to help the student understand concepts, not just provide answers`;
  }

  protected buildUserPrompt(query: Query): string {
    const contextSection = query.context ? `\n\nContext: ${query.context}` : '';
    return `Student Question: ${query.text}${contextSection}`;
  }

  /** Ask the model to teach around a deterministic answer; fall back to the bare answer. */
  private async explainToolResult(query: Query, toolName: ToolName, display: string, log: Logger): Promise<string> {
    const prompt = `You are a ${this.name} helping with: "${query.text}"

You used the tool "${toolName}" and got this result: ${display}

Provide an educational response that:
1. Explains the ${this.profile.conceptAdjective} concepts involved
2. Shows how this applies to the question
3. Includes the answer in an easy to understand way`;

    const outcome = await tryChat(this.llm, { messages: [{ role: 'user', content: prompt }] });
    if (outcome.ok && !isBlank(outcome.response.content)) {
      return outcome.response.content;
    }

    log.warn(
      { err: outcome.ok ? EMPTY_REPLY : outcome.error, tool: toolName },
      'Explanation call failed, returning the tool result as is',
    );
    return `I found this ${this.profile.toolResultNoun} for your ${this.profile.subject} question: ${display}. Let me know if you need further explanation!`;
  }

  private failure(
    error: unknown,
    baseMetadata: Record<string, unknown>,
    startedAt: number,
    log: Logger,
  ): HandlerResult {
    const message = describeError(error);
    log.error({ err: error }, 'Handler failed');
    return {
      content: `I encountered an error while trying to help with your ${this.profile.subject} question: ${message}. Please try rephrasing.`,
      confidence: FAILURE_CONFIDENCE,
      sources: [this.name],
      metadata: { ...baseMetadata, error: message },
      executionTimeMs: elapsedMs(startedAt),
    };
  }
}
