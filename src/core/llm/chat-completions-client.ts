import { z } from 'zod';
import { withTimeout } from '../../shared/async/resilience';
import { AppError } from '../../shared/errors/app-error';
import { logger } from '../../shared/logging/logger';
import { LLMClient, LLMRequest, LLMResponse, LLMToolCall } from './llm-types';

interface ChatCompletionsConfig {
  baseUrl: string;
  model: string;
  apiKey?: string;
  timeoutMs: number;
  temperature: number;
}

interface ChatCompletionsPayload {
  model: string;
  messages: LLMRequest['messages'];
  temperature: number;
  max_tokens?: number;
  tools?: LLMRequest['tools'];
  tool_choice?: LLMRequest['toolChoice'];
}

const completionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullish(),
            tool_calls: z
              .array(
                z.object({
                  function: z.object({
                    name: z.string(),
                    arguments: z.string().default('{}'),
                  }),
                }),
              )
              .nullish(),
          })
          .optional(),
      }),
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

function assertSafeBaseUrl(rawBaseUrl: string): string {
  const trimmed = rawBaseUrl.trim().replace(/\/$/, '').replace(/\/chat\/completions$/, '');
  const parsed = new URL(trimmed);
  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    throw new Error('LLM base URL must use HTTP(S).');
  }
  return parsed.toString().replace(/\/$/, '');
}

function parseToolArguments(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    logger.warn({ raw: raw.slice(0, 200) }, '[LLM] Tool call arguments were not valid JSON');
    return {};
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Minimal client for OpenAI-compatible `/chat/completions` endpoints.
 *
 * Native `tool_calls` are surfaced as `toolCalls`; the text content is kept alongside.
 * There are no retries: a failed call rejects once with an `AppError`.
 */
export class ChatCompletionsClient implements LLMClient {
  private config: ChatCompletionsConfig;

  constructor(config: Partial<ChatCompletionsConfig> & { baseUrl: string; model: string }) {
    this.config = {
      baseUrl: assertSafeBaseUrl(config.baseUrl),
      model: config.model,
      apiKey: config.apiKey,
      timeoutMs: config.timeoutMs ?? 30000,
      temperature: config.temperature ?? 0.7,
    };
  }

  get defaultModel(): string {
    return this.config.model;
  }

  async chat(request: LLMRequest): Promise<LLMResponse> {
    const url = `${this.config.baseUrl}/chat/completions`;
    const model = request.model ?? this.config.model;
    const timeout = request.timeoutMs ?? this.config.timeoutMs;

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (this.config.apiKey) {
      headers['Authorization'] = `Bearer ${this.config.apiKey}`;
    }

    const payload: ChatCompletionsPayload = {
      model,
      messages: request.messages,
      temperature: request.temperature ?? this.config.temperature,
      max_tokens: request.maxTokens,
    };
    if (request.tools && request.tools.length > 0) {
      payload.tools = request.tools;
      payload.tool_choice = request.toolChoice ?? 'auto';
    }

    logger.debug({ url, model, messageCount: request.messages.length, tools: payload.tools?.length ?? 0 }, '[LLM] Request');

    const controller = new AbortController();
    try {
      return await withTimeout(this.send(url, headers, payload, controller.signal), timeout, 'LLM call');
    } catch (error) {
      if (error instanceof AppError && error.code === 'TIMEOUT') {
        controller.abort();
      }
      throw error;
    }
  }

  /** Request and body read share one abort signal; the caller owns the deadline. */
  private async send(
    url: string,
    headers: Record<string, string>,
    payload: ChatCompletionsPayload,
    signal: AbortSignal,
  ): Promise<LLMResponse> {
    const { model } = payload;

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(payload),
        signal,
      });
    } catch (error) {
      if (isAbortError(error)) {
        throw new AppError('TIMEOUT', 'LLM request was aborted', error, { model });
      }
      throw new AppError('EXTERNAL_CALL_FAILED', 'LLM request could not be sent', error, { model });
    }

    if (!response.ok) {
      const text = await response.text();
      logger.warn({ status: response.status, model, error: text.slice(0, 200) }, '[LLM] API error');
      throw new AppError(
        'EXTERNAL_CALL_FAILED',
        `LLM API error: ${response.status} ${response.statusText} - ${text.slice(0, 200)}`,
        undefined,
        { status: response.status, model },
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (isAbortError(error)) {
        throw new AppError('TIMEOUT', 'LLM response was aborted', error, { model });
      }
      throw new AppError('EXTERNAL_CALL_FAILED', 'LLM response was not valid JSON', error, { model });
    }

    const parsed = completionSchema.safeParse(body);
    if (!parsed.success) {
      throw new AppError('EXTERNAL_CALL_FAILED', 'LLM response had an unexpected shape', parsed.error, { model });
    }

    const message = parsed.data.choices[0]?.message;
    const toolCalls: LLMToolCall[] = (message?.tool_calls ?? []).map((call) => ({
      name: call.function.name,
      args: parseToolArguments(call.function.arguments),
    }));
    const usage = parsed.data.usage;

    logger.debug({ usage, toolCalls: toolCalls.length }, '[LLM] Success');

    return {
      content: message?.content ?? '',
      toolCalls,
      model: parsed.data.model ?? model,
      usage: usage
        ? {
            promptTokens: usage.prompt_tokens,
            completionTokens: usage.completion_tokens,
            totalTokens: usage.total_tokens,
          }
        : undefined,
    };
  }
}
