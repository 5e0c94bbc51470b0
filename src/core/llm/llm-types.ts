import type { AppError } from '../../shared/errors/app-error';

export type LLMRole = 'system' | 'user' | 'assistant';

export interface LLMChatMessage {
  role: LLMRole;
  content: string;
}

/** Function tool offered to the model, in OpenAI chat-completions shape. */
export interface LLMFunctionTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: object;
  };
}

export type LLMToolChoice = 'auto' | 'required' | 'none';

export interface LLMRequest {
  messages: LLMChatMessage[];
  model?: string;
  temperature?: number;
  maxTokens?: number;
  tools?: LLMFunctionTool[];
  toolChoice?: LLMToolChoice;
  /** Per-call timeout; falls back to the client default. */
  timeoutMs?: number;
}

/** One function call selected by the model. Arguments are untrusted. */
export interface LLMToolCall {
  name: string;
  args: unknown;
}

export interface LLMResponse {
  content: string;
  /** Empty when the model answered in free text. */
  toolCalls: LLMToolCall[];
  model: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

export interface LLMClient {
  /** Model used when a request does not name one. */
  readonly defaultModel: string;
  /** Resolve with the model output, or reject with an `AppError` on transport failure or timeout. */
  chat(request: LLMRequest): Promise<LLMResponse>;
}

/** Outcome of a model call with transport failures folded into a value. */
export type LLMOutcome = { ok: true; response: LLMResponse } | { ok: false; error: AppError };
