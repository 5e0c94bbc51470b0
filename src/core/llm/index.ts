import { config } from '../../shared/config/env';
import { toErrorWithCode } from '../../shared/errors/app-error';
import { ChatCompletionsClient } from './chat-completions-client';
import { LLMClient, LLMOutcome, LLMRequest } from './llm-types';

export interface LLMClientOptions {
  chatModel?: string;
}

export function createLLMClient(opts?: LLMClientOptions): LLMClient {
  return new ChatCompletionsClient({
    baseUrl: config.LLM_BASE_URL,
    apiKey: config.LLM_API_KEY,
    model: opts?.chatModel ?? config.CHAT_MODEL,
    timeoutMs: config.LLM_TIMEOUT_MS,
    temperature: config.LLM_TEMPERATURE,
  });
}

/**
 * Call the model and fold any rejection into an `{ ok: false }` outcome.
 *
 * Callers branch on the outcome instead of catching, so "the model answered without a
 * function call" and "the call never completed" stay distinguishable.
 */
export async function tryChat(client: LLMClient, request: LLMRequest): Promise<LLMOutcome> {
  try {
    const response = await client.chat(request);
    return { ok: true, response };
  } catch (error) {
    return { ok: false, error: toErrorWithCode(error, 'EXTERNAL_CALL_FAILED') };
  }
}
