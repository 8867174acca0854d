import { config } from '../../shared/config/env';
import { LLMClient } from './llm-types';
import { OpenAIClient } from './openai-client';

let instance: LLMClient | null = null;

export function getLLMClient(): LLMClient {
  if (!instance) {
    instance = new OpenAIClient({
      baseUrl: config.OPENAI_BASE_URL,
      apiKey: config.OPENAI_API_KEY,
      model: config.OPENAI_MODEL,
      maxTokens: config.CHAT_MAX_OUTPUT_TOKENS,
      timeoutMs: config.LLM_TIMEOUT_MS,
    });
  }
  return instance;
}
