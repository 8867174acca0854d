import { z } from 'zod';
import { AppError } from '../../shared/errors/app-error';
import { logger } from '../../shared/logging/logger';
import { LLMClient, LLMRequest, LLMResponse } from './llm-types';

export interface OpenAIClientConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
}

interface ChatCompletionPayload {
  model: string;
  messages: LLMRequest['messages'];
  max_tokens: number;
}

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

function normalizeBaseUrl(rawBaseUrl: string): string {
  const trimmed = rawBaseUrl.trim().replace(/\/$/, '').replace(/\/chat\/completions$/, '');
  const parsed = new URL(trimmed);
  return parsed.toString().replace(/\/$/, '');
}

/**
 * Client for OpenAI-compatible `/chat/completions` endpoints.
 *
 * One attempt per call. The deadline covers the whole exchange, body included: when it
 * passes, the request is aborted and the call rejects with `TIMEOUT`. HTTP errors and
 * malformed bodies reject with `EXTERNAL_CALL_FAILED`.
 */
export class OpenAIClient implements LLMClient {
  private readonly config: OpenAIClientConfig;

  constructor(config: OpenAIClientConfig) {
    if (!Number.isInteger(config.timeoutMs) || config.timeoutMs < 1) {
      throw new RangeError('timeoutMs must be a positive integer');
    }
    this.config = { ...config, baseUrl: normalizeBaseUrl(config.baseUrl) };
  }

  async chat(request: LLMRequest): Promise<LLMResponse> {
    const { model, timeoutMs } = this.config;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new AppError('TIMEOUT', `Chat completion timed out after ${timeoutMs}ms`, undefined, {
          model,
        });
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    });

    try {
      return await Promise.race([this.exchange(request, controller.signal), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async exchange(request: LLMRequest, signal: AbortSignal): Promise<LLMResponse> {
    const { baseUrl, apiKey, model, maxTokens } = this.config;
    const url = `${baseUrl}/chat/completions`;

    const payload: ChatCompletionPayload = {
      model,
      messages: request.messages,
      max_tokens: maxTokens,
    };

    logger.debug({ url, model, messageCount: payload.messages.length }, '[OpenAI] Request');

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify(payload),
        signal,
      });
    } catch (error) {
      throw new AppError('EXTERNAL_CALL_FAILED', 'Chat completion request failed', error, { model });
    }

    if (!response.ok) {
      const text = await response.text();
      throw new AppError(
        'EXTERNAL_CALL_FAILED',
        `OpenAI API error: ${response.status} ${response.statusText} - ${text.slice(0, 200)}`,
        undefined,
        { model, status: response.status },
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new AppError('EXTERNAL_CALL_FAILED', 'Chat completion returned invalid JSON', error, { model });
    }

    const parsed = chatCompletionSchema.safeParse(body);
    if (!parsed.success) {
      throw new AppError('EXTERNAL_CALL_FAILED', 'Chat completion response was malformed', parsed.error, {
        model,
      });
    }

    const usage = parsed.data.usage;
    logger.debug({ usage }, '[OpenAI] Success');

    return {
      content: parsed.data.choices[0].message.content ?? '',
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
