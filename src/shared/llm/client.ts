/**
 * LLM Client
 *
 * One CompletionClient over the Anthropic and OpenAI SDKs, with a response
 * cache, retries on transient failures and tolerant JSON parsing of replies.
 */

import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { jsonrepair } from 'jsonrepair';
import { loggers } from '../logger';
import {
  DEFAULT_LLM_CONFIG,
  DEFAULT_RETRY_POLICY,
  type CompletionClient,
  type LLMConfig,
  type LLMProvider,
  type LLMRequest,
  type LLMResponse,
  type RetryPolicy
} from './types';
import { ResponseCache, type CacheKey, type CacheOptions } from './cache';

type Backend = (request: LLMRequest, key: CacheKey) => Promise<LLMResponse>;

/**
 * Rate limits, timeouts, conflicts and server errors are worth another try;
 * other 4xx replies are not.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof Anthropic.APIError || error instanceof OpenAI.APIError) {
    const { status } = error;
    return status === undefined || status === 408 || status === 409 || status === 429 || status >= 500;
  }
  return true;
}

export class LLMClient implements CompletionClient {
  private readonly config: LLMConfig;
  private readonly cache: ResponseCache;
  private readonly retry: RetryPolicy;
  private readonly backend: Backend;

  constructor(
    config: Partial<LLMConfig> & { apiKey: string },
    cacheOptions: Partial<CacheOptions> = {},
    retry: Partial<RetryPolicy> = {}
  ) {
    const provider = config.provider ?? parseProvider(process.env.LLM_PROVIDER);
    this.config = { ...DEFAULT_LLM_CONFIG[provider], ...config, provider };
    this.cache = new ResponseCache(cacheOptions);
    this.retry = { ...DEFAULT_RETRY_POLICY, ...retry };
    this.backend = provider === 'anthropic'
      ? anthropicBackend(new Anthropic({ apiKey: this.config.apiKey, timeout: this.config.timeout }))
      : openaiBackend(new OpenAI({ apiKey: this.config.apiKey, timeout: this.config.timeout }));
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const userMessage = request.messages.find(m => m.role === 'user');
    if (!userMessage) {
      throw new Error('Request must include at least one user message');
    }

    const key: CacheKey = {
      model: request.model ?? this.config.model,
      temperature: request.temperature ?? this.config.temperature,
      maxTokens: request.maxTokens ?? this.config.maxTokens,
      systemPrompt: request.systemPrompt ?? '',
      userPrompt: userMessage.content
    };

    const cached = this.cache.get(key);
    if (cached) {
      loggers.llm.debug({ model: key.model }, 'cache hit');
      return cached;
    }

    const start = Date.now();
    loggers.llm.debug(
      { provider: this.config.provider, model: key.model, temperature: key.temperature, maxTokens: key.maxTokens },
      'request start'
    );

    const response = await this.withRetries(() => this.backend(request, key));

    loggers.llm.debug(
      { model: response.model, finishReason: response.finishReason, elapsedMs: Date.now() - start, usage: response.usage },
      'request end'
    );
    this.cache.set(key, response);
    return response;
  }

  private async withRetries<T>(call: () => Promise<T>): Promise<T> {
    const { maxAttempts, backoffMs } = this.retry;
    for (let attempt = 1; ; attempt++) {
      try {
        return await call();
      } catch (error) {
        if (attempt >= maxAttempts || !isRetryable(error)) {
          throw error;
        }
        const delay = backoffMs[Math.min(attempt - 1, backoffMs.length - 1)] ?? 0;
        loggers.llm.warn({ attempt, delay, err: error }, 'request failed, retrying');
        await new Promise(resolve => setTimeout(resolve, delay));
      }
    }
  }

  clearCache(): void {
    this.cache.clear();
  }

  getCacheStats(): { size: number; maxEntries: number; enabled: boolean } {
    return this.cache.getStats();
  }

  getConfig(): LLMConfig {
    return { ...this.config };
  }
}

function anthropicBackend(sdk: Anthropic): Backend {
  return async (request, key) => {
    const response = await sdk.messages.create({
      model: key.model,
      max_tokens: key.maxTokens,
      temperature: key.temperature,
      system: key.systemPrompt,
      messages: request.messages.map(m => ({ role: m.role, content: m.content }))
    });

    const block = response.content[0];
    if (!block || block.type !== 'text') {
      throw new Error('Unexpected response type from Anthropic');
    }
    return {
      content: block.text,
      model: response.model,
      usage: { inputTokens: response.usage.input_tokens, outputTokens: response.usage.output_tokens },
      finishReason: response.stop_reason ?? undefined
    };
  };
}

function openaiBackend(sdk: OpenAI): Backend {
  return async (request, key) => {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = key.systemPrompt
      ? [{ role: 'system', content: key.systemPrompt }]
      : [];
    for (const message of request.messages) {
      messages.push(
        message.role === 'assistant'
          ? { role: 'assistant', content: message.content }
          : { role: 'user', content: message.content }
      );
    }

    const response = await sdk.chat.completions.create({
      model: key.model,
      messages,
      temperature: key.temperature,
      max_tokens: key.maxTokens
    });

    const choice = response.choices[0];
    if (!choice?.message.content) {
      throw new Error('No content in OpenAI response');
    }
    return {
      content: choice.message.content,
      model: response.model,
      usage: response.usage
        ? { inputTokens: response.usage.prompt_tokens, outputTokens: response.usage.completion_tokens }
        : undefined,
      finishReason: choice.finish_reason ?? undefined
    };
  };
}

/**
 * Parse a JSON reply, tolerating markdown fences, surrounding prose and
 * minor syntax damage.
 *
 * @throws Error when nothing JSON-like can be recovered
 */
export function parseJsonResponse(text: string): unknown {
  const unfenced = text
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '')
    .trim();

  const open = unfenced.indexOf('{');
  const close = unfenced.lastIndexOf('}');
  const candidates = open !== -1 && close > open
    ? [unfenced, unfenced.slice(open, close + 1)]
    : [unfenced];

  for (const candidate of candidates) {
    try {
      return JSON.parse(candidate);
    } catch {
      continue;
    }
  }

  const last = candidates[candidates.length - 1];
  try {
    return JSON.parse(jsonrepair(last));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse LLM response as JSON: ${reason}. Response preview: ${text.slice(0, 200)}`);
  }
}

function parseProvider(value: string | undefined): LLMProvider {
  return value === 'openai' ? 'openai' : 'anthropic';
}

/**
 * Client for the provider named by LLM_PROVIDER, or null when that
 * provider's API key is unset
 */
export function createLLMClientFromEnv(
  cacheOptions?: Partial<CacheOptions>,
  retry?: Partial<RetryPolicy>
): LLMClient | null {
  const provider = parseProvider(process.env.LLM_PROVIDER);
  const keyVariable = provider === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'OPENAI_API_KEY';
  const apiKey = process.env[keyVariable];

  if (!apiKey) {
    loggers.llm.warn({ provider }, `No API key found. Set ${keyVariable} to enable enhancement.`);
    return null;
  }

  return new LLMClient(
    { provider, apiKey, model: process.env.LLM_MODEL || DEFAULT_LLM_CONFIG[provider].model },
    cacheOptions,
    retry
  );
}
