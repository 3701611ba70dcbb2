/**
 * Tests for the shared LLM client, cache and JSON reply parsing
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import {
  LLMClient,
  ResponseCache,
  DEFAULT_LLM_CONFIG,
  isRetryable,
  parseJsonResponse,
  createLLMClientFromEnv,
  type CacheKey
} from '../../shared/llm';

const RESPONSE = { content: 'Hi there!', model: 'test-model' };

const KEY: CacheKey = {
  model: 'test-model',
  temperature: 0,
  maxTokens: 100,
  systemPrompt: 'System',
  userPrompt: 'Hello'
};

describe('ResponseCache', () => {
  let clock: number;
  let cache: ResponseCache;

  beforeEach(() => {
    clock = 1_000_000;
    cache = new ResponseCache({ enabled: true, ttlSeconds: 60, maxEntries: 3 }, () => clock);
  });

  it('should cache and retrieve responses', () => {
    expect(cache.get(KEY)).toBeNull();
    cache.set(KEY, RESPONSE);
    expect(cache.get({ ...KEY })).toEqual(RESPONSE);
  });

  it('should key on every request parameter', () => {
    cache.set(KEY, RESPONSE);
    expect(cache.get({ ...KEY, maxTokens: 200 })).toBeNull();
    expect(cache.get({ ...KEY, userPrompt: 'Goodbye' })).toBeNull();
    expect(cache.get({ ...KEY, temperature: 0.5 })).toBeNull();
    expect(cache.get({ ...KEY, systemPrompt: '' })).toBeNull();
    expect(cache.get({ ...KEY, model: 'other-model' })).toBeNull();
  });

  it('should expire entries after the TTL', () => {
    cache.set(KEY, RESPONSE);
    clock += 60_000;
    expect(cache.get(KEY)).toEqual(RESPONSE);
    clock += 1;
    expect(cache.get(KEY)).toBeNull();
    expect(cache.getStats().size).toBe(0);
  });

  it('should evict the oldest entry when full', () => {
    for (let i = 0; i < 4; i++) {
      cache.set({ ...KEY, userPrompt: `prompt-${i}` }, { content: `response-${i}`, model: 'test-model' });
    }

    expect(cache.get({ ...KEY, userPrompt: 'prompt-0' })).toBeNull();
    expect(cache.get({ ...KEY, userPrompt: 'prompt-3' })?.content).toBe('response-3');
    expect(cache.getStats()).toEqual({ size: 3, maxEntries: 3, enabled: true });
  });

  it('should store nothing when disabled', () => {
    const disabled = new ResponseCache({ enabled: false });
    disabled.set(KEY, RESPONSE);
    expect(disabled.get(KEY)).toBeNull();
    expect(disabled.getStats().size).toBe(0);
  });
});

describe('isRetryable', () => {
  it('should retry rate limits and server errors', () => {
    expect(isRetryable(new Anthropic.APIError(429, undefined, 'rate limited', undefined))).toBe(true);
    expect(isRetryable(new OpenAI.APIError(503, undefined, 'unavailable', undefined))).toBe(true);
  });

  it('should not retry other client errors', () => {
    expect(isRetryable(new Anthropic.APIError(401, undefined, 'unauthorized', undefined))).toBe(false);
    expect(isRetryable(new OpenAI.APIError(400, undefined, 'bad request', undefined))).toBe(false);
  });

  it('should retry errors that did not come from an API response', () => {
    expect(isRetryable(new Error('socket hang up'))).toBe(true);
  });
});

describe('LLM Client', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('should merge a partial configuration with provider defaults', () => {
    const client = new LLMClient({ apiKey: 'test-secret', provider: 'openai', temperature: 0.3 });
    expect(client.getConfig()).toEqual({
      ...DEFAULT_LLM_CONFIG.openai,
      apiKey: 'test-secret',
      temperature: 0.3
    });
  });

  it('should take the provider from the environment', () => {
    process.env.LLM_PROVIDER = 'openai';
    expect(new LLMClient({ apiKey: 'test-secret' }).getConfig().provider).toBe('openai');
    delete process.env.LLM_PROVIDER;
    expect(new LLMClient({ apiKey: 'test-secret' }).getConfig().provider).toBe('anthropic');
  });

  it('should reject a request without a user message', async () => {
    const client = new LLMClient({ apiKey: 'test-secret', provider: 'anthropic' });
    await expect(
      client.complete({ messages: [{ role: 'assistant', content: 'hello' }] })
    ).rejects.toThrow('Request must include at least one user message');
  });

  it('should expose cache statistics', () => {
    const client = new LLMClient({ apiKey: 'test-secret', provider: 'anthropic' }, { maxEntries: 50 });
    expect(client.getCacheStats()).toEqual({ size: 0, maxEntries: 50, enabled: true });
  });

  describe('createLLMClientFromEnv', () => {
    it('should return null without an API key', () => {
      delete process.env.LLM_PROVIDER;
      delete process.env.ANTHROPIC_API_KEY;
      expect(createLLMClientFromEnv()).toBeNull();
    });

    it('should use the key and model of the selected provider', () => {
      process.env.LLM_PROVIDER = 'openai';
      process.env.OPENAI_API_KEY = 'test-secret';
      process.env.LLM_MODEL = 'test-model';

      const client = createLLMClientFromEnv();
      expect(client?.getConfig().provider).toBe('openai');
      expect(client?.getConfig().model).toBe('test-model');
    });
  });
});

describe('parseJsonResponse', () => {
  it('should parse clean JSON', () => {
    expect(parseJsonResponse('{"key": "value"}')).toEqual({ key: 'value' });
  });

  it('should strip markdown fences', () => {
    expect(parseJsonResponse('```json\n{"key": "value"}\n```')).toEqual({ key: 'value' });
  });

  it('should extract JSON from surrounding prose', () => {
    expect(parseJsonResponse('Here is the result: {"key": "value"} and more')).toEqual({ key: 'value' });
  });

  it('should repair minor syntax damage', () => {
    expect(parseJsonResponse("{additional_skills: ['Kafka', 'Spark'],}")).toEqual({
      additional_skills: ['Kafka', 'Spark']
    });
  });

  it('should parse arrays', () => {
    expect(parseJsonResponse('[1, 2, 3]')).toEqual([1, 2, 3]);
  });
});
