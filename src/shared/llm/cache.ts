/**
 * Response Cache
 *
 * In-process cache of LLM replies so an identical enhancement prompt is sent
 * once per process. Entries expire after a TTL; when full, the oldest entry
 * is dropped.
 */

import { createHash } from 'crypto';
import type { LLMResponse } from './types';

/**
 * Everything that can change a reply
 */
export interface CacheKey {
  model: string;
  temperature: number;
  maxTokens: number;
  systemPrompt: string;
  userPrompt: string;
}

export interface CacheOptions {
  enabled: boolean;
  ttlSeconds: number;
  maxEntries: number;
}

export const DEFAULT_CACHE_OPTIONS: CacheOptions = {
  enabled: true,
  ttlSeconds: 3600,
  maxEntries: 1000
};

interface CacheEntry {
  response: LLMResponse;
  storedAt: number;
}

export class ResponseCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly options: CacheOptions;
  private readonly now: () => number;

  constructor(options: Partial<CacheOptions> = {}, now: () => number = Date.now) {
    this.options = { ...DEFAULT_CACHE_OPTIONS, ...options };
    this.now = now;
  }

  static digest(key: CacheKey): string {
    return createHash('sha256')
      .update(JSON.stringify([key.model, key.temperature, key.maxTokens, key.systemPrompt, key.userPrompt]))
      .digest('hex');
  }

  get(key: CacheKey): LLMResponse | null {
    if (!this.options.enabled) {
      return null;
    }

    const digest = ResponseCache.digest(key);
    const entry = this.entries.get(digest);
    if (!entry) {
      return null;
    }

    if ((this.now() - entry.storedAt) / 1000 > this.options.ttlSeconds) {
      this.entries.delete(digest);
      return null;
    }
    return entry.response;
  }

  set(key: CacheKey, response: LLMResponse): void {
    if (!this.options.enabled) {
      return;
    }

    if (this.entries.size >= this.options.maxEntries) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }
    this.entries.set(ResponseCache.digest(key), { response, storedAt: this.now() });
  }

  clear(): void {
    this.entries.clear();
  }

  getStats(): { size: number; maxEntries: number; enabled: boolean } {
    return {
      size: this.entries.size,
      maxEntries: this.options.maxEntries,
      enabled: this.options.enabled
    };
  }
}
