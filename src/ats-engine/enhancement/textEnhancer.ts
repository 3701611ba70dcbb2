/**
 * Text Enhancement Collaborator
 *
 * The engine reaches a text-generation service only through TextEnhancer.
 * NoopTextEnhancer is the "AI absent" configuration; LLMTextEnhancer adapts
 * the shared Anthropic/OpenAI client. Every call goes through
 * requestEnhancement, which applies the timeout and turns any failure into
 * null so callers fall back to their deterministic path.
 */

import type { CompletionClient } from '../../shared/llm/types';
import { createLLMClientFromEnv } from '../../shared/llm/client';
import { getConfig } from '../config';
import { GracefulDegradation, withTimeout } from '../errors/gracefulDegradation';
import { ATSErrorFactory, isATSError } from '../errors/types';
import { toError } from '../../shared/errors';
import { ATSLogger } from '../logging/logger';

export interface TextEnhancer {
  /**
   * Generate text for a prompt. Resolves null when the service is unavailable.
   */
  generate(prompt: string, maxTokens: number): Promise<string | null>;
}

/**
 * Enhancer that never produces text
 */
export class NoopTextEnhancer implements TextEnhancer {
  async generate(): Promise<string | null> {
    return null;
  }
}

export interface LLMTextEnhancerOptions {
  systemPrompt?: string;
  temperature?: number;
}

const DEFAULT_SYSTEM_PROMPT =
  'You edit resumes and analyse job postings for applicant tracking systems. ' +
  'Never invent employers, dates, titles or responsibilities. ' +
  'Return only the requested text.';

/**
 * Enhancer backed by an LLM completion client
 */
export class LLMTextEnhancer implements TextEnhancer {
  private client: CompletionClient;
  private options: LLMTextEnhancerOptions;

  constructor(client: CompletionClient, options: LLMTextEnhancerOptions = {}) {
    this.client = client;
    this.options = options;
  }

  async generate(prompt: string, maxTokens: number): Promise<string | null> {
    const response = await this.client.complete({
      systemPrompt: this.options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
      messages: [{ role: 'user', content: prompt }],
      maxTokens,
      temperature: this.options.temperature
    });
    return response.content;
  }
}

export interface EnhancementRequest {
  /** Label used in logs and timeout errors */
  operation: string;
  maxTokens: number;
  timeoutMs: number;
}

/**
 * Call the enhancer once under a timeout. Errors, timeouts and empty replies
 * all resolve to null; nothing is retried.
 */
export async function requestEnhancement(
  enhancer: TextEnhancer,
  prompt: string,
  request: EnhancementRequest
): Promise<string | null> {
  let failed = false;
  const reply = await GracefulDegradation.withGracefulDegradation<string | null>(
    async () => {
      try {
        return await withTimeout(enhancer.generate(prompt, request.maxTokens), request.timeoutMs, request.operation);
      } catch (error) {
        throw isATSError(error) ? error : ATSErrorFactory.enhancementFailed(request.operation, toError(error).message);
      }
    },
    () => {
      failed = true;
      return null;
    },
    `enhancement:${request.operation}`
  );

  const text = reply?.trim() ?? '';
  if (!text) {
    ATSLogger.logEnhancement(request.operation, failed ? 'failed' : 'unavailable');
    return null;
  }
  return text;
}

/**
 * Build an enhancer from the environment: an LLM-backed one when enhancement
 * is enabled and an API key is configured, the no-op enhancer otherwise.
 */
export function createTextEnhancerFromEnv(
  enabled: boolean = getConfig().getEnhancementConfig().enabled
): TextEnhancer {
  if (!enabled) {
    return new NoopTextEnhancer();
  }

  // Single attempt; a failure falls back to the deterministic path
  const client = createLLMClientFromEnv(undefined, { maxAttempts: 1 });
  return client ? new LLMTextEnhancer(client) : new NoopTextEnhancer();
}
