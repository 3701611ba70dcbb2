/**
 * LLM Types
 *
 * Request, response and configuration shapes shared by the Anthropic and
 * OpenAI back ends.
 */

export type LLMProvider = 'anthropic' | 'openai';

export interface LLMConfig {
  provider: LLMProvider;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  /** Per-request SDK timeout in milliseconds */
  timeout: number;
}

/**
 * Defaults per provider. Enhancement replies are short, so the token
 * ceiling stays low.
 */
export const DEFAULT_LLM_CONFIG: Record<LLMProvider, Omit<LLMConfig, 'apiKey'>> = {
  anthropic: {
    provider: 'anthropic',
    model: 'claude-sonnet-4-20250514',
    temperature: 0,
    maxTokens: 1024,
    timeout: 30000
  },
  openai: {
    provider: 'openai',
    model: 'gpt-4o',
    temperature: 0,
    maxTokens: 1024,
    timeout: 30000
  }
};

/** The system prompt travels separately in LLMRequest.systemPrompt */
export interface LLMMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface LLMRequest {
  messages: readonly LLMMessage[];
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  /** Overrides the configured model for this request */
  model?: string;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: TokenUsage;
  finishReason?: string;
}

/**
 * Anything that can answer an LLMRequest. LLMClient implements it; tests
 * substitute in-process stubs.
 */
export interface CompletionClient {
  complete(request: LLMRequest): Promise<LLMResponse>;
}

/**
 * How often a failed call is attempted and how long to wait in between.
 * The last backoff value repeats when attempts outnumber it.
 */
export interface RetryPolicy {
  maxAttempts: number;
  backoffMs: readonly number[];
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffMs: [1000, 2000, 4000]
};
