/**
 * LLM Module
 *
 * Unified LLM client and utilities for Anthropic and OpenAI.
 */

export * from './types';
export * from './client';
export * from './cache';
