// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { BaseProvider } from './base.js';
import { AnthropicProvider } from './anthropic.js';
import { OpenAICompatibleProvider, createOllamaProvider } from './openai-compatible.js';
import { MockProvider } from './mock.js';
import type { ProviderConfig } from '../types.js';
import { logger } from '../logger.js';

export { BaseProvider } from './base.js';
export { AnthropicProvider } from './anthropic.js';
export { OpenAICompatibleProvider, createOllamaProvider } from './openai-compatible.js';
export { MockProvider } from './mock.js';
export type { MockResponse, MockProviderConfig, MockCall } from './mock.js';
export { withRetry, isRetryableError } from './retry.js';
export type { RetryOptions } from './retry.js';

export interface CreateProviderOptions extends ProviderConfig {
  /** Provider type, or 'auto' to detect from the environment */
  type: string;
}

/** Provider factory function type */
export type ProviderFactory = (options: CreateProviderOptions) => BaseProvider;

/** Registry of provider factories */
const providerFactories = new Map<string, ProviderFactory>();

// Register built-in providers
providerFactories.set('anthropic', (options) => new AnthropicProvider(options));
providerFactories.set('openai', (options) => new OpenAICompatibleProvider(options));
providerFactories.set('ollama', (options) => createOllamaProvider(options.model, options.baseUrl));
providerFactories.set('mock', (options) => new MockProvider({
  model: options.model,
  responsesFile: process.env.COURSEMATE_MOCK_FILE,
}));

/**
 * Get list of registered provider types.
 */
export function getProviderTypes(): string[] {
  return Array.from(providerFactories.keys());
}

/**
 * Factory function to create a provider based on type.
 */
export function createProvider(options: CreateProviderOptions): BaseProvider {
  if (options.type === 'auto') {
    return detectProvider(options);
  }

  const factory = providerFactories.get(options.type);
  if (!factory) {
    const available = getProviderTypes().join(', ');
    throw new Error(`Unknown provider type: ${options.type}. Available: ${available}`);
  }

  return factory(options);
}

/**
 * Detect the best available provider based on environment.
 */
export function detectProvider(config: ProviderConfig = {}): BaseProvider {
  if (process.env.ANTHROPIC_API_KEY) {
    logger.verbose('Using Anthropic provider (found ANTHROPIC_API_KEY)');
    return new AnthropicProvider(config);
  }

  if (process.env.OPENAI_API_KEY) {
    logger.verbose('Using OpenAI provider (found OPENAI_API_KEY)');
    return new OpenAICompatibleProvider(config);
  }

  // Default to Ollama for local usage
  logger.verbose('Using Ollama provider (no API keys found, assuming local)');
  return createOllamaProvider(config.model, config.baseUrl);
}
