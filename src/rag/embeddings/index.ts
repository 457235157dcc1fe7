// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Embedding Provider Factory
 *
 * Selects the embedding provider from configuration.
 */

import { BaseEmbeddingProvider } from './base.js';
import { OpenAIEmbeddingProvider } from './openai.js';
import { OllamaEmbeddingProvider } from './ollama.js';
import type { RAGConfig } from '../types.js';

export { BaseEmbeddingProvider } from './base.js';
export { OpenAIEmbeddingProvider } from './openai.js';
export { OllamaEmbeddingProvider } from './ollama.js';

/**
 * Create an embedding provider based on configuration.
 * `auto` prefers OpenAI when OPENAI_API_KEY is set, otherwise local Ollama.
 */
export function createEmbeddingProvider(
  config: Pick<RAGConfig, 'embeddingProvider' | 'openaiModel' | 'ollamaModel' | 'ollamaBaseUrl'>
): BaseEmbeddingProvider {
  const provider = config.embeddingProvider;

  if (provider === 'openai') {
    return new OpenAIEmbeddingProvider(config.openaiModel);
  }

  if (provider === 'ollama') {
    return new OllamaEmbeddingProvider(config.ollamaModel, config.ollamaBaseUrl);
  }

  if (process.env.OPENAI_API_KEY) {
    return new OpenAIEmbeddingProvider(config.openaiModel);
  }
  return new OllamaEmbeddingProvider(config.ollamaModel, config.ollamaBaseUrl);
}
