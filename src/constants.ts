// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Centralized constants for coursemate.
 */

/**
 * Chunking and retrieval defaults.
 */
export const RAG_DEFAULTS = {
  /** Maximum characters per content chunk */
  CHUNK_SIZE: 800,
  /** Characters carried over from the previous chunk */
  CHUNK_OVERLAP: 100,
  /** Maximum search results returned to the model */
  MAX_RESULTS: 5,
  OPENAI_EMBEDDING_MODEL: 'text-embedding-3-small',
  OLLAMA_EMBEDDING_MODEL: 'nomic-embed-text',
  OLLAMA_BASE_URL: 'http://localhost:11434',
} as const;

/**
 * Query loop configuration.
 */
export const AGENT_CONFIG = {
  /** Tools-enabled model calls per query before the forced final call */
  MAX_TOOL_ROUNDS: 2,
  /** Exchanges remembered per session */
  MAX_HISTORY: 2,
  MODEL_TIMEOUT_MS: 60000,
  TOOL_TIMEOUT_MS: 15000,
  /** Retries of a transient model failure within one call */
  MODEL_MAX_RETRIES: 2,
  MODEL_RETRY_DELAY_MS: 1000,
  /** Output token cap for each model call */
  MAX_OUTPUT_TOKENS: 800,
  TEMPERATURE: 0,
} as const;

/**
 * Default models per provider.
 */
export const DEFAULT_MODELS = {
  anthropic: 'claude-sonnet-4-20250514',
  openai: 'gpt-4o-mini',
  ollama: 'llama3.1',
} as const;

/**
 * Course document file extensions picked up by the indexer.
 */
export const COURSE_FILE_EXTENSIONS = ['.txt', '.md'] as const;

/**
 * Answer used when the forced final call returns no text.
 */
export const EMPTY_ANSWER_FALLBACK =
  'I was unable to produce an answer from the course materials for this question.';
