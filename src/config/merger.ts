// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Merger
 *
 * Functions for merging configuration from multiple sources.
 * Priority: CLI options > workspace config > global config > defaults
 */

import { AGENT_CONFIG, RAG_DEFAULTS } from '../constants.js';
import { CourseMatePaths } from '../paths.js';
import type { WorkspaceConfig, ResolvedConfig } from './types.js';
import {
  POSITIVE_INT_FIELDS,
  NON_NEGATIVE_INT_FIELDS,
  isPositiveInt,
  isNonNegativeInt,
} from './validator.js';

/**
 * Default configuration values. The index path follows COURSEMATE_HOME,
 * so defaults are computed per call.
 */
export function getDefaultConfig(): ResolvedConfig {
  return {
    provider: 'auto',
    embeddingProvider: 'auto',
    openaiEmbeddingModel: RAG_DEFAULTS.OPENAI_EMBEDDING_MODEL,
    ollamaEmbeddingModel: RAG_DEFAULTS.OLLAMA_EMBEDDING_MODEL,
    ollamaBaseUrl: RAG_DEFAULTS.OLLAMA_BASE_URL,
    chunkSize: RAG_DEFAULTS.CHUNK_SIZE,
    chunkOverlap: RAG_DEFAULTS.CHUNK_OVERLAP,
    maxResults: RAG_DEFAULTS.MAX_RESULTS,
    maxHistory: AGENT_CONFIG.MAX_HISTORY,
    maxToolRounds: AGENT_CONFIG.MAX_TOOL_ROUNDS,
    modelTimeoutMs: AGENT_CONFIG.MODEL_TIMEOUT_MS,
    toolTimeoutMs: AGENT_CONFIG.TOOL_TIMEOUT_MS,
    modelMaxRetries: AGENT_CONFIG.MODEL_MAX_RETRIES,
    modelRetryDelayMs: AGENT_CONFIG.MODEL_RETRY_DELAY_MS,
    docsPath: './docs',
    indexPath: CourseMatePaths.index(),
  };
}

/**
 * CLI options that can override configuration.
 */
export interface CLIOptions {
  provider?: string;
  model?: string;
  baseUrl?: string;
  indexPath?: string;
}

/**
 * Apply a config file layer to the resolved config.
 * Numeric values that fail validation are skipped.
 */
function applyWorkspaceConfig(config: ResolvedConfig, source: WorkspaceConfig): void {
  if (source.provider) config.provider = source.provider;
  if (source.model) config.model = source.model;
  if (source.baseUrl) config.baseUrl = source.baseUrl;
  if (source.embeddingProvider) config.embeddingProvider = source.embeddingProvider;
  if (source.openaiEmbeddingModel) config.openaiEmbeddingModel = source.openaiEmbeddingModel;
  if (source.ollamaEmbeddingModel) config.ollamaEmbeddingModel = source.ollamaEmbeddingModel;
  if (source.ollamaBaseUrl) config.ollamaBaseUrl = source.ollamaBaseUrl;
  if (source.docsPath) config.docsPath = source.docsPath;
  if (source.indexPath) config.indexPath = source.indexPath;

  for (const field of POSITIVE_INT_FIELDS) {
    const value = source[field];
    if (value !== undefined && isPositiveInt(value)) config[field] = value;
  }
  for (const field of NON_NEGATIVE_INT_FIELDS) {
    const value = source[field];
    if (value !== undefined && isNonNegativeInt(value)) config[field] = value;
  }

  const distance = source.courseMatchMaxDistance;
  if (distance !== undefined && Number.isFinite(distance) && distance >= 0 && distance <= 2) {
    config.courseMatchMaxDistance = distance;
  }
}

/**
 * Merge config files with CLI options.
 * Priority: CLI options > workspace config > global config
 */
export function mergeConfig(
  workspaceConfig: WorkspaceConfig | null,
  cliOptions: CLIOptions,
  globalConfig: WorkspaceConfig | null = null
): ResolvedConfig {
  const config = getDefaultConfig();

  // Global config (lowest priority, baseline for all projects)
  if (globalConfig) {
    applyWorkspaceConfig(config, globalConfig);
  }

  // Workspace config (overrides global)
  if (workspaceConfig) {
    applyWorkspaceConfig(config, workspaceConfig);
  }

  // CLI options override workspace config
  if (cliOptions.provider && cliOptions.provider !== 'auto') {
    config.provider = cliOptions.provider;
  }
  if (cliOptions.model) config.model = cliOptions.model;
  if (cliOptions.baseUrl) config.baseUrl = cliOptions.baseUrl;
  if (cliOptions.indexPath) config.indexPath = cliOptions.indexPath;

  return config;
}
