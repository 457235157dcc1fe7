// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Types
 *
 * Schema for configuration files and the resolved configuration.
 */

import { z } from 'zod';

/**
 * Configuration file contents.
 * Can be defined in .coursemate.json or coursemate.config.json in the
 * working directory, or globally in ~/.coursemate/config.json.
 */
export const WorkspaceConfigSchema = z.object({
  /** Provider to use (anthropic, openai, ollama, mock, auto) */
  provider: z.string().optional(),
  /** Model name to use */
  model: z.string().optional(),
  /** Custom base URL for the model API */
  baseUrl: z.string().optional(),

  embeddingProvider: z.enum(['openai', 'ollama', 'auto']).optional(),
  openaiEmbeddingModel: z.string().optional(),
  ollamaEmbeddingModel: z.string().optional(),
  ollamaBaseUrl: z.string().optional(),

  chunkSize: z.number().optional(),
  chunkOverlap: z.number().optional(),
  maxResults: z.number().optional(),
  /** Exchanges remembered per session */
  maxHistory: z.number().optional(),
  /** Tools-enabled model calls per query */
  maxToolRounds: z.number().optional(),
  modelTimeoutMs: z.number().optional(),
  toolTimeoutMs: z.number().optional(),
  /** Retries of a transient model failure */
  modelMaxRetries: z.number().optional(),
  /** Delay before the first retry; doubles after that */
  modelRetryDelayMs: z.number().optional(),

  /** Folder of course documents for `coursemate index` */
  docsPath: z.string().optional(),
  /** Directory holding the vector index */
  indexPath: z.string().optional(),
  /** Cosine distance beyond which a course name matches nothing */
  courseMatchMaxDistance: z.number().optional(),
});

export type WorkspaceConfig = z.infer<typeof WorkspaceConfigSchema>;

/**
 * Resolved configuration with all defaults applied.
 */
export interface ResolvedConfig {
  provider: string;
  model?: string;
  baseUrl?: string;

  embeddingProvider: 'openai' | 'ollama' | 'auto';
  openaiEmbeddingModel: string;
  ollamaEmbeddingModel: string;
  ollamaBaseUrl: string;

  chunkSize: number;
  chunkOverlap: number;
  maxResults: number;
  maxHistory: number;
  maxToolRounds: number;
  modelTimeoutMs: number;
  toolTimeoutMs: number;
  modelMaxRetries: number;
  modelRetryDelayMs: number;

  docsPath: string;
  indexPath: string;
  courseMatchMaxDistance?: number;
}
