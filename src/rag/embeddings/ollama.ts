// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Ollama Embedding Provider
 *
 * Uses Ollama's local embedding models for generating embeddings.
 */

import { z } from 'zod';
import { BaseEmbeddingProvider } from './base.js';
import { RAG_DEFAULTS } from '../../constants.js';
import { logger } from '../../logger.js';

/**
 * Model dimensions for common Ollama embedding models.
 */
const MODEL_DIMENSIONS: Record<string, number> = {
  'nomic-embed-text': 768,
  'mxbai-embed-large': 1024,
  'all-minilm': 384,
  'snowflake-arctic-embed': 1024,
};

const EmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()),
});

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

/**
 * Ollama embedding provider implementation.
 */
export class OllamaEmbeddingProvider extends BaseEmbeddingProvider {
  private baseUrl: string;
  private model: string;
  private dimensions: number | null = null;

  constructor(
    model: string = RAG_DEFAULTS.OLLAMA_EMBEDDING_MODEL,
    baseUrl: string = RAG_DEFAULTS.OLLAMA_BASE_URL
  ) {
    super();
    this.model = model;
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  getName(): string {
    return 'Ollama';
  }

  getModel(): string {
    return this.model;
  }

  getDimensions(): number {
    if (this.dimensions !== null) {
      return this.dimensions;
    }
    return MODEL_DIMENSIONS[this.model] || 768;
  }

  /**
   * Embed a single text and return its embedding.
   */
  private async embedSingle(text: string): Promise<number[]> {
    const response = await fetch(`${this.baseUrl}/api/embeddings`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.model,
        prompt: text,
      }),
    });

    if (!response.ok) {
      throw new Error(
        `Ollama embedding request failed: ${response.status} ${response.statusText}`
      );
    }

    const data = EmbeddingResponseSchema.parse(await response.json());

    // Cache the dimensions from the first successful response
    if (this.dimensions === null) {
      this.dimensions = data.embedding.length;
    }

    return data.embedding;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    // /api/embeddings takes one prompt per request; bound the parallelism
    const BATCH_SIZE = 5;
    const embeddings: number[][] = [];

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);
      const batchResults = await Promise.all(
        batch.map((text) => this.embedSingle(text))
      );
      embeddings.push(...batchResults);
    }

    return embeddings;
  }

  async isAvailable(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, {
        method: 'GET',
      });
      if (!response.ok) {
        return false;
      }

      const data = TagsResponseSchema.parse(await response.json());
      return data.models.some(
        (m) => m.name === this.model || m.name.startsWith(`${this.model}:`)
      );
    } catch (error) {
      logger.debug(`Ollama not reachable at ${this.baseUrl}: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }
}
