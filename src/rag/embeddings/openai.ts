// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * OpenAI Embedding Provider
 *
 * Uses OpenAI's text-embedding models for generating embeddings.
 */

import OpenAI from 'openai';
import { BaseEmbeddingProvider } from './base.js';
import { RAG_DEFAULTS } from '../../constants.js';

/**
 * Model dimensions for OpenAI embedding models.
 */
const MODEL_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

/**
 * OpenAI embedding provider implementation.
 */
export class OpenAIEmbeddingProvider extends BaseEmbeddingProvider {
  private client: OpenAI;
  private model: string;
  private hasKey: boolean;

  constructor(model: string = RAG_DEFAULTS.OPENAI_EMBEDDING_MODEL, apiKey?: string) {
    super();
    const key = apiKey ?? process.env.OPENAI_API_KEY;
    this.hasKey = Boolean(key);
    // The SDK throws on a missing key; defer that to the first request
    this.client = new OpenAI({ apiKey: key ?? 'missing' });
    this.model = model;
  }

  getName(): string {
    return 'OpenAI';
  }

  getModel(): string {
    return this.model;
  }

  getDimensions(): number {
    return MODEL_DIMENSIONS[this.model] || 1536;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    // OpenAI has a limit on batch size, process in chunks if needed
    const batchSize = 100;
    const allEmbeddings: number[][] = [];

    for (let i = 0; i < texts.length; i += batchSize) {
      const batch = texts.slice(i, i + batchSize);

      const response = await this.client.embeddings.create({
        model: this.model,
        input: batch,
      });

      // Sort by index to maintain order
      const sorted = [...response.data].sort((a, b) => a.index - b.index);
      allEmbeddings.push(...sorted.map((d) => d.embedding));
    }

    return allEmbeddings;
  }

  async isAvailable(): Promise<boolean> {
    return this.hasKey;
  }
}
