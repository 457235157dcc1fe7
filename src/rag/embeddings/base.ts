// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Base Embedding Provider
 *
 * Abstract class that all embedding providers must implement.
 * The same provider embeds catalog titles, content chunks and queries.
 */

import { createHash } from 'crypto';

/**
 * Simple hash function for cache keys.
 */
function hashText(text: string): string {
  return createHash('sha256').update(text).digest('hex').slice(0, 16);
}

/**
 * Embedding cache entry with TTL.
 */
interface EmbeddingCacheEntry {
  embedding: number[];
  timestamp: number;
}

/**
 * In-memory LRU cache for embeddings with TTL.
 */
class EmbeddingCache {
  private cache = new Map<string, EmbeddingCacheEntry>();
  private maxSize: number;
  private ttlMs: number;

  constructor(maxSize = 1000, ttlMinutes = 60) {
    this.maxSize = maxSize;
    this.ttlMs = ttlMinutes * 60 * 1000;
  }

  get(key: string): number[] | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;

    if (Date.now() - entry.timestamp > this.ttlMs) {
      this.cache.delete(key);
      return undefined;
    }

    // Move to end for LRU (delete and re-add)
    this.cache.delete(key);
    this.cache.set(key, entry);
    return entry.embedding;
  }

  set(key: string, embedding: number[]): void {
    while (this.cache.size >= this.maxSize) {
      const firstKey = this.cache.keys().next().value;
      if (firstKey === undefined) break;
      this.cache.delete(firstKey);
    }

    this.cache.set(key, {
      embedding,
      timestamp: Date.now(),
    });
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}

// Shared cache instance across all providers
const embeddingCache = new EmbeddingCache();

/**
 * Abstract base class for embedding providers.
 */
export abstract class BaseEmbeddingProvider {
  /**
   * Get the provider name (e.g., "OpenAI", "Ollama").
   */
  abstract getName(): string;

  abstract getModel(): string;

  abstract getDimensions(): number;

  /**
   * Generate embeddings for multiple texts, in input order.
   */
  abstract embed(texts: string[]): Promise<number[][]>;

  /**
   * Check if the provider is available and properly configured.
   */
  abstract isAvailable(): Promise<boolean>;

  private cacheKey(text: string): string {
    return `${this.getName()}:${this.getModel()}:${hashText(text)}`;
  }

  /**
   * Generate embedding for a single text with caching.
   */
  async embedOne(text: string): Promise<number[]> {
    const cacheKey = this.cacheKey(text);
    const cached = embeddingCache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const [embedding] = await this.embed([text]);
    if (!embedding) {
      throw new Error(`${this.getName()} returned no embedding`);
    }
    embeddingCache.set(cacheKey, embedding);
    return embedding;
  }

  /**
   * Generate embeddings for multiple texts with caching.
   */
  async embedWithCache(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const results = new Map<number, number[]>();
    const uncachedIndices: number[] = [];
    const uncachedTexts: string[] = [];

    for (let i = 0; i < texts.length; i++) {
      const cached = embeddingCache.get(this.cacheKey(texts[i]));
      if (cached) {
        results.set(i, cached);
      } else {
        uncachedIndices.push(i);
        uncachedTexts.push(texts[i]);
      }
    }

    if (uncachedTexts.length > 0) {
      const newEmbeddings = await this.embed(uncachedTexts);
      if (newEmbeddings.length !== uncachedTexts.length) {
        throw new Error(
          `${this.getName()} returned ${newEmbeddings.length} embeddings for ${uncachedTexts.length} texts`
        );
      }

      uncachedIndices.forEach((i, j) => {
        results.set(i, newEmbeddings[j]);
        embeddingCache.set(this.cacheKey(texts[i]), newEmbeddings[j]);
      });
    }

    return texts.map((_, i) => results.get(i) ?? []);
  }

  static getCacheStats(): { size: number } {
    return { size: embeddingCache.size };
  }

  static clearCache(): void {
    embeddingCache.clear();
  }
}
