// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OpenAIEmbeddingProvider } from '../src/rag/embeddings/openai.js';
import { OllamaEmbeddingProvider } from '../src/rag/embeddings/ollama.js';
import { BaseEmbeddingProvider, createEmbeddingProvider } from '../src/rag/embeddings/index.js';

const { embeddingsCreate } = vi.hoisted(() => ({ embeddingsCreate: vi.fn() }));

// Mock OpenAI client
vi.mock('openai', () => {
  const OpenAI = vi.fn(() => ({
    embeddings: { create: embeddingsCreate },
  }));

  return { default: OpenAI, OpenAI };
});

// Mock fetch for Ollama
const mockFetch = vi.fn();

function jsonResponse(body: unknown, ok = true) {
  return { ok, status: ok ? 200 : 500, statusText: ok ? 'OK' : 'Internal Server Error', json: async () => body };
}

describe('Embedding Providers', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.unstubAllEnvs();
  });

  describe('OpenAIEmbeddingProvider', () => {
    it('creates provider with default model', () => {
      const provider = new OpenAIEmbeddingProvider(undefined, 'test-key');
      expect(provider.getName()).toBe('OpenAI');
      expect(provider.getModel()).toBe('text-embedding-3-small');
      expect(provider.getDimensions()).toBe(1536);
    });

    it('returns embeddings in input order', async () => {
      embeddingsCreate.mockResolvedValue({
        data: [
          { index: 1, embedding: [0, 1] },
          { index: 0, embedding: [1, 0] },
        ],
      });
      const provider = new OpenAIEmbeddingProvider('text-embedding-3-small', 'test-key');

      expect(await provider.embed(['first', 'second'])).toEqual([[1, 0], [0, 1]]);
      expect(embeddingsCreate).toHaveBeenCalledWith({ model: 'text-embedding-3-small', input: ['first', 'second'] });
    });

    it('handles empty input', async () => {
      const provider = new OpenAIEmbeddingProvider(undefined, 'test-key');
      expect(await provider.embed([])).toEqual([]);
      expect(embeddingsCreate).not.toHaveBeenCalled();
    });

    it('isAvailable returns false when API key is missing', async () => {
      vi.stubEnv('OPENAI_API_KEY', '');
      const provider = new OpenAIEmbeddingProvider();
      expect(await provider.isAvailable()).toBe(false);
    });
  });

  describe('OllamaEmbeddingProvider', () => {
    it('creates provider with default model', () => {
      const provider = new OllamaEmbeddingProvider();
      expect(provider.getName()).toBe('Ollama');
      expect(provider.getModel()).toBe('nomic-embed-text');
      expect(provider.getDimensions()).toBe(768);
    });

    it('posts each text and learns the dimensions', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ embedding: [0.1, 0.2, 0.3] }));
      const provider = new OllamaEmbeddingProvider('custom-embed', 'http://ollama.test/');

      const result = await provider.embed(['a', 'b']);

      expect(result).toEqual([[0.1, 0.2, 0.3], [0.1, 0.2, 0.3]]);
      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(mockFetch.mock.calls[0][0]).toBe('http://ollama.test/api/embeddings');
      expect(JSON.parse(mockFetch.mock.calls[0][1].body)).toEqual({ model: 'custom-embed', prompt: 'a' });
      expect(provider.getDimensions()).toBe(3);
    });

    it('handles API errors', async () => {
      mockFetch.mockResolvedValue(jsonResponse({}, false));
      const provider = new OllamaEmbeddingProvider();

      await expect(provider.embed(['a'])).rejects.toThrow(
        'Ollama embedding request failed: 500 Internal Server Error'
      );
    });

    it('rejects malformed responses', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ embedding: 'nope' }));
      const provider = new OllamaEmbeddingProvider();

      await expect(provider.embed(['a'])).rejects.toThrow();
    });

    it('is available when the model is installed', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ models: [{ name: 'nomic-embed-text:latest' }] }));
      expect(await new OllamaEmbeddingProvider().isAvailable()).toBe(true);
    });

    it('is not available when the model is missing', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ models: [{ name: 'llama3.1:latest' }] }));
      expect(await new OllamaEmbeddingProvider().isAvailable()).toBe(false);
    });

    it('is not available when Ollama is not running', async () => {
      mockFetch.mockRejectedValue(new Error('fetch failed'));
      expect(await new OllamaEmbeddingProvider().isAvailable()).toBe(false);
    });
  });

  describe('embedOne caching', () => {
    it('embeds each distinct text once', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ embedding: [1, 2] }));
      const provider = new OllamaEmbeddingProvider();

      await provider.embedOne('same text');
      await provider.embedOne('same text');

      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(BaseEmbeddingProvider.getCacheStats().size).toBe(1);
    });

    it('only embeds uncached texts in a batch', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ embedding: [1, 2] }));
      const provider = new OllamaEmbeddingProvider();
      await provider.embedOne('cached');

      const result = await provider.embedWithCache(['cached', 'fresh']);

      expect(result).toEqual([[1, 2], [1, 2]]);
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });
  });

  describe('createEmbeddingProvider', () => {
    const base = {
      openaiModel: 'text-embedding-3-small',
      ollamaModel: 'nomic-embed-text',
      ollamaBaseUrl: 'http://localhost:11434',
    };

    it('creates the configured provider', () => {
      expect(createEmbeddingProvider({ ...base, embeddingProvider: 'openai' })).toBeInstanceOf(OpenAIEmbeddingProvider);
      expect(createEmbeddingProvider({ ...base, embeddingProvider: 'ollama' })).toBeInstanceOf(OllamaEmbeddingProvider);
    });

    it('prefers OpenAI in auto mode when a key is set', () => {
      vi.stubEnv('OPENAI_API_KEY', 'test-key');
      expect(createEmbeddingProvider({ ...base, embeddingProvider: 'auto' })).toBeInstanceOf(OpenAIEmbeddingProvider);
    });

    it('falls back to Ollama in auto mode', () => {
      vi.stubEnv('OPENAI_API_KEY', '');
      expect(createEmbeddingProvider({ ...base, embeddingProvider: 'auto' })).toBeInstanceOf(OllamaEmbeddingProvider);
    });
  });
});
