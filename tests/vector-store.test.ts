// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import { CourseVectorStore, contentId } from '../src/rag/vector-store.js';
import { CourseChunker } from '../src/rag/chunker.js';
import { RetrievalFailureError } from '../src/errors.js';
import { HashingEmbeddingProvider } from './helpers/hashing-embeddings.js';
import { VECTORS_COURSE, COOKING_COURSE, makeTempDir, removeTempDir } from './helpers/fixtures.js';

describe('CourseVectorStore', () => {
  let tempDir: string;
  let indexPath: string;
  let embeddings: HashingEmbeddingProvider;
  let store: CourseVectorStore;
  const chunker = new CourseChunker();

  async function load(store: CourseVectorStore, text: string): Promise<void> {
    const { course, chunks } = chunker.parseCourseDocument(text);
    await store.upsertContent(chunks);
    await store.upsertCatalog(course);
  }

  beforeEach(async () => {
    tempDir = makeTempDir();
    indexPath = path.join(tempDir, 'index');
    embeddings = new HashingEmbeddingProvider();
    store = new CourseVectorStore(embeddings, { indexPath });
    await store.initialize();
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  it('builds content ids from title and chunk index', () => {
    expect(contentId('Intro to Vectors', 3)).toBe('Intro to Vectors#3');
  });

  describe('empty index', () => {
    it('resolves no course name', async () => {
      expect(await store.resolveCourseName('Vectors')).toBeNull();
    });

    it('returns no search results without embedding the query', async () => {
      expect(await store.searchContent('anything')).toEqual([]);
      expect(embeddings.embeddedTexts).toEqual([]);
    });

    it('reports no courses', async () => {
      expect(await store.getCourseCount()).toBe(0);
      expect(await store.getAllCourses()).toEqual([]);
      expect(await store.hasCourse('Intro to Vectors')).toBe(false);
    });
  });

  describe('catalog', () => {
    beforeEach(async () => {
      await load(store, VECTORS_COURSE);
      await load(store, COOKING_COURSE);
    });

    it('stores course metadata with lessons', async () => {
      expect(await store.getCourse('Intro to Vectors')).toEqual({
        title: 'Intro to Vectors',
        instructor: 'Ada Example',
        link: 'https://example.com/vectors',
        lessons: [
          { lessonNumber: 0, title: 'What Is a Vector', link: 'https://example.com/vectors/0' },
          { lessonNumber: 1, title: 'Vector Operations', link: 'https://example.com/vectors/1' },
        ],
        lessonCount: 2,
      });
    });

    it('lists courses sorted by title', async () => {
      expect(await store.getCourseTitles()).toEqual(['Cooking Basics', 'Intro to Vectors']);
      expect(await store.getCourseCount()).toBe(2);
    });

    it('does not add a title twice', async () => {
      const { course } = chunker.parseCourseDocument(VECTORS_COURSE);

      expect(await store.upsertCatalog(course)).toBe(false);
      expect(await store.getCourseCount()).toBe(2);
    });

    it('resolves a partial course name to the closest title', async () => {
      expect(await store.resolveCourseName('Vectors')).toBe('Intro to Vectors');
      expect(await store.resolveCourseName('cooking')).toBe('Cooking Basics');
    });

    it('returns outlines and links', async () => {
      const outline = await store.getCourseOutline('Cooking');

      expect(outline?.title).toBe('Cooking Basics');
      expect(outline?.lessonCount).toBe(3);
      expect(await store.getCourseLink('Cooking Basics')).toBe('https://example.com/cooking');
      expect(await store.getLessonLink('Cooking Basics', 2)).toBe('https://example.com/cooking/2');
      expect(await store.getLessonLink('Cooking Basics', 1)).toBeNull();
      expect(await store.getCourseLink('Unknown')).toBeNull();
    });

    it('rejects a best match beyond the distance cutoff', async () => {
      const strict = new CourseVectorStore(embeddings, { indexPath, courseMatchMaxDistance: 0.1 });
      await strict.initialize();

      expect(await strict.resolveCourseName('Vectors')).toBeNull();
      expect(await strict.resolveCourseName('Intro to Vectors')).toBe('Intro to Vectors');
    });

    it('persists across store instances', async () => {
      const reopened = new CourseVectorStore(new HashingEmbeddingProvider(), { indexPath });
      await reopened.initialize();

      expect(await reopened.hasCourse('Intro to Vectors')).toBe(true);
      expect(await reopened.getChunkCount()).toBe(4);
    });
  });

  describe('content search', () => {
    beforeEach(async () => {
      await load(store, VECTORS_COURSE);
      await load(store, COOKING_COURSE);
    });

    it('orders results by ascending distance', async () => {
      const results = await store.searchContent('What is a vector?');

      expect(results).toHaveLength(4);
      expect(results[0].courseTitle).toBe('Intro to Vectors');
      expect(results[0].lessonNumber).toBe(0);
      for (let i = 1; i < results.length; i++) {
        expect(results[i].distance).toBeGreaterThanOrEqual(results[i - 1].distance);
      }
    });

    it('applies the result limit', async () => {
      const limited = new CourseVectorStore(embeddings, { indexPath, maxResults: 1 });
      await limited.initialize();

      expect(await limited.searchContent('vector')).toHaveLength(1);
      expect(await store.searchContent('vector', { limit: 2 })).toHaveLength(2);
    });

    it('filters by exact course title and lesson number', async () => {
      const results = await store.searchContent('sharp knives', {
        courseTitle: 'Cooking Basics',
        lessonNumber: 2,
      });

      expect(results).toHaveLength(1);
      expect(results[0]).toMatchObject({ courseTitle: 'Cooking Basics', lessonNumber: 2, chunkIndex: 1 });
    });

    it('returns nothing when the filter matches nothing', async () => {
      expect(await store.searchContent('vector', { courseTitle: 'Vectors' })).toEqual([]);
      expect(await store.searchContent('vector', { courseTitle: 'Intro to Vectors', lessonNumber: 9 })).toEqual([]);
    });

    it('overwrites a chunk stored under the same key', async () => {
      await store.upsertContent([
        { courseTitle: 'Intro to Vectors', lessonNumber: 0, chunkIndex: 0, content: 'Replaced text.' },
      ]);

      const results = await store.searchContent('replaced', { courseTitle: 'Intro to Vectors', lessonNumber: 0 });
      expect(results.map((r) => r.content)).toEqual(['Replaced text.']);
      expect(results[0].distance).toBeCloseTo(0, 5);
      expect(await store.getChunkCount()).toBe(4);
    });
  });

  describe('maintenance', () => {
    beforeEach(async () => {
      await load(store, VECTORS_COURSE);
      await load(store, COOKING_COURSE);
    });

    it('removes a course and its chunks', async () => {
      expect(await store.removeCourse('Cooking Basics')).toBe(2);
      expect(await store.getCourseTitles()).toEqual(['Intro to Vectors']);
      expect(await store.getChunkCount()).toBe(2);
    });

    it('clears both collections', async () => {
      await store.clear();

      expect(await store.getCourseCount()).toBe(0);
      expect(await store.getChunkCount()).toBe(0);
    });

    it('counts a course added by concurrent writers once', async () => {
      const { course } = chunker.parseCourseDocument(VECTORS_COURSE.replace('Intro to Vectors', 'Vectors Again'));

      const added = await Promise.all([store.upsertCatalog(course), store.upsertCatalog(course)]);

      expect(added.filter(Boolean)).toHaveLength(1);
      expect(await store.getCourseCount()).toBe(3);
    });

    it('serializes concurrent writes to one collection', async () => {
      const writes = Array.from({ length: 5 }, (_, i) =>
        store.upsertContent([{ courseTitle: 'Batch', chunkIndex: i, content: `Batch chunk ${i}.` }])
      );
      await Promise.all(writes);

      expect(await store.getChunkCount()).toBe(9);
    });
  });

  describe('failures', () => {
    it('raises RetrievalFailureError before initialization', async () => {
      const fresh = new CourseVectorStore(embeddings, { indexPath: path.join(tempDir, 'other') });

      await expect(fresh.searchContent('vector')).rejects.toThrow(RetrievalFailureError);
      await expect(fresh.hasCourse('x')).rejects.toThrow('Index not initialized');
    });

    it('raises RetrievalFailureError when the query cannot be embedded', async () => {
      await load(store, VECTORS_COURSE);
      embeddings.failWith = new Error('embedding service down');

      await expect(store.searchContent('vector')).rejects.toThrow(
        'Failed to embed query: embedding service down'
      );
    });
  });
});
