// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Course Vector Store
 *
 * Two vectra LocalIndex collections under one index directory:
 * `catalog` holds one entry per course (title embedding, course metadata),
 * `content` holds one entry per chunk.
 */

import { LocalIndex, type MetadataFilter } from 'vectra';
import * as path from 'path';
import { z } from 'zod';
import type { BaseEmbeddingProvider } from './embeddings/base.js';
import type {
  ContentSearchOptions,
  ContentSearchResult,
  Course,
  CourseChunk,
  CourseMetadata,
  Lesson,
} from './types.js';
import { RetrievalFailureError, errorMessage } from '../errors.js';
import { RAG_DEFAULTS } from '../constants.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { ensureDir } from '../paths.js';
import { logger } from '../logger.js';

/**
 * Metadata values vectra can store inline.
 */
type StoredMetadata = Record<string, string | number | boolean>;

type Collection = 'catalog' | 'content';

const LessonsSchema = z.array(
  z.object({
    lessonNumber: z.number().int(),
    title: z.string(),
    link: z.string().optional(),
  })
);

export interface CourseVectorStoreOptions {
  /** Directory holding the `catalog` and `content` collections */
  indexPath: string;
  /** Default search limit */
  maxResults?: number;
  /** Best course match farther than this resolves to null */
  courseMatchMaxDistance?: number;
}

/**
 * Build the content collection id for a chunk.
 */
export function contentId(courseTitle: string, chunkIndex: number): string {
  return `${courseTitle}#${chunkIndex}`;
}

/**
 * Convert a course into catalog metadata. Unset optional fields are omitted.
 */
function toCatalogMetadata(course: Course): StoredMetadata {
  const lessons = course.lessons.map((lesson) => {
    const entry: Lesson = { lessonNumber: lesson.lessonNumber, title: lesson.title };
    if (lesson.link) entry.link = lesson.link;
    return entry;
  });

  const metadata: StoredMetadata = {
    title: course.title,
    lessonsJson: JSON.stringify(lessons),
    lessonCount: lessons.length,
  };
  if (course.instructor) metadata.instructor = course.instructor;
  if (course.link) metadata.link = course.link;
  return metadata;
}

function parseLessons(json: string, title: string): Lesson[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    logger.warn(`Ignoring unreadable lesson list for course '${title}': ${errorMessage(error)}`);
    return [];
  }

  const parsed = LessonsSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn(`Ignoring malformed lesson list for course '${title}'`);
    return [];
  }
  return parsed.data;
}

function fromCatalogMetadata(metadata: StoredMetadata): CourseMetadata | null {
  const { title, instructor, link, lessonsJson } = metadata;
  if (typeof title !== 'string') return null;

  const lessons = typeof lessonsJson === 'string' ? parseLessons(lessonsJson, title) : [];
  const course: CourseMetadata = { title, lessons, lessonCount: lessons.length };
  if (typeof instructor === 'string') course.instructor = instructor;
  if (typeof link === 'string') course.link = link;
  return course;
}

function toContentMetadata(chunk: CourseChunk): StoredMetadata {
  const metadata: StoredMetadata = {
    courseTitle: chunk.courseTitle,
    chunkIndex: chunk.chunkIndex,
    content: chunk.content,
  };
  if (chunk.lessonNumber !== undefined) metadata.lessonNumber = chunk.lessonNumber;
  return metadata;
}

/**
 * Exact-match vectra filter for a content search. Null when unfiltered.
 */
function contentFilter(options: ContentSearchOptions): MetadataFilter | null {
  const filter: MetadataFilter = {};
  if (options.courseTitle !== undefined) filter.courseTitle = { $eq: options.courseTitle };
  if (options.lessonNumber !== undefined) filter.lessonNumber = { $eq: options.lessonNumber };
  return Object.keys(filter).length > 0 ? filter : null;
}

/**
 * vectra scores by cosine similarity; a zero vector scores NaN.
 */
function toDistance(score: number): number {
  return Number.isFinite(score) ? 1 - score : 1;
}

function fromContentMetadata(metadata: StoredMetadata): CourseChunk | null {
  const { courseTitle, chunkIndex, content, lessonNumber } = metadata;
  if (typeof courseTitle !== 'string' || typeof chunkIndex !== 'number' || typeof content !== 'string') {
    return null;
  }
  const chunk: CourseChunk = { courseTitle, chunkIndex, content };
  if (typeof lessonNumber === 'number') chunk.lessonNumber = lessonNumber;
  return chunk;
}

/**
 * Dual-collection vector store for course catalog and content.
 */
export class CourseVectorStore {
  private catalog: LocalIndex | null = null;
  private content: LocalIndex | null = null;
  private readonly indexPath: string;
  private readonly maxResults: number;
  private readonly courseMatchMaxDistance?: number;
  /** One update at a time per collection */
  private readonly writeLock = new KeyedMutex();

  constructor(
    private readonly embeddings: BaseEmbeddingProvider,
    options: CourseVectorStoreOptions
  ) {
    this.indexPath = options.indexPath;
    this.maxResults = options.maxResults ?? RAG_DEFAULTS.MAX_RESULTS;
    this.courseMatchMaxDistance = options.courseMatchMaxDistance;
  }

  /**
   * Create or open both collections.
   */
  async initialize(): Promise<void> {
    await this.guard('initialize index', async () => {
      ensureDir(this.indexPath);
      this.catalog = await this.openCollection('catalog');
      this.content = await this.openCollection('content');
    });
    logger.debug(`Vector index ready at ${this.indexPath}`);
  }

  private async openCollection(name: Collection): Promise<LocalIndex> {
    const index = new LocalIndex(path.join(this.indexPath, name));
    if (!(await index.isIndexCreated())) {
      await index.createIndex({ version: 1 });
    }
    return index;
  }

  private collection(name: Collection): LocalIndex {
    const index = name === 'catalog' ? this.catalog : this.content;
    if (!index) {
      throw new RetrievalFailureError('Index not initialized');
    }
    return index;
  }

  /**
   * Run a storage operation, wrapping failures in RetrievalFailureError.
   */
  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof RetrievalFailureError) throw error;
      throw new RetrievalFailureError(`Failed to ${operation}: ${errorMessage(error)}`, error);
    }
  }

  /**
   * Apply a batch of writes to a collection as one vectra update.
   */
  private async write(name: Collection, apply: (index: LocalIndex) => Promise<void>): Promise<void> {
    await this.writeLock.runExclusive(name, async () => {
      const index = this.collection(name);
      await index.beginUpdate();
      try {
        await apply(index);
        await index.endUpdate();
      } catch (error) {
        index.cancelUpdate();
        throw error;
      }
    });
  }

  // ============================================
  // Catalog
  // ============================================

  async hasCourse(title: string): Promise<boolean> {
    return this.guard('check course', async () => {
      const item = await this.collection('catalog').getItem(title);
      return item !== undefined;
    });
  }

  /**
   * Add a course to the catalog. Returns false when the title already exists,
   * including when a concurrent writer added it first.
   */
  async upsertCatalog(course: Course): Promise<boolean> {
    if (await this.hasCourse(course.title)) {
      return false;
    }

    const vector = await this.guard('embed course title', () => this.embeddings.embedOne(course.title));
    let added = false;
    await this.guard('write catalog', () =>
      this.write('catalog', async (index) => {
        // Re-check under the lock; another writer may have added it
        if (await index.getItem(course.title)) return;
        await index.upsertItem({
          id: course.title,
          vector,
          metadata: toCatalogMetadata(course),
        });
        added = true;
      })
    );
    return added;
  }

  /**
   * Find the catalog title closest to a possibly partial course name.
   * Returns null when the catalog is empty or the best match is farther
   * than the configured cutoff.
   */
  async resolveCourseName(name: string): Promise<string | null> {
    const items = await this.guard('read catalog', () => this.collection('catalog').listItems());
    if (items.length === 0) return null;

    const query = await this.guard('embed course name', () => this.embeddings.embedOne(name));
    const [top] = await this.guard('query catalog', () =>
      this.collection('catalog').queryItems(query, '', 1)
    );
    if (!top) return null;

    const title = typeof top.item.metadata.title === 'string' ? top.item.metadata.title : top.item.id;
    const distance = toDistance(top.score);
    if (this.courseMatchMaxDistance !== undefined && distance > this.courseMatchMaxDistance) {
      logger.debug(`No course within ${this.courseMatchMaxDistance} of '${name}' (best: ${title}, ${distance.toFixed(3)})`);
      return null;
    }
    return title;
  }

  async getAllCourses(): Promise<CourseMetadata[]> {
    const items = await this.guard('read catalog', () => this.collection('catalog').listItems());
    const courses: CourseMetadata[] = [];
    for (const item of items) {
      const course = fromCatalogMetadata(item.metadata);
      if (course) courses.push(course);
    }
    return courses.sort((a, b) => a.title.localeCompare(b.title));
  }

  async getCourseTitles(): Promise<string[]> {
    const courses = await this.getAllCourses();
    return courses.map((c) => c.title);
  }

  async getCourseCount(): Promise<number> {
    const items = await this.guard('read catalog', () => this.collection('catalog').listItems());
    return items.length;
  }

  /**
   * Get catalog metadata by exact title.
   */
  async getCourse(title: string): Promise<CourseMetadata | null> {
    const item = await this.guard('read catalog', () => this.collection('catalog').getItem(title));
    return item ? fromCatalogMetadata(item.metadata) : null;
  }

  /**
   * Resolve a course name and return its outline.
   */
  async getCourseOutline(name: string): Promise<CourseMetadata | null> {
    const title = await this.resolveCourseName(name);
    return title ? this.getCourse(title) : null;
  }

  async getCourseLink(title: string): Promise<string | null> {
    const course = await this.getCourse(title);
    return course?.link ?? null;
  }

  async getLessonLink(title: string, lessonNumber: number): Promise<string | null> {
    const course = await this.getCourse(title);
    const lesson = course?.lessons.find((l) => l.lessonNumber === lessonNumber);
    return lesson?.link ?? null;
  }

  // ============================================
  // Content
  // ============================================

  /**
   * Insert content chunks. An existing (courseTitle, chunkIndex) key is
   * overwritten.
   */
  async upsertContent(chunks: CourseChunk[]): Promise<void> {
    if (chunks.length === 0) return;

    const vectors = await this.embeddings.embedWithCache(chunks.map((c) => c.content));
    await this.guard('write content', () =>
      this.write('content', async (index) => {
        for (let i = 0; i < chunks.length; i++) {
          const chunk = chunks[i];
          await index.upsertItem({
            id: contentId(chunk.courseTitle, chunk.chunkIndex),
            vector: vectors[i],
            metadata: toContentMetadata(chunk),
          });
        }
      })
    );
  }

  /**
   * Similarity search over content with exact-match filters.
   * Results are ordered by ascending distance.
   */
  async searchContent(
    query: string,
    options: ContentSearchOptions = {}
  ): Promise<ContentSearchResult[]> {
    const limit = options.limit ?? this.maxResults;
    if (limit <= 0) return [];

    const index = this.collection('content');
    const filter = contentFilter(options);

    // Nothing to rank: skip embedding the query
    const candidates = await this.guard('read content', () =>
      filter ? index.listItemsByMetadata(filter) : index.listItems()
    );
    if (candidates.length === 0) return [];

    const queryVector = await this.guard('embed query', () => this.embeddings.embedOne(query));
    const matches = await this.guard('query content', () =>
      index.queryItems(queryVector, '', limit, filter ?? undefined)
    );

    const results: ContentSearchResult[] = [];
    for (const match of matches) {
      const chunk = fromContentMetadata(match.item.metadata);
      if (!chunk) continue;
      const result: ContentSearchResult = {
        content: chunk.content,
        courseTitle: chunk.courseTitle,
        chunkIndex: chunk.chunkIndex,
        distance: toDistance(match.score),
      };
      if (chunk.lessonNumber !== undefined) result.lessonNumber = chunk.lessonNumber;
      results.push(result);
    }

    // vectra orders by score only; break ties by key
    return results
      .sort((a, b) =>
        a.distance - b.distance ||
        a.courseTitle.localeCompare(b.courseTitle) ||
        a.chunkIndex - b.chunkIndex
      )
      .slice(0, limit);
  }

  async getChunkCount(): Promise<number> {
    const items = await this.guard('read content', () => this.collection('content').listItems());
    return items.length;
  }

  // ============================================
  // Maintenance
  // ============================================

  /**
   * Delete a course's catalog entry and all of its chunks.
   * Returns the number of chunks removed.
   */
  async removeCourse(title: string): Promise<number> {
    let removed = 0;
    await this.guard('remove course', async () => {
      await this.write('catalog', async (index) => {
        if (await index.getItem(title)) {
          await index.deleteItem(title);
        }
      });
      await this.write('content', async (index) => {
        const items = await index.listItemsByMetadata({ courseTitle: { $eq: title } });
        for (const item of items) {
          await index.deleteItem(item.id);
        }
        removed = items.length;
      });
    });
    return removed;
  }

  /**
   * Delete and recreate both collections.
   */
  async clear(): Promise<void> {
    await this.guard('clear index', async () => {
      for (const name of ['catalog', 'content'] as const) {
        await this.writeLock.runExclusive(name, async () => {
          const index = this.collection(name);
          await index.deleteIndex();
          await index.createIndex({ version: 1 });
        });
      }
    });
    logger.debug('Vector index cleared');
  }

  getPath(): string {
    return this.indexPath;
  }
}
