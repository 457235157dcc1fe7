/**
 * RAG System Types
 *
 * Defines interfaces for the course retrieval system: parsed courses,
 * content chunks, catalog metadata and search results.
 */

/**
 * A lesson within a course. Lesson numbers are unique within a course
 * but need not be contiguous.
 */
export interface Lesson {
  lessonNumber: number;
  title: string;
  link?: string;
}

/**
 * A parsed course document. The title is the course's primary key.
 */
export interface Course {
  title: string;
  link?: string;
  instructor?: string;
  /** Lessons in document order */
  lessons: Lesson[];
}

/**
 * A chunk of lesson text stored in the content collection.
 */
export interface CourseChunk {
  courseTitle: string;
  /** Absent for documents without lesson markers */
  lessonNumber?: number;
  /** Zero-based, global across the document */
  chunkIndex: number;
  content: string;
}

/**
 * Result of a parsed course document.
 */
export interface ParsedCourseDocument {
  course: Course;
  chunks: CourseChunk[];
}

/**
 * Result from a content search.
 */
export interface ContentSearchResult {
  content: string;
  courseTitle: string;
  lessonNumber?: number;
  chunkIndex: number;
  /** 1 - cosine similarity; lower is closer */
  distance: number;
}

/**
 * Course-level metadata stored in the catalog collection.
 */
export interface CourseMetadata {
  title: string;
  instructor?: string;
  link?: string;
  lessons: Lesson[];
  lessonCount: number;
}

/**
 * Exact-match filters for content search. Course titles must already be
 * resolved; fuzzy names are never passed here.
 */
export interface ContentSearchOptions {
  courseTitle?: string;
  lessonNumber?: number;
  /** Maximum results (default: configured maxResults) */
  limit?: number;
}

/**
 * Attribution for an answer, one per retrieved result.
 */
export interface SourceRef {
  /** "{courseTitle} - Lesson {n}" or "{courseTitle}" */
  label: string;
  courseTitle: string;
  lessonNumber?: number;
  /** Lesson link, falling back to the course link */
  link?: string;
}

/**
 * Configuration for the retrieval system.
 */
export interface RAGConfig {
  /** Embedding provider to use */
  embeddingProvider: 'openai' | 'ollama' | 'auto';
  /** OpenAI embedding model (default: text-embedding-3-small) */
  openaiModel: string;
  /** Ollama embedding model (default: nomic-embed-text) */
  ollamaModel: string;
  /** Ollama base URL (default: http://localhost:11434) */
  ollamaBaseUrl: string;
  /** Maximum characters per chunk */
  chunkSize: number;
  /** Characters carried into the next chunk */
  chunkOverlap: number;
  /** Number of results to return */
  maxResults: number;
  /** Directory holding the catalog and content collections */
  indexPath: string;
  /** Best course match farther than this resolves to no course */
  courseMatchMaxDistance?: number;
}

/**
 * Summary of a folder ingestion.
 */
export interface IngestSummary {
  coursesAdded: number;
  chunksAdded: number;
  /** Titles already indexed */
  skipped: number;
  /** Files that could not be read or parsed */
  failed: number;
}

/**
 * Progress callback for indexing operations.
 */
export type IndexProgressCallback = (current: number, total: number, file: string) => void;
