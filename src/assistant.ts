// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Course Assistant
 *
 * Wires the vector store, course tools, query loop and session memory
 * together. One instance serves any number of sessions.
 */

import type { BaseProvider } from './providers/base.js';
import { createProvider } from './providers/index.js';
import type { BaseEmbeddingProvider } from './rag/embeddings/base.js';
import { createEmbeddingProvider } from './rag/embeddings/index.js';
import { CourseVectorStore } from './rag/vector-store.js';
import { CourseChunker } from './rag/chunker.js';
import { CourseIndexer, type AddFolderOptions, type AddedCourse } from './rag/indexer.js';
import type { CourseMetadata, IndexProgressCallback, IngestSummary, SourceRef } from './rag/types.js';
import { createCourseToolRegistry } from './tools/index.js';
import { CourseAgent, type QueryOutcome } from './agent.js';
import { SessionManager } from './session.js';
import type { RetryOptions } from './providers/retry.js';
import type { ResolvedConfig } from './config/types.js';
import { logger } from './logger.js';

export interface CourseAssistantOptions {
  provider: BaseProvider;
  embeddings: BaseEmbeddingProvider;
  indexPath: string;
  chunkSize?: number;
  chunkOverlap?: number;
  maxResults?: number;
  maxHistory?: number;
  maxToolRounds?: number;
  modelTimeoutMs?: number;
  toolTimeoutMs?: number;
  courseMatchMaxDistance?: number;
  retryOptions?: RetryOptions;
  onToolCall?: (name: string, input: Record<string, unknown>) => void;
}

export interface QueryResponse {
  answer: string;
  sources: SourceRef[];
  sessionId: string;
  outcome: QueryOutcome;
}

export interface CourseAnalytics {
  totalCourses: number;
  courseTitles: string[];
}

export class CourseAssistant {
  readonly store: CourseVectorStore;
  readonly sessions: SessionManager;
  private readonly indexer: CourseIndexer;
  private readonly agent: CourseAgent;

  constructor(options: CourseAssistantOptions) {
    this.store = new CourseVectorStore(options.embeddings, {
      indexPath: options.indexPath,
      maxResults: options.maxResults,
      courseMatchMaxDistance: options.courseMatchMaxDistance,
    });
    this.indexer = new CourseIndexer(
      this.store,
      new CourseChunker({ chunkSize: options.chunkSize, chunkOverlap: options.chunkOverlap })
    );
    this.sessions = new SessionManager(options.maxHistory);
    this.agent = new CourseAgent({
      provider: options.provider,
      toolRegistry: createCourseToolRegistry(this.store),
      maxRounds: options.maxToolRounds,
      modelTimeoutMs: options.modelTimeoutMs,
      toolTimeoutMs: options.toolTimeoutMs,
      retryOptions: options.retryOptions,
      onToolCall: options.onToolCall,
    });
  }

  /**
   * Create or open the vector index.
   */
  async initialize(): Promise<void> {
    await this.store.initialize();
  }

  setIndexProgress(callback: IndexProgressCallback | null): void {
    this.indexer.onProgress = callback;
  }

  async addCourseDocument(filePath: string): Promise<AddedCourse | null> {
    return this.indexer.addCourseDocument(filePath);
  }

  async addCourseFolder(folderPath: string, options: AddFolderOptions = {}): Promise<IngestSummary> {
    const summary = await this.indexer.addCourseFolder(folderPath, options);
    logger.verbose(
      `Indexed ${summary.coursesAdded} courses (${summary.chunksAdded} chunks), ` +
      `${summary.skipped} already present, ${summary.failed} failed`
    );
    return summary;
  }

  /**
   * Answer a question within a session, creating one when no id is given.
   * Failed queries are not remembered.
   */
  async query(text: string, sessionId?: string): Promise<QueryResponse> {
    const id = sessionId ?? this.sessions.createSession();
    const result = await this.agent.run(text, this.sessions.formatHistory(id));

    if (result.outcome !== 'failed') {
      await this.sessions.append(id, text, result.answer);
    }

    logger.debug(
      `Query finished: ${result.outcome}, ${result.rounds} rounds, ${result.toolCalls} tool calls`
    );
    return { answer: result.answer, sources: result.sources, sessionId: id, outcome: result.outcome };
  }

  async getCourseAnalytics(): Promise<CourseAnalytics> {
    const courseTitles = await this.store.getCourseTitles();
    return { totalCourses: courseTitles.length, courseTitles };
  }

  async getCourseOutline(courseName: string): Promise<CourseMetadata | null> {
    return this.store.getCourseOutline(courseName);
  }
}

/**
 * Build an assistant from resolved configuration.
 */
export function createCourseAssistant(
  config: ResolvedConfig,
  hooks: Pick<CourseAssistantOptions, 'onToolCall'> = {}
): CourseAssistant {
  const provider = createProvider({
    type: config.provider,
    model: config.model,
    baseUrl: config.baseUrl,
  });
  const embeddings = createEmbeddingProvider({
    embeddingProvider: config.embeddingProvider,
    openaiModel: config.openaiEmbeddingModel,
    ollamaModel: config.ollamaEmbeddingModel,
    ollamaBaseUrl: config.ollamaBaseUrl,
  });

  logger.verbose(`Model: ${provider.getName()} (${provider.getModel()})`);
  logger.verbose(`Embeddings: ${embeddings.getName()} (${embeddings.getModel()})`);

  return new CourseAssistant({
    provider,
    embeddings,
    indexPath: config.indexPath,
    chunkSize: config.chunkSize,
    chunkOverlap: config.chunkOverlap,
    maxResults: config.maxResults,
    maxHistory: config.maxHistory,
    maxToolRounds: config.maxToolRounds,
    modelTimeoutMs: config.modelTimeoutMs,
    toolTimeoutMs: config.toolTimeoutMs,
    courseMatchMaxDistance: config.courseMatchMaxDistance,
    retryOptions: {
      maxRetries: config.modelMaxRetries,
      initialDelayMs: config.modelRetryDelayMs,
    },
    ...hooks,
  });
}
