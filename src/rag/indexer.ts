// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Course Indexer
 *
 * Ingests course documents into the vector store.
 * - Titles already in the catalog are skipped (idempotent load)
 * - A document that cannot be read or parsed is skipped without
 *   affecting the rest of the folder
 */

import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import type { Course, IndexProgressCallback, IngestSummary } from './types.js';
import type { CourseVectorStore } from './vector-store.js';
import type { CourseChunker } from './chunker.js';
import { MalformedDocumentError, errorMessage } from '../errors.js';
import { COURSE_FILE_EXTENSIONS } from '../constants.js';
import { logger } from '../logger.js';

export interface AddFolderOptions {
  /** Delete both collections before ingesting */
  clearExisting?: boolean;
}

export interface AddedCourse {
  course: Course;
  chunkCount: number;
}

function emptySummary(): IngestSummary {
  return { coursesAdded: 0, chunksAdded: 0, skipped: 0, failed: 0 };
}

/**
 * Loads course documents from disk into the catalog and content collections.
 */
export class CourseIndexer {
  /** Progress callback */
  onProgress: IndexProgressCallback | null = null;

  constructor(
    private readonly store: CourseVectorStore,
    private readonly chunker: CourseChunker
  ) {}

  /**
   * Read, parse and index one course document.
   * Returns null when the course title is already indexed.
   *
   * @throws MalformedDocumentError when headers or lessons are invalid
   */
  async addCourseDocument(filePath: string): Promise<AddedCourse | null> {
    const text = await fs.promises.readFile(filePath, 'utf-8');
    const { course, chunks } = this.chunker.parseCourseDocument(text, path.basename(filePath));

    if (await this.store.hasCourse(course.title)) {
      logger.debug(`Course already indexed: ${course.title}`);
      return null;
    }

    // Content first: a catalog entry marks the course as fully loaded
    await this.store.upsertContent(chunks);
    await this.store.upsertCatalog(course);

    logger.ingest(course.title, course.lessons.length, chunks.length);
    return { course, chunkCount: chunks.length };
  }

  /**
   * Index every course document (.txt, .md) in a folder.
   */
  async addCourseFolder(folderPath: string, options: AddFolderOptions = {}): Promise<IngestSummary> {
    const summary = emptySummary();

    if (!fs.existsSync(folderPath) || !fs.statSync(folderPath).isDirectory()) {
      logger.error(`Course folder not found: ${folderPath}`);
      return summary;
    }

    if (options.clearExisting) {
      logger.verbose('Clearing existing index...');
      await this.store.clear();
    }

    const files = await this.findCourseFiles(folderPath);
    logger.debug(`Found ${files.length} course documents in ${folderPath}`);

    for (let i = 0; i < files.length; i++) {
      const file = files[i];
      this.onProgress?.(i + 1, files.length, path.basename(file));

      try {
        const added = await this.addCourseDocument(file);
        if (added) {
          summary.coursesAdded++;
          summary.chunksAdded += added.chunkCount;
        } else {
          summary.skipped++;
        }
      } catch (error) {
        summary.failed++;
        if (error instanceof MalformedDocumentError) {
          logger.warn(`Skipping malformed document ${error.message}`);
        } else {
          logger.error(
            `Failed to index ${path.basename(file)}: ${errorMessage(error)}`,
            error instanceof Error ? error : undefined
          );
        }
      }
    }

    return summary;
  }

  /**
   * List course documents in a folder (not recursive), sorted by name.
   */
  private async findCourseFiles(folderPath: string): Promise<string[]> {
    const extensions = COURSE_FILE_EXTENSIONS.map((ext) => ext.slice(1)).join(',');
    const files = await glob(`*.{${extensions}}`, {
      cwd: folderPath,
      absolute: true,
      nodir: true,
    });
    return files.sort();
  }
}
