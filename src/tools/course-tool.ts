// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { BaseTool } from './base.js';
import type { CourseVectorStore } from '../rag/vector-store.js';
import type { ContentSearchResult, CourseMetadata, SourceRef } from '../rag/types.js';

/**
 * Base for tools backed by the course vector store.
 */
export abstract class CourseTool<TInput> extends BaseTool<TInput> {
  constructor(protected readonly store: CourseVectorStore) {
    super();
  }

  /**
   * List the indexed course titles so the model can retry with a valid name.
   */
  protected async argumentHelp(): Promise<string | null> {
    const titles = await this.store.getCourseTitles();
    if (titles.length === 0) {
      return 'No courses are currently indexed.';
    }
    return `Available courses: ${titles.map((t) => `'${t}'`).join(', ')}`;
  }

  /**
   * Build one source per result. Links prefer the lesson link and fall
   * back to the course link.
   */
  protected async buildSources(results: ContentSearchResult[]): Promise<SourceRef[]> {
    const courses = new Map<string, CourseMetadata | null>();
    const sources: SourceRef[] = [];

    for (const result of results) {
      if (!courses.has(result.courseTitle)) {
        courses.set(result.courseTitle, await this.store.getCourse(result.courseTitle));
      }
      sources.push(toSourceRef(result.courseTitle, result.lessonNumber, courses.get(result.courseTitle) ?? null));
    }

    return sources;
  }
}

/**
 * Create a source reference for a course or one of its lessons.
 */
export function toSourceRef(
  courseTitle: string,
  lessonNumber: number | undefined,
  course: CourseMetadata | null
): SourceRef {
  const source: SourceRef = {
    label: lessonNumber !== undefined ? `${courseTitle} - Lesson ${lessonNumber}` : courseTitle,
    courseTitle,
  };
  if (lessonNumber !== undefined) source.lessonNumber = lessonNumber;

  const lessonLink = lessonNumber !== undefined
    ? course?.lessons.find((l) => l.lessonNumber === lessonNumber)?.link
    : undefined;
  const link = lessonLink ?? course?.link;
  if (link) source.link = link;

  return source;
}
