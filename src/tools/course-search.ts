// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Course Search Tool
 *
 * Lets the model search course content, optionally restricted to one
 * course (matched by partial name) and one lesson.
 */

import { CourseTool } from './course-tool.js';
import type { ToolContext } from './base.js';
import type { ToolDefinition } from '../types.js';
import type { ContentSearchResult } from '../rag/types.js';
import { SearchCourseContentSchema, type SearchCourseContentInput } from './schemas.js';
import { logger } from '../logger.js';

/**
 * Format results as `[Course - Lesson n]` blocks separated by blank lines.
 */
export function formatSearchResults(results: ContentSearchResult[]): string {
  return results
    .map((result) => {
      const header = result.lessonNumber !== undefined
        ? `[${result.courseTitle} - Lesson ${result.lessonNumber}]`
        : `[${result.courseTitle}]`;
      return `${header}\n${result.content}`;
    })
    .join('\n\n');
}

export class CourseSearchTool extends CourseTool<SearchCourseContentInput> {
  protected readonly schema = SearchCourseContentSchema;

  getDefinition(): ToolDefinition {
    return {
      name: 'search_course_content',
      description: `Search course materials for content relevant to a question.
Use this for questions about concepts, explanations or details covered in a course.
Optionally restrict the search to one course (partial names work, e.g. "MCP" or "Introduction")
and to one lesson number.`,
      input_schema: {
        type: 'object',
        properties: {
          query: {
            type: 'string',
            description: 'What to search for in the course content',
          },
          course_name: {
            type: 'string',
            description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
          },
          lesson_number: {
            type: 'integer',
            description: 'Specific lesson number to search within (e.g. 1, 2, 3)',
          },
        },
        required: ['query'],
      },
    };
  }

  protected async execute(input: SearchCourseContentInput, context: ToolContext): Promise<string> {
    const { query, course_name: courseName, lesson_number: lessonNumber } = input;

    let courseTitle: string | undefined;
    if (courseName !== undefined) {
      const resolved = await this.store.resolveCourseName(courseName);
      if (!resolved) {
        const count = await this.store.getCourseCount();
        return count === 0
          ? 'No courses are available to search.'
          : `No course found matching '${courseName}'.`;
      }
      courseTitle = resolved;
      logger.debug(`Resolved course '${courseName}' to '${resolved}'`);
    }

    const results = await this.store.searchContent(query, { courseTitle, lessonNumber });
    context.recordSources(await this.buildSources(results));

    if (results.length === 0) {
      let filterInfo = '';
      if (courseName !== undefined) filterInfo += ` in course '${courseName}'`;
      if (lessonNumber !== undefined) filterInfo += ` in lesson ${lessonNumber}`;
      return `No relevant content found${filterInfo}.`;
    }

    return formatSearchResults(results);
  }
}
