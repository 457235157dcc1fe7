// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { CourseTool, toSourceRef } from './course-tool.js';
import type { ToolContext } from './base.js';
import type { ToolDefinition } from '../types.js';
import type { CourseMetadata } from '../rag/types.js';
import { CourseOutlineSchema, type CourseOutlineInput } from './schemas.js';

/**
 * Format a course outline: title, link, instructor and numbered lessons.
 */
export function formatOutline(course: CourseMetadata): string {
  const lines = [`Course: ${course.title}`];
  if (course.link) lines.push(`Course Link: ${course.link}`);
  if (course.instructor) lines.push(`Instructor: ${course.instructor}`);

  lines.push('');
  if (course.lessons.length > 0) {
    lines.push(`Lessons (${course.lessons.length} total):`);
    for (const lesson of course.lessons) {
      lines.push(`  ${lesson.lessonNumber}. ${lesson.title}`);
    }
  } else {
    lines.push('No lesson structure available for this course.');
  }

  return lines.join('\n');
}

/**
 * Returns the lesson list of a course matched by partial name.
 */
export class CourseOutlineTool extends CourseTool<CourseOutlineInput> {
  protected readonly schema = CourseOutlineSchema;

  getDefinition(): ToolDefinition {
    return {
      name: 'get_course_outline',
      description:
        'Get the complete outline of a course: title, link, instructor and all lessons with numbers and titles.',
      input_schema: {
        type: 'object',
        properties: {
          course_name: {
            type: 'string',
            description: "Course title or partial course name (e.g. 'MCP', 'Introduction', 'RAG')",
          },
        },
        required: ['course_name'],
      },
    };
  }

  protected async execute(input: CourseOutlineInput, context: ToolContext): Promise<string> {
    const course = await this.store.getCourseOutline(input.course_name);
    if (!course) {
      return `No course found matching '${input.course_name}'.`;
    }

    context.recordSources([toSourceRef(course.title, undefined, course)]);
    return formatOutline(course);
  }
}
