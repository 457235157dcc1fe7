// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { CourseTool } from './course-tool.js';
import type { ToolDefinition } from '../types.js';
import type { CourseMetadata } from '../rag/types.js';
import { ListCoursesSchema, type ListCoursesInput } from './schemas.js';

/**
 * Format the catalog as a markdown list.
 */
export function formatCourseList(courses: CourseMetadata[]): string {
  if (courses.length === 0) {
    return 'No courses are currently available.';
  }

  const lines = [`Available courses (${courses.length}):`];
  for (const course of courses) {
    let line = `- **${course.title}**`;
    if (course.instructor) line += ` by ${course.instructor}`;
    if (course.lessonCount > 0) line += ` (${course.lessonCount} lessons)`;
    if (course.link) line += ` [Course Link](${course.link})`;
    lines.push(line);
  }
  return lines.join('\n');
}

/**
 * Lists every indexed course.
 */
export class CourseListTool extends CourseTool<ListCoursesInput> {
  protected readonly schema = ListCoursesSchema;

  getDefinition(): ToolDefinition {
    return {
      name: 'list_all_courses',
      description:
        'List all available courses with instructor, lesson count and link. Use for questions like "what courses are available?"',
      input_schema: {
        type: 'object',
        properties: {},
      },
    };
  }

  protected async execute(): Promise<string> {
    return formatCourseList(await this.store.getAllCourses());
  }
}
