// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

export { BaseTool, type Tool, type ToolContext } from './base.js';
export { ToolRegistry } from './registry.js';
export { CourseTool, toSourceRef } from './course-tool.js';
export { CourseSearchTool, formatSearchResults } from './course-search.js';
export { CourseOutlineTool, formatOutline } from './course-outline.js';
export { CourseListTool, formatCourseList } from './course-list.js';
export * from './schemas.js';

import { ToolRegistry } from './registry.js';
import { CourseSearchTool } from './course-search.js';
import { CourseOutlineTool } from './course-outline.js';
import { CourseListTool } from './course-list.js';
import type { CourseVectorStore } from '../rag/vector-store.js';

/**
 * Create a registry holding the course tools, all backed by one store.
 */
export function createCourseToolRegistry(store: CourseVectorStore): ToolRegistry {
  const registry = new ToolRegistry();
  registry.registerAll([
    new CourseSearchTool(store),
    new CourseOutlineTool(store),
    new CourseListTool(store),
  ]);
  return registry;
}
