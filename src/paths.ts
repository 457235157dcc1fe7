// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Centralized path management for coursemate.
 *
 * Paths are computed at call time so tests can point COURSEMATE_HOME
 * at a temporary directory.
 */

import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the base coursemate directory.
 * Supports override via the COURSEMATE_HOME environment variable.
 */
export function getCourseMateHome(): string {
  if (process.env.COURSEMATE_HOME) {
    return process.env.COURSEMATE_HOME;
  }
  return join(homedir(), '.coursemate');
}

export const CourseMatePaths = {
  /**
   * Base directory (~/.coursemate)
   */
  home: (): string => getCourseMateHome(),

  /**
   * Default vector index directory
   */
  index: (): string => join(getCourseMateHome(), 'index'),

  /**
   * Global config file
   */
  globalConfig: (): string => join(getCourseMateHome(), 'config.json'),
} as const;

/**
 * Ensure a specific directory exists.
 * Creates parent directories as needed.
 */
export function ensureDir(dirPath: string): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
  }
}
