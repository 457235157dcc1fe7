// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Loader
 *
 * Functions for loading configuration files from disk.
 * Handles global and workspace configuration files.
 */

import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';
import { CourseMatePaths } from '../paths.js';
import { WorkspaceConfigSchema, type WorkspaceConfig } from './types.js';

/**
 * Configuration file names (checked in order).
 */
export const CONFIG_FILES = ['.coursemate.json', 'coursemate.config.json'];

export interface LoadedConfig {
  config: WorkspaceConfig | null;
  configPath: string | null;
}

/**
 * Read and validate one config file. Unreadable or invalid files are
 * reported and ignored.
 */
function readConfigFile(configPath: string): WorkspaceConfig | null {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    logger.warn(`Failed to parse ${configPath}: ${errorMessage(error)}`);
    return null;
  }

  const parsed = WorkspaceConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    logger.warn(`Ignoring invalid config ${configPath}: ${issues.join('; ')}`);
    return null;
  }
  return parsed.data;
}

/**
 * Load global configuration from ~/.coursemate/config.json.
 * @param overrideDir - Optional directory override for testing
 */
export function loadGlobalConfig(overrideDir?: string): LoadedConfig {
  const configPath = overrideDir
    ? path.join(overrideDir, 'config.json')
    : CourseMatePaths.globalConfig();

  if (!fs.existsSync(configPath)) {
    return { config: null, configPath: null };
  }
  return { config: readConfigFile(configPath), configPath };
}

/**
 * Find and load workspace configuration from a directory.
 * Searches for .coursemate.json, then coursemate.config.json.
 */
export function loadWorkspaceConfig(cwd: string = process.cwd()): LoadedConfig {
  for (const fileName of CONFIG_FILES) {
    const configPath = path.join(cwd, fileName);
    if (fs.existsSync(configPath)) {
      return { config: readConfigFile(configPath), configPath };
    }
  }
  return { config: null, configPath: null };
}
