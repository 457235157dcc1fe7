// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Module
 *
 * - types.ts     - Config file schema and ResolvedConfig
 * - loader.ts    - File I/O (load config files)
 * - validator.ts - Config validation
 * - merger.ts    - Config merging with priority handling
 */

import * as path from 'path';
import { ConfigError } from '../errors.js';
import { logger } from '../logger.js';
import { loadGlobalConfig, loadWorkspaceConfig } from './loader.js';
import { validateConfig } from './validator.js';
import { mergeConfig, type CLIOptions } from './merger.js';
import type { ResolvedConfig } from './types.js';

export { WorkspaceConfigSchema } from './types.js';
export type { WorkspaceConfig, ResolvedConfig } from './types.js';
export { CONFIG_FILES, loadGlobalConfig, loadWorkspaceConfig } from './loader.js';
export type { LoadedConfig } from './loader.js';
export { validateConfig, VALID_PROVIDERS } from './validator.js';
export { getDefaultConfig, mergeConfig } from './merger.js';
export type { CLIOptions } from './merger.js';

export interface ResolveConfigOptions {
  cli?: CLIOptions;
  /** Directory searched for workspace config and used for relative paths */
  cwd?: string;
  /** Directory holding the global config.json (testing) */
  globalDir?: string;
}

/**
 * Load, validate and merge every config source.
 * Relative paths are resolved against `cwd`.
 *
 * @throws ConfigError when chunkOverlap is not smaller than chunkSize
 */
export function resolveConfig(options: ResolveConfigOptions = {}): ResolvedConfig {
  const cwd = options.cwd ?? process.cwd();
  const global = loadGlobalConfig(options.globalDir);
  const workspace = loadWorkspaceConfig(cwd);

  for (const loaded of [global, workspace]) {
    if (!loaded.config || !loaded.configPath) continue;
    for (const warning of validateConfig(loaded.config)) {
      logger.warn(`${loaded.configPath}: ${warning}`);
    }
    logger.debug(`Loaded config from ${loaded.configPath}`);
  }

  const config = mergeConfig(workspace.config, options.cli ?? {}, global.config);

  if (config.chunkOverlap >= config.chunkSize) {
    throw new ConfigError(
      `chunkOverlap (${config.chunkOverlap}) must be smaller than chunkSize (${config.chunkSize})`
    );
  }

  config.docsPath = path.resolve(cwd, config.docsPath);
  config.indexPath = path.resolve(cwd, config.indexPath);
  return config;
}
