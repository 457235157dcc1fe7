// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Validator
 *
 * Functions for validating configuration values.
 */

import type { WorkspaceConfig } from './types.js';

/**
 * Valid provider names.
 */
export const VALID_PROVIDERS = ['anthropic', 'openai', 'ollama', 'mock', 'auto'];

/**
 * Fields that must be positive integers.
 */
export const POSITIVE_INT_FIELDS = [
  'chunkSize',
  'maxResults',
  'maxToolRounds',
  'modelTimeoutMs',
  'toolTimeoutMs',
  'modelRetryDelayMs',
] as const;

/**
 * Fields that must be non-negative integers.
 */
export const NON_NEGATIVE_INT_FIELDS = ['chunkOverlap', 'maxHistory', 'modelMaxRetries'] as const;

export function isPositiveInt(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

export function isNonNegativeInt(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Validate configuration file contents.
 * Returns an array of warning messages for invalid options; invalid
 * numeric values are ignored when merging.
 */
export function validateConfig(config: WorkspaceConfig): string[] {
  const warnings: string[] = [];

  if (config.provider && !VALID_PROVIDERS.includes(config.provider)) {
    warnings.push(`Unknown provider "${config.provider}". Valid: ${VALID_PROVIDERS.join(', ')}`);
  }

  for (const field of POSITIVE_INT_FIELDS) {
    const value = config[field];
    if (value !== undefined && !isPositiveInt(value)) {
      warnings.push(`${field} must be a positive integer, got ${value}`);
    }
  }

  for (const field of NON_NEGATIVE_INT_FIELDS) {
    const value = config[field];
    if (value !== undefined && !isNonNegativeInt(value)) {
      warnings.push(`${field} must be a non-negative integer, got ${value}`);
    }
  }

  if (config.courseMatchMaxDistance !== undefined) {
    const d = config.courseMatchMaxDistance;
    if (!Number.isFinite(d) || d < 0 || d > 2) {
      warnings.push(`courseMatchMaxDistance must be between 0 and 2, got ${d}`);
    }
  }

  if (
    config.chunkSize !== undefined &&
    config.chunkOverlap !== undefined &&
    config.chunkOverlap >= config.chunkSize
  ) {
    warnings.push(
      `chunkOverlap (${config.chunkOverlap}) must be smaller than chunkSize (${config.chunkSize})`
    );
  }

  return warnings;
}
