// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Error taxonomy for ingestion and query handling.
 *
 * Ingestion errors are isolated per document; query-time errors are absorbed
 * by the agent loop so callers always receive text.
 */

/**
 * Error codes used for classification in logs and tests.
 */
export enum ErrorCode {
  MALFORMED_DOCUMENT = 'MALFORMED_DOCUMENT',
  RETRIEVAL_FAILURE = 'RETRIEVAL_FAILURE',
  TOOL_ARGUMENT = 'TOOL_ARGUMENT',
  MODEL_UNAVAILABLE = 'MODEL_UNAVAILABLE',
  TIMEOUT = 'TIMEOUT',
  CONFIG = 'CONFIG',
}

/**
 * Base class for all coursemate errors.
 */
export class CourseMateError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CourseMateError';
  }
}

/**
 * A course document failed header or lesson parsing.
 */
export class MalformedDocumentError extends CourseMateError {
  constructor(message: string, public readonly source?: string) {
    super(source ? `${source}: ${message}` : message, ErrorCode.MALFORMED_DOCUMENT);
    this.name = 'MalformedDocumentError';
  }
}

/**
 * The vector index could not be read or queried.
 */
export class RetrievalFailureError extends CourseMateError {
  constructor(message: string, cause?: unknown) {
    super(message, ErrorCode.RETRIEVAL_FAILURE, { cause });
    this.name = 'RetrievalFailureError';
  }
}

/**
 * The model invoked a tool with missing or invalid arguments.
 */
export class ToolArgumentError extends CourseMateError {
  constructor(
    message: string,
    public readonly toolName: string,
    public readonly issues: string[] = []
  ) {
    super(message, ErrorCode.TOOL_ARGUMENT);
    this.name = 'ToolArgumentError';
  }
}

/**
 * The language model provider failed or timed out.
 */
export class ModelUnavailableError extends CourseMateError {
  constructor(message: string, cause?: unknown) {
    super(message, ErrorCode.MODEL_UNAVAILABLE, { cause });
    this.name = 'ModelUnavailableError';
  }
}

/**
 * An operation exceeded its caller-imposed deadline.
 */
export class TimeoutError extends CourseMateError {
  constructor(label: string, public readonly ms: number) {
    super(`${label} timed out after ${ms}ms`, ErrorCode.TIMEOUT);
    this.name = 'TimeoutError';
  }
}

/**
 * Configuration that cannot be used as-is.
 */
export class ConfigError extends CourseMateError {
  constructor(message: string) {
    super(message, ErrorCode.CONFIG);
    this.name = 'ConfigError';
  }
}

/**
 * Extract a readable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
