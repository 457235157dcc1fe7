// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Logger
 *
 * Level-aware logging utilities for debug output.
 * Provides graduated verbosity: NORMAL → VERBOSE → DEBUG → TRACE
 */

import chalk from 'chalk';
import type { Message, ToolDefinition } from './types.js';

/**
 * Log levels for graduated verbosity.
 */
export enum LogLevel {
  /** Normal output - only essential information */
  NORMAL = 0,
  /** Verbose - tool inputs/outputs and ingestion progress */
  VERBOSE = 1,
  /** Debug - API details, index details */
  DEBUG = 2,
  /** Trace - full request/response payloads */
  TRACE = 3,
}

/**
 * Parse log level from CLI options.
 */
export function parseLogLevel(options: {
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}): LogLevel {
  if (options.trace) return LogLevel.TRACE;
  if (options.debug) return LogLevel.DEBUG;
  if (options.verbose) return LogLevel.VERBOSE;
  return LogLevel.NORMAL;
}

/**
 * Centralized logger with level-aware output.
 */
class Logger {
  private level: LogLevel = LogLevel.NORMAL;
  private silent: boolean = false;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Suppress all output, including warnings and errors (used by tests).
   */
  setSilent(silent: boolean): void {
    this.silent = silent;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return !this.silent && this.level >= level;
  }

  verbose(message: string): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      console.log(chalk.dim(message));
    }
  }

  debug(message: string): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.log(chalk.dim(`[Debug] ${message}`));
    }
  }

  trace(message: string): void {
    if (this.isLevelEnabled(LogLevel.TRACE)) {
      console.log(chalk.gray(`[Trace] ${message}`));
    }
  }

  // ============================================
  // Formatted output helpers
  // ============================================

  /**
   * Log tool input at VERBOSE level.
   */
  toolInput(name: string, input: Record<string, unknown>): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      console.log(chalk.yellow(`\n🔎 ${name}`));
      for (const [key, value] of Object.entries(input)) {
        const valueStr = typeof value === 'string'
          ? value.length > 80 ? value.slice(0, 80) + '...' : value
          : JSON.stringify(value);
        console.log(chalk.dim(`   ${key}: ${valueStr}`));
      }
    }
  }

  /**
   * Log tool output at VERBOSE level.
   */
  toolOutput(name: string, result: string, duration: number, isError: boolean): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      const lines = result.split('\n').length;
      const durationStr = duration.toFixed(2);

      if (isError) {
        console.log(chalk.red(`✗ ${name}`) + chalk.dim(` (error, ${durationStr}s)`));
        if (this.level >= LogLevel.DEBUG) {
          console.log(chalk.red(chalk.dim(`   ${result.slice(0, 200)}`)));
        }
      } else {
        console.log(chalk.green(`✓ ${name}`) + chalk.dim(` (${lines} lines, ${durationStr}s)`));
      }
    }
  }

  /**
   * Log an ingestion step at VERBOSE level.
   */
  ingest(courseTitle: string, lessonCount: number, chunkCount: number): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      console.log(chalk.dim(`[Index] ${courseTitle}: ${lessonCount} lessons, ${chunkCount} chunks`));
    }
  }

  /**
   * Log API request at DEBUG level.
   */
  apiRequest(model: string, messageCount: number, hasTools: boolean): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      const toolsStr = hasTools ? ', with tools' : ', tools disabled';
      console.log(chalk.dim(`[API] Sending to ${model} (${messageCount} messages${toolsStr})...`));
    }
  }

  /**
   * Log API response at DEBUG level.
   */
  apiResponse(
    outputTokens: number,
    stopReason: string,
    duration: number,
    toolCallCount?: number
  ): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      let details = `${outputTokens} tokens, ${stopReason}`;
      if (toolCallCount && toolCallCount > 0) {
        details += `, ${toolCallCount} tool calls`;
      }
      details += `, ${duration.toFixed(2)}s`;
      console.log(chalk.dim(`[API] Response: ${details}`));
    }
  }

  /**
   * Replace control characters so payload dumps stay on one line.
   */
  private sanitize(str: string): string {
    return str
      .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
      .replace(/\r?\n/g, '\\n')
      .replace(/\t/g, '\\t');
  }

  /**
   * Log full API request at TRACE level.
   */
  apiRequestFull(
    model: string,
    messages: Message[],
    tools?: ToolDefinition[],
    systemPrompt?: string
  ): void {
    if (!this.isLevelEnabled(LogLevel.TRACE)) return;

    console.log(chalk.gray('\n' + '='.repeat(60)));
    console.log(chalk.gray('[API Request]'));
    console.log(chalk.gray('='.repeat(60)));
    console.log(chalk.gray(`  model: ${model}`));

    if (systemPrompt) {
      const truncated = systemPrompt.length > 200
        ? systemPrompt.slice(0, 200) + '...'
        : systemPrompt;
      console.log(chalk.gray(`  system: "${this.sanitize(truncated)}"`));
    }

    console.log(chalk.gray(`  messages: [`));
    for (const msg of messages.slice(-5)) {
      const content = typeof msg.content === 'string'
        ? msg.content.slice(0, 100)
        : `[${msg.content.map((b) => b.type).join(', ')}]`;
      console.log(chalk.gray(`    { role: "${msg.role}", content: "${this.sanitize(content)}" }`));
    }
    if (messages.length > 5) {
      console.log(chalk.gray(`    ... and ${messages.length - 5} more messages`));
    }
    console.log(chalk.gray(`  ]`));

    if (tools && tools.length > 0) {
      console.log(chalk.gray(`  tools: [${tools.map((t) => t.name).join(', ')}]`));
    }
    console.log(chalk.gray('='.repeat(60) + '\n'));
  }

  /**
   * Log an error with optional stack trace at DEBUG level.
   */
  error(message: string, error?: Error): void {
    if (this.silent) return;
    console.error(chalk.red(`Error: ${message}`));
    if (error && this.level >= LogLevel.DEBUG) {
      console.error(chalk.dim(error.stack || 'No stack trace available'));
    }
  }

  warn(message: string): void {
    if (this.silent) return;
    console.warn(chalk.yellow(`Warning: ${message}`));
  }

  info(message: string): void {
    if (this.silent) return;
    console.log(chalk.blue(`Info: ${message}`));
  }
}

/**
 * Singleton logger instance for global use.
 */
export const logger = new Logger();
