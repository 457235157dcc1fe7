// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Spinner Manager
 *
 * Terminal progress feedback using ora. Disabled outside TTYs.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Manages a single spinner instance with TTY detection.
 */
class SpinnerManager {
  private spinner: Ora | null = null;
  private enabled: boolean;

  constructor() {
    // Piped output gets no spinner
    this.enabled = process.stdout.isTTY ?? false;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    if (!enabled && this.spinner) {
      this.stop();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Start a new spinner with the given text.
   * If a spinner is already running, it will be stopped first.
   */
  start(text: string): void {
    if (!this.isEnabled()) return;

    if (this.spinner) {
      this.spinner.stop();
    }
    this.spinner = ora({
      text,
      color: 'cyan',
      spinner: 'dots',
      discardStdin: false, // Don't interfere with readline's stdin handling
    }).start();
  }

  update(text: string): void {
    if (this.spinner && this.isEnabled()) {
      this.spinner.text = text;
    }
  }

  succeed(text?: string): void {
    if (this.spinner) {
      this.spinner.succeed(text);
      this.spinner = null;
    }
  }

  fail(text?: string): void {
    if (this.spinner) {
      this.spinner.fail(text);
      this.spinner = null;
    }
  }

  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  // ============================================
  // Convenience methods for common operations
  // ============================================

  thinking(): void {
    this.start(chalk.cyan('Thinking...'));
  }

  /**
   * Show indexing progress.
   */
  indexing(current: number, total: number, filename?: string): void {
    const progress = `${current}/${total}`;
    const text = filename
      ? chalk.blue(`Indexing ${progress}: ${filename}`)
      : chalk.blue(`Indexing ${progress} files...`);

    if (this.spinner) {
      this.update(text);
    } else {
      this.start(text);
    }
  }

  indexingDone(courses: number, chunks: number): void {
    this.succeed(chalk.green(`Indexed ${courses} courses (${chunks} chunks)`));
  }
}

/**
 * Singleton spinner instance for global use.
 */
export const spinner = new SpinnerManager();
