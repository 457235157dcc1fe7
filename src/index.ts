#!/usr/bin/env node
// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { createInterface } from 'readline';
import { program } from 'commander';
import chalk from 'chalk';
import { resolveConfig, type ResolvedConfig } from './config/index.js';
import { createCourseAssistant, type CourseAssistant, type QueryResponse } from './assistant.js';
import { formatOutline } from './tools/course-outline.js';
import { logger, parseLogLevel, LogLevel } from './logger.js';
import { spinner } from './spinner.js';
import { errorMessage } from './errors.js';
import { VERSION } from './version.js';

type GlobalOptions = {
  provider?: string;
  model?: string;
  baseUrl?: string;
  indexPath?: string;
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
};

/**
 * Apply global flags and build a ready assistant.
 */
async function setup(): Promise<{ config: ResolvedConfig; assistant: CourseAssistant }> {
  const options = program.opts<GlobalOptions>();

  const logLevel = parseLogLevel({
    verbose: options.verbose,
    debug: options.debug,
    trace: options.trace,
  });
  logger.setLevel(logLevel);

  // Spinners conflict with verbose output
  if (logLevel > LogLevel.NORMAL) {
    spinner.setEnabled(false);
  }

  const config = resolveConfig({
    cli: {
      provider: options.provider,
      model: options.model,
      baseUrl: options.baseUrl,
      indexPath: options.indexPath,
    },
  });

  const assistant = createCourseAssistant(config, {
    onToolCall: (name) => {
      spinner.update(chalk.cyan(`Searching (${name})...`));
    },
  });
  await assistant.initialize();
  logger.debug(`Index path: ${config.indexPath}`);

  return { config, assistant };
}

function printAnswer(response: QueryResponse): void {
  console.log(`\n${response.answer}`);

  if (response.sources.length > 0) {
    console.log(chalk.bold('\nSources:'));
    response.sources.forEach((source, i) => {
      const link = source.link ? chalk.dim(` ${source.link}`) : '';
      console.log(`  ${i + 1}. ${source.label}${link}`);
    });
  }
  console.log();
}

async function ask(assistant: CourseAssistant, question: string, sessionId?: string): Promise<QueryResponse> {
  spinner.thinking();
  try {
    const response = await assistant.query(question, sessionId);
    spinner.stop();
    return response;
  } catch (error) {
    spinner.fail('Query failed');
    throw error;
  }
}

/**
 * Interactive loop over one session.
 */
async function chat(assistant: CourseAssistant): Promise<void> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: process.stdin.isTTY ?? false,
  });

  let sessionId = assistant.sessions.createSession();
  console.log(chalk.bold.cyan(`coursemate v${VERSION}`));
  console.log(chalk.dim('Ask about your courses. /new starts a new conversation, /exit quits.\n'));

  const prompt = (): void => {
    rl.setPrompt(chalk.bold.green('> '));
    rl.prompt();
  };

  rl.on('line', (line) => {
    const input = line.trim();
    if (!input) {
      prompt();
      return;
    }

    if (input === '/exit' || input === '/quit') {
      rl.close();
      return;
    }

    if (input === '/new') {
      assistant.sessions.deleteSession(sessionId);
      sessionId = assistant.sessions.createSession();
      console.log(chalk.dim('Started a new conversation.\n'));
      prompt();
      return;
    }

    rl.pause();
    ask(assistant, input, sessionId)
      .then(printAnswer)
      .catch((error: unknown) => {
        logger.error(errorMessage(error), error instanceof Error ? error : undefined);
      })
      .finally(() => {
        rl.resume();
        prompt();
      });
  });

  prompt();
  await new Promise<void>((resolve) => {
    rl.on('close', () => {
      console.log(chalk.dim('\nGoodbye!'));
      resolve();
    });
  });
}

program
  .name('coursemate')
  .description('Ask questions about your course materials')
  .version(VERSION)
  .option('-p, --provider <type>', 'Provider to use (anthropic, openai, ollama, mock)', 'auto')
  .option('-m, --model <name>', 'Model to use')
  .option('--base-url <url>', 'Base URL for API (for self-hosted models)')
  .option('--index-path <dir>', 'Directory holding the vector index')
  .option('--verbose', 'Show tool calls and indexing details')
  .option('--debug', 'Show API and index details')
  .option('--trace', 'Show full request payloads');

program
  .command('index')
  .description('Index a folder of course documents')
  .argument('[folder]', 'Folder with .txt/.md course documents (default: docsPath)')
  .option('--clear', 'Delete the existing index first')
  .action(async (folder: string | undefined, cmd: { clear?: boolean }) => {
    const { config, assistant } = await setup();
    const target = folder ?? config.docsPath;

    assistant.setIndexProgress((current, total, file) => spinner.indexing(current, total, file));
    const summary = await assistant.addCourseFolder(target, { clearExisting: cmd.clear });
    spinner.indexingDone(summary.coursesAdded, summary.chunksAdded);

    if (summary.skipped > 0) {
      console.log(chalk.dim(`${summary.skipped} already indexed`));
    }
    if (summary.failed > 0) {
      console.log(chalk.yellow(`${summary.failed} documents could not be indexed`));
    }
  });

program
  .command('ask')
  .description('Ask a single question')
  .argument('<question...>', 'The question')
  .option('-s, --session <id>', 'Session id to continue')
  .action(async (words: string[], cmd: { session?: string }) => {
    const { assistant } = await setup();
    printAnswer(await ask(assistant, words.join(' '), cmd.session));
  });

program
  .command('courses')
  .description('List indexed courses')
  .action(async () => {
    const { assistant } = await setup();
    const analytics = await assistant.getCourseAnalytics();

    console.log(chalk.bold(`${analytics.totalCourses} courses indexed`));
    for (const title of analytics.courseTitles) {
      console.log(`  - ${title}`);
    }
  });

program
  .command('outline')
  .description('Show the lessons of a course')
  .argument('<course...>', 'Course name (partial names work)')
  .action(async (words: string[]) => {
    const { assistant } = await setup();
    const name = words.join(' ');
    const outline = await assistant.getCourseOutline(name);

    if (!outline) {
      console.log(chalk.yellow(`No course found matching '${name}'.`));
      return;
    }
    console.log(formatOutline(outline));
  });

program
  .command('chat')
  .description('Start an interactive session')
  .action(async () => {
    const { assistant } = await setup();
    await chat(assistant);
  });

program.parseAsync().catch((error: unknown) => {
  spinner.stop();
  logger.error(errorMessage(error), error instanceof Error ? error : undefined);
  process.exitCode = 1;
});
