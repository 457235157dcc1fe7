import type { Message, ContentBlock, ToolResult, ToolCall, ToolDefinition, ProviderResponse } from './types.js';
import type { BaseProvider } from './providers/base.js';
import type { ToolRegistry } from './tools/registry.js';
import type { ToolContext } from './tools/base.js';
import type { SourceRef } from './rag/types.js';
import { withRetry, type RetryOptions } from './providers/retry.js';
import { withTimeout } from './utils/timeout.js';
import { ModelUnavailableError, errorMessage } from './errors.js';
import { AGENT_CONFIG, EMPTY_ANSWER_FALLBACK } from './constants.js';
import { logger } from './logger.js';

const DEFAULT_SYSTEM_PROMPT = `You are an assistant for questions about course materials. You can look things up with tools:
- list_all_courses: which courses exist, with instructors and lesson counts
- get_course_outline: the lesson list of one course (title, link, numbered lessons)
- search_course_content: passages from the course content, optionally limited to one course or lesson

How to work:
- Questions about which courses exist: call list_all_courses
- Questions about the structure or lessons of a course: call get_course_outline
- Questions about what a course teaches: call search_course_content
- General knowledge questions unrelated to any course: answer directly without tools
- Use at most one tool per step and base your answer only on what the tools return
- If a search finds nothing, say so plainly

Answers should be short, accurate and direct. Do not describe your search process or mention the tools.`;

/**
 * How a query ended.
 * - answered: the model replied without requesting a tool
 * - forced: a final tool-free call produced the answer
 * - failed: the model could not be reached; the answer explains why
 */
export type QueryOutcome = 'answered' | 'forced' | 'failed';

export interface AgentResult {
  answer: string;
  sources: SourceRef[];
  outcome: QueryOutcome;
  /** Tools-enabled model calls made */
  rounds: number;
  /** Tool calls executed (skipped calls not counted) */
  toolCalls: number;
}

export interface AgentOptions {
  provider: BaseProvider;
  toolRegistry: ToolRegistry;
  systemPrompt?: string;
  /** Tools-enabled model calls per query (default: 2) */
  maxRounds?: number;
  /** Deadline for one model call, retries included */
  modelTimeoutMs?: number;
  /** Deadline for one tool call */
  toolTimeoutMs?: number;
  retryOptions?: RetryOptions;
  onToolCall?: (name: string, input: Record<string, unknown>) => void;
  onToolResult?: (name: string, result: string, isError: boolean) => void;
}

/**
 * Build the first user message for a query.
 */
export function buildUserPrompt(query: string): string {
  return `Answer this question about course materials: ${query}`;
}

/**
 * Append formatted conversation history to a system prompt.
 */
export function buildSystemPrompt(base: string, history?: string | null): string {
  return history ? `${base}\n\nPrevious conversation:\n${history}` : base;
}

/**
 * The CourseAgent runs one query through a bounded tool loop:
 * call the model with tools, execute any tool calls, repeat up to
 * `maxRounds` times, then force a final answer without tools.
 */
export class CourseAgent {
  private provider: BaseProvider;
  private toolRegistry: ToolRegistry;
  private systemPrompt: string;
  private maxRounds: number;
  private modelTimeoutMs: number;
  private toolTimeoutMs: number;
  private retryOptions: RetryOptions;
  private callbacks: {
    onToolCall?: (name: string, input: Record<string, unknown>) => void;
    onToolResult?: (name: string, result: string, isError: boolean) => void;
  };

  constructor(options: AgentOptions) {
    this.provider = options.provider;
    this.toolRegistry = options.toolRegistry;
    this.systemPrompt = options.systemPrompt || DEFAULT_SYSTEM_PROMPT;
    this.maxRounds = options.maxRounds ?? AGENT_CONFIG.MAX_TOOL_ROUNDS;
    this.modelTimeoutMs = options.modelTimeoutMs ?? AGENT_CONFIG.MODEL_TIMEOUT_MS;
    this.toolTimeoutMs = options.toolTimeoutMs ?? AGENT_CONFIG.TOOL_TIMEOUT_MS;
    this.retryOptions = options.retryOptions ?? {};
    this.callbacks = {
      onToolCall: options.onToolCall,
      onToolResult: options.onToolResult,
    };

    if (!Number.isInteger(this.maxRounds) || this.maxRounds < 1) {
      throw new RangeError(`maxRounds must be a positive integer, got ${this.maxRounds}`);
    }
  }

  getMaxRounds(): number {
    return this.maxRounds;
  }

  /**
   * Answer a query. Never throws for model or retrieval problems; those
   * end in a forced or failed outcome.
   * @param history - Formatted previous exchanges for the system prompt
   */
  async run(query: string, history?: string | null): Promise<AgentResult> {
    let sources: SourceRef[] = [];
    const context: ToolContext = {
      recordSources: (recorded) => {
        sources = [...recorded];
      },
    };

    const systemPrompt = buildSystemPrompt(this.systemPrompt, history);
    const messages: Message[] = [{ role: 'user', content: buildUserPrompt(query) }];
    const tools = this.provider.supportsToolUse() ? this.toolRegistry.getDefinitions() : undefined;

    let rounds = 0;
    let toolCalls = 0;

    while (tools && rounds < this.maxRounds) {
      rounds++;

      let response: ProviderResponse;
      try {
        response = await this.callModel(messages, tools, systemPrompt);
      } catch (error) {
        logger.error(`Round ${rounds} failed, forcing final answer: ${errorMessage(error)}`,
          error instanceof Error ? error : undefined);
        break;
      }

      // No tool calls, we're done
      if (response.toolCalls.length === 0) {
        return {
          answer: response.content.trim() ? response.content : EMPTY_ANSWER_FALLBACK,
          sources,
          outcome: 'answered',
          rounds,
          toolCalls,
        };
      }

      const contentBlocks: ContentBlock[] = [];
      if (response.content) {
        contentBlocks.push({ type: 'text', text: response.content });
      }
      for (const toolCall of response.toolCalls) {
        contentBlocks.push({
          type: 'tool_use',
          id: toolCall.id,
          name: toolCall.name,
          input: toolCall.input,
        });
      }
      messages.push({ role: 'assistant', content: contentBlocks });

      const turn = await this.executeToolCalls(response.toolCalls, context);
      toolCalls += turn.executed;

      const resultBlocks: ContentBlock[] = turn.results.map((result, i) => ({
        type: 'tool_result' as const,
        tool_use_id: result.tool_use_id,
        name: response.toolCalls[i].name,
        content: result.content,
        is_error: result.is_error,
      }));
      messages.push({ role: 'user', content: resultBlocks });

      if (turn.failed) {
        logger.verbose('Tool failure, forcing final answer');
        break;
      }
    }

    return this.finalAnswer(messages, systemPrompt, sources, rounds, toolCalls);
  }

  /**
   * One tool-free model call over everything gathered so far.
   */
  private async finalAnswer(
    messages: Message[],
    systemPrompt: string,
    sources: SourceRef[],
    rounds: number,
    toolCalls: number
  ): Promise<AgentResult> {
    try {
      const response = await this.callModel(messages, undefined, systemPrompt);
      return {
        answer: response.content.trim() ? response.content : EMPTY_ANSWER_FALLBACK,
        sources,
        outcome: rounds > 0 ? 'forced' : 'answered',
        rounds,
        toolCalls,
      };
    } catch (error) {
      logger.error(`Query failed: ${errorMessage(error)}`, error instanceof Error ? error : undefined);
      return {
        answer: `Query failed: ${errorMessage(error)}`,
        sources,
        outcome: 'failed',
        rounds,
        toolCalls,
      };
    }
  }

  /**
   * Call the model with retries inside a deadline.
   * @throws ModelUnavailableError
   */
  private async callModel(
    messages: Message[],
    tools: ToolDefinition[] | undefined,
    systemPrompt: string
  ): Promise<ProviderResponse> {
    const model = this.provider.getModel();
    logger.apiRequest(model, messages.length, tools !== undefined);
    logger.apiRequestFull(model, messages, tools, systemPrompt);

    const start = Date.now();
    // Ends pending retries once the deadline passes
    const retryControl = new AbortController();
    try {
      const response = await withTimeout(
        withRetry(() => this.provider.chat(messages, tools, systemPrompt), {
          ...this.retryOptions,
          signal: retryControl.signal,
          onRetry: (attempt, error, delayMs) => {
            logger.warn(`Model call failed (${error.message}), retry ${attempt} in ${delayMs}ms`);
            this.retryOptions.onRetry?.(attempt, error, delayMs);
          },
        }),
        this.modelTimeoutMs,
        `Model call to ${model}`
      );

      logger.apiResponse(
        response.usage?.outputTokens ?? 0,
        response.stopReason,
        (Date.now() - start) / 1000,
        response.toolCalls.length
      );
      return response;
    } catch (error) {
      throw new ModelUnavailableError(errorMessage(error), error);
    } finally {
      retryControl.abort();
    }
  }

  /**
   * Execute tool calls one at a time. After a failure (retrieval error or
   * timeout) the rest of the turn is skipped, but every call still gets a
   * result so the model sees a complete turn.
   */
  private async executeToolCalls(
    calls: ToolCall[],
    context: ToolContext
  ): Promise<{ results: ToolResult[]; executed: number; failed: boolean }> {
    const results: ToolResult[] = [];
    let executed = 0;
    let failed = false;

    for (const toolCall of calls) {
      if (failed) {
        results.push({
          tool_use_id: toolCall.id,
          content: 'Skipped: an earlier tool call in this turn failed.',
          is_error: true,
        });
        continue;
      }

      this.callbacks.onToolCall?.(toolCall.name, toolCall.input);
      executed++;

      // Sources from a call that outlives its deadline are ignored
      let settled = false;
      const callContext: ToolContext = {
        recordSources: (recorded) => {
          if (!settled) context.recordSources(recorded);
        },
      };

      let result: ToolResult;
      try {
        result = await withTimeout(
          this.toolRegistry.execute(toolCall, callContext),
          this.toolTimeoutMs,
          `Tool ${toolCall.name}`
        );
      } catch (error) {
        logger.error(`Tool ${toolCall.name} failed: ${errorMessage(error)}`,
          error instanceof Error ? error : undefined);
        failed = true;
        result = {
          tool_use_id: toolCall.id,
          content: `Error: ${errorMessage(error)}`,
          is_error: true,
        };
      } finally {
        settled = true;
      }

      results.push(result);
      this.callbacks.onToolResult?.(toolCall.name, result.content, result.is_error === true);
    }

    return { results, executed, failed };
  }
}
