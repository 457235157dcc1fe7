import type { z } from 'zod';
import type { ToolDefinition, ToolResult } from '../types.js';
import type { SourceRef } from '../rag/types.js';
import { RetrievalFailureError, ToolArgumentError, errorMessage } from '../errors.js';

/**
 * Per-query state handed to tools. A fresh context is created for each
 * query, so concurrent queries never share sources.
 */
export interface ToolContext {
  /** Replace the sources recorded for the current query */
  recordSources(sources: SourceRef[]): void;
}

/**
 * A tool as seen by the registry.
 */
export interface Tool {
  getName(): string;
  getDefinition(): ToolDefinition;
  run(toolUseId: string, input: Record<string, unknown>, context: ToolContext): Promise<ToolResult>;
}

/**
 * Abstract base class for tools.
 * Each tool can be called by the model; its input is validated against a
 * zod schema before `execute` sees it.
 */
export abstract class BaseTool<TInput> implements Tool {
  /**
   * Get the tool definition for the model.
   * This includes the name, description, and input schema.
   */
  abstract getDefinition(): ToolDefinition;

  /**
   * Schema for validating the model's arguments.
   */
  protected abstract readonly schema: z.ZodType<TInput, z.ZodTypeDef, unknown>;

  /**
   * Execute the tool with validated input.
   * @returns The text to send back to the model
   */
  protected abstract execute(input: TInput, context: ToolContext): Promise<string>;

  /**
   * Extra guidance appended to argument errors, e.g. valid values.
   */
  protected async argumentHelp(): Promise<string | null> {
    return null;
  }

  getName(): string {
    return this.getDefinition().name;
  }

  /**
   * Validate raw arguments.
   * @throws ToolArgumentError
   */
  parseInput(input: Record<string, unknown>): TInput {
    const result = this.schema.safeParse(input);
    if (!result.success) {
      const issues = result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      );
      throw new ToolArgumentError(
        `Invalid arguments for ${this.getName()}: ${issues.join('; ')}`,
        this.getName(),
        issues
      );
    }
    return result.data;
  }

  /**
   * Validate, execute, and wrap the result in a ToolResult.
   * Argument problems come back as a message for the model to act on;
   * RetrievalFailureError propagates to the caller.
   */
  async run(toolUseId: string, input: Record<string, unknown>, context: ToolContext): Promise<ToolResult> {
    let parsed: TInput;
    try {
      parsed = this.parseInput(input);
    } catch (error) {
      if (!(error instanceof ToolArgumentError)) throw error;
      const help = await this.argumentHelp();
      return {
        tool_use_id: toolUseId,
        content: help ? `${error.message}\n\n${help}` : error.message,
        is_error: true,
      };
    }

    try {
      const result = await this.execute(parsed, context);
      return {
        tool_use_id: toolUseId,
        content: result,
        is_error: false,
      };
    } catch (error) {
      if (error instanceof RetrievalFailureError) throw error;
      return {
        tool_use_id: toolUseId,
        content: `Error: ${errorMessage(error)}`,
        is_error: true,
      };
    }
  }
}
