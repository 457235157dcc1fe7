// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import type { ToolDefinition, ToolCall, ToolResult } from '../types.js';
import type { Tool, ToolContext } from './base.js';
import { logger } from '../logger.js';

/**
 * Registry for managing available tools.
 * Tools are registered here and can be looked up by name.
 */
export class ToolRegistry {
  private tools: Map<string, Tool> = new Map();

  /**
   * Register a tool with the registry.
   */
  register(tool: Tool): void {
    const name = tool.getName();
    if (this.tools.has(name)) {
      throw new Error(`Tool "${name}" is already registered`);
    }
    this.tools.set(name, tool);
  }

  /**
   * Register multiple tools at once.
   */
  registerAll(tools: Tool[]): void {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  /**
   * Get a tool by name.
   */
  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  /**
   * Check if a tool is registered.
   */
  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Get all tool definitions for sending to the AI model.
   */
  getDefinitions(): ToolDefinition[] {
    return Array.from(this.tools.values()).map((tool) => tool.getDefinition());
  }

  /**
   * Execute a single tool call.
   * Unknown tools come back as an error result; RetrievalFailureError
   * propagates.
   */
  async execute(toolCall: ToolCall, context: ToolContext): Promise<ToolResult> {
    const tool = this.tools.get(toolCall.name);

    if (!tool) {
      return {
        tool_use_id: toolCall.id,
        content: `Error: Unknown tool "${toolCall.name}". Available tools: ${this.listTools().join(', ')}`,
        is_error: true,
      };
    }

    logger.toolInput(toolCall.name, toolCall.input);
    const start = Date.now();
    const result = await tool.run(toolCall.id, toolCall.input, context);
    logger.toolOutput(toolCall.name, result.content, (Date.now() - start) / 1000, result.is_error === true);

    return result;
  }

  /**
   * List all registered tool names.
   */
  listTools(): string[] {
    return Array.from(this.tools.keys());
  }
}
