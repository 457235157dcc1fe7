// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

// Core message types
/**
 * A message exchanged with the language model.
 */
export interface Message {
  role: 'user' | 'assistant';
  content: string | ContentBlock[];
}

/**
 * A block of content within a message.
 * `tool_use` blocks carry `id`, `name` and `input`; `tool_result` blocks
 * carry `tool_use_id`, `content` and optionally `is_error`.
 */
export interface ContentBlock {
  type: 'text' | 'tool_use' | 'tool_result';
  text?: string;
  id?: string;
  name?: string;
  input?: Record<string, unknown>;
  tool_use_id?: string;
  content?: string;
  is_error?: boolean;
}

// Tool definitions
/**
 * Declaration of a tool as sent to the model.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

/**
 * A tool invocation requested by the model.
 */
export interface ToolCall {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

/**
 * The observation returned to the model for a tool call.
 */
export interface ToolResult {
  tool_use_id: string;
  content: string;
  is_error?: boolean;
}

/**
 * Token usage information from a provider response.
 */
export interface TokenUsage {
  /** Number of tokens in the input/prompt */
  inputTokens: number;
  /** Number of tokens in the output/completion */
  outputTokens: number;
}

// Provider response
/**
 * A model response: either final text, or one or more tool-use requests
 * (possibly with accompanying text).
 */
export interface ProviderResponse {
  content: string;
  toolCalls: ToolCall[];
  stopReason: 'end_turn' | 'tool_use' | 'max_tokens';
  usage?: TokenUsage;
}

// Provider configuration
export interface ProviderConfig {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Narrow an unknown value to a plain object record.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
