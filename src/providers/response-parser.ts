/**
 * Shared response parsing utilities for providers.
 * Provides common operations for extracting tool calls, usage, and stop reasons.
 */

import { isRecord } from '../types.js';
import type { ToolCall, ProviderResponse } from '../types.js';

/**
 * Map a provider-specific stop reason to our standard format.
 */
export function mapStopReason(
  reason: string | null | undefined,
  hasToolCalls: boolean
): 'end_turn' | 'tool_use' | 'max_tokens' {
  if (hasToolCalls) {
    return 'tool_use';
  }

  const normalizedReason = reason?.toLowerCase() || '';

  if (normalizedReason.includes('tool')) {
    return 'tool_use';
  }
  if (normalizedReason.includes('length') || normalizedReason.includes('max_tokens')) {
    return 'max_tokens';
  }

  return 'end_turn';
}

/**
 * Create a standard ProviderResponse object.
 */
export function createProviderResponse(params: {
  content: string;
  toolCalls: ToolCall[];
  stopReason?: string | null;
  inputTokens?: number;
  outputTokens?: number;
}): ProviderResponse {
  const { content, toolCalls, stopReason, inputTokens, outputTokens } = params;

  return {
    content,
    toolCalls,
    stopReason: mapStopReason(stopReason, toolCalls.length > 0),
    ...(inputTokens !== undefined && outputTokens !== undefined && {
      usage: {
        inputTokens,
        outputTokens,
      },
    }),
  };
}

/**
 * Parse tool-call arguments, returning an empty object for anything that
 * is not a JSON object. Invalid arguments are then reported by the tool's
 * own validation.
 */
export function safeParseJson(json: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json || '{}');
  } catch {
    return {};
  }
  return isRecord(parsed) ? parsed : {};
}

/**
 * Narrow a provider's tool input to a record.
 */
export function toToolInput(input: unknown): Record<string, unknown> {
  return isRecord(input) ? input : {};
}
