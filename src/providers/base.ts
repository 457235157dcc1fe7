// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import type { Message, ToolDefinition, ProviderResponse, ProviderConfig } from '../types.js';

/**
 * Abstract base class for language model providers.
 * Implement this interface to add support for new model backends.
 */
export abstract class BaseProvider {
  protected config: ProviderConfig;

  constructor(config: ProviderConfig = {}) {
    this.config = config;
  }

  /**
   * Send a chat completion request to the model.
   * @param messages - Conversation so far
   * @param tools - Tool definitions; omit to force a plain-text answer.
   *   Without tools, earlier tool-use turns are sent as plain text.
   * @param systemPrompt - Optional system prompt (uses native API support when available)
   */
  abstract chat(
    messages: Message[],
    tools?: ToolDefinition[],
    systemPrompt?: string
  ): Promise<ProviderResponse>;

  /**
   * Check if this provider supports tool use / function calling.
   */
  abstract supportsToolUse(): boolean;

  /**
   * Get the name of this provider for display purposes.
   */
  abstract getName(): string;

  abstract getModel(): string;
}
