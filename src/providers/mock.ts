// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Mock Provider for Testing
 *
 * A configurable mock provider that simulates model responses
 * for deterministic testing without real API calls.
 *
 * Supports two modes:
 * 1. In-process: Pass responses directly to constructor
 * 2. File-based: Load responses from a JSON file
 *    (set COURSEMATE_MOCK_FILE and use `--provider mock`)
 */

import { readFileSync, existsSync } from 'fs';
import { z } from 'zod';
import { BaseProvider } from './base.js';
import type { Message, ToolDefinition, ProviderResponse, ToolCall, TokenUsage } from '../types.js';

/**
 * A single mock response configuration.
 */
export interface MockResponse {
  /** Text content to return */
  content?: string;
  /** Tool calls to return */
  toolCalls?: ToolCall[];
  /** Stop reason (defaults to 'end_turn' or 'tool_use' if toolCalls present) */
  stopReason?: 'end_turn' | 'tool_use' | 'max_tokens';
  /** Simulate an error */
  error?: Error;
  /** Resolve only after this many milliseconds */
  delayMs?: number;
  /** Optional token usage to report */
  usage?: TokenUsage;
}

/**
 * Configuration for MockProvider.
 */
export interface MockProviderConfig {
  /** Queue of responses to return in order */
  responses?: MockResponse[];
  /** Default response when queue is empty */
  defaultResponse?: string;
  /** Path to JSON file containing responses */
  responsesFile?: string;
  /** Whether to report tool use support (default: true) */
  supportsTools?: boolean;
  /** Model name to report (default: 'mock-model') */
  model?: string;
}

/**
 * Record of a single call to the provider.
 */
export interface MockCall {
  messages: Message[];
  tools?: ToolDefinition[];
  systemPrompt?: string;
  timestamp: Date;
}

const MockResponsesFileSchema = z.object({
  responses: z.array(z.object({
    content: z.string().optional(),
    toolCalls: z.array(z.object({
      id: z.string(),
      name: z.string(),
      input: z.record(z.unknown()),
    })).optional(),
    error: z.string().optional(),
  })).default([]),
  defaultResponse: z.string().optional(),
  model: z.string().optional(),
});

/**
 * Mock provider for testing.
 * Simulates provider responses with configurable behavior.
 */
export class MockProvider extends BaseProvider {
  private responseQueue: MockResponse[];
  private defaultResponse: string;
  private toolSupport: boolean;
  private modelName: string;
  private callHistory: MockCall[] = [];

  /**
   * Load mock configuration from a JSON file.
   */
  static loadFromFile(filePath: string): MockProviderConfig {
    if (!existsSync(filePath)) {
      throw new Error(`Mock responses file not found: ${filePath}`);
    }

    const data = MockResponsesFileSchema.parse(JSON.parse(readFileSync(filePath, 'utf-8')));
    return {
      responses: data.responses.map(({ error, ...rest }) => ({
        ...rest,
        ...(error !== undefined && { error: new Error(error) }),
      })),
      defaultResponse: data.defaultResponse,
      model: data.model,
    };
  }

  constructor(config: MockProviderConfig = {}) {
    super({});

    let effectiveConfig = config;
    if (config.responsesFile) {
      const fileConfig = MockProvider.loadFromFile(config.responsesFile);
      effectiveConfig = { ...fileConfig, ...config, responses: config.responses || fileConfig.responses };
    }

    this.responseQueue = [...(effectiveConfig.responses || [])];
    this.defaultResponse = effectiveConfig.defaultResponse || 'Mock response';
    this.toolSupport = effectiveConfig.supportsTools !== false;
    this.modelName = effectiveConfig.model || 'mock-model';
  }

  /**
   * Add responses to the queue.
   */
  addResponses(responses: MockResponse[]): void {
    this.responseQueue.push(...responses);
  }

  setDefaultResponse(response: string): void {
    this.defaultResponse = response;
  }

  getCallHistory(): MockCall[] {
    return [...this.callHistory];
  }

  getLastCall(): MockCall | undefined {
    return this.callHistory[this.callHistory.length - 1];
  }

  getCallCount(): number {
    return this.callHistory.length;
  }

  reset(): void {
    this.callHistory = [];
    this.responseQueue = [];
  }

  private getNextResponse(): MockResponse {
    return this.responseQueue.shift() ?? { content: this.defaultResponse };
  }

  private buildResponse(mock: MockResponse): ProviderResponse {
    const toolCalls = mock.toolCalls || [];
    const stopReason = mock.stopReason || (toolCalls.length > 0 ? 'tool_use' : 'end_turn');

    return {
      content: mock.content || '',
      toolCalls,
      stopReason,
      usage: mock.usage || {
        inputTokens: 100,
        outputTokens: 50,
      },
    };
  }

  async chat(
    messages: Message[],
    tools?: ToolDefinition[],
    systemPrompt?: string
  ): Promise<ProviderResponse> {
    this.callHistory.push({
      messages: structuredClone(messages),
      tools: tools ? structuredClone(tools) : undefined,
      systemPrompt,
      timestamp: new Date(),
    });

    const response = this.getNextResponse();

    if (response.delayMs) {
      await new Promise(resolve => setTimeout(resolve, response.delayMs));
    }
    if (response.error) {
      throw response.error;
    }

    return this.buildResponse(response);
  }

  supportsToolUse(): boolean {
    return this.toolSupport;
  }

  getName(): string {
    return 'Mock';
  }

  getModel(): string {
    return this.modelName;
  }
}
