// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import OpenAI from 'openai';
import { AnthropicProvider } from '../src/providers/anthropic.js';
import { OpenAICompatibleProvider, createOllamaProvider } from '../src/providers/openai-compatible.js';
import { MockProvider } from '../src/providers/mock.js';
import { createProvider, getProviderTypes } from '../src/providers/index.js';
import { mapStopReason, safeParseJson } from '../src/providers/response-parser.js';
import type { Message, ToolDefinition } from '../src/types.js';

const { anthropicCreate, openaiCreate } = vi.hoisted(() => ({
  anthropicCreate: vi.fn(),
  openaiCreate: vi.fn(),
}));

// Mock the SDK clients
vi.mock('@anthropic-ai/sdk', () => ({
  default: vi.fn().mockImplementation(() => ({
    messages: {
      create: anthropicCreate,
    },
  })),
}));

vi.mock('openai', () => ({
  default: vi.fn().mockImplementation(() => ({
    chat: {
      completions: {
        create: openaiCreate,
      },
    },
  })),
}));

const LIST_TOOL: ToolDefinition = {
  name: 'list_all_courses',
  description: 'List courses',
  input_schema: { type: 'object', properties: {} },
};

const TOOL_TURN: Message[] = [
  { role: 'user', content: 'Which courses exist?' },
  {
    role: 'assistant',
    content: [{ type: 'tool_use', id: 't1', name: 'list_all_courses', input: {} }],
  },
  {
    role: 'user',
    content: [{ type: 'tool_result', tool_use_id: 't1', name: 'list_all_courses', content: 'none' }],
  },
];

beforeEach(() => {
  anthropicCreate.mockReset();
  openaiCreate.mockReset();
});

describe('AnthropicProvider', () => {
  it('sends tool blocks and tool definitions when tools are given', async () => {
    anthropicCreate.mockResolvedValue({
      content: [{ type: 'text', text: 'No courses yet.' }],
      stop_reason: 'end_turn',
      usage: { input_tokens: 20, output_tokens: 4 },
    });
    const provider = new AnthropicProvider({ apiKey: 'test-key' });

    const response = await provider.chat(TOOL_TURN, [LIST_TOOL], 'System');

    expect(anthropicCreate).toHaveBeenCalledWith({
      model: 'claude-sonnet-4-20250514',
      max_tokens: 800,
      temperature: 0,
      system: 'System',
      messages: [
        { role: 'user', content: 'Which courses exist?' },
        { role: 'assistant', content: [{ type: 'tool_use', id: 't1', name: 'list_all_courses', input: {} }] },
        { role: 'user', content: [{ type: 'tool_result', tool_use_id: 't1', content: 'none', is_error: false }] },
      ],
      tools: [{ name: 'list_all_courses', description: 'List courses', input_schema: { type: 'object', properties: {} } }],
      tool_choice: { type: 'auto' },
    });
    expect(response).toEqual({
      content: 'No courses yet.',
      toolCalls: [],
      stopReason: 'end_turn',
      usage: { inputTokens: 20, outputTokens: 4 },
    });
  });

  it('sends earlier tool turns as text when no tools are given', async () => {
    anthropicCreate.mockResolvedValue({
      content: [{ type: 'text', text: 'Final.' }],
      stop_reason: 'end_turn',
      usage: { input_tokens: 1, output_tokens: 1 },
    });
    const provider = new AnthropicProvider({ apiKey: 'test-key', model: 'claude-test' });

    await provider.chat(TOOL_TURN);

    expect(anthropicCreate).toHaveBeenCalledWith({
      model: 'claude-test',
      max_tokens: 800,
      temperature: 0,
      messages: [
        { role: 'user', content: 'Which courses exist?' },
        { role: 'assistant', content: '[Calling list_all_courses]: {}' },
        { role: 'user', content: '[Result from list_all_courses]:\nnone' },
      ],
    });
  });

  it('parses tool calls', async () => {
    anthropicCreate.mockResolvedValue({
      content: [
        { type: 'text', text: 'Looking.' },
        { type: 'tool_use', id: 'toolu_1', name: 'get_course_outline', input: { course_name: 'Vectors' } },
      ],
      stop_reason: 'tool_use',
      usage: { input_tokens: 5, output_tokens: 6 },
    });
    const provider = new AnthropicProvider({ apiKey: 'test-key' });

    const response = await provider.chat([{ role: 'user', content: 'q' }], [LIST_TOOL]);

    expect(response.content).toBe('Looking.');
    expect(response.stopReason).toBe('tool_use');
    expect(response.toolCalls).toEqual([
      { id: 'toolu_1', name: 'get_course_outline', input: { course_name: 'Vectors' } },
    ]);
  });

  it('reports name, model and tool support', () => {
    const provider = new AnthropicProvider({ apiKey: 'test-key', model: 'claude-test' });
    expect(provider.getName()).toBe('Anthropic');
    expect(provider.getModel()).toBe('claude-test');
    expect(provider.supportsToolUse()).toBe(true);
  });
});

describe('OpenAICompatibleProvider', () => {
  it('pairs tool calls and tool results', async () => {
    openaiCreate.mockResolvedValue({
      choices: [{ message: { content: 'None.' }, finish_reason: 'stop' }],
      usage: { prompt_tokens: 9, completion_tokens: 2 },
    });
    const provider = new OpenAICompatibleProvider({ apiKey: 'test-key' });

    const response = await provider.chat(TOOL_TURN, [LIST_TOOL], 'System');

    expect(openaiCreate).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      max_tokens: 800,
      temperature: 0,
      messages: [
        { role: 'system', content: 'System' },
        { role: 'user', content: 'Which courses exist?' },
        {
          role: 'assistant',
          content: null,
          tool_calls: [{ id: 't1', type: 'function', function: { name: 'list_all_courses', arguments: '{}' } }],
        },
        { role: 'tool', tool_call_id: 't1', content: 'none' },
      ],
      tools: [{
        type: 'function',
        function: { name: 'list_all_courses', description: 'List courses', parameters: { type: 'object', properties: {} } },
      }],
    });
    expect(response).toEqual({
      content: 'None.',
      toolCalls: [],
      stopReason: 'end_turn',
      usage: { inputTokens: 9, outputTokens: 2 },
    });
  });

  it('parses function calls and tolerates bad arguments', async () => {
    openaiCreate.mockResolvedValue({
      choices: [{
        message: {
          content: null,
          tool_calls: [
            { id: 'c1', type: 'function', function: { name: 'search_course_content', arguments: '{"query":"vectors"}' } },
            { id: 'c2', type: 'function', function: { name: 'search_course_content', arguments: 'not json' } },
          ],
        },
        finish_reason: 'tool_calls',
      }],
    });
    const provider = new OpenAICompatibleProvider({ apiKey: 'test-key' });

    const response = await provider.chat([{ role: 'user', content: 'q' }], [LIST_TOOL]);

    expect(response).toEqual({
      content: '',
      toolCalls: [
        { id: 'c1', name: 'search_course_content', input: { query: 'vectors' } },
        { id: 'c2', name: 'search_course_content', input: {} },
      ],
      stopReason: 'tool_use',
    });
  });

  it('uses max_completion_tokens for newer models', async () => {
    openaiCreate.mockResolvedValue({ choices: [{ message: { content: 'ok' }, finish_reason: 'stop' }] });
    const provider = new OpenAICompatibleProvider({ apiKey: 'test-key', model: 'gpt-5-mini' });

    await provider.chat([{ role: 'user', content: 'q' }]);

    const request = openaiCreate.mock.calls[0][0];
    expect(request).toMatchObject({ max_completion_tokens: 800 });
    expect(request).not.toHaveProperty('max_tokens');
    expect(request).not.toHaveProperty('tools');
  });
});

describe('createOllamaProvider', () => {
  it('points at the OpenAI-compatible endpoint', () => {
    const provider = createOllamaProvider('llama3.1', 'http://localhost:11434/');

    expect(provider.getName()).toBe('Ollama');
    expect(provider.getModel()).toBe('llama3.1');
    expect(OpenAI).toHaveBeenLastCalledWith(expect.objectContaining({ baseURL: 'http://localhost:11434/v1' }));
  });
});

describe('Provider Factory', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('lists built-in provider types', () => {
    expect(getProviderTypes()).toEqual(['anthropic', 'openai', 'ollama', 'mock']);
  });

  it('creates providers by type', () => {
    expect(createProvider({ type: 'anthropic', apiKey: 'test-key' })).toBeInstanceOf(AnthropicProvider);
    expect(createProvider({ type: 'openai', apiKey: 'test-key' }).getName()).toBe('OpenAI');
    expect(createProvider({ type: 'ollama' }).getName()).toBe('Ollama');
    expect(createProvider({ type: 'mock', model: 'fake' }).getModel()).toBe('fake');
    expect(createProvider({ type: 'mock' })).toBeInstanceOf(MockProvider);
  });

  it('rejects unknown types', () => {
    expect(() => createProvider({ type: 'nope' })).toThrow(
      'Unknown provider type: nope. Available: anthropic, openai, ollama, mock'
    );
  });

  it('detects the provider from API keys', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-key');
    expect(createProvider({ type: 'auto' }).getName()).toBe('Anthropic');

    vi.stubEnv('ANTHROPIC_API_KEY', '');
    vi.stubEnv('OPENAI_API_KEY', 'test-key');
    expect(createProvider({ type: 'auto' }).getName()).toBe('OpenAI');

    vi.stubEnv('OPENAI_API_KEY', '');
    expect(createProvider({ type: 'auto' }).getName()).toBe('Ollama');
  });
});

describe('response parsing', () => {
  it('maps stop reasons', () => {
    expect(mapStopReason('stop', false)).toBe('end_turn');
    expect(mapStopReason('length', false)).toBe('max_tokens');
    expect(mapStopReason('tool_calls', false)).toBe('tool_use');
    expect(mapStopReason(null, true)).toBe('tool_use');
  });

  it('parses only JSON objects', () => {
    expect(safeParseJson('{"a":1}')).toEqual({ a: 1 });
    expect(safeParseJson('[1,2]')).toEqual({});
    expect(safeParseJson('')).toEqual({});
    expect(safeParseJson('{')).toEqual({});
  });
});
