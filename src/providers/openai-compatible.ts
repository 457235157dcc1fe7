import OpenAI from 'openai';
import { BaseProvider } from './base.js';
import type { Message, ToolDefinition, ProviderResponse, ProviderConfig, ToolCall } from '../types.js';
import { createProviderResponse, safeParseJson } from './response-parser.js';
import { extractTextContent, flattenToolHistory } from './message-converter.js';
import { AGENT_CONFIG, DEFAULT_MODELS, RAG_DEFAULTS } from '../constants.js';

// Models that use max_completion_tokens instead of max_tokens
const COMPLETION_TOKEN_MODELS = ['gpt-5', 'o1', 'o3'];

/**
 * OpenAI-compatible provider that works with:
 * - OpenAI API
 * - Ollama (via OpenAI compatibility layer)
 * - Any other OpenAI-compatible server
 */
export class OpenAICompatibleProvider extends BaseProvider {
  private client: OpenAI;
  private model: string;
  private providerName: string;

  constructor(config: ProviderConfig & { providerName?: string } = {}) {
    super(config);
    this.client = new OpenAI({
      apiKey: config.apiKey || process.env.OPENAI_API_KEY || 'not-needed',
      baseURL: config.baseUrl,
    });
    this.model = config.model || DEFAULT_MODELS.openai;
    this.providerName = config.providerName || 'OpenAI';
  }

  private getTokenParams(): { max_tokens?: number; max_completion_tokens?: number } {
    const maxTokens = this.config.maxTokens ?? AGENT_CONFIG.MAX_OUTPUT_TOKENS;
    const usesCompletionTokens = COMPLETION_TOKEN_MODELS.some(m => this.model.startsWith(m));
    return usesCompletionTokens
      ? { max_completion_tokens: maxTokens }
      : { max_tokens: maxTokens };
  }

  async chat(messages: Message[], tools?: ToolDefinition[], systemPrompt?: string): Promise<ProviderResponse> {
    const hasTools = tools !== undefined && tools.length > 0;
    const history = hasTools ? messages : flattenToolHistory(messages);
    const convertedMessages = this.convertMessages(history);
    const messagesWithSystem: OpenAI.ChatCompletionMessageParam[] = systemPrompt
      ? [{ role: 'system', content: systemPrompt }, ...convertedMessages]
      : convertedMessages;

    const response = await this.client.chat.completions.create({
      model: this.model,
      ...this.getTokenParams(),
      temperature: this.config.temperature ?? AGENT_CONFIG.TEMPERATURE,
      messages: messagesWithSystem,
      ...(hasTools && { tools: this.convertTools(tools) }),
    });

    return this.parseResponse(response);
  }

  supportsToolUse(): boolean {
    return true;
  }

  getName(): string {
    return this.providerName;
  }

  getModel(): string {
    return this.model;
  }

  private convertMessages(messages: Message[]): OpenAI.ChatCompletionMessageParam[] {
    return messages.flatMap((msg): OpenAI.ChatCompletionMessageParam[] => {
      if (typeof msg.content === 'string') {
        return msg.role === 'assistant'
          ? [{ role: 'assistant', content: msg.content }]
          : [{ role: 'user', content: msg.content }];
      }

      // OpenAI requires all tool_calls in a single assistant message,
      // with the tool results immediately following it
      const toolCalls: OpenAI.ChatCompletionMessageToolCall[] = [];
      const toolResults: OpenAI.ChatCompletionToolMessageParam[] = [];
      const textContent = extractTextContent(msg);

      for (const block of msg.content) {
        if (block.type === 'tool_use' && msg.role === 'assistant') {
          toolCalls.push({
            id: block.id || '',
            type: 'function',
            function: {
              name: block.name || '',
              arguments: JSON.stringify(block.input || {}),
            },
          });
        } else if (block.type === 'tool_result') {
          toolResults.push({
            role: 'tool',
            tool_call_id: block.tool_use_id || '',
            content: block.content || '',
          });
        }
      }

      if (msg.role === 'assistant') {
        return [{
          role: 'assistant',
          content: textContent || null,
          ...(toolCalls.length > 0 && { tool_calls: toolCalls }),
        }];
      }

      const parts: OpenAI.ChatCompletionMessageParam[] = [...toolResults];
      if (textContent) {
        parts.push({ role: 'user', content: textContent });
      }
      return parts;
    });
  }

  private convertTools(tools: ToolDefinition[]): OpenAI.ChatCompletionTool[] {
    return tools.map((tool) => ({
      type: 'function' as const,
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.input_schema,
      },
    }));
  }

  private parseResponse(response: OpenAI.ChatCompletion): ProviderResponse {
    const message = response.choices[0]?.message;
    const content = message?.content || '';
    const toolCalls: ToolCall[] = [];

    for (const toolCall of message?.tool_calls ?? []) {
      toolCalls.push({
        id: toolCall.id,
        name: toolCall.function.name,
        input: safeParseJson(toolCall.function.arguments),
      });
    }

    return createProviderResponse({
      content,
      toolCalls,
      stopReason: response.choices[0]?.finish_reason,
      inputTokens: response.usage?.prompt_tokens,
      outputTokens: response.usage?.completion_tokens,
    });
  }
}

/**
 * Create a provider for Ollama (running locally)
 */
export function createOllamaProvider(
  model: string = DEFAULT_MODELS.ollama,
  baseUrl: string = RAG_DEFAULTS.OLLAMA_BASE_URL
): OpenAICompatibleProvider {
  return new OpenAICompatibleProvider({
    baseUrl: `${baseUrl.replace(/\/+$/, '')}/v1`,
    model,
    providerName: 'Ollama',
  });
}
