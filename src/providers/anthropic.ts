import Anthropic from '@anthropic-ai/sdk';
import { BaseProvider } from './base.js';
import type { Message, ToolDefinition, ProviderResponse, ProviderConfig, ToolCall } from '../types.js';
import { createProviderResponse, toToolInput } from './response-parser.js';
import { flattenToolHistory, mapContentBlocks } from './message-converter.js';
import { AGENT_CONFIG, DEFAULT_MODELS } from '../constants.js';

type AnthropicBlockParam =
  | Anthropic.TextBlockParam
  | Anthropic.ToolUseBlockParam
  | Anthropic.ToolResultBlockParam;

export class AnthropicProvider extends BaseProvider {
  private client: Anthropic;
  private model: string;

  constructor(config: ProviderConfig = {}) {
    super(config);
    this.client = new Anthropic({
      apiKey: config.apiKey || process.env.ANTHROPIC_API_KEY,
      ...(config.baseUrl && { baseURL: config.baseUrl }),
    });
    this.model = config.model || DEFAULT_MODELS.anthropic;
  }

  async chat(messages: Message[], tools?: ToolDefinition[], systemPrompt?: string): Promise<ProviderResponse> {
    const hasTools = tools !== undefined && tools.length > 0;
    // The API rejects tool blocks in a request that declares no tools
    const history = hasTools ? messages : flattenToolHistory(messages);

    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.config.maxTokens ?? AGENT_CONFIG.MAX_OUTPUT_TOKENS,
      temperature: this.config.temperature ?? AGENT_CONFIG.TEMPERATURE,
      ...(systemPrompt && { system: systemPrompt }),
      messages: this.convertMessages(history),
      ...(hasTools && {
        tools: this.convertTools(tools),
        tool_choice: { type: 'auto' as const },
      }),
    });

    return this.parseResponse(response);
  }

  supportsToolUse(): boolean {
    return true;
  }

  getName(): string {
    return 'Anthropic';
  }

  getModel(): string {
    return this.model;
  }

  private convertTools(tools: ToolDefinition[]): Anthropic.Tool[] {
    return tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      input_schema: tool.input_schema,
    }));
  }

  private convertMessages(messages: Message[]): Anthropic.MessageParam[] {
    return messages.map((msg): Anthropic.MessageParam => {
      if (typeof msg.content === 'string') {
        return { role: msg.role, content: msg.content };
      }

      const content = mapContentBlocks<AnthropicBlockParam>(msg.content, {
        text: (block) => ({ type: 'text', text: block.text || '' }),
        tool_use: (block) => ({
          type: 'tool_use',
          id: block.id || '',
          name: block.name || '',
          input: block.input || {},
        }),
        tool_result: (block) => ({
          type: 'tool_result',
          tool_use_id: block.tool_use_id || '',
          content: block.content || '',
          is_error: block.is_error || false,
        }),
      });

      return { role: msg.role, content };
    });
  }

  private parseResponse(response: Anthropic.Message): ProviderResponse {
    let content = '';
    const toolCalls: ToolCall[] = [];

    for (const block of response.content) {
      if (block.type === 'text') {
        content += block.text;
      } else if (block.type === 'tool_use') {
        toolCalls.push({
          id: block.id,
          name: block.name,
          input: toToolInput(block.input),
        });
      }
    }

    return createProviderResponse({
      content,
      toolCalls,
      stopReason: response.stop_reason,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    });
  }
}
