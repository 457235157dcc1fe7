// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Shared message conversion utilities for providers.
 *
 * Providers use these helpers instead of their own inline block handling,
 * so every provider renders tool turns the same way.
 */

import type { Message, ContentBlock } from '../types.js';

/**
 * Convert a content block to plain text representation.
 *
 * - text: the text content
 * - tool_result: "[Result from toolName]:\ncontent" or "[ERROR from toolName]:\ncontent"
 * - tool_use: "[Calling toolName]: {input}"
 */
export function blockToText(block: ContentBlock): string {
  switch (block.type) {
    case 'text':
      return block.text || '';

    case 'tool_result': {
      const prefix = block.is_error ? 'ERROR' : 'Result';
      const toolName = block.name || 'tool';
      return `[${prefix} from ${toolName}]:\n${block.content || ''}`;
    }

    case 'tool_use': {
      const toolName = block.name || 'tool';
      return `[Calling ${toolName}]: ${JSON.stringify(block.input || {})}`;
    }

    default: {
      const unknownType: never = block.type;
      throw new Error(`Unknown content block type: ${String(unknownType)}`);
    }
  }
}

/**
 * Convert an entire message to plain text.
 */
export function messageToText(message: Message): string {
  if (typeof message.content === 'string') {
    return message.content;
  }

  return message.content
    .map(blockToText)
    .filter(Boolean)
    .join('\n\n');
}

/**
 * Rewrite tool_use and tool_result blocks as text. Used when a request is
 * sent without tools, since APIs reject tool blocks in that case.
 */
export function flattenToolHistory(messages: Message[]): Message[] {
  return messages.map((message) =>
    typeof message.content === 'string'
      ? message
      : { role: message.role, content: messageToText(message) }
  );
}

/**
 * Extract text content from a message, ignoring tool blocks.
 */
export function extractTextContent(message: Message): string {
  if (typeof message.content === 'string') {
    return message.content;
  }
  return message.content
    .filter((block) => block.type === 'text')
    .map((block) => block.text || '')
    .join('');
}

/**
 * Block converter interface for provider-specific block conversion.
 */
export interface BlockConverters<T> {
  text: (block: ContentBlock) => T;
  tool_use: (block: ContentBlock) => T;
  tool_result: (block: ContentBlock) => T;
}

/**
 * Map content blocks using provider-specific converters.
 *
 * @example
 * const anthropicBlocks = mapContentBlocks(blocks, {
 *   text: (b) => ({ type: 'text', text: b.text || '' }),
 *   tool_use: (b) => ({ type: 'tool_use', id: b.id, name: b.name, input: b.input }),
 *   tool_result: (b) => ({ type: 'tool_result', tool_use_id: b.tool_use_id, content: b.content }),
 * });
 */
export function mapContentBlocks<T>(
  blocks: ContentBlock[],
  converters: BlockConverters<T>
): T[] {
  return blocks.map((block) => converters[block.type](block));
}
