/**
 * Inline Prompt Block
 *
 * The deployed agent has its own system instructions; this block rides
 * along with every query and carries the per-request material.
 */

import { truncate } from './context-builder.js';

/**
 * Instruction header placed at the top of every inline block.
 */
export const INSTRUCTION_HEADER = [
  'You are Policy Navigator. Answer from the retrieved context below when it is relevant.',
  'Extract EO numbers, signing dates, titles and quoted text directly from the context.',
  'Do not ask for documents that already appear in the context.',
  'Do not add a "Sources" heading; sources are appended separately.',
].join('\n');

export interface InlineBlockParts {
  history?: string;
  context?: string;
  header?: string;
}

/**
 * Header, history and context as one block, cut to `cap` characters.
 */
export function composeInlineBlock(parts: InlineBlockParts, cap: number): string {
  const sections = [parts.header ?? INSTRUCTION_HEADER];

  if (parts.history) {
    sections.push(`Conversation so far:\n${parts.history}`);
  }
  if (parts.context) {
    sections.push(`Retrieved context:\n${parts.context}`);
  }

  return truncate(sections.join('\n\n'), cap);
}

/**
 * Prepend the inline block to the user's query.
 */
export function composeAgentQuery(query: string, parts: InlineBlockParts, cap: number): string {
  return `${composeInlineBlock(parts, cap)}\n\n${query}`;
}
