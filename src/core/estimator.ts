/**
 * Token estimation for batching.
 *
 * Rough on purpose: ~4 characters per token for English prose, plus a fixed
 * allowance per entry for the date/title lines and separators the prompt adds.
 */

import type { NoteItem } from './types.js';

export const CHARS_PER_TOKEN = 4;
export const ENTRY_OVERHEAD_TOKENS = 50;

export function estimateTokens(text: string): number {
  return Math.floor(text.length / CHARS_PER_TOKEN);
}

export function estimateItemTokens(item: NoteItem): number {
  const text = `${item.title ?? ''}\n${item.content}`;
  return estimateTokens(text) + ENTRY_OVERHEAD_TOKENS;
}
