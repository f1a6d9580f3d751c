/**
 * Front matter parsing
 *
 * Reads the leading `---` YAML block of a note or summary into a typed
 * NoteFrontmatter. Keys other than title/date/hashtag/tags are dropped, and a
 * key with an unusable value is dropped on its own without failing the rest.
 */

import YAML from 'yaml';
import { z } from 'zod';

import type { NoteFrontmatter } from './types.js';

const FRONTMATTER_REGEX = /^---[ \t]*\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n|$)([\s\S]*)$/;

const scalarText = z
  .union([z.string(), z.number(), z.date()])
  .transform((v) => (v instanceof Date ? v.toISOString().slice(0, 10) : String(v)));

const FrontmatterSchema = z.object({
  title: scalarText.optional().catch(undefined),
  date: scalarText.optional().catch(undefined),
  hashtag: scalarText
    .transform((v) => v.replace(/^#/, ''))
    .optional()
    .catch(undefined),
  tags: z
    .union([z.array(scalarText), scalarText.transform((v) => v.split(','))])
    .transform((tags) => tags.map((t) => t.trim().replace(/^#/, '')).filter((t) => t.length > 0))
    .optional()
    .catch(undefined),
});

/**
 * Split a document into its raw header text and body. `header` is null when
 * the document does not open with a `---` line.
 */
export function splitFrontmatter(content: string): { header: string | null; body: string } {
  const match = content.match(FRONTMATTER_REGEX);
  if (!match) {
    return { header: null, body: content };
  }
  return { header: match[1], body: match[2] };
}

/**
 * Parse the front matter of `content`.
 *
 * Returns `frontmatter: null` when there is no header or the header is not a
 * YAML mapping; `body` is the content after the header either way.
 */
export function parseFrontmatter(content: string): {
  frontmatter: NoteFrontmatter | null;
  body: string;
} {
  const { header, body } = splitFrontmatter(content);
  if (header === null) {
    return { frontmatter: null, body };
  }

  let raw: unknown;
  try {
    raw = YAML.parse(header);
  } catch {
    // Malformed YAML: treat the note as having no header metadata
    return { frontmatter: null, body };
  }

  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    return { frontmatter: null, body };
  }

  const parsed = FrontmatterSchema.parse(raw);
  return {
    frontmatter: {
      title: parsed.title,
      date: parsed.date,
      hashtag: parsed.hashtag,
      tags: parsed.tags ?? [],
    },
    body,
  };
}

export function stringifyFrontmatter(data: Record<string, string | number>): string {
  return `---\n${YAML.stringify(data)}---\n`;
}
