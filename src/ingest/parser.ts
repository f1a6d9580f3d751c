/**
 * tagdigest - Note Parser
 *
 * Reads vault notes into JournalEntries and keeps the ones carrying the
 * target hashtag inside the reporting window.
 */

import { readFile } from 'fs/promises';
import path from 'path';

import { errorMessage } from '../core/errors.js';
import { parseFrontmatter } from '../core/frontmatter.js';
import { NullLogger, type Logger } from '../core/logger.js';
import { findDateIn, formatIsoDate, parseCalendarDate } from '../core/temporal.js';
import type { JournalEntry, NoteFrontmatter } from '../core/types.js';

const HASHTAG_PATTERN = /#([\p{L}\p{N}_]+)/gu;
const HEADING_PATTERN = /^#\s+(.+)$/m;

export const UNKNOWN_DATE_KEY = 'unknown';

export interface EntryParserOptions {
  targetHashtag: string;
  startDate?: Date | null;
  endDate?: Date | null;
  logger?: Logger;
}

export function extractHashtags(text: string): Set<string> {
  return new Set(Array.from(text.matchAll(HASHTAG_PATTERN), (m) => m[1]));
}

function extractTitle(filePath: string, frontmatter: NoteFrontmatter, body: string): string {
  if (frontmatter.title) return frontmatter.title;

  const heading = body.match(HEADING_PATTERN);
  if (heading) return heading[1].trim();

  return path.basename(filePath, path.extname(filePath));
}

function extractDate(filePath: string, frontmatter: NoteFrontmatter, body: string): Date | null {
  const fromHeader = frontmatter.date ? parseCalendarDate(frontmatter.date) : null;
  if (fromHeader) return fromHeader;

  return findDateIn(path.basename(filePath, path.extname(filePath))) ?? findDateIn(body);
}

export class EntryParser {
  readonly targetHashtag: string;
  private startDate: Date | null;
  private endDate: Date | null;
  private logger: Logger;

  constructor(options: EntryParserOptions) {
    this.targetHashtag = options.targetHashtag.replace(/^#+/, '');
    this.startDate = options.startDate ?? null;
    this.endDate = options.endDate ?? null;
    this.logger = options.logger ?? new NullLogger();
  }

  parseNote(filePath: string, raw: string): JournalEntry {
    const parsed = parseFrontmatter(raw);
    const frontmatter: NoteFrontmatter = parsed.frontmatter ?? { tags: [] };
    const body = parsed.body;

    const hashtags = extractHashtags(body);
    for (const tag of frontmatter.tags) {
      hashtags.add(tag);
    }

    return {
      filePath,
      title: extractTitle(filePath, frontmatter, body),
      content: body.trim(),
      date: extractDate(filePath, frontmatter, body),
      hashtags,
      frontmatter,
      rawContent: raw,
    };
  }

  /** Null when the file cannot be read. */
  async parseFile(filePath: string): Promise<JournalEntry | null> {
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf-8');
    } catch (error) {
      this.logger.warn(`Failed to read ${filePath}: ${errorMessage(error)}`);
      return null;
    }
    return this.parseNote(filePath, raw);
  }

  async parseFiles(filePaths: readonly string[]): Promise<JournalEntry[]> {
    const entries: JournalEntry[] = [];

    for (const filePath of filePaths) {
      const entry = await this.parseFile(filePath);
      if (entry && this.matches(entry)) {
        entries.push(entry);
        this.logger.debug(`Matched entry: ${filePath}`);
      }
    }

    this.logger.info(`Parsed ${entries.length} matching entries out of ${filePaths.length} files`);
    return entries;
  }

  /** Undated entries pass the date check. */
  matches(entry: JournalEntry): boolean {
    if (!entry.hashtags.has(this.targetHashtag)) return false;

    if (this.startDate && this.endDate && entry.date) {
      const time = entry.date.getTime();
      if (time < this.startDate.getTime() || time > this.endDate.getTime()) return false;
    }
    return true;
  }
}

/** Entries keyed by `YYYY-MM-DD`, undated ones under `unknown`. */
export function groupEntriesByDate(entries: readonly JournalEntry[]): Map<string, JournalEntry[]> {
  const grouped = new Map<string, JournalEntry[]>();
  for (const entry of entries) {
    const key = entry.date ? formatIsoDate(entry.date) : UNKNOWN_DATE_KEY;
    const group = grouped.get(key);
    if (group) {
      group.push(entry);
    } else {
      grouped.set(key, [entry]);
    }
  }
  return grouped;
}
