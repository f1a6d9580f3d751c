import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { EntryParser, UNKNOWN_DATE_KEY, extractHashtags, groupEntriesByDate } from './parser.js';

const day = (iso: string): Date => new Date(`${iso}T00:00:00.000Z`);

describe('extractHashtags', () => {
  it('should collect word hashtags without the #', () => {
    expect(extractHashtags('#work and #work-items, issue #2024')).toEqual(new Set(['work', '2024']));
  });

  it('should keep accented and non-Latin letters in hashtags', () => {
    expect(extractHashtags('Notes #réunion and #café, then #会議')).toEqual(new Set(['réunion', 'café', '会議']));
  });

  it('should not treat markdown headings as hashtags', () => {
    expect(extractHashtags('# Heading\n## Sub heading')).toEqual(new Set());
  });
});

describe('EntryParser.parseNote', () => {
  const parser = new EntryParser({ targetHashtag: 'work' });

  it('should prefer front matter for title, date and tags', () => {
    const raw = '---\ntitle: Planning\ndate: 2024-01-16\ntags: [work]\n---\n# Heading\nBody text #meeting';
    const entry = parser.parseNote('/vault/2024-01-15.md', raw);

    expect(entry.title).toBe('Planning');
    expect(entry.date).toEqual(day('2024-01-16'));
    expect(entry.hashtags).toEqual(new Set(['meeting', 'work']));
    expect(entry.content).toBe('# Heading\nBody text #meeting');
    expect(entry.rawContent).toBe(raw);
  });

  it('should fall back to the first heading, then the file name', () => {
    expect(parser.parseNote('/vault/sync.md', '# Weekly sync\n\nTalked #work').title).toBe('Weekly sync');
    expect(parser.parseNote('/vault/2024-01-15 standup.md', 'Just text #work').title).toBe('2024-01-15 standup');
  });

  it('should date a note from its file name, then its body', () => {
    expect(parser.parseNote('/vault/2024-01-15 standup.md', 'text').date).toEqual(day('2024-01-15'));
    expect(parser.parseNote('/vault/meeting.md', 'Met on 1/20/2024 #work').date).toEqual(day('2024-01-20'));
    expect(parser.parseNote('/vault/idea.md', 'No date here').date).toBeNull();
  });

  it('should ignore a header date that does not parse', () => {
    expect(parser.parseNote('/vault/2024-01-15.md', '---\ndate: soon\n---\nx').date).toEqual(day('2024-01-15'));
  });

  it('should default to empty front matter', () => {
    expect(parser.parseNote('/vault/a.md', 'plain').frontmatter).toEqual({ tags: [] });
  });
});

describe('EntryParser.matches', () => {
  const ranged = new EntryParser({
    targetHashtag: '##work',
    startDate: day('2024-01-15'),
    endDate: new Date('2024-01-21T23:59:59.999Z'),
  });

  it('should strip leading # from the target', () => {
    expect(ranged.targetHashtag).toBe('work');
  });

  it('should require the hashtag and a date inside the range', () => {
    expect(ranged.matches(ranged.parseNote('/v/2024-01-21.md', '#work'))).toBe(true);
    expect(ranged.matches(ranged.parseNote('/v/2024-01-22.md', '#work'))).toBe(false);
    expect(ranged.matches(ranged.parseNote('/v/2024-01-16.md', '#personal'))).toBe(false);
  });

  it('should match a target hashtag with accented letters', () => {
    const parser = new EntryParser({ targetHashtag: '#réunion' });
    expect(parser.matches(parser.parseNote('/v/2024-01-15.md', 'Met the team #réunion'))).toBe(true);
  });

  it('should let undated entries through', () => {
    expect(ranged.matches(ranged.parseNote('/v/idea.md', '#work'))).toBe(true);
  });

  it('should skip the date check unless both bounds are set', () => {
    const openEnded = new EntryParser({ targetHashtag: 'work', startDate: day('2024-01-15') });
    expect(openEnded.matches(openEnded.parseNote('/v/2020-01-01.md', '#work'))).toBe(true);
  });
});

describe('EntryParser.parseFiles', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'tagdigest-parse-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should keep matching notes and skip unreadable files', async () => {
    const work = path.join(dir, '2024-01-15.md');
    const personal = path.join(dir, '2024-01-16.md');
    await writeFile(work, 'Kickoff #work');
    await writeFile(personal, 'Lunch #personal');

    const entries = await new EntryParser({ targetHashtag: 'work' }).parseFiles([
      work,
      path.join(dir, 'missing.md'),
      personal,
    ]);

    expect(entries.map((e) => e.filePath)).toEqual([work]);
  });
});

describe('groupEntriesByDate', () => {
  it('should key entries by day with undated ones under unknown', () => {
    const parser = new EntryParser({ targetHashtag: 'work' });
    const a = parser.parseNote('/v/2024-01-15 a.md', '#work');
    const b = parser.parseNote('/v/idea.md', '#work');
    const c = parser.parseNote('/v/2024-01-15 c.md', '#work');

    const grouped = groupEntriesByDate([a, b, c]);

    expect([...grouped.keys()]).toEqual(['2024-01-15', UNKNOWN_DATE_KEY]);
    expect(grouped.get('2024-01-15')).toEqual([a, c]);
    expect(grouped.get(UNKNOWN_DATE_KEY)).toEqual([b]);
  });
});
