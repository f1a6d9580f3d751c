import { describe, expect, it } from 'vitest';

import { parseFrontmatter, splitFrontmatter, stringifyFrontmatter } from './frontmatter.js';

describe('parseFrontmatter', () => {
  it('should read title, date and tags', () => {
    const content = '---\ntitle: Standup\ndate: 2024-01-15\ntags: [work, "#meeting"]\n---\nBody text';

    expect(parseFrontmatter(content)).toEqual({
      frontmatter: { title: 'Standup', date: '2024-01-15', hashtag: undefined, tags: ['work', 'meeting'] },
      body: 'Body text',
    });
  });

  it('should split comma-separated tags', () => {
    const { frontmatter } = parseFrontmatter('---\ntags: work, meeting\n---\n');
    expect(frontmatter?.tags).toEqual(['work', 'meeting']);
  });

  it('should strip the # from a hashtag', () => {
    const { frontmatter } = parseFrontmatter('---\nhashtag: "#work"\n---\nx');
    expect(frontmatter?.hashtag).toBe('work');
  });

  it('should turn numeric scalars into text', () => {
    const { frontmatter } = parseFrontmatter('---\ntitle: 2024\n---\nx');
    expect(frontmatter?.title).toBe('2024');
  });

  it('should drop a field with an unusable value and keep the rest', () => {
    const { frontmatter } = parseFrontmatter('---\ntitle:\n  nested: 1\ndate: 2024-01-15\n---\nx');
    expect(frontmatter).toEqual({ title: undefined, date: '2024-01-15', hashtag: undefined, tags: [] });
  });

  it('should return null metadata for malformed YAML', () => {
    expect(parseFrontmatter('---\ntitle: [unclosed\n---\nBody')).toEqual({ frontmatter: null, body: 'Body' });
  });

  it('should return null metadata when the header is not a mapping', () => {
    expect(parseFrontmatter('---\n- a\n- b\n---\nBody').frontmatter).toBeNull();
  });

  it('should leave content without a header alone', () => {
    expect(parseFrontmatter('# Title\n\nBody')).toEqual({ frontmatter: null, body: '# Title\n\nBody' });
  });
});

describe('splitFrontmatter', () => {
  it('should not treat a later horizontal rule as a header', () => {
    expect(splitFrontmatter('Intro\n---\nMore').header).toBeNull();
  });

  it('should accept CRLF line endings', () => {
    expect(splitFrontmatter('---\r\ntitle: A\r\n---\r\nBody')).toEqual({ header: 'title: A', body: 'Body' });
  });
});

describe('stringifyFrontmatter', () => {
  it('should wrap YAML in --- lines', () => {
    expect(stringifyFrontmatter({ title: 'A', batch_count: 2 })).toBe('---\ntitle: A\nbatch_count: 2\n---\n');
  });
});
