import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { VaultError } from '../core/errors.js';
import { isExcludedFilename, scanVault, validateVault } from './scanner.js';

async function touch(root: string, relative: string, content = '# note\n'): Promise<void> {
  const filePath = path.join(root, relative);
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, content);
}

describe('scanVault', () => {
  let tmp: string;
  let vault: string;

  beforeEach(async () => {
    tmp = await mkdtemp(path.join(os.tmpdir(), 'tagdigest-scan-'));
    vault = path.join(tmp, 'vault');
    await touch(vault, '.obsidian/workspace.md');
    await touch(vault, 'Daily/2024-01-15.md');
    await touch(vault, 'Daily/~draft.md');
    await touch(vault, 'Daily/.#lock.md');
    await touch(vault, 'notes.md');
    await touch(vault, 'Templates/daily.md');
    await touch(vault, 'Summaries/Week-2024-01-08-work.md');
    await touch(vault, 'attachments.txt', 'not markdown');
  });

  afterEach(async () => {
    await rm(tmp, { recursive: true, force: true });
  });

  it('should skip excluded directories and scratch files', async () => {
    const result = await scanVault(vault);

    expect(result.vaultPath).toBe(vault);
    expect(result.markdownFiles).toEqual([path.join(vault, 'Daily', '2024-01-15.md'), path.join(vault, 'notes.md')]);
    expect(result.totalFiles).toBe(7);
    expect(result.excludedDirs).toContain('Templates');
  });

  it('should stay at the top level when not recursive', async () => {
    const result = await scanVault(vault, { recursive: false });

    expect(result.markdownFiles).toEqual([path.join(vault, 'notes.md')]);
    expect(result.totalFiles).toBe(1);
  });

  it('should add extra excluded directories to the defaults', async () => {
    const result = await scanVault(vault, { excludeDirs: ['Daily'] });

    expect(result.markdownFiles).toEqual([path.join(vault, 'notes.md')]);
  });

  it('should only match excluded names below the vault root', async () => {
    const nested = path.join(tmp, 'Templates', 'vault');
    await touch(nested, 'note.md');

    const result = await scanVault(nested);

    expect(result.markdownFiles).toEqual([path.join(nested, 'note.md')]);
  });

  it('should reject a missing path or a file', async () => {
    await expect(scanVault(path.join(tmp, 'missing'))).rejects.toThrow(VaultError);
    await expect(scanVault(path.join(vault, 'notes.md'))).rejects.toThrow(/not a directory/);
  });
});

describe('validateVault', () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await mkdtemp(path.join(os.tmpdir(), 'tagdigest-validate-'));
  });

  afterEach(async () => {
    await rm(tmp, { recursive: true, force: true });
  });

  it('should require a settings directory and at least one note', async () => {
    expect(await validateVault(tmp)).toBe(false);

    await mkdir(path.join(tmp, '.obsidian'));
    expect(await validateVault(tmp)).toBe(false);

    await touch(tmp, 'note.md');
    expect(await validateVault(tmp)).toBe(true);
  });
});

describe('isExcludedFilename', () => {
  it('should match editor scratch and backup names', () => {
    expect(isExcludedFilename('~note.md')).toBe(true);
    expect(isExcludedFilename('.#note.md')).toBe(true);
    expect(isExcludedFilename('note.md.swp')).toBe(true);
    expect(isExcludedFilename('note.md')).toBe(false);
  });
});
