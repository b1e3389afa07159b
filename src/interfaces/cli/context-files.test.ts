import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadContextFiles } from './context-files.js';

describe('loadContextFiles', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'kiln-context-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('joins readable files in order and skips the rest', async () => {
    await writeFile(join(dir, 'a.md'), 'first');
    await writeFile(join(dir, 'b.md'), 'second');
    const missing = join(dir, 'missing.md');

    const context = await loadContextFiles([join(dir, 'a.md'), missing, join(dir, 'b.md')]);

    expect(context.content).toBe('first\nsecond');
    expect(context.loaded).toEqual([join(dir, 'a.md'), join(dir, 'b.md')]);
    expect(context.skipped.map(entry => entry.path)).toEqual([missing]);
  });

  it('returns empty content when no files are given', async () => {
    expect(await loadContextFiles([])).toEqual({ content: '', loaded: [], skipped: [] });
  });
});
