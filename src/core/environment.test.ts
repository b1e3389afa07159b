import { mkdir, mkdtemp, rm, symlink, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { EnvironmentState, captureFileState, hashContent } from './environment.js';
import { ErrorKind, failed, succeeded } from './types/operation-result.js';
import { createTempWorkspace, type TempWorkspace } from './test-helpers/scripted-backend.js';

describe('captureFileState', () => {
  let temp: TempWorkspace;

  beforeEach(async () => {
    temp = await createTempWorkspace();
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('records size, hash and permission bits of a file', async () => {
    const file = join(temp.root, 'note.txt');
    await writeFile(file, 'hello', { mode: 0o640 });

    const state = await captureFileState(file, 'note.txt');
    expect(state.exists).toBe(true);
    expect(state.isDirectory).toBe(false);
    expect(state.size).toBe(5);
    expect(state.contentHash).toBe(hashContent('hello'));
    expect(state.path).toBe('note.txt');
    expect(state.permissions).toMatch(/^[0-7]{3}$/);
  });

  it('reports a missing path as absent instead of rejecting', async () => {
    const state = await captureFileState(join(temp.root, 'nope'), 'nope');
    expect(state).toMatchObject({ path: 'nope', exists: false, size: 0, contentHash: '', isDirectory: false });
    expect(state.lastModified.getTime()).toBe(0);
  });

  it('leaves the hash empty for directories', async () => {
    await mkdir(join(temp.root, 'dir'));
    const state = await captureFileState(join(temp.root, 'dir'), 'dir');
    expect(state.isDirectory).toBe(true);
    expect(state.contentHash).toBe('');
  });
});

describe('EnvironmentState', () => {
  let temp: TempWorkspace;
  let env: EnvironmentState;

  beforeEach(async () => {
    temp = await createTempWorkspace();
    env = new EnvironmentState(temp.workspace);
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('walks nested directories and keys entries by relative path', async () => {
    await mkdir(join(temp.root, 'src', 'lib'), { recursive: true });
    await writeFile(join(temp.root, 'src', 'lib', 'util.ts'), 'export {};');

    const files = await env.captureAll();
    expect([...files.keys()].sort()).toEqual(['src', 'src/lib', 'src/lib/util.ts']);
    expect(env.getFile('src/lib/util.ts')?.size).toBe(10);
  });

  it('marks entries deleted since the last capture as absent', async () => {
    await writeFile(join(temp.root, 'gone.txt'), 'x');
    await env.captureAll();
    await rm(join(temp.root, 'gone.txt'));

    await env.captureAll();
    expect(env.getFile('gone.txt')?.exists).toBe(false);

    await env.captureAll();
    expect(env.getFile('gone.txt')).toBeUndefined();
  });

  it('does not record or follow symbolic links', async () => {
    const outside = await mkdtemp(join(tmpdir(), 'kiln-outside-'));
    try {
      await writeFile(join(outside, 'secret.txt'), 'secret\n');
      await symlink(outside, join(temp.root, 'out'), 'dir');
      await writeFile(join(temp.root, 'inside.txt'), 'ok');

      const files = await env.captureAll();
      expect([...files.keys()]).toEqual(['inside.txt']);
    } finally {
      await rm(outside, { recursive: true, force: true });
    }
  });

  it('keeps only the 20 most recent operations', () => {
    for (let i = 0; i < 25; i++) {
      env.recordOperation(`op${i}`, succeeded('ok'));
    }
    const recent = env.getRecentOperations();
    expect(recent).toHaveLength(20);
    expect(recent[0].operation).toBe('op5');
    expect(env.getRecentOperations(2).map(op => op.operation)).toEqual(['op23', 'op24']);
  });

  it('derives suggestions from successful directories and repeated errors', () => {
    env.recordOperation('write_file', succeeded('ok', { affectedPaths: ['src/a.ts'] }));
    env.recordOperation('write_file', succeeded('ok', { affectedPaths: ['src/b.ts'] }));
    env.recordOperation('read_file', failed('missing', ErrorKind.NotFound, 'FileNotFoundError'));
    env.recordOperation('read_file', failed('missing', ErrorKind.NotFound, 'FileNotFoundError'));

    const stats = env.getStats();
    expect(stats.successCount).toBe(2);
    expect(stats.failureCount).toBe(2);
    expect(stats.successfulPatterns.get('write_file\u0000src')?.count).toBe(2);
    expect(env.suggestions()).toEqual([
      'Consider using these directories: src',
      'Watch out for not_found errors, seen 2 times',
    ]);
  });

  it('serialises to plain JSON', async () => {
    await writeFile(join(temp.root, 'a.txt'), 'abc');
    await env.captureAll();
    env.recordOperation('write_file', succeeded('ok', { affectedPaths: ['a.txt'] }), new Date(0));

    const json = env.toJSON();
    expect(json.files['a.txt'].size).toBe(3);
    expect(json.recentOperations[0].timestamp).toBe('1970-01-01T00:00:00.000Z');
    expect(json.stats.successfulPatterns).toEqual([{ operation: 'write_file', directory: '.', count: 1 }]);
  });
});
