import { mkdir, utimes, writeFile } from 'fs/promises';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { EnvironmentState } from './environment.js';
import { EMPTY_WORKSPACE, isIgnoredPath, renderWorkspaceSummary } from './workspace-summary.js';
import { succeeded } from './types/operation-result.js';
import { createTempWorkspace, type TempWorkspace } from './test-helpers/scripted-backend.js';

describe('isIgnoredPath', () => {
  it('matches ignored segments anywhere in the path', () => {
    expect(isIgnoredPath('node_modules/chalk/index.js')).toBe(true);
    expect(isIgnoredPath('app/.git/HEAD')).toBe(true);
    expect(isIgnoredPath('build/main.o')).toBe(true);
    expect(isIgnoredPath('src/environment.ts')).toBe(false);
  });
});

describe('renderWorkspaceSummary', () => {
  let temp: TempWorkspace;
  let env: EnvironmentState;

  beforeEach(async () => {
    temp = await createTempWorkspace();
    env = new EnvironmentState(temp.workspace);
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('renders an empty sandbox as a single line', async () => {
    await env.captureAll();
    expect(renderWorkspaceSummary(env)).toBe(EMPTY_WORKSPACE);
  });

  it('separates recent files from a capped list of older ones', async () => {
    const now = new Date();
    const old = new Date(now.getTime() - 2 * 60 * 60 * 1000);

    await writeFile(join(temp.root, 'fresh.txt'), 'new');
    for (let i = 1; i <= 7; i++) {
      const file = join(temp.root, `old${i}.txt`);
      await writeFile(file, 'old');
      await utimes(file, old, old);
    }
    await mkdir(join(temp.root, 'node_modules'));
    await writeFile(join(temp.root, 'node_modules', 'dep.js'), '');

    await env.captureAll();
    env.recordOperation('write_file', succeeded('ok', { affectedPaths: ['fresh.txt'] }));

    expect(renderWorkspaceSummary(env, now)).toBe(
      [
        'Workspace State:',
        'Active Files (Last 30 min):',
        '  - fresh.txt',
        '',
        'Recent Operations:',
        '  - write_file',
        '',
        'Other Workspace Files:',
        '  - old1.txt',
        '  - old2.txt',
        '  - old3.txt',
        '  - old4.txt',
        '  - old5.txt',
        '  ... +2 more',
      ].join('\n')
    );
  });

  it('shows directories with a trailing slash and only the last three operations', async () => {
    await mkdir(join(temp.root, 'src'));
    await env.captureAll();
    for (const op of ['read_file', 'write_file', 'list_directory', 'delete_file']) {
      env.recordOperation(op, succeeded('ok'));
    }

    expect(renderWorkspaceSummary(env)).toBe(
      [
        'Workspace State:',
        'Active Files (Last 30 min):',
        '  - src/',
        '',
        'Recent Operations:',
        '  - write_file',
        '  - list_directory',
        '  - delete_file',
      ].join('\n')
    );
  });
});
