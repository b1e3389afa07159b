import { sep } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { WorkspaceError } from '../utils/errors.js';
import { WorkspaceManager, normalizeSegments } from './workspace.js';
import { createTempWorkspace, type TempWorkspace } from './test-helpers/scripted-backend.js';

describe('normalizeSegments', () => {
  it('drops dots and pops on parent references', () => {
    expect(normalizeSegments('./a/./b/../c')).toEqual(['a', 'c']);
  });

  it('ignores parent references above the root', () => {
    expect(normalizeSegments('../../etc/passwd')).toEqual(['etc', 'passwd']);
  });

  it('treats absolute paths and backslashes as relative segments', () => {
    expect(normalizeSegments('/tmp/x')).toEqual(['tmp', 'x']);
    expect(normalizeSegments('a\\b\\c')).toEqual(['a', 'b', 'c']);
  });
});

describe('WorkspaceManager', () => {
  let temp: TempWorkspace;

  beforeEach(async () => {
    temp = await createTempWorkspace();
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('keeps every resolved path inside the root', () => {
    const requests = ['../../outside', '/etc/passwd', 'a/../../..', '..\\..\\x', 'a/b/../../../c', '', '.'];
    for (const request of requests) {
      const resolved = temp.workspace.resolvePath(request);
      expect(temp.workspace.contains(resolved)).toBe(true);
    }
  });

  it('resolves the empty path and "." to the root', () => {
    expect(temp.workspace.isRoot(temp.workspace.resolvePath(''))).toBe(true);
    expect(temp.workspace.relativePath(temp.workspace.resolvePath('.'))).toBe('.');
  });

  it('gives sandbox-relative paths with forward slashes', () => {
    const resolved = temp.workspace.resolvePath('./src/app/main.ts');
    expect(resolved).toBe([temp.workspace.getWorkspaceDir(), 'src', 'app', 'main.ts'].join(sep));
    expect(temp.workspace.relativePath(resolved)).toBe('src/app/main.ts');
  });

  it('fails to initialize a missing directory unless asked to create it', async () => {
    const missing = temp.workspace.resolvePath('not-there');
    await expect(new WorkspaceManager({ workspaceDir: missing }).initialize()).rejects.toBeInstanceOf(WorkspaceError);

    const created = new WorkspaceManager({ workspaceDir: missing, create: true });
    await expect(created.initialize()).resolves.toBeUndefined();
  });
});
