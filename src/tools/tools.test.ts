import { mkdir, mkdtemp, readdir, rm, symlink, writeFile as fsWriteFile, readFile as fsReadFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { hashContent } from '../core/environment.js';
import { ErrorKind, type OperationResult } from '../core/types/operation-result.js';
import { createTempWorkspace, type TempWorkspace } from '../core/test-helpers/scripted-backend.js';
import type { ParsedCommand } from './command-parser.js';
import { createTool, toToolCommand } from './registry.js';
import { verifyWrittenFile } from './verification.js';

describe('tools', () => {
  let temp: TempWorkspace;

  beforeEach(async () => {
    temp = await createTempWorkspace();
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  async function run(parsed: ParsedCommand, temperature?: number): Promise<OperationResult> {
    const resolution = toToolCommand(parsed);
    if (!resolution.ok) {
      return resolution.result;
    }
    return createTool(resolution.command).run({ workspace: temp.workspace, temperature });
  }

  it('writes a file, verifies it and reads it back', async () => {
    const written = await run({ operation: 'write_file', path: './hello.txt', content: 'Hello\n' }, 0.3);

    expect(written.success).toBe(true);
    expect(written.result).toBe('Successfully wrote to hello.txt');
    expect(written.verification?.passed).toBe(true);
    expect(written.rollback).toEqual([{ action: 'delete', path: 'hello.txt' }]);
    expect(written.affectedPaths).toEqual(['hello.txt']);
    expect(written.temperature).toEqual({ initial: 0.3, final: 0.3, adjustments: [] });

    const read = await run({ operation: 'read_file', path: 'hello.txt' });
    expect(read.success).toBe(true);
    expect(read.result).toBe('Hello');
  });

  it('warns on overwrite and offers the previous hash for rollback', async () => {
    await run({ operation: 'write_file', path: 'note.md', content: 'first' });
    const second = await run({ operation: 'write_file', path: 'note.md', content: 'second' });

    expect(second.warnings).toEqual(['Overwrote existing file note.md']);
    expect(second.rollback).toEqual([{ action: 'restore', path: 'note.md', previousHash: hashContent('first') }]);
  });

  it('keeps paths that try to escape inside the sandbox', async () => {
    const result = await run({ operation: 'write_file', path: '../../escape.txt', content: 'x' });

    expect(result.result).toBe('Successfully wrote to escape.txt');
    expect(await fsReadFile(join(temp.root, 'escape.txt'), 'utf-8')).toBe('x');
  });

  it('reports a missing file on read', async () => {
    const result = await run({ operation: 'read_file', path: 'missing.txt' });

    expect(result.success).toBe(false);
    expect(result.result).toBe('File missing.txt does not exist');
    expect(result.diagnostics.kind).toBe(ErrorKind.NotFound);
    expect(result.diagnostics.error).toBe('FileNotFoundError');
  });

  it('refuses to read a directory', async () => {
    await mkdir(join(temp.root, 'src'));
    const result = await run({ operation: 'read_file', path: 'src' });
    expect(result.diagnostics.kind).toBe(ErrorKind.IsDirectory);
  });

  it('fails a write whose parent is a regular file', async () => {
    await fsWriteFile(join(temp.root, 'a'), 'file');
    const result = await run({ operation: 'write_file', path: 'a/b.txt', content: 'x' });

    expect(result.success).toBe(false);
    expect(result.result.startsWith('Failed to write a/b.txt: ')).toBe(true);
  });

  it('deletes idempotently', async () => {
    await fsWriteFile(join(temp.root, 'old.txt'), 'bye');

    const first = await run({ operation: 'delete_file', path: 'old.txt' });
    expect(first.result).toBe('Successfully deleted old.txt');
    expect(first.rollback).toEqual([
      { action: 'recreate', path: 'old.txt', wasDirectory: false, previousHash: hashContent('bye') },
    ]);

    const second = await run({ operation: 'delete_file', path: 'old.txt' });
    expect(second.success).toBe(true);
    expect(second.result).toBe('old.txt is already absent');
  });

  it('refuses to delete the workspace root', async () => {
    const result = await run({ operation: 'delete_file', path: '../..' });
    expect(result.success).toBe(false);
    expect(result.diagnostics.kind).toBe(ErrorKind.PermissionDenied);
  });

  it('creates and lists directories', async () => {
    const created = await run({ operation: 'create_directory', path: 'pkg/sub' });
    expect(created.result).toBe('Successfully created directory pkg/sub');

    await run({ operation: 'write_file', path: 'pkg/index.ts', content: 'export {};' });
    const listed = await run({ operation: 'list_directory', path: 'pkg' });
    expect(listed.result).toBe('Contents of pkg:\n  - index.ts\n  - sub/');

    const empty = await run({ operation: 'list_directory', path: 'pkg/sub' });
    expect(empty.result).toBe('Contents of pkg/sub:\n  (empty directory)');
  });

  it('saves and loads JSON', async () => {
    const saved = await run({ operation: 'save_json', path: 'cfg.json', content: '\n  {"a": [1, 2]}\n' });
    expect(saved.result).toBe('Successfully saved JSON to cfg.json');
    expect(saved.verification?.checks).toEqual({ exists: true, parses: true, structureMatches: true });

    const loaded = await run({ operation: 'load_json', path: 'cfg.json' });
    expect(loaded.data).toEqual({ a: [1, 2] });
    expect(loaded.result).toBe('{\n  "a": [\n    1,\n    2\n  ]\n}');
  });

  it('verifies saved JSON against what the format can represent', async () => {
    const saved = await run({ operation: 'save_json', path: 'num.json', content: '{"x": -0, "big": 1e400}' });
    expect(saved.success).toBe(true);
    expect(saved.verification?.checks).toEqual({ exists: true, parses: true, structureMatches: true });

    const loaded = await run({ operation: 'load_json', path: 'num.json' });
    expect(loaded.data).toEqual({ x: 0, big: null });
  });

  it('refuses paths that lead out of the workspace through a symbolic link', async () => {
    const outside = await mkdtemp(join(tmpdir(), 'kiln-outside-'));
    try {
      await fsWriteFile(join(outside, 'secret.txt'), 'secret\n');
      await symlink(outside, join(temp.root, 'out'), 'dir');

      const read = await run({ operation: 'read_file', path: 'out/secret.txt' });
      expect(read.success).toBe(false);
      expect(read.result).toBe('Path out/secret.txt resolves outside the workspace');
      expect(read.diagnostics.kind).toBe(ErrorKind.PermissionDenied);

      const write = await run({ operation: 'write_file', path: 'out/new.txt', content: 'x' });
      expect(write.success).toBe(false);
      expect(write.diagnostics.kind).toBe(ErrorKind.PermissionDenied);
      expect(await readdir(outside)).toEqual(['secret.txt']);
    } finally {
      await rm(outside, { recursive: true, force: true });
    }
  });

  it('rejects invalid JSON before touching the disk', async () => {
    const result = await run({ operation: 'save_json', path: 'bad.json', content: '{oops' });
    expect(result.success).toBe(false);
    expect(result.diagnostics.kind).toBe(ErrorKind.InvalidJson);
  });

  it('returns a failure for unsupported operations', async () => {
    const result = await run({ operation: 'rename_file', path: 'a.txt' });

    expect(result.success).toBe(false);
    expect(result.result).toBe('Unsupported operation: rename_file');
    expect(result.diagnostics.kind).toBe(ErrorKind.UnsupportedOperation);
  });
});

describe('verifyWrittenFile', () => {
  let temp: TempWorkspace;

  beforeEach(async () => {
    temp = await createTempWorkspace();
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('names the first failed check', async () => {
    const target = join(temp.root, 'f.txt');
    await fsWriteFile(target, 'abc');

    expect(await verifyWrittenFile(target, 'abcd')).toEqual({
      passed: false,
      checks: { exists: true, isFile: true, sizeMatches: false, contentMatches: false },
      reason: 'File size differs from the written content',
    });
  });
});
