/**
 * File-system primitives
 *
 * Thin wrappers over fs/promises that report failure as a value carrying
 * an ErrorKind instead of rejecting.
 */

import { mkdir, readFile as fsReadFile, readdir, rm, stat, writeFile as fsWriteFile } from 'fs/promises';
import { dirname } from 'path';
import { ErrorKind } from '../core/types/operation-result.js';

export type FsResult<T> = { ok: true; value: T } | { ok: false; kind: ErrorKind; message: string };

export interface DirectoryEntry {
  name: string;
  isDirectory: boolean;
}

const ERRNO_KINDS: Record<string, ErrorKind> = {
  ENOENT: ErrorKind.NotFound,
  EACCES: ErrorKind.PermissionDenied,
  EPERM: ErrorKind.PermissionDenied,
  EROFS: ErrorKind.PermissionDenied,
  EISDIR: ErrorKind.IsDirectory,
  ENOTDIR: ErrorKind.NotADirectory,
  EEXIST: ErrorKind.AlreadyExists,
};

export function classifyError(error: unknown): ErrorKind {
  if (error instanceof SyntaxError) {
    return ErrorKind.InvalidJson;
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return ERRNO_KINDS[error.code] ?? ErrorKind.Io;
  }
  return ErrorKind.Unknown;
}

async function attempt<T>(run: () => Promise<T>): Promise<FsResult<T>> {
  try {
    return { ok: true, value: await run() };
  } catch (error) {
    return {
      ok: false,
      kind: classifyError(error),
      message: error instanceof Error ? error.message : String(error),
    };
  }
}

/** Write text, creating parent directories as needed. */
export function writeFile(path: string, content: string): Promise<FsResult<void>> {
  return attempt(async () => {
    await mkdir(dirname(path), { recursive: true });
    await fsWriteFile(path, content, 'utf-8');
  });
}

export function readFile(path: string): Promise<FsResult<string>> {
  return attempt(() => fsReadFile(path, 'utf-8'));
}

export function createDirectory(path: string): Promise<FsResult<void>> {
  return attempt(async () => {
    await mkdir(path, { recursive: true });
  });
}

/**
 * Remove a file or a directory tree. Removing something that is already
 * gone succeeds and reports `removed: false`.
 */
export function deletePath(path: string): Promise<FsResult<{ removed: boolean }>> {
  return attempt(async () => {
    try {
      await stat(path);
    } catch (error) {
      if (classifyError(error) === ErrorKind.NotFound) {
        return { removed: false };
      }
      throw error;
    }
    await rm(path, { recursive: true, force: true });
    return { removed: true };
  });
}

export function listDirectory(path: string): Promise<FsResult<DirectoryEntry[]>> {
  return attempt(async () => {
    const entries = await readdir(path, { withFileTypes: true });
    return entries
      .map(entry => ({ name: entry.name, isDirectory: entry.isDirectory() }))
      .sort((a, b) => a.name.localeCompare(b.name));
  });
}

export function saveStructured(path: string, data: unknown): Promise<FsResult<string>> {
  return attempt(async () => {
    const text = JSON.stringify(data, null, 2);
    if (text === undefined) {
      throw new TypeError('Value cannot be serialised as JSON');
    }
    await mkdir(dirname(path), { recursive: true });
    await fsWriteFile(path, text, 'utf-8');
    return text;
  });
}

export function loadStructured(path: string): Promise<FsResult<unknown>> {
  return attempt(async () => {
    const text = await fsReadFile(path, 'utf-8');
    const data: unknown = JSON.parse(text);
    return data;
  });
}
