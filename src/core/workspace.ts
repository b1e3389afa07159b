/**
 * Workspace Manager
 *
 * Owns the sandbox root. Every path the model names is resolved through
 * resolvePath(), which can never climb above the root.
 */

import { access, lstat, mkdir, realpath, stat } from 'fs/promises';
import { dirname, join, relative, resolve, sep } from 'path';
import { WorkspaceError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface WorkspaceConfig {
  workspaceDir: string;
  /** Create the directory when it does not exist yet */
  create?: boolean;
}

/**
 * Split a requested path into segments, dropping `.` and popping on `..`.
 * A `..` with nothing left to pop is ignored.
 */
export function normalizeSegments(requested: string): string[] {
  const segments: string[] = [];
  for (const part of requested.split(/[\\/]+/)) {
    if (part === '' || part === '.') {
      continue;
    }
    if (part === '..') {
      segments.pop();
      continue;
    }
    segments.push(part);
  }
  return segments;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

async function realpathOr<T extends string | undefined>(path: string, fallback: T): Promise<string | T> {
  try {
    return await realpath(path);
  } catch (error) {
    if (isMissing(error)) {
      return fallback;
    }
    throw error;
  }
}

async function isLink(path: string): Promise<boolean> {
  try {
    return (await lstat(path)).isSymbolicLink();
  } catch (error) {
    if (isMissing(error)) {
      return false;
    }
    throw error;
  }
}

export class WorkspaceManager {
  private workspaceDir: string;
  private create: boolean;

  constructor(config: WorkspaceConfig) {
    this.workspaceDir = resolve(config.workspaceDir);
    this.create = config.create ?? false;
  }

  /**
   * Verify (or create) the sandbox directory
   */
  async initialize(): Promise<void> {
    logger.debug(`Initializing workspace: ${this.workspaceDir}`);

    if (this.create) {
      try {
        await mkdir(this.workspaceDir, { recursive: true });
      } catch (error) {
        throw new WorkspaceError(
          `Cannot create workspace directory ${this.workspaceDir}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }

    try {
      await access(this.workspaceDir);
    } catch {
      throw new WorkspaceError(`Workspace directory does not exist: ${this.workspaceDir}`);
    }

    const info = await stat(this.workspaceDir);
    if (!info.isDirectory()) {
      throw new WorkspaceError(`Workspace path is not a directory: ${this.workspaceDir}`);
    }
  }

  /**
   * Map a model-supplied path onto an absolute path inside the sandbox
   */
  resolvePath(requested: string): string {
    return join(this.workspaceDir, ...normalizeSegments(requested));
  }

  /**
   * Sandbox-relative form of an absolute path, with forward slashes.
   * The root itself is ".".
   */
  relativePath(absolute: string): string {
    const rel = relative(this.workspaceDir, absolute);
    return rel === '' ? '.' : rel.split(sep).join('/');
  }

  isRoot(absolute: string): boolean {
    return resolve(absolute) === this.workspaceDir;
  }

  contains(absolute: string): boolean {
    const resolved = resolve(absolute);
    return resolved === this.workspaceDir || resolved.startsWith(this.workspaceDir + sep);
  }

  /**
   * Like contains(), but judged on the real path of the nearest existing
   * ancestor, so a symbolic link inside the sandbox cannot lead out of it.
   * A dangling link on the way counts as outside.
   */
  async containsReal(absolute: string): Promise<boolean> {
    const root = await realpathOr(this.workspaceDir, this.workspaceDir);
    let current = resolve(absolute);

    while (true) {
      const real = await realpathOr(current, undefined);
      if (real !== undefined) {
        return real === root || real.startsWith(root + sep);
      }
      if (await isLink(current)) {
        return false;
      }
      const parent = dirname(current);
      if (parent === current) {
        return false;
      }
      current = parent;
    }
  }

  getWorkspaceDir(): string {
    return this.workspaceDir;
  }
}
