/**
 * Environment State
 *
 * Point-in-time snapshots of the sandbox plus a short record of what the
 * agent recently did to it. Rebuilt from disk on demand, never persisted.
 */

import { createHash } from 'crypto';
import { createReadStream, type Dirent, type Stats } from 'fs';
import { readdir, stat } from 'fs/promises';
import { join, posix } from 'path';
import type { WorkspaceManager } from './workspace.js';
import { ErrorKind, type OperationResult } from './types/operation-result.js';
import { logger } from '../utils/logger.js';

export interface FileState {
  /** Sandbox-relative path, forward slashes */
  readonly path: string;
  readonly exists: boolean;
  readonly size: number;
  /** Octal permission bits, e.g. "644" */
  readonly permissions: string;
  readonly owner: string;
  /** SHA-256 hex of the content; empty for directories and unreadable files */
  readonly contentHash: string;
  readonly lastModified: Date;
  readonly isDirectory: boolean;
}

export interface OperationRecord {
  readonly operation: string;
  readonly success: boolean;
  readonly timestamp: Date;
  readonly affectedPaths: readonly string[];
}

export interface OperationStats {
  successCount: number;
  failureCount: number;
  /** "(operation, parent directory)" pairs of successful operations, with counts */
  successfulPatterns: Map<string, { operation: string; directory: string; count: number }>;
  errorKinds: Map<string, number>;
}

export const RECENT_OPERATION_LIMIT = 20;

export function hashFile(absolutePath: string): Promise<string> {
  return new Promise(resolve => {
    const hash = createHash('sha256');
    const stream = createReadStream(absolutePath);
    stream.on('data', chunk => hash.update(chunk));
    stream.on('end', () => resolve(hash.digest('hex')));
    stream.on('error', () => resolve(''));
  });
}

export function hashContent(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

function absentState(path: string): FileState {
  return Object.freeze({
    path,
    exists: false,
    size: 0,
    permissions: '',
    owner: '',
    contentHash: '',
    lastModified: new Date(0),
    isDirectory: false,
  });
}

/**
 * Read the metadata of one path. Never rejects: a failed stat reports the
 * path as absent, a failed read leaves the hash empty.
 */
export async function captureFileState(absolutePath: string, displayPath: string = absolutePath): Promise<FileState> {
  let info: Stats;
  try {
    info = await stat(absolutePath);
  } catch {
    return absentState(displayPath);
  }

  const isDirectory = info.isDirectory();
  return Object.freeze({
    path: displayPath,
    exists: true,
    size: info.size,
    permissions: (info.mode & 0o777).toString(8).padStart(3, '0'),
    owner: String(info.uid),
    contentHash: isDirectory ? '' : await hashFile(absolutePath),
    lastModified: info.mtime,
    isDirectory,
  });
}

export class EnvironmentState {
  private readonly files = new Map<string, FileState>();
  private readonly operations: OperationRecord[] = [];
  private readonly stats: OperationStats = {
    successCount: 0,
    failureCount: 0,
    successfulPatterns: new Map(),
    errorKinds: new Map(),
  };

  constructor(private readonly workspace: WorkspaceManager) {}

  get rootDir(): string {
    return this.workspace.getWorkspaceDir();
  }

  /**
   * Snapshot one sandbox-relative path and store it
   */
  async captureFile(relativePath: string): Promise<FileState> {
    const absolute = this.workspace.resolvePath(relativePath);
    const state = await captureFileState(absolute, this.workspace.relativePath(absolute));
    this.files.set(state.path, state);
    return state;
  }

  /**
   * Walk the whole sandbox. A path seen in the previous capture that is
   * gone now stays in the map as absent for one capture, then drops out.
   * Symbolic links are neither recorded nor followed.
   */
  async captureAll(): Promise<ReadonlyMap<string, FileState>> {
    const seen = new Set<string>();
    await this.walk('', seen);

    for (const [path, state] of this.files) {
      if (seen.has(path)) {
        continue;
      }
      if (state.exists) {
        this.files.set(path, absentState(path));
      } else {
        this.files.delete(path);
      }
    }

    logger.debug(`Captured ${seen.size} workspace entries`);
    return this.files;
  }

  private async walk(relativeDir: string, seen: Set<string>): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(join(this.rootDir, relativeDir), { withFileTypes: true });
    } catch (error) {
      logger.debug(`Skipping unreadable directory ${relativeDir || '.'}: ${String(error)}`);
      return;
    }

    for (const entry of entries) {
      const relPath = relativeDir ? posix.join(relativeDir, entry.name) : entry.name;
      if (entry.isSymbolicLink()) {
        logger.debug(`Skipping symbolic link ${relPath}`);
        continue;
      }
      const state = await this.captureFile(relPath);
      seen.add(state.path);
      if (state.isDirectory) {
        await this.walk(relPath, seen);
      }
    }
  }

  getFile(relativePath: string): FileState | undefined {
    return this.files.get(relativePath);
  }

  getFiles(): ReadonlyMap<string, FileState> {
    return this.files;
  }

  recordOperation(operation: string, result: OperationResult, timestamp: Date = new Date()): void {
    this.operations.push({
      operation,
      success: result.success,
      timestamp,
      affectedPaths: [...result.affectedPaths],
    });
    if (this.operations.length > RECENT_OPERATION_LIMIT) {
      this.operations.shift();
    }

    if (result.success) {
      this.stats.successCount++;
      const first = result.affectedPaths[0];
      if (first !== undefined) {
        const directory = posix.basename(posix.dirname(first));
        const key = `${operation}\u0000${directory}`;
        const pattern = this.stats.successfulPatterns.get(key);
        if (pattern) {
          pattern.count++;
        } else {
          this.stats.successfulPatterns.set(key, { operation, directory, count: 1 });
        }
      }
    } else {
      this.stats.failureCount++;
      const kind = result.diagnostics.kind ?? ErrorKind.Unknown;
      this.stats.errorKinds.set(kind, (this.stats.errorKinds.get(kind) ?? 0) + 1);
    }
  }

  getRecentOperations(limit: number = RECENT_OPERATION_LIMIT): readonly OperationRecord[] {
    return this.operations.slice(-limit);
  }

  getStats(): Readonly<OperationStats> {
    return this.stats;
  }

  /**
   * Hints derived from what has worked and what keeps failing
   */
  suggestions(): string[] {
    const suggestions: string[] = [];

    const directories = [...new Set([...this.stats.successfulPatterns.values()].map(p => p.directory))];
    if (directories.length > 0) {
      suggestions.push(`Consider using these directories: ${directories.join(', ')}`);
    }

    let worst: [string, number] | undefined;
    for (const entry of this.stats.errorKinds) {
      if (!worst || entry[1] > worst[1]) {
        worst = entry;
      }
    }
    if (worst) {
      suggestions.push(`Watch out for ${worst[0]} errors, seen ${worst[1]} times`);
    }

    return suggestions;
  }

  toJSON() {
    return {
      root: this.rootDir,
      files: Object.fromEntries(
        [...this.files].map(([path, state]) => [
          path,
          { ...state, lastModified: state.lastModified.toISOString() },
        ])
      ),
      recentOperations: this.operations.map(op => ({ ...op, timestamp: op.timestamp.toISOString() })),
      stats: {
        successCount: this.stats.successCount,
        failureCount: this.stats.failureCount,
        successfulPatterns: [...this.stats.successfulPatterns.values()],
        errorKinds: Object.fromEntries(this.stats.errorKinds),
      },
    };
  }
}
