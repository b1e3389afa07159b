/**
 * Workspace summary rendering for prompts
 *
 * Produces a short, deterministic description of the sandbox: what was
 * touched recently, what the agent just did, and a capped sample of the rest.
 */

import type { EnvironmentState, FileState } from './environment.js';

/** Path segments that are never worth showing the model. */
export const IGNORED_SEGMENTS: ReadonlySet<string> = new Set([
  '.git',
  '.gitignore',
  '.hg',
  '.svn',
  'node_modules',
  '__pycache__',
  '.vscode',
  '.idea',
  '.env',
  'venv',
  '.venv',
  'env',
  '.DS_Store',
  '.next',
  '.cache',
]);

/** Compiled artefacts, matched on the end of any segment. */
export const IGNORED_SUFFIXES: readonly string[] = ['.pyc', '.pyo', '.pyd', '.so', '.o', '.class', '.tsbuildinfo'];

export const ACTIVE_WINDOW_MS = 30 * 60 * 1000;
export const OTHER_FILES_LIMIT = 5;
export const RECENT_OPERATIONS_SHOWN = 3;
export const EMPTY_WORKSPACE = 'Workspace: (Empty)';

export function isIgnoredPath(path: string): boolean {
  return path
    .split('/')
    .some(segment => IGNORED_SEGMENTS.has(segment) || IGNORED_SUFFIXES.some(suffix => segment.endsWith(suffix)));
}

function displayName(state: FileState): string {
  return state.isDirectory ? `${state.path}/` : state.path;
}

export function renderWorkspaceSummary(environment: EnvironmentState, now: Date = new Date()): string {
  const active: string[] = [];
  const other: string[] = [];
  const cutoff = now.getTime() - ACTIVE_WINDOW_MS;

  for (const state of environment.getFiles().values()) {
    if (!state.exists || isIgnoredPath(state.path)) {
      continue;
    }
    if (state.lastModified.getTime() > cutoff) {
      active.push(displayName(state));
    } else {
      other.push(displayName(state));
    }
  }

  if (active.length === 0 && other.length === 0) {
    return EMPTY_WORKSPACE;
  }

  active.sort();
  other.sort();

  const lines: string[] = ['Workspace State:'];

  if (active.length > 0) {
    lines.push('Active Files (Last 30 min):');
    lines.push(...active.map(path => `  - ${path}`));
    lines.push('');
  }

  const recent = environment.getRecentOperations(RECENT_OPERATIONS_SHOWN);
  if (recent.length > 0) {
    lines.push('Recent Operations:');
    lines.push(...recent.map(op => `  - ${op.operation}`));
    lines.push('');
  }

  if (other.length > 0) {
    lines.push('Other Workspace Files:');
    lines.push(...other.slice(0, OTHER_FILES_LIMIT).map(path => `  - ${path}`));
    if (other.length > OTHER_FILES_LIMIT) {
      lines.push(`  ... +${other.length - OTHER_FILES_LIMIT} more`);
    }
  }

  return lines.join('\n').trimEnd();
}
