/**
 * Context files given with -f/--file, concatenated ahead of the first prompt.
 * Unreadable files are reported and skipped.
 */

import { promises as fs } from 'fs';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface LoadedContext {
  content: string;
  loaded: string[];
  skipped: Array<{ path: string; reason: string }>;
}

export async function loadContextFiles(paths: readonly string[]): Promise<LoadedContext> {
  const parts: string[] = [];
  const loaded: string[] = [];
  const skipped: LoadedContext['skipped'] = [];

  for (const path of paths) {
    try {
      parts.push(await fs.readFile(path, 'utf-8'));
      loaded.push(path);
    } catch (error) {
      const reason = errorMessage(error);
      logger.warn(`Could not read context file ${path}: ${reason}`);
      skipped.push({ path, reason });
    }
  }

  return { content: parts.join('\n'), loaded, skipped };
}
