/**
 * In-process stand-ins used by the test suites
 */

import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { GenerationBackend, GenerationOptions } from '../../models/base.js';
import { CancelledError } from '../../utils/errors.js';
import { WorkspaceManager } from '../workspace.js';

/** One scripted reply: a whole response, its fragments, a failure, or a hang until aborted. */
export type ScriptedReply = string | string[] | Error | { waitForAbort: true };

/**
 * Replays canned responses in order; once the script runs out every call
 * yields nothing.
 */
export class ScriptedBackend implements GenerationBackend {
  readonly name = 'scripted';
  readonly prompts: string[] = [];
  readonly calls: GenerationOptions[] = [];
  private readonly replies: ScriptedReply[];

  constructor(replies: ScriptedReply[]) {
    this.replies = [...replies];
  }

  async *generate(prompt: string, options: GenerationOptions): AsyncIterable<string> {
    this.prompts.push(prompt);
    this.calls.push(options);

    const reply = this.replies.shift() ?? '';
    if (reply instanceof Error) {
      throw reply;
    }
    if (typeof reply === 'object' && !Array.isArray(reply)) {
      yield 'partial ';
      await new Promise<void>(resolve => {
        if (options.signal?.aborted) {
          resolve();
        } else {
          options.signal?.addEventListener('abort', () => resolve(), { once: true });
        }
      });
      throw new CancelledError();
    }

    for (const fragment of Array.isArray(reply) ? reply : [reply]) {
      yield fragment;
    }
  }
}

export interface TempWorkspace {
  root: string;
  workspace: WorkspaceManager;
  cleanup(): Promise<void>;
}

export async function createTempWorkspace(prefix: string = 'kiln-test-'): Promise<TempWorkspace> {
  const root = await mkdtemp(join(tmpdir(), prefix));
  const workspace = new WorkspaceManager({ workspaceDir: root });
  await workspace.initialize();
  return {
    root,
    workspace,
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}
