/**
 * Tools
 *
 * One class per operation kind. BaseTool.run() is the single failure
 * boundary: it resolves the path inside the sandbox, performs the
 * operation, verifies the post-condition and turns anything thrown into a
 * failed OperationResult.
 */

import { captureFileState, type FileState } from '../core/environment.js';
import type { WorkspaceManager } from '../core/workspace.js';
import {
  ErrorKind,
  failed,
  succeeded,
  temperatureTrace,
  withFields,
  type OperationKind,
  type OperationResult,
  type RollbackHint,
  type VerificationReport,
} from '../core/types/operation-result.js';
import { logger } from '../utils/logger.js';
import type { CommandOf, ToolCommand } from './commands.js';
import {
  classifyError,
  createDirectory,
  deletePath,
  listDirectory,
  loadStructured,
  readFile,
  saveStructured,
  writeFile,
  type FsResult,
} from './fs-primitives.js';
import { verifyAbsent, verifyDirectory, verifyExists, verifySavedJson, verifyWrittenFile } from './verification.js';

export interface ToolContext {
  workspace: WorkspaceManager;
  /** Sampling temperature of the generation that requested the call */
  temperature?: number;
}

/** Where an operation acts: absolute path, display path, and its state beforehand. */
export interface ToolTarget {
  absolute: string;
  display: string;
  before: FileState;
}

export interface Tool {
  readonly kind: OperationKind;
  readonly path: string;
  run(context: ToolContext): Promise<OperationResult>;
}

function fsFailure(target: ToolTarget, action: string, outcome: Extract<FsResult<unknown>, { ok: false }>): OperationResult {
  return failed(`Failed to ${action} ${target.display}: ${outcome.message}`, outcome.kind, outcome.message, {
    affectedPaths: [target.display],
  });
}

export abstract class BaseTool<C extends ToolCommand = ToolCommand> implements Tool {
  constructor(readonly command: C) {}

  get kind(): OperationKind {
    return this.command.kind;
  }

  get path(): string {
    return this.command.path;
  }

  async run(context: ToolContext): Promise<OperationResult> {
    const trace = temperatureTrace(context.temperature);

    try {
      const absolute = context.workspace.resolvePath(this.command.path);
      const display = context.workspace.relativePath(absolute);
      if (!(await context.workspace.containsReal(absolute))) {
        return failed(`Path ${display} resolves outside the workspace`, ErrorKind.PermissionDenied, 'Path escapes the workspace', {
          suggestion: 'Name a path that stays inside the workspace without following links.',
          temperature: trace,
        });
      }
      const target: ToolTarget = { absolute, display, before: await captureFileState(absolute, display) };

      const result = await this.perform(target, context);
      if (!result.success) {
        return withFields(result, { temperature: trace });
      }

      const verification = await this.verify(target, result);
      if (!verification.passed) {
        logger.debug(`Verification failed for ${this.kind} ${display}: ${verification.reason}`);
        return failed(
          `Verification failed for ${display}: ${verification.reason ?? 'post-condition not met'}`,
          ErrorKind.VerificationFailed,
          'Verification failed',
          {
            verification,
            affectedPaths: result.affectedPaths,
            warnings: result.warnings,
            rollback: result.rollback,
            temperature: trace,
            diagnostics: { details: { checks: verification.checks } },
          }
        );
      }

      return withFields(result, { verification, temperature: trace });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.debug(`Error executing ${this.kind}: ${message}`);
      return failed(`Failed to execute ${this.kind}: ${message}`, classifyError(error), message, {
        temperature: trace,
      });
    }
  }

  protected abstract perform(target: ToolTarget, context: ToolContext): Promise<OperationResult>;

  protected abstract verify(target: ToolTarget, result: OperationResult): Promise<VerificationReport>;
}

function writeRollback(target: ToolTarget): RollbackHint[] {
  if (!target.before.exists) {
    return [{ action: 'delete', path: target.display }];
  }
  if (!target.before.isDirectory) {
    return [{ action: 'restore', path: target.display, previousHash: target.before.contentHash }];
  }
  return [];
}

function overwriteWarnings(target: ToolTarget): string[] {
  return target.before.exists && !target.before.isDirectory ? [`Overwrote existing file ${target.display}`] : [];
}

export class WriteFileTool extends BaseTool<CommandOf<'write_file'>> {
  protected async perform(target: ToolTarget): Promise<OperationResult> {
    const outcome = await writeFile(target.absolute, this.command.content);
    if (!outcome.ok) {
      return fsFailure(target, 'write', outcome);
    }

    const warnings = overwriteWarnings(target);
    if (this.command.content.length === 0) {
      warnings.push(`Wrote an empty file to ${target.display}`);
    }

    return succeeded(`Successfully wrote to ${target.display}`, {
      affectedPaths: [target.display],
      warnings,
      rollback: writeRollback(target),
    });
  }

  protected verify(target: ToolTarget): Promise<VerificationReport> {
    return verifyWrittenFile(target.absolute, this.command.content);
  }
}

export class ReadFileTool extends BaseTool<CommandOf<'read_file'>> {
  protected async perform(target: ToolTarget): Promise<OperationResult> {
    if (!target.before.exists) {
      return failed(`File ${target.display} does not exist`, ErrorKind.NotFound, 'FileNotFoundError', {
        suggestion: 'Check the path against the current workspace state.',
      });
    }
    if (target.before.isDirectory) {
      return failed(`${target.display} is a directory`, ErrorKind.IsDirectory, 'IsADirectoryError', {
        suggestion: 'Use list_directory to see what it contains.',
      });
    }

    const outcome = await readFile(target.absolute);
    if (!outcome.ok) {
      return fsFailure(target, 'read', outcome);
    }
    return succeeded(outcome.value, { affectedPaths: [target.display] });
  }

  protected verify(target: ToolTarget): Promise<VerificationReport> {
    return verifyExists(target.absolute);
  }
}

export class CreateDirectoryTool extends BaseTool<CommandOf<'create_directory'>> {
  protected async perform(target: ToolTarget): Promise<OperationResult> {
    const outcome = await createDirectory(target.absolute);
    if (!outcome.ok) {
      return fsFailure(target, 'create directory', outcome);
    }

    return succeeded(`Successfully created directory ${target.display}`, {
      affectedPaths: [target.display],
      warnings: target.before.isDirectory ? [`Directory ${target.display} already existed`] : [],
      rollback: target.before.exists ? [] : [{ action: 'delete', path: target.display }],
    });
  }

  protected verify(target: ToolTarget): Promise<VerificationReport> {
    return verifyDirectory(target.absolute);
  }
}

export class DeleteFileTool extends BaseTool<CommandOf<'delete_file'>> {
  protected async perform(target: ToolTarget, context: ToolContext): Promise<OperationResult> {
    if (context.workspace.isRoot(target.absolute)) {
      return failed('Refusing to delete the workspace root', ErrorKind.PermissionDenied, 'Refusing to delete the workspace root', {
        suggestion: 'Name a file or directory inside the workspace.',
      });
    }

    const outcome = await deletePath(target.absolute);
    if (!outcome.ok) {
      return fsFailure(target, 'delete', outcome);
    }
    if (!outcome.value.removed) {
      return succeeded(`${target.display} is already absent`);
    }

    return succeeded(`Successfully deleted ${target.display}`, {
      affectedPaths: [target.display],
      rollback: [
        {
          action: 'recreate',
          path: target.display,
          wasDirectory: target.before.isDirectory,
          previousHash: target.before.contentHash,
        },
      ],
    });
  }

  protected verify(target: ToolTarget): Promise<VerificationReport> {
    return verifyAbsent(target.absolute);
  }
}

export class ListDirectoryTool extends BaseTool<CommandOf<'list_directory'>> {
  protected async perform(target: ToolTarget): Promise<OperationResult> {
    const outcome = await listDirectory(target.absolute);
    if (!outcome.ok) {
      return fsFailure(target, 'list', outcome);
    }

    const lines = outcome.value.map(entry => `  - ${entry.name}${entry.isDirectory ? '/' : ''}`);
    const body = lines.length > 0 ? lines.join('\n') : '  (empty directory)';
    return succeeded(`Contents of ${target.display}:\n${body}`, {
      data: outcome.value,
      affectedPaths: [target.display],
    });
  }

  protected verify(target: ToolTarget): Promise<VerificationReport> {
    return verifyDirectory(target.absolute);
  }
}

export class SaveJsonTool extends BaseTool<CommandOf<'save_json'>> {
  protected async perform(target: ToolTarget): Promise<OperationResult> {
    const outcome = await saveStructured(target.absolute, this.command.data);
    if (!outcome.ok) {
      return fsFailure(target, 'save JSON to', outcome);
    }

    return succeeded(`Successfully saved JSON to ${target.display}`, {
      affectedPaths: [target.display],
      warnings: overwriteWarnings(target),
      rollback: writeRollback(target),
    });
  }

  protected verify(target: ToolTarget): Promise<VerificationReport> {
    return verifySavedJson(target.absolute, this.command.data);
  }
}

export class LoadJsonTool extends BaseTool<CommandOf<'load_json'>> {
  protected async perform(target: ToolTarget): Promise<OperationResult> {
    if (!target.before.exists) {
      return failed(`File ${target.display} does not exist`, ErrorKind.NotFound, 'FileNotFoundError');
    }

    const outcome = await loadStructured(target.absolute);
    if (!outcome.ok) {
      const prefix = outcome.kind === ErrorKind.InvalidJson ? 'Invalid JSON in' : 'Failed to load JSON from';
      return failed(`${prefix} ${target.display}: ${outcome.message}`, outcome.kind, outcome.message, {
        affectedPaths: [target.display],
      });
    }

    return succeeded(JSON.stringify(outcome.value, null, 2), {
      data: outcome.value,
      affectedPaths: [target.display],
    });
  }

  protected verify(target: ToolTarget): Promise<VerificationReport> {
    return verifyExists(target.absolute);
  }
}
