/**
 * Tool executor
 *
 * Runs every command block found in one model response, strictly in order,
 * and folds the individual results into one summary for the next prompt.
 */

import type { WorkspaceManager } from '../core/workspace.js';
import type { AgentObserver, ToolExecution } from '../core/types/agent-observer.js';
import {
  ErrorKind,
  failed,
  succeeded,
  withFields,
  temperatureTrace,
  type OperationResult,
} from '../core/types/operation-result.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { parseCommands, type ParsedCommand } from './command-parser.js';
import { createTool, toToolCommand, type CommandResolution } from './registry.js';

export interface ExecutorOptions {
  workspace: WorkspaceManager;
  temperature?: number;
  observer?: AgentObserver;
}

export type ExecutionOutcome =
  | { status: 'no_commands' }
  | {
      status: 'executed';
      executions: ToolExecution[];
      summary: string;
      /** Aggregate: successful only if every command succeeded */
      result: OperationResult;
      /** Operation names in execution order, deduplicated */
      label: string;
    };

export function summarizeExecutions(executions: readonly ToolExecution[]): string {
  const ok = executions.filter(e => e.result.success);
  const bad = executions.filter(e => !e.result.success);
  const lines: string[] = [];

  if (ok.length > 0) {
    lines.push(`Successfully completed ${ok.length} operations:`);
    lines.push(...ok.map(e => `- ${e.tool}: ${e.result.result}`));
  }
  if (bad.length > 0) {
    if (lines.length > 0) {
      lines.push('');
    }
    lines.push(`Failed ${bad.length} operations:`);
    lines.push(...bad.map(e => `- ${e.tool}: ${e.result.result}`));
  }

  return lines.join('\n');
}

function aggregate(executions: readonly ToolExecution[], summary: string, temperature?: number): OperationResult {
  const firstFailure = executions.find(e => !e.result.success);
  const combined = succeeded(summary, {
    affectedPaths: executions.flatMap(e => e.result.affectedPaths),
    warnings: executions.flatMap(e => e.result.warnings),
    rollback: executions.flatMap(e => e.result.rollback),
    temperature: temperatureTrace(temperature),
  });

  if (!firstFailure) {
    return combined;
  }
  return withFields(combined, { success: false, diagnostics: firstFailure.result.diagnostics });
}

function resolveCommand(command: ParsedCommand): CommandResolution {
  try {
    return toToolCommand(command);
  } catch (error) {
    const message = errorMessage(error);
    logger.debug(`Could not prepare ${command.operation}: ${message}`);
    return {
      ok: false,
      result: failed(`Failed to execute ${command.operation}: ${message}`, ErrorKind.Unknown, message),
    };
  }
}

export async function executeCommands(response: string, options: ExecutorOptions): Promise<ExecutionOutcome> {
  const parsed = parseCommands(response);
  if (parsed.length === 0) {
    return { status: 'no_commands' };
  }

  logger.debug(`Found ${parsed.length} tool command(s)`);
  const executions: ToolExecution[] = [];

  for (const command of parsed) {
    options.observer?.onOperationStart?.(command.operation, command.path);

    const resolution = resolveCommand(command);
    let execution: ToolExecution;
    if (resolution.ok) {
      const result = await createTool(resolution.command).run({
        workspace: options.workspace,
        temperature: options.temperature,
      });
      execution = { tool: command.operation, kind: resolution.command.kind, path: command.path, result };
    } else {
      execution = { tool: command.operation, path: command.path, result: resolution.result };
    }

    executions.push(execution);
    options.observer?.onOperationExecuted?.(execution);
  }

  const summary = summarizeExecutions(executions);
  return {
    status: 'executed',
    executions,
    summary,
    result: aggregate(executions, summary, options.temperature),
    label: [...new Set(executions.map(e => e.tool))].join(', '),
  };
}
