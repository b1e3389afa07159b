/**
 * Tool registry
 *
 * The only place operation names from model output are looked up. Past
 * this point everything is a typed ToolCommand.
 */

import {
  ErrorKind,
  OPERATION_KINDS,
  failed,
  isOperationKind,
  type OperationResult,
} from '../core/types/operation-result.js';
import type { ToolCommand } from './commands.js';
import { dedent, normalizeWriteContent, type ParsedCommand } from './command-parser.js';
import {
  CreateDirectoryTool,
  DeleteFileTool,
  ListDirectoryTool,
  LoadJsonTool,
  ReadFileTool,
  SaveJsonTool,
  WriteFileTool,
  type Tool,
} from './tools.js';

export type CommandResolution = { ok: true; command: ToolCommand } | { ok: false; result: OperationResult };

export function toToolCommand(parsed: ParsedCommand): CommandResolution {
  const { operation, path } = parsed;

  if (!isOperationKind(operation)) {
    return {
      ok: false,
      result: failed(`Unsupported operation: ${operation}`, ErrorKind.UnsupportedOperation, 'Unsupported operation', {
        suggestion: `Use one of: ${OPERATION_KINDS.join(', ')}`,
      }),
    };
  }

  switch (operation) {
    case 'write_file':
      return { ok: true, command: { kind: operation, path, content: normalizeWriteContent(parsed.content ?? '') } };

    case 'save_json': {
      const text = dedent(parsed.content ?? '');
      if (text === '') {
        return {
          ok: false,
          result: failed(`No JSON content given for ${path}`, ErrorKind.InvalidJson, 'Missing JSON content', {
            suggestion: 'Put the JSON document between %%content and %%end.',
          }),
        };
      }
      try {
        const data: unknown = JSON.parse(text);
        return { ok: true, command: { kind: operation, path, data } };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return {
          ok: false,
          result: failed(`Invalid JSON for ${path}: ${message}`, ErrorKind.InvalidJson, message),
        };
      }
    }

    case 'read_file':
    case 'create_directory':
    case 'delete_file':
    case 'list_directory':
    case 'load_json':
      return { ok: true, command: { kind: operation, path } };
  }
}

export function createTool(command: ToolCommand): Tool {
  switch (command.kind) {
    case 'write_file':
      return new WriteFileTool(command);
    case 'read_file':
      return new ReadFileTool(command);
    case 'create_directory':
      return new CreateDirectoryTool(command);
    case 'delete_file':
      return new DeleteFileTool(command);
    case 'list_directory':
      return new ListDirectoryTool(command);
    case 'save_json':
      return new SaveJsonTool(command);
    case 'load_json':
      return new LoadJsonTool(command);
  }
}
