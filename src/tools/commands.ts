/**
 * Typed tool commands
 *
 * One variant per operation kind, each with exactly the arguments that
 * operation needs. Built from raw ParsedCommands by the registry.
 */

import type { OperationKind } from '../core/types/operation-result.js';

export type ToolCommand =
  | { kind: 'write_file'; path: string; content: string }
  | { kind: 'read_file'; path: string }
  | { kind: 'create_directory'; path: string }
  | { kind: 'delete_file'; path: string }
  | { kind: 'list_directory'; path: string }
  | { kind: 'save_json'; path: string; data: unknown }
  | { kind: 'load_json'; path: string };

export type CommandOf<K extends OperationKind> = Extract<ToolCommand, { kind: K }>;
