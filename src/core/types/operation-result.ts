/**
 * OperationResult - the immutable outcome of one executed tool command
 *
 * Every tool execution, successful or not, produces one of these. Failures
 * are values: nothing in the tool layer throws past its own boundary.
 */

/** Closed set of operations the command grammar can request. */
export const OPERATION_KINDS = [
  'write_file',
  'read_file',
  'create_directory',
  'delete_file',
  'list_directory',
  'save_json',
  'load_json',
] as const;

export type OperationKind = (typeof OPERATION_KINDS)[number];

export function isOperationKind(name: string): name is OperationKind {
  return (OPERATION_KINDS as readonly string[]).includes(name);
}

export enum ErrorKind {
  NotFound = 'not_found',
  AlreadyExists = 'already_exists',
  PermissionDenied = 'permission_denied',
  IsDirectory = 'is_directory',
  NotADirectory = 'not_a_directory',
  InvalidJson = 'invalid_json',
  VerificationFailed = 'verification_failed',
  UnsupportedOperation = 'unsupported_operation',
  Io = 'io_error',
  Unknown = 'unknown',
}

export interface Diagnostics {
  /** Human-readable error text; present on every failure */
  error?: string;
  kind?: ErrorKind;
  suggestion?: string;
  details?: Record<string, unknown>;
}

export interface VerificationReport {
  passed: boolean;
  /** Individual post-condition checks, e.g. { exists: true, sizeMatches: false } */
  checks: Record<string, boolean>;
  reason?: string;
}

/** Describes how an operation could be undone. Never executed automatically. */
export type RollbackHint =
  | { action: 'delete'; path: string }
  | { action: 'restore'; path: string; previousHash: string }
  | { action: 'recreate'; path: string; wasDirectory: boolean; previousHash: string };

export interface TemperatureTrace {
  initial: number;
  final: number;
  adjustments: ReadonlyArray<{ from: number; to: number; reason: string }>;
  effectiveness?: number;
}

export interface OperationResult {
  readonly success: boolean;
  readonly result: string;
  /** Structured payload, e.g. the parsed document from load_json */
  readonly data?: unknown;
  readonly verification?: VerificationReport;
  readonly diagnostics: Diagnostics;
  readonly affectedPaths: readonly string[];
  readonly warnings: readonly string[];
  readonly rollback: readonly RollbackHint[];
  readonly temperature: TemperatureTrace;
}

type ResultFields = Omit<Partial<OperationResult>, 'success' | 'result'>;

export function temperatureTrace(temperature: number = 0): TemperatureTrace {
  return { initial: temperature, final: temperature, adjustments: [] };
}

function build(success: boolean, result: string, fields: ResultFields): OperationResult {
  return Object.freeze({
    success,
    result,
    data: fields.data,
    verification: fields.verification,
    diagnostics: fields.diagnostics ?? {},
    affectedPaths: fields.affectedPaths ?? [],
    warnings: fields.warnings ?? [],
    rollback: fields.rollback ?? [],
    temperature: fields.temperature ?? temperatureTrace(),
  });
}

export function succeeded(result: string, fields: ResultFields = {}): OperationResult {
  return build(true, result, fields);
}

export function failed(
  result: string,
  kind: ErrorKind,
  error: string,
  fields: ResultFields & { suggestion?: string } = {}
): OperationResult {
  const { suggestion, ...rest } = fields;
  return build(false, result, {
    ...rest,
    diagnostics: { ...rest.diagnostics, error, kind, ...(suggestion ? { suggestion } : {}) },
  });
}

/** Copy a result with some fields replaced; the original stays untouched. */
export function withFields(
  base: OperationResult,
  fields: ResultFields & { success?: boolean; result?: string }
): OperationResult {
  return build(fields.success ?? base.success, fields.result ?? base.result, { ...base, ...fields });
}

export function hasError(result: OperationResult | string | undefined): boolean {
  return typeof result === 'object' && result.diagnostics.error !== undefined;
}
