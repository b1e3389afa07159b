/**
 * AgentObserver - presentation hook the core reports to
 *
 * The core never prints. Front ends (the CLI, tests, embedding programs)
 * implement whichever callbacks they care about.
 */

import type { OperationResult, OperationKind } from './operation-result.js';

export type AgentState = 'PROMPTING' | 'GENERATING' | 'EXECUTING' | 'DONE' | 'FAILED' | 'CANCELLED';

export interface Exchange {
  readonly user: string;
  readonly assistant: string;
  readonly result?: OperationResult | string;
  readonly operation?: string;
}

export interface ToolExecution {
  /** Operation name as written by the model (may be unsupported) */
  readonly tool: string;
  readonly kind?: OperationKind;
  readonly path: string;
  readonly result: OperationResult;
}

export interface TrimEvent {
  log: 'exchanges' | 'operations';
  /** Which tier of the eviction policy picked the entry */
  tier: 'non-priority' | 'error-fallback' | 'front';
  remaining: number;
  available: number;
}

export interface AgentObserver {
  onStateChange?(state: AgentState, iteration: number): void;
  onToken?(chunk: string): void;
  onGenerationComplete?(response: string): void;
  onOperationStart?(tool: string, path: string): void;
  onOperationExecuted?(execution: ToolExecution): void;
  onExchangeAdded?(exchange: Exchange, total: number): void;
  onTrim?(event: TrimEvent): void;
  onNotice?(message: string, level: 'info' | 'warn' | 'error'): void;
}
