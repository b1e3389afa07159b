/**
 * Conversation State
 *
 * Keeps the exchange log and the operation log inside their token budgets.
 * Both logs share one eviction policy: drop the oldest ordinary entry
 * outside the active window, then the oldest error entry, and only then
 * reach into the front of the log.
 */

import type { EnvironmentState } from './environment.js';
import {
  TokenBudget,
  createConversationBudget,
  estimateTokens,
  type BudgetCategory,
  type CategoryUsage,
} from './token-budget.js';
import { renderWorkspaceSummary } from './workspace-summary.js';
import { hasError, type Diagnostics, type OperationResult } from './types/operation-result.js';
import type { AgentObserver, Exchange, TrimEvent } from './types/agent-observer.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_CONTEXT_WINDOW = 32768;
export const DEFAULT_OPERATION_HISTORY_TOKENS = 4000;
export const ACTIVE_WINDOW = 3;
export const OPERATION_LOG_LIMIT = 20;
export const HISTORY_EXCHANGES_IN_PROMPT = 5;

export interface OperationLogEntry {
  readonly tool: string;
  readonly success: boolean;
  readonly result: string;
  readonly timestamp: Date;
  readonly affectedPaths: readonly string[];
  readonly warnings: readonly string[];
  readonly diagnostics: Diagnostics;
}

export interface ConversationStateOptions {
  environment: EnvironmentState;
  maxTokens?: number;
  operationHistoryTokens?: number;
  /** Most recent entries exempt from ordinary eviction */
  activeWindow?: number;
  /** Entries a log never shrinks below; defaults to the active window */
  minRetained?: number;
  observer?: AgentObserver;
  clock?: () => Date;
}

export interface Eviction {
  index: number;
  tier: TrimEvent['tier'];
}

/**
 * Pick the entry to evict next, or undefined when the log is at its floor.
 */
export function selectEviction<T>(
  entries: readonly T[],
  isPriority: (entry: T) => boolean,
  activeWindow: number = ACTIVE_WINDOW,
  minRetained: number = activeWindow
): Eviction | undefined {
  if (entries.length <= minRetained) {
    return undefined;
  }

  const older = Math.max(0, entries.length - activeWindow);
  for (let i = 0; i < older; i++) {
    if (!isPriority(entries[i])) {
      return { index: i, tier: 'non-priority' };
    }
  }
  for (let i = 0; i < older; i++) {
    if (isPriority(entries[i])) {
      return { index: i, tier: 'error-fallback' };
    }
  }
  return { index: 0, tier: 'front' };
}

function resultText(result: OperationResult | string): string {
  return typeof result === 'string' ? result : result.result;
}

export function exchangeTokens(exchange: Exchange): number {
  let tokens = estimateTokens(`User: ${exchange.user}\nAssistant: ${exchange.assistant}`);
  if (exchange.result !== undefined) {
    tokens += estimateTokens(`\nResult: ${resultText(exchange.result)}`);
    if (typeof exchange.result === 'object' && exchange.result.diagnostics.error !== undefined) {
      tokens += estimateTokens(
        `\nError Details: ${exchange.result.diagnostics.error}` +
          `\nSuggested Fix: ${exchange.result.diagnostics.suggestion ?? ''}`
      );
    }
  }
  if (exchange.operation) {
    tokens += estimateTokens(`\nOperation: ${exchange.operation}`);
  }
  return tokens;
}

export function formatOperationEntry(entry: OperationLogEntry): string {
  const status = entry.success ? 'ok' : 'failed';
  const error = entry.diagnostics.error ? ` [${entry.diagnostics.error}]` : '';
  return `- ${entry.tool} (${status}): ${entry.result}${error}`;
}

export class ConversationState {
  readonly environment: EnvironmentState;
  readonly budget: TokenBudget<BudgetCategory>;
  private readonly operationBudget: TokenBudget<'operations'>;
  private exchangeLog: Exchange[] = [];
  private operationLog: OperationLogEntry[] = [];
  private readonly activeWindow: number;
  private readonly minRetained: number;
  private readonly observer?: AgentObserver;
  private readonly clock: () => Date;

  constructor(options: ConversationStateOptions) {
    this.environment = options.environment;
    this.budget = createConversationBudget(options.maxTokens ?? DEFAULT_CONTEXT_WINDOW);
    this.operationBudget = new TokenBudget(
      options.operationHistoryTokens ?? DEFAULT_OPERATION_HISTORY_TOKENS,
      ['operations'] as const
    );
    this.activeWindow = options.activeWindow ?? ACTIVE_WINDOW;
    this.minRetained = options.minRetained ?? this.activeWindow;
    this.observer = options.observer;
    this.clock = options.clock ?? (() => new Date());
  }

  get exchanges(): readonly Exchange[] {
    return this.exchangeLog;
  }

  get operationHistory(): readonly OperationLogEntry[] {
    return this.operationLog;
  }

  /**
   * Record one user/assistant round, evicting older exchanges first if the
   * new one would not fit
   */
  addExchange(
    user: string,
    assistant: string,
    result?: OperationResult | string,
    operation?: string
  ): Exchange {
    const exchange: Exchange = Object.freeze({
      user,
      assistant,
      ...(result !== undefined ? { result } : {}),
      ...(operation ? { operation } : {}),
    });

    this.trimExchangesFor(exchangeTokens(exchange));
    this.exchangeLog.push(exchange);
    this.recomputeCategoryUsage();

    this.observer?.onExchangeAdded?.(exchange, this.exchangeLog.length);
    return exchange;
  }

  /**
   * Append to the operation log, which has its own budget and a hard cap
   */
  addOperationResult(tool: string, result: OperationResult, timestamp: Date = this.clock()): OperationLogEntry {
    const entry: OperationLogEntry = Object.freeze({
      tool,
      success: result.success,
      result: result.result,
      timestamp,
      affectedPaths: result.affectedPaths,
      warnings: result.warnings,
      diagnostics: result.diagnostics,
    });

    this.trimOperationsFor(estimateTokens(formatOperationEntry(entry)));
    this.operationLog.push(entry);
    if (this.operationLog.length > OPERATION_LOG_LIMIT) {
      this.operationLog.shift();
    }
    this.recomputeOperationUsage();
    return entry;
  }

  private trimExchangesFor(required: number): void {
    while (this.budget.available() < required) {
      const eviction = selectEviction(this.exchangeLog, ex => hasError(ex.result), this.activeWindow, this.minRetained);
      if (!eviction) {
        logger.debug(`Exchange log at its floor (${this.exchangeLog.length}); ${required} tokens requested, ${this.budget.available()} available`);
        break;
      }

      this.exchangeLog.splice(eviction.index, 1);
      this.recomputeCategoryUsage();
      this.observer?.onTrim?.({
        log: 'exchanges',
        tier: eviction.tier,
        remaining: this.exchangeLog.length,
        available: this.budget.available(),
      });
    }
  }

  private trimOperationsFor(required: number): void {
    while (this.operationBudget.available() < required) {
      const eviction = selectEviction(this.operationLog, op => !op.success, this.activeWindow, this.minRetained);
      if (!eviction) {
        break;
      }

      this.operationLog.splice(eviction.index, 1);
      this.recomputeOperationUsage();
      this.observer?.onTrim?.({
        log: 'operations',
        tier: eviction.tier,
        remaining: this.operationLog.length,
        available: this.operationBudget.available(),
      });
    }
  }

  /**
   * Re-derive the error/active/history/workspace usages from the current
   * logs. Must run after every structural change.
   */
  recomputeCategoryUsage(): void {
    let error = 0;
    let active = 0;
    let history = 0;
    const activeStart = this.exchangeLog.length - this.activeWindow;

    this.exchangeLog.forEach((exchange, index) => {
      const tokens = exchangeTokens(exchange);
      if (hasError(exchange.result)) {
        error += tokens;
      } else if (index >= activeStart) {
        active += tokens;
      } else {
        history += tokens;
      }
    });

    this.budget.update('error', error);
    this.budget.update('active', active);
    this.budget.update('history', history);
    this.budget.update('workspace', estimateTokens(this.renderWorkspaceSummary()));
  }

  private recomputeOperationUsage(): void {
    const tokens = this.operationLog.reduce((sum, entry) => sum + estimateTokens(formatOperationEntry(entry)), 0);
    this.operationBudget.update('operations', tokens);
  }

  /**
   * Account for text that is always sent: instructions, the request, context files
   */
  setUsage(category: 'system' | 'current' | 'context', text: string): void {
    this.budget.update(category, estimateTokens(text));
  }

  renderWorkspaceSummary(): string {
    return renderWorkspaceSummary(this.environment, this.clock());
  }

  renderHistory(limit: number = HISTORY_EXCHANGES_IN_PROMPT): string {
    const recent = limit > 0 ? this.exchangeLog.slice(-limit) : [];
    if (recent.length === 0) {
      return 'No conversation history';
    }

    const lines: string[] = [];
    for (const exchange of recent) {
      lines.push(`User: ${exchange.user}`);
      lines.push(`Assistant: ${exchange.assistant}`);
      if (exchange.result !== undefined) {
        lines.push(`Result: ${resultText(exchange.result)}`);
      }
      if (exchange.operation) {
        lines.push(`Operation: ${exchange.operation}`);
      }
    }
    return lines.join('\n');
  }

  renderOperationHistory(limit: number = ACTIVE_WINDOW): string {
    return this.operationLog.slice(-limit).map(formatOperationEntry).join('\n');
  }

  tokenUsage(): CategoryUsage<BudgetCategory>[] {
    return this.budget.usageReport();
  }

  operationTokenUsage(): CategoryUsage<'operations'>[] {
    return this.operationBudget.usageReport();
  }

  clear(): void {
    this.exchangeLog = [];
    this.operationLog = [];
    this.recomputeCategoryUsage();
    this.recomputeOperationUsage();
  }
}
