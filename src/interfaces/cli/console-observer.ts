/**
 * Terminal presentation of agent progress
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { AgentObserver, AgentState, ToolExecution, TrimEvent } from '../../core/types/agent-observer.js';
import { logger } from '../../utils/logger.js';
import { formatForCLI } from '../../utils/markdown.js';

export interface ConsoleObserverOptions {
  /** Print tokens as they arrive; otherwise render the full response as markdown */
  stream: boolean;
  spinner?: boolean;
  write?: (text: string) => void;
}

/** One-line description of an executed operation, without colour. */
export function describeExecution(execution: ToolExecution): string {
  const mark = execution.result.success ? '✓' : '✗';
  const firstLine = execution.result.result.split('\n')[0];
  return `${mark} ${execution.tool} ${execution.path}: ${firstLine}`;
}

export class ConsoleObserver implements AgentObserver {
  private spinner: Ora | null = null;
  private receivedTokens = false;
  private readonly stream: boolean;
  private readonly useSpinner: boolean;
  private readonly write: (text: string) => void;

  constructor(options: ConsoleObserverOptions) {
    this.stream = options.stream;
    this.useSpinner = options.spinner ?? true;
    this.write = options.write ?? (text => process.stdout.write(text));
  }

  onStateChange(state: AgentState): void {
    if (state === 'GENERATING') {
      this.receivedTokens = false;
      if (this.useSpinner) {
        this.spinner = ora('Thinking...').start();
      }
    } else if (state === 'DONE' || state === 'FAILED' || state === 'CANCELLED') {
      this.stopSpinner();
    }
  }

  onToken(chunk: string): void {
    if (!this.stream) {
      return;
    }
    if (!this.receivedTokens) {
      this.stopSpinner();
      this.write(chalk.bold.green('\nKiln: '));
      this.receivedTokens = true;
    }
    this.write(chunk);
  }

  onGenerationComplete(response: string): void {
    this.stopSpinner();
    if (this.stream) {
      if (this.receivedTokens) {
        this.write('\n');
      }
      return;
    }
    if (response.trim() !== '') {
      this.write(`${chalk.bold.green('\nKiln:')}\n${formatForCLI(response)}\n`);
    }
  }

  onOperationStart(tool: string, path: string): void {
    logger.debug(`Running ${tool} on ${path}`);
  }

  onOperationExecuted(execution: ToolExecution): void {
    const line = describeExecution(execution);
    this.write(`${execution.result.success ? chalk.green(line) : chalk.red(line)}\n`);
    for (const warning of execution.result.warnings) {
      this.write(`${chalk.yellow(`  ⚠ ${warning}`)}\n`);
    }
    const suggestion = execution.result.diagnostics.suggestion;
    if (!execution.result.success && suggestion) {
      this.write(`${chalk.gray(`  Suggestion: ${suggestion}`)}\n`);
    }
  }

  onTrim(event: TrimEvent): void {
    logger.debug(`Trimmed ${event.log} (${event.tier}); ${event.remaining} left, ${event.available} tokens free`);
  }

  onNotice(message: string, level: 'info' | 'warn' | 'error'): void {
    const colour = level === 'error' ? chalk.red : level === 'warn' ? chalk.yellow : chalk.gray;
    this.write(`${colour(`\n${message}`)}\n`);
  }

  stopSpinner(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}
