/**
 * Kiln Agent - Main Loop
 *
 * Drives one user request through PROMPTING → GENERATING → EXECUTING until
 * the model stops asking for operations, an operation fails, the caller
 * cancels, or the round-trip ceiling is reached.
 */

import type { GenerationBackend } from '../models/base.js';
import { executeCommands } from '../tools/executor.js';
import { CancelledError, KilnError, ModelError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { ConversationState } from './conversation-state.js';
import { EnvironmentState } from './environment.js';
import {
  SYSTEM_PROMPT,
  TOOL_MANUAL,
  buildContinuationPrompt,
  buildInitialPrompt,
  completedFraming,
  failedFraming,
} from './prompts.js';
import type { AgentObserver, AgentState } from './types/agent-observer.js';
import type { WorkspaceManager } from './workspace.js';

export const DEFAULT_MAX_ITERATIONS = 25;
export const DEFAULT_TEMPERATURE = 0.3;
export const DEFAULT_MAX_GENERATION_TOKENS = 2000;

export interface AgentConfig {
  model: GenerationBackend;
  workspace: WorkspaceManager;
  observer?: AgentObserver;
  maxIterations?: number;
  temperature?: number;
  maxGenerationTokens?: number;
  contextWindow?: number;
  operationHistoryTokens?: number;
  /** Concatenated context files, sent with every prompt */
  context?: string;
  /** Ask the backend for a streamed response; defaults to true */
  stream?: boolean;
  clock?: () => Date;
}

export interface ChatOptions {
  signal?: AbortSignal;
}

export type TerminalState = Extract<AgentState, 'DONE' | 'FAILED' | 'CANCELLED'>;

export interface AgentResponse {
  /** Last non-empty model response of the request */
  content: string;
  iterations: number;
  toolsUsed: string[];
  state: TerminalState;
  /** Set when the loop ended for a reason the user should see, e.g. the ceiling */
  notice?: string;
  /** Failure framing of the operations that ended the request */
  feedback?: string;
}

export class KilnAgent {
  private model: GenerationBackend;
  private workspace: WorkspaceManager;
  private environment: EnvironmentState;
  private conversation: ConversationState;
  private observer?: AgentObserver;
  private maxIterations: number;
  private temperature: number;
  private maxGenerationTokens: number;
  private contextWindow?: number;
  private operationHistoryTokens?: number;
  private context: string;
  private stream: boolean;
  private clock?: () => Date;
  private currentState: AgentState = 'DONE';

  constructor(config: AgentConfig) {
    this.model = config.model;
    this.workspace = config.workspace;
    this.observer = config.observer;
    this.maxIterations = config.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
    this.maxGenerationTokens = config.maxGenerationTokens ?? DEFAULT_MAX_GENERATION_TOKENS;
    this.contextWindow = config.contextWindow;
    this.operationHistoryTokens = config.operationHistoryTokens;
    this.context = config.context ?? '';
    this.stream = config.stream ?? true;
    this.clock = config.clock;

    if (this.maxIterations < 1) {
      throw new KilnError('maxIterations must be at least 1', 'INVALID_ARGUMENT');
    }

    this.environment = new EnvironmentState(this.workspace);
    this.conversation = this.createConversation();
  }

  private createConversation(): ConversationState {
    return new ConversationState({
      environment: this.environment,
      maxTokens: this.contextWindow,
      operationHistoryTokens: this.operationHistoryTokens,
      observer: this.observer,
      clock: this.clock,
    });
  }

  private setState(state: AgentState, iteration: number): void {
    this.currentState = state;
    logger.debug(`Agent state ${state} (iteration ${iteration}/${this.maxIterations})`);
    this.observer?.onStateChange?.(state, iteration);
  }

  private finish(state: TerminalState, iteration: number, response: Omit<AgentResponse, 'state'>): AgentResponse {
    this.setState(state, iteration);
    return { ...response, state };
  }

  /**
   * Process one user request to completion
   */
  async chat(input: string, options: ChatOptions = {}): Promise<AgentResponse> {
    const { signal } = options;
    const toolsUsed: string[] = [];
    let iterations = 0;
    let content = '';
    let previousResult = '';

    logger.debug('Processing user request...');
    this.conversation.setUsage('system', `${SYSTEM_PROMPT}\n\n${TOOL_MANUAL}`);
    this.conversation.setUsage('current', input);
    this.conversation.setUsage('context', this.context);

    while (true) {
      if (signal?.aborted) {
        return this.finish('CANCELLED', iterations, { content, iterations, toolsUsed });
      }

      this.setState('PROMPTING', iterations + 1);
      await this.environment.captureAll();
      this.conversation.recomputeCategoryUsage();

      const parts = {
        request: input,
        workspace: this.conversation.renderWorkspaceSummary(),
        context: this.context,
        history: this.conversation.renderHistory(),
      };
      const prompt =
        iterations === 0
          ? buildInitialPrompt(parts)
          : buildContinuationPrompt({
              ...parts,
              previousResult,
              operationLog: this.conversation.renderOperationHistory(),
            });

      this.setState('GENERATING', iterations + 1);
      let response: string;
      try {
        response = await this.generate(prompt, signal);
      } catch (error) {
        if (error instanceof CancelledError || signal?.aborted) {
          logger.debug('Generation cancelled');
          return this.finish('CANCELLED', iterations, { content, iterations, toolsUsed });
        }
        logger.debug(`Model call failed: ${errorMessage(error)}`);
        this.currentState = 'FAILED';
        if (error instanceof ModelError) {
          throw error;
        }
        throw new ModelError(`Failed to get response from model: ${errorMessage(error)}`, this.model.name);
      }
      iterations++;
      await this.environment.captureAll();

      if (response.trim() === '') {
        return this.finish('DONE', iterations, { content, iterations, toolsUsed });
      }
      content = response;

      this.setState('EXECUTING', iterations);
      const outcome = await executeCommands(response, {
        workspace: this.workspace,
        temperature: this.temperature,
        observer: this.observer,
      });

      let next: 'PROMPTING' | TerminalState;
      let feedback: string | undefined;

      if (outcome.status === 'no_commands') {
        this.conversation.addExchange(input, response, 'No tool executed');
        next = 'DONE';
      } else {
        for (const execution of outcome.executions) {
          const timestamp = this.clock?.() ?? new Date();
          this.environment.recordOperation(execution.tool, execution.result, timestamp);
          this.conversation.addOperationResult(execution.tool, execution.result, timestamp);
          toolsUsed.push(execution.tool);
        }
        this.conversation.addExchange(input, response, outcome.result, outcome.label);

        if (outcome.result.success) {
          previousResult = completedFraming(outcome.label, outcome.summary);
          next = 'PROMPTING';
        } else {
          feedback = failedFraming(outcome.label, outcome.summary, outcome.result.diagnostics.error);
          next = 'FAILED';
        }
      }

      if (iterations >= this.maxIterations) {
        const notice = `Maximum number of agent-tool interactions (${this.maxIterations}) reached.`;
        logger.warn(notice);
        this.observer?.onNotice?.(notice, 'warn');
        return this.finish('FAILED', iterations, { content, iterations, toolsUsed, notice, feedback });
      }

      if (next !== 'PROMPTING') {
        return this.finish(next, iterations, { content, iterations, toolsUsed, feedback });
      }
    }
  }

  private async generate(prompt: string, signal: AbortSignal | undefined): Promise<string> {
    let response = '';
    const stream = this.model.generate(prompt, {
      maxTokens: this.maxGenerationTokens,
      temperature: this.temperature,
      stream: this.stream,
      signal,
    });

    for await (const chunk of stream) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      response += chunk;
      this.observer?.onToken?.(chunk);
    }

    this.observer?.onGenerationComplete?.(response);
    return response;
  }

  /**
   * Start a fresh conversation for the same workspace
   */
  reset(): void {
    this.conversation = this.createConversation();
    logger.debug('Conversation reset');
  }

  get state(): AgentState {
    return this.currentState;
  }

  getConversation(): ConversationState {
    return this.conversation;
  }

  getEnvironment(): EnvironmentState {
    return this.environment;
  }

  getWorkspace(): WorkspaceManager {
    return this.workspace;
  }

  getModel(): GenerationBackend {
    return this.model;
  }
}
