/**
 * Kiln - token-budgeted coding agent
 *
 * Main exports for programmatic usage
 */

export { KilnAgent } from './core/agent.js';
export type { AgentConfig, AgentResponse, ChatOptions, TerminalState } from './core/agent.js';
export { configManager, ConfigManager } from './core/config.js';
export { resolveSessionSettings } from './core/settings.js';
export type { SessionFlags, SessionSettings } from './core/settings.js';
export { WorkspaceManager } from './core/workspace.js';
export { EnvironmentState, captureFileState } from './core/environment.js';
export type { FileState } from './core/environment.js';
export { ConversationState } from './core/conversation-state.js';
export { TokenBudget, estimateTokens } from './core/token-budget.js';

export { OllamaModel, createOllamaModel } from './models/ollama.js';
export type { GenerationBackend, GenerationOptions } from './models/base.js';

export { parseCommands } from './tools/command-parser.js';
export { executeCommands } from './tools/executor.js';
export type { ToolCommand } from './tools/commands.js';

export { logger, LogLevel } from './utils/logger.js';

export * from './utils/errors.js';
export * from './core/types/operation-result.js';
export type * from './core/types/agent-observer.js';
