/**
 * Session settings
 *
 * Merges command-line flags, environment variables, stored configuration
 * and built-in defaults, in that order of precedence.
 */

import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';
import type { KilnConfig } from './config.js';
import { DEFAULT_CONTEXT_WINDOW, DEFAULT_OPERATION_HISTORY_TOKENS } from './conversation-state.js';
import { DEFAULT_MAX_GENERATION_TOKENS, DEFAULT_TEMPERATURE } from './agent.js';

export const DEFAULT_BACKEND_URL = 'http://localhost:11434';
export const DEFAULT_MODEL = 'qwen2.5-coder:7b';
export const DEFAULT_WORKSPACE = './workspace';

export const ENV_VARS = {
  url: 'KILN_OLLAMA_URL',
  model: 'KILN_MODEL',
  temperature: 'KILN_TEMPERATURE',
  maxTokens: 'KILN_MAX_TOKENS',
} as const;

/** Values as they arrive from the command line; numbers are still strings. */
export interface SessionFlags {
  workspace?: string;
  temperature?: string;
  maxTokens?: string;
  model?: string;
  url?: string;
  stream?: boolean;
  debug?: boolean;
}

const SessionSettingsSchema = z.object({
  backendUrl: z.string().url(),
  model: z.string().min(1),
  temperature: z.coerce.number().min(0).max(1),
  maxTokens: z.coerce.number().int().positive(),
  contextWindow: z.number().int().positive(),
  operationHistoryTokens: z.number().int().positive(),
  workspaceDir: z.string().min(1),
  stream: z.boolean(),
  debug: z.boolean(),
});

export type SessionSettings = z.infer<typeof SessionSettingsSchema>;

function fromEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

export function resolveSessionSettings(
  flags: SessionFlags,
  env: NodeJS.ProcessEnv = process.env,
  stored: Partial<KilnConfig> = {}
): SessionSettings {
  const candidate = {
    backendUrl: flags.url ?? fromEnv(env, ENV_VARS.url) ?? stored.backend?.url ?? DEFAULT_BACKEND_URL,
    model: flags.model ?? fromEnv(env, ENV_VARS.model) ?? stored.backend?.model ?? DEFAULT_MODEL,
    temperature:
      flags.temperature ?? fromEnv(env, ENV_VARS.temperature) ?? stored.generation?.temperature ?? DEFAULT_TEMPERATURE,
    maxTokens:
      flags.maxTokens ?? fromEnv(env, ENV_VARS.maxTokens) ?? stored.generation?.maxTokens ?? DEFAULT_MAX_GENERATION_TOKENS,
    contextWindow: stored.budget?.contextWindow ?? DEFAULT_CONTEXT_WINDOW,
    operationHistoryTokens: stored.budget?.operationHistoryTokens ?? DEFAULT_OPERATION_HISTORY_TOKENS,
    workspaceDir: flags.workspace ?? stored.workspace?.defaultDir ?? DEFAULT_WORKSPACE,
    stream: flags.stream ?? true,
    debug: flags.debug ?? stored.debug ?? false,
  };

  const parsed = SessionSettingsSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`Invalid setting ${issue.path.join('.')}: ${issue.message}`);
  }
  return parsed.data;
}
