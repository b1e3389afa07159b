#!/usr/bin/env node

/**
 * Kiln CLI Entry Point
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync, readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { configManager } from '../../core/config.js';
import { KilnAgent } from '../../core/agent.js';
import { resolveSessionSettings, type SessionSettings } from '../../core/settings.js';
import { WorkspaceManager } from '../../core/workspace.js';
import { createOllamaModel } from '../../models/ollama.js';
import { logger, LogLevel } from '../../utils/logger.js';
import { ConsoleObserver } from './console-observer.js';
import { loadContextFiles } from './context-files.js';
import { printResponse, runWithCancellation, startREPL } from './repl.js';
import { resetConfiguration, runSetupWizard, updateConfiguration, viewConfiguration } from './setup-wizard.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// package.json sits above src/ when run from source and above dist/ when built
function readVersion(): string {
  let dir = __dirname;
  while (true) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      const parsed = z.object({ version: z.string() }).safeParse(JSON.parse(readFileSync(candidate, 'utf-8')));
      return parsed.success ? parsed.data.version : '0.0.0';
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return '0.0.0';
    }
    dir = parent;
  }
}

interface SessionCommandOptions {
  workspace?: string;
  file: string[];
  temperature?: string;
  maxTokens?: string;
  model?: string;
  url?: string;
  stream: boolean;
  debug?: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function addSessionOptions(command: Command): Command {
  return command
    .option('-w, --workspace <path>', 'Workspace directory (created if missing)')
    .option('-f, --file <path>', 'Context file to include (repeatable)', collect, [])
    .option('-t, --temperature <value>', 'Sampling temperature (0-1)')
    .option('--max-tokens <number>', 'Maximum tokens per response')
    .option('--model <name>', 'Ollama model name')
    .option('--url <url>', 'Ollama server URL')
    .option('--no-stream', 'Render the full response instead of streaming tokens')
    .option('--debug', 'Enable debug logging');
}

interface Session {
  agent: KilnAgent;
  observer: ConsoleObserver;
  settings: SessionSettings;
}

async function createSession(options: SessionCommandOptions): Promise<Session> {
  const stored = configManager.validateConfig();
  const settings = resolveSessionSettings(
    {
      workspace: options.workspace,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      model: options.model,
      url: options.url,
      stream: options.stream,
      debug: options.debug,
    },
    process.env,
    stored
  );

  if (settings.debug) {
    logger.setLogLevel(LogLevel.DEBUG);
  }

  const workspace = new WorkspaceManager({ workspaceDir: resolve(settings.workspaceDir), create: true });
  await workspace.initialize();

  const context = await loadContextFiles(options.file);
  if (context.loaded.length > 0) {
    console.log(chalk.gray(`Context files: ${context.loaded.join(', ')}`));
  }

  const model = createOllamaModel({ baseUrl: settings.backendUrl, model: settings.model });

  // Test model connectivity before proceeding
  console.log(chalk.gray('Testing model connectivity...'));
  if (!(await model.testConnectivity())) {
    console.log(chalk.red('✗ Backend not ready'));
    console.log(chalk.gray(`  Server: ${model.baseUrl}`));
    console.log(chalk.gray(`  Model: ${settings.model}`));
    console.log(chalk.yellow('Check that Ollama is running and the model is pulled:'), chalk.cyan(`ollama pull ${settings.model}\n`));
    process.exit(1);
  }
  console.log(chalk.green(`✓ Connected to ${settings.model}\n`));

  const observer = new ConsoleObserver({ stream: settings.stream });
  const agent = new KilnAgent({
    model,
    workspace,
    observer,
    temperature: settings.temperature,
    maxGenerationTokens: settings.maxTokens,
    contextWindow: settings.contextWindow,
    operationHistoryTokens: settings.operationHistoryTokens,
    context: context.content,
    stream: settings.stream,
  });

  return { agent, observer, settings };
}

const program = new Command();

program
  .name('kiln')
  .description('Coding assistant that edits a sandboxed workspace through a local Ollama model')
  .version(readVersion());

addSessionOptions(
  program
    .command('chat', { isDefault: true })
    .description('Start an interactive chat (default)')
).action(async (options: SessionCommandOptions) => {
  try {
    const { agent, observer } = await createSession(options);
    await startREPL({ agent, observer });
  } catch (error) {
    logger.error('Chat session failed', error);
    process.exit(1);
  }
});

addSessionOptions(
  program
    .command('run')
    .description('Run a single request and exit')
    .argument('<prompt>', 'Request to execute')
).action(async (prompt: string, options: SessionCommandOptions) => {
  try {
    const { agent } = await createSession(options);
    const response = await runWithCancellation(agent, prompt);
    printResponse(response);
    if (response.state !== 'DONE') {
      process.exitCode = 1;
    }
  } catch (error) {
    logger.error('Execution failed', error);
    process.exit(1);
  }
});

const config = program
  .command('config')
  .description('Configure the backend and defaults')
  .action(async () => {
    try {
      if (!configManager.isConfigured()) {
        console.log(chalk.yellow('Kiln is not configured yet. Running setup wizard...\n'));
        await runSetupWizard();
      } else {
        await updateConfiguration();
      }
    } catch (error) {
      logger.error('Configuration update failed', error);
      process.exit(1);
    }
  });

config
  .command('show')
  .description('Print the stored configuration')
  .action(() => {
    viewConfiguration();
  });

config
  .command('reset')
  .description('Delete the stored configuration')
  .action(async () => {
    try {
      await resetConfiguration();
    } catch (error) {
      logger.error('Configuration reset failed', error);
      process.exit(1);
    }
  });

program.parseAsync().catch(error => {
  logger.error('Command failed', error);
  process.exit(1);
});
