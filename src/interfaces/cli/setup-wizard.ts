/**
 * Setup Wizard for first-time configuration
 */

import inquirer from 'inquirer';
import chalk from 'chalk';
import { configManager } from '../../core/config.js';
import { DEFAULT_CONTEXT_WINDOW, DEFAULT_OPERATION_HISTORY_TOKENS } from '../../core/conversation-state.js';
import { DEFAULT_MAX_GENERATION_TOKENS, DEFAULT_TEMPERATURE } from '../../core/agent.js';
import { DEFAULT_BACKEND_URL, DEFAULT_MODEL, DEFAULT_WORKSPACE } from '../../core/settings.js';
import { logger } from '../../utils/logger.js';

function validateUrl(input: string): true | string {
  try {
    new URL(input);
    return true;
  } catch {
    return 'Please enter a valid URL';
  }
}

function validatePositiveInteger(input: string): true | string {
  const value = Number(input);
  return (Number.isInteger(value) && value > 0) || 'Please enter a positive whole number';
}

function validateTemperature(input: string): true | string {
  const value = Number(input);
  return (input.trim() !== '' && value >= 0 && value <= 1) || 'Temperature must be between 0 and 1';
}

async function promptBackend(): Promise<void> {
  const current = configManager.getBackend();

  const answers = await inquirer.prompt<{ url: string; model: string }>([
    {
      type: 'input',
      name: 'url',
      message: 'Ollama server URL:',
      default: current?.url ?? DEFAULT_BACKEND_URL,
      validate: validateUrl,
    },
    {
      type: 'input',
      name: 'model',
      message: 'Model name:',
      default: current?.model ?? DEFAULT_MODEL,
      validate: (input: string) => input.trim().length > 0 || 'Model name is required',
    },
  ]);

  configManager.setBackend({ url: answers.url.trim(), model: answers.model.trim() });
  logger.success('Backend configured');
}

async function promptGeneration(): Promise<void> {
  const current = configManager.getGeneration();

  const answers = await inquirer.prompt<{ temperature: string; maxTokens: string }>([
    {
      type: 'input',
      name: 'temperature',
      message: 'Temperature (0-1):',
      default: String(current?.temperature ?? DEFAULT_TEMPERATURE),
      validate: validateTemperature,
    },
    {
      type: 'input',
      name: 'maxTokens',
      message: 'Max tokens per response:',
      default: String(current?.maxTokens ?? DEFAULT_MAX_GENERATION_TOKENS),
      validate: validatePositiveInteger,
    },
  ]);

  configManager.setGeneration({
    temperature: Number(answers.temperature),
    maxTokens: Number(answers.maxTokens),
  });
  logger.success('Generation settings saved');
}

async function promptBudget(): Promise<void> {
  const current = configManager.getBudget();

  const answers = await inquirer.prompt<{ contextWindow: string; operationHistoryTokens: string }>([
    {
      type: 'input',
      name: 'contextWindow',
      message: 'Context window (tokens):',
      default: String(current?.contextWindow ?? DEFAULT_CONTEXT_WINDOW),
      validate: validatePositiveInteger,
    },
    {
      type: 'input',
      name: 'operationHistoryTokens',
      message: 'Operation history budget (tokens):',
      default: String(current?.operationHistoryTokens ?? DEFAULT_OPERATION_HISTORY_TOKENS),
      validate: validatePositiveInteger,
    },
  ]);

  configManager.setBudget({
    contextWindow: Number(answers.contextWindow),
    operationHistoryTokens: Number(answers.operationHistoryTokens),
  });
  logger.success('Token budget saved');
}

async function promptWorkspace(): Promise<void> {
  const { dir } = await inquirer.prompt<{ dir: string }>([
    {
      type: 'input',
      name: 'dir',
      message: 'Default workspace directory:',
      default: configManager.getDefaultWorkspace() ?? DEFAULT_WORKSPACE,
      validate: (input: string) => input.trim().length > 0 || 'A directory is required',
    },
  ]);

  configManager.setDefaultWorkspace(dir.trim());
  logger.success(`Default workspace set to ${dir.trim()}`);
}

export async function runSetupWizard(): Promise<void> {
  console.log(chalk.bold.cyan('\nWelcome to Kiln Setup\n'));
  console.log('Kiln talks to an Ollama server. Press Enter to accept a default.\n');

  await promptBackend();
  await promptGeneration();

  console.log(chalk.bold.green('\n✓ Setup complete!\n'));
  console.log(`Configuration saved to: ${chalk.cyan(configManager.getConfigPath())}`);
  console.log('\nYou can now run:', chalk.cyan('kiln'));
  console.log('');
}

/**
 * Update existing configuration interactively
 */
export async function updateConfiguration(): Promise<void> {
  console.log(chalk.bold.cyan('\nUpdate Kiln Configuration\n'));

  const { choice } = await inquirer.prompt<{ choice: string }>([
    {
      type: 'list',
      name: 'choice',
      message: 'What would you like to update?',
      choices: [
        { name: 'Backend (URL and model)', value: 'backend' },
        { name: 'Generation (temperature, max tokens)', value: 'generation' },
        { name: 'Token Budget', value: 'budget' },
        { name: 'Default Workspace', value: 'workspace' },
        { name: 'Debug Mode', value: 'debug' },
        { name: 'View Configuration', value: 'view' },
        { name: 'Reset All', value: 'reset' },
        { name: 'Cancel', value: 'cancel' },
      ],
    },
  ]);

  switch (choice) {
    case 'backend':
      await promptBackend();
      break;
    case 'generation':
      await promptGeneration();
      break;
    case 'budget':
      await promptBudget();
      break;
    case 'workspace':
      await promptWorkspace();
      break;
    case 'debug':
      await toggleDebugMode();
      break;
    case 'view':
      viewConfiguration();
      break;
    case 'reset':
      await resetConfiguration();
      break;
    case 'cancel':
      console.log('Cancelled');
      break;
  }
}

async function toggleDebugMode() {
  const current = configManager.isDebug();

  const { enabled } = await inquirer.prompt<{ enabled: boolean }>([
    {
      type: 'confirm',
      name: 'enabled',
      message: 'Enable debug mode?',
      default: current,
    },
  ]);

  configManager.setDebug(enabled);
  logger.success(`Debug mode ${enabled ? 'enabled' : 'disabled'}`);
}

export function viewConfiguration() {
  const config = configManager.getConfig();
  console.log(chalk.bold('\nCurrent Configuration:'));
  console.log(chalk.gray(configManager.getConfigPath()));
  console.log(JSON.stringify(config, null, 2));
  console.log('');
}

export async function resetConfiguration() {
  const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
    {
      type: 'confirm',
      name: 'confirm',
      message: chalk.red('Are you sure you want to reset all configuration?'),
      default: false,
    },
  ]);

  if (confirm) {
    configManager.reset();
    logger.success('Configuration reset');
  }
}
