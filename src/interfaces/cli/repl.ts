/**
 * REPL (Read-Eval-Print Loop) for interactive chat with the Kiln agent
 */

import inquirer from 'inquirer';
import chalk from 'chalk';
import type { AgentResponse, KilnAgent } from '../../core/agent.js';
import { errorMessage } from '../../utils/errors.js';
import type { ConsoleObserver } from './console-observer.js';

export interface REPLOptions {
  agent: KilnAgent;
  observer: ConsoleObserver;
}

/**
 * Run one request with Ctrl+C bound to cancelling it
 */
export async function runWithCancellation(agent: KilnAgent, input: string): Promise<AgentResponse> {
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.on('SIGINT', onSigint);
  try {
    return await agent.chat(input, { signal: controller.signal });
  } finally {
    process.off('SIGINT', onSigint);
  }
}

export function printResponse(response: AgentResponse): void {
  if (response.state === 'CANCELLED') {
    console.log(chalk.yellow('\n✗ Request cancelled'));
  } else if (response.state === 'FAILED' && response.feedback) {
    console.log(chalk.red(`\n${response.feedback}`));
  }

  if (response.toolsUsed.length > 0) {
    console.log(chalk.gray(`\n[Used tools: ${response.toolsUsed.join(', ')}]`));
  }
  console.log(chalk.gray(`[Iterations: ${response.iterations}]\n`));
}

export async function startREPL(options: REPLOptions): Promise<void> {
  const { agent, observer } = options;

  console.log(chalk.bold.cyan('\nKiln - Interactive Mode\n'));
  console.log(chalk.gray('Type your message and press Enter. Type /help for commands or /exit to quit.'));
  console.log(chalk.gray('Press Ctrl+C while a response is generating to cancel it.\n'));
  console.log(chalk.gray(`Workspace: ${agent.getWorkspace().getWorkspaceDir()}`));
  console.log(chalk.gray(`Model: ${agent.getModel().name}\n`));

  // REPL loop
  while (true) {
    const { message } = await inquirer.prompt<{ message: string }>([
      {
        type: 'input',
        name: 'message',
        message: chalk.bold.blue('You:'),
        prefix: '',
      },
    ]);

    const trimmedMessage = message.trim();

    // Handle commands with / prefix
    if (trimmedMessage.startsWith('/')) {
      const command = trimmedMessage.substring(1).toLowerCase();

      if (command === 'exit' || command === 'quit') {
        console.log(chalk.gray('\nGoodbye!\n'));
        break;
      }

      if (command === 'help') {
        showHelp();
        continue;
      }

      if (command === 'clear') {
        agent.reset();
        console.log(chalk.yellow('\n✓ Conversation cleared\n'));
        continue;
      }

      if (command === 'history') {
        showHistory(agent);
        continue;
      }

      if (command === 'usage') {
        showUsage(agent);
        continue;
      }

      if (command === 'workspace') {
        await showWorkspace(agent);
        continue;
      }

      // Unknown command
      console.log(chalk.red(`\n✗ Unknown command: /${command}`));
      console.log(chalk.gray('Type /help for available commands\n'));
      continue;
    }

    if (!trimmedMessage) {
      continue;
    }

    try {
      const response = await runWithCancellation(agent, trimmedMessage);
      printResponse(response);
    } catch (error) {
      observer.stopSpinner();
      console.log(chalk.red('\n✗ Error:'), errorMessage(error));
      console.log('');
    }
  }
}

function showHelp() {
  console.log(chalk.bold('\nAvailable Commands:'));
  console.log('  /exit, /quit   - Exit the REPL');
  console.log('  /help          - Show this help message');
  console.log('  /clear         - Start a fresh conversation');
  console.log('  /history       - Show conversation history');
  console.log('  /usage         - Show token budget usage');
  console.log('  /workspace     - Show the current workspace summary');
  console.log('');
}

function truncate(text: string, length: number = 100): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > length ? `${flat.substring(0, length)}...` : flat;
}

function showHistory(agent: KilnAgent) {
  const exchanges = agent.getConversation().exchanges;

  console.log(chalk.bold('\nConversation History:'));
  if (exchanges.length === 0) {
    console.log(chalk.gray('  No conversation history'));
  }

  exchanges.forEach((exchange, index) => {
    console.log(`${index + 1}. ${chalk.blue('user')}: ${truncate(exchange.user)}`);
    console.log(`   ${chalk.green('assistant')}: ${truncate(exchange.assistant)}`);
    if (exchange.operation) {
      console.log(`   ${chalk.yellow('operation')}: ${exchange.operation}`);
    }
    if (exchange.result !== undefined) {
      const text = typeof exchange.result === 'string' ? exchange.result : exchange.result.result;
      console.log(`   ${chalk.gray('result')}: ${truncate(text)}`);
    }
  });

  console.log('');
}

function showUsage(agent: KilnAgent) {
  const conversation = agent.getConversation();

  console.log(chalk.bold('\nToken Usage:'));
  for (const usage of conversation.tokenUsage()) {
    const marker = usage.trimmable ? '' : chalk.gray(' (protected)');
    console.log(`  ${usage.category.padEnd(12)} ${String(usage.used).padStart(7)}${marker}`);
  }
  console.log(`  ${'available'.padEnd(12)} ${String(conversation.budget.available()).padStart(7)}`);

  for (const usage of conversation.operationTokenUsage()) {
    console.log(chalk.gray(`  operation log: ${usage.used} used, ${usage.available} free`));
  }
  console.log('');
}

async function showWorkspace(agent: KilnAgent) {
  await agent.getEnvironment().captureAll();
  const conversation = agent.getConversation();
  conversation.recomputeCategoryUsage();

  console.log('');
  console.log(conversation.renderWorkspaceSummary());
  for (const suggestion of agent.getEnvironment().suggestions()) {
    console.log(chalk.gray(`  ${suggestion}`));
  }
  console.log('');
}
