/**
 * Example: Programmatic Usage of Kiln
 *
 * Runs one request against a local Ollama server and prints what happened.
 */

import {
  KilnAgent,
  createOllamaModel,
  WorkspaceManager,
  logger,
  LogLevel,
} from '../src/index.js';

async function main() {
  // Enable debug logging
  logger.setLogLevel(LogLevel.DEBUG);

  try {
    // 1. Create the backend
    const model = createOllamaModel({
      baseUrl: process.env.KILN_OLLAMA_URL || 'http://localhost:11434',
      model: process.env.KILN_MODEL || 'qwen2.5-coder:7b',
    });

    if (!(await model.testConnectivity())) {
      logger.error('Ollama is not reachable or the model is not pulled');
      process.exitCode = 1;
      return;
    }

    // 2. Initialize the sandbox
    const workspace = new WorkspaceManager({
      workspaceDir: './example-workspace',
      create: true,
    });
    await workspace.initialize();

    // 3. Create the agent, reporting progress through an observer
    const agent = new KilnAgent({
      model,
      workspace,
      temperature: 0.2,
      observer: {
        onToken: chunk => process.stdout.write(chunk),
        onOperationExecuted: execution => {
          logger.info(`${execution.tool} ${execution.path}: ${execution.result.success ? 'ok' : 'failed'}`);
        },
      },
    });

    // 4. Run a request
    const response = await agent.chat('Create a README.md that describes a todo-list CLI.');

    console.log('\n');
    logger.info(`Finished in state ${response.state} after ${response.iterations} iteration(s)`);
    logger.info(`Tools used: ${response.toolsUsed.join(', ') || 'none'}`);
    if (response.feedback) {
      logger.warn(response.feedback);
    }

    // 5. Inspect the token budget
    for (const usage of agent.getConversation().tokenUsage()) {
      logger.debug(`${usage.category}: ${usage.used}`);
    }
  } catch (error) {
    logger.error('Example failed', error);
    process.exitCode = 1;
  }
}

main().catch(error => {
  logger.error('Unhandled error', error);
  process.exit(1);
});
