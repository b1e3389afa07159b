import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ModelError } from '../utils/errors.js';
import { KilnAgent } from './agent.js';
import { estimateTokens } from './token-budget.js';
import type { AgentState } from './types/agent-observer.js';
import { ScriptedBackend, createTempWorkspace, type TempWorkspace } from './test-helpers/scripted-backend.js';

function writeBlock(path: string, content: string): string {
  return `Creating ${path}.\n%%tool write_file\n%%path ${path}\n%%content\n${content}\n%%end`;
}

describe('KilnAgent', () => {
  let temp: TempWorkspace;

  beforeEach(async () => {
    temp = await createTempWorkspace();
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('finishes after one cycle when the response has no commands', async () => {
    const states: string[] = [];
    const backend = new ScriptedBackend(['Hello! Nothing to change.']);
    const agent = new KilnAgent({
      model: backend,
      workspace: temp.workspace,
      observer: { onStateChange: (state: AgentState, iteration: number) => states.push(`${state}:${iteration}`) },
    });

    const response = await agent.chat('hi');

    expect(response).toEqual({
      content: 'Hello! Nothing to change.',
      iterations: 1,
      toolsUsed: [],
      state: 'DONE',
    });
    expect(states).toEqual(['PROMPTING:1', 'GENERATING:1', 'EXECUTING:1', 'DONE:1']);
    expect(agent.getConversation().exchanges).toEqual([
      { user: 'hi', assistant: 'Hello! Nothing to change.', result: 'No tool executed' },
    ]);
    expect(backend.calls[0]).toEqual({ maxTokens: 2000, temperature: 0.3, stream: true, signal: undefined });
  });

  it('writes a/b.txt, loops once with the completed framing, then stops on an empty response', async () => {
    const backend = new ScriptedBackend([writeBlock('a/b.txt', 'hello'), '']);
    const agent = new KilnAgent({ model: backend, workspace: temp.workspace });

    const response = await agent.chat('create a/b.txt');

    expect(response.state).toBe('DONE');
    expect(response.iterations).toBe(2);
    expect(response.toolsUsed).toEqual(['write_file']);
    expect(await readFile(join(temp.root, 'a', 'b.txt'), 'utf-8')).toBe('hello');

    const exchanges = agent.getConversation().exchanges;
    expect(exchanges).toHaveLength(1);
    expect(exchanges[0].operation).toBe('write_file');

    expect(backend.prompts[0]).toContain('User Request:\ncreate a/b.txt');
    expect(backend.prompts[1]).toContain('Status: Success - No further action needed');
    expect(backend.prompts[1]).toContain('- write_file (ok): Successfully wrote to a/b.txt');
    expect(agent.getEnvironment().getFile('a/b.txt')?.exists).toBe(true);
  });

  it('fails after one iteration when a write cannot succeed', async () => {
    await writeFile(join(temp.root, 'a'), 'a regular file');
    const backend = new ScriptedBackend([writeBlock('a/b.txt', 'hello'), 'should not be asked']);
    const agent = new KilnAgent({ model: backend, workspace: temp.workspace });

    const response = await agent.chat('create a/b.txt');

    expect(response.state).toBe('FAILED');
    expect(response.iterations).toBe(1);
    expect(backend.prompts).toHaveLength(1);
    expect(response.feedback).toContain('Status: Failed');
    expect(agent.getConversation().exchanges).toHaveLength(1);
    expect(agent.getEnvironment().getStats().failureCount).toBe(1);
  });

  it('stops at the iteration ceiling', async () => {
    const notices: string[] = [];
    const backend = new ScriptedBackend([writeBlock('one.txt', '1'), writeBlock('two.txt', '2'), writeBlock('three.txt', '3')]);
    const agent = new KilnAgent({
      model: backend,
      workspace: temp.workspace,
      maxIterations: 2,
      observer: { onNotice: message => notices.push(message) },
    });

    const response = await agent.chat('keep going');

    expect(response.state).toBe('FAILED');
    expect(response.iterations).toBe(2);
    expect(response.notice).toBe('Maximum number of agent-tool interactions (2) reached.');
    expect(notices).toEqual(['Maximum number of agent-tool interactions (2) reached.']);
    expect(backend.prompts).toHaveLength(2);
  });

  it('cancels during generation without recording the exchange', async () => {
    const controller = new AbortController();
    const backend = new ScriptedBackend([{ waitForAbort: true }]);
    const agent = new KilnAgent({
      model: backend,
      workspace: temp.workspace,
      observer: { onToken: () => controller.abort() },
    });

    const response = await agent.chat('write a novel', { signal: controller.signal });

    expect(response.state).toBe('CANCELLED');
    expect(response.iterations).toBe(0);
    expect(agent.getConversation().exchanges).toHaveLength(0);
    expect(agent.state).toBe('CANCELLED');
  });

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const backend = new ScriptedBackend(['unused']);
    const agent = new KilnAgent({ model: backend, workspace: temp.workspace });

    const response = await agent.chat('hi', { signal: controller.signal });

    expect(response.state).toBe('CANCELLED');
    expect(backend.prompts).toHaveLength(0);
  });

  it('propagates backend failures as ModelError', async () => {
    const failing = new KilnAgent({
      model: new ScriptedBackend([new ModelError('server down', 'scripted')]),
      workspace: temp.workspace,
    });
    await expect(failing.chat('hi')).rejects.toThrow('server down');

    const broken = new KilnAgent({ model: new ScriptedBackend([new Error('boom')]), workspace: temp.workspace });
    const error = await broken.chat('hi').catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ModelError);
    expect(error).toHaveProperty('message', 'Failed to get response from model: boom');
  });

  it('accounts the request and context in the budget and resets cleanly', async () => {
    const agent = new KilnAgent({
      model: new ScriptedBackend(['ok']),
      workspace: temp.workspace,
      context: 'project notes',
    });

    await agent.chat('summarise the project');
    const conversation = agent.getConversation();
    expect(conversation.budget.get('current')).toBe(estimateTokens('summarise the project'));
    expect(conversation.budget.get('context')).toBe(estimateTokens('project notes'));

    agent.reset();
    expect(agent.getConversation().exchanges).toHaveLength(0);
  });
});
