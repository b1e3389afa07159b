/**
 * Prompt assembly
 *
 * The backend is a plain completion endpoint, so every round-trip sends one
 * self-contained prompt: instructions, the command manual, workspace state,
 * recent history and either the user request or the previous results.
 */

import { OPERATION_KINDS } from './types/operation-result.js';

export const SYSTEM_PROMPT = [
  'You are Kiln, a coding assistant working inside a sandboxed workspace directory.',
  '',
  'You can only change files by emitting tool commands. Anything you merely describe does not happen.',
  '',
  'Guidelines:',
  '- Say briefly what you are about to do, then emit the commands',
  '- Use paths relative to the workspace root',
  '- Emit one command block per operation',
  '- Commands run in the order you write them; results come back in the next message',
  '- Never repeat an operation that already completed',
  '- If an operation failed, explain the error instead of guessing',
].join('\n');

export const TOOL_MANUAL = [
  'TOOL COMMANDS',
  '',
  'Write a file:',
  '%%tool write_file',
  '%%path ./src/greeting.ts',
  '%%content',
  "export const greeting = 'hello';",
  '%%end',
  '',
  'Read a file:',
  '%%tool read_file',
  '%%path ./src/greeting.ts',
  '%%end',
  '',
  'Save structured data:',
  '%%tool save_json',
  '%%path ./data/settings.json',
  '%%content',
  '{ "theme": "dark" }',
  '%%end',
  '',
  `Available operations: ${OPERATION_KINDS.join(', ')}`,
  '',
  'Rules:',
  '1. Every command starts with %%tool and ends with %%end',
  '2. Text between %%content and %%end is written exactly as given',
  '3. Paths cannot leave the workspace',
].join('\n');

export interface InitialPromptParts {
  request: string;
  workspace: string;
  context: string;
  history: string;
}

export interface ContinuationPromptParts extends InitialPromptParts {
  previousResult: string;
  operationLog: string;
}

export function buildInitialPrompt(parts: InitialPromptParts): string {
  return [
    SYSTEM_PROMPT,
    '',
    TOOL_MANUAL,
    '',
    'Current Workspace State:',
    parts.workspace,
    '',
    'Context Files:',
    parts.context || 'No additional context provided',
    '',
    'Conversation History:',
    parts.history,
    '',
    'User Request:',
    parts.request,
  ].join('\n');
}

export function buildContinuationPrompt(parts: ContinuationPromptParts): string {
  return [
    SYSTEM_PROMPT,
    '',
    TOOL_MANUAL,
    '',
    'Previous Operation Results:',
    parts.previousResult || 'No previous operation results',
    '',
    'Current Task Context:',
    `- Original Request: ${parts.request}`,
    `- Current State: ${parts.workspace}`,
    `- Available Context: ${parts.context || 'No additional context'}`,
    '',
    'Recent Operations:',
    parts.operationLog,
    '',
    'Conversation History:',
    parts.history,
    '',
    'Remember:',
    '1. If tools were just executed, give ONLY a short summary of what was done and ask if anything else is needed',
    '2. If the task is not finished, use tool commands for the remaining file operations',
    '3. Keep the answer focused',
  ].join('\n');
}

export function completedFraming(label: string, result: string): string {
  return [
    'Previous Operation Complete',
    `Operation: ${label}`,
    'Status: Success - No further action needed',
    `Result: ${result}`,
    'Note: This operation has completed successfully. Unless the user asked for more, no further tool calls are needed.',
  ].join('\n');
}

export function failedFraming(label: string, result: string, error?: string): string {
  return [
    'Last Operation Results:',
    `Operation: ${label}`,
    'Status: Failed',
    `Error: ${result}`,
    `Details: ${error ?? 'No additional details'}`,
  ].join('\n');
}
