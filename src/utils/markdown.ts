/**
 * Markdown Rendering Utilities
 *
 * Renders complete model responses for the terminal when streaming is off.
 */

import { Marked } from 'marked';
import { markedTerminal } from 'marked-terminal';
import { logger } from './logger.js';

// Create marked instance with terminal renderer
const marked = new Marked(
  markedTerminal({
    width: 100,
    showSectionPrefix: false,
    unescape: true,
    emoji: false,
    tab: 2,
  }) as any
);

const COMMAND_START = /^\s*%%tool\b/;
const COMMAND_END = /^\s*%%end\s*$/;

/**
 * Wrap %%tool ... %%end blocks in code fences so the renderer shows them
 * verbatim instead of reflowing file contents as prose
 */
export function fenceCommandBlocks(text: string): string {
  const out: string[] = [];
  let inside = false;

  for (const line of text.split('\n')) {
    if (!inside && COMMAND_START.test(line)) {
      out.push('```');
      inside = true;
    }
    out.push(line);
    if (inside && COMMAND_END.test(line)) {
      out.push('```');
      inside = false;
    }
  }
  if (inside) {
    out.push('```');
  }

  return out.join('\n');
}

/**
 * Render markdown text for terminal display
 */
export function renderMarkdown(text: string): string {
  try {
    return marked.parse(text) as string;
  } catch (error) {
    logger.debug(`Markdown rendering failed, printing plain text: ${error instanceof Error ? error.message : String(error)}`);
    return text;
  }
}

/**
 * Check if a string contains markdown formatting
 */
export function containsMarkdown(text: string): boolean {
  const markdownPatterns = [
    /^#{1,6}\s/m, // Headers
    /\*\*.*\*\*/m, // Bold
    /`.*`/m, // Code
    /^```/m, // Code blocks
    /^\s*[-*+]\s/m, // Lists
    /^\s*\d+\.\s/m, // Numbered lists
    /\[.*\]\(.*\)/m, // Links
  ];

  return markdownPatterns.some(pattern => pattern.test(text));
}

/**
 * Format a model response for CLI output
 */
export function formatForCLI(text: string): string {
  const fenced = fenceCommandBlocks(text);
  if (containsMarkdown(fenced)) {
    return renderMarkdown(fenced);
  }
  return text;
}
