/**
 * Tool command parser
 *
 * Pulls command blocks out of free-form model output:
 *
 *   %%tool write_file
 *   %%path ./src/index.ts
 *   %%content
 *   ...literal content...
 *   %%end
 *
 * Blocks without a payload close with %%end right after the path line.
 * Anything between blocks is prose and is ignored.
 */

export interface ParsedCommand {
  operation: string;
  path: string;
  /** Raw payload, undefined when the block had no %%content section */
  content?: string;
}

const COMMAND_PATTERN =
  /%%tool[ \t]+([\w-]+)[ \t]*\r?\n[ \t]*%%path[ \t]+([^\r\n]+?)[ \t]*\r?\n[ \t]*(?:%%content[ \t]*(?:\r?\n)?([\s\S]*?)%%end|%%end)/g;

function unquote(path: string): string {
  const match = /^(["'`])(.*)\1$/.exec(path);
  return match ? match[2] : path;
}

/**
 * Remove leading/trailing blank lines and the indentation every non-blank
 * line shares.
 */
export function dedent(text: string): string {
  const lines = text.replace(/\r\n/g, '\n').split('\n');

  while (lines.length > 0 && lines[0].trim() === '') {
    lines.shift();
  }
  while (lines.length > 0 && lines[lines.length - 1].trim() === '') {
    lines.pop();
  }

  const common = lines.reduce<number | undefined>((min, line) => {
    if (line.trim() === '') {
      return min;
    }
    const indent = /^[ \t]*/.exec(line)?.[0].length ?? 0;
    return min === undefined ? indent : Math.min(min, indent);
  }, undefined) ?? 0;

  return lines.map(line => (line.trim() === '' ? '' : line.slice(common))).join('\n');
}

/**
 * Expand literal \n and \t when the whole payload arrived escaped on a
 * single line. Multi-line payloads are left alone so string literals in
 * code keep their escapes.
 */
export function unescapeContent(text: string): string {
  if (text.includes('\n') || !/\\[nt]/.test(text)) {
    return text;
  }
  return text.replace(/\\n/g, '\n').replace(/\\t/g, '\t');
}

/** Payload as it should land on disk for write_file. */
export function normalizeWriteContent(raw: string): string {
  return dedent(unescapeContent(dedent(raw)));
}

export function parseCommands(response: string): ParsedCommand[] {
  const commands: ParsedCommand[] = [];

  for (const match of response.matchAll(COMMAND_PATTERN)) {
    const [, operation, rawPath, content] = match;
    commands.push({
      operation: operation.trim(),
      path: unquote(rawPath.trim()),
      ...(content !== undefined ? { content } : {}),
    });
  }

  return commands;
}
