import { describe, expect, it } from 'vitest';
import { ErrorKind, failed, succeeded } from '../../core/types/operation-result.js';
import { ConsoleObserver, describeExecution } from './console-observer.js';

describe('describeExecution', () => {
  it('summarises an execution on one line', () => {
    expect(
      describeExecution({ tool: 'write_file', path: 'a.txt', result: succeeded('Successfully wrote to a.txt') })
    ).toBe('✓ write_file a.txt: Successfully wrote to a.txt');
    expect(
      describeExecution({ tool: 'list_directory', path: 'src', result: succeeded('Contents of src:\n  - a.ts') })
    ).toBe('✓ list_directory src: Contents of src:');
    expect(
      describeExecution({ tool: 'read_file', path: 'x', result: failed('File x does not exist', ErrorKind.NotFound, 'E') })
    ).toBe('✗ read_file x: File x does not exist');
  });
});

describe('ConsoleObserver', () => {
  it('writes streamed tokens in order after a header', () => {
    const out: string[] = [];
    const observer = new ConsoleObserver({ stream: true, spinner: false, write: text => out.push(text) });

    observer.onStateChange('GENERATING');
    observer.onToken('Hel');
    observer.onToken('lo');
    observer.onGenerationComplete('Hello');

    expect(out).toHaveLength(4);
    expect(out.slice(1)).toEqual(['Hel', 'lo', '\n']);
  });

  it('prints nothing per token when streaming is off', () => {
    const out: string[] = [];
    const observer = new ConsoleObserver({ stream: false, spinner: false, write: text => out.push(text) });

    observer.onStateChange('GENERATING');
    observer.onToken('ignored');
    observer.onGenerationComplete('');

    expect(out).toEqual([]);
  });
});
