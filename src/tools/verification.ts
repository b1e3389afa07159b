/**
 * Post-condition checks
 *
 * Each check re-reads the file system after an operation reported success
 * and compares what is there with what the operation meant to leave behind.
 */

import { isDeepStrictEqual } from 'util';
import { captureFileState, hashContent } from '../core/environment.js';
import type { VerificationReport } from '../core/types/operation-result.js';
import { loadStructured } from './fs-primitives.js';

function report(checks: Record<string, boolean>, reasons: Record<string, string>): VerificationReport {
  const failedCheck = Object.keys(checks).find(name => !checks[name]);
  return {
    passed: failedCheck === undefined,
    checks,
    ...(failedCheck !== undefined ? { reason: reasons[failedCheck] ?? `${failedCheck} check failed` } : {}),
  };
}

export async function verifyWrittenFile(target: string, content: string): Promise<VerificationReport> {
  const state = await captureFileState(target);
  if (!state.exists) {
    return report({ exists: false }, { exists: 'File does not exist but should' });
  }
  return report(
    {
      exists: true,
      isFile: !state.isDirectory,
      sizeMatches: state.size === Buffer.byteLength(content, 'utf-8'),
      contentMatches: state.contentHash === hashContent(content),
    },
    {
      isFile: 'Path exists but is a directory',
      sizeMatches: 'File size differs from the written content',
      contentMatches: 'File content differs from the written content',
    }
  );
}

export async function verifySavedJson(target: string, data: unknown): Promise<VerificationReport> {
  const state = await captureFileState(target);
  if (!state.exists) {
    return report({ exists: false }, { exists: 'File does not exist' });
  }

  const loaded = await loadStructured(target);
  if (!loaded.ok) {
    return report({ exists: true, parses: false }, { parses: `Saved file is not valid JSON: ${loaded.message}` });
  }

  // Compare against the value as JSON can carry it: -0 becomes 0, out-of-range numbers become null
  const expected: unknown = JSON.parse(JSON.stringify(data));
  return report(
    { exists: true, parses: true, structureMatches: isDeepStrictEqual(loaded.value, expected) },
    { structureMatches: 'Saved JSON does not match expected structure' }
  );
}

export async function verifyDirectory(target: string): Promise<VerificationReport> {
  const state = await captureFileState(target);
  return report(
    { exists: state.exists, isDirectory: state.isDirectory },
    { exists: 'Directory does not exist', isDirectory: 'Path exists but is not a directory' }
  );
}

export async function verifyExists(target: string): Promise<VerificationReport> {
  const state = await captureFileState(target);
  return report({ exists: state.exists }, { exists: 'File does not exist' });
}

export async function verifyAbsent(target: string): Promise<VerificationReport> {
  const state = await captureFileState(target);
  return report({ absent: !state.exists }, { absent: 'File still exists after deletion' });
}
