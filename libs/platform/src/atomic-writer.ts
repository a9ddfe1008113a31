/**
 * Atomic JSON persistence
 *
 * Writes go to a temporary file next to the target and are renamed into
 * place, so a crash mid-write never leaves a truncated JSON file behind.
 * Reads treat a missing or malformed file as "no data yet". All I/O goes
 * through secure-fs.
 */

import path from 'path';
import { createLogger, getErrorCode, getErrorMessage } from '@homelab/utils';
import * as secureFs from './secure-fs.js';

const logger = createLogger('AtomicWriter');

export interface AtomicWriteOptions {
  /** JSON indentation (default: 2) */
  indent?: number;
}

/**
 * Serialize `value` as JSON and atomically replace `filePath`.
 * Parent directories are created when missing.
 */
export async function atomicWriteJson(
  filePath: string,
  value: unknown,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const { indent = 2 } = options;
  const dir = path.dirname(filePath);
  const tempPath = path.join(
    dir,
    `.${path.basename(filePath)}.${process.pid}.${Date.now()}.${Math.random().toString(36).slice(2, 8)}.tmp`
  );

  await secureFs.mkdir(dir, { recursive: true });

  try {
    await secureFs.writeFile(tempPath, JSON.stringify(value, null, indent));
    await secureFs.rename(tempPath, filePath);
  } catch (error) {
    await secureFs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Result of a recovering JSON read
 */
export interface JsonReadResult<T> {
  /** Parsed (or fallback) data */
  data: T;
  /** True when the fallback was substituted */
  recovered: boolean;
  /** Why the fallback was used */
  reason?: 'missing' | 'malformed' | 'unreadable';
  error?: string;
}

/**
 * Read and parse a JSON file, substituting `fallback` when the file is absent,
 * unreadable or not valid JSON. Never throws.
 *
 * The parsed value is returned as `unknown`; callers validate its shape.
 */
export async function readJsonWithRecovery(
  filePath: string,
  fallback: unknown
): Promise<JsonReadResult<unknown>> {
  let raw: string;
  try {
    raw = await secureFs.readFile(filePath);
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      return { data: fallback, recovered: true, reason: 'missing' };
    }
    return {
      data: fallback,
      recovered: true,
      reason: 'unreadable',
      error: getErrorMessage(error),
    };
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    return { data: parsed, recovered: false };
  } catch (error) {
    return {
      data: fallback,
      recovered: true,
      reason: 'malformed',
      error: getErrorMessage(error),
    };
  }
}

/**
 * Log a warning when readJsonWithRecovery() substituted defaults for a file
 * that exists but could not be used. A missing file is expected on first run.
 */
export function logRecoveryWarning(
  result: JsonReadResult<unknown>,
  filePath: string,
  what: string
): void {
  if (!result.recovered || result.reason === 'missing') return;
  logger.warn(`Using defaults for ${what}: ${filePath} is ${result.reason} (${result.error ?? ''})`);
}
