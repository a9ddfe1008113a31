/**
 * Throttled file system wrapper
 *
 * Every call goes through a shared p-limit queue so bursts of reads/writes
 * (parallel widget refreshes, settings saves) cannot exhaust file
 * descriptors. Calls that still fail with EMFILE/ENFILE are retried with
 * exponential backoff.
 */

import fs from 'fs/promises';
import type { Dirent, MakeDirectoryOptions, RmOptions } from 'fs';
import pLimit from 'p-limit';
import { getErrorCode, retryWithBackoff } from '@homelab/utils';

export interface ThrottleConfig {
  /** Maximum concurrent file operations (default: 100) */
  maxConcurrency: number;
  /** Retries for EMFILE/ENFILE (default: 3) */
  maxRetries: number;
  /** Base backoff delay in ms (default: 100) */
  baseDelay: number;
  /** Maximum backoff delay in ms (default: 5000) */
  maxDelay: number;
}

const DEFAULT_CONFIG: ThrottleConfig = {
  maxConcurrency: 100,
  maxRetries: 3,
  baseDelay: 100,
  maxDelay: 5000,
};

let config: ThrottleConfig = { ...DEFAULT_CONFIG };
let limiter = pLimit(config.maxConcurrency);

/**
 * Update throttling settings. Changing maxConcurrency replaces the limiter;
 * operations already queued finish on the old one.
 */
export function configureThrottling(partial: Partial<ThrottleConfig>): void {
  const next = { ...config, ...partial };
  if (next.maxConcurrency !== config.maxConcurrency) {
    limiter = pLimit(next.maxConcurrency);
  }
  config = next;
}

export function getThrottlingConfig(): ThrottleConfig {
  return { ...config };
}

/** Operations waiting for a slot */
export function getPendingOperations(): number {
  return limiter.pendingCount;
}

/** Operations currently running */
export function getActiveOperations(): number {
  return limiter.activeCount;
}

function isFileDescriptorError(error: unknown): boolean {
  const code = getErrorCode(error);
  return code === 'EMFILE' || code === 'ENFILE';
}

function throttled<T>(operation: () => Promise<T>): Promise<T> {
  return limiter(() =>
    retryWithBackoff(operation, {
      maxRetries: config.maxRetries,
      baseDelay: config.baseDelay,
      maxDelay: config.maxDelay,
      shouldRetry: isFileDescriptorError,
    })
  );
}

// ---------------------------------------------------------------------------
// fs/promises surface
// ---------------------------------------------------------------------------

export function readFile(filePath: string, encoding: BufferEncoding = 'utf-8'): Promise<string> {
  return throttled(() => fs.readFile(filePath, encoding));
}

export function writeFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  return throttled(() => fs.writeFile(filePath, data, encoding));
}

export function mkdir(dirPath: string, options?: MakeDirectoryOptions): Promise<string | undefined> {
  return throttled(() => fs.mkdir(dirPath, options));
}

export function rename(oldPath: string, newPath: string): Promise<void> {
  return throttled(() => fs.rename(oldPath, newPath));
}

export function rm(target: string, options?: RmOptions): Promise<void> {
  return throttled(() => fs.rm(target, options));
}

export function readdir(dirPath: string): Promise<Dirent[]> {
  return throttled(() => fs.readdir(dirPath, { withFileTypes: true }));
}
