/**
 * ShellTransport - Interactive shell process behind the terminal bridge
 *
 * Two implementations: a pseudo-terminal (node-pty) on Linux/macOS and
 * plain stdio pipes on Windows. The bridge only talks to this interface.
 */

import { createLogger } from '@homelab/utils';

const logger = createLogger('ShellTransport');

export interface Disposable {
  dispose(): void;
}

export interface ShellExit {
  exitCode: number | null;
  signal: string | number | null;
}

export type KillSignal = 'SIGTERM' | 'SIGKILL';

export interface ShellTransport {
  /** `false` for pipe-backed shells, which have no window size */
  readonly supportsResize: boolean;
  readonly pid: number | undefined;
  /** Write raw keystrokes */
  write(data: string): void;
  resize(cols: number, rows: number): void;
  /** Subscribe to decoded output text */
  onData(listener: (text: string) => void): Disposable;
  /** Fires once when the process exits */
  onExit(listener: (exit: ShellExit) => void): Disposable;
  /**
   * SIGTERM, then SIGKILL if the process has not exited within `graceMs`.
   * Resolves once the process exited or was killed; safe to call repeatedly.
   */
  terminate(graceMs: number): Promise<void>;
}

/** Initial terminal size, matching COLUMNS/LINES in the shell environment */
export const DEFAULT_COLS = 120;
export const DEFAULT_ROWS = 30;

/** Time a shell gets to exit after SIGTERM */
export const DEFAULT_KILL_GRACE_MS = 1000;

/**
 * Streaming UTF-8 decoder
 *
 * Multi-byte sequences split across chunks are carried over to the next
 * chunk; invalid bytes decode to U+FFFD.
 */
export class Utf8StreamDecoder {
  private readonly decoder = new TextDecoder('utf-8', { fatal: false });

  write(chunk: Uint8Array): string {
    return this.decoder.decode(chunk, { stream: true });
  }

  /** Flush any incomplete trailing sequence */
  end(): string {
    return this.decoder.decode();
  }
}

/**
 * Send SIGTERM, wait up to `graceMs` for `exited` to settle, then SIGKILL.
 * Kill failures (process already gone) are logged and otherwise ignored.
 */
export async function terminateWithGrace(
  kill: (signal: KillSignal) => void,
  exited: Promise<void>,
  graceMs: number
): Promise<void> {
  const send = (signal: KillSignal): void => {
    try {
      kill(signal);
    } catch (error) {
      logger.debug(`${signal} failed:`, error);
    }
  };

  send('SIGTERM');

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timedOut = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(true), graceMs);
  });
  const needsKill = await Promise.race([exited.then(() => false), timedOut]);
  clearTimeout(timer);

  if (needsKill) {
    logger.warn(`Shell ignored SIGTERM for ${graceMs}ms, sending SIGKILL`);
    send('SIGKILL');
  }
}

/**
 * A promise that resolves on the first exit, plus the hook that resolves it
 */
export function createExitSignal(): { exited: Promise<void>; markExited: () => void } {
  let markExited: () => void = () => {};
  const exited = new Promise<void>((resolve) => {
    markExited = resolve;
  });
  return { exited, markExited };
}
