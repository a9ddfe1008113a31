/**
 * Pseudo-terminal transport (Linux/macOS)
 *
 * Runs the user's login shell (`$SHELL -il`) in the home directory on a
 * node-pty pseudo-terminal. node-pty starts the child in its own session
 * with the pty as its controlling terminal, so job control and password
 * prompts behave as in a normal terminal emulator.
 *
 * node-pty is a native add-on and is loaded on first spawn only.
 */

import os from 'os';
import type { IPty } from 'node-pty';
import { createLogger } from '@homelab/utils';
import {
  createExitSignal,
  DEFAULT_COLS,
  DEFAULT_ROWS,
  terminateWithGrace,
  type Disposable,
  type KillSignal,
  type ShellExit,
  type ShellTransport,
} from './shell-transport.js';

const logger = createLogger('PtyTransport');

/** Variables that make ssh and git pop up GUI password prompts */
const STRIPPED_ENV_VARS = ['SSH_ASKPASS', 'SSH_ASKPASS_REQUIRE', 'DISPLAY'];

/**
 * Environment for the shell: the server's environment with terminal and
 * locale settings forced, minus GUI askpass hooks
 */
export function buildShellEnv(base: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined && !STRIPPED_ENV_VARS.includes(key)) {
      env[key] = value;
    }
  }
  return {
    ...env,
    TERM: 'xterm-256color',
    COLORTERM: 'truecolor',
    COLUMNS: String(DEFAULT_COLS),
    LINES: String(DEFAULT_ROWS),
    LC_ALL: 'en_US.UTF-8',
    LANG: 'en_US.UTF-8',
  };
}

export interface PtySpawnOptions {
  /** Shell executable (default: $SHELL or /bin/bash) */
  shell?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export class PtyShellTransport implements ShellTransport {
  readonly supportsResize = true;

  private readonly exitSignal = createExitSignal();
  private exited = false;

  private constructor(private readonly pty: IPty) {
    pty.onExit(() => {
      this.exited = true;
      this.exitSignal.markExited();
    });
  }

  /**
   * Spawn a login shell on a new pseudo-terminal.
   * Rejects when node-pty cannot be loaded or the shell cannot be started.
   */
  static async spawn(options: PtySpawnOptions = {}): Promise<PtyShellTransport> {
    const shell = options.shell ?? process.env.SHELL ?? '/bin/bash';
    const { spawn } = await import('node-pty');

    const pty = spawn(shell, ['-il'], {
      name: 'xterm-256color',
      cols: DEFAULT_COLS,
      rows: DEFAULT_ROWS,
      cwd: options.cwd ?? os.homedir(),
      env: buildShellEnv(options.env),
      encoding: 'utf8',
    });

    logger.info(`Spawned ${shell} -il (pid ${pty.pid})`);
    return new PtyShellTransport(pty);
  }

  get pid(): number {
    return this.pty.pid;
  }

  write(data: string): void {
    this.pty.write(data);
  }

  resize(cols: number, rows: number): void {
    this.pty.resize(cols, rows);
  }

  onData(listener: (text: string) => void): Disposable {
    return this.pty.onData(listener);
  }

  onExit(listener: (exit: ShellExit) => void): Disposable {
    return this.pty.onExit(({ exitCode, signal }) => {
      listener({ exitCode, signal: signal ?? null });
    });
  }

  async terminate(graceMs: number): Promise<void> {
    if (this.exited) return;
    await terminateWithGrace(
      (signal: KillSignal) => this.pty.kill(signal),
      this.exitSignal.exited,
      graceMs
    );
  }
}
