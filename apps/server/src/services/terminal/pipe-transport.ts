/**
 * Pipe transport (Windows)
 *
 * PowerShell (falling back to %COMSPEC%) on plain stdin/stdout pipes with
 * stderr merged into the output. There is no window size, so resize is a
 * no-op.
 */

import { spawn, type ChildProcessWithoutNullStreams } from 'child_process';
import os from 'os';
import { createLogger, getErrorMessage } from '@homelab/utils';
import {
  createExitSignal,
  terminateWithGrace,
  Utf8StreamDecoder,
  type Disposable,
  type KillSignal,
  type ShellExit,
  type ShellTransport,
} from './shell-transport.js';

const logger = createLogger('PipeTransport');

export interface ShellCommand {
  command: string;
  args: string[];
}

/** Commands tried in order until one starts */
export function windowsShellCommands(env: NodeJS.ProcessEnv = process.env): ShellCommand[] {
  return [
    { command: 'powershell.exe', args: ['-NoLogo', '-NoProfile'] },
    { command: env.COMSPEC ?? 'cmd.exe', args: [] },
  ];
}

/**
 * Resolve once the child has started, reject on a spawn error (ENOENT, EACCES)
 */
function startProcess(
  { command, args }: ShellCommand,
  cwd: string
): Promise<ChildProcessWithoutNullStreams> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      env: process.env,
      stdio: 'pipe',
      windowsHide: true,
    });

    const onError = (error: Error): void => {
      child.off('spawn', onSpawn);
      reject(error);
    };
    const onSpawn = (): void => {
      child.off('error', onError);
      resolve(child);
    };

    child.once('error', onError);
    child.once('spawn', onSpawn);
  });
}

export class PipeShellTransport implements ShellTransport {
  readonly supportsResize = false;

  private readonly exitSignal = createExitSignal();
  private readonly dataListeners = new Set<(text: string) => void>();
  private readonly exitListeners = new Set<(exit: ShellExit) => void>();
  private exited = false;

  private constructor(private readonly child: ChildProcessWithoutNullStreams) {
    const stdoutDecoder = new Utf8StreamDecoder();
    const stderrDecoder = new Utf8StreamDecoder();

    child.stdout.on('data', (chunk: Buffer) => this.emitData(stdoutDecoder.write(chunk)));
    child.stderr.on('data', (chunk: Buffer) => this.emitData(stderrDecoder.write(chunk)));
    child.stdin.on('error', (error) => {
      logger.debug('stdin error:', getErrorMessage(error));
    });
    child.on('error', (error) => {
      logger.error('Shell process error:', getErrorMessage(error));
    });
    child.on('exit', (exitCode, signal) => {
      this.emitData(stdoutDecoder.end() + stderrDecoder.end());
      this.exited = true;
      this.exitSignal.markExited();
      for (const listener of this.exitListeners) {
        listener({ exitCode, signal });
      }
    });
  }

  /**
   * Start the first shell from `commands` that spawns successfully
   */
  static async spawn(
    commands: ShellCommand[] = windowsShellCommands(),
    cwd: string = os.homedir()
  ): Promise<PipeShellTransport> {
    let lastError: unknown = new Error('No shell command to start');
    for (const command of commands) {
      try {
        const child = await startProcess(command, cwd);
        logger.info(`Spawned ${command.command} (pid ${child.pid ?? 'unknown'})`);
        return new PipeShellTransport(child);
      } catch (error) {
        logger.warn(`Could not start ${command.command}:`, getErrorMessage(error));
        lastError = error;
      }
    }
    throw lastError;
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  write(data: string): void {
    this.child.stdin.write(data);
  }

  resize(): void {
    // No window size on pipes
  }

  onData(listener: (text: string) => void): Disposable {
    this.dataListeners.add(listener);
    return { dispose: () => this.dataListeners.delete(listener) };
  }

  onExit(listener: (exit: ShellExit) => void): Disposable {
    this.exitListeners.add(listener);
    return { dispose: () => this.exitListeners.delete(listener) };
  }

  async terminate(graceMs: number): Promise<void> {
    if (this.exited) return;
    await terminateWithGrace(
      (signal: KillSignal) => {
        this.child.kill(signal);
      },
      this.exitSignal.exited,
      graceMs
    );
  }

  private emitData(text: string): void {
    if (!text) return;
    for (const listener of this.dataListeners) {
      listener(text);
    }
  }
}
