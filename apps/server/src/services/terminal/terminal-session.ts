/**
 * TerminalSession - Bridges one WebSocket connection to one shell
 *
 * Lifecycle: spawning → active → closing → closed.
 *
 * - spawning: the transport is being started; input frames are buffered
 * - active: shell output is relayed to the peer and input frames are
 *   classified as resize commands or keystrokes
 * - closing: entered exactly once, from socket close, socket error, shell
 *   exit, spawn failure or an I/O error. Listeners are released, the shell is
 *   terminated (SIGTERM, then SIGKILL after the grace period) and the peer is
 *   closed.
 * - closed: terminal state
 */

import { createLogger, getErrorMessage } from '@homelab/utils';
import { isResizeFrame, parseResizeFrame } from './resize.js';
import {
  DEFAULT_KILL_GRACE_MS,
  type Disposable,
  type ShellTransport,
} from './shell-transport.js';

const logger = createLogger('TerminalSession');

export type TerminalState = 'spawning' | 'active' | 'closing' | 'closed';

/** The connection side of a session */
export interface TerminalPeer {
  /** Rejects when the frame could not be sent */
  send(text: string): Promise<void>;
  close(code: number, reason: string): void;
}

export interface TerminalSessionOptions {
  /** Time the shell gets between SIGTERM and SIGKILL (default: 1000) */
  killGraceMs?: number;
  /** Called once the session reaches `closed` */
  onClosed?: (session: TerminalSession) => void;
}

/** WebSocket close codes */
const CLOSE_NORMAL = 1000;
const CLOSE_INTERNAL_ERROR = 1011;

let nextSessionId = 1;

export class TerminalSession {
  readonly id = nextSessionId++;

  private stateValue: TerminalState = 'spawning';
  private transport: ShellTransport | null = null;
  private subscriptions: Disposable[] = [];
  private pendingInput: string[] = [];
  private closing: Promise<void> | null = null;

  private readonly killGraceMs: number;
  private readonly onClosed?: (session: TerminalSession) => void;

  constructor(
    private readonly peer: TerminalPeer,
    private readonly spawnShell: () => Promise<ShellTransport>,
    options: TerminalSessionOptions = {}
  ) {
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.onClosed = options.onClosed;
  }

  get state(): TerminalState {
    return this.stateValue;
  }

  /**
   * Spawn the shell and start relaying. A spawn failure sends a short
   * message to the peer and closes the session.
   */
  async start(): Promise<void> {
    let transport: ShellTransport;
    try {
      transport = await this.spawnShell();
    } catch (error) {
      logger.error(`Session ${this.id}: shell failed to start:`, getErrorMessage(error));
      await this.peer
        .send(`Failed to start shell: ${getErrorMessage(error)}\r\n`)
        .catch((sendError: unknown) => {
          logger.debug(`Session ${this.id}: could not report spawn failure:`, sendError);
        });
      await this.close('spawn failed', CLOSE_INTERNAL_ERROR);
      return;
    }

    this.transport = transport;

    // The peer went away while the shell was starting
    if (this.stateValue !== 'spawning') {
      await transport.terminate(this.killGraceMs);
      return;
    }

    this.subscriptions = [
      transport.onData((text) => this.relayOutput(text)),
      transport.onExit((exit) => {
        logger.info(`Session ${this.id}: shell exited (code ${exit.exitCode ?? 'none'})`);
        this.closeInBackground('shell exited', CLOSE_NORMAL);
      }),
    ];
    this.stateValue = 'active';
    logger.info(`Session ${this.id}: active (pid ${transport.pid ?? 'unknown'})`);

    const buffered = this.pendingInput;
    this.pendingInput = [];
    for (const frame of buffered) {
      this.handleInput(frame);
    }
  }

  /**
   * Handle one text frame from the peer
   */
  handleInput(frame: string): void {
    if (this.stateValue === 'spawning') {
      this.pendingInput.push(frame);
      return;
    }
    const transport = this.transport;
    if (this.stateValue !== 'active' || !transport) return;

    if (isResizeFrame(frame)) {
      const size = parseResizeFrame(frame);
      if (size && transport.supportsResize) {
        try {
          transport.resize(size.cols, size.rows);
        } catch (error) {
          logger.warn(`Session ${this.id}: resize failed:`, getErrorMessage(error));
        }
      }
      return;
    }

    try {
      transport.write(frame);
    } catch (error) {
      logger.error(`Session ${this.id}: write failed:`, getErrorMessage(error));
      this.closeInBackground('write failed', CLOSE_INTERNAL_ERROR);
    }
  }

  /**
   * Tear the session down. Idempotent: later calls return the first
   * teardown's promise.
   */
  close(reason: string, code: number = CLOSE_NORMAL): Promise<void> {
    this.closing ??= this.teardown(reason, code);
    return this.closing;
  }

  // ---------------------------------------------------------------------------
  // Internal helpers
  // ---------------------------------------------------------------------------

  private relayOutput(text: string): void {
    if (this.stateValue !== 'active') return;
    this.peer.send(text).catch((error: unknown) => {
      logger.debug(`Session ${this.id}: send failed:`, getErrorMessage(error));
      this.closeInBackground('send failed', CLOSE_INTERNAL_ERROR);
    });
  }

  private closeInBackground(reason: string, code: number): void {
    this.close(reason, code).catch((error: unknown) => {
      logger.error(`Session ${this.id}: teardown failed:`, error);
    });
  }

  private async teardown(reason: string, code: number): Promise<void> {
    this.stateValue = 'closing';
    logger.info(`Session ${this.id}: closing (${reason})`);

    for (const subscription of this.subscriptions) {
      subscription.dispose();
    }
    this.subscriptions = [];
    this.pendingInput = [];

    try {
      await this.transport?.terminate(this.killGraceMs);
    } finally {
      try {
        this.peer.close(code, reason);
      } catch (error) {
        logger.debug(`Session ${this.id}: peer close failed:`, getErrorMessage(error));
      }
      this.stateValue = 'closed';
      this.onClosed?.(this);
    }
  }
}
