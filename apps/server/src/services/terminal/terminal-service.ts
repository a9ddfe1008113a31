/**
 * Terminal Service - Serves browser terminals on the /terminal WebSocket
 *
 * Each connection gets its own TerminalSession and shell. Active sessions
 * are tracked so shutdown() can close them all.
 */

import type { IncomingMessage } from 'http';
import type { Duplex } from 'stream';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { createLogger, getErrorMessage } from '@homelab/utils';
import type { EventEmitter } from '../../lib/events.js';
import { PipeShellTransport } from './pipe-transport.js';
import { PtyShellTransport } from './pty-transport.js';
import type { ShellTransport } from './shell-transport.js';
import { TerminalSession, type TerminalPeer } from './terminal-session.js';

const logger = createLogger('Terminal');

export const TERMINAL_PATH = '/terminal';

/**
 * Start an interactive shell for the current platform:
 * pipes on Windows, a pseudo-terminal everywhere else
 */
export function createShellTransport(
  platform: NodeJS.Platform = process.platform
): Promise<ShellTransport> {
  return platform === 'win32' ? PipeShellTransport.spawn() : PtyShellTransport.spawn();
}

/**
 * Text of a ws message, whatever buffer shape it arrived in
 */
export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/**
 * Adapt a ws socket to the session's peer interface
 */
export function createSocketPeer(ws: WebSocket): TerminalPeer {
  return {
    send: (text) =>
      new Promise<void>((resolve, reject) => {
        ws.send(text, (error) => (error ? reject(error) : resolve()));
      }),
    close: (code, reason) => {
      if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
        ws.close(code, reason);
      }
    },
  };
}

export interface TerminalServiceOptions {
  /** Shell factory (default: createShellTransport) */
  spawnShell?: () => Promise<ShellTransport>;
  /** Grace period between SIGTERM and SIGKILL */
  killGraceMs?: number;
  events?: EventEmitter;
}

export class TerminalService {
  private readonly wss = new WebSocketServer({ noServer: true });
  private readonly sessions = new Set<TerminalSession>();
  private readonly spawnShell: () => Promise<ShellTransport>;

  constructor(private readonly options: TerminalServiceOptions = {}) {
    this.spawnShell = options.spawnShell ?? (() => createShellTransport());
    this.wss.on('connection', (ws: WebSocket) => this.attach(ws));
  }

  /** Number of open sessions */
  get activeSessions(): number {
    return this.sessions.size;
  }

  /**
   * Complete a WebSocket upgrade for the /terminal path
   */
  handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    this.wss.handleUpgrade(req, socket, head, (ws) => {
      this.wss.emit('connection', ws, req);
    });
  }

  /**
   * Bind a connected socket to a new session and start its shell
   */
  attach(ws: WebSocket): TerminalSession {
    const session = new TerminalSession(createSocketPeer(ws), this.spawnShell, {
      killGraceMs: this.options.killGraceMs,
      onClosed: (closed) => {
        this.sessions.delete(closed);
        this.options.events?.emit('terminal:closed', { session: closed.id });
      },
    });
    this.sessions.add(session);

    ws.on('message', (data: RawData) => session.handleInput(rawDataToString(data)));
    ws.on('close', () => {
      session.close('socket closed').catch((error: unknown) => {
        logger.error(`Session ${session.id}: close failed:`, error);
      });
    });
    ws.on('error', (error) => {
      logger.warn(`Session ${session.id}: socket error:`, getErrorMessage(error));
      session.close('socket error').catch((closeError: unknown) => {
        logger.error(`Session ${session.id}: close failed:`, closeError);
      });
    });

    this.options.events?.emit('terminal:opened', { session: session.id });
    session.start().catch((error: unknown) => {
      logger.error(`Session ${session.id}: start failed:`, error);
    });
    return session;
  }

  /**
   * Close every session and stop accepting connections
   */
  async shutdown(): Promise<void> {
    const sessions = [...this.sessions];
    if (sessions.length > 0) {
      logger.info(`Closing ${sessions.length} terminal session(s)`);
    }
    await Promise.all(sessions.map((session) => session.close('server shutdown', 1001)));
    await new Promise<void>((resolve, reject) => {
      this.wss.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
