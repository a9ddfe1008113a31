/**
 * Event Socket - Pushes dashboard events to browsers on /api/events
 *
 * Every connected client receives each event as a JSON text frame
 * `{ type, payload }`. Clients never send anything meaningful; incoming
 * frames are ignored.
 */

import type { IncomingMessage } from 'http';
import type { Duplex } from 'stream';
import { WebSocketServer, WebSocket } from 'ws';
import { createLogger, getErrorMessage } from '@homelab/utils';
import type { EventEmitter, EventType } from '../lib/events.js';

const logger = createLogger('EventSocket');

export const EVENTS_PATH = '/api/events';

export class EventSocketService {
  private readonly wss = new WebSocketServer({ noServer: true });
  private readonly unsubscribe: () => void;

  constructor(events: EventEmitter) {
    this.unsubscribe = events.subscribe((type, payload) => this.broadcast(type, payload));
    this.wss.on('connection', (ws: WebSocket) => {
      logger.debug(`Client connected (${this.wss.clients.size} total)`);
      ws.on('error', (error) => {
        logger.warn('Client socket error:', getErrorMessage(error));
      });
    });
  }

  get clientCount(): number {
    return this.wss.clients.size;
  }

  handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    this.wss.handleUpgrade(req, socket, head, (ws) => {
      this.wss.emit('connection', ws, req);
    });
  }

  /**
   * Send one event to every open client
   */
  broadcast(type: EventType, payload: unknown): void {
    const frame = JSON.stringify({ type, payload });
    for (const client of this.wss.clients) {
      if (client.readyState !== WebSocket.OPEN) continue;
      client.send(frame, (error) => {
        if (error) logger.debug(`Dropped ${type} for a client:`, getErrorMessage(error));
      });
    }
  }

  async shutdown(): Promise<void> {
    this.unsubscribe();
    for (const client of this.wss.clients) {
      client.close(1001, 'server shutdown');
    }
    await new Promise<void>((resolve, reject) => {
      this.wss.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
