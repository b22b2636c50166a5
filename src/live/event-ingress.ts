/**
 * Session event ingress.
 *
 * A WebSocket endpoint through which the hosting framework forwards track
 * and detection events as JSON. Each valid event is acknowledged after the
 * handler has processed it; malformed messages get an error reply.
 */

import { WebSocketServer, type WebSocket, type RawData } from 'ws';
import { parseSessionEvent } from '../session/events';
import type { SessionEvent } from '../session/types';

export type SessionEventHandler = (event: SessionEvent) => Promise<void>;

/**
 * Replies sent to ingress clients.
 */
export type IngressReply =
  | { type: 'ack'; event: SessionEvent['type'] }
  | { type: 'error'; message: string };

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export class SessionEventIngress {
  private readonly handler: SessionEventHandler;
  private wss: WebSocketServer | null = null;

  constructor(handler: SessionEventHandler) {
    this.handler = handler;
  }

  /**
   * Starts listening. Resolves with the bound port (useful with port 0).
   */
  start(port: number, host: string = '127.0.0.1'): Promise<number> {
    if (this.wss) {
      return Promise.reject(new Error('Event ingress already started'));
    }

    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({ port, host });
      this.wss = wss;

      wss.once('error', reject);
      wss.once('listening', () => {
        wss.off('error', reject);
        const address = wss.address();
        const boundPort = typeof address === 'string' ? port : address.port;
        console.log(`[EventIngress] Listening on ws://${host}:${boundPort}`);
        resolve(boundPort);
      });

      wss.on('connection', (ws: WebSocket) => {
        ws.on('message', (data: RawData) => {
          this.handleMessage(ws, data).catch((error: unknown) => {
            console.error('[EventIngress] Failed to handle message:', error);
          });
        });
      });
    });
  }

  async stop(): Promise<void> {
    const wss = this.wss;
    if (!wss) return;
    this.wss = null;

    for (const client of wss.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve, reject) => {
      wss.close((error?: Error) => (error ? reject(error) : resolve()));
    });
  }

  private async handleMessage(ws: WebSocket, data: RawData): Promise<void> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(rawDataToString(data));
    } catch {
      this.reply(ws, { type: 'error', message: 'Message is not valid JSON' });
      return;
    }

    const event = parseSessionEvent(parsed);
    if (!event) {
      this.reply(ws, { type: 'error', message: 'Invalid session event' });
      return;
    }

    await this.handler(event);
    this.reply(ws, { type: 'ack', event: event.type });
  }

  private reply(ws: WebSocket, reply: IngressReply): void {
    if (ws.readyState === ws.OPEN) {
      ws.send(JSON.stringify(reply));
    }
  }
}
