/**
 * Gemini Live session over WebSocket.
 *
 * Speaks the BidiGenerateContent protocol: a `setup` message opens the
 * session, realtime audio goes in as `realtimeInput`, prompts go in as
 * `clientContent` user turns, and the model's spoken audio comes back in
 * `serverContent` messages.
 */

import { WebSocket, type RawData } from 'ws';
import type { VoiceSession } from '../session/types';

/**
 * Connection settings.
 */
export interface GeminiLiveConfig {
  apiKey: string;
  /** Model resource name */
  model: string;
  /** System instruction for the session */
  instructions: string;
  /** WebSocket endpoint, without the key query parameter */
  endpoint: string;
  /** Prebuilt voice name, if any */
  voiceName?: string;
  /** How long to wait for setupComplete (ms) */
  connectTimeoutMs: number;
}

export const DEFAULT_GEMINI_LIVE_CONFIG: Omit<GeminiLiveConfig, 'apiKey' | 'instructions'> = {
  model: 'models/gemini-2.0-flash-live-001',
  endpoint: 'wss://generativelanguage.googleapis.com/ws/google.ai.generativelanguage.v1beta.GenerativeService.BidiGenerateContent',
  connectTimeoutMs: 10_000,
};

/**
 * What the model sends back.
 */
export type LiveServerEvent =
  | { type: 'audio'; data: Buffer; mimeType: string }
  | { type: 'text'; text: string }
  | { type: 'turn_complete' }
  | { type: 'closed'; code: number; reason: string };

export type LiveServerCallback = (event: LiveServerEvent) => void;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export class GeminiLiveSession implements VoiceSession {
  private readonly config: GeminiLiveConfig;
  private ws: WebSocket | null = null;
  private ready = false;
  private callbacks: LiveServerCallback[] = [];

  constructor(config: Pick<GeminiLiveConfig, 'apiKey' | 'instructions'> & Partial<GeminiLiveConfig>) {
    this.config = { ...DEFAULT_GEMINI_LIVE_CONFIG, ...config };
  }

  get connected(): boolean {
    return this.ready && this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  /**
   * Subscribe to model output.
   */
  subscribe(callback: LiveServerCallback): () => void {
    this.callbacks.push(callback);
    return () => {
      const idx = this.callbacks.indexOf(callback);
      if (idx >= 0) {
        this.callbacks.splice(idx, 1);
      }
    };
  }

  /**
   * Opens the socket and completes the setup handshake.
   */
  connect(): Promise<void> {
    if (this.ws) {
      return Promise.reject(new Error('Live session already connected'));
    }

    return new Promise((resolve, reject) => {
      const url = `${this.config.endpoint}?key=${encodeURIComponent(this.config.apiKey)}`;
      const ws = new WebSocket(url);
      this.ws = ws;
      let settled = false;

      const settle = (error?: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const timer = setTimeout(() => {
        settle(new Error('Timed out waiting for live session setup'));
        ws.terminate();
      }, this.config.connectTimeoutMs);

      ws.on('open', () => {
        ws.send(JSON.stringify(this.buildSetupMessage()));
      });

      ws.on('message', (data: RawData) => {
        const message = this.parseMessage(data);
        if (!message) return;

        if ('setupComplete' in message) {
          this.ready = true;
          console.log('[GeminiLive] Session ready');
          settle();
          return;
        }
        this.handleServerMessage(message);
      });

      ws.on('error', (error: Error) => {
        if (!settled) {
          settle(error);
          return;
        }
        console.error('[GeminiLive] Socket error:', error.message);
      });

      ws.on('close', (code: number, reason: Buffer) => {
        this.ready = false;
        this.ws = null;
        const text = reason.toString('utf8');
        settle(new Error(`Live session closed during setup (${code}${text ? `: ${text}` : ''})`));
        this.emit({ type: 'closed', code, reason: text });
      });
    });
  }

  async sendAudio(data: Buffer, mimeType: string): Promise<void> {
    await this.send({
      realtimeInput: {
        audio: { data: data.toString('base64'), mimeType },
      },
    });
  }

  async sendPrompt(text: string): Promise<void> {
    await this.send({
      clientContent: {
        turns: [{ role: 'user', parts: [{ text }] }],
        turnComplete: true,
      },
    });
  }

  async close(): Promise<void> {
    const ws = this.ws;
    if (!ws) return;

    this.ready = false;
    if (ws.readyState === WebSocket.CLOSED) return;

    await new Promise<void>((resolve) => {
      ws.once('close', () => resolve());
      ws.close(1000, 'session ended');
    });
  }

  private buildSetupMessage(): Record<string, unknown> {
    const generationConfig: Record<string, unknown> = { responseModalities: ['AUDIO'] };
    if (this.config.voiceName) {
      generationConfig.speechConfig = {
        voiceConfig: { prebuiltVoiceConfig: { voiceName: this.config.voiceName } },
      };
    }

    return {
      setup: {
        model: this.config.model,
        generationConfig,
        systemInstruction: { parts: [{ text: this.config.instructions }] },
      },
    };
  }

  private send(payload: Record<string, unknown>): Promise<void> {
    const ws = this.ws;
    if (!ws || !this.connected) {
      return Promise.reject(new Error('Live session is not connected'));
    }

    return new Promise((resolve, reject) => {
      ws.send(JSON.stringify(payload), (error?: Error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  private parseMessage(data: RawData): Record<string, unknown> | null {
    try {
      const parsed: unknown = JSON.parse(rawDataToString(data));
      return isRecord(parsed) ? parsed : null;
    } catch (error) {
      console.warn('[GeminiLive] Ignoring malformed server message:', error instanceof Error ? error.message : error);
      return null;
    }
  }

  private handleServerMessage(message: Record<string, unknown>): void {
    const content = message.serverContent;
    if (!isRecord(content)) return;

    const turn = content.modelTurn;
    if (isRecord(turn) && Array.isArray(turn.parts)) {
      for (const part of turn.parts) {
        if (!isRecord(part)) continue;

        const inline = part.inlineData;
        if (isRecord(inline) && typeof inline.data === 'string') {
          this.emit({
            type: 'audio',
            data: Buffer.from(inline.data, 'base64'),
            mimeType: typeof inline.mimeType === 'string' ? inline.mimeType : 'audio/pcm;rate=24000',
          });
        } else if (typeof part.text === 'string') {
          this.emit({ type: 'text', text: part.text });
        }
      }
    }

    if (content.turnComplete === true) {
      this.emit({ type: 'turn_complete' });
    }
  }

  private emit(event: LiveServerEvent): void {
    for (const callback of this.callbacks) {
      try {
        callback(event);
      } catch (error) {
        console.error('Live session callback error:', error);
      }
    }
  }
}
