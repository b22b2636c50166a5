/**
 * Mock voice session for running without a model and for tests.
 *
 * Audio is counted rather than stored; only the most recent chunks are
 * kept, so a long `--mock` run holds a fixed amount of memory.
 */

import type { VoiceSession } from '../session/types';

export interface MockVoiceSessionOptions {
  verbose?: boolean;
  /** How many of the latest audio chunks to keep */
  recentAudioLimit?: number;
}

export class MockVoiceSession implements VoiceSession {
  connected = true;
  readonly prompts: string[] = [];
  readonly recentAudio: Buffer[] = [];
  readonly mimeTypes = new Set<string>();
  private readonly verbose: boolean;
  private readonly recentAudioLimit: number;
  private chunkCount = 0;
  private byteCount = 0;

  constructor(options: MockVoiceSessionOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.recentAudioLimit = options.recentAudioLimit ?? 50;
  }

  async sendAudio(data: Buffer, mimeType: string): Promise<void> {
    this.chunkCount++;
    this.byteCount += data.length;
    this.mimeTypes.add(mimeType);

    if (this.recentAudioLimit > 0) {
      this.recentAudio.push(data);
      if (this.recentAudio.length > this.recentAudioLimit) {
        this.recentAudio.shift();
      }
    }
  }

  async sendPrompt(text: string): Promise<void> {
    this.prompts.push(text);
    if (this.verbose) {
      console.log(`[MockVoice] ${text}`);
    }
  }

  async close(): Promise<void> {
    this.connected = false;
  }

  audioChunks(): number {
    return this.chunkCount;
  }

  /**
   * Total audio bytes received.
   */
  audioBytes(): number {
    return this.byteCount;
  }
}
