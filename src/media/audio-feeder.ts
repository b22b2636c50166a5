/**
 * Audio Feeder - Streams a media source's audio track into the voice session.
 *
 * Demuxes, decodes and resamples the source to 16 kHz mono PCM, hands each
 * segment to the sink in playback order, and loops the source forever.
 * Decode faults are logged and retried after a fixed backoff; only failing
 * to open the source rejects `start()`.
 */

import type { AudioSink, SessionEventLog } from '../session/types';
import { NULL_EVENT_LOG } from '../session/types';
import { sleep, errorMessage } from '../timing/sleep';
import { PcmResampler } from './resampler';
import type { CanonicalAudioFormat, MediaContainer, MediaOpener } from './types';
import { CANONICAL_AUDIO_FORMAT, pcmMimeType } from './types';

/**
 * Feeder tuning.
 */
export interface AudioFeederConfig {
  /** Pause after a demux/decode fault before resuming (ms) */
  faultBackoffMs: number;
  /** Pause after each packet so other work can run (ms) */
  yieldMs: number;
  /** Output format */
  target: CanonicalAudioFormat;
}

export const DEFAULT_AUDIO_FEEDER_CONFIG: AudioFeederConfig = {
  faultBackoffMs: 1000,
  yieldMs: 1,
  target: CANONICAL_AUDIO_FORMAT,
};

/**
 * How a `start()` call finished.
 */
export type FeederOutcome = 'stopped' | 'no_audio_track' | 'already_running';

export interface AudioFeederOptions {
  open: MediaOpener;
  logger?: SessionEventLog;
  config?: Partial<AudioFeederConfig>;
}

/**
 * Counters for one feeding run.
 */
export interface AudioFeederStats {
  chunksSent: number;
  chunksDropped: number;
  loops: number;
  faults: number;
}

export class AudioFeeder {
  private readonly source: string;
  private readonly openMedia: MediaOpener;
  private readonly logger: SessionEventLog;
  private readonly config: AudioFeederConfig;
  private readonly mimeType: string;

  private running = false;
  private stopRequested = false;
  private abortController: AbortController | null = null;
  private stats: AudioFeederStats = { chunksSent: 0, chunksDropped: 0, loops: 0, faults: 0 };

  constructor(source: string, options: AudioFeederOptions) {
    this.source = source;
    this.openMedia = options.open;
    this.logger = options.logger ?? NULL_EVENT_LOG;
    this.config = { ...DEFAULT_AUDIO_FEEDER_CONFIG, ...options.config };
    this.mimeType = pcmMimeType(this.config.target);
  }

  /**
   * Feeds audio to `sink` until `stop()` is called.
   *
   * Resolves 'no_audio_track' immediately for video-only sources and
   * 'already_running' if a feed is already active. Rejects only when the
   * source cannot be opened.
   */
  async start(sink: AudioSink): Promise<FeederOutcome> {
    if (this.running) {
      return 'already_running';
    }

    this.running = true;
    this.stopRequested = false;
    const controller = new AbortController();
    this.abortController = controller;
    this.stats = { chunksSent: 0, chunksDropped: 0, loops: 0, faults: 0 };

    let container: MediaContainer;
    try {
      container = await this.openMedia(this.source);
    } catch (error) {
      this.running = false;
      this.abortController = null;
      throw error;
    }

    try {
      return await this.feed(container, sink, controller.signal);
    } finally {
      container.close();
      this.running = false;
      this.abortController = null;
      this.logger.log({
        type: 'audio_stopped',
        source: this.source,
        chunks: this.stats.chunksSent,
        dropped: this.stats.chunksDropped,
      });
      console.log(`[AudioFeeder] Audio streaming stopped (${this.stats.chunksSent} chunks sent)`);
    }
  }

  /**
   * Requests shutdown. Takes effect within one packet, including while the
   * feeder is blocked reading from the source.
   */
  stop(): void {
    this.stopRequested = true;
    this.abortController?.abort();
  }

  isRunning(): boolean {
    return this.running;
  }

  getStats(): AudioFeederStats {
    return { ...this.stats };
  }

  private async feed(
    container: MediaContainer,
    sink: AudioSink,
    signal: AbortSignal
  ): Promise<FeederOutcome> {
    const audio = container.audio;
    if (!audio) {
      console.warn(`[AudioFeeder] No audio stream in ${this.source}`);
      this.logger.log({ type: 'audio_no_track', source: this.source });
      return 'no_audio_track';
    }

    const resampler = new PcmResampler(audio, this.config.target);
    this.logger.log({
      type: 'audio_started',
      source: this.source,
      sampleRate: audio.sampleRate,
      channels: audio.channels,
    });
    console.log(`[AudioFeeder] Streaming audio from ${this.source} (${audio.sampleRate} Hz, ${audio.channels}ch)`);

    while (!this.stopRequested) {
      try {
        let packets = 0;
        const sentBefore = this.stats.chunksSent;

        for await (const packet of container.demux(signal)) {
          if (this.stopRequested) break;
          packets++;

          for (const frame of packet.decode()) {
            if (this.stopRequested) break;

            for (const segment of resampler.resample(frame)) {
              await this.emit(sink, segment);
            }
          }

          await sleep(this.config.yieldMs, signal);
        }

        if (this.stopRequested) break;

        if (packets === 0) {
          // An empty pass would otherwise spin without ever suspending
          this.logger.log({ type: 'warning', message: 'Source produced no audio packets', context: this.source });
          if (!(await sleep(this.config.faultBackoffMs, signal))) break;
        }

        await container.seek(0);
        resampler.reset();
        this.stats.loops++;
        this.logger.log({
          type: 'audio_looped',
          source: this.source,
          loop: this.stats.loops,
          chunks: this.stats.chunksSent - sentBefore,
        });
        console.log('[AudioFeeder] Audio looped');
      } catch (error) {
        if (this.stopRequested) break;

        this.stats.faults++;
        const message = errorMessage(error);
        console.error(`[AudioFeeder] Audio stream error: ${message}`);
        this.logger.log({
          type: 'audio_fault',
          source: this.source,
          error: message,
          backoffMs: this.config.faultBackoffMs,
        });
        await sleep(this.config.faultBackoffMs, signal);
        resampler.reset();
      }
    }

    return 'stopped';
  }

  /**
   * Hands one segment to the sink. The segment is dropped if the session is
   * not connected or the send fails; stale audio is never retried and a sink
   * error never interrupts the source.
   */
  private async emit(sink: AudioSink, segment: Buffer): Promise<void> {
    if (!sink.connected) {
      this.stats.chunksDropped++;
      return;
    }

    try {
      await sink.sendAudio(segment, this.mimeType);
      this.stats.chunksSent++;
    } catch (error) {
      this.stats.chunksDropped++;
      this.logger.log({ type: 'audio_send_failed', source: this.source, error: errorMessage(error) });
    }
  }
}
