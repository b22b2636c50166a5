/**
 * Types for the audio feeding pipeline.
 *
 * A media container is demuxed into packets, packets decode into raw
 * interleaved 16-bit frames, and frames are resampled into the canonical
 * format accepted by the voice session.
 */

/**
 * Target PCM format for the voice session.
 */
export interface CanonicalAudioFormat {
  sampleRate: number;
  channels: 1;
  bitDepth: 16;
}

/**
 * 16 kHz, mono, signed 16-bit little-endian.
 */
export const CANONICAL_AUDIO_FORMAT: CanonicalAudioFormat = {
  sampleRate: 16000,
  channels: 1,
  bitDepth: 16,
};

/**
 * Format tag sent with every chunk.
 */
export function pcmMimeType(format: CanonicalAudioFormat = CANONICAL_AUDIO_FORMAT): string {
  return `audio/pcm;rate=${format.sampleRate}`;
}

/**
 * Native format of a source's audio track.
 */
export interface AudioStreamInfo {
  sampleRate: number;
  channels: number;
  /** Codec name as reported by the demuxer, when known */
  codec?: string;
}

/**
 * Raw decoded audio: interleaved signed 16-bit samples.
 */
export interface AudioFrame {
  samples: Int16Array;
  sampleRate: number;
  channels: number;
}

/**
 * One demuxed unit of the audio track.
 */
export interface AudioPacket {
  decode(): AudioFrame[];
}

/**
 * An opened media source.
 */
export interface MediaContainer {
  /** Audio track info, or null for video-only sources */
  readonly audio: AudioStreamInfo | null;
  /**
   * Yields audio packets from the current position to end of stream.
   * Iteration ends early once `signal` aborts.
   */
  demux(signal: AbortSignal): AsyncIterable<AudioPacket>;
  /** Repositions the next demux at `seconds` from the start */
  seek(seconds: number): Promise<void>;
  /** Releases the source. Safe to call more than once. */
  close(): void;
}

/**
 * Opens a media source by path or URI.
 * Rejects with MediaSourceError if the source cannot be acquired.
 */
export type MediaOpener = (source: string) => Promise<MediaContainer>;

/**
 * The source could not be opened at all.
 */
export class MediaSourceError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(`${message}: ${source}`);
    this.name = 'MediaSourceError';
    this.source = source;
  }
}
