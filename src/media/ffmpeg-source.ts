/**
 * FFmpeg-backed media source.
 *
 * Probes the file for its first audio stream, then decodes that stream to
 * raw interleaved s16le through prism-media's FFmpeg wrapper. By default
 * ffmpeg also resamples to 16 kHz mono, with its own filtering. Seeking
 * restarts the decoder at the requested offset; a pass that ends early
 * leaves the offset where it stopped so the next pass resumes there.
 */

import prism from 'prism-media';
import { execFile, type ChildProcess } from 'child_process';
import { existsSync } from 'fs';
import type { AudioFrame, AudioPacket, AudioStreamInfo, MediaContainer, MediaOpener } from './types';
import { CANONICAL_AUDIO_FORMAT, MediaSourceError } from './types';

/**
 * A running decoder process.
 */
export interface PcmDecoder {
  /** Raw s16le output */
  readonly output: AsyncIterable<unknown>;
  /** Resolves with the exit code once the process has closed */
  readonly exited: Promise<number | null>;
  /** First error raised by the process, if any */
  failure(): Error | null;
  destroy(): void;
}

export type DecoderSpawner = (args: string[]) => PcmDecoder;

/**
 * Decoder options.
 */
export interface FfmpegSourceConfig {
  /** Read input at native playback speed (ffmpeg -re) */
  realtime: boolean;
  /** Samples per channel in each decoded frame */
  frameSize: number;
  /** Rate and layout ffmpeg decodes to; null keeps the source's own */
  outputFormat: { sampleRate: number; channels: number } | null;
  spawnDecoder: DecoderSpawner;
}

/**
 * Spawns ffmpeg through prism-media and exposes its stdout.
 */
export function spawnFfmpegDecoder(args: string[]): PcmDecoder {
  const ffmpeg = new prism.FFmpeg({ args });
  const child: ChildProcess = ffmpeg.process;
  const stdout = child.stdout;
  if (!stdout) {
    ffmpeg.destroy();
    throw new Error('ffmpeg started without an output stream');
  }

  const exited = new Promise<number | null>(resolve => {
    child.once('close', (code: number | null) => resolve(code));
  });
  let failure: Error | null = null;
  ffmpeg.on('error', (error: Error) => {
    failure = failure ?? error;
  });

  return {
    output: stdout,
    exited,
    failure: () => failure,
    destroy: () => ffmpeg.destroy(),
  };
}

export const DEFAULT_FFMPEG_SOURCE_CONFIG: FfmpegSourceConfig = {
  realtime: true,
  frameSize: 1024,
  outputFormat: { sampleRate: CANONICAL_AUDIO_FORMAT.sampleRate, channels: CANONICAL_AUDIO_FORMAT.channels },
  spawnDecoder: spawnFfmpegDecoder,
};

/**
 * The first audio stream as ffmpeg describes it. `channels` is null when
 * the layout name is not one we know.
 */
export interface ProbedAudioStream {
  codec: string;
  sampleRate: number;
  channels: number | null;
}

const NAMED_LAYOUTS: Record<string, number> = {
  mono: 1,
  stereo: 2,
  '2.1': 3,
  '3.0': 3,
  quad: 4,
  '4.0': 4,
  '5.0': 5,
  '5.1': 6,
  '6.1': 7,
  '7.1': 8,
};

/**
 * Maps an ffmpeg channel layout description to a channel count.
 */
export function parseChannelLayout(layout: string): number | null {
  const normalized = layout.trim().toLowerCase().replace(/\(.*\)$/, '');
  if (normalized in NAMED_LAYOUTS) {
    return NAMED_LAYOUTS[normalized];
  }
  const counted = normalized.match(/^(\d+) channels?$/);
  if (counted) {
    return parseInt(counted[1], 10);
  }
  return null;
}

const AUDIO_STREAM_PATTERN = /Stream #\d+:\d+\S*: Audio: ([^,\s]+)[^,]*, (\d+) Hz, ([^,]+)/;

/**
 * Extracts the first audio stream's format from ffmpeg's input banner.
 * Returns null when the input has no audio stream.
 */
export function parseAudioStreamInfo(probeOutput: string): ProbedAudioStream | null {
  const match = probeOutput.match(AUDIO_STREAM_PATTERN);
  if (!match) return null;

  return {
    codec: match[1],
    sampleRate: parseInt(match[2], 10),
    channels: parseChannelLayout(match[3]),
  };
}

/**
 * Format the decoder will produce for a probed stream. An unknown layout
 * is downmixed to mono.
 */
export function decodeFormatFor(
  probed: ProbedAudioStream,
  outputFormat: FfmpegSourceConfig['outputFormat']
): AudioStreamInfo {
  if (outputFormat) {
    return { codec: probed.codec, sampleRate: outputFormat.sampleRate, channels: outputFormat.channels };
  }
  return { codec: probed.codec, sampleRate: probed.sampleRate, channels: probed.channels ?? 1 };
}

/**
 * Locates the ffmpeg binary the way prism-media does.
 */
function ffmpegCommand(source: string): string {
  try {
    return prism.FFmpeg.getInfo().command;
  } catch (error) {
    throw new MediaSourceError(source, `FFmpeg is not available (${error instanceof Error ? error.message : String(error)})`);
  }
}

/**
 * Runs ffmpeg with only an input to read its stream banner.
 * ffmpeg exits non-zero here ("output file must be specified"), which is expected.
 */
function probe(command: string, source: string): Promise<string> {
  return new Promise((resolve, reject) => {
    execFile(command, ['-hide_banner', '-nostdin', '-i', source], (error, _stdout, stderr) => {
      if (error && 'code' in error && error.code === 'ENOENT') {
        reject(new MediaSourceError(source, 'FFmpeg binary not found'));
        return;
      }
      resolve(stderr);
    });
  });
}

/**
 * A slice of decoded PCM aligned on channel-frame boundaries.
 */
class PcmPacket implements AudioPacket {
  constructor(
    private readonly data: Buffer,
    private readonly audio: AudioStreamInfo,
    private readonly frameSize: number
  ) {}

  decode(): AudioFrame[] {
    const { channels, sampleRate } = this.audio;
    const totalSamples = this.data.length / 2;
    const samplesPerFrame = this.frameSize * channels;
    const frames: AudioFrame[] = [];

    for (let start = 0; start < totalSamples; start += samplesPerFrame) {
      const count = Math.min(samplesPerFrame, totalSamples - start);
      const samples = new Int16Array(count);
      for (let i = 0; i < count; i++) {
        samples[i] = this.data.readInt16LE((start + i) * 2);
      }
      frames.push({ samples, sampleRate, channels });
    }

    return frames;
  }
}

/**
 * A file opened through ffmpeg. `audio` is the decoded format.
 */
export class FfmpegMediaContainer implements MediaContainer {
  readonly audio: AudioStreamInfo | null;
  private readonly path: string;
  private readonly config: FfmpegSourceConfig;
  private offsetSeconds = 0;
  private decoder: PcmDecoder | null = null;
  private closed = false;

  constructor(path: string, audio: AudioStreamInfo | null, config: FfmpegSourceConfig) {
    this.path = path;
    this.audio = audio;
    this.config = config;
  }

  async *demux(signal: AbortSignal): AsyncIterable<AudioPacket> {
    const audio = this.audio;
    if (!audio) return;
    if (this.closed) {
      throw new Error(`Media source is closed: ${this.path}`);
    }

    const startOffset = this.offsetSeconds;
    const args = [
      '-hide_banner',
      '-nostdin',
      '-loglevel', 'error',
      ...(this.config.realtime ? ['-re'] : []),
      '-ss', String(startOffset),
      '-i', this.path,
      '-map', '0:a:0',
      '-vn',
      '-ac', String(audio.channels),
      '-ar', String(audio.sampleRate),
      '-f', 's16le',
      '-acodec', 'pcm_s16le',
    ];

    const decoder = this.config.spawnDecoder(args);
    this.decoder = decoder;
    const onAbort = () => decoder.destroy();
    signal.addEventListener('abort', onAbort, { once: true });

    const bytesPerFrame = 2 * audio.channels;
    const bytesPerSecond = bytesPerFrame * audio.sampleRate;
    let bytesYielded = 0;
    let carry = Buffer.alloc(0);

    try {
      for await (const data of decoder.output) {
        if (signal.aborted) return;
        const chunk = Buffer.isBuffer(data) ? data : Buffer.from(String(data));
        const combined = carry.length > 0 ? Buffer.concat([carry, chunk]) : chunk;
        const usable = combined.length - (combined.length % bytesPerFrame);
        carry = Buffer.from(combined.subarray(usable));
        if (usable > 0) {
          bytesYielded += usable;
          yield new PcmPacket(combined.subarray(0, usable), audio, this.config.frameSize);
        }
      }

      if (signal.aborted) return;
      const failure = decoder.failure();
      if (failure) throw failure;
      const code = await decoder.exited;
      if (code !== null && code !== 0) {
        throw new Error(`ffmpeg exited with code ${code}`);
      }
    } catch (error) {
      if (signal.aborted) return;
      throw error;
    } finally {
      // Where this pass stopped; seek() overrides it
      this.offsetSeconds = startOffset + bytesYielded / bytesPerSecond;
      signal.removeEventListener('abort', onAbort);
      decoder.destroy();
      if (this.decoder === decoder) {
        this.decoder = null;
      }
    }
  }

  async seek(seconds: number): Promise<void> {
    this.offsetSeconds = Math.max(0, seconds);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.decoder?.destroy();
    this.decoder = null;
  }
}

/**
 * Creates a MediaOpener that decodes local files with ffmpeg.
 */
export function createFfmpegOpener(config: Partial<FfmpegSourceConfig> = {}): MediaOpener {
  const resolved = { ...DEFAULT_FFMPEG_SOURCE_CONFIG, ...config };

  return async (source: string) => {
    if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(source) && !existsSync(source)) {
      throw new MediaSourceError(source, 'Media file does not exist');
    }

    const command = ffmpegCommand(source);
    const banner = await probe(command, source);
    if (/No such file or directory|Invalid data found when processing input/.test(banner)) {
      throw new MediaSourceError(source, 'FFmpeg could not open input');
    }

    const probed = parseAudioStreamInfo(banner);
    const audio = probed ? decodeFormatFor(probed, resolved.outputFormat) : null;
    return new FfmpegMediaContainer(source, audio, resolved);
  };
}
