/**
 * Streaming PCM resampler.
 *
 * Downmixes interleaved 16-bit frames to mono by averaging channels, then
 * converts the rate by linear interpolation. Interpolation state carries
 * across frames so consecutive frames produce a continuous signal.
 * Canonical input (same rate, mono) passes through sample-for-sample.
 *
 * There is no anti-alias filter, so downsampling folds content above the
 * target Nyquist back into band. The ffmpeg source decodes straight to the
 * canonical format and only hands this stage identity work.
 */

import type { AudioFrame, AudioStreamInfo, CanonicalAudioFormat } from './types';
import { CANONICAL_AUDIO_FORMAT } from './types';

const INT16_MIN = -32768;
const INT16_MAX = 32767;

function clampInt16(value: number): number {
  if (value < INT16_MIN) return INT16_MIN;
  if (value > INT16_MAX) return INT16_MAX;
  return value;
}

/**
 * Averages interleaved channels into a mono float signal.
 */
export function downmixToMono(samples: Int16Array, channels: number): Float64Array {
  const frameCount = Math.floor(samples.length / channels);
  const mono = new Float64Array(frameCount);

  if (channels === 1) {
    for (let i = 0; i < frameCount; i++) {
      mono[i] = samples[i];
    }
    return mono;
  }

  for (let i = 0; i < frameCount; i++) {
    let sum = 0;
    const base = i * channels;
    for (let c = 0; c < channels; c++) {
      sum += samples[base + c];
    }
    mono[i] = sum / channels;
  }
  return mono;
}

/**
 * Converts frames of a fixed input format to the canonical format.
 */
export class PcmResampler {
  private readonly input: AudioStreamInfo;
  private readonly step: number;

  // Read position relative to the start of the next frame. Values in (-1, 0)
  // interpolate between the previous frame's last sample and the new first.
  private position = 0;
  private lastSample = 0;

  constructor(input: AudioStreamInfo, target: CanonicalAudioFormat = CANONICAL_AUDIO_FORMAT) {
    if (input.sampleRate <= 0 || input.channels <= 0) {
      throw new Error(`Unsupported input format: ${input.sampleRate} Hz, ${input.channels} channels`);
    }
    this.input = input;
    this.step = input.sampleRate / target.sampleRate;
  }

  /**
   * Resamples one frame. Returns zero or one little-endian PCM segments.
   */
  resample(frame: AudioFrame): Buffer[] {
    if (frame.sampleRate !== this.input.sampleRate || frame.channels !== this.input.channels) {
      throw new Error(
        `Frame format ${frame.sampleRate} Hz/${frame.channels}ch does not match stream ` +
        `${this.input.sampleRate} Hz/${this.input.channels}ch`
      );
    }

    const mono = downmixToMono(frame.samples, frame.channels);
    const n = mono.length;
    if (n === 0) return [];

    const out: number[] = [];
    let pos = this.position;

    while (pos <= n - 1) {
      const i0 = Math.floor(pos);
      const fraction = pos - i0;
      const s0 = i0 < 0 ? this.lastSample : mono[i0];
      const value = fraction === 0 ? s0 : s0 * (1 - fraction) + mono[i0 + 1] * fraction;
      out.push(clampInt16(Math.round(value)));
      pos += this.step;
    }

    this.position = pos - n;
    this.lastSample = mono[n - 1];

    if (out.length === 0) return [];

    const buffer = Buffer.alloc(out.length * 2);
    for (let i = 0; i < out.length; i++) {
      buffer.writeInt16LE(out[i], i * 2);
    }
    return [buffer];
  }

  /**
   * Drops interpolation state, e.g. after a seek.
   */
  reset(): void {
    this.position = 0;
    this.lastSample = 0;
  }
}
