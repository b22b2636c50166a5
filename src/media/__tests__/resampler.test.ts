/**
 * Tests for the streaming PCM resampler.
 */

import { describe, it, expect } from 'vitest';
import { PcmResampler, downmixToMono } from '../resampler';
import type { AudioFrame } from '../types';
import { pcmSamples } from '../../test/fakes';

function frame(samples: number[], sampleRate: number, channels: number): AudioFrame {
  return { samples: Int16Array.from(samples), sampleRate, channels };
}

describe('downmixToMono', () => {
  it('should average interleaved channels', () => {
    expect(Array.from(downmixToMono(Int16Array.from([100, 200, -100, -300]), 2))).toEqual([150, -200]);
  });

  it('should copy mono input unchanged', () => {
    expect(Array.from(downmixToMono(Int16Array.from([1, -2, 3]), 1))).toEqual([1, -2, 3]);
  });
});

describe('PcmResampler', () => {
  it('should pass canonical input through sample-for-sample', () => {
    const resampler = new PcmResampler({ sampleRate: 16000, channels: 1 });
    const first = resampler.resample(frame([1, 2, 3, 4], 16000, 1));
    const second = resampler.resample(frame([-5, 32767, -32768], 16000, 1));

    expect(first).toHaveLength(1);
    expect(pcmSamples(...first, ...second)).toEqual([1, 2, 3, 4, -5, 32767, -32768]);
  });

  it('should write little-endian 16-bit output', () => {
    const resampler = new PcmResampler({ sampleRate: 16000, channels: 1 });
    const [buffer] = resampler.resample(frame([0x0102], 16000, 1));
    expect(Array.from(buffer)).toEqual([0x02, 0x01]);
  });

  it('should downmix stereo to mono', () => {
    const resampler = new PcmResampler({ sampleRate: 16000, channels: 2 });
    const out = resampler.resample(frame([100, 200, -100, -300], 16000, 2));
    expect(pcmSamples(...out)).toEqual([150, -200]);
  });

  it('should decimate 32 kHz to 16 kHz across frame boundaries', () => {
    const resampler = new PcmResampler({ sampleRate: 32000, channels: 1 });
    const a = resampler.resample(frame([0, 10, 20, 30, 40, 50], 32000, 1));
    const b = resampler.resample(frame([60, 70], 32000, 1));
    expect(pcmSamples(...a)).toEqual([0, 20, 40]);
    expect(pcmSamples(...b)).toEqual([60]);
  });

  it('should interpolate continuously when upsampling across frames', () => {
    const resampler = new PcmResampler({ sampleRate: 8000, channels: 1 });
    const a = resampler.resample(frame([0, 100], 8000, 1));
    const b = resampler.resample(frame([200, 300], 8000, 1));
    expect(pcmSamples(...a)).toEqual([0, 50, 100]);
    expect(pcmSamples(...b)).toEqual([150, 200, 250, 300]);
  });

  it('should forget the previous frame after reset', () => {
    const resampler = new PcmResampler({ sampleRate: 8000, channels: 1 });
    resampler.resample(frame([0, 100], 8000, 1));
    resampler.reset();
    const out = resampler.resample(frame([200, 300], 8000, 1));
    expect(pcmSamples(...out)).toEqual([200, 250, 300]);
  });

  it('should return no segments for an empty frame', () => {
    const resampler = new PcmResampler({ sampleRate: 16000, channels: 1 });
    expect(resampler.resample(frame([], 16000, 1))).toEqual([]);
  });

  it('should reject frames that do not match the stream format', () => {
    const resampler = new PcmResampler({ sampleRate: 44100, channels: 2 });
    expect(() => resampler.resample(frame([1, 2], 48000, 2))).toThrow('does not match stream');
  });

  it('should reject an invalid input format', () => {
    expect(() => new PcmResampler({ sampleRate: 0, channels: 1 })).toThrow('Unsupported input format');
  });
});
