/**
 * Media Module
 *
 * Opens a video's audio track, converts it to 16 kHz mono PCM and feeds it
 * to the voice session in an endless loop.
 */

export type {
  AudioFrame,
  AudioPacket,
  AudioStreamInfo,
  CanonicalAudioFormat,
  MediaContainer,
  MediaOpener,
} from './types';
export { CANONICAL_AUDIO_FORMAT, MediaSourceError, pcmMimeType } from './types';

export { PcmResampler, downmixToMono } from './resampler';

export { AudioFeeder, DEFAULT_AUDIO_FEEDER_CONFIG } from './audio-feeder';
export type { AudioFeederConfig, AudioFeederOptions, AudioFeederStats, FeederOutcome } from './audio-feeder';

export {
  FfmpegMediaContainer,
  createFfmpegOpener,
  decodeFormatFor,
  parseAudioStreamInfo,
  parseChannelLayout,
  spawnFfmpegDecoder,
  DEFAULT_FFMPEG_SOURCE_CONFIG,
} from './ffmpeg-source';
export type { DecoderSpawner, FfmpegSourceConfig, PcmDecoder, ProbedAudioStream } from './ffmpeg-source';
