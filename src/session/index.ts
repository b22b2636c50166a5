/**
 * Session Module
 *
 * Event contract with the hosting framework and the orchestrator that
 * wires the audio feeder and commentary scheduler into one session.
 */

export type {
  TrackType,
  DetectedObject,
  TrackAddedEvent,
  DetectionEvent,
  SessionEvent,
  AudioSink,
  PromptSink,
  VoiceSession,
  SessionLogEvent,
  SessionEventLog,
} from './types';
export { NULL_EVENT_LOG } from './types';

export { parseSessionEvent } from './events';

export { CommentaryOrchestrator } from './orchestrator';
export type { OrchestratorOptions, FailureCallback } from './orchestrator';
