/**
 * Types shared by the commentary session: inbound events from the hosting
 * framework, the voice-session sinks, and the structured log contract.
 */

/**
 * Media track kinds announced by the call platform.
 */
export type TrackType = 'audio' | 'video';

/**
 * A single object reported by the detection subsystem.
 */
export interface DetectedObject {
  label: string;
  confidence: number;
  /** Optional bounding box as [x1, y1, x2, y2] */
  bbox?: [number, number, number, number];
}

/**
 * A media track became available.
 */
export interface TrackAddedEvent {
  type: 'track_added';
  trackType: TrackType;
}

/**
 * One frame's worth of detections.
 */
export interface DetectionEvent {
  type: 'detection';
  objects: DetectedObject[];
}

/**
 * Events delivered to a session's single registered handler.
 *
 * Handlers may assume events arrive one at a time: the orchestrator
 * serializes dispatch, so no two invocations overlap.
 */
export type SessionEvent = TrackAddedEvent | DetectionEvent;

/**
 * Receives PCM audio for the realtime voice model.
 */
export interface AudioSink {
  /** Whether the session can accept input right now */
  readonly connected: boolean;
  sendAudio(data: Buffer, mimeType: string): Promise<void>;
}

/**
 * Receives text prompts that make the voice model speak.
 */
export interface PromptSink {
  readonly connected: boolean;
  sendPrompt(text: string): Promise<void>;
}

/**
 * A realtime voice-generation session.
 */
export interface VoiceSession extends AudioSink, PromptSink {
  close(): Promise<void>;
}

/**
 * Structured log events for a commentary session.
 */
export type SessionLogEvent =
  | { type: 'session_started'; sessionId: string; mode: string; videoPath?: string }
  | { type: 'session_ended'; sessionId: string; reason?: string }
  | { type: 'session_failed'; sessionId: string; error: string }
  | { type: 'track_added'; trackType: TrackType; firstVideo: boolean }
  | { type: 'audio_started'; source: string; sampleRate: number; channels: number }
  | { type: 'audio_no_track'; source: string }
  | { type: 'audio_looped'; source: string; loop: number; chunks: number }
  | { type: 'audio_fault'; source: string; error: string; backoffMs: number }
  | { type: 'audio_send_failed'; source: string; error: string }
  | { type: 'audio_stopped'; source: string; chunks: number; dropped: number }
  | { type: 'prompt_sent'; kind: 'opening' | 'regular'; prompt: string }
  | { type: 'prompt_dropped'; kind: 'opening' | 'regular'; prompt: string }
  | { type: 'prompt_failed'; kind: 'opening' | 'regular'; error: string }
  | { type: 'commentary_state'; from: string; to: string }
  | { type: 'warning'; message: string; context?: string }
  | { type: 'debug'; message: string; data?: unknown };

/**
 * Anything that can record session log events.
 */
export interface SessionEventLog {
  log(event: SessionLogEvent): void;
}

/**
 * Log that discards everything.
 */
export const NULL_EVENT_LOG: SessionEventLog = {
  log() {},
};
