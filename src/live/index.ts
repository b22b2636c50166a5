/**
 * Live Module
 *
 * Network adapters: the Gemini Live voice session, a mock session, and the
 * WebSocket ingress for framework events.
 */

export { GeminiLiveSession, DEFAULT_GEMINI_LIVE_CONFIG } from './gemini-live-session';
export type { GeminiLiveConfig, LiveServerEvent, LiveServerCallback } from './gemini-live-session';
export { MockVoiceSession } from './mock-voice-session';
export type { MockVoiceSessionOptions } from './mock-voice-session';
export { SessionEventIngress } from './event-ingress';
export type { SessionEventHandler, IngressReply } from './event-ingress';
