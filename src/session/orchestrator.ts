/**
 * Commentary orchestrator.
 *
 * Composition root for one session: receives framework events, starts the
 * audio feeder and the commentary scheduler on the first video track, and
 * stops both when the session ends.
 */

import type { AudioFeeder } from '../media/audio-feeder';
import type { CommentaryScheduler } from '../commentary/types';
import { errorMessage } from '../timing/sleep';
import type { AudioSink, SessionEvent, SessionEventLog, TrackType } from './types';
import { NULL_EVENT_LOG } from './types';

/**
 * Called when the session cannot continue, e.g. the media source failed to open.
 */
export type FailureCallback = (error: Error) => void;

export interface OrchestratorOptions {
  sessionId: string;
  /** Where the feeder sends audio */
  audioSink: AudioSink;
  /** Null when no media source was configured */
  feeder: AudioFeeder | null;
  scheduler: CommentaryScheduler;
  logger?: SessionEventLog;
  /** Recorded in the session log */
  videoPath?: string;
}

export class CommentaryOrchestrator {
  private readonly sessionId: string;
  private readonly audioSink: AudioSink;
  private readonly feeder: AudioFeeder | null;
  private readonly scheduler: CommentaryScheduler;
  private readonly logger: SessionEventLog;

  private started = false;
  private ended = false;
  private feederTask: Promise<void> | null = null;
  private dispatchChain: Promise<void> = Promise.resolve();
  private failureCallbacks: FailureCallback[] = [];

  constructor(options: OrchestratorOptions) {
    this.sessionId = options.sessionId;
    this.audioSink = options.audioSink;
    this.feeder = options.feeder;
    this.scheduler = options.scheduler;
    this.logger = options.logger ?? NULL_EVENT_LOG;

    this.logger.log({
      type: 'session_started',
      sessionId: this.sessionId,
      mode: this.scheduler.mode,
      videoPath: options.videoPath,
    });
  }

  /**
   * Registers a failure listener.
   */
  onFailure(callback: FailureCallback): () => void {
    this.failureCallbacks.push(callback);
    return () => {
      const idx = this.failureCallbacks.indexOf(callback);
      if (idx !== -1) {
        this.failureCallbacks.splice(idx, 1);
      }
    };
  }

  /**
   * Queues an event for the session handler.
   *
   * Events are handled strictly one at a time in arrival order, whatever
   * the caller's concurrency; the returned promise settles once this event
   * has been handled.
   */
  dispatch(event: SessionEvent): Promise<void> {
    this.dispatchChain = this.dispatchChain.then(() => this.handle(event));
    return this.dispatchChain;
  }

  /**
   * Stops the feeder and scheduler and waits for them to wind down.
   */
  async end(reason?: string): Promise<void> {
    if (this.ended) return;
    this.ended = true;

    this.feeder?.stop();
    await this.scheduler.stop();
    await this.feederTask;
    await this.dispatchChain;

    this.logger.log({ type: 'session_ended', sessionId: this.sessionId, reason });
    console.log(`[Orchestrator] Session ${this.sessionId} ended${reason ? ` (${reason})` : ''}`);
  }

  hasStarted(): boolean {
    return this.started;
  }

  hasEnded(): boolean {
    return this.ended;
  }

  private async handle(event: SessionEvent): Promise<void> {
    if (this.ended) return;

    try {
      switch (event.type) {
        case 'track_added':
          this.handleTrackAdded(event.trackType);
          break;
        case 'detection':
          await this.scheduler.onDetection(event);
          break;
      }
    } catch (error) {
      console.error('[Orchestrator] Event handler error:', error);
      this.logger.log({ type: 'warning', message: errorMessage(error), context: event.type });
    }
  }

  private handleTrackAdded(trackType: TrackType): void {
    const firstVideo = trackType === 'video' && !this.started;
    this.logger.log({ type: 'track_added', trackType, firstVideo });
    if (!firstVideo) return;

    this.started = true;
    console.log('[Orchestrator] Video track detected - starting commentary');

    if (this.feeder) {
      this.feederTask = this.runFeeder(this.feeder);
    }
    this.scheduler.start();
  }

  private async runFeeder(feeder: AudioFeeder): Promise<void> {
    try {
      await feeder.start(this.audioSink);
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      console.error(`[Orchestrator] Audio feed failed to start: ${failure.message}`);
      this.logger.log({ type: 'session_failed', sessionId: this.sessionId, error: failure.message });
      for (const callback of this.failureCallbacks) {
        try {
          callback(failure);
        } catch (err) {
          console.error('Failure callback error:', err);
        }
      }
    }
  }
}
