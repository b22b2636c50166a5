/**
 * Event-triggered commentary - speaks in response to detections.
 *
 * AWAITING_OPENING: the first event of any kind delivers the opening prompt.
 * COOLING_DOWN: events are ignored until the cooldown since the opening has
 *   elapsed; the event that ends the cooldown is handled as ACTIVE.
 * ACTIVE: a qualifying event delivers a random prompt if the debouncer grants.
 *
 * Runs no background loop; all work happens in `onDetection`, which the
 * orchestrator never invokes concurrently.
 */

import type { DetectionEvent, PromptSink, SessionEventLog } from '../session/types';
import { NULL_EVENT_LOG } from '../session/types';
import { Debouncer } from '../timing';
import { deliverPrompt } from './delivery';
import { pickPrompt } from './prompts';
import type {
  CommentaryPhase,
  CommentaryScheduler,
  CommentaryState,
  EventStrategyConfig,
  PromptSet,
  QualifyingPredicate,
} from './types';
import { DEFAULT_EVENT_STRATEGY_CONFIG } from './types';

export interface EventStrategyOptions {
  sink: PromptSink;
  prompts: PromptSet;
  qualifies: QualifyingPredicate;
  logger?: SessionEventLog;
  config?: Partial<EventStrategyConfig>;
  random?: () => number;
}

export class EventTriggeredCommentaryStrategy implements CommentaryScheduler {
  readonly mode = 'event' as const;
  private readonly sink: PromptSink;
  private readonly prompts: PromptSet;
  private readonly qualifies: QualifyingPredicate;
  private readonly logger: SessionEventLog;
  private readonly config: EventStrategyConfig;
  private readonly random: () => number;
  private readonly debouncer: Debouncer;
  private readonly state: CommentaryState = { phase: 'AWAITING_OPENING', openingDeliveredAt: null };

  private running = false;
  private inFlight: Promise<unknown> | null = null;

  constructor(options: EventStrategyOptions) {
    this.sink = options.sink;
    this.prompts = options.prompts;
    this.qualifies = options.qualifies;
    this.logger = options.logger ?? NULL_EVENT_LOG;
    this.config = { ...DEFAULT_EVENT_STRATEGY_CONFIG, ...options.config };
    this.random = options.random ?? Math.random;
    this.debouncer = new Debouncer(this.config.debounceMs);
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    console.log('[Commentary] Waiting for detections');
  }

  async stop(): Promise<void> {
    this.running = false;
    await this.inFlight;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Snapshot of the scheduler state.
   */
  getState(): Readonly<CommentaryState> {
    return { ...this.state };
  }

  async onDetection(event: DetectionEvent, now: number = Date.now()): Promise<void> {
    if (!this.running) return;

    switch (this.state.phase) {
      case 'AWAITING_OPENING':
        this.state.openingDeliveredAt = now;
        this.transition('COOLING_DOWN');
        await this.track(deliverPrompt(this.sink, this.prompts.opening, 'opening', this.logger));
        return;

      case 'COOLING_DOWN': {
        const openedAt = this.state.openingDeliveredAt ?? now;
        if (now - openedAt < this.config.cooldownMs) return;
        this.transition('ACTIVE');
        await this.handleActive(event, now);
        return;
      }

      case 'ACTIVE':
        await this.handleActive(event, now);
        return;
    }
  }

  private async handleActive(event: DetectionEvent, now: number): Promise<void> {
    if (!this.qualifies(event)) return;
    if (!this.debouncer.tryAcquire(now)) return;

    const prompt = pickPrompt(this.prompts.prompts, this.random);
    await this.track(deliverPrompt(this.sink, prompt, 'regular', this.logger));
  }

  private transition(to: CommentaryPhase): void {
    const from = this.state.phase;
    this.state.phase = to;
    this.logger.log({ type: 'commentary_state', from, to });
  }

  private async track<T>(delivery: Promise<T>): Promise<T> {
    this.inFlight = delivery;
    try {
      return await delivery;
    } finally {
      if (this.inFlight === delivery) {
        this.inFlight = null;
      }
    }
  }
}
