/**
 * Periodic commentary - speaks on a fixed cadence.
 *
 * startup delay -> opening prompt -> settle delay -> regular prompt every
 * interval. A failed delivery waits the fault backoff instead of the
 * interval, then the loop carries on.
 */

import type { DetectionEvent, PromptSink, SessionEventLog } from '../session/types';
import { NULL_EVENT_LOG } from '../session/types';
import { sleep } from '../timing';
import { deliverPrompt } from './delivery';
import { pickPrompt } from './prompts';
import type { CommentaryScheduler, PeriodicStrategyConfig, PromptSet } from './types';
import { DEFAULT_PERIODIC_STRATEGY_CONFIG } from './types';

export interface PeriodicStrategyOptions {
  sink: PromptSink;
  prompts: PromptSet;
  logger?: SessionEventLog;
  config?: Partial<PeriodicStrategyConfig>;
  /** Source of randomness for prompt selection */
  random?: () => number;
}

export class PeriodicCommentaryStrategy implements CommentaryScheduler {
  readonly mode = 'periodic' as const;
  private readonly sink: PromptSink;
  private readonly prompts: PromptSet;
  private readonly logger: SessionEventLog;
  private readonly config: PeriodicStrategyConfig;
  private readonly random: () => number;

  private abortController: AbortController | null = null;
  private task: Promise<void> | null = null;

  constructor(options: PeriodicStrategyOptions) {
    this.sink = options.sink;
    this.prompts = options.prompts;
    this.logger = options.logger ?? NULL_EVENT_LOG;
    this.config = { ...DEFAULT_PERIODIC_STRATEGY_CONFIG, ...options.config };
    this.random = options.random ?? Math.random;
  }

  start(): void {
    if (this.task) return;

    const controller = new AbortController();
    this.abortController = controller;
    this.task = this.run(controller.signal).finally(() => {
      this.task = null;
      this.abortController = null;
    });
  }

  /**
   * Cancels at the next wait boundary. Resolves once the loop has exited.
   */
  async stop(): Promise<void> {
    this.abortController?.abort();
    await this.task;
  }

  isRunning(): boolean {
    return this.task !== null;
  }

  async onDetection(_event: DetectionEvent): Promise<void> {
    // Cadence is time-driven only
  }

  private async run(signal: AbortSignal): Promise<void> {
    console.log('[Commentary] Starting commentary loop');

    if (!(await sleep(this.config.startupDelayMs, signal))) return;
    await deliverPrompt(this.sink, this.prompts.opening, 'opening', this.logger);

    if (!(await sleep(this.config.settleDelayMs, signal))) return;

    while (!signal.aborted) {
      const prompt = pickPrompt(this.prompts.prompts, this.random);
      const result = await deliverPrompt(this.sink, prompt, 'regular', this.logger);
      const wait = result === 'failed' ? this.config.faultBackoffMs : this.config.intervalMs;
      if (!(await sleep(wait, signal))) return;
    }
  }
}
