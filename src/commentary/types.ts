/**
 * Types for the live commentary scheduler.
 *
 * The scheduler decides when the voice session is asked to speak: either on
 * a fixed cadence, or in response to detection events gated by an opening,
 * a cooldown and a debounce window.
 */

import type { DetectionEvent } from '../session/types';

/**
 * Commentary persona selected by the user.
 */
export type CommentaryStyle =
  | 'enthusiastic' // Energetic play-by-play
  | 'analytical'   // Tactics and strategy
  | 'casual'       // Relaxed chat
  | 'roasting';    // Mocks every mistake

export const COMMENTARY_STYLES: readonly CommentaryStyle[] = ['enthusiastic', 'analytical', 'casual', 'roasting'];

/**
 * How much the listener already knows about the sport.
 */
export type KnowledgeLevel = 'beginner' | 'intermediate' | 'expert';

export const KNOWLEDGE_LEVELS: readonly KnowledgeLevel[] = ['beginner', 'intermediate', 'expert'];

/**
 * Which scheduling strategy a session uses.
 */
export type CommentaryMode = 'periodic' | 'event';

export const COMMENTARY_MODES: readonly CommentaryMode[] = ['periodic', 'event'];

/**
 * Template families. Every style except roasting shares the neutral set.
 */
export type PromptCategory = 'roasting' | 'neutral';

/**
 * Prompts available to a scheduler.
 */
export interface PromptSet {
  /** Delivered once, before any regular prompt */
  opening: string;
  /** Regular prompts; one is chosen uniformly per trigger */
  prompts: readonly string[];
}

/**
 * The two sides of the match.
 */
export interface MatchTeams {
  team1: string;
  team2: string;
}

/**
 * Kind of prompt being delivered.
 */
export type PromptKind = 'opening' | 'regular';

/**
 * Outcome of handing one prompt to the session.
 */
export type DeliveryResult = 'sent' | 'dropped' | 'failed';

/**
 * Timing for the fixed-cadence strategy.
 */
export interface PeriodicStrategyConfig {
  /** Wait before the opening prompt (ms) */
  startupDelayMs: number;
  /** Wait between the opening and the first regular prompt (ms) */
  settleDelayMs: number;
  /** Wait between regular prompts (ms) */
  intervalMs: number;
  /** Wait after a failed delivery before trying again (ms) */
  faultBackoffMs: number;
}

export const DEFAULT_PERIODIC_STRATEGY_CONFIG: PeriodicStrategyConfig = {
  startupDelayMs: 3000,
  settleDelayMs: 5000,
  intervalMs: 4000,
  faultBackoffMs: 2000,
};

/**
 * Gating for the detection-driven strategy.
 */
export interface EventStrategyConfig {
  /** Quiet period after the opening prompt (ms) */
  cooldownMs: number;
  /** Minimum spacing between regular prompts (ms) */
  debounceMs: number;
}

export const DEFAULT_EVENT_STRATEGY_CONFIG: EventStrategyConfig = {
  cooldownMs: 8000,
  debounceMs: 6000,
};

/**
 * Phases of the detection-driven strategy. ACTIVE is terminal.
 */
export type CommentaryPhase = 'AWAITING_OPENING' | 'COOLING_DOWN' | 'ACTIVE';

/**
 * Scheduler-owned state for the detection-driven strategy.
 */
export interface CommentaryState {
  phase: CommentaryPhase;
  /** When the opening prompt was delivered (epoch ms) */
  openingDeliveredAt: number | null;
}

/**
 * Decides whether a detection event may trigger commentary.
 */
export type QualifyingPredicate = (event: DetectionEvent) => boolean;

/**
 * Common lifecycle for both strategies.
 */
export interface CommentaryScheduler {
  readonly mode: CommentaryMode;
  /** Begins scheduling. A second call while running is a no-op. */
  start(): void;
  /** Cancels scheduling and waits for any in-flight delivery to settle */
  stop(): Promise<void>;
  isRunning(): boolean;
  /**
   * Handles one detection event. Callers must not overlap invocations.
   * Strategies that do not react to detections ignore it.
   */
  onDetection(event: DetectionEvent): Promise<void>;
}
