/**
 * Commentary Module
 *
 * Decides when the voice session should speak and what it is asked:
 * - Periodic strategy: fixed cadence after an opening
 * - Event-triggered strategy: detections gated by opening, cooldown and debounce
 */

export type {
  CommentaryStyle,
  KnowledgeLevel,
  CommentaryMode,
  PromptCategory,
  PromptSet,
  MatchTeams,
  PromptKind,
  DeliveryResult,
  PeriodicStrategyConfig,
  EventStrategyConfig,
  CommentaryPhase,
  CommentaryState,
  QualifyingPredicate,
  CommentaryScheduler,
} from './types';

export {
  COMMENTARY_STYLES,
  KNOWLEDGE_LEVELS,
  COMMENTARY_MODES,
  DEFAULT_PERIODIC_STRATEGY_CONFIG,
  DEFAULT_EVENT_STRATEGY_CONFIG,
} from './types';

export {
  buildPrompts,
  buildOpeningPrompt,
  buildPromptSet,
  pickPrompt,
  promptCategory,
  levelHint,
  hasObjectLabel,
} from './prompts';

export { deliverPrompt } from './delivery';
export { PeriodicCommentaryStrategy } from './periodic-strategy';
export type { PeriodicStrategyOptions } from './periodic-strategy';
export { EventTriggeredCommentaryStrategy } from './event-strategy';
export type { EventStrategyOptions } from './event-strategy';
export { createCommentaryScheduler } from './scheduler';
export type { CommentarySchedulerOptions } from './scheduler';
