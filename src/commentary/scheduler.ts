/**
 * Builds the commentary scheduler for a session.
 */

import type { PromptSink, SessionEventLog } from '../session/types';
import { EventTriggeredCommentaryStrategy } from './event-strategy';
import { PeriodicCommentaryStrategy } from './periodic-strategy';
import type {
  CommentaryMode,
  CommentaryScheduler,
  EventStrategyConfig,
  PeriodicStrategyConfig,
  PromptSet,
  QualifyingPredicate,
} from './types';

export interface CommentarySchedulerOptions {
  mode: CommentaryMode;
  sink: PromptSink;
  prompts: PromptSet;
  /** Required by the event-triggered strategy */
  qualifies?: QualifyingPredicate;
  logger?: SessionEventLog;
  periodic?: Partial<PeriodicStrategyConfig>;
  event?: Partial<EventStrategyConfig>;
  random?: () => number;
}

export function createCommentaryScheduler(options: CommentarySchedulerOptions): CommentaryScheduler {
  const { sink, prompts, logger, random } = options;

  switch (options.mode) {
    case 'periodic':
      return new PeriodicCommentaryStrategy({ sink, prompts, logger, random, config: options.periodic });

    case 'event':
      if (!options.qualifies) {
        throw new Error('Event-triggered commentary needs a qualifying predicate');
      }
      return new EventTriggeredCommentaryStrategy({
        sink,
        prompts,
        logger,
        random,
        qualifies: options.qualifies,
        config: options.event,
      });
  }
}
