/**
 * Tests for the detection-driven commentary strategy and the scheduler factory.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EventTriggeredCommentaryStrategy } from '../event-strategy';
import { PeriodicCommentaryStrategy } from '../periodic-strategy';
import { createCommentaryScheduler } from '../scheduler';
import { hasObjectLabel } from '../prompts';
import type { PromptSet } from '../types';
import type { DetectionEvent } from '../../session/types';
import { RecordingEventLog, RecordingPromptSink } from '../../test/fakes';

const PROMPTS: PromptSet = {
  opening: 'Welcome!',
  prompts: ['Big play.'],
};

const PERSON: DetectionEvent = { type: 'detection', objects: [{ label: 'person', confidence: 0.9 }] };
const BALL: DetectionEvent = { type: 'detection', objects: [{ label: 'ball', confidence: 0.9 }] };
const EMPTY: DetectionEvent = { type: 'detection', objects: [] };

describe('EventTriggeredCommentaryStrategy', () => {
  let sink: RecordingPromptSink;
  let logger: RecordingEventLog;
  let strategy: EventTriggeredCommentaryStrategy;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    sink = new RecordingPromptSink();
    logger = new RecordingEventLog();
    strategy = new EventTriggeredCommentaryStrategy({
      sink,
      prompts: PROMPTS,
      qualifies: hasObjectLabel('person'),
      logger,
      config: { cooldownMs: 8000, debounceMs: 6000 },
    });
    strategy.start();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should deliver the opening on the first event even if it does not qualify', async () => {
    await strategy.onDetection(EMPTY, 1000);

    expect(sink.prompts).toEqual(['Welcome!']);
    expect(strategy.getState()).toEqual({ phase: 'COOLING_DOWN', openingDeliveredAt: 1000 });
  });

  it('should ignore qualifying events during the cooldown', async () => {
    await strategy.onDetection(PERSON, 0);
    await strategy.onDetection(PERSON, 4000);
    await strategy.onDetection(PERSON, 7999);

    expect(sink.prompts).toEqual(['Welcome!']);
    expect(strategy.getState().phase).toBe('COOLING_DOWN');
  });

  it('should handle the event that ends the cooldown as active', async () => {
    await strategy.onDetection(PERSON, 0);
    await strategy.onDetection(PERSON, 8000);

    expect(sink.prompts).toEqual(['Welcome!', 'Big play.']);
    expect(logger.ofType('commentary_state')).toEqual([
      { type: 'commentary_state', from: 'AWAITING_OPENING', to: 'COOLING_DOWN' },
      { type: 'commentary_state', from: 'COOLING_DOWN', to: 'ACTIVE' },
    ]);
  });

  it('should become active on a non-qualifying event without speaking', async () => {
    await strategy.onDetection(PERSON, 0);
    await strategy.onDetection(BALL, 9000);

    expect(sink.prompts).toEqual(['Welcome!']);
    expect(strategy.getState().phase).toBe('ACTIVE');

    await strategy.onDetection(PERSON, 9001);
    expect(sink.prompts).toEqual(['Welcome!', 'Big play.']);
  });

  it('should debounce regular prompts once active', async () => {
    for (const now of [0, 4000, 8001, 11001, 14002]) {
      await strategy.onDetection(PERSON, now);
    }

    expect(sink.prompts).toEqual(['Welcome!', 'Big play.', 'Big play.']);
  });

  it('should not start a debounce window for non-qualifying events', async () => {
    await strategy.onDetection(PERSON, 0);
    await strategy.onDetection(BALL, 8000);
    await strategy.onDetection(BALL, 9000);
    await strategy.onDetection(PERSON, 10000);

    expect(sink.prompts).toEqual(['Welcome!', 'Big play.']);
  });

  it('should advance state when the opening is dropped', async () => {
    sink.connected = false;
    await strategy.onDetection(PERSON, 0);

    expect(sink.prompts).toEqual([]);
    expect(logger.ofType('prompt_dropped')).toEqual([
      { type: 'prompt_dropped', kind: 'opening', prompt: 'Welcome!' },
    ]);
    expect(strategy.getState().phase).toBe('COOLING_DOWN');
  });

  it('should absorb a delivery fault and keep the debounce window', async () => {
    await strategy.onDetection(PERSON, 0);
    sink.failures = 1;

    await expect(strategy.onDetection(PERSON, 8000)).resolves.toBeUndefined();
    await strategy.onDetection(PERSON, 9000);
    await strategy.onDetection(PERSON, 14000);

    expect(sink.prompts).toEqual(['Welcome!', 'Big play.']);
    expect(logger.ofType('prompt_failed')).toHaveLength(1);
  });

  it('should ignore events before start and after stop', async () => {
    await strategy.stop();
    await strategy.onDetection(PERSON, 0);

    expect(sink.prompts).toEqual([]);
    expect(strategy.getState().phase).toBe('AWAITING_OPENING');
    expect(strategy.isRunning()).toBe(false);
  });
});

describe('createCommentaryScheduler', () => {
  it('should build the periodic strategy', () => {
    const scheduler = createCommentaryScheduler({
      mode: 'periodic',
      sink: new RecordingPromptSink(),
      prompts: PROMPTS,
    });
    expect(scheduler).toBeInstanceOf(PeriodicCommentaryStrategy);
    expect(scheduler.mode).toBe('periodic');
  });

  it('should build the event strategy with a predicate', () => {
    const scheduler = createCommentaryScheduler({
      mode: 'event',
      sink: new RecordingPromptSink(),
      prompts: PROMPTS,
      qualifies: hasObjectLabel('person'),
    });
    expect(scheduler).toBeInstanceOf(EventTriggeredCommentaryStrategy);
  });

  it('should require a predicate for event mode', () => {
    expect(() =>
      createCommentaryScheduler({ mode: 'event', sink: new RecordingPromptSink(), prompts: PROMPTS })
    ).toThrow('Event-triggered commentary needs a qualifying predicate');
  });
});
