/**
 * Tests for the JSONL session logger.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { appendFileSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { SessionLogger, filterLogsByType, generateSessionId, readSessionLogs } from '../session-logger';

describe('SessionLogger', () => {
  let logsDir: string;

  beforeEach(() => {
    logsDir = mkdtempSync(join(tmpdir(), 'commentator-logs-'));
  });

  afterEach(() => {
    rmSync(logsDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should write one JSON line per event', () => {
    const logger = new SessionLogger('session_a', join(logsDir, 'nested'));
    logger.log({ type: 'prompt_sent', kind: 'opening', prompt: 'Welcome!' });
    logger.warning('Source produced no audio packets', 'match.mp4');

    expect(logger.getLogPath()).toBe(join(logsDir, 'nested', 'session_a.jsonl'));
    const lines = readFileSync(logger.getLogPath(), 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);

    const first: unknown = JSON.parse(lines[0]);
    expect(first).toMatchObject({
      sessionId: 'session_a',
      event: { type: 'prompt_sent', kind: 'opening', prompt: 'Welcome!' },
    });
  });

  it('should read back and filter entries', () => {
    const logger = new SessionLogger('session_b', logsDir);
    logger.log({ type: 'session_started', sessionId: 'session_b', mode: 'event' });
    logger.log({ type: 'commentary_state', from: 'AWAITING_OPENING', to: 'COOLING_DOWN' });
    logger.debug('tick', { n: 1 });

    const entries = readSessionLogs('session_b', logsDir);
    expect(entries.map((e) => e.event.type)).toEqual(['session_started', 'commentary_state', 'debug']);
    expect(filterLogsByType(entries, ['commentary_state']).map((e) => e.event)).toEqual([
      { type: 'commentary_state', from: 'AWAITING_OPENING', to: 'COOLING_DOWN' },
    ]);
  });

  it('should not write while disabled', () => {
    const logger = new SessionLogger('session_c', logsDir);
    logger.disable();
    logger.log({ type: 'audio_no_track', source: 'match.mp4' });
    logger.enable();
    logger.log({ type: 'audio_no_track', source: 'other.mp4' });

    expect(readSessionLogs('session_c', logsDir).map((e) => e.event)).toEqual([
      { type: 'audio_no_track', source: 'other.mp4' },
    ]);
  });

  it('should skip malformed lines', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = new SessionLogger('session_d', logsDir);
    logger.log({ type: 'audio_no_track', source: 'match.mp4' });
    appendFileSync(logger.getLogPath(), '{truncated\n');

    expect(readSessionLogs('session_d', logsDir)).toHaveLength(1);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should return nothing for an unknown session', () => {
    expect(readSessionLogs('session_missing', logsDir)).toEqual([]);
  });
});

describe('generateSessionId', () => {
  it('should produce distinct prefixed ids', () => {
    const a = generateSessionId();
    const b = generateSessionId();
    expect(a).toMatch(/^session_\d+_[a-z0-9]+$/);
    expect(a).not.toBe(b);
  });
});
