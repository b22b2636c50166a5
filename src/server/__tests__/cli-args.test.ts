/**
 * Tests for command-line parsing.
 */

import { describe, it, expect } from 'vitest';
import { applyCliOptions, parseCliArgs } from '../cli-args';
import { loadCommentatorConfig } from '../../config/env';

describe('parseCliArgs', () => {
  it('should return defaults for no arguments', () => {
    expect(parseCliArgs([])).toEqual({ mock: false, help: false });
  });

  it('should parse long and short value flags', () => {
    const options = parseCliArgs([
      '--video', 'match.mp4',
      '--team1', 'Reds',
      '--team2', 'Blues',
      '-f', 'Reds',
      '-l', 'expert',
      '-s', 'Roasting',
      '-m', 'event',
      '--port', '9000',
      '--output-audio', 'out.pcm',
      '--mock',
    ]);

    expect(options).toEqual({
      video: 'match.mp4',
      team1: 'Reds',
      team2: 'Blues',
      favTeam: 'Reds',
      level: 'expert',
      style: 'roasting',
      mode: 'event',
      port: 9000,
      outputAudio: 'out.pcm',
      mock: true,
      help: false,
    });
  });

  it('should recognise help', () => {
    expect(parseCliArgs(['-h']).help).toBe(true);
    expect(parseCliArgs(['--help']).help).toBe(true);
  });

  it('should reject unknown options', () => {
    expect(() => parseCliArgs(['--loud'])).toThrow('--loud: unknown option');
  });

  it('should reject a flag without a value', () => {
    expect(() => parseCliArgs(['--video'])).toThrow('--video: missing value');
    expect(() => parseCliArgs(['--team1', '--mock'])).toThrow('--team1: missing value');
  });

  it('should validate enumerated and numeric values', () => {
    expect(() => parseCliArgs(['--mode', 'random'])).toThrow('--mode: expected one of periodic, event, got "random"');
    expect(() => parseCliArgs(['--port', '70000'])).toThrow('--port: must be between 0 and 65535, got 70000');
  });
});

describe('applyCliOptions', () => {
  it('should let command-line options override the environment', () => {
    const config = loadCommentatorConfig({ TEAM1_NAME: 'Env Reds', COMMENTARY_MODE: 'periodic', EVENT_PORT: '7000' });
    const merged = applyCliOptions(config, parseCliArgs(['--team2', 'Blues', '-m', 'event']));

    expect(merged.teams).toEqual({ team1: 'Env Reds', team2: 'Blues' });
    expect(merged.mode).toBe('event');
    expect(merged.eventPort).toBe(7000);
    expect(merged.level).toBe('beginner');
  });
});
