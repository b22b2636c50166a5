/**
 * Commentator configuration from environment variables.
 *
 * Environment variables:
 *   VIDEO_PATH        - Video whose audio is streamed to the model
 *   TEAM1_NAME        - Default: Green Bay Packers
 *   TEAM2_NAME        - Default: Chicago Bears
 *   TEAM1_COLOR       - Default: yellow
 *   TEAM2_COLOR       - Default: navy blue with orange
 *   FAV_TEAM_NAME     - Viewer's favourite team (optional)
 *   KNOWLEDGE_LEVEL   - beginner | intermediate | expert (default: beginner)
 *   COMMENTARY_STYLE  - enthusiastic | analytical | casual | roasting (default: enthusiastic)
 *   COMMENTARY_MODE   - periodic | event (default: periodic)
 *   COOLDOWN_MS       - Quiet period after the opening, event mode (default: 8000)
 *   DEBOUNCE_MS       - Minimum spacing of event prompts (default: 6000)
 *   TARGET_LABEL      - Object label that triggers event commentary (default: person)
 *   MIN_CONFIDENCE    - Minimum detection confidence, 0-1 (default: 0.5)
 *   GEMINI_API_KEY    - Gemini API key (GOOGLE_API_KEY also accepted)
 *   GEMINI_MODEL      - Live model name
 *   EVENT_PORT        - Event ingress WebSocket port (default: 8765)
 *   LOGS_DIR          - Session log directory (default: ./logs/sessions)
 */

import type { CommentaryMode, CommentaryStyle, KnowledgeLevel, MatchTeams } from '../commentary/types';
import { COMMENTARY_MODES, COMMENTARY_STYLES, KNOWLEDGE_LEVELS } from '../commentary/types';
import { DEFAULT_EVENT_STRATEGY_CONFIG } from '../commentary/types';

export type Env = Record<string, string | undefined>;

/**
 * Resolved commentator settings.
 */
export interface CommentatorConfig {
  videoPath: string | null;
  teams: MatchTeams;
  team1Color: string;
  team2Color: string;
  favTeam: string;
  level: KnowledgeLevel;
  style: CommentaryStyle;
  mode: CommentaryMode;
  cooldownMs: number;
  debounceMs: number;
  targetLabel: string;
  minConfidence: number;
  geminiApiKey: string | null;
  geminiModel: string | null;
  eventPort: number;
  logsDir: string | null;
}

/**
 * A configuration value is missing or invalid.
 */
export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = 'ConfigError';
    this.variable = variable;
  }
}

/**
 * Matches `raw` against an enumerated set, case-insensitively.
 */
export function parseChoice<T extends string>(name: string, raw: string, choices: readonly T[]): T {
  const normalized = raw.trim().toLowerCase();
  const match = choices.find((option) => option === normalized);
  if (!match) {
    throw new ConfigError(name, `expected one of ${choices.join(', ')}, got "${raw}"`);
  }
  return match;
}

/**
 * Parses a finite number within [min, max].
 */
export function parseNumber(name: string, raw: string, min: number, max: number = Infinity): number {
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ConfigError(name, `expected a number, got "${raw}"`);
  }
  if (value < min || value > max) {
    throw new ConfigError(name, `must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

function text(env: Env, name: string, fallback: string): string {
  const raw = env[name];
  return raw !== undefined && raw.trim() !== '' ? raw.trim() : fallback;
}

function optional(env: Env, name: string): string | null {
  const raw = env[name];
  return raw !== undefined && raw.trim() !== '' ? raw.trim() : null;
}

function choice<T extends string>(env: Env, name: string, choices: readonly T[], fallback: T): T {
  const raw = optional(env, name);
  return raw === null ? fallback : parseChoice(name, raw, choices);
}

function numeric(env: Env, name: string, fallback: number, min: number, max?: number): number {
  const raw = optional(env, name);
  return raw === null ? fallback : parseNumber(name, raw, min, max);
}

/**
 * Reads the commentator configuration. Throws ConfigError on invalid values.
 */
export function loadCommentatorConfig(env: Env = process.env): CommentatorConfig {
  return {
    videoPath: optional(env, 'VIDEO_PATH'),
    teams: {
      team1: text(env, 'TEAM1_NAME', 'Green Bay Packers'),
      team2: text(env, 'TEAM2_NAME', 'Chicago Bears'),
    },
    team1Color: text(env, 'TEAM1_COLOR', 'yellow'),
    team2Color: text(env, 'TEAM2_COLOR', 'navy blue with orange'),
    favTeam: text(env, 'FAV_TEAM_NAME', ''),
    level: choice(env, 'KNOWLEDGE_LEVEL', KNOWLEDGE_LEVELS, 'beginner'),
    style: choice(env, 'COMMENTARY_STYLE', COMMENTARY_STYLES, 'enthusiastic'),
    mode: choice(env, 'COMMENTARY_MODE', COMMENTARY_MODES, 'periodic'),
    cooldownMs: numeric(env, 'COOLDOWN_MS', DEFAULT_EVENT_STRATEGY_CONFIG.cooldownMs, 0),
    debounceMs: numeric(env, 'DEBOUNCE_MS', DEFAULT_EVENT_STRATEGY_CONFIG.debounceMs, 1),
    targetLabel: text(env, 'TARGET_LABEL', 'person'),
    minConfidence: numeric(env, 'MIN_CONFIDENCE', 0.5, 0, 1),
    geminiApiKey: optional(env, 'GEMINI_API_KEY') ?? optional(env, 'GOOGLE_API_KEY'),
    geminiModel: optional(env, 'GEMINI_MODEL'),
    eventPort: numeric(env, 'EVENT_PORT', 8765, 0, 65535),
    logsDir: optional(env, 'LOGS_DIR'),
  };
}
