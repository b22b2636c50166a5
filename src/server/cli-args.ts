/**
 * Command-line options for the commentator.
 */

import type { CommentaryMode, CommentaryStyle, KnowledgeLevel } from '../commentary/types';
import { COMMENTARY_MODES, COMMENTARY_STYLES, KNOWLEDGE_LEVELS } from '../commentary/types';
import type { CommentatorConfig } from '../config/env';
import { ConfigError, parseChoice, parseNumber } from '../config/env';

export interface CliOptions {
  video?: string;
  team1?: string;
  team2?: string;
  favTeam?: string;
  level?: KnowledgeLevel;
  style?: CommentaryStyle;
  mode?: CommentaryMode;
  port?: number;
  outputAudio?: string;
  mock: boolean;
  help: boolean;
}

export const USAGE = `Usage: npm start -- [options]

Options:
  -v, --video <path>        Video file whose audio is narrated
      --team1 <name>        Team 1 name
      --team2 <name>        Team 2 name
  -f, --fav-team <name>     Your favourite team
  -l, --level <level>       ${KNOWLEDGE_LEVELS.join(' | ')}
  -s, --style <style>       ${COMMENTARY_STYLES.join(' | ')}
  -m, --mode <mode>         ${COMMENTARY_MODES.join(' | ')}
      --port <port>         Event ingress port
      --output-audio <file> Write the commentator's raw PCM output to a file
      --mock                Use a mock voice session (no API key needed)
  -h, --help                Show this help`;

const VALUE_FLAGS: Record<string, string> = {
  '-v': 'video',
  '--video': 'video',
  '--team1': 'team1',
  '--team2': 'team2',
  '-f': 'favTeam',
  '--fav-team': 'favTeam',
  '-l': 'level',
  '--level': 'level',
  '-s': 'style',
  '--style': 'style',
  '-m': 'mode',
  '--mode': 'mode',
  '--port': 'port',
  '--output-audio': 'outputAudio',
};

/**
 * Parses argv (without the node and script entries).
 */
export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = { mock: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--mock') {
      options.mock = true;
      continue;
    }
    if (arg === '-h' || arg === '--help') {
      options.help = true;
      continue;
    }

    const key = VALUE_FLAGS[arg];
    if (!key) {
      throw new ConfigError(arg, 'unknown option');
    }
    const value = args[i + 1];
    if (value === undefined || value.startsWith('-')) {
      throw new ConfigError(arg, 'missing value');
    }
    i++;

    switch (key) {
      case 'video':
        options.video = value;
        break;
      case 'team1':
        options.team1 = value;
        break;
      case 'team2':
        options.team2 = value;
        break;
      case 'favTeam':
        options.favTeam = value;
        break;
      case 'level':
        options.level = parseChoice(arg, value, KNOWLEDGE_LEVELS);
        break;
      case 'style':
        options.style = parseChoice(arg, value, COMMENTARY_STYLES);
        break;
      case 'mode':
        options.mode = parseChoice(arg, value, COMMENTARY_MODES);
        break;
      case 'port':
        options.port = parseNumber(arg, value, 0, 65535);
        break;
      case 'outputAudio':
        options.outputAudio = value;
        break;
    }
  }

  return options;
}

/**
 * Command-line options take precedence over the environment.
 */
export function applyCliOptions(config: CommentatorConfig, options: CliOptions): CommentatorConfig {
  return {
    ...config,
    videoPath: options.video ?? config.videoPath,
    teams: {
      team1: options.team1 ?? config.teams.team1,
      team2: options.team2 ?? config.teams.team2,
    },
    favTeam: options.favTeam ?? config.favTeam,
    level: options.level ?? config.level,
    style: options.style ?? config.style,
    mode: options.mode ?? config.mode,
    eventPort: options.port ?? config.eventPort,
  };
}
