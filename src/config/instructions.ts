/**
 * Instructions templating.
 *
 * Loads the commentator's system instructions and fills in the match and
 * viewer placeholders.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { CommentaryStyle, KnowledgeLevel } from '../commentary/types';

/**
 * Values substituted into the template.
 */
export interface InstructionVariables {
  favTeam: string;
  level: KnowledgeLevel;
  style: CommentaryStyle;
  team1: string;
  team2: string;
  team1Color: string;
  team2Color: string;
}

export const DEFAULT_INSTRUCTIONS_PATH = fileURLToPath(new URL('./instructions.md', import.meta.url));

function capitalize(value: string): string {
  return value.length === 0 ? value : value[0].toUpperCase() + value.slice(1);
}

/**
 * Replaces every placeholder occurrence. Unknown placeholders are left as-is.
 */
export function renderInstructions(template: string, vars: InstructionVariables): string {
  const replacements: Record<string, string> = {
    '{FAV_TEAM_NAME}': vars.favTeam ? vars.favTeam : 'not specified',
    '{KNOWLEDGE_LEVEL}': capitalize(vars.level),
    '{COMMENTARY_STYLE}': capitalize(vars.style),
    '{TEAM1_NAME}': vars.team1,
    '{TEAM2_NAME}': vars.team2,
    '{TEAM1_COLOR}': vars.team1Color,
    '{TEAM2_COLOR}': vars.team2Color,
  };

  let result = template;
  for (const [placeholder, value] of Object.entries(replacements)) {
    result = result.split(placeholder).join(value);
  }
  return result;
}

/**
 * Reads the template from disk and renders it.
 */
export function loadInstructions(vars: InstructionVariables, path: string = DEFAULT_INSTRUCTIONS_PATH): string {
  return renderInstructions(readFileSync(path, 'utf-8'), vars);
}
