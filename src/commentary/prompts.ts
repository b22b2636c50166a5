/**
 * Prompt templates for live commentary.
 *
 * A regular prompt is a style template followed by a knowledge-level hint,
 * e.g. "What's happening? Roast it. 1-2 sentences. Explain terms simply."
 */

import type { DetectionEvent } from '../session/types';
import type {
  CommentaryStyle,
  KnowledgeLevel,
  MatchTeams,
  PromptCategory,
  PromptSet,
  QualifyingPredicate,
} from './types';

/**
 * Phrasing hints appended to every regular prompt.
 */
const LEVEL_HINTS: Record<KnowledgeLevel, string> = {
  beginner: 'Explain terms simply.',
  intermediate: 'Explain tactics.',
  expert: 'Use jargon freely.',
};

/**
 * Templates per category.
 */
const PROMPT_TEMPLATES: Record<PromptCategory, readonly string[]> = {
  roasting: [
    "What's happening? Roast it. 1-2 sentences.",
    'Comment on that play with roasts. 1-2 sentences.',
  ],
  neutral: [
    "What's happening? 1-2 sentences.",
    'Comment on that play. 1-2 sentences.',
  ],
};

export function promptCategory(style: CommentaryStyle): PromptCategory {
  return style === 'roasting' ? 'roasting' : 'neutral';
}

export function levelHint(level: KnowledgeLevel): string {
  return LEVEL_HINTS[level];
}

/**
 * Regular prompts for a style and knowledge level.
 */
export function buildPrompts(style: CommentaryStyle, level: KnowledgeLevel): string[] {
  const hint = levelHint(level);
  return PROMPT_TEMPLATES[promptCategory(style)].map((template) => `${template} ${hint}`);
}

export function buildOpeningPrompt(teams: MatchTeams): string {
  return `Welcome to ${teams.team1} vs ${teams.team2}! Quick intro in 1-2 sentences.`;
}

export function buildPromptSet(style: CommentaryStyle, level: KnowledgeLevel, teams: MatchTeams): PromptSet {
  return {
    opening: buildOpeningPrompt(teams),
    prompts: buildPrompts(style, level),
  };
}

/**
 * Picks one prompt uniformly at random.
 */
export function pickPrompt(prompts: readonly string[], random: () => number = Math.random): string {
  if (prompts.length === 0) {
    throw new Error('Prompt set is empty');
  }
  const index = Math.min(prompts.length - 1, Math.floor(random() * prompts.length));
  return prompts[index];
}

/**
 * Qualifies events containing an object with the given label.
 */
export function hasObjectLabel(label: string, minConfidence: number = 0): QualifyingPredicate {
  const wanted = label.trim().toLowerCase();
  return (event: DetectionEvent) =>
    event.objects.some(
      (obj) => obj.label.trim().toLowerCase() === wanted && obj.confidence >= minConfidence
    );
}
