export { loadCommentatorConfig, parseChoice, parseNumber, ConfigError } from './env';
export type { CommentatorConfig, Env } from './env';
export { renderInstructions, loadInstructions, DEFAULT_INSTRUCTIONS_PATH } from './instructions';
export type { InstructionVariables } from './instructions';
