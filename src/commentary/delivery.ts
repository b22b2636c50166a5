/**
 * Hands prompts to the voice session.
 */

import type { PromptSink, SessionEventLog } from '../session/types';
import { errorMessage } from '../timing/sleep';
import type { DeliveryResult, PromptKind } from './types';

/**
 * Sends one prompt. An unreachable session drops the prompt; a throwing
 * session is logged and reported as 'failed'. Never throws.
 */
export async function deliverPrompt(
  sink: PromptSink,
  prompt: string,
  kind: PromptKind,
  logger: SessionEventLog
): Promise<DeliveryResult> {
  if (!sink.connected) {
    logger.log({ type: 'prompt_dropped', kind, prompt });
    return 'dropped';
  }

  try {
    await sink.sendPrompt(prompt);
    logger.log({ type: 'prompt_sent', kind, prompt });
    return 'sent';
  } catch (error) {
    const message = errorMessage(error);
    console.error(`[Commentary] Commentary error: ${message}`);
    logger.log({ type: 'prompt_failed', kind, error: message });
    return 'failed';
  }
}
