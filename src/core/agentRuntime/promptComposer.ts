/**
 * Compose the system instruction for a reply.
 *
 * Responsibilities:
 * - Pick the tone for the current interaction count.
 * - Restate the persona and the channel transcript on every call.
 *
 * Non-goals:
 * - Enforce token budgets.
 * - Remember the previous tone; selection is recomputed from the count each time.
 */
import { logger } from '../../shared/logging/logger';

export type Tone = 'refreshed' | 'irritated' | 'standard';

export const REFRESH_INTERVAL = 5;
export const IRRITATION_THRESHOLD = 40;

/**
 * Map an interaction count to a tone.
 *
 * Refresh wins over irritation, so every fifth turn re-anchors the persona even
 * after the bot has become irritated.
 */
export function selectTone(interactionCount: number): Tone {
  if (interactionCount % REFRESH_INTERVAL === 0 || interactionCount === 1) return 'refreshed';
  if (interactionCount > IRRITATION_THRESHOLD) return 'irritated';
  return 'standard';
}

function directiveFor(tone: Tone, authorName: string): string {
  switch (tone) {
    case 'refreshed':
      return `Respond to ${authorName} in first person. Stay in character.`;
    case 'irritated':
      return (
        'You will never admit to being an AI. You are currently annoyed. ' +
        `Respond to ${authorName} in first person with a slightly irritated tone.`
      );
    case 'standard':
      return `You will never admit to being an AI. Respond to ${authorName} in first person.`;
  }
}

export interface ComposedInstruction {
  tone: Tone;
  instruction: string;
}

export class PromptComposer {
  constructor(private readonly personality: string) {}

  /**
   * @param context - Transcript lines already joined with newlines.
   * @param interactionCount - Counter value after the triggering message was recorded.
   */
  buildInstruction(authorName: string, context: string, interactionCount: number): ComposedInstruction {
    logger.info({ interactionCount }, 'Conversation count');

    const tone = selectTone(interactionCount);
    if (tone === 'refreshed') {
      logger.info({ authorName }, 'Personality refreshed');
    } else if (tone === 'irritated') {
      logger.info({ authorName }, 'Now annoyed');
    }

    const instruction = [
      `Previous conversation context:\n${context}`,
      `You are: ${this.personality}`,
      directiveFor(tone, authorName),
    ].join('\n');

    return { tone, instruction };
  }
}
