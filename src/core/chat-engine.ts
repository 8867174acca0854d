import type { Logger } from 'pino';
import { logger } from '../shared/logging/logger';
import { AppError, toErrorWithCode } from '../shared/errors/app-error';
import { buildContext, renderContext } from './awareness/contextAssembler';
import { BOT_TRANSCRIPT_LABEL, HistoryStore } from './awareness/historyStore';
import { formatMemoryLine, RollingMemory } from './awareness/rollingMemory';
import { PromptComposer } from './agentRuntime/promptComposer';
import { stripBotMention } from './invocation/mention';
import { LLMClient } from './llm/llm-types';
import { runInChannel } from './utils/channelQueue';
import { toUnixSeconds } from './utils/clock';

export const APOLOGY_MESSAGE = 'Sorry, there was an error processing your request.';

export interface ChatRuntimeDeps {
  store: HistoryStore;
  memory: RollingMemory;
  composer: PromptComposer;
  llm: LLMClient;
  contextLimit?: number;
}

export interface BotIdentity {
  id: string;
  username: string;
  discriminator?: string | null;
}

export interface ChatReplyParams {
  channelId: string;
  guildId: string | null;
  authorName: string;
  rawContent: string;
  /** Counter value captured right after the triggering message was recorded. */
  interactionCount: number;
  bot: BotIdentity;
  send: (text: string) => Promise<unknown>;
}

/**
 * Generate and deliver a reply to a message that mentioned the bot.
 *
 * Flow:
 * 1. Strip the bot mention and assemble the channel context
 * 2. Compose the system instruction for the current interaction count
 * 3. Call the completion API (system = instruction, user = cleaned message)
 * 4. Deliver, remember and persist the reply; when the completion call or the
 *    delivery fails, deliver the apology and remember it without persisting it
 *
 * Replies within one channel run one at a time; other channels are not blocked.
 *
 * @returns true when a generated reply was delivered.
 */
export async function generateChatReply(params: ChatReplyParams, deps: ChatRuntimeDeps): Promise<boolean> {
  return runInChannel(params.channelId, async () => {
    const { channelId, guildId, authorName, rawContent, interactionCount, bot, send } = params;
    const log = logger.child({ channelId });

    const cleanMessage = stripBotMention(rawContent, bot.id);
    const contextLines = await buildContext(channelId, {
      store: deps.store,
      memory: deps.memory,
      limit: deps.contextLimit,
    });
    const { tone, instruction } = deps.composer.buildInstruction(
      authorName,
      renderContext(contextLines),
      interactionCount,
    );
    log.debug({ tone, contextLines: contextLines.length }, 'Instruction composed');

    let replyText: string;
    try {
      const response = await deps.llm.chat({
        messages: [
          { role: 'system', content: instruction },
          { role: 'user', content: cleanMessage },
        ],
      });
      replyText = response.content.trim();
      if (!replyText) {
        throw new AppError('EXTERNAL_CALL_FAILED', 'Chat completion returned empty content');
      }
    } catch (error) {
      const appError = toErrorWithCode(error, 'EXTERNAL_CALL_FAILED');
      log.error({ error: appError, code: appError.code }, 'Failed to call completion API');
      return deliverApology(send, deps.memory, log);
    }

    try {
      await send(replyText);
    } catch (error) {
      log.error({ error }, 'Failed to deliver reply');
      return deliverApology(send, deps.memory, log);
    }

    deps.memory.append(formatMemoryLine(BOT_TRANSCRIPT_LABEL, replyText));

    try {
      const nowTs = toUnixSeconds();
      await deps.store.recordParticipant({
        userId: bot.id,
        username: bot.username,
        discriminator: bot.discriminator ?? null,
        isBot: true,
        nowTs,
        incrementMessage: true,
        incrementMention: false,
      });
      await deps.store.appendMessage({
        ts: nowTs,
        userId: bot.id,
        username: bot.username,
        guildId,
        channelId,
        messageId: null,
        isBot: true,
        content: replyText,
      });
    } catch (error) {
      log.error({ error }, 'Failed to log bot response (non-fatal)');
    }

    return true;
  });
}

async function deliverApology(
  send: ChatReplyParams['send'],
  memory: RollingMemory,
  log: Logger,
): Promise<false> {
  try {
    await send(APOLOGY_MESSAGE);
  } catch (error) {
    log.error({ error }, 'Failed to deliver apology');
    return false;
  }
  memory.append(formatMemoryLine(BOT_TRANSCRIPT_LABEL, APOLOGY_MESSAGE));
  return false;
}
