import { GrammyError, HttpError, type Api } from 'grammy';
import type { AdminCheckResult, ChannelInfo, ChannelInspector } from '../channels/verifier.js';
import type { PostingTransport } from './jobs.js';
import type { MessagingTransport } from './notifications.js';
import { PermanentTransportError, TransientError, errorMessage } from '../shared/errors.js';

export interface TelegramErrorClass {
  transient: boolean;
  reason: string;
}

/** Split Telegram failures into ones worth retrying and ones the chat itself gave. */
export function classifyTelegramError(err: unknown): TelegramErrorClass {
  if (err instanceof HttpError) {
    return { transient: true, reason: `network/http error: ${err.message}` };
  }

  if (err instanceof GrammyError) {
    const desc = err.description.toLowerCase();
    const transient = err.error_code === 429
      || err.error_code >= 500
      || desc.includes('timeout')
      || desc.includes('temporarily')
      || desc.includes('try again');
    return { transient, reason: `telegram error ${err.error_code}: ${err.description}` };
  }

  return { transient: true, reason: `unknown error: ${errorMessage(err)}` };
}

function toTransportError(err: unknown, action: string): Error {
  const { transient, reason } = classifyTelegramError(err);
  return transient
    ? new TransientError(`${action} failed: ${reason}`, { cause: err })
    : new PermanentTransportError(`${action} failed: ${reason}`, { cause: err });
}

export interface PlacementLocation {
  chatId: string;
  messageId: number;
}

export function formatPlacementRef(chatId: string, messageId: number): string {
  return `${chatId}/${messageId}`;
}

export function parsePlacementRef(ref: string): PlacementLocation {
  const slash = ref.lastIndexOf('/');
  const messageId = Number(ref.slice(slash + 1));
  if (slash <= 0 || !Number.isInteger(messageId) || messageId <= 0) {
    throw new PermanentTransportError(`Malformed placement reference "${ref}"`);
  }
  return { chatId: ref.slice(0, slash), messageId };
}

function isMissingMessage(err: unknown): boolean {
  const lowered = errorMessage(err).toLowerCase();
  return lowered.includes('not found')
    || lowered.includes('message to copy not found')
    || lowered.includes('message_id_invalid')
    || lowered.includes('message id invalid');
}

/**
 * Posts the ad and pins it. A failed pin is logged; the post itself counts
 * as the placement.
 */
export function createPostingTransport(api: Api, livenessCheckChannelId: number): PostingTransport {
  return {
    async publish(telegramChannelId, content) {
      let messageId: number;
      try {
        const msg = await api.sendMessage(telegramChannelId, content);
        messageId = msg.message_id;
      } catch (err) {
        throw toTransportError(err, `post to ${telegramChannelId}`);
      }

      try {
        await api.pinChatMessage(telegramChannelId, messageId, { disable_notification: true });
      } catch (err) {
        console.warn(`[bot] Could not pin message ${messageId} in ${telegramChannelId}:`, errorMessage(err));
      }
      return formatPlacementRef(telegramChannelId, messageId);
    },

    /**
     * Copy the post into a dedicated check channel and delete the copy. A
     * missing source message means the post was deleted; any other failure
     * leaves the answer unknown.
     */
    async exists(placementRef) {
      const { chatId, messageId } = parsePlacementRef(placementRef);
      let copiedId: number;
      try {
        const copied = await api.copyMessage(livenessCheckChannelId, chatId, messageId, {
          disable_notification: true,
        });
        copiedId = copied.message_id;
      } catch (err) {
        if (isMissingMessage(err)) return false;
        throw toTransportError(err, `liveness check of ${placementRef}`);
      }

      try {
        await api.deleteMessage(livenessCheckChannelId, copiedId);
      } catch (err) {
        console.warn(`[bot] Could not delete liveness copy ${copiedId}:`, errorMessage(err));
      }
      return true;
    },

    async remove(placementRef) {
      const { chatId, messageId } = parsePlacementRef(placementRef);
      try {
        await api.deleteMessage(chatId, messageId);
      } catch (err) {
        throw toTransportError(err, `delete ${placementRef}`);
      }
    },
  };
}

export function createChannelInspector(api: Api): ChannelInspector {
  let botId: number | null = null;

  return {
    /** `isDefinitive=false` means the status could not be determined reliably. */
    async adminStatus(telegramChannelId): Promise<AdminCheckResult> {
      try {
        if (botId === null) botId = (await api.getMe()).id;
        const member = await api.getChatMember(telegramChannelId, botId);
        const isAdmin = member.status === 'administrator' || member.status === 'creator';
        return { isAdmin, isDefinitive: true, reason: `chat member status=${member.status}` };
      } catch (err) {
        const { transient, reason } = classifyTelegramError(err);
        return { isAdmin: false, isDefinitive: !transient, reason };
      }
    },

    async info(telegramChannelId): Promise<ChannelInfo> {
      try {
        const chat = await api.getChat(telegramChannelId);
        const subscribers = await api.getChatMemberCount(telegramChannelId);
        const title = 'title' in chat && typeof chat.title === 'string' ? chat.title : null;
        return { title, subscribers };
      } catch (err) {
        throw toTransportError(err, `read channel ${telegramChannelId}`);
      }
    },
  };
}

export function createMessagingTransport(api: Api): MessagingTransport {
  return {
    async send(telegramUserId, content) {
      await api.sendMessage(telegramUserId, content, { parse_mode: 'HTML' });
    },
  };
}
