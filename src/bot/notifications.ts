import type { Store } from '../db/store.js';
import type { CampaignStateMachine } from '../escrow/transitions.js';
import { errorMessage } from '../shared/errors.js';
import { withTimeout } from '../shared/retry.js';
import type { Campaign, CampaignTransition } from '../shared/types.js';

/** Outbound direct messages. Rejects when the message could not be delivered. */
export interface MessagingTransport {
  send(telegramUserId: number, content: string): Promise<void>;
}

interface Outgoing {
  userId: number;
  text: string;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

function preview(campaign: Campaign): string {
  const text = campaign.ad_text.length > 80 ? `${campaign.ad_text.slice(0, 77)}...` : campaign.ad_text;
  return escapeHtml(text);
}

/**
 * Tells advertisers and channel owners about campaign transitions. Delivery
 * is best-effort: a failed message is logged and the transition stands.
 * Messages go out in transition order on a queue of their own, so the
 * transition never waits for Telegram.
 */
export class Notifier {
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly store: Store,
    private readonly transport: MessagingTransport,
    private readonly timeoutMs: number,
  ) {}

  attach(machine: CampaignStateMachine): () => void {
    return machine.onTransition((event) => this.enqueue(event));
  }

  enqueue(event: CampaignTransition): void {
    this.queue = this.queue.then(() =>
      this.onTransition(event).catch((err: unknown) => {
        console.error(`[notify] Failed to notify about campaign ${event.campaign.id}:`, errorMessage(err));
      }),
    );
  }

  /** Resolves once every queued notification has been attempted. */
  flush(): Promise<void> {
    return this.queue;
  }

  async onTransition(event: CampaignTransition): Promise<void> {
    const messages = await this.compose(event);
    for (const message of messages) {
      await this.notifyUser(message.userId, message.text);
    }
  }

  /** Send a DM to a user by their DB user ID. Returns whether it was delivered. */
  async notifyUser(userId: number, text: string): Promise<boolean> {
    try {
      const user = await this.store.getUser(userId);
      if (!user) return false;
      await withTimeout(this.transport.send(user.telegram_id, text), this.timeoutMs, `DM to user ${userId}`);
      return true;
    } catch (err) {
      console.error(`[notify] Failed to DM user ${userId}:`, errorMessage(err));
      return false;
    }
  }

  private async compose({ campaign, from, to }: CampaignTransition): Promise<Outgoing[]> {
    const advertiser = campaign.advertiser_id;
    const ref = `<b>Campaign #${campaign.id}</b>`;
    const ownerId = await this.ownerOf(campaign);
    const channelName = await this.channelName(campaign);

    switch (to) {
      case 'funded':
        return [{ userId: advertiser, text: `${ref} funded. ${campaign.budget} is held in escrow.` }];
      case 'offered':
        if (from === 'accepted') {
          const reason = campaign.failure_reason ? ` (${escapeHtml(campaign.failure_reason)})` : '';
          return [{ userId: advertiser, text: `${ref} is back on offer${reason}. Your budget is still held.` }];
        }
        return [{ userId: advertiser, text: `${ref} is now visible to channel owners.` }];
      case 'accepted': {
        const out: Outgoing[] = [{ userId: advertiser, text: `${ref} was accepted by ${channelName}. Posting starts shortly.` }];
        if (ownerId !== null) {
          out.push({ userId: ownerId, text: `You accepted ${ref}. The ad will be posted to ${channelName} automatically:\n\n${preview(campaign)}` });
        }
        return out;
      }
      case 'posted': {
        const live = `It has to stay live for ${campaign.duration_hours}h.`;
        const out: Outgoing[] = [{ userId: advertiser, text: `${ref} is live in ${channelName}. ${live}` }];
        if (ownerId !== null) {
          out.push({ userId: ownerId, text: `${ref} was posted to ${channelName}. ${live} Deleting it early cancels the payout.` });
        }
        return out;
      }
      case 'confirmed': {
        const out: Outgoing[] = [{ userId: advertiser, text: `${ref} completed. The ad stayed live for the full ${campaign.duration_hours}h.` }];
        if (ownerId !== null) {
          out.push({ userId: ownerId, text: `${ref} verified in ${channelName}. ${campaign.budget} has been released to you!` });
        }
        return out;
      }
      case 'refunded': {
        const out: Outgoing[] = [{ userId: advertiser, text: `${ref} was refunded: the placement could not be confirmed. ${campaign.budget} is back in your balance.` }];
        if (ownerId !== null) {
          out.push({ userId: ownerId, text: `${ref} in ${channelName} was not confirmed. Payment was refunded to the advertiser.` });
        }
        return out;
      }
      case 'cancelled': {
        const held = from === 'funded' || from === 'offered' || from === 'accepted' || from === 'posted';
        const refund = held ? ` ${campaign.budget} is back in your balance.` : '';
        return [{ userId: advertiser, text: `${ref} was cancelled.${refund}` }];
      }
      case 'expired':
        return [{ userId: advertiser, text: `${ref} expired before it was completed. ${campaign.budget} is back in your balance.` }];
      case 'draft':
      case 'pending_funding':
        return [];
    }
  }

  private async ownerOf(campaign: Campaign): Promise<number | null> {
    if (campaign.channel_id === null) return null;
    const channel = await this.store.getChannel(campaign.channel_id);
    return channel?.owner_id ?? null;
  }

  private async channelName(campaign: Campaign): Promise<string> {
    if (campaign.channel_id === null) return 'a channel';
    const channel = await this.store.getChannel(campaign.channel_id);
    if (!channel) return 'a channel';
    return escapeHtml(channel.title ?? channel.telegram_channel_id);
  }
}
