import { assertTransition } from './index.js';
import type { Store } from '../db/store.js';
import type { KeyedLock } from '../shared/locks.js';
import {
  AlreadyClaimedError,
  ExpiredError,
  ForbiddenError,
  InvalidTransitionError,
  NotFoundError,
  VerificationFailedError,
  errorMessage,
} from '../shared/errors.js';
import type { Campaign, CampaignPatch, CampaignState, CampaignTransition, Channel } from '../shared/types.js';

export type TransitionListener = (event: CampaignTransition) => void | Promise<void>;

const CLAIMED_STATES: CampaignState[] = ['accepted', 'posted', 'confirmed'];

export function campaignKey(campaignId: number): string {
  return `campaign:${campaignId}`;
}

export interface ReofferOptions {
  excludeOwnerId: number;
  reason: string;
  /** Only re-offer while the campaign is still bound to this channel. */
  boundChannelId?: number;
}

/**
 * Owns every campaign state change. Writers for one campaign run one at a
 * time inside `serialize`, and each change is a compare-and-swap on the stored
 * state, so a writer holding a stale view loses instead of overwriting.
 */
export class CampaignStateMachine {
  private listeners: TransitionListener[] = [];

  constructor(
    private readonly store: Store,
    private readonly locks: KeyedLock,
    private readonly now: () => Date = () => new Date(),
  ) {}

  serialize<T>(campaignId: number, fn: () => Promise<T>): Promise<T> {
    return this.locks.run(campaignKey(campaignId), fn);
  }

  onTransition(listener: TransitionListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  /**
   * Compare-and-swap `from → to` inside the caller's transaction. Listeners
   * are not told; call `emit` once the transaction has committed.
   */
  async apply(
    db: Store,
    campaignId: number,
    from: CampaignState,
    to: CampaignState,
    patch: CampaignPatch = {},
  ): Promise<Campaign> {
    assertTransition(from, to);

    const updated = await db.updateCampaignState(campaignId, from, to, patch);
    if (updated) return updated;

    const current = await db.getCampaign(campaignId);
    if (!current) throw new NotFoundError('Campaign', campaignId);
    if (to === 'accepted' && CLAIMED_STATES.includes(current.state)) {
      throw new AlreadyClaimedError(campaignId);
    }
    if (current.state === 'expired') throw new ExpiredError(campaignId);
    throw new InvalidTransitionError(
      `Campaign ${campaignId} is ${current.state}, cannot move ${from} → ${to}`,
      { campaignId, from, to, actual: current.state },
    );
  }

  /** Notify listeners of committed transitions. Listener failures are logged only. */
  async emit(...events: CampaignTransition[]): Promise<void> {
    for (const event of events) {
      for (const listener of this.listeners) {
        try {
          await listener(event);
        } catch (err) {
          console.error(
            `[escrow] Listener failed for campaign ${event.campaign.id} (${event.from} → ${event.to}):`,
            errorMessage(err),
          );
        }
      }
    }
  }

  async transition(
    campaignId: number,
    from: CampaignState,
    to: CampaignState,
    patch: CampaignPatch = {},
  ): Promise<Campaign> {
    const campaign = await this.serialize(campaignId, () =>
      this.store.transaction((tx) => this.apply(tx, campaignId, from, to, patch)),
    );
    console.log(`[escrow] Campaign ${campaignId}: ${from} → ${to}`);
    await this.emit({ campaign, from, to });
    return campaign;
  }

  /**
   * Bind the campaign to a verified channel. Only the first claim on an
   * offered campaign wins; later claims fail with AlreadyClaimed.
   */
  async accept(campaignId: number, channelId: number): Promise<Campaign> {
    const campaign = await this.serialize(campaignId, () =>
      this.store.transaction(async (tx) => {
        const current = await tx.getCampaign(campaignId);
        if (!current) throw new NotFoundError('Campaign', campaignId);

        const channel = await this.requireVerifiedChannel(tx, channelId);

        const now = this.now();
        if (current.state === 'offered' && current.expires_at.getTime() <= now.getTime()) {
          throw new ExpiredError(campaignId);
        }

        const exclusions = await tx.listExclusions(campaignId);
        if (exclusions.some((e) => e.owner_id === channel.owner_id)) {
          throw new ForbiddenError(`Owner ${channel.owner_id} is excluded from campaign ${campaignId}`);
        }

        return this.apply(tx, campaignId, 'offered', 'accepted', { channel_id: channelId, accepted_at: now });
      }),
    );
    console.log(`[escrow] Campaign ${campaignId} accepted by channel ${channelId}`);
    await this.emit({ campaign, from: 'offered', to: 'accepted' });
    return campaign;
  }

  /**
   * `accepted → posted`, refused with VerificationFailed unless the bound
   * channel is still verified.
   */
  async markPosted(campaignId: number, patch: CampaignPatch): Promise<Campaign> {
    const campaign = await this.serialize(campaignId, () =>
      this.store.transaction(async (tx) => {
        const current = await tx.getCampaign(campaignId);
        if (!current) throw new NotFoundError('Campaign', campaignId);
        if (current.state === 'accepted') {
          await this.requireVerifiedChannel(tx, current.channel_id);
        }
        return this.apply(tx, campaignId, 'accepted', 'posted', patch);
      }),
    );
    console.log(`[escrow] Campaign ${campaignId}: accepted → posted`);
    await this.emit({ campaign, from: 'accepted', to: 'posted' });
    return campaign;
  }

  /**
   * `accepted → offered` inside the caller's transaction: unbind the channel
   * and bar its owner from this campaign. No funds move.
   */
  async reofferWithin(db: Store, campaignId: number, options: ReofferOptions): Promise<Campaign> {
    if (options.boundChannelId !== undefined) {
      const current = await db.getCampaign(campaignId);
      if (!current) throw new NotFoundError('Campaign', campaignId);
      if (current.state === 'accepted' && current.channel_id !== options.boundChannelId) {
        throw new ForbiddenError(`Campaign ${campaignId} is no longer bound to channel ${options.boundChannelId}`);
      }
    }
    const campaign = await this.apply(db, campaignId, 'accepted', 'offered', {
      channel_id: null,
      accepted_at: null,
      placement_ref: null,
      failure_reason: options.reason,
    });
    await db.addExclusion(campaignId, options.excludeOwnerId, options.reason);
    return campaign;
  }

  async reoffer(campaignId: number, options: ReofferOptions): Promise<Campaign> {
    const campaign = await this.serialize(campaignId, () =>
      this.store.transaction((tx) => this.reofferWithin(tx, campaignId, options)),
    );
    console.log(`[escrow] Campaign ${campaignId} re-offered, owner ${options.excludeOwnerId} excluded: ${options.reason}`);
    await this.emit({ campaign, from: 'accepted', to: 'offered' });
    return campaign;
  }

  private async requireVerifiedChannel(db: Store, channelId: number | null): Promise<Channel> {
    if (channelId === null) {
      throw new VerificationFailedError('Campaign has no bound channel');
    }
    const channel = await db.getChannel(channelId);
    if (!channel) throw new NotFoundError('Channel', channelId);
    if (channel.state !== 'verified') {
      throw new VerificationFailedError(`Channel ${channelId} is ${channel.state}, not verified`, {
        channelId,
        state: channel.state,
      });
    }
    return channel;
  }
}
