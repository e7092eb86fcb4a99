import type { Store } from '../db/store.js';
import type { EngineConfig } from '../config/engine.js';
import type { CampaignStateMachine } from '../escrow/transitions.js';
import type { EscrowCoordinator } from '../escrow/coordinator.js';
import type { KeyedLock } from '../shared/locks.js';
import { withTimeout } from '../shared/retry.js';
import { ForbiddenError, InvalidInputError, NotFoundError, errorMessage } from '../shared/errors.js';
import type { CampaignState, Channel, ChannelPatch, ChannelState } from '../shared/types.js';

const HOUR_MS = 60 * 60 * 1000;

export interface AdminCheckResult {
  isAdmin: boolean;
  /** False when the answer came from a transient failure rather than the chat itself. */
  isDefinitive: boolean;
  reason: string;
}

export interface ChannelInfo {
  title: string | null;
  subscribers: number;
}

/** Read-only view of a channel as the bot sees it. */
export interface ChannelInspector {
  adminStatus(telegramChannelId: string): Promise<AdminCheckResult>;
  info(telegramChannelId: string): Promise<ChannelInfo>;
}

export type AdminSignal = 'admin' | 'not_admin' | 'unknown';

export type VerificationReason = 'ok' | 'not_admin' | 'admin_unknown' | 'too_few_subscribers' | 'info_unavailable';

export interface VerificationResult {
  channel: Channel;
  previous: ChannelState;
  state: ChannelState;
  changed: boolean;
  reason: VerificationReason;
}

interface VerifierDeps {
  store: Store;
  inspector: ChannelInspector;
  machine: CampaignStateMachine;
  coordinator: EscrowCoordinator;
  locks: KeyedLock;
  config: EngineConfig;
  now?: () => Date;
}

function channelKey(channelId: number): string {
  return `channel:${channelId}`;
}

/**
 * Confirms the bot administers a channel and keeps its state and trust score.
 * Channel state changes happen here and nowhere else.
 */
export class ChannelVerifier {
  private readonly store: Store;
  private readonly inspector: ChannelInspector;
  private readonly machine: CampaignStateMachine;
  private readonly coordinator: EscrowCoordinator;
  private readonly locks: KeyedLock;
  private readonly config: EngineConfig;
  private readonly now: () => Date;

  constructor(deps: VerifierDeps) {
    this.store = deps.store;
    this.inspector = deps.inspector;
    this.machine = deps.machine;
    this.coordinator = deps.coordinator;
    this.locks = deps.locks;
    this.config = deps.config;
    this.now = deps.now ?? (() => new Date());
  }

  /** Register a channel for `ownerId` and run a first verification. */
  async register(ownerId: number, telegramChannelId: string): Promise<VerificationResult> {
    const id = telegramChannelId.trim();
    if (!/^(@[A-Za-z0-9_]{5,32}|-?\d+)$/.test(id)) {
      throw new InvalidInputError(`"${telegramChannelId}" is not a channel username or id`);
    }

    const existing = await this.store.getChannelByTelegramId(id);
    if (existing) {
      if (existing.owner_id !== ownerId) {
        throw new ForbiddenError(`Channel ${id} is registered to another user`);
      }
      return this.verify(existing);
    }

    let title: string | null = null;
    try {
      title = (await withTimeout(this.inspector.info(id), this.config.verification.timeoutMs, `info ${id}`)).title;
    } catch (err) {
      console.warn(`[channelCheck] Could not read channel info for ${id}:`, errorMessage(err));
    }

    const channel = await this.store.createChannel({
      owner_id: ownerId,
      telegram_channel_id: id,
      title,
      trust_score: this.config.trust.initial,
    });
    console.log(`[channelCheck] Registered channel ${channel.id} (${id}) for user ${ownerId}`);
    return this.verify(channel);
  }

  async verify(channel: Channel): Promise<VerificationResult> {
    const signal = await this.confirmAdminStatus(channel.telegram_channel_id);

    let info: ChannelInfo | null = null;
    if (signal === 'admin') {
      try {
        info = await withTimeout(
          this.inspector.info(channel.telegram_channel_id),
          this.config.verification.timeoutMs,
          `info ${channel.telegram_channel_id}`,
        );
      } catch (err) {
        console.warn(`[channelCheck] Subscriber lookup failed for ${channel.telegram_channel_id}:`, errorMessage(err));
      }
    }

    const result = await this.locks.run(channelKey(channel.id), async () => {
      const current = await this.store.getChannel(channel.id);
      if (!current) throw new NotFoundError('Channel', channel.id);

      const { state, reason } = this.decide(current.state, signal, info);
      const now = this.now();
      const patch: ChannelPatch = { state, last_checked_at: now };
      if (signal !== 'unknown') patch.bot_is_admin = signal === 'admin';
      if (info) {
        patch.subscribers = info.subscribers;
        if (info.title) patch.title = info.title;
      }
      if (state === 'verified' && current.state !== 'verified') patch.verified_at = now;

      const updated = await this.store.updateChannel(current.id, patch);
      if (!updated) throw new NotFoundError('Channel', channel.id);
      return { channel: updated, previous: current.state, state, changed: state !== current.state, reason };
    });

    if (result.changed) {
      console.log(`[channelCheck] Channel ${channel.id}: ${result.previous} → ${result.state} (${result.reason})`);
    }
    if (result.state !== 'verified') {
      await this.unwindBoundCampaigns(result.channel, result.state);
    }
    if (result.previous === 'verified' && result.state === 'revoked') {
      const penalised = await this.adjustTrust(channel.id, -this.config.trust.revocationPenalty, 'admin rights revoked');
      return { ...result, channel: penalised };
    }
    return result;
  }

  /** Re-verify every verified and pending channel. One failure does not stop the rest. */
  async recheckAll(): Promise<VerificationResult[]> {
    const channels = await this.store.listChannelsByState(['verified', 'pending']);
    const results: VerificationResult[] = [];
    for (const channel of channels) {
      try {
        results.push(await this.verify(channel));
      } catch (err) {
        console.error(`[channelCheck] Verification of channel ${channel.id} failed:`, errorMessage(err));
      }
    }
    return results;
  }

  async adjustTrust(channelId: number, delta: number, reason: string): Promise<Channel> {
    return this.locks.run(channelKey(channelId), async () => {
      const channel = await this.store.getChannel(channelId);
      if (!channel) throw new NotFoundError('Channel', channelId);
      const { min, max } = this.config.trust;
      const next = Math.min(max, Math.max(min, channel.trust_score + delta));
      const updated = await this.store.updateChannel(channelId, { trust_score: next });
      if (!updated) throw new NotFoundError('Channel', channelId);
      console.log(`[channelCheck] Trust of channel ${channelId}: ${channel.trust_score} → ${next} (${reason})`);
      return updated;
    });
  }

  /** What the owner has to do for the channel to pass verification. */
  guidance(result: VerificationResult): string[] {
    const { minSubscribers } = this.config.verification;
    switch (result.reason) {
      case 'ok':
        return [];
      case 'not_admin':
        return [
          'Open your channel settings and go to Administrators.',
          'Add this bot as an administrator.',
          'Grant it permission to post and pin messages, then verify again.',
        ];
      case 'admin_unknown':
      case 'info_unavailable':
        return ['We could not reach Telegram to check your channel. Try verifying again in a few minutes.'];
      case 'too_few_subscribers':
        return [
          `Your channel needs at least ${minSubscribers} subscribers (currently ${result.channel.subscribers}).`,
          'We re-check pending channels automatically.',
        ];
    }
  }

  private decide(
    current: ChannelState,
    signal: AdminSignal,
    info: ChannelInfo | null,
  ): { state: ChannelState; reason: VerificationReason } {
    if (signal === 'not_admin') {
      const wasTrusted = current === 'verified' || current === 'revoked';
      return { state: wasTrusted ? 'revoked' : 'pending', reason: 'not_admin' };
    }
    if (signal === 'unknown') {
      return { state: current === 'verified' ? 'verified' : 'pending', reason: 'admin_unknown' };
    }
    if (!info) {
      return { state: current === 'verified' ? 'verified' : 'pending', reason: 'info_unavailable' };
    }
    if (info.subscribers < this.config.verification.minSubscribers) {
      return { state: 'pending', reason: 'too_few_subscribers' };
    }
    return { state: 'verified', reason: 'ok' };
  }

  /** Ask twice: one definitive "admin" wins, any transient failure makes the answer unknown. */
  private async confirmAdminStatus(telegramChannelId: string): Promise<AdminSignal> {
    const checks = [
      await this.checkAdmin(telegramChannelId),
      await this.checkAdmin(telegramChannelId),
    ];

    if (checks.some((c) => c.isAdmin)) {
      return 'admin';
    }

    const reasons = checks.map((c) => c.reason).join(' | ');
    if (checks.some((c) => !c.isDefinitive)) {
      console.warn(`[channelCheck] Admin check uncertain for ${telegramChannelId}: ${reasons}`);
      return 'unknown';
    }

    console.warn(`[channelCheck] Admin check confirmed not-admin for ${telegramChannelId}: ${reasons}`);
    return 'not_admin';
  }

  private async checkAdmin(telegramChannelId: string): Promise<AdminCheckResult> {
    try {
      return await withTimeout(
        this.inspector.adminStatus(telegramChannelId),
        this.config.verification.timeoutMs,
        `admin check ${telegramChannelId}`,
      );
    } catch (err) {
      return { isAdmin: false, isDefinitive: false, reason: errorMessage(err) };
    }
  }

  /**
   * Campaigns may only stay accepted against a verified channel. An accepted
   * one goes back on offer without the owner when there is time left to place
   * it, otherwise it is cancelled and refunded. A posted one stays while the
   * bot can still check the placement; on revocation it is refunded.
   */
  private async unwindBoundCampaigns(channel: Channel, state: ChannelState): Promise<void> {
    const states: CampaignState[] = state === 'revoked' ? ['accepted', 'posted'] : ['accepted'];
    const campaigns = await this.store.listCampaignsByChannel(channel.id, states);
    for (const campaign of campaigns) {
      try {
        if (campaign.state === 'posted') {
          await this.coordinator.settle(campaign.id, 'refunded');
          console.log(`[channelCheck] Refunded campaign ${campaign.id} (channel ${channel.id} revoked)`);
          continue;
        }

        const placementDeadline = this.now().getTime() + campaign.duration_hours * HOUR_MS;
        if (placementDeadline < campaign.expires_at.getTime()) {
          await this.machine.reoffer(campaign.id, {
            excludeOwnerId: channel.owner_id,
            reason: `channel ${channel.id} ${state}`,
            boundChannelId: channel.id,
          });
        } else {
          await this.coordinator.settle(campaign.id, 'cancelled', ['accepted']);
          console.log(`[channelCheck] Cancelled campaign ${campaign.id} (channel ${channel.id} ${state}, no time to re-offer)`);
        }
      } catch (err) {
        console.error(`[channelCheck] Failed to unwind campaign ${campaign.id}:`, errorMessage(err));
      }
    }
  }
}
