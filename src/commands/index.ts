import { randomUUID } from 'crypto';
import { z, ZodError } from 'zod';
import type { Store } from '../db/store.js';
import type { EngineConfig } from '../config/engine.js';
import type { Ledger } from '../ledger/index.js';
import type { CampaignStateMachine } from '../escrow/transitions.js';
import type { EscrowCoordinator } from '../escrow/coordinator.js';
import type { ChannelVerifier, VerificationResult } from '../channels/verifier.js';
import type { CampaignJobStatus, PostingOrchestrator } from '../bot/jobs.js';
import type { KeyedLock } from '../shared/locks.js';
import {
  ExpiredError,
  ForbiddenError,
  InvalidInputError,
  InvalidTransitionError,
  NotFoundError,
  VerificationFailedError,
  errorMessage,
  isEngineError,
  userMessage,
  type PublicErrorKind,
} from '../shared/errors.js';
import type {
  Campaign,
  Channel,
  ChannelState,
  EscrowHold,
  Transaction,
  User,
  UserRole,
} from '../shared/types.js';

export interface CommandError {
  kind: PublicErrorKind;
  message: string;
}

export type CommandResult<T> = { ok: true; value: T } | { ok: false; error: CommandError };

export const createCampaignSchema = z.object({
  adText: z.string().trim().min(1).max(4096),
  budget: z.number().int().positive(),
  durationHours: z.number().positive().max(24 * 30).optional(),
});

export type CreateCampaignInput = z.input<typeof createCampaignSchema>;

/** Longest idempotency reference a top-up accepts. */
export const TOPUP_REFERENCE_MAX = 200;

const topUpSchema = z.object({
  amount: z.number().int().positive(),
  reference: z.string().min(1).max(TOPUP_REFERENCE_MAX).optional(),
});

export interface CampaignDetails {
  campaign: Campaign;
  hold: EscrowHold | null;
  jobs: CampaignJobStatus;
}

export interface ChannelVerification {
  channel: Channel;
  state: ChannelState;
  changed: boolean;
  guidance: string[];
}

export interface CommandDeps {
  store: Store;
  ledger: Ledger;
  machine: CampaignStateMachine;
  coordinator: EscrowCoordinator;
  verifier: ChannelVerifier;
  orchestrator: PostingOrchestrator;
  locks: KeyedLock;
  config: EngineConfig;
  now?: () => Date;
}

/** Map any failure to a public error kind and message. Raw errors are logged, never returned. */
export function toCommandError(err: unknown, command: string): CommandError {
  if (isEngineError(err)) {
    console.warn(`[commands] ${command} rejected (${err.kind}): ${err.message}`);
    return { kind: err.kind, message: userMessage(err.kind) };
  }
  if (err instanceof ZodError) {
    const detail = err.issues.map((i) => `${i.path.join('.') || 'input'}: ${i.message}`).join('; ');
    console.warn(`[commands] ${command} rejected (InvalidInput): ${detail}`);
    return { kind: 'InvalidInput', message: `${userMessage('InvalidInput')} ${detail}` };
  }
  console.error(`[commands] ${command} failed:`, errorMessage(err));
  return { kind: 'Internal', message: userMessage('Internal') };
}

/**
 * The operations front-ends call. Every command returns a CommandResult and
 * never throws.
 */
export class CommandService {
  private readonly now: () => Date;

  constructor(private readonly deps: CommandDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  // ── Users ──────────────────────────────────────────────────────────

  /** Find or create the user behind a Telegram account. */
  ensureUser(telegramId: number, username: string | null, role: UserRole = 'advertiser'): Promise<CommandResult<User>> {
    return this.run('ensureUser', () =>
      this.deps.locks.run(`telegram:${telegramId}`, async () => {
        const { store } = this.deps;
        const existing = await store.getUserByTelegramId(telegramId);
        if (!existing) {
          const user = await store.createUser(telegramId, username, role);
          console.log(`[commands] Created user ${user.id} (telegram ${telegramId}, ${role})`);
          return user;
        }
        if (username !== null && existing.username !== username) {
          return (await store.updateUser(existing.id, { username })) ?? existing;
        }
        return existing;
      }),
    );
  }

  deactivateUser(userId: number): Promise<CommandResult<User>> {
    return this.run('deactivateUser', async () => {
      await this.requireUser(userId);
      const user = await this.deps.store.updateUser(userId, { is_active: false });
      if (!user) throw new NotFoundError('User', userId);
      console.log(`[commands] Deactivated user ${userId}`);
      return user;
    });
  }

  // ── Balance ────────────────────────────────────────────────────────

  getBalance(userId: number): Promise<CommandResult<number>> {
    return this.run('getBalance', () => this.deps.ledger.balance(userId));
  }

  topUp(userId: number, amount: number, reference?: string): Promise<CommandResult<Transaction>> {
    return this.run('topUp', async () => {
      const input = topUpSchema.parse({ amount, reference });
      await this.requireUser(userId);
      return this.deps.ledger.topUp(userId, input.amount, input.reference ?? `topup:${userId}:${randomUUID()}`);
    });
  }

  listMyTransactions(userId: number, limit = 20): Promise<CommandResult<Transaction[]>> {
    return this.run('listMyTransactions', () => this.deps.ledger.history(userId, limit));
  }

  // ── Campaigns (advertiser) ─────────────────────────────────────────

  createCampaign(userId: number, input: CreateCampaignInput): Promise<CommandResult<Campaign>> {
    return this.run('createCampaign', async () => {
      const body = createCampaignSchema.parse(input);
      const user = await this.actAs(await this.requireActiveUser(userId), 'advertiser');
      const campaign = await this.deps.store.createCampaign({
        advertiser_id: user.id,
        ad_text: body.adText,
        budget: body.budget,
        duration_hours: body.durationHours ?? this.deps.config.defaultDurationHours,
        state: 'draft',
        expires_at: new Date(this.now().getTime() + this.deps.config.campaignTtlMs),
      });
      console.log(`[commands] User ${user.id} created campaign ${campaign.id} (budget ${campaign.budget})`);
      return campaign;
    });
  }

  /**
   * Hold the budget and publish the offer. Safe to call again after a partial
   * failure: each step starts from whatever state the campaign reached.
   */
  fundCampaign(userId: number, campaignId: number): Promise<CommandResult<Campaign>> {
    return this.run('fundCampaign', async () => {
      await this.requireActiveUser(userId);
      const { machine, coordinator } = this.deps;
      let campaign = await this.requireOwnCampaign(userId, campaignId);
      if (campaign.expires_at.getTime() <= this.now().getTime()) {
        throw new ExpiredError(campaignId);
      }

      if (campaign.state === 'draft') {
        if (campaign.budget <= 0) throw new InvalidInputError('Budget must be positive');
        campaign = await machine.transition(campaignId, 'draft', 'pending_funding');
      }
      if (campaign.state === 'pending_funding') {
        await coordinator.hold(campaignId);
        campaign = await this.requireCampaign(campaignId);
      }
      if (campaign.state !== 'funded') {
        throw new InvalidTransitionError(`Campaign ${campaignId} is already ${campaign.state}`);
      }
      return machine.transition(campaignId, 'funded', 'offered');
    });
  }

  /** Advertiser cancels before a channel has accepted; any held budget is refunded. */
  cancelCampaign(userId: number, campaignId: number): Promise<CommandResult<Campaign>> {
    return this.run('cancelCampaign', async () => {
      const campaign = await this.requireOwnCampaign(userId, campaignId);
      switch (campaign.state) {
        case 'draft':
        case 'pending_funding':
          return this.deps.coordinator.settleWithoutHold(campaignId, 'cancelled', ['draft', 'pending_funding']);
        case 'funded':
        case 'offered':
          // Re-checked under the campaign lock: an accept that got there first wins.
          return this.deps.coordinator.settle(campaignId, 'cancelled', ['funded', 'offered']);
        default:
          throw new InvalidTransitionError(`Campaign ${campaignId} cannot be cancelled while ${campaign.state}`);
      }
    });
  }

  getCampaign(userId: number, campaignId: number): Promise<CommandResult<CampaignDetails>> {
    return this.run('getCampaign', async () => {
      const campaign = await this.requireVisibleCampaign(userId, campaignId);
      return {
        campaign,
        hold: await this.deps.store.getHoldByCampaign(campaignId),
        jobs: await this.deps.orchestrator.status(campaignId),
      };
    });
  }

  listMyCampaigns(userId: number): Promise<CommandResult<Campaign[]>> {
    return this.run('listMyCampaigns', async () => {
      await this.requireUser(userId);
      return this.deps.store.listCampaignsByAdvertiser(userId);
    });
  }

  campaignTransactions(userId: number, campaignId: number): Promise<CommandResult<Transaction[]>> {
    return this.run('campaignTransactions', async () => {
      await this.requireVisibleCampaign(userId, campaignId);
      return this.deps.ledger.campaignTransactions(campaignId);
    });
  }

  // ── Offers (channel owner) ─────────────────────────────────────────

  /** Offered campaigns this owner may accept. Requires a verified channel. */
  listOffers(userId: number): Promise<CommandResult<Campaign[]>> {
    return this.run('listOffers', async () => {
      await this.requireActiveUser(userId);
      const channels = await this.deps.store.listChannelsByOwner(userId);
      if (!channels.some((c) => c.state === 'verified')) {
        throw new VerificationFailedError(`User ${userId} has no verified channel`);
      }

      const now = this.now().getTime();
      const offered = await this.deps.store.listCampaignsByState(['offered']);
      const visible: Campaign[] = [];
      for (const campaign of offered) {
        if (campaign.advertiser_id === userId || campaign.expires_at.getTime() <= now) continue;
        const exclusions = await this.deps.store.listExclusions(campaign.id);
        if (exclusions.some((e) => e.owner_id === userId)) continue;
        visible.push(campaign);
      }
      return visible;
    });
  }

  /**
   * Claim an offered campaign for one of the caller's verified channels.
   * Without `channelId` the caller's most trusted verified channel is used.
   */
  acceptOffer(userId: number, campaignId: number, channelId?: number): Promise<CommandResult<Campaign>> {
    return this.run('acceptOffer', async () => {
      const user = await this.requireActiveUser(userId);
      const channel = await this.pickChannel(userId, channelId);
      if (channel.trust_score < this.deps.config.trust.minToAccept) {
        throw new ForbiddenError(`Channel ${channel.id} trust ${channel.trust_score} is below ${this.deps.config.trust.minToAccept}`);
      }

      const campaign = await this.requireCampaign(campaignId);
      if (campaign.advertiser_id === userId) {
        throw new ForbiddenError(`User ${userId} cannot accept their own campaign ${campaignId}`);
      }

      await this.actAs(user, 'channel_owner');
      return this.deps.machine.accept(campaignId, channel.id);
    });
  }

  /** Channel owner backs out before the ad is posted; the campaign goes back on offer without them. */
  withdrawAcceptance(userId: number, campaignId: number): Promise<CommandResult<Campaign>> {
    return this.run('withdrawAcceptance', async () => {
      const campaign = await this.requireCampaign(campaignId);
      const channel = campaign.channel_id === null ? null : await this.deps.store.getChannel(campaign.channel_id);
      if (!channel || channel.owner_id !== userId) {
        throw new ForbiddenError(`User ${userId} has not accepted campaign ${campaignId}`);
      }
      if (campaign.state !== 'accepted') {
        throw new InvalidTransitionError(`Campaign ${campaignId} is ${campaign.state}, not accepted`);
      }

      const reoffered = await this.deps.machine.reoffer(campaignId, {
        excludeOwnerId: userId,
        reason: 'channel owner withdrew',
        boundChannelId: channel.id,
      });
      await this.deps.verifier.adjustTrust(
        channel.id,
        -this.deps.config.trust.withdrawPenalty,
        `withdrew from campaign ${campaignId}`,
      );
      return reoffered;
    });
  }

  // ── Channels ───────────────────────────────────────────────────────

  registerChannel(userId: number, telegramChannelId: string): Promise<CommandResult<ChannelVerification>> {
    return this.run('registerChannel', async () => {
      const user = await this.actAs(await this.requireActiveUser(userId), 'channel_owner');
      return this.describe(await this.deps.verifier.register(user.id, telegramChannelId));
    });
  }

  verifyChannel(userId: number, channelId: number): Promise<CommandResult<ChannelVerification>> {
    return this.run('verifyChannel', async () => {
      const channel = await this.deps.store.getChannel(channelId);
      if (!channel) throw new NotFoundError('Channel', channelId);
      if (channel.owner_id !== userId) throw new ForbiddenError(`Channel ${channelId} belongs to another user`);
      return this.describe(await this.deps.verifier.verify(channel));
    });
  }

  listMyChannels(userId: number): Promise<CommandResult<Channel[]>> {
    return this.run('listMyChannels', async () => {
      await this.requireUser(userId);
      return this.deps.store.listChannelsByOwner(userId);
    });
  }

  // ── Helpers ────────────────────────────────────────────────────────

  private async run<T>(command: string, fn: () => Promise<T>): Promise<CommandResult<T>> {
    try {
      return { ok: true, value: await fn() };
    } catch (err) {
      return { ok: false, error: toCommandError(err, command) };
    }
  }

  private describe(result: VerificationResult): ChannelVerification {
    return {
      channel: result.channel,
      state: result.state,
      changed: result.changed,
      guidance: this.deps.verifier.guidance(result),
    };
  }

  private async requireUser(userId: number): Promise<User> {
    const user = await this.deps.store.getUser(userId);
    if (!user) throw new NotFoundError('User', userId);
    return user;
  }

  private async requireActiveUser(userId: number): Promise<User> {
    const user = await this.requireUser(userId);
    if (!user.is_active) throw new ForbiddenError(`User ${userId} is deactivated`);
    return user;
  }

  /** Acting in a role the user does not have yet makes them both. */
  private async actAs(user: User, role: Exclude<UserRole, 'both'>): Promise<User> {
    if (user.role === role || user.role === 'both') return user;
    const updated = await this.deps.store.updateUser(user.id, { role: 'both' });
    return updated ?? user;
  }

  private async requireCampaign(campaignId: number): Promise<Campaign> {
    const campaign = await this.deps.store.getCampaign(campaignId);
    if (!campaign) throw new NotFoundError('Campaign', campaignId);
    return campaign;
  }

  private async requireOwnCampaign(userId: number, campaignId: number): Promise<Campaign> {
    const campaign = await this.requireCampaign(campaignId);
    if (campaign.advertiser_id !== userId) {
      throw new ForbiddenError(`Campaign ${campaignId} belongs to another user`);
    }
    return campaign;
  }

  /** Advertiser, owner of the bound channel, or any user while the campaign is on offer. */
  private async requireVisibleCampaign(userId: number, campaignId: number): Promise<Campaign> {
    const campaign = await this.requireCampaign(campaignId);
    if (campaign.advertiser_id === userId || campaign.state === 'offered') return campaign;
    if (campaign.channel_id !== null) {
      const channel = await this.deps.store.getChannel(campaign.channel_id);
      if (channel?.owner_id === userId) return campaign;
    }
    throw new ForbiddenError(`User ${userId} cannot view campaign ${campaignId}`);
  }

  private async pickChannel(userId: number, channelId?: number): Promise<Channel> {
    if (channelId !== undefined) {
      const channel = await this.deps.store.getChannel(channelId);
      if (!channel) throw new NotFoundError('Channel', channelId);
      if (channel.owner_id !== userId) throw new ForbiddenError(`Channel ${channelId} belongs to another user`);
      return channel;
    }
    const verified = (await this.deps.store.listChannelsByOwner(userId))
      .filter((c) => c.state === 'verified')
      .sort((a, b) => b.trust_score - a.trust_score);
    if (verified.length === 0) {
      throw new VerificationFailedError(`User ${userId} has no verified channel`);
    }
    return verified[0];
  }
}
