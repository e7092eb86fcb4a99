import { SETTLEMENT_SOURCES } from './index.js';
import type { CampaignStateMachine } from './transitions.js';
import type { Store } from '../db/store.js';
import type { Ledger } from '../ledger/index.js';
import { retry, type BackoffPolicy } from '../shared/retry.js';
import {
  ExpiredError,
  InvalidTransitionError,
  NotFoundError,
  ConcurrencyConflict,
  TransientError,
  errorMessage,
} from '../shared/errors.js';
import type {
  Campaign,
  CampaignState,
  CampaignTransition,
  EscrowHold,
  RefundOutcome,
  Transaction,
} from '../shared/types.js';

/** Retry policy for persistence contention at the coordinator boundary. */
export const PERSISTENCE_RETRY: BackoffPolicy = {
  maxAttempts: 3,
  baseDelayMs: 50,
  maxDelayMs: 1000,
};

export function campaignReference(campaignId: number): string {
  return `campaign:${campaignId}`;
}

type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

interface Settlement {
  transaction: Transaction;
  event: CampaignTransition | null;
}

/**
 * Moves advertiser budgets in and out of escrow. Each operation runs in one
 * store transaction that pairs the hold's status change, the ledger entry and
 * the campaign transition, so they commit or roll back together.
 *
 * Lock order is always campaign, then ledger actor, then store transaction.
 */
export class EscrowCoordinator {
  constructor(
    private readonly store: Store,
    private readonly ledger: Ledger,
    private readonly machine: CampaignStateMachine,
    private readonly sleep: Sleep,
    private readonly now: () => Date = () => new Date(),
    private readonly policy: BackoffPolicy = PERSISTENCE_RETRY,
  ) {}

  /** Debit the advertiser and move `pending_funding → funded`. */
  async hold(campaignId: number): Promise<EscrowHold> {
    const { hold, campaign } = await this.withRetry(`hold ${campaignId}`, () =>
      this.machine.serialize(campaignId, async () => {
        const campaign = await this.requireCampaign(this.store, campaignId);
        return this.ledger.withActors([campaign.advertiser_id], () =>
          this.store.transaction(async (tx) => {
            const funded = await this.machine.apply(tx, campaignId, 'pending_funding', 'funded', {
              funded_at: this.now(),
            });
            const hold = await tx.createHold(campaignId, funded.budget);
            await this.ledger.post(tx, {
              actor_id: funded.advertiser_id,
              amount: -funded.budget,
              kind: 'debit-escrow',
              reference: campaignReference(campaignId),
              campaign_id: campaignId,
              hold_id: hold.id,
            });
            return { hold, campaign: funded };
          }),
        );
      }),
    );

    console.log(`[escrow] Held ${hold.amount} for campaign ${campaignId} (hold ${hold.id})`);
    await this.machine.emit({ campaign, from: 'pending_funding', to: 'funded' });
    return hold;
  }

  /**
   * Pay the bound channel's owner and move `posted → confirmed`. A hold that
   * is already released returns the original payout.
   */
  async release(hold: EscrowHold): Promise<Transaction> {
    const campaignId = hold.campaign_id;
    const settlement = await this.withRetry(`release hold ${hold.id}`, () =>
      this.machine.serialize(campaignId, async () => {
        const campaign = await this.requireCampaign(this.store, campaignId);
        if (campaign.channel_id === null) {
          throw new InvalidTransitionError(`Campaign ${campaignId} has no bound channel to pay`);
        }
        const channel = await this.store.getChannel(campaign.channel_id);
        if (!channel) throw new NotFoundError('Channel', campaign.channel_id);

        return this.ledger.withActors([channel.owner_id], () =>
          this.store.transaction(async (tx): Promise<Settlement> => {
            const current = await this.requireHold(tx, hold.id);
            if (current.status === 'released') {
              return { transaction: await this.original(tx, campaignId, 'credit-payout'), event: null };
            }
            if (current.status === 'refunded') {
              throw new InvalidTransitionError(`Hold ${hold.id} was already refunded`);
            }

            const confirmed = await this.machine.apply(tx, campaignId, 'posted', 'confirmed', {
              settled_at: this.now(),
            });
            await this.finalize(tx, current, 'released');
            const transaction = await this.ledger.post(tx, {
              actor_id: channel.owner_id,
              amount: current.amount,
              kind: 'credit-payout',
              reference: campaignReference(campaignId),
              campaign_id: campaignId,
              hold_id: current.id,
            });
            return { transaction, event: { campaign: confirmed, from: 'posted', to: 'confirmed' } };
          }),
        );
      }),
    );

    return this.finish(settlement, `Released ${hold.amount} from hold ${hold.id}`);
  }

  /**
   * Return the budget to the advertiser and close the campaign with
   * `outcome`. The campaign must be in one of `from` when the refund runs.
   * A hold that is already refunded returns the original refund.
   */
  async refund(
    hold: EscrowHold,
    outcome: RefundOutcome,
    from: readonly CampaignState[] = SETTLEMENT_SOURCES[outcome],
  ): Promise<Transaction> {
    const campaignId = hold.campaign_id;
    const settlement = await this.withRetry(`refund hold ${hold.id}`, () =>
      this.machine.serialize(campaignId, async () => {
        const campaign = await this.requireCampaign(this.store, campaignId);

        return this.ledger.withActors([campaign.advertiser_id], () =>
          this.store.transaction(async (tx): Promise<Settlement> => {
            const current = await this.requireHold(tx, hold.id);
            if (current.status === 'refunded') {
              return { transaction: await this.original(tx, campaignId, 'refund'), event: null };
            }
            if (current.status === 'released') {
              throw new InvalidTransitionError(`Hold ${hold.id} was already released`);
            }

            const before = await this.requireSettleable(tx, campaignId, outcome, from);
            const closed = await this.machine.apply(tx, campaignId, before.state, outcome, {
              settled_at: this.now(),
            });
            await this.finalize(tx, current, 'refunded');
            const transaction = await this.ledger.post(tx, {
              actor_id: campaign.advertiser_id,
              amount: current.amount,
              kind: 'refund',
              reference: campaignReference(campaignId),
              campaign_id: campaignId,
              hold_id: current.id,
            });
            return { transaction, event: { campaign: closed, from: before.state, to: outcome } };
          }),
        );
      }),
    );

    return this.finish(settlement, `Refunded ${hold.amount} from hold ${hold.id} (${outcome})`);
  }

  /** Close a campaign that never had funds held. */
  async settleWithoutHold(
    campaignId: number,
    outcome: RefundOutcome,
    from: readonly CampaignState[] = SETTLEMENT_SOURCES[outcome],
  ): Promise<Campaign> {
    const event = await this.withRetry(`settle ${campaignId}`, () =>
      this.machine.serialize(campaignId, () =>
        this.store.transaction(async (tx): Promise<CampaignTransition> => {
          const hold = await tx.getHoldByCampaign(campaignId);
          if (hold?.status === 'held') {
            throw new InvalidTransitionError(`Campaign ${campaignId} has funds in hold ${hold.id}`);
          }
          const before = await this.requireSettleable(tx, campaignId, outcome, from);
          const campaign = await this.machine.apply(tx, campaignId, before.state, outcome, {
            settled_at: this.now(),
          });
          return { campaign, from: before.state, to: outcome };
        }),
      ),
    );

    console.log(`[escrow] Campaign ${campaignId}: ${event.from} → ${event.to} (nothing held)`);
    await this.machine.emit(event);
    return event.campaign;
  }

  /** Close the campaign with `outcome`, refunding its hold when one is active. */
  async settle(
    campaignId: number,
    outcome: RefundOutcome,
    from: readonly CampaignState[] = SETTLEMENT_SOURCES[outcome],
  ): Promise<Campaign> {
    const hold = await this.store.getHoldByCampaign(campaignId);
    if (hold?.status === 'held') {
      await this.refund(hold, outcome, from);
      return this.requireCampaign(this.store, campaignId);
    }
    return this.settleWithoutHold(campaignId, outcome, from);
  }

  /** Read the campaign inside the settling transaction and check it may still close with `outcome`. */
  private async requireSettleable(
    tx: Store,
    campaignId: number,
    outcome: RefundOutcome,
    from: readonly CampaignState[],
  ): Promise<Campaign> {
    const campaign = await this.requireCampaign(tx, campaignId);
    if (from.includes(campaign.state)) return campaign;
    if (campaign.state === 'expired') throw new ExpiredError(campaignId);
    throw new InvalidTransitionError(
      `Campaign ${campaignId} is ${campaign.state}, cannot move to ${outcome}`,
      { campaignId, from: campaign.state, to: outcome },
    );
  }

  private async finalize(tx: Store, hold: EscrowHold, to: 'released' | 'refunded'): Promise<void> {
    const updated = await tx.updateHoldStatus(hold.id, 'held', to);
    if (!updated) {
      throw new ConcurrencyConflict(`Hold ${hold.id} changed while moving to ${to}`);
    }
  }

  private async original(tx: Store, campaignId: number, kind: 'credit-payout' | 'refund'): Promise<Transaction> {
    const transaction = await tx.findTransaction(campaignReference(campaignId), kind);
    if (!transaction) throw new NotFoundError(`${kind} transaction for campaign`, campaignId);
    return transaction;
  }

  private async requireCampaign(db: Store, campaignId: number): Promise<Campaign> {
    const campaign = await db.getCampaign(campaignId);
    if (!campaign) throw new NotFoundError('Campaign', campaignId);
    return campaign;
  }

  private async requireHold(db: Store, holdId: number): Promise<EscrowHold> {
    const hold = await db.getHold(holdId);
    if (!hold) throw new NotFoundError('Hold', holdId);
    return hold;
  }

  private async finish(settlement: Settlement, message: string): Promise<Transaction> {
    if (settlement.event) {
      console.log(`[escrow] ${message}`);
      await this.machine.emit(settlement.event);
    }
    return settlement.transaction;
  }

  private withRetry<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return retry(() => fn(), {
      ...this.policy,
      sleep: this.sleep,
      shouldRetry: (err) => err instanceof TransientError,
      onRetry: (err, attempt, delayMs) => {
        console.warn(`[escrow] ${label} attempt ${attempt} failed, retrying in ${delayMs}ms:`, errorMessage(err));
      },
    });
  }
}
