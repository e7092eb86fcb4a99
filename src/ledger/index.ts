import type { Store } from '../db/store.js';
import { KeyedLock } from '../shared/locks.js';
import {
  ConcurrencyConflict,
  InsufficientFundsError,
  InvalidInputError,
  NotFoundError,
} from '../shared/errors.js';
import type { CreditKind, NewTransaction, Transaction } from '../shared/types.js';

export interface LedgerLinks {
  campaignId?: number | null;
  holdId?: number | null;
}

export interface ReconcileReport {
  actorId: number;
  cached: number;
  derived: number;
  ok: boolean;
}

export function actorKey(actorId: number): string {
  return `user:${actorId}`;
}

function assertAmount(amount: number): void {
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw new InvalidInputError(`Amount must be a positive integer, got ${amount}`);
  }
}

/**
 * Append-only balance ledger. Every mutation writes exactly one transaction
 * row and moves the cached balance by the same amount in the same commit.
 *
 * Mutations for one actor are serialized by an in-process lock on top of the
 * row lock taken by `lockUser`; different actors never wait on each other.
 */
export class Ledger {
  constructor(
    private readonly store: Store,
    private readonly locks = new KeyedLock(),
  ) {}

  /** Hold the serialization scope of every listed actor while `fn` runs. */
  withActors<T>(actorIds: number[], fn: () => Promise<T>): Promise<T> {
    return this.locks.runMany(actorIds.map(actorKey), fn);
  }

  /**
   * Apply one entry inside the caller's transaction. The caller must already
   * hold the actor's scope. A `(reference, kind)` pair seen before returns the
   * original row and leaves the balance alone.
   */
  async post(tx: Store, entry: NewTransaction): Promise<Transaction> {
    const user = await tx.lockUser(entry.actor_id);
    if (!user) throw new NotFoundError('User', entry.actor_id);

    const existing = await tx.findTransaction(entry.reference, entry.kind);
    if (existing) return this.duplicate(existing);

    const next = user.balance + entry.amount;
    if (next < 0) {
      throw new InsufficientFundsError(user.id, user.balance, -entry.amount);
    }

    const transaction = await tx.insertTransaction(entry);
    if (!transaction) {
      // Another writer committed the same entry after our lookup.
      const original = await tx.findTransaction(entry.reference, entry.kind);
      if (!original) throw new ConcurrencyConflict(`Transaction ${entry.kind} ${entry.reference} vanished`);
      return this.duplicate(original);
    }
    if (!(await tx.setUserBalance(user.id, user.balance, next))) {
      throw new ConcurrencyConflict(`Balance of user ${user.id} changed concurrently`);
    }
    return transaction;
  }

  private duplicate(existing: Transaction): Transaction {
    console.log(`[ledger] Duplicate ${existing.kind} for ${existing.reference}, returning transaction ${existing.id}`);
    return existing;
  }

  debit(actorId: number, amount: number, reference: string, links: LedgerLinks = {}): Promise<Transaction> {
    assertAmount(amount);
    return this.apply({
      actor_id: actorId,
      amount: -amount,
      kind: 'debit-escrow',
      reference,
      campaign_id: links.campaignId ?? null,
      hold_id: links.holdId ?? null,
    });
  }

  credit(
    actorId: number,
    amount: number,
    reference: string,
    kind: CreditKind,
    links: LedgerLinks = {},
  ): Promise<Transaction> {
    assertAmount(amount);
    return this.apply({
      actor_id: actorId,
      amount,
      kind,
      reference,
      campaign_id: links.campaignId ?? null,
      hold_id: links.holdId ?? null,
    });
  }

  topUp(actorId: number, amount: number, reference: string): Promise<Transaction> {
    return this.credit(actorId, amount, reference, 'topup');
  }

  async balance(actorId: number): Promise<number> {
    const user = await this.store.getUser(actorId);
    if (!user) throw new NotFoundError('User', actorId);
    return user.balance;
  }

  async history(actorId: number, limit?: number): Promise<Transaction[]> {
    const user = await this.store.getUser(actorId);
    if (!user) throw new NotFoundError('User', actorId);
    return this.store.listTransactionsByActor(actorId, limit);
  }

  campaignTransactions(campaignId: number): Promise<Transaction[]> {
    return this.store.listTransactionsByCampaign(campaignId);
  }

  /** Compare the cached balance with the fold over the actor's transactions. */
  async reconcile(actorId: number): Promise<ReconcileReport> {
    return this.withActors([actorId], async () => {
      const user = await this.store.getUser(actorId);
      if (!user) throw new NotFoundError('User', actorId);
      const derived = await this.store.sumTransactions(actorId);
      const report = { actorId, cached: user.balance, derived, ok: user.balance === derived };
      if (!report.ok) {
        console.error(`[ledger] Balance drift for user ${actorId}: cached ${user.balance}, derived ${derived}`);
      }
      return report;
    });
  }

  private apply(entry: NewTransaction): Promise<Transaction> {
    return this.withActors([entry.actor_id], () =>
      this.store.transaction((tx) => this.post(tx, entry)),
    );
  }
}
