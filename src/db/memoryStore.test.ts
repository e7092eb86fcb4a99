import { beforeEach, describe, expect, it } from 'vitest';
import { MemoryStore } from './memoryStore.js';
import { ConcurrencyConflict } from '../shared/errors.js';

describe('MemoryStore', () => {
  let store: MemoryStore;
  let userId: number;

  beforeEach(async () => {
    store = new MemoryStore();
    userId = (await store.createUser(42, 'tester', 'advertiser')).id;
  });

  it('keeps transaction writes invisible until commit', async () => {
    let seenOutside: number | undefined;
    await store.transaction(async (tx) => {
      await tx.setUserBalance(userId, 0, 100);
      seenOutside = (await store.getUser(userId))?.balance;
    });

    expect(seenOutside).toBe(0);
    expect((await store.getUser(userId))?.balance).toBe(100);
  });

  it('discards writes when the transaction throws', async () => {
    await expect(store.transaction(async (tx) => {
      await tx.setUserBalance(userId, 0, 100);
      throw new Error('rollback');
    })).rejects.toThrow('rollback');

    expect((await store.getUser(userId))?.balance).toBe(0);
  });

  it('rejects a commit whose compare-and-swap lost to another commit', async () => {
    const losing = store.transaction(async (tx) => {
      await tx.setUserBalance(userId, 0, 100);
      // Another writer commits while this transaction is still open.
      await store.setUserBalance(userId, 0, 50);
    });

    await expect(losing).rejects.toBeInstanceOf(ConcurrencyConflict);
    expect((await store.getUser(userId))?.balance).toBe(50);
  });

  it('returns null from a campaign swap whose expected state is stale', async () => {
    const campaign = await store.createCampaign({
      advertiser_id: userId,
      ad_text: 'ad',
      budget: 10,
      duration_hours: 1,
      state: 'draft',
      expires_at: new Date(Date.now() + 60_000),
    });

    expect(await store.updateCampaignState(campaign.id, 'funded', 'offered')).toBeNull();
    const moved = await store.updateCampaignState(campaign.id, 'draft', 'pending_funding');
    expect(moved?.state).toBe('pending_funding');
  });

  it('allows a single active hold per campaign', async () => {
    await store.createHold(7, 100);
    await expect(store.createHold(7, 100)).rejects.toThrow('active hold for campaign 7');
  });

  it('enforces unique (reference, kind) on transactions', async () => {
    const entry = { actor_id: userId, amount: 5, kind: 'topup' as const, reference: 'r1', campaign_id: null, hold_id: null };
    await store.insertTransaction(entry);

    await expect(store.insertTransaction(entry)).resolves.toBeNull();
    await expect(store.insertTransaction({ ...entry, kind: 'refund' })).resolves.toMatchObject({ kind: 'refund' });
  });
});
