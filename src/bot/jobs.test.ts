import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PermanentTransportError, TransientError } from '../shared/errors.js';
import { createEngine } from '../engine.js';
import { sweepExpired } from './expiry.js';
import {
  createTestEngine,
  seedAdvertiser,
  seedOfferedCampaign,
  seedVerifiedOwner,
  unwrap,
  type TestHarness,
} from '../testing/harness.js';
import type { Campaign, Channel, User } from '../shared/types.js';

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;

describe('PostingOrchestrator', () => {
  let h: TestHarness;
  let advertiser: User;
  let owner: User;
  let channel: Channel;
  let campaign: Campaign;

  async function state(): Promise<string | undefined> {
    return (await h.store.getCampaign(campaign.id))?.state;
  }

  async function trust(): Promise<number | undefined> {
    return (await h.store.getChannel(channel.id))?.trust_score;
  }

  async function accept(): Promise<void> {
    unwrap(await h.engine.commands.acceptOffer(owner.id, campaign.id));
  }

  beforeEach(async () => {
    vi.useFakeTimers();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    h = createTestEngine();
    advertiser = await seedAdvertiser(h, 100, 1000);
    ({ user: owner, channel } = await seedVerifiedOwner(h, 200, '@posting_channel'));
    campaign = await seedOfferedCampaign(h, advertiser.id, 500, 1);
  });

  afterEach(() => {
    h.engine.stop();
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it('posts, waits out the duration and pays the channel owner', async () => {
    await accept();
    await vi.advanceTimersByTimeAsync(0);

    const posted = await h.store.getCampaign(campaign.id);
    expect(posted?.state).toBe('posted');
    expect(posted?.placement_ref).toBe('@posting_channel:1');
    expect(h.posting.placements.get('@posting_channel:1')?.content).toBe('Try the test widget');

    await vi.advanceTimersByTimeAsync(HOUR_MS);

    expect(await state()).toBe('confirmed');
    expect(await h.engine.ledger.balance(owner.id)).toBe(500);
    expect(await h.engine.ledger.balance(advertiser.id)).toBe(500);
    expect(await trust()).toBe(55);
    expect((await h.engine.orchestrator.status(campaign.id)).scheduled).toEqual([]);
  });

  it('does not confirm before the duration has run', async () => {
    await accept();
    await vi.advanceTimersByTimeAsync(0);

    await vi.advanceTimersByTimeAsync(HOUR_MS - 1);

    expect(await state()).toBe('posted');
    expect(await h.engine.ledger.balance(owner.id)).toBe(0);
  });

  it('retries transient publish failures with exponential backoff', async () => {
    h.posting.failNext(new TransientError('network down'), new TransientError('network down'));
    await accept();

    await vi.advanceTimersByTimeAsync(0);
    expect(h.posting.publishCalls).toHaveLength(1);
    await vi.advanceTimersByTimeAsync(2000);
    expect(h.posting.publishCalls).toHaveLength(2);
    expect(await state()).toBe('accepted');
    await vi.advanceTimersByTimeAsync(4000);
    expect(h.posting.publishCalls).toHaveLength(3);

    expect(await state()).toBe('posted');
  });

  it('re-offers the campaign without the owner once retries are exhausted', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    h.posting.failNext(
      new TransientError('network down'),
      new TransientError('network down'),
      new TransientError('network down'),
    );
    await accept();

    await vi.advanceTimersByTimeAsync(6000);

    const after = await h.store.getCampaign(campaign.id);
    expect(h.posting.publishCalls).toHaveLength(3);
    expect(after?.state).toBe('offered');
    expect(after?.channel_id).toBeNull();
    expect(after?.failure_reason).toBe('posting failed');
    expect(await trust()).toBe(40);
    expect(await h.engine.ledger.balance(advertiser.id)).toBe(500);
    expect(unwrap(await h.engine.commands.listOffers(owner.id))).toEqual([]);
  });

  it('does not retry a permanent transport failure', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    h.posting.failNext(new PermanentTransportError('chat not found'));
    await accept();

    await vi.advanceTimersByTimeAsync(10_000);

    expect(h.posting.publishCalls).toHaveLength(1);
    expect(await state()).toBe('offered');
  });

  it('does not publish to a channel that is no longer verified', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    await accept();
    await h.store.updateChannel(channel.id, { state: 'pending' });

    await vi.advanceTimersByTimeAsync(0);

    const after = await h.store.getCampaign(campaign.id);
    expect(h.posting.publishCalls).toEqual([]);
    expect(after?.state).toBe('offered');
    expect(after?.channel_id).toBeNull();
    expect(after?.failure_reason).toBe(`channel ${channel.id} is not verified`);
    expect((await h.store.listExclusions(campaign.id)).map((e) => e.owner_id)).toEqual([owner.id]);
    expect(await trust()).toBe(50);
    expect(await h.engine.ledger.balance(advertiser.id)).toBe(500);
  });

  it('stops retrying once the channel loses verification during backoff', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    h.posting.failNext(new TransientError('network down'));
    await accept();
    await vi.advanceTimersByTimeAsync(0);
    expect(h.posting.publishCalls).toHaveLength(1);

    h.inspector.subscribers.set('@posting_channel', 5);
    await h.engine.verifier.verify(channel);
    await vi.advanceTimersByTimeAsync(10_000);

    expect(h.posting.publishCalls).toHaveLength(1);
    expect(await state()).toBe('offered');
  });

  it('stops retrying when the owner withdraws during backoff', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    h.posting.failNext(new TransientError('network down'));
    await accept();
    await vi.advanceTimersByTimeAsync(0);

    unwrap(await h.engine.commands.withdrawAcceptance(owner.id, campaign.id));
    await vi.advanceTimersByTimeAsync(10_000);

    expect(h.posting.publishCalls).toHaveLength(1);
    expect(await state()).toBe('offered');
    expect(await trust()).toBe(40);
  });

  it('stops retrying when the campaign expires mid-posting', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    h.posting.failNext(new TransientError('network down'));
    await accept();
    await vi.advanceTimersByTimeAsync(0);

    vi.setSystemTime(Date.now() + 169 * HOUR_MS);
    const swept = await sweepExpired({
      store: h.store,
      coordinator: h.engine.coordinator,
      scheduler: h.engine.scheduler,
      config: h.engine.config,
    });
    await vi.advanceTimersByTimeAsync(10_000);

    expect(swept.expired).toEqual([campaign.id]);
    expect(h.posting.publishCalls).toHaveLength(1);
    expect(await state()).toBe('expired');
    expect(await h.engine.ledger.balance(advertiser.id)).toBe(1000);
  });

  it('refunds the advertiser when the post is deleted early', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    await accept();
    await vi.advanceTimersByTimeAsync(0);

    h.posting.placements.clear();
    await vi.advanceTimersByTimeAsync(5 * MINUTE_MS);

    expect(await state()).toBe('refunded');
    expect(await h.engine.ledger.balance(advertiser.id)).toBe(1000);
    expect(await h.engine.ledger.balance(owner.id)).toBe(0);
    expect(await trust()).toBe(35);
  });

  it('refunds after repeated inconclusive confirmation checks', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    await accept();
    await vi.advanceTimersByTimeAsync(0);

    h.posting.existsError = new TransientError('telegram unavailable');
    await vi.advanceTimersByTimeAsync(HOUR_MS + 10 * MINUTE_MS);
    expect(await state()).toBe('posted');

    await vi.advanceTimersByTimeAsync(HOUR_MS);

    expect(await state()).toBe('refunded');
    expect(await h.engine.ledger.balance(advertiser.id)).toBe(1000);
    expect(await h.engine.ledger.balance(owner.id)).toBe(0);
    expect(await trust()).toBe(50);
  });

  it('skips publishing once the campaign is no longer accepted', async () => {
    await accept();
    const placementRef = await h.posting.publish('@posting_channel', 'stray');
    await h.engine.machine.transition(campaign.id, 'accepted', 'posted', { placement_ref: placementRef, posted_at: new Date() });

    const result = await h.engine.orchestrator.post(campaign.id);

    expect(result.status).toBe('aborted');
    expect(h.posting.publishCalls).toHaveLength(1);
  });

  it('resumes posting for accepted campaigns after a restart', async () => {
    await accept();
    h.engine.stop();

    const restarted = createEngine({
      store: h.store,
      config: h.engine.config,
      transports: { posting: h.posting, inspector: h.inspector },
    });
    try {
      expect(await restarted.orchestrator.resume()).toEqual({ posting: 1, monitoring: 0 });
      await vi.advanceTimersByTimeAsync(0);

      expect(await state()).toBe('posted');
      expect(h.posting.publishCalls).toEqual(['@posting_channel']);
    } finally {
      restarted.stop();
    }
  });

  it('reports scheduled work for a posted campaign', async () => {
    await accept();
    await vi.advanceTimersByTimeAsync(0);

    const status = await h.engine.orchestrator.status(campaign.id);

    expect(status.state).toBe('posted');
    expect(status.postingInFlight).toBe(false);
    expect(status.scheduled).toEqual([`confirm:${campaign.id}`, `monitor:${campaign.id}`]);
    const posted = await h.store.getCampaign(campaign.id);
    expect(status.confirmAt?.getTime()).toBe((posted?.posted_at?.getTime() ?? 0) + HOUR_MS);
  });
});
