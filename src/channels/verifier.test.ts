import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ForbiddenError, InvalidInputError } from '../shared/errors.js';
import {
  createTestEngine,
  seedAdvertiser,
  seedOfferedCampaign,
  seedVerifiedOwner,
  unwrap,
  type TestHarness,
} from '../testing/harness.js';

describe('ChannelVerifier', () => {
  let h: TestHarness;
  let ownerId: number;

  beforeEach(async () => {
    vi.useFakeTimers();
    h = createTestEngine();
    ownerId = unwrap(await h.engine.commands.ensureUser(500, 'owner', 'channel_owner')).id;
  });

  afterEach(() => {
    h.engine.stop();
    vi.useRealTimers();
  });

  describe('register', () => {
    it('verifies a channel where the bot is admin with enough subscribers', async () => {
      h.inspector.setAdmin('@good_channel', true);
      h.inspector.subscribers.set('@good_channel', 1000);

      const result = await h.engine.verifier.register(ownerId, '@good_channel');

      expect(result.state).toBe('verified');
      expect(result.reason).toBe('ok');
      expect(result.channel).toMatchObject({
        owner_id: ownerId,
        title: 'Title of @good_channel',
        subscribers: 1000,
        trust_score: 50,
        bot_is_admin: true,
      });
      expect(result.channel.verified_at).toBeInstanceOf(Date);
      expect(h.engine.verifier.guidance(result)).toEqual([]);
    });

    it('leaves the channel pending with setup steps when the bot is not admin', async () => {
      const result = await h.engine.verifier.register(ownerId, '@not_admin_here');

      expect(result.state).toBe('pending');
      expect(result.reason).toBe('not_admin');
      expect(h.engine.verifier.guidance(result)).toHaveLength(3);
    });

    it('keeps a small channel pending', async () => {
      h.inspector.setAdmin('@tiny_channel', true);
      h.inspector.subscribers.set('@tiny_channel', 50);

      const result = await h.engine.verifier.register(ownerId, '@tiny_channel');

      expect(result.state).toBe('pending');
      expect(result.reason).toBe('too_few_subscribers');
      expect(h.engine.verifier.guidance(result)[0]).toBe(
        'Your channel needs at least 100 subscribers (currently 50).',
      );
    });

    it('rejects an identifier that is neither a username nor a numeric id', async () => {
      await expect(h.engine.verifier.register(ownerId, 'not a channel')).rejects.toBeInstanceOf(InvalidInputError);
    });

    it('refuses a channel registered to someone else', async () => {
      await seedVerifiedOwner(h, 600, '@taken_channel');

      await expect(h.engine.verifier.register(ownerId, '@taken_channel')).rejects.toBeInstanceOf(ForbiddenError);
    });
  });

  describe('verify', () => {
    it('keeps a verified channel verified when both admin checks are inconclusive', async () => {
      const { channel } = await seedVerifiedOwner(h, 600, '@flaky_channel');
      const transient = { isAdmin: false, isDefinitive: false, reason: 'timeout' };
      h.inspector.adminQueue.push(transient, transient);

      const result = await h.engine.verifier.verify(channel);

      expect(result.state).toBe('verified');
      expect(result.reason).toBe('admin_unknown');
      expect(result.changed).toBe(false);
    });

    it('trusts one definitive admin answer over one failed check', async () => {
      const { channel } = await seedVerifiedOwner(h, 600, '@flaky_channel');
      h.inspector.adminQueue.push({ isAdmin: false, isDefinitive: false, reason: 'timeout' });

      const result = await h.engine.verifier.verify(channel);

      expect(result.state).toBe('verified');
      expect(result.reason).toBe('ok');
    });

    it('revokes a verified channel that lost the bot and lowers its trust', async () => {
      const { channel } = await seedVerifiedOwner(h, 600, '@revoked_channel');
      h.inspector.setAdmin('@revoked_channel', false);

      const result = await h.engine.verifier.verify(channel);

      expect(result.previous).toBe('verified');
      expect(result.state).toBe('revoked');
      expect(result.channel.trust_score).toBe(30);
      expect(result.channel.bot_is_admin).toBe(false);
    });

    it('restores a revoked channel once the bot is admin again', async () => {
      const { channel } = await seedVerifiedOwner(h, 600, '@back_again');
      h.inspector.setAdmin('@back_again', false);
      await h.engine.verifier.verify(channel);

      h.inspector.setAdmin('@back_again', true);
      const result = await h.engine.verifier.verify(channel);

      expect(result.previous).toBe('revoked');
      expect(result.state).toBe('verified');
    });

    it('puts an accepted campaign back on offer without the revoked owner', async () => {
      const { user: owner, channel } = await seedVerifiedOwner(h, 600, '@losing_admin');
      const advertiser = await seedAdvertiser(h, 700, 1000);
      const campaign = await seedOfferedCampaign(h, advertiser.id, 500);
      unwrap(await h.engine.commands.acceptOffer(owner.id, campaign.id));

      h.inspector.setAdmin('@losing_admin', false);
      await h.engine.verifier.verify(channel);

      const after = await h.store.getCampaign(campaign.id);
      expect(after?.state).toBe('offered');
      expect(after?.failure_reason).toBe(`channel ${channel.id} revoked`);
      expect((await h.store.listExclusions(campaign.id)).map((e) => e.owner_id)).toEqual([owner.id]);
      expect(await h.engine.ledger.balance(advertiser.id)).toBe(500);
    });

    it('takes an accepted campaign off a channel that drops below the subscriber floor', async () => {
      const { user: owner, channel } = await seedVerifiedOwner(h, 600, '@shrinking_channel');
      const advertiser = await seedAdvertiser(h, 700, 1000);
      const campaign = await seedOfferedCampaign(h, advertiser.id, 500);
      unwrap(await h.engine.commands.acceptOffer(owner.id, campaign.id));

      h.inspector.subscribers.set('@shrinking_channel', 5);
      const result = await h.engine.verifier.verify(channel);
      await vi.advanceTimersByTimeAsync(0);

      expect(result.state).toBe('pending');
      expect(result.channel.trust_score).toBe(50);
      const after = await h.store.getCampaign(campaign.id);
      expect(after?.state).toBe('offered');
      expect(after?.failure_reason).toBe(`channel ${channel.id} pending`);
      expect(h.posting.publishCalls).toEqual([]);
      expect(await h.engine.ledger.balance(advertiser.id)).toBe(500);
    });

    it('leaves a posted campaign in place when its channel only drops to pending', async () => {
      const { user: owner, channel } = await seedVerifiedOwner(h, 600, '@shrinking_channel');
      const advertiser = await seedAdvertiser(h, 700, 1000);
      const campaign = await seedOfferedCampaign(h, advertiser.id, 500);
      unwrap(await h.engine.commands.acceptOffer(owner.id, campaign.id));
      await vi.advanceTimersByTimeAsync(0);

      h.inspector.subscribers.set('@shrinking_channel', 5);
      await h.engine.verifier.verify(channel);

      expect((await h.store.getCampaign(campaign.id))?.state).toBe('posted');
      expect(await h.engine.ledger.balance(advertiser.id)).toBe(500);
    });

    it('refunds a posted campaign on a revoked channel', async () => {
      const { user: owner, channel } = await seedVerifiedOwner(h, 600, '@losing_admin');
      const advertiser = await seedAdvertiser(h, 700, 1000);
      const campaign = await seedOfferedCampaign(h, advertiser.id, 500);
      unwrap(await h.engine.commands.acceptOffer(owner.id, campaign.id));
      await vi.advanceTimersByTimeAsync(0);
      expect((await h.store.getCampaign(campaign.id))?.state).toBe('posted');

      h.inspector.setAdmin('@losing_admin', false);
      await h.engine.verifier.verify(channel);

      expect((await h.store.getCampaign(campaign.id))?.state).toBe('refunded');
      expect(await h.engine.ledger.balance(advertiser.id)).toBe(1000);
      expect(await h.engine.ledger.balance(owner.id)).toBe(0);
    });
  });

  it('clamps trust adjustments to the 0-100 range', async () => {
    const { channel } = await seedVerifiedOwner(h, 600, '@trust_channel');

    expect((await h.engine.verifier.adjustTrust(channel.id, 80, 'bonus')).trust_score).toBe(100);
    expect((await h.engine.verifier.adjustTrust(channel.id, -500, 'penalty')).trust_score).toBe(0);
  });

  it('rechecks verified and pending channels only', async () => {
    await seedVerifiedOwner(h, 600, '@checked_channel');
    await h.engine.verifier.register(ownerId, '@pending_channel');

    const results = await h.engine.verifier.recheckAll();

    expect(results.map((r) => r.channel.telegram_channel_id).sort()).toEqual(['@checked_channel', '@pending_channel']);
  });
});
