import type { Store } from '../db/store.js';
import type { EngineConfig } from '../config/engine.js';
import type { CampaignStateMachine } from '../escrow/transitions.js';
import type { EscrowCoordinator } from '../escrow/coordinator.js';
import type { ChannelVerifier } from '../channels/verifier.js';
import { AbortedError, type Scheduler } from '../shared/scheduler.js';
import { retry, withTimeout } from '../shared/retry.js';
import {
  InvalidTransitionError,
  NotFoundError,
  PlacementFailedError,
  TimeoutError,
  VerificationFailedError,
  errorMessage,
  isEngineError,
  isTransient,
} from '../shared/errors.js';
import type { Campaign, CampaignState } from '../shared/types.js';

const HOUR_MS = 60 * 60 * 1000;

export interface PostingTransport {
  /** Place `content` in the channel; resolves to an opaque placement reference. */
  publish(telegramChannelId: string, content: string): Promise<string>;
  exists(placementRef: string): Promise<boolean>;
  remove(placementRef: string): Promise<void>;
}

export type PostingResult =
  | { status: 'posted'; campaign: Campaign; placementRef: string; attempts: number }
  | { status: 'failed'; campaignId: number; attempts: number; error: PlacementFailedError }
  | { status: 'aborted'; campaignId: number; reason: string };

export interface CampaignJobStatus {
  campaignId: number;
  state: CampaignState;
  postingInFlight: boolean;
  scheduled: string[];
  confirmAt: Date | null;
}

interface OrchestratorDeps {
  store: Store;
  machine: CampaignStateMachine;
  coordinator: EscrowCoordinator;
  verifier: ChannelVerifier;
  transport: PostingTransport;
  scheduler: Scheduler;
  config: EngineConfig;
}

const postKey = (id: number) => `post:${id}`;
const confirmKey = (id: number) => `confirm:${id}`;
const monitorKey = (id: number) => `monitor:${id}`;

function confirmationTime(campaign: Campaign): Date | null {
  if (!campaign.posted_at) return null;
  return new Date(campaign.posted_at.getTime() + campaign.duration_hours * HOUR_MS);
}

/**
 * Places accepted campaigns in their channel, then checks the placement is
 * still there once the campaign's duration has run. All work runs as keyed
 * scheduler tasks so it can be cancelled when the campaign moves on.
 */
export class PostingOrchestrator {
  private readonly inFlight = new Map<number, AbortController>();

  constructor(private readonly deps: OrchestratorDeps) {}

  /** Start posting in the background. */
  schedulePosting(campaignId: number): void {
    this.deps.scheduler.schedule(postKey(campaignId), 0, async () => {
      const result = await this.post(campaignId);
      console.log(`[jobs] Posting campaign ${campaignId} finished: ${result.status}`);
    });
  }

  async post(campaignId: number): Promise<PostingResult> {
    const { store, scheduler, config } = this.deps;
    this.inFlight.get(campaignId)?.abort();
    const controller = new AbortController();
    this.inFlight.set(campaignId, controller);

    let attempts = 0;
    try {
      const placementRef = await retry(
        async (attempt) => {
          attempts = attempt;
          const campaign = await store.getCampaign(campaignId);
          if (!campaign) throw new NotFoundError('Campaign', campaignId);
          if (campaign.state !== 'accepted' || campaign.channel_id === null) {
            throw new AbortedError(`Campaign ${campaignId} is ${campaign.state}`);
          }
          const channel = await store.getChannel(campaign.channel_id);
          if (!channel) throw new NotFoundError('Channel', campaign.channel_id);
          if (channel.state !== 'verified') {
            throw new VerificationFailedError(`Channel ${channel.id} is ${channel.state}, not verified`);
          }
          return this.publishWithTimeout(campaignId, channel.telegram_channel_id, campaign.ad_text);
        },
        {
          ...config.posting,
          sleep: (ms, signal) => scheduler.sleep(ms, signal),
          signal: controller.signal,
          shouldRetry: (err) => !(err instanceof AbortedError) && isTransient(err),
          onRetry: (err, attempt, delayMs) => {
            console.warn(
              `[jobs] Posting campaign ${campaignId} attempt ${attempt} failed, retrying in ${delayMs}ms:`,
              errorMessage(err),
            );
          },
        },
      );

      if (controller.signal.aborted) {
        await this.removePlacement(placementRef, campaignId);
        return { status: 'aborted', campaignId, reason: 'cancelled while publishing' };
      }
      return await this.recordPlacement(campaignId, placementRef, attempts);
    } catch (err) {
      if (err instanceof AbortedError || controller.signal.aborted) {
        console.log(`[jobs] Posting campaign ${campaignId} aborted: ${errorMessage(err)}`);
        return { status: 'aborted', campaignId, reason: errorMessage(err) };
      }
      if (err instanceof VerificationFailedError) {
        return this.unbindUnverified(campaignId, err);
      }
      if (isEngineError(err) && err.kind === 'NotFound') throw err;
      return this.handlePostingFailure(campaignId, attempts, err);
    } finally {
      if (this.inFlight.get(campaignId) === controller) {
        this.inFlight.delete(campaignId);
      }
    }
  }

  /**
   * Check the placement is still live and settle the hold: release to the
   * channel owner when it is, refund the advertiser when it is gone. Throws
   * VerificationFailed when the placement cannot be checked.
   */
  async confirmCompletion(campaignId: number): Promise<boolean> {
    const { store, coordinator, verifier, transport, config } = this.deps;
    const campaign = await store.getCampaign(campaignId);
    if (!campaign) throw new NotFoundError('Campaign', campaignId);
    if (campaign.state !== 'posted' || campaign.channel_id === null) {
      throw new InvalidTransitionError(`Campaign ${campaignId} is ${campaign.state}, not posted`);
    }
    const channelId = campaign.channel_id;

    let alive = false;
    if (campaign.placement_ref) {
      const placementRef = campaign.placement_ref;
      try {
        alive = await retry(
          () => withTimeout(transport.exists(placementRef), config.verification.timeoutMs, `exists ${placementRef}`),
          {
            maxAttempts: config.confirmation.checkAttempts,
            baseDelayMs: config.posting.baseDelayMs,
            maxDelayMs: config.posting.maxDelayMs,
            sleep: (ms, signal) => this.deps.scheduler.sleep(ms, signal),
          },
        );
      } catch (err) {
        throw new VerificationFailedError(`Placement of campaign ${campaignId} could not be checked`, {
          campaignId,
          cause: errorMessage(err),
        });
      }
    }

    this.deps.scheduler.cancel(monitorKey(campaignId));
    const hold = await store.getHoldByCampaign(campaignId);
    if (!hold) throw new NotFoundError('Hold for campaign', campaignId);

    if (alive) {
      await coordinator.release(hold);
      await verifier.adjustTrust(channelId, config.trust.successReward, `campaign ${campaignId} confirmed`);
      console.log(`[jobs] Campaign ${campaignId} confirmed, ${hold.amount} released`);
      return true;
    }

    await coordinator.refund(hold, 'refunded');
    await verifier.adjustTrust(channelId, -config.trust.earlyDeletionPenalty, `campaign ${campaignId} placement missing`);
    console.log(`[jobs] Campaign ${campaignId} placement missing at confirmation, refunded`);
    return false;
  }

  /** Stop every timer and in-flight retry for the campaign. */
  cancel(campaignId: number): boolean {
    const { scheduler } = this.deps;
    let cancelled = false;
    for (const key of [postKey(campaignId), confirmKey(campaignId), monitorKey(campaignId)]) {
      if (scheduler.cancel(key)) cancelled = true;
    }
    const controller = this.inFlight.get(campaignId);
    if (controller) {
      controller.abort();
      this.inFlight.delete(campaignId);
      cancelled = true;
    }
    if (cancelled) console.log(`[jobs] Cancelled jobs for campaign ${campaignId}`);
    return cancelled;
  }

  /** Re-drive accepted and posted campaigns after a restart. */
  async resume(): Promise<{ posting: number; monitoring: number }> {
    const { store } = this.deps;
    const accepted = await store.listCampaignsByState(['accepted']);
    for (const campaign of accepted) {
      this.schedulePosting(campaign.id);
    }

    const posted = await store.listCampaignsByState(['posted']);
    for (const campaign of posted) {
      this.watchPlacement(campaign);
    }

    if (accepted.length + posted.length > 0) {
      console.log(`[jobs] Resumed ${accepted.length} posting and ${posted.length} monitoring job(s)`);
    }
    return { posting: accepted.length, monitoring: posted.length };
  }

  async status(campaignId: number): Promise<CampaignJobStatus> {
    const campaign = await this.deps.store.getCampaign(campaignId);
    if (!campaign) throw new NotFoundError('Campaign', campaignId);
    const keys = [postKey(campaignId), confirmKey(campaignId), monitorKey(campaignId)];
    return {
      campaignId,
      state: campaign.state,
      postingInFlight: this.inFlight.has(campaignId),
      scheduled: keys.filter((key) => this.deps.scheduler.has(key)),
      confirmAt: campaign.state === 'posted' ? confirmationTime(campaign) : null,
    };
  }

  private async publishWithTimeout(campaignId: number, telegramChannelId: string, content: string): Promise<string> {
    const publishing = this.deps.transport.publish(telegramChannelId, content);
    try {
      return await withTimeout(publishing, this.deps.config.posting.timeoutMs, `publish campaign ${campaignId}`);
    } catch (err) {
      if (err instanceof TimeoutError) {
        // A publish that lands after its timeout would be an unpaid duplicate.
        void publishing.then(
          (ref) => this.removePlacement(ref, campaignId),
          (lateErr: unknown) => {
            console.warn(`[jobs] Timed-out publish for campaign ${campaignId} failed later:`, errorMessage(lateErr));
          },
        );
      }
      throw err;
    }
  }

  private async recordPlacement(campaignId: number, placementRef: string, attempts: number): Promise<PostingResult> {
    const { machine } = this.deps;
    let campaign: Campaign;
    try {
      campaign = await machine.markPosted(campaignId, {
        placement_ref: placementRef,
        posted_at: this.deps.scheduler.now(),
      });
    } catch (err) {
      if (!isEngineError(err)) throw err;
      // The campaign moved on, or its channel lost verification, while the post was going out.
      await this.removePlacement(placementRef, campaignId);
      if (err instanceof VerificationFailedError) return this.unbindUnverified(campaignId, err);
      return { status: 'aborted', campaignId, reason: err.message };
    }

    console.log(`[jobs] Campaign ${campaignId} posted (${placementRef}) after ${attempts} attempt(s)`);
    this.watchPlacement(campaign);
    return { status: 'posted', campaign, placementRef, attempts };
  }

  /** Put an accepted campaign whose channel is no longer verified back on offer. */
  private async unbindUnverified(campaignId: number, cause: VerificationFailedError): Promise<PostingResult> {
    const { store } = this.deps;
    console.warn(`[jobs] Not posting campaign ${campaignId}: ${cause.message}`);
    const campaign = await store.getCampaign(campaignId);
    const channel = campaign && campaign.channel_id !== null ? await store.getChannel(campaign.channel_id) : null;
    if (!campaign || campaign.state !== 'accepted' || !channel) {
      return { status: 'aborted', campaignId, reason: cause.message };
    }
    try {
      await this.deps.machine.reoffer(campaignId, {
        excludeOwnerId: channel.owner_id,
        reason: `channel ${channel.id} is not verified`,
        boundChannelId: channel.id,
      });
    } catch (err) {
      if (!isEngineError(err)) throw err;
      return { status: 'aborted', campaignId, reason: err.message };
    }
    return { status: 'aborted', campaignId, reason: cause.message };
  }

  private async handlePostingFailure(campaignId: number, attempts: number, cause: unknown): Promise<PostingResult> {
    const { store, machine, verifier, config } = this.deps;
    const error = new PlacementFailedError(campaignId, attempts);
    console.error(`[jobs] ${error.message}:`, errorMessage(cause));

    const campaign = await store.getCampaign(campaignId);
    if (!campaign || campaign.state !== 'accepted' || campaign.channel_id === null) {
      return { status: 'aborted', campaignId, reason: `campaign is ${campaign?.state ?? 'missing'}` };
    }
    const channel = await store.getChannel(campaign.channel_id);
    if (!channel) throw new NotFoundError('Channel', campaign.channel_id);

    try {
      await machine.reoffer(campaignId, { excludeOwnerId: channel.owner_id, reason: 'posting failed' });
    } catch (err) {
      if (!isEngineError(err)) throw err;
      return { status: 'aborted', campaignId, reason: err.message };
    }
    await verifier.adjustTrust(channel.id, -config.trust.postingPenalty, `posting campaign ${campaignId} failed`);
    return { status: 'failed', campaignId, attempts, error };
  }

  /** Schedule the end-of-duration confirmation and the liveness monitor. */
  private watchPlacement(campaign: Campaign): void {
    const { scheduler, config } = this.deps;
    const confirmAt = confirmationTime(campaign);
    if (!confirmAt) return;

    const delayMs = Math.max(0, confirmAt.getTime() - scheduler.now().getTime());
    scheduler.schedule(confirmKey(campaign.id), delayMs, () => this.runConfirmation(campaign.id, 0));
    if (delayMs > config.monitorIntervalMs) {
      scheduler.every(monitorKey(campaign.id), config.monitorIntervalMs, () => this.checkLiveness(campaign.id));
    }
    console.log(`[jobs] Confirming campaign ${campaign.id} at ${confirmAt.toISOString()}`);
  }

  private async runConfirmation(campaignId: number, reschedules: number): Promise<void> {
    const { scheduler, coordinator, config } = this.deps;
    try {
      await this.confirmCompletion(campaignId);
    } catch (err) {
      if (!(err instanceof VerificationFailedError)) throw err;
      if (reschedules < config.confirmation.maxReschedules) {
        console.warn(
          `[jobs] Confirmation of campaign ${campaignId} inconclusive, retrying in ${config.confirmation.rescheduleDelayMs}ms`,
        );
        scheduler.schedule(confirmKey(campaignId), config.confirmation.rescheduleDelayMs, () =>
          this.runConfirmation(campaignId, reschedules + 1),
        );
        return;
      }
      console.error(`[jobs] Confirmation of campaign ${campaignId} failed ${reschedules + 1} times, refunding`);
      scheduler.cancel(monitorKey(campaignId));
      await coordinator.settle(campaignId, 'refunded');
    }
  }

  /** Periodic check between posting and confirmation; an early deletion refunds. */
  private async checkLiveness(campaignId: number): Promise<void> {
    const { store, scheduler, transport, coordinator, verifier, config } = this.deps;
    const campaign = await store.getCampaign(campaignId);
    if (!campaign || campaign.state !== 'posted' || !campaign.placement_ref || campaign.channel_id === null) {
      console.log(`[jobs] Campaign ${campaignId} no longer posted, stopping monitor`);
      scheduler.cancel(monitorKey(campaignId));
      return;
    }

    let alive: boolean;
    try {
      alive = await withTimeout(
        transport.exists(campaign.placement_ref),
        config.verification.timeoutMs,
        `exists ${campaign.placement_ref}`,
      );
    } catch (err) {
      console.warn(`[jobs] Liveness check for campaign ${campaignId} inconclusive:`, errorMessage(err));
      return;
    }
    if (alive) return;

    console.warn(`[jobs] Campaign ${campaignId} placement deleted early, refunding`);
    this.cancel(campaignId);
    await coordinator.settle(campaignId, 'refunded');
    await verifier.adjustTrust(
      campaign.channel_id,
      -config.trust.earlyDeletionPenalty,
      `campaign ${campaignId} deleted early`,
    );
  }

  private async removePlacement(placementRef: string, campaignId: number): Promise<void> {
    try {
      await this.deps.transport.remove(placementRef);
      console.log(`[jobs] Removed orphaned placement ${placementRef} of campaign ${campaignId}`);
    } catch (err) {
      console.error(`[jobs] Failed to remove placement ${placementRef}:`, errorMessage(err));
    }
  }
}
