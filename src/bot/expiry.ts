import type { Store } from '../db/store.js';
import type { EscrowCoordinator } from '../escrow/coordinator.js';
import type { Scheduler } from '../shared/scheduler.js';
import type { EngineConfig } from '../config/engine.js';
import { errorMessage } from '../shared/errors.js';

export interface ExpiryDeps {
  store: Store;
  coordinator: EscrowCoordinator;
  scheduler: Scheduler;
  config: EngineConfig;
}

export interface ExpirySweepResult {
  expired: number[];
  cancelled: number[];
}

/**
 * Close every campaign past its deadline:
 * - funded / offered / accepted → expired, hold refunded
 * - draft / pending_funding → cancelled (nothing held)
 * Posting retries in flight are cancelled by the transition listener.
 */
export async function sweepExpired(deps: ExpiryDeps): Promise<ExpirySweepResult> {
  const { store, coordinator, scheduler } = deps;
  const now = scheduler.now();
  const result: ExpirySweepResult = { expired: [], cancelled: [] };

  const overdue = await store.listCampaignsExpiringBefore(now, ['funded', 'offered', 'accepted']);
  for (const campaign of overdue) {
    try {
      await coordinator.settle(campaign.id, 'expired');
      result.expired.push(campaign.id);
      console.log(`[expiry] Campaign ${campaign.id} expired (${campaign.state}), budget refunded`);
    } catch (err) {
      console.error(`[expiry] Failed to expire campaign ${campaign.id}:`, errorMessage(err));
    }
  }

  const stale = await store.listCampaignsExpiringBefore(now, ['draft', 'pending_funding']);
  for (const campaign of stale) {
    try {
      await coordinator.settleWithoutHold(campaign.id, 'cancelled');
      result.cancelled.push(campaign.id);
      console.log(`[expiry] Campaign ${campaign.id} cancelled (${campaign.state}, never funded)`);
    } catch (err) {
      console.error(`[expiry] Failed to cancel campaign ${campaign.id}:`, errorMessage(err));
    }
  }

  return result;
}

/** Run the sweep now, then every `expirySweepIntervalMs`. */
export function startExpiryJob(deps: ExpiryDeps): void {
  const intervalMs = deps.config.expirySweepIntervalMs;

  sweepExpired(deps).catch((err) =>
    console.error('[expiry] Initial check failed:', errorMessage(err)),
  );

  deps.scheduler.every('expiry-sweep', intervalMs, async () => {
    await sweepExpired(deps);
  });

  console.log(`[expiry] Expiry job started (checking every ${Math.round(intervalMs / 60000)} minutes)`);
}
