import type { ChannelVerifier } from '../channels/verifier.js';
import type { Scheduler } from '../shared/scheduler.js';
import type { EngineConfig } from '../config/engine.js';
import { errorMessage } from '../shared/errors.js';

async function checkChannels(verifier: ChannelVerifier): Promise<void> {
  const results = await verifier.recheckAll();
  const changed = results.filter((r) => r.changed);
  if (changed.length > 0) {
    console.log(
      `[channelCheck] ${changed.length} of ${results.length} channel(s) changed state: ` +
        changed.map((r) => `${r.channel.id} ${r.previous}→${r.state}`).join(', '),
    );
  }
}

/**
 * Start the periodic re-verification of verified and pending channels.
 * Runs once on startup.
 */
export function startChannelCheckJob(verifier: ChannelVerifier, scheduler: Scheduler, config: EngineConfig): void {
  const intervalMs = config.verification.intervalMs;

  checkChannels(verifier).catch((err) =>
    console.error('[channelCheck] Initial run error:', errorMessage(err)),
  );

  scheduler.every('channel-check', intervalMs, () => checkChannels(verifier));

  console.log(`[channelCheck] Channel check job started (every ${Math.round(intervalMs / 60000)} minutes)`);
}
