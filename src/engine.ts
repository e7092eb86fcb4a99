import type { Store } from './db/store.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config/engine.js';
import { KeyedLock } from './shared/locks.js';
import { TimerScheduler, type Scheduler } from './shared/scheduler.js';
import { Ledger } from './ledger/index.js';
import { CampaignStateMachine } from './escrow/transitions.js';
import { EscrowCoordinator } from './escrow/coordinator.js';
import { ChannelVerifier, type ChannelInspector } from './channels/verifier.js';
import { PostingOrchestrator, type PostingTransport } from './bot/jobs.js';
import { Notifier, type MessagingTransport } from './bot/notifications.js';
import { startExpiryJob } from './bot/expiry.js';
import { startChannelCheckJob } from './bot/channelCheck.js';
import { CommandService } from './commands/index.js';

export interface EngineTransports {
  posting: PostingTransport;
  inspector: ChannelInspector;
  messaging?: MessagingTransport;
}

export interface EngineOptions {
  store: Store;
  transports: EngineTransports;
  config?: EngineConfig;
  scheduler?: Scheduler;
}

export interface Engine {
  config: EngineConfig;
  store: Store;
  scheduler: Scheduler;
  ledger: Ledger;
  machine: CampaignStateMachine;
  coordinator: EscrowCoordinator;
  verifier: ChannelVerifier;
  orchestrator: PostingOrchestrator;
  notifier: Notifier | null;
  commands: CommandService;
  /** Resume interrupted campaigns and start the periodic jobs. */
  start(): Promise<void>;
  stop(): void;
}

/** Wire the engine components over one store, one lock table and one scheduler. */
export function createEngine(options: EngineOptions): Engine {
  const { store, transports } = options;
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  const scheduler = options.scheduler ?? new TimerScheduler('jobs');
  const now = () => scheduler.now();
  const locks = new KeyedLock();

  const ledger = new Ledger(store, locks);
  const machine = new CampaignStateMachine(store, locks, now);
  const coordinator = new EscrowCoordinator(store, ledger, machine, (ms, signal) => scheduler.sleep(ms, signal), now);
  const verifier = new ChannelVerifier({ store, inspector: transports.inspector, machine, coordinator, locks, config, now });
  const orchestrator = new PostingOrchestrator({
    store,
    machine,
    coordinator,
    verifier,
    transport: transports.posting,
    scheduler,
    config,
  });

  // Posting starts on acceptance; leaving accepted/posted stops whatever was running for it.
  machine.onTransition(({ campaign, from, to }) => {
    if (to === 'accepted') {
      orchestrator.schedulePosting(campaign.id);
    } else if ((from === 'accepted' || from === 'posted') && to !== 'posted') {
      orchestrator.cancel(campaign.id);
    }
  });

  const notifier = transports.messaging ? new Notifier(store, transports.messaging, config.notificationTimeoutMs) : null;
  notifier?.attach(machine);

  const commands = new CommandService({
    store,
    ledger,
    machine,
    coordinator,
    verifier,
    orchestrator,
    locks,
    config,
    now,
  });

  return {
    config,
    store,
    scheduler,
    ledger,
    machine,
    coordinator,
    verifier,
    orchestrator,
    notifier,
    commands,
    async start() {
      await orchestrator.resume();
      startExpiryJob({ store, coordinator, scheduler, config });
      startChannelCheckJob(verifier, scheduler, config);
    },
    stop() {
      scheduler.stop();
    },
  };
}
