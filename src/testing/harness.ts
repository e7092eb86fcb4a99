import { MemoryStore } from '../db/memoryStore.js';
import { createEngine, type Engine } from '../engine.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config/engine.js';
import type { AdminCheckResult, ChannelInfo, ChannelInspector } from '../channels/verifier.js';
import type { PostingTransport } from '../bot/jobs.js';
import type { MessagingTransport } from '../bot/notifications.js';
import type { CommandResult } from '../commands/index.js';
import type { Campaign, Channel, User } from '../shared/types.js';

/** Channel stand-in: placements live in a map until removed or deleted by the test. */
export class FakePostingTransport implements PostingTransport {
  readonly placements = new Map<string, { channel: string; content: string }>();
  readonly publishCalls: string[] = [];
  readonly removed: string[] = [];
  existsError: Error | null = null;
  private failures: Error[] = [];
  private seq = 0;

  /** The next publish calls reject with these errors, in order. */
  failNext(...errors: Error[]): void {
    this.failures.push(...errors);
  }

  async publish(telegramChannelId: string, content: string): Promise<string> {
    this.publishCalls.push(telegramChannelId);
    const failure = this.failures.shift();
    if (failure) throw failure;
    this.seq += 1;
    const ref = `${telegramChannelId}:${this.seq}`;
    this.placements.set(ref, { channel: telegramChannelId, content });
    return ref;
  }

  async exists(placementRef: string): Promise<boolean> {
    if (this.existsError) throw this.existsError;
    return this.placements.has(placementRef);
  }

  async remove(placementRef: string): Promise<void> {
    this.removed.push(placementRef);
    this.placements.delete(placementRef);
  }
}

export class FakeChannelInspector implements ChannelInspector {
  readonly admin = new Map<string, AdminCheckResult>();
  readonly subscribers = new Map<string, number>();
  /** Consumed before `admin`, one result per call. */
  readonly adminQueue: AdminCheckResult[] = [];
  infoError: Error | null = null;

  setAdmin(telegramChannelId: string, isAdmin: boolean, isDefinitive = true): void {
    this.admin.set(telegramChannelId, { isAdmin, isDefinitive, reason: isAdmin ? 'administrator' : 'left' });
  }

  async adminStatus(telegramChannelId: string): Promise<AdminCheckResult> {
    return this.adminQueue.shift()
      ?? this.admin.get(telegramChannelId)
      ?? { isAdmin: false, isDefinitive: true, reason: 'not a member' };
  }

  async info(telegramChannelId: string): Promise<ChannelInfo> {
    if (this.infoError) throw this.infoError;
    return { title: `Title of ${telegramChannelId}`, subscribers: this.subscribers.get(telegramChannelId) ?? 0 };
  }
}

export class FakeMessaging implements MessagingTransport {
  readonly sent: Array<{ telegramUserId: number; content: string }> = [];
  readonly failFor = new Set<number>();
  /** Sends to these chats never settle. */
  readonly hangFor = new Set<number>();

  async send(telegramUserId: number, content: string): Promise<void> {
    if (this.failFor.has(telegramUserId)) throw new Error(`chat ${telegramUserId} blocked the bot`);
    if (this.hangFor.has(telegramUserId)) return new Promise<void>(() => {});
    this.sent.push({ telegramUserId, content });
  }

  to(telegramUserId: number): string[] {
    return this.sent.filter((m) => m.telegramUserId === telegramUserId).map((m) => m.content);
  }
}

export interface TestHarness {
  engine: Engine;
  store: MemoryStore;
  posting: FakePostingTransport;
  inspector: FakeChannelInspector;
  messaging: FakeMessaging;
}

export function createTestEngine(options: { config?: EngineConfig; store?: MemoryStore } = {}): TestHarness {
  const store = options.store ?? new MemoryStore();
  const posting = new FakePostingTransport();
  const inspector = new FakeChannelInspector();
  const messaging = new FakeMessaging();
  const engine = createEngine({
    store,
    config: options.config ?? DEFAULT_ENGINE_CONFIG,
    transports: { posting, inspector, messaging },
  });
  return { engine, store, posting, inspector, messaging };
}

/** Wait until every queued notification has been attempted. */
export async function flushNotifications(h: TestHarness): Promise<void> {
  await h.engine.notifier?.flush();
}

export function unwrap<T>(result: CommandResult<T>): T {
  if (!result.ok) throw new Error(`${result.error.kind}: ${result.error.message}`);
  return result.value;
}

export async function seedAdvertiser(h: TestHarness, telegramId: number, balance: number): Promise<User> {
  const { commands } = h.engine;
  const user = unwrap(await commands.ensureUser(telegramId, `advertiser${telegramId}`));
  if (balance > 0) unwrap(await commands.topUp(user.id, balance, `seed:${telegramId}`));
  return user;
}

export async function seedVerifiedOwner(
  h: TestHarness,
  telegramId: number,
  telegramChannelId: string,
  subscribers = 1000,
): Promise<{ user: User; channel: Channel }> {
  h.inspector.setAdmin(telegramChannelId, true);
  h.inspector.subscribers.set(telegramChannelId, subscribers);
  const { commands } = h.engine;
  const user = unwrap(await commands.ensureUser(telegramId, `owner${telegramId}`, 'channel_owner'));
  const { channel } = unwrap(await commands.registerChannel(user.id, telegramChannelId));
  return { user, channel };
}

export async function seedOfferedCampaign(
  h: TestHarness,
  advertiserId: number,
  budget = 500,
  durationHours = 1,
): Promise<Campaign> {
  const { commands } = h.engine;
  const draft = unwrap(await commands.createCampaign(advertiserId, { adText: 'Try the test widget', budget, durationHours }));
  return unwrap(await commands.fundCampaign(advertiserId, draft.id));
}
