import { ConcurrencyConflict } from '../shared/errors.js';
import type {
  Campaign,
  CampaignExclusion,
  CampaignPatch,
  CampaignState,
  Channel,
  ChannelPatch,
  ChannelState,
  EscrowHold,
  HoldStatus,
  NewCampaign,
  NewChannel,
  NewTransaction,
  Transaction,
  TransactionKind,
  User,
  UserRole,
} from '../shared/types.js';
import type { Store } from './store.js';

interface Row {
  id: number;
}

class Table<T extends Row> {
  readonly rows = new Map<number, T>();
  private seq = 0;

  nextId(): number {
    this.seq += 1;
    return this.seq;
  }
}

/**
 * A table as seen from one store handle. Outside a transaction writes go
 * straight to the table; inside one they are staged until commit.
 */
class TableView<T extends Row> {
  constructor(
    private readonly table: Table<T>,
    private readonly staged: Map<number, T> | null,
  ) {}

  get(id: number): T | undefined {
    const row = this.staged?.get(id) ?? this.table.rows.get(id);
    return row ? { ...row } : undefined;
  }

  committed(id: number): T | undefined {
    return this.table.rows.get(id);
  }

  all(): T[] {
    const merged = new Map(this.table.rows);
    if (this.staged) {
      for (const [id, row] of this.staged) merged.set(id, row);
    }
    return [...merged.values()].map((row) => ({ ...row }));
  }

  put(row: T): T {
    (this.staged ?? this.table.rows).set(row.id, { ...row });
    return { ...row };
  }

  insert(build: (id: number) => T): T {
    return this.put(build(this.table.nextId()));
  }

  commit(): void {
    if (!this.staged) return;
    for (const [id, row] of this.staged) this.table.rows.set(id, row);
  }
}

class MemoryTables {
  users = new Table<User>();
  channels = new Table<Channel>();
  campaigns = new Table<Campaign>();
  holds = new Table<EscrowHold>();
  transactions = new Table<Transaction>();
  exclusions = new Table<CampaignExclusion>();
}

interface TxState {
  views: MemoryViews;
  /** Checked against committed rows at commit time; any false aborts the transaction. */
  conditions: Array<{ check: () => boolean; describe: string }>;
}

type MemoryViews = {
  users: TableView<User>;
  channels: TableView<Channel>;
  campaigns: TableView<Campaign>;
  holds: TableView<EscrowHold>;
  transactions: TableView<Transaction>;
  exclusions: TableView<CampaignExclusion>;
};

function createViews(tables: MemoryTables, staged: boolean): MemoryViews {
  const stage = <T extends Row>() => (staged ? new Map<number, T>() : null);
  return {
    users: new TableView(tables.users, stage<User>()),
    channels: new TableView(tables.channels, stage<Channel>()),
    campaigns: new TableView(tables.campaigns, stage<Campaign>()),
    holds: new TableView(tables.holds, stage<EscrowHold>()),
    transactions: new TableView(tables.transactions, stage<Transaction>()),
    exclusions: new TableView(tables.exclusions, stage<CampaignExclusion>()),
  };
}

function byIdDesc<T extends Row>(a: T, b: T): number {
  return b.id - a.id;
}

/**
 * In-process Store used by the tests. Transactions stage their writes and
 * apply them in one synchronous step on commit, after re-checking every
 * compare-and-swap they performed against the committed rows.
 */
export class MemoryStore implements Store {
  private readonly views: MemoryViews;

  constructor(
    private readonly tables = new MemoryTables(),
    private readonly tx: TxState | null = null,
  ) {
    this.views = tx?.views ?? createViews(tables, false);
  }

  async transaction<T>(fn: (tx: Store) => Promise<T>): Promise<T> {
    if (this.tx) return fn(this);

    const state: TxState = { views: createViews(this.tables, true), conditions: [] };
    const result = await fn(new MemoryStore(this.tables, state));

    const failed = state.conditions.find((c) => !c.check());
    if (failed) {
      throw new ConcurrencyConflict(`Commit rejected: ${failed.describe} changed concurrently`);
    }
    for (const view of Object.values(state.views)) view.commit();
    return result;
  }

  private expect(describe: string, check: () => boolean): void {
    this.tx?.conditions.push({ describe, check });
  }

  private now(): Date {
    return new Date();
  }

  // ── Users ──────────────────────────────────────────────────────────

  async createUser(telegramId: number, username: string | null, role: UserRole): Promise<User> {
    if (this.views.users.all().some((u) => u.telegram_id === telegramId)) {
      throw new Error(`duplicate key: users.telegram_id=${telegramId}`);
    }
    return this.views.users.insert((id) => ({
      id,
      telegram_id: telegramId,
      username,
      role,
      balance: 0,
      is_active: true,
      created_at: this.now(),
    }));
  }

  async getUser(id: number): Promise<User | null> {
    return this.views.users.get(id) ?? null;
  }

  async getUserByTelegramId(telegramId: number): Promise<User | null> {
    return this.views.users.all().find((u) => u.telegram_id === telegramId) ?? null;
  }

  async lockUser(id: number): Promise<User | null> {
    return this.getUser(id);
  }

  async updateUser(id: number, patch: Partial<Pick<User, 'username' | 'role' | 'is_active'>>): Promise<User | null> {
    const user = this.views.users.get(id);
    if (!user) return null;
    return this.views.users.put({ ...user, ...patch });
  }

  async setUserBalance(id: number, expected: number, next: number): Promise<boolean> {
    const user = this.views.users.get(id);
    if (!user || user.balance !== expected) return false;
    if (next < 0) throw new Error('check constraint violated: users.balance >= 0');
    this.views.users.put({ ...user, balance: next });
    // A committed row that moved away from `expected` means another writer won.
    const committed = this.views.users.committed(id)?.balance;
    if (committed !== undefined) {
      this.expect(`users.${id}.balance`, () => this.views.users.committed(id)?.balance === committed);
    }
    return true;
  }

  // ── Transactions ───────────────────────────────────────────────────

  async insertTransaction(entry: NewTransaction): Promise<Transaction | null> {
    if (this.views.transactions.all().some((t) => t.reference === entry.reference && t.kind === entry.kind)) {
      return null;
    }
    const inserted = this.views.transactions.insert((id) => ({ ...entry, id, created_at: this.now() }));
    this.expect(`transactions(${entry.reference}, ${entry.kind})`, () =>
      ![...this.tables.transactions.rows.values()].some(
        (t) => t.reference === entry.reference && t.kind === entry.kind && t.id !== inserted.id,
      ),
    );
    return inserted;
  }

  async findTransaction(reference: string, kind: TransactionKind): Promise<Transaction | null> {
    return this.views.transactions.all().find((t) => t.reference === reference && t.kind === kind) ?? null;
  }

  async listTransactionsByActor(actorId: number, limit?: number): Promise<Transaction[]> {
    const rows = this.views.transactions.all().filter((t) => t.actor_id === actorId).sort(byIdDesc);
    return limit === undefined ? rows : rows.slice(0, limit);
  }

  async listTransactionsByCampaign(campaignId: number): Promise<Transaction[]> {
    return this.views.transactions.all().filter((t) => t.campaign_id === campaignId).sort(byIdDesc);
  }

  async sumTransactions(actorId: number): Promise<number> {
    return this.views.transactions.all()
      .filter((t) => t.actor_id === actorId)
      .reduce((sum, t) => sum + t.amount, 0);
  }

  // ── Channels ───────────────────────────────────────────────────────

  async createChannel(channel: NewChannel): Promise<Channel> {
    if (this.views.channels.all().some((c) => c.telegram_channel_id === channel.telegram_channel_id)) {
      throw new Error(`duplicate key: channels.telegram_channel_id=${channel.telegram_channel_id}`);
    }
    const now = this.now();
    return this.views.channels.insert((id) => ({
      ...channel,
      id,
      state: 'unverified',
      subscribers: 0,
      bot_is_admin: false,
      last_checked_at: null,
      verified_at: null,
      created_at: now,
      updated_at: now,
    }));
  }

  async getChannel(id: number): Promise<Channel | null> {
    return this.views.channels.get(id) ?? null;
  }

  async getChannelByTelegramId(telegramChannelId: string): Promise<Channel | null> {
    return this.views.channels.all().find((c) => c.telegram_channel_id === telegramChannelId) ?? null;
  }

  async listChannelsByOwner(ownerId: number): Promise<Channel[]> {
    return this.views.channels.all().filter((c) => c.owner_id === ownerId).sort(byIdDesc);
  }

  async listChannelsByState(states: ChannelState[]): Promise<Channel[]> {
    return this.views.channels.all().filter((c) => states.includes(c.state));
  }

  async updateChannel(id: number, patch: ChannelPatch): Promise<Channel | null> {
    const channel = this.views.channels.get(id);
    if (!channel) return null;
    return this.views.channels.put({ ...channel, ...patch, updated_at: this.now() });
  }

  // ── Campaigns ──────────────────────────────────────────────────────

  async createCampaign(campaign: NewCampaign): Promise<Campaign> {
    const now = this.now();
    return this.views.campaigns.insert((id) => ({
      ...campaign,
      id,
      channel_id: null,
      placement_ref: null,
      failure_reason: null,
      created_at: now,
      updated_at: now,
      funded_at: null,
      accepted_at: null,
      posted_at: null,
      settled_at: null,
    }));
  }

  async getCampaign(id: number): Promise<Campaign | null> {
    return this.views.campaigns.get(id) ?? null;
  }

  async updateCampaignState(
    id: number,
    from: CampaignState,
    to: CampaignState,
    patch: CampaignPatch = {},
  ): Promise<Campaign | null> {
    const campaign = this.views.campaigns.get(id);
    if (!campaign || campaign.state !== from) return null;
    const committed = this.views.campaigns.committed(id)?.state;
    if (committed !== undefined) {
      this.expect(`campaigns.${id}.state`, () => this.views.campaigns.committed(id)?.state === committed);
    }
    return this.views.campaigns.put({ ...campaign, ...patch, state: to, updated_at: this.now() });
  }

  async listCampaignsByState(states: CampaignState[]): Promise<Campaign[]> {
    return this.views.campaigns.all().filter((c) => states.includes(c.state)).sort((a, b) => a.id - b.id);
  }

  async listCampaignsByAdvertiser(advertiserId: number): Promise<Campaign[]> {
    return this.views.campaigns.all().filter((c) => c.advertiser_id === advertiserId).sort(byIdDesc);
  }

  async listCampaignsByChannel(channelId: number, states: CampaignState[]): Promise<Campaign[]> {
    return this.views.campaigns.all()
      .filter((c) => c.channel_id === channelId && states.includes(c.state))
      .sort((a, b) => a.id - b.id);
  }

  async listCampaignsExpiringBefore(at: Date, states: CampaignState[]): Promise<Campaign[]> {
    return this.views.campaigns.all()
      .filter((c) => states.includes(c.state) && c.expires_at.getTime() <= at.getTime())
      .sort((a, b) => a.id - b.id);
  }

  // ── Escrow holds ───────────────────────────────────────────────────

  async createHold(campaignId: number, amount: number): Promise<EscrowHold> {
    const active = (rows: Iterable<EscrowHold>) =>
      [...rows].some((h) => h.campaign_id === campaignId && h.status === 'held');
    if (active(this.views.holds.all())) {
      throw new Error(`duplicate key: escrow_holds active hold for campaign ${campaignId}`);
    }
    this.expect(`escrow_holds(campaign ${campaignId})`, () => !active(this.tables.holds.rows.values()));
    return this.views.holds.insert((id) => ({
      id,
      campaign_id: campaignId,
      amount,
      status: 'held',
      created_at: this.now(),
      settled_at: null,
    }));
  }

  async getHold(id: number): Promise<EscrowHold | null> {
    return this.views.holds.get(id) ?? null;
  }

  async getHoldByCampaign(campaignId: number): Promise<EscrowHold | null> {
    return this.views.holds.all().filter((h) => h.campaign_id === campaignId).sort(byIdDesc)[0] ?? null;
  }

  async updateHoldStatus(id: number, from: HoldStatus, to: HoldStatus): Promise<EscrowHold | null> {
    const hold = this.views.holds.get(id);
    if (!hold || hold.status !== from) return null;
    const committed = this.views.holds.committed(id)?.status;
    if (committed !== undefined) {
      this.expect(`escrow_holds.${id}.status`, () => this.views.holds.committed(id)?.status === committed);
    }
    return this.views.holds.put({ ...hold, status: to, settled_at: this.now() });
  }

  // ── Exclusions ─────────────────────────────────────────────────────

  async addExclusion(campaignId: number, ownerId: number, reason: string): Promise<CampaignExclusion> {
    const existing = this.views.exclusions.all().find((e) => e.campaign_id === campaignId && e.owner_id === ownerId);
    if (existing) return existing;
    return this.views.exclusions.insert((id) => ({
      id,
      campaign_id: campaignId,
      owner_id: ownerId,
      reason,
      created_at: this.now(),
    }));
  }

  async listExclusions(campaignId: number): Promise<CampaignExclusion[]> {
    return this.views.exclusions.all().filter((e) => e.campaign_id === campaignId);
  }
}
