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

/**
 * Persistence capability consumed by the engine. Every mutating call made
 * through the `tx` handed to `transaction()` commits or rolls back as a unit.
 *
 * The `update*` methods taking an expected state/status are compare-and-swap:
 * they return `null` when the stored value no longer matches.
 */
export interface Store {
  transaction<T>(fn: (tx: Store) => Promise<T>): Promise<T>;

  // ── Users ──────────────────────────────────────────────────────────
  createUser(telegramId: number, username: string | null, role: UserRole): Promise<User>;
  getUser(id: number): Promise<User | null>;
  getUserByTelegramId(telegramId: number): Promise<User | null>;
  /** Read a user row for update; inside a transaction the row stays locked until commit. */
  lockUser(id: number): Promise<User | null>;
  updateUser(id: number, patch: Partial<Pick<User, 'username' | 'role' | 'is_active'>>): Promise<User | null>;
  setUserBalance(id: number, expected: number, next: number): Promise<boolean>;

  // ── Transactions (ledger entries) ──────────────────────────────────
  /** Null when a transaction with the same reference and kind already exists. */
  insertTransaction(entry: NewTransaction): Promise<Transaction | null>;
  findTransaction(reference: string, kind: TransactionKind): Promise<Transaction | null>;
  listTransactionsByActor(actorId: number, limit?: number): Promise<Transaction[]>;
  listTransactionsByCampaign(campaignId: number): Promise<Transaction[]>;
  sumTransactions(actorId: number): Promise<number>;

  // ── Channels ───────────────────────────────────────────────────────
  createChannel(channel: NewChannel): Promise<Channel>;
  getChannel(id: number): Promise<Channel | null>;
  getChannelByTelegramId(telegramChannelId: string): Promise<Channel | null>;
  listChannelsByOwner(ownerId: number): Promise<Channel[]>;
  listChannelsByState(states: ChannelState[]): Promise<Channel[]>;
  updateChannel(id: number, patch: ChannelPatch): Promise<Channel | null>;

  // ── Campaigns ──────────────────────────────────────────────────────
  createCampaign(campaign: NewCampaign): Promise<Campaign>;
  getCampaign(id: number): Promise<Campaign | null>;
  updateCampaignState(id: number, from: CampaignState, to: CampaignState, patch?: CampaignPatch): Promise<Campaign | null>;
  listCampaignsByState(states: CampaignState[]): Promise<Campaign[]>;
  listCampaignsByAdvertiser(advertiserId: number): Promise<Campaign[]>;
  listCampaignsByChannel(channelId: number, states: CampaignState[]): Promise<Campaign[]>;
  listCampaignsExpiringBefore(at: Date, states: CampaignState[]): Promise<Campaign[]>;

  // ── Escrow holds ───────────────────────────────────────────────────
  createHold(campaignId: number, amount: number): Promise<EscrowHold>;
  getHold(id: number): Promise<EscrowHold | null>;
  getHoldByCampaign(campaignId: number): Promise<EscrowHold | null>;
  updateHoldStatus(id: number, from: HoldStatus, to: HoldStatus): Promise<EscrowHold | null>;

  // ── Exclusions ─────────────────────────────────────────────────────
  addExclusion(campaignId: number, ownerId: number, reason: string): Promise<CampaignExclusion>;
  listExclusions(campaignId: number): Promise<CampaignExclusion[]>;
}
