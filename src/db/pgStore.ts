import type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
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

// BIGINT columns come back from pg as strings.
type Bigint = string | number;

interface UserRow extends Omit<User, 'telegram_id' | 'balance'> {
  telegram_id: Bigint;
  balance: Bigint;
}

interface ChannelRow extends Omit<Channel, 'subscribers'> {
  subscribers: Bigint;
}

// NUMERIC comes back as a string too.
interface CampaignRow extends Omit<Campaign, 'budget' | 'duration_hours'> {
  budget: Bigint;
  duration_hours: string | number;
}

interface HoldRow extends Omit<EscrowHold, 'amount'> {
  amount: Bigint;
}

interface TransactionRow extends Omit<Transaction, 'amount'> {
  amount: Bigint;
}

const toUser = (row: UserRow): User => ({ ...row, telegram_id: Number(row.telegram_id), balance: Number(row.balance) });
const toChannel = (row: ChannelRow): Channel => ({ ...row, subscribers: Number(row.subscribers) });
const toCampaign = (row: CampaignRow): Campaign => ({
  ...row,
  budget: Number(row.budget),
  duration_hours: Number(row.duration_hours),
});
const toHold = (row: HoldRow): EscrowHold => ({ ...row, amount: Number(row.amount) });
const toTransaction = (row: TransactionRow): Transaction => ({ ...row, amount: Number(row.amount) });

const CAMPAIGN_PATCH_COLUMNS: ReadonlyArray<keyof CampaignPatch> = [
  'channel_id', 'placement_ref', 'failure_reason', 'funded_at', 'accepted_at', 'posted_at', 'settled_at',
];

const CHANNEL_PATCH_COLUMNS: ReadonlyArray<keyof ChannelPatch> = [
  'title', 'state', 'subscribers', 'trust_score', 'bot_is_admin', 'last_checked_at', 'verified_at',
];

// Serialization failure and deadlock: safe to retry the whole transaction.
const RETRYABLE_PG_CODES = new Set(['40001', '40P01']);

function pgErrorCode(err: unknown): string | null {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}

/**
 * Build `SET a = $n, b = $n+1` clauses for the keys present in `patch`,
 * restricted to `columns`.
 */
function setClauses<P extends object>(
  patch: P,
  columns: ReadonlyArray<keyof P>,
  values: unknown[],
): string[] {
  const clauses: string[] = [];
  for (const column of columns) {
    const value = patch[column];
    if (value === undefined) continue;
    values.push(value);
    clauses.push(`${String(column)} = $${values.length}`);
  }
  return clauses;
}

export class PgStore implements Store {
  constructor(
    private readonly pool: Pool,
    private readonly client: PoolClient | null = null,
  ) {}

  private query<R extends QueryResultRow>(text: string, values: unknown[] = []): Promise<QueryResult<R>> {
    return this.client ? this.client.query<R>(text, values) : this.pool.query<R>(text, values);
  }

  async transaction<T>(fn: (tx: Store) => Promise<T>): Promise<T> {
    if (this.client) return fn(this);

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await fn(new PgStore(this.pool, client));
      await client.query('COMMIT');
      return result;
    } catch (err) {
      await client.query('ROLLBACK');
      const code = pgErrorCode(err);
      if (code && RETRYABLE_PG_CODES.has(code)) {
        throw new ConcurrencyConflict(`Transaction aborted by database (${code})`);
      }
      throw err;
    } finally {
      client.release();
    }
  }

  // ── Users ──────────────────────────────────────────────────────────

  async createUser(telegramId: number, username: string | null, role: UserRole): Promise<User> {
    const { rows } = await this.query<UserRow>(
      `INSERT INTO users (telegram_id, username, role)
       VALUES ($1, $2, $3)
       RETURNING *`,
      [telegramId, username, role],
    );
    return toUser(rows[0]);
  }

  async getUser(id: number): Promise<User | null> {
    const { rows } = await this.query<UserRow>('SELECT * FROM users WHERE id = $1', [id]);
    return rows[0] ? toUser(rows[0]) : null;
  }

  async getUserByTelegramId(telegramId: number): Promise<User | null> {
    const { rows } = await this.query<UserRow>('SELECT * FROM users WHERE telegram_id = $1', [telegramId]);
    return rows[0] ? toUser(rows[0]) : null;
  }

  async lockUser(id: number): Promise<User | null> {
    const { rows } = await this.query<UserRow>('SELECT * FROM users WHERE id = $1 FOR UPDATE', [id]);
    return rows[0] ? toUser(rows[0]) : null;
  }

  async updateUser(id: number, patch: Partial<Pick<User, 'username' | 'role' | 'is_active'>>): Promise<User | null> {
    const values: unknown[] = [id];
    const clauses = setClauses(patch, ['username', 'role', 'is_active'], values);
    if (clauses.length === 0) return this.getUser(id);
    const { rows } = await this.query<UserRow>(
      `UPDATE users SET ${clauses.join(', ')} WHERE id = $1 RETURNING *`,
      values,
    );
    return rows[0] ? toUser(rows[0]) : null;
  }

  async setUserBalance(id: number, expected: number, next: number): Promise<boolean> {
    const { rowCount } = await this.query(
      'UPDATE users SET balance = $3 WHERE id = $1 AND balance = $2',
      [id, expected, next],
    );
    return (rowCount ?? 0) > 0;
  }

  // ── Transactions ───────────────────────────────────────────────────

  async insertTransaction(entry: NewTransaction): Promise<Transaction | null> {
    const { rows } = await this.query<TransactionRow>(
      `INSERT INTO transactions (actor_id, amount, kind, reference, campaign_id, hold_id)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (reference, kind) DO NOTHING
       RETURNING *`,
      [entry.actor_id, entry.amount, entry.kind, entry.reference, entry.campaign_id, entry.hold_id],
    );
    return rows[0] ? toTransaction(rows[0]) : null;
  }

  async findTransaction(reference: string, kind: TransactionKind): Promise<Transaction | null> {
    const { rows } = await this.query<TransactionRow>(
      'SELECT * FROM transactions WHERE reference = $1 AND kind = $2',
      [reference, kind],
    );
    return rows[0] ? toTransaction(rows[0]) : null;
  }

  async listTransactionsByActor(actorId: number, limit = 50): Promise<Transaction[]> {
    const { rows } = await this.query<TransactionRow>(
      'SELECT * FROM transactions WHERE actor_id = $1 ORDER BY id DESC LIMIT $2',
      [actorId, limit],
    );
    return rows.map(toTransaction);
  }

  async listTransactionsByCampaign(campaignId: number): Promise<Transaction[]> {
    const { rows } = await this.query<TransactionRow>(
      'SELECT * FROM transactions WHERE campaign_id = $1 ORDER BY id DESC',
      [campaignId],
    );
    return rows.map(toTransaction);
  }

  async sumTransactions(actorId: number): Promise<number> {
    const { rows } = await this.query<{ total: Bigint }>(
      'SELECT COALESCE(SUM(amount), 0) AS total FROM transactions WHERE actor_id = $1',
      [actorId],
    );
    return Number(rows[0]?.total ?? 0);
  }

  // ── Channels ───────────────────────────────────────────────────────

  async createChannel(channel: NewChannel): Promise<Channel> {
    const { rows } = await this.query<ChannelRow>(
      `INSERT INTO channels (owner_id, telegram_channel_id, title, trust_score)
       VALUES ($1, $2, $3, $4)
       RETURNING *`,
      [channel.owner_id, channel.telegram_channel_id, channel.title, channel.trust_score],
    );
    return toChannel(rows[0]);
  }

  async getChannel(id: number): Promise<Channel | null> {
    const { rows } = await this.query<ChannelRow>('SELECT * FROM channels WHERE id = $1', [id]);
    return rows[0] ? toChannel(rows[0]) : null;
  }

  async getChannelByTelegramId(telegramChannelId: string): Promise<Channel | null> {
    const { rows } = await this.query<ChannelRow>(
      'SELECT * FROM channels WHERE telegram_channel_id = $1',
      [telegramChannelId],
    );
    return rows[0] ? toChannel(rows[0]) : null;
  }

  async listChannelsByOwner(ownerId: number): Promise<Channel[]> {
    const { rows } = await this.query<ChannelRow>(
      'SELECT * FROM channels WHERE owner_id = $1 ORDER BY id DESC',
      [ownerId],
    );
    return rows.map(toChannel);
  }

  async listChannelsByState(states: ChannelState[]): Promise<Channel[]> {
    const { rows } = await this.query<ChannelRow>(
      'SELECT * FROM channels WHERE state = ANY($1::text[]) ORDER BY id',
      [states],
    );
    return rows.map(toChannel);
  }

  async updateChannel(id: number, patch: ChannelPatch): Promise<Channel | null> {
    const values: unknown[] = [id];
    const clauses = setClauses(patch, CHANNEL_PATCH_COLUMNS, values);
    clauses.push('updated_at = NOW()');
    const { rows } = await this.query<ChannelRow>(
      `UPDATE channels SET ${clauses.join(', ')} WHERE id = $1 RETURNING *`,
      values,
    );
    return rows[0] ? toChannel(rows[0]) : null;
  }

  // ── Campaigns ──────────────────────────────────────────────────────

  async createCampaign(campaign: NewCampaign): Promise<Campaign> {
    const { rows } = await this.query<CampaignRow>(
      `INSERT INTO campaigns (advertiser_id, ad_text, budget, duration_hours, state, expires_at)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING *`,
      [campaign.advertiser_id, campaign.ad_text, campaign.budget, campaign.duration_hours, campaign.state, campaign.expires_at],
    );
    return toCampaign(rows[0]);
  }

  async getCampaign(id: number): Promise<Campaign | null> {
    const { rows } = await this.query<CampaignRow>('SELECT * FROM campaigns WHERE id = $1', [id]);
    return rows[0] ? toCampaign(rows[0]) : null;
  }

  async updateCampaignState(
    id: number,
    from: CampaignState,
    to: CampaignState,
    patch: CampaignPatch = {},
  ): Promise<Campaign | null> {
    const values: unknown[] = [id, from, to];
    const clauses = ['state = $3', 'updated_at = NOW()', ...setClauses(patch, CAMPAIGN_PATCH_COLUMNS, values)];

    // WHERE state = $2 is the compare-and-swap: a concurrent writer leaves zero rows.
    const { rows } = await this.query<CampaignRow>(
      `UPDATE campaigns
       SET ${clauses.join(', ')}
       WHERE id = $1 AND state = $2
       RETURNING *`,
      values,
    );
    return rows[0] ? toCampaign(rows[0]) : null;
  }

  async listCampaignsByState(states: CampaignState[]): Promise<Campaign[]> {
    const { rows } = await this.query<CampaignRow>(
      'SELECT * FROM campaigns WHERE state = ANY($1::text[]) ORDER BY id',
      [states],
    );
    return rows.map(toCampaign);
  }

  async listCampaignsByAdvertiser(advertiserId: number): Promise<Campaign[]> {
    const { rows } = await this.query<CampaignRow>(
      'SELECT * FROM campaigns WHERE advertiser_id = $1 ORDER BY id DESC',
      [advertiserId],
    );
    return rows.map(toCampaign);
  }

  async listCampaignsByChannel(channelId: number, states: CampaignState[]): Promise<Campaign[]> {
    const { rows } = await this.query<CampaignRow>(
      'SELECT * FROM campaigns WHERE channel_id = $1 AND state = ANY($2::text[]) ORDER BY id',
      [channelId, states],
    );
    return rows.map(toCampaign);
  }

  async listCampaignsExpiringBefore(at: Date, states: CampaignState[]): Promise<Campaign[]> {
    const { rows } = await this.query<CampaignRow>(
      `SELECT * FROM campaigns
       WHERE state = ANY($2::text[])
       AND expires_at <= $1
       ORDER BY id`,
      [at, states],
    );
    return rows.map(toCampaign);
  }

  // ── Escrow holds ───────────────────────────────────────────────────

  async createHold(campaignId: number, amount: number): Promise<EscrowHold> {
    const { rows } = await this.query<HoldRow>(
      `INSERT INTO escrow_holds (campaign_id, amount)
       VALUES ($1, $2)
       RETURNING *`,
      [campaignId, amount],
    );
    return toHold(rows[0]);
  }

  async getHold(id: number): Promise<EscrowHold | null> {
    const { rows } = await this.query<HoldRow>('SELECT * FROM escrow_holds WHERE id = $1', [id]);
    return rows[0] ? toHold(rows[0]) : null;
  }

  async getHoldByCampaign(campaignId: number): Promise<EscrowHold | null> {
    const { rows } = await this.query<HoldRow>(
      'SELECT * FROM escrow_holds WHERE campaign_id = $1 ORDER BY id DESC LIMIT 1',
      [campaignId],
    );
    return rows[0] ? toHold(rows[0]) : null;
  }

  async updateHoldStatus(id: number, from: HoldStatus, to: HoldStatus): Promise<EscrowHold | null> {
    const { rows } = await this.query<HoldRow>(
      `UPDATE escrow_holds
       SET status = $3, settled_at = NOW()
       WHERE id = $1 AND status = $2
       RETURNING *`,
      [id, from, to],
    );
    return rows[0] ? toHold(rows[0]) : null;
  }

  // ── Exclusions ─────────────────────────────────────────────────────

  async addExclusion(campaignId: number, ownerId: number, reason: string): Promise<CampaignExclusion> {
    const { rows } = await this.query<CampaignExclusion>(
      `INSERT INTO campaign_exclusions (campaign_id, owner_id, reason)
       VALUES ($1, $2, $3)
       ON CONFLICT (campaign_id, owner_id) DO UPDATE SET reason = campaign_exclusions.reason
       RETURNING *`,
      [campaignId, ownerId, reason],
    );
    return rows[0];
  }

  async listExclusions(campaignId: number): Promise<CampaignExclusion[]> {
    const { rows } = await this.query<CampaignExclusion>(
      'SELECT * FROM campaign_exclusions WHERE campaign_id = $1 ORDER BY id',
      [campaignId],
    );
    return rows;
  }
}
