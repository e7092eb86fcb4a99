// Campaign state union: all campaign state transitions go through src/escrow/
export type CampaignState =
  | 'draft'
  | 'pending_funding'
  | 'funded'
  | 'offered'
  | 'accepted'
  | 'posted'
  | 'confirmed'
  | 'cancelled'
  | 'refunded'
  | 'expired';

export type UserRole = 'advertiser' | 'channel_owner' | 'both';
export type ChannelState = 'unverified' | 'pending' | 'verified' | 'revoked';
export type HoldStatus = 'held' | 'released' | 'refunded';
export type TransactionKind = 'debit-escrow' | 'credit-payout' | 'refund' | 'topup';
export type CreditKind = Exclude<TransactionKind, 'debit-escrow'>;

/** Terminal outcomes that return held funds to the advertiser. */
export type RefundOutcome = 'cancelled' | 'expired' | 'refunded';

export interface User {
  id: number;
  telegram_id: number;
  username: string | null;
  role: UserRole;
  balance: number;
  is_active: boolean;
  created_at: Date;
}

export interface Channel {
  id: number;
  owner_id: number;
  telegram_channel_id: string;
  title: string | null;
  state: ChannelState;
  subscribers: number;
  trust_score: number;
  bot_is_admin: boolean;
  last_checked_at: Date | null;
  verified_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface Campaign {
  id: number;
  advertiser_id: number;
  ad_text: string;
  budget: number;
  duration_hours: number;
  state: CampaignState;
  channel_id: number | null;
  placement_ref: string | null;
  failure_reason: string | null;
  created_at: Date;
  updated_at: Date;
  funded_at: Date | null;
  accepted_at: Date | null;
  posted_at: Date | null;
  settled_at: Date | null;
  expires_at: Date;
}

export interface EscrowHold {
  id: number;
  campaign_id: number;
  amount: number;
  status: HoldStatus;
  created_at: Date;
  settled_at: Date | null;
}

export interface Transaction {
  id: number;
  actor_id: number;
  amount: number;
  kind: TransactionKind;
  reference: string;
  campaign_id: number | null;
  hold_id: number | null;
  created_at: Date;
}

export interface CampaignExclusion {
  id: number;
  campaign_id: number;
  owner_id: number;
  reason: string;
  created_at: Date;
}

export type CampaignPatch = Partial<Pick<
  Campaign,
  'channel_id' | 'placement_ref' | 'failure_reason' | 'funded_at' | 'accepted_at' | 'posted_at' | 'settled_at'
>>;

export type ChannelPatch = Partial<Pick<
  Channel,
  'title' | 'state' | 'subscribers' | 'trust_score' | 'bot_is_admin' | 'last_checked_at' | 'verified_at'
>>;

export interface NewCampaign {
  advertiser_id: number;
  ad_text: string;
  budget: number;
  duration_hours: number;
  state: CampaignState;
  expires_at: Date;
}

export interface NewTransaction {
  actor_id: number;
  amount: number;
  kind: TransactionKind;
  reference: string;
  campaign_id: number | null;
  hold_id: number | null;
}

export interface NewChannel {
  owner_id: number;
  telegram_channel_id: string;
  title: string | null;
  trust_score: number;
}

/** Emitted after a campaign transition has been committed. */
export interface CampaignTransition {
  campaign: Campaign;
  from: CampaignState;
  to: CampaignState;
}
