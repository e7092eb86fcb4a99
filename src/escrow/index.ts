import { InvalidTransitionError } from '../shared/errors.js';
import type { CampaignState, RefundOutcome } from '../shared/types.js';

// Valid state transitions: enforced here and nowhere else
const VALID_TRANSITIONS: Record<CampaignState, CampaignState[]> = {
  draft: ['pending_funding', 'cancelled'],
  pending_funding: ['funded', 'cancelled'],
  funded: ['offered', 'expired', 'cancelled'],
  offered: ['accepted', 'expired', 'cancelled'],
  accepted: ['posted', 'offered', 'expired', 'cancelled'],
  posted: ['confirmed', 'refunded'],
  confirmed: [],
  cancelled: [],
  refunded: [],
  expired: [],
};

export const CAMPAIGN_STATES: CampaignState[] = [
  'draft', 'pending_funding', 'funded', 'offered', 'accepted',
  'posted', 'confirmed', 'cancelled', 'refunded', 'expired',
];

/**
 * States a campaign may be settled from, per outcome. An advertiser cancels
 * before acceptance; losing a channel after acceptance passes `['accepted']`.
 */
export const SETTLEMENT_SOURCES: Record<RefundOutcome, readonly CampaignState[]> = {
  cancelled: ['draft', 'pending_funding', 'funded', 'offered'],
  expired: ['funded', 'offered', 'accepted'],
  refunded: ['posted'],
};

export function canTransition(from: CampaignState, to: CampaignState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: CampaignState, to: CampaignState): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(`Invalid campaign transition: ${from} → ${to}`, { from, to });
  }
}

export function isTerminal(state: CampaignState): boolean {
  return VALID_TRANSITIONS[state].length === 0;
}
