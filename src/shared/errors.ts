export type EngineErrorKind =
  | 'InsufficientFunds'
  | 'InvalidTransition'
  | 'AlreadyClaimed'
  | 'VerificationFailed'
  | 'PlacementFailed'
  | 'Expired'
  | 'NotFound'
  | 'InvalidInput'
  | 'Forbidden';

export class EngineError extends Error {
  kind: EngineErrorKind;
  details?: unknown;

  constructor(kind: EngineErrorKind, message: string, details?: unknown) {
    super(message);
    this.kind = kind;
    this.details = details;
    this.name = 'EngineError';
  }
}

export class InsufficientFundsError extends EngineError {
  constructor(actorId: number, balance: number, requested: number) {
    super('InsufficientFunds', `User ${actorId} has ${balance}, needs ${requested}`, { actorId, balance, requested });
    this.name = 'InsufficientFundsError';
  }
}

export class InvalidTransitionError extends EngineError {
  constructor(message: string, details?: unknown) {
    super('InvalidTransition', message, details);
    this.name = 'InvalidTransitionError';
  }
}

export class AlreadyClaimedError extends EngineError {
  constructor(campaignId: number) {
    super('AlreadyClaimed', `Campaign ${campaignId} was already claimed`, { campaignId });
    this.name = 'AlreadyClaimedError';
  }
}

export class VerificationFailedError extends EngineError {
  constructor(message: string, details?: unknown) {
    super('VerificationFailed', message, details);
    this.name = 'VerificationFailedError';
  }
}

export class PlacementFailedError extends EngineError {
  constructor(campaignId: number, attempts: number) {
    super('PlacementFailed', `Campaign ${campaignId} could not be posted after ${attempts} attempts`, { campaignId, attempts });
    this.name = 'PlacementFailedError';
  }
}

export class ExpiredError extends EngineError {
  constructor(campaignId: number) {
    super('Expired', `Campaign ${campaignId} has expired`, { campaignId });
    this.name = 'ExpiredError';
  }
}

export class NotFoundError extends EngineError {
  constructor(entity: string, id: number | string) {
    super('NotFound', `${entity} ${id} not found`, { entity, id });
    this.name = 'NotFoundError';
  }
}

export class InvalidInputError extends EngineError {
  constructor(message: string, details?: unknown) {
    super('InvalidInput', message, details);
    this.name = 'InvalidInputError';
  }
}

export class ForbiddenError extends EngineError {
  constructor(message: string) {
    super('Forbidden', message);
    this.name = 'ForbiddenError';
  }
}

/**
 * Failure of a collaborator (transport, persistence contention) that may
 * succeed when retried. Never surfaced to users as-is.
 */
export class TransientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientError';
  }
}

export class TimeoutError extends TransientError {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

/** A compare-and-swap lost against a concurrent commit. */
export class ConcurrencyConflict extends TransientError {
  constructor(message: string) {
    super(message);
    this.name = 'ConcurrencyConflict';
  }
}

/** Transport failure that retrying cannot fix (e.g. the chat rejected the post). */
export class PermanentTransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PermanentTransportError';
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

export function isTransient(err: unknown): boolean {
  if (err instanceof TransientError) return true;
  if (err instanceof EngineError || err instanceof PermanentTransportError) return false;
  // Unclassified collaborator failures (network, driver) get another chance.
  return err instanceof Error;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export type PublicErrorKind = EngineErrorKind | 'Internal';

const USER_MESSAGES: Record<PublicErrorKind, string> = {
  InsufficientFunds: 'Your balance is too low for this budget. Top up and try again.',
  InvalidTransition: 'This action is not available for the campaign in its current state.',
  AlreadyClaimed: 'Another channel has already accepted this offer.',
  VerificationFailed: 'Channel verification failed. Make sure the bot is an admin of your channel and try again.',
  PlacementFailed: 'The ad could not be posted. The campaign has been offered to other channels.',
  Expired: 'This campaign has expired.',
  NotFound: 'We could not find what you were looking for.',
  InvalidInput: 'Some of the details you entered are not valid.',
  Forbidden: 'You are not allowed to do that.',
  Internal: 'Something went wrong on our side. Please try again later.',
};

export function userMessage(kind: PublicErrorKind): string {
  return USER_MESSAGES[kind];
}
