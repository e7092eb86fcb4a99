import type { Response } from 'express';
import type { CommandResult } from '../commands/index.js';
import type { PublicErrorKind } from '../shared/errors.js';

const STATUS_BY_KIND: Record<PublicErrorKind, number> = {
  InvalidInput: 400,
  InsufficientFunds: 402,
  Forbidden: 403,
  NotFound: 404,
  InvalidTransition: 409,
  AlreadyClaimed: 409,
  Expired: 410,
  VerificationFailed: 422,
  PlacementFailed: 502,
  Internal: 500,
};

export function statusFor(kind: PublicErrorKind): number {
  return STATUS_BY_KIND[kind];
}

/** Write a command result as JSON: the value on success, `{ error: { kind, message } }` otherwise. */
export function sendResult<T>(res: Response, result: CommandResult<T>, successStatus = 200): void {
  if (result.ok) {
    res.status(successStatus).json(result.value);
    return;
  }
  res.status(statusFor(result.error.kind)).json({ error: result.error });
}
