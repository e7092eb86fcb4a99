import { describe, expect, it } from 'vitest';
import { GrammyError, HttpError } from 'grammy';
import { classifyTelegramError, formatPlacementRef, parsePlacementRef } from './admin.js';
import { PermanentTransportError } from '../shared/errors.js';

function telegramError(code: number, description: string): GrammyError {
  return new GrammyError(
    `Call to 'sendMessage' failed! (${code}: ${description})`,
    { ok: false, error_code: code, description },
    'sendMessage',
    {},
  );
}

describe('classifyTelegramError', () => {
  it.each([
    [429, 'Too Many Requests: retry after 5', true],
    [502, 'Bad Gateway', true],
    [400, 'Bad Request: chat not found', false],
    [403, 'Forbidden: bot was kicked from the channel chat', false],
  ])('treats %i (%s) as transient=%s', (code, description, transient) => {
    expect(classifyTelegramError(telegramError(code, description)).transient).toBe(transient);
  });

  it('treats network failures as transient', () => {
    const err = new HttpError('Network request for sendMessage failed!', new Error('ECONNRESET'));

    expect(classifyTelegramError(err)).toEqual({
      transient: true,
      reason: 'network/http error: Network request for sendMessage failed!',
    });
  });
});

describe('placement references', () => {
  it('round-trips a chat and message id', () => {
    expect(parsePlacementRef(formatPlacementRef('-1001234', 42))).toEqual({ chatId: '-1001234', messageId: 42 });
  });

  it('rejects a malformed reference', () => {
    expect(() => parsePlacementRef('garbage')).toThrow(PermanentTransportError);
  });
});
