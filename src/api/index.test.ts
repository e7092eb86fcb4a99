import crypto from 'crypto';
import type { Server } from 'http';
import { z } from 'zod';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp } from './index.js';
import { validateInitData } from './middleware/auth.js';
import { statusFor } from './errors.js';
import { createTestEngine, type TestHarness } from '../testing/harness.js';

const BOT_TOKEN = 'test-secret';

const campaignIdSchema = z.object({ id: z.number() });

function signInitData(user: Record<string, unknown>, botToken = BOT_TOKEN): string {
  const params = new URLSearchParams({ auth_date: '1700000000', user: JSON.stringify(user) });
  const dataCheckString = Array.from(params.entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${key}=${value}`)
    .join('\n');
  const secretKey = crypto.createHmac('sha256', 'WebAppData').update(botToken).digest();
  params.set('hash', crypto.createHmac('sha256', secretKey).update(dataCheckString).digest('hex'));
  return params.toString();
}

describe('validateInitData', () => {
  const user = { id: 4242, first_name: 'Test', username: 'tester' };

  it('accepts data signed with the bot token', () => {
    expect(validateInitData(signInitData(user), BOT_TOKEN)).toEqual(user);
  });

  it('rejects data signed with another token', () => {
    expect(validateInitData(signInitData(user, 'other-secret'), BOT_TOKEN)).toBeNull();
  });

  it('rejects data without a hash', () => {
    expect(validateInitData('user=%7B%7D', BOT_TOKEN)).toBeNull();
  });
});

describe('statusFor', () => {
  it.each([
    ['InsufficientFunds', 402],
    ['AlreadyClaimed', 409],
    ['Expired', 410],
    ['Internal', 500],
  ] as const)('maps %s to %i', (kind, status) => {
    expect(statusFor(kind)).toBe(status);
  });
});

describe('HTTP API', () => {
  let h: TestHarness;
  let server: Server;
  let baseUrl: string;
  const auth = { Authorization: `tma ${signInitData({ id: 4242, first_name: 'Test', username: 'tester' })}` };

  async function call(method: string, path: string, body?: unknown): Promise<{ status: number; body: unknown }> {
    const res = await fetch(`${baseUrl}${path}`, {
      method,
      headers: { ...auth, 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    return { status: res.status, body: await res.json() };
  }

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    h = createTestEngine();
    const app = createApp({ commands: h.engine.commands, botToken: BOT_TOKEN });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('server is not listening on a port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    h.engine.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    vi.restoreAllMocks();
  });

  it('answers health checks without auth', async () => {
    const res = await fetch(`${baseUrl}/api/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok' });
  });

  it('rejects requests without Mini App auth', async () => {
    const res = await fetch(`${baseUrl}/api/balance`);

    expect(res.status).toBe(401);
  });

  it('tops up and reports the balance for the signed-in user', async () => {
    const topUp = await call('POST', '/api/balance/topup', { amount: 700, reference: 'client-1' });
    const balance = await call('GET', '/api/balance');

    expect(topUp.status).toBe(201);
    expect(balance.status).toBe(200);
    expect(balance.body).toMatchObject({ balance: 700, transactions: [{ amount: 700, kind: 'topup' }] });
  });

  it('accepts the longest client reference that still fits the stored key', async () => {
    const longest = await call('POST', '/api/balance/topup', { amount: 10, reference: 'r'.repeat(173) });
    const tooLong = await call('POST', '/api/balance/topup', { amount: 10, reference: 'r'.repeat(174) });

    expect(longest.status).toBe(201);
    expect(tooLong.status).toBe(400);
  });

  it('creates and funds a campaign', async () => {
    await call('POST', '/api/balance/topup', { amount: 700, reference: 'client-1' });

    const created = await call('POST', '/api/campaigns', { adText: 'HTTP ad', budget: 300 });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({ state: 'draft', budget: 300 });

    const list = await call('GET', '/api/campaigns');
    const [campaign] = z.array(campaignIdSchema).parse(list.body);
    const funded = await call('POST', `/api/campaigns/${campaign.id}/fund`);

    expect(funded.status).toBe(200);
    expect(funded.body).toMatchObject({ state: 'offered' });
  });

  it('maps command errors to HTTP statuses', async () => {
    const created = await call('POST', '/api/campaigns', { adText: 'Unfunded ad', budget: 300 });
    const { id } = campaignIdSchema.parse(created.body);

    const funded = await call('POST', `/api/campaigns/${id}/fund`);
    const missing = await call('GET', '/api/campaigns/9999');
    const invalid = await call('POST', '/api/campaigns', { adText: '', budget: 0 });
    const badId = await call('GET', '/api/campaigns/abc');

    expect(funded.status).toBe(402);
    expect(funded.body).toMatchObject({ error: { kind: 'InsufficientFunds' } });
    expect(missing.status).toBe(404);
    expect(invalid.status).toBe(400);
    expect(badId.status).toBe(400);
  });
});
