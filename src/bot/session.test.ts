import { describe, expect, it } from 'vitest';
import { SessionStore } from './session.js';

describe('SessionStore', () => {
  it('expires a session after its TTL without activity', () => {
    let now = 0;
    const sessions = new SessionStore<string>(1000, () => now);
    sessions.set(1, 'ad_text');

    now = 999;
    expect(sessions.get(1)).toBe('ad_text');
    now = 1000;
    expect(sessions.get(1)).toBeUndefined();
    expect(sessions.size).toBe(0);
  });

  it('sweeps only expired sessions', () => {
    let now = 0;
    const sessions = new SessionStore<string>(1000, () => now);
    sessions.set(1, 'old');
    now = 500;
    sessions.set(2, 'new');

    now = 1200;
    expect(sessions.sweep()).toBe(1);
    expect(sessions.get(2)).toBe('new');
  });
});
