interface Entry<T> {
  value: T;
  expiresAt: number;
}

/**
 * Per-user dialogue progress with a sliding TTL. Kept apart from campaign
 * state: losing a session only loses the half-typed input.
 */
export class SessionStore<T> {
  private entries = new Map<number, Entry<T>>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = () => Date.now(),
  ) {}

  get(userId: number): T | undefined {
    const entry = this.entries.get(userId);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(userId);
      return undefined;
    }
    return entry.value;
  }

  set(userId: number, value: T): void {
    this.entries.set(userId, { value, expiresAt: this.now() + this.ttlMs });
  }

  delete(userId: number): boolean {
    return this.entries.delete(userId);
  }

  /** Drop expired sessions; returns how many were removed. */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [userId, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(userId);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}
