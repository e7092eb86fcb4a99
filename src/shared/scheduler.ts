import { errorMessage } from './errors.js';

export type Task = () => Promise<void>;

/** Clock and delayed/periodic task execution with cancellation. */
export interface Scheduler {
  now(): Date;
  /** Run `task` once after `delayMs`. Replaces a pending task with the same key. */
  schedule(key: string, delayMs: number, task: Task): void;
  /** Run `task` every `intervalMs`. Replaces a pending task with the same key. */
  every(key: string, intervalMs: number, task: Task): void;
  cancel(key: string): boolean;
  has(key: string): boolean;
  /** Resolves after `ms`; rejects with the signal's reason when aborted first. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
  stop(): void;
}

type Handle =
  | { kind: 'timeout'; timer: NodeJS.Timeout }
  | { kind: 'interval'; timer: NodeJS.Timeout };

export class AbortedError extends Error {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'AbortedError';
  }
}

/**
 * Scheduler backed by Node timers. Each task is tracked by key so it can be
 * cancelled when the owning campaign leaves the state that justified it.
 */
export class TimerScheduler implements Scheduler {
  private handles = new Map<string, Handle>();

  constructor(private readonly tag = 'scheduler') {}

  now(): Date {
    return new Date();
  }

  schedule(key: string, delayMs: number, task: Task): void {
    this.cancel(key);
    const timer = setTimeout(() => {
      this.handles.delete(key);
      this.runTask(key, task);
    }, Math.max(0, delayMs));
    this.handles.set(key, { kind: 'timeout', timer });
  }

  every(key: string, intervalMs: number, task: Task): void {
    this.cancel(key);
    let running = false;
    const timer = setInterval(() => {
      // Skip a tick while the previous run is still in flight.
      if (running) return;
      running = true;
      this.runTask(key, task, () => {
        running = false;
      });
    }, intervalMs);
    this.handles.set(key, { kind: 'interval', timer });
  }

  cancel(key: string): boolean {
    const handle = this.handles.get(key);
    if (!handle) return false;
    if (handle.kind === 'interval') {
      clearInterval(handle.timer);
    } else {
      clearTimeout(handle.timer);
    }
    this.handles.delete(key);
    return true;
  }

  has(key: string): boolean {
    return this.handles.has(key);
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new AbortedError());
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        reject(new AbortedError());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, Math.max(0, ms));
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  stop(): void {
    for (const key of [...this.handles.keys()]) {
      this.cancel(key);
    }
  }

  private runTask(key: string, task: Task, done?: () => void): void {
    void task()
      .catch((err) => {
        console.error(`[${this.tag}] Task ${key} failed:`, errorMessage(err));
      })
      .finally(() => done?.());
  }
}
