import { errorMessage } from './errors.js';
import logger from './logger.js';

// setTimeout overflows past 2^31-1 ms; longer waits are re-armed in steps.
const MAX_TIMER_MS = 2_147_483_647;

export type DeadlineCallback = (jobId: string) => void | Promise<void>;

interface Entry {
  deadline: number;
  timer: NodeJS.Timeout;
}

/**
 * One timer per job. `extend` re-arms the job's timer, `clear` forgets it.
 * Firing removes the entry before the callback runs.
 */
export class TimeoutScheduler {
  private readonly entries = new Map<string, Entry>();
  private readonly onExpire: DeadlineCallback;
  private readonly now: () => number;

  constructor(onExpire: DeadlineCallback, now: () => number = Date.now) {
    this.onExpire = onExpire;
    this.now = now;
  }

  schedule(jobId: string, deadline: number): void {
    this.clear(jobId);
    this.arm(jobId, deadline);
  }

  /** Moves an armed deadline; returns false when nothing is armed for the job. */
  extend(jobId: string, deadline: number): boolean {
    if (!this.entries.has(jobId)) {
      return false;
    }
    this.schedule(jobId, deadline);
    return true;
  }

  clear(jobId: string): void {
    const entry = this.entries.get(jobId);
    if (entry) {
      clearTimeout(entry.timer);
      this.entries.delete(jobId);
    }
  }

  clearAll(): void {
    for (const entry of this.entries.values()) {
      clearTimeout(entry.timer);
    }
    this.entries.clear();
  }

  private arm(jobId: string, deadline: number): void {
    const delay = Math.max(0, deadline - this.now());
    const timer = setTimeout(() => this.fire(jobId, deadline), Math.min(delay, MAX_TIMER_MS));
    timer.unref();
    this.entries.set(jobId, { deadline, timer });
  }

  private fire(jobId: string, deadline: number): void {
    const entry = this.entries.get(jobId);
    if (!entry || entry.deadline !== deadline) {
      return;
    }
    if (this.now() < deadline) {
      this.arm(jobId, deadline);
      return;
    }
    this.entries.delete(jobId);
    Promise.resolve()
      .then(() => this.onExpire(jobId))
      .catch((err: unknown) => {
        logger.error('deadline handler failed', { jobId, error: errorMessage(err) });
      });
  }
}
