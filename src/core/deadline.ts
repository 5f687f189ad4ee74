import { RunTimeoutError } from '../utils/error-handler.js';

/**
 * One wall-clock budget for a whole run. Every step asks it how much time is
 * left instead of carrying its own timeout, so per-step allowances can never
 * add up to more than the caller granted.
 */
export class Deadline {
  readonly startedAt: number;
  readonly expiresAt: number;
  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout;
  private readonly watchers = new Set<NodeJS.Timeout>();

  constructor(readonly budgetMs: number) {
    this.startedAt = Date.now();
    this.expiresAt = this.startedAt + budgetMs;
    this.timer = setTimeout(() => this.abort('Run deadline reached'), budgetMs);
    this.timer.unref();
  }

  /** Aborted once the budget is spent (or the owner gives up early). */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  elapsedMs(): number {
    return Date.now() - this.startedAt;
  }

  remainingMs(): number {
    return Math.max(0, this.expiresAt - Date.now());
  }

  expired(): boolean {
    return this.controller.signal.aborted || this.remainingMs() === 0;
  }

  throwIfExpired(step: string): void {
    if (this.expired()) {
      throw new RunTimeoutError(`Run deadline reached before ${step}`, { budgetMs: this.budgetMs });
    }
  }

  /**
   * Timeout for a single network call: its own allowance, clipped to what is
   * left of the run.
   */
  callTimeout(perCallMs: number, step: string): number {
    this.throwIfExpired(step);
    return Math.max(1, Math.min(perCallMs, this.remainingMs()));
  }

  /** Resolves true after `ms`, or false as soon as the deadline aborts. */
  sleep(ms: number): Promise<boolean> {
    if (this.expired()) return Promise.resolve(false);

    return new Promise(resolve => {
      const signal = this.controller.signal;
      const onAbort = () => {
        clearTimeout(timer);
        resolve(false);
      };
      const timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort);
        resolve(!this.expired());
      }, Math.min(ms, this.remainingMs()));
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Resolves once the budget plus `graceMs` has passed; never resolves after dispose(). */
  whenOverrun(graceMs: number): Promise<void> {
    return new Promise(resolve => {
      const overrun = setTimeout(() => {
        this.watchers.delete(overrun);
        resolve();
      }, this.remainingMs() + graceMs);
      overrun.unref();
      this.watchers.add(overrun);
    });
  }

  abort(reason: string): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(new RunTimeoutError(reason, { budgetMs: this.budgetMs }));
    }
  }

  dispose(): void {
    clearTimeout(this.timer);
    for (const watcher of this.watchers) {
      clearTimeout(watcher);
    }
    this.watchers.clear();
  }
}
