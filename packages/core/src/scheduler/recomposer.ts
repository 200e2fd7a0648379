/**
 * Recomposition Scheduler
 *
 * Cell writes ask for a pass; the scheduler coalesces every request made in
 * one task into a single pass. A request made while a pass is running is
 * deferred and served by another pass once the current one returns, never by
 * a nested one.
 */

import { Logger } from 'tessel-kernel';
import { ensureError } from 'tessel-shared';
import type { Scheduler } from '../composer/types';

const log = Logger.for('Recomposer');

export type SchedulerStrategy = 'microtask' | 'animation-frame' | 'manual';

export interface Recomposable {
  recompose(): void;
}

export interface RecomposerOptions {
  strategy?: SchedulerStrategy;
  /** Consecutive passes a single flush may run before giving up. Defaults to 10. */
  maxPassesPerFlush?: number;
}

export class Recomposer implements Scheduler {
  readonly strategy: SchedulerStrategy;
  private readonly maxPassesPerFlush: number;

  private pending = false;
  private scheduled = false;
  private running = false;
  private isDisposed = false;
  private passes = 0;
  private idleWaiters: (() => void)[] = [];

  constructor(
    private readonly target: Recomposable,
    options: RecomposerOptions = {},
  ) {
    this.strategy = options.strategy ?? 'microtask';
    this.maxPassesPerFlush = options.maxPassesPerFlush ?? 10;
  }

  /** Passes run since construction */
  get passCount(): number {
    return this.passes;
  }

  get isPending(): boolean {
    return this.pending;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Request a pass. Cheap to call repeatedly: at most one pass is queued.
   */
  schedule(): void {
    if (this.isDisposed) return;
    this.pending = true;
    if (this.running || this.scheduled || this.strategy === 'manual') return;

    this.scheduled = true;
    this.enqueue(() => {
      this.scheduled = false;
      this.flush();
    });
  }

  /**
   * Run pending passes now. No-op while a pass is running; the running flush
   * picks up the request itself.
   */
  flush(): void {
    if (this.running || this.isDisposed) return;

    this.running = true;
    let passes = 0;
    try {
      while (this.pending) {
        if (passes >= this.maxPassesPerFlush) {
          log.warn(
            { maxPassesPerFlush: this.maxPassesPerFlush },
            'Recomposition did not settle; dropping pending pass',
          );
          this.pending = false;
          break;
        }
        this.pending = false;
        passes++;
        this.passes++;
        try {
          this.target.recompose();
        } catch (error) {
          log.error({ err: ensureError(error) }, 'Recomposition pass failed');
        }
      }
    } finally {
      this.running = false;
      this.settle();
    }
  }

  /**
   * Resolves once no pass is pending or running.
   */
  whenIdle(): Promise<void> {
    if (!this.pending && !this.running) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  dispose(): void {
    this.isDisposed = true;
    this.pending = false;
    this.settle();
  }

  private settle(): void {
    if (this.pending && !this.isDisposed) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private enqueue(task: () => void): void {
    if (this.strategy === 'animation-frame' && typeof globalThis.requestAnimationFrame === 'function') {
      globalThis.requestAnimationFrame(() => task());
      return;
    }
    queueMicrotask(task);
  }
}
