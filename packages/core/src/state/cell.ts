/**
 * State cells: observable values that drive recomposition.
 *
 * A read inside a component body subscribes the node being composed; a write
 * that changes the value notifies every subscriber, which marks its node dirty
 * and asks the scheduler for a pass.
 *
 * @example
 * ```typescript
 * const count = cell(0, { name: 'count' });
 *
 * const Counter = () => <span>{count.value}</span>;
 *
 * count.set(1);
 * count.update((n) => n + 1);
 *
 * batch(() => {
 *   count.set(10);
 *   label.set('ten');
 *   // subscribers are notified once, here
 * });
 * ```
 */

import { Logger } from 'tessel-kernel';
import { ReactivityError } from 'tessel-shared';
import { currentObserver } from './tracking';
import type { CellObserver, ReactiveSource } from './tracking';

const log = Logger.for('StateCell');

/**
 * The node that created a cell. Only the two fields the cell needs.
 */
export interface CellOwner {
  readonly id: number;
  readonly disposed: boolean;
}

export interface CellOptions<T> {
  /** Name for debugging and log lines */
  name?: string;
  /** Custom equality; writes of an equal value are ignored. Defaults to `Object.is`. */
  equals?: (previous: T, next: T) => boolean;
  owner?: CellOwner;
}

// ============================================================================
// Batching
// ============================================================================

let batchDepth = 0;
const pendingObservers = new Set<CellObserver>();

/**
 * Coalesce writes. Observers touched inside `fn` are notified once, when the
 * outermost batch ends.
 */
export function batch<T>(fn: () => T): T {
  batchDepth++;
  try {
    return fn();
  } finally {
    batchDepth--;
    if (batchDepth === 0) {
      const observers = [...pendingObservers];
      pendingObservers.clear();
      for (const observer of observers) {
        observer.notify();
      }
    }
  }
}

// ============================================================================
// StateCell
// ============================================================================

export class StateCell<T> implements ReactiveSource {
  readonly name: string | undefined;
  readonly owner: CellOwner | undefined;

  private current: T;
  private isDisposed = false;
  private readonly observers = new Set<CellObserver>();
  private readonly equals: (previous: T, next: T) => boolean;

  constructor(initial: T, options: CellOptions<T> = {}) {
    this.current = initial;
    this.name = options.name;
    this.owner = options.owner;
    this.equals = options.equals ?? Object.is;
  }

  get value(): T {
    return this.get();
  }

  set value(next: T) {
    this.set(next);
  }

  get disposed(): boolean {
    return this.isDisposed;
  }

  get subscriberCount(): number {
    return this.observers.size;
  }

  /**
   * Read and subscribe the node being composed, if any.
   */
  get(): T {
    const observer = currentObserver();
    if (observer && !this.isDisposed) {
      this.observers.add(observer);
      observer.track(this);
    }
    return this.current;
  }

  /** Read without subscribing */
  peek(): T {
    return this.current;
  }

  set(next: T): void {
    if (this.isDisposed || this.owner?.disposed) {
      log.warn(
        { err: ReactivityError.disposed(this.name, this.owner?.id), cell: this.name },
        'Write to disposed state cell dropped',
      );
      return;
    }
    if (this.equals(this.current, next)) return;
    this.current = next;
    this.notifyObservers();
  }

  update(fn: (current: T) => T): void {
    this.set(fn(this.current));
  }

  unsubscribe(observer: CellObserver): void {
    this.observers.delete(observer);
  }

  /**
   * Detach all subscribers. The last value stays readable; later writes are
   * dropped.
   */
  dispose(): void {
    this.isDisposed = true;
    this.observers.clear();
  }

  private notifyObservers(): void {
    const observers = [...this.observers];
    if (batchDepth > 0) {
      for (const observer of observers) pendingObservers.add(observer);
      return;
    }
    for (const observer of observers) {
      observer.notify();
    }
  }
}

export function cell<T>(initial: T, options?: CellOptions<T>): StateCell<T> {
  return new StateCell(initial, options);
}

export function isStateCell(value: unknown): value is StateCell<unknown> {
  return value instanceof StateCell;
}
