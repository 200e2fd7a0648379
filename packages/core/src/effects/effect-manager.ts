/**
 * Effect Manager
 *
 * Effects are queued while bodies run and executed after the pass completes
 * and garbage has been torn down, in composition order (parent before child).
 * A body whose composition fails has its queued effects rolled back.
 *
 * Every body and cleanup runs in isolation: an error is logged against the
 * owning node and the remaining effects still run.
 */

import { Logger } from 'tessel-kernel';
import { ensureError } from 'tessel-shared';
import { structuralEqual } from '../composer/equality';

const log = Logger.for('EffectManager');

export type EffectCleanup = () => void;

/** Effect body; may return a cleanup that runs before the next body or on disposal */
export type EffectBody = () => void | EffectCleanup;

export const EffectPhase = {
  Body: 'body',
  Cleanup: 'cleanup',
} as const;

export type EffectPhase = (typeof EffectPhase)[keyof typeof EffectPhase];

/**
 * What the manager needs to know about the node that owns an effect.
 */
export interface EffectOwner {
  readonly id: number;
  readonly disposed: boolean;
  readonly name: string;
}

/**
 * Persistent per-hook effect state, stored in the owner's slot table.
 */
export class EffectSlot {
  /** Deps of the last body that ran */
  deps: readonly unknown[] | undefined = undefined;
  cleanup: EffectCleanup | undefined = undefined;
  started = false;

  /**
   * Whether a body with `deps` is due. `undefined` deps run after every
   * composition of the owner.
   */
  isStale(deps: readonly unknown[] | undefined): boolean {
    if (!this.started || deps === undefined || this.deps === undefined) return true;
    return !structuralEqual(deps, this.deps);
  }
}

export interface EffectRecord {
  owner: EffectOwner;
  slot: EffectSlot;
  body: EffectBody;
  deps: readonly unknown[] | undefined;
}

export interface EffectManagerOptions {
  /** When false nothing is queued (server rendering). Defaults to true. */
  enabled?: boolean;
}

export class EffectManager {
  private queue: EffectRecord[] = [];
  private readonly enabled: boolean;

  constructor(options: EffectManagerOptions = {}) {
    this.enabled = options.enabled ?? true;
  }

  get pending(): number {
    return this.queue.length;
  }

  enqueue(record: EffectRecord): void {
    if (!this.enabled) return;
    this.queue.push(record);
  }

  /** Position to roll back to if the body about to run fails */
  mark(): number {
    return this.queue.length;
  }

  rollback(mark: number): void {
    this.queue.length = Math.min(mark, this.queue.length);
  }

  /**
   * Run queued effects. Records whose owner was disposed in the meantime are
   * dropped.
   */
  flush(): void {
    const queue = this.queue;
    this.queue = [];

    for (const record of queue) {
      if (record.owner.disposed) continue;
      const { slot } = record;

      const previous = slot.cleanup;
      slot.cleanup = undefined;
      if (previous) {
        this.invoke(record.owner, EffectPhase.Cleanup, previous);
      }

      const result = this.invoke(record.owner, EffectPhase.Body, record.body);
      slot.cleanup = typeof result === 'function' ? result : undefined;
      slot.deps = record.deps;
      slot.started = true;
    }
  }

  /**
   * Run the pending cleanups of a node that is being destroyed. Each cleanup
   * runs at most once.
   */
  cleanup(owner: EffectOwner, slots: Iterable<EffectSlot>): void {
    for (const slot of slots) {
      const cleanup = slot.cleanup;
      slot.cleanup = undefined;
      if (cleanup) {
        this.invoke(owner, EffectPhase.Cleanup, cleanup);
      }
    }
  }

  /** Drop anything still queued */
  clear(): void {
    this.queue = [];
  }

  private invoke(owner: EffectOwner, phase: EffectPhase, fn: EffectBody): void | EffectCleanup {
    try {
      return fn();
    } catch (error) {
      log.error(
        { err: ensureError(error), phase, component: owner.name, nodeId: owner.id },
        'Effect error',
      );
      return undefined;
    }
  }
}
