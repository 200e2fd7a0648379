import { StateError } from 'tessel-shared';
import type { NodeId } from './types';

/**
 * Integer-indexed node storage. Freed indices are reused, so an id is only
 * meaningful while its node is alive.
 */
export class NodeArena<T> {
  private readonly items: (T | undefined)[] = [];
  private readonly free: NodeId[] = [];
  private count = 0;

  allocate(create: (id: NodeId) => T): T {
    const id = this.free.pop() ?? this.items.length;
    const item = create(id);
    this.items[id] = item;
    this.count++;
    return item;
  }

  get(id: NodeId): T | undefined {
    return this.items[id];
  }

  require(id: NodeId): T {
    const item = this.items[id];
    if (item === undefined) {
      throw new StateError('free', 'allocated', `Node ${id} is not allocated`);
    }
    return item;
  }

  release(id: NodeId): void {
    if (this.items[id] === undefined) return;
    this.items[id] = undefined;
    this.free.push(id);
    this.count--;
  }

  get size(): number {
    return this.count;
  }

  *values(): IterableIterator<T> {
    for (const item of this.items) {
      if (item !== undefined) yield item;
    }
  }
}
