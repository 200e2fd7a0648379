import type { Renderable, TesselElement } from '../jsx/jsx-runtime';
import type { CellOwner } from '../state/cell';
import type { CellObserver, ReactiveSource } from '../state/tracking';
import type { EffectOwner } from '../effects/effect-manager';
import type { NodeId, NodeKind, NodeType, Slot } from './types';

/**
 * A node of the logical UI tree. Owned by the Composer; lives in its arena
 * until the parent stops emitting it.
 *
 * The node is also the observer for every cell its body reads, and the owner
 * of every cell and effect its hooks create.
 */
export class CompositionNode implements CellObserver, CellOwner, EffectOwner {
  parent: NodeId | null;
  children: NodeId[] = [];
  slots: Slot[] = [];

  dirty = false;
  disposed = false;
  /** Set after the first body run that completed */
  mounted = false;

  /** Element that produced this node in the last pass */
  element: TesselElement | null = null;
  /** Content of a text node */
  text: string | null = null;
  /** Output of the last successful body run */
  output: Renderable = undefined;

  /** Cells read by the current (or last) body run */
  sources = new Set<ReactiveSource>();

  constructor(
    readonly id: NodeId,
    readonly kind: NodeKind,
    readonly type: NodeType,
    /** Identity key among siblings: `k:<key>` or `i:<occurrence>` */
    readonly key: string,
    parent: NodeId | null,
    private readonly onInvalidate: (node: CompositionNode) => void,
  ) {
    this.parent = parent;
  }

  get nodeId(): NodeId {
    return this.id;
  }

  get name(): string {
    if (this.element?.kind === 'component') return this.element.name;
    if (typeof this.type === 'string') return this.type;
    return this.kind;
  }

  notify(): void {
    this.onInvalidate(this);
  }

  track(source: ReactiveSource): void {
    this.sources.add(source);
  }
}
