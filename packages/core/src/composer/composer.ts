/**
 * Composer
 *
 * Builds and incrementally updates the logical UI tree from elements.
 *
 * A pass walks from the root. Each emitted child is matched to an existing
 * node by identity key (element type plus explicit key, or occurrence index
 * among unkeyed siblings of the same type); unmatched nodes are created and
 * previous children that were not emitted become garbage. Garbage is torn
 * down after the walk, then queued effects run.
 *
 * A component whose props are structurally equal to the last run and which
 * is not dirty is skipped: its body does not run and its last output is
 * walked again so that dirty descendants still rerun.
 *
 * @example
 * ```typescript
 * const composer = new Composer({ onError: (err) => report(err) });
 * composer.compose(<App />);
 * const html = composer.renderTree(new HtmlRenderer()).join('');
 * ```
 */

import { Logger } from 'tessel-kernel';
import {
  CompositionError,
  ReactivityError,
  StateError,
  ensureError,
  isCompositionError,
} from 'tessel-shared';
import { isRenderable } from '../jsx/jsx-runtime';
import type { ComponentElement, FragmentElement, HostElement, Renderable } from '../jsx/jsx-runtime';
import { isStateCell } from '../state/cell';
import type { StateCell } from '../state/cell';
import { withObserver } from '../state/tracking';
import { EffectManager, EffectSlot } from '../effects/effect-manager';
import type { HeadManager } from '../head/head-manager';
import { splitHostProps } from '../renderers/backend';
import type { RendererBackend } from '../renderers/backend';
import { structuralEqual } from './equality';
import { NodeArena } from './node-arena';
import { CompositionNode } from './node';
import { getRenderContext, setRenderContext } from './render-context';
import type { RenderContext } from './render-context';
import { NodeKind, ROOT_TYPE, SlotTag, TEXT_TYPE, slotTagName } from './types';
import type { CompositionStats, NodeId, NodeKey, NodeType, Scheduler, Slot } from './types';

const log = Logger.for('Composer');

export interface ComposerOptions {
  /** Receives errors thrown by component bodies. Without it they are logged. */
  onError?: (error: CompositionError) => void;
  /** Run effects after each pass. Off for server rendering. Defaults to true. */
  effects?: boolean;
  /** Target of `useHead` */
  head?: HeadManager;
  /** Asked for a pass when a cell read by some node changes */
  scheduler?: Scheduler;
}

// ============================================================================
// Frames
// ============================================================================

/**
 * Per-node bookkeeping while the node's children are being emitted.
 */
class Frame {
  /** Previous children by type, then identity key. Duplicate keys queue up. */
  private readonly previous = new Map<NodeType, Map<string, NodeId[]>>();
  private readonly occurrences = new Map<NodeType, number>();
  private readonly seenKeys = new Map<NodeType, Set<string>>();
  readonly emitted: NodeId[] = [];

  constructor(
    readonly node: CompositionNode,
    arena: NodeArena<CompositionNode>,
  ) {
    for (const id of node.children) {
      const child = arena.require(id);
      let byKey = this.previous.get(child.type);
      if (!byKey) {
        byKey = new Map();
        this.previous.set(child.type, byKey);
      }
      const ids = byKey.get(child.key);
      if (ids) ids.push(id);
      else byKey.set(child.key, [id]);
    }
  }

  identityKey(nodeKey: NodeKey): string {
    if (nodeKey.key !== undefined && nodeKey.key !== null) {
      const key = `k:${String(nodeKey.key)}`;
      let seen = this.seenKeys.get(nodeKey.type);
      if (!seen) {
        seen = new Set();
        this.seenKeys.set(nodeKey.type, seen);
      }
      if (seen.has(key)) {
        log.warn({ parent: this.node.name, key: String(nodeKey.key) }, 'Duplicate key among siblings');
      }
      seen.add(key);
      return key;
    }
    const occurrence = this.occurrences.get(nodeKey.type) ?? 0;
    this.occurrences.set(nodeKey.type, occurrence + 1);
    return `i:${occurrence}`;
  }

  /** Take the earliest previous child with this identity, if any */
  claim(type: NodeType, key: string): NodeId | undefined {
    const ids = this.previous.get(type)?.get(key);
    return ids?.shift();
  }

  /** Previous children that were not claimed */
  unclaimed(): NodeId[] {
    const ids: NodeId[] = [];
    for (const byKey of this.previous.values()) {
      for (const queued of byKey.values()) ids.push(...queued);
    }
    return ids;
  }
}

function isRenderableList(value: Renderable): value is readonly Renderable[] {
  return Array.isArray(value);
}

function hostChildren(element: HostElement | FragmentElement): Renderable {
  const props = element.props;
  const children = 'children' in props ? props.children : undefined;
  return isRenderable(children) ? children : undefined;
}

function emptyStats(): CompositionStats {
  return { invoked: 0, skipped: 0, created: 0, disposed: 0 };
}

// ============================================================================
// Composer
// ============================================================================

export class Composer {
  readonly effects: EffectManager;
  readonly head: HeadManager | undefined;

  private readonly arena = new NodeArena<CompositionNode>();
  private readonly frames: Frame[] = [];
  private readonly onError: ((error: CompositionError) => void) | undefined;
  private scheduler: Scheduler | undefined;

  private root: CompositionNode | null = null;
  private rootElement: Renderable = undefined;
  private hasRootElement = false;
  private garbage: NodeId[] = [];
  private composing = false;
  private isDisposed = false;
  private lastStats: CompositionStats = emptyStats();
  private readonly idCounters = new Map<string, number>();

  constructor(options: ComposerOptions = {}) {
    this.onError = options.onError;
    this.head = options.head;
    this.scheduler = options.scheduler;
    this.effects = new EffectManager({ enabled: options.effects ?? true });
  }

  // ==========================================================================
  // Passes
  // ==========================================================================

  /**
   * Run a full pass from the root with a new root element.
   */
  compose(element: Renderable): void {
    this.rootElement = element;
    this.hasRootElement = true;
    this.runPass();
  }

  /**
   * Re-walk from the root with the last root element. The skip policy prunes
   * everything that is neither dirty nor fed new props.
   */
  recompose(): void {
    if (!this.hasRootElement) return;
    this.runPass();
  }

  attachScheduler(scheduler: Scheduler | undefined): void {
    this.scheduler = scheduler;
  }

  get isComposing(): boolean {
    return this.composing;
  }

  get disposed(): boolean {
    return this.isDisposed;
  }

  /** Counters for the last pass */
  get stats(): Readonly<CompositionStats> {
    return this.lastStats;
  }

  private runPass(): void {
    if (this.isDisposed) throw StateError.disposed('Composer');
    if (this.composing) throw ReactivityError.reentrant();

    this.composing = true;
    this.lastStats = emptyStats();
    try {
      const root = this.ensureRoot();
      this.frames.push(new Frame(root, this.arena));
      try {
        this.reconcile(this.rootElement);
      } finally {
        this.exitNode();
      }
    } finally {
      this.composing = false;
    }

    this.collectGarbage();
    this.effects.flush();
    log.trace({ ...this.lastStats, nodes: this.arena.size }, 'Composition pass complete');
  }

  private ensureRoot(): CompositionNode {
    if (!this.root) {
      this.root = this.arena.allocate(
        (id) => new CompositionNode(id, NodeKind.Root, ROOT_TYPE, 'root', null, (node) => this.invalidate(node)),
      );
    }
    return this.root;
  }

  private invalidate(node: CompositionNode): void {
    if (node.disposed) return;
    node.dirty = true;
    this.scheduler?.schedule();
  }

  // ==========================================================================
  // Node contract
  // ==========================================================================

  /**
   * Begin processing a child of the current node. Reuses the previous child
   * with the same identity key or creates a new one.
   */
  enter(nodeKey: NodeKey): CompositionNode {
    const frame = this.currentFrame();
    const key = frame.identityKey(nodeKey);
    const existing = frame.claim(nodeKey.type, key);

    let node: CompositionNode;
    if (existing !== undefined) {
      node = this.arena.require(existing);
    } else {
      const parent = frame.node.id;
      node = this.arena.allocate(
        (id) => new CompositionNode(id, nodeKey.kind, nodeKey.type, key, parent, (target) => this.invalidate(target)),
      );
      this.lastStats.created++;
    }

    frame.emitted.push(node.id);
    this.frames.push(new Frame(node, this.arena));
    return node;
  }

  /**
   * Close the current node. Previous children it did not emit this run are
   * queued for teardown after the pass.
   */
  exitNode(): void {
    const frame = this.frames.pop();
    if (!frame) {
      throw new StateError('idle', 'composing', 'exitNode() called with no open node');
    }
    this.garbage.push(...frame.unclaimed());
    frame.node.children = frame.emitted;
  }

  /**
   * Return the remembered value at `index` of the node whose body is running,
   * computing it on first use and whenever `keys` changed structurally.
   * `keys` undefined computes once; `null` recomputes on every run.
   */
  rememberSlot<T>(
    index: number,
    compute: (previous?: T) => T,
    keys?: readonly unknown[] | null,
    tag: SlotTag = SlotTag.Memo,
  ): T {
    const ctx = this.bodyContext('rememberSlot');
    const node = ctx.node;
    const existing = node.slots[index];

    if (existing === undefined) {
      if (node.mounted) {
        throw CompositionError.hookOrder(node.name, node.id, `more hooks than the previous run (${index + 1})`);
      }
      const value = compute();
      node.slots[index] = { tag, value, keys };
      return value;
    }

    if (existing.tag !== tag) {
      throw CompositionError.hookOrder(
        node.name,
        node.id,
        `slot ${index} was ${slotTagName(existing.tag)}, now ${slotTagName(tag)}`,
      );
    }

    const previous = slotValue<T>(existing);
    const stale = keys === null || (keys !== undefined && (existing.keys == null || !structuralEqual(keys, existing.keys)));
    if (!stale) return previous;

    const value = compute(previous);
    node.slots[index] = { tag, value, keys };
    return value;
  }

  /**
   * Next id for `prefix`, counted per composer so server and client
   * compositions of the same tree agree.
   */
  nextId(prefix: string): string {
    const next = (this.idCounters.get(prefix) ?? 0) + 1;
    this.idCounters.set(prefix, next);
    return `${prefix}-${next}`;
  }

  private currentFrame(): Frame {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) {
      throw new StateError('idle', 'composing', 'No node is being composed');
    }
    return frame;
  }

  private bodyContext(operation: string): RenderContext {
    const ctx = getRenderContext();
    if (!ctx || ctx.composer !== this) {
      throw StateError.invalidHookCall(operation);
    }
    return ctx;
  }

  // ==========================================================================
  // Element walking
  // ==========================================================================

  private reconcile(value: Renderable): void {
    if (value === null || value === undefined || typeof value === 'boolean') return;

    if (typeof value === 'string' || typeof value === 'number') {
      const node = this.enter({ kind: NodeKind.Text, type: TEXT_TYPE });
      node.text = String(value);
      this.exitNode();
      return;
    }

    if (isRenderableList(value)) {
      for (const item of value) this.reconcile(item);
      return;
    }

    const node = this.enter({ kind: value.kind, type: value.type, key: value.key });
    try {
      if (value.kind === 'component') {
        this.visitComponent(node, value);
      } else {
        node.element = value;
        this.reconcile(hostChildren(value));
      }
    } finally {
      this.exitNode();
    }
  }

  private visitComponent(node: CompositionNode, element: ComponentElement): void {
    const previous = node.element;
    const canSkip =
      node.mounted &&
      !node.dirty &&
      previous !== null &&
      previous.kind === 'component' &&
      structuralEqual(previous.props, element.props);

    node.element = element;

    if (canSkip) {
      this.lastStats.skipped++;
      this.reconcile(node.output);
      return;
    }

    const output = this.runBody(node, element);
    if (output.ok) {
      this.reconcile(output.value);
    } else {
      node.element = previous;
      this.reconcile(node.output);
    }
  }

  /**
   * Invoke a component body. On failure the slot table, subscriptions and
   * queued effects are restored to what they were before the call.
   */
  private runBody(node: CompositionNode, element: ComponentElement): { ok: true; value: Renderable } | { ok: false } {
    const snapshot = node.slots.slice();
    const mark = this.effects.mark();
    const previousSources = node.sources;
    node.sources = new Set();
    node.dirty = false;

    const ctx: RenderContext = { composer: this, node, hookIndex: 0 };
    const outer = getRenderContext();
    setRenderContext(ctx);
    this.lastStats.invoked++;

    try {
      const value = withObserver(node, () => element.invoke());
      if (node.mounted && ctx.hookIndex !== snapshot.length) {
        throw CompositionError.hookOrder(
          node.name,
          node.id,
          `expected ${snapshot.length} hooks, got ${ctx.hookIndex}`,
        );
      }

      for (const source of previousSources) {
        if (!node.sources.has(source)) source.unsubscribe(node);
      }
      node.output = value;
      node.mounted = true;
      return { ok: true, value };
    } catch (error) {
      const kept = new Set<Slot>(snapshot);
      for (const slot of node.slots) {
        if (!kept.has(slot)) this.releaseSlot(slot);
      }
      node.slots = snapshot;
      for (const source of previousSources) node.sources.add(source);
      this.effects.rollback(mark);

      this.report(isCompositionError(error) ? error : CompositionError.body(element.name, node.id, ensureError(error)));
      return { ok: false };
    } finally {
      setRenderContext(outer);
    }
  }

  private report(error: CompositionError): void {
    if (this.onError) {
      this.onError(error);
      return;
    }
    log.error({ err: error, component: error.component, nodeId: error.nodeId }, 'Composition error');
  }

  // ==========================================================================
  // Teardown
  // ==========================================================================

  private collectGarbage(): void {
    const roots = this.garbage;
    this.garbage = [];
    if (roots.length === 0) return;

    const doomed: CompositionNode[] = [];
    for (const id of roots) {
      this.collectSubtree(id, doomed);
    }
    this.teardown(doomed);
  }

  /** Post-order: children before their parent */
  private collectSubtree(id: NodeId, out: CompositionNode[]): void {
    const node = this.arena.get(id);
    if (!node || node.disposed) return;
    for (const child of node.children) {
      this.collectSubtree(child, out);
    }
    out.push(node);
  }

  /**
   * Run every cleanup of the doomed nodes first, then reclaim their slots and
   * arena indices.
   */
  private teardown(nodes: CompositionNode[]): void {
    for (const node of nodes) {
      this.effects.cleanup(node, effectSlots(node.slots));
    }
    for (const node of nodes) {
      node.disposed = true;
      for (const slot of node.slots) {
        this.releaseSlot(slot);
      }
      node.slots = [];
      for (const source of node.sources) source.unsubscribe(node);
      node.sources.clear();
      this.arena.release(node.id);
      this.lastStats.disposed++;
    }
  }

  private releaseSlot(slot: Slot): void {
    if (isStateCell(slot.value)) {
      slot.value.dispose();
    } else if (slot.value instanceof StateSlot) {
      slot.value.cell.dispose();
    }
  }

  /**
   * Tear down the whole tree. All cleanups run; the composer cannot be used
   * afterwards.
   */
  dispose(): void {
    if (this.isDisposed) return;
    if (this.composing) throw ReactivityError.reentrant();

    const doomed: CompositionNode[] = [];
    if (this.root) {
      this.collectSubtree(this.root.id, doomed);
    }
    this.teardown(doomed);
    this.effects.clear();
    this.root = null;
    this.isDisposed = true;
  }

  // ==========================================================================
  // Introspection and rendering
  // ==========================================================================

  getNode(id: NodeId): CompositionNode | undefined {
    return this.arena.get(id);
  }

  getRoot(): CompositionNode | null {
    return this.root;
  }

  getChildren(id: NodeId): CompositionNode[] {
    const node = this.arena.get(id);
    if (!node) return [];
    return node.children.map((child) => this.arena.require(child));
  }

  get nodeCount(): number {
    return this.arena.size;
  }

  /**
   * Produce backend output for the current tree. Components, fragments and
   * the root contribute only their children.
   */
  renderTree<T>(backend: RendererBackend<T>): T[] {
    if (!this.root) return [];
    return this.renderChildren(this.root, backend);
  }

  private renderChildren<T>(node: CompositionNode, backend: RendererBackend<T>): T[] {
    return node.children.flatMap((id) => this.renderNode(this.arena.require(id), backend));
  }

  private renderNode<T>(node: CompositionNode, backend: RendererBackend<T>): T[] {
    if (node.kind === NodeKind.Text) {
      return [backend.text(node.text ?? '')];
    }
    const element = node.element;
    if (node.kind === NodeKind.Host && element?.kind === 'host') {
      const { attributes, modifier } = splitHostProps(element.props);
      return [backend.render(element.type, attributes, modifier, () => this.renderChildren(node, backend))];
    }
    return this.renderChildren(node, backend);
  }
}

// ============================================================================
// Slot values
// ============================================================================

/**
 * Value stored by `useState` and `useReducer`: the cell plus its stable
 * dispatcher.
 */
export class StateSlot<T, A> {
  constructor(
    readonly cell: StateCell<T>,
    readonly dispatch: (action: A) => void,
  ) {}
}

// Slot values are stored untyped; each hook reads back what it wrote at the
// same index, which the tag check above guards.
function slotValue<T>(slot: Slot): T {
  return slot.value as T;
}

function* effectSlots(slots: readonly Slot[]): Generator<EffectSlot> {
  for (const slot of slots) {
    if (slot.value instanceof EffectSlot) yield slot.value;
  }
}
