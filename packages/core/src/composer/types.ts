import type { CompositionError } from 'tessel-shared';
import type { ComponentIdentity, FragmentType, Key } from '../jsx/jsx-runtime';

// ============================================================================
// Node identity
// ============================================================================

export type NodeId = number;

export const NodeKind = {
  Root: 'root',
  Component: 'component',
  Host: 'host',
  Fragment: 'fragment',
  Text: 'text',
} as const;

export type NodeKind = (typeof NodeKind)[keyof typeof NodeKind];

export const ROOT_TYPE: unique symbol = Symbol.for('tessel.root');
export const TEXT_TYPE: unique symbol = Symbol.for('tessel.text');

/**
 * Call-site identity of a node: the component function, the host tag, or one
 * of the fragment, text and root markers.
 */
export type NodeType = string | ComponentIdentity | FragmentType | typeof ROOT_TYPE | typeof TEXT_TYPE;

/**
 * What the parent emits for a child. The composer turns `key` into the
 * node's identity key, falling back to the occurrence index among unkeyed
 * siblings of the same type.
 */
export interface NodeKey {
  kind: NodeKind;
  type: NodeType;
  key?: Key | null;
}

// ============================================================================
// Slot table
// ============================================================================

export const SlotTag = {
  State: 0,
  Reducer: 1,
  Effect: 10,
  Memo: 20,
  Ref: 30,
  Id: 40,
  Head: 50,
} as const;

export type SlotTag = (typeof SlotTag)[keyof typeof SlotTag];

export function slotTagName(tag: SlotTag): string {
  for (const [name, value] of Object.entries(SlotTag)) {
    if (value === tag) return name;
  }
  return String(tag);
}

/**
 * One remembered value. `keys` undefined means computed once; `null` means
 * recomputed on every run.
 */
export interface Slot {
  readonly tag: SlotTag;
  readonly value: unknown;
  readonly keys: readonly unknown[] | null | undefined;
}

// ============================================================================
// Composer
// ============================================================================

export interface CompositionStats {
  /** Component bodies invoked */
  invoked: number;
  /** Component nodes whose body was skipped */
  skipped: number;
  created: number;
  disposed: number;
}

export interface Scheduler {
  schedule(): void;
}
