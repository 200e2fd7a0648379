/* eslint-disable @typescript-eslint/no-namespace */
import { ValidationError } from 'tessel-shared';
import type { ActionDescriptor } from 'tessel-shared';
import type { Modifier, StyleObject } from '../renderers/backend';

// ============================================================================
// Element model
// ============================================================================

export type Key = string | number;

/**
 * Anything a component body or a `children` prop may produce.
 * `null`, `undefined` and booleans render nothing.
 */
export type Renderable =
  | TesselElement
  | string
  | number
  | boolean
  | null
  | undefined
  | readonly Renderable[];

export type HostProps = Record<string, unknown>;

/**
 * Function component. Bodies are re-invoked on every composition of the node
 * that is not skipped.
 */
export type Component<P extends object = object> = (props: P) => Renderable;

/** Identity of a component as stored on elements and nodes */
export type ComponentIdentity = (props: never) => Renderable;

export const Fragment: unique symbol = Symbol.for('tessel.fragment');
export type FragmentType = typeof Fragment;

export const ELEMENT_BRAND: unique symbol = Symbol.for('tessel.element');

interface ElementBase {
  readonly $$typeof: typeof ELEMENT_BRAND;
  readonly key: Key | null;
}

export interface HostElement extends ElementBase {
  readonly kind: 'host';
  readonly type: string;
  readonly props: HostProps;
}

export interface ComponentElement extends ElementBase {
  readonly kind: 'component';
  readonly type: ComponentIdentity;
  readonly props: object;
  /** Display name used in logs and errors */
  readonly name: string;
  /** Calls the component with the props this element was created with */
  invoke(): Renderable;
}

export interface FragmentElement extends ElementBase {
  readonly kind: 'fragment';
  readonly type: FragmentType;
  readonly props: { children?: Renderable };
}

export type TesselElement = HostElement | ComponentElement | FragmentElement;

// ============================================================================
// Guards
// ============================================================================

export function isElement(value: unknown): value is TesselElement {
  return (
    typeof value === 'object' &&
    value !== null &&
    '$$typeof' in value &&
    value.$$typeof === ELEMENT_BRAND
  );
}

export function isRenderable(value: unknown): value is Renderable {
  if (value === null || value === undefined) return true;
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return true;
    case 'object':
      return Array.isArray(value) ? value.every(isRenderable) : isElement(value);
    default:
      return false;
  }
}

function readKey(props: object): Key | null {
  if (!('key' in props)) return null;
  const key = props.key;
  return typeof key === 'string' || typeof key === 'number' ? key : null;
}

function readChildren(props: object): Renderable {
  if (!('children' in props)) return undefined;
  return isRenderable(props.children) ? props.children : undefined;
}

export function componentName(type: ComponentIdentity): string {
  if ('displayName' in type && typeof type.displayName === 'string') {
    return type.displayName;
  }
  return type.name || 'Anonymous';
}

/**
 * Copy props into a host props record. `key` is element metadata, not an
 * attribute, so it is dropped.
 */
export function toHostProps(props: object): HostProps {
  const out: HostProps = {};
  for (const [name, value] of Object.entries(props)) {
    if (name !== 'key') out[name] = value;
  }
  return out;
}

// ============================================================================
// Factories
// ============================================================================

function hostElement(type: string, props: object, key: Key | null): HostElement {
  return { $$typeof: ELEMENT_BRAND, kind: 'host', type, props: toHostProps(props), key };
}

function fragmentElement(props: object, key: Key | null): FragmentElement {
  return { $$typeof: ELEMENT_BRAND, kind: 'fragment', type: Fragment, props: { children: readChildren(props) }, key };
}

function componentElement<P extends object>(type: Component<P>, props: P, key: Key | null): ComponentElement {
  return {
    $$typeof: ELEMENT_BRAND,
    kind: 'component',
    type,
    props,
    key,
    name: componentName(type),
    invoke: () => type(props),
  };
}

function toElement<P extends object>(
  type: string | FragmentType | Component<P>,
  props: P,
  key: Key | null,
): TesselElement {
  if (typeof type === 'string') return hostElement(type, props, key);
  if (type === Fragment) return fragmentElement(props, key);
  if (typeof type !== 'function') {
    throw ValidationError.type('type', 'string, Fragment or component function', typeof type);
  }
  return componentElement(type, props, key);
}

/**
 * Automatic-runtime entry point. The compiler passes `key` separately and
 * children inside `props`.
 */
export function jsx<P extends object>(
  type: string | FragmentType | Component<P>,
  props: P,
  key?: Key | null,
): TesselElement {
  return toElement(type, props, key ?? null);
}

export const jsxs = jsx;

export function jsxDEV<P extends object>(
  type: string | FragmentType | Component<P>,
  props: P,
  key?: Key | null,
): TesselElement {
  return toElement(type, props, key ?? null);
}

/**
 * Merge positional children into props, the way the classic runtime does:
 * one child stays as-is, several become an array.
 */
export function withChildren<P extends object>(props: P, children: readonly Renderable[]): P {
  if (children.length === 0) return props;
  return { ...props, children: children.length === 1 ? children[0] : children };
}

/**
 * Classic-runtime factory, for code that builds trees without JSX.
 *
 * @example
 * ```typescript
 * createElement('nav', { className: 'menu' }, createElement(HamburgerMenu, { label: 'Menu' }));
 * ```
 */
export function createElement(
  type: string | FragmentType,
  props?: HostProps | null,
  ...children: Renderable[]
): TesselElement;
export function createElement<P extends object>(
  type: Component<P>,
  props: P,
  ...children: Renderable[]
): TesselElement;
export function createElement<P extends object>(
  type: string | FragmentType | Component<P>,
  props?: P | null,
  ...children: Renderable[]
): TesselElement {
  if (typeof type === 'function') {
    if (props === null || props === undefined) {
      throw ValidationError.required('props', `Component '${componentName(type)}' requires a props object`);
    }
    return toElement(type, withChildren(props, children), readKey(props));
  }
  const base: object = props ?? {};
  return toElement(type, withChildren(base, children), readKey(base));
}

// ============================================================================
// JSX namespace
// ============================================================================

export interface HostAttributes {
  children?: Renderable;
  key?: Key;
  style?: StyleObject | string;
  /** Styling bundle handed to the renderer backend */
  modifier?: Modifier;
  'data-action'?: ActionDescriptor | string;
  [attr: string]: unknown;
}

export namespace JSX {
  export type Element = TesselElement;

  export type ElementType = string | ComponentIdentity;

  export interface ElementChildrenAttribute {
    // eslint-disable-next-line @typescript-eslint/ban-types
    children: {};
  }

  export interface IntrinsicAttributes {
    key?: Key;
  }

  export interface IntrinsicElements {
    [tag: string]: HostAttributes;
  }
}
