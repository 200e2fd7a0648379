import { isElement } from '../jsx/jsx-runtime';

function ownEntries(value: object): Map<string, unknown> {
  const entries = new Map<string, unknown>();
  for (const [key, item] of Object.entries(value)) {
    entries.set(key, item);
  }
  return entries;
}

function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Structural equality used for props comparison (skip policy) and for hook
 * keys and effect deps.
 *
 * Primitives compare with `Object.is`. Arrays and plain objects compare
 * member-wise. Elements compare by kind, type, key and props. Everything else
 * (class instances, cells, functions) compares by identity.
 */
export function structuralEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) {
    return false;
  }

  if (isElement(a) || isElement(b)) {
    return (
      isElement(a) &&
      isElement(b) &&
      a.kind === b.kind &&
      a.type === b.type &&
      a.key === b.key &&
      structuralEqual(a.props, b.props)
    );
  }

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!structuralEqual(a[i], b[i])) return false;
    }
    return true;
  }

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }

  if (!isPlainObject(a) || !isPlainObject(b)) return false;

  const left = ownEntries(a);
  const right = ownEntries(b);
  if (left.size !== right.size) return false;
  for (const [key, value] of left) {
    if (!right.has(key) || !structuralEqual(value, right.get(key))) return false;
  }
  return true;
}
