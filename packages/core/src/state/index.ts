/**
 * # Tessel State
 *
 * Observable state cells. Reads inside a component body subscribe the node
 * being composed; writes schedule a recomposition pass.
 *
 * @module tessel/state
 */

export * from './cell';
export { untracked, withObserver, currentObserver } from './tracking';
export type { CellObserver, ReactiveSource } from './tracking';
