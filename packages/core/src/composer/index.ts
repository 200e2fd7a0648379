export { Composer, StateSlot } from './composer';
export type { ComposerOptions } from './composer';
export { CompositionNode } from './node';
export { NodeArena } from './node-arena';
export { structuralEqual } from './equality';
export { getCurrentContext } from './render-context';
export type { RenderContext } from './render-context';
export * from './hooks';
export * from './types';
