import { StateError } from 'tessel-shared';
import type { Composer } from './composer';
import type { CompositionNode } from './node';

// ============================================================================
// Render Context (Global During a Body Run)
// ============================================================================

export interface RenderContext {
  composer: Composer;
  node: CompositionNode;
  /** Next slot index; hooks claim one each */
  hookIndex: number;
}

let renderContext: RenderContext | null = null;

/**
 * Get the current render context. Throws if called outside a component body.
 */
export function getCurrentContext(hook: string): RenderContext {
  if (renderContext === null) {
    throw StateError.invalidHookCall(hook);
  }
  return renderContext;
}

export function getRenderContext(): RenderContext | null {
  return renderContext;
}

/**
 * Set render context (called by the composer around each body).
 */
export function setRenderContext(ctx: RenderContext | null): void {
  renderContext = ctx;
}
