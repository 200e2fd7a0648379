// ============================================================================
// Dependency Tracking
// ============================================================================

/**
 * Something an observer can be subscribed to. Cells implement this so the
 * composer can drop a node's subscriptions when it re-runs or is disposed.
 */
export interface ReactiveSource {
  unsubscribe(observer: CellObserver): void;
}

/**
 * The reader side of a subscription: in practice, one per composition node.
 */
export interface CellObserver {
  /** Arena index of the node this observer belongs to */
  readonly nodeId: number;
  /** Called when a source the observer read has changed */
  notify(): void;
  /** Called when the observer reads a source during a body run */
  track(source: ReactiveSource): void;
}

// `null` entries come from untracked()
const trackingStack: (CellObserver | null)[] = [];

export function currentObserver(): CellObserver | undefined {
  return trackingStack[trackingStack.length - 1] ?? undefined;
}

/**
 * Run `fn` with `observer` receiving every cell read inside it.
 */
export function withObserver<T>(observer: CellObserver, fn: () => T): T {
  trackingStack.push(observer);
  try {
    return fn();
  } finally {
    trackingStack.pop();
  }
}

/**
 * Read cells without subscribing the node being composed.
 *
 * @example
 * ```typescript
 * const Label = () => {
 *   const total = untracked(() => counter.value); // no re-run when counter changes
 *   return `Total: ${total}`;
 * };
 * ```
 */
export function untracked<T>(fn: () => T): T {
  trackingStack.push(null);
  try {
    return fn();
  } finally {
    trackingStack.pop();
  }
}
