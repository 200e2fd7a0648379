/**
 * Hooks
 *
 * Each hook claims the next slot of the node whose body is running. The
 * composer checks that the slot tag and the number of hooks match the last
 * successful run.
 *
 * Rules of Hooks:
 * 1. Only call hooks at the top level of a component body
 * 2. Only call hooks from components or custom hooks
 * 3. Call hooks in the same order every run
 */

import { Logger } from 'tessel-kernel';
import { cell } from '../state/cell';
import type { CellOptions, StateCell } from '../state/cell';
import { EffectSlot } from '../effects/effect-manager';
import type { EffectBody, EffectCleanup } from '../effects/effect-manager';
import { StateSlot } from './composer';
import { getCurrentContext } from './render-context';
import { SlotTag } from './types';

const log = Logger.for('Hooks');

export type StateUpdate<T> = T | ((previous: T) => T);
export type Dispatch<T> = (update: StateUpdate<T>) => void;
export type StateHookResult<T> = [T, Dispatch<T>];
export type ReducerHookResult<S, A> = [S, (action: A) => void];
export type RefObject<T> = { current: T };

function isUpdater<T>(update: StateUpdate<T>): update is (previous: T) => T {
  return typeof update === 'function';
}

function claimSlot<T>(
  hook: string,
  compute: (previous?: T) => T,
  keys: readonly unknown[] | null | undefined,
  tag: SlotTag,
): T {
  const ctx = getCurrentContext(hook);
  const index = ctx.hookIndex++;
  return ctx.composer.rememberSlot(index, compute, keys, tag);
}

// ============================================================================
// STATE HOOKS
// ============================================================================

/**
 * A state cell owned by the calling node. Reading `.value` in the body
 * subscribes the node; writes schedule a pass. Writes after the node is
 * destroyed are dropped.
 *
 * @example
 * ```tsx
 * function Counter() {
 *   const count = useCell(0);
 *   return <button onClick={() => count.update((n) => n + 1)}>{count.value}</button>;
 * }
 * ```
 */
export function useCell<T>(initial: T, options: Omit<CellOptions<T>, 'owner'> = {}): StateCell<T> {
  const ctx = getCurrentContext('useCell');
  const index = ctx.hookIndex++;
  const owner = ctx.node;
  return ctx.composer.rememberSlot(index, () => cell(initial, { ...options, owner }), undefined, SlotTag.State);
}

/**
 * React-style state tuple backed by a cell.
 */
export function useState<T>(initial: T): StateHookResult<T> {
  const ctx = getCurrentContext('useState');
  const index = ctx.hookIndex++;
  const owner = ctx.node;
  const slot = ctx.composer.rememberSlot(
    index,
    () => {
      const state = cell(initial, { owner });
      return new StateSlot<T, StateUpdate<T>>(state, (update) => {
        state.set(isUpdater(update) ? update(state.peek()) : update);
      });
    },
    undefined,
    SlotTag.State,
  );
  return [slot.cell.value, slot.dispatch];
}

/**
 * State updated through a reducer. The dispatcher always applies the reducer
 * from the latest run.
 */
export function useReducer<S, A>(reducer: (state: S, action: A) => S, initial: S): ReducerHookResult<S, A> {
  const ctx = getCurrentContext('useReducer');
  const index = ctx.hookIndex++;
  const owner = ctx.node;
  const latest = ctx.composer.rememberSlot(index, () => ({ reducer }), undefined, SlotTag.Reducer);
  latest.reducer = reducer;

  const slot = ctx.composer.rememberSlot(
    ctx.hookIndex++,
    () => {
      const state = cell(initial, { owner });
      return new StateSlot<S, A>(state, (action) => {
        state.set(latest.reducer(state.peek(), action));
      });
    },
    undefined,
    SlotTag.State,
  );
  return [slot.cell.value, slot.dispatch];
}

/**
 * Toggle between true and false.
 */
export function useToggle(initial = false): [boolean, () => void] {
  const [value, setValue] = useState(initial);
  const toggle = useCallback(() => setValue((current) => !current), [setValue]);
  return [value, toggle];
}

// ============================================================================
// MEMOIZATION HOOKS
// ============================================================================

export function useMemo<T>(factory: () => T, deps: readonly unknown[]): T {
  return claimSlot('useMemo', () => factory(), deps, SlotTag.Memo);
}

export function useCallback<T extends (...args: never[]) => unknown>(callback: T, deps: readonly unknown[]): T {
  return claimSlot('useCallback', () => callback, deps, SlotTag.Memo);
}

export function useRef<T>(initial: T): RefObject<T> {
  return claimSlot('useRef', () => ({ current: initial }), undefined, SlotTag.Ref);
}

/**
 * The value from the last run that completed, `undefined` on the first.
 */
export function usePrevious<T>(value: T): T | undefined {
  const ref = useRef<T | undefined>(undefined);
  const previous = ref.current;
  useEffect(() => {
    ref.current = value;
  });
  return previous;
}

// ============================================================================
// EFFECT HOOKS
// ============================================================================

/**
 * Run `body` after the pass in which the node was first composed, and again
 * after any pass in which `deps` differ structurally. Without deps it runs
 * after every composition of the node. Never runs on the skip path.
 *
 * @example
 * ```tsx
 * useEffect(() => {
 *   const id = setInterval(() => tick.update((n) => n + 1), 1000);
 *   return () => clearInterval(id);
 * }, []);
 * ```
 */
export function useEffect(body: EffectBody, deps?: readonly unknown[]): void {
  const ctx = getCurrentContext('useEffect');
  const index = ctx.hookIndex++;
  const slot = ctx.composer.rememberSlot(index, () => new EffectSlot(), undefined, SlotTag.Effect);
  if (slot.isStale(deps)) {
    ctx.composer.effects.enqueue({ owner: ctx.node, slot, body, deps });
  }
}

/**
 * `useEffect` with the deps first.
 */
export function onMount(deps: readonly unknown[], body: EffectBody): void {
  useEffect(body, deps);
}

/**
 * Run once after the node is first composed.
 */
export function useOnMount(body: () => void): void {
  useEffect(() => {
    body();
  }, []);
}

/**
 * Run once when the node is destroyed. The latest callback is used.
 */
export function useOnUnmount(callback: () => void): void {
  const ref = useRef(callback);
  ref.current = callback;
  useEffect((): EffectCleanup => () => ref.current(), []);
}

// ============================================================================
// IDS AND HEAD
// ============================================================================

/**
 * Stable id for the node, `<prefix>-<n>` with `n` counted per composer.
 */
export function useId(prefix = 'tessel'): string {
  const ctx = getCurrentContext('useId');
  const index = ctx.hookIndex++;
  const composer = ctx.composer;
  return composer.rememberSlot(index, () => composer.nextId(prefix), undefined, SlotTag.Id);
}

/**
 * Add markup to the document head. Adding the same markup again is a no-op.
 */
export function useHead(markup: string): void {
  const ctx = getCurrentContext('useHead');
  const index = ctx.hookIndex++;
  const composer = ctx.composer;
  composer.rememberSlot(
    index,
    () => {
      if (composer.head) {
        composer.head.addHeadElement(markup);
      } else {
        log.debug({ component: ctx.node.name }, 'useHead without a head manager');
      }
      return markup;
    },
    [markup],
    SlotTag.Head,
  );
}
