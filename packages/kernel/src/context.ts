import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";
import { ContextError } from "tessel-shared";

export interface ContextMetadata extends Record<string, unknown> {}

/**
 * Request-scoped context for a server render.
 *
 * Each SSR request renders inside its own context so that log lines carry
 * the request id and nothing composition-related leaks across requests.
 *
 * @example
 * ```typescript
 * interface AppContext extends KernelContext {
 *   locale: string;
 * }
 * ```
 */
export interface KernelContext {
  requestId: string;
  traceId: string;
  /** Route or page being rendered, when known */
  route?: string;
  metadata: ContextMetadata;
}

const storage = new AsyncLocalStorage<KernelContext>();

export class Context {
  /**
   * Creates a new context object with defaults.
   */
  static create(overrides: Partial<KernelContext> = {}): KernelContext {
    return {
      requestId: overrides.requestId ?? randomUUID(),
      traceId: overrides.traceId ?? randomUUID(),
      route: overrides.route,
      metadata: overrides.metadata ?? {},
    };
  }

  /**
   * Runs a function within the given context. Works for synchronous renders
   * and for async work alike; the return value is passed through.
   */
  static run<T>(context: KernelContext, fn: () => T): T {
    return storage.run(context, fn);
  }

  /**
   * Creates a child context that inherits from the current context (or creates a new root).
   * The child is a shallow copy; `metadata` is shared with the parent.
   */
  static child(overrides: Partial<KernelContext> = {}): KernelContext {
    const parent = Context.tryGet();
    if (!parent) {
      return Context.create(overrides);
    }
    return {
      ...parent,
      ...overrides,
    };
  }

  /**
   * Creates a child context and runs a function within it.
   *
   * @example
   * ```typescript
   * const [a, b] = await Promise.all([
   *   Context.fork({ route: '/a' }, async () => render(pageA)),
   *   Context.fork({ route: '/b' }, async () => render(pageB)),
   * ]);
   * ```
   */
  static fork<T>(overrides: Partial<KernelContext>, fn: () => T): T {
    return Context.run(Context.child(overrides), fn);
  }

  /**
   * Gets the current context. Throws if not found.
   */
  static get(): KernelContext {
    const store = storage.getStore();
    if (!store) {
      throw ContextError.notFound();
    }
    return store;
  }

  /**
   * Gets the current context or returns undefined if not found.
   */
  static tryGet(): KernelContext | undefined {
    return storage.getStore();
  }
}
