/**
 * Action Registry
 *
 * Maps an action `type` to the handler that performs it. `toggle` is
 * registered by default; applications add their own types.
 *
 * @example
 * ```typescript
 * const registry = new ActionRegistry();
 * registry.register('dismiss', ({ target }) => target.remove());
 * ```
 */

import { Logger } from 'tessel-kernel';
import { TOGGLE_ACTION, ValidationError, ensureError } from 'tessel-shared';
import type { ActionDescriptor } from 'tessel-shared';
import { getRuntimeConfig } from '../config';
import { applyToggle } from './toggle';
import type { ToggleOptions } from './toggle';

const log = Logger.for('ActionRegistry');

export interface ActionContext {
  descriptor: ActionDescriptor;
  /** Element carrying the `data-action` attribute */
  trigger: Element;
  /** Element named by `descriptor.targetId` */
  target: HTMLElement;
  document: Document;
  event?: Event;
}

export type ActionHandler = (context: ActionContext) => void;

export interface RegisterOptions {
  /** Overwrite an existing handler for the type */
  replace?: boolean;
}

export interface ActionRegistryOptions {
  /** Register the default `toggle` handler (default: true) */
  defaults?: boolean;
  /** Toggle options; read from the runtime config at dispatch time when omitted */
  toggle?: ToggleOptions;
}

/**
 * `toggle` handler. Options resolve on every call so config changes apply to
 * already-bound triggers.
 */
export function createToggleHandler(options?: ToggleOptions): ActionHandler {
  return ({ target, trigger }) => {
    const { syncAria, defaultShowDisplay } = options ?? getRuntimeConfig();
    applyToggle(target, trigger, { syncAria, defaultShowDisplay });
  };
}

export class ActionRegistry {
  private handlers = new Map<string, ActionHandler>();

  constructor(options: ActionRegistryOptions = {}) {
    if (options.defaults !== false) {
      this.register(TOGGLE_ACTION, createToggleHandler(options.toggle));
    }
  }

  register(type: string, handler: ActionHandler, options: RegisterOptions = {}): this {
    if (typeof type !== 'string' || type.trim() === '') {
      throw ValidationError.required('type', 'Action type must be a non-empty string');
    }
    if (typeof handler !== 'function') {
      throw ValidationError.type('handler', 'function', typeof handler);
    }
    if (this.handlers.has(type) && !options.replace) {
      throw ValidationError.constraint('type', `Action '${type}' is already registered; pass { replace: true }`);
    }
    this.handlers.set(type, handler);
    return this;
  }

  unregister(type: string): boolean {
    return this.handlers.delete(type);
  }

  has(type: string): boolean {
    return this.handlers.has(type);
  }

  types(): string[] {
    return Array.from(this.handlers.keys());
  }

  /**
   * Run the handler for `descriptor.type`. Returns false for unknown types and
   * for handlers that threw; both are logged.
   */
  dispatch(descriptor: ActionDescriptor, context: Omit<ActionContext, 'descriptor'>): boolean {
    const handler = this.handlers.get(descriptor.type);
    if (!handler) {
      log.warn({ type: descriptor.type, targetId: descriptor.targetId }, 'Unknown action type');
      return false;
    }
    try {
      handler({ ...context, descriptor });
      return true;
    } catch (error) {
      log.error({ err: ensureError(error), type: descriptor.type, targetId: descriptor.targetId }, 'Action failed');
      return false;
    }
  }
}
