/**
 * Hydration Engine
 *
 * Binds server-rendered markup to behavior. `scan` walks the existing DOM
 * for action triggers, marks the ones that cannot work as inert and brings
 * `aria-expanded` in line with each toggle target. Events are handled by one
 * delegated listener at the root, so triggers added after the scan work the
 * same way.
 */

import { Logger } from 'tessel-kernel';
import { HydrationError, TOGGLE_ACTION, parseAction } from 'tessel-shared';
import type { ActionDescriptor } from 'tessel-shared';
import { getRuntimeConfig } from '../config';
import type { ActionRegistry } from './action-registry';
import { isActivationKey, isElementTarget, isKeyboardEvent, isRoleButton } from './dom';
import { SID_ATTRIBUTE } from './event-queue';
import type { CallbackRegistry } from './event-queue';
import { isHidden, syncTriggers } from './toggle';

const log = Logger.for('HydrationEngine');

export const INERT_ATTRIBUTE = 'data-action-inert';

export type InertReason = 'parse' | 'target';

export interface HydrationReport {
  /** Triggers whose descriptor parsed and whose target exists */
  bound: number;
  /** Triggers with an unparsable or invalid descriptor */
  inert: number;
  /** Triggers whose target id matches no element */
  unmatched: number;
}

export interface HydrationEngineOptions {
  /** Attribute carrying the descriptor (default: from the runtime config) */
  attribute?: string;
  callbacks?: CallbackRegistry;
  syncAria?: boolean;
}

type Resolution =
  | { status: 'bound'; descriptor: ActionDescriptor; target: HTMLElement }
  | { status: 'inert'; reason: InertReason; error: HydrationError };

const DELEGATED_EVENTS = ['click', 'keydown'] as const;

export class HydrationEngine {
  readonly attribute: string;
  private readonly callbacks?: CallbackRegistry;
  private readonly syncAria: boolean;
  private attachedTo: Element | null = null;

  constructor(
    private readonly registry: ActionRegistry,
    options: HydrationEngineOptions = {},
  ) {
    const config = getRuntimeConfig();
    this.attribute = options.attribute ?? config.actionAttribute;
    this.callbacks = options.callbacks;
    this.syncAria = options.syncAria ?? config.syncAria;
  }

  /**
   * Depth-first walk of `root` and its descendants. Failures are logged and
   * the trigger marked inert; the walk always continues.
   */
  scan(root: Element): HydrationReport {
    const report: HydrationReport = { bound: 0, inert: 0, unmatched: 0 };
    this.walk(root, report);
    log.debug({ ...report }, 'Hydration scan complete');
    return report;
  }

  private walk(element: Element, report: HydrationReport): void {
    if (element.hasAttribute(this.attribute)) {
      const resolution = this.resolve(element);
      if (resolution.status === 'bound') {
        report.bound++;
        this.normalize(element, resolution.descriptor, resolution.target);
      } else if (resolution.reason === 'parse') {
        report.inert++;
      } else {
        report.unmatched++;
      }
    }
    for (const child of Array.from(element.children)) {
      this.walk(child, report);
    }
  }

  /**
   * Parse the trigger's descriptor and find its target, marking the trigger
   * inert on failure.
   */
  private resolve(trigger: Element): Resolution {
    const parsed = parseAction(trigger.getAttribute(this.attribute));
    if (!parsed.ok) {
      return this.markInert(trigger, 'parse', parsed.error);
    }

    const { descriptor } = parsed;
    const target = trigger.ownerDocument.getElementById(descriptor.targetId);
    if (!target) {
      return this.markInert(trigger, 'target', HydrationError.missingTarget(descriptor.targetId, descriptor.type));
    }

    trigger.removeAttribute(INERT_ATTRIBUTE);
    return { status: 'bound', descriptor, target };
  }

  private markInert(trigger: Element, reason: InertReason, error: HydrationError): Resolution {
    trigger.setAttribute(INERT_ATTRIBUTE, reason);
    log.warn({ err: error, reason, element: describe(trigger) }, 'Skipping action binding');
    return { status: 'inert', reason, error };
  }

  private normalize(trigger: Element, descriptor: ActionDescriptor, target: HTMLElement): void {
    if (descriptor.type !== TOGGLE_ACTION || !this.syncAria) return;
    syncTriggers(target, trigger, !isHidden(target), { syncAria: true });
  }

  /**
   * Delegated handler for clicks and Enter/Space on `role="button"` triggers.
   * Clicks outside any trigger go to the callback registry when they land
   * on a `data-sid` element.
   */
  handleEvent = (event: Event): void => {
    const origin = event.target;
    if (!isElementTarget(origin)) return;

    if (event.type === 'keydown') {
      if (!isKeyboardEvent(event) || !isActivationKey(event)) return;
    } else if (event.type !== 'click') {
      return;
    }

    const trigger = origin.closest(`[${this.attribute}]`);
    if (!trigger) {
      if (event.type === 'click') this.handleSid(origin, event);
      return;
    }
    if (event.type === 'keydown' && !isRoleButton(trigger)) return;

    const resolution = this.resolve(trigger);
    if (resolution.status === 'inert') return;
    event.preventDefault();

    this.registry.dispatch(resolution.descriptor, {
      trigger,
      target: resolution.target,
      document: trigger.ownerDocument,
      event,
    });
  };

  private handleSid(origin: Element, event: Event): void {
    if (!this.callbacks) return;
    const element = origin.closest(`[${SID_ATTRIBUTE}]`);
    const sid = element?.getAttribute(SID_ATTRIBUTE);
    if (!sid || !this.callbacks.has(sid)) return;
    this.callbacks.invoke({ sid, event });
  }

  /**
   * Install the delegated listener on `root`. One root at a time.
   */
  attach(root: Element): void {
    if (this.attachedTo === root) return;
    this.detach();
    for (const type of DELEGATED_EVENTS) {
      root.addEventListener(type, this.handleEvent);
    }
    this.attachedTo = root;
  }

  detach(): void {
    const root = this.attachedTo;
    if (!root) return;
    for (const type of DELEGATED_EVENTS) {
      root.removeEventListener(type, this.handleEvent);
    }
    this.attachedTo = null;
  }

  get isAttached(): boolean {
    return this.attachedTo !== null;
  }
}

function describe(element: Element): string {
  return element.id ? `${element.tagName.toLowerCase()}#${element.id}` : element.tagName.toLowerCase();
}
