/**
 * Bootloader
 *
 * A small handler set that makes toggles work before the runtime has loaded.
 * It runs synchronously at parse time, takes the activation guard and listens
 * in the capture phase on the document. Until the runtime upgrades it, it
 * understands only `toggle`; clicks on `data-sid` elements are held in
 * `__TESSEL_QUEUE__` for the runtime to replay.
 */

import { Logger } from 'tessel-kernel';
import { ACTION_ATTRIBUTE, HydrationError, TOGGLE_ACTION, parseAction } from 'tessel-shared';
import { getGuard, releaseGuard, tryActivate } from './activation-guard';
import { isActivationKey, isElementTarget, isKeyboardEvent, isRoleButton } from './dom';
import { SID_ATTRIBUTE, enqueueEvent, getEventQueue } from './event-queue';
import { applyToggle } from './toggle';
import type { ToggleOptions } from './toggle';

const log = Logger.for('Bootloader');

export interface BootloaderOptions {
  attribute?: string;
  toggle?: ToggleOptions;
}

export interface Bootloader {
  /** Remove the listeners and give the guard back */
  dispose(): void;
}

/**
 * Install the bootloader on `win`. Returns null when another handler set
 * already holds the guard.
 */
export function installBootloader(win: Window, options: BootloaderOptions = {}): Bootloader | null {
  if (!tryActivate(win, 'bootloader')) return null;

  getEventQueue(win);
  const doc = win.document;
  const attribute = options.attribute ?? ACTION_ATTRIBUTE;
  const listener = (event: Event): void => handleBootEvent(win, event, attribute, options.toggle);

  doc.addEventListener('click', listener, true);
  doc.addEventListener('keydown', listener, true);

  return {
    dispose() {
      doc.removeEventListener('click', listener, true);
      doc.removeEventListener('keydown', listener, true);
      releaseGuard(win, 'bootloader');
    },
  };
}

function handleBootEvent(win: Window, event: Event, attribute: string, toggle: ToggleOptions | undefined): void {
  const upgraded = getGuard(win).handler;
  if (upgraded) {
    upgraded(event);
    return;
  }

  const origin = event.target;
  if (!isElementTarget(origin)) return;

  const keyboard = isKeyboardEvent(event);
  if (keyboard && !isActivationKey(event)) return;
  if (!keyboard && event.type !== 'click') return;

  const trigger = origin.closest(`[${attribute}]`);
  if (trigger) {
    if (keyboard && !isRoleButton(trigger)) return;

    const parsed = parseAction(trigger.getAttribute(attribute));
    if (!parsed.ok) {
      log.warn({ err: parsed.error }, 'Ignoring trigger with invalid descriptor');
      return;
    }
    const { descriptor } = parsed;
    // Other types wait for the runtime
    if (descriptor.type !== TOGGLE_ACTION) return;

    const target = win.document.getElementById(descriptor.targetId);
    if (!target) {
      log.warn({ err: HydrationError.missingTarget(descriptor.targetId, descriptor.type) }, 'Ignoring trigger');
      return;
    }
    event.preventDefault();
    applyToggle(target, trigger, toggle);
    return;
  }

  if (keyboard) return;
  const sidElement = origin.closest(`[${SID_ATTRIBUTE}]`);
  const sid = sidElement?.getAttribute(SID_ATTRIBUTE);
  if (!sid) return;

  event.preventDefault();
  enqueueEvent(win, { type: 'click', targetId: sid, timestamp: Date.now() });
}
