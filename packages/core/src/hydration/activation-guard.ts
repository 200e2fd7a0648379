/**
 * Activation Guard
 *
 * One page-global record decides which handler set owns event delegation.
 * The bootloader and the runtime both ask for it; whoever asks first holds it
 * for the life of the page, and the other is skipped.
 */

import { Logger } from 'tessel-kernel';
import { HydrationError } from 'tessel-shared';
import type { QueuedEvent } from './event-queue';

const log = Logger.for('ActivationGuard');

export type GuardOwner = 'bootloader' | 'runtime' | (string & {});

/** Event handler installed by the runtime over the bootloader's dispatcher */
export type DelegatedHandler = (event: Event) => void;

export interface HydrationGuardState {
  active: boolean;
  owner: GuardOwner | null;
  /** Every activation attempt, successful or not */
  attempts: number;
  handler?: DelegatedHandler;
}

declare global {
  interface Window {
    __TESSEL_HYDRATION_ACTIVE__?: boolean;
    __TESSEL_HYDRATION_GUARD__?: HydrationGuardState;
    __TESSEL_QUEUE__?: QueuedEvent[];
  }
}

/**
 * The guard record for a window, created on first use. A bare
 * `__TESSEL_HYDRATION_ACTIVE__` flag set by other code counts as held.
 */
export function getGuard(win: Window): HydrationGuardState {
  const existing = win.__TESSEL_HYDRATION_GUARD__;
  if (existing) return existing;

  const flagged = win.__TESSEL_HYDRATION_ACTIVE__ === true;
  const guard: HydrationGuardState = {
    active: flagged,
    owner: flagged ? 'unknown' : null,
    attempts: 0,
  };
  win.__TESSEL_HYDRATION_GUARD__ = guard;
  return guard;
}

/**
 * Check-then-set with no yield point in between. Returns false, and logs the
 * skipped registration, when someone already holds the guard.
 */
export function tryActivate(win: Window, owner: GuardOwner): boolean {
  const guard = getGuard(win);
  guard.attempts++;

  if (guard.active) {
    log.info(
      { err: HydrationError.doubleRegistration(owner, guard.owner, guard.attempts) },
      'Handler registration skipped',
    );
    return false;
  }

  guard.active = true;
  guard.owner = owner;
  win.__TESSEL_HYDRATION_ACTIVE__ = true;
  return true;
}

export function isActive(win: Window): boolean {
  return getGuard(win).active;
}

/**
 * Give the guard up. Only the holder can release it.
 */
export function releaseGuard(win: Window, owner: GuardOwner): boolean {
  const guard = getGuard(win);
  if (!guard.active || guard.owner !== owner) return false;

  guard.active = false;
  guard.owner = null;
  guard.handler = undefined;
  win.__TESSEL_HYDRATION_ACTIVE__ = false;
  return true;
}

/**
 * Route the holder's events to `handler`. Used by the runtime when the
 * bootloader got there first.
 */
export function upgradeHandler(win: Window, handler: DelegatedHandler | undefined): void {
  getGuard(win).handler = handler;
}
