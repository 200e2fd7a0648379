/**
 * Toggle
 *
 * Flip a target between hidden (`display: none`) and shown. The display in
 * force when a visible target is first hidden is kept in
 * `data-original-display` and restored when it is shown again, so an even
 * number of toggles leaves `display` where it started.
 *
 * Shared by the bootloader and the `toggle` action handler.
 */

import { controllersOf } from './dom';

export const ORIGINAL_DISPLAY_ATTRIBUTE = 'data-original-display';
export const HAMBURGER_ATTRIBUTE = 'data-hamburger-toggle';

export interface ToggleOptions {
  /** Update `aria-expanded` and hamburger labels (default: true) */
  syncAria?: boolean;
  /** Display used when no original display was recorded (default: 'block') */
  defaultShowDisplay?: string;
}

const DISCLOSURE_GLYPHS = ['+', '−', '-'];

function computedDisplay(target: HTMLElement): string {
  const view = target.ownerDocument.defaultView;
  return view ? view.getComputedStyle(target).display : '';
}

export function isHidden(target: HTMLElement): boolean {
  const inline = target.style.display;
  if (inline !== '') return inline === 'none';
  return computedDisplay(target) === 'none';
}

/**
 * Toggle `target`. Returns true when the target ends up shown.
 */
export function applyToggle(target: HTMLElement, trigger: Element | null, options: ToggleOptions = {}): boolean {
  const wasHidden = isHidden(target);

  if (wasHidden) {
    const recorded = target.getAttribute(ORIGINAL_DISPLAY_ATTRIBUTE);
    target.style.display =
      recorded !== null && recorded !== '' && recorded !== 'none' ? recorded : options.defaultShowDisplay ?? 'block';
  } else {
    if (!target.hasAttribute(ORIGINAL_DISPLAY_ATTRIBUTE)) {
      const current = target.style.display || computedDisplay(target);
      if (current !== '' && current !== 'none') {
        target.setAttribute(ORIGINAL_DISPLAY_ATTRIBUTE, current);
      }
    }
    target.style.display = 'none';
  }

  const expanded = wasHidden;
  syncTriggers(target, trigger, expanded, options);
  return expanded;
}

/**
 * Bring every trigger of `target` in line with `expanded`: the given trigger
 * plus everything whose `aria-controls` names the target.
 */
export function syncTriggers(
  target: HTMLElement,
  trigger: Element | null,
  expanded: boolean,
  options: ToggleOptions = {},
): void {
  const triggers = new Set<Element>(controllersOf(target.ownerDocument, target.id));
  if (trigger) triggers.add(trigger);

  for (const element of triggers) {
    const hamburger = element.getAttribute(HAMBURGER_ATTRIBUTE) === 'true';

    if (options.syncAria !== false) {
      element.setAttribute('aria-expanded', String(expanded));
      if (hamburger) {
        element.setAttribute('aria-label', expanded ? 'Close menu' : 'Open menu');
      }
    }

    if (hamburger) {
      const icon = element.querySelector('.material-icons');
      if (icon) icon.textContent = expanded ? 'close' : 'menu';
    }

    const glyph = element.querySelector('span:not(.material-icons)');
    if (glyph && DISCLOSURE_GLYPHS.includes((glyph.textContent ?? '').trim())) {
      glyph.textContent = expanded ? '−' : '+';
    }
  }
}
