// Realm-independent checks: markup may come from another window (iframes, jsdom).

export function isElementTarget(target: EventTarget | null): target is Element {
  return target !== null && 'closest' in target && typeof target.closest === 'function';
}

export function isKeyboardEvent(event: Event): event is KeyboardEvent {
  return event.type === 'keydown' && 'key' in event && typeof event.key === 'string';
}

/** Enter or Space, the keys that activate a `role="button"` element */
export function isActivationKey(event: KeyboardEvent): boolean {
  return event.key === 'Enter' || event.key === ' ' || event.key === 'Spacebar';
}

export function isRoleButton(element: Element): boolean {
  return element.getAttribute('role') === 'button';
}

/**
 * Elements whose `aria-controls` list names `id`.
 */
export function controllersOf(doc: Document, id: string): Element[] {
  if (id === '') return [];
  return Array.from(doc.querySelectorAll('[aria-controls]')).filter((element) =>
    (element.getAttribute('aria-controls') ?? '').split(/\s+/).includes(id),
  );
}
