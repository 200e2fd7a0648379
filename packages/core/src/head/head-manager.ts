import { Logger } from 'tessel-kernel';
import { escapeHtml } from '../renderers/html-renderer';

const log = Logger.for('HeadManager');

export interface HeadManagerOptions {
  /** Live document; markup is inserted into its head as it is added */
  document?: Document;
}

/**
 * Collects `<head>` markup. The same markup string is only ever added once.
 *
 * On the server the collected markup is written by the document renderer;
 * in the browser each new entry is inserted into `document.head`.
 *
 * @example
 * ```typescript
 * head.addHeadElement('<link rel="stylesheet" href="/menu.css">');
 * head.addHeadElement('<link rel="stylesheet" href="/menu.css">'); // no-op
 * head.setTitle('Docs');
 * ```
 */
export class HeadManager {
  private readonly entries: string[] = [];
  private readonly seen = new Set<string>();
  private titleMarkup: string | undefined;
  private readonly document: Document | undefined;

  constructor(options: HeadManagerOptions = {}) {
    this.document = options.document;
  }

  /**
   * Add markup to the head. Returns false when the markup was already added.
   */
  addHeadElement(markup: string): boolean {
    const normalized = markup.trim();
    if (normalized === '' || this.seen.has(normalized)) return false;

    this.seen.add(normalized);
    this.entries.push(normalized);

    if (this.document) {
      this.document.head.insertAdjacentHTML('beforeend', normalized);
    }
    log.debug({ markup: normalized }, 'Head element added');
    return true;
  }

  /**
   * Replace the document title.
   */
  setTitle(text: string): void {
    const markup = `<title>${escapeHtml(text)}</title>`;
    if (markup === this.titleMarkup) return;

    if (this.titleMarkup !== undefined) {
      this.remove(this.titleMarkup);
    }
    if (this.document) {
      for (const existing of Array.from(this.document.head.querySelectorAll('title'))) {
        existing.remove();
      }
    }
    this.titleMarkup = markup;
    this.addHeadElement(markup);
  }

  get elements(): readonly string[] {
    return this.entries;
  }

  has(markup: string): boolean {
    return this.seen.has(markup.trim());
  }

  /** Markup for a server-rendered `<head>` */
  renderHead(): string {
    return this.entries.join('');
  }

  /**
   * Mark markup already present in a server-rendered head as added, so the
   * client does not insert it a second time.
   */
  seedFromDocument(document: Document): void {
    for (const element of Array.from(document.head.children)) {
      const markup = element.outerHTML.trim();
      if (this.seen.has(markup)) continue;
      this.seen.add(markup);
      this.entries.push(markup);
      if (element.tagName === 'TITLE') {
        this.titleMarkup = markup;
      }
    }
  }

  private remove(markup: string): void {
    this.seen.delete(markup);
    const index = this.entries.indexOf(markup);
    if (index >= 0) this.entries.splice(index, 1);
  }
}
