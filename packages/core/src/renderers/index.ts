/**
 * # Tessel Renderers
 *
 * The backend interface the Composer renders host nodes through, and the
 * reference HTML backend used for server rendering and tests.
 *
 * ```typescript
 * import { HtmlRenderer } from 'tessel';
 *
 * const html = composer.renderTree(new HtmlRenderer()).join('');
 * ```
 *
 * @module tessel/renderers
 */

export * from './backend';
export { HtmlRenderer, VOID_ELEMENTS, escapeHtml, serializeStyle } from './html-renderer';
