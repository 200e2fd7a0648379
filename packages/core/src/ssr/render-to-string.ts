/**
 * Server Rendering
 *
 * Each render composes once, with effects off, inside its own kernel
 * `Context`, so log lines carry the request id and no composition state is
 * shared between requests.
 */

import { Context, Logger } from 'tessel-kernel';
import type { KernelContext } from 'tessel-kernel';
import type { CompositionError } from 'tessel-shared';
import { Composer } from '../composer/composer';
import { HeadManager } from '../head/head-manager';
import type { Renderable } from '../jsx/jsx-runtime';
import { HtmlRenderer, escapeHtml } from '../renderers/html-renderer';
import { getRuntimeConfig } from '../config';

const log = Logger.for('SSR');

export interface RenderToStringOptions {
  /** Overrides for the per-render kernel context (route, request id, ...) */
  context?: Partial<KernelContext>;
  /** Collects `useHead` markup; a fresh manager is used when omitted */
  head?: HeadManager;
  onError?: (error: CompositionError) => void;
}

export interface RenderDocumentOptions extends RenderToStringOptions {
  title?: string;
  lang?: string;
  /** Serialized into the state script for `readInitialState` */
  state?: unknown;
  /** Script srcs appended to the body, in order */
  scripts?: readonly string[];
  /** Script loaded before the app markup so toggles work early */
  bootloaderSrc?: string;
  rootElementId?: string;
  stateElementId?: string;
}

/**
 * Base64 of the UTF-8 JSON of `state`, the format `readInitialState` reads.
 */
export function encodeState(state: unknown): string {
  return Buffer.from(JSON.stringify(state), 'utf8').toString('base64');
}

export function renderToString(element: Renderable, options: RenderToStringOptions = {}): string {
  const context = Context.child(options.context);
  return Context.run(context, () => {
    const head = options.head ?? new HeadManager();
    const composer = new Composer({ effects: false, head, onError: options.onError });
    try {
      composer.compose(element);
      const markup = composer.renderTree(new HtmlRenderer()).join('');
      log.debug({ nodes: composer.nodeCount, bytes: markup.length }, 'Rendered to string');
      return markup;
    } finally {
      composer.dispose();
    }
  });
}

/**
 * Render a complete HTML document: collected head markup, the app inside its
 * root element, the optional state script and the page scripts.
 */
export function renderDocument(element: Renderable, options: RenderDocumentOptions = {}): string {
  const config = getRuntimeConfig();
  const head = options.head ?? new HeadManager();
  if (options.title !== undefined) head.setTitle(options.title);

  const body = renderToString(element, { ...options, head });
  const rootId = options.rootElementId ?? config.rootElementId;
  const stateId = options.stateElementId ?? config.stateElementId;

  const parts: string[] = [
    '<!DOCTYPE html>',
    `<html lang="${escapeHtml(options.lang ?? 'en')}">`,
    '<head><meta charset="utf-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1">',
    head.renderHead(),
    '</head>',
    '<body>',
  ];
  if (options.bootloaderSrc !== undefined) {
    parts.push(`<script src="${escapeHtml(options.bootloaderSrc)}"></script>`);
  }
  parts.push(`<div id="${escapeHtml(rootId)}">${body}</div>`);
  if (options.state !== undefined) {
    parts.push(`<script id="${escapeHtml(stateId)}" type="application/json">${encodeState(options.state)}</script>`);
  }
  for (const src of options.scripts ?? []) {
    parts.push(`<script type="module" src="${escapeHtml(src)}"></script>`);
  }
  parts.push('</body>', '</html>');
  return parts.join('');
}
