import { Logger } from 'tessel-kernel';
import { actionDescriptorSchema, encodeAction, ACTION_ATTRIBUTE } from 'tessel-shared';
import type { HostProps } from '../jsx/jsx-runtime';
import type { Modifier, RendererBackend, StyleObject, StyleValue } from './backend';

const log = Logger.for('HtmlRenderer');

/** Elements that never have children or a closing tag */
export const VOID_ELEMENTS: ReadonlySet<string> = new Set([
  'area',
  'base',
  'br',
  'col',
  'embed',
  'hr',
  'img',
  'input',
  'link',
  'meta',
  'source',
  'track',
  'wbr',
]);

const ATTRIBUTE_ALIASES: Readonly<Record<string, string>> = {
  className: 'class',
  htmlFor: 'for',
};

const TAG_NAME = /^[a-zA-Z][a-zA-Z0-9-]*$/;
const ATTRIBUTE_NAME = /^[^\s"'>\/=\u0000-\u001f]+$/;
const EVENT_HANDLER = /^on[A-Z]/;

/**
 * Escapes HTML special characters for text and attribute values.
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function kebabCase(name: string): string {
  if (name.startsWith('--')) return name;
  return name.replace(/[A-Z]/g, (char) => `-${char.toLowerCase()}`);
}

function isStyleObject(value: unknown): value is StyleObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(
    (item) => item === null || item === undefined || typeof item === 'string' || typeof item === 'number',
  );
}

function isPresent(value: StyleValue): value is string | number {
  return value !== null && value !== undefined && value !== '';
}

/**
 * Serialize a style object to `prop:value;prop:value`.
 */
export function serializeStyle(style: StyleObject): string {
  return Object.entries(style)
    .filter((entry): entry is [string, string | number] => isPresent(entry[1]))
    .map(([name, value]) => `${kebabCase(name)}:${value}`)
    .join(';');
}

function serializeAction(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  const parsed = actionDescriptorSchema.safeParse(value);
  if (!parsed.success) {
    log.warn({ issue: parsed.error.issues[0]?.message }, 'Dropping invalid data-action descriptor');
    return undefined;
  }
  return encodeAction(parsed.data);
}

function serializeValue(name: string, value: unknown): string | true | undefined {
  if (value === undefined || value === null || value === false) return undefined;
  if (value === true) return true;
  if (typeof value === 'function' || typeof value === 'symbol') return undefined;
  if (name === 'style') {
    if (typeof value === 'string') return value;
    return isStyleObject(value) ? serializeStyle(value) : undefined;
  }
  if (name === ACTION_ATTRIBUTE) return serializeAction(value);
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint') return String(value);
  return JSON.stringify(value);
}

/**
 * Reference backend producing HTML strings, used for server rendering and in
 * tests.
 *
 * @example
 * ```typescript
 * const html = composer.renderTree(new HtmlRenderer()).join('');
 * ```
 */
export class HtmlRenderer implements RendererBackend<string> {
  render(kind: string, props: HostProps, modifier: Modifier | undefined, children: () => string[]): string {
    if (!TAG_NAME.test(kind)) {
      log.warn({ kind }, 'Skipping host element with invalid tag name');
      return '';
    }

    const attributes = this.collectAttributes(props, modifier);
    const open = `<${kind}${this.formatAttributes(attributes)}>`;

    if (VOID_ELEMENTS.has(kind.toLowerCase())) {
      return open;
    }
    return `${open}${children().join('')}</${kind}>`;
  }

  text(value: string): string {
    return escapeHtml(value);
  }

  private collectAttributes(props: HostProps, modifier: Modifier | undefined): Map<string, string | true> {
    const attributes = new Map<string, string | true>();

    for (const [prop, value] of Object.entries(props)) {
      if (prop === 'key' || EVENT_HANDLER.test(prop)) continue;
      const name = ATTRIBUTE_ALIASES[prop] ?? prop;
      if (!ATTRIBUTE_NAME.test(name)) {
        log.warn({ attribute: name }, 'Skipping invalid attribute name');
        continue;
      }
      const serialized = serializeValue(name, value);
      if (serialized !== undefined) {
        attributes.set(name, serialized);
      }
    }

    if (modifier?.attributes) {
      for (const [name, value] of Object.entries(modifier.attributes)) {
        if (!attributes.has(name) && ATTRIBUTE_NAME.test(name)) {
          attributes.set(name, value);
        }
      }
    }

    const modifierStyle = modifier?.styles ? serializeStyle(modifier.styles) : '';
    if (modifierStyle !== '') {
      const existing = attributes.get('style');
      attributes.set('style', typeof existing === 'string' && existing !== '' ? `${existing};${modifierStyle}` : modifierStyle);
    }

    return attributes;
  }

  private formatAttributes(attributes: Map<string, string | true>): string {
    let out = '';
    for (const [name, value] of attributes) {
      out += value === true ? ` ${name}` : ` ${name}="${escapeHtml(value)}"`;
    }
    return out;
  }
}
