/**
 * Renderer backend contract.
 *
 * The Composer walks its tree and asks a backend to produce output for each
 * host node; components, fragments and the root are transparent. A backend
 * decides what `T` is: an HTML string, a DOM node, a test record.
 */

import { z } from 'zod';
import { Logger } from 'tessel-kernel';
import type { HostProps } from '../jsx/jsx-runtime';

const log = Logger.for('RendererBackend');

export type StyleValue = string | number | null | undefined;

export type StyleObject = Record<string, StyleValue>;

export const modifierSchema = z.object({
  styles: z.record(z.union([z.string(), z.number(), z.null(), z.undefined()])).optional(),
  attributes: z.record(z.string()).optional(),
});

/**
 * Styling bundle attached to a host element through its `modifier` prop.
 * Backends merge `styles` into the element's style and add `attributes`
 * that the element does not set itself.
 */
export type Modifier = z.infer<typeof modifierSchema>;

export interface RendererBackend<T> {
  /**
   * Render one host node. `children` renders the node's children on demand,
   * so a backend may skip them (void elements) or wrap them.
   */
  render(kind: string, props: HostProps, modifier: Modifier | undefined, children: () => T[]): T;
  text(value: string): T;
}

/**
 * Separate the props a backend should see as attributes from the element's
 * children and modifier.
 */
export function splitHostProps(props: HostProps): { attributes: HostProps; modifier: Modifier | undefined } {
  const attributes: HostProps = {};
  let modifier: Modifier | undefined;

  for (const [name, value] of Object.entries(props)) {
    if (name === 'children') continue;
    if (name === 'modifier') {
      if (value === undefined || value === null) continue;
      const parsed = modifierSchema.safeParse(value);
      if (parsed.success) {
        modifier = parsed.data;
      } else {
        log.warn({ issues: parsed.error.issues.length }, 'Ignoring invalid modifier');
      }
      continue;
    }
    attributes[name] = value;
  }

  return { attributes, modifier };
}
