import type { z } from 'zod';
import { Logger } from 'tessel-kernel';
import { ensureError } from 'tessel-shared';
import { getRuntimeConfig } from '../config';

const log = Logger.for('InitialState');

function decodeBase64Utf8(encoded: string): string {
  const binary = atob(encoded.trim());
  const bytes = Uint8Array.from(binary, (char) => char.charCodeAt(0));
  return new TextDecoder().decode(bytes);
}

/**
 * Read the state the server embedded in `<script id="tessel-state">` as
 * base64 JSON. Returns undefined, after logging, when the element is missing,
 * the payload does not decode or it fails `schema`.
 *
 * @example
 * ```typescript
 * const state = readInitialState(document, z.object({ user: z.string() }));
 * ```
 */
export function readInitialState(doc: Document, schema?: undefined, elementId?: string): unknown;
export function readInitialState<T>(doc: Document, schema: z.ZodType<T>, elementId?: string): T | undefined;
export function readInitialState<T>(
  doc: Document,
  schema?: z.ZodType<T>,
  elementId: string = getRuntimeConfig().stateElementId,
): unknown {
  const element = doc.getElementById(elementId);
  const payload = element?.textContent?.trim();
  if (!payload) {
    log.debug({ elementId }, 'No initial state');
    return undefined;
  }

  let json: unknown;
  try {
    json = JSON.parse(decodeBase64Utf8(payload));
  } catch (error) {
    log.warn({ err: ensureError(error), elementId }, 'Initial state did not decode');
    return undefined;
  }

  if (!schema) return json;
  const result = schema.safeParse(json);
  if (!result.success) {
    log.warn({ err: result.error, elementId }, 'Initial state failed validation');
    return undefined;
  }
  return result.data;
}
