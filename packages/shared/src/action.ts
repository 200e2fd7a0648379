/**
 * Action descriptors
 *
 * The JSON contract between server-rendered markup and client behavior. A
 * descriptor is serialized into the `data-action` attribute of a trigger
 * element and parsed back by the bootloader and the hydration engine.
 *
 * @example
 * ```typescript
 * const attr = encodeAction({ type: 'toggle', targetId: 'hamburger-menu-1' });
 * // '{"type":"toggle","targetId":"hamburger-menu-1"}'
 *
 * const result = parseAction(attr);
 * if (result.ok) dispatch(result.descriptor);
 * ```
 */

import { z } from "zod";
import { HydrationError, ensureError } from "./errors";

/** Attribute that carries a serialized descriptor */
export const ACTION_ATTRIBUTE = "data-action";

/** The one action type the bootloader understands */
export const TOGGLE_ACTION = "toggle";

export const actionDescriptorSchema = z.object({
  /** Open enum: any registered action kind */
  type: z.string().min(1, "type must not be empty"),
  /** Id of the element the action operates on */
  targetId: z.string().min(1, "targetId must not be empty"),
  params: z.record(z.string()).optional(),
});

export type ActionDescriptor = z.infer<typeof actionDescriptorSchema>;

export type ActionParseResult =
  | { ok: true; descriptor: ActionDescriptor }
  | { ok: false; error: HydrationError };

/**
 * Serialize a descriptor for a `data-action` attribute.
 * Validates first so that bad descriptors never reach markup.
 */
export function encodeAction(descriptor: ActionDescriptor): string {
  const parsed = actionDescriptorSchema.parse(descriptor);
  const out: ActionDescriptor = { type: parsed.type, targetId: parsed.targetId };
  if (parsed.params !== undefined) {
    out.params = parsed.params;
  }
  return JSON.stringify(out);
}

/**
 * Parse a `data-action` attribute value. Never throws.
 */
export function parseAction(raw: string | null | undefined): ActionParseResult {
  if (raw === null || raw === undefined || raw.trim() === "") {
    return { ok: false, error: HydrationError.parse(raw ?? "") };
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    return { ok: false, error: HydrationError.parse(raw, ensureError(error)) };
  }

  const result = actionDescriptorSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const detail = issue ? `${issue.path.join(".") || "descriptor"}: ${issue.message}` : "invalid";
    return { ok: false, error: HydrationError.parse(raw, new Error(detail)) };
  }

  return { ok: true, descriptor: result.data };
}

/**
 * Build a toggle descriptor for the element with the given id.
 */
export function toggleAction(targetId: string): ActionDescriptor {
  return { type: TOGGLE_ACTION, targetId };
}
