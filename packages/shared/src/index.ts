/**
 * # Tessel Shared
 *
 * Platform-independent pieces used by both the server renderer and the
 * client runtime:
 *
 * - **Errors** - the `TesselError` hierarchy, type guards and helpers
 * - **Action descriptors** - the `data-action` JSON contract, validated with zod
 *
 * ```typescript
 * import { encodeAction, parseAction, toggleAction } from 'tessel-shared';
 *
 * const attr = encodeAction(toggleAction('hamburger-menu-1'));
 * ```
 *
 * @module tessel-shared
 */

export * from "./errors";
export * from "./action";
