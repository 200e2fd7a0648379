/**
 * # Tessel Kernel
 *
 * Low-level infrastructure shared by the runtime and the server renderer.
 *
 * - **Logger** - Structured pino logging with component-scoped child loggers
 * - **Context** - Request-scoped render context with automatic propagation
 *
 * ```typescript
 * import { Logger, Context } from 'tessel-kernel';
 *
 * const log = Logger.for('Renderer');
 *
 * Context.run(Context.create({ route: '/docs' }), () => {
 *   log.info('Rendering'); // includes request_id, trace_id and route
 * });
 * ```
 *
 * @module tessel-kernel
 */

export * from "./context";
export * from "./logger";
