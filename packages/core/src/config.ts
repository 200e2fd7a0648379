import { z } from 'zod';
import { LOG_LEVELS, Logger } from 'tessel-kernel';
import type { LogLevel } from 'tessel-kernel';
import { ACTION_ATTRIBUTE, ValidationError } from 'tessel-shared';
import type { SchedulerStrategy } from './scheduler/recomposer';

export interface RuntimeConfig {
  /** Applied to the global logger when set; otherwise the logger keeps its own level */
  logLevel?: LogLevel;
  scheduler: SchedulerStrategy;
  maxPassesPerFlush: number;
  actionAttribute: string;
  /**
   * Keep `aria-expanded`, `aria-label` and hamburger labels in step with the
   * toggle target. `false` only flips `display`.
   */
  syncAria: boolean;
  rootElementId: string;
  stateElementId: string;
  /** Display used to show a target that has no recorded original display */
  defaultShowDisplay: string;
}

export type RuntimeConfigOptions = Partial<RuntimeConfig>;

const logLevelSchema = z.custom<LogLevel>(
  (value) => typeof value === 'string' && LOG_LEVELS.some((level) => level === value),
  { message: `logLevel must be one of ${LOG_LEVELS.join(', ')}` },
);

const runtimeConfigSchema = z
  .object({
    logLevel: logLevelSchema,
    scheduler: z.enum(['microtask', 'animation-frame', 'manual']),
    maxPassesPerFlush: z.number().int().positive(),
    actionAttribute: z.string().regex(/^data-[a-z0-9-]+$/, 'must be a data-* attribute name'),
    syncAria: z.boolean(),
    rootElementId: z.string().min(1),
    stateElementId: z.string().min(1),
    defaultShowDisplay: z
      .string()
      .min(1)
      .refine((value) => value !== 'none', 'must not be none'),
  })
  .partial()
  .strict();

const DEFAULTS: RuntimeConfig = {
  scheduler: 'microtask',
  maxPassesPerFlush: 10,
  actionAttribute: ACTION_ATTRIBUTE,
  syncAria: true,
  rootElementId: 'tessel-app',
  stateElementId: 'tessel-state',
  defaultShowDisplay: 'block',
};

let config: RuntimeConfig = { ...DEFAULTS };

/**
 * Configure runtime defaults. Options are validated and merged into the
 * current config; runtimes created afterwards pick them up.
 *
 * @example
 * ```typescript
 * configureRuntime({
 *   logLevel: 'debug',
 *   scheduler: 'animation-frame',
 *   syncAria: true,
 * });
 * ```
 */
export function configureRuntime(options: RuntimeConfigOptions): RuntimeConfig {
  config = resolveRuntimeConfig(options);
  if (config.logLevel !== undefined) {
    Logger.setLevel(config.logLevel);
  }
  return getRuntimeConfig();
}

/**
 * Validate options and merge them over the current config without storing
 * the result. Invalid options raise `ValidationError`.
 */
export function resolveRuntimeConfig(options: RuntimeConfigOptions = {}): RuntimeConfig {
  const result = runtimeConfigSchema.safeParse(options);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
    throw ValidationError.constraint(field, issue ? `${field}: ${issue.message}` : 'Invalid runtime config');
  }

  const resolved: RuntimeConfig = { ...config };
  for (const [key, value] of Object.entries(result.data)) {
    if (value === undefined) continue;
    Object.assign(resolved, { [key]: value });
  }
  return resolved;
}

export function getRuntimeConfig(): RuntimeConfig {
  return { ...config };
}

/**
 * Restore defaults. Meant for tests.
 */
export function resetRuntimeConfig(): void {
  config = { ...DEFAULTS };
}
