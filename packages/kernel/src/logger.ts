/**
 * Logger
 *
 * pino-backed component loggers. Inside a render `Context` every line
 * carries `request_id`, `trace_id` and `route`.
 *
 * Loggers from `Logger.for()` resolve lazily, so a module-level
 * `const log = Logger.for('Composer')` follows later `configure`,
 * `setLevel` and `reset` calls.
 *
 * @example
 * ```typescript
 * Logger.configure({ level: 'debug', prettyPrint: true });
 *
 * const log = Logger.for('HydrationEngine');
 * log.debug({ bound: 3 }, 'Hydrated');
 * ```
 */

import pino, { type DestinationStream, type Logger as PinoLogger, type LoggerOptions } from "pino";
import { Context, type KernelContext } from "./context";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

export interface LoggerConfig {
  /** Log level (default: TESSEL_LOG_LEVEL from the environment, else 'info') */
  level?: LogLevel;
  /** Where lines go; stdout when omitted. Ignored while pretty printing. */
  destination?: DestinationStream;
  /** Add render context fields to every line (default: true) */
  includeContext?: boolean;
  /** Pretty print through pino-pretty (default: NODE_ENV === 'development') */
  prettyPrint?: boolean;
}

/**
 * Message-first (`log.info('Bound')`) or object-first
 * (`log.warn({ err, nodeId }, 'Dropped write')`).
 */
export interface LogMethod {
  (msg: string, ...args: unknown[]): void;
  (obj: Record<string, unknown>, msg?: string, ...args: unknown[]): void;
}

export interface KernelLogger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
  child(bindings: Record<string, unknown>): KernelLogger;
  readonly level: LogLevel;
}

let globalLogger: PinoLogger | null = null;
let globalConfig: LoggerConfig = {};
/** Bumped whenever the global logger changes; lazy loggers re-resolve on change */
let generation = 0;

function readEnv(name: string): string | undefined {
  return typeof process !== "undefined" ? process.env[name] : undefined;
}

function defaultLevel(): LogLevel {
  const fromEnv = readEnv("TESSEL_LOG_LEVEL");
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

function toLogLevel(level: string): LogLevel {
  return isLogLevel(level) ? level : "info";
}

function contextFields(ctx: KernelContext): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  if (ctx.requestId) fields.request_id = ctx.requestId;
  if (ctx.traceId) fields.trace_id = ctx.traceId;
  if (ctx.route) fields.route = ctx.route;
  return fields;
}

function createPino(config: LoggerConfig): PinoLogger {
  const usePretty = config.prettyPrint ?? (readEnv("NODE_ENV") === "development" && !config.destination);

  const options: LoggerOptions = {
    level: config.level ?? defaultLevel(),
    base: typeof process !== "undefined" ? { pid: process.pid } : {},
    // Runs on every line
    mixin: () => {
      if (config.includeContext === false) return {};
      const ctx = Context.tryGet();
      return ctx ? contextFields(ctx) : {};
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (usePretty) {
    options.transport = {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname" },
    };
    return pino(options);
  }
  return config.destination ? pino(options, config.destination) : pino(options);
}

function getOrCreateGlobalLogger(): PinoLogger {
  if (!globalLogger) {
    globalLogger = createPino(globalConfig);
  }
  return globalLogger;
}

function lazyLogger(bindings: Record<string, unknown>): KernelLogger {
  let cached: PinoLogger | null = null;
  let cachedGeneration = -1;

  const current = (): PinoLogger => {
    if (cached === null || cachedGeneration !== generation) {
      cached = getOrCreateGlobalLogger().child(bindings);
      cachedGeneration = generation;
    }
    return cached;
  };

  return {
    get trace() {
      const target = current();
      return target.trace.bind(target);
    },
    get debug() {
      const target = current();
      return target.debug.bind(target);
    },
    get info() {
      const target = current();
      return target.info.bind(target);
    },
    get warn() {
      const target = current();
      return target.warn.bind(target);
    },
    get error() {
      const target = current();
      return target.error.bind(target);
    },
    get fatal() {
      const target = current();
      return target.fatal.bind(target);
    },
    child(childBindings: Record<string, unknown>): KernelLogger {
      return lazyLogger({ ...bindings, ...childBindings });
    },
    get level(): LogLevel {
      return toLogLevel(current().level);
    },
  };
}

export const Logger = {
  /**
   * Merge `config` into the global configuration and rebuild the logger.
   */
  configure(config: LoggerConfig): void {
    globalConfig = { ...globalConfig, ...config };
    globalLogger = createPino(globalConfig);
    generation++;
  },

  /**
   * Logger bound to `component`: a name, or an object whose constructor
   * name is used.
   */
  for(nameOrComponent: string | object): KernelLogger {
    const name =
      typeof nameOrComponent === "string" ? nameOrComponent : nameOrComponent.constructor.name;
    return lazyLogger({ component: name });
  },

  get level(): LogLevel {
    return toLogLevel(getOrCreateGlobalLogger().level);
  },

  setLevel(level: LogLevel): void {
    getOrCreateGlobalLogger().level = level;
    generation++;
  },

  /** Drop the global logger and its configuration. */
  reset(): void {
    globalLogger = null;
    globalConfig = {};
    generation++;
  },
};

export type { DestinationStream };
