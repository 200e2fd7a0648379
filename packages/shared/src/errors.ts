/**
 * Tessel Error Hierarchy
 *
 * Structured error classes shared by the composer, the hydration layer and the
 * kernel. All errors extend TesselError which provides:
 * - Unique error codes for programmatic handling
 * - Rich metadata for debugging
 * - Serialization support (errors travel into structured logs as JSON)
 * - Type guards for catching specific error types
 *
 * Most of these are reported rather than thrown: a composition error reaches
 * the caller's `onError`, a hydration binding error is logged and the element
 * is left inert.
 *
 * @example Catching specific errors
 * ```typescript
 * const composer = new Composer({
 *   onError: (error) => {
 *     if (isCompositionError(error)) {
 *       report(error.component, error.toJSON());
 *     }
 *   },
 * });
 * ```
 */

// =============================================================================
// Base Error
// =============================================================================

/**
 * Error codes for programmatic error handling.
 * Format: CATEGORY_SPECIFIC (e.g., HYDRATION_PARSE, VALIDATION_REQUIRED)
 */
export type TesselErrorCode =
  // Composition
  | "COMPOSITION_BODY"
  | "COMPOSITION_HOOK_ORDER"
  // Hydration
  | "HYDRATION_PARSE"
  | "HYDRATION_TARGET"
  | "HYDRATION_DOUBLE_REGISTRATION"
  // Validation
  | "VALIDATION_REQUIRED"
  | "VALIDATION_TYPE"
  | "VALIDATION_FORMAT"
  | "VALIDATION_CONSTRAINT"
  // State/Lifecycle
  | "STATE_INVALID"
  | "STATE_NOT_READY"
  | "STATE_DISPOSED"
  // Context
  | "CONTEXT_NOT_FOUND"
  // Reactivity
  | "REACTIVITY_DISPOSED"
  | "REACTIVITY_REENTRANT";

/**
 * Serialized error format
 */
export interface SerializedTesselError {
  name: string;
  code: TesselErrorCode;
  message: string;
  details?: Record<string, unknown>;
  cause?: SerializedTesselError | { message: string; name?: string };
  stack?: string;
}

function isSerializedTesselError(
  value: SerializedTesselError | { message: string; name?: string },
): value is SerializedTesselError {
  return "code" in value && typeof value.code === "string";
}

/**
 * Base class for all Tessel errors.
 * Provides consistent structure, serialization, and type identification.
 */
export class TesselError extends Error {
  /** Unique error code for programmatic handling */
  readonly code: TesselErrorCode;

  /** Additional error details */
  readonly details: Record<string, unknown>;

  constructor(
    code: TesselErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(message, { cause });
    this.name = "TesselError";
    this.code = code;
    this.details = details;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serialize error (JSON-safe)
   */
  toJSON(): SerializedTesselError {
    const serialized: SerializedTesselError = {
      name: this.name,
      code: this.code,
      message: this.message,
    };

    if (Object.keys(this.details).length > 0) {
      serialized.details = this.details;
    }

    if (this.cause instanceof TesselError) {
      serialized.cause = this.cause.toJSON();
    } else if (this.cause instanceof Error) {
      serialized.cause = {
        message: this.cause.message,
        name: this.cause.name,
      };
    }

    if (this.stack) {
      serialized.stack = this.stack;
    }

    return serialized;
  }

  /**
   * Create error from serialized format
   */
  static fromJSON(json: SerializedTesselError): TesselError {
    let cause: Error | undefined;
    if (json.cause) {
      cause = isSerializedTesselError(json.cause)
        ? TesselError.fromJSON(json.cause)
        : new Error(json.cause.message);
    }

    return new TesselError(json.code, json.message, json.details, cause);
  }
}

// =============================================================================
// Composition Errors
// =============================================================================

/**
 * Error reported when a node body throws during composition, or when hooks
 * are called in a different order than on the previous run.
 *
 * The composer keeps the node's previous subtree and hands this error to the
 * caller-supplied handler.
 */
export class CompositionError extends TesselError {
  /** Display name of the component whose body failed */
  readonly component: string;

  /** Arena index of the failing node */
  readonly nodeId: number;

  constructor(
    component: string,
    nodeId: number,
    message: string,
    code: "COMPOSITION_BODY" | "COMPOSITION_HOOK_ORDER" = "COMPOSITION_BODY",
    cause?: Error,
  ) {
    super(code, message, { component, nodeId }, cause);
    this.name = "CompositionError";
    this.component = component;
    this.nodeId = nodeId;
  }

  /**
   * Wrap an error thrown by a component body
   */
  static body(component: string, nodeId: number, cause: Error): CompositionError {
    return new CompositionError(
      component,
      nodeId,
      `Component '${component}' threw during composition: ${cause.message}`,
      "COMPOSITION_BODY",
      cause,
    );
  }

  /**
   * Create error for hooks called in a different order or number
   */
  static hookOrder(component: string, nodeId: number, detail: string): CompositionError {
    return new CompositionError(
      component,
      nodeId,
      `Hooks in '${component}' ran in a different order than the previous composition (${detail}). ` +
        "Hooks must be called in the same order every run.",
      "COMPOSITION_HOOK_ORDER",
    );
  }
}

// =============================================================================
// Hydration Errors
// =============================================================================

/**
 * Error describing a hydration binding failure. Never thrown out of the
 * hydration walk; it is logged and the element is marked inert.
 *
 * @example
 * ```typescript
 * log.warn({ err: HydrationError.parse(raw, cause) }, 'Skipping action binding');
 * ```
 */
export class HydrationError extends TesselError {
  constructor(
    message: string,
    code:
      | "HYDRATION_PARSE"
      | "HYDRATION_TARGET"
      | "HYDRATION_DOUBLE_REGISTRATION" = "HYDRATION_PARSE",
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(code, message, details, cause);
    this.name = "HydrationError";
  }

  /**
   * Descriptor attribute was not valid JSON or failed validation
   */
  static parse(raw: string, cause?: Error): HydrationError {
    return new HydrationError(
      cause ? `Invalid action descriptor: ${cause.message}` : "Invalid action descriptor",
      "HYDRATION_PARSE",
      { raw },
      cause,
    );
  }

  /**
   * Descriptor names a target id that is not in the document
   */
  static missingTarget(targetId: string, type: string): HydrationError {
    return new HydrationError(
      `No element with id '${targetId}' for '${type}' action`,
      "HYDRATION_TARGET",
      { targetId, type },
    );
  }

  /**
   * A second handler set tried to register while another is active
   */
  static doubleRegistration(owner: string, holder: string | null, attempts: number): HydrationError {
    return new HydrationError(
      `Handler registration by '${owner}' skipped: '${holder ?? "unknown"}' is already active`,
      "HYDRATION_DOUBLE_REGISTRATION",
      { owner, holder, attempts },
    );
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when input validation fails.
 *
 * @example
 * ```typescript
 * throw ValidationError.required('type');
 * throw new ValidationError('handler', 'Handler function required', { expected: 'function' });
 * ```
 */
export class ValidationError extends TesselError {
  /** Field or parameter that failed validation */
  readonly field: string;

  /** Expected type or format (optional) */
  readonly expected?: string;

  /** Actual value received (optional) */
  readonly received?: string;

  constructor(
    field: string,
    message: string,
    options: {
      expected?: string;
      received?: string;
      code?:
        | "VALIDATION_REQUIRED"
        | "VALIDATION_TYPE"
        | "VALIDATION_FORMAT"
        | "VALIDATION_CONSTRAINT";
    } = {},
    cause?: Error,
  ) {
    const code = options.code ?? "VALIDATION_REQUIRED";

    super(
      code,
      message,
      {
        field,
        ...(options.expected !== undefined ? { expected: options.expected } : {}),
        ...(options.received !== undefined ? { received: options.received } : {}),
      },
      cause,
    );
    this.name = "ValidationError";
    this.field = field;
    this.expected = options.expected;
    this.received = options.received;
  }

  /**
   * Create a "required" validation error
   */
  static required(field: string, message?: string): ValidationError {
    return new ValidationError(field, message ?? `${field} is required`, {
      code: "VALIDATION_REQUIRED",
    });
  }

  /**
   * Create a "type mismatch" validation error
   */
  static type(field: string, expected: string, received?: string): ValidationError {
    const msg = received
      ? `${field} must be ${expected}, received ${received}`
      : `${field} must be ${expected}`;
    return new ValidationError(field, msg, {
      expected,
      received,
      code: "VALIDATION_TYPE",
    });
  }

  /**
   * Create a "constraint violated" validation error
   */
  static constraint(field: string, message: string): ValidationError {
    return new ValidationError(field, message, { code: "VALIDATION_CONSTRAINT" });
  }
}

// =============================================================================
// State/Lifecycle Errors
// =============================================================================

/**
 * Error thrown when an operation is attempted in an invalid state.
 *
 * @example
 * ```typescript
 * throw StateError.disposed('Composer');
 * throw new StateError('idle', 'composing', 'Hooks can only be called inside a component body');
 * ```
 */
export class StateError extends TesselError {
  /** Current state */
  readonly current: string;

  /** Expected/required state (optional) */
  readonly expectedState?: string;

  constructor(
    current: string,
    expectedState: string | undefined,
    message: string,
    code: "STATE_INVALID" | "STATE_NOT_READY" | "STATE_DISPOSED" = "STATE_INVALID",
    cause?: Error,
  ) {
    super(
      code,
      message,
      { current, ...(expectedState !== undefined ? { expectedState } : {}) },
      cause,
    );
    this.name = "StateError";
    this.current = current;
    this.expectedState = expectedState;
  }

  /**
   * Create error for "not ready" state
   */
  static notReady(component: string, current: string): StateError {
    return new StateError(
      current,
      "ready",
      `${component} is not ready (current state: ${current})`,
      "STATE_NOT_READY",
    );
  }

  /**
   * Create error for use after dispose
   */
  static disposed(component: string): StateError {
    return new StateError("disposed", undefined, `${component} has been disposed`, "STATE_DISPOSED");
  }

  /**
   * Create error for a hook called outside a component body
   */
  static invalidHookCall(hook: string): StateError {
    return new StateError(
      "idle",
      "composing",
      `Invalid hook call: ${hook}() can only be called inside a component body.\n` +
        "Possible causes:\n" +
        "1. Calling a hook outside a component\n" +
        "2. Calling a hook from an effect or event handler",
    );
  }
}

// =============================================================================
// Context Errors
// =============================================================================

/**
 * Error thrown when the execution context is missing.
 */
export class ContextError extends TesselError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: Error) {
    super("CONTEXT_NOT_FOUND", message, details, cause);
    this.name = "ContextError";
  }

  /**
   * Create "context not found" error with helpful message
   */
  static notFound(): ContextError {
    return new ContextError(
      "Context not found. Ensure you are running within a Context.run() block.",
    );
  }
}

// =============================================================================
// Reactivity Errors
// =============================================================================

/**
 * Error for state cell and scheduler misuse.
 *
 * @example
 * ```typescript
 * log.warn({ err: ReactivityError.disposed('count') }, 'Write dropped');
 * throw ReactivityError.reentrant();
 * ```
 */
export class ReactivityError extends TesselError {
  constructor(
    message: string,
    code: "REACTIVITY_DISPOSED" | "REACTIVITY_REENTRANT" = "REACTIVITY_DISPOSED",
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(code, message, details, cause);
    this.name = "ReactivityError";
  }

  /**
   * Create error for a write to a disposed cell or a cell owned by a disposed node
   */
  static disposed(cellName?: string, ownerId?: number): ReactivityError {
    return new ReactivityError(
      cellName
        ? `State cell '${cellName}' is disposed; write dropped`
        : "State cell is disposed; write dropped",
      "REACTIVITY_DISPOSED",
      { cellName, ownerId },
    );
  }

  /**
   * Create error for a composition pass started while another is running
   */
  static reentrant(): ReactivityError {
    return new ReactivityError(
      "A composition pass is already running; passes cannot be nested",
      "REACTIVITY_REENTRANT",
    );
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if error is any Tessel error
 */
export function isTesselError(error: unknown): error is TesselError {
  return error instanceof TesselError;
}

export function isCompositionError(error: unknown): error is CompositionError {
  return error instanceof CompositionError;
}

export function isHydrationError(error: unknown): error is HydrationError {
  return error instanceof HydrationError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isStateError(error: unknown): error is StateError {
  return error instanceof StateError;
}

export function isContextError(error: unknown): error is ContextError {
  return error instanceof ContextError;
}

export function isReactivityError(error: unknown): error is ReactivityError {
  return error instanceof ReactivityError;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Ensure a value is an Error, wrapping if necessary.
 * Useful for catch blocks that might receive non-Error values.
 */
export function ensureError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(String(value));
}

/**
 * Wrap any error as a Tessel error if it isn't already.
 */
export function wrapAsTesselError(
  error: unknown,
  defaultCode: TesselErrorCode = "STATE_INVALID",
): TesselError {
  if (error instanceof TesselError) {
    return error;
  }
  const err = ensureError(error);
  return new TesselError(defaultCode, err.message, {}, err);
}
