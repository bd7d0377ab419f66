/**
 * Error Taxonomy
 *
 * Every failure the demo server can produce maps onto one of these classes.
 * Handlers convert validation and business-rule failures into tool error
 * responses; infrastructure failures travel up to the caller.
 */

// ─── Request Validation ──────────────────────────────────────────────────────

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export type ArgumentErrorKind = 'MissingArgument' | 'TypeMismatch';

/**
 * A tool argument that is absent or has the wrong type.
 */
export class ArgumentError extends ValidationError {
  constructor(
    public readonly kind: ArgumentErrorKind,
    field: string,
    message: string
  ) {
    super(message, field);
    this.name = 'ArgumentError';
  }
}

/**
 * Well-formed input the tool refuses to act on (divide by zero, unknown operation).
 */
export class BusinessRuleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BusinessRuleError';
  }
}

// ─── Storage ─────────────────────────────────────────────────────────────────

export type StoreErrorKind = 'ConnectionError' | 'MigrationError' | 'SeedError' | 'RetrievalError';

export class StoreError extends Error {
  constructor(
    public readonly kind: StoreErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StoreError';
  }
}

export class SerializationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SerializationError';
  }
}

// ─── Dispatch ────────────────────────────────────────────────────────────────

export type DispatchErrorKind = 'UnknownName' | 'DuplicateName';

export class DispatchError extends Error {
  constructor(
    public readonly kind: DispatchErrorKind,
    public readonly target: string,
    message: string
  ) {
    super(message);
    this.name = 'DispatchError';
  }
}

/**
 * True for failures a tool handler reports back to the caller as an error result.
 */
export function isToolError(error: unknown): error is ValidationError | BusinessRuleError {
  return error instanceof ValidationError || error instanceof BusinessRuleError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
