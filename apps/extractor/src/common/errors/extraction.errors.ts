/**
 * Extraction Errors - Custom error types for the extractor
 *
 * DemoLoadError, BundleLoadError, ExtractionFailedError and
 * InvalidArgumentError escape to the caller. MalformedRecordError travels
 * inside a Result: the offending row is dropped and counted, never thrown.
 *
 * @module common/errors
 */

/**
 * Base error for all extractor errors
 */
export abstract class ExtractionError extends Error {
  abstract readonly code: string;
  readonly timestamp: Date;
  readonly context: Record<string, unknown> | undefined;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
    };
  }
}

/**
 * A raw event row lacks the fields needed to identify it
 */
export class MalformedRecordError extends ExtractionError {
  readonly code = "MALFORMED_RECORD";
  readonly kind: string;
  readonly missingFields: readonly string[];

  constructor(kind: string, missingFields: readonly string[], context?: Record<string, unknown>) {
    super(`Malformed ${kind} record: missing ${missingFields.join(", ")}`, {
      ...context,
      kind,
      missingFields,
    });
    this.kind = kind;
    this.missingFields = missingFields;
  }
}

/**
 * The demo could not be read or parsed upstream
 */
export class DemoLoadError extends ExtractionError {
  readonly code = "DEMO_LOAD_FAILED";
  readonly source: string;

  constructor(source: string, reason: string, context?: Record<string, unknown>) {
    super(`Failed to load demo ${source}: ${reason}`, { ...context, source });
    this.source = source;
  }
}

/**
 * A previously exported result bundle could not be read back
 */
export class BundleLoadError extends ExtractionError {
  readonly code = "BUNDLE_LOAD_FAILED";
  readonly source: string;

  constructor(source: string, reason: string) {
    super(`Failed to load match bundle ${source}: ${reason}`, { source });
    this.source = source;
  }
}

/**
 * A derivation step failed; the match produces no bundle
 */
export class ExtractionFailedError extends ExtractionError {
  readonly code = "EXTRACTION_FAILED";
  readonly transformer: string;

  constructor(demoId: string, transformer: string, reason: string) {
    super(`Extraction failed for ${demoId} in ${transformer}: ${reason}`, {
      demoId,
      transformer,
    });
    this.transformer = transformer;
  }
}

/**
 * Bad command line or configuration value
 */
export class InvalidArgumentError extends ExtractionError {
  readonly code = "INVALID_ARGUMENT";
  readonly argument: string;

  constructor(argument: string, message: string) {
    super(message, { argument });
    this.argument = argument;
  }
}

/**
 * Result type for operations that can fail
 */
export type Result<T, E extends ExtractionError = ExtractionError> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Create a success result
 */
export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Create a failure result
 */
export function err<E extends ExtractionError>(error: E): Result<never, E> {
  return { success: false, error };
}

/**
 * Unwrap result or throw
 */
export function unwrap<T, E extends ExtractionError>(result: Result<T, E>): T {
  if (result.success) {
    return result.data;
  }
  throw result.error;
}
