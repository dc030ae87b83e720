/**
 * Pipeline error taxonomy
 *
 * Every failure the loader can record in a step outcome is one of these.
 * Only ConfigurationError is fatal; the rest are logged and the run goes on.
 */

// ============================================================================
// Error Classes
// ============================================================================

export class TransportError extends Error {
  code = "TRANSPORT_ERROR" as const;

  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = "TransportError";
  }
}

export class ParseError extends Error {
  code: "PARSE_ERROR" | "MALFORMED_ROW" = "PARSE_ERROR";

  constructor(
    message: string,
    public readonly source: string
  ) {
    super(message);
    this.name = "ParseError";
  }
}

/**
 * A row whose field count does not match the header. Rejects the whole
 * bulk operation it belongs to.
 */
export class MalformedRowError extends ParseError {
  constructor(
    source: string,
    public readonly line: number,
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(
      `Malformed row at line ${String(line)}: expected ${String(expected)} fields, got ${String(actual)}`,
      source
    );
    this.code = "MALFORMED_ROW";
    this.name = "MalformedRowError";
  }
}

export class SchemaError extends Error {
  code = "SCHEMA_ERROR" as const;

  constructor(
    message: string,
    public readonly target: string
  ) {
    super(message);
    this.name = "SchemaError";
  }
}

export class ConstraintViolation extends Error {
  code = "CONSTRAINT_VIOLATION" as const;

  constructor(
    message: string,
    public readonly table: string
  ) {
    super(message);
    this.name = "ConstraintViolation";
  }
}

export class ConfigurationError extends Error {
  code = "CONFIGURATION_ERROR" as const;

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export type PipelineError =
  | TransportError
  | ParseError
  | SchemaError
  | ConstraintViolation;

// ============================================================================
// Result Type
// ============================================================================

export type Result<T, E extends Error = PipelineError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ============================================================================
// Mapping
// ============================================================================

function sqliteCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Map anything thrown inside a storage step onto the taxonomy. SQLite
 * constraint failures become ConstraintViolation, our own errors pass
 * through, everything else is treated as a storage (schema) failure.
 */
export function toPipelineError(error: unknown, target: string): PipelineError {
  if (
    error instanceof TransportError ||
    error instanceof ParseError ||
    error instanceof SchemaError ||
    error instanceof ConstraintViolation
  ) {
    return error;
  }

  if (error instanceof Error) {
    const code = sqliteCode(error);
    if (code?.startsWith("SQLITE_CONSTRAINT") === true) {
      return new ConstraintViolation(error.message, target);
    }
    return new SchemaError(error.message, target);
  }

  return new SchemaError(String(error), target);
}
