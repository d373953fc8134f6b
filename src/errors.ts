/**
 * Error taxonomy for the schematic engine.
 *
 * Every error carries a stable `code` and a `context` record so that callers
 * (tool layers, CLIs) can build their own messages without parsing ours.
 */

export type ErrorContext = Record<string, string | number | boolean | undefined>;

export class SchematicError extends Error {
  readonly code: string;
  readonly context: ErrorContext;

  constructor(code: string, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }
}

/** Malformed s-expression text: unbalanced delimiters, bad escapes, unterminated strings. */
export class SExprSyntaxError extends SchematicError {
  readonly offset: number;
  readonly line: number;
  readonly column: number;

  constructor(message: string, offset: number, line: number, column: number) {
    super("SYNTAX_ERROR", `${message} (line ${line}, column ${column})`, { offset, line, column });
    this.offset = offset;
    this.line = line;
    this.column = column;
  }
}

export class DuplicateReferenceError extends SchematicError {
  constructor(reference: string, scope: string, existingUuid?: string) {
    super("DUPLICATE_REFERENCE", `Reference ${reference} already exists in ${scope}`, {
      reference,
      scope,
      existingUuid,
    });
  }
}

export class DuplicateIdError extends SchematicError {
  constructor(uuid: string, kind?: string) {
    super("DUPLICATE_ID", `Identifier ${uuid} is already in use`, { uuid, kind });
  }
}

export class NotFoundError extends SchematicError {
  constructor(kind: string, key: string, operation?: string) {
    super("NOT_FOUND", `${kind} not found: ${key}`, { kind, key, operation });
  }
}

export class SymbolNotFoundError extends SchematicError {
  constructor(libId: string, detail?: string) {
    super("SYMBOL_NOT_FOUND", `Symbol ${libId} could not be resolved${detail ? `: ${detail}` : ""}`, { libId });
  }
}

export class NoPathError extends SchematicError {
  constructor(reason: string, context: ErrorContext = {}) {
    super("NO_PATH", `No route found: ${reason}`, context);
  }
}

export class InvalidArgumentError extends SchematicError {
  constructor(message: string, context: ErrorContext = {}) {
    super("INVALID_ARGUMENT", message, context);
  }
}

export class ConfigError extends SchematicError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], context: ErrorContext = {}) {
    super("CONFIG_ERROR", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, context);
    this.issues = issues;
  }
}

export type IssueSeverity = "error" | "warning";

/** One structural finding reported by `Schematic.validate()`. */
export interface ValidationIssue {
  code:
    | "INVALID_REFERENCE"
    | "DUPLICATE_REFERENCE"
    | "DUPLICATE_ID"
    | "MISSING_ID"
    | "MISSING_SYMBOL"
    | "OVERLAPPING_COMPONENTS"
    | "INVALID_ROTATION"
    | "DEGENERATE_WIRE";
  severity: IssueSeverity;
  message: string;
  /** Identifier of the offending entity, when it has one. */
  uuid?: string;
  reference?: string;
}

/** Thrown only when a caller asks for a valid document (e.g. `save({ validate: true })`). */
export class ValidationError extends SchematicError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[], operation: string) {
    super("VALIDATION_FAILED", `${operation} rejected: ${issues.length} validation error(s)`, {
      operation,
      count: issues.length,
    });
    this.issues = issues;
  }
}
