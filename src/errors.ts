/**
 * Error hierarchy for the parsing engine.
 *
 * Malformed source text never throws: lexical and syntax errors become
 * ERROR and MISSING nodes in the tree. The classes below cover requests
 * that cannot be honoured at all.
 */

export abstract class SylvanError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Table blob was produced for an engine version this build cannot read.
 */
export class LanguageVersionMismatchError extends SylvanError {
  readonly code = "ERR_LANGUAGE_VERSION";

  constructor(
    readonly version: number,
    readonly minVersion: number,
    readonly maxVersion: number
  ) {
    super(
      `Incompatible language version ${version}. Expected a version between ${minVersion} and ${maxVersion}`
    );
  }
}

export class InvalidLanguageError extends SylvanError {
  readonly code = "ERR_LANGUAGE_INVALID";

  constructor(readonly reason: string) {
    super(`Invalid language table: ${reason}`);
  }
}

export class InvalidEditRangeError extends SylvanError {
  readonly code = "ERR_EDIT_RANGE";

  constructor(reason: string) {
    super(`Invalid edit: ${reason}`);
  }
}

export type QueryErrorKind =
  | "syntax"
  | "node_type"
  | "field"
  | "capture"
  | "predicate"
  | "structure";

/**
 * Pattern text could not be compiled. `offset` is a byte offset into the
 * pattern source; row and column locate it for display.
 */
export class QueryCompileError extends SylvanError {
  readonly code = "ERR_QUERY_COMPILE";

  constructor(
    readonly kind: QueryErrorKind,
    readonly reason: string,
    readonly offset: number,
    readonly row: number,
    readonly column: number
  ) {
    super(`Query error at ${row + 1}:${column + 1} (${kind}): ${reason}`);
  }
}

export class ParseCancelledError extends SylvanError {
  readonly code = "ERR_PARSE_CANCELLED";

  constructor(readonly reason: "aborted" | "timeout") {
    super(reason === "timeout" ? "Parse timed out" : "Parse was cancelled");
  }
}

/**
 * A handle was used after `delete()` was called on it or on the Language
 * it was built from.
 */
export class ReleasedHandleError extends SylvanError {
  readonly code = "ERR_RELEASED";

  constructor(handle: string) {
    super(`${handle} has been released`);
  }
}

export class ConfigError extends SylvanError {
  readonly code = "ERR_CONFIG";

  constructor(message: string, readonly path?: string) {
    super(path ? `${message} (${path})` : message);
  }
}

export class UnknownLanguageError extends SylvanError {
  readonly code = "ERR_UNKNOWN_LANGUAGE";

  constructor(language: string | number) {
    super(`Unknown language: ${language}`);
  }
}

export class DuplicateLanguageError extends SylvanError {
  readonly code = "ERR_DUPLICATE_LANGUAGE";

  constructor(readonly language: string) {
    super(`Language "${language}" is already registered`);
  }
}

export type RangesQueryErrorKind = "missing_capture" | "duplicate_capture";

/** A fold or indent query lacks the captures it is read through */
export class RangesQueryError extends SylvanError {
  readonly code = "ERR_RANGES_QUERY";

  constructor(
    readonly kind: RangesQueryErrorKind,
    reason: string
  ) {
    super(reason);
  }
}

export type InjectionQueryErrorKind =
  | "missing_capture"
  | "duplicate_capture"
  | "invalid_property"
  | "language_conflict"
  | "invalid_predicate";

export class InjectionQueryError extends SylvanError {
  readonly code = "ERR_INJECTION_QUERY";

  constructor(
    readonly kind: InjectionQueryErrorKind,
    reason: string,
    readonly patternIndex: number | null = null
  ) {
    super(patternIndex === null ? reason : `${reason} in pattern ${patternIndex}`);
  }
}

export type SessionErrorKind = "no_document" | "document_too_large" | "no_highlights";

/** A tool session request that the open document cannot serve */
export class SessionError extends SylvanError {
  readonly code = "ERR_SESSION";

  constructor(
    readonly kind: SessionErrorKind,
    reason: string
  ) {
    super(reason);
  }
}
