/**
 * Error taxonomy for the clause engine.
 *
 * Heuristic misses in segmentation never raise; these errors cover empty
 * input, bad arguments and index builds that could not complete.
 */

export type ClauseEngineErrorCode =
  | "INPUT_ERROR"
  | "BACKEND_UNAVAILABLE"
  | "INVALID_ARGUMENT"
  | "INDEX_BUILD_FAILED";

/** Base class for every error the engine raises on purpose. */
export class ClauseEngineError extends Error {
  public readonly code: ClauseEngineErrorCode;

  public constructor(code: ClauseEngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = new.target.name;
  }
}

/** No page text at all, or nothing extractable. Recoverable by re-upload. */
export class InputError extends ClauseEngineError {
  public constructor(message = "No extractable text", options?: { cause?: unknown }) {
    super("INPUT_ERROR", message, options);
  }
}

/** The dense embedding backend could not initialize or embed. */
export class BackendUnavailableError extends ClauseEngineError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("BACKEND_UNAVAILABLE", message, options);
  }
}

export class InvalidArgumentError extends ClauseEngineError {
  public constructor(message: string) {
    super("INVALID_ARGUMENT", message);
  }
}

/** Raised once per document-processing attempt when no index could be built. */
export class IndexBuildError extends ClauseEngineError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("INDEX_BUILD_FAILED", message, options);
  }
}

/** Render any thrown value as a single log-friendly line. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
