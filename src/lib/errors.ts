/**
 * Centralized error definitions for the compiler boundary
 *
 * Library, target list and output failures stop a run. A failed selection
 * cache write is logged and the run continues with the decision in memory.
 * Everything that goes wrong for a single query or song is a value in
 * src/lib/issues.ts and is reported at the end of the run instead.
 */

import { Data } from "effect"

// ============================================================================
// Input Errors
// ============================================================================

/**
 * The library file could not be read, is not JSON, or has no song list
 */
export class LibraryLoadError extends Data.TaggedError("LibraryLoadError")<{
  readonly path: string
  readonly message: string
  readonly cause?: unknown
}> {}

/**
 * The target list file could not be read
 */
export class TargetListError extends Data.TaggedError("TargetListError")<{
  readonly path: string
  readonly cause: unknown
}> {}

// ============================================================================
// Persistence Errors
// ============================================================================

/**
 * Writing the selection cache back to disk failed
 */
export class SelectionCacheError extends Data.TaggedError("SelectionCacheError")<{
  readonly path: string
  readonly message: string
  readonly cause: unknown
}> {}

/**
 * The compiled setlist could not be written for the renderer
 */
export class OutputWriteError extends Data.TaggedError("OutputWriteError")<{
  readonly path: string
  readonly cause: unknown
}> {}

// ============================================================================
// Error Union
// ============================================================================

export type CompilerError =
  | LibraryLoadError
  | TargetListError
  | SelectionCacheError
  | OutputWriteError

export const isCompilerError = (error: unknown): error is CompilerError =>
  error instanceof LibraryLoadError ||
  error instanceof TargetListError ||
  error instanceof SelectionCacheError ||
  error instanceof OutputWriteError

/**
 * One-line description for the CLI
 */
export function describeCompilerError(error: CompilerError): string {
  switch (error._tag) {
    case "LibraryLoadError":
      return `Could not load song library ${error.path}: ${error.message}`
    case "TargetListError":
      return `Could not read target list ${error.path}: ${formatCause(error.cause)}`
    case "SelectionCacheError":
      return `Could not save selection cache ${error.path}: ${error.message}`
    case "OutputWriteError":
      return `Could not write ${error.path}: ${formatCause(error.cause)}`
  }
}

export function formatCause(cause: unknown): string {
  if (cause instanceof Error) return `${cause.name}: ${cause.message}`
  try {
    return JSON.stringify(cause) ?? String(cause)
  } catch {
    return String(cause)
  }
}
