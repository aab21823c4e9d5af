/**
 * Consolidated error system for tracecheck.
 *
 * All error classes extend TracecheckError, which carries a typed error code.
 * Predicate failures observed while shrinking are signals, not errors, and
 * never surface through these classes.
 */

import type { EntryId, Trace } from './types'

// ============================================================================
// Error Codes
// ============================================================================

export const TracecheckErrorCode = {
  // Domains
  INVALID_DOMAIN: 'INVALID_DOMAIN',
  UNSATISFIABLE_DOMAIN: 'UNSATISFIABLE_DOMAIN',

  // Tracing
  UNKNOWN_ENTRY: 'UNKNOWN_ENTRY',
  TRACE_SCOPE: 'TRACE_SCOPE',

  // Property runner
  PROPERTY_FAILED: 'PROPERTY_FAILED',
} as const

export type TracecheckErrorCode = (typeof TracecheckErrorCode)[keyof typeof TracecheckErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class TracecheckError extends Error {
  readonly code: TracecheckErrorCode

  constructor(code: TracecheckErrorCode, message: string) {
    super(message)
    this.name = 'TracecheckError'
    this.code = code
  }
}

// ============================================================================
// Domain Errors
// ============================================================================

export class InvalidDomainError extends TracecheckError {
  constructor(message: string) {
    super(TracecheckErrorCode.INVALID_DOMAIN, message)
    this.name = 'InvalidDomainError'
  }
}

export class UnsatisfiableDomainError extends TracecheckError {
  constructor(message: string) {
    super(TracecheckErrorCode.UNSATISFIABLE_DOMAIN, message)
    this.name = 'UnsatisfiableDomainError'
  }
}

// ============================================================================
// Tracing Errors
// ============================================================================

export class UnknownEntryError extends TracecheckError {
  readonly entryId: string

  constructor(entryId: string, message?: string) {
    super(TracecheckErrorCode.UNKNOWN_ENTRY, message ?? `Trace has no entry '${entryId}'`)
    this.name = 'UnknownEntryError'
    this.entryId = entryId
  }
}

export class TraceScopeError extends TracecheckError {
  constructor(message: string) {
    super(TracecheckErrorCode.TRACE_SCOPE, message)
    this.name = 'TraceScopeError'
  }
}

// ============================================================================
// Property Runner Errors
// ============================================================================

export type PropertyFailureDetails = {
  /** The generated example that first failed */
  example: unknown
  /** The replayed example built from the shrunk trace */
  shrunkExample: unknown
  /** Trace left after shrinking; still reproduces the failure */
  shrunkTrace: Trace
  /** Ids of entries whose value or presence changed while shrinking */
  changedEntries: EntryId[]
  /** Whatever the test threw for the original example */
  cause: unknown
  seed: number
  exampleIndex: number
}

export class PropertyFailedError extends TracecheckError {
  readonly example: unknown
  readonly shrunkExample: unknown
  readonly shrunkTrace: Trace
  readonly changedEntries: EntryId[]
  override readonly cause: unknown
  readonly seed: number
  readonly exampleIndex: number

  constructor(details: PropertyFailureDetails) {
    super(
      TracecheckErrorCode.PROPERTY_FAILED,
      `Property failed on example ${details.exampleIndex + 1} (seed=${details.seed}): ${describeCause(details.cause)}`
    )
    this.name = 'PropertyFailedError'
    this.example = details.example
    this.shrunkExample = details.shrunkExample
    this.shrunkTrace = details.shrunkTrace
    this.changedEntries = details.changedEntries
    this.cause = details.cause
    this.seed = details.seed
    this.exampleIndex = details.exampleIndex
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message
  return String(cause)
}
