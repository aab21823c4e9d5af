/**
 * Shared Types
 *
 * Branded entry ids and the trace data model shared by the tracer, the graph
 * queries and the shrinker.
 */

import type { Random } from 'fast-check'

// ============================================================================
// Branded ID Types
// ============================================================================

declare const __entryId: unique symbol

/** Trace entry id: `t0`, `t1`, … in generation order */
export type EntryId = string & { readonly [__entryId]: true }

// ============================================================================
// Domains
// ============================================================================

/**
 * The space of values a generator can produce.
 *
 * `accepts` is a runtime type guard used when replaying stored values into a
 * domain. It holds only for values the domain could generate, bounds
 * included.
 */
export interface Domain<T> {
  readonly label: string
  generate(random: Random): T
  accepts(value: unknown): value is T
  /** Domain-specific shrink step; replaces the default transform table */
  shrink?(value: T): T
}

// ============================================================================
// Trace Data Model
// ============================================================================

export type EntryMetadata = Record<string, unknown>

export type TraceEntry = {
  readonly id: EntryId
  /** Domain that produced the value (opaque to the graph queries) */
  readonly origin: Domain<unknown>
  value: unknown
  /** Ids of strictly earlier entries, in recording order */
  dependencies: EntryId[]
  metadata: EntryMetadata
}

export type Trace = {
  entries: TraceEntry[]
  variableAssignments: Map<string, EntryId>
  nextId: number
}

/** Flat id → value view of a trace, the only shape the shrinker rebuilds */
export type Reconstruction = ReadonlyMap<EntryId, unknown>

/**
 * Black-box test used while shrinking. Throwing means the example still fails
 * (candidate accepted); returning normally means it passes (candidate rejected).
 */
export type Predicate = (value: Reconstruction) => unknown
