/**
 * Type-specific shrink transforms.
 *
 * Each transform takes one value and proposes one smaller candidate. All of
 * them are pure and reach a fixed point at their minimum value.
 */

import type { TraceEntry } from './types'

export type ShrinkOutcome =
  | { kind: 'shrunk'; value: unknown }
  | { kind: 'minimal'; reason: string }

// ============================================================================
// Transforms
// ============================================================================

/** Halve toward zero; 0 is the fixed point for either sign */
export function shrinkInteger(value: number): number {
  if (value > 0) return Math.max(0, Math.floor(value / 2))
  if (value < 0) return Math.trunc(value / 2) || 0
  return value
}

export function shrinkText(value: string): string {
  if (value.length <= 1) return value
  return value.slice(0, Math.floor(value.length / 2))
}

export function shrinkSequence<T>(value: readonly T[]): T[] {
  if (value.length <= 1) return [...value]
  return value.slice(0, Math.floor(value.length / 2))
}

// ============================================================================
// Dispatch
// ============================================================================

/** Applies the transform for the value's kind */
export function shrinkValue(value: unknown): ShrinkOutcome {
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    const next = shrinkInteger(value)
    return next === value ? minimal('integer is already 0') : { kind: 'shrunk', value: next }
  }
  if (typeof value === 'string') {
    const next = shrinkText(value)
    return next === value ? minimal('text is too short to halve') : { kind: 'shrunk', value: next }
  }
  if (Array.isArray(value)) {
    if (value.length <= 1) return minimal('sequence is too short to halve')
    return { kind: 'shrunk', value: shrinkSequence(value) }
  }
  return minimal(`cannot shrink ${describeKind(value)} further`)
}

/**
 * Shrink step for a recorded entry: the producing domain's own `shrink` when it
 * declares one, the kind table otherwise.
 */
export function shrinkEntryValue(entry: TraceEntry): ShrinkOutcome {
  const { origin, value } = entry
  if (origin.shrink && origin.accepts(value)) {
    const next = origin.shrink(value)
    return Object.is(next, value) ? minimal(`${origin.label} reports no smaller value`) : { kind: 'shrunk', value: next }
  }
  return shrinkValue(value)
}

function minimal(reason: string): ShrinkOutcome {
  return { kind: 'minimal', reason }
}

function describeKind(value: unknown): string {
  if (value === null) return 'null'
  if (typeof value === 'number') return 'non-integer number'
  return typeof value
}
