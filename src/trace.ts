/**
 * Trace Module
 *
 * Append-only record of generated values and their recorded dependencies.
 * Mutating helpers used by the shrinker (`withEntryValue`, `withoutEntry`)
 * always work on a full copy so the source trace stays untouched.
 */

import type { Domain, EntryId, EntryMetadata, Reconstruction, Trace, TraceEntry } from './types'
import { UnknownEntryError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type TraceInvariant =
  | 'uniqueIds'
  | 'idOrder'
  | 'nextIdAhead'
  | 'dependencyExists'
  | 'dependencyEarlier'
  | 'assignmentExists'

export type TraceInvariantViolation = {
  invariant: TraceInvariant
  entryId?: EntryId
  message: string
}

// ============================================================================
// Ids
// ============================================================================

export function entryIdAt(index: number): EntryId {
  return `t${index}` as EntryId
}

/** Generation index encoded in an entry id, or -1 for foreign ids */
export function entryIndexOf(id: string): number {
  const match = /^t(\d+)$/.exec(id)
  if (!match) return -1
  return Number(match[1])
}

// ============================================================================
// Construction
// ============================================================================

export function createTrace(): Trace {
  return { entries: [], variableAssignments: new Map(), nextId: 0 }
}

export function addEntry(
  trace: Trace,
  origin: Domain<unknown>,
  value: unknown,
  dependencies: readonly EntryId[] = [],
  metadata: EntryMetadata = {}
): EntryId {
  const id = entryIdAt(trace.nextId)
  trace.nextId++

  trace.entries.push({
    id,
    origin,
    value,
    dependencies: [...new Set(dependencies)],
    metadata: { ...metadata },
  })
  return id
}

export function assignVariable(trace: Trace, name: string, id: EntryId): void {
  if (!getEntry(trace, id)) throw new UnknownEntryError(id, `Cannot bind '${name}': trace has no entry '${id}'`)
  trace.variableAssignments.set(name, id)
}

export function getEntry(trace: Trace, id: EntryId): TraceEntry | undefined {
  return trace.entries.find(e => e.id === id)
}

// ============================================================================
// Copies
// ============================================================================

/**
 * Independent copy of the entry list and the assignments. Values are shared:
 * shrink transforms never mutate a value in place, they return a new one.
 */
export function cloneTrace(trace: Trace): Trace {
  return {
    entries: trace.entries.map(e => ({
      id: e.id,
      origin: e.origin,
      value: e.value,
      dependencies: [...e.dependencies],
      metadata: { ...e.metadata },
    })),
    variableAssignments: new Map(trace.variableAssignments),
    nextId: trace.nextId,
  }
}

export function withEntryValue(trace: Trace, id: EntryId, value: unknown): Trace {
  const copy = cloneTrace(trace)
  const entry = getEntry(copy, id)
  if (!entry) throw new UnknownEntryError(id)
  entry.value = value
  return copy
}

/**
 * Copy of the trace without `id`: the entry, every assignment bound to it and
 * every dependency reference to it are gone. `nextId` is kept so ids are never
 * reused.
 */
export function withoutEntry(trace: Trace, id: EntryId): Trace {
  const copy = cloneTrace(trace)
  if (!getEntry(copy, id)) throw new UnknownEntryError(id)

  copy.entries = copy.entries.filter(e => e.id !== id)
  for (const [name, bound] of [...copy.variableAssignments]) {
    if (bound === id) copy.variableAssignments.delete(name)
  }
  for (const entry of copy.entries) {
    entry.dependencies = entry.dependencies.filter(dep => dep !== id)
  }
  return copy
}

// ============================================================================
// Reconstruction
// ============================================================================

export function reconstructValue(trace: Trace): Reconstruction {
  return new Map(trace.entries.map(e => [e.id, e.value] as const))
}

/** Name → value view over the bound entries */
export function reconstructVariables(trace: Trace): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [name, id] of trace.variableAssignments) {
    const entry = getEntry(trace, id)
    if (entry) out[name] = entry.value
  }
  return out
}

// ============================================================================
// Invariants
// ============================================================================

export function validateTrace(trace: Trace): TraceInvariantViolation[] {
  const violations: TraceInvariantViolation[] = []
  const position = new Map<EntryId, number>()
  let previousIndex = -1

  trace.entries.forEach((entry, i) => {
    if (position.has(entry.id)) {
      violations.push({ invariant: 'uniqueIds', entryId: entry.id, message: `Entry id ${entry.id} appears more than once` })
    }
    position.set(entry.id, i)

    const index = entryIndexOf(entry.id)
    if (index <= previousIndex) {
      violations.push({ invariant: 'idOrder', entryId: entry.id, message: `Entry id ${entry.id} is not after the previous entry` })
    }
    previousIndex = Math.max(previousIndex, index)

    if (index >= trace.nextId) {
      violations.push({ invariant: 'nextIdAhead', entryId: entry.id, message: `nextId ${trace.nextId} does not exceed ${entry.id}` })
    }

    for (const dep of entry.dependencies) {
      const depPosition = position.get(dep)
      if (dep === entry.id) {
        violations.push({ invariant: 'dependencyEarlier', entryId: entry.id, message: `${entry.id} depends on itself` })
      } else if (depPosition === undefined) {
        const later = trace.entries.some(e => e.id === dep)
        violations.push(later
          ? { invariant: 'dependencyEarlier', entryId: entry.id, message: `${entry.id} depends on later entry ${dep}` }
          : { invariant: 'dependencyExists', entryId: entry.id, message: `${entry.id} depends on missing entry ${dep}` })
      }
    }
  })

  for (const [name, id] of trace.variableAssignments) {
    if (!position.has(id)) {
      violations.push({ invariant: 'assignmentExists', entryId: id, message: `Variable '${name}' is bound to missing entry ${id}` })
    }
  }

  return violations
}
