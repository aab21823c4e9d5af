/**
 * Invariant checkers for fuzz testing.
 *
 * These functions verify that traces, graph queries and shrink results
 * satisfy invariants that should hold regardless of how the trace was built.
 */
import { entryIndexOf, reconstructValue, validateTrace } from '../../../src/trace'
import {
  closure,
  connectedComponents,
  dependencyDepths,
  dependencyGraph,
  reverseDependencies,
} from '../../../src/graph'
import type { ShrinkResult } from '../../../src/shrinker'
import type { EntryId, Predicate, Trace } from '../../../src/types'

// ============================================================================
// Invariant Result Types
// ============================================================================

export interface InvariantViolation {
  invariant: string
  message: string
  context?: Record<string, unknown>
}

export interface InvariantCheckResult {
  passed: boolean
  violations: InvariantViolation[]
}

function result(violations: InvariantViolation[]): InvariantCheckResult {
  return { passed: violations.length === 0, violations }
}

// ============================================================================
// Trace Invariants
// ============================================================================

/**
 * traceIsWellFormed - ids unique and increasing, dependencies earlier and
 * present, bindings present
 */
export function traceIsWellFormed(trace: Trace): InvariantCheckResult {
  return result(
    validateTrace(trace).map(v => ({
      invariant: 'traceIsWellFormed',
      message: v.message,
      context: { rule: v.invariant, entryId: v.entryId },
    }))
  )
}

// ============================================================================
// Graph Invariants
// ============================================================================

/**
 * reverseIsTranspose - child → parent in the forward graph iff parent → child
 * in the reverse graph, and both cover every entry
 */
export function reverseIsTranspose(trace: Trace): InvariantCheckResult {
  const violations: InvariantViolation[] = []
  const forward = dependencyGraph(trace)
  const reverse = reverseDependencies(trace)

  for (const entry of trace.entries) {
    if (!forward.has(entry.id) || !reverse.has(entry.id)) {
      violations.push({
        invariant: 'reverseIsTranspose',
        message: `Entry ${entry.id} missing from a graph`,
        context: { entryId: entry.id },
      })
    }
  }

  for (const [child, parents] of forward) {
    for (const parent of parents) {
      if (!reverse.get(parent)?.has(child)) {
        violations.push({
          invariant: 'reverseIsTranspose',
          message: `Edge ${child} -> ${parent} has no reverse edge`,
          context: { child, parent },
        })
      }
    }
  }

  for (const [parent, children] of reverse) {
    for (const child of children) {
      if (!forward.get(child)?.has(parent)) {
        violations.push({
          invariant: 'reverseIsTranspose',
          message: `Reverse edge ${parent} -> ${child} has no forward edge`,
          context: { child, parent },
        })
      }
    }
  }

  return result(violations)
}

/**
 * componentsPartition - every entry is in exactly one component, and no edge
 * crosses two components
 */
export function componentsPartition(trace: Trace): InvariantCheckResult {
  const violations: InvariantViolation[] = []
  const owner = new Map<EntryId, number>()

  connectedComponents(trace).forEach((component, index) => {
    for (const id of component) {
      const previous = owner.get(id)
      if (previous !== undefined) {
        violations.push({
          invariant: 'componentsPartition',
          message: `Entry ${id} is in components ${previous} and ${index}`,
          context: { entryId: id },
        })
      }
      owner.set(id, index)
    }
  })

  for (const entry of trace.entries) {
    const home = owner.get(entry.id)
    if (home === undefined) {
      violations.push({
        invariant: 'componentsPartition',
        message: `Entry ${entry.id} is in no component`,
        context: { entryId: entry.id },
      })
      continue
    }
    for (const dep of entry.dependencies) {
      if (owner.get(dep) !== home) {
        violations.push({
          invariant: 'componentsPartition',
          message: `Edge ${entry.id} -> ${dep} crosses components`,
          context: { child: entry.id, parent: dep },
        })
      }
    }
  }

  return result(violations)
}

/**
 * depthsConsistent - roots have depth 0, every other entry is one deeper than
 * its deepest dependency
 */
export function depthsConsistent(trace: Trace): InvariantCheckResult {
  const violations: InvariantViolation[] = []
  const depths = dependencyDepths(trace)

  for (const entry of trace.entries) {
    const depth = depths.get(entry.id)
    const expected = entry.dependencies.length === 0
      ? 0
      : 1 + Math.max(...entry.dependencies.map(dep => depths.get(dep) ?? 0))

    if (depth !== expected) {
      violations.push({
        invariant: 'depthsConsistent',
        message: `Entry ${entry.id} has depth ${depth}, expected ${expected}`,
        context: { entryId: entry.id, depth, expected },
      })
    }
  }

  return result(violations)
}

/**
 * closureIsClosed - the closure of a set contains the set and every
 * dependency of its members
 */
export function closureIsClosed(trace: Trace, start: EntryId[]): InvariantCheckResult {
  const violations: InvariantViolation[] = []
  const graph = dependencyGraph(trace)
  const closed = closure(graph, start)

  for (const id of start) {
    if (!closed.has(id)) {
      violations.push({ invariant: 'closureIsClosed', message: `Start entry ${id} missing from closure` })
    }
  }
  for (const id of closed) {
    for (const dep of graph.get(id) ?? []) {
      if (!closed.has(dep)) {
        violations.push({
          invariant: 'closureIsClosed',
          message: `Closure holds ${id} but not its dependency ${dep}`,
          context: { entryId: id, dependency: dep },
        })
      }
    }
  }

  return result(violations)
}

// ============================================================================
// Shrink Invariants
// ============================================================================

/** Size measure that every default transform strictly decreases */
export function valueSize(value: unknown): number {
  if (typeof value === 'number' && Number.isSafeInteger(value)) return Math.abs(value)
  if (typeof value === 'string' || Array.isArray(value)) return value.length
  return 0
}

/**
 * shrinkResultValid - the result still fails, has no entry the input lacked,
 * no larger value than the input, and is itself well formed
 */
export function shrinkResultValid(input: Trace, shrunk: ShrinkResult, predicate: Predicate): InvariantCheckResult {
  const violations: InvariantViolation[] = []

  let stillFails = false
  try {
    predicate(reconstructValue(shrunk.trace))
  } catch {
    stillFails = true
  }
  if (!stillFails) {
    violations.push({ invariant: 'shrinkResultValid', message: 'Shrunk trace no longer fails' })
  }

  if (shrunk.trace.entries.length > input.entries.length) {
    violations.push({
      invariant: 'shrinkResultValid',
      message: `Shrunk trace grew from ${input.entries.length} to ${shrunk.trace.entries.length} entries`,
    })
  }

  const before = reconstructValue(input)
  for (const entry of shrunk.trace.entries) {
    if (!before.has(entry.id)) {
      violations.push({ invariant: 'shrinkResultValid', message: `Entry ${entry.id} was not in the input` })
      continue
    }
    if (valueSize(entry.value) > valueSize(before.get(entry.id))) {
      violations.push({
        invariant: 'shrinkResultValid',
        message: `Entry ${entry.id} grew while shrinking`,
        context: { before: before.get(entry.id), after: entry.value },
      })
    }
  }

  violations.push(...traceIsWellFormed(shrunk.trace).violations)
  return result(violations)
}

// ============================================================================
// Aggregate Invariant Checker
// ============================================================================

export function checkAllTraceInvariants(trace: Trace): InvariantCheckResult {
  const allViolations = [
    ...traceIsWellFormed(trace).violations,
    ...reverseIsTranspose(trace).violations,
    ...componentsPartition(trace).violations,
    ...depthsConsistent(trace).violations,
  ]
  return result(allViolations)
}

/**
 * Throws with every violation listed. Useful for failing a property with the
 * full diagnostics.
 */
export function assertNoViolations(check: InvariantCheckResult, context?: string): void {
  if (check.passed) return
  const prefix = context ? `[${context}] ` : ''
  const lines = check.violations.map(v => `  • ${v.invariant}: ${v.message}`)
  throw new Error(`${prefix}Invariant violations detected:\n${lines.join('\n')}`)
}

/** Generation index order of ids, for stable comparisons in properties */
export function byIndex(a: EntryId, b: EntryId): number {
  return entryIndexOf(a) - entryIndexOf(b)
}
