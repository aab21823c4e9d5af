/**
 * Graph Analyzer
 *
 * Read-only queries over the dependency graph recorded in a trace. An edge
 * child → parent exists for every parent listed in `child.dependencies`.
 *
 * Every traversal is iterative with a visited set. The graph is acyclic by
 * construction; the visited set keeps a corrupted trace from looping.
 */

import type { EntryId, Trace } from './types'

export type DependencyGraph = Map<EntryId, Set<EntryId>>

// ============================================================================
// Adjacency
// ============================================================================

export function dependencyGraph(trace: Trace): DependencyGraph {
  const graph: DependencyGraph = new Map()
  for (const entry of trace.entries) {
    graph.set(entry.id, new Set(entry.dependencies))
  }
  return graph
}

/**
 * Exact transpose of `dependencyGraph`: every entry id is a key, mapped to the
 * ids that list it as a dependency.
 */
export function reverseDependencies(trace: Trace): DependencyGraph {
  const reverse: DependencyGraph = new Map()
  for (const entry of trace.entries) {
    reverse.set(entry.id, new Set())
  }
  for (const entry of trace.entries) {
    for (const dep of entry.dependencies) {
      let dependents = reverse.get(dep)
      if (!dependents) {
        dependents = new Set()
        reverse.set(dep, dependents)
      }
      dependents.add(entry.id)
    }
  }
  return reverse
}

// ============================================================================
// Closures
// ============================================================================

/** Every id reachable from `start` (inclusive) following `graph` edges */
export function closure(graph: DependencyGraph, start: Iterable<EntryId>): Set<EntryId> {
  const seen = new Set<EntryId>()
  const stack = [...start]

  while (stack.length > 0) {
    const id = stack.pop()
    if (id === undefined || seen.has(id)) continue
    seen.add(id)
    for (const next of graph.get(id) ?? []) {
      if (!seen.has(next)) stack.push(next)
    }
  }
  return seen
}

/**
 * Entries the variable's value transitively depends on, including the bound
 * entry itself. Unbound names have no known dependencies.
 */
export function variableDependencies(trace: Trace, name: string): Set<EntryId> {
  const id = trace.variableAssignments.get(name)
  if (id === undefined) return new Set()
  return closure(dependencyGraph(trace), [id])
}

/**
 * Names bound to entries that transitively depend on the variable's entry.
 * Unbound entries on the way contribute no name but are still traversed.
 */
export function dependentVariables(trace: Trace, name: string): Set<string> {
  const id = trace.variableAssignments.get(name)
  if (id === undefined) return new Set()

  const reached = closure(reverseDependencies(trace), [id])
  reached.delete(id)

  const names = new Set<string>()
  for (const [variable, bound] of trace.variableAssignments) {
    if (reached.has(bound)) names.add(variable)
  }
  return names
}

// ============================================================================
// Components & Depth
// ============================================================================

/**
 * Partition of all entry ids under the undirected view of the graph.
 * Components come out in order of their earliest entry.
 */
export function connectedComponents(trace: Trace): Set<EntryId>[] {
  const forward = dependencyGraph(trace)
  const reverse = reverseDependencies(trace)
  const undirected: DependencyGraph = new Map()

  for (const entry of trace.entries) {
    const neighbours = new Set<EntryId>()
    for (const id of forward.get(entry.id) ?? []) {
      // Dangling references only appear in corrupted traces
      if (forward.has(id)) neighbours.add(id)
    }
    for (const id of reverse.get(entry.id) ?? []) neighbours.add(id)
    undirected.set(entry.id, neighbours)
  }

  const assigned = new Set<EntryId>()
  const components: Set<EntryId>[] = []
  for (const entry of trace.entries) {
    if (assigned.has(entry.id)) continue
    const component = closure(undirected, [entry.id])
    for (const id of component) assigned.add(id)
    components.push(component)
  }
  return components
}

/**
 * Dependency depth per entry: 0 without dependencies, otherwise one more than
 * the deepest dependency. Computed bottom-up with an explicit stack; an edge
 * back into an entry still being expanded counts as depth 0.
 */
export function dependencyDepths(trace: Trace): Map<EntryId, number> {
  const graph = dependencyGraph(trace)
  const depth = new Map<EntryId, number>()
  const expanding = new Set<EntryId>()

  for (const entry of trace.entries) {
    if (depth.has(entry.id)) continue
    const stack: EntryId[] = [entry.id]

    while (stack.length > 0) {
      const id = stack[stack.length - 1]
      if (id === undefined) break
      if (depth.has(id)) {
        stack.pop()
        continue
      }

      const deps = [...(graph.get(id) ?? [])].filter(dep => graph.has(dep))
      if (!expanding.has(id)) {
        expanding.add(id)
        const pending = deps.filter(dep => !depth.has(dep) && !expanding.has(dep))
        if (pending.length > 0) {
          stack.push(...pending)
          continue
        }
      }

      let deepest = -1
      for (const dep of deps) {
        deepest = Math.max(deepest, depth.get(dep) ?? 0)
      }
      depth.set(id, deps.length === 0 ? 0 : deepest + 1)
      expanding.delete(id)
      stack.pop()
    }
  }
  return depth
}
