/**
 * Tracer
 *
 * Draw recorder. Wraps every generation call and stamps it into the trace
 * with its dependency set.
 *
 * `draw` records the cumulative set: each draw depends on every id drawn
 * earlier in the current scope, whether or not it used those values.
 * `drawWithId` takes an explicit `dependsOn` list and hands back the entry id
 * for identity binding through `assign`.
 */

import type { Random } from 'fast-check'
import { isDeepStrictEqual } from 'node:util'
import type { Domain, EntryId, EntryMetadata, Reconstruction, Trace } from './types'
import { addEntry, assignVariable, createTrace, entryIdAt, getEntry } from './trace'
import { TraceScopeError, UnknownEntryError } from './errors'
import { createRandom } from './domain'

// ============================================================================
// Types
// ============================================================================

export type DrawOptions = {
  /** Exact dependencies; defaults to everything drawn earlier in scope */
  dependsOn?: readonly EntryId[]
  metadata?: EntryMetadata
}

export type Drawn<T> = {
  value: T
  id: EntryId
}

export type ScopeOptions = {
  /** Start the scope with an empty accumulator instead of inheriting it */
  fresh?: boolean
}

export type TracerConfig = {
  random?: Random
  seed?: number
  /**
   * Stored values keyed by entry id. The n-th draw returns the value stored
   * for `t<n>` when the drawing domain accepts it, and generates otherwise.
   */
  replay?: Reconstruction
}

export interface Tracer {
  readonly trace: Trace
  /** Number of currently open scopes */
  readonly scopeDepth: number
  draw<T>(domain: Domain<T>): T
  drawWithId<T>(domain: Domain<T>, options?: DrawOptions): Drawn<T>
  recordAssignment(name: string, value: unknown): void
  assign(name: string, id: EntryId): void
  enter(options?: ScopeOptions): void
  exit(): void
  scoped<R>(fn: () => R, options?: ScopeOptions): R
}

// ============================================================================
// Factory
// ============================================================================

export function createTracer(config: TracerConfig = {}): Tracer {
  const random = config.random ?? createRandom(config.seed ?? 0)
  const replay = config.replay
  const trace = createTrace()

  let accumulator: EntryId[] = []
  const scopes: EntryId[][] = []

  function produce<T>(domain: Domain<T>): T {
    if (replay) {
      const stored = replay.get(entryIdAt(trace.nextId))
      if (domain.accepts(stored)) return stored
    }
    return domain.generate(random)
  }

  function drawWithId<T>(domain: Domain<T>, options?: DrawOptions): Drawn<T> {
    const drawIndex = trace.nextId
    const value = produce(domain)

    let dependencies: readonly EntryId[] = accumulator
    if (options?.dependsOn) {
      for (const dep of options.dependsOn) {
        if (!getEntry(trace, dep)) throw new UnknownEntryError(dep, `Draw ${drawIndex} depends on unknown entry '${dep}'`)
      }
      dependencies = options.dependsOn
    }

    const id = addEntry(trace, domain, value, dependencies, {
      drawIndex,
      scopeDepth: scopes.length,
      ...options?.metadata,
    })
    accumulator.push(id)
    return { value, id }
  }

  function draw<T>(domain: Domain<T>): T {
    return drawWithId(domain).value
  }

  /**
   * Binds `name` to the newest entry whose value equals `value`. Dropped when
   * nothing matches, e.g. when the value was transformed after the draw.
   */
  function recordAssignment(name: string, value: unknown): void {
    for (let i = trace.entries.length - 1; i >= 0; i--) {
      const entry = trace.entries[i]
      if (entry && isDeepStrictEqual(entry.value, value)) {
        trace.variableAssignments.set(name, entry.id)
        return
      }
    }
  }

  function assign(name: string, id: EntryId): void {
    assignVariable(trace, name, id)
  }

  function enter(options?: ScopeOptions): void {
    scopes.push([...accumulator])
    if (options?.fresh) accumulator = []
  }

  function exit(): void {
    const restored = scopes.pop()
    if (!restored) throw new TraceScopeError('exit() called without a matching enter()')
    accumulator = restored
  }

  function scoped<R>(fn: () => R, options?: ScopeOptions): R {
    enter(options)
    try {
      return fn()
    } finally {
      exit()
    }
  }

  return {
    trace,
    get scopeDepth() {
      return scopes.length
    },
    draw,
    drawWithId,
    recordAssignment,
    assign,
    enter,
    exit,
    scoped,
  }
}
