/**
 * Dataflow-Aware Shrinker
 *
 * Reduces a failing trace in three ordered phases, each run exactly once on
 * the previous phase's output:
 *
 *   A. shrink one value at a time, shallowest entries first
 *   B. shrink the root of each multi-entry connected component
 *   C. remove shared, weakly-anchored entries outright
 *
 * Every phase is first-improvement: the first candidate that still fails is
 * accepted and the phase ends. Candidates are always built on a clone, so the
 * last accepted trace is never touched by a rejected trial.
 */

import type { EntryId, Predicate, Reconstruction, Trace } from './types'
import { cloneTrace, getEntry, reconstructValue, withEntryValue, withoutEntry } from './trace'
import { connectedComponents, dependencyDepths, dependencyGraph, reverseDependencies } from './graph'
import { shrinkEntryValue } from './shrink-transforms'

// ============================================================================
// Types
// ============================================================================

export type ShrinkPhase = 'values' | 'chains' | 'optional'

export type ShrinkStep =
  | { phase: ShrinkPhase; kind: 'value'; entryId: EntryId; from: unknown; to: unknown }
  | { phase: ShrinkPhase; kind: 'removal'; entryId: EntryId; from: unknown }

export type ShrinkOptions = {
  /** Print each accepted step */
  verbose?: boolean
  /** Called once per accepted step */
  onStep?: (step: ShrinkStep) => void
}

export type ShrinkResult = {
  value: Reconstruction
  trace: Trace
  steps: ShrinkStep[]
  /** Number of predicate evaluations spent */
  trials: number
}

type PhaseOutcome = { trace: Trace; step: ShrinkStep } | null

type TrialRunner = (candidate: Trace) => boolean

// ============================================================================
// Public API
// ============================================================================

export const SHRINK_PHASES: readonly ShrinkPhase[] = ['values', 'chains', 'optional']

/**
 * Shrinks `trace` against `predicate`. The returned trace still makes the
 * predicate throw; when no phase finds an improvement it is an unchanged copy
 * of the input.
 */
export function shrink(trace: Trace, predicate: Predicate, options: ShrinkOptions = {}): ShrinkResult {
  let trials = 0
  const stillFails: TrialRunner = (candidate) => {
    trials++
    try {
      predicate(reconstructValue(candidate))
      return false
    } catch {
      return true
    }
  }

  let current = cloneTrace(trace)
  const steps: ShrinkStep[] = []

  for (const phase of SHRINK_PHASES) {
    const outcome = runPhase(phase, current, stillFails)
    if (!outcome) continue
    current = outcome.trace
    steps.push(outcome.step)
    report(outcome.step, options)
  }

  return { value: reconstructValue(current), trace: current, steps, trials }
}

export function runPhase(phase: ShrinkPhase, trace: Trace, stillFails: TrialRunner): PhaseOutcome {
  switch (phase) {
    case 'values':
      return shrinkIndividualValues(trace, stillFails)
    case 'chains':
      return shrinkDependencyChains(trace, stillFails)
    case 'optional':
      return shrinkOptionalDependencies(trace, stillFails)
  }
}

// ============================================================================
// Phase A: individual values
// ============================================================================

export function shrinkIndividualValues(trace: Trace, stillFails: TrialRunner): PhaseOutcome {
  const depths = dependencyDepths(trace)
  // Array.prototype.sort is stable, so equal depths keep generation order
  const ordered = [...trace.entries].sort((a, b) => (depths.get(a.id) ?? 0) - (depths.get(b.id) ?? 0))

  for (const entry of ordered) {
    const outcome = shrinkEntryValue(entry)
    if (outcome.kind === 'minimal') continue

    const candidate = withEntryValue(trace, entry.id, outcome.value)
    if (stillFails(candidate)) {
      return { trace: candidate, step: { phase: 'values', kind: 'value', entryId: entry.id, from: entry.value, to: outcome.value } }
    }
  }
  return null
}

// ============================================================================
// Phase B: dependency chains
// ============================================================================

export function shrinkDependencyChains(trace: Trace, stillFails: TrialRunner): PhaseOutcome {
  const graph = dependencyGraph(trace)

  for (const component of connectedComponents(trace)) {
    if (component.size < 2) continue

    const roots = [...component].filter(id => (graph.get(id)?.size ?? 0) === 0)
    for (const rootId of roots) {
      const entry = getEntry(trace, rootId)
      if (!entry) continue
      const outcome = shrinkEntryValue(entry)
      if (outcome.kind === 'minimal') continue

      const candidate = withEntryValue(trace, rootId, outcome.value)
      if (stillFails(candidate)) {
        return { trace: candidate, step: { phase: 'chains', kind: 'value', entryId: rootId, from: entry.value, to: outcome.value } }
      }
    }
  }
  return null
}

// ============================================================================
// Phase C: optional dependencies
// ============================================================================

/**
 * Candidates have more than one direct dependent but at most one dependency of
 * their own: shared ancestors that carry little of the structure.
 */
export function optionalEntryIds(trace: Trace): EntryId[] {
  const reverse = reverseDependencies(trace)
  return trace.entries
    .filter(e => (reverse.get(e.id)?.size ?? 0) > 1 && e.dependencies.length <= 1)
    .map(e => e.id)
}

export function shrinkOptionalDependencies(trace: Trace, stillFails: TrialRunner): PhaseOutcome {
  for (const id of optionalEntryIds(trace)) {
    const entry = getEntry(trace, id)
    if (!entry) continue

    const candidate = withoutEntry(trace, id)
    if (stillFails(candidate)) {
      return { trace: candidate, step: { phase: 'optional', kind: 'removal', entryId: id, from: entry.value } }
    }
  }
  return null
}

// ============================================================================
// Reporting
// ============================================================================

export function describeStep(step: ShrinkStep): string {
  if (step.kind === 'removal') {
    return `Removed optional entry ${step.entryId} with value ${formatValue(step.from)}`
  }
  const subject = step.phase === 'chains' ? 'component root ' : ''
  return `Shrunk ${subject}${step.entryId} from ${formatValue(step.from)} to ${formatValue(step.to)}`
}

function report(step: ShrinkStep, options: ShrinkOptions): void {
  if (options.verbose) console.log(`    ${describeStep(step)}`)
  if (!options.onStep) return
  try {
    options.onStep(step)
  } catch (e) {
    console.error(`Shrink step handler error on ${step.entryId}:`, e)
  }
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value)
  if (Array.isArray(value)) return `[${value.map(formatValue).join(', ')}]`
  return String(value)
}
