/**
 * Property Runner
 *
 * Runs a test over generated examples, stops at the first failure, shrinks the
 * failing trace and reports the result as a PropertyFailedError.
 *
 * While shrinking, each candidate trace is replayed through the domain to
 * rebuild a domain-shaped example before the test runs on it. Only a throw
 * from the test keeps the candidate. A candidate is rejected without running
 * the test when the replay throws or has to generate any draw afresh.
 */

import type { Domain, EntryId, Reconstruction, Trace } from './types'
import { asComposite, type Traced } from './composite'
import { createRandom } from './domain'
import { resolveConfig, type PropertyConfig } from './config'
import { PropertyFailedError } from './errors'
import { getEntry } from './trace'
import { shrink } from './shrinker'

// ============================================================================
// Types
// ============================================================================

export type PropertyTest<T> = (value: T) => void

export type PropertyReport = {
  examplesTried: number
  seed: number
  elapsedMs: number
  /** The time budget ran out before maxExamples were tried */
  timedOut: boolean
}

// ============================================================================
// Runner
// ============================================================================

export function checkProperty<T>(domain: Domain<T>, test: PropertyTest<T>, config?: PropertyConfig): PropertyReport {
  const settings = resolveConfig(config)
  const source = asComposite(domain)
  const random = createRandom(settings.seed)
  const startedAt = Date.now()

  let examplesTried = 0
  let timedOut = false

  if (settings.verbose) {
    console.log(`Running property test with ${settings.maxExamples} examples (seed=${settings.seed})...`)
  }

  for (let i = 0; i < settings.maxExamples; i++) {
    if (settings.timeoutMs !== undefined && Date.now() - startedAt > settings.timeoutMs) {
      timedOut = true
      if (settings.verbose) console.log(`Test timed out after ${settings.timeoutMs}ms`)
      break
    }

    const { value, trace } = source.generateWithTrace(random)
    examplesTried++

    try {
      test(value)
    } catch (cause) {
      if (settings.verbose) {
        console.log(`  ✗ Example ${i + 1} failed: ${formatExample(value)}`)
        console.log(`    Error: ${cause instanceof Error ? cause.message : String(cause)}`)
      }

      // The Random only serves draws missing from the candidate, which rejects it
      const replayCandidate = (values: Reconstruction): Traced<T> | null => {
        let replayed: Traced<T>
        try {
          replayed = source.replay(values, createRandom(settings.seed))
        } catch (error) {
          if (settings.verbose) {
            console.log(`    Replay failed: ${error instanceof Error ? error.message : String(error)}`)
          }
          return null
        }
        return replayedFromStore(values, replayed.trace) ? replayed : null
      }

      let shrunkExample = value
      const result = shrink(
        trace,
        (values) => {
          const replayed = replayCandidate(values)
          if (!replayed) return
          try {
            test(replayed.value)
          } catch (stillFailing) {
            // Phases stop at their first failing candidate, so the last one seen is the result
            shrunkExample = replayed.value
            throw stillFailing
          }
        },
        { verbose: settings.verbose }
      )

      if (settings.verbose) {
        console.log(`    Minimal failing example: ${formatExample(shrunkExample)}`)
        printSummary(examplesTried, 1, Date.now() - startedAt)
      }

      throw new PropertyFailedError({
        example: value,
        shrunkExample,
        shrunkTrace: result.trace,
        changedEntries: changedEntries(trace, result.trace),
        cause,
        seed: settings.seed,
        exampleIndex: i,
      })
    }

    if (settings.verbose && (i + 1) % 10 === 0) {
      console.log(`  ✓ Example ${i + 1}/${settings.maxExamples} passed`)
    }
  }

  const elapsedMs = Date.now() - startedAt
  if (settings.verbose) printSummary(examplesTried, 0, elapsedMs)

  return { examplesTried, seed: settings.seed, elapsedMs, timedOut }
}

// ============================================================================
// Helpers
// ============================================================================

/** Ids whose value changed or whose entry was removed between two traces */
export function changedEntries(before: Trace, after: Trace): EntryId[] {
  const changed: EntryId[] = []
  for (const entry of before.entries) {
    const now = getEntry(after, entry.id)
    if (!now || !Object.is(now.value, entry.value)) changed.push(entry.id)
  }
  return changed
}

/** True when every draw of the replayed trace took its value from `values` */
export function replayedFromStore(values: Reconstruction, replayed: Trace): boolean {
  return replayed.entries.every(entry => values.has(entry.id) && Object.is(values.get(entry.id), entry.value))
}

function formatExample(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    return String(value)
  }
}

function printSummary(examplesTried: number, examplesFailed: number, elapsedMs: number): void {
  console.log('\nProperty Test Summary:')
  console.log(`  Examples tried: ${examplesTried}`)
  console.log(`  Examples failed: ${examplesFailed}`)
  console.log(`  Time elapsed: ${(elapsedMs / 1000).toFixed(2)}s`)
  console.log(examplesFailed === 0 ? '  ✓ All examples passed!' : `  ✗ ${examplesFailed} examples failed`)
}
