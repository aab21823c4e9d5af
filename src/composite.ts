/**
 * Composite Domains
 *
 * A composite domain runs a generation routine that draws from other domains
 * through a Tracer. Running it under a fresh tracer yields the value together
 * with its trace; replaying it over a (possibly shrunk) id → value map rebuilds
 * a domain-shaped value from the stored draws.
 */

import type { Random } from 'fast-check'
import type { Domain, Reconstruction, Trace } from './types'
import { createTracer, type Tracer } from './tracer'

// ============================================================================
// Types
// ============================================================================

export type CompositeFn<T> = (tracer: Tracer) => T

export type Traced<T> = {
  value: T
  trace: Trace
}

export interface CompositeDomain<T> extends Domain<T> {
  generateWithTrace(random: Random): Traced<T>
  /**
   * Re-runs the routine; the n-th draw takes the value stored for `t<n>` when
   * present and accepted by the drawing domain, and generates otherwise.
   */
  replay(values: Reconstruction, random: Random): Traced<T>
}

export type CompositeOptions<T> = {
  label?: string
  /** Shape check for composite values drawn inside another composite */
  guard?: (value: unknown) => value is T
}

// ============================================================================
// Builders
// ============================================================================

export function composite<T>(fn: CompositeFn<T>, options?: CompositeOptions<T>): CompositeDomain<T> {
  const guard = options?.guard

  function run(tracer: Tracer): Traced<T> {
    const value = fn(tracer)
    return { value, trace: tracer.trace }
  }

  return {
    label: options?.label ?? 'composite',
    generate: (random) => run(createTracer({ random })).value,
    accepts(value: unknown): value is T {
      return guard ? guard(value) : false
    },
    generateWithTrace: (random) => run(createTracer({ random })),
    replay: (values, random) => run(createTracer({ random, replay: values })),
  }
}

export function isCompositeDomain<T>(domain: Domain<T>): domain is CompositeDomain<T> {
  return 'generateWithTrace' in domain && 'replay' in domain
}

/** Composite view of any domain; plain domains become a single traced draw */
export function asComposite<T>(domain: Domain<T>): CompositeDomain<T> {
  if (isCompositeDomain(domain)) return domain
  return composite(tracer => tracer.draw(domain), {
    label: domain.label,
    guard: (value: unknown): value is T => domain.accepts(value),
  })
}
