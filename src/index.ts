/**
 * tracecheck
 *
 * Public API exports
 */

// Error system (base class, codes, all error classes)
export {
  TracecheckError, TracecheckErrorCode,
  InvalidDomainError, UnsatisfiableDomainError,
  UnknownEntryError, TraceScopeError,
  PropertyFailedError,
} from './errors'
export type { TracecheckErrorCode as TracecheckErrorCodeType, PropertyFailureDetails } from './errors'

// Trace data model
export type { EntryId, EntryMetadata, TraceEntry, Trace, Reconstruction, Predicate, Domain } from './types'
export type { TraceInvariant, TraceInvariantViolation } from './trace'
export {
  createTrace, addEntry, assignVariable, getEntry,
  cloneTrace, withEntryValue, withoutEntry,
  reconstructValue, reconstructVariables,
  validateTrace, entryIdAt, entryIndexOf,
} from './trace'

// Graph analyzer
export type { DependencyGraph } from './graph'
export {
  dependencyGraph, reverseDependencies, closure,
  variableDependencies, dependentVariables,
  connectedComponents, dependencyDepths,
} from './graph'

// Tracer
export type { Tracer, TracerConfig, DrawOptions, Drawn, ScopeOptions } from './tracer'
export { createTracer } from './tracer'

// Domains
export type { StringOptions, ListOptions } from './domain'
export {
  createRandom, sampleArbitrary, fromArbitrary,
  integers, floats, strings, booleans, lists, choices,
  mapDomain, filterDomain, withShrink,
  DEFAULT_ALPHABET,
} from './domain'

// Composite domains
export type { CompositeDomain, CompositeFn, CompositeOptions, Traced } from './composite'
export { composite, isCompositeDomain, asComposite } from './composite'

// Shrinking
export type { ShrinkOutcome } from './shrink-transforms'
export { shrinkInteger, shrinkText, shrinkSequence, shrinkValue, shrinkEntryValue } from './shrink-transforms'
export type { ShrinkPhase, ShrinkStep, ShrinkOptions, ShrinkResult } from './shrinker'
export {
  shrink, runPhase, SHRINK_PHASES,
  shrinkIndividualValues, shrinkDependencyChains, shrinkOptionalDependencies,
  optionalEntryIds, describeStep,
} from './shrinker'

// Property runner
export type { PropertyConfig, ResolvedPropertyConfig } from './config'
export { resolveConfig, DEFAULT_MAX_EXAMPLES } from './config'
export type { PropertyTest, PropertyReport } from './property'
export { checkProperty, changedEntries, replayedFromStore } from './property'
