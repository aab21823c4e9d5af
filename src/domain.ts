/**
 * Domains
 *
 * Value generators consumed by the tracer. Generation is delegated to
 * fast-check arbitraries driven by an explicit `Random`, so a run is fully
 * reproducible from its seed. `accepts` is membership: a value outside the
 * bounds, lengths or alphabet is rejected.
 */

import * as fc from 'fast-check'
import { xoroshiro128plus } from 'pure-rand'
import { isDeepStrictEqual } from 'node:util'
import type { Domain } from './types'
import { InvalidDomainError, UnsatisfiableDomainError } from './errors'

export type { Domain } from './types'

// ============================================================================
// Constants
// ============================================================================

const ASCII_LETTERS = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ'
const DIGITS = '0123456789'
const PUNCTUATION = '!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~'

export const DEFAULT_ALPHABET = ASCII_LETTERS + DIGITS + PUNCTUATION

const FILTER_ATTEMPTS = 100

// ============================================================================
// Randomness
// ============================================================================

export function createRandom(seed: number): fc.Random {
  return new fc.Random(xoroshiro128plus(seed))
}

/** Draws an unbiased value from an arbitrary */
export function sampleArbitrary<T>(arbitrary: fc.Arbitrary<T>, random: fc.Random): T {
  return arbitrary.generate(random, undefined).value
}

// ============================================================================
// Builders
// ============================================================================

export function fromArbitrary<T>(
  arbitrary: fc.Arbitrary<T>,
  accepts: (value: unknown) => value is T,
  label: string = 'arbitrary'
): Domain<T> {
  return {
    label,
    generate: (random) => sampleArbitrary(arbitrary, random),
    accepts,
  }
}

export function integers(min: number = -1000, max: number = 1000): Domain<number> {
  if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max)) {
    throw new InvalidDomainError(`integers bounds must be safe integers, got [${min}, ${max}]`)
  }
  if (min > max) throw new InvalidDomainError(`integers min ${min} exceeds max ${max}`)

  return fromArbitrary(
    fc.integer({ min, max }),
    (value: unknown): value is number => isInteger(value) && value >= min && value <= max,
    `integers(${min}, ${max})`
  )
}

export function floats(min: number = -1000, max: number = 1000): Domain<number> {
  if (!Number.isFinite(min) || !Number.isFinite(max)) {
    throw new InvalidDomainError(`floats bounds must be finite, got [${min}, ${max}]`)
  }
  if (min > max) throw new InvalidDomainError(`floats min ${min} exceeds max ${max}`)

  return fromArbitrary(
    fc.double({ min, max, noNaN: true }),
    (value: unknown): value is number => isFiniteNumber(value) && value >= min && value <= max,
    `floats(${min}, ${max})`
  )
}

export type StringOptions = {
  minLength?: number
  maxLength?: number
  alphabet?: string
}

export function strings(options?: StringOptions): Domain<string> {
  const minLength = options?.minLength ?? 0
  const maxLength = options?.maxLength ?? 100
  const alphabet = options?.alphabet ?? DEFAULT_ALPHABET
  checkLengths('strings', minLength, maxLength)
  if (alphabet.length === 0) throw new InvalidDomainError('strings alphabet must not be empty')

  const chars = [...alphabet]
  const allowed = new Set(chars)
  const arbitrary = fc
    .array(fc.constantFrom(...chars), { minLength, maxLength })
    .map(cs => cs.join(''))
  return fromArbitrary(
    arbitrary,
    (value: unknown): value is string => {
      if (!isString(value)) return false
      const cs = [...value]
      return cs.length >= minLength && cs.length <= maxLength && cs.every(c => allowed.has(c))
    },
    `strings(${minLength}..${maxLength})`
  )
}

export function booleans(): Domain<boolean> {
  return fromArbitrary(fc.boolean(), isBoolean, 'booleans()')
}

export type ListOptions = {
  minLength?: number
  maxLength?: number
}

export function lists<T>(element: Domain<T>, options?: ListOptions): Domain<T[]> {
  const minLength = options?.minLength ?? 0
  const maxLength = options?.maxLength ?? 10
  checkLengths('lists', minLength, maxLength)

  return {
    label: `lists(${element.label}, ${minLength}..${maxLength})`,
    generate(random) {
      const length = random.nextInt(minLength, maxLength)
      return Array.from({ length }, () => element.generate(random))
    },
    accepts(value: unknown): value is T[] {
      return (
        Array.isArray(value) &&
        value.length >= minLength &&
        value.length <= maxLength &&
        value.every(v => element.accepts(v))
      )
    },
  }
}

export function choices<T>(values: readonly T[]): Domain<T> {
  if (values.length === 0) throw new InvalidDomainError('choices needs at least one value')

  const options = [...values]
  return fromArbitrary(
    fc.constantFrom(...options),
    (value: unknown): value is T => options.some(v => isDeepStrictEqual(v, value)),
    `choices(${options.length})`
  )
}

// ============================================================================
// Combinators
// ============================================================================

/**
 * Domain of `fn` applied to the base domain's values. Without a `guard`,
 * mapped values are never replayed and are generated afresh instead.
 */
export function mapDomain<T, U>(
  domain: Domain<T>,
  fn: (value: T) => U,
  guard?: (value: unknown) => value is U
): Domain<U> {
  return {
    label: `${domain.label}.map`,
    generate: (random) => fn(domain.generate(random)),
    accepts: guard ?? rejectAll,
  }
}

export function filterDomain<T>(
  domain: Domain<T>,
  predicate: (value: T) => boolean,
  maxAttempts: number = FILTER_ATTEMPTS
): Domain<T> {
  const label = `${domain.label}.filter`
  return {
    label,
    generate(random) {
      for (let attempt = 0; attempt < maxAttempts; attempt++) {
        const value = domain.generate(random)
        if (predicate(value)) return value
      }
      throw new UnsatisfiableDomainError(`${label} found no accepted value in ${maxAttempts} attempts`)
    },
    accepts(value: unknown): value is T {
      return domain.accepts(value) && predicate(value)
    },
  }
}

/** Same domain with a domain-specific shrink step */
export function withShrink<T>(domain: Domain<T>, shrink: (value: T) => T): Domain<T> {
  return {
    label: domain.label,
    generate: (random) => domain.generate(random),
    accepts: (value: unknown): value is T => domain.accepts(value),
    shrink,
  }
}

// ============================================================================
// Guards
// ============================================================================

function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value)
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}

function isString(value: unknown): value is string {
  return typeof value === 'string'
}

function isBoolean(value: unknown): value is boolean {
  return typeof value === 'boolean'
}

function rejectAll<U>(_value: unknown): _value is U {
  return false
}

function checkLengths(name: string, minLength: number, maxLength: number): void {
  if (!Number.isInteger(minLength) || minLength < 0) {
    throw new InvalidDomainError(`${name} minLength must be a non-negative integer, got ${minLength}`)
  }
  if (!Number.isInteger(maxLength) || maxLength < minLength) {
    throw new InvalidDomainError(`${name} maxLength ${maxLength} is below minLength ${minLength}`)
  }
}
