/**
 * Property tests for the tracer.
 *
 * Random draw/scope programs are run against the tracer and against a plain
 * stack model of the cumulative accumulator; recorded dependencies must match.
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { assertNoViolations, checkAllTraceInvariants } from '../invariants'
import { createTracer } from '../../../src/tracer'
import { integers, strings } from '../../../src/domain'
import { entryIdAt, reconstructValue } from '../../../src/trace'

type Op = 'draw' | 'enter' | 'fresh' | 'exit'

const programGen = fc.array(fc.constantFrom<Op>('draw', 'enter', 'fresh', 'exit'), { maxLength: 40 })

describe('Tracer - Model Equivalence', () => {
  it('cumulative dependencies match a stack model', () => {
    fc.assert(
      fc.property(programGen, fc.integer(), (program, seed) => {
        const tracer = createTracer({ seed })
        let accumulator: string[] = []
        const stack: string[][] = []
        const expected: string[][] = []

        for (const op of program) {
          switch (op) {
            case 'draw':
              expected.push([...accumulator])
              accumulator.push(entryIdAt(expected.length - 1))
              tracer.draw(integers())
              break
            case 'enter':
            case 'fresh':
              stack.push([...accumulator])
              if (op === 'fresh') accumulator = []
              tracer.enter({ fresh: op === 'fresh' })
              break
            case 'exit': {
              const restored = stack.pop()
              if (!restored) continue
              accumulator = restored
              tracer.exit()
              break
            }
          }
        }

        expect(tracer.trace.entries.map(e => e.dependencies)).toEqual(expected)
        expect(tracer.scopeDepth).toBe(stack.length)
        assertNoViolations(checkAllTraceInvariants(tracer.trace))
      })
    )
  })

  it('replaying a trace reproduces it', () => {
    fc.assert(
      fc.property(fc.integer(), fc.nat({ max: 6 }), (seed, count) => {
        const program = (tracer: ReturnType<typeof createTracer>) => {
          for (let i = 0; i < count; i++) {
            tracer.scoped(() => {
              tracer.draw(integers(0, 50))
              tracer.draw(strings({ maxLength: 5 }))
            })
          }
        }

        const original = createTracer({ seed })
        program(original)
        const replayed = createTracer({
          seed: seed + 1,
          replay: reconstructValue(original.trace),
        })
        program(replayed)

        expect(replayed.trace.entries.map(e => e.value)).toEqual(original.trace.entries.map(e => e.value))
        expect(replayed.trace.entries.map(e => e.dependencies)).toEqual(original.trace.entries.map(e => e.dependencies))
      })
    )
  })
})
