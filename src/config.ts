/**
 * Runner configuration.
 *
 * Explicit settings win, then environment variables, then defaults:
 * - TRACECHECK_MAX_EXAMPLES: examples per property (default 100)
 * - TRACECHECK_SEED: seed for reproducing a run (default: time-derived)
 * - TRACECHECK_VERBOSE: 'true' prints progress and shrink steps
 * - TRACECHECK_TIMEOUT_MS: wall-clock budget checked between examples
 */

// ============================================================================
// Types
// ============================================================================

export type PropertyConfig = {
  maxExamples?: number
  seed?: number
  verbose?: boolean
  timeoutMs?: number
}

export type ResolvedPropertyConfig = {
  maxExamples: number
  seed: number
  verbose: boolean
  timeoutMs: number | undefined
}

type Env = Record<string, string | undefined>

export const DEFAULT_MAX_EXAMPLES = 100

// ============================================================================
// Environment
// ============================================================================

function getPositiveInt(env: Env, key: string): number | undefined {
  const raw = env[key]
  if (!raw) return undefined
  const parsed = parseInt(raw, 10)
  if (isNaN(parsed) || parsed <= 0) return undefined
  return parsed
}

export function getMaxExamples(env: Env = process.env): number {
  return getPositiveInt(env, 'TRACECHECK_MAX_EXAMPLES') ?? DEFAULT_MAX_EXAMPLES
}

export function getSeed(env: Env = process.env): number | undefined {
  const raw = env.TRACECHECK_SEED
  if (!raw) return undefined
  const parsed = parseInt(raw, 10)
  return isNaN(parsed) ? undefined : parsed
}

export function isVerbose(env: Env = process.env): boolean {
  return env.TRACECHECK_VERBOSE === 'true'
}

export function getTimeoutMs(env: Env = process.env): number | undefined {
  return getPositiveInt(env, 'TRACECHECK_TIMEOUT_MS')
}

// ============================================================================
// Resolution
// ============================================================================

export function randomSeed(): number {
  return (Date.now() ^ (Math.random() * 0x100000000)) | 0
}

export function resolveConfig(config?: PropertyConfig, env: Env = process.env): ResolvedPropertyConfig {
  return {
    maxExamples: config?.maxExamples ?? getMaxExamples(env),
    seed: config?.seed ?? getSeed(env) ?? randomSeed(),
    verbose: config?.verbose ?? isVerbose(env),
    timeoutMs: config?.timeoutMs ?? getTimeoutMs(env),
  }
}
