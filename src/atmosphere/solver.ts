/**
 * Bracket-free secant iteration for recovering altitude.
 *
 * The forward model is piecewise analytic, so it is inverted numerically.
 * The slope is estimated from a fixed probe step instead of an analytic
 * derivative:
 *
 *   m  = Δ / (f(h + Δ) − f(h))
 *   h' = m · (target − f(h)) + h
 *
 * The target function is assumed monotonic over the range of interest
 * (0–300 kft for every quantity in this library). Nothing checks that.
 *
 * Hitting the iteration cap is not an error: the last estimate is
 * returned with `converged: false`.
 */

import { CONSOLE_DIAGNOSTICS } from './diagnostics.ts'
import type { DiagnosticSink } from './diagnostics.ts'

export interface SolverConfig {
  /** First estimate [ft]; iteration starts from a previous estimate of 0 */
  initialGuess: number
  /** Finite-difference probe step Δ [ft] */
  probeStep: number
  /** Stop when successive estimates differ by no more than this [ft] */
  tolerance: number
  /** Hard cap on iterations */
  maxIterations: number
  /** Emit an iteration-count notice when more iterations than this were needed */
  noticeAfter: number
}

export const DEFAULT_SOLVER_CONFIG: Readonly<SolverConfig> = Object.freeze({
  initialGuess: 5000,
  probeStep: 500,
  tolerance: 5,
  maxIterations: 20,
  noticeAfter: 18,
})

export interface SolveOptions {
  config?: Partial<SolverConfig>
  diagnostics?: DiagnosticSink
}

export interface SolveResult {
  /** Final estimate [ft] */
  altitude: number
  iterations: number
  /** Last step was within tolerance */
  converged: boolean
}

/**
 * Fill unset fields from the defaults. An explicit `undefined` counts as unset.
 */
export function resolveSolverConfig(overrides: Partial<SolverConfig> = {}): SolverConfig {
  return {
    initialGuess: overrides.initialGuess ?? DEFAULT_SOLVER_CONFIG.initialGuess,
    probeStep: overrides.probeStep ?? DEFAULT_SOLVER_CONFIG.probeStep,
    tolerance: overrides.tolerance ?? DEFAULT_SOLVER_CONFIG.tolerance,
    maxIterations: overrides.maxIterations ?? DEFAULT_SOLVER_CONFIG.maxIterations,
    noticeAfter: overrides.noticeAfter ?? DEFAULT_SOLVER_CONFIG.noticeAfter,
  }
}

/**
 * Find the altitude [ft] where f(altitude) = target.
 *
 * @param f       Forward model, altitude [ft] → quantity
 * @param target  Quantity to match, in the same units f returns
 */
export function secantSolve(
  f: (altitude: number) => number,
  target: number,
  options: SolveOptions = {},
): SolveResult {
  const cfg = resolveSolverConfig(options.config)
  const diagnostics = options.diagnostics ?? CONSOLE_DIAGNOSTICS

  let previous = 0
  let estimate = cfg.initialGuess
  let n = 0

  while (Math.abs(estimate - previous) > cfg.tolerance && n < cfg.maxIterations) {
    previous = estimate
    const f1 = f(previous)
    const f2 = f(previous + cfg.probeStep)
    const m = cfg.probeStep / (f2 - f1)
    estimate = m * (target - f1) + previous
    n++
  }

  if (n > cfg.noticeAfter) {
    diagnostics.warn(`altitude solver: n = ${n} iterations (cap ${cfg.maxIterations})`)
  }

  return {
    altitude: estimate,
    iterations: n,
    converged: Math.abs(estimate - previous) <= cfg.tolerance,
  }
}
