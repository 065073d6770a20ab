/**
 * Inverse solvers: altitude from a target freestream quantity.
 *
 * Each inversion normalizes the target to English units, runs the shared
 * secant iteration against the forward model in feet, and converts the
 * altitude to the caller's unit.
 *
 * The `solveAltitudeFor*` functions return the full SolveResult (with the
 * convergence flag); the `getAltFor*` functions return only the altitude.
 *
 * This module is UI-independent.
 */

import { GAS_CONSTANT, GAMMA } from './constants.ts'
import { baseTemperature, basePressure } from './layers.ts'
import { atmDensity } from './derived.ts'
import { secantSolve } from './solver.ts'
import type { SolveOptions, SolveResult } from './solver.ts'
import { convertAltitude, convertVelocity, convertPressure, convertDensity } from './units.ts'
import type { AltitudeUnit, VelocityUnit, PressureUnit, DensityUnit } from './units.ts'

// ─── Options ─────────────────────────────────────────────────────────────────

export interface InverseOptions extends SolveOptions {
  /** Units of the returned altitude; default 'ft' */
  altUnits?: AltitudeUnit
}

export interface DensityInverseOptions extends InverseOptions {
  /** Default 'slug/ft^3' */
  densityUnits?: DensityUnit
}

export interface PressureInverseOptions extends InverseOptions {
  /** Default 'psf' */
  pressureUnits?: PressureUnit
}

export interface EasInverseOptions extends InverseOptions {
  /** Default 'ft/s' */
  velocityUnits?: VelocityUnit
}

export interface QMachInverseOptions extends SolveOptions {
  /** q in Pa and altitude in m; default false (psf, ft) */
  SI?: boolean
}

function inAltUnits(result: SolveResult, altUnits: AltitudeUnit): SolveResult {
  return { ...result, altitude: convertAltitude(result.altitude, 'ft', altUnits) }
}

// ─── Density ─────────────────────────────────────────────────────────────────

/**
 * Altitude at which the freestream density equals `density`.
 */
export function solveAltitudeForDensity(density: number, options: DensityInverseOptions = {}): SolveResult {
  const { densityUnits = 'slug/ft^3', altUnits = 'ft', config, diagnostics } = options
  const target = convertDensity(density, densityUnits, 'slug/ft^3')
  const result = secantSolve(z => atmDensity(z), target, { config, diagnostics })
  return inAltUnits(result, altUnits)
}

export function getAltForDensity(density: number, options: DensityInverseOptions = {}): number {
  return solveAltitudeForDensity(density, options).altitude
}

// ─── Pressure ────────────────────────────────────────────────────────────────

/**
 * Altitude at which the freestream static pressure equals `pressure`.
 */
export function solveAltitudeForPressure(pressure: number, options: PressureInverseOptions = {}): SolveResult {
  const { pressureUnits = 'psf', altUnits = 'ft', config, diagnostics } = options
  const target = convertPressure(pressure, pressureUnits, 'psf')
  const result = secantSolve(basePressure, target, { config, diagnostics })
  return inAltUnits(result, altUnits)
}

export function getAltForPressure(pressure: number, options: PressureInverseOptions = {}): number {
  return solveAltitudeForPressure(pressure, options).altitude
}

// ─── Dynamic Pressure at Fixed Mach ──────────────────────────────────────────

/**
 * Altitude at which Mach `mach` produces dynamic pressure `q`.
 *
 * q = (γ/2)·p·M² is solved for p algebraically, then the (monotonic)
 * pressure profile is inverted.
 */
export function solveAltitudeForQMach(q: number, mach: number, options: QMachInverseOptions = {}): SolveResult {
  const { SI = false, config, diagnostics } = options
  const pressure = 2 * q / (GAMMA * mach ** 2)
  return solveAltitudeForPressure(pressure, {
    pressureUnits: SI ? 'Pa' : 'psf',
    altUnits: SI ? 'm' : 'ft',
    config,
    diagnostics,
  })
}

export function getAltForQMach(q: number, mach: number, options: QMachInverseOptions = {}): number {
  return solveAltitudeForQMach(q, mach, options).altitude
}

// ─── Equivalent Airspeed at Fixed Mach ───────────────────────────────────────

/**
 * Altitude at which Mach `mach` corresponds to equivalent airspeed `eas`.
 *
 *   EAS = a·M·√(p/T)·k,  k = √(T₀/p₀)
 *
 * EAS depends on both T and p, so this inverts the EAS relation directly.
 */
export function solveAltitudeForEasMach(eas: number, mach: number, options: EasInverseOptions = {}): SolveResult {
  const { velocityUnits = 'ft/s', altUnits = 'ft', config, diagnostics } = options
  const target = convertVelocity(eas, velocityUnits, 'ft/s')
  const k = Math.sqrt(baseTemperature(0) / basePressure(0))

  const easAt = (z: number): number => {
    const T = baseTemperature(z)
    const p = basePressure(z)
    const a = Math.sqrt(GAMMA * GAS_CONSTANT * T)
    return a * mach * Math.sqrt(p / T) * k
  }

  const result = secantSolve(easAt, target, { config, diagnostics })
  return inAltUnits(result, altUnits)
}

export function getAltForEasMach(eas: number, mach: number, options: EasInverseOptions = {}): number {
  return solveAltitudeForEasMach(eas, mach, options).altitude
}
