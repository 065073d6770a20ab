/**
 * Derived freestream quantities.
 *
 * Every function normalizes its inputs to English units (ft, °R, psf,
 * slug/ft³, ft/s), composes the layer table with the ideal-gas law,
 * isentropic relations and Sutherland's law, then converts the result to
 * the caller's unit.
 *
 * Only InvalidUnitError can escape from here.
 *
 * This module is UI-independent.
 */

import { GAS_CONSTANT, GAMMA, HALF_GAMMA } from './constants.ts'
import { baseTemperature, basePressure } from './layers.ts'
import { sutherlandViscosity } from './sutherland.ts'
import type { DiagnosticOptions } from './sutherland.ts'
import { CONSOLE_DIAGNOSTICS } from './diagnostics.ts'
import {
  convertAltitude,
  convertTemperature,
  convertVelocity,
  convertPressure,
  convertDensity,
  convertDynamicViscosity,
  convertKinematicViscosity,
  convertReynoldsPerLength,
} from './units.ts'
import type {
  AltitudeUnit,
  VelocityUnit,
  PressureUnit,
  DensityUnit,
  DynamicViscosityUnit,
  KinematicViscosityUnit,
  ReynoldsUnit,
} from './units.ts'

// ─── Options ─────────────────────────────────────────────────────────────────

export interface AltitudeOptions {
  /** Default 'ft' */
  altUnits?: AltitudeUnit
}

export interface DensityOptions extends AltitudeOptions {
  /** Gas constant [ft·lbf/(slug·°R)], default 1716 */
  R?: number
  /** Default 'slug/ft^3' */
  densityUnits?: DensityUnit
}

export interface SpeedOfSoundOptions extends AltitudeOptions {
  /** Default 'ft/s' */
  velocityUnits?: VelocityUnit
  /** Ratio of specific heats, default 1.4 */
  gamma?: number
}

export interface VelocityOptions extends AltitudeOptions {
  /** Default 'ft/s' */
  velocityUnits?: VelocityUnit
}

export interface DynamicPressureOptions extends AltitudeOptions {
  /** Default 'psf' */
  pressureUnits?: PressureUnit
}

export interface EquivalentAirspeedOptions extends AltitudeOptions {
  /** Default 'ft/s' */
  easUnits?: VelocityUnit
}

export interface DebugOptions extends DiagnosticOptions {
  /** Send intermediate values to the sink's `debug` channel */
  debug?: boolean
}

export interface DynamicViscosityOptions extends AltitudeOptions, DiagnosticOptions {
  /** Default '(lbf*s)/ft^2' */
  viscUnits?: DynamicViscosityUnit
}

export interface KinematicViscosityOptions extends AltitudeOptions, DebugOptions {
  /** Default 'ft^2/s' */
  viscUnits?: KinematicViscosityUnit
}

export interface ReynoldsOptions extends AltitudeOptions, DebugOptions {
  /** Default '1/ft' */
  reUnits?: ReynoldsUnit
}

export interface SIReynoldsOptions extends DebugOptions {
  /** Altitude in m and result in 1/m; default false (ft, 1/ft) */
  SI?: boolean
}

function emitDebug(options: DebugOptions, lines: string[]): void {
  if (!options.debug) return
  const sink = options.diagnostics ?? CONSOLE_DIAGNOSTICS
  for (const line of lines) sink.debug?.(line)
}

// ─── Density & Speed of Sound ────────────────────────────────────────────────

/**
 * Freestream density ρ∞ from the ideal-gas law.
 *
 *   ρ = p / (R·T)
 *
 * `R` is the only overridable gas constant in the library.
 */
export function atmDensity(alt: number, options: DensityOptions = {}): number {
  const { R = GAS_CONSTANT, altUnits = 'ft', densityUnits = 'slug/ft^3' } = options
  const z = convertAltitude(alt, altUnits, 'ft')
  const rho = basePressure(z) / (R * baseTemperature(z))
  return convertDensity(rho, 'slug/ft^3', densityUnits)
}

/**
 * Freestream speed of sound a∞.
 *
 *   a = √(γ·R·T)
 */
export function atmSpeedOfSound(alt: number, options: SpeedOfSoundOptions = {}): number {
  const { altUnits = 'ft', velocityUnits = 'ft/s', gamma = GAMMA } = options
  const z = convertAltitude(alt, altUnits, 'ft')
  const a = Math.sqrt(gamma * GAS_CONSTANT * baseTemperature(z))
  return convertVelocity(a, 'ft/s', velocityUnits)
}

// ─── Velocity & Mach ─────────────────────────────────────────────────────────

/**
 * True airspeed at a Mach number.  V = M·a
 */
export function atmVelocity(alt: number, mach: number, options: VelocityOptions = {}): number {
  const { altUnits = 'ft', velocityUnits = 'ft/s' } = options
  return mach * atmSpeedOfSound(alt, { altUnits, velocityUnits })
}

/**
 * Mach number of a true airspeed V given in `velocityUnits`.  M = V/a
 */
export function atmMach(alt: number, V: number, options: VelocityOptions = {}): number {
  const { altUnits = 'ft', velocityUnits = 'ft/s' } = options
  return V / atmSpeedOfSound(alt, { altUnits, velocityUnits })
}

// ─── Dynamic Pressure & EAS ──────────────────────────────────────────────────

/**
 * Freestream dynamic pressure q∞.
 *
 * From q = ½ρV², p = ρRT, M = V/a and a = √(γRT):
 *
 *   q = (γ/2)·p·M² = 0.7·p·M²
 */
export function atmDynamicPressure(alt: number, mach: number, options: DynamicPressureOptions = {}): number {
  const { altUnits = 'ft', pressureUnits = 'psf' } = options
  const z = convertAltitude(alt, altUnits, 'ft')
  const q = HALF_GAMMA * basePressure(z) * mach ** 2
  return convertPressure(q, 'psf', pressureUnits)
}

/**
 * Equivalent airspeed at a Mach number.
 *
 *   EAS = TAS·√(ρ/ρ₀),  ρ/ρ₀ = (p·T₀)/(T·p₀)
 *   EAS = a·M·√((p·T₀)/(T·p₀))
 *
 * The sea-level reference (T₀, p₀) is evaluated from the table on every call.
 */
export function atmEquivalentAirspeed(alt: number, mach: number, options: EquivalentAirspeedOptions = {}): number {
  const { altUnits = 'ft', easUnits = 'ft/s' } = options
  const z = convertAltitude(alt, altUnits, 'ft')
  const T0 = baseTemperature(0)
  const p0 = basePressure(0)
  const T = baseTemperature(z)
  const p = basePressure(z)
  const a = Math.sqrt(GAMMA * GAS_CONSTANT * T)

  const eas = a * mach * Math.sqrt((p * T0) / (T * p0))
  return convertVelocity(eas, 'ft/s', easUnits)
}

// ─── Viscosity ───────────────────────────────────────────────────────────────

/**
 * Freestream dynamic viscosity μ∞ from Sutherland's law.
 */
export function atmDynamicViscosityMu(alt: number, options: DynamicViscosityOptions = {}): number {
  const { altUnits = 'ft', viscUnits = '(lbf*s)/ft^2', diagnostics } = options
  const z = convertAltitude(alt, altUnits, 'ft')
  const mu = sutherlandViscosity(baseTemperature(z), { diagnostics })
  return convertDynamicViscosity(mu, '(lbf*s)/ft^2', viscUnits)
}

/**
 * Freestream kinematic viscosity ν∞ = μ/ρ.
 */
export function atmKinematicViscosityNu(alt: number, options: KinematicViscosityOptions = {}): number {
  const { altUnits = 'ft', viscUnits = 'ft^2/s', diagnostics } = options
  const z = convertAltitude(alt, altUnits, 'ft')
  const rho = atmDensity(z)
  const mu = atmDynamicViscosityMu(z, { diagnostics })
  const nu = mu / rho
  emitDebug(options, [`kinematic viscosity: rho=${rho} [slug/ft^3] mu=${mu} [(lbf*s)/ft^2] nu=${nu} [ft^2/s]`])
  return convertKinematicViscosity(nu, 'ft^2/s', viscUnits)
}

// ─── Unit Reynolds Number ────────────────────────────────────────────────────

/**
 * Reynolds number per unit length, closed form.
 *
 *   Re_L = ρV/μ = p·M·a / (μ·R·T)
 *
 * Pressure and temperature are evaluated once.
 */
export function atmUnitReynoldsNumber2(alt: number, mach: number, options: ReynoldsOptions = {}): number {
  const { altUnits = 'ft', reUnits = '1/ft', diagnostics } = options
  const z = convertAltitude(alt, altUnits, 'ft')
  const p = basePressure(z)
  const T = baseTemperature(z)
  const a = Math.sqrt(GAMMA * GAS_CONSTANT * T)
  const mu = sutherlandViscosity(T, { diagnostics })

  const reL = p * a * mach / (mu * GAS_CONSTANT * T)
  const rho = p / (GAS_CONSTANT * T)
  emitDebug(options, [
    'unit Reynolds number (closed form)',
    `z   = ${convertAltitude(z, 'ft', 'm')} [m] = ${z} [ft]`,
    `a   = ${convertVelocity(a, 'ft/s', 'm/s')} [m/s] = ${a} [ft/s]`,
    `rho = ${convertDensity(rho, 'slug/ft^3', 'kg/m^3')} [kg/m^3] = ${rho} [slug/ft^3]`,
    `M   = ${mach}`,
    `V   = ${convertVelocity(a * mach, 'ft/s', 'm/s')} [m/s] = ${a * mach} [ft/s]`,
    `T   = ${convertTemperature(T, 'R', 'K')} [K] = ${T} [R]`,
    `mu  = ${convertDynamicViscosity(mu, '(lbf*s)/ft^2', '(N*s)/m^2')} [(N*s)/m^2] = ${mu} [(lbf*s)/ft^2]`,
    `Re  = ${convertReynoldsPerLength(reL, '1/ft', '1/m')} [1/m] = ${reL} [1/ft]`,
  ])
  return convertReynoldsPerLength(reL, '1/ft', reUnits)
}

/**
 * Reynolds number per unit length, built from the other primitives.
 *
 *   Re_L = ρ·V / μ
 *
 * With `SI` the altitude is read in metres and the result is per metre.
 */
export function atmUnitReynoldsNumber(alt: number, mach: number, options: SIReynoldsOptions = {}): number {
  const { SI = false, diagnostics } = options
  const z = convertAltitude(alt, SI ? 'm' : 'ft', 'ft')
  const rho = atmDensity(z)
  const V = atmVelocity(z, mach)
  const mu = atmDynamicViscosityMu(z, { diagnostics })

  const reL = rho * V / mu
  emitDebug(options, [
    'unit Reynolds number',
    `z   = ${convertAltitude(z, 'ft', 'm')} [m] = ${z} [ft]`,
    `rho = ${convertDensity(rho, 'slug/ft^3', 'kg/m^3')} [kg/m^3] = ${rho} [slug/ft^3]`,
    `V   = ${convertVelocity(V, 'ft/s', 'm/s')} [m/s] = ${V} [ft/s]`,
    `mu  = ${convertDynamicViscosity(mu, '(lbf*s)/ft^2', '(N*s)/m^2')} [(N*s)/m^2] = ${mu} [(lbf*s)/ft^2]`,
    `Re  = ${convertReynoldsPerLength(reL, '1/ft', '1/m')} [1/m] = ${reL} [1/ft]`,
  ])
  return convertReynoldsPerLength(reL, '1/ft', SI ? '1/m' : '1/ft')
}

// ─── Snapshot ────────────────────────────────────────────────────────────────

/**
 * All freestream quantities at one flight condition, English units.
 */
export interface AirProperties {
  altitude: number            // ft
  mach: number
  temperature: number         // °R
  pressure: number            // lbf/ft²
  density: number             // slug/ft³
  speedOfSound: number        // ft/s
  velocity: number            // ft/s (true airspeed)
  dynamicPressure: number     // lbf/ft²
  equivalentAirspeed: number  // ft/s
  dynamicViscosity: number    // (lbf·s)/ft²
  kinematicViscosity: number  // ft²/s
  unitReynoldsNumber: number  // 1/ft
}

/**
 * Evaluate every derived quantity from a single temperature/pressure lookup.
 */
export function atmAirProperties(
  alt: number,
  mach: number,
  options: AltitudeOptions & DiagnosticOptions = {},
): AirProperties {
  const { altUnits = 'ft', diagnostics } = options
  const z = convertAltitude(alt, altUnits, 'ft')
  const T0 = baseTemperature(0)
  const p0 = basePressure(0)
  const T = baseTemperature(z)
  const p = basePressure(z)

  const rho = p / (GAS_CONSTANT * T)
  const a = Math.sqrt(GAMMA * GAS_CONSTANT * T)
  const V = mach * a
  const mu = sutherlandViscosity(T, { diagnostics })

  return {
    altitude: z,
    mach,
    temperature: T,
    pressure: p,
    density: rho,
    speedOfSound: a,
    velocity: V,
    dynamicPressure: HALF_GAMMA * p * mach ** 2,
    equivalentAirspeed: V * Math.sqrt((p * T0) / (T * p0)),
    dynamicViscosity: mu,
    kinematicViscosity: mu / rho,
    unitReynoldsNumber: rho * V / mu,
  }
}
