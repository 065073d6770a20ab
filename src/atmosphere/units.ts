/**
 * Unit conversion: multiplicative factor tables.
 *
 * Every dimension has one canonical (English) unit that the physics runs in.
 * Each table entry is the size of one unit expressed in the canonical unit,
 * so converting is  value · size(in) / size(out).
 *
 * Temperature is a pure scale: only absolute scales (°R, K) are accepted.
 *
 * This module is UI-independent.
 */

import { InvalidUnitError } from './errors.ts'

const M_TO_FT = 1 / 0.3048
const PA_TO_PSF = 1 / 47.880172
const KG_M3_TO_SLUG_FT3 = 1 / 515.378818
const PA_S_TO_LBF_S_FT2 = 1 / 47.88026

// ─── Factor Tables ───────────────────────────────────────────────────────────

const ALTITUDE_UNITS = {
  'ft': 1,
  'm': M_TO_FT,
  'kft': 1000,
} as const

const VELOCITY_UNITS = {
  'ft/s': 1,
  'm/s': M_TO_FT,
  'in/s': 1 / 12,
  'knots': 1.68781,
} as const

const PRESSURE_UNITS = {
  'psf': 1,
  'psi': 144,
  'Pa': PA_TO_PSF,
} as const

const DENSITY_UNITS = {
  'slug/ft^3': 1,
  'slinch/in^3': 12 ** 4,
  'kg/m^3': KG_M3_TO_SLUG_FT3,
} as const

const TEMPERATURE_UNITS = {
  'R': 1,
  'K': 9 / 5,
} as const

const DYNAMIC_VISCOSITY_UNITS = {
  '(lbf*s)/ft^2': 1,
  '(N*s)/m^2': PA_S_TO_LBF_S_FT2,
  'Pa*s': PA_S_TO_LBF_S_FT2,
} as const

const KINEMATIC_VISCOSITY_UNITS = {
  'ft^2/s': 1,
  'm^2/s': M_TO_FT * M_TO_FT,
} as const

// Reynolds number per unit length: 1/m is 0.3048 "per foot"
const REYNOLDS_UNITS = {
  '1/ft': 1,
  '1/m': 0.3048,
} as const

/**
 * All supported dimensions, keyed by name.
 * The first key of every table is its canonical unit.
 */
export const UNIT_DIMENSIONS = {
  altitude: ALTITUDE_UNITS,
  velocity: VELOCITY_UNITS,
  pressure: PRESSURE_UNITS,
  density: DENSITY_UNITS,
  temperature: TEMPERATURE_UNITS,
  dynamicViscosity: DYNAMIC_VISCOSITY_UNITS,
  kinematicViscosity: KINEMATIC_VISCOSITY_UNITS,
  reynolds: REYNOLDS_UNITS,
} as const

export type DimensionName = keyof typeof UNIT_DIMENSIONS
export type UnitOf<D extends DimensionName> = keyof (typeof UNIT_DIMENSIONS)[D] & string

export type AltitudeUnit = UnitOf<'altitude'>
export type VelocityUnit = UnitOf<'velocity'>
export type PressureUnit = UnitOf<'pressure'>
export type DensityUnit = UnitOf<'density'>
export type TemperatureUnit = UnitOf<'temperature'>
export type DynamicViscosityUnit = UnitOf<'dynamicViscosity'>
export type KinematicViscosityUnit = UnitOf<'kinematicViscosity'>
export type ReynoldsUnit = UnitOf<'reynolds'>

// ─── Token Validation ────────────────────────────────────────────────────────

/**
 * Type guard for a raw unit token, e.g. one read from user input.
 */
export function isUnit<D extends DimensionName>(dimension: D, token: string): token is UnitOf<D> {
  return Object.hasOwn(UNIT_DIMENSIONS[dimension], token)
}

/**
 * Supported tokens for a dimension, canonical unit first.
 */
export function unitsFor(dimension: DimensionName): string[] {
  return Object.keys(UNIT_DIMENSIONS[dimension])
}

function unitSize(dimension: DimensionName, token: string): number {
  const table: Readonly<Record<string, number>> = UNIT_DIMENSIONS[dimension]
  if (!Object.hasOwn(table, token)) {
    throw new InvalidUnitError(dimension, token, Object.keys(table))
  }
  return table[token]
}

// ─── Conversion ──────────────────────────────────────────────────────────────

/**
 * Convert a scalar between two units of the same dimension.
 *
 * Both tokens are validated first. Identical tokens return the value
 * untouched (no multiply by 1.0).
 *
 * @throws InvalidUnitError when either token is not supported for `dimension`
 */
export function convert(value: number, dimension: DimensionName, unitIn: string, unitOut: string): number {
  // input → canonical, then canonical → output
  let factor = unitSize(dimension, unitIn)
  factor /= unitSize(dimension, unitOut)
  if (unitIn === unitOut) return value
  return value * factor
}

/** Altitude / length; canonical unit ft. */
export function convertAltitude(alt: number, unitIn: string, unitOut: string): number {
  return convert(alt, 'altitude', unitIn, unitOut)
}

/** Velocity; canonical unit ft/s. */
export function convertVelocity(velocity: number, unitIn: string, unitOut: string): number {
  return convert(velocity, 'velocity', unitIn, unitOut)
}

/** Pressure; canonical unit psf. */
export function convertPressure(pressure: number, unitIn: string, unitOut: string): number {
  return convert(pressure, 'pressure', unitIn, unitOut)
}

/** Density; canonical unit slug/ft^3. */
export function convertDensity(density: number, unitIn: string, unitOut: string): number {
  return convert(density, 'density', unitIn, unitOut)
}

/** Absolute temperature; canonical unit °R. */
export function convertTemperature(temperature: number, unitIn: string, unitOut: string): number {
  return convert(temperature, 'temperature', unitIn, unitOut)
}

export function convertDynamicViscosity(mu: number, unitIn: string, unitOut: string): number {
  return convert(mu, 'dynamicViscosity', unitIn, unitOut)
}

export function convertKinematicViscosity(nu: number, unitIn: string, unitOut: string): number {
  return convert(nu, 'kinematicViscosity', unitIn, unitOut)
}

export function convertReynoldsPerLength(reL: number, unitIn: string, unitOut: string): number {
  return convert(reL, 'reynolds', unitIn, unitOut)
}
