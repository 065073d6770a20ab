/**
 * Atmosphere profile: temperature and pressure with caller units.
 *
 * Thin unit-normalizing wrappers over the layer table in layers.ts.
 */

import { baseTemperature, basePressure } from './layers.ts'
import { convertAltitude, convertPressure, convertTemperature } from './units.ts'
import type { AltitudeUnit, PressureUnit, TemperatureUnit } from './units.ts'

export interface TemperatureOptions {
  /** Default 'ft' */
  altUnits?: AltitudeUnit
  /** Default 'R' */
  temperatureUnits?: TemperatureUnit
}

export interface PressureOptions {
  /** Default 'ft' */
  altUnits?: AltitudeUnit
  /** Default 'psf' */
  pressureUnits?: PressureUnit
}

/**
 * Freestream temperature T∞.
 *
 * @param alt  Geometric altitude in `altUnits`
 * @returns    Temperature in `temperatureUnits` (°R or K)
 */
export function atmTemperature(alt: number, options: TemperatureOptions = {}): number {
  const { altUnits = 'ft', temperatureUnits = 'R' } = options
  const z = convertAltitude(alt, altUnits, 'ft')
  return convertTemperature(baseTemperature(z), 'R', temperatureUnits)
}

/**
 * Freestream static pressure p∞.
 *
 * @param alt  Geometric altitude in `altUnits`
 * @returns    Pressure in `pressureUnits`
 */
export function atmPressure(alt: number, options: PressureOptions = {}): number {
  const { altUnits = 'ft', pressureUnits = 'psf' } = options
  const z = convertAltitude(alt, altUnits, 'ft')
  return convertPressure(basePressure(z), 'psf', pressureUnits)
}
