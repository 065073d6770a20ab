/**
 * Error types for the atmosphere library.
 *
 * The only failure the library reports is a malformed unit token.
 * Physical edge cases (extrapolated altitudes, Sutherland out of range,
 * solver hitting its iteration cap) return best-effort values instead.
 */

import type { DimensionName } from './units.ts'

export class InvalidUnitError extends Error {
  readonly dimension: DimensionName
  readonly unit: string
  readonly allowed: readonly string[]

  constructor(dimension: DimensionName, unit: string, allowed: readonly string[]) {
    super(`${dimension} unit '${unit}' is not valid; use [${allowed.join(', ')}]`)
    this.name = 'InvalidUnitError'
    this.dimension = dimension
    this.unit = unit
    this.allowed = allowed
  }
}
