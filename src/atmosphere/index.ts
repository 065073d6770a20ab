/**
 * Atmosphere module: public API.
 *
 * This is the barrel export for the standard atmosphere library.
 * Everything in this directory is pure math with no I/O.
 */

export { InvalidUnitError } from './errors.ts'
export {
  UNIT_DIMENSIONS, isUnit, unitsFor, convert,
  convertAltitude, convertVelocity, convertPressure, convertDensity, convertTemperature,
  convertDynamicViscosity, convertKinematicViscosity, convertReynoldsPerLength,
} from './units.ts'
export type {
  DimensionName, UnitOf, AltitudeUnit, VelocityUnit, PressureUnit, DensityUnit, TemperatureUnit,
  DynamicViscosityUnit, KinematicViscosityUnit, ReynoldsUnit,
} from './units.ts'
export { GAS_CONSTANT, GAMMA } from './constants.ts'
export { CONSOLE_DIAGNOSTICS, SILENT_DIAGNOSTICS } from './diagnostics.ts'
export type { DiagnosticSink } from './diagnostics.ts'
export {
  ATMOSPHERE_LAYERS, TOP_OF_TABLE, findLayer, evaluateTemperatureLaw, evaluatePressureLaw,
  baseTemperature, basePressure,
} from './layers.ts'
export type { AtmosphereLayer, TemperatureLaw, PressureLaw } from './layers.ts'
export { atmTemperature, atmPressure } from './profile.ts'
export type { TemperatureOptions, PressureOptions } from './profile.ts'
export { sutherlandViscosity } from './sutherland.ts'
export type { DiagnosticOptions } from './sutherland.ts'
export {
  atmDensity, atmSpeedOfSound, atmVelocity, atmMach, atmDynamicPressure, atmEquivalentAirspeed,
  atmDynamicViscosityMu, atmKinematicViscosityNu, atmUnitReynoldsNumber, atmUnitReynoldsNumber2,
  atmAirProperties,
} from './derived.ts'
export type {
  AltitudeOptions, DensityOptions, SpeedOfSoundOptions, VelocityOptions, DynamicPressureOptions,
  EquivalentAirspeedOptions, DynamicViscosityOptions, KinematicViscosityOptions, ReynoldsOptions,
  SIReynoldsOptions, DebugOptions, AirProperties,
} from './derived.ts'
export { secantSolve, resolveSolverConfig, DEFAULT_SOLVER_CONFIG } from './solver.ts'
export type { SolverConfig, SolveOptions, SolveResult } from './solver.ts'
export {
  getAltForDensity, getAltForPressure, getAltForQMach, getAltForEasMach,
  solveAltitudeForDensity, solveAltitudeForPressure, solveAltitudeForQMach, solveAltitudeForEasMach,
} from './inverse.ts'
export type {
  InverseOptions, DensityInverseOptions, PressureInverseOptions, EasInverseOptions, QMachInverseOptions,
} from './inverse.ts'
