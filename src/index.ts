export * from './atmosphere/index.ts'
export { sweepAltitude, sweepMach, DEFAULT_ALTITUDE_SWEEP, DEFAULT_MACH_SWEEP } from './sweep/flight-conditions.ts'
export type { FlightCondition, AltitudeSweepConfig, MachSweepConfig } from './sweep/flight-conditions.ts'
