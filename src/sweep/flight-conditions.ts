/**
 * Flight-condition sweeps: tabulates the atmosphere over a range.
 *
 * Steps altitude at fixed Mach, or Mach at fixed altitude, and evaluates
 * every freestream quantity at each point. Rows are in English units
 * regardless of the units the range was given in.
 */

import { atmAirProperties } from '../atmosphere/derived.ts'
import type { AirProperties } from '../atmosphere/derived.ts'
import { findLayer } from '../atmosphere/layers.ts'
import type { DiagnosticSink } from '../atmosphere/diagnostics.ts'
import type { AltitudeUnit } from '../atmosphere/units.ts'

// ─── Data Row ────────────────────────────────────────────────────────────────

export interface FlightCondition extends AirProperties {
  /** Name of the atmosphere layer the altitude falls in */
  layer: string
}

// ─── Sweep Configuration ─────────────────────────────────────────────────────

export interface AltitudeSweepConfig {
  minAlt: number
  maxAlt: number
  step: number
  altUnits: AltitudeUnit
  mach: number
  diagnostics?: DiagnosticSink
}

export interface MachSweepConfig {
  minMach: number
  maxMach: number
  step: number
  alt: number
  altUnits: AltitudeUnit
  diagnostics?: DiagnosticSink
}

export const DEFAULT_ALTITUDE_SWEEP: Readonly<AltitudeSweepConfig> = Object.freeze({
  minAlt: 0,
  maxAlt: 100000,
  step: 5000,
  altUnits: 'ft',
  mach: 0.8,
})

export const DEFAULT_MACH_SWEEP: Readonly<MachSweepConfig> = Object.freeze({
  minMach: 0.1,
  maxMach: 2.0,
  step: 0.1,
  alt: 0,
  altUnits: 'ft',
})

/**
 * Number of points min + i·step that stay ≤ max. A 1e-9 slack keeps an
 * endpoint that rounding puts a hair past max.
 */
function sweepCount(min: number, max: number, step: number): number {
  if (!(step > 0)) {
    throw new RangeError(`sweep step must be positive; got ${step}`)
  }
  return Math.max(0, Math.floor((max - min) / step + 1e-9) + 1)
}

function toCondition(props: AirProperties): FlightCondition {
  return { ...props, layer: findLayer(props.altitude).name }
}

// ─── Sweep Generators ────────────────────────────────────────────────────────

/**
 * Sweep altitude from minAlt to maxAlt (inclusive) at a fixed Mach.
 *
 * alt_i = minAlt + i·step, as in sweepMach.
 */
export function sweepAltitude(config: Partial<AltitudeSweepConfig> = {}): FlightCondition[] {
  const minAlt = config.minAlt ?? DEFAULT_ALTITUDE_SWEEP.minAlt
  const maxAlt = config.maxAlt ?? DEFAULT_ALTITUDE_SWEEP.maxAlt
  const step = config.step ?? DEFAULT_ALTITUDE_SWEEP.step
  const altUnits = config.altUnits ?? DEFAULT_ALTITUDE_SWEEP.altUnits
  const mach = config.mach ?? DEFAULT_ALTITUDE_SWEEP.mach
  const rows: FlightCondition[] = []

  const count = sweepCount(minAlt, maxAlt, step)
  for (let i = 0; i < count; i++) {
    const alt = minAlt + i * step
    const props = atmAirProperties(alt, mach, { altUnits, diagnostics: config.diagnostics })
    rows.push(toCondition(props))
  }

  return rows
}

/**
 * Sweep Mach from minMach to maxMach (inclusive) at a fixed altitude.
 *
 * Mach_i = minMach + i·step, for every i that keeps Mach_i ≤ maxMach.
 */
export function sweepMach(config: Partial<MachSweepConfig> = {}): FlightCondition[] {
  const minMach = config.minMach ?? DEFAULT_MACH_SWEEP.minMach
  const maxMach = config.maxMach ?? DEFAULT_MACH_SWEEP.maxMach
  const step = config.step ?? DEFAULT_MACH_SWEEP.step
  const alt = config.alt ?? DEFAULT_MACH_SWEEP.alt
  const altUnits = config.altUnits ?? DEFAULT_MACH_SWEEP.altUnits
  const rows: FlightCondition[] = []

  const count = sweepCount(minMach, maxMach, step)
  for (let i = 0; i < count; i++) {
    const mach = minMach + i * step
    const props = atmAirProperties(alt, mach, { altUnits, diagnostics: config.diagnostics })
    rows.push(toCondition(props))
  }

  return rows
}
