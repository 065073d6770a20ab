/**
 * Sutherland's law for the dynamic viscosity of air.
 *
 * Aerodynamics for Engineers (Bertin, 4th ed.), eq. 1.5b, English units.
 */

import {
  SUTHERLAND_LINEAR_LIMIT,
  SUTHERLAND_VALID_LIMIT,
  SUTHERLAND_LINEAR_SLOPE,
  SUTHERLAND_C1,
  SUTHERLAND_S,
} from './constants.ts'
import { CONSOLE_DIAGNOSTICS } from './diagnostics.ts'
import type { DiagnosticSink } from './diagnostics.ts'

export interface DiagnosticOptions {
  /** Where non-fatal warnings go; default writes to the console */
  diagnostics?: DiagnosticSink
}

/**
 * Dynamic viscosity μ [(lbf·s)/ft²] at temperature T [°R].
 *
 *   T < 225 °R:  μ = 8.0382436e-10 · T
 *   otherwise:   μ = 2.27e-8 · T^1.5 / (T + 198.6)
 *
 * Above 5400 °R the law is outside its validated range. A warning is
 * emitted and the value is still returned.
 */
export function sutherlandViscosity(T: number, options: DiagnosticOptions = {}): number {
  if (T < SUTHERLAND_LINEAR_LIMIT) {
    return SUTHERLAND_LINEAR_SLOPE * T
  }
  if (T > SUTHERLAND_VALID_LIMIT) {
    const sink = options.diagnostics ?? CONSOLE_DIAGNOSTICS
    sink.warn(`viscosity: temperature is too large (T > ${SUTHERLAND_VALID_LIMIT} R); T=${T}`)
  }
  return SUTHERLAND_C1 * T ** 1.5 / (T + SUTHERLAND_S)
}
