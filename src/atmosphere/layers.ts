/**
 * Six-layer standard atmosphere table (English units).
 *
 * Temperature and ln(pressure) fits from Table C.1 of the Bell Handbook of
 * Aerodynamic Heating (BAC-7006-3352-001). The fits are valid to ~300 kft;
 * above the top breakpoint the last layer's formulas are extrapolated, and
 * below sea level the first layer's are.
 *
 * Altitude z is geometric [ft], temperature [°R], pressure [lbf/ft²].
 * Δz is always measured from the layer floor.
 *
 * This module is UI-independent.
 */

// ─── Layer Laws ──────────────────────────────────────────────────────────────

export type TemperatureLaw =
  | { kind: 'constant'; value: number }
  /** T = base + slope·Δz */
  | { kind: 'linear'; base: number; slope: number }

export type PressureLaw =
  /** ln p = lnBase + slope·Δz */
  | { kind: 'linear'; lnBase: number; slope: number }
  /** ln p = lnBase + exponent·ln(1 + rate·Δz) */
  | { kind: 'log-linear'; lnBase: number; exponent: number; rate: number }

export interface AtmosphereLayer {
  name: string
  /** Inclusive lower bound [ft] */
  floor: number
  /** Exclusive upper bound [ft]; the top layer is open above it */
  ceiling: number
  temperature: TemperatureLaw
  pressure: PressureLaw
}

function layer(def: AtmosphereLayer): Readonly<AtmosphereLayer> {
  return Object.freeze({
    ...def,
    temperature: Object.freeze({ ...def.temperature }),
    pressure: Object.freeze({ ...def.pressure }),
  })
}

// ─── Layer Table ─────────────────────────────────────────────────────────────

export const ATMOSPHERE_LAYERS: readonly Readonly<AtmosphereLayer>[] = Object.freeze([
  layer({
    name: 'troposphere',
    floor: 0,
    ceiling: 36151.725,
    temperature: { kind: 'linear', base: 518.0, slope: -0.003559996 },
    pressure: { kind: 'log-linear', lnBase: 7.657389, exponent: 5.2561258, rate: -6.8634634e-6 },
  }),
  layer({
    name: 'lower stratosphere',
    floor: 36151.725,
    ceiling: 82344.678,
    temperature: { kind: 'constant', value: 389.988 },
    pressure: { kind: 'linear', lnBase: 6.158411, slope: -4.77916918e-5 },
  }),
  layer({
    name: 'upper stratosphere',
    floor: 82344.678,
    ceiling: 155347.756,
    temperature: { kind: 'linear', base: 389.988, slope: 0.0016273286 },
    pressure: { kind: 'log-linear', lnBase: 3.950775, exponent: -11.3882724, rate: 4.17276598e-6 },
  }),
  layer({
    name: 'stratopause',
    floor: 155347.756,
    ceiling: 175346.171,
    temperature: { kind: 'constant', value: 508.788 },
    pressure: { kind: 'linear', lnBase: 0.922461, slope: -3.62635373e-5 },
  }),
  layer({
    name: 'mesosphere',
    floor: 175346.171,
    ceiling: 249000.304,
    temperature: { kind: 'linear', base: 508.788, slope: -0.0020968273 },
    pressure: { kind: 'log-linear', lnBase: 0.197235, exponent: 8.7602095, rate: -4.12122002e-6 },
  }),
  layer({
    name: 'upper mesosphere',
    floor: 249000.304,
    ceiling: 299515.564,
    temperature: { kind: 'constant', value: 354.348 },
    pressure: { kind: 'linear', lnBase: -2.971785, slope: -5.153354665e-5 },
  }),
])

const TOP_LAYER = ATMOSPHERE_LAYERS[ATMOSPHERE_LAYERS.length - 1]

/** Highest tabulated altitude [ft]; the model extrapolates above it. */
export const TOP_OF_TABLE = TOP_LAYER.ceiling

// ─── Evaluation ──────────────────────────────────────────────────────────────

/**
 * Layer containing altitude z [ft].
 * Inclusive floor, exclusive ceiling; anything at or above the top
 * floor belongs to the top layer, anything below sea level to the first.
 */
export function findLayer(z: number): Readonly<AtmosphereLayer> {
  for (const l of ATMOSPHERE_LAYERS) {
    if (z < l.ceiling) return l
  }
  return TOP_LAYER
}

export function evaluateTemperatureLaw(law: TemperatureLaw, dz: number): number {
  switch (law.kind) {
    case 'constant':
      return law.value
    case 'linear':
      return law.base + law.slope * dz
  }
}

export function evaluatePressureLaw(law: PressureLaw, dz: number): number {
  switch (law.kind) {
    case 'linear':
      return Math.exp(law.lnBase + law.slope * dz)
    case 'log-linear':
      return Math.exp(law.lnBase + law.exponent * Math.log(1 + law.rate * dz))
  }
}

/**
 * Temperature [°R] at geometric altitude z [ft].
 */
export function baseTemperature(z: number): number {
  const l = findLayer(z)
  return evaluateTemperatureLaw(l.temperature, z - l.floor)
}

/**
 * Pressure [lbf/ft²] at geometric altitude z [ft].
 */
export function basePressure(z: number): number {
  const l = findLayer(z)
  return evaluatePressureLaw(l.pressure, z - l.floor)
}
