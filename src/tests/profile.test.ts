/**
 * Atmosphere profile tests.
 *
 * Tests src/atmosphere/layers.ts and src/atmosphere/profile.ts:
 *   - layer table shape and immutability
 *   - findLayer boundary selection
 *   - per-layer law evaluation
 *   - continuity across layer boundaries
 *   - sea-level reference values, extrapolation
 *   - monotonic decrease of pressure
 *   - unsupported unit tokens from untyped callers
 */

import { describe, it, expect } from 'vitest'
import {
  ATMOSPHERE_LAYERS,
  TOP_OF_TABLE,
  findLayer,
  evaluateTemperatureLaw,
  evaluatePressureLaw,
  baseTemperature,
  basePressure,
} from '../atmosphere/layers.ts'
import { atmTemperature, atmPressure } from '../atmosphere/profile.ts'
import type { PressureOptions } from '../atmosphere/profile.ts'
import { InvalidUnitError } from '../atmosphere/errors.ts'

const BOUNDARIES = [36151.725, 82344.678, 155347.756, 175346.171, 249000.304, 299515.564]

// ─── Layer Table ─────────────────────────────────────────────────────────────

describe('ATMOSPHERE_LAYERS', () => {
  it('has six contiguous layers starting at sea level', () => {
    expect(ATMOSPHERE_LAYERS).toHaveLength(6)
    expect(ATMOSPHERE_LAYERS[0].floor).toBe(0)
    for (let i = 1; i < ATMOSPHERE_LAYERS.length; i++) {
      expect(ATMOSPHERE_LAYERS[i].floor).toBe(ATMOSPHERE_LAYERS[i - 1].ceiling)
    }
    expect(ATMOSPHERE_LAYERS.map(l => l.ceiling)).toEqual(BOUNDARIES)
    expect(TOP_OF_TABLE).toBe(299515.564)
  })

  it('layers 2, 4 and 6 are isothermal', () => {
    expect(ATMOSPHERE_LAYERS.map(l => l.temperature.kind)).toEqual([
      'linear', 'constant', 'linear', 'constant', 'linear', 'constant',
    ])
  })

  it('is frozen', () => {
    expect(Object.isFrozen(ATMOSPHERE_LAYERS)).toBe(true)
    for (const l of ATMOSPHERE_LAYERS) {
      expect(Object.isFrozen(l)).toBe(true)
      expect(Object.isFrozen(l.temperature)).toBe(true)
      expect(Object.isFrozen(l.pressure)).toBe(true)
    }
  })
})

// ─── findLayer ───────────────────────────────────────────────────────────────

describe('findLayer', () => {
  it('floor is inclusive, ceiling exclusive', () => {
    expect(findLayer(36151.725).name).toBe('lower stratosphere')
    expect(findLayer(36151.724).name).toBe('troposphere')
    expect(findLayer(249000.304).name).toBe('upper mesosphere')
  })

  it('below sea level → first layer', () => {
    expect(findLayer(-2000).name).toBe('troposphere')
  })

  it('above the table → top layer', () => {
    expect(findLayer(299515.564).name).toBe('upper mesosphere')
    expect(findLayer(400000).name).toBe('upper mesosphere')
  })
})

// ─── Layer Laws ──────────────────────────────────────────────────────────────

describe('layer laws', () => {
  it('constant temperature ignores Δz', () => {
    expect(evaluateTemperatureLaw({ kind: 'constant', value: 389.988 }, 12345)).toBe(389.988)
  })

  it('linear temperature: base + slope·Δz', () => {
    expect(evaluateTemperatureLaw({ kind: 'linear', base: 500, slope: -0.002 }, 1000)).toBeCloseTo(498, 12)
  })

  it('linear ln p at Δz = 0 → exp(lnBase)', () => {
    expect(evaluatePressureLaw({ kind: 'linear', lnBase: 2, slope: -1e-4 }, 0)).toBeCloseTo(Math.exp(2), 12)
  })

  it('log-linear ln p: lnBase + exponent·ln(1 + rate·Δz)', () => {
    const p = evaluatePressureLaw({ kind: 'log-linear', lnBase: 1, exponent: 2, rate: 0.5 }, 2)
    // ln p = 1 + 2·ln(2)  →  p = e·4
    expect(p).toBeCloseTo(4 * Math.E, 12)
  })
})

// ─── Reference Values ────────────────────────────────────────────────────────

describe('sea level', () => {
  it('T = 518.0 °R', () => {
    expect(atmTemperature(0)).toBe(518.0)
  })

  it('p = exp(7.657389) ≈ 2116.22 psf', () => {
    expect(atmPressure(0)).toBe(Math.exp(7.657389))
    expect(atmPressure(0)).toBeCloseTo(2116.2247, 4)
  })

  it('SI output: 287.78 K and 101325.2 Pa', () => {
    expect(atmTemperature(0, { temperatureUnits: 'K' })).toBeCloseTo(287.7777777778, 8)
    expect(atmPressure(0, { pressureUnits: 'Pa' })).toBeCloseTo(101325.2048, 3)
  })
})

describe('atmTemperature / atmPressure', () => {
  it('36000 ft, just below the tropopause', () => {
    expect(atmTemperature(36000)).toBeCloseTo(389.840144, 9)
    expect(atmPressure(36000)).toBeCloseTo(476.12826, 4)
  })

  it('50000 ft, isothermal layer', () => {
    expect(atmTemperature(50000)).toBe(389.988)
    expect(atmPressure(50000)).toBeCloseTo(243.85615, 4)
  })

  it('accepts altitude in kft and m', () => {
    expect(atmPressure(50, { altUnits: 'kft' })).toBe(atmPressure(50000))
    expect(atmTemperature(3048, { altUnits: 'm' })).toBeCloseTo(atmTemperature(10000), 9)
  })

  it('rejects an unsupported altitude token from an untyped caller', () => {
    const options: PressureOptions = JSON.parse('{"altUnits":"mi"}')
    expect(() => atmPressure(0, options)).toThrow(InvalidUnitError)
  })

  it('extrapolates above 299.5 kft with the top layer', () => {
    expect(atmTemperature(350000)).toBe(354.348)
    expect(atmPressure(350000)).toBeCloseTo(2.811400693e-4, 12)
  })

  it('extrapolates below sea level with the first layer', () => {
    expect(atmTemperature(-1000)).toBeCloseTo(521.559996, 9)
    expect(atmPressure(-1000)).toBeCloseTo(2193.691434, 5)
  })
})

// ─── Continuity ──────────────────────────────────────────────────────────────

describe('continuity at layer boundaries', () => {
  const eps = 1e-6

  for (const z of BOUNDARIES) {
    it(`pressure is continuous at ${z} ft`, () => {
      expect(Math.abs(basePressure(z - eps) - basePressure(z))).toBeLessThan(1e-3)
    })
  }

  for (const z of BOUNDARIES.slice(1)) {
    it(`temperature is continuous at ${z} ft`, () => {
      expect(Math.abs(baseTemperature(z - eps) - baseTemperature(z))).toBeLessThan(1e-3)
    })
  }

  it('tropopause carries the tabulated 0.688 °R step', () => {
    const step = baseTemperature(36151.725) - baseTemperature(36151.725 - eps)
    expect(step).toBeCloseTo(0.688, 3)
  })
})

// ─── Monotonicity ────────────────────────────────────────────────────────────

describe('monotonic decrease', () => {
  it('pressure strictly decreases from 0 to 250 kft in 1000 ft steps', () => {
    let previous = atmPressure(0)
    for (let z = 1000; z <= 250000; z += 1000) {
      const p = atmPressure(z)
      expect(p).toBeLessThan(previous)
      previous = p
    }
  })
})
