/**
 * Unit conversion tests.
 *
 * Every conversion pair must invert exactly (within 1e-9 relative),
 * and the quantity table must agree with the pairs.
 */

import { describe, it, expect } from 'vitest'
import {
  mmToIn, inToMm, mm2ToIn2, in2ToMm2, ccToIn3, in3ToCc,
  cfmToM3min, m3minToCfm, m3minToM3s, m3sToM3min, cfmToM3s, m3sToCfm,
  ftsToMs, msToFts, inH2OToPa, paToInH2O, cToK, fToK,
  fromSI, toSI, seriesFromSI, unitLabel, unitLabels, ldAxisTick, formatCorrex,
} from '../flow/units.ts'

const PAIRS: [string, (x: number) => number, (x: number) => number][] = [
  ['mm ↔ in', mmToIn, inToMm],
  ['mm² ↔ in²', mm2ToIn2, in2ToMm2],
  ['cc ↔ in³', ccToIn3, in3ToCc],
  ['CFM ↔ m³/min', cfmToM3min, m3minToCfm],
  ['m³/min ↔ m³/s', m3minToM3s, m3sToM3min],
  ['CFM ↔ m³/s', cfmToM3s, m3sToCfm],
  ['ft/s ↔ m/s', ftsToMs, msToFts],
  ['inH2O ↔ Pa', inH2OToPa, paToInH2O],
]

const SAMPLES = [1e-6, 0.0254, 1, 3.75, 28, 645.16, 1e4, 7.3e7]

describe('conversion pairs', () => {
  for (const [name, to, from] of PAIRS) {
    it(`${name} round-trips both ways`, () => {
      for (const x of SAMPLES) {
        expect(Math.abs(from(to(x)) - x) / x).toBeLessThan(1e-9)
        expect(Math.abs(to(from(x)) - x) / x).toBeLessThan(1e-9)
      }
    })
  }

  it('uses the exact customary factors', () => {
    expect(inToMm(1)).toBe(25.4)
    expect(in2ToMm2(1)).toBe(645.16)
    expect(in3ToCc(1)).toBe(16.387064)
    expect(cfmToM3min(1)).toBe(0.028316846592)
    expect(msToFts(0.3048)).toBe(1)
  })

  it('uses 249.0889 Pa per inch of water', () => {
    expect(inH2OToPa(1)).toBe(249.0889)
    expect(inH2OToPa(28)).toBeCloseTo(6974.4892, 9)
  })

  it('converts temperatures to kelvin', () => {
    expect(cToK(15)).toBeCloseTo(288.15, 12)
    expect(fToK(32)).toBeCloseTo(273.15, 12)
    expect(fToK(212)).toBeCloseTo(373.15, 12)
  })
})

describe('quantity table', () => {
  it('maps SI base values to screen units', () => {
    expect(fromSI('length', 'SI', 0.044)).toBeCloseTo(44, 12)
    expect(fromSI('length', 'US', 0.0254)).toBeCloseTo(1, 12)
    expect(fromSI('area', 'SI', 1e-6)).toBeCloseTo(1, 12)
    expect(fromSI('area', 'US', 645.16e-6)).toBeCloseTo(1, 12)
    expect(fromSI('volume', 'US', 16.387064e-6)).toBeCloseTo(1, 12)
    expect(fromSI('flow', 'SI', 0.5 / 60)).toBeCloseTo(0.5, 12)
    expect(fromSI('velocity', 'US', 0.3048)).toBeCloseTo(1, 12)
    expect(fromSI('depression', 'SI', 249.0889)).toBeCloseTo(1, 12)
  })

  it('agrees with the conversion pairs for flow', () => {
    const q_m3s = 0.02
    expect(fromSI('flow', 'US', q_m3s)).toBeCloseTo(m3sToCfm(q_m3s), 9)
  })

  it('toSI inverts fromSI', () => {
    for (const kind of ['length', 'area', 'volume', 'flow', 'velocity', 'flowPerArea', 'power', 'pistonSpeed'] as const) {
      for (const units of ['US', 'SI'] as const) {
        const x = 12.5
        expect(Math.abs(toSI(kind, units, fromSI(kind, units, x)) - x) / x).toBeLessThan(1e-12)
      }
    }
  })

  it('keeps unavailable entries in series', () => {
    expect(seriesFromSI('length', 'SI', [0.001, null, 0.002])).toEqual([1, null, 2])
  })

  it('labels quantities per unit system', () => {
    expect(unitLabel('flow', 'US')).toBe('CFM')
    expect(unitLabel('flow', 'SI')).toBe('m³/min')
    expect(unitLabel('power', 'US')).toBe('HP')
    expect(unitLabel('power', 'SI')).toBe('kW')
    expect(unitLabels({ lift: 'length', flow: 'flow', cd: 'coefficient' }, 'US')).toEqual({
      lift: 'in',
      flow: 'CFM',
      cd: '-',
    })
  })
})

describe('legacy GUI helpers', () => {
  it('ceils L/D to the next 0.01 tick', () => {
    expect(ldAxisTick(0.123)).toBe(0.13)
    expect(ldAxisTick(0.25)).toBe(0.25)
    expect(ldAxisTick(0.301)).toBe(0.31)
  })

  it('formats report values with four decimals', () => {
    expect(formatCorrex(0.123456)).toBe('0.1235')
    expect(formatCorrex(2)).toBe('2.0000')
  })
})
