/**
 * Air state and flow correction tests.
 */

import { describe, it, expect } from 'vitest'
import {
  makeAirState, STANDARD_AIR, saturationVaporPressure, airDensity, speedOfSound, R_AIR,
} from '../flow/air-state.ts'
import { flowReferenced, flowTo28InH2O, flowToReferenceDepression } from '../flow/flow-correction.ts'
import { InvalidArgumentError } from '../flow/errors.ts'
import { inH2OToPa } from '../flow/units.ts'

describe('air state', () => {
  it('is frozen', () => {
    const s = makeAirState(100000, 293.15, 0.4)
    expect(Object.isFrozen(s)).toBe(true)
    expect(s).toEqual({ p_Pa: 100000, T_K: 293.15, RH: 0.4 })
  })

  it('rejects impossible states', () => {
    expect(() => makeAirState(0, 288.15)).toThrow(InvalidArgumentError)
    expect(() => makeAirState(101325, -1)).toThrow(InvalidArgumentError)
    expect(() => makeAirState(101325, 288.15, 1.5)).toThrow(/RH must be within 0\.\.1/)
    expect(() => makeAirState(101325, 288.15, -0.1)).toThrow(InvalidArgumentError)
  })

  it('Tetens vapour pressure is 610.78 Pa at 0 °C', () => {
    expect(saturationVaporPressure(273.15)).toBeCloseTo(610.78, 10)
    expect(saturationVaporPressure(293.15)).toBeCloseTo(2338.2047, 3)
  })

  it('dry standard air is p/(R·T)', () => {
    expect(airDensity(STANDARD_AIR)).toBeCloseTo(1.224978, 6)
  })

  it('humidity lowers density', () => {
    const dry = airDensity(makeAirState(101325, 293.15, 0))
    const humid = airDensity(makeAirState(101325, 293.15, 0.5))
    expect(humid).toBeCloseTo(1.1901919, 6)
    expect(humid).toBeLessThan(dry)
  })

  it('floors the dry partial pressure at 1 Pa', () => {
    const s = makeAirState(1, 373.15, 1)
    expect(airDensity(s)).toBeCloseTo(1 / (R_AIR * 373.15), 15)
  })

  it('speed of sound is √(γ·R·T)', () => {
    expect(speedOfSound(288.15)).toBeCloseTo(340.297029, 5)
    expect(() => speedOfSound(0)).toThrow(InvalidArgumentError)
  })
})

describe('flow correction', () => {
  it('self-correction is a no-op', () => {
    for (const [dp, rho] of [[100, 1.2], [6974.4892, 1.225], [25000, 0.9]]) {
      expect(flowReferenced(0.0123, dp, rho, dp, rho)).toBeCloseTo(0.0123, 15)
    }
  })

  it('scales with √(Δp*/Δp)·√(ρ/ρ*)', () => {
    expect(flowReferenced(1, 100, 1.2, 400, 1.2)).toBeCloseTo(2, 12)
    expect(flowReferenced(1, 100, 1.2, 100, 0.3)).toBeCloseTo(2, 12)
  })

  it('rejects non-positive depressions and densities', () => {
    expect(() => flowReferenced(1, 0, 1.2, 100, 1.2)).toThrow(InvalidArgumentError)
    expect(() => flowReferenced(1, 100, -1, 100, 1.2)).toThrow(InvalidArgumentError)
    expect(() => flowReferenced(1, 100, 1.2, 0, 1.2)).toThrow(InvalidArgumentError)
    expect(() => flowReferenced(1, 100, 1.2, 100, 0)).toThrow(InvalidArgumentError)
  })

  it('corrects 7 inH2O to 28 inH2O by a factor of 2', () => {
    expect(flowTo28InH2O(0.01, 7, STANDARD_AIR)).toBeCloseTo(0.02, 12)
  })

  it('corrects density only when a reference state is given', () => {
    const measured = makeAirState(101325, 288.15)
    const reference = makeAirState(101325 / 4, 288.15)
    expect(flowTo28InH2O(0.01, 28, measured, reference)).toBeCloseTo(0.02, 12)
  })

  it('corrects depression only by default', () => {
    expect(flowToReferenceDepression(0.01, inH2OToPa(7), 1.1)).toBeCloseTo(0.02, 12)
  })
})
