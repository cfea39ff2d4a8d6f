/**
 * Engine coupling tests.
 *
 *   - four-stroke demand and RPM solvers
 *   - port-supply balance against the calibration anchor
 *   - shift / torque-peak RPM
 *   - power limits
 *   - exhaust/intake ratio models
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  engineVolumetricFlow, rpmFromFlow, rpmFromAreaAndTargetVelocity, engineDisplacement, meanPistonSpeed,
  exhaustPrimaryArea, mainScreenA0, portFlowCapacity, peakRpmFromPortArea, portAreaFromPeakRpm,
  shiftRpm, compressionCorrection, torquePeakRpm, portAreaPowerLimit, airflowPowerLimit,
  exIntRatio, aggregateExIntRatio, existingExIntRatio, requiredExIntRatio,
} from '../flow/engine-coupling.ts'
import type { PortBalanceInputs } from '../flow/engine-coupling.ts'
import { CalibrationRegistry } from '../flow/calibration.ts'
import { InvalidArgumentError } from '../flow/errors.ts'

/** 2.75 in² mean port area on a 427.7 in³ V8 */
const ANCHOR: PortBalanceInputs = {
  mach: 0.5475,
  nPortsEff: 4,
  displacement: 427.7,
  ve: 1.0,
}

afterEach(() => {
  vi.restoreAllMocks()
})

// ─── Demand ──────────────────────────────────────────────────────────────────

describe('engine demand', () => {
  it('one intake event per two revolutions', () => {
    expect(engineVolumetricFlow(2, 6000, 1)).toBeCloseTo(100, 12)
    expect(engineVolumetricFlow(2, 6000, 0.9)).toBeCloseTo(90, 12)
  })

  it('rpmFromFlow inverts the demand', () => {
    expect(rpmFromFlow(100, 2, 1)).toBeCloseTo(6000, 9)
    expect(rpmFromFlow(engineVolumetricFlow(5.7, 5200, 0.85), 5.7, 0.85)).toBeCloseTo(5200, 9)
  })

  it('RPM from area and target velocity', () => {
    expect(rpmFromAreaAndTargetVelocity(0.002, 0.005, 1, 100)).toBeCloseTo(4800, 9)
  })

  it('rejects non-physical demand inputs', () => {
    expect(() => engineVolumetricFlow(0, 6000, 1)).toThrow(InvalidArgumentError)
    expect(() => rpmFromFlow(-1, 2, 1)).toThrow(InvalidArgumentError)
    expect(() => rpmFromFlow(1, 2, 0)).toThrow(InvalidArgumentError)
  })

  it('displacement π/4·B²·S·n', () => {
    expect(engineDisplacement(4, 4, 8)).toBeCloseTo(128 * Math.PI, 10)
    expect(() => engineDisplacement(4, 4, 2.5)).toThrow(/positive integer/)
  })

  it('mean piston speed and exhaust primary area', () => {
    expect(meanPistonSpeed(0.1, 6000)).toBeCloseTo(1200, 10)
    expect(exhaustPrimaryArea(0.1, 50)).toBeCloseTo(0.002, 15)
    expect(() => exhaustPrimaryArea(0.1, 0)).toThrow(InvalidArgumentError)
  })
})

// ─── Port Balance ────────────────────────────────────────────────────────────

describe('port-supply balance', () => {
  it('main-screen a₀ per unit system', () => {
    expect(mainScreenA0('US')).toBe(1125)
    expect(mainScreenA0('SI')).toBe(343.2)
  })

  it('raw port flow capacity', () => {
    expect(portFlowCapacity('US', 2.75, 0.5475 * 1125, 4)).toBeCloseTo(2823.046875, 9)
    expect(portFlowCapacity('SI', 1000, 100, 2)).toBeCloseTo(12, 12)
  })

  it('reproduces the 7037 RPM anchor', () => {
    const rpm = peakRpmFromPortArea('US', 2.75, ANCHOR)
    expect(Math.abs(rpm - 7037)).toBeLessThanOrEqual(1)
    expect(rpm).toBeCloseTo(7037.327156885668, 6)
  })

  it('portAreaFromPeakRpm inverts the balance', () => {
    expect(portAreaFromPeakRpm('US', peakRpmFromPortArea('US', 2.75, ANCHOR), ANCHOR)).toBeCloseTo(2.75, 10)
    const si = { mach: 0.5, nPortsEff: 2, displacement: 2827.4, ve: 0.95 }
    expect(portAreaFromPeakRpm('SI', peakRpmFromPortArea('SI', 1774, si), si)).toBeCloseTo(1774, 8)
  })

  it('rejects a zero displacement', () => {
    expect(() => peakRpmFromPortArea('US', 2.75, { ...ANCHOR, displacement: 0 })).toThrow(InvalidArgumentError)
  })

  it('shift RPM is peak × 1.07', () => {
    expect(shiftRpm(7037.327156885668)).toBeCloseTo(7529.940057867665, 6)
  })

  it('torque-peak RPM is peak / f(cr)', () => {
    expect(compressionCorrection(10.5)).toBe(1.1207)
    expect(torquePeakRpm(7037.327156885668, 10.5)).toBeCloseTo(6279.403191653135, 6)
  })

  it('compression slope changes the spacing, and f(cr) must stay positive', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const cal = new CalibrationRegistry()
    cal.override('K_CR_SLOPE', 0.1, 'sensitivity study')
    expect(compressionCorrection(12.5, cal)).toBeCloseTo(1.1207 * 1.2, 12)
    cal.override('K_CR_SLOPE', 1, 'sensitivity study')
    expect(() => compressionCorrection(9, cal)).toThrow(/correction must stay > 0/)
  })
})

// ─── Power Limits ────────────────────────────────────────────────────────────

describe('power limits', () => {
  it('US: HP per CFM', () => {
    expect(portAreaPowerLimit('US', 2823.046875)).toBeCloseTo(2823.046875, 9)
    expect(airflowPowerLimit('US', 300)).toBeCloseTo(123.3, 9)
  })

  it('SI: kW per m³/min', () => {
    expect(portAreaPowerLimit('SI', 10)).toBeCloseTo(65.34, 9)
    expect(airflowPowerLimit('SI', 5)).toBeCloseTo(107.1, 9)
  })

  it('manual profile HP per CFM@28', () => {
    expect(airflowPowerLimit('US', 1720, new CalibrationRegistry('manual'))).toBeCloseTo(739.6, 9)
  })

  it('rejects negative flows', () => {
    expect(() => airflowPowerLimit('US', -1)).toThrow(InvalidArgumentError)
  })
})

// ─── Exhaust / Intake ────────────────────────────────────────────────────────

describe('exhaust/intake ratio', () => {
  it('per-row ratio', () => {
    expect(exIntRatio(84.1, 114.5)).toBeCloseTo(0.7344978165938865, 12)
    expect(() => exIntRatio(84.1, 0)).toThrow(InvalidArgumentError)
  })

  it('avg and total aggregation', () => {
    const pairs = [{ exhaust: 1, intake: 2 }, { exhaust: 3, intake: 4 }]
    expect(aggregateExIntRatio(pairs, 'avg')).toBeCloseTo(0.625, 12)
    expect(aggregateExIntRatio(pairs, 'total')).toBeCloseTo(4 / 6, 12)
    expect(() => aggregateExIntRatio([])).toThrow(InvalidArgumentError)
  })

  it('existing ratio uplift matches the report', () => {
    expect(existingExIntRatio(84.1 / 114.5)).toBeCloseTo(0.7450011353711791, 12)
  })

  it('existing ratio caps at 1 and passes ≥ 1 through', () => {
    expect(existingExIntRatio(0.99)).toBe(1)
    expect(existingExIntRatio(1.2)).toBe(1.2)
  })

  it('required ratio regression', () => {
    expect(requiredExIntRatio(10.5, 12)).toBeCloseTo(0.7865, 12)
    expect(() => requiredExIntRatio(10.5, 0)).toThrow(InvalidArgumentError)
  })
})
