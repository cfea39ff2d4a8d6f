/**
 * Engine coupling — four-stroke demand, RPM solvers, power limits and
 * exhaust/intake ratio models.
 *
 * Demand and RPM solvers are unit-agnostic (any consistent volume / flow
 * pair). The port-supply balance and the power limits are calibrated per
 * unit system and take screen units:
 *
 *   US: area in², velocity ft/s, flow CFM, displacement in³, power HP
 *   SI: area mm², velocity m/s, flow m³/min, displacement cc, power kW
 *
 * This module is UI-independent.
 */

import { defaultCalibration, type CalibrationRegistry } from './calibration.ts'
import { InvalidArgumentError, requireNonNegative, requirePositive } from './errors.ts'
import type { UnitSystem } from './units.ts'

// ─── Engine Demand ───────────────────────────────────────────────────────────

/**
 * Volumetric demand of a four-stroke engine: one intake event per two
 * crank revolutions. Q = (V_d / 2)·RPM/60·VE, per second.
 */
export function engineVolumetricFlow(displacement: number, rpm: number, ve: number): number {
  requirePositive('engineVolumetricFlow', 'displacement', displacement)
  requireNonNegative('engineVolumetricFlow', 'rpm', rpm)
  requirePositive('engineVolumetricFlow', 've', ve)
  return (displacement / 2) * rpm / 60 * ve
}

/**
 * RPM at which the engine demand equals Q (per second).
 */
export function rpmFromFlow(q: number, displacement: number, ve: number): number {
  requireNonNegative('rpmFromFlow', 'q', q)
  requirePositive('rpmFromFlow', 'displacement', displacement)
  requirePositive('rpmFromFlow', 've', ve)
  return q * 60 * 2 / (displacement * ve)
}

/**
 * RPM supported by a mean port area at a target mean port velocity.
 */
export function rpmFromAreaAndTargetVelocity(area: number, displacement: number, ve: number, v_target: number): number {
  requirePositive('rpmFromAreaAndTargetVelocity', 'area', area)
  requirePositive('rpmFromAreaAndTargetVelocity', 'v_target', v_target)
  return rpmFromFlow(area * v_target, displacement, ve)
}

/**
 * Swept volume π/4·bore²·stroke·nCyl, in the cube of the input length unit.
 */
export function engineDisplacement(bore: number, stroke: number, nCyl: number): number {
  requirePositive('engineDisplacement', 'bore', bore)
  requirePositive('engineDisplacement', 'stroke', stroke)
  if (!(Number.isInteger(nCyl) && nCyl >= 1)) {
    throw new InvalidArgumentError('engineDisplacement', 'nCyl', `cylinder count must be a positive integer (got ${nCyl})`)
  }
  return Math.PI / 4 * bore * bore * stroke * nCyl
}

/**
 * Mean piston speed 2·stroke·RPM, in stroke units per minute.
 */
export function meanPistonSpeed(stroke: number, rpm: number): number {
  requirePositive('meanPistonSpeed', 'stroke', stroke)
  requireNonNegative('meanPistonSpeed', 'rpm', rpm)
  return 2 * stroke * rpm
}

/**
 * Collector/primary area for an exhaust flow at a target velocity, A = Q/v.
 */
export function exhaustPrimaryArea(q: number, v_target: number): number {
  requireNonNegative('exhaustPrimaryArea', 'q', q)
  requirePositive('exhaustPrimaryArea', 'v_target', v_target)
  return q / v_target
}

// ─── Port Supply Balance ─────────────────────────────────────────────────────

/** in³ per ft³ × two revolutions per intake event */
const RPM_CONSTANT_US = 1728 * 2
/** cc per m³ × two revolutions per intake event */
const RPM_CONSTANT_SI = 1e6 * 2

const RPM_CONSTANT: Record<UnitSystem, number> = {
  US: RPM_CONSTANT_US,
  SI: RPM_CONSTANT_SI,
}

/** screen area → flow-unit area (ft² or m²) */
const AREA_TO_FLOW_BASE: Record<UnitSystem, number> = {
  US: 1 / 144,
  SI: 1e-6,
}

/**
 * Fixed main-screen a₀ for the unit system (ft/s or m/s).
 */
export function mainScreenA0(units: UnitSystem, calibration: CalibrationRegistry = defaultCalibration): number {
  return units === 'US' ? calibration.get('A0_FT_S') : calibration.get('A0_M_S')
}

/**
 * Raw port-flow capacity: area × velocity × 60 × effective port count.
 * US returns CFM (ft³/min), SI returns m³/min.
 */
export function portFlowCapacity(units: UnitSystem, area: number, velocity: number, nPortsEff: number): number {
  requirePositive('portFlowCapacity', 'area', area)
  requireNonNegative('portFlowCapacity', 'velocity', velocity)
  requirePositive('portFlowCapacity', 'nPortsEff', nPortsEff)
  return area * AREA_TO_FLOW_BASE[units] * velocity * 60 * nPortsEff
}

export interface PortBalanceInputs {
  /** main-screen Mach number at the mean port area */
  mach: number
  nPortsEff: number
  /** whole-engine displacement (in³ or cc) */
  displacement: number
  ve: number
}

/**
 * Peak-power RPM at which the calibrated port supply meets engine demand:
 * RPM = Q_ports·K_PORT_DIST·C / (displacement·VE).
 */
export function peakRpmFromPortArea(
  units: UnitSystem,
  area: number,
  inputs: PortBalanceInputs,
  calibration: CalibrationRegistry = defaultCalibration,
): number {
  requirePositive('peakRpmFromPortArea', 'displacement', inputs.displacement)
  requirePositive('peakRpmFromPortArea', 've', inputs.ve)
  const velocity = inputs.mach * mainScreenA0(units, calibration)
  const q = portFlowCapacity(units, area, velocity, inputs.nPortsEff)
  return q * calibration.get('K_PORT_DIST') * RPM_CONSTANT[units] / (inputs.displacement * inputs.ve)
}

/**
 * Inverse of peakRpmFromPortArea: mean port area required for a peak RPM.
 */
export function portAreaFromPeakRpm(
  units: UnitSystem,
  rpm: number,
  inputs: PortBalanceInputs,
  calibration: CalibrationRegistry = defaultCalibration,
): number {
  requirePositive('portAreaFromPeakRpm', 'rpm', rpm)
  requirePositive('portAreaFromPeakRpm', 'mach', inputs.mach)
  requirePositive('portAreaFromPeakRpm', 'nPortsEff', inputs.nPortsEff)
  requirePositive('portAreaFromPeakRpm', 'displacement', inputs.displacement)
  requirePositive('portAreaFromPeakRpm', 've', inputs.ve)
  const velocity = inputs.mach * mainScreenA0(units, calibration)
  const q = rpm * inputs.displacement * inputs.ve / (calibration.get('K_PORT_DIST') * RPM_CONSTANT[units])
  return q / (AREA_TO_FLOW_BASE[units] * velocity * 60 * inputs.nPortsEff)
}

export function shiftRpm(peakRpm: number, calibration: CalibrationRegistry = defaultCalibration): number {
  requireNonNegative('shiftRpm', 'peakRpm', peakRpm)
  return peakRpm * (1 + calibration.get('SHIFT_ALPHA'))
}

/**
 * f(cr) = K_CR·(1 + K_CR_SLOPE·(cr − K_CR_REF)); spacing between the
 * power and torque peaks.
 */
export function compressionCorrection(cr: number, calibration: CalibrationRegistry = defaultCalibration): number {
  requirePositive('compressionCorrection', 'cr', cr)
  const f = calibration.get('K_CR') * (1 + calibration.get('K_CR_SLOPE') * (cr - calibration.get('K_CR_REF')))
  if (!(f > 0)) {
    throw new InvalidArgumentError('compressionCorrection', 'cr', `correction must stay > 0 (got ${f} at cr=${cr})`)
  }
  return f
}

export function torquePeakRpm(peakRpm: number, cr: number, calibration: CalibrationRegistry = defaultCalibration): number {
  requireNonNegative('torquePeakRpm', 'peakRpm', peakRpm)
  return peakRpm / compressionCorrection(cr, calibration)
}

// ─── Power Limits ────────────────────────────────────────────────────────────

/**
 * Port-area power limit from the raw port supply.
 * US: K_CSA_HP × CFM → HP. SI: K_CSA_kW × m³/min → kW.
 */
export function portAreaPowerLimit(
  units: UnitSystem,
  rawPortFlow: number,
  calibration: CalibrationRegistry = defaultCalibration,
): number {
  requireNonNegative('portAreaPowerLimit', 'rawPortFlow', rawPortFlow)
  const k = units === 'US' ? calibration.get('K_CSA_HP') : calibration.get('K_CSA_kW')
  return k * rawPortFlow
}

/**
 * Airflow power limit from the head flow corrected to 28 inH2O.
 * US: K_CFM_TO_HP × CFM@28 → HP. SI: K_FLOW_kW × m³/min@28 → kW.
 */
export function airflowPowerLimit(
  units: UnitSystem,
  flowAt28: number,
  calibration: CalibrationRegistry = defaultCalibration,
): number {
  requireNonNegative('airflowPowerLimit', 'flowAt28', flowAt28)
  const k = units === 'US' ? calibration.get('K_CFM_TO_HP') : calibration.get('K_FLOW_kW')
  return k * flowAt28
}

// ─── Exhaust / Intake Ratio ──────────────────────────────────────────────────

export type RatioAggregation = 'avg' | 'total'

export interface FlowPair {
  exhaust: number
  intake: number
}

export function exIntRatio(q_exhaust: number, q_intake: number): number {
  requireNonNegative('exIntRatio', 'q_exhaust', q_exhaust)
  requirePositive('exIntRatio', 'q_intake', q_intake)
  return q_exhaust / q_intake
}

/**
 * Header ratio over all rows.
 *   avg:   mean of per-row ratios
 *   total: Σ exhaust / Σ intake
 */
export function aggregateExIntRatio(pairs: readonly FlowPair[], mode: RatioAggregation = 'avg'): number {
  if (pairs.length === 0) {
    throw new InvalidArgumentError('aggregateExIntRatio', 'pairs', 'at least one row is required')
  }
  if (mode === 'total') {
    let ex = 0
    let int = 0
    for (const p of pairs) {
      ex += p.exhaust
      int += p.intake
    }
    return exIntRatio(ex, int)
  }
  let sum = 0
  for (const p of pairs) sum += exIntRatio(p.exhaust, p.intake)
  return sum / pairs.length
}

/**
 * Existing ratio as displayed: ratios below 1 get the K_EXINT_RATIO uplift,
 * capped at 1; ratios at or above 1 pass through.
 */
export function existingExIntRatio(raw: number, calibration: CalibrationRegistry = defaultCalibration): number {
  requireNonNegative('existingExIntRatio', 'raw', raw)
  if (raw >= 1) return raw
  return Math.min(1, raw * calibration.get('K_EXINT_RATIO'))
}

/**
 * Required ratio regression: EI_REQ_BASE + EI_REQ_CR·cr + EI_REQ_LIFT·maxLift[mm].
 */
export function requiredExIntRatio(cr: number, maxLift_mm: number, calibration: CalibrationRegistry = defaultCalibration): number {
  requirePositive('requiredExIntRatio', 'cr', cr)
  requirePositive('requiredExIntRatio', 'maxLift_mm', maxLift_mm)
  return calibration.get('EI_REQ_BASE')
    + calibration.get('EI_REQ_CR') * cr
    + calibration.get('EI_REQ_LIFT') * maxLift_mm
}
