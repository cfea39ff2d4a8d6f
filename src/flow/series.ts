/**
 * Series builder — per-lift series for one side of a flow test, and
 * two-test percent deltas.
 *
 * Every series is computed in SI base units. A point whose optional input
 * is missing, or whose inputs are physically invalid, yields null in the
 * affected series only; the other series of that point are unaffected.
 *
 * This module is UI-independent.
 */

import { airDensity, STANDARD_AIR, type AirState } from './air-state.ts'
import { defaultCalibration, type CalibrationRegistry } from './calibration.ts'
import { saeCd, STANDARD_REFERENCE, type ReferenceCondition } from './coefficients.ts'
import { isInvalidArgument, requirePositive } from './errors.ts'
import { flowReferenced } from './flow-correction.ts'
import {
  curtainArea,
  effectiveArea,
  ldRatio,
  portWindowArea,
  type EffectiveAreaOptions,
  type ValveGeometry,
} from './geometry.ts'
import {
  machAtMinArea,
  portEnergyDensity,
  swirlNumber,
  swirlRatioFromWheel,
  velocityFromFlow,
  type FlowSample,
} from './kinematics.ts'
import type { FlowHeader, FlowRow, Side, SideGeometry } from './records.ts'
import { ldAxisTick, type QuantityKind } from './units.ts'

// ─── Types ───────────────────────────────────────────────────────────────────

/**
 * One measurement for one side, SI base units. Read-only input.
 */
export interface FlowPoint {
  readonly lift: number
  /** measured flow [m³/s] */
  readonly flow: number
  readonly depression_Pa: number
  readonly airState?: AirState
  /** per-point density [kg/m³], wins over airState */
  readonly density?: number
  readonly meanArea?: number
  readonly effectiveArea?: number
  readonly valveDiameter?: number
  readonly swirl?: number
  readonly swirlWheelRpm?: number
  readonly swirlSamples?: readonly FlowSample[]
}

export interface SeriesOptions {
  reference: ReferenceCondition
  effectiveArea: Partial<EffectiveAreaOptions>
  /** round L/D up to the 0.01 axis tick */
  ldAxisRound: boolean
}

export const DEFAULT_SERIES_OPTIONS: SeriesOptions = {
  reference: STANDARD_REFERENCE,
  effectiveArea: {},
  ldAxisRound: true,
}

export type Series = (number | null)[]

export type SeriesKey =
  | 'lift'
  | 'ld'
  | 'flow'
  | 'flowAt28'
  | 'saeCd'
  | 'effectiveCd'
  | 'meanVelocity'
  | 'effectiveVelocity'
  | 'mach'
  | 'energyDensity'
  | 'energyPerLength'
  | 'observedFlowPerArea'
  | 'swirl'

export type SideSeries = Record<SeriesKey, Series>

export const SERIES_KINDS: Record<SeriesKey, QuantityKind> = {
  lift: 'length',
  ld: 'ld',
  flow: 'flow',
  flowAt28: 'flow',
  saeCd: 'coefficient',
  effectiveCd: 'coefficient',
  meanVelocity: 'velocity',
  effectiveVelocity: 'velocity',
  mach: 'mach',
  energyDensity: 'energyDensity',
  energyPerLength: 'energyPerLength',
  observedFlowPerArea: 'flowPerArea',
  swirl: 'swirl',
}

/** Series that take part in two-test comparisons (everything but the x axes) */
export const COMPARED_SERIES: readonly SeriesKey[] = [
  'flow',
  'flowAt28',
  'saeCd',
  'effectiveCd',
  'meanVelocity',
  'effectiveVelocity',
  'mach',
  'energyDensity',
  'energyPerLength',
  'observedFlowPerArea',
  'swirl',
]

// ─── Helpers ─────────────────────────────────────────────────────────────────

/**
 * Evaluate one series entry; invalid arguments become null, anything else
 * propagates.
 */
function attempt(fn: () => number): number | null {
  try {
    return fn()
  } catch (err) {
    if (isInvalidArgument(err)) return null
    throw err
  }
}

function pointDensity(point: FlowPoint, calibration: CalibrationRegistry): number {
  if (point.density !== undefined) return point.density
  if (point.airState) return airDensity(point.airState)
  return calibration.get('RHO_KGM3_STD')
}

/**
 * Full valve description when the header supplies all of it.
 */
export function valveGeometryOf(side: SideGeometry): ValveGeometry | null {
  if (side.throatDiameter === undefined || side.seatAngle_deg === undefined || side.seatWidth === undefined) {
    return null
  }
  return {
    valveDiameter: side.valveDiameter,
    throatDiameter: side.throatDiameter,
    stemDiameter: side.stemDiameter ?? 0,
    seatAngle_deg: side.seatAngle_deg,
    seatWidth: side.seatWidth,
  }
}

/**
 * Effective-area options for a side: valve count and window cap from the header.
 */
export function sideAreaOptions(side: SideGeometry, options: Partial<EffectiveAreaOptions> = {}): Partial<EffectiveAreaOptions> {
  const merged: Partial<EffectiveAreaOptions> = { ...options, valveCount: side.valveCount }
  if (side.window) merged.windowArea = portWindowArea(side.window)
  return merged
}

/**
 * Per-side points from bench rows. A row's valve diameter is the intake
 * valve's; exhaust points fall back to the header.
 */
export function pointsForSide(rows: readonly FlowRow[], side: Side): FlowPoint[] {
  return rows.map((r) => ({
    lift: r.lift,
    flow: side === 'intake' ? r.intakeFlow : r.exhaustFlow,
    depression_Pa: r.depression_Pa,
    airState: r.airState,
    density: r.density,
    meanArea: r.meanArea,
    effectiveArea: r.effectiveArea,
    valveDiameter: side === 'intake' ? r.valveDiameter : undefined,
    swirl: r.swirl,
    swirlWheelRpm: r.swirlWheelRpm,
  }))
}

// ─── Builder ─────────────────────────────────────────────────────────────────

export function buildSideSeries(
  points: readonly FlowPoint[],
  side: Side,
  header: FlowHeader,
  options: Partial<SeriesOptions> = {},
  calibration: CalibrationRegistry = defaultCalibration,
): SideSeries {
  const opts = { ...DEFAULT_SERIES_OPTIONS, ...options }
  const geometry = header[side]
  const valve = valveGeometryOf(geometry)
  const areaOptions = attemptOptions(geometry, opts.effectiveArea)
  // energy is reported at standard density whatever the bench air
  const rhoStd = calibration.get('RHO_KGM3_STD')

  const out: SideSeries = {
    lift: [],
    ld: [],
    flow: [],
    flowAt28: [],
    saeCd: [],
    effectiveCd: [],
    meanVelocity: [],
    effectiveVelocity: [],
    mach: [],
    energyDensity: [],
    energyPerLength: [],
    observedFlowPerArea: [],
    swirl: [],
  }

  for (const p of points) {
    const dValve = p.valveDiameter ?? geometry.valveDiameter
    const rho = pointDensity(p, calibration)
    const T_K = p.airState ? p.airState.T_K : STANDARD_AIR.T_K

    out.lift.push(p.lift)
    out.ld.push(attempt(() => {
      const ld = ldRatio(p.lift, dValve)
      return opts.ldAxisRound ? ldAxisTick(ld) : ld
    }))
    out.flow.push(p.flow)
    out.flowAt28.push(attempt(() =>
      flowReferenced(p.flow, p.depression_Pa, rho, opts.reference.dp_Pa, opts.reference.rho ?? rho),
    ))
    out.saeCd.push(attempt(() =>
      saeCd(p.flow, p.depression_Pa, rho, curtainArea(dValve, p.lift), opts.reference),
    ))

    const aEff = effectiveAreaFor(p, valve, areaOptions)
    if (aEff === null) {
      out.effectiveCd.push(null)
      out.effectiveVelocity.push(null)
    } else {
      out.effectiveCd.push(attempt(() => saeCd(p.flow, p.depression_Pa, rho, aEff, opts.reference)))
      out.effectiveVelocity.push(attempt(() => velocityFromFlow(p.flow, aEff)))
    }

    const aMean = p.meanArea
    if (aMean === undefined) {
      out.meanVelocity.push(null)
      out.mach.push(null)
      out.energyDensity.push(null)
      out.energyPerLength.push(null)
    } else {
      const v = attempt(() => velocityFromFlow(p.flow, aMean))
      out.meanVelocity.push(v)
      out.mach.push(attempt(() => machAtMinArea(p.flow, aMean, T_K)))
      const e = v === null ? null : attempt(() => portEnergyDensity(rhoStd, v))
      out.energyDensity.push(e)
      out.energyPerLength.push(e === null ? null : e * aMean)
    }

    out.observedFlowPerArea.push(attempt(() => {
      const aCurtain = curtainArea(dValve, p.lift)
      requirePositive('observedFlowPerArea', 'curtainArea', aCurtain)
      return p.flow / aCurtain
    }))
    out.swirl.push(swirlFor(p, header.bore))
  }
  return out
}

/**
 * Effective-area options for the side, or null when the window is invalid.
 */
function attemptOptions(geometry: SideGeometry, options: Partial<EffectiveAreaOptions>): Partial<EffectiveAreaOptions> | null {
  try {
    return sideAreaOptions(geometry, options)
  } catch (err) {
    if (isInvalidArgument(err)) return null
    throw err
  }
}

/**
 * Measured effective area, else the modelled one when the valve is fully described.
 */
function effectiveAreaFor(
  p: FlowPoint,
  valve: ValveGeometry | null,
  areaOptions: Partial<EffectiveAreaOptions> | null,
): number | null {
  if (p.effectiveArea !== undefined) return p.effectiveArea
  if (!valve || !areaOptions) return null
  return attempt(() => effectiveArea(p.lift, valve, areaOptions))
}

function swirlFor(p: FlowPoint, bore: number | undefined): number | null {
  if (p.swirl !== undefined) return p.swirl
  if (bore === undefined) return null
  const wheelRpm = p.swirlWheelRpm
  if (wheelRpm !== undefined) return attempt(() => swirlRatioFromWheel(wheelRpm, bore, p.flow))
  const samples = p.swirlSamples
  if (samples !== undefined) return attempt(() => swirlNumber(samples, bore / 2))
  return null
}

// ─── Comparison ──────────────────────────────────────────────────────────────

/**
 * Element-wise 100·(a − b)/b. Null where b is 0 or either side is null;
 * the longer series is truncated.
 */
export function percentDelta(a: readonly (number | null)[], b: readonly (number | null)[]): Series {
  const n = Math.min(a.length, b.length)
  const out: Series = []
  for (let i = 0; i < n; i++) {
    const va = a[i]
    const vb = b[i]
    if (va === null || vb === null || vb === 0) {
      out.push(null)
    } else {
      out.push(100 * (va - vb) / vb)
    }
  }
  return out
}
