/**
 * Screen entry points — main screen, flow test, and two-test comparison.
 *
 * Each takes raw upstream records for one unit system, validates them,
 * and returns plain nested numbers (null = unavailable) in that unit
 * system's screen units, with a label map for rendering.
 *
 * Flow tests and comparisons run in SI base units and convert at the
 * edge. The main screen is evaluated natively per unit system, because
 * its calibrations were tuned per unit system.
 */

import { airDensity } from './air-state.ts'
import { defaultCalibration, type CalibrationRegistry } from './calibration.ts'
import { UnavailableError } from './errors.ts'
import { flowReferenced } from './flow-correction.ts'
import {
  curtainArea,
  effectiveArea,
  ldRatio,
  portWindowArea,
  solvePortDimensions,
  throatArea,
  type PortDimensions,
} from './geometry.ts'
import { meanPortVelocityFromMach } from './kinematics.ts'
import {
  aggregateExIntRatio,
  airflowPowerLimit,
  engineDisplacement,
  existingExIntRatio,
  mainScreenA0,
  meanPistonSpeed,
  peakRpmFromPortArea,
  portAreaPowerLimit,
  portFlowCapacity,
  requiredExIntRatio,
  shiftRpm,
  torquePeakRpm,
  type FlowPair,
  type RatioAggregation,
} from './engine-coupling.ts'
import {
  MainInputsSI,
  MainInputsUS,
  parseFlowTest,
  splitRecord,
  type FlowHeader,
  type FlowRow,
  type Side,
  type SideGeometry,
} from './records.ts'
import {
  buildSideSeries,
  COMPARED_SERIES,
  DEFAULT_SERIES_OPTIONS,
  percentDelta,
  pointsForSide,
  SERIES_KINDS,
  sideAreaOptions,
  valveGeometryOf,
  type Series,
  type SeriesKey,
  type SeriesOptions,
  type SideSeries,
} from './series.ts'
import {
  fromSI,
  seriesFromSI,
  unitLabels,
  type QuantityKind,
  type UnitSystem,
} from './units.ts'

// ─── Main Screen ─────────────────────────────────────────────────────────────

export interface MainScreenResult {
  units: UnitSystem
  /** in³ or cc */
  displacement: number
  /** Mach × fixed a₀, ft/s or m/s */
  meanPortVelocity: number
  nPortsEff: number
  portFlow: {
    /** CFM or m³/min */
    raw: number
    /** raw × K_PORT_DIST */
    effective: number
  }
  peakRpm: number
  shiftRpm: number
  torquePeakRpm: number
  /** at peak RPM; ft/min or m/min */
  meanPistonSpeed: number
  powerLimits: {
    /** HP or kW */
    portArea: number
    /** null without a head flow */
    airflow: number | null
  }
  notes: string[]
  extras: Record<string, unknown>
  labels: Record<string, string>
}

const MAIN_KINDS: Record<string, QuantityKind> = {
  displacement: 'volume',
  meanPortVelocity: 'velocity',
  portFlow: 'flow',
  peakRpm: 'rpm',
  shiftRpm: 'rpm',
  torquePeakRpm: 'rpm',
  meanPistonSpeed: 'pistonSpeed',
  powerLimits: 'power',
}

/** Main-screen quantities in the unit system's screen units */
interface MainScreenValues {
  mach: number
  area: number
  bore: number
  stroke: number
  nCyl: number
  ve: number
  cr: number
  nPortsEff: number
  headFlow?: number
  /** screen stroke unit → piston-speed length unit (ft or m) */
  strokeToSpeedLength: number
  /** bore³ unit → displacement unit */
  boreCubedToDisplacement: number
}

function mainScreenValues(units: UnitSystem, raw: unknown): { values: MainScreenValues; extras: Record<string, unknown> } {
  if (units === 'SI') {
    const { record: r, extras } = splitRecord(MainInputsSI, raw, 'computeMainScreen')
    return {
      values: {
        mach: r.mach,
        area: r.mean_port_area_mm2,
        bore: r.bore_mm,
        stroke: r.stroke_mm,
        nCyl: r.n_cyl,
        ve: r.ve,
        cr: r.cr,
        nPortsEff: r.n_ports_eff ?? (r.siamesed_intake ? r.n_cyl / 2 : r.n_cyl),
        headFlow: r.head_flow_m3min,
        strokeToSpeedLength: 1 / 1000,
        boreCubedToDisplacement: 1 / 1000,
      },
      extras,
    }
  }
  const { record: r, extras } = splitRecord(MainInputsUS, raw, 'computeMainScreen')
  return {
    values: {
      mach: r.mach,
      area: r.mean_port_area_in2,
      bore: r.bore_in,
      stroke: r.stroke_in,
      nCyl: r.n_cyl,
      ve: r.ve,
      cr: r.cr,
      nPortsEff: r.n_ports_eff ?? (r.siamesed_intake ? r.n_cyl / 2 : r.n_cyl),
      headFlow: r.head_flow_cfm,
      strokeToSpeedLength: 1 / 12,
      boreCubedToDisplacement: 1,
    },
    extras,
  }
}

export function computeMainScreen(
  units: UnitSystem,
  inputs: unknown,
  calibration: CalibrationRegistry = defaultCalibration,
): MainScreenResult {
  const { values: v, extras } = mainScreenValues(units, inputs)

  const displacement = engineDisplacement(v.bore, v.stroke, v.nCyl) * v.boreCubedToDisplacement
  const velocity = meanPortVelocityFromMach(v.mach, mainScreenA0(units, calibration))
  const raw = portFlowCapacity(units, v.area, velocity, v.nPortsEff)
  const peak = peakRpmFromPortArea(units, v.area, {
    mach: v.mach,
    nPortsEff: v.nPortsEff,
    displacement,
    ve: v.ve,
  }, calibration)

  const notes = [...calibration.discrepancies()]
  const drifted = calibration.drift()
  if (drifted.length > 0) {
    notes.push(`calibration overridden: ${drifted.map((d) => `${d.name}=${d.value}`).join(', ')}`)
  }
  if (units === 'US') {
    notes.push('mean piston speed: the legacy screens show m/min in both unit systems; reported here in ft/min')
  }
  if (v.headFlow === undefined) {
    notes.push('airflow power limit unavailable: no head flow given')
  }

  return {
    units,
    displacement,
    meanPortVelocity: velocity,
    nPortsEff: v.nPortsEff,
    portFlow: {
      raw,
      effective: raw * calibration.get('K_PORT_DIST'),
    },
    peakRpm: peak,
    shiftRpm: shiftRpm(peak, calibration),
    torquePeakRpm: torquePeakRpm(peak, v.cr, calibration),
    meanPistonSpeed: meanPistonSpeed(v.stroke * v.strokeToSpeedLength, peak),
    powerLimits: {
      portArea: portAreaPowerLimit(units, raw, calibration),
      airflow: v.headFlow === undefined ? null : airflowPowerLimit(units, v.headFlow, calibration),
    },
    notes,
    extras,
    labels: unitLabels(MAIN_KINDS, units),
  }
}

// ─── Flow Test Header (SI base) ──────────────────────────────────────────────

export interface FlowTestOptions extends SeriesOptions {
  ratioMode: RatioAggregation
}

export const DEFAULT_FLOW_TEST_OPTIONS: FlowTestOptions = {
  ...DEFAULT_SERIES_OPTIONS,
  ratioMode: 'avg',
}

export interface SideHeaderMetrics {
  windowArea: number | null
  throatArea: number | null
  curtainAreaAtMaxLift: number
  effectiveAreaAtMaxLift: number | null
  maxLd: number
  /** highest flow corrected to the reference depression */
  peakFlow: number
}

export interface ExIntRatioMetrics {
  mode: RatioAggregation
  raw: number
  existing: number
  required: number
  /** existing − required */
  margin: number
}

export interface FlowTestHeaderMetrics {
  intake: SideHeaderMetrics
  exhaust: SideHeaderMetrics
  port: PortDimensions | null
  exIntRatio: ExIntRatioMetrics
}

export interface FlowTestRow {
  lift: number
  ldIntake: number
  ldExhaust: number
  depression: number
  intakeFlow: number
  exhaustFlow: number
  intakeFlowAt28: number
  exhaustFlowAt28: number
  /** null when the intake flow is zero */
  exIntRatio: number | null
}

function rowDensity(row: FlowRow, calibration: CalibrationRegistry): number {
  if (row.density !== undefined) return row.density
  if (row.airState) return airDensity(row.airState)
  return calibration.get('RHO_KGM3_STD')
}

function flowAtReference(q: number, row: FlowRow, options: FlowTestOptions, calibration: CalibrationRegistry): number {
  const rho = rowDensity(row, calibration)
  return flowReferenced(q, row.depression_Pa, rho, options.reference.dp_Pa, options.reference.rho ?? rho)
}

function sideHeaderMetrics(
  side: SideGeometry,
  header: FlowHeader,
  peakFlow: number,
  options: FlowTestOptions,
): SideHeaderMetrics {
  const valve = valveGeometryOf(side)
  return {
    windowArea: side.window ? portWindowArea(side.window) : null,
    throatArea: side.throatDiameter === undefined ? null : throatArea(side.throatDiameter, side.stemDiameter ?? 0),
    curtainAreaAtMaxLift: curtainArea(side.valveDiameter, header.maxLift) * side.valveCount,
    effectiveAreaAtMaxLift: valve
      ? effectiveArea(header.maxLift, valve, sideAreaOptions(side, options.effectiveArea))
      : null,
    maxLd: ldRatio(header.maxLift, side.valveDiameter),
    peakFlow,
  }
}

/**
 * Header aggregates of a flow test, SI base units.
 *
 * Optional geometry (window, throat, full valve, port descriptors) yields
 * null. Missing rows, or no row with intake flow, throw UnavailableError;
 * invalid geometry throws InvalidGeometryError.
 */
export function flowTestHeaderMetrics(
  header: FlowHeader,
  rows: readonly FlowRow[],
  options: Partial<FlowTestOptions> = {},
  calibration: CalibrationRegistry = defaultCalibration,
): FlowTestHeaderMetrics {
  const opts = { ...DEFAULT_FLOW_TEST_OPTIONS, ...options }
  if (rows.length === 0) {
    throw new UnavailableError('rows', 'flow test header needs at least one row')
  }

  const corrected: FlowPair[] = rows.map((r) => ({
    exhaust: flowAtReference(r.exhaustFlow, r, opts, calibration),
    intake: flowAtReference(r.intakeFlow, r, opts, calibration),
  }))
  const pairs = corrected.filter((p) => p.intake > 0)
  if (pairs.length === 0) {
    throw new UnavailableError('intakeFlow', 'exhaust/intake ratio needs a row with intake flow > 0')
  }

  const raw = aggregateExIntRatio(pairs, opts.ratioMode)
  const existing = existingExIntRatio(raw, calibration)
  const maxLift_mm = fromSI('length', 'SI', header.maxLift)
  const required = requiredExIntRatio(header.cr, maxLift_mm, calibration)

  return {
    intake: sideHeaderMetrics(header.intake, header, Math.max(...corrected.map((p) => p.intake)), opts),
    exhaust: sideHeaderMetrics(header.exhaust, header, Math.max(...corrected.map((p) => p.exhaust)), opts),
    port: solvePortDimensions(header.port),
    exIntRatio: {
      mode: opts.ratioMode,
      raw,
      existing,
      required,
      margin: existing - required,
    },
  }
}

/**
 * Per-row table, SI base units.
 */
export function flowTestRows(
  header: FlowHeader,
  rows: readonly FlowRow[],
  options: Partial<FlowTestOptions> = {},
  calibration: CalibrationRegistry = defaultCalibration,
): FlowTestRow[] {
  const opts = { ...DEFAULT_FLOW_TEST_OPTIONS, ...options }
  return rows.map((r) => {
    const intakeFlowAt28 = flowAtReference(r.intakeFlow, r, opts, calibration)
    const exhaustFlowAt28 = flowAtReference(r.exhaustFlow, r, opts, calibration)
    return {
      lift: r.lift,
      ldIntake: ldRatio(r.lift, r.valveDiameter ?? header.intake.valveDiameter),
      ldExhaust: ldRatio(r.lift, header.exhaust.valveDiameter),
      depression: r.depression_Pa,
      intakeFlow: r.intakeFlow,
      exhaustFlow: r.exhaustFlow,
      intakeFlowAt28,
      exhaustFlowAt28,
      exIntRatio: intakeFlowAt28 > 0 ? exhaustFlowAt28 / intakeFlowAt28 : null,
    }
  })
}

// ─── Flow Test Screen ────────────────────────────────────────────────────────

const SIDE_HEADER_KINDS: Record<keyof SideHeaderMetrics, QuantityKind> = {
  windowArea: 'area',
  throatArea: 'area',
  curtainAreaAtMaxLift: 'area',
  effectiveAreaAtMaxLift: 'area',
  maxLd: 'ld',
  peakFlow: 'flow',
}

const ROW_KINDS: Record<keyof FlowTestRow, QuantityKind> = {
  lift: 'length',
  ldIntake: 'ld',
  ldExhaust: 'ld',
  depression: 'depression',
  intakeFlow: 'flow',
  exhaustFlow: 'flow',
  intakeFlowAt28: 'flow',
  exhaustFlowAt28: 'flow',
  exIntRatio: 'ratio',
}

const PORT_KINDS: Record<keyof PortDimensions, QuantityKind> = {
  volume: 'volume',
  length: 'length',
  area: 'area',
}

export const FLOW_TEST_KINDS: Record<string, QuantityKind> = {
  ...SIDE_HEADER_KINDS,
  ...ROW_KINDS,
  ...SERIES_KINDS,
  portVolume: 'volume',
  portLength: 'length',
  portArea: 'area',
}

function nullableFromSI(kind: QuantityKind, units: UnitSystem, value: number | null): number | null {
  return value === null ? null : fromSI(kind, units, value)
}

function convertSideHeader(m: SideHeaderMetrics, units: UnitSystem): SideHeaderMetrics {
  return {
    windowArea: nullableFromSI(SIDE_HEADER_KINDS.windowArea, units, m.windowArea),
    throatArea: nullableFromSI(SIDE_HEADER_KINDS.throatArea, units, m.throatArea),
    curtainAreaAtMaxLift: fromSI(SIDE_HEADER_KINDS.curtainAreaAtMaxLift, units, m.curtainAreaAtMaxLift),
    effectiveAreaAtMaxLift: nullableFromSI(SIDE_HEADER_KINDS.effectiveAreaAtMaxLift, units, m.effectiveAreaAtMaxLift),
    maxLd: m.maxLd,
    peakFlow: fromSI(SIDE_HEADER_KINDS.peakFlow, units, m.peakFlow),
  }
}

function convertHeader(m: FlowTestHeaderMetrics, units: UnitSystem): FlowTestHeaderMetrics {
  return {
    intake: convertSideHeader(m.intake, units),
    exhaust: convertSideHeader(m.exhaust, units),
    port: m.port && {
      volume: fromSI(PORT_KINDS.volume, units, m.port.volume),
      length: fromSI(PORT_KINDS.length, units, m.port.length),
      area: fromSI(PORT_KINDS.area, units, m.port.area),
    },
    exIntRatio: m.exIntRatio,
  }
}

function convertRow(r: FlowTestRow, units: UnitSystem): FlowTestRow {
  return {
    lift: fromSI(ROW_KINDS.lift, units, r.lift),
    ldIntake: r.ldIntake,
    ldExhaust: r.ldExhaust,
    depression: fromSI(ROW_KINDS.depression, units, r.depression),
    intakeFlow: fromSI(ROW_KINDS.intakeFlow, units, r.intakeFlow),
    exhaustFlow: fromSI(ROW_KINDS.exhaustFlow, units, r.exhaustFlow),
    intakeFlowAt28: fromSI(ROW_KINDS.intakeFlowAt28, units, r.intakeFlowAt28),
    exhaustFlowAt28: fromSI(ROW_KINDS.exhaustFlowAt28, units, r.exhaustFlowAt28),
    exIntRatio: r.exIntRatio,
  }
}

export function convertSideSeries(series: SideSeries, units: UnitSystem): SideSeries {
  return {
    lift: seriesFromSI(SERIES_KINDS.lift, units, series.lift),
    ld: seriesFromSI(SERIES_KINDS.ld, units, series.ld),
    flow: seriesFromSI(SERIES_KINDS.flow, units, series.flow),
    flowAt28: seriesFromSI(SERIES_KINDS.flowAt28, units, series.flowAt28),
    saeCd: seriesFromSI(SERIES_KINDS.saeCd, units, series.saeCd),
    effectiveCd: seriesFromSI(SERIES_KINDS.effectiveCd, units, series.effectiveCd),
    meanVelocity: seriesFromSI(SERIES_KINDS.meanVelocity, units, series.meanVelocity),
    effectiveVelocity: seriesFromSI(SERIES_KINDS.effectiveVelocity, units, series.effectiveVelocity),
    mach: seriesFromSI(SERIES_KINDS.mach, units, series.mach),
    energyDensity: seriesFromSI(SERIES_KINDS.energyDensity, units, series.energyDensity),
    energyPerLength: seriesFromSI(SERIES_KINDS.energyPerLength, units, series.energyPerLength),
    observedFlowPerArea: seriesFromSI(SERIES_KINDS.observedFlowPerArea, units, series.observedFlowPerArea),
    swirl: seriesFromSI(SERIES_KINDS.swirl, units, series.swirl),
  }
}

export interface FlowTestResult {
  units: UnitSystem
  header: FlowTestHeaderMetrics
  rows: FlowTestRow[]
  series: Record<Side, SideSeries>
  extras: {
    header: Record<string, unknown>
    rows: Record<string, unknown>[]
  }
  labels: Record<string, string>
}

export function computeFlowTest(
  units: UnitSystem,
  header: unknown,
  rows: readonly unknown[],
  options: Partial<FlowTestOptions> = {},
  calibration: CalibrationRegistry = defaultCalibration,
): FlowTestResult {
  const opts = { ...DEFAULT_FLOW_TEST_OPTIONS, ...options }
  const parsed = parseFlowTest(units, header, rows)

  const metrics = flowTestHeaderMetrics(parsed.header, parsed.rows, opts, calibration)
  const table = flowTestRows(parsed.header, parsed.rows, opts, calibration)
  const intake = buildSideSeries(pointsForSide(parsed.rows, 'intake'), 'intake', parsed.header, opts, calibration)
  const exhaust = buildSideSeries(pointsForSide(parsed.rows, 'exhaust'), 'exhaust', parsed.header, opts, calibration)

  return {
    units,
    header: convertHeader(metrics, units),
    rows: table.map((r) => convertRow(r, units)),
    series: {
      intake: convertSideSeries(intake, units),
      exhaust: convertSideSeries(exhaust, units),
    },
    extras: {
      header: parsed.headerExtras,
      rows: parsed.rowExtras,
    },
    labels: unitLabels(FLOW_TEST_KINDS, units),
  }
}

// ─── Compare ─────────────────────────────────────────────────────────────────

export type CompareMode = 'lift' | 'ld'

export interface FlowTestInput {
  header: unknown
  rows: readonly unknown[]
}

export type SeriesDelta = Partial<Record<SeriesKey, Series>>

export interface CompareResult {
  units: UnitSystem
  mode: CompareMode
  /** x axis from test A, truncated to the shorter test */
  x: Series
  a: Record<Side, SideSeries>
  b: Record<Side, SideSeries>
  /** percent change of A relative to B */
  delta: Record<Side, SeriesDelta>
  labels: Record<string, string>
}

function sideDeltas(a: SideSeries, b: SideSeries): SeriesDelta {
  const out: SeriesDelta = {}
  for (const key of COMPARED_SERIES) out[key] = percentDelta(a[key], b[key])
  return out
}

function testSeries(
  units: UnitSystem,
  input: FlowTestInput,
  options: FlowTestOptions,
  calibration: CalibrationRegistry,
): Record<Side, SideSeries> {
  const parsed = parseFlowTest(units, input.header, input.rows)
  return {
    intake: buildSideSeries(pointsForSide(parsed.rows, 'intake'), 'intake', parsed.header, options, calibration),
    exhaust: buildSideSeries(pointsForSide(parsed.rows, 'exhaust'), 'exhaust', parsed.header, options, calibration),
  }
}

export function compareTests(
  units: UnitSystem,
  mode: CompareMode,
  a: FlowTestInput,
  b: FlowTestInput,
  options: Partial<FlowTestOptions> = {},
  calibration: CalibrationRegistry = defaultCalibration,
): CompareResult {
  const opts = { ...DEFAULT_FLOW_TEST_OPTIONS, ...options }
  const seriesA = testSeries(units, a, opts, calibration)
  const seriesB = testSeries(units, b, opts, calibration)

  const n = Math.min(seriesA.intake.lift.length, seriesB.intake.lift.length)
  const xKey: SeriesKey = mode === 'lift' ? 'lift' : 'ld'

  return {
    units,
    mode,
    x: seriesFromSI(SERIES_KINDS[xKey], units, seriesA.intake[xKey].slice(0, n)),
    a: {
      intake: convertSideSeries(seriesA.intake, units),
      exhaust: convertSideSeries(seriesA.exhaust, units),
    },
    b: {
      intake: convertSideSeries(seriesB.intake, units),
      exhaust: convertSideSeries(seriesB.exhaust, units),
    },
    delta: {
      intake: sideDeltas(seriesA.intake, seriesB.intake),
      exhaust: sideDeltas(seriesA.exhaust, seriesB.exhaust),
    },
    labels: { ...unitLabels(SERIES_KINDS, units), delta: '%' },
  }
}
