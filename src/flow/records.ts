/**
 * Upstream records — the structured shapes external parsers and the UI
 * hand to the screens, one variant per unit system.
 *
 * Each record is validated against a strict core schema. Fields the
 * engine never reads are not rejected: splitRecord() returns them in a
 * separate passthrough map so callers can carry them along.
 *
 * normalize*() functions convert a validated record to SI base units.
 * US records from the report parser use older key names (q_cfm, and
 * header geometry in mm); parseFlowTest() adopts them before validation.
 */

import { z } from 'zod'
import { makeAirState, type AirState } from './air-state.ts'
import { InvalidArgumentError } from './errors.ts'
import type { PortDimensions, PortWindow } from './geometry.ts'
import { cToK, inH2OToPa, MM_PER_IN, toSI, type UnitSystem } from './units.ts'

const positive = z.number().finite().positive()
const nonNegative = z.number().finite().nonnegative()
const positiveInt = z.number().int().min(1)

// ─── Main Screen ─────────────────────────────────────────────────────────────

const mainCommon = {
  mach: z.number().min(0).max(1),
  n_cyl: positiveInt,
  ve: positive.default(1.0),
  n_ports_eff: positive.optional(),
  cr: positive.default(10.5),
  siamesed_intake: z.boolean().default(false),
}

export const MainInputsSI = z.object({
  ...mainCommon,
  mean_port_area_mm2: positive,
  bore_mm: positive,
  stroke_mm: positive,
  /** head flow at 28 inH2O, drives the airflow power limit */
  head_flow_m3min: nonNegative.optional(),
})

export const MainInputsUS = z.object({
  ...mainCommon,
  mean_port_area_in2: positive,
  bore_in: positive,
  stroke_in: positive,
  head_flow_cfm: nonNegative.optional(),
})

export type TMainInputsSI = z.infer<typeof MainInputsSI>
export type TMainInputsUS = z.infer<typeof MainInputsUS>

// ─── Flow Test Rows ──────────────────────────────────────────────────────────

const rowCommon = {
  dp_inH2O: positive.default(28.0),
  /** per-point density; overrides the air state when both are given */
  rho_kgm3: positive.optional(),
  temp_C: z.number().finite().gt(-273.15).optional(),
  baro_Pa: positive.optional(),
  rh: z.number().min(0).max(1).optional(),
  swirl: z.number().finite().optional(),
  swirl_wheel_rpm: nonNegative.optional(),
}

export const FlowRowSI = z.object({
  ...rowCommon,
  lift_mm: positive,
  q_in_m3min: nonNegative,
  q_ex_m3min: nonNegative.default(0),
  a_mean_mm2: positive.optional(),
  a_eff_mm2: positive.optional(),
  d_valve_mm: positive.optional(),
})

export const FlowRowUS = z.object({
  ...rowCommon,
  lift_in: positive,
  q_in_cfm: nonNegative,
  q_ex_cfm: nonNegative.default(0),
  a_mean_in2: positive.optional(),
  a_eff_in2: positive.optional(),
  d_valve_in: positive.optional(),
})

export type TFlowRowSI = z.infer<typeof FlowRowSI>
export type TFlowRowUS = z.infer<typeof FlowRowUS>

// ─── Flow Test Header ────────────────────────────────────────────────────────

const headerCommon = {
  seat_angle_in_deg: z.number().finite().optional(),
  seat_angle_ex_deg: z.number().finite().optional(),
  n_valves_in: positiveInt.default(1),
  n_valves_ex: positiveInt.default(1),
  cr: positive,
}

export const FlowHeaderSI = z.object({
  ...headerCommon,
  in_width_mm: positive.optional(),
  in_height_mm: positive.optional(),
  in_r_top_mm: nonNegative.default(0),
  in_r_bot_mm: nonNegative.default(0),
  ex_width_mm: positive.optional(),
  ex_height_mm: positive.optional(),
  ex_r_top_mm: nonNegative.default(0),
  ex_r_bot_mm: nonNegative.default(0),
  d_valve_in_mm: positive,
  d_valve_ex_mm: positive,
  d_stem_in_mm: positive.optional(),
  d_stem_ex_mm: positive.optional(),
  d_throat_in_mm: positive.optional(),
  d_throat_ex_mm: positive.optional(),
  seat_width_in_mm: nonNegative.optional(),
  seat_width_ex_mm: nonNegative.optional(),
  port_volume_cc: positive.optional(),
  port_length_centerline_mm: positive.optional(),
  port_area_mm2: positive.optional(),
  /** cylinder bore, for swirl-meter ratios */
  bore_mm: positive.optional(),
  max_lift_mm: positive,
})

export const FlowHeaderUS = z.object({
  ...headerCommon,
  in_width_in: positive.optional(),
  in_height_in: positive.optional(),
  in_r_top_in: nonNegative.default(0),
  in_r_bot_in: nonNegative.default(0),
  ex_width_in: positive.optional(),
  ex_height_in: positive.optional(),
  ex_r_top_in: nonNegative.default(0),
  ex_r_bot_in: nonNegative.default(0),
  d_valve_in_in: positive,
  d_valve_ex_in: positive,
  d_stem_in_in: positive.optional(),
  d_stem_ex_in: positive.optional(),
  d_throat_in_in: positive.optional(),
  d_throat_ex_in: positive.optional(),
  seat_width_in_in: nonNegative.optional(),
  seat_width_ex_in: nonNegative.optional(),
  port_volume_in3: positive.optional(),
  port_length_centerline_in: positive.optional(),
  port_area_in2: positive.optional(),
  bore_in: positive.optional(),
  max_lift_in: positive,
})

export type TFlowHeaderSI = z.infer<typeof FlowHeaderSI>
export type TFlowHeaderUS = z.infer<typeof FlowHeaderUS>

// ─── Split ───────────────────────────────────────────────────────────────────

export interface SplitRecord<T> {
  record: T
  /** fields outside the core schema, passed through untouched */
  extras: Record<string, unknown>
}

/**
 * Validate the core of a record and collect everything else as extras.
 * Throws InvalidArgumentError naming the first failing field.
 */
export function splitRecord<S extends z.AnyZodObject>(
  schema: S,
  raw: unknown,
  operation: string = 'splitRecord',
): SplitRecord<z.output<S>> {
  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = issue ? issue.path.join('.') : 'record'
    const message = parsed.error.issues.map((i) => `${i.path.join('.') || 'record'}: ${i.message}`).join('; ')
    throw new InvalidArgumentError(operation, field, message)
  }

  const extras: Record<string, unknown> = {}
  if (typeof raw === 'object' && raw !== null) {
    for (const [key, value] of Object.entries(raw)) {
      if (!(key in schema.shape)) extras[key] = value
    }
  }
  return { record: parsed.data, extras }
}

// ─── Normalized (SI base) ────────────────────────────────────────────────────

export type Side = 'intake' | 'exhaust'

export const SIDES: readonly Side[] = ['intake', 'exhaust']

/**
 * Per-side header geometry in metres. Valve diameter is always known;
 * the rest of the valve description is optional.
 */
export interface SideGeometry {
  valveDiameter: number
  throatDiameter?: number
  stemDiameter?: number
  seatAngle_deg?: number
  seatWidth?: number
  valveCount: number
  window?: PortWindow
}

export interface FlowHeader {
  intake: SideGeometry
  exhaust: SideGeometry
  /** known port descriptors, m³ / m / m² */
  port: Partial<PortDimensions>
  cr: number
  maxLift: number
  bore?: number
}

/**
 * One bench row, SI base units. Flows in m³/s, depression in Pa.
 */
export interface FlowRow {
  lift: number
  intakeFlow: number
  exhaustFlow: number
  depression_Pa: number
  airState?: AirState
  density?: number
  meanArea?: number
  effectiveArea?: number
  /** intake valve diameter measured with this row */
  valveDiameter?: number
  swirl?: number
  swirlWheelRpm?: number
}

function optionalSI(kind: 'length' | 'area' | 'volume', units: UnitSystem, value: number | undefined): number | undefined {
  return value === undefined ? undefined : toSI(kind, units, value)
}

function windowFrom(
  units: UnitSystem,
  width: number | undefined,
  height: number | undefined,
  rTop: number,
  rBottom: number,
): PortWindow | undefined {
  if (width === undefined || height === undefined) return undefined
  return {
    width: toSI('length', units, width),
    height: toSI('length', units, height),
    rTop: toSI('length', units, rTop),
    rBottom: toSI('length', units, rBottom),
  }
}

export function normalizeFlowHeaderSI(h: TFlowHeaderSI): FlowHeader {
  const len = (v: number | undefined): number | undefined => optionalSI('length', 'SI', v)
  return {
    intake: {
      valveDiameter: toSI('length', 'SI', h.d_valve_in_mm),
      throatDiameter: len(h.d_throat_in_mm),
      stemDiameter: len(h.d_stem_in_mm),
      seatAngle_deg: h.seat_angle_in_deg,
      seatWidth: len(h.seat_width_in_mm),
      valveCount: h.n_valves_in,
      window: windowFrom('SI', h.in_width_mm, h.in_height_mm, h.in_r_top_mm, h.in_r_bot_mm),
    },
    exhaust: {
      valveDiameter: toSI('length', 'SI', h.d_valve_ex_mm),
      throatDiameter: len(h.d_throat_ex_mm),
      stemDiameter: len(h.d_stem_ex_mm),
      seatAngle_deg: h.seat_angle_ex_deg,
      seatWidth: len(h.seat_width_ex_mm),
      valveCount: h.n_valves_ex,
      window: windowFrom('SI', h.ex_width_mm, h.ex_height_mm, h.ex_r_top_mm, h.ex_r_bot_mm),
    },
    port: {
      volume: optionalSI('volume', 'SI', h.port_volume_cc),
      length: len(h.port_length_centerline_mm),
      area: optionalSI('area', 'SI', h.port_area_mm2),
    },
    cr: h.cr,
    maxLift: toSI('length', 'SI', h.max_lift_mm),
    bore: len(h.bore_mm),
  }
}

export function normalizeFlowHeaderUS(h: TFlowHeaderUS): FlowHeader {
  const len = (v: number | undefined): number | undefined => optionalSI('length', 'US', v)
  return {
    intake: {
      valveDiameter: toSI('length', 'US', h.d_valve_in_in),
      throatDiameter: len(h.d_throat_in_in),
      stemDiameter: len(h.d_stem_in_in),
      seatAngle_deg: h.seat_angle_in_deg,
      seatWidth: len(h.seat_width_in_in),
      valveCount: h.n_valves_in,
      window: windowFrom('US', h.in_width_in, h.in_height_in, h.in_r_top_in, h.in_r_bot_in),
    },
    exhaust: {
      valveDiameter: toSI('length', 'US', h.d_valve_ex_in),
      throatDiameter: len(h.d_throat_ex_in),
      stemDiameter: len(h.d_stem_ex_in),
      seatAngle_deg: h.seat_angle_ex_deg,
      seatWidth: len(h.seat_width_ex_in),
      valveCount: h.n_valves_ex,
      window: windowFrom('US', h.ex_width_in, h.ex_height_in, h.ex_r_top_in, h.ex_r_bot_in),
    },
    port: {
      volume: optionalSI('volume', 'US', h.port_volume_in3),
      length: len(h.port_length_centerline_in),
      area: optionalSI('area', 'US', h.port_area_in2),
    },
    cr: h.cr,
    maxLift: toSI('length', 'US', h.max_lift_in),
    bore: len(h.bore_in),
  }
}

type RowAir = Pick<TFlowRowSI, 'rho_kgm3' | 'temp_C' | 'baro_Pa' | 'rh' | 'swirl' | 'swirl_wheel_rpm' | 'dp_inH2O'>

function rowCommonFields(r: RowAir): Pick<FlowRow, 'depression_Pa' | 'airState' | 'density' | 'swirl' | 'swirlWheelRpm'> {
  const airState = r.temp_C !== undefined && r.baro_Pa !== undefined
    ? makeAirState(r.baro_Pa, cToK(r.temp_C), r.rh ?? 0)
    : undefined
  return {
    depression_Pa: inH2OToPa(r.dp_inH2O),
    airState,
    density: r.rho_kgm3,
    swirl: r.swirl,
    swirlWheelRpm: r.swirl_wheel_rpm,
  }
}

export function normalizeFlowRowSI(r: TFlowRowSI): FlowRow {
  return {
    lift: toSI('length', 'SI', r.lift_mm),
    intakeFlow: toSI('flow', 'SI', r.q_in_m3min),
    exhaustFlow: toSI('flow', 'SI', r.q_ex_m3min),
    ...rowCommonFields(r),
    meanArea: optionalSI('area', 'SI', r.a_mean_mm2),
    effectiveArea: optionalSI('area', 'SI', r.a_eff_mm2),
    valveDiameter: optionalSI('length', 'SI', r.d_valve_mm),
  }
}

export function normalizeFlowRowUS(r: TFlowRowUS): FlowRow {
  return {
    lift: toSI('length', 'US', r.lift_in),
    intakeFlow: toSI('flow', 'US', r.q_in_cfm),
    exhaustFlow: toSI('flow', 'US', r.q_ex_cfm),
    ...rowCommonFields(r),
    meanArea: optionalSI('area', 'US', r.a_mean_in2),
    effectiveArea: optionalSI('area', 'US', r.a_eff_in2),
    valveDiameter: optionalSI('length', 'US', r.d_valve_in),
  }
}

// ─── Legacy Keys ─────────────────────────────────────────────────────────────

interface LegacyKey {
  key: string
  /** legacy value × scale = current value */
  scale: number
  /** the legacy writer uses 0 for "not measured" */
  zeroIsAbsent?: boolean
}

/** US rows: the report parser emits the intake flow as q_cfm */
const LEGACY_US_ROW_KEYS: Record<string, LegacyKey> = {
  q_cfm: { key: 'q_in_cfm', scale: 1 },
}

const IN_PER_MM = 1 / MM_PER_IN

/** US headers: the report parser keeps the geometry in millimetres */
const LEGACY_US_HEADER_KEYS: Record<string, LegacyKey> = {
  in_width_mm: { key: 'in_width_in', scale: IN_PER_MM, zeroIsAbsent: true },
  in_height_mm: { key: 'in_height_in', scale: IN_PER_MM, zeroIsAbsent: true },
  in_r_top_mm: { key: 'in_r_top_in', scale: IN_PER_MM },
  in_r_bot_mm: { key: 'in_r_bot_in', scale: IN_PER_MM },
  ex_width_mm: { key: 'ex_width_in', scale: IN_PER_MM, zeroIsAbsent: true },
  ex_height_mm: { key: 'ex_height_in', scale: IN_PER_MM, zeroIsAbsent: true },
  ex_r_top_mm: { key: 'ex_r_top_in', scale: IN_PER_MM },
  ex_r_bot_mm: { key: 'ex_r_bot_in', scale: IN_PER_MM },
  d_valve_in_mm: { key: 'd_valve_in_in', scale: IN_PER_MM },
  d_valve_ex_mm: { key: 'd_valve_ex_in', scale: IN_PER_MM },
  max_lift_mm: { key: 'max_lift_in', scale: IN_PER_MM },
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Rename legacy keys to their current names. A current key already
 * present wins, and the legacy one is left for the extras.
 */
export function adoptLegacyKeys(raw: unknown, legacy: Record<string, LegacyKey>): unknown {
  if (!isPlainObject(raw)) return raw
  const out: Record<string, unknown> = {}
  for (const [name, value] of Object.entries(raw)) {
    const mapping = legacy[name]
    if (!mapping || mapping.key in raw) {
      out[name] = value
      continue
    }
    if (typeof value !== 'number') {
      out[mapping.key] = value
      continue
    }
    if (mapping.zeroIsAbsent && value === 0) continue
    out[mapping.key] = value * mapping.scale
  }
  return out
}

export function adoptLegacyUSRow(raw: unknown): unknown {
  return adoptLegacyKeys(raw, LEGACY_US_ROW_KEYS)
}

export function adoptLegacyUSHeader(raw: unknown): unknown {
  return adoptLegacyKeys(raw, LEGACY_US_HEADER_KEYS)
}

// ─── Parse Helpers ───────────────────────────────────────────────────────────

export interface ParsedFlowTest {
  header: FlowHeader
  rows: FlowRow[]
  headerExtras: Record<string, unknown>
  rowExtras: Record<string, unknown>[]
}

/**
 * Validate and normalize a raw header plus rows for a unit system.
 */
export function parseFlowTest(units: UnitSystem, rawHeader: unknown, rawRows: readonly unknown[]): ParsedFlowTest {
  if (units === 'SI') {
    const h = splitRecord(FlowHeaderSI, rawHeader, 'computeFlowTest.header')
    const rows = rawRows.map((r, i) => splitRecord(FlowRowSI, r, `computeFlowTest.rows[${i}]`))
    return {
      header: normalizeFlowHeaderSI(h.record),
      rows: rows.map((r) => normalizeFlowRowSI(r.record)),
      headerExtras: h.extras,
      rowExtras: rows.map((r) => r.extras),
    }
  }
  const h = splitRecord(FlowHeaderUS, adoptLegacyUSHeader(rawHeader), 'computeFlowTest.header')
  const rows = rawRows.map((r, i) => splitRecord(FlowRowUS, adoptLegacyUSRow(r), `computeFlowTest.rows[${i}]`))
  return {
    header: normalizeFlowHeaderUS(h.record),
    rows: rows.map((r) => normalizeFlowRowUS(r.record)),
    headerExtras: h.extras,
    rowExtras: rows.map((r) => r.extras),
  }
}
