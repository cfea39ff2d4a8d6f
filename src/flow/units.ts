/**
 * Unit conversion between the customary (US) and metric (SI) unit systems.
 *
 * Internally every computation runs in SI base units (m, m², m³/s, Pa, K).
 * The screen units — mm, m³/min, in, CFM, ... — only exist at the edges,
 * through the QUANTITY_UNITS table below.
 *
 * This module is UI-independent.
 */

export type UnitSystem = 'US' | 'SI'

// ─── Exact Factors ───────────────────────────────────────────────────────────

export const MM_PER_IN = 25.4
export const MM2_PER_IN2 = 645.16
export const CC_PER_IN3 = 16.387064
export const M3MIN_PER_CFM = 0.028316846592
export const M_PER_FT = 0.3048
/** Pa per inch of water column (at 4 °C), the flow-bench industry standard */
export const PA_PER_IN_H2O = 249.0889
export const PA_PER_PSI = 6894.757293168
export const N_PER_LBF = 4.4482216152605
export const W_PER_HP = 745.69987158227

/** Standard bench depression */
export const REFERENCE_DEPRESSION_IN_H2O = 28

// ─── Conversion Pairs ────────────────────────────────────────────────────────

export const mmToIn = (mm: number): number => mm / MM_PER_IN
export const inToMm = (inches: number): number => inches * MM_PER_IN

export const mm2ToIn2 = (mm2: number): number => mm2 / MM2_PER_IN2
export const in2ToMm2 = (in2: number): number => in2 * MM2_PER_IN2

export const ccToIn3 = (cc: number): number => cc / CC_PER_IN3
export const in3ToCc = (in3: number): number => in3 * CC_PER_IN3

export const cfmToM3min = (cfm: number): number => cfm * M3MIN_PER_CFM
export const m3minToCfm = (m3min: number): number => m3min / M3MIN_PER_CFM

export const m3minToM3s = (m3min: number): number => m3min / 60
export const m3sToM3min = (m3s: number): number => m3s * 60

export const cfmToM3s = (cfm: number): number => m3minToM3s(cfmToM3min(cfm))
export const m3sToCfm = (m3s: number): number => m3minToCfm(m3sToM3min(m3s))

export const ftsToMs = (fts: number): number => fts * M_PER_FT
export const msToFts = (ms: number): number => ms / M_PER_FT

export const inH2OToPa = (inH2O: number): number => inH2O * PA_PER_IN_H2O
export const paToInH2O = (pa: number): number => pa / PA_PER_IN_H2O

export const cToK = (t_C: number): number => t_C + 273.15
export const fToK = (t_F: number): number => (t_F - 32) * 5 / 9 + 273.15

// ─── Quantity Table ──────────────────────────────────────────────────────────

export type QuantityKind =
  | 'length'
  | 'area'
  | 'volume'
  | 'flow'
  | 'velocity'
  | 'depression'
  | 'energyDensity'
  | 'energyPerLength'
  | 'flowPerArea'
  | 'ld'
  | 'coefficient'
  | 'ratio'
  | 'mach'
  | 'swirl'
  | 'percent'
  | 'rpm'
  | 'power'
  | 'pistonSpeed'

interface QuantityUnit {
  /** Multiply an SI base value by this to get the screen value */
  fromBase: number
  label: string
}

/**
 * Screen unit for every output quantity, per unit system.
 * SI base units: m, m², m³, m³/s, m/s, Pa, J/m³, J/m (= N), m/s (flow per area), W.
 */
export const QUANTITY_UNITS: Record<QuantityKind, Record<UnitSystem, QuantityUnit>> = {
  length: {
    SI: { fromBase: 1000, label: 'mm' },
    US: { fromBase: 1000 / MM_PER_IN, label: 'in' },
  },
  area: {
    SI: { fromBase: 1e6, label: 'mm²' },
    US: { fromBase: 1e6 / MM2_PER_IN2, label: 'in²' },
  },
  volume: {
    SI: { fromBase: 1e6, label: 'cc' },
    US: { fromBase: 1e6 / CC_PER_IN3, label: 'in³' },
  },
  flow: {
    SI: { fromBase: 60, label: 'm³/min' },
    US: { fromBase: 60 / M3MIN_PER_CFM, label: 'CFM' },
  },
  velocity: {
    SI: { fromBase: 1, label: 'm/s' },
    US: { fromBase: 1 / M_PER_FT, label: 'ft/s' },
  },
  depression: {
    SI: { fromBase: 1 / PA_PER_IN_H2O, label: 'inH2O' },
    US: { fromBase: 1 / PA_PER_IN_H2O, label: 'inH2O' },
  },
  energyDensity: {
    SI: { fromBase: 1, label: 'J/m³' },
    // ft·lbf per (in²·ft) is numerically psi
    US: { fromBase: 1 / PA_PER_PSI, label: 'ft·lbf/(in²·ft)' },
  },
  energyPerLength: {
    SI: { fromBase: 1, label: 'J/m' },
    US: { fromBase: 1 / N_PER_LBF, label: 'ft·lbf/ft' },
  },
  flowPerArea: {
    SI: { fromBase: 60 / 1e6, label: 'm³/min/mm²' },
    US: { fromBase: (60 / M3MIN_PER_CFM) * (MM2_PER_IN2 / 1e6), label: 'CFM/in²' },
  },
  ld: {
    SI: { fromBase: 1, label: 'L/D' },
    US: { fromBase: 1, label: 'L/D' },
  },
  coefficient: {
    SI: { fromBase: 1, label: '-' },
    US: { fromBase: 1, label: '-' },
  },
  ratio: {
    SI: { fromBase: 1, label: '-' },
    US: { fromBase: 1, label: '-' },
  },
  mach: {
    SI: { fromBase: 1, label: 'Mach' },
    US: { fromBase: 1, label: 'Mach' },
  },
  swirl: {
    SI: { fromBase: 1, label: '-' },
    US: { fromBase: 1, label: '-' },
  },
  percent: {
    SI: { fromBase: 1, label: '%' },
    US: { fromBase: 1, label: '%' },
  },
  rpm: {
    SI: { fromBase: 1, label: 'rpm' },
    US: { fromBase: 1, label: 'rpm' },
  },
  power: {
    SI: { fromBase: 1e-3, label: 'kW' },
    US: { fromBase: 1 / W_PER_HP, label: 'HP' },
  },
  pistonSpeed: {
    SI: { fromBase: 60, label: 'm/min' },
    US: { fromBase: 60 / M_PER_FT, label: 'ft/min' },
  },
}

export function fromSI(kind: QuantityKind, units: UnitSystem, value: number): number {
  return value * QUANTITY_UNITS[kind][units].fromBase
}

export function toSI(kind: QuantityKind, units: UnitSystem, value: number): number {
  return value / QUANTITY_UNITS[kind][units].fromBase
}

/**
 * Convert a series that may hold "unavailable" (null) entries.
 */
export function seriesFromSI(kind: QuantityKind, units: UnitSystem, values: (number | null)[]): (number | null)[] {
  return values.map((v) => (v === null ? null : fromSI(kind, units, v)))
}

export function unitLabel(kind: QuantityKind, units: UnitSystem): string {
  return QUANTITY_UNITS[kind][units].label
}

/**
 * Build a label map for a keyed set of quantities.
 */
export function unitLabels(kinds: Record<string, QuantityKind>, units: UnitSystem): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [key, kind] of Object.entries(kinds)) {
    out[key] = unitLabel(kind, units)
  }
  return out
}

// ─── Legacy GUI Helpers ──────────────────────────────────────────────────────

/**
 * L/D axis tick: ceil to the next 0.01.
 */
export function ldAxisTick(ld: number): number {
  return Math.ceil(ld * 100) / 100
}

/**
 * Four-decimal formatting used by report exports.
 */
export function formatCorrex(value: number): string {
  return value.toFixed(4)
}
