/**
 * Valve and port area models.
 *
 * Curtain (cylinder swept at the seat line), throat (net of stem),
 * seat-limited curtain, port-window cap, and the blended effective area
 * that hands over from curtain to throat as the valve opens.
 *
 * All lengths in metres, areas in m².
 * This module is UI-independent.
 */

import { InvalidGeometryError } from './errors.ts'

const DEG2RAD = Math.PI / 180

// ─── Types ───────────────────────────────────────────────────────────────────

export interface ValveGeometry {
  valveDiameter: number
  throatDiameter: number
  stemDiameter: number
  seatAngle_deg: number
  seatWidth: number
}

export interface PortWindow {
  width: number
  height: number
  rTop: number
  rBottom: number
}

export type BlendStrategy = 'logistic' | 'smoothMin'

export interface EffectiveAreaOptions {
  strategy: BlendStrategy
  /** smooth-min exponent, n ≥ 1 */
  n: number
  /** logistic midpoint in L/D */
  ld0: number
  /** logistic steepness */
  k: number
  /** valves per port */
  valveCount: number
  /** port-window area cap [m²] */
  windowArea?: number
}

export const DEFAULT_EFFECTIVE_AREA: EffectiveAreaOptions = {
  strategy: 'logistic',
  n: 6,
  ld0: 0.30,
  k: 12,
  valveCount: 1,
}

// ─── Primitive Areas ─────────────────────────────────────────────────────────

/**
 * Curtain area A = π·d·L.
 */
export function curtainArea(d_valve: number, lift: number): number {
  if (!(d_valve > 0)) throw new InvalidGeometryError('curtainArea', 'd_valve', `valve diameter must be > 0 (got ${d_valve})`)
  if (!(lift >= 0)) throw new InvalidGeometryError('curtainArea', 'lift', `lift must be >= 0 (got ${lift})`)
  return Math.PI * d_valve * lift
}

/**
 * Throat area net of the valve stem, A = π/4·(d_t² − d_s²).
 */
export function throatArea(d_throat: number, d_stem: number = 0): number {
  if (!(d_throat > 0)) throw new InvalidGeometryError('throatArea', 'd_throat', `throat diameter must be > 0 (got ${d_throat})`)
  if (!(d_stem >= 0)) throw new InvalidGeometryError('throatArea', 'd_stem', `stem diameter must be >= 0 (got ${d_stem})`)
  if (d_stem >= d_throat) {
    throw new InvalidGeometryError('throatArea', 'd_stem', `stem diameter ${d_stem} must be smaller than throat diameter ${d_throat}`)
  }
  return Math.PI * (d_throat * d_throat - d_stem * d_stem) / 4
}

export function ldRatio(lift: number, d_valve: number): number {
  if (!(d_valve > 0)) throw new InvalidGeometryError('ldRatio', 'd_valve', `valve diameter must be > 0 (got ${d_valve})`)
  return lift / d_valve
}

/**
 * Port window: rectangle with two rounded corner pairs.
 * A ≈ w·h − 2·(1 − π/4)·(r_top² + r_bot²). Upper-bound cap only.
 */
export function portWindowArea(window: PortWindow): number {
  const { width, height, rTop, rBottom } = window
  if (!(width > 0)) throw new InvalidGeometryError('portWindowArea', 'width', `width must be > 0 (got ${width})`)
  if (!(height > 0)) throw new InvalidGeometryError('portWindowArea', 'height', `height must be > 0 (got ${height})`)
  if (!(rTop >= 0)) throw new InvalidGeometryError('portWindowArea', 'rTop', `corner radius must be >= 0 (got ${rTop})`)
  if (!(rBottom >= 0)) throw new InvalidGeometryError('portWindowArea', 'rBottom', `corner radius must be >= 0 (got ${rBottom})`)
  const area = width * height - 2 * (1 - Math.PI / 4) * (rTop * rTop + rBottom * rBottom)
  if (!(area > 0)) {
    throw new InvalidGeometryError('portWindowArea', 'rTop', `corner radii leave no window area (${area})`)
  }
  return area
}

// ─── Blends ──────────────────────────────────────────────────────────────────

/**
 * Sigmoid 1 / (1 + exp(x)), clamped against overflow.
 */
function sigmoid(x: number): number {
  if (x > 500) return 0
  if (x < -500) return 1
  return 1 / (1 + Math.exp(x))
}

function requireArea(operation: string, field: string, area: number): void {
  if (!(area >= 0)) throw new InvalidGeometryError(operation, field, `${field} must be >= 0 (got ${area})`)
}

/**
 * Smooth minimum (power mean): (A1^-n + A2^-n)^(-1/n) ≤ min(A1, A2).
 */
export function effectiveAreaSmoothMin(a1: number, a2: number, n: number = DEFAULT_EFFECTIVE_AREA.n): number {
  requireArea('effectiveAreaSmoothMin', 'a1', a1)
  requireArea('effectiveAreaSmoothMin', 'a2', a2)
  if (!(n >= 1)) throw new InvalidGeometryError('effectiveAreaSmoothMin', 'n', `n must be >= 1 (got ${n})`)
  if (a1 === 0 || a2 === 0) return 0
  return Math.pow(Math.pow(a1, -n) + Math.pow(a2, -n), -1 / n)
}

/**
 * Logistic weight over L/D: w = 1 / (1 + exp(−k·(L/D − L/D₀))).
 */
export function logisticWeight(ld: number, ld0: number = DEFAULT_EFFECTIVE_AREA.ld0, k: number = DEFAULT_EFFECTIVE_AREA.k): number {
  return sigmoid(-k * (ld - ld0))
}

/**
 * Logistic hand-over from curtain to throat: (1 − w)·A1 + w·A2.
 */
export function effectiveAreaLogistic(
  a1: number,
  a2: number,
  ld: number,
  ld0: number = DEFAULT_EFFECTIVE_AREA.ld0,
  k: number = DEFAULT_EFFECTIVE_AREA.k,
): number {
  requireArea('effectiveAreaLogistic', 'a1', a1)
  requireArea('effectiveAreaLogistic', 'a2', a2)
  const w = logisticWeight(ld, ld0, k)
  return (1 - w) * a1 + w * a2
}

// ─── Seat-Limited and Effective Area ─────────────────────────────────────────

function validateValve(operation: string, valve: ValveGeometry, lift: number): void {
  if (!(valve.valveDiameter > 0)) throw new InvalidGeometryError(operation, 'valveDiameter', `valve diameter must be > 0 (got ${valve.valveDiameter})`)
  if (!(valve.throatDiameter > 0)) throw new InvalidGeometryError(operation, 'throatDiameter', `throat diameter must be > 0 (got ${valve.throatDiameter})`)
  if (!(valve.seatWidth >= 0)) throw new InvalidGeometryError(operation, 'seatWidth', `seat width must be >= 0 (got ${valve.seatWidth})`)
  if (!(lift >= 0)) throw new InvalidGeometryError(operation, 'lift', `lift must be >= 0 (got ${lift})`)
}

/**
 * Lift below which the seat, not the curtain, bounds the flow: w_seat·tan(θ).
 */
export function seatLiftThreshold(valve: ValveGeometry): number {
  const theta = Math.max(1e-6, valve.seatAngle_deg * DEG2RAD)
  return valve.seatWidth * Math.tan(theta)
}

function blend(a1: number, a2: number, ld: number, opts: EffectiveAreaOptions): number {
  return opts.strategy === 'smoothMin'
    ? effectiveAreaSmoothMin(a1, a2, opts.n)
    : effectiveAreaLogistic(a1, a2, ld, opts.ld0, opts.k)
}

/**
 * Seat-limited area: pure curtain up to the seat threshold; above it the
 * blend between the curtain at the threshold and the throat.
 */
export function seatLimitedArea(
  lift: number,
  valve: ValveGeometry,
  options: Partial<EffectiveAreaOptions> = {},
): number {
  validateValve('seatLimitedArea', valve, lift)
  const opts = { ...DEFAULT_EFFECTIVE_AREA, ...options }
  const threshold = seatLiftThreshold(valve)
  if (lift <= threshold) return curtainArea(valve.valveDiameter, lift)

  const aSeat = curtainArea(valve.valveDiameter, threshold)
  const aThroat = throatArea(valve.throatDiameter, valve.stemDiameter)
  return blend(aSeat, aThroat, ldRatio(lift, valve.valveDiameter), opts)
}

/**
 * Effective flow area at a lift.
 *
 * Blends the seat-capped curtain A1 = min(A_curtain(L), A_curtain(L_seat))
 * with the throat A2, then caps by the curtain itself and the throat.
 * Multi-valve ports sum per valve (≤ n·A_throat); the window caps the total.
 *
 * Non-decreasing in lift, zero at zero lift.
 */
export function effectiveArea(
  lift: number,
  valve: ValveGeometry,
  options: Partial<EffectiveAreaOptions> = {},
): number {
  validateValve('effectiveArea', valve, lift)
  const opts = { ...DEFAULT_EFFECTIVE_AREA, ...options }
  if (!(Number.isInteger(opts.valveCount) && opts.valveCount >= 1)) {
    throw new InvalidGeometryError('effectiveArea', 'valveCount', `valve count must be a positive integer (got ${opts.valveCount})`)
  }

  const aCurtain = curtainArea(valve.valveDiameter, lift)
  const aThroat = throatArea(valve.throatDiameter, valve.stemDiameter)
  const aSeatCapped = Math.min(aCurtain, curtainArea(valve.valveDiameter, seatLiftThreshold(valve)))
  const ld = ldRatio(lift, valve.valveDiameter)

  const perValve = Math.min(blend(aSeatCapped, aThroat, ld, opts), aCurtain, aThroat)
  const total = Math.min(perValve * opts.valveCount, opts.valveCount * aThroat)

  if (opts.windowArea === undefined) return total
  requireArea('effectiveArea', 'windowArea', opts.windowArea)
  return Math.min(total, opts.windowArea)
}

// ─── Port Volume / Area / Length ─────────────────────────────────────────────

export interface PortDimensions {
  volume: number
  length: number
  area: number
}

export function portVolume(area: number, length: number): number {
  return area * length
}

export function portAreaFromVolume(volume: number, length: number): number {
  if (!(length > 0)) throw new InvalidGeometryError('portAreaFromVolume', 'length', `centerline length must be > 0 (got ${length})`)
  return volume / length
}

export function portLengthFromVolume(volume: number, area: number): number {
  if (!(area > 0)) throw new InvalidGeometryError('portLengthFromVolume', 'area', `mean area must be > 0 (got ${area})`)
  return volume / area
}

/**
 * Fill in the third of (volume, centerline length, mean area) from the other two.
 * Returns null when fewer than two are known. With all three, the volume is
 * recomputed from area × length.
 */
export function solvePortDimensions(known: Partial<PortDimensions>): PortDimensions | null {
  const { volume, length, area } = known
  if (area !== undefined && length !== undefined) {
    return { volume: portVolume(area, length), length, area }
  }
  if (volume !== undefined && length !== undefined) {
    return { volume, length, area: portAreaFromVolume(volume, length) }
  }
  if (volume !== undefined && area !== undefined) {
    return { volume, length: portLengthFromVolume(volume, area), area }
  }
  return null
}
