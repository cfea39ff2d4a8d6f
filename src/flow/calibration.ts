/**
 * Calibration registry — the explicit calibration context.
 *
 * Built from the frozen anchor table of one profile. Values change only
 * through override(), which is recorded in the audit trail; verify()
 * compares live values with their anchors and throws on drift.
 *
 * Reads are safe from anywhere. Overrides racing a verify() must be
 * serialized by the caller (load calibration once, before computing).
 */

import { z } from 'zod'
import {
  CALIBRATION_ANCHORS,
  CALIBRATION_NAMES,
  CALIBRATION_PROFILES,
  isCalibrationName,
  isCalibrationProfileName,
  PROVISIONAL_CALIBRATIONS,
  type AnchorEntry,
  type CalibrationName,
  type CalibrationProfileName,
} from './calibration-anchors.ts'
import { CalibrationDriftError, InvalidArgumentError, type DriftEntry } from './errors.ts'
import { M3MIN_PER_CFM, M_PER_FT, W_PER_HP } from './units.ts'

export interface CalibrationConstant {
  name: CalibrationName
  value: number
  anchor: number
  unit: string
  origin: string
}

export interface OverrideRecord {
  name: CalibrationName
  previous: number
  value: number
  reason: string
  at: string
}

// ─── Override Batches ────────────────────────────────────────────────────────

export const CalibrationOverride = z.object({
  name: z.custom<CalibrationName>(
    (v) => typeof v === 'string' && isCalibrationName(v),
    { message: 'unknown calibration constant' },
  ),
  value: z.number().finite(),
  reason: z.string().min(1),
})

export const CalibrationOverrideBatch = z.array(CalibrationOverride)

export type TCalibrationOverride = z.infer<typeof CalibrationOverride>

// ─── Registry ────────────────────────────────────────────────────────────────

/** Relative tolerance for cross-unit consistency notes */
const CONSISTENCY_TOLERANCE = 1e-4

export class CalibrationRegistry {
  readonly profile: CalibrationProfileName
  private readonly constants = new Map<CalibrationName, CalibrationConstant>()
  private readonly audit: OverrideRecord[] = []

  constructor(profile: CalibrationProfileName = 'report') {
    this.profile = profile
    const profileAnchors = CALIBRATION_PROFILES[profile].anchors
    for (const name of CALIBRATION_NAMES) {
      const source: AnchorEntry = profileAnchors[name] ?? CALIBRATION_ANCHORS[name]
      this.constants.set(name, {
        name,
        value: source.anchor,
        anchor: source.anchor,
        unit: source.unit,
        origin: source.origin,
      })
    }
  }

  private lookup(name: CalibrationName): CalibrationConstant {
    const entry = this.constants.get(name)
    if (!entry) {
      throw new InvalidArgumentError('CalibrationRegistry', 'name', `unknown calibration constant '${name}'`)
    }
    return entry
  }

  get(name: CalibrationName): number {
    return this.lookup(name).value
  }

  entry(name: CalibrationName): Readonly<CalibrationConstant> {
    return { ...this.lookup(name) }
  }

  entries(): CalibrationConstant[] {
    return CALIBRATION_NAMES.map((name) => ({ ...this.lookup(name) }))
  }

  /**
   * Replace a live value. The anchor is left untouched, so a pinned
   * verify() reports the override as drift.
   */
  override(name: CalibrationName, value: number, reason: string): OverrideRecord {
    const parsed = CalibrationOverride.safeParse({ name, value, reason })
    if (!parsed.success) {
      const field = String(parsed.error.issues[0]?.path[0] ?? 'value')
      throw new InvalidArgumentError('CalibrationRegistry.override', field, parsed.error.issues.map((i) => i.message).join('; '))
    }
    const entry = this.lookup(name)
    const record: OverrideRecord = {
      name,
      previous: entry.value,
      value,
      reason,
      at: new Date().toISOString(),
    }
    entry.value = value
    this.audit.push(record)
    console.warn(`[calibration] ${name} overridden: ${record.previous} → ${value} (${reason})`)
    return record
  }

  /**
   * Apply a batch of overrides from an untrusted source (e.g. a JSON file).
   * Validated as a whole before any value changes.
   */
  applyOverrides(batch: unknown): OverrideRecord[] {
    const parsed = CalibrationOverrideBatch.safeParse(batch)
    if (!parsed.success) {
      throw new InvalidArgumentError(
        'CalibrationRegistry.applyOverrides',
        parsed.error.issues[0]?.path.join('.') ?? 'batch',
        parsed.error.issues.map((i) => i.message).join('; '),
      )
    }
    return parsed.data.map((o) => this.override(o.name, o.value, o.reason))
  }

  auditTrail(): readonly OverrideRecord[] {
    return this.audit.map((r) => ({ ...r }))
  }

  drift(): DriftEntry[] {
    return this.entries()
      .filter((c) => c.value !== c.anchor)
      .map((c) => ({ name: c.name, value: c.value, anchor: c.anchor }))
  }

  isPinned(): boolean {
    return this.drift().length === 0
  }

  /**
   * Throws CalibrationDriftError if any live value differs from its anchor.
   */
  verify(): void {
    const drifted = this.drift()
    if (drifted.length > 0) throw new CalibrationDriftError(drifted)
  }

  /**
   * Known inconsistencies between the anchor sets, for callers to surface.
   * The SI and US main screens were tuned independently, so their constants
   * are not unit conversions of one another.
   */
  discrepancies(): string[] {
    const notes: string[] = []

    const a0FromUs = this.get('A0_FT_S') * M_PER_FT
    const a0Si = this.get('A0_M_S')
    if (relativeDifference(a0FromUs, a0Si) > CONSISTENCY_TOLERANCE) {
      notes.push(
        `a0: ${this.get('A0_FT_S')} ft/s is ${a0FromUs.toFixed(2)} m/s, ` +
        `but the SI screen uses ${a0Si} m/s`
      )
    }

    // HP per CFM → kW per m³/min
    const hpPerCfmToKw = W_PER_HP / 1000 / M3MIN_PER_CFM
    const flowKw = this.get('K_CFM_TO_HP') * hpPerCfmToKw
    if (relativeDifference(flowKw, this.get('K_FLOW_kW')) > CONSISTENCY_TOLERANCE) {
      notes.push(
        `airflow limit: K_CFM_TO_HP=${this.get('K_CFM_TO_HP')} HP/CFM equals ` +
        `${flowKw.toFixed(3)} kW/(m³/min), but K_FLOW_kW=${this.get('K_FLOW_kW')}`
      )
    }
    const csaKw = this.get('K_CSA_HP') * hpPerCfmToKw
    if (relativeDifference(csaKw, this.get('K_CSA_kW')) > CONSISTENCY_TOLERANCE) {
      notes.push(
        `port-area limit: K_CSA_HP=${this.get('K_CSA_HP').toFixed(4)} HP/CFM equals ` +
        `${csaKw.toFixed(3)} kW/(m³/min), but K_CSA_kW=${this.get('K_CSA_kW')}`
      )
    }
    if (PROVISIONAL_CALIBRATIONS.length > 0) {
      notes.push(`unanchored: ${PROVISIONAL_CALIBRATIONS.join(', ')} are provisional, with no reference report behind them`)
    }
    if (this.profile !== 'report') {
      notes.push(`profile '${this.profile}': ${CALIBRATION_PROFILES[this.profile].description}`)
    }
    return notes
  }
}

function relativeDifference(a: number, b: number): number {
  const scale = Math.max(Math.abs(a), Math.abs(b))
  return scale === 0 ? 0 : Math.abs(a - b) / scale
}

// ─── Construction ────────────────────────────────────────────────────────────

export interface CalibrationOptions {
  profile?: CalibrationProfileName | string
  overrides?: unknown
}

export function createCalibrationRegistry(options: CalibrationOptions = {}): CalibrationRegistry {
  const profile = options.profile ?? 'report'
  if (!isCalibrationProfileName(profile)) {
    throw new InvalidArgumentError('createCalibrationRegistry', 'profile', `unknown calibration profile '${profile}'`)
  }
  const registry = new CalibrationRegistry(profile)
  if (options.overrides !== undefined) registry.applyOverrides(options.overrides)
  return registry
}

/** Process-wide registry, pinned to the report anchors at load. */
export const defaultCalibration = new CalibrationRegistry('report')
