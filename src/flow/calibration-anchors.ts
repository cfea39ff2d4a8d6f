/**
 * Frozen calibration anchors.
 *
 * Reference values captured from the legacy screens and reports, with the
 * anchor each was tuned against. Update deliberately, together with the
 * anchor tests, when retuning.
 *
 * This module is UI-independent.
 */

export interface AnchorEntry {
  anchor: number
  unit: string
  origin: string
  /** no reference report backs this value */
  provisional?: boolean
}

// ─── Report Profile (default) ────────────────────────────────────────────────

export const CALIBRATION_ANCHORS = {
  // Main-screen air constants (fixed by the GUI, not a(T))
  A0_FT_S: {
    anchor: 1125.0,
    unit: 'ft/s',
    origin: 'GUI main screen fixed a0 for Mach ↔ mean port velocity (US)',
  },
  A0_M_S: {
    anchor: 343.2,
    unit: 'm/s',
    origin: 'GUI main screen fixed a0 for Mach ↔ mean port velocity (SI)',
  },
  RHO_KGM3_STD: {
    anchor: 1.225,
    unit: 'kg/m³',
    origin: 'Standard sea-level density for energy and default per-point density',
  },

  // Main-screen power and RPM calibrations
  K_CFM_TO_HP: {
    anchor: 0.411,
    unit: 'HP/CFM@28',
    origin: 'HP ≈ 0.411 × CFM@28; tuned to report screen examples',
  },
  K_CSA_HP: {
    anchor: 1.0,
    unit: 'HP/CFM',
    origin: 'Port-area HP per ft³/min of raw port supply (A/144 · Mach·a0 · 60 · N)',
  },
  K_PORT_DIST: {
    anchor: 0.3085,
    unit: '-',
    origin: '2.75 in², Mach 0.5475, N=4, VE=1.0, 427.7 in³ → 7037 RPM (solved 0.30849)',
  },
  SHIFT_ALPHA: {
    anchor: 0.07,
    unit: '-',
    origin: 'Shift RPM = peak RPM × (1 + alpha)',
  },
  K_CSA_kW: {
    anchor: 6.534,
    unit: 'kW/(m³/min)',
    origin: 'SI main screen port-area limit ≈ 522 kW',
  },
  K_FLOW_kW: {
    anchor: 21.42,
    unit: 'kW/(m³/min@28)',
    origin: 'SI main screen airflow limit ≈ 528 kW',
  },

  // Compression-ratio correction, f(cr) = K_CR·(1 + K_CR_SLOPE·(cr − K_CR_REF))
  K_CR: {
    anchor: 1.1207,
    unit: '-',
    origin: 'Power-to-torque peak spacing at the reference compression ratio',
  },
  K_CR_REF: {
    anchor: 10.5,
    unit: ':1',
    origin: 'Reference compression ratio',
  },
  K_CR_SLOPE: {
    anchor: 0.0,
    unit: '1/ratio',
    origin: 'No CR sensitivity in the current screens',
  },

  // Exhaust/intake ratio models
  K_EXINT_RATIO: {
    anchor: 1.0143,
    unit: '-',
    origin: 'Existing E/I uplift matching report 84.1/114.5 → 0.745, capped at 1.0',
  },
  EI_REQ_BASE: {
    anchor: 0.92,
    unit: '-',
    origin: 'Required E/I regression intercept; provisional, unanchored',
    provisional: true,
  },
  EI_REQ_CR: {
    anchor: -0.015,
    unit: '1/ratio',
    origin: 'Required E/I regression slope in compression ratio; provisional, unanchored',
    provisional: true,
  },
  EI_REQ_LIFT: {
    anchor: 0.002,
    unit: '1/mm',
    origin: 'Required E/I regression slope in max lift; provisional, unanchored',
    provisional: true,
  },
} as const satisfies Record<string, AnchorEntry>

export type CalibrationName = keyof typeof CALIBRATION_ANCHORS

export function isCalibrationName(name: string): name is CalibrationName {
  return Object.prototype.hasOwnProperty.call(CALIBRATION_ANCHORS, name)
}

export const CALIBRATION_NAMES: CalibrationName[] = Object.keys(CALIBRATION_ANCHORS).filter(isCalibrationName)

function isProvisional(entry: AnchorEntry): boolean {
  return entry.provisional === true
}

/** Constants without a reference anchor, surfaced by discrepancies() */
export const PROVISIONAL_CALIBRATIONS: CalibrationName[] = CALIBRATION_NAMES.filter((name) => isProvisional(CALIBRATION_ANCHORS[name]))

// ─── Profiles ────────────────────────────────────────────────────────────────

export type CalibrationProfileName = 'report' | 'manual'

export interface CalibrationProfile {
  description: string
  /** anchors that differ from the report table */
  anchors: Partial<Record<CalibrationName, AnchorEntry>>
}

/**
 * cm²·m/s → CFM: 1e-4 m³/s × 60 / 0.028316846592
 */
const CFM_PER_CM2_MS = 1e-4 * 60 / 0.028316846592

export const CALIBRATION_PROFILES: Record<CalibrationProfileName, CalibrationProfile> = {
  report: {
    description: 'Report and screen anchors (default)',
    anchors: {},
  },
  manual: {
    description: 'Manual revision: HP = 0.43 × CFM@28, HP = 0.257 × A[cm²]·V[m/s]·N',
    anchors: {
      K_CFM_TO_HP: {
        anchor: 0.43,
        unit: 'HP/CFM@28',
        origin: 'Manual: HP = 0.43 × CFM@28 (740 HP @ 1720 CFM)',
      },
      K_CSA_HP: {
        anchor: 0.257 / CFM_PER_CM2_MS,
        unit: 'HP/CFM',
        origin: 'Manual: C_CSA = 0.257 HP/(cm²·m/s), re-expressed per CFM',
      },
    },
  },
}

export function isCalibrationProfileName(name: string): name is CalibrationProfileName {
  return Object.prototype.hasOwnProperty.call(CALIBRATION_PROFILES, name)
}
