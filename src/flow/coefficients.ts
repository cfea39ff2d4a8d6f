/**
 * Discharge coefficients.
 *
 * Cd = Q / (A·√(2Δp/ρ)) — measured flow over the ideal flow through A.
 * SAE Cd evaluates it after correcting to the reference depression.
 * Effective Cd swaps the curtain for the blended effective area and may
 * exceed 1.0; it is a normalization metric, not a physical coefficient.
 */

import { requireNonNegative, requirePositive } from './errors.ts'
import { flowReferenced } from './flow-correction.ts'
import { inH2OToPa, REFERENCE_DEPRESSION_IN_H2O } from './units.ts'

export function cd(q: number, a_ref: number, dp: number, rho: number): number {
  requireNonNegative('cd', 'q', q)
  requirePositive('cd', 'a_ref', a_ref)
  requirePositive('cd', 'dp', dp)
  requirePositive('cd', 'rho', rho)
  return q / (a_ref * Math.sqrt(2 * dp / rho))
}

export interface ReferenceCondition {
  dp_Pa: number
  /** defaults to the measured density (depression-only correction) */
  rho?: number
}

export const STANDARD_REFERENCE: ReferenceCondition = {
  dp_Pa: inH2OToPa(REFERENCE_DEPRESSION_IN_H2O),
}

/**
 * Reference-corrected ("SAE") Cd.
 */
export function saeCd(
  q_meas: number,
  dp_meas: number,
  rho_meas: number,
  a_ref: number,
  reference: ReferenceCondition = STANDARD_REFERENCE,
): number {
  const rho_ref = reference.rho ?? rho_meas
  const q_ref = flowReferenced(q_meas, dp_meas, rho_meas, reference.dp_Pa, rho_ref)
  return cd(q_ref, a_ref, reference.dp_Pa, rho_ref)
}

/**
 * SAE Cd against the blended effective area. Not bounded by 1.
 */
export function effectiveCd(
  q_meas: number,
  dp_meas: number,
  rho_meas: number,
  a_eff: number,
  reference: ReferenceCondition = STANDARD_REFERENCE,
): number {
  return saeCd(q_meas, dp_meas, rho_meas, a_eff, reference)
}
