/**
 * Flow correction to a reference depression and air state.
 *
 *   Q* = Q_meas · √(Δp* / Δp_meas) · √(ρ_meas / ρ*)
 */

import { requirePositive } from './errors.ts'
import { type AirState, airDensity } from './air-state.ts'
import { inH2OToPa, REFERENCE_DEPRESSION_IN_H2O } from './units.ts'

export function flowReferenced(
  q_meas: number,
  dp_meas: number,
  rho_meas: number,
  dp_ref: number,
  rho_ref: number,
): number {
  requirePositive('flowReferenced', 'dp_meas', dp_meas)
  requirePositive('flowReferenced', 'rho_meas', rho_meas)
  requirePositive('flowReferenced', 'dp_ref', dp_ref)
  requirePositive('flowReferenced', 'rho_ref', rho_ref)
  return q_meas * Math.sqrt(dp_ref / dp_meas) * Math.sqrt(rho_meas / rho_ref)
}

/**
 * Correct a measured flow to 28 inH2O.
 * Without a reference state only the depression is corrected.
 */
export function flowTo28InH2O(
  q_meas: number,
  dp_meas_inH2O: number,
  measured: AirState,
  reference?: AirState,
): number {
  const rho_meas = airDensity(measured)
  const rho_ref = reference ? airDensity(reference) : rho_meas
  return flowReferenced(
    q_meas,
    inH2OToPa(dp_meas_inH2O),
    rho_meas,
    inH2OToPa(REFERENCE_DEPRESSION_IN_H2O),
    rho_ref,
  )
}

/**
 * Depression-only correction when the caller already holds densities.
 */
export function flowToReferenceDepression(
  q_meas: number,
  dp_meas_Pa: number,
  rho_meas: number,
  rho_ref: number = rho_meas,
): number {
  return flowReferenced(q_meas, dp_meas_Pa, rho_meas, inH2OToPa(REFERENCE_DEPRESSION_IN_H2O), rho_ref)
}
