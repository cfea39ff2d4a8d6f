/**
 * Air state and thermodynamics.
 *
 * Density from total pressure, temperature and relative humidity
 * (Tetens vapour pressure), and the ideal-gas speed of sound.
 * γ and R_air are physical constants, never calibration knobs.
 *
 * This module is UI-independent.
 */

import { InvalidArgumentError, requirePositive } from './errors.ts'

export const GAMMA_AIR = 1.4
/** Specific gas constant of dry air [J/(kg·K)] */
export const R_AIR = 287.058

/** Floor for the dry-air partial pressure [Pa] */
const MIN_DRY_PRESSURE_PA = 1

export interface AirState {
  readonly p_Pa: number   // absolute (total) pressure
  readonly T_K: number    // temperature
  readonly RH: number     // relative humidity fraction, 0..1
}

export function makeAirState(p_Pa: number, T_K: number, RH: number = 0): AirState {
  requirePositive('makeAirState', 'p_Pa', p_Pa)
  requirePositive('makeAirState', 'T_K', T_K)
  if (!(RH >= 0 && RH <= 1)) {
    throw new InvalidArgumentError('makeAirState', 'RH', `RH must be within 0..1 (got ${RH})`)
  }
  return Object.freeze({ p_Pa, T_K, RH })
}

/** Sea-level standard, dry. */
export const STANDARD_AIR: AirState = makeAirState(101325, 288.15, 0)

// ─── Thermodynamics ──────────────────────────────────────────────────────────

/**
 * Saturation vapour pressure of water (Tetens) [Pa].
 * Reasonable over the 0..50 °C bench range.
 */
export function saturationVaporPressure(T_K: number): number {
  const Tc = T_K - 273.15
  return 610.78 * Math.exp((17.27 * Tc) / (Tc + 237.3))
}

/**
 * Moist-air density [kg/m³]: ρ = (p − RH·p_v(T)) / (R_air·T).
 * With RH = 0 this is plain p/(R·T).
 */
export function airDensity(state: AirState): number {
  const pv = state.RH * saturationVaporPressure(state.T_K)
  const pDry = Math.max(MIN_DRY_PRESSURE_PA, state.p_Pa - pv)
  return pDry / (R_AIR * state.T_K)
}

/**
 * Speed of sound a = √(γ·R·T) [m/s].
 */
export function speedOfSound(T_K: number, gamma: number = GAMMA_AIR, R: number = R_AIR): number {
  requirePositive('speedOfSound', 'T_K', T_K)
  return Math.sqrt(gamma * R * T_K)
}
