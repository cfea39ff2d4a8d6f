/**
 * Port velocities, Mach number, Pitot probe, swirl and tumble.
 *
 * This module is UI-independent.
 */

import { InvalidArgumentError, requireNonNegative, requirePositive } from './errors.ts'
import { speedOfSound } from './air-state.ts'

// ─── Velocity ────────────────────────────────────────────────────────────────

/**
 * Mean velocity through a section, V = Q/A.
 */
export function velocityFromFlow(q: number, area: number): number {
  requirePositive('velocityFromFlow', 'area', area)
  return q / area
}

export function machFromVelocity(v: number, T_K: number): number {
  return v / speedOfSound(T_K)
}

/**
 * Mach number at the minimum cross-section for flow Q.
 */
export function machAtMinArea(q: number, a_min: number, T_K: number): number {
  return machFromVelocity(velocityFromFlow(q, a_min), T_K)
}

/**
 * Mean port velocity at a Mach number against a fixed reference a₀.
 * The legacy main screen uses a fixed a₀ rather than a(T).
 */
export function meanPortVelocityFromMach(mach: number, a0: number): number {
  requireNonNegative('meanPortVelocityFromMach', 'mach', mach)
  return mach * a0
}

/**
 * Local velocity from a Pitot probe, V = C·√(2Δp/ρ).
 */
export function velocityPitot(dp: number, rho: number, c_probe: number = 1): number {
  requireNonNegative('velocityPitot', 'dp', dp)
  requirePositive('velocityPitot', 'rho', rho)
  requirePositive('velocityPitot', 'c_probe', c_probe)
  return c_probe * Math.sqrt(2 * dp / rho)
}

/**
 * Kinetic energy density of the stream, ½ρv² [J/m³].
 */
export function portEnergyDensity(rho: number, v: number): number {
  requirePositive('portEnergyDensity', 'rho', rho)
  requireNonNegative('portEnergyDensity', 'v', v)
  return 0.5 * rho * v * v
}

// ─── Swirl & Tumble ──────────────────────────────────────────────────────────

/**
 * One discrete sample of the measured velocity field.
 *   swirl:  (u_θ, u_z, r, dA)
 *   tumble: (u_y, u_z, x, dA)
 */
export interface FlowSample {
  uTransverse: number
  uAxial: number
  arm: number
  dA: number
}

function angularMomentumRatio(operation: string, samples: readonly FlowSample[], R: number): number {
  requirePositive(operation, 'R', R)
  let num = 0
  let den = 0
  for (const s of samples) {
    num += s.uTransverse * s.uAxial * s.arm * s.dA
    den += s.uAxial * s.uAxial * s.dA
  }
  if (!(den > 0)) {
    throw new InvalidArgumentError(operation, 'samples', 'axial momentum flux must be > 0')
  }
  return num / (R * den)
}

/**
 * Swirl number S = Σ(u_θ·u_z·r·dA) / (R·Σ(u_z²·dA)).
 * Density cancels when uniform over the section.
 */
export function swirlNumber(samples: readonly FlowSample[], R: number): number {
  return angularMomentumRatio('swirlNumber', samples, R)
}

/**
 * Tumble number about the transverse axis, same form as swirl with (u_y, u_z, x).
 */
export function tumbleNumber(samples: readonly FlowSample[], R: number): number {
  return angularMomentumRatio('tumbleNumber', samples, R)
}

/**
 * Swirl ratio from a paddle-wheel swirl meter: SR = ω·R / V̄, V̄ = Q / A_cyl.
 */
export function swirlRatioFromWheel(rpm_wheel: number, bore: number, q: number): number {
  requirePositive('swirlRatioFromWheel', 'bore', bore)
  requirePositive('swirlRatioFromWheel', 'q', q)
  const aCyl = Math.PI * bore * bore / 4
  const vMean = velocityFromFlow(q, aCyl)
  const omega = 2 * Math.PI * rpm_wheel / 60
  return (omega * bore * 0.5) / vMean
}
