/**
 * Closed-form physics for lift safety checks.
 * SI units throughout: kg, m, s, N.
 */

import { DomainError, RangeWarning, logWarning, type WarningHandler } from './errors'

/** Standard gravity (m/s²) */
export const G = 9.81

/** Air density at sea level, 15 °C (kg/m³) */
export const SEA_LEVEL_AIR_DENSITY = 1.225

/** Flat plate facing the wind */
export const DEFAULT_DRAG_COEFFICIENT = 1.0

export const BEAUFORT_MIN = 0
export const BEAUFORT_MAX = 12

const BEAUFORT_DESCRIPTIONS = [
  'Calm',                     // 0
  'Light air',                // 1
  'Light breeze',             // 2
  'Gentle breeze',            // 3
  'Moderate breeze',          // 4
  'Fresh breeze',             // 5
  'Strong breeze',            // 6
  'High wind/Moderate gale',  // 7
  'Gale/Fresh gale',          // 8
  'Strong gale',              // 9
  'Storm/Whole gale',         // 10
  'Violent storm',            // 11
  'Hurricane force',          // 12
] as const

/**
 * Peak force when a falling load is stopped over a distance.
 * F = m · g · h / Δs
 */
export function impactForce(mass: number, height: number, deformation: number): number {
  if (deformation <= 0) {
    throw new DomainError(`Deformation must be positive, got ${deformation} m`)
  }
  return (mass * G * height) / deformation
}

export function newtonsToKgf(force: number): number {
  return force / G
}

export function metersPerSecondToKmh(speed: number): number {
  return speed * 3.6
}

/**
 * Empirical Beaufort conversion: v = 0.836 · B^(3/2).
 * Ratings outside 0-12 are reported through `onWarning` and extrapolated.
 * A negative rating has no real root and yields NaN; callers get the warning,
 * not an error.
 */
export function beaufortToWindSpeed(scale: number, onWarning: WarningHandler = logWarning): number {
  if (scale < BEAUFORT_MIN || scale > BEAUFORT_MAX) {
    onWarning(new RangeWarning(
      `Beaufort scale should be between ${BEAUFORT_MIN} and ${BEAUFORT_MAX}, got ${scale}`,
    ))
  }
  return 0.836 * Math.pow(scale, 1.5)
}

/**
 * Aerodynamic drag with an explicit air density.
 * F = ½ · ρ · v² · A · Cd
 */
export function dragForce(speed: number, area: number, dragCoefficient: number, airDensity: number): number {
  return 0.5 * airDensity * speed * speed * area * dragCoefficient
}

/** Drag at sea-level air density. */
export function windForce(speed: number, area: number, dragCoefficient = DEFAULT_DRAG_COEFFICIENT): number {
  return dragForce(speed, area, dragCoefficient, SEA_LEVEL_AIR_DENSITY)
}

/**
 * Rounds to the nearest rating and clamps to 0-12.
 * Unlike beaufortToWindSpeed, out-of-range input never extrapolates here.
 */
export function beaufortDescription(scale: number): string {
  const index = Math.min(Math.max(Math.round(scale), BEAUFORT_MIN), BEAUFORT_MAX)
  return BEAUFORT_DESCRIPTIONS[index]
}

export function checkOverload(loadMass: number, capacity: number, safetyFactor = 1): boolean {
  return loadMass * safetyFactor <= capacity
}
