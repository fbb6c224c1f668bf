/**
 * Parameter preparation for the external 3D multibody model, plus the static
 * rig geometry used by the renderer.
 *
 * Coordinate system (renderer and RigModel):
 *   X: wind direction
 *   Y: vertical (up)
 *   Z: across the wind
 *   Origin: ground level, directly below the hook
 *
 * The external model uses Z up; only the gravity vector is passed in its frame.
 *
 * Sling geometry: four legs of equal length run from the payload's top corners
 * to a single hook point above the payload centre. With r the half-diagonal of
 * the payload's top face:
 *   rise = √(slingLength² - r²)
 *   yHook = dropHeight + payloadHeight + rise
 */

import type { DampingClass, RigConfiguration, RigModel, SlingDynamics, SlingLeg, SolverSettings, Vec3 } from './types'
import { DomainError, logWarning, type WarningHandler } from './errors'
import { beaufortToWindSpeed, dragForce } from './physics'

// Hook body dimensions (m)
export const HOOK_WIDTH  = 0.1
export const HOOK_HEIGHT = 0.2

// Damping ratio band edges
export const LIGHT_DAMPING_RATIO    = 0.3
export const MODERATE_DAMPING_RATIO = 0.7
export const CRITICAL_DAMPING_RATIO = 1.0

export function payloadVolume(config: RigConfiguration): number {
  const volume = config.payloadLength * config.payloadWidth * config.payloadHeight
  if (volume <= 0) {
    throw new DomainError(`Payload volume must be positive, got ${volume} m³`)
  }
  return volume
}

export function payloadDensity(config: RigConfiguration): number {
  return config.payloadMass / payloadVolume(config)
}

/** The 3D rig carries a hook instead of a pulley. */
export function rigTotalMass(config: RigConfiguration): number {
  return config.payloadMass + config.hookMass + config.slingMass
}

export function rigWindSpeed(config: RigConfiguration, onWarning: WarningHandler = logWarning): number {
  return beaufortToWindSpeed(config.windScale, onWarning)
}

export function rigWindForce(config: RigConfiguration, onWarning: WarningHandler = logWarning): number {
  return dragForce(rigWindSpeed(config, onWarning), config.exposedArea, config.dragCoefficient, config.airDensity)
}

/**
 * Named values handed to the external model. The model's blocks reference
 * these names; nothing here knows how they are wired.
 */
export function workspaceVariables(config: RigConfiguration, onWarning: WarningHandler = logWarning): Record<string, number> {
  return {
    payload_mass:      config.payloadMass,
    payload_length:    config.payloadLength,
    payload_width:     config.payloadWidth,
    payload_height:    config.payloadHeight,
    payload_density:   payloadDensity(config),
    hook_mass:         config.hookMass,
    sling_mass:        config.slingMass,
    sling_length:      config.slingLength,
    sling_damping:     config.slingDamping,
    sling_stiffness:   config.slingStiffness,
    wind_speed:        rigWindSpeed(config, onWarning),
    beaufort_scale:    config.windScale,
    exposed_area:      config.exposedArea,
    drag_coefficient:  config.dragCoefficient,
    air_density:       config.airDensity,
    initial_height:    config.dropHeight,
    safety_factor:     config.safetyFactor,
    deformation_limit: config.deformationLimit,
    gravity_x:         config.gravity.x,
    gravity_y:         config.gravity.y,
    gravity_z:         config.gravity.z,
    crane_capacity:    config.craneCapacity,
  }
}

export function solverSettings(config: RigConfiguration): SolverSettings {
  return {
    stopTime: config.simulationTime,
    solverType: 'Variable-step',
    solver: 'ode45',
    relTol: '1e-3',
    absTol: 'auto',
  }
}

/** Mass hanging on the slings: the payload plus the slings themselves. */
export function suspendedMass(config: RigConfiguration): number {
  return config.payloadMass + config.slingMass
}

export function dampingClass(dampingRatio: number): DampingClass {
  if (dampingRatio < LIGHT_DAMPING_RATIO)    return 'lightly damped'
  if (dampingRatio < MODERATE_DAMPING_RATIO) return 'moderately damped'
  if (dampingRatio < CRITICAL_DAMPING_RATIO) return 'heavily damped'
  return 'overdamped'
}

/**
 * Mass-spring-damper view of a sling carrying `mass`.
 *   ω_n = √(k/m),  c_crit = 2√(km),  ζ = c / c_crit
 */
export function slingDynamics(mass: number, stiffness: number, damping: number): SlingDynamics {
  if (mass <= 0)      throw new DomainError(`Suspended mass must be positive, got ${mass} kg`)
  if (stiffness <= 0) throw new DomainError(`Sling stiffness must be positive, got ${stiffness} N/m`)

  const naturalFrequency = Math.sqrt(stiffness / mass)
  const criticalDamping  = 2 * Math.sqrt(stiffness * mass)
  const dampingRatio     = damping / criticalDamping

  return {
    naturalFrequency,
    frequencyHz: naturalFrequency / (2 * Math.PI),
    period: (2 * Math.PI) / naturalFrequency,
    criticalDamping,
    dampingRatio,
    underdamped: dampingRatio < CRITICAL_DAMPING_RATIO,
    dampingClass: dampingClass(dampingRatio),
  }
}

export function rigSlingDynamics(config: RigConfiguration): SlingDynamics {
  return slingDynamics(suspendedMass(config), config.slingStiffness, config.slingDamping)
}

export function buildRig(config: RigConfiguration, onWarning: WarningHandler = logWarning): RigModel {
  const { payloadLength: L, payloadWidth: W, payloadHeight: H, dropHeight, slingLength } = config

  // Validates dimensions before any geometry is derived
  payloadVolume(config)

  const halfDiagonal = Math.hypot(L / 2, W / 2)
  if (slingLength <= halfDiagonal) {
    throw new DomainError(
      `Sling length ${slingLength} m must exceed the payload half-diagonal ${halfDiagonal.toFixed(3)} m`,
    )
  }

  // ── Vertical levels ──────────────────────────────────────────────────────────
  const yPayloadTop = dropHeight + H
  const rise        = Math.sqrt(slingLength * slingLength - halfDiagonal * halfDiagonal)
  const hookPoint: Vec3  = { x: 0, y: yPayloadTop + rise, z: 0 }
  const hookCenter: Vec3 = { x: 0, y: hookPoint.y + HOOK_HEIGHT / 2, z: 0 }

  // ── Sling legs, counter-clockwise seen from above ───────────────────────────
  const corners: [number, number][] = [[-1, -1], [+1, -1], [+1, +1], [-1, +1]]
  const slings: SlingLeg[] = corners.map(([sx, sz]) => ({
    start: { x: sx * L / 2, y: yPayloadTop, z: sz * W / 2 },
    end: { ...hookPoint },
    length: slingLength,
  }))

  return {
    config,
    hookPoint,
    hookCenter,
    payload: {
      center: { x: 0, y: dropHeight + H / 2, z: 0 },
      length: L,
      height: H,
      width: W,
    },
    slings,
    windForce: rigWindForce(config, onWarning),
  }
}
