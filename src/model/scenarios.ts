/**
 * Predefined lift scenarios. Unknown names fall back to the default.
 */

import type { LiftConfiguration, RigConfiguration, Vec3 } from './types'

export const SCENARIO_NAMES = ['default', 'light_load', 'heavy_load', 'heavy_wind', 'critical'] as const

export type ScenarioName = typeof SCENARIO_NAMES[number]

export const DEFAULT_GRAVITY: Vec3 = { x: 0, y: 0, z: -9.81 }

export const DEFAULT_CONFIG: LiftConfiguration = {
  payloadMass: 3000,
  pulleyMass: 50,
  slingMass: 30,
  safetyFactor: 1.25,
  dropHeight: 2,
  deformationLimit: 0.2,
  windScale: 6,
  exposedArea: 1.5,
  craneCapacity: 5000,
}

const SCENARIOS: Record<ScenarioName, LiftConfiguration> = {
  default: DEFAULT_CONFIG,
  light_load: {
    payloadMass: 500,
    pulleyMass: 20,
    slingMass: 10,
    safetyFactor: 1.5,
    dropHeight: 1,
    deformationLimit: 0.15,
    windScale: 3,
    exposedArea: 0.8,
    craneCapacity: 2000,
  },
  heavy_load: {
    payloadMass: 8000,
    pulleyMass: 100,
    slingMass: 80,
    safetyFactor: 1.25,
    dropHeight: 3,
    deformationLimit: 0.25,
    windScale: 4,
    exposedArea: 3.0,
    craneCapacity: 12000,
  },
  heavy_wind: {
    payloadMass: 2000,
    pulleyMass: 40,
    slingMass: 25,
    safetyFactor: 1.5,
    dropHeight: 2,
    deformationLimit: 0.2,
    windScale: 9,    // strong gale
    exposedArea: 2.5,
    craneCapacity: 5000,
  },
  critical: {
    payloadMass: 4500,
    pulleyMass: 60,
    slingMass: 40,
    safetyFactor: 1.1,      // low margin
    dropHeight: 5,
    deformationLimit: 0.05, // rigid landing
    windScale: 7,
    exposedArea: 2.0,
    craneCapacity: 5000,
  },
}

type RigExtras = Omit<RigConfiguration, keyof LiftConfiguration>

const RIG_EXTRAS: Record<ScenarioName, RigExtras> = {
  default: {
    payloadLength: 2.0, payloadWidth: 1.5, payloadHeight: 1.0,
    hookMass: 50, slingLength: 3.0, slingDamping: 100, slingStiffness: 10000,
    dragCoefficient: 1.2, airDensity: 1.225, simulationTime: 10, gravity: DEFAULT_GRAVITY,
  },
  light_load: {
    payloadLength: 1.0, payloadWidth: 0.8, payloadHeight: 0.6,
    hookMass: 20, slingLength: 2.0, slingDamping: 80, slingStiffness: 8000,
    dragCoefficient: 1.1, airDensity: 1.225, simulationTime: 10, gravity: DEFAULT_GRAVITY,
  },
  heavy_load: {
    payloadLength: 3.0, payloadWidth: 2.0, payloadHeight: 1.5,
    hookMass: 100, slingLength: 4.0, slingDamping: 150, slingStiffness: 15000,
    dragCoefficient: 1.3, airDensity: 1.225, simulationTime: 15, gravity: DEFAULT_GRAVITY,
  },
  heavy_wind: {
    payloadLength: 2.5, payloadWidth: 2.0, payloadHeight: 0.8,
    hookMass: 40, slingLength: 3.0, slingDamping: 100, slingStiffness: 10000,
    dragCoefficient: 1.5, airDensity: 1.225, simulationTime: 12, gravity: DEFAULT_GRAVITY,
  },
  critical: {
    payloadLength: 2.0, payloadWidth: 1.5, payloadHeight: 1.2,
    hookMass: 60, slingLength: 5.0, slingDamping: 120, slingStiffness: 12000,
    dragCoefficient: 1.2, airDensity: 1.225, simulationTime: 20, gravity: DEFAULT_GRAVITY,
  },
}

export function isScenarioName(name: string): name is ScenarioName {
  return SCENARIO_NAMES.some(n => n === name)
}

/** Trimmed, lower-cased; anything unknown becomes 'default'. */
export function resolveScenarioName(name: string): ScenarioName {
  const key = name.trim().toLowerCase()
  return isScenarioName(key) ? key : 'default'
}

export function scenarioConfig(name: string): LiftConfiguration {
  return { ...SCENARIOS[resolveScenarioName(name)] }
}

export function rigScenarioConfig(name: string): RigConfiguration {
  const key = resolveScenarioName(name)
  const extras = RIG_EXTRAS[key]
  return { ...SCENARIOS[key], ...extras, gravity: { ...extras.gravity } }
}
