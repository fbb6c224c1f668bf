import { z } from 'zod'
import type { LiftConfiguration, RigConfiguration } from './types'
import { ConfigError } from './errors'

export const Vec3Schema = z.tuple([z.number(), z.number(), z.number()])

/**
 * Configuration file contents. Keys are snake_case; every key is optional and
 * overrides the preset named by `scenario` (or the default preset).
 *
 * deformation_limit and crane_capacity accept any number: non-positive values
 * fail at evaluation time with a DomainError. wind_scale is never range-checked.
 */
export const ConfigFileSchema = z.object({
  scenario:          z.string().optional(),
  payload_mass:      z.number().positive().optional(),
  pulley_mass:       z.number().nonnegative().optional(),
  sling_mass:        z.number().nonnegative().optional(),
  safety_factor:     z.number().positive().optional(),
  drop_height:       z.number().nonnegative().optional(),
  deformation_limit: z.number().finite().optional(),
  wind_scale:        z.number().finite().optional(),
  exposed_area:      z.number().nonnegative().optional(),
  crane_capacity:    z.number().finite().optional(),
  // 3D rig
  payload_length:    z.number().positive().optional(),
  payload_width:     z.number().positive().optional(),
  payload_height:    z.number().positive().optional(),
  hook_mass:         z.number().nonnegative().optional(),
  sling_length:      z.number().positive().optional(),
  sling_damping:     z.number().nonnegative().optional(),
  sling_stiffness:   z.number().positive().optional(),
  drag_coefficient:  z.number().nonnegative().optional(),
  air_density:       z.number().positive().optional(),
  simulation_time:   z.number().positive().optional(),
  gravity:           Vec3Schema.optional(),
}).strict()

export type ConfigFile = z.infer<typeof ConfigFileSchema>

/**
 * Batch file: `{ "lifts": [{ "name": "...", ...config keys }] }`. Each entry
 * overrides its own `scenario` preset.
 */
export const BatchFileSchema = z.object({
  lifts: z.array(ConfigFileSchema.extend({ name: z.string().min(1) })).min(1),
}).strict()

export type BatchFile = z.infer<typeof BatchFileSchema>
export type BatchEntry = BatchFile['lifts'][number]

/** Keys are lower-cased once, so `Payload_Mass` and `payload_mass` are the same key. */
function normalizeKeys(input: unknown): unknown {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) return input
  return Object.fromEntries(Object.entries(input).map(([k, v]) => [k.toLowerCase(), v]))
}

function invalid(error: z.ZodError): ConfigError {
  const problems = error.issues.map(issue => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
  return new ConfigError(`Invalid configuration: ${problems.join('; ')}`)
}

export function parseConfigFile(input: unknown): ConfigFile {
  const result = ConfigFileSchema.safeParse(normalizeKeys(input))
  if (!result.success) throw invalid(result.error)
  return result.data
}

export function parseBatchFile(input: unknown): BatchFile {
  const top = normalizeKeys(input)
  const normalized = typeof top === 'object' && top !== null && 'lifts' in top && Array.isArray(top.lifts)
    ? { ...top, lifts: top.lifts.map(normalizeKeys) }
    : top
  const result = BatchFileSchema.safeParse(normalized)
  if (!result.success) throw invalid(result.error)
  return result.data
}

export function applyLiftOverrides(base: LiftConfiguration, file: ConfigFile): LiftConfiguration {
  return {
    payloadMass:      file.payload_mass      ?? base.payloadMass,
    pulleyMass:       file.pulley_mass       ?? base.pulleyMass,
    slingMass:        file.sling_mass        ?? base.slingMass,
    safetyFactor:     file.safety_factor     ?? base.safetyFactor,
    dropHeight:       file.drop_height       ?? base.dropHeight,
    deformationLimit: file.deformation_limit ?? base.deformationLimit,
    windScale:        file.wind_scale        ?? base.windScale,
    exposedArea:      file.exposed_area      ?? base.exposedArea,
    craneCapacity:    file.crane_capacity    ?? base.craneCapacity,
  }
}

export function applyRigOverrides(base: RigConfiguration, file: ConfigFile): RigConfiguration {
  const gravity = file.gravity
    ? { x: file.gravity[0], y: file.gravity[1], z: file.gravity[2] }
    : { ...base.gravity }
  return {
    ...applyLiftOverrides(base, file),
    payloadLength:   file.payload_length   ?? base.payloadLength,
    payloadWidth:    file.payload_width    ?? base.payloadWidth,
    payloadHeight:   file.payload_height   ?? base.payloadHeight,
    hookMass:        file.hook_mass        ?? base.hookMass,
    slingLength:     file.sling_length     ?? base.slingLength,
    slingDamping:    file.sling_damping    ?? base.slingDamping,
    slingStiffness:  file.sling_stiffness  ?? base.slingStiffness,
    dragCoefficient: file.drag_coefficient ?? base.dragCoefficient,
    airDensity:      file.air_density      ?? base.airDensity,
    simulationTime:  file.simulation_time  ?? base.simulationTime,
    gravity,
  }
}
