import type { LiftConfiguration, RiskLevel, SafetyReport } from './types'
import { DomainError, type RangeWarning } from './errors'
import {
  impactForce,
  newtonsToKgf,
  beaufortToWindSpeed,
  beaufortDescription,
  windForce,
  DEFAULT_DRAG_COEFFICIENT,
} from './physics'

// Risk thresholds
export const OVERLOAD_RATIO      = 1.0
export const NEAR_CAPACITY_RATIO = 0.9
export const MODERATE_LOAD_RATIO = 0.75
export const DANGEROUS_WIND_MPS  = 20
export const DANGEROUS_BEAUFORT  = 8

// Recommendation triggers
export const GUSTY_WIND_MPS      = 15
export const HIGH_LOAD_RATIO     = 0.85

export interface EvaluateOptions {
  /** Drag coefficient for the wind force. Default: 1.0 (flat plate) */
  dragCoefficient?: number
}

export function totalMass(config: LiftConfiguration): number {
  return config.payloadMass + config.pulleyMass + config.slingMass
}

/** First match wins: load checks outrank wind, wind outranks moderate load. */
export function classifyRisk(loadRatio: number, windSpeedMps: number, windScale: number): RiskLevel {
  if (loadRatio > OVERLOAD_RATIO)      return 'CRITICAL - Overload'
  if (loadRatio > NEAR_CAPACITY_RATIO) return 'HIGH - Near capacity'
  if (windSpeedMps > DANGEROUS_WIND_MPS || windScale >= DANGEROUS_BEAUFORT) return 'HIGH - Dangerous wind'
  if (loadRatio > MODERATE_LOAD_RATIO) return 'MEDIUM - Moderate load'
  return 'LOW - Safe conditions'
}

/**
 * Builds a fresh safety report for one lift.
 * Throws DomainError for a non-positive deformation limit or crane capacity.
 */
export function evaluate(config: LiftConfiguration, options: EvaluateOptions = {}): SafetyReport {
  const dragCoefficient = options.dragCoefficient ?? DEFAULT_DRAG_COEFFICIENT
  const warnings: string[] = []
  const collect = (w: RangeWarning): void => { warnings.push(w.message) }

  const mass = totalMass(config)

  // ── Impact ──────────────────────────────────────────────────────────────────
  const impactForceNewtons = impactForce(mass, config.dropHeight, config.deformationLimit)

  // ── Overload ────────────────────────────────────────────────────────────────
  if (config.craneCapacity <= 0) {
    throw new DomainError(`Crane capacity must be positive, got ${config.craneCapacity} kg`)
  }
  const effectiveLoad = mass * config.safetyFactor
  const loadRatio     = effectiveLoad / config.craneCapacity
  const overloadSafe  = loadRatio <= OVERLOAD_RATIO

  // ── Wind ────────────────────────────────────────────────────────────────────
  const windSpeedMps     = beaufortToWindSpeed(config.windScale, collect)
  const windDescription  = beaufortDescription(config.windScale)
  const windForceNewtons = windForce(windSpeedMps, config.exposedArea, dragCoefficient)

  return {
    totalMass: mass,
    impactForceNewtons,
    impactForceKgf: newtonsToKgf(impactForceNewtons),
    effectiveLoad,
    loadRatio,
    overloadSafe,
    windSpeedMps,
    windDescription,
    windForceNewtons,
    riskLevel: classifyRisk(loadRatio, windSpeedMps, config.windScale),
    // Wind is advisory: a dangerous-wind report can still be safe to lift.
    safeToLift: overloadSafe,
    warnings,
  }
}

/**
 * Advice for the lift crew. HIGH and CRITICAL risks get targeted measures;
 * everything else gets the standard protocol.
 */
export function recommendations(report: Pick<SafetyReport, 'riskLevel' | 'windSpeedMps' | 'loadRatio'>): string[] {
  if (!report.riskLevel.startsWith('HIGH') && !report.riskLevel.startsWith('CRITICAL')) {
    return [
      'Standard 3D safety protocols',
      'Monitor conditions during lift',
    ]
  }

  const advice = ['Use 3D simulation to verify dynamics']
  if (report.windSpeedMps > GUSTY_WIND_MPS) {
    advice.push('Monitor wind direction and gusts', 'Consider postponing lift')
  }
  if (report.loadRatio > HIGH_LOAD_RATIO) {
    advice.push('Verify crane capacity and stability', 'Use additional safety measures')
  }
  return advice
}

export interface NamedLift {
  name: string
  config: LiftConfiguration
}

export interface BatchResult extends NamedLift {
  report: SafetyReport
  recommendations: string[]
}

/** Evaluates each lift in order. The first DomainError aborts the batch. */
export function evaluateBatch(lifts: NamedLift[], options: EvaluateOptions = {}): BatchResult[] {
  return lifts.map(({ name, config }) => {
    const report = evaluate(config, options)
    return { name, config, report, recommendations: recommendations(report) }
  })
}
