import type { LiftConfiguration, RigConfiguration, SafetyReport } from './types'
import { beaufortDescription, metersPerSecondToKmh, newtonsToKgf } from './physics'
import { payloadDensity, payloadVolume, rigSlingDynamics, rigTotalMass, rigWindForce, rigWindSpeed } from './rig'
import { recommendations, totalMass, type BatchResult } from './report'
import { logWarning, type WarningHandler } from './errors'

const RULE = '════════════════════════════════════════════'

function yesNo(value: boolean): string {
  return value ? '✅ YES' : '❌ NO'
}

function row(label: string, value: string): string {
  return `  ${(label + ':').padEnd(19)} ${value}`
}

function adviceLines(report: SafetyReport): string[] {
  return [
    'RECOMMENDATIONS:',
    ...recommendations(report).map(advice => `  • ${advice}`),
    '',
  ]
}

export function formatConfig(config: LiftConfiguration): string[] {
  return [
    'Configuration Parameters:',
    '-------------------------',
    row('Payload',           `${config.payloadMass} kg`),
    row('Pulley Weight',     `${config.pulleyMass} kg`),
    row('Slings Weight',     `${config.slingMass} kg`),
    row('Total Load',        `${totalMass(config)} kg`),
    row('Crane Capacity',    `${config.craneCapacity} kg`),
    row('Safety Factor',     `${config.safetyFactor}`),
    row('Drop Height',       `${config.dropHeight} m`),
    row('Deformation Limit', `${config.deformationLimit} m`),
    row('Beaufort Scale',    `${config.windScale}`),
    row('Exposed Area',      `${config.exposedArea} m²`),
    '',
  ]
}

export function formatReport(report: SafetyReport): string[] {
  return [
    '╔════════════════════════════════════════════╗',
    '║      SimuLift - Safety Analysis Report     ║',
    '╚════════════════════════════════════════════╝',
    '',
    'LOAD ANALYSIS:',
    row('Total Mass',     `${report.totalMass.toFixed(2)} kg`),
    row('Effective Load', `${report.effectiveLoad.toFixed(2)} kg`),
    row('Load Ratio',     `${(report.loadRatio * 100).toFixed(1)}%`),
    row('Overload Safe',  yesNo(report.overloadSafe)),
    '',
    'IMPACT ANALYSIS:',
    row('Impact Force',   `${report.impactForceNewtons.toFixed(2)} N (${report.impactForceKgf.toFixed(2)} kgf)`),
    '',
    'WIND ANALYSIS:',
    row('Beaufort',       report.windDescription),
    row('Wind Speed',     `${report.windSpeedMps.toFixed(2)} m/s (${metersPerSecondToKmh(report.windSpeedMps).toFixed(2)} km/h)`),
    row('Wind Force',     `${report.windForceNewtons.toFixed(2)} N`),
    '',
    'OVERALL VERDICT:',
    row('Risk Level',     report.riskLevel),
    row('Safe to Lift',   yesNo(report.safeToLift)),
    '',
    ...adviceLines(report),
    RULE,
  ]
}

export function formatRigConfig(config: RigConfiguration, onWarning: WarningHandler = logWarning): string[] {
  const windSpeed = rigWindSpeed(config, onWarning)
  const g = config.gravity
  return [
    '3D Configuration Parameters:',
    '============================',
    '',
    'PAYLOAD:',
    row('Mass',              `${config.payloadMass} kg`),
    row('Dimensions',        `${config.payloadLength.toFixed(2)} x ${config.payloadWidth.toFixed(2)} x ${config.payloadHeight.toFixed(2)} m`),
    row('Volume',            `${payloadVolume(config).toFixed(3)} m³`),
    row('Density',           `${payloadDensity(config).toFixed(2)} kg/m³`),
    '',
    'LIFTING SYSTEM:',
    row('Hook Mass',         `${config.hookMass} kg`),
    row('Sling Mass',        `${config.slingMass} kg`),
    row('Sling Length',      `${config.slingLength.toFixed(2)} m`),
    row('Sling Stiffness',   `${config.slingStiffness} N/m`),
    row('Sling Damping',     `${config.slingDamping} N/(m/s)`),
    '',
    'OPERATIONAL:',
    row('Total Mass',        `${rigTotalMass(config)} kg`),
    row('Crane Capacity',    `${config.craneCapacity} kg`),
    row('Safety Factor',     `${config.safetyFactor}`),
    row('Initial Height',    `${config.dropHeight} m`),
    row('Deformation Limit', `${config.deformationLimit} m`),
    '',
    'ENVIRONMENTAL:',
    row('Beaufort Scale',    `${config.windScale} (${beaufortDescription(config.windScale)})`),
    row('Wind Speed',        `${windSpeed.toFixed(2)} m/s (${metersPerSecondToKmh(windSpeed).toFixed(2)} km/h)`),
    row('Exposed Area',      `${config.exposedArea} m²`),
    row('Drag Coefficient',  config.dragCoefficient.toFixed(2)),
    row('Air Density',       `${config.airDensity.toFixed(3)} kg/m³`),
    '',
    'SIMULATION:',
    row('Duration',          `${config.simulationTime} s`),
    row('Gravity',           `[${g.x.toFixed(2)}, ${g.y.toFixed(2)}, ${g.z.toFixed(2)}] m/s²`),
    '',
  ]
}

/** Safety verdict, wind and sling dynamics for a 3D configuration. */
export function formatRigSummary(config: RigConfiguration, report: SafetyReport, onWarning: WarningHandler = logWarning): string[] {
  const windForce = rigWindForce(config, onWarning)
  const dynamics  = rigSlingDynamics(config)
  return [
    'SAFETY ANALYSIS:',
    row('Load Ratio',        `${(report.loadRatio * 100).toFixed(1)}% of capacity`),
    row('Risk Level',        report.riskLevel),
    row('Safe to Lift',      yesNo(report.safeToLift)),
    '',
    'WIND EFFECTS:',
    row('Wind Force',        `${windForce.toFixed(2)} N (${newtonsToKgf(windForce).toFixed(2)} kgf)`),
    row('Wind Description',  report.windDescription),
    '',
    'IMPACT ANALYSIS:',
    row('Calculated Impact', `${report.impactForceNewtons.toFixed(2)} N (${report.impactForceKgf.toFixed(2)} kgf)`),
    '',
    'SLING DYNAMICS:',
    row('Natural Frequency', `${dynamics.naturalFrequency.toFixed(2)} rad/s (${dynamics.frequencyHz.toFixed(2)} Hz, T=${dynamics.period.toFixed(2)} s)`),
    row('Damping Ratio',     `${dynamics.dampingRatio.toFixed(3)} (${dynamics.dampingClass})`),
    '',
    ...adviceLines(report),
  ]
}

export function formatBatch(results: BatchResult[]): string[] {
  const lines = ['Batch Safety Analysis:', '======================', '']
  results.forEach(({ name, config, report, recommendations: advice }, i) => {
    lines.push(
      `${i + 1}. ${name}:`,
      `   Load: ${report.totalMass.toFixed(0)} kg, Capacity: ${config.craneCapacity.toFixed(0)} kg`,
      `   Wind: ${report.windDescription} (${report.windSpeedMps.toFixed(1)} m/s)`,
      `   Status: ${report.safeToLift ? '✅ SAFE' : '❌ UNSAFE'}`,
      `   Risk: ${report.riskLevel}`,
      '   Recommendations:',
      ...advice.map(a => `     • ${a}`),
      '',
    )
  })
  return lines
}
