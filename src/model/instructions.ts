/**
 * Assembly instructions for the external multibody model. The model itself is
 * built by hand in the modelling tool; this text tells the operator which
 * components to add and which workspace variables they must reference.
 */

import { format, parse } from 'node:path'
import type { RigConfiguration } from './types'
import { rigWindSpeed } from './rig'
import { logWarning, type WarningHandler } from './errors'

/** 'models/SimuLift_3D.slx' → 'models/SimuLift_3D_Instructions.txt' */
export function instructionsFileName(modelPath: string): string {
  const { dir, name } = parse(modelPath)
  return format({ dir, name: `${name}_Instructions`, ext: '.txt' })
}

/** Label padded to a fixed column, then the value. */
function variableLine(name: string, value: string): string {
  return `  ${name.padEnd(18)} = ${value}`
}

export function buildInstructions(modelPath: string, config: RigConfiguration, onWarning: WarningHandler = logWarning): string {
  const g = config.gravity
  const lines = [
    'SimuLift 3D Model Creation Instructions',
    '========================================',
    '',
    `Model File: ${modelPath}`,
    '',
    'Required Multibody Components:',
    '------------------------------',
    '',
    '1. WORLD FRAME',
    '   - Add: Mechanism Configuration block',
    `   - Set gravity: [${g.x}; ${g.y}; ${g.z}] m/s²`,
    '',
    '2. CRANE HOOK (Fixed Reference Point)',
    '   - Add: Rigid Transform block',
    '   - Position: [0; 0; initial_height] (from workspace)',
    '   - This represents the crane hook attachment point',
    '',
    '3. HOOK BODY',
    '   - Add: Solid block (or Brick Solid)',
    '   - Mass: hook_mass (from workspace)',
    '   - Small dimensions: [0.1 x 0.1 x 0.2] m',
    '',
    '4. SLING SYSTEM',
    '   Option A - Flexible Cable:',
    '   - Add: Cable block',
    '   - Length: sling_length (from workspace)',
    '   - Damping: sling_damping (from workspace)',
    '   - Stiffness: sling_stiffness (from workspace)',
    '   Option B - Rigid Links (simpler):',
    '   - Add: Cylindrical Solid blocks',
    '   - Total mass: sling_mass (from workspace)',
    '   - Connect with Revolute Joints for flexibility',
    '',
    '5. PAYLOAD',
    '   - Add: Brick Solid block',
    '   - Dimensions: [payload_length, payload_width, payload_height] (from workspace)',
    '   - Mass: payload_mass (from workspace)',
    '   - Or use density: payload_density (from workspace)',
    '',
    '6. JOINTS',
    '   - Hook to Sling: Spherical Joint (allows swinging)',
    '   - Sling to Payload: Universal Joint or Spherical Joint',
    '',
    '7. WIND FORCE',
    '   - Add: External Force & Torque block',
    '   - Connect to Payload frame',
    '   - F_wind = 0.5 * air_density * wind_speed^2 * exposed_area * drag_coefficient',
    '   - Direction: [1; 0; 0] (X-axis, horizontal wind)',
    '',
    '8. SENSORS (Optional for data logging)',
    '   - Add: Transform Sensor (for payload position)',
    '   - Add: Joint Sensor (for cable tensions)',
    '',
    '9. VISUALIZATION',
    '   - Add colors and geometry to Solid blocks',
    '   - Enable the mechanics explorer',
    '',
    'Workspace Variables:',
    '--------------------',
    variableLine('payload_mass',     `${config.payloadMass.toFixed(2)} kg`),
    variableLine('payload_length',   `${config.payloadLength.toFixed(2)} m`),
    variableLine('payload_width',    `${config.payloadWidth.toFixed(2)} m`),
    variableLine('payload_height',   `${config.payloadHeight.toFixed(2)} m`),
    variableLine('hook_mass',        `${config.hookMass.toFixed(2)} kg`),
    variableLine('sling_mass',       `${config.slingMass.toFixed(2)} kg`),
    variableLine('sling_length',     `${config.slingLength.toFixed(2)} m`),
    variableLine('sling_damping',    `${config.slingDamping.toFixed(2)} N/(m/s)`),
    variableLine('sling_stiffness',  `${config.slingStiffness.toFixed(2)} N/m`),
    variableLine('wind_speed',       `${rigWindSpeed(config, onWarning).toFixed(2)} m/s`),
    variableLine('exposed_area',     `${config.exposedArea.toFixed(2)} m²`),
    variableLine('drag_coefficient', config.dragCoefficient.toFixed(2)),
    variableLine('air_density',      `${config.airDensity.toFixed(3)} kg/m³`),
    variableLine('initial_height',   `${config.dropHeight.toFixed(2)} m`),
    variableLine('gravity',          `[${g.x}; ${g.y}; ${g.z}] m/s²`),
    '',
    'Solver Settings:',
    '----------------',
    '  Type: Variable-step',
    '  Solver: ode45 (or ode15s for stiff systems)',
    `  Stop time: ${config.simulationTime.toFixed(1)} seconds`,
    '',
    'Next Steps:',
    '-----------',
    `1. Create a new model: ${modelPath}`,
    '2. Add the multibody components described above',
    '3. Reference the workspace variables in block parameters',
    '4. Connect blocks according to the physical system',
    '5. Run: simulift rig --scenario heavy_load',
    '',
  ]
  return lines.join('\n')
}
