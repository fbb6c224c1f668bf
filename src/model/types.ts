// Masses in kg, lengths in meters, forces in newtons unless stated otherwise.

export interface LiftConfiguration {
  /** Mass of the object being lifted (kg) */
  payloadMass: number
  /** Pulley / sheave assembly (kg) */
  pulleyMass: number
  /** Slings, chains or cables (kg) */
  slingMass: number
  /** Multiplier applied to the nominal load. Typically 1.1 - 2.0 */
  safetyFactor: number
  /** Height the load could fall from (m) */
  dropHeight: number
  /** Stopping distance over which an impact is absorbed (m) */
  deformationLimit: number
  /** Beaufort rating, 0 (calm) to 12 (hurricane force) */
  windScale: number
  /** Projected area perpendicular to the wind (m²) */
  exposedArea: number
  /** Safe working load of the crane (kg) */
  craneCapacity: number
}

export type RiskLevel =
  | 'CRITICAL - Overload'
  | 'HIGH - Near capacity'
  | 'HIGH - Dangerous wind'
  | 'MEDIUM - Moderate load'
  | 'LOW - Safe conditions'

export interface SafetyReport {
  totalMass: number
  impactForceNewtons: number
  impactForceKgf: number
  /** totalMass × safetyFactor (kg) */
  effectiveLoad: number
  /** effectiveLoad / craneCapacity */
  loadRatio: number
  overloadSafe: boolean
  windSpeedMps: number
  windDescription: string
  windForceNewtons: number
  riskLevel: RiskLevel
  /** Driven by overload status only; wind never flips it */
  safeToLift: boolean
  /** Range warnings raised while evaluating */
  warnings: string[]
}

export interface Vec3 {
  x: number
  y: number
  z: number
}

/** Lift configuration extended with the parameters of the 3D multibody model. */
export interface RigConfiguration extends LiftConfiguration {
  payloadLength: number
  payloadWidth: number
  payloadHeight: number
  /** Hook rigid body; replaces the pulley in the 3D rig (kg) */
  hookMass: number
  /** Length of each sling leg (m) */
  slingLength: number
  /** Cable damping coefficient (N·s/m) */
  slingDamping: number
  /** Cable stiffness (N/m) */
  slingStiffness: number
  dragCoefficient: number
  /** kg/m³. Sea level: 1.225 */
  airDensity: number
  /** Simulation stop time (s) */
  simulationTime: number
  /** Gravity vector in the external model's frame, Z up (m/s²) */
  gravity: Vec3
}

export interface SolverSettings {
  stopTime: number
  solverType: 'Variable-step'
  solver: 'ode45'
  relTol: string
  absTol: string
}

export type DampingClass =
  | 'lightly damped'
  | 'moderately damped'
  | 'heavily damped'
  | 'overdamped'

export interface SlingDynamics {
  /** ω_n = √(k/m) (rad/s) */
  naturalFrequency: number
  frequencyHz: number
  /** Oscillation period (s) */
  period: number
  /** 2√(km) (N·s/m) */
  criticalDamping: number
  dampingRatio: number
  underdamped: boolean
  dampingClass: DampingClass
}

export interface PayloadBox {
  /** Box centre */
  center: Vec3
  /** Extent along X */
  length: number
  /** Extent along Y (vertical) */
  height: number
  /** Extent along Z */
  width: number
}

export interface SlingLeg {
  /** Payload top corner */
  start: Vec3
  /** Hook point */
  end: Vec3
  length: number
}

/**
 * Static geometry of the lift rig.
 * Y is up, origin on the ground directly below the hook.
 */
export interface RigModel {
  config: RigConfiguration
  /** Where all sling legs meet */
  hookPoint: Vec3
  /** Hook body centre, above the hook point */
  hookCenter: Vec3
  payload: PayloadBox
  slings: SlingLeg[]
  /** Drag force on the payload, along +X (N) */
  windForce: number
}
