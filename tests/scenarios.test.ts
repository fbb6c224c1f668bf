import { describe, it, expect } from 'vitest'
import {
  scenarioConfig,
  rigScenarioConfig,
  resolveScenarioName,
  isScenarioName,
  SCENARIO_NAMES,
  DEFAULT_CONFIG,
} from '../src/model/scenarios'

describe('scenarioConfig', () => {
  it('returns the preset for each known name', () => {
    expect(scenarioConfig('light_load').payloadMass).toBe(500)
    expect(scenarioConfig('heavy_load').craneCapacity).toBe(12000)
    expect(scenarioConfig('heavy_wind').windScale).toBe(9)
    expect(scenarioConfig('critical').deformationLimit).toBe(0.05)
    expect(scenarioConfig('default')).toEqual(DEFAULT_CONFIG)
  })

  it('unknown names fall back to exactly the default values', () => {
    expect(scenarioConfig('tower_crane_at_night')).toEqual(DEFAULT_CONFIG)
    expect(scenarioConfig('')).toEqual(DEFAULT_CONFIG)
  })

  it('ignores case and surrounding whitespace', () => {
    expect(scenarioConfig(' Heavy_Wind ')).toEqual(scenarioConfig('heavy_wind'))
    expect(scenarioConfig('CRITICAL').safetyFactor).toBe(1.1)
  })

  it('hands out copies, never the preset itself', () => {
    const a = scenarioConfig('light_load')
    a.payloadMass = 99999
    expect(scenarioConfig('light_load').payloadMass).toBe(500)
  })
})

describe('resolveScenarioName', () => {
  it('normalizes known names and maps the rest to default', () => {
    expect(resolveScenarioName('Light_Load')).toBe('light_load')
    expect(resolveScenarioName('nope')).toBe('default')
  })

  it('lists five presets', () => {
    expect(SCENARIO_NAMES).toEqual(['default', 'light_load', 'heavy_load', 'heavy_wind', 'critical'])
    expect(isScenarioName('heavy_load')).toBe(true)
    expect(isScenarioName('Heavy_Load')).toBe(false)
  })
})

describe('rigScenarioConfig', () => {
  it('extends the lift preset with rig parameters', () => {
    const c = rigScenarioConfig('light_load')
    expect(c.payloadMass).toBe(500)
    expect(c.payloadLength).toBe(1.0)
    expect(c.payloadWidth).toBe(0.8)
    expect(c.payloadHeight).toBe(0.6)
    expect(c.hookMass).toBe(20)
    expect(c.dragCoefficient).toBe(1.1)
  })

  it('default rig: 2 × 1.5 × 1 m payload on 3 m slings for 10 s', () => {
    const c = rigScenarioConfig('default')
    expect([c.payloadLength, c.payloadWidth, c.payloadHeight]).toEqual([2.0, 1.5, 1.0])
    expect(c.slingLength).toBe(3.0)
    expect(c.simulationTime).toBe(10)
    expect(c.gravity).toEqual({ x: 0, y: 0, z: -9.81 })
  })

  it('unknown names fall back to the default rig', () => {
    expect(rigScenarioConfig('whatever')).toEqual(rigScenarioConfig('default'))
  })

  it('gravity vectors are not shared between calls', () => {
    const a = rigScenarioConfig('critical')
    a.gravity.z = -1.62
    expect(rigScenarioConfig('critical').gravity.z).toBe(-9.81)
  })
})
