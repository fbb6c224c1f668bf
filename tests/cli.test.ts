import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { run, EXIT_OK, EXIT_ERROR, EXIT_USAGE, type CliIO } from '../src/cli'
import { SCENARIO_NAMES } from '../src/model/scenarios'

interface Captured extends CliIO {
  stdout: string[]
  stderr: string[]
}

function capture(): Captured {
  const stdout: string[] = []
  const stderr: string[] = []
  return {
    stdout,
    stderr,
    out: line => { stdout.push(line) },
    err: line => { stderr.push(line) },
  }
}

let dir: string

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'simulift-'))
})

afterEach(() => {
  rmSync(dir, { recursive: true, force: true })
})

function writeConfig(contents: unknown): string {
  const path = join(dir, 'lift.json')
  writeFileSync(path, JSON.stringify(contents))
  return path
}

describe('simulift scenarios', () => {
  it('lists the presets', () => {
    const io = capture()
    expect(run(['scenarios'], io)).toBe(EXIT_OK)
    expect(io.stdout).toEqual([...SCENARIO_NAMES])
  })
})

describe('simulift report', () => {
  it('defaults to the report command and the default scenario', () => {
    const io = capture()
    expect(run([], io)).toBe(EXIT_OK)
    expect(io.stdout[0]).toBe('Running scenario: default')
    expect(io.stdout).toContain('  Risk Level:         MEDIUM - Moderate load')
    expect(io.stderr).toEqual([])
  })

  it('heavy wind is HIGH risk but safe to lift', () => {
    const io = capture()
    expect(run(['report', '--scenario', 'heavy_wind'], io)).toBe(EXIT_OK)
    expect(io.stdout).toContain('  Risk Level:         HIGH - Dangerous wind')
    expect(io.stdout).toContain('  Safe to Lift:       ✅ YES')
  })

  it('option names are case-insensitive', () => {
    const io = capture()
    expect(run(['--Scenario', 'critical'], io)).toBe(EXIT_OK)
    expect(io.stdout[0]).toBe('Running scenario: critical')
    expect(io.stdout).toContain('  Safe to Lift:       ❌ NO')
  })

  it('unknown scenarios run the default', () => {
    const io = capture()
    expect(run(['--scenario=night_shift'], io)).toBe(EXIT_OK)
    expect(io.stdout[0]).toBe('Running scenario: default')
  })

  it('--json prints the configuration and report', () => {
    const io = capture()
    expect(run(['--scenario', 'light_load', '--json'], io)).toBe(EXIT_OK)
    const data = JSON.parse(io.stdout.join('\n'))
    expect(data.scenario).toBe('light_load')
    expect(data.config.payloadMass).toBe(500)
    expect(data.report.riskLevel).toBe('LOW - Safe conditions')
    expect(data.report.safeToLift).toBe(true)
    expect(data.recommendations).toEqual(['Standard 3D safety protocols', 'Monitor conditions during lift'])
  })

  it('prints recommendations after the verdict', () => {
    const io = capture()
    expect(run(['--scenario', 'critical'], io)).toBe(EXIT_OK)
    const i = io.stdout.indexOf('RECOMMENDATIONS:')
    expect(io.stdout.slice(i + 1, i + 3)).toEqual([
      '  • Use 3D simulation to verify dynamics',
      '  • Monitor wind direction and gusts',
    ])
  })

  it('--drag scales the wind force', () => {
    const plain = capture()
    const shaped = capture()
    run(['--json'], plain)
    run(['--json', '--drag', '2'], shaped)
    const a = JSON.parse(plain.stdout.join('\n')).report.windForceNewtons
    const b = JSON.parse(shaped.stdout.join('\n')).report.windForceNewtons
    expect(b).toBeCloseTo(2 * a, 9)
  })

  it('reads overrides and the scenario from a config file', () => {
    const path = writeConfig({ scenario: 'heavy_load', crane_capacity: 9000 })
    const io = capture()
    expect(run(['--config', path, '--json'], io)).toBe(EXIT_OK)
    const data = JSON.parse(io.stdout.join('\n'))
    expect(data.scenario).toBe('heavy_load')
    expect(data.config.craneCapacity).toBe(9000)
    expect(data.report.riskLevel).toBe('CRITICAL - Overload')
  })

  it('prints out-of-range wind warnings to stderr once', () => {
    const path = writeConfig({ wind_scale: 13 })
    const io = capture()
    expect(run(['--config', path], io)).toBe(EXIT_OK)
    expect(io.stderr).toEqual(['RangeWarning: Beaufort scale should be between 0 and 12, got 13'])
  })

  it('exits 1 on a DomainError', () => {
    const path = writeConfig({ deformation_limit: 0 })
    const io = capture()
    expect(run(['--config', path], io)).toBe(EXIT_ERROR)
    expect(io.stderr).toEqual(['DomainError: Deformation must be positive, got 0 m'])
    expect(io.stdout).toEqual([])
  })

  it('exits 1 on an invalid config file', () => {
    const path = writeConfig({ payload_mass: 'heavy' })
    const io = capture()
    expect(run(['--config', path], io)).toBe(EXIT_ERROR)
    expect(io.stderr[0]).toMatch(/^ConfigError: Invalid configuration: payload_mass: /)
  })

  it('exits 1 when the config file is missing', () => {
    const io = capture()
    expect(run(['--config', join(dir, 'missing.json')], io)).toBe(EXIT_ERROR)
    expect(io.stderr[0]).toMatch(/^ConfigError: Cannot read configuration file /)
  })

  it('exits 1 when the config file is not JSON', () => {
    const path = join(dir, 'broken.json')
    writeFileSync(path, '{ payload_mass: ')
    const io = capture()
    expect(run(['--config', path], io)).toBe(EXIT_ERROR)
    expect(io.stderr[0]).toMatch(/is not valid JSON/)
  })
})

describe('usage errors', () => {
  it('unknown option', () => {
    const io = capture()
    expect(run(['--bogus'], io)).toBe(EXIT_USAGE)
    expect(io.stderr).toContain('Usage: simulift [command] [options]')
  })

  it('unknown command', () => {
    const io = capture()
    expect(run(['launch'], io)).toBe(EXIT_USAGE)
    expect(io.stderr[0]).toBe('Unknown command: launch')
  })

  it('non-numeric drag coefficient', () => {
    const io = capture()
    expect(run(['--drag', 'high'], io)).toBe(EXIT_USAGE)
    expect(io.stderr[0]).toBe('--drag expects a number, got high')
  })

  it('--help prints usage to stdout', () => {
    const io = capture()
    expect(run(['--help'], io)).toBe(EXIT_OK)
    expect(io.stdout[0]).toBe('Usage: simulift [command] [options]')
  })
})

describe('simulift rig', () => {
  it('prints the 3D configuration and summary', () => {
    const io = capture()
    expect(run(['rig', '--scenario', 'heavy_load'], io)).toBe(EXIT_OK)
    expect(io.stdout[0]).toBe('Running scenario: heavy_load')
    expect(io.stdout).toContain('3D Configuration Parameters:')
    expect(io.stdout).toContain('  Dimensions:         3.00 x 2.00 x 1.50 m')
    expect(io.stdout).toContain('SLING DYNAMICS:')
  })

  it('--3d on report switches to the rig command', () => {
    const io = capture()
    expect(run(['--3d'], io)).toBe(EXIT_OK)
    expect(io.stdout).toContain('3D Configuration Parameters:')
  })

  it('--json includes workspace variables, solver settings and dynamics', () => {
    const io = capture()
    expect(run(['rig', '--json'], io)).toBe(EXIT_OK)
    const data = JSON.parse(io.stdout.join('\n'))
    expect(data.workspace.payload_density).toBeCloseTo(1000, 9)
    expect(data.solver.stopTime).toBe(10)
    expect(data.dynamics.underdamped).toBe(true)
    expect(data.dynamics.dampingClass).toBe('lightly damped')
    expect(data.dynamics.naturalFrequency).toBeCloseTo(Math.sqrt(10000 / 3030), 9)
    expect(data.recommendations).toEqual(['Standard 3D safety protocols', 'Monitor conditions during lift'])
  })

  it('--out writes the instructions and scene files', () => {
    const out = join(dir, 'model')
    const io = capture()
    expect(run(['rig', '--scenario', 'critical', '--out', out, '--model', 'models/Crane.slx'], io)).toBe(EXIT_OK)

    const instructions = join(out, 'Crane_Instructions.txt')
    const scene = join(out, 'Crane.scene.json')
    expect(existsSync(instructions)).toBe(true)
    expect(existsSync(scene)).toBe(true)
    expect(io.stderr).toEqual([`Wrote ${instructions}`, `Wrote ${scene}`])

    expect(readFileSync(instructions, 'utf8').split('\n')).toContain('Model File: models/Crane.slx')
    expect(JSON.parse(readFileSync(scene, 'utf8')).object.name).toBe('lift-rig')
  })

  it('exits 1 when the output directory cannot be created', () => {
    const blocker = join(dir, 'taken')
    writeFileSync(blocker, 'not a directory')
    const io = capture()
    expect(run(['rig', '--out', blocker], io)).toBe(EXIT_ERROR)
    expect(io.stderr).toHaveLength(1)
    expect(io.stderr[0]).toMatch(/^OutputError: Cannot create output directory /)
    expect(io.stdout).toEqual([])
  })

  it('leaves no partial output when a file cannot be written', () => {
    const out = join(dir, 'model')
    mkdirSync(join(out, 'SimuLift_3D.scene.json'), { recursive: true })
    const io = capture()
    expect(run(['rig', '--out', out], io)).toBe(EXIT_ERROR)
    expect(io.stderr).toHaveLength(1)
    expect(io.stderr[0]).toMatch(/^OutputError: Cannot write .*SimuLift_3D\.scene\.json: /)
    expect(existsSync(join(out, 'SimuLift_3D_Instructions.txt'))).toBe(false)
  })

  it('exits 1 when the slings are too short', () => {
    const path = writeConfig({ sling_length: 0.5 })
    const io = capture()
    expect(run(['rig', '--config', path], io)).toBe(EXIT_ERROR)
    expect(io.stderr[0]).toMatch(/^DomainError: Sling length 0.5 m must exceed/)
  })
})

describe('simulift batch', () => {
  const lifts = {
    lifts: [
      { name: 'Yard crane', scenario: 'light_load' },
      { name: 'Tower crane', payload_mass: 4000, crane_capacity: 4000 },
    ],
  }

  it('summarises every lift', () => {
    const path = writeConfig(lifts)
    const io = capture()
    expect(run(['batch', '--config', path], io)).toBe(EXIT_OK)
    expect(io.stdout[0]).toBe('Batch Safety Analysis:')
    expect(io.stdout).toContain('1. Yard crane:')
    expect(io.stdout).toContain('2. Tower crane:')
    expect(io.stdout).toContain('   Load: 4080 kg, Capacity: 4000 kg')
    expect(io.stdout).toContain('   Status: ❌ UNSAFE')
    expect(io.stdout).toContain('   Risk: CRITICAL - Overload')
  })

  it('--json prints one result per lift', () => {
    const path = writeConfig(lifts)
    const io = capture()
    expect(run(['batch', '--config', path, '--json'], io)).toBe(EXIT_OK)
    const data = JSON.parse(io.stdout.join('\n'))
    expect(data.map((r: { name: string }) => r.name)).toEqual(['Yard crane', 'Tower crane'])
    expect(data[0].report.riskLevel).toBe('LOW - Safe conditions')
  })

  it('needs a config file', () => {
    const io = capture()
    expect(run(['batch'], io)).toBe(EXIT_USAGE)
    expect(io.stderr[0]).toBe('batch needs --config FILE')
  })

  it('exits 1 on an invalid batch file', () => {
    const path = writeConfig({ lifts: [{ payload_mass: 100 }] })
    const io = capture()
    expect(run(['batch', '--config', path], io)).toBe(EXIT_ERROR)
    expect(io.stderr[0]).toMatch(/^ConfigError: Invalid configuration: lifts\.0\.name: /)
  })
})
