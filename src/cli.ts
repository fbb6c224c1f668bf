import { basename, join, parse } from 'node:path'
import { parseArgs } from 'node:util'
import { evaluate, evaluateBatch, recommendations } from './model/report'
import { SCENARIO_NAMES, resolveScenarioName, rigScenarioConfig, scenarioConfig } from './model/scenarios'
import { applyLiftOverrides, applyRigOverrides, type ConfigFile } from './model/schema'
import { formatBatch, formatConfig, formatReport, formatRigConfig, formatRigSummary } from './model/format'
import { buildRig, rigSlingDynamics, solverSettings, workspaceVariables } from './model/rig'
import { buildInstructions, instructionsFileName } from './model/instructions'
import { ConfigError, DomainError, OutputError, RangeWarning, type WarningHandler } from './model/errors'
import { rigSceneJson } from './renderer/rig'
import { loadBatchFile, loadConfigFile } from './config'
import { writeOutputFiles } from './output'

export interface CliIO {
  out(line: string): void
  err(line: string): void
}

export const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line),
}

export const EXIT_OK    = 0
export const EXIT_ERROR = 1
export const EXIT_USAGE = 2

export const DEFAULT_MODEL_PATH = 'SimuLift_3D.slx'

const USAGE = [
  'Usage: simulift [command] [options]',
  '',
  'Commands:',
  '  report      Safety report for a lift (default)',
  '  rig         3D rig parameters, instructions and scene',
  '  batch       Evaluate every lift listed in --config',
  '  scenarios   List predefined scenarios',
  '',
  'Options:',
  '  --scenario NAME   Preset to start from (unknown names use default)',
  '  --config FILE     JSON file overriding preset values (batch: list of lifts)',
  '  --drag CD         Drag coefficient for the report wind force (default 1.0)',
  '  --3d              Same as the rig command',
  '  --model PATH      External model path (rig, default SimuLift_3D.slx)',
  '  --out DIR         Write the instructions and scene files to DIR (rig)',
  '  --json            Print machine-readable JSON',
  '  --help            Show this help',
]

const OPTIONS = {
  scenario: { type: 'string' },
  config:   { type: 'string' },
  drag:     { type: 'string' },
  '3d':     { type: 'boolean' },
  use3d:    { type: 'boolean' },
  model:    { type: 'string' },
  out:      { type: 'string' },
  json:     { type: 'boolean' },
  help:     { type: 'boolean', short: 'h' },
} as const

interface Invocation {
  command: string
  scenario?: string
  configPath?: string
  drag?: number
  model: string
  out?: string
  json: boolean
}

/** `--Scenario=x` and `--scenario=x` are the same option. Values keep their case. */
function normalizeOptionNames(argv: string[]): string[] {
  return argv.map(arg => {
    if (!arg.startsWith('--')) return arg
    const eq = arg.indexOf('=')
    return eq < 0 ? arg.toLowerCase() : arg.slice(0, eq).toLowerCase() + arg.slice(eq)
  })
}

class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

function parseRawArgs(argv: string[]) {
  try {
    return parseArgs({ args: normalizeOptionNames(argv), options: OPTIONS, allowPositionals: true, strict: true })
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err))
  }
}

function parseInvocation(argv: string[]): Invocation | 'help' {
  const { values, positionals } = parseRawArgs(argv)
  if (values.help) return 'help'
  if (positionals.length > 1) throw new UsageError(`Unexpected argument: ${positionals[1]}`)

  let drag: number | undefined
  if (values.drag !== undefined) {
    drag = Number(values.drag)
    if (!Number.isFinite(drag)) throw new UsageError(`--drag expects a number, got ${values.drag}`)
  }

  let command = positionals[0] ?? 'report'
  if (command === 'report' && (values['3d'] || values.use3d)) command = 'rig'

  return {
    command,
    scenario: values.scenario,
    configPath: values.config,
    drag,
    model: values.model ?? DEFAULT_MODEL_PATH,
    out: values.out,
    json: values.json ?? false,
  }
}

function dedupedWarnings(io: CliIO): WarningHandler {
  const seen = new Set<string>()
  return warning => {
    if (seen.has(warning.message)) return
    seen.add(warning.message)
    io.err(warning.toString())
  }
}

function loadOverrides(inv: Invocation): { scenario: string, file: ConfigFile } {
  const file: ConfigFile = inv.configPath ? loadConfigFile(inv.configPath) : {}
  const scenario = resolveScenarioName(inv.scenario ?? file.scenario ?? 'default')
  return { scenario, file }
}

// ── Commands ──────────────────────────────────────────────────────────────────

function runReport(inv: Invocation, io: CliIO): void {
  const { scenario, file } = loadOverrides(inv)
  const config = applyLiftOverrides(scenarioConfig(scenario), file)
  const report = evaluate(config, { dragCoefficient: inv.drag })
  const warn = dedupedWarnings(io)
  for (const message of report.warnings) warn(new RangeWarning(message))

  if (inv.json) {
    io.out(JSON.stringify({ scenario, config, report, recommendations: recommendations(report) }, null, 2))
    return
  }
  io.out(`Running scenario: ${scenario}`)
  io.out('')
  for (const line of formatConfig(config)) io.out(line)
  for (const line of formatReport(report)) io.out(line)
}

function runRig(inv: Invocation, io: CliIO): void {
  const { scenario, file } = loadOverrides(inv)
  const config = applyRigOverrides(rigScenarioConfig(scenario), file)
  const warn = dedupedWarnings(io)

  const report = evaluate(config, { dragCoefficient: inv.drag })
  const rig = buildRig(config, warn)
  const workspace = workspaceVariables(config, warn)

  if (inv.out) {
    const modelFile = basename(inv.model)
    const instructionsPath = join(inv.out, instructionsFileName(modelFile))
    const scenePath = join(inv.out, `${parse(modelFile).name}.scene.json`)
    writeOutputFiles(inv.out, [
      { path: instructionsPath, contents: buildInstructions(inv.model, config, warn) },
      { path: scenePath, contents: JSON.stringify(rigSceneJson(rig)) },
    ])
    io.err(`Wrote ${instructionsPath}`)
    io.err(`Wrote ${scenePath}`)
  }

  if (inv.json) {
    io.out(JSON.stringify({
      scenario,
      config,
      report,
      recommendations: recommendations(report),
      workspace,
      solver: solverSettings(config),
      dynamics: rigSlingDynamics(config),
    }, null, 2))
    return
  }
  io.out(`Running scenario: ${scenario}`)
  io.out('')
  for (const line of formatRigConfig(config, warn)) io.out(line)
  for (const line of formatRigSummary(config, report, warn)) io.out(line)
}

function runBatch(inv: Invocation, io: CliIO): void {
  if (inv.configPath === undefined) throw new UsageError('batch needs --config FILE')
  const { lifts } = loadBatchFile(inv.configPath)
  const results = evaluateBatch(
    lifts.map(entry => ({
      name: entry.name,
      config: applyLiftOverrides(scenarioConfig(entry.scenario ?? 'default'), entry),
    })),
    { dragCoefficient: inv.drag },
  )
  const warn = dedupedWarnings(io)
  for (const { report } of results) {
    for (const message of report.warnings) warn(new RangeWarning(message))
  }

  if (inv.json) {
    io.out(JSON.stringify(results, null, 2))
    return
  }
  for (const line of formatBatch(results)) io.out(line)
}

function usage(io: CliIO, message: string): number {
  io.err(message)
  for (const line of USAGE) io.err(line)
  return EXIT_USAGE
}

function dispatch(inv: Invocation, io: CliIO): number {
  switch (inv.command) {
    case 'scenarios':
      for (const name of SCENARIO_NAMES) io.out(name)
      return EXIT_OK
    case 'report':
      runReport(inv, io)
      return EXIT_OK
    case 'rig':
      runRig(inv, io)
      return EXIT_OK
    case 'batch':
      runBatch(inv, io)
      return EXIT_OK
    default:
      return usage(io, `Unknown command: ${inv.command}`)
  }
}

/** Runs one CLI invocation and returns the process exit code. */
export function run(argv: string[], io: CliIO = consoleIO): number {
  try {
    const inv = parseInvocation(argv)
    if (inv === 'help') {
      for (const line of USAGE) io.out(line)
      return EXIT_OK
    }
    return dispatch(inv, io)
  } catch (err) {
    if (err instanceof UsageError) return usage(io, err.message)
    if (err instanceof DomainError || err instanceof ConfigError || err instanceof OutputError) {
      io.err(`${err.name}: ${err.message}`)
      return EXIT_ERROR
    }
    throw err
  }
}
