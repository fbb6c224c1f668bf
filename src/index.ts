export * from './model/types'
export * from './model/errors'
export * from './model/physics'
export * from './model/report'
export * from './model/scenarios'
export * from './model/rig'
export * from './model/instructions'
export * from './model/format'
export * from './model/schema'
export * from './renderer/rig'
export { loadBatchFile, loadConfigFile } from './config'
export { writeOutputFiles, type OutputFile } from './output'
export { run, type CliIO } from './cli'
