import { readFileSync } from 'node:fs'
import { ConfigError } from './model/errors'
import { parseBatchFile, parseConfigFile, type BatchFile, type ConfigFile } from './model/schema'

function readJson(path: string): unknown {
  let text: string
  try {
    text = readFileSync(path, 'utf8')
  } catch (err) {
    throw new ConfigError(`Cannot read configuration file ${path}: ${err instanceof Error ? err.message : String(err)}`)
  }

  try {
    return JSON.parse(text)
  } catch (err) {
    throw new ConfigError(`Configuration file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`)
  }
}

/** Reads and validates a JSON configuration file. Throws ConfigError. */
export function loadConfigFile(path: string): ConfigFile {
  return parseConfigFile(readJson(path))
}

export function loadBatchFile(path: string): BatchFile {
  return parseBatchFile(readJson(path))
}
