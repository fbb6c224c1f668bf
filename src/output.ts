import { mkdirSync, rmSync, writeFileSync } from 'node:fs'
import { OutputError } from './model/errors'

export interface OutputFile {
  path: string
  contents: string
}

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Writes every file into `dir`, creating it first. Either all files are
 * written or none are left behind. Throws OutputError.
 */
export function writeOutputFiles(dir: string, files: OutputFile[]): void {
  try {
    mkdirSync(dir, { recursive: true })
  } catch (err) {
    throw new OutputError(`Cannot create output directory ${dir}: ${reason(err)}`)
  }

  const written: string[] = []
  for (const file of files) {
    try {
      writeFileSync(file.path, file.contents)
    } catch (err) {
      for (const path of written) rmSync(path, { force: true })
      throw new OutputError(`Cannot write ${file.path}: ${reason(err)}`)
    }
    written.push(file.path)
  }
}
