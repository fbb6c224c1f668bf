/**
 * Error taxonomy shared by the model and the CLI.
 *
 *   DomainError   a denominator or divisor is non-positive; aborts evaluation
 *   ConfigError   a configuration file is unreadable or malformed
 *   OutputError   an output directory or file cannot be written
 *   RangeWarning  an input is outside its documented range; advisory only
 */

export class DomainError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'DomainError'
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export class OutputError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'OutputError'
  }
}

export class RangeWarning {
  readonly name = 'RangeWarning'

  constructor(readonly message: string) {}

  toString(): string {
    return `${this.name}: ${this.message}`
  }
}

export type WarningHandler = (warning: RangeWarning) => void

export const logWarning: WarningHandler = warning => {
  console.warn(warning.toString())
}
