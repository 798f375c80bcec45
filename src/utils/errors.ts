export class TpdError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/** Malformed header, inconsistent column counts or an unparsable numeric token. */
export class ParseError extends TpdError {
  readonly line: number | null

  constructor(message: string, line: number | null = null) {
    super(line === null ? message : `${message} (line ${line})`)
    this.line = line
  }
}

/** Invalid option values, rejected before any computation starts. */
export class ConfigError extends TpdError {}

export class FitConvergenceError extends TpdError {
  readonly iterations: number

  constructor(message: string, iterations = 0) {
    super(message)
    this.iterations = iterations
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
