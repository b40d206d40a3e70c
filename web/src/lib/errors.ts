export class InsufficientHistoryError extends Error {
  readonly indicator: string
  readonly required: number
  readonly actual: number

  constructor(indicator: string, required: number, actual: number) {
    super(`${indicator} needs at least ${required} closes, got ${actual}`)
    this.name = 'InsufficientHistoryError'
    this.indicator = indicator
    this.required = required
    this.actual = actual
  }
}

export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidInputError'
  }
}

/** Raised by the market data gateway when a provider cannot supply data. */
export class DataUnavailableError extends Error {
  readonly source: string

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(`${source}: ${message}`, options)
    this.name = 'DataUnavailableError'
    this.source = source
  }
}

export class StoreError extends Error {
  readonly status: number
  readonly body?: string

  constructor(message: string, status: number, body?: string) {
    super(`${message} (${status})`)
    this.name = 'StoreError'
    this.status = status
    this.body = body
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
