/**
 * Error kinds raised by the flow engine.
 *
 * InvalidArgumentError   — physically impossible input, raised synchronously.
 * UnavailableError       — a required input for a header aggregate is missing.
 * CalibrationDriftError  — live calibration disagrees with its frozen anchors.
 */

export class InvalidArgumentError extends Error {
  operation: string
  field: string

  constructor(operation: string, field: string, message: string) {
    super(`${operation}: ${message}`)
    this.name = 'InvalidArgumentError'
    this.operation = operation
    this.field = field
  }
}

export class InvalidGeometryError extends InvalidArgumentError {
  constructor(operation: string, field: string, message: string) {
    super(operation, field, message)
    this.name = 'InvalidGeometryError'
  }
}

export class UnavailableError extends Error {
  input: string

  constructor(input: string, message: string) {
    super(message)
    this.name = 'UnavailableError'
    this.input = input
  }
}

export interface DriftEntry {
  name: string
  value: number
  anchor: number
}

export class CalibrationDriftError extends Error {
  drifted: DriftEntry[]

  constructor(drifted: DriftEntry[]) {
    const list = drifted.map((d) => `${d.name}=${d.value} (anchor ${d.anchor})`).join(', ')
    super(`Calibration drift detected: ${list}`)
    this.name = 'CalibrationDriftError'
    this.drifted = drifted
  }
}

export function isInvalidArgument(err: unknown): err is InvalidArgumentError {
  return err instanceof InvalidArgumentError
}

/**
 * Throw InvalidArgumentError unless value > 0.
 */
export function requirePositive(operation: string, field: string, value: number): void {
  if (!(value > 0)) {
    throw new InvalidArgumentError(operation, field, `${field} must be > 0 (got ${value})`)
  }
}

/**
 * Throw InvalidArgumentError unless value >= 0.
 */
export function requireNonNegative(operation: string, field: string, value: number): void {
  if (!(value >= 0)) {
    throw new InvalidArgumentError(operation, field, `${field} must be >= 0 (got ${value})`)
  }
}
