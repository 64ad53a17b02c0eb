/**
 * Error types raised while turning a survey sheet into a line plot.
 *
 * Each carries enough context to point at the offending row, shot or view.
 */

/**
 * Base class for every cavemap error.
 */
export class CavemapError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CavemapError'
  }
}

/**
 * A CSV cell could not be read as the shape its column expects.
 */
export class ParseError extends CavemapError {
  readonly row: number
  readonly field: string
  readonly value: string

  constructor(message: string, row: number, field: string, value: string) {
    super(`Row ${row}, field "${field}": ${message}`)
    this.name = 'ParseError'
    this.row = row
    this.field = field
    this.value = value
  }
}

/**
 * A shot was rejected while building or resolving the network.
 */
export class ValidationError extends CavemapError {
  readonly shot: string
  readonly reason: 'distance' | 'unknown_from' | 'duplicate_name' | 'missing_angle' | 'empty_network'

  constructor(message: string, shot: string, reason: ValidationError['reason']) {
    super(message)
    this.name = 'ValidationError'
    this.shot = shot
    this.reason = reason
  }
}

/**
 * Some shots cannot be reached from the origin.
 */
export class ConnectivityError extends CavemapError {
  readonly unreachable: string[]

  constructor(unreachable: string[]) {
    super(`Provided shots do not connect from origin: ${unreachable.join(', ')}`)
    this.name = 'ConnectivityError'
    this.unreachable = unreachable
  }
}

export class ViewError extends CavemapError {
  readonly view: string

  constructor(view: string) {
    super(`Invalid view: ${view}`)
    this.name = 'ViewError'
    this.view = view
  }
}
