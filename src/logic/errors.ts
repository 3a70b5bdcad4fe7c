export class InvalidPolygonError extends Error {
  code = 'INVALID_POLYGON'
  constructor(distinctVertices: number, label = 'polygon') {
    super(`${label} needs at least 3 distinct vertices, got ${distinctVertices}`)
    this.name = 'InvalidPolygonError'
  }
}

/** Two subsystems claim the same command. Assembly must stop. */
export class DuplicateCommandError extends Error {
  code = 'DUPLICATE_COMMAND'
  constructor(
    readonly command: string,
    readonly owner: string,
    readonly claimant: string,
  ) {
    super(`Could not attach '${claimant}'; command '${command}' already handled by '${owner}'`)
    this.name = 'DuplicateCommandError'
  }
}

export class DuplicateSubsystemError extends Error {
  code = 'DUPLICATE_SUBSYSTEM'
  constructor(name: string) {
    super(`A subsystem named '${name}' is already attached`)
    this.name = 'DuplicateSubsystemError'
  }
}

export class DuplicateShipError extends Error {
  code = 'DUPLICATE_SHIP'
  constructor(name: string) {
    super(`A ship named '${name}' is already in the world`)
    this.name = 'DuplicateShipError'
  }
}

export class UnrecognizedCommandError extends Error {
  code = 'UNRECOGNIZED_COMMAND'
  constructor(subsystem: string, command: string) {
    super(`${subsystem} does not handle '${command}'`)
    this.name = 'UnrecognizedCommandError'
  }
}

export class UnknownFieldError extends Error {
  code = 'UNKNOWN_FIELD'
  constructor(readonly key: string) {
    super(`Unknown field: ${key}`)
    this.name = 'UnknownFieldError'
  }
}

export class ReadOnlyFieldError extends Error {
  code = 'READ_ONLY_FIELD'
  constructor(readonly key: string) {
    super(`Field is read-only: ${key}`)
    this.name = 'ReadOnlyFieldError'
  }
}

export class InvalidFieldValueError extends Error {
  code = 'INVALID_FIELD_VALUE'
  constructor(
    readonly key: string,
    expected: string,
  ) {
    super(`Field ${key} expects ${expected}`)
    this.name = 'InvalidFieldValueError'
  }
}

export class ShipNotFoundError extends Error {
  code = 'SHIP_NOT_FOUND'
  constructor(name: string) {
    super(`Ship not found: ${name}`)
    this.name = 'ShipNotFoundError'
  }
}
