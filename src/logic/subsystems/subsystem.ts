import type {
  Command,
  CommandType,
  FieldValue,
  Pose,
  SimEventKind,
  Telemetry,
  Vec2,
} from '@/types/sim'
import {
  InvalidFieldValueError,
  ReadOnlyFieldError,
  UnknownFieldError,
  UnrecognizedCommandError,
} from '@/logic/errors'
import { formatPoints } from '@/utils/geometry'

/**
 * What a subsystem may see and change on the ship it is attached to.
 * Subsystems never reach into one another; shared state goes through here.
 */
export interface ShipHandle {
  readonly pose: Readonly<Pose>
  readonly currentSpeed: number
  readonly desiredSpeed: number
  readonly collisionWarning: boolean
  readonly collisionEvent: boolean
  readonly waypoints: readonly Vec2[]
  setCurrentSpeed(speed: number): void
  setDesiredSpeed(speed: number): void
  appendWaypoint(point: Vec2): void
  getNamespaced(subsystem: string, field: string): FieldValue
  setNamespaced(subsystem: string, field: string, value: FieldValue): void
  report(kind: SimEventKind, message: string): void
}

export type FieldAccessor = {
  get: () => FieldValue
  set?: (value: FieldValue, key: string) => void
}

export type FieldTable = Record<string, FieldAccessor>

export const expectNumber = (value: FieldValue, key: string): number => {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidFieldValueError(key, 'a finite number')
  }
  return value
}

export const expectBoolean = (value: FieldValue, key: string): boolean => {
  if (typeof value !== 'boolean') {
    throw new InvalidFieldValueError(key, 'a boolean')
  }
  return value
}

export const expectPoints = (value: FieldValue, key: string): Vec2[] => {
  if (!Array.isArray(value)) {
    throw new InvalidFieldValueError(key, 'a list of points')
  }
  return value.map((point) => {
    if (!Number.isFinite(point.x) || !Number.isFinite(point.y)) {
      throw new InvalidFieldValueError(key, 'a list of finite points')
    }
    return { x: point.x, y: point.y }
  })
}

/** Flatten a field value into something a telemetry row can hold. */
export const toTelemetryValue = (value: FieldValue) =>
  Array.isArray(value) ? formatPoints(value) : value

export abstract class Subsystem {
  abstract readonly commands: readonly CommandType[]

  private handle?: ShipHandle

  private fieldTable?: Map<string, FieldAccessor>

  constructor(readonly name: string) {}

  /** Called by the ship when this subsystem is attached. */
  attachTo(ship: ShipHandle) {
    this.handle = ship
  }

  isAttached = () => Boolean(this.handle)

  protected get ship(): ShipHandle {
    if (!this.handle) {
      throw new Error(`[${this.name}] is not attached to a ship`)
    }
    return this.handle
  }

  handleCommand(command: Command) {
    if (!this.commands.includes(command.type)) {
      throw new UnrecognizedCommandError(this.name, command.type)
    }
    this.onCommand(command)
  }

  /** Per-tick hook; runs after collision checks and before the ship moves. */
  tick(_dt: number) {}

  fieldNames() {
    return [...this.fields.keys()]
  }

  getField(field: string): FieldValue {
    return this.accessor(field).get()
  }

  setField(field: string, value: FieldValue) {
    const accessor = this.accessor(field)
    const key = `${this.name}:${field}`
    if (!accessor.set) {
      throw new ReadOnlyFieldError(key)
    }
    accessor.set(value, key)
  }

  telemetry(): Telemetry {
    const row: Telemetry = {}
    this.fields.forEach((accessor, field) => {
      row[field] = toTelemetryValue(accessor.get())
    })
    return row
  }

  protected abstract onCommand(command: Command): void

  protected abstract describeFields(): FieldTable

  private get fields() {
    if (!this.fieldTable) {
      this.fieldTable = new Map(Object.entries(this.describeFields()))
    }
    return this.fieldTable
  }

  private accessor(field: string) {
    const accessor = this.fields.get(field)
    if (!accessor) {
      throw new UnknownFieldError(`${this.name}:${field}`)
    }
    return accessor
  }
}
