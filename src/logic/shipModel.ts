import type {
  AttributeSurface,
  Command,
  CommandType,
  FieldValue,
  Polygon,
  Pose,
  SimEventKind,
  Telemetry,
  Vec2,
} from '@/types/sim'
import { DEFAULT_SAFETY_CLEARANCE_M } from '@/logic/constants'
import { CommandRegistry } from '@/logic/commandRegistry'
import { polygonsIntersect } from '@/logic/collision/polygonIntersect'
import { DuplicateSubsystemError, ReadOnlyFieldError, UnknownFieldError } from '@/logic/errors'
import { advanceAlongPath } from '@/logic/pathFollower'
import { assertPolygon, centerOnCentroid, placePolygon } from '@/logic/polygon'
import { buildSafetyMargin } from '@/logic/safetyMargin'
import {
  expectBoolean,
  expectNumber,
  expectPoints,
  toTelemetryValue,
  type FieldAccessor,
  type FieldTable,
  type ShipHandle,
  type Subsystem,
} from '@/logic/subsystems/subsystem'
import { DiagnosticLog } from '@/state/diagnostics'
import { normalizeDeg } from '@/utils/geometry'

export type ShipModelOptions = {
  name?: string
  /** Outline in meters; it is re-centred on its area centroid. */
  hull: readonly Vec2[]
  clearance?: number
  pose?: Partial<Pose>
  diagnostics?: DiagnosticLog
}

const TELEMETRY_FIELDS = [
  'x',
  'y',
  'headingDeg',
  'currentSpeed',
  'desiredSpeed',
  'collisionWarning',
  'collisionEvent',
] as const

const copyPoints = (points: readonly Vec2[]) => points.map((p) => ({ x: p.x, y: p.y }))

/**
 * One vessel: pose, speeds, hull and safety margin, waypoint path and the
 * subsystems attached to it.
 *
 * Tick order is fixed:
 * 1. place hull and margin at the current pose
 * 2. set collision flags against every obstacle
 * 3. tick subsystems in attachment order
 * 4. advance along the waypoint path
 */
export class ShipModel implements ShipHandle, AttributeSurface {
  readonly name: string

  /** Ship frame, centroid at the origin, bow along +y. */
  readonly hull: Polygon

  /** Ship frame, built once from the hull. */
  readonly safetyMargin: Polygon

  readonly clearance: number

  private currentPose: Pose

  private previousPose: Pose

  private speed = { current: 0, desired: 0 }

  private path: Vec2[] = []

  private placed: { hull: Polygon; safetyMargin: Polygon }

  private warning = false

  private event = false

  private elapsed = 0

  private subsystems = new Map<string, Subsystem>()

  private registry = new CommandRegistry()

  private diagnostics: DiagnosticLog

  private fields: Map<string, FieldAccessor>

  constructor(options: ShipModelOptions) {
    this.name = options.name ?? 'ship'
    this.clearance = options.clearance ?? DEFAULT_SAFETY_CLEARANCE_M
    this.hull = centerOnCentroid(assertPolygon(options.hull, 'hull'))
    this.safetyMargin = buildSafetyMargin(this.hull, this.clearance)
    this.currentPose = {
      x: options.pose?.x ?? 0,
      y: options.pose?.y ?? 0,
      headingDeg: normalizeDeg(options.pose?.headingDeg ?? 0),
    }
    this.previousPose = { ...this.currentPose }
    this.diagnostics = options.diagnostics ?? new DiagnosticLog()
    this.placed = this.place()
    this.fields = new Map(Object.entries(this.describeFields()))
  }

  // ---------------------------------------------------------------------------
  // Ship handle (what subsystems see)
  // ---------------------------------------------------------------------------

  get pose(): Readonly<Pose> {
    return this.currentPose
  }

  get lastPose(): Readonly<Pose> {
    return this.previousPose
  }

  get currentSpeed() {
    return this.speed.current
  }

  get desiredSpeed() {
    return this.speed.desired
  }

  get collisionWarning() {
    return this.warning
  }

  get collisionEvent() {
    return this.event
  }

  get waypoints(): readonly Vec2[] {
    return this.path
  }

  get placedHull(): readonly Vec2[] {
    return this.placed.hull
  }

  get placedSafetyMargin(): readonly Vec2[] {
    return this.placed.safetyMargin
  }

  get elapsedSeconds() {
    return this.elapsed
  }

  setCurrentSpeed(speed: number) {
    this.speed.current = Math.max(0, speed)
  }

  setDesiredSpeed(speed: number) {
    this.speed.desired = Math.max(0, speed)
  }

  /** Append a destination; an idle ship first gets its own position as the path head. */
  appendWaypoint(point: Vec2) {
    if (this.path.length === 0) {
      this.path.push({ x: this.currentPose.x, y: this.currentPose.y })
    }
    this.path.push({ x: point.x, y: point.y })
  }

  getNamespaced(subsystem: string, field: string): FieldValue {
    return this.subsystemFor(subsystem, field).getField(field)
  }

  setNamespaced(subsystem: string, field: string, value: FieldValue) {
    this.subsystemFor(subsystem, field).setField(field, value)
  }

  report(kind: SimEventKind, message: string) {
    this.diagnostics.report({ t: this.elapsed, kind, shipName: this.name, message })
  }

  // ---------------------------------------------------------------------------
  // Assembly and commands
  // ---------------------------------------------------------------------------

  /** Throws DuplicateSubsystemError / DuplicateCommandError; nothing is attached then. */
  attach(subsystem: Subsystem) {
    if (this.subsystems.has(subsystem.name)) {
      throw new DuplicateSubsystemError(subsystem.name)
    }
    this.registry.register(subsystem)
    this.subsystems.set(subsystem.name, subsystem)
    subsystem.attachTo(this)
    return this
  }

  getSubsystem = (name: string) => this.subsystems.get(name)

  subsystemNames = () => [...this.subsystems.keys()]

  commandOwner = (command: CommandType) => this.registry.ownerOf(command)?.name

  /** Route to the owning subsystem; unowned commands are reported, not thrown. */
  dispatch(command: Command) {
    const handled = this.registry.dispatch(command)
    if (!handled) {
      this.report('unknown_command', `No system can handle the command '${command.type}'`)
    }
    return handled
  }

  // ---------------------------------------------------------------------------
  // Simulation
  // ---------------------------------------------------------------------------

  update(dt: number, obstacles: readonly (readonly Vec2[])[] = []) {
    if (!Number.isFinite(dt) || dt < 0) {
      throw new RangeError(`[ship] dt must be a finite number >= 0, got ${dt}`)
    }
    this.elapsed += dt
    this.placed = this.place()

    const wasWarning = this.warning
    const wasEvent = this.event
    this.warning = false
    this.event = false
    obstacles.forEach((obstacle) => {
      // the hull sits inside the margin, so a clear margin means a clear hull
      if (!polygonsIntersect(this.placed.safetyMargin, obstacle)) return
      this.warning = true
      if (polygonsIntersect(this.placed.hull, obstacle)) {
        this.event = true
      }
    })
    if (this.event && !wasEvent) {
      this.report('collision_event', `${this.name} hull is touching an obstacle`)
    } else if (this.warning && !wasWarning) {
      this.report('collision_warning', `${this.name} is inside the safety margin of an obstacle`)
    }

    this.subsystems.forEach((subsystem) => subsystem.tick(dt))

    if (this.path.length < 2) {
      this.path = []
      return
    }
    const step = advanceAlongPath(this.path, this.speed.current, dt)
    this.previousPose = { ...this.currentPose }
    this.currentPose = {
      x: step.position.x,
      y: step.position.y,
      headingDeg: step.headingDeg ?? this.currentPose.headingDeg,
    }
    this.path = step.path
  }

  telemetry(): Telemetry {
    const row: Telemetry = {}
    TELEMETRY_FIELDS.forEach((field) => {
      row[field] = toTelemetryValue(this.get(field))
    })
    this.subsystems.forEach((subsystem) => {
      Object.entries(subsystem.telemetry()).forEach(([field, value]) => {
        row[`${subsystem.name}.${field}`] = value
      })
    })
    return row
  }

  // ---------------------------------------------------------------------------
  // Attribute surface: "field" for the ship, "Subsystem:field" for subsystems
  // ---------------------------------------------------------------------------

  get(key: string): FieldValue {
    const split = splitKey(key)
    if (split) return this.getNamespaced(split.subsystem, split.field)
    return this.shipField(key).get()
  }

  set(key: string, value: FieldValue) {
    const split = splitKey(key)
    if (split) {
      this.setNamespaced(split.subsystem, split.field, value)
      return
    }
    const accessor = this.shipField(key)
    if (!accessor.set) {
      throw new ReadOnlyFieldError(key)
    }
    accessor.set(value, key)
  }

  fieldNames = () => [...this.fields.keys()]

  private shipField(key: string) {
    const accessor = this.fields.get(key)
    if (!accessor) throw new UnknownFieldError(key)
    return accessor
  }

  private subsystemFor(name: string, field: string) {
    const subsystem = this.subsystems.get(name)
    if (!subsystem) throw new UnknownFieldError(`${name}:${field}`)
    return subsystem
  }

  // The path head is always the ship's own position.
  private syncPathHead() {
    if (this.path.length === 0) return
    this.path[0] = { x: this.currentPose.x, y: this.currentPose.y }
  }

  /** Written points are pending destinations; a leading copy of the position is dropped. */
  private replaceWaypoints(points: Vec2[]) {
    const { x, y } = this.currentPose
    const pending = points.length > 0 && points[0].x === x && points[0].y === y ? points.slice(1) : points
    this.path = pending.length > 0 ? [{ x, y }, ...pending] : []
  }

  private place() {
    return {
      hull: placePolygon(this.hull, this.currentPose),
      safetyMargin: placePolygon(this.safetyMargin, this.currentPose),
    }
  }

  private describeFields(): FieldTable {
    return {
      x: {
        get: () => this.currentPose.x,
        set: (value, key) => {
          this.currentPose.x = expectNumber(value, key)
          this.syncPathHead()
        },
      },
      y: {
        get: () => this.currentPose.y,
        set: (value, key) => {
          this.currentPose.y = expectNumber(value, key)
          this.syncPathHead()
        },
      },
      headingDeg: {
        get: () => this.currentPose.headingDeg,
        set: (value, key) => {
          this.currentPose.headingDeg = normalizeDeg(expectNumber(value, key))
        },
      },
      currentSpeed: {
        get: () => this.speed.current,
        set: (value, key) => this.setCurrentSpeed(expectNumber(value, key)),
      },
      desiredSpeed: {
        get: () => this.speed.desired,
        set: (value, key) => this.setDesiredSpeed(expectNumber(value, key)),
      },
      collisionWarning: {
        get: () => this.warning,
        set: (value, key) => {
          this.warning = expectBoolean(value, key)
        },
      },
      collisionEvent: {
        get: () => this.event,
        set: (value, key) => {
          this.event = expectBoolean(value, key)
        },
      },
      waypoints: {
        get: () => copyPoints(this.path),
        set: (value, key) => this.replaceWaypoints(expectPoints(value, key)),
      },
      previousX: { get: () => this.previousPose.x },
      previousY: { get: () => this.previousPose.y },
      previousHeadingDeg: { get: () => this.previousPose.headingDeg },
      hull: { get: () => copyPoints(this.hull) },
      safetyMargin: { get: () => copyPoints(this.safetyMargin) },
      placedHull: { get: () => copyPoints(this.placed.hull) },
      placedSafetyMargin: { get: () => copyPoints(this.placed.safetyMargin) },
    }
  }
}

const splitKey = (key: string) => {
  const index = key.indexOf(':')
  if (index < 0) return null
  return { subsystem: key.slice(0, index), field: key.slice(index + 1) }
}
