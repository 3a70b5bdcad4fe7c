export type Vec2 = { x: number; y: number }

/** Implicitly closed ring of at least three distinct vertices. */
export type Polygon = Vec2[]

export type Pose = {
  x: number
  y: number
  /** 0° = +y, increasing counter-clockwise (90° = -x, 270° = +x). Always in [0, 360). */
  headingDeg: number
}

export type Command =
  | { type: 'TURN_LEFT' }
  | { type: 'TURN_RIGHT' }
  | { type: 'SET_SPEED'; speed: number }
  | { type: 'ADD_WAYPOINT'; x: number; y: number }
  | { type: 'FIRE' }

export type CommandType = Command['type']

export const COMMAND_TYPES: readonly CommandType[] = [
  'TURN_LEFT',
  'TURN_RIGHT',
  'SET_SPEED',
  'ADD_WAYPOINT',
  'FIRE',
]

/** Values reachable through the attribute surface. */
export type FieldValue = number | boolean | string | Vec2[]

/** Values allowed in a telemetry row. */
export type TelemetryValue = number | boolean | string

export type Telemetry = Record<string, TelemetryValue>

export type SimEventKind =
  | 'unknown_command'
  | 'invalid_argument'
  | 'collision_warning'
  | 'collision_event'

export type SimEvent = {
  eventId: string
  /** World time (seconds) when the event was reported. */
  t: number
  kind: SimEventKind
  shipName?: string
  message: string
}

export interface AttributeSurface {
  get(key: string): FieldValue
  set(key: string, value: FieldValue): void
}
