import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import type { Vec2 } from '@/types/sim'
import { ShipModel } from '@/logic/shipModel'
import { Engine, Navigation, Rudder, Weapons } from '@/logic/subsystems'
import {
  DuplicateSubsystemError,
  InvalidFieldValueError,
  InvalidPolygonError,
  ReadOnlyFieldError,
  UnknownFieldError,
} from '@/logic/errors'
import { polygonCentroid } from '@/logic/polygon'
import { DiagnosticLog } from '@/state/diagnostics'

const hull: Vec2[] = [
  { x: -5, y: -10 },
  { x: 5, y: -10 },
  { x: 5, y: 10 },
  { x: -5, y: 10 },
]

const makeBox = (minX: number, maxX: number, minY = -5, maxY = 5): Vec2[] => [
  { x: minX, y: minY },
  { x: maxX, y: minY },
  { x: maxX, y: maxY },
  { x: minX, y: maxY },
]

const makeShip = () => {
  const diagnostics = new DiagnosticLog(50, false)
  const ship = new ShipModel({ name: 'alpha', hull, clearance: 100, diagnostics })
  return { ship, diagnostics }
}

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe('ShipModel construction', () => {
  it('re-centres the hull on its centroid', () => {
    const ship = new ShipModel({ hull: hull.map((p) => ({ x: p.x + 50, y: p.y + 20 })) })
    const c = polygonCentroid(ship.hull)
    expect(c.x).toBeCloseTo(0, 9)
    expect(c.y).toBeCloseTo(0, 9)
  })

  it('builds the safety margin once from the hull', () => {
    const { ship } = makeShip()
    expect(ship.safetyMargin).toHaveLength(72)
    expect(ship.get('safetyMargin')).toEqual(ship.safetyMargin)
  })

  it('rejects a degenerate hull', () => {
    expect(() => new ShipModel({ hull: [{ x: 0, y: 0 }, { x: 1, y: 1 }] })).toThrow(InvalidPolygonError)
  })

  it('normalizes the starting heading', () => {
    const ship = new ShipModel({ hull, pose: { headingDeg: -90 } })
    expect(ship.pose).toEqual({ x: 0, y: 0, headingDeg: 270 })
  })

  it('rejects two subsystems with the same name', () => {
    const { ship } = makeShip()
    ship.attach(new Weapons())
    expect(() => ship.attach(new Weapons())).toThrow(DuplicateSubsystemError)
  })
})

describe('ShipModel dispatch', () => {
  it('reports a command nobody handles', () => {
    const { ship, diagnostics } = makeShip()
    ship.attach(new Rudder())
    expect(ship.dispatch({ type: 'FIRE' })).toBe(false)
    const [event] = diagnostics.getEvents()
    expect(event.kind).toBe('unknown_command')
    expect(event.shipName).toBe('alpha')
    expect(event.message).toBe("No system can handle the command 'FIRE'")
  })

  it('names the owner of each command', () => {
    const { ship } = makeShip()
    ship.attach(new Rudder()).attach(new Engine())
    expect(ship.commandOwner('TURN_LEFT')).toBe('Rudder')
    expect(ship.commandOwner('SET_SPEED')).toBe('Engine')
    expect(ship.commandOwner('FIRE')).toBeUndefined()
  })
})

describe('ShipModel.update', () => {
  it('moves along the waypoints at the current speed', () => {
    const { ship } = makeShip()
    ship.appendWaypoint({ x: 100, y: 0 })
    ship.setCurrentSpeed(10)
    ship.update(1)
    expect(ship.pose.x).toBeCloseTo(10, 9)
    expect(ship.pose.y).toBe(0)
    expect(ship.pose.headingDeg).toBeCloseTo(270, 9)
    expect(ship.get('previousX')).toBe(0)
    expect(ship.waypoints).toEqual([
      { x: 10, y: 0 },
      { x: 100, y: 0 },
    ])
  })

  it('ticks subsystems before moving', () => {
    const { ship } = makeShip()
    ship.attach(new Engine('Engine', { acceleration: 2 }))
    ship.appendWaypoint({ x: 100, y: 0 })
    ship.dispatch({ type: 'SET_SPEED', speed: 10 })
    ship.update(1)
    expect(ship.currentSpeed).toBe(2)
    expect(ship.pose.x).toBeCloseTo(2, 9)
  })

  it('clears the path and keeps the heading after arrival', () => {
    const { ship } = makeShip()
    ship.appendWaypoint({ x: 0, y: -10 })
    ship.setCurrentSpeed(20)
    ship.update(1)
    expect(ship.pose.x).toBe(0)
    expect(ship.pose.y).toBe(-10)
    expect(ship.pose.headingDeg).toBeCloseTo(180, 9)
    expect(ship.waypoints).toEqual([])
    ship.update(1)
    expect(ship.pose.y).toBe(-10)
    expect(ship.pose.headingDeg).toBeCloseTo(180, 9)
  })

  it('does not move without waypoints', () => {
    const { ship } = makeShip()
    ship.setCurrentSpeed(10)
    ship.update(1)
    expect(ship.pose).toEqual({ x: 0, y: 0, headingDeg: 0 })
  })

  it('rejects a negative or non-finite step', () => {
    const { ship } = makeShip()
    ship.appendWaypoint({ x: 100, y: 0 })
    ship.setCurrentSpeed(10)
    expect(() => ship.update(Number.NaN)).toThrow(RangeError)
    expect(() => ship.update(-1)).toThrow(RangeError)
    expect(ship.elapsedSeconds).toBe(0)
    expect(ship.pose.x).toBe(0)
  })

  it('accumulates elapsed time', () => {
    const { ship } = makeShip()
    ship.update(0.5)
    ship.update(0.25)
    expect(ship.elapsedSeconds).toBe(0.75)
  })
})

describe('ShipModel collisions', () => {
  it('is clear when the obstacle is outside the margin', () => {
    const { ship } = makeShip()
    ship.update(0.1, [makeBox(500, 510)])
    expect(ship.collisionWarning).toBe(false)
    expect(ship.collisionEvent).toBe(false)
  })

  it('warns when the obstacle enters the margin only', () => {
    const { ship } = makeShip()
    ship.update(0.1, [makeBox(50, 60)])
    expect(ship.collisionWarning).toBe(true)
    expect(ship.collisionEvent).toBe(false)
  })

  it('flags an event when the hull touches the obstacle', () => {
    const { ship } = makeShip()
    ship.update(0.1, [makeBox(0, 60)])
    expect(ship.collisionWarning).toBe(true)
    expect(ship.collisionEvent).toBe(true)
  })

  it('checks the pose held before this tick moves the ship', () => {
    const { ship } = makeShip()
    ship.appendWaypoint({ x: 300, y: 0 })
    ship.setCurrentSpeed(10)
    const obstacle = makeBox(106, 116)
    ship.update(1, [obstacle])
    expect(ship.pose.x).toBeCloseTo(10, 9)
    expect(ship.collisionWarning).toBe(false)
    ship.update(1, [obstacle])
    expect(ship.collisionWarning).toBe(true)
    expect(ship.collisionEvent).toBe(false)
  })

  it('clears the flags once the obstacle is gone', () => {
    const { ship } = makeShip()
    ship.update(0.1, [makeBox(0, 60)])
    ship.update(0.1, [])
    expect(ship.collisionWarning).toBe(false)
    expect(ship.collisionEvent).toBe(false)
  })

  it('reports only the rising edge of a warning', () => {
    const { ship, diagnostics } = makeShip()
    const obstacle = makeBox(50, 60)
    ship.update(0.1, [obstacle])
    ship.update(0.1, [obstacle])
    expect(diagnostics.getEvents().map((e) => e.kind)).toEqual(['collision_warning'])
  })

  it('reports an event instead of a warning when both start together', () => {
    const { ship, diagnostics } = makeShip()
    ship.update(0.1, [makeBox(0, 60)])
    expect(diagnostics.getEvents().map((e) => e.kind)).toEqual(['collision_event'])
  })
})

describe('ShipModel attribute surface', () => {
  it('reads and writes ship fields', () => {
    const { ship } = makeShip()
    ship.set('x', 5)
    ship.set('headingDeg', 450)
    expect(ship.get('x')).toBe(5)
    expect(ship.get('headingDeg')).toBe(90)
  })

  it('replaces the waypoint list', () => {
    const { ship } = makeShip()
    ship.set('waypoints', [
      { x: 0, y: 0 },
      { x: 0, y: 50 },
    ])
    expect(ship.waypoints).toEqual([
      { x: 0, y: 0 },
      { x: 0, y: 50 },
    ])
  })

  it('moves the path head along with a written position', () => {
    const { ship } = makeShip()
    ship.appendWaypoint({ x: 100, y: 0 })
    ship.setCurrentSpeed(10)
    ship.set('x', 50)
    expect(ship.waypoints[0]).toEqual({ x: 50, y: 0 })
    ship.update(1)
    expect(ship.pose.x).toBeCloseTo(60, 9)
    expect(ship.pose.y).toBe(0)
  })

  it('treats a written waypoint list as pending destinations', () => {
    const { ship } = makeShip()
    ship.set('waypoints', [
      { x: 500, y: 500 },
      { x: 500, y: 600 },
    ])
    expect(ship.waypoints).toEqual([
      { x: 0, y: 0 },
      { x: 500, y: 500 },
      { x: 500, y: 600 },
    ])
    ship.setCurrentSpeed(1)
    ship.update(1)
    expect(ship.pose.x).toBeCloseTo(Math.SQRT1_2, 9)
    expect(ship.pose.y).toBeCloseTo(Math.SQRT1_2, 9)
  })

  it('clears the path when an empty waypoint list is written', () => {
    const { ship } = makeShip()
    ship.appendWaypoint({ x: 100, y: 0 })
    ship.set('waypoints', [])
    expect(ship.waypoints).toEqual([])
  })

  it('routes "Subsystem:field" keys', () => {
    const { ship } = makeShip()
    ship.attach(new Engine())
    expect(ship.get('Engine:maxSpeed')).toBe(15)
  })

  it('refuses derived fields', () => {
    const { ship } = makeShip()
    expect(() => ship.set('hull', [])).toThrow(ReadOnlyFieldError)
    expect(() => ship.set('previousX', 1)).toThrow(ReadOnlyFieldError)
  })

  it('refuses unknown keys', () => {
    const { ship } = makeShip()
    expect(() => ship.get('draft')).toThrow(UnknownFieldError)
    expect(() => ship.get('Sonar:range')).toThrow(UnknownFieldError)
  })

  it('refuses values of the wrong type', () => {
    const { ship } = makeShip()
    expect(() => ship.set('x', 'east')).toThrow(InvalidFieldValueError)
    expect(() => ship.set('collisionWarning', 1)).toThrow(InvalidFieldValueError)
  })
})

describe('ShipModel.telemetry', () => {
  it('lists ship fields then subsystem fields', () => {
    const { ship } = makeShip()
    ship.attach(new Rudder()).attach(new Navigation())
    expect(Object.keys(ship.telemetry())).toEqual([
      'x',
      'y',
      'headingDeg',
      'currentSpeed',
      'desiredSpeed',
      'collisionWarning',
      'collisionEvent',
      'Rudder.headingDeg',
      'Navigation.projectedPath',
      'Navigation.waypoints',
    ])
  })
})
