import { appEnv } from '@/config/env'
import { defaultScenario, type ScenarioConfig } from '@/config/scenario'
import { ShipModel } from '@/logic/shipModel'
import { Engine, Navigation, Rudder, Weapons, type EngineOptions } from '@/logic/subsystems'
import { World } from '@/logic/world'
import { DiagnosticLog } from '@/state/diagnostics'
import type { Pose, Vec2 } from '@/types/sim'

export type CreateShipOptions = {
  name: string
  hull: readonly Vec2[]
  clearance?: number
  pose?: Partial<Pose>
  engine?: EngineOptions
  route?: readonly Vec2[]
  diagnostics?: DiagnosticLog
}

/** A ship with Rudder, Engine, Weapons and Navigation attached, in that order. */
export const createShip = (options: CreateShipOptions) => {
  const ship = new ShipModel({
    name: options.name,
    hull: options.hull,
    clearance: options.clearance ?? appEnv.safetyClearanceM,
    pose: options.pose,
    diagnostics: options.diagnostics,
  })
  ship
    .attach(new Rudder())
    .attach(new Engine('Engine', options.engine))
    .attach(new Weapons())
    .attach(new Navigation())
  options.route?.forEach((point) => {
    ship.dispatch({ type: 'ADD_WAYPOINT', x: point.x, y: point.y })
  })
  return ship
}

export const createWorld = (scenario: ScenarioConfig = defaultScenario()) => {
  const diagnostics = new DiagnosticLog()
  const world = new World(scenario.obstacles, diagnostics)
  const ship = createShip({
    name: scenario.shipName,
    hull: scenario.hull,
    clearance: scenario.clearance,
    pose: scenario.start,
    engine: scenario.engine,
    route: scenario.route,
    diagnostics,
  })
  if (scenario.initialSpeed > 0) {
    ship.dispatch({ type: 'SET_SPEED', speed: scenario.initialSpeed })
  }
  world.attachShip(ship)
  return world
}
