import type { Polygon, Telemetry, Vec2 } from '@/types/sim'
import { DuplicateShipError } from '@/logic/errors'
import { assertPolygon } from '@/logic/polygon'
import type { ShipModel } from '@/logic/shipModel'
import { DiagnosticLog } from '@/state/diagnostics'

const validateObstacles = (obstacles: readonly (readonly Vec2[])[]) =>
  obstacles.map((obstacle, index) => assertPolygon(obstacle, `obstacle ${index}`))

/**
 * Static obstacles plus the ships moving among them. Ships tick in the order
 * they were attached.
 */
export class World {
  totalTime = 0

  timeDelta = 0

  private obstacleList: Polygon[]

  private ships = new Map<string, ShipModel>()

  constructor(
    obstacles: readonly (readonly Vec2[])[] = [],
    readonly diagnostics = new DiagnosticLog(),
  ) {
    this.obstacleList = validateObstacles(obstacles)
  }

  get obstacles(): readonly Polygon[] {
    return this.obstacleList
  }

  /** Replace every obstacle. Only call between ticks. */
  setObstacles(obstacles: readonly (readonly Vec2[])[]) {
    this.obstacleList = validateObstacles(obstacles)
  }

  addObstacle(obstacle: readonly Vec2[]) {
    this.obstacleList = [
      ...this.obstacleList,
      assertPolygon(obstacle, `obstacle ${this.obstacleList.length}`),
    ]
  }

  attachShip(ship: ShipModel) {
    if (this.ships.has(ship.name)) {
      throw new DuplicateShipError(ship.name)
    }
    this.ships.set(ship.name, ship)
    return ship
  }

  getShip = (name: string) => this.ships.get(name)

  shipNames = () => [...this.ships.keys()]

  update(dt: number) {
    if (!Number.isFinite(dt) || dt < 0) {
      throw new RangeError(`[world] dt must be a finite number >= 0, got ${dt}`)
    }
    this.totalTime += dt
    this.timeDelta = dt
    this.ships.forEach((ship) => ship.update(dt, this.obstacleList))
  }

  /** One flat row: world fields, then `<ship>.<field>` for every ship. */
  telemetry(): Telemetry {
    const row: Telemetry = { totalTime: this.totalTime, timeDelta: this.timeDelta }
    this.ships.forEach((ship, name) => {
      Object.entries(ship.telemetry()).forEach(([field, value]) => {
        row[`${name}.${field}`] = value
      })
    })
    return row
  }
}
