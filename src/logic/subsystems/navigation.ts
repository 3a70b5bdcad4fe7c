import type { Command, CommandType, Vec2 } from '@/types/sim'
import { Subsystem, type FieldTable } from './subsystem'

export class Navigation extends Subsystem {
  readonly commands: readonly CommandType[] = ['ADD_WAYPOINT']

  private projectedPath: Vec2[] = []

  constructor(name = 'Navigation') {
    super(name)
  }

  protected onCommand(command: Command) {
    if (command.type !== 'ADD_WAYPOINT') return
    if (!Number.isFinite(command.x) || !Number.isFinite(command.y)) {
      this.ship.report('invalid_argument', `ADD_WAYPOINT ${command.x} ${command.y} ignored, not a finite point`)
      return
    }
    this.ship.appendWaypoint({ x: command.x, y: command.y })
  }

  // Display only; the path follower works from the ship's own waypoint list.
  tick() {
    const { x, y } = this.ship.pose
    this.projectedPath = [{ x, y }, ...this.ship.waypoints.slice(1).map((p) => ({ x: p.x, y: p.y }))]
  }

  protected describeFields(): FieldTable {
    return {
      projectedPath: { get: () => this.projectedPath.map((p) => ({ ...p })) },
      waypoints: { get: () => this.ship.waypoints.map((p) => ({ ...p })) },
    }
  }
}
