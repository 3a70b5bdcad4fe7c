import type { Command, FieldValue, Telemetry } from '@/types/sim'
import { ShipNotFoundError } from '@/logic/errors'
import type { ShipModel } from '@/logic/shipModel'
import type { World } from '@/logic/world'
import { parseCommand } from './commands'

/**
 * The surface a view, input handler or logger talks to: route operator
 * actions to one ship, read and write its attributes by name, and step the
 * world.
 */
export class ShipController {
  readonly ship: ShipModel

  constructor(
    private world: World,
    shipName: string,
  ) {
    const ship = world.getShip(shipName)
    if (!ship) throw new ShipNotFoundError(shipName)
    this.ship = ship
  }

  /** Returns true when a subsystem took the action. Bad input is reported, never thrown. */
  handleAction(action: string | Command) {
    if (typeof action !== 'string') {
      return this.ship.dispatch(action)
    }
    const parsed = parseCommand(action)
    if (!parsed.ok) {
      this.ship.report('unknown_command', parsed.reason)
      return false
    }
    return this.ship.dispatch(parsed.command)
  }

  /** `"x"` for a ship field, `"Engine:maxSpeed"` for a subsystem field. */
  get = (key: string): FieldValue => this.ship.get(key)

  set = (key: string, value: FieldValue) => this.ship.set(key, value)

  update(dt: number) {
    this.world.update(dt)
  }

  telemetry(): Telemetry {
    return this.world.telemetry()
  }
}
