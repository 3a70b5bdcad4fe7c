import type { Command, CommandType } from '@/types/sim'
import { RUDDER_STEP_DEG } from '@/logic/constants'
import { expectNumber, Subsystem, type FieldTable } from './subsystem'
import { normalizeDeg } from '@/utils/geometry'

/**
 * Manual heading order. Each press moves `Rudder:headingDeg` by one step;
 * the order is kept apart from the heading the path follower computes.
 */
export class Rudder extends Subsystem {
  readonly commands: readonly CommandType[] = ['TURN_LEFT', 'TURN_RIGHT']

  private headingDeg = 0

  constructor(name = 'Rudder') {
    super(name)
  }

  protected onCommand(command: Command) {
    switch (command.type) {
      case 'TURN_LEFT':
        this.turn(-RUDDER_STEP_DEG)
        break
      case 'TURN_RIGHT':
        this.turn(RUDDER_STEP_DEG)
        break
      default:
        break
    }
  }

  protected describeFields(): FieldTable {
    return {
      headingDeg: {
        get: () => this.headingDeg,
        set: (value, key) => {
          this.headingDeg = normalizeDeg(expectNumber(value, key))
        },
      },
    }
  }

  private turn(deltaDeg: number) {
    const current = expectNumber(this.ship.getNamespaced(this.name, 'headingDeg'), `${this.name}:headingDeg`)
    this.ship.setNamespaced(this.name, 'headingDeg', normalizeDeg(current + deltaDeg))
  }
}
