import type { Command, CommandType } from '@/types/sim'
import { Subsystem, type FieldTable } from './subsystem'

/** FIRE has no effect on the world; shots are only counted. */
export class Weapons extends Subsystem {
  readonly commands: readonly CommandType[] = ['FIRE']

  private shotsFired = 0

  constructor(name = 'Weapons') {
    super(name)
  }

  protected onCommand(command: Command) {
    if (command.type === 'FIRE') {
      this.shotsFired += 1
    }
  }

  protected describeFields(): FieldTable {
    return {
      shotsFired: { get: () => this.shotsFired },
    }
  }
}
