import type { Command, CommandType } from '@/types/sim'
import { DuplicateCommandError } from '@/logic/errors'
import type { Subsystem } from '@/logic/subsystems/subsystem'

/** Command type → the single subsystem that owns it. */
export class CommandRegistry {
  private owners = new Map<CommandType, Subsystem>()

  /**
   * Claim every command `subsystem` declares. Nothing is registered when any
   * of them already belongs to another subsystem.
   */
  register(subsystem: Subsystem) {
    const declared = [...new Set(subsystem.commands)]
    declared.forEach((command) => {
      const owner = this.owners.get(command)
      if (owner && owner !== subsystem) {
        throw new DuplicateCommandError(command, owner.name, subsystem.name)
      }
    })
    declared.forEach((command) => this.owners.set(command, subsystem))
  }

  ownerOf = (command: CommandType) => this.owners.get(command)

  registeredCommands = () => [...this.owners.keys()]

  /** Forward `command` to its owner. Returns false when nobody owns it. */
  dispatch(command: Command) {
    const owner = this.owners.get(command.type)
    if (!owner) return false
    owner.handleCommand(command)
    return true
  }
}
