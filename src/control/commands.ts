import { COMMAND_TYPES, type Command, type CommandType } from '@/types/sim'

export type ParsedCommand = { ok: true; command: Command } | { ok: false; reason: string }

const isCommandType = (token: string): token is CommandType =>
  COMMAND_TYPES.some((type) => type === token)

const ARITY: Record<CommandType, number> = {
  TURN_LEFT: 0,
  TURN_RIGHT: 0,
  SET_SPEED: 1,
  ADD_WAYPOINT: 2,
  FIRE: 0,
}

const build = (type: CommandType, args: number[]): Command => {
  switch (type) {
    case 'SET_SPEED':
      return { type, speed: args[0] }
    case 'ADD_WAYPOINT':
      return { type, x: args[0], y: args[1] }
    case 'TURN_LEFT':
    case 'TURN_RIGHT':
    case 'FIRE':
      return { type }
  }
}

/**
 * Parse a textual action such as `FIRE`, `SET_SPEED 12` or
 * `ADD_WAYPOINT(400, 100)`. Tokens are case-insensitive.
 */
export const parseCommand = (text: string): ParsedCommand => {
  const parts = text.replace(/[(),]/g, ' ').trim().split(/\s+/).filter(Boolean)
  if (!parts.length) {
    return { ok: false, reason: 'Empty command' }
  }
  const [rawToken, ...rawArgs] = parts
  const token = rawToken.toUpperCase()
  if (!isCommandType(token)) {
    return { ok: false, reason: `No system can handle the command '${rawToken}'` }
  }
  const expected = ARITY[token]
  if (rawArgs.length !== expected) {
    return { ok: false, reason: `${token} takes ${expected} argument(s), got ${rawArgs.length}` }
  }
  const args = rawArgs.map(Number)
  if (args.some((value) => !Number.isFinite(value))) {
    return { ok: false, reason: `${token} arguments must be numbers: ${rawArgs.join(' ')}` }
  }
  return { ok: true, command: build(token, args) }
}

