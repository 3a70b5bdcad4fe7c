import type { Command, CommandType } from '@/types/sim'
import { DEFAULT_ACCELERATION, DEFAULT_MAX_SPEED, DEFAULT_MIN_SPEED } from '@/logic/constants'
import { expectNumber, Subsystem, type FieldTable } from './subsystem'
import { clamp } from '@/utils/geometry'

export type EngineOptions = {
  /** Slowest accepted SET_SPEED, m/s */
  minSpeed?: number
  /** Fastest accepted SET_SPEED, m/s */
  maxSpeed?: number
  /** m/s² */
  acceleration?: number
}

/**
 * Speed control.
 *
 * SET_SPEED only changes the ship's desired speed, and only when the value is
 * inside [minSpeed, maxSpeed]. Each tick the current speed ramps toward the
 * desired speed at `acceleration`, except during a collision event, when it
 * drops to zero at once.
 */
export class Engine extends Subsystem {
  readonly commands: readonly CommandType[] = ['SET_SPEED']

  private minSpeed: number

  private maxSpeed: number

  private acceleration: number

  constructor(name = 'Engine', options: EngineOptions = {}) {
    super(name)
    this.minSpeed = options.minSpeed ?? DEFAULT_MIN_SPEED
    this.maxSpeed = options.maxSpeed ?? DEFAULT_MAX_SPEED
    this.acceleration = options.acceleration ?? DEFAULT_ACCELERATION
    if (this.minSpeed < 0 || this.minSpeed > this.maxSpeed) {
      throw new RangeError(`[engine] invalid speed bounds [${this.minSpeed}, ${this.maxSpeed}]`)
    }
    if (!(this.acceleration >= 0)) {
      throw new RangeError(`[engine] acceleration must be >= 0, got ${this.acceleration}`)
    }
  }

  accepts = (speed: number) =>
    Number.isFinite(speed) && speed >= this.minSpeed && speed <= this.maxSpeed

  protected onCommand(command: Command) {
    if (command.type !== 'SET_SPEED') return
    if (!this.accepts(command.speed)) {
      this.ship.report(
        'invalid_argument',
        `SET_SPEED ${command.speed} ignored, outside [${this.minSpeed}, ${this.maxSpeed}]`,
      )
      return
    }
    this.ship.setDesiredSpeed(command.speed)
  }

  tick(dt: number) {
    if (this.ship.collisionEvent) {
      this.ship.setCurrentSpeed(0)
      return
    }
    const current = this.ship.currentSpeed
    const maxChange = this.acceleration * Math.max(0, dt)
    const change = clamp(this.ship.desiredSpeed - current, -maxChange, maxChange)
    this.ship.setCurrentSpeed(current + change)
  }

  protected describeFields(): FieldTable {
    return {
      minSpeed: {
        get: () => this.minSpeed,
        set: (value, key) => {
          this.minSpeed = clamp(expectNumber(value, key), 0, this.maxSpeed)
        },
      },
      maxSpeed: {
        get: () => this.maxSpeed,
        set: (value, key) => {
          this.maxSpeed = Math.max(expectNumber(value, key), this.minSpeed)
        },
      },
      acceleration: {
        get: () => this.acceleration,
        set: (value, key) => {
          this.acceleration = Math.max(0, expectNumber(value, key))
        },
      },
    }
  }
}
