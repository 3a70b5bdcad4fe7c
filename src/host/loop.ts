import { performance } from 'node:perf_hooks'
import { appEnv } from '@/config/env'
import type { World } from '@/logic/world'
import type { Telemetry } from '@/types/sim'

type SimulationLoopOptions = {
  tickRateHz?: number
  maxTickSeconds?: number
  /** Milliseconds; defaults to performance.now */
  now?: () => number
  onTick?: (world: World, telemetry: Telemetry) => void
}

/**
 * Steps a world from wall-clock time. Long stalls are clamped to
 * `maxTickSeconds` so one late timer does not teleport a ship.
 */
export class SimulationLoop {
  private timer?: ReturnType<typeof setInterval>

  private lastTick = 0

  private readonly tickRateHz: number

  private readonly maxTickSeconds: number

  private readonly now: () => number

  constructor(
    private world: World,
    private options: SimulationLoopOptions = {},
  ) {
    this.tickRateHz = options.tickRateHz ?? appEnv.tickRateHz
    this.maxTickSeconds = options.maxTickSeconds ?? appEnv.maxTickSeconds
    this.now = options.now ?? (() => performance.now())
  }

  start() {
    if (this.timer) return
    this.lastTick = this.now()
    const intervalMs = 1000 / this.tickRateHz
    this.timer = setInterval(() => this.tick(), intervalMs)
  }

  stop() {
    if (!this.timer) return
    clearInterval(this.timer)
    this.timer = undefined
  }

  isRunning = () => Boolean(this.timer)

  /** Advance by an explicit `dt` (seconds) and notify `onTick`. */
  step(dt: number) {
    this.world.update(dt)
    this.options.onTick?.(this.world, this.world.telemetry())
  }

  private tick() {
    const now = this.now()
    const rawDt = (now - this.lastTick) / 1000
    const dt = Math.min(Math.max(rawDt, 0), this.maxTickSeconds)
    this.lastTick = now
    try {
      this.step(dt)
    } catch (error) {
      console.error('[loop] tick failed, stopping', error)
      this.stop()
    }
  }
}
