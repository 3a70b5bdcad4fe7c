import { config } from 'dotenv'

config()

const toNumber = (value: string | undefined, fallback: number) => {
  if (!value) return fallback
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : fallback
}

const toBool = (value: string | undefined, fallback = false) => {
  if (!value) return fallback
  const normalized = value.trim().toLowerCase()
  return normalized === '1' || normalized === 'true' || normalized === 'yes'
}

const rawEnv = process.env

export const appEnv = {
  // Distance the safety margin extends beyond the hull, meters.
  safetyClearanceM: toNumber(rawEnv.SAFETY_CLEARANCE_M, 100),
  engineMinSpeed: toNumber(rawEnv.ENGINE_MIN_SPEED, 0),
  engineMaxSpeed: toNumber(rawEnv.ENGINE_MAX_SPEED, 15),
  engineAcceleration: toNumber(rawEnv.ENGINE_ACCELERATION, 0.5),
  tickRateHz: toNumber(rawEnv.TICK_RATE_HZ, 10),
  // Longest wall-clock gap the host loop feeds into one tick.
  maxTickSeconds: toNumber(rawEnv.MAX_TICK_SECONDS, 0.25),
  debugSim: toBool(rawEnv.DEBUG_SIM, false),
} as const

export type AppEnv = typeof appEnv
