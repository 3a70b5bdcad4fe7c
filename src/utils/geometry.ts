import type { Vec2 } from '@/types/sim'

export const distanceBetween = (a: Vec2, b: Vec2) => {
  const dx = a.x - b.x
  const dy = a.y - b.y
  return Math.hypot(dx, dy)
}

export const degToRad = (deg: number) => (deg * Math.PI) / 180

export const radToDeg = (rad: number) => (rad * 180) / Math.PI

/**
 * Normalize angle to 0-360 range
 * Example: -45° becomes 315°, 370° becomes 10°
 */
export const normalizeDeg = (deg: number) => {
  const wrapped = deg % 360
  const positive = wrapped < 0 ? wrapped + 360 : wrapped
  // -1e-15 + 360 rounds to 360; -0 becomes 0
  return positive >= 360 || positive === 0 ? 0 : positive
}

/**
 * Bearing from `from` to `to`.
 * 0° points along +y and angles grow counter-clockwise, so +x is 270°.
 */
export const angleDegrees = (from: Vec2, to: Vec2) =>
  normalizeDeg(radToDeg(Math.atan2(to.y - from.y, to.x - from.x)) - 90)

export const clamp = (value: number, min: number, max: number) =>
  Math.max(min, Math.min(max, value))

export const formatPoints = (points: readonly Vec2[], digits = 2) =>
  points.map((p) => `${p.x.toFixed(digits)},${p.y.toFixed(digits)}`).join(';')
