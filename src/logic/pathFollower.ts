import type { Vec2 } from '@/types/sim'
import { GEOMETRY_EPSILON } from '@/logic/constants'
import { angleDegrees, distanceBetween } from '@/utils/geometry'

export type PathStep = {
  position: Vec2
  /** Bearing of the segment being traversed; undefined when every segment had zero length. */
  headingDeg?: number
  /** New path headed by `position`, or empty once the final waypoint is reached. */
  path: Vec2[]
}

/**
 * Move along a polyline by `speed * dt` meters.
 *
 * `path[0]` is the current position and the rest are pending waypoints.
 * Consumed waypoints are dropped; reaching the last one returns an empty path.
 * The input array is never mutated or returned.
 */
export const advanceAlongPath = (path: readonly Vec2[], speed: number, dt: number): PathStep => {
  if (path.length < 2) {
    throw new RangeError(`[path] need the current position and at least one waypoint, got ${path.length} points`)
  }

  const distance = speed * dt
  if (!Number.isFinite(distance)) {
    throw new RangeError(`[path] speed * dt must be finite, got ${speed} * ${dt}`)
  }

  const points = path.map((p) => ({ x: p.x, y: p.y }))
  let remaining = Math.max(0, distance)
  let headingDeg: number | undefined
  let start = 0

  while (start < points.length - 1) {
    const from = points[start]
    const to = points[start + 1]
    const length = distanceBetween(from, to)
    if (length <= GEOMETRY_EPSILON) {
      start += 1
      continue
    }

    headingDeg = angleDegrees(from, to)
    const isFinalSegment = start === points.length - 2
    if (remaining < length) {
      const t = remaining / length
      const position = { x: from.x + (to.x - from.x) * t, y: from.y + (to.y - from.y) * t }
      return { position, headingDeg, path: [{ ...position }, ...points.slice(start + 1)] }
    }
    if (isFinalSegment) {
      return { position: { ...to }, headingDeg, path: [] }
    }
    remaining -= length
    start += 1
  }

  // only zero-length segments were left
  const last = points[points.length - 1]
  return { position: { ...last }, headingDeg, path: [] }
}
