import type { Polygon, Vec2 } from '@/types/sim'
import { DEFAULT_SAFETY_CLEARANCE_M, MARGIN_QUARTER_SEGMENTS } from '@/logic/constants'
import { assertPolygon, convexHull } from '@/logic/polygon'
import { InvalidPolygonError } from '@/logic/errors'

const MAX_ARC_STEP_RAD = Math.PI / 2 / MARGIN_QUARTER_SEGMENTS

const outwardNormalAngle = (from: Vec2, to: Vec2) =>
  // CCW ring: the outward normal of (dx, dy) is (dy, -dx)
  Math.atan2(-(to.x - from.x), to.y - from.y)

const pointAt = (center: Vec2, angleRad: number, radius: number): Vec2 => ({
  x: center.x + Math.cos(angleRad) * radius,
  y: center.y + Math.sin(angleRad) * radius,
})

/**
 * Minkowski sum of the convex hull of `hull` and a disk of radius `clearance`.
 *
 * Each hull edge is pushed out along its normal; each corner gets a round join
 * made of segments tangent to the clearance circle, so the polygon never dips
 * inside the true buffer. The result is counter-clockwise.
 */
export const buildSafetyMargin = (
  hull: readonly Vec2[],
  clearance = DEFAULT_SAFETY_CLEARANCE_M,
): Polygon => {
  if (!(clearance > 0) || !Number.isFinite(clearance)) {
    throw new RangeError(`[margin] clearance must be a positive number, got ${clearance}`)
  }
  const ring = convexHull(assertPolygon(hull, 'hull'))
  if (ring.length < 3) {
    // every vertex collinear
    throw new InvalidPolygonError(ring.length, 'hull')
  }

  const n = ring.length
  const normals = ring.map((point, i) => outwardNormalAngle(point, ring[(i + 1) % n]))
  const margin: Polygon = []

  ring.forEach((corner, i) => {
    const before = normals[(i - 1 + n) % n]
    const after = normals[i]
    let turn = after - before
    while (turn < 0) turn += Math.PI * 2
    while (turn >= Math.PI * 2) turn -= Math.PI * 2

    const steps = Math.max(1, Math.ceil(turn / MAX_ARC_STEP_RAD - 1e-9))
    const step = turn / steps
    const tangentRadius = clearance / Math.cos(step / 2)

    margin.push(pointAt(corner, before, clearance))
    for (let k = 0; k < steps; k += 1) {
      margin.push(pointAt(corner, before + (k + 0.5) * step, tangentRadius))
    }
    margin.push(pointAt(corner, after, clearance))
  })

  return margin
}
