import type { Vec2 } from '@/types/sim'
import { GEOMETRY_EPSILON } from '@/logic/constants'
import { assertPolygon, boundingBox, pointInPolygon, type BoundingBox } from '@/logic/polygon'

type Orientation = -1 | 0 | 1

const orientation = (a: Vec2, b: Vec2, c: Vec2): Orientation => {
  const value = (b.x - a.x) * (c.y - a.y) - (b.y - a.y) * (c.x - a.x)
  if (Math.abs(value) <= GEOMETRY_EPSILON) return 0
  return value > 0 ? 1 : -1
}

/** `p` is known to be collinear with a-b; check it lies within the segment's extent. */
const withinSegment = (p: Vec2, a: Vec2, b: Vec2) =>
  p.x <= Math.max(a.x, b.x) + GEOMETRY_EPSILON &&
  p.x >= Math.min(a.x, b.x) - GEOMETRY_EPSILON &&
  p.y <= Math.max(a.y, b.y) + GEOMETRY_EPSILON &&
  p.y >= Math.min(a.y, b.y) - GEOMETRY_EPSILON

/** Closed-segment test: shared endpoints and collinear overlaps count. */
export const segmentsIntersect = (p1: Vec2, p2: Vec2, q1: Vec2, q2: Vec2) => {
  const o1 = orientation(p1, p2, q1)
  const o2 = orientation(p1, p2, q2)
  const o3 = orientation(q1, q2, p1)
  const o4 = orientation(q1, q2, p2)

  if (o1 !== o2 && o3 !== o4) return true

  if (o1 === 0 && withinSegment(q1, p1, p2)) return true
  if (o2 === 0 && withinSegment(q2, p1, p2)) return true
  if (o3 === 0 && withinSegment(p1, q1, q2)) return true
  if (o4 === 0 && withinSegment(p2, q1, q2)) return true
  return false
}

const boxesOverlap = (a: BoundingBox, b: BoundingBox) =>
  a.minX <= b.maxX + GEOMETRY_EPSILON &&
  b.minX <= a.maxX + GEOMETRY_EPSILON &&
  a.minY <= b.maxY + GEOMETRY_EPSILON &&
  b.minY <= a.maxY + GEOMETRY_EPSILON

/**
 * True when the two polygons share at least one point, boundary contact
 * included. Either polygon may be given explicitly closed.
 */
export const polygonsIntersect = (first: readonly Vec2[], second: readonly Vec2[]) => {
  const a = assertPolygon(first, 'first polygon')
  const b = assertPolygon(second, 'second polygon')
  if (!boxesOverlap(boundingBox(a), boundingBox(b))) return false

  for (let i = 0; i < a.length; i += 1) {
    const a1 = a[i]
    const a2 = a[(i + 1) % a.length]
    for (let j = 0; j < b.length; j += 1) {
      if (segmentsIntersect(a1, a2, b[j], b[(j + 1) % b.length])) return true
    }
  }

  // No boundary contact: one is either wholly inside the other or they are apart.
  return pointInPolygon(a[0], b) || pointInPolygon(b[0], a)
}
