import type { Polygon, Pose, Vec2 } from '@/types/sim'
import { GEOMETRY_EPSILON } from '@/logic/constants'
import { InvalidPolygonError } from '@/logic/errors'
import { degToRad } from '@/utils/geometry'

export type TransformOrigin = 'centroid' | 'center' | Vec2

export type BoundingBox = { minX: number; minY: number; maxX: number; maxY: number }

const samePoint = (a: Vec2, b: Vec2) =>
  Math.abs(a.x - b.x) <= GEOMETRY_EPSILON && Math.abs(a.y - b.y) <= GEOMETRY_EPSILON

/**
 * Drop repeated consecutive vertices, including a closing vertex that repeats
 * the first one (`[(a), (b), (c), (a)]` becomes `[(a), (b), (c)]`).
 */
export const normalizePolygon = (polygon: readonly Vec2[]): Polygon => {
  const out: Polygon = []
  polygon.forEach((point) => {
    const last = out[out.length - 1]
    if (last && samePoint(last, point)) return
    out.push({ x: point.x, y: point.y })
  })
  while (out.length > 1 && samePoint(out[0], out[out.length - 1])) {
    out.pop()
  }
  return out
}

const countDistinct = (polygon: readonly Vec2[]) => {
  const distinct: Vec2[] = []
  polygon.forEach((point) => {
    if (!distinct.some((seen) => samePoint(seen, point))) distinct.push(point)
  })
  return distinct.length
}

/** Normalized copy of `polygon`; throws when fewer than 3 distinct vertices remain. */
export const assertPolygon = (polygon: readonly Vec2[], label = 'polygon'): Polygon => {
  const normalized = normalizePolygon(polygon)
  const distinct = countDistinct(normalized)
  if (distinct < 3) {
    throw new InvalidPolygonError(distinct, label)
  }
  return normalized
}

export const signedArea = (polygon: readonly Vec2[]) => {
  let sum = 0
  for (let i = 0; i < polygon.length; i += 1) {
    const a = polygon[i]
    const b = polygon[(i + 1) % polygon.length]
    sum += a.x * b.y - b.x * a.y
  }
  return sum / 2
}

export const boundingBox = (polygon: readonly Vec2[]): BoundingBox => {
  let minX = Infinity
  let minY = Infinity
  let maxX = -Infinity
  let maxY = -Infinity
  polygon.forEach((p) => {
    minX = Math.min(minX, p.x)
    minY = Math.min(minY, p.y)
    maxX = Math.max(maxX, p.x)
    maxY = Math.max(maxY, p.y)
  })
  return { minX, minY, maxX, maxY }
}

/** Area centroid; falls back to the vertex mean for zero-area rings. */
export const polygonCentroid = (polygon: readonly Vec2[]): Vec2 => {
  const area = signedArea(polygon)
  if (Math.abs(area) <= GEOMETRY_EPSILON) {
    const sum = polygon.reduce((acc, p) => ({ x: acc.x + p.x, y: acc.y + p.y }), { x: 0, y: 0 })
    const n = Math.max(polygon.length, 1)
    return { x: sum.x / n, y: sum.y / n }
  }
  let cx = 0
  let cy = 0
  for (let i = 0; i < polygon.length; i += 1) {
    const a = polygon[i]
    const b = polygon[(i + 1) % polygon.length]
    const cross = a.x * b.y - b.x * a.y
    cx += (a.x + b.x) * cross
    cy += (a.y + b.y) * cross
  }
  return { x: cx / (6 * area), y: cy / (6 * area) }
}

const resolveOrigin = (polygon: readonly Vec2[], origin: TransformOrigin): Vec2 => {
  if (origin === 'centroid') return polygonCentroid(polygon)
  if (origin === 'center') {
    const box = boundingBox(polygon)
    return { x: (box.minX + box.maxX) / 2, y: (box.minY + box.maxY) / 2 }
  }
  return origin
}

/**
 * Translate, then rotate counter-clockwise, then scale, each about `origin`
 * as measured on the intermediate shape. Returns a new polygon.
 */
export const transformPolygon = (
  polygon: readonly Vec2[],
  dx = 0,
  dy = 0,
  rotationDeg = 0,
  scale = 1,
  origin: TransformOrigin = 'centroid',
): Polygon => {
  const moved = polygon.map((p) => ({ x: p.x + dx, y: p.y + dy }))
  if (rotationDeg === 0 && scale === 1) return moved

  const pivot = resolveOrigin(moved, origin)
  const rad = degToRad(rotationDeg)
  const cos = Math.cos(rad)
  const sin = Math.sin(rad)
  const rotated = moved.map((p) => {
    const rx = p.x - pivot.x
    const ry = p.y - pivot.y
    return { x: pivot.x + rx * cos - ry * sin, y: pivot.y + rx * sin + ry * cos }
  })
  if (scale === 1) return rotated

  const scalePivot = resolveOrigin(rotated, origin)
  return rotated.map((p) => ({
    x: scalePivot.x + (p.x - scalePivot.x) * scale,
    y: scalePivot.y + (p.y - scalePivot.y) * scale,
  }))
}

/** Move a ship-frame polygon (origin at the ship's reference point) to `pose`. */
export const placePolygon = (local: readonly Vec2[], pose: Pose): Polygon =>
  transformPolygon(local, pose.x, pose.y, pose.headingDeg, 1, { x: pose.x, y: pose.y })

/** Shift `polygon` so its area centroid sits on (0, 0). */
export const centerOnCentroid = (polygon: readonly Vec2[]): Polygon => {
  const c = polygonCentroid(polygon)
  return transformPolygon(polygon, -c.x, -c.y)
}

/** Even-odd ray cast. Points exactly on an edge may go either way. */
export const pointInPolygon = (point: Vec2, polygon: readonly Vec2[]) => {
  let inside = false
  const n = polygon.length
  for (let i = 0, j = n - 1; i < n; j = i, i += 1) {
    const vi = polygon[i]
    const vj = polygon[j]
    if (vi.y > point.y !== vj.y > point.y) {
      const intersectX = ((vj.x - vi.x) * (point.y - vi.y)) / (vj.y - vi.y) + vi.x
      if (point.x < intersectX) {
        inside = !inside
      }
    }
  }
  return inside
}

const cross = (o: Vec2, a: Vec2, b: Vec2) => (a.x - o.x) * (b.y - o.y) - (a.y - o.y) * (b.x - o.x)

/** Counter-clockwise convex hull without collinear vertices (monotone chain). */
export const convexHull = (points: readonly Vec2[]): Polygon => {
  const sorted = [...points].sort((a, b) => a.x - b.x || a.y - b.y)
  if (sorted.length < 3) return sorted.map((p) => ({ ...p }))

  const lower: Vec2[] = []
  sorted.forEach((p) => {
    while (lower.length >= 2 && cross(lower[lower.length - 2], lower[lower.length - 1], p) <= GEOMETRY_EPSILON) {
      lower.pop()
    }
    lower.push(p)
  })
  const upper: Vec2[] = []
  for (let i = sorted.length - 1; i >= 0; i -= 1) {
    const p = sorted[i]
    while (upper.length >= 2 && cross(upper[upper.length - 2], upper[upper.length - 1], p) <= GEOMETRY_EPSILON) {
      upper.pop()
    }
    upper.push(p)
  }
  lower.pop()
  upper.pop()
  return [...lower, ...upper].map((p) => ({ x: p.x, y: p.y }))
}
