export * from '@/types/sim'
export { appEnv, type AppEnv } from '@/config/env'
export {
  battleshipOutline,
  defaultObstacles,
  defaultScenario,
  patrolRoute,
  patrolStart,
  type ScenarioConfig,
} from '@/config/scenario'
export {
  angleDegrees,
  clamp,
  degToRad,
  distanceBetween,
  formatPoints,
  normalizeDeg,
  radToDeg,
} from '@/utils/geometry'
export {
  assertPolygon,
  boundingBox,
  centerOnCentroid,
  convexHull,
  normalizePolygon,
  placePolygon,
  pointInPolygon,
  polygonCentroid,
  signedArea,
  transformPolygon,
  type BoundingBox,
  type TransformOrigin,
} from '@/logic/polygon'
export { polygonsIntersect, segmentsIntersect } from '@/logic/collision/polygonIntersect'
export { buildSafetyMargin } from '@/logic/safetyMargin'
export { advanceAlongPath, type PathStep } from '@/logic/pathFollower'
export * from '@/logic/errors'
export * from '@/logic/subsystems'
export { CommandRegistry } from '@/logic/commandRegistry'
export { ShipModel, type ShipModelOptions } from '@/logic/shipModel'
export { World } from '@/logic/world'
export { DiagnosticLog, type DiagnosticReport } from '@/state/diagnostics'
export { createShip, createWorld, type CreateShipOptions } from '@/state/factories'
export { parseCommand, type ParsedCommand } from '@/control/commands'
export { ShipController } from '@/control/shipController'
export { SimulationLoop } from '@/host/loop'
