import type { Polygon, Pose, Vec2 } from '@/types/sim'
import type { EngineOptions } from '@/logic/subsystems/engine'
import { appEnv } from '@/config/env'

const HULL_WIDTH_M = 20
const HULL_LENGTH_M = 154

/**
 * Battleship outline, bow along +y, shifted so the bounding box is centred
 * on the origin (the ship model re-centres it on the area centroid).
 */
export const battleshipOutline: Vec2[] = [
  { x: HULL_WIDTH_M / 2, y: HULL_LENGTH_M },
  { x: HULL_WIDTH_M * 0.8, y: HULL_LENGTH_M * 0.87 },
  { x: HULL_WIDTH_M, y: HULL_LENGTH_M * 0.375 },
  { x: HULL_WIDTH_M * 0.9, y: HULL_LENGTH_M * 0.15 },
  { x: HULL_WIDTH_M * 0.8, y: 0 },
  { x: HULL_WIDTH_M * 0.2, y: 0 },
  { x: HULL_WIDTH_M * 0.1, y: HULL_LENGTH_M * 0.15 },
  { x: 0, y: HULL_LENGTH_M * 0.375 },
  { x: HULL_WIDTH_M * 0.2, y: HULL_LENGTH_M * 0.87 },
].map((p) => ({ x: p.x - HULL_WIDTH_M / 2, y: p.y - HULL_LENGTH_M / 2 }))

// Explicitly closed ring; the world drops the repeated vertex.
export const defaultObstacles: Polygon[] = [
  [
    { x: 260, y: 320 },
    { x: 365, y: 350 },
    { x: 270, y: 440 },
    { x: 260, y: 320 },
  ],
]

export const patrolStart: Pose = { x: 100, y: 100, headingDeg: 270 }

export const patrolRoute: Vec2[] = [
  { x: 400, y: 100 },
  { x: 400, y: 400 },
  { x: 100, y: 400 },
  { x: 150, y: 150 },
]

export type ScenarioConfig = {
  shipName: string
  hull: Vec2[]
  clearance: number
  engine: EngineOptions
  obstacles: Polygon[]
  start: Pose
  route: Vec2[]
  /** Speed ordered once the ship is assembled; 0 leaves it idle. */
  initialSpeed: number
}

export const defaultScenario = (): ScenarioConfig => ({
  shipName: 'battleship',
  hull: battleshipOutline.map((p) => ({ ...p })),
  clearance: appEnv.safetyClearanceM,
  engine: {
    minSpeed: appEnv.engineMinSpeed,
    maxSpeed: appEnv.engineMaxSpeed,
    acceleration: appEnv.engineAcceleration,
  },
  obstacles: defaultObstacles.map((obstacle) => obstacle.map((p) => ({ ...p }))),
  start: { ...patrolStart },
  route: patrolRoute.map((p) => ({ ...p })),
  initialSpeed: 10,
})
