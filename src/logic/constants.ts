export const DEFAULT_SAFETY_CLEARANCE_M = 100 //Minimum distance kept between the hull and any obstacle
export const MARGIN_QUARTER_SEGMENTS = 16 //How many straight pieces approximate a quarter circle of the safety margin
export const RUDDER_STEP_DEG = 5 //How far one rudder press moves the heading order
export const DEFAULT_MIN_SPEED = 0 //Slowest speed the engine accepts in meters per second
export const DEFAULT_MAX_SPEED = 15 //Fastest speed the engine accepts in meters per second
export const DEFAULT_ACCELERATION = 0.5 //How fast the engine changes speed in meters per second per second
export const GEOMETRY_EPSILON = 1e-9 //Tolerance for collinearity and zero-length checks in meters
export const DIAGNOSTIC_HISTORY = 50 //How many reported events the diagnostic log keeps
