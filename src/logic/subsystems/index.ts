export { Subsystem, type ShipHandle, type FieldAccessor, type FieldTable } from './subsystem'
export { Rudder } from './rudder'
export { Engine, type EngineOptions } from './engine'
export { Navigation } from './navigation'
export { Weapons } from './weapons'
