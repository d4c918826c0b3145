export { PhysicsDefaults, ConfigError, createSimConfig, validateFriction } from './PhysicsConfig.js'
export type { SimConfig, SimConfigOptions, ConfigErrorKind, BodyTints } from './PhysicsConfig.js'
export { WorldBounds } from './WorldBounds.js'
export type { AxisRange } from './WorldBounds.js'
export { NO_INPUT, inputOf } from './types.js'
export type { Direction, InputSnapshot, BodyState } from './types.js'
export { mapInput, inputDirection, inputForce, inputTint } from './InputMapper.js'
export type { MappedInput } from './InputMapper.js'
export { integrate } from './Integrator.js'
export { resolveBoundary } from './BoundaryResolver.js'
export type { Axis, BoundarySide, BoundaryContact, BoundaryResult } from './BoundaryResolver.js'
export { tick } from './tick.js'
export { FixedStepper } from './FixedStepper.js'
