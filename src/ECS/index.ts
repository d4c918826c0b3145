// Core ECS exports
export { World } from './World.js'
export type { EntityId, WorldEvent, WorldEventData, WorldOptions, BodySnapshot } from './World.js'
export { createSystem } from './System.js'
export type { System, SystemPhase } from './System.js'
export { spawnCube } from './Cube.js'
export type { CubeOptions } from './Cube.js'

// Components
export {
    Position,
    Velocity,
    Acceleration,
    Friction,
    Extent,
    Color,
    Controller,
    ALL_COMPONENTS
} from './Components.js'
export type { ComponentTypes, ComponentKey } from './Components.js'

// Systems
export {
    createPhysicsSystems,
    createInputSystem,
    PhysicsIntegrationSystem,
    createBoundaryCollisionSystem,
    createTraceRenderer
} from './systems/index.js'
export type { TraceRenderer, TraceRendererOptions } from './systems/index.js'
