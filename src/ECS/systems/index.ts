import type { System } from '../System.js'
import type { SimConfig } from '../../sim/PhysicsConfig.js'
import { createInputSystem } from './InputSystem.js'
import { PhysicsIntegrationSystem } from './PhysicsIntegration.js'
import { createBoundaryCollisionSystem } from './BoundaryCollision.js'

export { createInputSystem } from './InputSystem.js'
export { PhysicsIntegrationSystem } from './PhysicsIntegration.js'
export { createBoundaryCollisionSystem } from './BoundaryCollision.js'
export { createTraceRenderer } from './TraceRenderer.js'
export type { TraceRenderer, TraceRendererOptions } from './TraceRenderer.js'

/**
 * The per-tick chain, in the only valid order:
 * input → integration → boundary.
 */
export function createPhysicsSystems(config: SimConfig): System[] {
    return [
        createInputSystem(config),
        PhysicsIntegrationSystem,
        createBoundaryCollisionSystem(config)
    ]
}
