import type { System } from '../System.js'
import type { World } from '../World.js'
import { Position, Velocity, Extent } from '../Components.js'
import { resolveBoundary } from '../../sim/BoundaryResolver.js'
import type { SimConfig } from '../../sim/PhysicsConfig.js'

/**
 * Keeps bodies inside the world: clamps position to the bounds inset by
 * the body's extent plus margin and reflects outbound velocity.
 * Raises a `boundaryContact` event per axis touched.
 */
export function createBoundaryCollisionSystem(config: SimConfig): System {
    return {
        name: 'BoundaryCollision',
        phase: 'simulate',

        update(world: World): void {
            for (const id of world.query(Position, Velocity)) {
                const pos = world.getComponent(id, Position)
                const vel = world.getComponent(id, Velocity)
                if (!pos || !vel) continue

                const range = config.bounds.effective(world.getComponent(id, Extent) ?? 0)
                const result = resolveBoundary(pos, vel, range, config.restitution)
                if (result.contacts.length === 0) continue

                pos.set(result.position)
                vel.set(result.velocity)
                for (const contact of result.contacts) {
                    world.emit('boundaryContact', { entity: id, tick: world.tick, contact })
                }
            }
        }
    }
}
