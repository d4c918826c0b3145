import type { System } from '../System.js'
import type { World } from '../World.js'
import { Position, Velocity, Acceleration, Friction, Extent } from '../Components.js'
import { integrate } from '../../sim/Integrator.js'

/**
 * Applies friction and acceleration to velocity, then velocity to position,
 * and clears the acceleration for the next tick.
 */
export const PhysicsIntegrationSystem: System = {
    name: 'PhysicsIntegration',
    phase: 'simulate',

    update(world: World, dt: number): void {
        for (const id of world.query(Position, Velocity, Acceleration, Friction)) {
            const pos = world.getComponent(id, Position)
            const vel = world.getComponent(id, Velocity)
            const accel = world.getComponent(id, Acceleration)
            const friction = world.getComponent(id, Friction)
            if (!pos || !vel || !accel || friction === undefined) continue

            const next = integrate({
                position: pos,
                velocity: vel,
                acceleration: accel,
                friction,
                extent: world.getComponent(id, Extent) ?? 0
            }, dt)

            pos.set(next.position)
            vel.set(next.velocity)
            accel.set(next.acceleration)
        }
    }
}
