import type { System } from '../System.js'
import type { World } from '../World.js'
import { Acceleration, Color, Controller } from '../Components.js'
import { mapInput } from '../../sim/InputMapper.js'
import type { SimConfig } from '../../sim/PhysicsConfig.js'

/**
 * Samples each controlled body's input source once per tick and writes the
 * resulting acceleration (and tint) for the integrator to consume.
 */
export function createInputSystem(config: SimConfig): System {
    return {
        name: 'Input',
        phase: 'simulate',

        update(world: World): void {
            for (const id of world.query(Controller, Acceleration)) {
                const source = world.getComponent(id, Controller)
                const accel = world.getComponent(id, Acceleration)
                if (!source || !accel) continue

                const { acceleration, tint } = mapInput(source.sample(), config)
                accel.set(acceleration)
                if (world.hasComponent(id, Color)) {
                    world.addComponent(id, Color, tint)
                }
            }
        }
    }
}
