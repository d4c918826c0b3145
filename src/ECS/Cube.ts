import Vec2, { type IVec2 } from '../lib/Vector2.js'
import { ConfigError, validateFriction, type SimConfig } from '../sim/PhysicsConfig.js'
import type { InputSource } from '../input/InputSource.js'
import type { EntityId, World } from './World.js'
import {
    Position,
    Velocity,
    Acceleration,
    Friction,
    Extent,
    Color,
    Controller
} from './Components.js'

export interface CubeOptions {
    position?: IVec2
    velocity?: IVec2
    /** Defaults to config.friction */
    friction?: number
    /** Defaults to config.extent */
    extent?: number
    /** Omit for a body that only coasts */
    input?: InputSource
}

/**
 * Create the movable cube with everything the physics chain reads.
 * Rejects values that would break the bounds/friction invariants.
 */
export function spawnCube(world: World, config: SimConfig, options: CubeOptions = {}): EntityId {
    const friction = options.friction ?? config.friction
    const extent = options.extent ?? config.extent
    const position = options.position ?? { x: 0, y: 0 }

    validateFriction(friction)
    if (!Number.isFinite(extent) || extent < 0) {
        throw new ConfigError('InvalidParameter', `Extent must be finite and >= 0, got ${extent}`)
    }
    if (!config.bounds.fits(extent)) {
        throw new ConfigError('DegenerateBounds', `World bounds leave no room for a body of extent ${extent}`)
    }
    if (!config.bounds.contains(position, extent)) {
        throw new ConfigError('InvalidParameter', `Start position (${position.x}, ${position.y}) is outside the world bounds`)
    }

    const id = world.createEntity()
    world.addComponent(id, Position, Vec2.copy(position))
    world.addComponent(id, Velocity, Vec2.copy(options.velocity ?? { x: 0, y: 0 }))
    world.addComponent(id, Acceleration, Vec2.zero())
    world.addComponent(id, Friction, friction)
    world.addComponent(id, Extent, extent)
    world.addComponent(id, Color, config.tints.base)
    if (options.input) {
        world.addComponent(id, Controller, options.input)
    }
    return id
}
