import { mapInput } from './InputMapper.js'
import { integrate } from './Integrator.js'
import { resolveBoundary } from './BoundaryResolver.js'
import type { SimConfig } from './PhysicsConfig.js'
import type { BodyState, InputSnapshot } from './types.js'

/**
 * One fixed simulation tick: input → integrate → boundary.
 * Returns a new state; `state` is left untouched.
 */
export function tick(state: BodyState, input: InputSnapshot, config: SimConfig, dt: number = config.dt): BodyState {
    const { acceleration } = mapInput(input, config)
    const moved = integrate({ ...state, acceleration }, dt)
    const resolved = resolveBoundary(
        moved.position,
        moved.velocity,
        config.bounds.effective(state.extent),
        config.restitution
    )

    return {
        ...moved,
        position: resolved.position,
        velocity: resolved.velocity
    }
}
