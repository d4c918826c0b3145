import Vec2 from '../lib/Vector2.js'
import type { BodyState } from './types.js'

/**
 * Semi-implicit Euler step:
 *   v' = v * friction + a * dt
 *   p' = p + v' * dt
 *
 * Friction damps the previous velocity before the new acceleration is added.
 * The returned state has its acceleration cleared.
 */
export function integrate(body: BodyState, dt: number): BodyState {
    const velocity = Vec2.scale(body.velocity, body.friction).add(Vec2.scale(body.acceleration, dt))
    const position = Vec2.add(body.position, Vec2.scale(velocity, dt))

    return {
        ...body,
        position,
        velocity,
        acceleration: Vec2.zero()
    }
}
