import Vec2 from '../lib/Vector2.js'
import type { RGB } from '../lib/common.js'
import type { SimConfig } from './PhysicsConfig.js'
import type { Direction, InputSnapshot } from './types.js'

const AXIS: Record<Direction, { x: number; y: number }> = {
    up: { x: 0, y: 1 },
    down: { x: 0, y: -1 },
    left: { x: -1, y: 0 },
    right: { x: 1, y: 0 }
}

export interface MappedInput {
    acceleration: Vec2
    tint: Readonly<RGB>
}

/** Unit (or zero) direction from the held keys. Opposite keys cancel. */
export function inputDirection(held: ReadonlySet<Direction>): Vec2 {
    const dir = Vec2.zero()
    for (const d of held) {
        dir.add(AXIS[d])
    }
    // Diagonals get the same magnitude as a single axis
    return dir.normalize()
}

export function inputForce(input: InputSnapshot, config: SimConfig): number {
    let force = config.inputForce
    if (input.sprint) force *= config.boostMultiplier
    if (input.surge) force *= config.boostMultiplier
    return force
}

export function inputTint(input: InputSnapshot, config: SimConfig): Readonly<RGB> {
    if (input.surge) return config.tints.surge
    if (input.sprint) return config.tints.sprint
    return config.tints.base
}

/** Map one tick of held input to an acceleration vector and a display tint */
export function mapInput(input: InputSnapshot, config: SimConfig): MappedInput {
    return {
        acceleration: inputDirection(input.held).scale(inputForce(input, config)),
        tint: inputTint(input, config)
    }
}
