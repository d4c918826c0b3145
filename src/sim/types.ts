import type Vec2 from '../lib/Vector2.js'

export type Direction = 'up' | 'down' | 'left' | 'right'

/** Held input, sampled once per tick */
export interface InputSnapshot {
    readonly held: ReadonlySet<Direction>
    /** Sprint modifier (Shift) */
    readonly sprint: boolean
    /** Surge modifier (primary pointer button) */
    readonly surge: boolean
}

export const NO_INPUT: InputSnapshot = Object.freeze({
    held: new Set<Direction>(),
    sprint: false,
    surge: false
})

export function inputOf(directions: Iterable<Direction>, modifiers: { sprint?: boolean; surge?: boolean } = {}): InputSnapshot {
    return {
        held: new Set(directions),
        sprint: modifiers.sprint ?? false,
        surge: modifiers.surge ?? false
    }
}

/** Everything the integrator needs to know about one movable body */
export interface BodyState {
    readonly position: Vec2
    readonly velocity: Vec2
    /** Per-tick input acceleration, zero outside the tick that set it */
    readonly acceleration: Vec2
    readonly friction: number
    readonly extent: number
}
