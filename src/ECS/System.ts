import type { World } from './World.js'

/**
 * 'simulate' systems run in registration order once per fixed tick and may
 * mutate physics components. 'visual' systems run once per display frame with
 * the frame's wall-clock delta and only read world state.
 */
export type SystemPhase = 'simulate' | 'visual'

export interface System {
    /** Unique within a world; used by unregisterSystem */
    name: string

    phase: SystemPhase

    /** Called when the system is registered */
    init?(world: World): void

    /** Called when the system is unregistered */
    dispose?(world: World): void

    /** dt is the fixed timestep for 'simulate', frame seconds for 'visual' */
    update(world: World, dt: number): void
}

/**
 * Identity helper that checks a system literal while keeping any extra
 * members it declares.
 */
export function createSystem<T extends System>(config: T): T {
    return config
}
