import type { InputSnapshot } from '../sim/types.js'

/**
 * Anything that can report held input. The Input system samples each
 * source exactly once per simulation tick.
 */
export interface InputSource {
    sample(): InputSnapshot
}
