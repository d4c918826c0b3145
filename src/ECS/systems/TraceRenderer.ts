import { createSystem, type System } from '../System.js'
import type { BodySnapshot, World } from '../World.js'
import { Position, Velocity } from '../Components.js'
import { AppLog } from '../../AppLog.js'
import { color } from '../../lib/common.js'

export interface TraceRendererOptions {
    /** Seconds of display time between log lines; 0 logs every frame, Infinity never */
    logInterval?: number
}

export interface TraceRenderer extends System {
    /** Snapshots read on the most recent frame */
    readonly latest: readonly BodySnapshot[]
    /** Number of frames rendered */
    readonly frames: number
}

export function formatSnapshot(s: BodySnapshot): string {
    const p = `(${s.position.x.toFixed(2)}, ${s.position.y.toFixed(2)})`
    const v = `(${s.velocity.x.toFixed(2)}, ${s.velocity.y.toFixed(2)})`
    const tint = s.color ? ` ${color(s.color)}` : ''
    return `tick ${s.tick} body ${s.entity} pos ${p} vel ${v}${tint}`
}

/**
 * Headless stand-in for a renderer. Reads frozen body snapshots once per
 * display frame and logs them at a fixed display-time interval.
 */
export function createTraceRenderer(options: TraceRendererOptions = {}): TraceRenderer {
    const logInterval = options.logInterval ?? 1
    let latest: BodySnapshot[] = []
    let frames = 0
    let sinceLog = 0

    const system = createSystem({
        name: 'TraceRenderer',
        phase: 'visual',

        init(): void {
            latest = []
            frames = 0
            sinceLog = 0
        },

        update(world: World, dt: number): void {
            latest = []
            for (const id of world.query(Position, Velocity)) {
                const snapshot = world.readBody(id)
                if (snapshot) latest.push(snapshot)
            }
            frames++

            sinceLog += dt
            if (sinceLog >= logInterval) {
                sinceLog = 0
                for (const s of latest) {
                    AppLog.info(formatSnapshot(s))
                }
            }
        }
    })

    return {
        ...system,
        get latest() {
            return latest
        },
        get frames() {
            return frames
        }
    }
}
