import Vec2, { type IVec2 } from '../lib/Vector2.js'
import type { AxisRange } from './WorldBounds.js'

export type Axis = 'x' | 'y'
export type BoundarySide = 'min' | 'max'

export interface BoundaryContact {
    axis: Axis
    side: BoundarySide
    /** False when the body was clamped with no outbound velocity to flip */
    reflected: boolean
    /** Speed along the axis before reflection */
    speed: number
}

export interface BoundaryResult {
    position: Vec2
    velocity: Vec2
    contacts: BoundaryContact[]
}

interface AxisResult {
    p: number
    v: number
    contact?: BoundaryContact
}

function resolveAxis(axis: Axis, p: number, v: number, lower: number, upper: number, restitution: number): AxisResult {
    if (p < lower) {
        const reflected = v < 0
        return {
            p: lower,
            v: reflected ? -v * restitution : v,
            contact: { axis, side: 'min', reflected, speed: Math.abs(v) }
        }
    }
    if (p > upper) {
        const reflected = v > 0
        return {
            p: upper,
            v: reflected ? -v * restitution : v,
            contact: { axis, side: 'max', reflected, speed: Math.abs(v) }
        }
    }
    return { p, v }
}

/**
 * Clamp a tentative position into `range` and reflect the velocity
 * component that points out of it. Axes are handled independently,
 * so a corner hit reflects both components in the same call.
 */
export function resolveBoundary(
    position: IVec2,
    velocity: IVec2,
    range: AxisRange,
    restitution: number = 1
): BoundaryResult {
    const x = resolveAxis('x', position.x, velocity.x, range.minX, range.maxX, restitution)
    const y = resolveAxis('y', position.y, velocity.y, range.minY, range.maxY, restitution)

    const contacts: BoundaryContact[] = []
    if (x.contact) contacts.push(x.contact)
    if (y.contact) contacts.push(y.contact)

    return {
        position: new Vec2(x.p, y.p),
        velocity: new Vec2(x.v, y.v),
        contacts
    }
}
