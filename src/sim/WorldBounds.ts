import Vec2, { type IVec2 } from '../lib/Vector2.js'
import { clamp } from '../lib/common.js'

/** Closed interval of valid body centres on each axis */
export interface AxisRange {
    readonly minX: number
    readonly maxX: number
    readonly minY: number
    readonly maxY: number
}

/**
 * Axis-aligned world rectangle plus a margin kept clear around the edges.
 *
 * A body of half-size `extent` may place its centre anywhere in
 * `[min + extent + margin, max - extent - margin]` on each axis.
 */
export class WorldBounds {
    readonly min: Readonly<IVec2>
    readonly max: Readonly<IVec2>

    constructor(min: IVec2, max: IVec2, readonly margin: number = 0) {
        this.min = Object.freeze({ x: min.x, y: min.y })
        this.max = Object.freeze({ x: max.x, y: max.y })
        Object.freeze(this)
    }

    /** Rectangle centred on the origin, the size of a window or canvas */
    static fromWindowSize(width: number, height: number, margin: number = 0): WorldBounds {
        const halfWidth = width / 2
        const halfHeight = height / 2
        return new WorldBounds(
            { x: -halfWidth, y: -halfHeight },
            { x: halfWidth, y: halfHeight },
            margin
        )
    }

    get width(): number {
        return this.max.x - this.min.x
    }

    get height(): number {
        return this.max.y - this.min.y
    }

    /** Bounds inset by `extent + margin` */
    effective(extent: number): AxisRange {
        const inset = extent + this.margin
        return {
            minX: this.min.x + inset,
            maxX: this.max.x - inset,
            minY: this.min.y + inset,
            maxY: this.max.y - inset
        }
    }

    /** True when at least one resting position exists for a body of this extent */
    fits(extent: number): boolean {
        const span = 2 * (extent + this.margin)
        return this.width >= span && this.height >= span
    }

    contains(position: IVec2, extent: number = 0): boolean {
        const r = this.effective(extent)
        return position.x >= r.minX
            && position.x <= r.maxX
            && position.y >= r.minY
            && position.y <= r.maxY
    }

    clampPosition(position: IVec2, extent: number = 0): Vec2 {
        const r = this.effective(extent)
        return new Vec2(
            clamp(position.x, r.minX, r.maxX),
            clamp(position.y, r.minY, r.maxY)
        )
    }
}
