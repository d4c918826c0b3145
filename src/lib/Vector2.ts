// 2D Vector class for physics and rendering

export interface IVec2 {
    x: number
    y: number
}

export default class Vec2 implements IVec2 {
    constructor(
        public x: number,
        public y: number
    ) {}

    set(x: number, y: number): Vec2
    set(v: IVec2): Vec2
    set(vx: IVec2 | number, y?: number): Vec2 {
        if (typeof vx === 'object') {
            this.x = vx.x
            this.y = vx.y
        } else {
            this.x = vx
            this.y = y ?? vx
        }
        return this
    }

    copy(): Vec2 {
        return new Vec2(this.x, this.y)
    }

    add(v: IVec2): Vec2 {
        this.x += v.x
        this.y += v.y
        return this
    }

    scale(s: number): Vec2 {
        this.x *= s
        this.y *= s
        return this
    }

    normalize(): Vec2 {
        const l = this.len()
        if (l > 0) {
            this.scale(1 / l)
        }
        return this
    }

    len(): number {
        return Math.sqrt(this.x * this.x + this.y * this.y)
    }

    isZero(): boolean {
        return this.x === 0 && this.y === 0
    }

    // ###################################################
    //    STATIC FUNCTIONS - always returns a new vector
    // ###################################################

    static copy(v: IVec2): Vec2 {
        return new Vec2(v.x, v.y)
    }

    static add(a: IVec2, b: IVec2): Vec2 {
        return new Vec2(a.x + b.x, a.y + b.y)
    }

    static scale(a: IVec2, s: number): Vec2 {
        return new Vec2(a.x * s, a.y * s)
    }

    static len(a: IVec2): number {
        return Math.sqrt(a.x * a.x + a.y * a.y)
    }

    static zero(): Vec2 {
        return new Vec2(0, 0)
    }
}
