import { describe, it, expect } from 'vitest'
import { resolveBoundary } from './BoundaryResolver.js'
import type { AxisRange } from './WorldBounds.js'

const RANGE: AxisRange = { minX: -600, maxX: 600, minY: -320, maxY: 320 }

describe('BoundaryResolver', () => {
    it('should leave an in-bounds body untouched', () => {
        const result = resolveBoundary({ x: 10, y: -20 }, { x: 5, y: -5 }, RANGE)

        expect(result.position).toEqual({ x: 10, y: -20 })
        expect(result.velocity).toEqual({ x: 5, y: -5 })
        expect(result.contacts).toEqual([])
    })

    it('should treat a body exactly on the bound as inside', () => {
        const result = resolveBoundary({ x: 600, y: 0 }, { x: 50, y: 0 }, RANGE)

        expect(result.position.x).toBe(600)
        expect(result.velocity.x).toBe(50)
        expect(result.contacts).toHaveLength(0)
    })

    it('should clamp to the upper bound and flip outbound velocity', () => {
        const result = resolveBoundary({ x: 595 + 50 / 6, y: 0 }, { x: 50, y: 0 }, RANGE)

        expect(result.position.x).toBe(600)
        expect(result.velocity.x).toBe(-50)
        expect(result.contacts).toEqual([
            { axis: 'x', side: 'max', reflected: true, speed: 50 }
        ])
    })

    it('should clamp to the lower bound and flip outbound velocity', () => {
        const result = resolveBoundary({ x: -605, y: 10 }, { x: -30, y: 5 }, RANGE)

        expect(result.position).toEqual({ x: -600, y: 10 })
        expect(result.velocity).toEqual({ x: 30, y: 5 })
        expect(result.contacts).toEqual([
            { axis: 'x', side: 'min', reflected: true, speed: 30 }
        ])
    })

    it('should reflect both axes on a corner hit', () => {
        const result = resolveBoundary({ x: 610, y: -330 }, { x: 40, y: -20 }, RANGE)

        expect(result.position).toEqual({ x: 600, y: -320 })
        expect(result.velocity).toEqual({ x: -40, y: 20 })
        expect(result.contacts.map(c => `${c.axis}-${c.side}`)).toEqual(['x-max', 'y-min'])
    })

    it('should clamp without reflecting when velocity is zero', () => {
        const result = resolveBoundary({ x: -601, y: 0 }, { x: 0, y: 0 }, RANGE)

        expect(result.position.x).toBe(-600)
        expect(result.velocity.x).toBe(0)
        expect(result.contacts).toEqual([
            { axis: 'x', side: 'min', reflected: false, speed: 0 }
        ])
    })

    it('should not flip a velocity already heading back inside', () => {
        const result = resolveBoundary({ x: 0, y: 325 }, { x: 0, y: -10 }, RANGE)

        expect(result.position.y).toBe(320)
        expect(result.velocity.y).toBe(-10)
        expect(result.contacts[0].reflected).toBe(false)
    })

    it('should preserve speed on reflection with restitution 1', () => {
        const cases = [
            { p: { x: 700, y: 0 }, v: { x: 123.5, y: 7 } },
            { p: { x: -650, y: 400 }, v: { x: -0.25, y: 88 } },
            { p: { x: 0, y: -999 }, v: { x: 3, y: -1e4 } }
        ]
        for (const { p, v } of cases) {
            const result = resolveBoundary(p, v, RANGE)
            expect(Math.abs(result.velocity.x)).toBe(Math.abs(v.x))
            expect(Math.abs(result.velocity.y)).toBe(Math.abs(v.y))
        }
    })

    it('should scale the reflected component by restitution', () => {
        const result = resolveBoundary({ x: 605, y: 0 }, { x: 40, y: 3 }, RANGE, 0.5)

        expect(result.velocity.x).toBe(-20)
        expect(result.velocity.y).toBe(3)
    })
})
