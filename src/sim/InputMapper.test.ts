import { describe, it, expect } from 'vitest'
import { mapInput, inputDirection } from './InputMapper.js'
import { createSimConfig } from './PhysicsConfig.js'
import { inputOf, NO_INPUT, type Direction } from './types.js'

describe('InputMapper', () => {
    const config = createSimConfig()

    describe('Direction', () => {
        it('should produce zero acceleration with nothing held', () => {
            const { acceleration } = mapInput(NO_INPUT, config)
            expect(acceleration.x).toBe(0)
            expect(acceleration.y).toBe(0)
        })

        it('should map single directions to the input force on one axis', () => {
            const right = mapInput(inputOf(['right']), config).acceleration
            expect(right.x).toBe(500)
            expect(right.y).toBe(0)

            const left = mapInput(inputOf(['left']), config).acceleration
            expect(left.x).toBe(-500)
            expect(left.y).toBe(0)

            const up = mapInput(inputOf(['up']), config).acceleration
            expect(up.x).toBe(0)
            expect(up.y).toBe(500)

            const down = mapInput(inputOf(['down']), config).acceleration
            expect(down.x).toBe(0)
            expect(down.y).toBe(-500)
        })

        it('should normalize diagonals to the same magnitude as an axis', () => {
            const { acceleration } = mapInput(inputOf(['up', 'right']), config)

            expect(acceleration.len()).toBeCloseTo(500, 10)
            expect(acceleration.x).toBeCloseTo(500 / Math.SQRT2, 10)
            expect(acceleration.y).toBeCloseTo(500 / Math.SQRT2, 10)
        })

        it('should cancel opposite directions', () => {
            const { acceleration } = mapInput(inputOf(['left', 'right']), config)
            expect(acceleration.isZero()).toBe(true)

            const all = mapInput(inputOf(['up', 'down', 'left', 'right']), config).acceleration
            expect(all.isZero()).toBe(true)
        })

        it('should keep the unpaired axis when three directions are held', () => {
            const dir = inputDirection(new Set<Direction>(['up', 'down', 'left']))
            expect(dir.x).toBe(-1)
            expect(dir.y).toBe(0)
        })
    })

    describe('Boost', () => {
        it('should multiply the force per held modifier', () => {
            const sprint = mapInput(inputOf(['right'], { sprint: true }), config).acceleration
            expect(sprint.x).toBe(1500)

            const surge = mapInput(inputOf(['right'], { surge: true }), config).acceleration
            expect(surge.x).toBe(1500)

            const both = mapInput(inputOf(['right'], { sprint: true, surge: true }), config).acceleration
            expect(both.x).toBe(4500)
        })

        it('should not create movement from modifiers alone', () => {
            const { acceleration } = mapInput(inputOf([], { sprint: true, surge: true }), config)
            expect(acceleration.isZero()).toBe(true)
        })

        it('should pick the tint from the strongest modifier', () => {
            expect(mapInput(NO_INPUT, config).tint).toEqual({ r: 0.25, g: 0.25, b: 0.75 })
            expect(mapInput(inputOf([], { sprint: true }), config).tint).toEqual({ r: 0.9, g: 0.25, b: 0.75 })
            expect(mapInput(inputOf([], { surge: true }), config).tint).toEqual({ r: 0.9, g: 0.9, b: 0.75 })
            expect(mapInput(inputOf([], { sprint: true, surge: true }), config).tint).toEqual({ r: 0.9, g: 0.9, b: 0.75 })
        })
    })

    it('should respect a configured input force', () => {
        const custom = createSimConfig({ inputForce: 120 })
        const { acceleration } = mapInput(inputOf(['down', 'left']), custom)
        expect(acceleration.len()).toBeCloseTo(120, 10)
        expect(acceleration.x).toBeLessThan(0)
        expect(acceleration.y).toBeLessThan(0)
    })
})
