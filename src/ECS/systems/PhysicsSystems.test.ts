import { describe, it, expect, beforeEach, vi } from 'vitest'
import { World } from '../World.js'
import { Position, Velocity, Acceleration, Color } from '../Components.js'
import { spawnCube } from '../Cube.js'
import { createPhysicsSystems } from './index.js'
import { createSimConfig } from '../../sim/PhysicsConfig.js'
import { tick } from '../../sim/tick.js'
import type { BodyState } from '../../sim/types.js'
import { KeyboardState } from '../../input/KeyboardState.js'
import { ScriptedInput, type Scenario } from '../../input/Scenario.js'
import Vec2 from '../../lib/Vector2.js'
import { AppLog } from '../../AppLog.js'

describe('Physics systems', () => {
    const config = createSimConfig()
    let world: World
    let keyboard: KeyboardState

    beforeEach(() => {
        AppLog.echo = false
        world = new World({ tickRate: config.tickRate })
        world.registerSystems(createPhysicsSystems(config))
        keyboard = new KeyboardState()
    })

    it('should register in input → integration → boundary order', () => {
        expect(world.getSystemNames('simulate')).toEqual(['Input', 'PhysicsIntegration', 'BoundaryCollision'])
    })

    it('should move a cube one tick to the right', () => {
        const cube = spawnCube(world, config, { input: keyboard })
        keyboard.press('KeyD')
        world.step()

        const pos = world.getComponent(cube, Position)
        const vel = world.getComponent(cube, Velocity)
        expect(vel?.x).toBeCloseTo(25 / 3, 10)
        expect(pos?.x).toBeCloseTo(25 / 180, 10)
        expect(pos?.y).toBe(0)
    })

    it('should not carry acceleration into the next tick', () => {
        const cube = spawnCube(world, config, { input: keyboard })
        keyboard.press('ArrowUp')
        world.step()
        expect(world.getComponent(cube, Acceleration)?.isZero()).toBe(true)

        keyboard.release('ArrowUp')
        world.step()
        const vel = world.getComponent(cube, Velocity)
        // Only friction acted on the second tick
        expect(vel?.y).toBeCloseTo((25 / 3) * 0.95, 10)
    })

    it('should tint the cube while boosting', () => {
        const cube = spawnCube(world, config, { input: keyboard })
        expect(world.getComponent(cube, Color)).toEqual({ r: 0.25, g: 0.25, b: 0.75 })

        keyboard.press('ShiftLeft')
        world.step()
        expect(world.getComponent(cube, Color)).toEqual({ r: 0.9, g: 0.25, b: 0.75 })

        keyboard.pointerDown()
        world.step()
        expect(world.getComponent(cube, Color)).toEqual({ r: 0.9, g: 0.9, b: 0.75 })
    })

    it('should bounce a coasting cube off the wall and raise an event', () => {
        const contacts = vi.fn()
        world.on('boundaryContact', contacts)

        const cube = spawnCube(world, config, {
            position: { x: 599.5, y: 0 },
            velocity: { x: 50, y: 0 },
            friction: 1
        })
        world.step()

        expect(world.getComponent(cube, Position)?.x).toBe(600)
        expect(world.getComponent(cube, Velocity)?.x).toBe(-50)
        expect(contacts).toHaveBeenCalledWith({
            entity: cube,
            tick: 0,
            contact: { axis: 'x', side: 'max', reflected: true, speed: 50 }
        })
    })

    it('should match the pure tick function exactly', () => {
        const scenario: Scenario = {
            name: 'zigzag',
            segments: [
                { ticks: 90, keys: ['KeyD', 'KeyW', 'ShiftRight'] },
                { ticks: 60, keys: ['KeyA'], pointer: true },
                { ticks: 40, keys: [] },
                { ticks: 80, keys: ['KeyS', 'KeyL'] }
            ]
        }
        const cube = spawnCube(world, config, { input: new ScriptedInput(scenario) })
        const pureInput = new ScriptedInput(scenario)
        let state: BodyState = {
            position: Vec2.zero(),
            velocity: Vec2.zero(),
            acceleration: Vec2.zero(),
            friction: config.friction,
            extent: config.extent
        }

        for (let i = 0; i < 300; i++) {
            world.step()
            state = tick(state, pureInput.sample(), config)
        }

        expect(world.getComponent(cube, Position)).toEqual(state.position)
        expect(world.getComponent(cube, Velocity)).toEqual(state.velocity)
    })

    it('should leave bodies without a controller to coast', () => {
        const cube = spawnCube(world, config, { velocity: { x: 100, y: 0 } })
        world.step()

        expect(world.getComponent(cube, Velocity)?.x).toBeCloseTo(95, 10)
    })
})
