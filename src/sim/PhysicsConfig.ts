import { WorldBounds } from './WorldBounds.js'
import type { RGB } from '../lib/common.js'

/**
 * Physics constants and default tuning.
 * Centralized for easy tuning and experimentation.
 */
export const PhysicsDefaults = Object.freeze({
    /** Fixed simulation rate (Hz) */
    tickRate: 60,

    /** Velocity retained per tick, in (0, 1]. 1 = no damping */
    friction: 0.95,

    /** Acceleration from held movement keys (units/s²) */
    inputForce: 500,

    /** Input force multiplier per held boost modifier */
    boostMultiplier: 3,

    /** Fraction of speed kept on a boundary reflection. 1 = perfectly elastic */
    restitution: 1.0,

    /** Half-size of the cube (50×50) */
    extent: 25,

    /** World rectangle, centred on the origin */
    worldWidth: 1280,
    worldHeight: 720,
    margin: 15,

    /** Backlog cap for a single FixedStepper.advance() call */
    maxStepsPerAdvance: 240,

    tint: Object.freeze({
        base: Object.freeze({ r: 0.25, g: 0.25, b: 0.75 }),
        sprint: Object.freeze({ r: 0.9, g: 0.25, b: 0.75 }),
        surge: Object.freeze({ r: 0.9, g: 0.9, b: 0.75 })
    })
} as const)

export type ConfigErrorKind =
    | 'InvalidFriction'
    | 'DegenerateBounds'
    | 'InvalidTimestep'
    | 'InvalidParameter'

export class ConfigError extends Error {
    constructor(readonly kind: ConfigErrorKind, message: string) {
        super(message)
        this.name = 'ConfigError'
    }
}

export interface BodyTints {
    readonly base: Readonly<RGB>
    readonly sprint: Readonly<RGB>
    readonly surge: Readonly<RGB>
}

/** Immutable simulation configuration, built once at startup */
export interface SimConfig {
    readonly tickRate: number
    /** Fixed timestep in seconds, 1 / tickRate */
    readonly dt: number
    readonly friction: number
    readonly inputForce: number
    readonly boostMultiplier: number
    readonly restitution: number
    readonly extent: number
    readonly bounds: WorldBounds
    readonly maxStepsPerAdvance: number
    readonly tints: BodyTints
}

export interface SimConfigOptions {
    tickRate?: number
    friction?: number
    inputForce?: number
    boostMultiplier?: number
    restitution?: number
    extent?: number
    bounds?: WorldBounds
    maxStepsPerAdvance?: number
}

export function validateFriction(friction: number): void {
    if (!(friction > 0 && friction <= 1)) {
        throw new ConfigError('InvalidFriction', `Friction must be in (0, 1], got ${friction}`)
    }
}

function requireFinite(name: string, value: number, min: number, max: number = Infinity): void {
    if (!Number.isFinite(value) || value < min || value > max) {
        const range = max === Infinity ? `>= ${min}` : `in [${min}, ${max}]`
        throw new ConfigError('InvalidParameter', `${name} must be finite and ${range}, got ${value}`)
    }
}

/**
 * Merge overrides onto the defaults, validate and freeze.
 * Throws ConfigError before any tick can run with a bad value.
 */
export function createSimConfig(options: SimConfigOptions = {}): SimConfig {
    const tickRate = options.tickRate ?? PhysicsDefaults.tickRate
    if (!Number.isFinite(tickRate) || tickRate <= 0) {
        throw new ConfigError('InvalidTimestep', `Tick rate must be a positive number, got ${tickRate}`)
    }

    const friction = options.friction ?? PhysicsDefaults.friction
    validateFriction(friction)

    const inputForce = options.inputForce ?? PhysicsDefaults.inputForce
    const boostMultiplier = options.boostMultiplier ?? PhysicsDefaults.boostMultiplier
    const restitution = options.restitution ?? PhysicsDefaults.restitution
    const extent = options.extent ?? PhysicsDefaults.extent
    const maxStepsPerAdvance = options.maxStepsPerAdvance ?? PhysicsDefaults.maxStepsPerAdvance
    requireFinite('Input force', inputForce, 0)
    requireFinite('Boost multiplier', boostMultiplier, 1)
    requireFinite('Restitution', restitution, 0, 1)
    requireFinite('Extent', extent, 0)
    if (!Number.isInteger(maxStepsPerAdvance) || maxStepsPerAdvance < 1) {
        throw new ConfigError('InvalidParameter', `Max steps per advance must be a positive integer, got ${maxStepsPerAdvance}`)
    }

    const bounds = options.bounds ?? WorldBounds.fromWindowSize(
        PhysicsDefaults.worldWidth,
        PhysicsDefaults.worldHeight,
        PhysicsDefaults.margin
    )
    requireFinite('Margin', bounds.margin, 0)
    if (!bounds.fits(extent)) {
        throw new ConfigError(
            'DegenerateBounds',
            `World ${bounds.width}×${bounds.height} leaves no room for a body of extent ${extent} with margin ${bounds.margin}`
        )
    }

    return Object.freeze({
        tickRate,
        dt: 1 / tickRate,
        friction,
        inputForce,
        boostMultiplier,
        restitution,
        extent,
        bounds,
        maxStepsPerAdvance,
        tints: PhysicsDefaults.tint
    })
}
