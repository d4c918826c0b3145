import type Vec2 from '../lib/Vector2.js'
import type { RGB } from '../lib/common.js'
import type { InputSource } from '../input/InputSource.js'

// Component type symbols for type-safe component access
export const Position = Symbol('Position')
export const Velocity = Symbol('Velocity')
export const Acceleration = Symbol('Acceleration')
export const Friction = Symbol('Friction')
export const Extent = Symbol('Extent')
export const Color = Symbol('Color')
export const Controller = Symbol('Controller')

// Type mapping from symbols to their data types
export interface ComponentTypes {
    [Position]: Vec2
    [Velocity]: Vec2        // units / second
    [Acceleration]: Vec2    // this tick only
    [Friction]: number      // velocity retained per tick, (0, 1]
    [Extent]: number        // half-size of the bounding box
    [Color]: Readonly<RGB>  // linear RGB (0..1)
    [Controller]: InputSource
}

// Helper type for component keys
export type ComponentKey = keyof ComponentTypes

// All component symbols for iteration
export const ALL_COMPONENTS: ComponentKey[] = [
    Position,
    Velocity,
    Acceleration,
    Friction,
    Extent,
    Color,
    Controller
]
