import type { IVec2 } from '../lib/Vector2.js'
import type { RGB } from '../lib/common.js'
import { AppLog } from '../AppLog.js'
import { FixedStepper } from '../sim/FixedStepper.js'
import type { BoundaryContact } from '../sim/BoundaryResolver.js'
import {
    type ComponentKey,
    type ComponentTypes,
    ALL_COMPONENTS,
    Position,
    Velocity,
    Acceleration,
    Friction,
    Extent,
    Color,
    Controller
} from './Components.js'
import type { System } from './System.js'

export type EntityId = number

/**
 * Event types for entity lifecycle and physics contacts
 */
export type WorldEvent =
    | 'entityCreated'
    | 'entityRemoved'
    | 'componentAdded'
    | 'componentRemoved'
    | 'boundaryContact'

export interface WorldEventData {
    entityCreated: { entity: EntityId }
    entityRemoved: { entity: EntityId }
    componentAdded: { entity: EntityId; component: ComponentKey }
    componentRemoved: { entity: EntityId; component: ComponentKey }
    boundaryContact: { entity: EntityId; tick: number; contact: BoundaryContact }
}

type EventCallback<T extends WorldEvent> = (data: WorldEventData[T]) => void

type EventListeners = { [T in WorldEvent]: Set<EventCallback<T>> }

type ComponentStores = { [K in ComponentKey]: Map<EntityId, ComponentTypes[K]> }

/**
 * Read-only view of a body handed to renderers. Copies, so a renderer
 * cannot reach back into physics state.
 */
export interface BodySnapshot {
    readonly entity: EntityId
    readonly tick: number
    readonly position: Readonly<IVec2>
    readonly velocity: Readonly<IVec2>
    readonly color: Readonly<RGB> | undefined
}

/**
 * Cached query result with dirty tracking
 */
interface QueryCache {
    entities: EntityId[]
    dirty: boolean
}

export interface WorldOptions {
    /** Fixed simulation rate (Hz) */
    tickRate?: number
    /** Backlog cap for a single advance() */
    maxStepsPerAdvance?: number
}

/**
 * ECS World with typed component storage and query caching.
 *
 * Features:
 * - Type-safe component access via symbols
 * - Query caching with automatic invalidation
 * - Deferred entity removal for safe iteration
 * - Event system for lifecycle hooks and boundary contacts
 * - Dual update loops (fixed-step simulation + visual)
 */
export class World {
    private nextEntityId: EntityId = 0
    private entities = new Set<EntityId>()
    private components: ComponentStores = {
        [Position]: new Map(),
        [Velocity]: new Map(),
        [Acceleration]: new Map(),
        [Color]: new Map(),
        [Friction]: new Map(),
        [Extent]: new Map(),
        [Controller]: new Map()
    }
    private pendingRemoval = new Set<EntityId>()

    // Query cache: key is sorted component descriptions joined
    private queryCache = new Map<string, QueryCache>()

    private eventListeners: EventListeners = {
        entityCreated: new Set(),
        entityRemoved: new Set(),
        componentAdded: new Set(),
        componentRemoved: new Set(),
        boundaryContact: new Set()
    }

    // Systems
    private simulationSystems: System[] = []
    private visualSystems: System[] = []

    // Time management
    private stepper: FixedStepper
    private ticker: Ticker
    private _tick = 0
    private _lastVisualUpdate: number | null = null

    // Performance monitoring callback
    onSimTick?: (durationMs: number) => void

    constructor(options: WorldOptions = {}) {
        const tickRate = options.tickRate ?? 60
        this.stepper = new FixedStepper(
            1 / tickRate,
            (dt) => this.tickSimulation(dt),
            options.maxStepsPerAdvance
        )
        this.ticker = new Ticker(tickRate, (elapsed) => this.advance(elapsed))
    }

    // ==================== Time ====================

    /** Fixed timestep in seconds */
    get dt(): number {
        return this.stepper.dt
    }

    /** Number of completed simulation ticks */
    get tick(): number {
        return this._tick
    }

    /** Fraction of a tick waiting in the stepper, for render interpolation */
    get alpha(): number {
        return this.stepper.alpha
    }

    // ==================== Simulation Control ====================

    /** Run the simulation in real time on an interval timer */
    start(): void {
        if (this.ticker.isRunning) return
        this.ticker.start()
        AppLog.info(`Simulation started at ${Math.round(1 / this.dt)} Hz`)
    }

    stop(): void {
        if (!this.ticker.isRunning) return
        this.ticker.stop()
        this.stepper.reset()
        AppLog.info(`Simulation stopped after ${this._tick} ticks`)
    }

    /** Run exactly one fixed tick */
    step(): void {
        this.tickSimulation(this.dt)
    }

    /**
     * Feed elapsed wall time (seconds) to the fixed stepper.
     * Returns the number of ticks run.
     */
    advance(elapsed: number): number {
        return this.stepper.advance(elapsed)
    }

    private tickSimulation(dt: number): void {
        const start = performance.now()
        for (const system of this.simulationSystems) {
            system.update(this, dt)
        }
        this._tick++
        this.flush()
        if (this.onSimTick) {
            this.onSimTick(performance.now() - start)
        }
    }

    /**
     * Run visual systems. Call between ticks, once per display frame.
     */
    updateVisuals(now: number = performance.now()): void {
        const dt = this._lastVisualUpdate === null ? 0 : (now - this._lastVisualUpdate) / 1000
        this._lastVisualUpdate = now

        for (const system of this.visualSystems) {
            system.update(this, dt)
        }
    }

    // ==================== Entity Management ====================

    createEntity(): EntityId {
        const id = this.nextEntityId++
        this.entities.add(id)
        this.emit('entityCreated', { entity: id })
        return id
    }

    removeEntity(entity: EntityId): void {
        this.pendingRemoval.add(entity)
        this.invalidateAllCaches()
    }

    hasEntity(entity: EntityId): boolean {
        return this.entities.has(entity) && !this.pendingRemoval.has(entity)
    }

    getEntityCount(): number {
        let count = 0
        for (const entity of this.entities) {
            if (!this.pendingRemoval.has(entity)) count++
        }
        return count
    }

    /**
     * Process pending entity removals.
     * Called automatically after each simulation tick.
     */
    flush(): void {
        if (this.pendingRemoval.size === 0) return

        for (const entity of this.pendingRemoval) {
            if (!this.entities.has(entity)) continue
            for (const key of ALL_COMPONENTS) {
                this.components[key].delete(entity)
            }
            this.entities.delete(entity)
            this.emit('entityRemoved', { entity })
        }
        this.pendingRemoval.clear()
    }

    // ==================== Component Management ====================

    /**
     * Set or update a component value.
     * Creates the component if it doesn't exist.
     */
    addComponent<K extends ComponentKey>(
        entity: EntityId,
        key: K,
        value: ComponentTypes[K]
    ): void {
        if (!this.entities.has(entity)) {
            throw new Error(`Unknown entity: ${entity}`)
        }
        const storage: Map<EntityId, ComponentTypes[K]> = this.components[key]
        // Only invalidate if this is a new component (not an update)
        const isNew = !storage.has(entity)
        storage.set(entity, value)

        if (isNew) {
            this.invalidateCachesForComponent(key)
            this.emit('componentAdded', { entity, component: key })
        }
    }

    removeComponent<K extends ComponentKey>(entity: EntityId, key: K): void {
        const storage: Map<EntityId, ComponentTypes[K]> = this.components[key]
        if (storage.has(entity)) {
            storage.delete(entity)
            this.invalidateCachesForComponent(key)
            this.emit('componentRemoved', { entity, component: key })
        }
    }

    getComponent<K extends ComponentKey>(
        entity: EntityId,
        key: K
    ): ComponentTypes[K] | undefined {
        const storage: Map<EntityId, ComponentTypes[K]> = this.components[key]
        return storage.get(entity)
    }

    hasComponent<K extends ComponentKey>(entity: EntityId, key: K): boolean {
        return this.components[key].has(entity)
    }

    // ==================== Query Caching ====================

    private getCacheKey(keys: ComponentKey[]): string {
        // Sort by symbol description for consistent keys
        return keys.map(k => k.description ?? String(k)).sort().join('|')
    }

    private invalidateCachesForComponent(component: ComponentKey): void {
        const compName = component.description ?? String(component)
        for (const [key, cache] of this.queryCache) {
            if (key.split('|').includes(compName)) {
                cache.dirty = true
            }
        }
    }

    private invalidateAllCaches(): void {
        for (const cache of this.queryCache.values()) {
            cache.dirty = true
        }
    }

    // ==================== Queries ====================

    /**
     * Query entities that have ALL specified components.
     * Results are cached until a matching component is added or removed.
     */
    query(...keys: ComponentKey[]): EntityId[] {
        if (keys.length === 0) {
            return Array.from(this.entities).filter(id => !this.pendingRemoval.has(id))
        }

        const cacheKey = this.getCacheKey(keys)
        let cache = this.queryCache.get(cacheKey)

        if (cache && !cache.dirty) {
            if (this.pendingRemoval.size > 0) {
                return cache.entities.filter(id => !this.pendingRemoval.has(id))
            }
            // Return a copy to prevent callers from corrupting the cache
            return cache.entities.slice()
        }

        const result = this.computeQuery(keys)

        if (cache) {
            cache.entities = result
            cache.dirty = false
        } else {
            cache = { entities: result, dirty: false }
            this.queryCache.set(cacheKey, cache)
        }

        return result.slice()
    }

    private computeQuery(keys: ComponentKey[]): EntityId[] {
        // Iterate the smallest store, check membership in the rest
        let smallest: ComponentKey | undefined
        let smallestSize = Infinity

        for (const key of keys) {
            const size = this.components[key].size
            if (size === 0) {
                return []
            }
            if (size < smallestSize) {
                smallest = key
                smallestSize = size
            }
        }

        if (smallest === undefined) return []

        const result: EntityId[] = []
        for (const entity of this.components[smallest].keys()) {
            if (this.pendingRemoval.has(entity)) continue
            if (keys.every(key => this.components[key].has(entity))) {
                result.push(entity)
            }
        }

        return result
    }

    /**
     * Query for a single entity with the specified components.
     */
    querySingle(...keys: ComponentKey[]): EntityId | undefined {
        const results = this.query(...keys)
        return results[0]
    }

    // ==================== Renderer Access ====================

    /**
     * Frozen copy of a body's kinematic state, or undefined if the entity
     * has no Position/Velocity.
     */
    readBody(entity: EntityId): BodySnapshot | undefined {
        const position = this.getComponent(entity, Position)
        const velocity = this.getComponent(entity, Velocity)
        if (!position || !velocity || !this.hasEntity(entity)) return undefined

        return Object.freeze({
            entity,
            tick: this._tick,
            position: Object.freeze(position.copy()),
            velocity: Object.freeze(velocity.copy()),
            color: this.getComponent(entity, Color)
        })
    }

    // ==================== System Management ====================

    /**
     * Simulation systems run in registration order every tick.
     */
    registerSystem(system: System): void {
        system.init?.(this)

        if (system.phase === 'visual') {
            this.visualSystems.push(system)
        } else {
            this.simulationSystems.push(system)
        }
    }

    registerSystems(systems: System[]): void {
        for (const system of systems) {
            this.registerSystem(system)
        }
    }

    unregisterSystem(name: string): boolean {
        for (const list of [this.simulationSystems, this.visualSystems]) {
            const idx = list.findIndex(s => s.name === name)
            if (idx !== -1) {
                const [system] = list.splice(idx, 1)
                system.dispose?.(this)
                return true
            }
        }
        return false
    }

    getSystemNames(phase: 'simulate' | 'visual'): string[] {
        const systems = phase === 'visual' ? this.visualSystems : this.simulationSystems
        return systems.map(s => s.name)
    }

    // ==================== Events ====================

    on<T extends WorldEvent>(event: T, callback: EventCallback<T>): void {
        this.eventListeners[event].add(callback)
    }

    off<T extends WorldEvent>(event: T, callback: EventCallback<T>): void {
        this.eventListeners[event].delete(callback)
    }

    emit<T extends WorldEvent>(event: T, data: WorldEventData[T]): void {
        const listeners: Set<EventCallback<T>> = this.eventListeners[event]
        for (const callback of listeners) {
            callback(data)
        }
    }

    // ==================== Simulation State ====================

    get isRunning(): boolean {
        return this.ticker.isRunning
    }
}


/**
 * Real-time driver: wakes on an interval and hands the measured wall time
 * to the fixed stepper. Timer jitter only changes how many ticks run per
 * wake-up, never the tick size.
 */
class Ticker {
    private interval: number
    private timer: ReturnType<typeof setInterval> | null = null
    private last = 0

    constructor(
        frequency: number,
        private callback: (elapsed: number) => void
    ) {
        this.interval = Math.max(1, Math.round(1000 / frequency))
    }

    get isRunning(): boolean {
        return this.timer !== null
    }

    start(): void {
        if (this.timer !== null) return
        this.last = performance.now()
        this.timer = setInterval(() => {
            const now = performance.now()
            const elapsed = (now - this.last) / 1000
            this.last = now
            this.callback(elapsed)
        }, this.interval)
    }

    stop(): void {
        if (this.timer !== null) {
            clearInterval(this.timer)
            this.timer = null
        }
    }
}
