import { readFileSync } from 'node:fs'
import type { InputSnapshot } from '../sim/types.js'
import type { InputSource } from './InputSource.js'
import { KeyboardState, SurgeButton } from './KeyboardState.js'

/** Keys held (and optionally the surge button) for a run of ticks */
export interface ScenarioSegment {
    ticks: number
    keys: string[]
    pointer?: boolean
}

export interface Scenario {
    name: string
    /** Optional start position of the cube */
    start?: { x: number; y: number }
    segments: ScenarioSegment[]
}

export class ScenarioError extends Error {
    constructor(message: string) {
        super(message)
        this.name = 'ScenarioError'
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseSegment(value: unknown, index: number): ScenarioSegment {
    if (!isRecord(value)) {
        throw new ScenarioError(`Segment ${index} must be an object`)
    }
    const { ticks, keys, pointer } = value
    if (typeof ticks !== 'number' || !Number.isInteger(ticks) || ticks < 0) {
        throw new ScenarioError(`Segment ${index}: "ticks" must be a non-negative integer`)
    }
    if (!Array.isArray(keys) || !keys.every((k): k is string => typeof k === 'string')) {
        throw new ScenarioError(`Segment ${index}: "keys" must be an array of key codes`)
    }
    if (pointer !== undefined && typeof pointer !== 'boolean') {
        throw new ScenarioError(`Segment ${index}: "pointer" must be a boolean`)
    }
    return pointer === undefined ? { ticks, keys } : { ticks, keys, pointer }
}

export function parseScenario(value: unknown): Scenario {
    if (!isRecord(value)) {
        throw new ScenarioError('Scenario must be an object')
    }
    const { name, start, segments } = value
    if (typeof name !== 'string') {
        throw new ScenarioError('Scenario "name" must be a string')
    }
    if (!Array.isArray(segments)) {
        throw new ScenarioError('Scenario "segments" must be an array')
    }
    const scenario: Scenario = { name, segments: segments.map(parseSegment) }
    if (start !== undefined) {
        const x = isRecord(start) ? start.x : undefined
        const y = isRecord(start) ? start.y : undefined
        if (typeof x !== 'number' || typeof y !== 'number') {
            throw new ScenarioError('Scenario "start" must be { x: number, y: number }')
        }
        scenario.start = { x, y }
    }
    return scenario
}

export function loadScenario(path: string): Scenario {
    let raw: unknown
    try {
        raw = JSON.parse(readFileSync(path, 'utf8'))
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err)
        throw new ScenarioError(`Cannot read scenario ${path}: ${reason}`)
    }
    return parseScenario(raw)
}

/** Total ticks a scenario covers */
export function scenarioLength(scenario: Scenario): number {
    return scenario.segments.reduce((sum, s) => sum + s.ticks, 0)
}

/**
 * Replays a scenario one tick per sample() through a KeyboardState,
 * so scripted keys go through the same bindings as live ones.
 * After the last segment nothing is held.
 */
export class ScriptedInput implements InputSource {
    private keyboard = new KeyboardState()
    private segment = 0
    private tickInSegment = 0

    constructor(private scenario: Scenario) {}

    get finished(): boolean {
        return this.segment >= this.scenario.segments.length
    }

    sample(): InputSnapshot {
        // Skip empty segments
        while (!this.finished && this.tickInSegment >= this.scenario.segments[this.segment].ticks) {
            this.segment++
            this.tickInSegment = 0
        }

        if (this.finished) {
            this.keyboard.releaseAll()
            return this.keyboard.sample()
        }

        const current = this.scenario.segments[this.segment]
        this.keyboard.hold(current.keys, current.pointer ? [SurgeButton] : [])
        this.tickInSegment++
        return this.keyboard.sample()
    }
}
