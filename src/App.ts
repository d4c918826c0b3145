import {
    World,
    spawnCube,
    createPhysicsSystems,
    createTraceRenderer,
    type EntityId,
    type BodySnapshot,
    type TraceRenderer
} from './ECS/index.js'
import { ConfigError, createSimConfig, type SimConfig } from './sim/index.js'
import { ScriptedInput, scenarioLength, type Scenario } from './input/Scenario.js'
import { PerfMonitor, type PerfStats } from './PerfMonitor.js'
import { AppLog } from './AppLog.js'

export interface AppOptions {
    scenario: Scenario
    config?: SimConfig
    /** Display frames per second driving the visual phase */
    frameRate?: number
    /** Seconds between trace log lines */
    logInterval?: number
}

export interface AppSummary {
    scenario: string
    ticks: number
    contacts: number
    reflections: number
    final: BodySnapshot | undefined
    perf: PerfStats
}

/**
 * Headless host: one world, one cube, a scripted input source and a
 * trace renderer standing in for the display.
 */
export default class App {
    readonly config: SimConfig
    readonly world: World
    readonly cube: EntityId
    readonly trace: TraceRenderer
    private input: ScriptedInput
    private perf = new PerfMonitor()
    private frameRate: number
    private totalTicks: number
    private contacts = 0
    private reflections = 0

    constructor(private options: AppOptions) {
        this.config = options.config ?? createSimConfig()
        this.frameRate = options.frameRate ?? 60
        if (!Number.isFinite(this.frameRate) || this.frameRate <= 0) {
            throw new ConfigError('InvalidTimestep', `Frame rate must be a positive number, got ${this.frameRate}`)
        }
        this.totalTicks = scenarioLength(options.scenario)

        this.world = new World({
            tickRate: this.config.tickRate,
            maxStepsPerAdvance: this.config.maxStepsPerAdvance
        })
        this.world.onSimTick = (ms) => this.perf.recordStep(ms)

        this.input = new ScriptedInput(options.scenario)
        this.cube = spawnCube(this.world, this.config, {
            position: options.scenario.start,
            input: this.input
        })

        this.trace = createTraceRenderer({ logInterval: options.logInterval })
        this.world.registerSystems([...createPhysicsSystems(this.config), this.trace])

        this.world.on('boundaryContact', ({ tick, contact }) => {
            this.contacts++
            if (!contact.reflected) return
            this.reflections++
            AppLog.info(
                `tick ${tick}: bounced off ${contact.axis}-${contact.side} at speed ${contact.speed.toFixed(2)}`
            )
        })

        AppLog.info(`Scenario "${options.scenario.name}": ${this.totalTicks} ticks at ${this.config.tickRate} Hz`)
    }

    get done(): boolean {
        return this.world.tick >= this.totalTicks
    }

    /**
     * Run the whole scenario as fast as possible. Each synthetic display
     * frame runs the ticks due by its timestamp, never past the scenario.
     */
    runHeadless(): AppSummary {
        let frame = 0
        while (!this.done) {
            frame++
            const due = Math.min(this.totalTicks, Math.floor((frame * this.config.tickRate) / this.frameRate))
            while (this.world.tick < due) {
                this.world.step()
            }
            this.renderFrame((frame * 1000) / this.frameRate)
        }
        return this.summary()
    }

    /**
     * Run the scenario in real time. Resolves once every scripted tick has run.
     */
    run(): Promise<AppSummary> {
        return new Promise((resolve) => {
            this.world.start()
            const frameTimer = setInterval(() => {
                this.renderFrame(performance.now())
                if (this.done) {
                    clearInterval(frameTimer)
                    this.world.stop()
                    resolve(this.summary())
                }
            }, Math.max(1, Math.round(1000 / this.frameRate)))
        })
    }

    summary(): AppSummary {
        return {
            scenario: this.options.scenario.name,
            ticks: this.world.tick,
            contacts: this.contacts,
            reflections: this.reflections,
            final: this.world.readBody(this.cube),
            perf: this.perf.getStats()
        }
    }

    private renderFrame(now: number): void {
        this.world.updateVisuals(now)
        this.perf.recordFrame()
    }
}
