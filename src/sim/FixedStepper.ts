import { AppLog } from '../AppLog.js'

/**
 * Accumulator-based fixed-timestep driver.
 *
 * Wall-clock time goes in through advance(); the step callback runs once per
 * whole `dt` accumulated, so simulation cadence is independent of whatever
 * loop calls advance().
 */
export class FixedStepper {
    private accumulator = 0
    private _steps = 0

    constructor(
        readonly dt: number,
        private step: (dt: number) => void,
        private maxSteps: number = Infinity
    ) {
        if (!(dt > 0) || !Number.isFinite(dt)) {
            throw new Error(`Timestep must be a positive number, got ${dt}`)
        }
    }

    /** Total steps run since construction */
    get steps(): number {
        return this._steps
    }

    /** Fraction of a step left in the accumulator, in [0, 1) */
    get alpha(): number {
        return this.accumulator / this.dt
    }

    /**
     * Add elapsed wall time (seconds) and run every whole step it covers.
     * Returns the number of steps run.
     */
    advance(elapsed: number): number {
        if (!Number.isFinite(elapsed) || elapsed <= 0) return 0

        this.accumulator += elapsed
        let count = 0
        while (this.accumulator >= this.dt) {
            if (count >= this.maxSteps) {
                const dropped = Math.floor(this.accumulator / this.dt)
                AppLog.warn(`Simulation fell behind, dropping ${dropped} step(s)`)
                this.accumulator %= this.dt
                break
            }
            this.step(this.dt)
            this.accumulator -= this.dt
            this._steps++
            count++
        }
        return count
    }

    reset(): void {
        this.accumulator = 0
    }
}
