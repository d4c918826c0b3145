/**
 * Simulation performance monitor
 *
 * Tracks:
 * - Ticks run
 * - Rolling average and worst step time (ms)
 * - Display frames rendered
 */

export interface PerfStats {
    ticks: number
    frames: number
    avgStepTime: number
    maxStepTime: number
}

export class PerfMonitor {
    private ticks = 0
    private frames = 0
    private stepTimes: number[] = []
    private maxStepTime = 0

    // Rolling window size for averaging
    private readonly windowSize = 120

    /**
     * Record one simulation step. Suits World.onSimTick directly.
     */
    recordStep(durationMs: number): void {
        this.ticks++
        this.stepTimes.push(durationMs)
        if (this.stepTimes.length > this.windowSize) {
            this.stepTimes.shift()
        }
        if (durationMs > this.maxStepTime) {
            this.maxStepTime = durationMs
        }
    }

    recordFrame(): void {
        this.frames++
    }

    getStats(): PerfStats {
        const avgStepTime = this.stepTimes.length > 0
            ? this.stepTimes.reduce((a, b) => a + b, 0) / this.stepTimes.length
            : 0

        return {
            ticks: this.ticks,
            frames: this.frames,
            avgStepTime,
            maxStepTime: this.maxStepTime
        }
    }

    /**
     * Reset all statistics
     */
    reset(): void {
        this.ticks = 0
        this.frames = 0
        this.stepTimes = []
        this.maxStepTime = 0
    }
}
