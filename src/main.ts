import { fileURLToPath } from 'node:url'
import App from './App.js'
import { AppLog } from './AppLog.js'
import { loadScenario } from './input/Scenario.js'
import { formatSnapshot } from './ECS/systems/TraceRenderer.js'

const DEFAULT_SCENARIO = fileURLToPath(new URL('../scenarios/demo.json', import.meta.url))

async function main(args: string[]): Promise<void> {
    const realtime = args.includes('--realtime')
    const path = args.find(a => !a.startsWith('--')) ?? DEFAULT_SCENARIO

    const app = new App({ scenario: loadScenario(path) })
    const summary = realtime ? await app.run() : app.runHeadless()

    AppLog.info(`Finished "${summary.scenario}" after ${summary.ticks} ticks, ${summary.reflections} bounce(s)`)
    if (summary.final) {
        AppLog.info(`Final state: ${formatSnapshot(summary.final)}`)
    }
    AppLog.info(
        `Step time avg ${summary.perf.avgStepTime.toFixed(3)} ms, max ${summary.perf.maxStepTime.toFixed(3)} ms over ${summary.perf.frames} frames`
    )
}

main(process.argv.slice(2)).catch((err: unknown) => {
    AppLog.error(err instanceof Error ? err.message : String(err))
    process.exitCode = 1
})
