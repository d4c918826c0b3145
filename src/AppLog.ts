/**
 * Application logging system
 * Provides a global AppLog singleton that stores recent messages and forwards them to the console.
 */

export type LogLevel = 'info' | 'warn' | 'error'

export interface LogEntry {
    timestamp: number
    level: LogLevel
    message: string
}

type LogListener = (entry: LogEntry) => void

class Logger {
    private entries: LogEntry[] = []
    private listeners: Set<LogListener> = new Set()
    private maxEntries = 500

    /** When false, entries are still stored and dispatched but not printed */
    echo = true

    info(message: string): void {
        this.add('info', message)
        if (this.echo) console.log(`[INFO] ${message}`)
    }

    warn(message: string): void {
        this.add('warn', message)
        if (this.echo) console.warn(`[WARN] ${message}`)
    }

    error(message: string): void {
        this.add('error', message)
        if (this.echo) console.error(`[ERROR] ${message}`)
    }

    getEntries(): readonly LogEntry[] {
        return this.entries
    }

    clear(): void {
        this.entries = []
    }

    onEntry(listener: LogListener): () => void {
        this.listeners.add(listener)
        return () => this.listeners.delete(listener)
    }

    private add(level: LogLevel, message: string): void {
        const entry: LogEntry = { timestamp: Date.now(), level, message }
        this.entries.push(entry)
        if (this.entries.length > this.maxEntries) {
            this.entries.shift()
        }
        for (const listener of this.listeners) {
            listener(entry)
        }
    }
}

/** Global application logger */
export const AppLog = new Logger()
