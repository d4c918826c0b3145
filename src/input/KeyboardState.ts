import type { Direction, InputSnapshot } from '../sim/types.js'
import type { InputSource } from './InputSource.js'

/** Key codes (KeyboardEvent.code) for each movement direction */
export const DirectionBindings: Readonly<Record<Direction, readonly string[]>> = {
    up: ['KeyW', 'KeyK', 'ArrowUp'],
    down: ['KeyS', 'KeyJ', 'ArrowDown'],
    left: ['KeyA', 'KeyH', 'ArrowLeft'],
    right: ['KeyD', 'KeyL', 'ArrowRight']
}

export const SprintKeys: readonly string[] = ['ShiftLeft', 'ShiftRight']

/** Pointer button that triggers surge */
export const SurgeButton = 0

const DIRECTIONS: Direction[] = ['up', 'down', 'left', 'right']

/**
 * Held-key tracker. Key events update it whenever they arrive;
 * sample() turns whatever is held at that moment into a snapshot.
 */
export class KeyboardState implements InputSource {
    private keys = new Set<string>()
    private buttons = new Set<number>()

    press(code: string): void {
        this.keys.add(code)
    }

    release(code: string): void {
        this.keys.delete(code)
    }

    pointerDown(button: number = SurgeButton): void {
        this.buttons.add(button)
    }

    pointerUp(button: number = SurgeButton): void {
        this.buttons.delete(button)
    }

    /** Replace everything held with exactly these keys and buttons */
    hold(codes: Iterable<string>, buttons: Iterable<number> = []): void {
        this.keys = new Set(codes)
        this.buttons = new Set(buttons)
    }

    releaseAll(): void {
        this.keys.clear()
        this.buttons.clear()
    }

    isPressed(code: string): boolean {
        return this.keys.has(code)
    }

    sample(): InputSnapshot {
        const held = new Set<Direction>()
        for (const dir of DIRECTIONS) {
            if (DirectionBindings[dir].some(code => this.keys.has(code))) {
                held.add(dir)
            }
        }
        return {
            held,
            sprint: SprintKeys.some(code => this.keys.has(code)),
            surge: this.buttons.has(SurgeButton)
        }
    }
}
