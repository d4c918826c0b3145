export interface RGB {
    r: number
    g: number
    b: number
}

/** CSS color string from linear 0..1 channels */
export function color(rgb: RGB): string
{
    return `rgb(${Math.round(rgb.r * 255)},${Math.round(rgb.g * 255)},${Math.round(rgb.b * 255)})`
}

export function clamp(x: number, min: number, max: number): number
{
    return Math.min(Math.max(x, min), max)
}
