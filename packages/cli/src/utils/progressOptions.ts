import { DEFAULT_OPTIONS, TqdmOptions } from 'iterbar'


export type ProgressFlags = {
    title: string
    interval?: number
    width?: number
}

function parseInteger(value: string | undefined) {
    if (value === undefined || !/^\d+$/.test(value.trim())) {
        return undefined
    }
    return parseInt(value, 10)
}

/** Defaults for the progress flags, taken from `ITERBAR_THROTTLE_MS` and `ITERBAR_BAR_WIDTH` where set. */
export function progressOptionsFromEnv(env: NodeJS.ProcessEnv = process.env) {
    return {
        throttleIntervalMs: parseInteger(env.ITERBAR_THROTTLE_MS) ?? DEFAULT_OPTIONS.throttleIntervalMs,
        barWidth: parseInteger(env.ITERBAR_BAR_WIDTH) ?? DEFAULT_OPTIONS.barWidth
    }
}

export function toProgressOptions(flags: ProgressFlags, env: NodeJS.ProcessEnv = process.env): TqdmOptions {
    const defaults = progressOptionsFromEnv(env)
    return {
        title: flags.title,
        throttleIntervalMs: flags.interval ?? defaults.throttleIntervalMs,
        barWidth: flags.width ?? defaults.barWidth
    }
}

/** Parse a fraction between 0 and 1, also accepting percentages such as `42%`. */
export function parseFraction(value: string) {
    const match = /^\s*(\d+(?:\.\d+)?|\.\d+)\s*(%?)\s*$/.exec(value)
    const fraction = match && (match[2] ? Number(match[1]) / 100 : Number(match[1]))
    if (fraction === null || fraction > 1) {
        throw new Error(`iterbar-cli: Invalid fraction: ${value}`)
    }
    return fraction
}
