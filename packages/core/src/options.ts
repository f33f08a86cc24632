import _ from 'lodash'


/** Anything progress text can be written to, e.g. `process.stderr` or a `Writable`. Must outlive the iteration it reports on. */
export interface OutputStream {
    write(chunk: string): unknown
}

/** Source of the current time in milliseconds. */
export type Clock = () => number

export type ProgressOptions = {
    /** Label printed in front of the bar. */
    title: string
    outputStream: OutputStream
    /** Minimum gap between two renders. The first and the final render are never suppressed. */
    throttleIntervalMs: number
    /** Number of cells of the bar. */
    barWidth: number
    clock: Clock
}

export const DEFAULT_OPTIONS: Readonly<Omit<ProgressOptions, 'outputStream'>> = {
    title: "",
    throttleIntervalMs: 100,
    barWidth: 10,
    clock: Date.now
}

const NUMERIC_OPTIONS = ['throttleIntervalMs', 'barWidth'] as const

/** Fill in defaults for all options that are not specified. Numeric options that are not finite are replaced by their defaults. A negative bar width draws an empty bar and a negative interval never throttles. */
export function resolveOptions(options: Partial<ProgressOptions> = {}): ProgressOptions {
    const resolved: ProgressOptions = _.defaults({}, _.omitBy(options, _.isUndefined), DEFAULT_OPTIONS, {
        outputStream: process.stderr
    })
    for (const key of NUMERIC_OPTIONS) {
        const value = resolved[key]
        if (!Number.isFinite(value)) {
            console.warn("Invalid progress option, using default", { key, value, default: DEFAULT_OPTIONS[key] })
            resolved[key] = DEFAULT_OPTIONS[key]
        }
    }
    return resolved
}
