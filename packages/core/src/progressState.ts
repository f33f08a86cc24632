import { strict as assert } from 'assert'
import _ from 'lodash'

import { Clock, DEFAULT_OPTIONS } from './options'
import formatDuration from './utils/formatDuration'


export type ProgressSnapshot = {
    total: number
    completed: number
    /** Integer between 0 and 100. */
    percentage: number
    elapsedMs: number
    estimatedMs: number
    remainingMs: number
}

/** Step counter and timer of a single progress bar. Renders itself as one terminal line. */
export class ProgressState {
    constructor(
        readonly total: number,
        readonly title = DEFAULT_OPTIONS.title,
        readonly throttleIntervalMs = DEFAULT_OPTIONS.throttleIntervalMs,
        readonly barWidth = DEFAULT_OPTIONS.barWidth,
        private readonly clock: Clock = DEFAULT_OPTIONS.clock
    ) {
        assert(Number.isInteger(total) && total >= 0, `Invalid progress total: ${total}`)
        this.startTime = this.currentTime = clock()
    }

    private _completed = 0
    private firstRender = true
    private startTime: number
    private currentTime: number
    private lastRenderTime = 0

    get completed() { return this._completed }

    /** Start over, keeping total and title. */
    reset() {
        this._completed = 0
        this.firstRender = true
        this.startTime = this.currentTime = this.clock()
    }

    /** Count one more completed step, unless all steps are completed already. */
    step() {
        if (this._completed < this.total) {
            this._completed++
            this.currentTime = this.clock()
        }
        return this._completed
    }

    isEnd() {
        return this._completed >= this.total
    }

    snapshot(): ProgressSnapshot {
        const { total, completed } = this
        const elapsedMs = completed ? this.currentTime - this.startTime : 0
        return {
            total,
            completed,
            percentage: total ? Math.floor(completed * 100 / total) : 0,
            elapsedMs,
            estimatedMs: completed ? Math.floor(elapsedMs * total / completed) : 0,
            remainingMs: completed ? Math.floor(elapsedMs * (total - completed) / completed) : 0
        }
    }

    /**
     * Render the progress line, starting with a carriage return so that consecutive renders overwrite each other.
     *
     * @param final force a terminal render, as the end of the range has been reached
     * @returns `undefined` if the render was throttled. The terminal render ends with a newline.
     */
    render(final: true): string
    render(final?: boolean): string | undefined
    render(final = false): string | undefined {
        const now = this.clock()
        const terminal = final || this.isEnd()
        if (!this.firstRender && !terminal && now - this.lastRenderTime < this.throttleIntervalMs) {
            return undefined
        }
        this.lastRenderTime = now
        this.firstRender = false

        const { total, completed, percentage, estimatedMs, remainingMs } = this.snapshot()
        const processed = total ? completed / total : 0
        const bar = _.times(this.barWidth, i => i / this.barWidth <= processed ? '=' : ' ').join('')
        // Shows the remaining rather than the elapsed time next to the estimate
        const times = `${formatDuration(estimatedMs)}<${formatDuration(remainingMs)}`
        const line = `\r${this.title} [${bar}] ${percentage}% ${completed}/${total} [${times}]`
        return terminal ? `${line}\n` : line
    }
}
