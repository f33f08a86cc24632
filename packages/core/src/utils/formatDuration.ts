import _ from 'lodash'


/** Format a duration in milliseconds as `HH:MM:SS`. Hours are not capped at 24. */
export default function formatDuration(milliseconds: number) {
    const ms = Math.max(0, Math.floor(milliseconds))
    return [
        Math.floor(ms / 3_600_000),
        Math.floor(ms % 3_600_000 / 60_000),
        Math.floor(ms % 60_000 / 1000)
    ].map(part => _.padStart(`${part}`, 2, '0')).join(':')
}
