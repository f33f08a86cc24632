/**
 * A forward-only position inside a sequence. Positions are values: advancing one returns a new position and leaves the old one untouched. Whether an earlier position can still be dereferenced depends on the sequence; positions over a single-pass iterator cannot.
 */
export interface Position<T> {
    equals(other: Position<T>): boolean
    /** Dereference. Undefined behavior at the end position. */
    get(): T
    next(): Position<T>
    /** Number of steps from this position to `other`, for positions that support random access. */
    distanceTo?(other: Position<T>): number
    /** Jump `steps` ahead without visiting the positions in between. */
    advanceBy?(steps: number): Position<T>
}

/** A sequence that knows its begin and end positions and how many elements lie between them. */
export interface Container<T> {
    begin(): Position<T>
    end(): Position<T>
    readonly size: number
}

/** Advance `position` by `steps`. Like the underlying positions, this does not check bounds. */
export function advance<T>(position: Position<T>, steps: number): Position<T> {
    if (position.advanceBy) {
        return position.advanceBy(steps)
    }
    let result = position
    for (let i = 0; i < steps; i++) {
        result = result.next()
    }
    return result
}

/** Count the steps from `begin` to `end`. Requires positions with random access; the range is never walked. */
export function distance<T>(begin: Position<T>, end: Position<T>): number {
    if (!begin.distanceTo) {
        throw new Error("Cannot measure the distance between positions without random access, pass a size instead")
    }
    return begin.distanceTo(end)
}

export function isPosition<T>(value: unknown): value is Position<T> {
    return typeof value === 'object'
        && value !== null
        && 'next' in value && typeof value.next === 'function'
        && 'equals' in value && typeof value.equals === 'function'
}
