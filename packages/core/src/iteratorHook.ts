import { Position } from './positions'


export type Hook<T> = (position: Position<T>) => void

/** Cursor handed out by an {@link IteratorHook}. Advancing it calls the hook with the new position. */
export class HookCursor<T> {
    constructor(
        private position: Position<T>,
        private readonly hook?: Hook<T>
    ) { }

    get value() {
        return this.position.get()
    }

    get() {
        return this.position.get()
    }

    equals(other: HookCursor<T>) {
        return this.position.equals(other.position)
    }

    /** Move to the next position, then notify the hook. Returns the cursor itself. */
    advance() {
        this.position = this.position.next()
        this.hook?.(this.position)
        return this
    }
}

/**
 * Decorates the range `[begin, end)` so that a hook is called once when iteration starts (with the begin position) and after every advancement (with the new position, including the end position). A full traversal of `n` elements therefore calls the hook `n + 1` times.
 *
 * Iterating the hook in a `for...of` loop yields the values of the underlying range unchanged. Leaving the loop early does not call the hook again.
 */
export class IteratorHook<T> implements Iterable<T> {
    constructor(
        readonly beginPosition: Position<T>,
        readonly endPosition: Position<T>,
        private readonly hook: Hook<T>
    ) { }

    begin() {
        this.hook(this.beginPosition)
        return new HookCursor(this.beginPosition, this.hook)
    }

    end() {
        return new HookCursor(this.endPosition, this.hook)
    }

    *[Symbol.iterator](): Generator<T, void, undefined> {
        for (let cursor = this.begin(), last = this.end(); !cursor.equals(last); cursor.advance()) {
            yield cursor.value
        }
    }
}

export function makeIteratorRangeHook<T>(begin: Position<T>, end: Position<T>, hook: Hook<T>) {
    return new IteratorHook(begin, end, hook)
}
