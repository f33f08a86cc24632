import { strict as assert } from 'assert'

import { Container, Position } from './base'


/** The shared state of all positions over one single-pass iterator: the index of the element pulled last and its result. */
export class IteratorSource<T> {
    constructor(readonly iterator: Iterator<T>) { }

    private index = -1
    private result?: IteratorResult<T>

    /** Pull elements up to `index`. Stops early once the iterator is exhausted. */
    at(index: number): IteratorResult<T> {
        if (index < this.index) {
            throw new Error(`Cannot revisit element ${index} of a single-pass iterator (now at ${this.index})`)
        }
        let result = this.result
        while (this.index < index && !result?.done) {
            result = this.result = this.iterator.next()
            this.index++
        }
        assert(result)
        return result
    }

    /** Whether the element at `index` is known to lie past the end, without pulling anything. */
    isKnownDone(index: number) {
        return (this.result?.done ?? false) && index >= this.index
    }
}

/**
 * Position over a single-pass JS iterator. Elements are pulled lazily on dereference, so moving a position (`next`, `advanceBy`, `distanceTo`) never consumes the source. Only the most recently pulled element is kept; dereferencing an earlier position throws.
 */
export class IteratorPosition<T> implements Position<T> {
    readonly source: IteratorSource<T>

    constructor(iterator: Iterator<T> | IteratorSource<T>, readonly index = 0) {
        this.source = iterator instanceof IteratorSource ? iterator : new IteratorSource(iterator)
    }

    /** Pulls up to this position. */
    get done(): boolean {
        return this.source.at(this.index).done ?? false
    }

    /** Equal to positions with the same index, or if both are known to lie past the end. Does not pull. */
    equals(other: Position<T>): boolean {
        if (other instanceof IteratorSentinel) {
            return other.equals(this)
        }
        if (!(other instanceof IteratorPosition) || other.source !== this.source) {
            return false
        }
        return other.index === this.index
            || this.source.isKnownDone(this.index) && this.source.isKnownDone(other.index)
    }

    get(): T {
        return this.source.at(this.index).value
    }

    next(): IteratorPosition<T> {
        return new IteratorPosition(this.source, this.index + 1)
    }

    advanceBy(steps: number): IteratorPosition<T> {
        return new IteratorPosition(this.source, this.index + steps)
    }

    distanceTo(other: Position<T>): number {
        if (!(other instanceof IteratorPosition) || other.source !== this.source) {
            throw new Error("Cannot measure distance to a position of another iterator")
        }
        return other.index - this.index
    }
}

/** The end of an iterator of unknown length: equal to every position that lies past the last element. Comparing against it pulls the compared position. */
export class IteratorSentinel<T> implements Position<T> {
    equals(other: Position<T>): boolean {
        return other instanceof IteratorSentinel
            || other instanceof IteratorPosition && other.done
    }

    get(): T {
        throw new Error("Cannot dereference the end of an iterator")
    }

    next(): Position<T> {
        return this
    }
}

/** Container view of an iterable whose element count is known up front, such as a `Set` or a `Map`. The iterable is iterated once, on the first call of `begin()`; its end is counted rather than detected, so no element is pulled ahead of time. */
export class IterableContainer<T> implements Container<T> {
    constructor(
        readonly iterable: Iterable<T>,
        readonly size: number
    ) { }

    private head?: IteratorPosition<T>

    begin(): IteratorPosition<T> {
        this.head ??= new IteratorPosition(this.iterable[Symbol.iterator]())
        return this.head
    }

    end(): IteratorPosition<T> {
        return this.begin().advanceBy(this.size)
    }
}
