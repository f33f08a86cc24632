import { Container, Position } from './base'


/** Position over an array-like (arrays, strings, typed arrays). Supports random access. */
export class ArrayPosition<T> implements Position<T> {
    constructor(
        readonly items: ArrayLike<T>,
        readonly index: number
    ) { }

    equals(other: Position<T>): boolean {
        return other instanceof ArrayPosition
            && other.items === this.items
            && other.index === this.index
    }

    get(): T {
        return this.items[this.index]
    }

    next(): ArrayPosition<T> {
        return new ArrayPosition(this.items, this.index + 1)
    }

    advanceBy(steps: number): ArrayPosition<T> {
        return new ArrayPosition(this.items, this.index + steps)
    }

    distanceTo(other: Position<T>): number {
        if (!(other instanceof ArrayPosition) || other.items !== this.items) {
            throw new Error("Cannot measure distance between positions of different sequences")
        }
        return other.index - this.index
    }
}

export class ArrayContainer<T> implements Container<T> {
    constructor(readonly items: ArrayLike<T>) { }

    begin(): ArrayPosition<T> {
        return new ArrayPosition(this.items, 0)
    }

    end(): ArrayPosition<T> {
        return new ArrayPosition(this.items, this.items.length)
    }

    get size() {
        return this.items.length
    }
}
