import { Container, Position } from './base'


/** Position over the integers. */
export class IntegerPosition implements Position<number> {
    constructor(readonly value: number) { }

    equals(other: Position<number>): boolean {
        return other instanceof IntegerPosition && other.value === this.value
    }

    get(): number {
        return this.value
    }

    next(): IntegerPosition {
        return new IntegerPosition(this.value + 1)
    }

    advanceBy(steps: number): IntegerPosition {
        return new IntegerPosition(this.value + steps)
    }

    distanceTo(other: Position<number>): number {
        if (!(other instanceof IntegerPosition)) {
            throw new Error("Cannot measure distance to a non-integer position")
        }
        return other.value - this.value
    }
}

/** The half-open integer range `[start, stop)`. An inverted range is empty. */
export class IntegerRange implements Container<number> {
    constructor(
        readonly start: number,
        readonly stop: number
    ) { }

    begin(): IntegerPosition {
        return new IntegerPosition(this.start)
    }

    end(): IntegerPosition {
        return new IntegerPosition(Math.max(this.start, this.stop))
    }

    get size() {
        return Math.max(0, this.stop - this.start)
    }
}
