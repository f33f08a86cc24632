import { ArrayContainer, ArrayPosition } from './array'
import { advance, Container, distance, isPosition, Position } from './base'
import { IterableContainer, IteratorPosition, IteratorSentinel, IteratorSource } from './iterator'
import { IntegerPosition, IntegerRange } from './range'


export {
    advance,
    ArrayContainer,
    ArrayPosition,
    Container,
    distance,
    IntegerPosition,
    IntegerRange,
    isPosition,
    IterableContainer,
    IteratorPosition,
    IteratorSentinel,
    IteratorSource,
    Position
}

/** Anything `tqdm` accepts as a whole sequence. */
export type ContainerLike<T> =
    | Container<T>
    | ArrayLike<T>
    | (Iterable<T> & { readonly size: number })

export function isContainer<T>(value: unknown): value is Container<T> {
    return typeof value === 'object'
        && value !== null
        && 'begin' in value && typeof value.begin === 'function'
        && 'end' in value && typeof value.end === 'function'
}

export function toContainer<T>(source: ContainerLike<T>): Container<T> {
    if (isContainer<T>(source)) {
        return source
    }
    if (typeof source === 'string' || 'length' in source) {
        return new ArrayContainer(source)
    }
    return new IterableContainer(source, source.size)
}
