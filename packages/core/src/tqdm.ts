import { IteratorHook, makeIteratorRangeHook } from './iteratorHook'
import { ProgressOptions, resolveOptions } from './options'
import { advance, ContainerLike, distance, IntegerRange, isPosition, Position, toContainer } from './positions'
import { ProgressState } from './progressState'


export type TqdmOptions = Partial<ProgressOptions>

/** Hook the range `[begin, end)` of `size` steps up to a fresh progress state that is printed to the configured stream. */
function progressHook<T>(begin: Position<T>, end: Position<T>, size: number, options: TqdmOptions) {
    const { title, outputStream, throttleIntervalMs, barWidth, clock } = resolveOptions(options)
    const state = new ProgressState(size, title, throttleIntervalMs, barWidth, clock)
    return makeIteratorRangeHook(begin, end, position => {
        if (position.equals(end)) {
            outputStream.write(state.render(true))
            return
        }
        const text = state.render()
        if (text !== undefined) {
            outputStream.write(text)
        }
        state.step()
    })
}

/** Show progress while iterating from `begin` to `end`. The positions must be able to tell their distance (see `Position.distanceTo`); use {@link tqdmSized} for single-pass sources of unknown length. */
export function tqdmRange<T>(begin: Position<T>, end: Position<T>, options: TqdmOptions = {}): IteratorHook<T> {
    return progressHook(begin, end, distance(begin, end), options)
}

/** Show progress while iterating `size` elements starting at `begin`. The end position is counted, not reached, so no element is pulled before iteration starts. */
export function tqdmSized<T>(begin: Position<T>, size: number, options: TqdmOptions = {}): IteratorHook<T> {
    return progressHook(begin, advance(begin, size), size, options)
}

/** Show progress while iterating all elements of `container`. Arrays, strings, `Set`s and `Map`s are accepted as well. The positions of the returned hook reference the container, so it stays reachable until the hook is dropped. */
export function tqdmContainer<T>(container: ContainerLike<T>, options: TqdmOptions = {}): IteratorHook<T> {
    const range = toContainer(container)
    return progressHook(range.begin(), range.end(), range.size, options)
}

/**
 * Transparent wrapper to iterate a range. As a side effect, print progress updates to a stream (standard error by default).
 *
 * ```ts
 * for (const item of tqdm(items, { title: "Processing" })) {
 *     process(item)
 * }
 * ```
 */
export function tqdm<T>(container: ContainerLike<T>, options?: TqdmOptions): IteratorHook<T>
export function tqdm<T>(begin: Position<T>, end: Position<T>, options?: TqdmOptions): IteratorHook<T>
export function tqdm<T>(begin: Position<T>, size: number, options?: TqdmOptions): IteratorHook<T>
export function tqdm<T>(
    source: ContainerLike<T> | Position<T>,
    endOrOptions?: Position<T> | number | TqdmOptions,
    options?: TqdmOptions
): IteratorHook<T> {
    if (isPosition<T>(source)) {
        if (typeof endOrOptions === 'number') {
            return tqdmSized(source, endOrOptions, options)
        }
        if (isPosition<T>(endOrOptions)) {
            return tqdmRange(source, endOrOptions, options)
        }
        throw new Error("tqdm: a begin position must be followed by an end position or a size")
    }
    if (typeof endOrOptions === 'number' || isPosition<T>(endOrOptions)) {
        throw new Error("tqdm: a container must not be followed by an end position or a size")
    }
    return tqdmContainer(source, endOrOptions)
}

/** Progress over the integers `[start, stop)`. */
export function trange(stop: number, options?: TqdmOptions): IteratorHook<number>
export function trange(start: number, stop: number, options?: TqdmOptions): IteratorHook<number>
export function trange(startOrStop: number, stopOrOptions?: number | TqdmOptions, options?: TqdmOptions) {
    const range = typeof stopOrOptions === 'number'
        ? new IntegerRange(startOrStop, stopOrOptions)
        : new IntegerRange(0, startOrStop)
    return tqdmContainer(range, typeof stopOrOptions === 'number' ? options : stopOrOptions)
}
