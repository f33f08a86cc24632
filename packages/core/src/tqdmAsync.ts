import { resolveOptions } from './options'
import { ProgressState } from './progressState'
import { TqdmOptions } from './tqdm'


/** Transparent wrapper to iterate an async `iterable` of `size` elements. As a side effect, print progress updates to the configured stream. The final line is only printed if the iterable is exhausted; items beyond `size` are passed through without further updates. */
export default async function *tqdmAsync<T>(iterable: AsyncIterable<T>, size: number, options: TqdmOptions = {}): AsyncGenerator<T, void, undefined> {
    const { title, outputStream, throttleIntervalMs, barWidth, clock } = resolveOptions(options)
    const state = new ProgressState(size, title, throttleIntervalMs, barWidth, clock)

    for await (const item of iterable) {
        if (!state.isEnd()) {
            const text = state.render()
            if (text !== undefined) {
                outputStream.write(text)
            }
            state.step()
        }
        yield item
    }
    outputStream.write(state.render(true))
}
