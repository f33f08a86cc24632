export { HookCursor, Hook, IteratorHook, makeIteratorRangeHook } from './iteratorHook'
export { Clock, DEFAULT_OPTIONS, OutputStream, ProgressOptions, resolveOptions } from './options'
export {
    advance,
    ArrayContainer,
    ArrayPosition,
    Container,
    ContainerLike,
    distance,
    IntegerPosition,
    IntegerRange,
    isContainer,
    isPosition,
    IterableContainer,
    IteratorPosition,
    IteratorSentinel,
    IteratorSource,
    Position,
    toContainer
} from './positions'
export { ASCII_PATTERNS, BLOCK_PATTERNS, ProgressBar } from './progressBar'
export { ProgressSnapshot, ProgressState } from './progressState'
export { getTerminalWidth } from './terminal'
export { tqdm, TqdmOptions, tqdmContainer, tqdmRange, tqdmSized, trange } from './tqdm'
export { default as tqdmAsync } from './tqdmAsync'
export { default as formatDuration } from './utils/formatDuration'
