/** Column count of the terminal attached to `stream`, or `fallback` if the stream is not a terminal. */
export function getTerminalWidth(
    stream: { isTTY?: boolean, columns?: number } = process.stdout,
    fallback = 80
) {
    return stream.isTTY && stream.columns && stream.columns > 0
        ? stream.columns
        : fallback
}
