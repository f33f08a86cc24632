/** Block the current thread for `milliseconds` without spinning. */
export default function sleepSync(milliseconds: number) {
    if (milliseconds > 0) {
        Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, milliseconds)
    }
}
