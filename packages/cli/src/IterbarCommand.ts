import { Command, flags } from '@oclif/command'
import { TqdmOptions } from 'iterbar'

import { ProgressFlags, toProgressOptions } from './utils/progressOptions'


/** Flags of all commands that iterate with a progress line. */
export const progressFlags = {
    help: flags.help({ char: 'h' }),
    title: flags.string({
        description: "label in front of the progress bar",
        default: ""
    }),
    interval: flags.integer({
        description: "minimum milliseconds between two updates (default: $ITERBAR_THROTTLE_MS or 100)"
    }),
    width: flags.integer({
        description: "number of cells of the progress bar (default: $ITERBAR_BAR_WIDTH or 10)"
    })
}

/** Abstract base class for all iterbar commands. */
export default abstract class IterbarCommand extends Command {
    progressOptions(flags: ProgressFlags): TqdmOptions {
        return {
            ...toProgressOptions(flags),
            outputStream: process.stderr
        }
    }
}
