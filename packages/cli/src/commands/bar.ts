import { flags } from '@oclif/command'
import { ASCII_PATTERNS, BLOCK_PATTERNS, getTerminalWidth, ProgressBar } from 'iterbar'

import IterbarCommand from '../IterbarCommand'
import { parseFraction } from '../utils/progressOptions'


export default class Bar extends IterbarCommand {
    static description = 'print a single bar for a fraction, sized to the terminal by default'

    static flags = {
        help: flags.help({ char: 'h' }),
        fraction: flags.string({
            description: "completed fraction between 0 and 1, or a percentage",
            default: "0.5"
        }),
        width: flags.integer({
            description: "number of cells (default: terminal width)"
        }),
        glyphs: flags.string({
            description: "glyph set to draw the bar with",
            options: ['ascii', 'blocks'],
            default: 'blocks'
        })
    }

    async run() {
        const { flags } = this.parse(Bar)

        const fraction = parseFraction(flags.fraction)
        const width = flags.width ?? getTerminalWidth() - 2
        if (width <= 0) {
            this.warn(`Bar width ${width} leaves nothing to draw`)
        }
        const bar = new ProgressBar(width, flags.glyphs === 'ascii' ? ASCII_PATTERNS : BLOCK_PATTERNS)
        bar.setPercentage(fraction)

        this.log(`|${bar}|`)
    }
}
