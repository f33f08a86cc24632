import { strict as assert } from 'assert'
import _ from 'lodash'


export const BLOCK_PATTERNS: readonly string[] = [" ", "▏", "▎", "▍", "▌", "▋", "▊", "▉", "█"]
export const ASCII_PATTERNS: readonly string[] = [" ", "#"]

/**
 * A bar drawn from a glyph set, with sub-cell resolution.
 *
 * `patterns[0]` is the empty cell, the last pattern is the full cell, and everything in between are partially filled cells in ascending order.
 */
export class ProgressBar {
    constructor(
        private width: number,
        private patterns: readonly string[] = BLOCK_PATTERNS
    ) {
        assertPatterns(patterns)
    }

    private percentage = 0

    setWidth(width: number) { this.width = width }
    getWidth() { return this.width }
    setPatterns(patterns: readonly string[]) {
        assertPatterns(patterns)
        this.patterns = patterns
    }
    getPatterns() { return this.patterns }
    /** @param percentage fraction between 0 and 1 */
    setPercentage(percentage: number) { this.percentage = percentage }
    getPercentage() { return this.percentage }

    /**
     * Exactly `width` glyphs. Note that a fraction of 0 still renders the first partial glyph in the first cell.
     */
    toString() {
        if (this.width <= 0) {
            return ""
        }
        const patternNum = this.patterns.length - 1
        // The epsilon keeps a fraction of exactly 1 from spilling into an extra cell
        const units = Math.trunc((this.percentage - 1e-5) * this.width * patternNum)
        const fullCells = Math.trunc(units / patternNum)
        return _.repeat(_.last(this.patterns), fullCells)
            + this.patterns[units % patternNum + 1]
            + _.repeat(this.patterns[0], this.width - fullCells - 1)
    }
}

function assertPatterns(patterns: readonly string[]) {
    assert(patterns.length >= 2, "A progress bar needs at least an empty and a full pattern")
}
