import { ASCII_PATTERNS, ProgressBar } from '../src'


describe('ProgressBar', () => {
    function render(width: number, percentage: number, patterns?: readonly string[]) {
        const bar = new ProgressBar(width, patterns)
        bar.setPercentage(percentage)
        return bar.toString()
    }

    it("should fill the whole bar at 100%", () => {
        expect(render(10, 1)).toBe("█".repeat(10))
    })

    it("should keep the first partial glyph at 0%", () => {
        expect(render(10, 0)).toBe("▏" + " ".repeat(9))
        expect(render(10, 0, ASCII_PATTERNS)).toBe("#" + " ".repeat(9))
    })

    it("should render half of a two-glyph bar", () => {
        expect(render(10, 0.5, ASCII_PATTERNS)).toBe("#####     ")
    })

    it.each`
        percentage  | expected
        ${0.25}     | ${"█   "}
        ${0.3}      | ${"█▎  "}
        ${0.5}      | ${"██  "}
        ${0.9}      | ${"███▋"}
        `("should render $percentage as '$expected'", (
        { percentage, expected }: { percentage: number, expected: string }) => {
        const actual = render(4, percentage)

        expect(actual).toBe(expected)
        expect([...actual]).toHaveLength(4)
    })

    it("should render nothing without width", () => {
        expect(render(0, 0.5)).toBe("")
        expect(render(-3, 0.5)).toBe("")
    })

    it("should keep its configuration", () => {
        const bar = new ProgressBar(3)
        bar.setWidth(5)
        bar.setPatterns(["-", "+"])
        bar.setPercentage(1)

        expect(bar.getWidth()).toBe(5)
        expect(bar.getPatterns()).toEqual(["-", "+"])
        expect(bar.getPercentage()).toBe(1)
        expect(`${bar}`).toBe("+++++")
    })

    it("should reject glyph sets without a full glyph", () => {
        expect(() => new ProgressBar(3, ["#"])).toThrow("A progress bar needs at least an empty and a full pattern")
        expect(() => new ProgressBar(3).setPatterns([])).toThrow()
    })
})
