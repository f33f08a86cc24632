import { ProgressState } from '../src'
import { FakeClock } from './_utils/fakes'


describe('ProgressState', () => {
    it("should always return a line from a terminal render", () => {
        const state = new ProgressState(2, "", 100, 2, new FakeClock().clock)
        const line: string = state.render(true)

        expect(line).toBe("\r [= ] 0% 0/2 [00:00:00<00:00:00]\n")
    })

    it("should render progress, estimated and remaining time", () => {
        const time = new FakeClock()
        const state = new ProgressState(4, "job", 100, 4, time.clock)

        expect(state.render()).toBe("\rjob [=   ] 0% 0/4 [00:00:00<00:00:00]")

        time.tick(1000)
        state.step()
        expect(state.render()).toBe("\rjob [==  ] 25% 1/4 [00:00:04<00:00:03]")

        time.tick(1000)
        state.step()
        state.step()
        state.step()
        expect(state.render()).toBe("\rjob [====] 100% 4/4 [00:00:02<00:00:00]\n")
    })

    it("should format hours beyond a day", () => {
        const time = new FakeClock()
        const state = new ProgressState(2, "", 0, 2, time.clock)
        time.tick(3_725_000)
        state.step()

        expect(state.render()).toBe("\r [==] 50% 1/2 [02:04:10<01:02:05]")
        expect(state.snapshot()).toEqual({
            total: 2,
            completed: 1,
            percentage: 50,
            elapsedMs: 3_725_000,
            estimatedMs: 7_450_000,
            remainingMs: 3_725_000
        })
    })

    it.each`
        total   | completed  | percentage
        ${1}    | ${0}       | ${0}
        ${3}    | ${1}       | ${33}
        ${3}    | ${2}       | ${66}
        ${100}  | ${29}      | ${29}
        ${7}    | ${7}       | ${100}
        `("should render $percentage% for $completed/$total", (
        { total, completed, percentage }: { total: number, completed: number, percentage: number }) => {
        const state = new ProgressState(total, "", 0, 10, new FakeClock().clock)
        for (let i = 0; i < completed; i++) {
            state.step()
        }

        expect(state.snapshot().percentage).toBe(percentage)
        expect(state.render()).toContain(` ${percentage}% ${completed}/${total} `)
    })

    it("should not step beyond the total", () => {
        const state = new ProgressState(3, "", 0, 10, new FakeClock().clock)

        expect([state.step(), state.step()]).toEqual([1, 2])
        expect(state.isEnd()).toBe(false)
        expect(state.step()).toBe(3)
        expect(state.isEnd()).toBe(true)
        expect(state.step()).toBe(3)
        expect(state.completed).toBe(3)
    })

    it("should render an empty total as 0/0", () => {
        const state = new ProgressState(0, "", 0, 3, new FakeClock().clock)

        expect(state.isEnd()).toBe(true)
        expect(state.step()).toBe(0)
        expect(state.render()).toBe("\r [=  ] 0% 0/0 [00:00:00<00:00:00]\n")
    })

    it("should throttle renders except the first and the last one", () => {
        const time = new FakeClock()
        const state = new ProgressState(3, "", 100, 3, time.clock)

        expect(state.render()).toBeDefined()
        state.step()
        time.tick(50)
        expect(state.render()).toBeUndefined()
        time.tick(50)
        expect(state.render()).toBe("\r [== ] 33% 1/3 [00:00:00<00:00:00]")
        state.step()
        time.tick(10)
        expect(state.render()).toBeUndefined()
        state.step()
        expect(state.render()).toBe("\r [===] 100% 3/3 [00:00:00<00:00:00]\n")
    })

    it("should force a terminal render", () => {
        const state = new ProgressState(3, "", 1000, 3, new FakeClock().clock)
        state.render()
        state.step()

        expect(state.render()).toBeUndefined()
        expect(state.render(true)).toBe("\r [== ] 33% 1/3 [00:00:00<00:00:00]\n")
    })

    it("should start over after reset", () => {
        const time = new FakeClock()
        const state = new ProgressState(2, "again", 1000, 2, time.clock)
        state.render()
        time.tick(5000)
        state.step()
        state.reset()

        expect(state.completed).toBe(0)
        expect(state.total).toBe(2)
        expect(state.render()).toBe("\ragain [= ] 0% 0/2 [00:00:00<00:00:00]")
        time.tick(2000)
        state.step()
        expect(state.snapshot().elapsedMs).toBe(2000)
    })

    it("should reject invalid totals", () => {
        expect(() => new ProgressState(-1)).toThrow("Invalid progress total: -1")
        expect(() => new ProgressState(1.5)).toThrow("Invalid progress total: 1.5")
    })
})
