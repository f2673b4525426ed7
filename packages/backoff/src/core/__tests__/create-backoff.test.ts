import type { RandomSource } from "../../ports/random-source"
import { createBackoff } from "../create-backoff"
import { proportionalJitter } from "../jitter/proportional"
import { exponential } from "../strategies/exponential"

const fixedRandom = (value: number): RandomSource => ({
  next: () => value,
})

describe("createBackoff", () => {
  const base = { milliseconds: 1000 }

  it("applies jitter to the exponential delay", () => {
    const backoff = createBackoff({
      delay: exponential({ base }),
      jitter: proportionalJitter({ random: fixedRandom(0) }),
      min: { milliseconds: 0 },
      max: { milliseconds: 60_000 },
    })

    expect(backoff.getDelay(0)).toEqual({ milliseconds: 500 })
    expect(backoff.getDelay(2)).toEqual({ milliseconds: 2000 })
  })

  it("caps at max", () => {
    const backoff = createBackoff({
      delay: exponential({ base }),
      min: { milliseconds: 0 },
      max: { milliseconds: 5000 },
    })

    expect(backoff.getDelay(10)).toEqual({ milliseconds: 5000 })
  })

  it("floors to whole milliseconds", () => {
    const backoff = createBackoff({
      delay: exponential({ base: { milliseconds: 3 } }),
      jitter: proportionalJitter({ random: fixedRandom(0) }),
      min: { milliseconds: 0 },
      max: { milliseconds: 100 },
    })

    expect(backoff.getDelay(0)).toEqual({ milliseconds: 1 })
  })

  it("falls back to min for non-finite output", () => {
    const backoff = createBackoff({
      delay: { getDelay: () => ({ milliseconds: Number.NaN }) },
      min: { milliseconds: 250 },
      max: { milliseconds: 1000 },
    })

    expect(backoff.getDelay(0)).toEqual({ milliseconds: 250 })
  })

  it("rejects max below min", () => {
    expect(() =>
      createBackoff({
        delay: exponential({ base }),
        min: { milliseconds: 10 },
        max: { milliseconds: 5 },
      }),
    ).toThrow(RangeError)
  })

  it("rejects a negative bound", () => {
    expect(() =>
      createBackoff({
        delay: exponential({ base }),
        min: { milliseconds: -1 },
        max: { milliseconds: 5 },
      }),
    ).toThrow(RangeError)
  })
})
