import type { MockProxy } from "vitest-mock-extended"

export type Mock<T> = MockProxy<T> & T
