export const TEST_WEBHOOK_SECRET = "test-secret"

/** Wall time the fake clocks start at, in epoch milliseconds. */
export const TEST_START_MS = Date.UTC(2025, 0, 15, 9, 0, 0)
