import { toAppError } from "./to-app-error"

/** One-line `code: message` summary, suitable for persisting as a last error. */
export function describeError(err: unknown): string {
  const appError = toAppError(err)

  return `${appError.code}: ${appError.message}`
}
