import { createHash, createHmac, timingSafeEqual } from "node:crypto"
import type { Milliseconds, TimeSource } from "@conduit/clock"

export type RejectionReason =
  | "missing_headers"
  | "invalid_timestamp"
  | "expired"
  | "invalid_signature"

/**
 * - `ms-raw-body`: timestamp in epoch milliseconds, MAC over `"<timestamp>.<raw body>"`.
 * - `seconds-body-digest`: timestamp in epoch seconds, MAC over
 *   `"<timestamp>.<hex SHA-256 of the raw body>"`.
 */
export type SignatureScheme = "ms-raw-body" | "seconds-body-digest"

export type VerificationResult = { kind: "verified" } | { kind: "rejected"; reason: RejectionReason }

export type SignatureVerifierDeps = {
  clock: TimeSource
}

export type SignatureVerifierConfig = {
  secret: string

  /** Accepted distance between the signed timestamp and now, either way. */
  toleranceMs: Milliseconds

  /** Defaults to `ms-raw-body`. */
  scheme?: SignatureScheme
}

const TIMESTAMP_PATTERN = /^\d{1,16}$/
const SIGNATURE_PATTERN = /^[0-9a-f]{64}$/

const TIMESTAMP_UNIT_MS: Record<SignatureScheme, number> = {
  "ms-raw-body": 1,
  "seconds-body-digest": 1_000,
}

/** Lowercase hex HMAC-SHA256 of the signed message for `scheme`. */
export function signPayload(
  secret: string,
  timestamp: string,
  rawBody: string | Uint8Array,
  scheme: SignatureScheme = "ms-raw-body",
): string {
  const mac = createHmac("sha256", secret).update(`${timestamp}.`)

  if (scheme === "seconds-body-digest") {
    return mac.update(createHash("sha256").update(rawBody).digest("hex")).digest("hex")
  }

  return mac.update(rawBody).digest("hex")
}

/**
 * Checks that a webhook came from the analysis service. Local and side-effect
 * free; runs before anything reads the job store.
 */
export class SignatureVerifier {
  private readonly scheme: SignatureScheme

  public constructor(
    private readonly deps: SignatureVerifierDeps,
    private readonly config: SignatureVerifierConfig,
  ) {
    this.scheme = config.scheme ?? "ms-raw-body"
  }

  verify(
    rawBody: string | Uint8Array,
    signature: string | undefined,
    timestamp: string | undefined,
  ): VerificationResult {
    if (!signature || !timestamp) return reject("missing_headers")

    if (!TIMESTAMP_PATTERN.test(timestamp)) return reject("invalid_timestamp")

    const signedAtMs = Number(timestamp) * TIMESTAMP_UNIT_MS[this.scheme]
    const age = Math.abs(this.deps.clock.nowMs() - signedAtMs)
    if (age > this.config.toleranceMs) return reject("expired")

    const received = signature.trim().toLowerCase()
    if (!SIGNATURE_PATTERN.test(received)) return reject("invalid_signature")

    const expected = signPayload(this.config.secret, timestamp, rawBody, this.scheme)

    const matches = timingSafeEqual(Buffer.from(received, "hex"), Buffer.from(expected, "hex"))

    return matches ? { kind: "verified" } : reject("invalid_signature")
  }
}

function reject(reason: RejectionReason): VerificationResult {
  return { kind: "rejected", reason }
}
