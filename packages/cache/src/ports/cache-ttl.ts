import type { Milliseconds, Seconds } from "./time"

type SecondsTtl = { kind: "seconds"; seconds: Seconds }
type MillisecondsTtl = { kind: "milliseconds"; milliseconds: Milliseconds }
type UntilDateTtl = { kind: "until"; expiresAt: Date }

export type CacheTtlDuration = SecondsTtl | MillisecondsTtl | UntilDateTtl

/**
 * Time-to-live accepted by every cache write.
 *
 * A bare number is a count of seconds. Zero and negative values are not
 * rejected; how they behave is backend-specific (file caches store an
 * already-past expiry, remote caches clamp to one second).
 */
export type CacheTtl = Seconds | CacheTtlDuration
