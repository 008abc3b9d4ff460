export type Milliseconds = number
export type Seconds = number

/** Seconds since the Unix epoch, always an integer. */
export type EpochSeconds = number
