/** Milliseconds since the Unix epoch, or a duration in milliseconds. */
export type Milliseconds = number

/** Whole microseconds since the Unix epoch. */
export type Microseconds = number
