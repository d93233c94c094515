/** A span of time in milliseconds. May be fractional. */
export type Milliseconds = number
