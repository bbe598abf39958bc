/**
 * Time source used for every expiry comparison
 */
export interface Clock {
  /** Milliseconds since the Unix epoch */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
