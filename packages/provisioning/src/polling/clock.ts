/**
 * Time source for the pollers; tests substitute a fake one.
 */
export interface PollerClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const systemClock: PollerClock = {
  now: () => Date.now(),
  sleep,
};
