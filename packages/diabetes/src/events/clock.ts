/**
 * Clock and identifier sources, injected into every time-sensitive call
 */

import { randomUUID } from "crypto";

export interface Clock {
  /** Current time as a Unix timestamp in milliseconds */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * A clock frozen at one instant, for deterministic tests and replays
 */
export function fixedClock(timestamp: number): Clock {
  return { now: () => timestamp };
}

export type IdGenerator = () => string;

export const randomId: IdGenerator = () => randomUUID();
