/**
 * Post-meal outcome matching
 *
 * The outcome of a food event is the reading nearest to two hours after it,
 * searched within ±15 minutes of that target.
 */

import type { GlucoseReading } from "../models/index.js";

/** Offset from the event to the outcome target: 2 hours */
export const OUTCOME_OFFSET_MS = 120 * 60 * 1000;

/** Search window half-width around the target: 15 minutes */
export const OUTCOME_TOLERANCE_MS = 15 * 60 * 1000;

export function outcomeTargetTime(eventTime: number): number {
  return eventTime + OUTCOME_OFFSET_MS;
}

export function outcomeSearchWindow(
  targetTime: number,
  toleranceMs: number = OUTCOME_TOLERANCE_MS
): { start: number; end: number } {
  return { start: targetTime - toleranceMs, end: targetTime + toleranceMs };
}

/**
 * Pick the reading closest to the target time.
 * Readings outside the tolerance are ignored; on a tie the earlier reading wins.
 */
export function findNearestReading(
  readings: readonly GlucoseReading[],
  targetTime: number,
  toleranceMs: number = OUTCOME_TOLERANCE_MS
): GlucoseReading | null {
  let nearest: GlucoseReading | null = null;
  let nearestDistance = Infinity;

  for (const reading of readings) {
    const distance = Math.abs(reading.timestamp - targetTime);
    if (distance > toleranceMs) continue;

    if (
      distance < nearestDistance ||
      (distance === nearestDistance && nearest !== null && reading.timestamp < nearest.timestamp)
    ) {
      nearest = reading;
      nearestDistance = distance;
    }
  }

  return nearest;
}
