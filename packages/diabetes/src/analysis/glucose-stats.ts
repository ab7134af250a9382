/**
 * Glucose statistical analysis functions
 */

import type { GlucoseReading } from "../models/index.js";
import { isInRange, type TirRange } from "../values/index.js";

/**
 * Time-in-range counts for a set of readings
 */
export interface TimeInRangeSummary {
  /** Number of readings analyzed */
  totalCount: number;
  /** Readings within [lower, upper], inclusive */
  inRangeCount: number;
  /** Readings strictly below the lower bound */
  belowCount: number;
  /** Readings strictly above the upper bound */
  aboveCount: number;
  /** 100 * inRange / total, one decimal; 0 when there are no readings */
  percentage: number;
}

/**
 * Glucose statistics result
 */
export interface GlucoseStats {
  /** Minimum glucose value */
  min: number;
  /** Maximum glucose value */
  max: number;
  /** Mean glucose value */
  mean: number;
  /** Standard deviation */
  stdDev: number;
  /** Coefficient of variation (stdDev/mean * 100) */
  cv: number;
  /** Glucose Management Indicator (GMI) */
  gmi: number;
  /** Number of readings analyzed */
  readingCount: number;
}

function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Count readings in, below, and above the target range.
 * The three counts always add up to the total.
 */
export function calculateTimeInRange(
  readings: ReadonlyArray<Pick<GlucoseReading, "glucoseMgDl">>,
  range: TirRange
): TimeInRangeSummary {
  let inRangeCount = 0;
  let belowCount = 0;
  let aboveCount = 0;

  for (const reading of readings) {
    if (isInRange(range, reading.glucoseMgDl)) inRangeCount++;
    else if (reading.glucoseMgDl < range.lower) belowCount++;
    else aboveCount++;
  }

  const totalCount = readings.length;
  const percentage = totalCount > 0 ? roundToTenth((inRangeCount / totalCount) * 100) : 0;

  return { totalCount, inRangeCount, belowCount, aboveCount, percentage };
}

/**
 * Calculate glucose statistics from readings
 */
export function calculateGlucoseStats(
  readings: ReadonlyArray<Pick<GlucoseReading, "glucoseMgDl">>
): GlucoseStats {
  if (readings.length === 0) {
    return {
      min: 0,
      max: 0,
      mean: 0,
      stdDev: 0,
      cv: 0,
      gmi: 0,
      readingCount: 0,
    };
  }

  const values = readings.map((r) => r.glucoseMgDl);
  const n = values.length;

  const min = Math.min(...values);
  const max = Math.max(...values);
  const mean = values.reduce((a, b) => a + b, 0) / n;

  // Population standard deviation
  const avgSquaredDiff = values.reduce((sum, v) => sum + Math.pow(v - mean, 2), 0) / n;
  const stdDev = Math.sqrt(avgSquaredDiff);

  const cv = mean > 0 ? (stdDev / mean) * 100 : 0;

  // GMI (Glucose Management Indicator) = 3.31 + (0.02392 × mean glucose in mg/dL)
  const gmi = 3.31 + 0.02392 * mean;

  return {
    min: Math.round(min),
    max: Math.round(max),
    mean: roundToTenth(mean),
    stdDev: roundToTenth(stdDev),
    cv: roundToTenth(cv),
    gmi: roundToTenth(gmi),
    readingCount: n,
  };
}
