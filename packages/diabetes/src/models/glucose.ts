/**
 * Glucose reading type - CGM samples from an external source
 */

/**
 * A single CGM reading. Readings arrive roughly every 5 minutes
 * and the series may have gaps.
 */
export interface GlucoseReading {
  /** Unix timestamp in milliseconds */
  timestamp: number;
  /** Glucose value in mg/dL */
  glucoseMgDl: number;
  /** Trend label from the source (e.g., "Flat", "SingleUp"), null if not reported */
  trend: string | null;
}
