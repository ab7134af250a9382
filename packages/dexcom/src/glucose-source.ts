/**
 * GlucoseSource backed by Dexcom Share
 */

import type { GlucoseReading, GlucoseSource, UserId } from "@glucolog/diabetes";
import {
  MAX_COUNT,
  MAX_MINUTES,
  fetchGlucoseReadings,
  getSessionId,
  parseDexcomTimestamp,
  type DexcomCredentials,
  type DexcomReading,
  type DexcomRegion,
} from "./client.js";

export interface DexcomGlucoseSourceOptions {
  region: DexcomRegion;
  /** Share credentials linked to a user, or null when the user has none */
  credentialsFor: (
    userId: UserId
  ) => DexcomCredentials | null | Promise<DexcomCredentials | null>;
  /** Current time in ms; Share windows are counted back from now */
  now?: () => number;
}

export function toGlucoseReading(reading: DexcomReading): GlucoseReading {
  return {
    timestamp: parseDexcomTimestamp(reading.WT),
    glucoseMgDl: reading.Value,
    trend: reading.Trend || null,
  };
}

/**
 * Share returns the latest readings counted back from now, so the request
 * covers now - start and the result is trimmed to [start, end].
 */
export function createDexcomGlucoseSource(options: DexcomGlucoseSourceOptions): GlucoseSource {
  const now = options.now ?? (() => Date.now());

  return {
    async getReadingsInRange(userId, start, end, signal) {
      const credentials = await options.credentialsFor(userId);
      if (!credentials) {
        console.log(`No Dexcom link for ${userId.value}, returning no readings`);
        return [];
      }

      const minutes = Math.min(Math.ceil((now() - start) / 60000), MAX_MINUTES);
      if (minutes < 1) return [];

      const request = { region: options.region, signal };
      const sessionId = await getSessionId(credentials, request);
      const raw = await fetchGlucoseReadings(sessionId, minutes, MAX_COUNT, request);

      const readings = raw
        .map(toGlucoseReading)
        .filter((r) => r.timestamp >= start && r.timestamp <= end)
        .sort((a, b) => a.timestamp - b.timestamp);

      console.log(`Found ${readings.length} readings for ${userId.value} (${raw.length} from Dexcom)`);
      return readings;
    },
  };
}
