/**
 * @glucolog/dexcom
 *
 * Dexcom Share client and glucose source
 */

export {
  DEXCOM_REGIONS,
  DEXCOM_BASE_URLS,
  DEXCOM_APP_IDS,
  MAX_MINUTES,
  MAX_COUNT,
  dexcomReadingSchema,
  parseDexcomTimestamp,
  getSessionId,
  fetchGlucoseReadings,
  type DexcomRegion,
  type DexcomCredentials,
  type DexcomReading,
  type DexcomRequestOptions,
} from "./client.js";

export {
  createDexcomGlucoseSource,
  toGlucoseReading,
  type DexcomGlucoseSourceOptions,
} from "./glucose-source.js";

export { loadDexcomConfig, type DexcomConfig } from "./config.js";
