/**
 * Dexcom Share configuration from the environment
 */

import { DEXCOM_REGIONS, type DexcomCredentials, type DexcomRegion } from "./client.js";

export interface DexcomConfig {
  region: DexcomRegion;
  /** Null when no Share account is configured */
  credentials: DexcomCredentials | null;
}

function isDexcomRegion(value: string): value is DexcomRegion {
  return DEXCOM_REGIONS.some((region) => region === value);
}

/**
 * Read DEXCOM_USERNAME, DEXCOM_PASSWORD and DEXCOM_REGION.
 * Throws when only one of username/password is set or the region is unknown.
 */
export function loadDexcomConfig(env: Record<string, string | undefined> = process.env): DexcomConfig {
  const region = env.DEXCOM_REGION?.trim().toLowerCase() || "us";
  if (!isDexcomRegion(region)) {
    throw new Error(`DEXCOM_REGION must be one of ${DEXCOM_REGIONS.join(", ")}, got "${region}"`);
  }

  const username = env.DEXCOM_USERNAME?.trim();
  const password = env.DEXCOM_PASSWORD;
  if (!username && !password) {
    return { region, credentials: null };
  }
  if (!username || !password) {
    throw new Error("DEXCOM_USERNAME and DEXCOM_PASSWORD must be set together");
  }

  return { region, credentials: { username, password } };
}
