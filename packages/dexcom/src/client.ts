/**
 * Dexcom Share API Client
 *
 * Authenticates and fetches glucose readings from the Dexcom Share API
 * in any of its three regions.
 */

import { z } from "zod";

export const DEXCOM_REGIONS = ["us", "ous", "jp"] as const;

export type DexcomRegion = (typeof DEXCOM_REGIONS)[number];

/** Dexcom Share API endpoints per region */
export const DEXCOM_BASE_URLS: Record<DexcomRegion, string> = {
  us: "https://share2.dexcom.com/ShareWebServices/Services",
  ous: "https://shareous1.dexcom.com/ShareWebServices/Services",
  jp: "https://share.dexcom.jp/ShareWebServices/Services",
};

export const DEXCOM_APP_IDS: Record<DexcomRegion, string> = {
  us: "d89443d2-327c-4a6f-89e5-496bbb0317db",
  ous: "d89443d2-327c-4a6f-89e5-496bbb0317db",
  jp: "d8665ade-9673-4e27-9ff6-92db4ce13d13",
};

/** Share only serves the last 24 hours */
export const MAX_MINUTES = 1440;
/** One reading every 5 minutes for 24 hours */
export const MAX_COUNT = 288;

/** Credentials for Dexcom Share authentication */
export interface DexcomCredentials {
  username: string;
  password: string;
}

export interface DexcomRequestOptions {
  region?: DexcomRegion;
  signal?: AbortSignal;
}

/** Account and session ids come back as quoted UUID strings */
const authStringSchema = z.string().regex(/^[0-9a-fA-F-]{36}$/, "Not UUID-like");

const DEXCOM_DATE = /Date\(\d+/;

/** Raw glucose reading from Dexcom API */
export const dexcomReadingSchema = z.object({
  /** Timestamp in Dexcom format: "Date(1234567890000)" */
  WT: z.string().regex(DEXCOM_DATE, "Not a Dexcom date"),
  /** System time */
  ST: z.string().optional(),
  /** Display time */
  DT: z.string().optional(),
  /** Glucose value in mg/dL */
  Value: z.number().int(),
  /** Trend direction (e.g., "Flat", "SingleUp", "FortyFiveDown") */
  Trend: z.string(),
});

export type DexcomReading = z.infer<typeof dexcomReadingSchema>;

const readingsSchema = z.array(dexcomReadingSchema);

const JSON_HEADERS = {
  "Content-Type": "application/json",
  Accept: "application/json",
} as const;

/**
 * Parse Dexcom timestamp format "Date(1234567890000)" to milliseconds.
 */
export function parseDexcomTimestamp(wt: string): number {
  const match = wt.match(/Date\((\d+)/);
  return match ? parseInt(match[1], 10) : 0;
}

function maskCredential(value: string, visible: number): string {
  return `${value.slice(0, visible)}***`;
}

async function readAuthString(response: Response, step: string): Promise<string> {
  const parsed = authStringSchema.safeParse(await response.json());
  if (!parsed.success) {
    throw new Error(`Dexcom ${step} returned an unexpected response`);
  }
  return parsed.data;
}

/**
 * Authenticate with Dexcom Share and get a session ID.
 *
 * Two-step process:
 * 1. Authenticate with username/password to get account ID
 * 2. Login with account ID to get session ID
 */
export async function getSessionId(
  credentials: DexcomCredentials,
  options: DexcomRequestOptions = {}
): Promise<string> {
  const { username, password } = credentials;
  const region = options.region ?? "us";
  const baseUrl = DEXCOM_BASE_URLS[region];
  const applicationId = DEXCOM_APP_IDS[region];

  console.log(
    `Authenticating with Dexcom (${region}) as ${maskCredential(username, 3)}, password ${maskCredential(password, 0)}`
  );

  // Step 1: Get account ID
  const authResponse = await fetch(`${baseUrl}/General/AuthenticatePublisherAccount`, {
    method: "POST",
    headers: JSON_HEADERS,
    body: JSON.stringify({
      accountName: username,
      password: password,
      applicationId,
    }),
    signal: options.signal,
  });

  if (!authResponse.ok) {
    const errorText = await authResponse.text().catch(() => "");
    if (errorText) {
      console.error("Dexcom auth error response: " + errorText);
    }
    throw new Error(`Dexcom auth failed: ${authResponse.status}`);
  }

  const accountId = await readAuthString(authResponse, "auth");

  // Step 2: Get session ID
  const sessionResponse = await fetch(`${baseUrl}/General/LoginPublisherAccountById`, {
    method: "POST",
    headers: JSON_HEADERS,
    body: JSON.stringify({
      accountId,
      password,
      applicationId,
    }),
    signal: options.signal,
  });

  if (!sessionResponse.ok) {
    throw new Error(`Dexcom login failed: ${sessionResponse.status}`);
  }

  return readAuthString(sessionResponse, "login");
}

/**
 * Fetch glucose readings from Dexcom Share.
 *
 * @param sessionId - Session ID from getSessionId()
 * @param minutes - Time window in minutes, clamped to 1..1440
 * @param maxCount - Maximum number of readings, clamped to 1..288
 * @returns Array of readings, newest first
 */
export async function fetchGlucoseReadings(
  sessionId: string,
  minutes: number = 30,
  maxCount: number = 2,
  options: DexcomRequestOptions = {}
): Promise<DexcomReading[]> {
  const baseUrl = DEXCOM_BASE_URLS[options.region ?? "us"];
  const params = new URLSearchParams({
    sessionId,
    minutes: String(Math.min(Math.max(Math.ceil(minutes), 1), MAX_MINUTES)),
    maxCount: String(Math.min(Math.max(Math.floor(maxCount), 1), MAX_COUNT)),
  });

  const response = await fetch(
    `${baseUrl}/Publisher/ReadPublisherLatestGlucoseValues?${params.toString()}`,
    {
      method: "POST",
      headers: JSON_HEADERS,
      signal: options.signal,
    }
  );

  if (!response.ok) {
    throw new Error(`Dexcom fetch failed: ${response.status}`);
  }

  const parsed = readingsSchema.safeParse(await response.json());
  if (!parsed.success) {
    throw new Error(`Dexcom returned malformed readings: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }
  return parsed.data;
}
