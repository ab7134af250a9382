import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createUserId, type UserId } from "@glucolog/diabetes";
import { createDexcomGlucoseSource, toGlucoseReading } from "./glucose-source.js";

const ACCOUNT_ID = "11111111-2222-3333-4444-555555555555";
const SESSION_ID = "aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee";
const NOW = 1707350400000; // 2024-02-08 00:00:00 UTC
const MINUTE = 60 * 1000;

function userId(value: string): UserId {
  const result = createUserId(value);
  if (!result.ok) throw new Error(result.error.message);
  return result.value;
}

function reading(timestamp: number, value: number, trend = "Flat") {
  return { WT: `Date(${timestamp})`, ST: `Date(${timestamp})`, DT: `Date(${timestamp})`, Value: value, Trend: trend };
}

describe("toGlucoseReading", () => {
  it("maps a Dexcom reading to a glucose reading", () => {
    expect(toGlucoseReading(reading(NOW, 142, "SingleUp"))).toEqual({
      timestamp: NOW,
      glucoseMgDl: 142,
      trend: "SingleUp",
    });
  });

  it("maps an empty trend to null", () => {
    expect(toGlucoseReading(reading(NOW, 142, "")).trend).toBeNull();
  });
});

describe("createDexcomGlucoseSource", () => {
  let fetchMock: ReturnType<typeof vi.fn>;
  const originalFetch = global.fetch;
  const credentials = { username: "test-user", password: "test-secret" };

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    fetchMock = vi.fn();
    global.fetch = fetchMock;
  });

  afterEach(() => {
    global.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  function mockShare(readings: unknown[]) {
    fetchMock
      .mockResolvedValueOnce({ ok: true, json: () => Promise.resolve(ACCOUNT_ID) })
      .mockResolvedValueOnce({ ok: true, json: () => Promise.resolve(SESSION_ID) })
      .mockResolvedValueOnce({ ok: true, json: () => Promise.resolve(readings) });
  }

  it("returns readings within the window sorted oldest first", async () => {
    // Share returns newest first, including readings outside the window
    mockShare([
      reading(NOW, 150),
      reading(NOW - 10 * MINUTE, 140),
      reading(NOW - 20 * MINUTE, 130),
      reading(NOW - 40 * MINUTE, 110),
    ]);
    const source = createDexcomGlucoseSource({
      region: "us",
      credentialsFor: () => credentials,
      now: () => NOW,
    });

    const readings = await source.getReadingsInRange(
      userId("user-1"),
      NOW - 30 * MINUTE,
      NOW - 5 * MINUTE
    );

    expect(readings).toEqual([
      { timestamp: NOW - 20 * MINUTE, glucoseMgDl: 130, trend: "Flat" },
      { timestamp: NOW - 10 * MINUTE, glucoseMgDl: 140, trend: "Flat" },
    ]);
  });

  it("requests minutes back from now to the window start", async () => {
    mockShare([]);
    const source = createDexcomGlucoseSource({
      region: "ous",
      credentialsFor: () => credentials,
      now: () => NOW,
    });

    await source.getReadingsInRange(userId("user-1"), NOW - 135 * MINUTE, NOW - 105 * MINUTE);

    const [url] = fetchMock.mock.calls[2];
    expect(url).toBe(
      `https://shareous1.dexcom.com/ShareWebServices/Services/Publisher/ReadPublisherLatestGlucoseValues?sessionId=${SESSION_ID}&minutes=135&maxCount=288`
    );
  });

  it("caps the request at 24 hours", async () => {
    mockShare([]);
    const source = createDexcomGlucoseSource({
      region: "us",
      credentialsFor: () => credentials,
      now: () => NOW,
    });

    await source.getReadingsInRange(userId("user-1"), NOW - 48 * 60 * MINUTE, NOW);

    const [url] = fetchMock.mock.calls[2];
    expect(url).toContain("minutes=1440&maxCount=288");
  });

  it("returns no readings for a user without a Dexcom link", async () => {
    const source = createDexcomGlucoseSource({
      region: "us",
      credentialsFor: () => null,
      now: () => NOW,
    });

    const readings = await source.getReadingsInRange(userId("user-2"), NOW - 60 * MINUTE, NOW);

    expect(readings).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("returns no readings for a window starting in the future", async () => {
    const source = createDexcomGlucoseSource({
      region: "us",
      credentialsFor: () => credentials,
      now: () => NOW,
    });

    const readings = await source.getReadingsInRange(userId("user-1"), NOW + MINUTE, NOW + 2 * MINUTE);

    expect(readings).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("propagates Share failures", async () => {
    fetchMock.mockResolvedValueOnce({ ok: false, status: 401, text: () => Promise.resolve("") });
    const source = createDexcomGlucoseSource({
      region: "us",
      credentialsFor: () => credentials,
      now: () => NOW,
    });

    await expect(
      source.getReadingsInRange(userId("user-1"), NOW - 60 * MINUTE, NOW)
    ).rejects.toThrow("Dexcom auth failed: 401");
  });
});
