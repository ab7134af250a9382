import { describe, it, expect } from "vitest";
import {
  OUTCOME_OFFSET_MS,
  findNearestReading,
  outcomeSearchWindow,
  outcomeTargetTime,
} from "./outcome.js";
import { MINUTE, NOW, reading } from "../testing/fixtures.js";

const TARGET = NOW;

describe("outcomeTargetTime", () => {
  it("is two hours after the event", () => {
    expect(OUTCOME_OFFSET_MS).toBe(120 * MINUTE);
    expect(outcomeTargetTime(NOW)).toBe(NOW + 120 * MINUTE);
  });
});

describe("outcomeSearchWindow", () => {
  it("spans 15 minutes either side of the target", () => {
    expect(outcomeSearchWindow(TARGET)).toEqual({ start: TARGET - 15 * MINUTE, end: TARGET + 15 * MINUTE });
  });
});

describe("findNearestReading", () => {
  it("selects the reading closest to the target", () => {
    const readings = [
      reading(TARGET - 10 * MINUTE, 110),
      reading(TARGET - 1 * MINUTE, 120),
      reading(TARGET + 5 * MINUTE, 115),
    ];
    expect(findNearestReading(readings, TARGET)).toEqual(reading(TARGET - 1 * MINUTE, 120));
  });

  it("does not depend on input order", () => {
    const readings = [
      reading(TARGET + 5 * MINUTE, 115),
      reading(TARGET - 1 * MINUTE, 120),
      reading(TARGET - 10 * MINUTE, 110),
    ];
    expect(findNearestReading(readings, TARGET)?.glucoseMgDl).toBe(120);
  });

  it("breaks ties in favour of the earlier reading", () => {
    const readings = [reading(TARGET + 5 * MINUTE, 130), reading(TARGET - 5 * MINUTE, 100)];
    expect(findNearestReading(readings, TARGET)?.glucoseMgDl).toBe(100);
  });

  it("accepts a reading exactly at the window edge", () => {
    expect(findNearestReading([reading(TARGET + 15 * MINUTE, 140)], TARGET)?.glucoseMgDl).toBe(140);
  });

  it("ignores readings outside the window", () => {
    expect(findNearestReading([reading(TARGET + 16 * MINUTE, 140)], TARGET)).toBeNull();
  });

  it("returns null for no readings", () => {
    expect(findNearestReading([], TARGET)).toBeNull();
  });
});
