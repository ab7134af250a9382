/**
 * Tests for event key generation
 */

import { describe, it, expect } from "vitest";
import { generateEventKeys, padTimestamp, timeRangeBounds, userTypePartition } from "./keys.js";
import { NOW, foodEvent, noteEvent } from "../testing/fixtures.js";

describe("padTimestamp", () => {
  it("pads to 15 digits so string order matches time order", () => {
    expect(padTimestamp(NOW)).toBe("001707393600000");
    expect(padTimestamp(5)).toBe("000000000000005");
  });
});

describe("generateEventKeys", () => {
  it("keys the item by event id and indexes it by user and type", () => {
    expect(generateEventKeys(foodEvent(NOW, 45, { id: "evt-1" }))).toEqual({
      pk: "EVT#evt-1",
      sk: "_",
      gsi1pk: "USR#user-1#EVENTS",
      gsi1sk: "001707393600000#evt-1",
      gsi2pk: "USR#user-1#FOOD",
      gsi2sk: "001707393600000#evt-1",
    });
  });

  it("uses the event type for the second index", () => {
    expect(generateEventKeys(noteEvent(NOW, "hi", { id: "evt-2" })).gsi2pk).toBe("USR#user-1#NOTE");
    expect(userTypePartition("user-1", "Insulin")).toBe("USR#user-1#INSULIN");
  });
});

describe("timeRangeBounds", () => {
  it("covers every event id at the end timestamp", () => {
    expect(timeRangeBounds(1000, 2000)).toEqual({
      start: "000000000001000",
      end: "000000000002000#~",
    });
  });
});
