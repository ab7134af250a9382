import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { getEvent, listEvents } from "./history.js";
import type { QueryDependencies } from "./ports.js";
import { DomainErrors } from "../errors.js";
import { fixedClock } from "../events/index.js";
import { createInMemoryEventStore } from "../storage/index.js";
import {
  HOUR,
  NOW,
  OTHER_USER,
  USER,
  exerciseEvent,
  foodEvent,
  insulinEvent,
  noteEvent,
} from "../testing/fixtures.js";

const DAY = 24 * HOUR;

const food = foodEvent(NOW - 1 * HOUR, 45, { id: "e1" });
const note = noteEvent(NOW - 2 * HOUR, "x".repeat(60), { id: "e2" });
const exercise = exerciseEvent(NOW - 3 * HOUR, 30, { id: "e3" });
const oldInsulin = insulinEvent(NOW - 40 * DAY, 2, "Long", { id: "e4" });
const otherUsers = foodEvent(NOW - 1 * HOUR, 10, { id: "e5", user: OTHER_USER });

function deps(events = createInMemoryEventStore([food, note, exercise, oldInsulin, otherUsers])): QueryDependencies {
  return {
    clock: fixedClock(NOW),
    glucose: { getReadingsInRange: async () => [] },
    events,
  };
}

describe("listEvents", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the newest page of the last 30 days", async () => {
    const result = await listEvents(deps(), { userId: USER, page: 1, pageSize: 2 });

    expect(result).toEqual({
      ok: true,
      value: {
        items: [
          {
            eventId: "e1",
            eventType: "Food",
            eventTime: NOW - 1 * HOUR,
            source: "Manual",
            summary: "45g carbs",
          },
          {
            eventId: "e2",
            eventType: "Note",
            eventTime: NOW - 2 * HOUR,
            source: "Manual",
            summary: `${"x".repeat(47)}...`,
          },
        ],
        page: 1,
        pageSize: 2,
        totalCount: 3,
        totalPages: 2,
        hasNextPage: true,
        hasPreviousPage: false,
      },
    });
  });

  it("returns later pages", async () => {
    const result = await listEvents(deps(), { userId: USER, page: 2, pageSize: 2 });

    if (!result.ok) throw new Error(result.error.message);
    expect(result.value.items.map((item) => item.eventId)).toEqual(["e3"]);
    expect(result.value.items[0].summary).toBe("30min");
    expect(result.value.hasNextPage).toBe(false);
    expect(result.value.hasPreviousPage).toBe(true);
  });

  it("filters both the count and the page by type", async () => {
    const result = await listEvents(deps(), { userId: USER, type: "Food", page: 1, pageSize: 10 });

    if (!result.ok) throw new Error(result.error.message);
    expect(result.value.totalCount).toBe(1);
    expect(result.value.totalPages).toBe(1);
    expect(result.value.items.map((item) => item.eventId)).toEqual(["e1"]);
  });

  it("honours explicit bounds", async () => {
    const result = await listEvents(deps(), {
      userId: USER,
      from: NOW - 50 * DAY,
      to: NOW,
      page: 1,
      pageSize: 10,
    });

    if (!result.ok) throw new Error(result.error.message);
    expect(result.value.totalCount).toBe(4);
    expect(result.value.items[3].summary).toBe("2U Long");
  });

  it("returns an empty page past the end", async () => {
    const result = await listEvents(deps(), { userId: USER, page: 5, pageSize: 2 });

    if (!result.ok) throw new Error(result.error.message);
    expect(result.value.items).toEqual([]);
    expect(result.value.hasNextPage).toBe(false);
  });

  it.each([
    [0, 10],
    [1, 0],
    [1, 101],
    [1.5, 10],
  ])("rejects page %d with size %d", async (page, pageSize) => {
    expect(await listEvents(deps(), { userId: USER, page, pageSize })).toEqual({
      ok: false,
      error: DomainErrors.invalidPaging,
    });
  });

  it("rejects a window that ends before it starts", async () => {
    expect(
      await listEvents(deps(), { userId: USER, from: NOW, to: NOW - HOUR, page: 1, pageSize: 10 })
    ).toEqual({ ok: false, error: DomainErrors.invalidDateRange });
  });

  it("surfaces a store failure", async () => {
    const events = createInMemoryEventStore();
    const cause = new Error("ProvisionedThroughputExceededException");
    vi.spyOn(events, "countByUserId").mockRejectedValue(cause);

    const result = await listEvents(deps(events), { userId: USER, page: 1, pageSize: 10 });

    expect(result).toEqual({
      ok: false,
      error: { kind: "UpstreamFailure", code: "Error", message: cause.message, cause },
    });
  });
});

describe("getEvent", () => {
  it("returns the caller's own event", async () => {
    expect(await getEvent(deps(), "e1", USER)).toEqual({ ok: true, value: food });
  });

  it("refuses another user's event", async () => {
    expect(await getEvent(deps(), "e5", USER)).toEqual({ ok: false, error: DomainErrors.forbidden });
  });

  it("reports a missing event", async () => {
    expect(await getEvent(deps(), "nope", USER)).toEqual({
      ok: false,
      error: DomainErrors.eventNotFound,
    });
  });
});
