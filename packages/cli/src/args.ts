/**
 * Option parsers: turn raw command-line strings into validated values
 */

import { InvalidArgumentError } from "commander";
import {
  CHART_RANGE_HOURS,
  isEventType,
  parseChartRange,
  type ChartRangeHours,
  type EventType,
  type Result,
} from "@glucolog/diabetes";

/**
 * Unwrap a domain result or fail the option with the domain message
 */
export function requireValue<T>(result: Result<T>): T {
  if (!result.ok) throw new InvalidArgumentError(result.error.message);
  return result.value;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

export function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) throw new InvalidArgumentError("Not a whole number.");
  return parsed;
}

/**
 * Accepts an ISO 8601 date/time or a Unix timestamp in milliseconds
 */
export function parseTimestamp(value: string): number {
  const trimmed = value.trim();
  const parsed = /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : Date.parse(trimmed);
  if (Number.isNaN(parsed)) throw new InvalidArgumentError("Not a date or timestamp.");
  return parsed;
}

export function parseRange(value: string): ChartRangeHours {
  const result = parseChartRange(value);
  if (!result.ok) {
    throw new InvalidArgumentError(`Range must be one of: ${CHART_RANGE_HOURS.join(", ")} hours.`);
  }
  return result.value;
}

export function parseEventType(value: string): EventType {
  if (!isEventType(value)) {
    throw new InvalidArgumentError("Type must be one of: Food, Insulin, Exercise, Note.");
  }
  return value;
}

/**
 * Pick a value from a fixed list, ignoring case
 */
export function oneOf<T extends string>(values: readonly T[]): (value: string) => T {
  return (value) => {
    const match = values.find((candidate) => candidate.toLowerCase() === value.toLowerCase());
    if (!match) throw new InvalidArgumentError(`Must be one of: ${values.join(", ")}.`);
    return match;
  };
}
