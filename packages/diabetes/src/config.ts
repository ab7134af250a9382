/**
 * Environment configuration for the query layer
 */

import { systemClock, type Clock } from "./events/index.js";
import type { EventStore, GlucoseSource, QueryDependencies } from "./queries/index.js";
import { createDocClient, createDynamoEventStore, createInMemoryEventStore } from "./storage/index.js";
import { STANDARD_TIR_RANGE, createTirRange, type TirRange } from "./values/index.js";

export interface DiabetesConfig {
  awsRegion: string;
  /** DynamoDB table for events; the in-process store is used when null */
  eventsTableName: string | null;
  /** Target range applied to every user */
  tirRange: TirRange;
}

type Env = Record<string, string | undefined>;

function readInteger(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new Error(`${name} must be a whole number, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

/**
 * Read configuration from the environment. Throws on invalid values.
 */
export function loadConfig(env: Env = process.env): DiabetesConfig {
  const lower = readInteger(env, "TIR_LOWER", STANDARD_TIR_RANGE.lower);
  const upper = readInteger(env, "TIR_UPPER", STANDARD_TIR_RANGE.upper);
  const tirRange = createTirRange(lower, upper);
  if (!tirRange.ok) {
    throw new Error(`Invalid TIR_LOWER/TIR_UPPER: ${tirRange.error.message}`);
  }

  return {
    awsRegion: env.AWS_REGION?.trim() || "us-east-1",
    eventsTableName: env.EVENTS_TABLE_NAME?.trim() || null,
    tirRange: tirRange.value,
  };
}

/**
 * The event store the configuration points at
 */
export function createEventStore(config: DiabetesConfig): EventStore {
  if (!config.eventsTableName) {
    console.warn("EVENTS_TABLE_NAME not set, using in-memory event store");
    return createInMemoryEventStore();
  }
  return createDynamoEventStore(createDocClient(config.awsRegion), config.eventsTableName);
}

/**
 * The table writes go to. Events written to the in-process store are lost
 * when the process exits, so logging refuses to run without one.
 */
export function requireEventsTable(config: DiabetesConfig): string {
  if (!config.eventsTableName) {
    throw new Error("EVENTS_TABLE_NAME must be set to log events");
  }
  return config.eventsTableName;
}

/**
 * Wire query dependencies from configuration and a glucose source
 */
export function createQueryDependencies(
  config: DiabetesConfig,
  glucose: GlucoseSource,
  options: { clock?: Clock; events?: EventStore } = {}
): QueryDependencies {
  return {
    clock: options.clock ?? systemClock,
    glucose,
    events: options.events ?? createEventStore(config),
    tirRangeFor: () => config.tirRange,
  };
}
