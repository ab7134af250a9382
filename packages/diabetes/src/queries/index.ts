/**
 * @glucolog/diabetes - Queries
 */

export type {
  GlucoseSource,
  EventStore,
  EventRangeQuery,
  QueryDependencies,
  QueryOptions,
} from "./ports.js";

export { fetchBoth, toQueryError, type Fetch } from "./join.js";

export { computeOutcome, OUTCOME_MESSAGES, type OutcomeResult } from "./outcome.js";

export { computeTimeInRange, type TirResult } from "./time-in-range.js";

export {
  assembleChart,
  type ChartResult,
  type ChartPoint,
  type ChartOverlay,
} from "./chart.js";

export {
  listEvents,
  getEvent,
  toEventSummary,
  MAX_PAGE_SIZE,
  type ListEventsParams,
  type EventSummary,
  type PagedResult,
} from "./history.js";
