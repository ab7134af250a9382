/**
 * @glucolog/diabetes - Analysis
 *
 * Pure computations over readings and events
 */

// Glucose statistics
export {
  calculateTimeInRange,
  calculateGlucoseStats,
  type TimeInRangeSummary,
  type GlucoseStats,
} from "./glucose-stats.js";

// Outcome matching
export {
  OUTCOME_OFFSET_MS,
  OUTCOME_TOLERANCE_MS,
  outcomeTargetTime,
  outcomeSearchWindow,
  findNearestReading,
} from "./outcome.js";

// Windows
export {
  CHART_RANGE_HOURS,
  HISTORY_DEFAULT_DAYS,
  parseChartRange,
  chartWindow,
  historyWindow,
  type ChartRangeHours,
  type TimeWindow,
} from "./windows.js";

// Summaries
export {
  CHART_NOTE_LIMIT,
  HISTORY_NOTE_LIMIT,
  truncateText,
  chartTooltip,
  historySummary,
} from "./summaries.js";
