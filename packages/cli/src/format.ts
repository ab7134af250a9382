/**
 * Plain-text rendering of query results for the terminal
 */

import {
  formatTirRange,
  toSnapshot,
  type ChartResult,
  type DiabetesEvent,
  type DomainError,
  type EventSummary,
  type OutcomeResult,
  type PagedResult,
  type TirResult,
} from "@glucolog/diabetes";

function iso(timestampMs: number): string {
  return new Date(timestampMs).toISOString();
}

export function formatError(error: DomainError): string {
  return `${error.code}: ${error.message}`;
}

export function formatChart(chart: ChartResult): string[] {
  return [
    `Chart ${chart.rangeHours}h: ${iso(chart.start)} to ${iso(chart.end)}`,
    `Readings (${chart.glucose.length}):`,
    ...chart.glucose.map((point) =>
      `  ${iso(point.timestamp)} ${point.glucoseMgDl} mg/dL ${point.trend ?? ""}`.trimEnd()
    ),
    `Events (${chart.events.length}):`,
    ...chart.events.map((overlay) => `  ${iso(overlay.eventTime)} ${overlay.eventType}: ${overlay.tooltip}`),
  ];
}

export function formatTimeInRange(result: TirResult): string[] {
  const target = formatTirRange({ kind: "TirRange", lower: result.lower, upper: result.upper });
  const { stats } = result;
  return [
    `Time in range (${target}, last ${result.rangeHours}h): ${result.percentage}%`,
    `  In range: ${result.inRangeCount}  Below: ${result.belowCount}  Above: ${result.aboveCount}  Total: ${result.totalCount}`,
    `  Mean: ${stats.mean} mg/dL  SD: ${stats.stdDev}  CV: ${stats.cv}%  GMI: ${stats.gmi}%`,
  ];
}

export function formatOutcome(outcome: OutcomeResult): string[] {
  if (outcome.isApproximate || outcome.glucoseMgDl === null) {
    return [`${outcome.message} (target ${iso(outcome.targetTime)})`];
  }
  return [
    `${outcome.message}: ${outcome.glucoseMgDl} mg/dL at ${iso(outcome.readingTime)} (target ${iso(outcome.targetTime)})`,
  ];
}

export function formatHistory(page: PagedResult<EventSummary>): string[] {
  return [
    `Page ${page.page} of ${Math.max(page.totalPages, 1)} (${page.totalCount} events)`,
    ...page.items.map(
      (item) => `  ${iso(item.eventTime)} ${item.eventType.padEnd(8)} ${item.summary}  [${item.eventId}]`
    ),
  ];
}

export function formatEvent(event: DiabetesEvent): string[] {
  return JSON.stringify(toSnapshot(event), null, 2).split("\n");
}
