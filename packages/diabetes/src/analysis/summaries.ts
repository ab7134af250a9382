/**
 * Short per-event text for chart tooltips and the history list
 *
 * The two call sites truncate notes differently (30/27 characters on the
 * chart, 50/47 in history) and word exercise differently. They are kept as
 * separate functions on purpose.
 */

import { assertNever, type DiabetesEvent } from "../models/index.js";
import { formatInsulinDose } from "../values/index.js";

export const CHART_NOTE_LIMIT = { threshold: 30, keep: 27 } as const;
export const HISTORY_NOTE_LIMIT = { threshold: 50, keep: 47 } as const;

const ELLIPSIS = "...";

/**
 * Text longer than the threshold is cut to `keep` characters plus "..."
 */
export function truncateText(text: string, limit: { threshold: number; keep: number }): string {
  return text.length > limit.threshold ? `${text.slice(0, limit.keep)}${ELLIPSIS}` : text;
}

/**
 * Tooltip for an event overlay on the glucose chart
 */
export function chartTooltip(event: DiabetesEvent): string {
  switch (event.eventType) {
    case "Food":
      return `${event.carbohydrate.grams}g carbs`;
    case "Insulin":
      return `${formatInsulinDose(event.dose)} ${event.insulinType}`;
    case "Exercise":
      return `${event.duration.minutes}min exercise`;
    case "Note":
      return truncateText(event.text.text, CHART_NOTE_LIMIT);
    default:
      return assertNever(event);
  }
}

/**
 * Summary line for an event in the history list
 */
export function historySummary(event: DiabetesEvent): string {
  switch (event.eventType) {
    case "Food":
      return `${event.carbohydrate.grams}g carbs`;
    case "Insulin":
      return `${formatInsulinDose(event.dose)} ${event.insulinType}`;
    case "Exercise":
      return `${event.duration.minutes}min`;
    case "Note":
      return truncateText(event.text.text, HISTORY_NOTE_LIMIT);
    default:
      return assertNever(event);
  }
}
