/**
 * Insulin event type
 */

import type { InsulinDose } from "../values/index.js";
import type { BaseEvent } from "./base.js";

/**
 * Fast-acting (bolus) or long-acting (basal)
 */
export type InsulinType = "Fast" | "Long";

export const INSULIN_TYPES = ["Fast", "Long"] as const;

/**
 * Insulin administration
 */
export interface InsulinEvent extends BaseEvent {
  readonly eventType: "Insulin";
  readonly insulinType: InsulinType;
  readonly dose: InsulinDose;
  /** Preparation details (brand, pen), at most 200 characters */
  readonly preparation: string | null;
  /** Delivery details (injection site, pump settings), at most 200 characters */
  readonly delivery: string | null;
  /** Timing context ("Before meal", "Bedtime"), at most 200 characters */
  readonly timing: string | null;
}
