/**
 * Food event type
 */

import type { Carbohydrate, MealTagId } from "../values/index.js";
import type { BaseEvent } from "./base.js";

/**
 * Expected absorption rate of the food
 */
export type AbsorptionHint = "Rapid" | "Normal" | "Slow" | "Other";

export const ABSORPTION_HINTS = ["Rapid", "Normal", "Slow", "Other"] as const;

/**
 * Meal or snack with its carbohydrate content
 */
export interface FoodEvent extends BaseEvent {
  readonly eventType: "Food";
  readonly carbohydrate: Carbohydrate;
  /** Meal category (breakfast, lunch, ...) from the meal tag lookup */
  readonly mealTagId: MealTagId;
  readonly absorptionHint: AbsorptionHint;
}
