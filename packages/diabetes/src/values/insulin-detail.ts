/**
 * Optional insulin free-text details (preparation, delivery, timing)
 */

import { DomainErrors, fail, ok, type Result } from "../errors.js";

export const INSULIN_DETAIL_MAX_LENGTH = 200;

/**
 * Trimmed text, or null when empty. Longer than 200 characters is an error.
 */
export function createInsulinDetail(text: string | null | undefined): Result<string | null> {
  const trimmed = text?.trim() ?? "";
  if (trimmed.length === 0) return ok(null);
  if (trimmed.length > INSULIN_DETAIL_MAX_LENGTH) {
    return fail(DomainErrors.invalidInsulinDetail);
  }
  return ok(trimmed);
}
