/**
 * Free-text note content
 *
 * Input is trimmed before the length check, so "  hello  " is stored as
 * "hello" and an all-whitespace string is rejected.
 */

import { DomainErrors, fail, ok, type Result } from "../errors.js";

export const NOTE_TEXT_MAX_LENGTH = 500;

export interface NoteText {
  readonly kind: "NoteText";
  readonly text: string;
}

export function createNoteText(text: string | null | undefined): Result<NoteText> {
  const trimmed = text?.trim() ?? "";

  if (trimmed.length < 1 || trimmed.length > NOTE_TEXT_MAX_LENGTH) {
    return fail(DomainErrors.invalidNoteText);
  }

  const value: NoteText = { kind: "NoteText", text: trimmed };
  return ok(Object.freeze(value));
}

/**
 * Note text for fields where a note is not required.
 * Empty or whitespace input is absent (null) rather than an error;
 * over-long input is still rejected.
 */
export function createOptionalNoteText(
  text: string | null | undefined
): Result<NoteText | null> {
  if (!text || text.trim().length === 0) {
    return ok(null);
  }
  return createNoteText(text);
}
