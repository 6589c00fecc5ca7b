/**
 * Secret redaction for report snippets.
 *
 * Every snippet a finding carries is produced here. Values of 8 characters or
 * more keep their first and last 4 characters; anything shorter is replaced by
 * a fixed mask so that its length is not revealed either.
 */

/** Minimum length for partial disclosure. */
export const MIN_REDACT_LENGTH = 8;

/** Characters kept at each end of a long value. */
export const REDACT_VISIBLE_CHARS = 4;

export const REDACTION_SEPARATOR = "...";

export const SHORT_VALUE_MASK = "********";

export function redact(secretValue: string): string {
  if (secretValue.length < MIN_REDACT_LENGTH) {
    return SHORT_VALUE_MASK;
  }
  const head = secretValue.slice(0, REDACT_VISIBLE_CHARS);
  const tail = secretValue.slice(-REDACT_VISIBLE_CHARS);
  return singleLine(head) + REDACTION_SEPARATOR + singleLine(tail);
}

// Multi-line captures (key blocks) must not break the report layout
function singleLine(text: string): string {
  return text.replace(/\s/g, " ");
}
