/**
 * packages/testkit/src/css.ts — Stylesheet inspection helpers.
 *
 * Why: Rendered stylesheets are long single-line-per-rule blobs. Tests assert
 * on individual rules and on how often a rule or fragment occurs.
 */

/** Splits a stylesheet into its non-empty, trimmed lines. */
export function cssRules(sheet: string): readonly string[] {
  const out: string[] = [];
  for (const line of sheet.split("\n")) {
    const trimmed = line.trim();
    if (trimmed.length > 0) out.push(trimmed);
  }
  return out;
}

/** Counts non-overlapping occurrences of `needle` in `haystack`. */
export function countOccurrences(haystack: string, needle: string): number {
  if (needle.length === 0) return 0;
  let count = 0;
  let from = 0;
  for (;;) {
    const at = haystack.indexOf(needle, from);
    if (at < 0) return count;
    count++;
    from = at + needle.length;
  }
}
