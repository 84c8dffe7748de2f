import { LookupError } from "../errors";
import { Diagnostics } from "../utils/diagnostics";

/**
 * Converts a score to a letter grade. A score at a threshold gets the
 * higher letter; below every threshold it gets the last letter.
 * @param thresholds Cut points, highest first
 * @param letters One more letter than thresholds, best first
 */
export function toLetter(
  score: number,
  thresholds: readonly number[],
  letters: readonly string[]
): string {
  for (let i = 0; i < thresholds.length; i++) {
    if (score >= thresholds[i]) {
      return letters[i];
    }
  }
  return letters[letters.length - 1];
}

/**
 * Converts a letter grade back to a score: the middle of its bracket,
 * rounded down. The bracket above the first threshold ends at 100 and
 * the one below the last threshold starts at 0.
 */
export function toNumeric(
  letter: string,
  thresholds: readonly number[],
  letters: readonly string[]
): number {
  const bounds = [...thresholds, 0, 100];
  const index = letters.indexOf(letter);
  if (index === -1 || index > thresholds.length) {
    throw new LookupError("Unknown letter grade", [letter]);
  }
  const lower = bounds[index];
  const upper = index === 0 ? bounds[bounds.length - 1] : bounds[index - 1];
  return Math.floor((lower + upper) / 2);
}

/**
 * Warns about a letter scale that will not map scores as intended
 */
export function checkLetterScale(
  thresholds: readonly number[],
  letters: readonly string[],
  diagnostics: Diagnostics
): void {
  const unsorted = thresholds.some(
    (threshold, i) => i > 0 && thresholds[i - 1] <= threshold
  );
  if (unsorted) {
    diagnostics.warn("thresholds-order", "Thresholds are not sorted in decreasing order", [
      thresholds.join(", "),
    ]);
  }
  if (thresholds.length !== letters.length - 1) {
    diagnostics.warn(
      "letter-count",
      "There should be one more letter grade than thresholds",
      [`${thresholds.length} thresholds`, `${letters.length} letters`]
    );
  }
}
