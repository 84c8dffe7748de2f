import { ConfigError, DomainError, KeyMissingError } from "../errors";
import { GradingScheme, ScoreInput, ScoreMap } from "../types";

export function mean(): GradingScheme {
  return { kind: "mean" };
}

/**
 * Average after dropping the `count` lowest scores
 */
export function drop(count: number): GradingScheme {
  if (!Number.isInteger(count) || count < 0) {
    throw new ConfigError("Drop count must be a non-negative integer", [
      String(count),
    ]);
  }
  return { kind: "drop", count };
}

/**
 * Weighted average. A list is matched to the scores by position,
 * a record by score name.
 */
export function weights(
  weightsBy: readonly number[] | Readonly<Record<string, number>>
): GradingScheme {
  const values = isNumberList(weightsBy) ? weightsBy : Object.values(weightsBy);
  if (values.length === 0 || sum(values) === 0) {
    throw new ConfigError("Weights must not be empty or sum to zero");
  }
  return isNumberList(weightsBy)
    ? { kind: "weighted-list", weights: [...weightsBy] }
    : { kind: "weighted-map", weights: { ...weightsBy } };
}

export function custom(apply: (values: ScoreMap) => number): GradingScheme {
  return { kind: "custom", apply };
}

/**
 * Applies one scheme to a set of scores
 * @param values Scores in order, or keyed by name (in order)
 * @returns The aggregate score, on the same scale as the inputs
 */
export function applyScheme(scheme: GradingScheme, values: ScoreInput): number {
  const scores = toScoreMap(values);
  const list = [...scores.values()];

  switch (scheme.kind) {
    case "mean":
      return sum(list) / list.length;
    case "drop": {
      const kept = list.length - scheme.count;
      if (kept <= 0) {
        throw new DomainError(
          `Cannot drop ${scheme.count} of ${list.length} scores`
        );
      }
      const highest = [...list].sort((a, b) => b - a).slice(0, kept);
      return sum(highest) / kept;
    }
    case "weighted-list": {
      const weightList = scheme.weights;
      if (weightList.length !== list.length) {
        throw new ConfigError(
          `Expected ${weightList.length} scores for the weights, got ${list.length}`
        );
      }
      const total = list.reduce((acc, v, i) => acc + v * weightList[i], 0);
      return total / sum(weightList);
    }
    case "weighted-map": {
      const entries = Object.entries(scheme.weights);
      const missing = entries
        .map(([key]) => key)
        .filter((key) => !scores.has(key));
      if (missing.length > 0) {
        throw new KeyMissingError("Weighted scores are missing", missing);
      }
      const total = entries.reduce(
        (acc, [key, weight]) => acc + (scores.get(key) ?? 0) * weight,
        0
      );
      return total / sum(entries.map(([, weight]) => weight));
    }
    case "custom":
      return scheme.apply(scores);
  }
}

/**
 * Best of several alternative policies: the max over `schemes`
 */
export function applyBestScheme(
  schemes: readonly GradingScheme[],
  values: ScoreInput
): number {
  if (schemes.length === 0) {
    throw new ConfigError("At least one grading scheme is required");
  }
  return Math.max(...schemes.map((scheme) => applyScheme(scheme, values)));
}

/**
 * Checks a scheme against the names it will be applied to, before any
 * score is computed
 * @param names The score names, in the order the scheme will see them
 * @param owner Used in error messages, e.g. the assignment name
 */
export function validateScheme(
  scheme: GradingScheme,
  names: readonly string[],
  owner: string
): void {
  switch (scheme.kind) {
    case "drop":
      if (scheme.count >= names.length) {
        throw new DomainError(
          `${owner}: cannot drop ${scheme.count} of ${names.length} scores`
        );
      }
      return;
    case "weighted-list":
      if (scheme.weights.length !== names.length) {
        throw new ConfigError(
          `${owner}: ${scheme.weights.length} weights given for ${names.length} scores`
        );
      }
      return;
    case "weighted-map": {
      const missing = Object.keys(scheme.weights).filter(
        (key) => !names.includes(key)
      );
      if (missing.length > 0) {
        throw new KeyMissingError(`${owner}: weights refer to unknown scores`, missing);
      }
      return;
    }
    default:
      return;
  }
}

function toScoreMap(values: ScoreInput): ScoreMap {
  if (isNumberList(values)) {
    return new Map(
      values.map((value, i): [string, number] => [String(i), value])
    );
  }
  return values;
}

function isNumberList(
  value: readonly number[] | object
): value is readonly number[] {
  return Array.isArray(value);
}

function sum(values: readonly number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}
