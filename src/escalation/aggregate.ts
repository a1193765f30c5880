import { InvalidSignalError } from "./errors";

export type WeightedScore = {
  score: number;
  weight?: number;
};

/**
 * Weighted mean of component risk scores. Bare numbers and entries without a weight
 * count once. No components, or a zero total weight, means no risk.
 */
export function aggregateRisk(signals: ReadonlyArray<number | WeightedScore>): number {
  let weightedSum = 0;
  let totalWeight = 0;

  signals.forEach((entry, index) => {
    const { score, weight = 1 } = typeof entry === "number" ? { score: entry } : entry;
    if (!Number.isFinite(score)) {
      throw new InvalidSignalError(`Component score at index ${index} must be a finite number.`, `risk[${index}]`, score);
    }
    if (!Number.isFinite(weight) || weight < 0) {
      throw new InvalidSignalError(
        `Component weight at index ${index} must be a finite, non-negative number.`,
        `weight[${index}]`,
        weight
      );
    }
    weightedSum += score * weight;
    totalWeight += weight;
  });

  if (totalWeight === 0) {
    return 0;
  }
  return weightedSum / totalWeight;
}
