/**
 * Source of model-like scores (confidence, error rate). Production callers plug in a
 * model; tests plug in fixed values.
 */
export type SignalScorer<I> = {
  score: (input: I) => number;
};

export function fixedScorer<I>(value: number): SignalScorer<I> {
  return { score: () => value };
}

export function sequenceScorer<I>(values: number[]): SignalScorer<I> {
  if (values.length === 0) {
    throw new RangeError("sequenceScorer requires at least one value.");
  }
  let index = 0;
  return {
    score: () => {
      const value = values[Math.min(index, values.length - 1)];
      index += 1;
      return value;
    }
  };
}

// Placeholder until a forecasting model is wired in.
export function uniformScorer<I>(min: number, max: number, random: () => number = Math.random): SignalScorer<I> {
  if (!(max >= min)) {
    throw new RangeError(`uniformScorer range [${min}, ${max}] is empty.`);
  }
  return { score: () => min + (max - min) * random() };
}
