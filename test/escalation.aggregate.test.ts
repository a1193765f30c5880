import { expect, test } from "vitest";
import { aggregateRisk } from "../src/escalation/aggregate";
import { InvalidSignalError } from "../src/escalation/errors";

test("empty component list aggregates to zero risk", () => {
  expect(aggregateRisk([])).toBe(0);
});

test("unweighted components aggregate to their mean", () => {
  expect(aggregateRisk([0.5])).toBe(0.5);
  expect(aggregateRisk([0.9, 0.7])).toBeCloseTo(0.8, 10);
  expect(aggregateRisk([{ score: 0.25 }, 0.75])).toBe(0.5);
});

test("weights scale each component's contribution", () => {
  expect(
    aggregateRisk([
      { score: 1, weight: 3 },
      { score: 0, weight: 1 }
    ])
  ).toBe(0.75);
});

test("zero total weight never divides", () => {
  expect(
    aggregateRisk([
      { score: 0.9, weight: 0 },
      { score: 0.4, weight: 0 }
    ])
  ).toBe(0);
});

test("rejects non-finite scores and invalid weights", () => {
  expect(() => aggregateRisk([0.2, Number.NaN])).toThrow(InvalidSignalError);
  expect(() => aggregateRisk([{ score: 0.2, weight: -1 }])).toThrow(InvalidSignalError);
  expect(() => aggregateRisk([{ score: 0.2, weight: Number.POSITIVE_INFINITY }])).toThrow(
    "Component weight at index 0 must be a finite, non-negative number."
  );
});
