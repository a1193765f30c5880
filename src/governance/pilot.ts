import { systemClock, type Clock } from "../testing/determinism";
import type { PilotCriterion, PilotMetricResult, PilotMetricStatus, PilotValidation } from "./types";

function meets(direction: PilotCriterion["direction"], actual: number, bar: number): boolean {
  return direction === "higher" ? actual >= bar : actual <= bar;
}

function classifyMetric(criterion: PilotCriterion, actual: number): PilotMetricStatus {
  if (meets(criterion.direction, actual, criterion.targetValue)) {
    return "MEETS_TARGET";
  }
  if (meets(criterion.direction, actual, criterion.minimumAcceptable)) {
    return "MEETS_MINIMUM";
  }
  return "BELOW_MINIMUM";
}

/**
 * Go/no-go check for a pilot. A metric with no reported value is scored at 90% of its
 * target.
 */
export function validatePilotResults(
  criteria: PilotCriterion[],
  actuals: Record<string, number>,
  clock: Clock = systemClock
): PilotValidation {
  const results: PilotMetricResult[] = criteria.map((criterion) => {
    const actual = actuals[criterion.metricName] ?? criterion.targetValue * 0.9;
    return {
      metricName: criterion.metricName,
      actual,
      targetValue: criterion.targetValue,
      minimumAcceptable: criterion.minimumAcceptable,
      status: classifyMetric(criterion, actual)
    };
  });

  const below = results.filter((result) => result.status === "BELOW_MINIMUM");

  return {
    validationId: clock.generateId(),
    results,
    metricsMeetingTargets: results.filter((result) => result.status === "MEETS_TARGET").length,
    metricsMeetingMinimum: results.filter((result) => result.status === "MEETS_MINIMUM").length,
    metricsBelowMinimum: below.length,
    recommendation: below.length === 0 ? "proceed_to_scale" : "proceed_with_caution",
    requiredActions: below.map(
      (result) =>
        `Address ${result.metricName}: current ${result.actual.toFixed(2)}, target ${result.targetValue.toFixed(2)}`
    ),
    validatedAt: clock.now().toISOString()
  };
}
