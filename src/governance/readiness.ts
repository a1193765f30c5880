import { aggregateRisk } from "../escalation/aggregate";
import { systemClock, type Clock } from "../testing/determinism";
import type { ReadinessAssessment } from "./types";

const DEFAULT_GAP_THRESHOLDS: Record<string, { minimum: number; gap: string }> = {
  workforce_preparedness: {
    minimum: 0.7,
    gap: "Insufficient change management capability; requires upskilling"
  },
  data_maturity: {
    minimum: 0.75,
    gap: "Data quality issues; requires data governance investment"
  }
};

export function assessReadiness(
  dimensionScores: Record<string, number>,
  options?: {
    gapThresholds?: Record<string, { minimum: number; gap: string }>;
    proceedAbove?: number;
    clock?: Clock;
  }
): ReadinessAssessment {
  const gapThresholds = options?.gapThresholds ?? DEFAULT_GAP_THRESHOLDS;
  const proceedAbove = options?.proceedAbove ?? 0.7;
  const clock = options?.clock ?? systemClock;

  const overallScore = aggregateRisk(Object.values(dimensionScores));
  const gaps = Object.entries(gapThresholds)
    .filter(([dimension, threshold]) => {
      const score = dimensionScores[dimension];
      return score !== undefined && score < threshold.minimum;
    })
    .map(([, threshold]) => threshold.gap);

  return {
    assessmentId: clock.generateId(),
    overallScore,
    dimensionScores: { ...dimensionScores },
    gaps,
    recommendation: overallScore > proceedAbove ? "proceed_with_remediation" : "delay_until_ready",
    assessedAt: clock.now().toISOString()
  };
}
