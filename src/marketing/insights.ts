import { systemClock, type Clock } from "../testing/determinism";
import type { PerformanceInsight, PerformanceTrend } from "./types";

export type PerformanceInsightInput = {
  campaignId: string;
  segmentId: string;
  conversionRate?: number;
  expectedConversionRate?: number;
};

export type PerformanceInsightOptions = {
  /** Percent variance below which a segment is behind target. */
  underperformBelow?: number;
  /** Percent variance above which a segment is ahead of target. */
  outperformAbove?: number;
  clock?: Clock;
};

const CONFIDENCE: Record<PerformanceTrend, number> = {
  below_target: 0.78,
  on_track: 0.72,
  above_target: 0.85
};

export function generatePerformanceInsight(
  input: PerformanceInsightInput,
  options?: PerformanceInsightOptions
): PerformanceInsight {
  const underperformBelow = options?.underperformBelow ?? -10;
  const outperformAbove = options?.outperformAbove ?? 10;
  const clock = options?.clock ?? systemClock;

  const currentValue = input.conversionRate ?? 0.035;
  const expectedValue = input.expectedConversionRate ?? 0.04;
  const variancePercent = expectedValue > 0 ? ((currentValue - expectedValue) / expectedValue) * 100 : 0;

  let trend: PerformanceTrend = "on_track";
  let recommendation = "Performance on track. Continue monitoring and optimize incrementally.";
  if (variancePercent < underperformBelow) {
    trend = "below_target";
    recommendation = `Conversion rate ${variancePercent.toFixed(1)}% below target. Consider: A/B test new messaging, increase frequency cap, or adjust budget allocation.`;
  } else if (variancePercent > outperformAbove) {
    trend = "above_target";
    recommendation = `Conversion rate ${variancePercent.toFixed(1)}% above target. Scale budget in this segment and channel combination.`;
  }

  return {
    insightId: clock.generateId(),
    campaignId: input.campaignId,
    segmentId: input.segmentId,
    metricName: "conversion_rate",
    currentValue,
    expectedValue,
    variancePercent,
    trend,
    recommendation,
    confidence: CONFIDENCE[trend],
    generatedAt: clock.now().toISOString()
  };
}
