import type { Logger } from "pino";
import { InvalidSignalError } from "../escalation/errors";
import { createEscalationEvaluator, type EscalationEvaluator } from "../escalation/evaluator";
import type { EvaluationContext } from "../escalation/types";
import { logger as defaultLogger } from "../logger";
import { systemClock, type Clock } from "../testing/determinism";
import { resolveThresholdTable } from "../thresholds/loader";
import type { ThresholdDocument } from "../thresholds/schema";
import { DEFAULT_FAIRNESS_CONSTRAINTS } from "./constraints";
import {
  fairnessStatusSchema,
  type CustomerSegment,
  type DisparityAssessment,
  type FairnessConcern,
  type FairnessConstraints,
  type FairnessStatus,
  type SegmentFairnessCheck
} from "./types";

export function validateSegmentFairness(
  segment: CustomerSegment,
  constraints: FairnessConstraints = DEFAULT_FAIRNESS_CONSTRAINTS
): SegmentFairnessCheck {
  const prohibitedAttributesFound: string[] = [];
  for (const rule of segment.targetingRules) {
    const normalized = rule.toLowerCase();
    for (const attribute of constraints.prohibitedAttributes) {
      if (normalized.includes(attribute.toLowerCase())) {
        prohibitedAttributesFound.push(attribute);
      }
    }
  }

  return {
    segmentId: segment.segmentId,
    isCompliant: prohibitedAttributesFound.length === 0 && segment.fairnessScore > constraints.minFairnessScore,
    prohibitedAttributesFound,
    fairnessScore: segment.fairnessScore
  };
}

export type FairnessMonitor = {
  assessDisparity: (conversionRatesBySegment: Record<string, number>, context?: EvaluationContext) => DisparityAssessment;
  screenSegments: (segments: CustomerSegment[]) => SegmentFairnessCheck[];
  concerns: () => FairnessConcern[];
  evaluator: EscalationEvaluator<FairnessStatus>;
};

export function createFairnessMonitor(options: {
  document: ThresholdDocument | null;
  constraints?: FairnessConstraints;
  clock?: Clock;
  logger?: Logger;
}): FairnessMonitor {
  const constraints = options.constraints ?? DEFAULT_FAIRNESS_CONSTRAINTS;
  const clock = options.clock ?? systemClock;
  const log = options.logger ?? defaultLogger;
  const resolved = resolveThresholdTable(options.document, "conversion-disparity", fairnessStatusSchema);
  const evaluator = createEscalationEvaluator(resolved.table, resolved.reviewAbove, { clock, logger: log });
  const concernLog: FairnessConcern[] = [];

  const assessDisparity = (
    conversionRatesBySegment: Record<string, number>,
    context?: EvaluationContext
  ): DisparityAssessment => {
    const entries = Object.entries(conversionRatesBySegment);
    if (entries.length === 0) {
      throw new InvalidSignalError("At least one segment conversion rate is required.", "conversion-rates", Number.NaN);
    }
    for (const [segmentId, rate] of entries) {
      if (!Number.isFinite(rate) || rate < 0) {
        throw new InvalidSignalError(
          `Conversion rate for ${segmentId} must be a finite, non-negative number.`,
          `conversion-rate.${segmentId}`,
          rate
        );
      }
    }

    const rates = entries.map(([, rate]) => rate);
    const maxRate = Math.max(...rates);
    const minRate = Math.min(...rates);
    const disparityRatio = minRate > 0 ? maxRate / minRate : 1;
    const assessmentId = clock.generateId();

    const outcome = evaluator.evaluate(
      { caseId: assessmentId, name: "marketing.conversion-disparity", value: disparityRatio },
      context
    );

    const recommendations: string[] = [];
    if (outcome.level !== "WITHIN_THRESHOLD") {
      recommendations.push(
        "Significant conversion rate disparity detected across segments. Review personalization logic for potential bias."
      );
    }

    return {
      assessmentId,
      conversionRatesBySegment: { ...conversionRatesBySegment },
      maxRate,
      minRate,
      disparityRatio,
      status: outcome.level,
      requiresReview: outcome.requiresReview,
      recommendations,
      assessedAt: clock.now().toISOString()
    };
  };

  const screenSegments = (segments: CustomerSegment[]): SegmentFairnessCheck[] =>
    segments.map((segment) => {
      const check = validateSegmentFairness(segment, constraints);
      if (!check.isCompliant) {
        concernLog.push({
          concernId: clock.generateId(),
          segmentId: segment.segmentId,
          prohibitedAttributes: check.prohibitedAttributesFound,
          fairnessScore: segment.fairnessScore,
          actionRequired: "human_review",
          loggedAt: clock.now().toISOString()
        });
        log.warn({ segmentId: segment.segmentId, prohibited: check.prohibitedAttributesFound }, "Segment failed fairness screening");
      }
      return check;
    });

  return {
    assessDisparity,
    screenSegments,
    concerns: () => concernLog.slice(),
    evaluator
  };
}
