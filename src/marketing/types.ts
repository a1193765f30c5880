import { z } from "zod";

export const fairnessStatusSchema = z.enum(["WITHIN_THRESHOLD", "MONITOR", "REQUIRES_REVIEW"]);
export type FairnessStatus = z.infer<typeof fairnessStatusSchema>;

export type CustomerSegment = {
  segmentId: string;
  segmentName: string;
  targetingRules: string[];
  fairnessScore: number;
};

export type FairnessConstraints = {
  prohibitedAttributes: readonly string[];
  minFairnessScore: number;
};

export type SegmentFairnessCheck = {
  segmentId: string;
  isCompliant: boolean;
  prohibitedAttributesFound: string[];
  fairnessScore: number;
};

export type FairnessConcern = {
  concernId: string;
  segmentId: string;
  prohibitedAttributes: string[];
  fairnessScore: number;
  actionRequired: "human_review";
  loggedAt: string;
};

export type DisparityAssessment = {
  assessmentId: string;
  conversionRatesBySegment: Record<string, number>;
  maxRate: number;
  minRate: number;
  disparityRatio: number;
  status: FairnessStatus;
  requiresReview: boolean;
  recommendations: string[];
  assessedAt: string;
};

export type PerformanceTrend = "below_target" | "on_track" | "above_target";

export type PerformanceInsight = {
  insightId: string;
  campaignId: string;
  segmentId: string;
  metricName: "conversion_rate";
  currentValue: number;
  expectedValue: number;
  variancePercent: number;
  trend: PerformanceTrend;
  recommendation: string;
  confidence: number;
  generatedAt: string;
};
