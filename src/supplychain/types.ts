import { z } from "zod";

export const decisionLevelSchema = z.enum(["AUTONOMOUS", "SEMI_AUTONOMOUS", "HUMAN_REVIEW", "ESCALATION"]);
export type DecisionLevel = z.infer<typeof decisionLevelSchema>;

export type InventoryActionType = "reorder" | "reduce" | "maintain";

export type DemandHistory = {
  avgDailyDemand?: number;
  volatilityFactor?: number;
  seasonalityFactor?: number;
};

export type ForecastTarget = {
  productId: string;
  locationId: string;
  horizonDays?: number;
};

export type ForecastData = {
  productId: string;
  locationId: string;
  forecastQty: number;
  lowerBound: number;
  upperBound: number;
  accuracy: number;
  historicalErrorRate: number;
  forecastMethod: string;
  horizonDays: number;
};

export type InventoryAction = {
  productId: string;
  locationId: string;
  actionType: InventoryActionType;
  recommendedQty: number;
  confidence: number;
  decisionLevel: DecisionLevel;
  requiresApproval: boolean;
  reorderPoint: number;
  safetyStock: number;
  reasoning: string;
  recommendedAt: string;
};

export type DriftReport = {
  driftDetected: boolean;
  driftMagnitude: number;
  driftPercent: number;
  action: "trigger_retraining" | "continue_monitoring";
  checkedAt: string;
  modelVersion: string;
};

export type RetrainingSchedule = {
  currentModelVersion: string;
  newModelVersion: string;
  triggerReason: string;
  scheduledFor: string;
  approvalRequiredBy: string;
};

export type InventoryExecutionStatus = "escalated" | "executed" | "pending_approval";

export type InventoryExecutionRecord = {
  executionId: string;
  productId: string;
  locationId: string;
  actionType: InventoryActionType;
  recommendedQty: number;
  status: InventoryExecutionStatus;
  executedBy: string | null;
  decisionLevel: DecisionLevel;
  confidence: number;
  reasoning: string;
  recordedAt: string;
};

export type SupplyChainGovernanceAudit = {
  auditId: string;
  totalDecisions: number;
  escalationsCount: number;
  escalationRate: number;
  modelVersion: string;
  lastTrainingDate: string;
  daysSinceTraining: number;
  autonomyFloor: DecisionLevel;
  complianceStatus: "compliant" | "needs_attention";
  governanceRecommendations: string[];
  auditedAt: string;
};
