import { config } from "../config";
import { systemClock, type Clock } from "../testing/determinism";
import type { InventoryGate } from "./execution";
import type { DecisionLevel, SupplyChainGovernanceAudit } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

export type SupplyChainAuditOptions = {
  modelVersion: string;
  lastTrainingDate: Date;
  autonomyFloor: DecisionLevel;
  escalationRateLimit?: number;
  retrainingIntervalDays?: number;
  clock?: Clock;
};

export function auditSupplyChainGovernance(
  gate: Pick<InventoryGate, "escalationQueue" | "decisionLog">,
  options: SupplyChainAuditOptions
): SupplyChainGovernanceAudit {
  const clock = options.clock ?? systemClock;
  const rateLimit = options.escalationRateLimit ?? config.supplyChainAudit.escalationRateLimit;
  const intervalDays = options.retrainingIntervalDays ?? config.supplyChainAudit.retrainingIntervalDays;

  const auditId = clock.generateId();
  const auditedAt = clock.now();
  const totalDecisions = gate.decisionLog().length;
  const escalationsCount = gate.escalationQueue().length;
  // Escalated actions never reach the decision log, so the rate can exceed 1.
  const escalationRate = escalationsCount / Math.max(totalDecisions, 1);
  const daysSinceTraining = Math.floor((auditedAt.getTime() - options.lastTrainingDate.getTime()) / DAY_MS);

  const governanceRecommendations: string[] = [];
  if (escalationRate > rateLimit) {
    governanceRecommendations.push("High escalation rate detected. Consider reviewing decision boundaries.");
  }
  if (daysSinceTraining > intervalDays) {
    governanceRecommendations.push("Model approaching retraining interval. Schedule maintenance window.");
  }

  return {
    auditId,
    totalDecisions,
    escalationsCount,
    escalationRate,
    modelVersion: options.modelVersion,
    lastTrainingDate: options.lastTrainingDate.toISOString(),
    daysSinceTraining,
    autonomyFloor: options.autonomyFloor,
    complianceStatus: governanceRecommendations.length === 0 ? "compliant" : "needs_attention",
    governanceRecommendations,
    auditedAt: auditedAt.toISOString()
  };
}
