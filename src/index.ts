export { config } from "./config";
export { logger } from "./logger";
export { ensureTraceId, withTraceId } from "./trace/trace";
export { createDeterministicClock, systemClock, type Clock, type DeterminismConfig } from "./testing/determinism";

export * from "./escalation/types";
export { ConfigurationError, InvalidSignalError } from "./escalation/errors";
export {
  createEscalationEvaluator,
  newEvaluator,
  validateThresholdTable,
  type EscalationEvaluator,
  type EscalationEvaluatorOptions
} from "./escalation/evaluator";
export { aggregateRisk, type WeightedScore } from "./escalation/aggregate";
export type { AuditLog } from "./escalation/audit-store";
export { InMemoryAuditLog } from "./escalation/audit-store.memory";
export { fixedScorer, sequenceScorer, uniformScorer, type SignalScorer } from "./escalation/scoring";
export { summarizeEscalations, type EscalationSummary, type EscalationSummaryOptions } from "./escalation/summary";

export {
  createThresholdLoader,
  defaultThresholdPath,
  parseThresholdDocument,
  resolveThresholdTable,
  type ResolvedThresholdTable,
  type ThresholdInfo,
  type ThresholdLoader,
  type ThresholdSnapshot
} from "./thresholds/loader";
export { thresholdDocumentSchema, type ThresholdDocument, type ThresholdTableEntry } from "./thresholds/schema";

export * from "./operations/types";
export { createComplianceValidator, type ComplianceValidator } from "./operations/validator";
export { createTaskGate, type TaskGate } from "./operations/execution";
export { classifyInput } from "./operations/classify";

export * from "./supplychain/types";
export { forecastDemand, type ForecastScoringInput } from "./supplychain/forecast";
export { createInventoryPlanner, type InventoryPlanner, type InventoryPlannerOptions } from "./supplychain/planner";
export { monitorLearningDrift, scheduleRetraining, type DriftOptions } from "./supplychain/drift";
export { createInventoryGate, type InventoryGate } from "./supplychain/execution";
export { auditSupplyChainGovernance, type SupplyChainAuditOptions } from "./supplychain/governance";

export * from "./marketing/types";
export { DEFAULT_FAIRNESS_CONSTRAINTS } from "./marketing/constraints";
export { createFairnessMonitor, validateSegmentFairness, type FairnessMonitor } from "./marketing/fairness";
export {
  generatePerformanceInsight,
  type PerformanceInsightInput,
  type PerformanceInsightOptions
} from "./marketing/insights";

export * from "./governance/types";
export { assessReadiness } from "./governance/readiness";
export { validatePilotResults } from "./governance/pilot";
export { generateComplianceAudit, type ComplianceAuditOptions } from "./governance/audit";
