export type ReadinessAssessment = {
  assessmentId: string;
  overallScore: number;
  dimensionScores: Record<string, number>;
  gaps: string[];
  recommendation: "proceed_with_remediation" | "delay_until_ready";
  assessedAt: string;
};

export type MetricDirection = "higher" | "lower";

export type PilotCriterion = {
  metricName: string;
  metricType: "quantitative" | "qualitative";
  direction: MetricDirection;
  baselineValue: number;
  targetValue: number;
  minimumAcceptable: number;
};

export type PilotMetricStatus = "MEETS_TARGET" | "MEETS_MINIMUM" | "BELOW_MINIMUM";

export type PilotMetricResult = {
  metricName: string;
  actual: number;
  targetValue: number;
  minimumAcceptable: number;
  status: PilotMetricStatus;
};

export type PilotValidation = {
  validationId: string;
  results: PilotMetricResult[];
  metricsMeetingTargets: number;
  metricsMeetingMinimum: number;
  metricsBelowMinimum: number;
  recommendation: "proceed_to_scale" | "proceed_with_caution";
  requiredActions: string[];
  validatedAt: string;
};

export type AuditFinding = {
  findingType: "escalation_volume" | "audit_coverage" | "escalation_rate";
  description: string;
  riskLevel: "informational" | "low" | "medium";
  recommendation: string;
};

export type ComplianceAudit = {
  auditId: string;
  auditPeriodDays: number;
  regulatoryFramework: string;
  totalDecisionsLogged: number;
  escalationsRequiringApproval: number;
  escalationRate: number;
  findings: AuditFinding[];
  controlEffectiveness: "effective" | "needs_attention";
  generatedAt: string;
};
