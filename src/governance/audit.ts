import { config } from "../config";
import { summarizeEscalations, type EscalationSummaryOptions } from "../escalation/summary";
import type { AuditRecord } from "../escalation/types";
import { systemClock, type Clock } from "../testing/determinism";
import type { AuditFinding, ComplianceAudit } from "./types";

export type ComplianceAuditOptions = EscalationSummaryOptions & {
  auditPeriodDays?: number;
  regulatoryFramework?: string;
  escalationVolumeLimit?: number;
  minimumAuditCoverage?: number;
  clock?: Clock;
};

export function generateComplianceAudit(
  records: ReadonlyArray<AuditRecord<string>>,
  options?: ComplianceAuditOptions
): ComplianceAudit {
  const clock = options?.clock ?? systemClock;
  const volumeLimit = options?.escalationVolumeLimit ?? config.governanceAudit.escalationVolumeLimit;
  const minimumCoverage = options?.minimumAuditCoverage ?? config.governanceAudit.minimumAuditCoverage;
  const summary = summarizeEscalations(records, options);
  const findings: AuditFinding[] = [];

  if (summary.escalatedRecords > volumeLimit) {
    findings.push({
      findingType: "escalation_volume",
      description: "High volume of escalations may indicate overly restrictive decision boundaries",
      riskLevel: "low",
      recommendation: "Review autonomy levels in next assessment"
    });
  }

  for (const anomaly of summary.anomalies) {
    findings.push({
      findingType: "escalation_rate",
      description: anomaly,
      riskLevel: "medium",
      recommendation: "Recalibrate threshold tables against recent outcomes"
    });
  }

  if (summary.totalRecords < minimumCoverage) {
    findings.push({
      findingType: "audit_coverage",
      description: "Audit trail volume below expected for measurement period",
      riskLevel: "informational",
      recommendation: "Monitor for representative sample size"
    });
  }

  return {
    auditId: clock.generateId(),
    auditPeriodDays: options?.auditPeriodDays ?? 30,
    regulatoryFramework: options?.regulatoryFramework ?? "SOX_ITGC",
    totalDecisionsLogged: summary.totalRecords,
    escalationsRequiringApproval: summary.escalatedRecords,
    escalationRate: summary.escalationRate,
    findings,
    controlEffectiveness: findings.some((finding) => finding.riskLevel === "medium") ? "needs_attention" : "effective",
    generatedAt: clock.now().toISOString()
  };
}
