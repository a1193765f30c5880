import { config } from "../config";
import type { AuditRecord } from "./types";

export type EscalationSummary = {
  totalRecords: number;
  escalatedRecords: number;
  escalationRate: number;
  countsByLevel: Record<string, number>;
  anomalies: string[];
  recommendations: string[];
};

export type EscalationSummaryOptions = {
  highEscalationRate?: number;
  lowEscalationRate?: number;
};

function formatPercent(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

export function summarizeEscalations(
  records: ReadonlyArray<AuditRecord<string>>,
  options?: EscalationSummaryOptions
): EscalationSummary {
  const highRate = options?.highEscalationRate ?? config.escalationReport.highEscalationRate;
  const lowRate = options?.lowEscalationRate ?? config.escalationReport.lowEscalationRate;

  const totalRecords = records.length;
  const escalatedRecords = records.filter((record) => record.requiresReview).length;
  const escalationRate = escalatedRecords / Math.max(totalRecords, 1);

  const countsByLevel: Record<string, number> = {};
  for (const record of records) {
    countsByLevel[record.level] = (countsByLevel[record.level] ?? 0) + 1;
  }

  const anomalies: string[] = [];
  const recommendations: string[] = [];

  if (escalationRate > highRate) {
    anomalies.push(`High escalation rate (${formatPercent(escalationRate)}): review decision boundaries.`);
  }
  if (totalRecords > 0 && escalationRate < lowRate) {
    recommendations.push("Consider increasing the autonomy threshold for low-risk decisions.");
  }

  return {
    totalRecords,
    escalatedRecords,
    escalationRate,
    countsByLevel,
    anomalies,
    recommendations
  };
}
