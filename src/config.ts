import dotenv from "dotenv";

dotenv.config();

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  if (value.toLowerCase() === "true") {
    return true;
  }
  if (value.toLowerCase() === "false") {
    return false;
  }
  return fallback;
}

function parseOptionalString(value: string | undefined): string | undefined {
  if (!value || value.trim().length === 0) {
    return undefined;
  }
  return value.trim();
}

export const config = {
  serviceName: process.env.SERVICE_NAME ?? "escalation-guardrails",
  logLevel: process.env.LOG_LEVEL ?? "info",
  thresholdsPath: parseOptionalString(process.env.THRESHOLDS_PATH),
  thresholdReloadEnabled: parseBoolean(process.env.THRESHOLD_RELOAD_ENABLED, false),
  auditRecentLimit: parseNumber(process.env.AUDIT_RECENT_LIMIT, 20),
  escalationReport: {
    highEscalationRate: parseNumber(process.env.ESCALATION_HIGH_RATE, 0.15),
    lowEscalationRate: parseNumber(process.env.ESCALATION_LOW_RATE, 0.1)
  },
  governanceAudit: {
    escalationVolumeLimit: parseNumber(process.env.GOVERNANCE_ESCALATION_LIMIT, 10),
    minimumAuditCoverage: parseNumber(process.env.GOVERNANCE_MIN_AUDIT_COVERAGE, 50)
  },
  workflow: {
    maxProcessingHours: parseNumber(process.env.WORKFLOW_MAX_PROCESSING_HOURS, 4)
  },
  supplyChainAudit: {
    escalationRateLimit: parseNumber(process.env.SUPPLY_CHAIN_ESCALATION_RATE_LIMIT, 0.3),
    retrainingIntervalDays: parseNumber(process.env.SUPPLY_CHAIN_RETRAINING_INTERVAL_DAYS, 90)
  },
  drift: {
    baselineErrorRate: parseNumber(process.env.DRIFT_BASELINE_ERROR_RATE, 0.15),
    threshold: parseNumber(process.env.DRIFT_THRESHOLD, 0.1)
  }
};
