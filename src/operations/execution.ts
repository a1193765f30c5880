import type { Logger } from "pino";
import { config } from "../config";
import { logger as defaultLogger } from "../logger";
import { systemClock, type Clock } from "../testing/determinism";
import { ensureTraceId, withTraceId } from "../trace/trace";
import type { ComplianceCheckResult, TaskRecord, WorkflowExceptionsReport } from "./types";

export type TaskGate = {
  submit: (check: ComplianceCheckResult, options?: { approvedBy?: string; traceId?: string }) => TaskRecord;
  pendingEscalations: () => TaskRecord[];
  executionLog: () => TaskRecord[];
  exceptionsReport: () => WorkflowExceptionsReport;
};

function formatPercent(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

/**
 * Holds back tasks whose compliance check requires review until an approver is named.
 * The gate owns its escalation queue and execution log.
 */
export function createTaskGate(options?: {
  clock?: Clock;
  logger?: Logger;
  maxProcessingHours?: number;
}): TaskGate {
  const clock = options?.clock ?? systemClock;
  const log = options?.logger ?? defaultLogger;
  const maxProcessingHours = options?.maxProcessingHours ?? config.workflow.maxProcessingHours;
  const escalations: TaskRecord[] = [];
  const executed: TaskRecord[] = [];

  const submit = (
    check: ComplianceCheckResult,
    submitOptions?: { approvedBy?: string; traceId?: string }
  ): TaskRecord => {
    const traced = withTraceId(log, ensureTraceId(submitOptions?.traceId));
    const approvedBy = submitOptions?.approvedBy?.trim() || null;

    if (check.requiresHumanReview && approvedBy === null) {
      const record: TaskRecord = {
        executionId: clock.generateId(),
        checkId: check.checkId,
        inputId: check.inputId,
        status: "escalated",
        executedBy: null,
        reason: "compliance_review_required",
        violations: check.violations.map((violation) => violation.message),
        riskScore: check.riskScore,
        estimatedProcessingHours: check.classification.estimatedProcessingHours,
        recordedAt: clock.now().toISOString()
      };
      escalations.push(record);
      traced.info({ inputId: check.inputId, status: check.status }, "Task escalated for compliance review");
      return record;
    }

    const record: TaskRecord = {
      executionId: clock.generateId(),
      checkId: check.checkId,
      inputId: check.inputId,
      status: "executed",
      executedBy: approvedBy === null ? "autonomous" : `approver:${approvedBy}`,
      reason: null,
      violations: check.violations.map((violation) => violation.message),
      riskScore: check.riskScore,
      estimatedProcessingHours: check.classification.estimatedProcessingHours,
      recordedAt: clock.now().toISOString()
    };
    executed.push(record);
    traced.info({ inputId: check.inputId, executedBy: record.executedBy }, "Task executed");
    return record;
  };

  const exceptionsReport = (): WorkflowExceptionsReport => {
    const totalTasks = executed.length + escalations.length;
    const escalationRate = escalations.length / Math.max(totalTasks, 1);
    const averageProcessingHours = executed.length === 0
      ? 0
      : executed.reduce((sum, record) => sum + record.estimatedProcessingHours, 0) / executed.length;

    const anomalies: string[] = [];
    if (escalationRate > config.escalationReport.highEscalationRate) {
      anomalies.push(`High escalation rate (${formatPercent(escalationRate)}): review decision boundaries.`);
    }
    if (averageProcessingHours > maxProcessingHours) {
      anomalies.push(`Long processing time (${averageProcessingHours.toFixed(1)}h): bottleneck detected.`);
    }

    const recommendations: string[] = [];
    if (totalTasks > 0 && escalationRate < config.escalationReport.lowEscalationRate) {
      recommendations.push("Consider increasing the autonomy threshold for low-risk transactions.");
    }

    return {
      totalTasks,
      escalatedTasks: escalations.length,
      escalationRate,
      averageProcessingHours,
      anomalies,
      recommendations,
      reportedAt: clock.now().toISOString()
    };
  };

  return {
    submit,
    pendingEscalations: () => escalations.slice(),
    executionLog: () => executed.slice(),
    exceptionsReport
  };
}
