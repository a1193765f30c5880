import type { Logger } from "pino";
import { logger as defaultLogger } from "../logger";
import { systemClock, type Clock } from "../testing/determinism";
import { ensureTraceId, withTraceId } from "../trace/trace";
import type { InventoryAction, InventoryExecutionRecord } from "./types";

export type InventoryGate = {
  submit: (action: InventoryAction, options?: { approvedBy?: string; traceId?: string }) => InventoryExecutionRecord;
  escalationQueue: () => InventoryExecutionRecord[];
  decisionLog: () => InventoryExecutionRecord[];
};

/**
 * Runs inventory actions the planner may take alone and queues the rest for a planner.
 * An ESCALATION-level action that gets through stays `pending_approval` in the log.
 */
export function createInventoryGate(options?: { clock?: Clock; logger?: Logger }): InventoryGate {
  const clock = options?.clock ?? systemClock;
  const log = options?.logger ?? defaultLogger;
  const escalations: InventoryExecutionRecord[] = [];
  const decisions: InventoryExecutionRecord[] = [];

  const submit = (
    action: InventoryAction,
    submitOptions?: { approvedBy?: string; traceId?: string }
  ): InventoryExecutionRecord => {
    const traced = withTraceId(log, ensureTraceId(submitOptions?.traceId));
    const approvedBy = submitOptions?.approvedBy?.trim() || null;
    const base = {
      executionId: clock.generateId(),
      productId: action.productId,
      locationId: action.locationId,
      actionType: action.actionType,
      recommendedQty: action.recommendedQty,
      decisionLevel: action.decisionLevel,
      confidence: action.confidence,
      reasoning: action.reasoning,
      recordedAt: clock.now().toISOString()
    };

    if (action.requiresApproval && approvedBy === null) {
      const record: InventoryExecutionRecord = { ...base, status: "escalated", executedBy: null };
      escalations.push(record);
      traced.info(
        { productId: action.productId, locationId: action.locationId, decisionLevel: action.decisionLevel },
        "Inventory action held for planner approval"
      );
      return record;
    }

    const record: InventoryExecutionRecord = {
      ...base,
      status: action.decisionLevel === "ESCALATION" ? "pending_approval" : "executed",
      executedBy: approvedBy === null ? "autonomous" : `planner:${approvedBy}`
    };
    decisions.push(record);
    traced.info({ productId: action.productId, status: record.status, executedBy: record.executedBy }, "Inventory action recorded");
    return record;
  };

  return {
    submit,
    escalationQueue: () => escalations.slice(),
    decisionLog: () => decisions.slice()
  };
}
