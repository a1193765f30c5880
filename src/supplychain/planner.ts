import type { Logger } from "pino";
import type { AuditLog } from "../escalation/audit-store";
import { InMemoryAuditLog } from "../escalation/audit-store.memory";
import { createEscalationEvaluator, type EscalationEvaluator } from "../escalation/evaluator";
import type { AuditRecord, EvaluationContext } from "../escalation/types";
import { logger as defaultLogger } from "../logger";
import { systemClock, type Clock } from "../testing/determinism";
import { resolveThresholdTable } from "../thresholds/loader";
import type { ThresholdDocument } from "../thresholds/schema";
import { decisionLevelSchema, type DecisionLevel, type ForecastData, type InventoryAction, type InventoryActionType } from "./types";

export type InventoryPlannerOptions = {
  document: ThresholdDocument | null;
  /** Least-severe level a recommendation can carry; lower outcomes are raised to it. */
  autonomyFloor?: DecisionLevel;
  leadTimeDays?: number;
  safetyStockFactor?: number;
  auditLog?: AuditLog<DecisionLevel>;
  clock?: Clock;
  logger?: Logger;
};

export type InventoryPlanner = {
  recommend: (forecast: ForecastData, currentInventory: number, context?: EvaluationContext) => InventoryAction;
  decisionLog: (limit?: number) => AuditRecord<DecisionLevel>[];
  evaluators: {
    forecastError: EscalationEvaluator<DecisionLevel>;
    orderQuantity: EscalationEvaluator<DecisionLevel>;
  };
};

const REORDER_COVERAGE = 1.5;
const REDUCTION_SHARE = 0.3;
const OVERSTOCK_MULTIPLE = 2;

export function createInventoryPlanner(options: InventoryPlannerOptions): InventoryPlanner {
  const autonomyFloor = options.autonomyFloor ?? "SEMI_AUTONOMOUS";
  const leadTimeDays = options.leadTimeDays ?? 14;
  const safetyStockFactor = options.safetyStockFactor ?? 0.2;
  const clock = options.clock ?? systemClock;
  const auditLog = options.auditLog ?? new InMemoryAuditLog<DecisionLevel>();
  const shared = { auditLog, clock, logger: options.logger ?? defaultLogger };

  const errorTable = resolveThresholdTable(options.document, "forecast-error", decisionLevelSchema);
  const quantityTable = resolveThresholdTable(options.document, "order-quantity", decisionLevelSchema);
  const forecastError = createEscalationEvaluator(errorTable.table, errorTable.reviewAbove, shared);
  const orderQuantity = createEscalationEvaluator(quantityTable.table, quantityTable.reviewAbove, shared);

  const recommend = (forecast: ForecastData, currentInventory: number, context?: EvaluationContext): InventoryAction => {
    const dailyDemand = forecast.forecastQty / forecast.horizonDays;
    const leadTimeDemand = dailyDemand * leadTimeDays;
    const safetyStock = Math.floor(dailyDemand * leadTimeDays * safetyStockFactor);
    const reorderPoint = leadTimeDemand + safetyStock;

    let actionType: InventoryActionType = "maintain";
    let recommendedQty = 0;
    if (currentInventory < reorderPoint) {
      actionType = "reorder";
      recommendedQty = Math.floor(forecast.forecastQty * REORDER_COVERAGE);
    } else if (currentInventory > forecast.upperBound * OVERSTOCK_MULTIPLE) {
      actionType = "reduce";
      recommendedQty = -Math.floor(currentInventory * REDUCTION_SHARE);
    }

    const caseId = `${forecast.productId}@${forecast.locationId}`;
    const errorOutcome = forecastError.evaluate(
      { caseId, name: "forecast.error-rate", value: forecast.historicalErrorRate },
      context
    );
    const quantityOutcome = orderQuantity.evaluate(
      { caseId, name: "inventory.order-quantity", value: Math.abs(recommendedQty) },
      context
    );

    const decisionLevel = forecastError.mostSevere(errorOutcome.level, quantityOutcome.level, autonomyFloor);

    return {
      productId: forecast.productId,
      locationId: forecast.locationId,
      actionType,
      recommendedQty,
      confidence: forecast.accuracy,
      decisionLevel,
      // Either table's cutoff is enough to hold the action back.
      requiresApproval: forecastError.requiresReview(decisionLevel) || orderQuantity.requiresReview(decisionLevel),
      reorderPoint,
      safetyStock,
      reasoning: `Reorder point: ${reorderPoint}, Current: ${currentInventory}, Forecast: ${forecast.forecastQty}, Safety stock: ${safetyStock}`,
      recommendedAt: clock.now().toISOString()
    };
  };

  return {
    recommend,
    decisionLog: (limit?: number) => auditLog.recent(limit),
    evaluators: { forecastError, orderQuantity }
  };
}
