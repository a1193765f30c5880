import path from "node:path";
import pino from "pino";
import { expect, test } from "vitest";
import { InvalidSignalError } from "../src/escalation/errors";
import { fixedScorer, sequenceScorer } from "../src/escalation/scoring";
import { monitorLearningDrift, scheduleRetraining } from "../src/supplychain/drift";
import { createInventoryGate } from "../src/supplychain/execution";
import { forecastDemand, type ForecastScoringInput } from "../src/supplychain/forecast";
import { auditSupplyChainGovernance } from "../src/supplychain/governance";
import { createInventoryPlanner } from "../src/supplychain/planner";
import type { ForecastData } from "../src/supplychain/types";
import { createDeterministicClock } from "../src/testing/determinism";
import { createThresholdLoader } from "../src/thresholds/loader";

const silent = pino({ level: "silent" });
const document = createThresholdLoader({
  path: path.resolve("thresholds/thresholds.v1.yaml"),
  handleSignals: false,
  logger: silent
}).getSnapshot().document;

const target = { productId: "sku-1", locationId: "dc-1" };

function forecastWithError(errorRate: number): ForecastData {
  return forecastDemand(
    { avgDailyDemand: 100, volatilityFactor: 0.25, seasonalityFactor: 1 },
    target,
    fixedScorer<ForecastScoringInput>(errorRate)
  );
}

function buildPlanner(options?: { autonomyFloor?: "AUTONOMOUS" | "SEMI_AUTONOMOUS" }) {
  return createInventoryPlanner({
    document,
    autonomyFloor: options?.autonomyFloor,
    clock: createDeterministicClock({ idPrefix: "plan" }),
    logger: silent
  });
}

test("forecast scales daily demand over the horizon", () => {
  expect(forecastWithError(0.2)).toEqual({
    productId: "sku-1",
    locationId: "dc-1",
    forecastQty: 3000,
    lowerBound: 2250,
    upperBound: 3750,
    accuracy: 0.8,
    historicalErrorRate: 0.2,
    forecastMethod: "ensemble_hybrid_model",
    horizonDays: 30
  });
});

test("forecast uses default demand history", () => {
  const forecast = forecastDemand({}, { ...target, horizonDays: 10 }, fixedScorer<ForecastScoringInput>(0.1));

  expect(forecast.forecastQty).toBe(1000);
  expect(forecast.lowerBound).toBe(850);
  expect(forecast.upperBound).toBe(1150);
});

test("forecast rejects error rates outside [0, 1] and bad horizons", () => {
  expect(() => forecastWithError(1.5)).toThrow(InvalidSignalError);
  expect(() => forecastWithError(Number.NaN)).toThrow(InvalidSignalError);
  expect(() => forecastDemand({}, { ...target, horizonDays: 0 }, fixedScorer<ForecastScoringInput>(0.1))).toThrow(
    "Forecast horizon must be a positive whole number of days."
  );
});

test("forecast passes the computed quantity to the scorer", () => {
  const seen: number[] = [];
  forecastDemand({ avgDailyDemand: 10 }, target, {
    score: (input) => {
      seen.push(input.forecastQty, input.target.horizonDays);
      return 0.1;
    }
  });

  expect(seen).toEqual([300, 30]);
});

test("low inventory triggers a reorder that needs approval", () => {
  const planner = buildPlanner();

  const action = planner.recommend(forecastWithError(0.2), 1000);

  expect(action).toEqual({
    productId: "sku-1",
    locationId: "dc-1",
    actionType: "reorder",
    recommendedQty: 4500,
    confidence: 0.8,
    decisionLevel: "HUMAN_REVIEW",
    requiresApproval: true,
    reorderPoint: 1680,
    safetyStock: 280,
    reasoning: "Reorder point: 1680, Current: 1000, Forecast: 3000, Safety stock: 280",
    recommendedAt: "2024-01-01T00:00:00.002Z"
  });
});

test("healthy inventory is maintained at the autonomy floor", () => {
  const action = buildPlanner().recommend(forecastWithError(0.1), 2000);

  expect(action.actionType).toBe("maintain");
  expect(action.recommendedQty).toBe(0);
  expect(action.decisionLevel).toBe("SEMI_AUTONOMOUS");
  expect(action.requiresApproval).toBe(false);

  const autonomous = buildPlanner({ autonomyFloor: "AUTONOMOUS" }).recommend(forecastWithError(0.1), 2000);
  expect(autonomous.decisionLevel).toBe("AUTONOMOUS");
});

test("overstock is reduced by a share of current inventory", () => {
  const action = buildPlanner().recommend(forecastWithError(0.1), 8000);

  expect(action.actionType).toBe("reduce");
  expect(action.recommendedQty).toBe(-2400);
  expect(action.decisionLevel).toBe("HUMAN_REVIEW");
});

test("forecast error alone can escalate a plan", () => {
  const planner = buildPlanner();
  const errorLevels = planner.evaluators.forecastError;

  expect(errorLevels.classify(0.15)).toBe("AUTONOMOUS");
  expect(errorLevels.classify(0.25)).toBe("SEMI_AUTONOMOUS");
  expect(errorLevels.classify(0.3)).toBe("HUMAN_REVIEW");
  expect(errorLevels.classify(0.4)).toBe("ESCALATION");
  expect(planner.recommend(forecastWithError(0.4), 2000).decisionLevel).toBe("ESCALATION");
});

test("both planner evaluations land in one decision log", () => {
  const planner = buildPlanner();
  planner.recommend(forecastWithError(0.2), 1000, { traceId: "trace-plan" });

  const records = planner.decisionLog();
  expect(records.map((record) => [record.id, record.tableId, record.level])).toEqual([
    ["plan-0001", "forecast-error", "SEMI_AUTONOMOUS"],
    ["plan-0002", "order-quantity", "HUMAN_REVIEW"]
  ]);
  expect(records.every((record) => record.caseId === "sku-1@dc-1" && record.traceId === "trace-plan")).toBe(true);
});

test("sequence scorer drives successive forecasts", () => {
  const scorer = sequenceScorer<ForecastScoringInput>([0.1, 0.3]);
  const first = forecastDemand({}, target, scorer);
  const second = forecastDemand({}, target, scorer);

  expect([first.historicalErrorRate, second.historicalErrorRate]).toEqual([0.1, 0.3]);
});

test("drift above the threshold triggers retraining", () => {
  const report = monitorLearningDrift([0.14, 0.15, 0.16, 0.18, 0.2], {
    baselineErrorRate: 0.15,
    threshold: 0.1,
    clock: createDeterministicClock()
  });

  expect(report.driftDetected).toBe(true);
  expect(report.action).toBe("trigger_retraining");
  expect(report.driftMagnitude).toBeCloseTo(0.016, 10);
  expect(report.driftPercent).toBeCloseTo(10.6667, 3);
  expect(report.checkedAt).toBe("2024-01-01T00:00:00.000Z");
  expect(report.modelVersion).toBe("1.0");
});

test("small drift and empty windows keep monitoring", () => {
  const steady = monitorLearningDrift([0.15, 0.16], { baselineErrorRate: 0.15, threshold: 0.1 });
  expect(steady.driftDetected).toBe(false);
  expect(steady.action).toBe("continue_monitoring");

  const improved = monitorLearningDrift([0.1, 0.1], { baselineErrorRate: 0.15, threshold: 0.1 });
  expect(improved.driftDetected).toBe(true);
  expect(improved.driftPercent).toBeCloseTo(-33.333, 2);

  const empty = monitorLearningDrift([], { modelVersion: "2.3" });
  expect(empty).toMatchObject({ driftDetected: false, driftMagnitude: 0, driftPercent: 0, modelVersion: "2.3" });
});

test("retraining bumps the minor version and waits a week", () => {
  const schedule = scheduleRetraining("1.0", "drift_detected", createDeterministicClock());

  expect(schedule).toEqual({
    currentModelVersion: "1.0",
    newModelVersion: "1.1",
    triggerReason: "drift_detected",
    scheduledFor: "2024-01-08T00:00:00.000Z",
    approvalRequiredBy: "supply_chain_director"
  });
  expect(scheduleRetraining("3.9", undefined, createDeterministicClock()).newModelVersion).toBe("3.10");
});

test("approval uses the stricter review cutoff of the two tables", () => {
  if (!document) {
    throw new Error("bundled thresholds did not load");
  }
  const strictQuantity = {
    ...document,
    tables: document.tables.map((table) =>
      table.id === "order-quantity" ? { ...table, reviewAbove: "AUTONOMOUS" } : table
    )
  };
  const planner = createInventoryPlanner({
    document: strictQuantity,
    clock: createDeterministicClock(),
    logger: silent
  });

  const action = planner.recommend(forecastWithError(0.1), 2000);

  expect(action.decisionLevel).toBe("SEMI_AUTONOMOUS");
  expect(action.requiresApproval).toBe(true);
});

test("inventory gate queues actions that need a planner", () => {
  const planner = buildPlanner();
  const gate = createInventoryGate({ clock: createDeterministicClock({ idPrefix: "gate" }), logger: silent });
  const action = planner.recommend(forecastWithError(0.2), 1000);

  expect(gate.submit(action)).toEqual({
    executionId: "gate-0001",
    productId: "sku-1",
    locationId: "dc-1",
    actionType: "reorder",
    recommendedQty: 4500,
    status: "escalated",
    executedBy: null,
    decisionLevel: "HUMAN_REVIEW",
    confidence: 0.8,
    reasoning: "Reorder point: 1680, Current: 1000, Forecast: 3000, Safety stock: 280",
    recordedAt: "2024-01-01T00:00:00.000Z"
  });

  const approved = gate.submit(action, { approvedBy: "planner-7" });
  expect(approved.status).toBe("executed");
  expect(approved.executedBy).toBe("planner:planner-7");
  expect(gate.escalationQueue()).toHaveLength(1);
  expect(gate.decisionLog().map((record) => record.executionId)).toEqual(["gate-0002"]);
});

test("inventory gate runs autonomous actions and parks approved escalations", () => {
  const planner = buildPlanner();
  const gate = createInventoryGate({ clock: createDeterministicClock({ idPrefix: "gate" }), logger: silent });

  const routine = gate.submit(planner.recommend(forecastWithError(0.1), 2000));
  expect(routine.status).toBe("executed");
  expect(routine.executedBy).toBe("autonomous");

  const risky = planner.recommend(forecastWithError(0.4), 2000);
  expect(gate.submit(risky).status).toBe("escalated");
  const parked = gate.submit(risky, { approvedBy: "planner-7" });
  expect(parked.status).toBe("pending_approval");
  expect(parked.decisionLevel).toBe("ESCALATION");
});

test("supply-chain audit flags escalation rate and stale training", () => {
  const planner = buildPlanner();
  const gate = createInventoryGate({ logger: silent });
  gate.submit(planner.recommend(forecastWithError(0.1), 2000));
  gate.submit(planner.recommend(forecastWithError(0.1), 2000));
  gate.submit(planner.recommend(forecastWithError(0.2), 1000));

  const audit = auditSupplyChainGovernance(gate, {
    modelVersion: "1.0",
    lastTrainingDate: new Date("2023-09-01T00:00:00.000Z"),
    autonomyFloor: "SEMI_AUTONOMOUS",
    clock: createDeterministicClock({ idPrefix: "sc" })
  });

  expect(audit).toEqual({
    auditId: "sc-0001",
    totalDecisions: 2,
    escalationsCount: 1,
    escalationRate: 0.5,
    modelVersion: "1.0",
    lastTrainingDate: "2023-09-01T00:00:00.000Z",
    daysSinceTraining: 122,
    autonomyFloor: "SEMI_AUTONOMOUS",
    complianceStatus: "needs_attention",
    governanceRecommendations: [
      "High escalation rate detected. Consider reviewing decision boundaries.",
      "Model approaching retraining interval. Schedule maintenance window."
    ],
    auditedAt: "2024-01-01T00:00:00.000Z"
  });
});

test("supply-chain audit of a quiet, recently trained planner is compliant", () => {
  const gate = createInventoryGate({ logger: silent });
  gate.submit(buildPlanner().recommend(forecastWithError(0.1), 2000));

  const audit = auditSupplyChainGovernance(gate, {
    modelVersion: "1.1",
    lastTrainingDate: new Date("2023-12-01T00:00:00.000Z"),
    autonomyFloor: "SEMI_AUTONOMOUS",
    clock: createDeterministicClock()
  });

  expect(audit.escalationRate).toBe(0);
  expect(audit.daysSinceTraining).toBe(31);
  expect(audit.complianceStatus).toBe("compliant");
  expect(audit.governanceRecommendations).toEqual([]);
});
