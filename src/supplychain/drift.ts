import { config } from "../config";
import { aggregateRisk } from "../escalation/aggregate";
import { createEscalationEvaluator } from "../escalation/evaluator";
import { systemClock, type Clock } from "../testing/determinism";
import type { DriftReport, RetrainingSchedule } from "./types";

const RETRAINING_LEAD_DAYS = 7;
const DAY_MS = 24 * 60 * 60 * 1000;

export type DriftOptions = {
  baselineErrorRate?: number;
  threshold?: number;
  modelVersion?: string;
  clock?: Clock;
};

/**
 * Compares the mean of recent forecast errors with the baseline. Drift is flagged when
 * the relative change exceeds `threshold` (a fraction, 0.10 = 10%).
 */
export function monitorLearningDrift(recentErrors: number[], options?: DriftOptions): DriftReport {
  const baseline = options?.baselineErrorRate ?? config.drift.baselineErrorRate;
  const threshold = options?.threshold ?? config.drift.threshold;
  const modelVersion = options?.modelVersion ?? "1.0";
  const clock = options?.clock ?? systemClock;
  const checkedAt = clock.now().toISOString();

  if (recentErrors.length === 0) {
    return {
      driftDetected: false,
      driftMagnitude: 0,
      driftPercent: 0,
      action: "continue_monitoring",
      checkedAt,
      modelVersion
    };
  }

  const averageError = aggregateRisk(recentErrors);
  const driftMagnitude = averageError - baseline;
  const driftPercent = baseline > 0 ? (driftMagnitude / baseline) * 100 : 0;

  const drift = createEscalationEvaluator(
    {
      id: "learning-drift",
      levels: ["STABLE", "DRIFTING"],
      bands: [
        { upTo: threshold * 100, level: "STABLE" },
        { upTo: Number.POSITIVE_INFINITY, level: "DRIFTING" }
      ],
      boundary: "inclusive",
      domain: { min: 0, max: Number.POSITIVE_INFINITY }
    },
    "STABLE",
    { clock }
  );
  const driftDetected = drift.classify(Math.abs(driftPercent)) === "DRIFTING";

  return {
    driftDetected,
    driftMagnitude,
    driftPercent,
    action: driftDetected ? "trigger_retraining" : "continue_monitoring",
    checkedAt,
    modelVersion
  };
}

export function scheduleRetraining(
  modelVersion: string,
  triggerReason = "periodic_maintenance",
  clock: Clock = systemClock
): RetrainingSchedule {
  const [major = "1", minor = "0"] = modelVersion.split(".");
  const minorNumber = Number.parseInt(minor, 10);
  const newModelVersion = `${major}.${Number.isNaN(minorNumber) ? 1 : minorNumber + 1}`;
  const scheduledFor = new Date(clock.now().getTime() + RETRAINING_LEAD_DAYS * DAY_MS);

  return {
    currentModelVersion: modelVersion,
    newModelVersion,
    triggerReason,
    scheduledFor: scheduledFor.toISOString(),
    approvalRequiredBy: "supply_chain_director"
  };
}
