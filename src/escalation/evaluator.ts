import type { Logger } from "pino";
import { logger as defaultLogger } from "../logger";
import { systemClock, type Clock } from "../testing/determinism";
import { ensureTraceId, withTraceId } from "../trace/trace";
import type { AuditLog } from "./audit-store";
import { InMemoryAuditLog } from "./audit-store.memory";
import { ConfigurationError, InvalidSignalError } from "./errors";
import type {
  AuditLogFilters,
  AuditRecord,
  DecisionOutcome,
  DecisionSignal,
  EvaluationContext,
  FrozenThresholdTable,
  ThresholdTable
} from "./types";

export type EscalationEvaluatorOptions<L extends string> = {
  auditLog?: AuditLog<L>;
  clock?: Clock;
  logger?: Logger;
};

export type EscalationEvaluator<L extends string> = {
  readonly table: FrozenThresholdTable<L>;
  readonly reviewAbove: L;
  evaluate: (signal: DecisionSignal | number, context?: EvaluationContext) => DecisionOutcome<L>;
  classify: (value: number) => L;
  severityOf: (level: L) => number;
  requiresReview: (level: L) => boolean;
  mostSevere: (first: L, ...rest: L[]) => L;
  recentRecords: (limit?: number) => AuditRecord<L>[];
  listRecords: (filters?: AuditLogFilters<L>) => AuditRecord<L>[];
  recordCount: () => number;
};

export function validateThresholdTable<L extends string>(table: ThresholdTable<L>, reviewAbove: L): void {
  const issues: string[] = [];
  const severity = new Map<L, number>();

  if (table.levels.length === 0) {
    issues.push("levels must not be empty");
  }
  table.levels.forEach((level, index) => {
    if (severity.has(level)) {
      issues.push(`level ${level} is listed more than once`);
      return;
    }
    severity.set(level, index);
  });

  if (table.bands.length === 0) {
    issues.push("bands must not be empty");
  }

  table.bands.forEach((band, index) => {
    const isLast = index === table.bands.length - 1;
    if (Number.isNaN(band.upTo)) {
      issues.push(`bands[${index}].upTo is not a number`);
    }
    if (band.upTo === Number.POSITIVE_INFINITY && !isLast) {
      issues.push(`bands[${index}] is unbounded but is not the last band`);
    }
    if (!severity.has(band.level)) {
      issues.push(`bands[${index}].level ${band.level} is not a declared level`);
    }
    if (index === 0) {
      return;
    }
    const previous = table.bands[index - 1];
    if (!(band.upTo > previous.upTo)) {
      issues.push(`bands[${index}].upTo ${band.upTo} must be greater than ${previous.upTo}`);
    }
    const previousSeverity = severity.get(previous.level);
    const currentSeverity = severity.get(band.level);
    if (previousSeverity !== undefined && currentSeverity !== undefined && currentSeverity < previousSeverity) {
      issues.push(`bands[${index}].level ${band.level} is less severe than ${previous.level}`);
    }
  });

  if (!severity.has(reviewAbove)) {
    issues.push(`reviewAbove ${reviewAbove} is not a declared level`);
  }

  if (Number.isNaN(table.domain.min) || Number.isNaN(table.domain.max) || table.domain.min > table.domain.max) {
    issues.push(`domain [${table.domain.min}, ${table.domain.max}] is not a valid range`);
  }

  if (issues.length > 0) {
    throw new ConfigurationError(`Threshold table ${table.id} is invalid:`, issues);
  }
}

function assertSignal(table: FrozenThresholdTable<string>, signal: DecisionSignal): void {
  if (!Number.isFinite(signal.value)) {
    throw new InvalidSignalError(
      `Signal ${signal.name} must be a finite number.`,
      signal.name,
      signal.value
    );
  }
  if (signal.value < table.domain.min || signal.value > table.domain.max) {
    throw new InvalidSignalError(
      `Signal ${signal.name}=${signal.value} is outside [${table.domain.min}, ${table.domain.max}] for table ${table.id}.`,
      signal.name,
      signal.value
    );
  }
}

export function createEscalationEvaluator<L extends string>(
  table: ThresholdTable<L>,
  reviewAbove: L,
  options?: EscalationEvaluatorOptions<L>
): EscalationEvaluator<L> {
  validateThresholdTable(table, reviewAbove);

  const bands = Object.freeze(table.bands.map((band) => Object.freeze({ ...band })));
  const frozenTable: FrozenThresholdTable<L> = Object.freeze({
    id: table.id,
    levels: Object.freeze([...table.levels]),
    bands,
    boundary: table.boundary,
    domain: Object.freeze({ ...table.domain })
  });
  const severity = new Map<L, number>(frozenTable.levels.map((level, index) => [level, index]));
  const cutoff = severity.get(reviewAbove) ?? 0;
  const auditLog = options?.auditLog ?? new InMemoryAuditLog<L>();
  const clock = options?.clock ?? systemClock;
  const log = options?.logger ?? defaultLogger;

  const severityOf = (level: L): number => severity.get(level) ?? 0;

  const requiresReview = (level: L): boolean => severityOf(level) > cutoff;

  const withinBand = frozenTable.boundary === "inclusive"
    ? (value: number, upTo: number) => value <= upTo
    : (value: number, upTo: number) => value < upTo;

  const classify = (value: number): L => {
    for (const band of bands) {
      if (withinBand(value, band.upTo)) {
        return band.level;
      }
    }
    return bands[bands.length - 1].level;
  };

  const mostSevere = (first: L, ...rest: L[]): L =>
    rest.reduce((current, level) => (severityOf(level) > severityOf(current) ? level : current), first);

  const evaluate = (input: DecisionSignal | number, context?: EvaluationContext): DecisionOutcome<L> => {
    const signal: DecisionSignal = typeof input === "number"
      ? { caseId: clock.generateId(), name: frozenTable.id, value: input }
      : input;
    assertSignal(frozenTable, signal);

    const level = classify(signal.value);
    const outcome: DecisionOutcome<L> = {
      caseId: signal.caseId,
      signalName: signal.name,
      signal: signal.value,
      tableId: frozenTable.id,
      level,
      severity: severityOf(level),
      requiresReview: requiresReview(level)
    };

    const traceId = ensureTraceId(context?.traceId);
    auditLog.append({
      id: clock.generateId(),
      traceId,
      caseId: outcome.caseId,
      signalName: outcome.signalName,
      signal: outcome.signal,
      tableId: outcome.tableId,
      level: outcome.level,
      requiresReview: outcome.requiresReview,
      recordedAt: clock.now().toISOString()
    });

    const traced = withTraceId(log, traceId);
    if (outcome.requiresReview) {
      traced.info(
        { caseId: outcome.caseId, tableId: outcome.tableId, signal: outcome.signal, level: outcome.level },
        "Decision escalated for review"
      );
    } else {
      traced.debug(
        { caseId: outcome.caseId, tableId: outcome.tableId, signal: outcome.signal, level: outcome.level },
        "Decision within autonomy bounds"
      );
    }

    return outcome;
  };

  return {
    table: frozenTable,
    reviewAbove,
    evaluate,
    classify,
    severityOf,
    requiresReview,
    mostSevere,
    recentRecords: (limit?: number) => auditLog.recent(limit),
    listRecords: (filters?: AuditLogFilters<L>) => auditLog.list(filters),
    recordCount: () => auditLog.size()
  };
}

export const newEvaluator = createEscalationEvaluator;
