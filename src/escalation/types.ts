export type BoundaryPolicy = "inclusive" | "exclusive";

export type SignalDomain = {
  min: number;
  max: number;
};

export type ThresholdBand<L extends string> = {
  upTo: number;
  level: L;
};

export type ThresholdTable<L extends string> = {
  id: string;
  /** Ordered from lowest to highest severity. */
  levels: readonly L[];
  bands: ThresholdBand<L>[];
  boundary: BoundaryPolicy;
  domain: SignalDomain;
};

/** Read-only view of a validated table, as held by an evaluator. */
export type FrozenThresholdTable<L extends string> = {
  readonly id: string;
  readonly levels: readonly L[];
  readonly bands: ReadonlyArray<Readonly<ThresholdBand<L>>>;
  readonly boundary: BoundaryPolicy;
  readonly domain: Readonly<SignalDomain>;
};

export type DecisionSignal = {
  caseId: string;
  name: string;
  value: number;
};

export type EvaluationContext = {
  traceId?: string;
};

export type DecisionOutcome<L extends string> = {
  caseId: string;
  signalName: string;
  signal: number;
  tableId: string;
  level: L;
  severity: number;
  requiresReview: boolean;
};

export type AuditRecord<L extends string> = {
  id: string;
  traceId: string;
  caseId: string;
  signalName: string;
  signal: number;
  tableId: string;
  level: L;
  requiresReview: boolean;
  recordedAt: string;
};

export type AuditLogFilters<L extends string> = {
  caseId?: string;
  level?: L;
  requiresReview?: boolean;
  since?: Date;
  until?: Date;
  limit?: number;
};
