import type { Logger } from "pino";
import type { z } from "zod";
import { aggregateRisk } from "../escalation/aggregate";
import { createEscalationEvaluator, type EscalationEvaluator } from "../escalation/evaluator";
import type { EvaluationContext } from "../escalation/types";
import { logger as defaultLogger } from "../logger";
import { systemClock, type Clock } from "../testing/determinism";
import { resolveThresholdTable } from "../thresholds/loader";
import type { ThresholdDocument } from "../thresholds/schema";
import { classifyInput } from "./classify";
import { INVOICE_RULES, PROCUREMENT_RULES } from "./rules";
import {
  approvalAuthoritySchema,
  autonomyTierSchema,
  complianceLevelSchema,
  operationalInputSchema,
  varianceBandSchema,
  type ApprovalAuthority,
  type AutonomyTier,
  type ComplianceCheckResult,
  type ComplianceLevel,
  type InvoiceAssessment,
  type OperationalInput,
  type ProcurementAssessment,
  type RuleViolation,
  type VarianceBand
} from "./types";

export type ComplianceValidator = {
  validate: (input: z.input<typeof operationalInputSchema>, context?: EvaluationContext) => ComplianceCheckResult;
  evaluators: {
    amount: EscalationEvaluator<AutonomyTier>;
    approvalAuthority: EscalationEvaluator<ApprovalAuthority>;
    variance: EscalationEvaluator<VarianceBand>;
    compliance: EscalationEvaluator<ComplianceLevel>;
  };
};

const currency = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2
});

function formatAmount(amount: number): string {
  return `$${currency.format(amount)}`;
}

function formatRatio(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

export function createComplianceValidator(options: {
  document: ThresholdDocument | null;
  clock?: Clock;
  logger?: Logger;
}): ComplianceValidator {
  const clock = options.clock ?? systemClock;
  const log = options.logger ?? defaultLogger;
  const shared = { clock, logger: log };

  const amountTable = resolveThresholdTable(options.document, "procurement-amount", autonomyTierSchema);
  const authorityTable = resolveThresholdTable(options.document, "approval-authority", approvalAuthoritySchema);
  const varianceTable = resolveThresholdTable(options.document, "invoice-variance", varianceBandSchema);
  const complianceTable = resolveThresholdTable(options.document, "compliance-risk", complianceLevelSchema);

  const evaluators = {
    amount: createEscalationEvaluator(amountTable.table, amountTable.reviewAbove, shared),
    approvalAuthority: createEscalationEvaluator(authorityTable.table, authorityTable.reviewAbove, shared),
    variance: createEscalationEvaluator(varianceTable.table, varianceTable.reviewAbove, shared),
    compliance: createEscalationEvaluator(complianceTable.table, complianceTable.reviewAbove, shared)
  };

  const checkProcurement = (
    input: OperationalInput,
    violations: RuleViolation[],
    context?: EvaluationContext
  ): ProcurementAssessment => {
    const tier = evaluators.amount.evaluate(
      { caseId: input.inputId, name: "procurement.amount", value: input.amount },
      context
    );
    if (tier.level === "ESCALATION") {
      violations.push({
        rule: "amount_review_threshold",
        message: `Amount ${formatAmount(input.amount)} exceeds review threshold`,
        severity: PROCUREMENT_RULES.severity.escalationAmount
      });
    } else if (tier.level === "SEMI_AUTONOMOUS") {
      violations.push({
        rule: "amount_semi_autonomous_range",
        message: `Amount ${formatAmount(input.amount)} in semi-autonomous range`,
        severity: PROCUREMENT_RULES.severity.semiAutonomousAmount
      });
    }

    const vendorRating = input.metadata.vendorRating ?? 0;
    if (vendorRating < PROCUREMENT_RULES.minimumVendorRating) {
      violations.push({
        rule: "vendor_rating_minimum",
        message: `Vendor rating ${vendorRating} below minimum threshold (${PROCUREMENT_RULES.minimumVendorRating})`,
        severity: PROCUREMENT_RULES.severity.vendorRating
      });
    }

    const authority = evaluators.approvalAuthority.evaluate(
      { caseId: input.inputId, name: "procurement.approval-authority", value: input.amount },
      context
    );

    return {
      amountTier: tier.level,
      amountTierRequiresReview: tier.requiresReview,
      approvalAuthority: authority.level
    };
  };

  const checkInvoice = (
    input: OperationalInput,
    violations: RuleViolation[],
    context?: EvaluationContext
  ): InvoiceAssessment => {
    const variance = input.metadata.poInvoiceVariance ?? 0;
    const band = evaluators.variance.evaluate(
      { caseId: input.inputId, name: "invoice.po-variance", value: variance },
      context
    );
    if (band.level === "ESCALATE") {
      violations.push({
        rule: "po_invoice_variance",
        message: `PO-Invoice variance ${formatRatio(variance)} exceeds threshold`,
        severity: INVOICE_RULES.severity.escalateVariance
      });
    } else if (band.level === "REVIEW") {
      violations.push({
        rule: "po_invoice_variance",
        message: `Variance ${formatRatio(variance)} requires review`,
        severity: INVOICE_RULES.severity.reviewVariance
      });
    }

    if (input.metadata.isDuplicate) {
      violations.push({
        rule: "no_duplicate_invoices",
        message: "Duplicate invoice detected",
        severity: INVOICE_RULES.severity.duplicate
      });
    }

    return { varianceBand: band.level };
  };

  const validate = (
    raw: z.input<typeof operationalInputSchema>,
    context?: EvaluationContext
  ): ComplianceCheckResult => {
    const input = operationalInputSchema.parse(raw);
    const violations: RuleViolation[] = [];
    let procurement: ProcurementAssessment | null = null;
    let invoice: InvoiceAssessment | null = null;
    let rulesChecked: string[] = [];

    switch (input.inputType) {
      case "procurement_request":
        procurement = checkProcurement(input, violations, context);
        rulesChecked = [...PROCUREMENT_RULES.checks];
        break;
      case "invoice":
        invoice = checkInvoice(input, violations, context);
        rulesChecked = [...INVOICE_RULES.checks];
        break;
      case "compliance_check":
      case "allocation":
        break;
    }

    const riskScore = aggregateRisk(violations.map((violation) => ({ score: violation.severity })));
    const compliance = evaluators.compliance.evaluate(
      { caseId: input.inputId, name: "compliance.risk", value: riskScore },
      context
    );

    return {
      checkId: clock.generateId(),
      inputId: input.inputId,
      entityId: input.entityId,
      inputType: input.inputType,
      status: compliance.level,
      violations,
      riskScore,
      requiresHumanReview: compliance.requiresReview,
      rulesChecked,
      procurement,
      invoice,
      classification: classifyInput(input),
      checkedAt: clock.now().toISOString()
    };
  };

  return { validate, evaluators };
}
