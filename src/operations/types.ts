import { z } from "zod";

export const complianceLevelSchema = z.enum(["GREEN", "YELLOW", "RED"]);
export const autonomyTierSchema = z.enum(["AUTONOMOUS", "SEMI_AUTONOMOUS", "ESCALATION"]);
export const approvalAuthoritySchema = z.enum(["PROCESS_OWNER", "DEPARTMENT_MANAGER", "DIRECTOR"]);
export const varianceBandSchema = z.enum(["AUTO_MATCH", "REVIEW", "ESCALATE"]);
export const operationalInputTypeSchema = z.enum(["procurement_request", "invoice", "compliance_check", "allocation"]);

export type ComplianceLevel = z.infer<typeof complianceLevelSchema>;
export type AutonomyTier = z.infer<typeof autonomyTierSchema>;
export type ApprovalAuthority = z.infer<typeof approvalAuthoritySchema>;
export type VarianceBand = z.infer<typeof varianceBandSchema>;
export type OperationalInputType = z.infer<typeof operationalInputTypeSchema>;

export const operationalInputSchema = z.object({
  inputId: z.string().min(1),
  inputType: operationalInputTypeSchema,
  entityId: z.string().min(1),
  amount: z.number().nonnegative(),
  vendorId: z.string().min(1).nullable().default(null),
  metadata: z
    .object({
      vendorRating: z.number().optional(),
      poInvoiceVariance: z.number().nonnegative().optional(),
      isDuplicate: z.boolean().optional()
    })
    .default({}),
  priorityLevel: z.number().int().min(1).max(4).default(3)
});

export type OperationalInput = z.infer<typeof operationalInputSchema>;

export type RuleViolation = {
  rule: string;
  message: string;
  severity: number;
};

export type ProcurementAssessment = {
  amountTier: AutonomyTier;
  amountTierRequiresReview: boolean;
  approvalAuthority: ApprovalAuthority;
};

export type InvoiceAssessment = {
  varianceBand: VarianceBand;
};

export type InputClassification = {
  processPathway: string;
  urgencyScore: number;
  estimatedProcessingHours: number;
  reasoning: string;
};

export type ComplianceCheckResult = {
  checkId: string;
  inputId: string;
  entityId: string;
  inputType: OperationalInputType;
  status: ComplianceLevel;
  violations: RuleViolation[];
  riskScore: number;
  requiresHumanReview: boolean;
  rulesChecked: string[];
  procurement: ProcurementAssessment | null;
  invoice: InvoiceAssessment | null;
  classification: InputClassification;
  checkedAt: string;
};

export type TaskStatus = "escalated" | "executed";

export type TaskRecord = {
  executionId: string;
  checkId: string;
  inputId: string;
  status: TaskStatus;
  executedBy: string | null;
  reason: string | null;
  violations: string[];
  riskScore: number;
  estimatedProcessingHours: number;
  recordedAt: string;
};

export type WorkflowExceptionsReport = {
  totalTasks: number;
  escalatedTasks: number;
  escalationRate: number;
  averageProcessingHours: number;
  anomalies: string[];
  recommendations: string[];
  reportedAt: string;
};
