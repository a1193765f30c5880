import type { InputClassification, OperationalInput, OperationalInputType } from "./types";

const PROCESS_PATHWAYS: Record<OperationalInputType, string> = {
  procurement_request: "procurement_validation_routing",
  invoice: "three_way_match_and_payment",
  compliance_check: "regulatory_assessment",
  allocation: "resource_optimization"
};

const URGENT_AMOUNT = 500000;
const SMALL_PROCUREMENT_LIMIT = 50000;

const amountFormat = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2
});

function estimateProcessingHours(input: OperationalInput): number {
  switch (input.inputType) {
    case "procurement_request":
      return input.amount <= SMALL_PROCUREMENT_LIMIT ? 0.5 : 1.5;
    case "invoice":
      return 0.25;
    case "compliance_check":
    case "allocation":
      return 1.0;
  }
}

/**
 * Routes an input to its processing pathway. Urgency blends priority (40%) with the
 * amount relative to 500k (60%).
 */
export function classifyInput(input: OperationalInput): InputClassification {
  const processPathway = PROCESS_PATHWAYS[input.inputType];
  const urgencyScore = (input.priorityLevel / 4) * 0.4 + Math.min(input.amount / URGENT_AMOUNT, 1) * 0.6;

  return {
    processPathway,
    urgencyScore,
    estimatedProcessingHours: estimateProcessingHours(input),
    reasoning: `Classified as ${processPathway} based on type, amount ($${amountFormat.format(input.amount)}), and priority level ${input.priorityLevel}`
  };
}
