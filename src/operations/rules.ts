export const PROCUREMENT_RULES = {
  minimumVendorRating: 3.5,
  severity: {
    escalationAmount: 0.9,
    semiAutonomousAmount: 0.5,
    vendorRating: 0.7
  },
  checks: ["three_way_match", "vendor_rating_minimum"]
} as const;

export const INVOICE_RULES = {
  severity: {
    escalateVariance: 0.8,
    reviewVariance: 0.4,
    duplicate: 1.0
  },
  checks: ["no_duplicate_invoices", "currency_validation"]
} as const;
