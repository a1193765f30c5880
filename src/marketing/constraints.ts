import type { FairnessConstraints } from "./types";

export const DEFAULT_FAIRNESS_CONSTRAINTS: FairnessConstraints = {
  prohibitedAttributes: [
    "race",
    "ethnicity",
    "religion",
    "sexual_orientation",
    "political_affiliation",
    "health_conditions"
  ],
  minFairnessScore: 0.7
};
