// Shared validation gateway types.
// Purpose: keep decision and policy shapes consistent between the gateway and its callers.


// =============================================================================
// POLICY TABLE
// =============================================================================

export type PatternMatchMode = "substring" | "regex";

export type PolicyPattern = {
  pattern: string;
  match: PatternMatchMode;
};

export type GatewayPolicy = {
  self_preservation: PolicyPattern[];
  advisory: PolicyPattern[];
  complexity_limit: number;
  complexity_exempt: string[];
};


// =============================================================================
// DECISIONS
// =============================================================================

export type RejectionCategory = "self_preservation" | "policy_other";

export type AdvisoryKind = "manipulation" | "complexity";

export type AdvisoryWarning = {
  kind: AdvisoryKind;
  message: string;
  pattern?: string;
};

export type AllowedDecision = {
  kind: "allowed";
  warnings: AdvisoryWarning[];
};

export type RejectedDecision = {
  kind: "rejected";
  category: RejectionCategory;
  reason: string;
  pattern?: string;
};

export type Decision = AllowedDecision | RejectedDecision;
