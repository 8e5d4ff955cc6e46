// Gateway policy table: defaults, schema and pattern matching.
// Purpose: keep the denylist/advisory data separate from the decision protocol.

import { z } from "zod";

import type { GatewayPolicy, PolicyPattern } from "./types.js";

// =============================================================================
// DEFAULTS
// =============================================================================

const DEFAULT_SELF_PRESERVATION = [
  "rm -rf /",
  "sudo rm",
  "delete --force",
  ":(){:|:&};:",
  "disable validation",
  "remove validation",
  "delete safety",
];

const DEFAULT_ADVISORY = [
  "hack",
  "bypass",
  "force",
  "ignore previous",
  "disregard safety",
  "jailbreak",
  "forget rules",
];

export const DEFAULT_COMPLEXITY_LIMIT = 1000;

export const DEFAULT_GATEWAY_POLICY: GatewayPolicy = {
  self_preservation: DEFAULT_SELF_PRESERVATION.map(toSubstringPattern),
  advisory: DEFAULT_ADVISORY.map(toSubstringPattern),
  complexity_limit: DEFAULT_COMPLEXITY_LIMIT,
  complexity_exempt: ["echo"],
};

// =============================================================================
// SCHEMA
// =============================================================================

// Plain strings are shorthand for substring patterns.
const PolicyPatternSchema = z.union([
  z.string().min(1).transform(toSubstringPattern),
  z
    .object({
      pattern: z.string().min(1),
      match: z.enum(["substring", "regex"]).default("substring"),
    })
    .superRefine((value, ctx) => {
      if (value.match === "regex" && !isValidRegex(value.pattern)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Invalid regular expression: ${value.pattern}`,
        });
      }
    }),
]);

export const GatewayPolicySchema = z.object({
  self_preservation: z.array(PolicyPatternSchema).default(DEFAULT_GATEWAY_POLICY.self_preservation),
  advisory: z.array(PolicyPatternSchema).default(DEFAULT_GATEWAY_POLICY.advisory),
  complexity_limit: z.number().int().positive().default(DEFAULT_COMPLEXITY_LIMIT),
  complexity_exempt: z.array(z.string().min(1)).default(DEFAULT_GATEWAY_POLICY.complexity_exempt),
});

// =============================================================================
// MATCHING
// =============================================================================

export function matchesPattern(text: string, pattern: PolicyPattern): boolean {
  if (pattern.match === "regex") {
    return new RegExp(pattern.pattern, "i").test(text);
  }
  return text.toLowerCase().includes(pattern.pattern.toLowerCase());
}

export function findMatchingPattern(
  text: string,
  patterns: readonly PolicyPattern[],
): PolicyPattern | undefined {
  return patterns.find((pattern) => matchesPattern(text, pattern));
}

function toSubstringPattern(pattern: string): PolicyPattern {
  return { pattern, match: "substring" };
}

function isValidRegex(source: string): boolean {
  try {
    new RegExp(source, "i");
    return true;
  } catch {
    return false;
  }
}
