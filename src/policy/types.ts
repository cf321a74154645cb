import type { CanonicalValue } from "../model/canonical.js";
import type { Severity, SeverityCounts } from "../model/severity.js";

// =============================================================================
// POLICY
// =============================================================================

export type RequiredKeyCheck = { type: "required_key"; key: string };
export type ForbiddenKeyCheck = { type: "forbidden_key"; key: string };
export type ValueMatchCheck = { type: "value_match"; key: string; regex: string; compiled: RegExp };
export type ValueEnumCheck = { type: "value_enum"; key: string; values: CanonicalValue[] };
export type ForbiddenValueCheck = { type: "forbidden_value"; key: string; value: CanonicalValue };

export type PolicyCheck =
  | RequiredKeyCheck
  | ForbiddenKeyCheck
  | ValueMatchCheck
  | ValueEnumCheck
  | ForbiddenValueCheck;

export type PolicyCheckType = PolicyCheck["type"];

export type PolicyRule = {
  id: string;
  description: string | null;
  severity: Severity;
  pattern: string | null;
  check: PolicyCheck;
};

export type Policy = {
  name: string;
  description: string | null;
  source: string;
  rules: PolicyRule[];
};

// =============================================================================
// RESULTS
// =============================================================================

export type Violation = {
  rule_id: string;
  rule_description: string | null;
  severity: Severity;
  file: string;
  key_path: string | null;
  message: string;
};

export type PolicySkippedFile = {
  path: string;
  error: string;
};

export type PolicyReport = {
  policy_name: string;
  policy_description: string | null;
  checked_at: string;
  total_files_checked: number;
  files_with_violations: number;
  total_violations: number;
  counts: SeverityCounts;
  skipped_files: PolicySkippedFile[];
  violations: Violation[];
};
