// Policy evaluation.
// Purpose: run each applicable rule against one flattened mapping and report violations in rule order.
// Container values are not applicable to value_match and value_enum; neither check fires on them.

import path from "node:path";

import { minimatch } from "minimatch";

import { formatValue, isScalar, scalarText, valuesEqual, type CanonicalValue } from "../model/canonical.js";
import type { FlattenedMapping } from "../model/flatten.js";
import { isDescendantPath } from "../model/key-path.js";
import { countBySeverity } from "../model/severity.js";
import type { Policy, PolicyReport, PolicyRule, PolicySkippedFile, Violation } from "./types.js";

export type PolicyTarget = {
  path: string;
  mapping: FlattenedMapping | null;
  error: string | null;
};

// =============================================================================
// MATCHING
// =============================================================================

export function ruleAppliesToFile(rule: PolicyRule, filePath: string): boolean {
  if (rule.pattern === null) return true;

  const normalized = filePath.replace(/\\/g, "/");
  const wholePath = rule.pattern.includes("/") || rule.pattern.includes("**");
  const subject = wholePath ? normalized : path.posix.basename(normalized);
  return minimatch(subject, rule.pattern, { dot: true });
}

// =============================================================================
// EVALUATION
// =============================================================================

export function evaluatePolicy(policy: Policy, mapping: FlattenedMapping, filePath: string): Violation[] {
  const violations: Violation[] = [];

  for (const rule of policy.rules) {
    if (!ruleAppliesToFile(rule, filePath)) continue;

    const failure = evaluateRule(rule, mapping);
    if (failure) {
      violations.push({
        rule_id: rule.id,
        rule_description: rule.description,
        severity: rule.severity,
        file: filePath,
        key_path: failure.key_path,
        message: failure.message,
      });
    }
  }

  return violations;
}

type RuleFailure = { key_path: string | null; message: string };

function evaluateRule(rule: PolicyRule, mapping: FlattenedMapping): RuleFailure | null {
  const check = rule.check;

  switch (check.type) {
    case "required_key":
      return hasKeyOrDescendant(mapping, check.key)
        ? null
        : { key_path: null, message: `Required key '${check.key}' is missing` };

    case "forbidden_key":
      return hasKeyOrDescendant(mapping, check.key)
        ? { key_path: check.key, message: `Forbidden key '${check.key}' is present` }
        : null;

    case "value_match": {
      const text = scalarEntryText(mapping.get(check.key));
      if (text === null || check.compiled.test(text)) return null;
      return {
        key_path: check.key,
        message: `Value '${text}' for key '${check.key}' does not match pattern '${check.regex}'`,
      };
    }

    case "value_enum": {
      const value = mapping.get(check.key);
      if (value === undefined || !isScalar(value)) return null;
      if (check.values.some((allowed) => valuesEqual(allowed, value))) return null;
      const allowed = check.values.map(formatValue).join(", ");
      return {
        key_path: check.key,
        message: `Value '${scalarText(value)}' for key '${check.key}' is not in allowed set: [${allowed}]`,
      };
    }

    case "forbidden_value": {
      const value = mapping.get(check.key);
      if (value === undefined || !valuesEqual(value, check.value)) return null;
      return {
        key_path: check.key,
        message: `Forbidden value '${formatValue(value)}' found for key '${check.key}'`,
      };
    }
  }
}

function hasKeyOrDescendant(mapping: FlattenedMapping, key: string): boolean {
  if (mapping.has(key)) return true;
  for (const keyPath of mapping.keys()) {
    if (isDescendantPath(keyPath, key)) return true;
  }
  return false;
}

function scalarEntryText(value: CanonicalValue | undefined): string | null {
  if (value === undefined || !isScalar(value)) return null;
  return scalarText(value);
}

// =============================================================================
// REPORT
// =============================================================================

export function evaluatePolicyOnFiles(
  policy: Policy,
  files: readonly PolicyTarget[],
  now: Date = new Date(),
): PolicyReport {
  const violations: Violation[] = [];
  const skipped: PolicySkippedFile[] = [];
  let checked = 0;

  for (const file of files) {
    if (!file.mapping) {
      skipped.push({ path: file.path, error: file.error ?? "not parsed" });
      continue;
    }
    checked += 1;
    violations.push(...evaluatePolicy(policy, file.mapping, file.path));
  }

  return {
    policy_name: policy.name,
    policy_description: policy.description,
    checked_at: now.toISOString(),
    total_files_checked: checked,
    files_with_violations: new Set(violations.map((violation) => violation.file)).size,
    total_violations: violations.length,
    counts: countBySeverity(violations),
    skipped_files: skipped,
    violations,
  };
}
