/*
Purpose: load a policy document (YAML or JSON) and validate it before any file is evaluated.
Assumptions: every problem is collected first; a PolicyError lists all of them at once.
Usage: const policy = loadPolicy("policies/prod.yaml");
*/

import fs from "node:fs";

import yaml from "js-yaml";
import { Minimatch } from "minimatch";
import { z } from "zod";

import { formatConfigIssues } from "../core/config.js";
import { PolicyError } from "../core/errors.js";
import {
  NULL_VALUE,
  boolValue,
  numberValue,
  stringValue,
  type CanonicalValue,
} from "../model/canonical.js";
import { SEVERITIES } from "../model/severity.js";
import type { Policy, PolicyCheck, PolicyRule } from "./types.js";

// =============================================================================
// SCHEMA
// =============================================================================

const PolicyScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

type PolicyScalar = z.infer<typeof PolicyScalarSchema>;

const KeySchema = z.string().min(1);

const CheckSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("required_key"), key: KeySchema }).strict(),
  z.object({ type: z.literal("forbidden_key"), key: KeySchema }).strict(),
  z.object({ type: z.literal("value_match"), key: KeySchema, regex: z.string() }).strict(),
  z
    .object({ type: z.literal("value_enum"), key: KeySchema, values: z.array(PolicyScalarSchema).min(1) })
    .strict(),
  z
    .object({ type: z.literal("forbidden_value"), key: KeySchema, value: PolicyScalarSchema.optional() })
    .strict(),
]);

const RuleSchema = z
  .object({
    id: z.string().min(1),
    description: z.string().optional(),
    severity: z.enum(SEVERITIES).default("medium"),
    pattern: z.string().min(1).optional(),
    check: CheckSchema,
  })
  .strict();

const PolicyDocumentSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    rules: z.array(RuleSchema),
  })
  .strict();

type RuleDocument = z.infer<typeof RuleSchema>;

// =============================================================================
// LOADING
// =============================================================================

export function loadPolicy(policyPath: string): Policy {
  let raw: string;
  try {
    raw = fs.readFileSync(policyPath, "utf8");
  } catch (err) {
    throw new PolicyError(`Failed to read policy file ${policyPath}`, { cause: err });
  }
  return parsePolicy(raw, policyPath);
}

export function parsePolicy(text: string, source: string): Policy {
  let document: unknown;
  try {
    document = yaml.load(text, { filename: source });
  } catch (err) {
    const reason = err instanceof yaml.YAMLException ? err.reason : String(err);
    throw new PolicyError(`Failed to parse policy file ${source}: ${reason}`, { cause: err });
  }

  const parsed = PolicyDocumentSchema.safeParse(document ?? {});
  if (!parsed.success) {
    throw new PolicyError(`Policy file ${source} failed validation`, {
      issues: formatConfigIssues(parsed.error.issues),
      cause: parsed.error,
    });
  }

  const issues = validateRules(parsed.data.rules);
  if (issues.length > 0) {
    throw new PolicyError(`Policy file ${source} failed validation`, { issues });
  }

  return {
    name: parsed.data.name,
    description: parsed.data.description ?? null,
    source,
    rules: parsed.data.rules.map(toRule),
  };
}

function validateRules(rules: RuleDocument[]): string[] {
  const issues: string[] = [];
  if (rules.length === 0) {
    issues.push("rules: Policy must contain at least one rule");
  }

  const seen = new Set<string>();
  rules.forEach((rule, index) => {
    const where = `rules.${index}`;

    if (seen.has(rule.id)) {
      issues.push(`${where}.id: Duplicate rule id '${rule.id}'`);
    }
    seen.add(rule.id);

    if (rule.pattern !== undefined && new Minimatch(rule.pattern).makeRe() === false) {
      issues.push(`${where}.pattern: Invalid glob pattern in rule '${rule.id}': ${rule.pattern}`);
    }

    const check = rule.check;
    if (check.type === "value_match") {
      const error = regexError(check.regex);
      if (error) {
        issues.push(`${where}.check.regex: Invalid regex in rule '${rule.id}': ${error}`);
      }
    }
    if (check.type === "forbidden_value" && check.value === undefined) {
      issues.push(`${where}.check.value: forbidden_value in rule '${rule.id}' requires a value`);
    }
  });

  return issues;
}

function regexError(source: string): string | null {
  try {
    new RegExp(source);
    return null;
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}

// =============================================================================
// CONVERSION
// =============================================================================

function toRule(rule: RuleDocument): PolicyRule {
  return {
    id: rule.id,
    description: rule.description ?? null,
    severity: rule.severity,
    pattern: rule.pattern ?? null,
    check: toCheck(rule.check),
  };
}

function toCheck(check: RuleDocument["check"]): PolicyCheck {
  switch (check.type) {
    case "required_key":
      return { type: "required_key", key: check.key };
    case "forbidden_key":
      return { type: "forbidden_key", key: check.key };
    case "value_match":
      return { type: "value_match", key: check.key, regex: check.regex, compiled: new RegExp(check.regex) };
    case "value_enum":
      return { type: "value_enum", key: check.key, values: check.values.map(toCanonical) };
    case "forbidden_value":
      return { type: "forbidden_value", key: check.key, value: toCanonical(check.value ?? null) };
  }
}

export function toCanonical(value: PolicyScalar): CanonicalValue {
  if (value === null) return NULL_VALUE;
  if (typeof value === "boolean") return boolValue(value);
  if (typeof value === "number") return numberValue(value);
  return stringValue(value);
}
