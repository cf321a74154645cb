import { describe, expect, it } from "vitest";

import { PolicyError } from "../core/errors.js";
import { boolValue, numberValue, stringValue } from "../model/canonical.js";
import { loadPolicy, parsePolicy } from "./loader.js";

function capturePolicyError(run: () => unknown): PolicyError {
  try {
    run();
  } catch (err) {
    if (err instanceof PolicyError) return err;
    throw err;
  }
  throw new Error("expected a PolicyError");
}

describe("parsePolicy", () => {
  it("reads rules with defaults filled in", () => {
    const policy = parsePolicy(
      [
        "name: production",
        "description: Rules for production services",
        "rules:",
        "  - id: need-owner",
        "    check: { type: required_key, key: metadata.owner }",
        "  - id: no-debug",
        "    severity: critical",
        "    pattern: '*.prod.yaml'",
        "    description: Debug must be off",
        "    check: { type: forbidden_value, key: debug, value: 'true' }",
        "",
      ].join("\n"),
      "policies/prod.yaml",
    );

    expect(policy.name).toBe("production");
    expect(policy.source).toBe("policies/prod.yaml");
    expect(policy.rules).toEqual([
      {
        id: "need-owner",
        description: null,
        severity: "medium",
        pattern: null,
        check: { type: "required_key", key: "metadata.owner" },
      },
      {
        id: "no-debug",
        description: "Debug must be off",
        severity: "critical",
        pattern: "*.prod.yaml",
        check: { type: "forbidden_value", key: "debug", value: stringValue("true") },
      },
    ]);
  });

  it("keeps policy values typed", () => {
    const policy = parsePolicy(
      JSON.stringify({
        name: "typed",
        rules: [
          { id: "a", check: { type: "forbidden_value", key: "debug", value: true } },
          { id: "b", check: { type: "value_enum", key: "replicas", values: [1, 3, "auto"] } },
        ],
      }),
      "typed.json",
    );

    expect(policy.rules[0]?.check).toEqual({ type: "forbidden_value", key: "debug", value: boolValue(true) });
    expect(policy.rules[1]?.check).toEqual({
      type: "value_enum",
      key: "replicas",
      values: [numberValue(1), numberValue(3), stringValue("auto")],
    });
  });

  it("compiles value_match patterns", () => {
    const policy = parsePolicy(
      "name: p\nrules:\n  - id: tag\n    check: { type: value_match, key: image, regex: ':v\\d+$' }\n",
      "p.yaml",
    );
    const check = policy.rules[0]?.check;

    expect(check?.type).toBe("value_match");
    if (check?.type === "value_match") {
      expect(check.compiled.test("api:v12")).toBe(true);
      expect(check.compiled.test("api:latest")).toBe(false);
    }
  });

  it("lists every rule problem at once", () => {
    const error = capturePolicyError(() =>
      parsePolicy(
        [
          "name: broken",
          "rules:",
          "  - id: a",
          "    check: { type: value_match, key: x, regex: '(' }",
          "  - id: a",
          "    check: { type: forbidden_value, key: y }",
          "",
        ].join("\n"),
        "broken.yaml",
      ),
    );

    expect(error.message).toBe("Policy file broken.yaml failed validation");
    expect(error.issues).toEqual([
      expect.stringMatching(/^rules\.0\.check\.regex: Invalid regex in rule 'a': /),
      "rules.1.id: Duplicate rule id 'a'",
      "rules.1.check.value: forbidden_value in rule 'a' requires a value",
    ]);
  });

  it("rejects a policy without rules", () => {
    const error = capturePolicyError(() => parsePolicy("name: empty\nrules: []\n", "empty.yaml"));
    expect(error.issues).toEqual(["rules: Policy must contain at least one rule"]);
  });

  it("reports schema problems with their location", () => {
    const error = capturePolicyError(() =>
      parsePolicy("name: p\nrules:\n  - id: a\n    check: { type: nope, key: x }\n", "p.yaml"),
    );

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^rules\.0\.check\.type: /);
  });

  it("reports unknown severities and keys", () => {
    const error = capturePolicyError(() =>
      parsePolicy(
        "name: p\nrules:\n  - id: a\n    severity: urgent\n    owner: me\n    check: { type: required_key, key: x }\n",
        "p.yaml",
      ),
    );

    expect(error.issues).toContain(
      'rules.0.severity: Expected one of "low", "medium", "high", "critical", received "urgent"',
    );
    expect(error.issues).toContain("rules.0: Unrecognized keys: owner");
  });

  it("wraps YAML syntax errors", () => {
    expect(() => parsePolicy("name: [", "bad.yaml")).toThrow(/^Failed to parse policy file bad\.yaml: /);
  });
});

describe("loadPolicy", () => {
  it("fails with a PolicyError when the file is missing", () => {
    expect(() => loadPolicy("/nonexistent/confaudit/policy.yaml")).toThrow(
      "Failed to read policy file /nonexistent/confaudit/policy.yaml",
    );
  });
});
