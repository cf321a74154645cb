import { describe, expect, it } from "vitest";

import type { Severity } from "../model/severity.js";
import type { Violation } from "../policy/types.js";
import type { SecretFinding } from "../secrets/scanner.js";
import { aggregateAudit, computeRisk } from "./aggregator.js";
import type { Inventory, ScannedFile } from "./inventory.js";
import { renderAuditMarkdown } from "./render-markdown.js";
import { renderAuditText } from "./render-text.js";

// =============================================================================
// HELPERS
// =============================================================================

function scanned(path: string, overrides: Partial<ScannedFile> = {}): ScannedFile {
  return {
    path,
    absolute_path: `/work/${path}`,
    format: path.endsWith(".json") ? "json" : path.endsWith(".toml") ? "toml" : "yaml",
    sha256: "0123456789abcdef".repeat(4),
    size: 10,
    key_count: 2,
    mapping: new Map(),
    bytes: new Uint8Array(),
    error: null,
    ...overrides,
  };
}

function inventory(files: ScannedFile[]): Inventory {
  return { root: "/work", scanned_at: "2026-02-01T12:00:00.000Z", files };
}

function finding(severity: Severity, file = "app.yaml", line = 1): SecretFinding {
  return {
    file,
    line,
    key_path: "db.password",
    secret_type: "generic_password",
    severity,
    confidence: "medium",
    pattern_name: "Generic Password",
    snippet: "hunt****",
  };
}

function violation(severity: Severity, file = "app.yaml", ruleId = "rule"): Violation {
  return {
    rule_id: ruleId,
    rule_description: null,
    severity,
    file,
    key_path: null,
    message: `${ruleId} failed`,
  };
}

const EMPTY = { secret_findings: [], violations: [], recent_changes: [] };

// =============================================================================
// TESTS
// =============================================================================

describe("computeRisk", () => {
  it("passes with no findings and no violations", () => {
    expect(computeRisk([], [])).toBe("PASS");
  });

  it("passes when only low-severity items remain", () => {
    expect(computeRisk([finding("medium"), finding("low")], [violation("low")])).toBe("PASS");
  });

  it("warns for high secrets and for medium or high violations", () => {
    expect(computeRisk([finding("high")], [])).toBe("WARN");
    expect(computeRisk([], [violation("medium")])).toBe("WARN");
    expect(computeRisk([], [violation("high")])).toBe("WARN");
  });

  it("fails on any critical item", () => {
    expect(computeRisk([finding("critical")], [])).toBe("FAIL");
    expect(computeRisk([], [violation("critical")])).toBe("FAIL");
  });

  it("never lowers the level when items are added", () => {
    const levels = ["PASS", "WARN", "FAIL"];
    const steps: Array<[SecretFinding[], Violation[]]> = [
      [[], []],
      [[finding("low")], []],
      [[finding("low")], [violation("medium")]],
      [[finding("low"), finding("high")], [violation("medium")]],
      [[finding("low"), finding("high")], [violation("medium"), violation("critical")]],
      [[finding("low"), finding("high"), finding("low")], [violation("medium"), violation("critical")]],
    ];

    const ranks = steps.map(([findings, violations]) => levels.indexOf(computeRisk(findings, violations)));
    expect(ranks).toEqual([0, 0, 1, 1, 2, 2]);
  });
});

describe("aggregateAudit", () => {
  it("fails a config that turns on debug under a critical rule", () => {
    const report = aggregateAudit({
      ...EMPTY,
      inventory: inventory([scanned("settings.json", { key_count: 1 })]),
      violations: [
        {
          rule_id: "no-debug",
          rule_description: "Debug must be off",
          severity: "critical",
          file: "settings.json",
          key_path: "debug",
          message: "Forbidden value 'true' found for key 'debug'",
        },
      ],
    });

    expect(report.risk).toBe("FAIL");
    expect(report.risk_summary).toBe("1 policy violation");
    expect(report.policy.counts).toEqual({ low: 0, medium: 0, high: 0, critical: 1 });
  });

  it("summarizes an inventory without issues", () => {
    const report = aggregateAudit({
      ...EMPTY,
      inventory: inventory([
        scanned("z.toml"),
        scanned("a.json"),
        scanned("broken.yaml", { key_count: 0, mapping: null, error: "Invalid YAML in broken.yaml" }),
      ]),
    });

    expect(report.overview).toEqual({
      generated_at: "2026-02-01T12:00:00.000Z",
      root: "/work",
      total_files: 3,
      formats: { yaml: 1, json: 1, toml: 1 },
      parse_errors: 1,
    });
    expect(report.inventory.map((entry) => entry.path)).toEqual(["a.json", "broken.yaml", "z.toml"]);
    expect(report.risk).toBe("PASS");
    expect(report.risk_summary).toBe("No issues found");
  });

  it("orders findings and violations by severity, then file", () => {
    const report = aggregateAudit({
      ...EMPTY,
      inventory: inventory([]),
      secret_findings: [finding("low", "b.yaml"), finding("critical", "c.yaml"), finding("low", "a.yaml", 7)],
      violations: [violation("low", "a.yaml", "r2"), violation("high", "b.yaml"), violation("low", "a.yaml", "r1")],
    });

    expect(report.secrets.findings.map((item) => `${item.severity}:${item.file}`)).toEqual([
      "critical:c.yaml",
      "low:a.yaml",
      "low:b.yaml",
    ]);
    expect(report.policy.violations.map((item) => `${item.severity}:${item.file}:${item.rule_id}`)).toEqual([
      "high:b.yaml:rule",
      "low:a.yaml:r1",
      "low:a.yaml:r2",
    ]);
    expect(report.risk_summary).toBe("3 secrets found, 3 policy violations");
  });

  it("does not depend on input order", () => {
    const findings = [finding("high", "a.yaml"), finding("low", "b.yaml")];
    const violations = [violation("medium", "a.yaml"), violation("critical", "b.yaml")];

    const forward = aggregateAudit({
      ...EMPTY,
      inventory: inventory([scanned("a.yaml"), scanned("b.yaml")]),
      secret_findings: findings,
      violations,
    });
    const reversed = aggregateAudit({
      ...EMPTY,
      inventory: inventory([scanned("b.yaml"), scanned("a.yaml")]),
      secret_findings: [...findings].reverse(),
      violations: [...violations].reverse(),
    });

    expect(reversed).toEqual(forward);
  });
});

describe("audit renderings", () => {
  const report = aggregateAudit({
    inventory: inventory([scanned("app.yaml")]),
    secret_findings: [finding("critical")],
    violations: [violation("medium", "app.yaml", "needs|pipe")],
    recent_changes: [],
  });

  it("ends the text report with the risk line", () => {
    const lines = renderAuditText(report).split("\n");

    expect(lines[0]).toBe("Config Audit Report");
    expect(lines.at(-1)).toBe("  FAIL -- 1 secret found, 1 policy violation");
  });

  it("escapes pipes inside markdown table cells", () => {
    const markdown = renderAuditMarkdown(report);

    expect(markdown).toContain("**Risk:** FAIL (1 secret found, 1 policy violation)");
    expect(markdown).toContain("| MEDIUM | app.yaml | needs\\|pipe | needs\\|pipe failed |");
  });
});
