import yaml from "js-yaml";
import { describe, expect, it } from "vitest";

import { diffMappings, type Change } from "../diff/diff-engine.js";
import { rebuildContainer, mappingEntries, type FlattenedMapping } from "../model/flatten.js";
import { toPlainJson } from "../model/canonical.js";
import { normalize } from "../normalize/normalizer.js";
import { evaluatePolicy } from "../policy/evaluator.js";
import { parsePolicy } from "../policy/loader.js";
import { computeRisk } from "../report/aggregator.js";
import type { Severity } from "../model/severity.js";
import { encode, flat } from "./helpers.js";

const DOCUMENTS: unknown[] = [
  { service: { name: "api", replicas: 3, ratio: 0.25, tags: ["blue", "canary"] }, debug: false },
  { "dotted.key": { "back\\slash": "x" }, empty: {}, none: null, list: [], nested: [[1, 2], { a: -7 }] },
  { limits: { cpu: "500m", memory: 1.5e3 }, features: [{ id: 1, enabled: true }, { id: 2, enabled: null }] },
];

function invert(change: Change): Change {
  switch (change.kind) {
    case "added":
      return { kind: "removed", key_path: change.key_path, old_value: change.new_value };
    case "removed":
      return { kind: "added", key_path: change.key_path, new_value: change.old_value };
    case "changed":
      return {
        kind: "changed",
        key_path: change.key_path,
        old_value: change.new_value,
        new_value: change.old_value,
      };
  }
}

function reserialize(mapping: FlattenedMapping): unknown {
  return toPlainJson(rebuildContainer(mappingEntries(mapping).map((entry) => [entry.key_path, entry.value]), ""));
}

describe("normalization", () => {
  it("maps the same data to the same mapping from JSON and YAML", () => {
    for (const document of DOCUMENTS) {
      const fromJson = normalize(encode(JSON.stringify(document)), "json");
      const fromYaml = normalize(encode(yaml.dump(document)), "yaml");

      expect(diffMappings(fromJson, fromYaml)).toEqual([]);
    }
  });

  it("survives a round trip through its own serialization", () => {
    for (const document of DOCUMENTS) {
      const mapping = flat(document);
      const again = normalize(encode(yaml.dump(reserialize(mapping))), "yaml");

      expect(diffMappings(mapping, again)).toEqual([]);
    }
  });
});

describe("diff", () => {
  it("is empty against itself", () => {
    for (const document of DOCUMENTS) {
      expect(diffMappings(flat(document), flat(document))).toEqual([]);
    }
  });

  it("is symmetric when the sides swap", () => {
    for (const [index, left] of DOCUMENTS.entries()) {
      const right = DOCUMENTS[(index + 1) % DOCUMENTS.length];
      const forward = diffMappings(flat(left), flat(right));
      const backward = diffMappings(flat(right), flat(left));

      expect(backward).toEqual(forward.map(invert));
    }
  });
});

describe("policy evaluation", () => {
  const policy = parsePolicy(
    [
      "name: props",
      "rules:",
      "  - id: needs-name",
      "    check: { type: required_key, key: service.name }",
      "  - id: replica-range",
      "    severity: high",
      "    check: { type: value_enum, key: service.replicas, values: [1, 2] }",
      "  - id: no-debug",
      "    severity: critical",
      "    check: { type: forbidden_value, key: debug, value: false }",
      "",
    ].join("\n"),
    "props.yaml",
  );

  it("does not depend on key order in the file", () => {
    const ordered = flat({ service: { name: "api", replicas: 3 }, debug: false });
    const shuffled = flat({ debug: false, service: { replicas: 3, name: "api" } });

    const first = evaluatePolicy(policy, ordered, "app.json");

    expect(first.map((violation) => violation.rule_id)).toEqual(["replica-range", "no-debug"]);
    expect(evaluatePolicy(policy, shuffled, "app.json")).toEqual(first);
    expect(evaluatePolicy(policy, ordered, "app.json")).toEqual(first);
  });
});

describe("risk", () => {
  it("never drops when findings are added", () => {
    const order = ["PASS", "WARN", "FAIL"];
    const severities: Severity[] = ["low", "medium", "high", "critical"];

    for (const base of severities) {
      for (const extra of severities) {
        const before = order.indexOf(computeRisk([{ severity: base }], [{ severity: base }]));
        const after = order.indexOf(
          computeRisk([{ severity: base }, { severity: extra }], [{ severity: base }, { severity: extra }]),
        );
        expect(after).toBeGreaterThanOrEqual(before);
      }
    }
  });
});
