import assert from "node:assert/strict";
import { test } from "node:test";
import {
  buildJsonReport,
  buildSarifReport,
  buildSecuritySummary,
  formatReport,
  formatReportText,
  sarifLevel
} from "../formatters.js";
import { EMPTY_GATE_INPUTS, evaluateGate } from "../../gate/qualityGate.js";
import { issueFingerprint } from "../../gate/baseline.js";
import type { ScanReport } from "../../types.js";

const EVAL_MESSAGE = "Avoid dynamic evaluation via eval().";

const report: ScanReport = {
  issues: [
    {
      ruleId: "PG104",
      path: "a.py",
      line: 2,
      severity: "low",
      message: "TODO marker found. Track and resolve before release.",
      snippet: "# TODO: x"
    },
    { ruleId: "PG201", path: "a.py", line: 3, column: 10, severity: "high", message: EVAL_MESSAGE, snippet: "x = eval(y)" },
    { ruleId: "PG201", path: "b.py", line: 1, column: 9, severity: "high", message: EVAL_MESSAGE },
    {
      ruleId: "PG001",
      path: "src/app.js",
      line: 10,
      column: 1,
      severity: "high",
      message: "Avoid dynamic code execution via eval()."
    }
  ],
  summary: {
    total: 4,
    bySeverity: { low: 1, medium: 0, high: 3, critical: 0 },
    byRule: { PG104: 1, PG201: 2, PG001: 1 },
    filesWithIssues: 3
  },
  notes: [
    { kind: "parse_fallback", path: "src/bad.js", message: "Could not parse (x); analyzed with pattern rules only." }
  ],
  metadata: {
    ruleSetFingerprint: "test-fingerprint",
    filesScanned: 5,
    generatedAt: "1970-01-01T00:00:00.000Z",
    toolVersion: "0.1.0"
  }
};

const gate = evaluateGate(report, { ...EMPTY_GATE_INPUTS, failOn: "high" });

test("text report groups repeated findings and appends the gate", () => {
  const text = formatReportText(report, { gate, color: false });
  assert.equal(
    text,
    [
      "POLYGATE SUMMARY",
      "----------------",
      "- Issues: 4 total (CRITICAL 0, HIGH 3, MEDIUM 0, LOW 1) in 3 file(s)",
      "- Files scanned: 5",
      "",
      "ALL ISSUES",
      "HIGH #1 PG001 Dynamic code execution",
      "  location: src/app.js:10:1",
      "  Avoid dynamic code execution via eval().",
      "",
      "HIGH #2 PG201 Dynamic code evaluation",
      "  affected locations (2):",
      "  - a.py:3:10",
      "  - b.py:1:9",
      `  ${EVAL_MESSAGE}`,
      "",
      "LOW #3 PG104 Work item marker",
      "  location: a.py:2",
      "  TODO marker found. Track and resolve before release.",
      "  evidence: # TODO: x",
      "",
      "NOTES",
      "- [parse_fallback] src/bad.js: Could not parse (x); analyzed with pattern rules only.",
      "",
      "QUALITY GATE: FAILED",
      "- Detected 3 issues with severity >= high"
    ].join("\n")
  );
});

test("text report for a clean scan", () => {
  const clean: ScanReport = {
    ...report,
    issues: [],
    notes: [],
    summary: { total: 0, bySeverity: { low: 0, medium: 0, high: 0, critical: 0 }, byRule: {}, filesWithIssues: 0 }
  };
  const passed = evaluateGate(clean, { ...EMPTY_GATE_INPUTS, failOn: "high" });
  assert.equal(
    formatReport("text", clean, { gate: passed, color: false }),
    [
      "POLYGATE SUMMARY",
      "----------------",
      "- Issues: 0 total (CRITICAL 0, HIGH 0, MEDIUM 0, LOW 0) in 0 file(s)",
      "- Files scanned: 5",
      "",
      "No issues.",
      "",
      "QUALITY GATE: PASSED"
    ].join("\n")
  );
});

test("security summary counts only security rules", () => {
  assert.deepEqual(buildSecuritySummary(report.issues), {
    issuesTotal: 3,
    filesWithIssues: 3,
    bySeverity: { low: 0, medium: 0, high: 3, critical: 0 },
    byRule: { PG001: 1, PG201: 2 },
    byLanguage: { javascript: 1, python: 2 },
    topFiles: [
      { path: "a.py", issues: 1 },
      { path: "b.py", issues: 1 },
      { path: "src/app.js", issues: 1 }
    ]
  });
});

test("json report carries the tool, issues and gate", () => {
  const json = buildJsonReport(report, { gate });
  assert.deepEqual(json.tool, { name: "polygate", version: "0.1.0" });
  assert.equal(json.issues, report.issues);
  assert.equal(json.gate?.passed, false);

  const parsed: unknown = JSON.parse(formatReport("json", report));
  assert.ok(typeof parsed === "object" && parsed !== null && "gate" in parsed);
  assert.equal(parsed.gate, null);
});

test("baseline matches are reported whether or not only new issues are gated", () => {
  const baseline = new Set([issueFingerprint(report.issues[1])]);
  const all = evaluateGate(report, { ...EMPTY_GATE_INPUTS, failOn: "high", baseline });
  assert.deepEqual(formatReportText(report, { gate: all, color: false }).split("\n").slice(-3), [
    "QUALITY GATE: FAILED",
    "- Detected 3 issues with severity >= high",
    "- baseline: 1 matched, 3 new (all issues gated)"
  ]);

  const onlyNew = evaluateGate(report, { ...EMPTY_GATE_INPUTS, failOn: "high", baseline, onlyNewIssues: true });
  assert.deepEqual(formatReportText(report, { gate: onlyNew, color: false }).split("\n").slice(-3), [
    "QUALITY GATE: FAILED",
    "- Detected 2 issues with severity >= high",
    "- baseline: 1 matched, 3 new (only new issues gated)"
  ]);

  const json = buildJsonReport(report, { gate: all });
  assert.equal(json.gate?.baselineMatched, 1);
  assert.equal(json.gate?.newIssues, 3);
});

test("sarif levels follow severity", () => {
  assert.equal(sarifLevel("critical"), "error");
  assert.equal(sarifLevel("high"), "error");
  assert.equal(sarifLevel("medium"), "warning");
  assert.equal(sarifLevel("low"), "note");
});

test("sarif results point at their rule by index", () => {
  const sarif = buildSarifReport(
    { ...report, issues: [...report.issues, { ruleId: "T9", path: "x.py", line: 1, severity: "medium", message: "custom" }] },
    { gate }
  );
  const [run] = sarif.runs;
  assert.equal(sarif.version, "2.1.0");
  assert.deepEqual(
    run.tool.driver.rules.map((rule) => [rule.id, rule.defaultConfiguration.level, rule.properties.tags]),
    [
      ["PG001", "error", ["security"]],
      ["PG104", "note", ["style"]],
      ["PG201", "error", ["security"]]
    ]
  );
  assert.deepEqual(
    run.results.map((result) => [result.ruleId, result.ruleIndex, result.level]),
    [
      ["PG104", 1, "note"],
      ["PG201", 2, "error"],
      ["PG201", 2, "error"],
      ["PG001", 0, "error"],
      ["T9", undefined, "warning"]
    ]
  );
  assert.deepEqual(run.results[0].locations[0].physicalLocation, {
    artifactLocation: { uri: "a.py" },
    region: { startLine: 2 }
  });
  assert.deepEqual(run.results[1].locations[0].physicalLocation.region, { startLine: 3, startColumn: 10 });
  assert.deepEqual(run.properties, { ruleSetFingerprint: "test-fingerprint", filesScanned: 5, qualityGatePassed: false });
});
