import assert from "node:assert/strict";
import { test } from "node:test";
import os from "node:os";
import path from "node:path";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { EMPTY_GATE_INPUTS, evaluateGate, gatedIssues, prepareGateInputs, type GateInputs } from "../qualityGate.js";
import { issueFingerprint } from "../baseline.js";
import { defaultConfig } from "../../config/loadConfig.js";
import {
  ConfigBaselineMissingError,
  ConfigBaselineRequiredError,
  ConfigCoverageMissingError,
  ConfigInvalidSeverityError,
  ConfigInvalidThresholdError
} from "../../errors/config.errors.js";
import type { Issue, Severity } from "../../types.js";

const issue = (ruleId: string, filePath: string, line: number, severity: Severity): Issue => ({
  ruleId,
  path: filePath,
  line,
  severity,
  message: `${ruleId} finding`
});

const inputs = (overrides: Partial<GateInputs>): GateInputs => ({ ...EMPTY_GATE_INPUTS, ...overrides });

const coverage = (percent: number) => ({ lineRate: percent / 100, percent, linesCovered: null, linesValid: null });

const ISSUES: Issue[] = [
  issue("PG104", "a.py", 1, "low"),
  issue("PG202", "a.py", 4, "medium"),
  issue("PG201", "b.py", 2, "high")
];

test("no thresholds always passes", () => {
  const result = evaluateGate({ issues: ISSUES }, EMPTY_GATE_INPUTS);
  assert.equal(result.passed, true);
  assert.deepEqual(result.violations, []);
  assert.deepEqual(result.counts, { total: 3, filesWithIssues: 2, bySeverity: { low: 1, medium: 1, high: 1, critical: 0 } });
});

test("fail_on high fails on a single high issue", () => {
  const result = evaluateGate({ issues: [issue("PG001", "app.js", 10, "high")] }, inputs({ failOn: "high" }));
  assert.equal(result.passed, false);
  assert.deepEqual(result.violations, [
    { threshold: "fail_on", limit: "high", observed: 1, message: "Detected 1 issue with severity >= high" }
  ]);
});

test("fail_on counts every issue at or above the severity", () => {
  const result = evaluateGate({ issues: ISSUES }, inputs({ failOn: "medium" }));
  assert.equal(result.violations[0].message, "Detected 2 issues with severity >= medium");
});

test("max_issues is an inclusive cap", () => {
  assert.equal(evaluateGate({ issues: ISSUES }, inputs({ maxIssues: 3 })).passed, true);
  const result = evaluateGate({ issues: ISSUES }, inputs({ maxIssues: 2 }));
  assert.deepEqual(
    result.violations.map((violation) => violation.message),
    ["Issue count 3 exceeds max_issues=2"]
  );
});

test("violations are listed in a fixed order", () => {
  const result = evaluateGate(
    { issues: ISSUES },
    inputs({ failOn: "high", maxIssues: 0, maxFilesWithIssues: 1, maxLow: 0, maxHigh: 0, minCoverage: 80, coverage: coverage(75) })
  );
  assert.deepEqual(
    result.violations.map((violation) => violation.threshold),
    ["fail_on", "max_issues", "max_files_with_issues", "max_low", "max_high", "min_coverage"]
  );
  assert.deepEqual(
    result.violations.map((violation) => violation.message),
    [
      "Detected 1 issue with severity >= high",
      "Issue count 3 exceeds max_issues=0",
      "Files with issues 2 exceeds max_files_with_issues=1",
      "low issue count 1 exceeds max_low=0",
      "high issue count 1 exceeds max_high=0",
      "Coverage 75.00% is below min_coverage=80.00%"
    ]
  );
  assert.equal(result.coveragePercent, 75);
});

test("coverage at the minimum passes", () => {
  const result = evaluateGate({ issues: [] }, inputs({ minCoverage: 80, coverage: coverage(80) }));
  assert.equal(result.passed, true);
});

test("coverage gate without data is a configuration error", () => {
  assert.throws(() => evaluateGate({ issues: [] }, inputs({ minCoverage: 50 })), ConfigCoverageMissingError);
  assert.throws(() => evaluateGate({ issues: ISSUES }, inputs({ failOn: "low", minCoverage: 0 })), ConfigCoverageMissingError);
});

test("adding issues never turns a failing gate into a passing one", () => {
  const gate = inputs({ maxMedium: 1, failOn: "critical" });
  let issues: Issue[] = [];
  let failed = false;
  const additions = [
    issue("PG202", "a.py", 1, "medium"),
    issue("PG202", "a.py", 2, "medium"),
    issue("PG104", "a.py", 3, "low"),
    issue("PG102", "b.py", 1, "critical")
  ];
  for (const addition of additions) {
    issues = [...issues, addition];
    const passed = evaluateGate({ issues }, gate).passed;
    if (failed) assert.equal(passed, false);
    failed = failed || !passed;
  }
  assert.equal(failed, true);
});

test("only new issues count when gating against a baseline", () => {
  const known = ISSUES[2];
  const baseline = new Set([issueFingerprint(known)]);
  const result = evaluateGate({ issues: ISSUES }, inputs({ failOn: "high", baseline, onlyNewIssues: true }));
  assert.equal(result.passed, true);
  assert.equal(result.baselineMatched, 1);
  assert.equal(result.newIssues, 2);
  assert.equal(result.counts.total, 2);

  const moved = evaluateGate(
    { issues: [{ ...known, line: known.line + 1 }] },
    inputs({ failOn: "high", baseline, onlyNewIssues: true })
  );
  assert.equal(moved.passed, false);
});

test("baseline matches are counted even when every issue is gated", () => {
  const baseline = new Set(ISSUES.map(issueFingerprint));
  assert.equal(gatedIssues(ISSUES, { baseline, onlyNewIssues: false }).length, 3);
  const result = evaluateGate({ issues: ISSUES }, inputs({ failOn: "high", baseline }));
  assert.equal(result.passed, false);
  assert.equal(result.counts.total, 3);
  assert.equal(result.baselineMatched, 3);
  assert.equal(result.newIssues, 0);
  assert.equal(result.onlyNewIssues, false);

  const withoutBaseline = evaluateGate({ issues: ISSUES }, EMPTY_GATE_INPUTS);
  assert.equal(withoutBaseline.baselineMatched, 0);
  assert.equal(withoutBaseline.newIssues, null);
});

test("evaluation does not modify the report", () => {
  const report = { issues: ISSUES.map((entry) => ({ ...entry })) };
  evaluateGate(report, inputs({ failOn: "low", baseline: new Set([issueFingerprint(ISSUES[0])]), onlyNewIssues: true }));
  assert.deepEqual(report.issues, ISSUES);
});

test("prepareGateInputs rejects bad severities and thresholds", async () => {
  const gate = defaultConfig("/project").gate;
  await assert.rejects(prepareGateInputs({ ...gate, failOn: "severe" }), ConfigInvalidSeverityError);
  await assert.rejects(prepareGateInputs({ ...gate, maxIssues: -1 }), ConfigInvalidThresholdError);
  await assert.rejects(prepareGateInputs({ ...gate, maxHigh: 1.5 }), ConfigInvalidThresholdError);
  await assert.rejects(prepareGateInputs({ ...gate, minCoverage: 120, coverageXml: "cov.xml" }), ConfigInvalidThresholdError);
});

test("prepareGateInputs requires the reports the gate depends on", async () => {
  const gate = defaultConfig("/project").gate;
  await assert.rejects(prepareGateInputs({ ...gate, onlyNewIssues: true }), ConfigBaselineRequiredError);
  await assert.rejects(prepareGateInputs({ ...gate, minCoverage: 80 }), ConfigCoverageMissingError);
  await assert.rejects(
    prepareGateInputs({ ...gate, baselineReport: "missing-baseline.json" }, { cwd: os.tmpdir() }),
    ConfigBaselineMissingError
  );
});

test("prepareGateInputs normalizes severity and loads reports relative to cwd", async (t) => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "polygate-gate-"));
  t.after(() => rm(dir, { recursive: true, force: true }));
  await writeFile(path.join(dir, "baseline.json"), JSON.stringify({ issues: [ISSUES[0]] }));
  await writeFile(path.join(dir, "coverage.xml"), '<?xml version="1.0"?>\n<coverage line-rate="0.5"></coverage>\n');

  const gate = defaultConfig(dir).gate;
  const prepared = await prepareGateInputs(
    { ...gate, failOn: " HIGH ", baselineReport: "baseline.json", coverageXml: "coverage.xml", minCoverage: 85 },
    { cwd: dir }
  );
  assert.equal(prepared.failOn, "high");
  assert.deepEqual([...(prepared.baseline ?? [])], [issueFingerprint(ISSUES[0])]);
  assert.equal(prepared.coverage?.percent, 50);
});

test("max_critical of zero passes a clean report and fails on one critical issue", () => {
  const gate = inputs({ maxCritical: 0 });
  assert.equal(evaluateGate({ issues: [issue("PG104", "a.py", 1, "low")] }, gate).passed, true);
  const result = evaluateGate({ issues: [issue("PG102", "keys.py", 1, "critical")] }, gate);
  assert.deepEqual(result.violations, [
    { threshold: "max_critical", limit: 0, observed: 1, message: "critical issue count 1 exceeds max_critical=0" }
  ]);
});
