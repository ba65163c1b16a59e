import path from "node:path";
import { issueFingerprint, loadBaseline, type Baseline } from "./baseline.js";
import { loadCoverage, type CoverageData } from "./coverage.js";
import {
  ConfigBaselineRequiredError,
  ConfigCoverageMissingError,
  ConfigInvalidSeverityError,
  ConfigInvalidThresholdError
} from "../errors/config.errors.js";
import {
  SEVERITIES,
  emptySeverityCounts,
  parseSeverity,
  severityRank,
  type Severity
} from "../types/domain/severity.js";
import type { GateConfig } from "../config/loadConfig.js";
import type { Issue, ScanReport } from "../types.js";

export type GateThreshold =
  | "fail_on"
  | "max_issues"
  | "max_files_with_issues"
  | "max_low"
  | "max_medium"
  | "max_high"
  | "max_critical"
  | "min_coverage";

export type GateViolation = {
  threshold: GateThreshold;
  limit: number | Severity;
  observed: number;
  message: string;
};

export type GateCounts = {
  total: number;
  filesWithIssues: number;
  bySeverity: Record<Severity, number>;
};

export type QualityGateResult = {
  passed: boolean;
  violations: GateViolation[];
  counts: GateCounts;
  /** Issues whose fingerprint is in the baseline; 0 without one. */
  baselineMatched: number;
  /** Issues absent from the baseline, or null when no baseline was given. */
  newIssues: number | null;
  onlyNewIssues: boolean;
  coveragePercent: number | null;
};

/** Validated gate settings with the baseline and coverage already loaded. */
export type GateInputs = {
  failOn: Severity | null;
  maxIssues: number | null;
  maxFilesWithIssues: number | null;
  maxLow: number | null;
  maxMedium: number | null;
  maxHigh: number | null;
  maxCritical: number | null;
  minCoverage: number | null;
  coverage: CoverageData | null;
  baseline: Baseline | null;
  onlyNewIssues: boolean;
};

export const EMPTY_GATE_INPUTS: GateInputs = {
  failOn: null,
  maxIssues: null,
  maxFilesWithIssues: null,
  maxLow: null,
  maxMedium: null,
  maxHigh: null,
  maxCritical: null,
  minCoverage: null,
  coverage: null,
  baseline: null,
  onlyNewIssues: false
};

export type PrepareGateOptions = {
  /** Base for relative report paths. */
  cwd?: string;
  /** Already-measured coverage; skips reading `coverageXml`. */
  coverage?: CoverageData | null;
};

type SeverityCap = "maxLow" | "maxMedium" | "maxHigh" | "maxCritical";

const SEVERITY_CAPS: Record<Severity, SeverityCap> = {
  low: "maxLow",
  medium: "maxMedium",
  high: "maxHigh",
  critical: "maxCritical"
};

function checkCap(setting: string, value: number | null): number | null {
  if (value === null) return null;
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigInvalidThresholdError(setting, value, "a non-negative integer");
  }
  return value;
}

/** Validates gate settings and loads the baseline and coverage reports they name. */
export async function prepareGateInputs(gate: GateConfig, options: PrepareGateOptions = {}): Promise<GateInputs> {
  const cwd = options.cwd ?? process.cwd();

  let failOn: Severity | null = null;
  if (gate.failOn !== null) {
    failOn = parseSeverity(gate.failOn);
    if (!failOn) throw new ConfigInvalidSeverityError("fail_on", gate.failOn);
  }

  if (gate.minCoverage !== null && !(gate.minCoverage >= 0 && gate.minCoverage <= 100)) {
    throw new ConfigInvalidThresholdError("min_coverage", gate.minCoverage, "a percentage between 0 and 100");
  }

  const inputs: GateInputs = {
    failOn,
    maxIssues: checkCap("max_issues", gate.maxIssues),
    maxFilesWithIssues: checkCap("max_files_with_issues", gate.maxFilesWithIssues),
    maxLow: checkCap("max_low", gate.maxLow),
    maxMedium: checkCap("max_medium", gate.maxMedium),
    maxHigh: checkCap("max_high", gate.maxHigh),
    maxCritical: checkCap("max_critical", gate.maxCritical),
    minCoverage: gate.minCoverage,
    coverage: null,
    baseline: null,
    onlyNewIssues: gate.onlyNewIssues
  };

  if (gate.onlyNewIssues && !gate.baselineReport) {
    throw new ConfigBaselineRequiredError();
  }
  if (gate.baselineReport) {
    inputs.baseline = await loadBaseline(path.resolve(cwd, gate.baselineReport));
  }

  if (options.coverage) {
    inputs.coverage = options.coverage;
  } else if (gate.coverageXml) {
    inputs.coverage = await loadCoverage(path.resolve(cwd, gate.coverageXml));
  } else if (gate.minCoverage !== null) {
    throw new ConfigCoverageMissingError(null);
  }

  return inputs;
}

/** Issues that count toward thresholds: all of them, or only those absent from the baseline. */
export function gatedIssues(issues: readonly Issue[], inputs: Pick<GateInputs, "baseline" | "onlyNewIssues">): Issue[] {
  const { baseline } = inputs;
  if (!inputs.onlyNewIssues || !baseline) return [...issues];
  return issues.filter((issue) => !baseline.has(issueFingerprint(issue)));
}

function countIssues(issues: readonly Issue[]): GateCounts {
  const bySeverity = emptySeverityCounts();
  const files = new Set<string>();
  for (const issue of issues) {
    bySeverity[issue.severity] += 1;
    files.add(issue.path);
  }
  return { total: issues.length, filesWithIssues: files.size, bySeverity };
}

const plural = (count: number, noun: string) => `${count} ${noun}${count === 1 ? "" : "s"}`;

/**
 * Checks every configured threshold and reports all violations in a fixed order.
 * Only reads its inputs; a report with no thresholds set always passes.
 *
 * @throws ConfigCoverageMissingError when `minCoverage` is set without coverage data.
 */
export function evaluateGate(report: Pick<ScanReport, "issues">, inputs: GateInputs): QualityGateResult {
  if (inputs.minCoverage !== null && !inputs.coverage) {
    throw new ConfigCoverageMissingError(null);
  }
  const gated = gatedIssues(report.issues, inputs);
  const counts = countIssues(gated);
  const violations: GateViolation[] = [];

  if (inputs.failOn) {
    const threshold = severityRank(inputs.failOn);
    const atOrAbove = gated.filter((issue) => severityRank(issue.severity) >= threshold).length;
    if (atOrAbove > 0) {
      violations.push({
        threshold: "fail_on",
        limit: inputs.failOn,
        observed: atOrAbove,
        message: `Detected ${plural(atOrAbove, "issue")} with severity >= ${inputs.failOn}`
      });
    }
  }

  if (inputs.maxIssues !== null && counts.total > inputs.maxIssues) {
    violations.push({
      threshold: "max_issues",
      limit: inputs.maxIssues,
      observed: counts.total,
      message: `Issue count ${counts.total} exceeds max_issues=${inputs.maxIssues}`
    });
  }

  if (inputs.maxFilesWithIssues !== null && counts.filesWithIssues > inputs.maxFilesWithIssues) {
    violations.push({
      threshold: "max_files_with_issues",
      limit: inputs.maxFilesWithIssues,
      observed: counts.filesWithIssues,
      message: `Files with issues ${counts.filesWithIssues} exceeds max_files_with_issues=${inputs.maxFilesWithIssues}`
    });
  }

  for (const severity of SEVERITIES) {
    const limit = inputs[SEVERITY_CAPS[severity]];
    const observed = counts.bySeverity[severity];
    if (limit === null || observed <= limit) continue;
    violations.push({
      threshold: `max_${severity}`,
      limit,
      observed,
      message: `${severity} issue count ${observed} exceeds max_${severity}=${limit}`
    });
  }

  const coveragePercent = inputs.coverage ? inputs.coverage.percent : null;
  if (inputs.minCoverage !== null && coveragePercent !== null && coveragePercent < inputs.minCoverage) {
    violations.push({
      threshold: "min_coverage",
      limit: inputs.minCoverage,
      observed: coveragePercent,
      message: `Coverage ${coveragePercent.toFixed(2)}% is below min_coverage=${inputs.minCoverage.toFixed(2)}%`
    });
  }

  const { baseline } = inputs;
  const baselineMatched = baseline
    ? report.issues.filter((issue) => baseline.has(issueFingerprint(issue))).length
    : 0;

  return {
    passed: violations.length === 0,
    violations,
    counts,
    baselineMatched,
    newIssues: baseline ? report.issues.length - baselineMatched : null,
    onlyNewIssues: inputs.onlyNewIssues,
    coveragePercent
  };
}
