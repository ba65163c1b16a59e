import pc from "picocolors";
import { detectLanguage } from "../fs/language.js";
import { defaultRegistry, securityRuleIds, type RuleRegistry } from "../scan/catalog/registry.js";
import { emptySeverityCounts, SEVERITIES, severityRank, type Severity } from "../types/domain/severity.js";
import { TOOL_NAME, TOOL_VERSION } from "../version.js";
import type { OutputFormat } from "../config/loadConfig.js";
import type { QualityGateResult } from "../gate/qualityGate.js";
import type { Issue, ScanReport } from "../types.js";

export type FormatOptions = {
  gate?: QualityGateResult | null;
  registry?: RuleRegistry;
  /** Defaults to picocolors' own terminal detection. */
  color?: boolean;
};

type Colors = ReturnType<typeof pc.createColors>;

function severityLabel(colors: Colors, severity: Severity): string {
  switch (severity) {
    case "critical":
      return colors.bgRed(colors.white(" CRITICAL "));
    case "high":
      return colors.red("HIGH");
    case "medium":
      return colors.yellow("MEDIUM");
    case "low":
    default:
      return colors.green("LOW");
  }
}

type IssueLocation = { location: string; path: string; line: number };

type GroupedIssue = {
  key: string;
  representative: Issue;
  locations: IssueLocation[];
};

function toLocation(issue: Issue): IssueLocation {
  const suffix = issue.column ? `:${issue.column}` : "";
  return { path: issue.path, line: issue.line, location: `${issue.path}:${issue.line}${suffix}` };
}

function groupIssues(issues: readonly Issue[]): GroupedIssue[] {
  // Same rule and same message across several places prints once with every location.
  const groups = new Map<string, GroupedIssue>();
  for (const issue of issues) {
    const key = `${issue.ruleId}|${issue.message}`;
    const existing = groups.get(key);
    if (!existing) {
      groups.set(key, { key, representative: issue, locations: [toLocation(issue)] });
      continue;
    }
    existing.locations.push(toLocation(issue));
  }
  return [...groups.values()].sort(
    (a, b) =>
      severityRank(b.representative.severity) - severityRank(a.representative.severity) ||
      a.representative.ruleId.localeCompare(b.representative.ruleId) ||
      a.key.localeCompare(b.key)
  );
}

function formatGroup(colors: Colors, group: GroupedIssue, registry: RuleRegistry, index: number): string {
  const issue = group.representative;
  const title = registry.get(issue.ruleId)?.title ?? issue.ruleId;
  const lines = [`${severityLabel(colors, issue.severity)} #${index} ${colors.cyan(issue.ruleId)} ${title}`];
  if (group.locations.length === 1) {
    lines.push(`  location: ${group.locations[0].location}`);
  } else {
    lines.push(`  affected locations (${group.locations.length}):`);
    for (const loc of group.locations) {
      lines.push(`  - ${loc.location}`);
    }
  }
  lines.push(`  ${issue.message}`);
  if (issue.snippet && group.locations.length === 1) lines.push(`  evidence: ${issue.snippet}`);
  return lines.join("\n");
}

function formatGateText(colors: Colors, gate: QualityGateResult): string {
  const lines = [
    gate.passed ? colors.green("QUALITY GATE: PASSED") : colors.red("QUALITY GATE: FAILED")
  ];
  for (const violation of gate.violations) {
    lines.push(`- ${violation.message}`);
  }
  if (gate.newIssues !== null) {
    const scope = gate.onlyNewIssues ? "only new issues gated" : "all issues gated";
    lines.push(`- baseline: ${gate.baselineMatched} matched, ${gate.newIssues} new (${scope})`);
  }
  if (gate.coveragePercent !== null) {
    lines.push(`- coverage: ${gate.coveragePercent.toFixed(2)}%`);
  }
  return lines.join("\n");
}

export function formatReportText(report: ScanReport, options: FormatOptions = {}): string {
  const colors = options.color === undefined ? pc : pc.createColors(options.color);
  const registry = options.registry ?? defaultRegistry();
  const { summary } = report;
  const counts = SEVERITIES.slice()
    .reverse()
    .map((severity) => `${severity.toUpperCase()} ${summary.bySeverity[severity]}`)
    .join(", ");

  const sections = [
    [
      "POLYGATE SUMMARY",
      "----------------",
      `- Issues: ${summary.total} total (${counts}) in ${summary.filesWithIssues} file(s)`,
      `- Files scanned: ${report.metadata.filesScanned}`
    ].join("\n")
  ];

  if (report.issues.length) {
    const body = groupIssues(report.issues)
      .map((group, index) => formatGroup(colors, group, registry, index + 1))
      .join("\n\n");
    sections.push(`ALL ISSUES\n${body}`);
  } else {
    sections.push("No issues.");
  }

  if (report.notes.length) {
    const notes = report.notes.map((note) =>
      `- ${colors.dim(`[${note.kind}]`)} ${note.path ? `${note.path}: ` : ""}${note.message}`
    );
    sections.push(`NOTES\n${notes.join("\n")}`);
  }

  if (options.gate) {
    sections.push(formatGateText(colors, options.gate));
  }

  return sections.join("\n\n");
}

export type SecuritySummary = {
  issuesTotal: number;
  filesWithIssues: number;
  bySeverity: Record<Severity, number>;
  byRule: Record<string, number>;
  byLanguage: Record<string, number>;
  topFiles: Array<{ path: string; issues: number }>;
};

function sortedCounts(counts: Map<string, number>): Record<string, number> {
  const result: Record<string, number> = {};
  for (const key of [...counts.keys()].sort()) {
    result[key] = counts.get(key) ?? 0;
  }
  return result;
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

export function buildSecuritySummary(issues: readonly Issue[], registry: RuleRegistry = defaultRegistry()): SecuritySummary {
  const securityIds = new Set(securityRuleIds(registry));
  const bySeverity = emptySeverityCounts();
  const byRule = new Map<string, number>();
  const byLanguage = new Map<string, number>();
  const byFile = new Map<string, number>();
  let total = 0;
  for (const issue of issues) {
    if (!securityIds.has(issue.ruleId)) continue;
    total += 1;
    bySeverity[issue.severity] += 1;
    increment(byRule, issue.ruleId);
    increment(byLanguage, detectLanguage(issue.path));
    increment(byFile, issue.path);
  }
  const topFiles = [...byFile.entries()]
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .slice(0, 10)
    .map(([path, count]) => ({ path, issues: count }));
  return {
    issuesTotal: total,
    filesWithIssues: byFile.size,
    bySeverity,
    byRule: sortedCounts(byRule),
    byLanguage: sortedCounts(byLanguage),
    topFiles
  };
}

export function buildJsonReport(report: ScanReport, options: FormatOptions = {}) {
  return {
    tool: { name: TOOL_NAME, version: TOOL_VERSION },
    issues: report.issues,
    summary: report.summary,
    security: buildSecuritySummary(report.issues, options.registry),
    notes: report.notes,
    metadata: report.metadata,
    gate: options.gate ?? null
  };
}

export function formatReportJson(report: ScanReport, options: FormatOptions = {}): string {
  return JSON.stringify(buildJsonReport(report, options), null, 2);
}

export type SarifLevel = "error" | "warning" | "note";

export function sarifLevel(severity: Severity): SarifLevel {
  switch (severity) {
    case "critical":
    case "high":
      return "error";
    case "medium":
      return "warning";
    case "low":
    default:
      return "note";
  }
}

type SarifRule = {
  id: string;
  name: string;
  shortDescription: { text: string };
  fullDescription: { text: string };
  defaultConfiguration: { level: SarifLevel };
  properties: { tags: string[] };
};

type SarifResult = {
  ruleId: string;
  ruleIndex?: number;
  level: SarifLevel;
  message: { text: string };
  locations: Array<{
    physicalLocation: {
      artifactLocation: { uri: string };
      region: { startLine: number; startColumn?: number };
    };
  }>;
};

export type SarifLog = {
  $schema: string;
  version: "2.1.0";
  runs: Array<{
    tool: { driver: { name: string; version: string; rules: SarifRule[] } };
    results: SarifResult[];
    properties?: Record<string, unknown>;
  }>;
};

export function buildSarifReport(report: ScanReport, options: FormatOptions = {}): SarifLog {
  const registry = options.registry ?? defaultRegistry();
  const ruleIds = [...new Set(report.issues.map((issue) => issue.ruleId))].sort();
  const rules: SarifRule[] = [];
  const ruleIndex = new Map<string, number>();
  for (const id of ruleIds) {
    const rule = registry.get(id);
    if (!rule) continue;
    ruleIndex.set(id, rules.length);
    rules.push({
      id: rule.id,
      name: rule.title,
      shortDescription: { text: rule.title },
      fullDescription: { text: rule.description },
      defaultConfiguration: { level: sarifLevel(rule.severity) },
      properties: { tags: rule.security && rule.category !== "security" ? [rule.category, "security"] : [rule.category] }
    });
  }

  const results = report.issues.map((issue): SarifResult => {
    const region: { startLine: number; startColumn?: number } = { startLine: issue.line };
    if (issue.column) region.startColumn = issue.column;
    const result: SarifResult = {
      ruleId: issue.ruleId,
      level: sarifLevel(issue.severity),
      message: { text: issue.message },
      locations: [{ physicalLocation: { artifactLocation: { uri: issue.path }, region } }]
    };
    const index = ruleIndex.get(issue.ruleId);
    if (index !== undefined) result.ruleIndex = index;
    return result;
  });

  const properties: Record<string, unknown> = {
    ruleSetFingerprint: report.metadata.ruleSetFingerprint,
    filesScanned: report.metadata.filesScanned
  };
  if (options.gate) {
    properties.qualityGatePassed = options.gate.passed;
    if (options.gate.coveragePercent !== null) {
      properties.coverageLinePercent = Math.round(options.gate.coveragePercent * 100) / 100;
    }
  }

  return {
    $schema: "https://json.schemastore.org/sarif-2.1.0.json",
    version: "2.1.0",
    runs: [
      {
        tool: { driver: { name: TOOL_NAME, version: TOOL_VERSION, rules } },
        results,
        properties
      }
    ]
  };
}

export function formatReport(format: OutputFormat, report: ScanReport, options: FormatOptions = {}): string {
  switch (format) {
    case "json":
      return formatReportJson(report, options);
    case "sarif":
      return JSON.stringify(buildSarifReport(report, options), null, 2);
    case "text":
    default:
      return formatReportText(report, options);
  }
}
