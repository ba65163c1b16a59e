import { buildSnippet } from "./catalog/helpers.js";
import { collectSuppressions, isSuppressed } from "./suppression.js";
import type { RuleDefinition, RuleMatch, RuleThresholds } from "./catalog/types.js";
import type { RuleSet } from "./catalog/registry.js";
import type { Issue, ScanNote, SourceUnit } from "../types.js";

export type AnalyzeOptions = {
  thresholds: RuleThresholds;
  inlineIgnore: boolean;
};

export type AnalyzerResult = {
  issues: Issue[];
  notes: ScanNote[];
};

/** One detection strategy; every variant reports through the same Issue model. */
export interface Analyzer {
  readonly kind: "structural" | "pattern";
  analyze(unit: SourceUnit, rules: RuleSet, options: AnalyzeOptions): AnalyzerResult;
}

export type RuleHit = {
  rule: RuleDefinition;
  match: RuleMatch;
};

export function splitLines(content: string): string[] {
  return content.split(/\r?\n/);
}

export function analyzerErrorNote(unit: SourceUnit, rule: RuleDefinition, err: unknown): ScanNote {
  const message = err instanceof Error ? err.message : String(err);
  return {
    kind: "analyzer_error",
    path: unit.path,
    message: `Rule ${rule.id} failed on this file and was skipped: ${message}`
  };
}

/**
 * Turns rule hits into Issues: severity comes from the rule, snippets from the source line,
 * and hits on a line carrying a matching ignore directive are dropped.
 */
export function buildIssues(
  unit: SourceUnit,
  lines: readonly string[],
  hits: readonly RuleHit[],
  options: Pick<AnalyzeOptions, "inlineIgnore">
): Issue[] {
  const directives = options.inlineIgnore ? collectSuppressions(lines, unit.language) : null;
  const issues: Issue[] = [];
  for (const { rule, match } of hits) {
    const line = Math.min(Math.max(1, Math.trunc(match.line)), Math.max(1, lines.length));
    if (isSuppressed(directives?.get(line)?.scope ?? null, rule.id)) continue;
    const text = lines[line - 1] ?? "";
    const issue: Issue = {
      ruleId: rule.id,
      path: unit.path,
      line,
      severity: rule.severity,
      message: match.message ?? rule.description
    };
    if (match.column !== undefined) issue.column = match.column;
    const snippet = match.snippet ?? buildSnippet(text);
    if (snippet) issue.snippet = snippet;
    issues.push(issue);
  }
  return issues;
}
