import { isCommentLine } from "./catalog/helpers.js";
import {
  analyzerErrorNote,
  buildIssues,
  splitLines,
  type AnalyzeOptions,
  type Analyzer,
  type AnalyzerResult,
  type RuleHit
} from "./analyzer.js";
import type { RuleSet } from "./catalog/registry.js";
import type { LineDetector, PatternContext, RuleDefinition, RuleMatch } from "./catalog/types.js";
import type { ScanNote, SourceUnit } from "../types.js";

function matchLines(detector: LineDetector, ctx: PatternContext): RuleMatch[] {
  const matches: RuleMatch[] = [];
  ctx.lines.forEach((line, index) => {
    if (detector.skipComments && isCommentLine(line, ctx.unit.language)) return;
    const match = detector.pattern.exec(line);
    if (!match) return;
    if (detector.unless?.(match, line, ctx)) return;
    matches.push({
      line: index + 1,
      column: match.index + 1,
      message: detector.message?.(match, line)
    });
  });
  return matches;
}

/**
 * Evaluates the line and scan detectors among `rules`; structural and cross-file
 * rules are left to their own passes.
 */
export function evaluatePatternRules(
  ctx: PatternContext,
  rules: readonly RuleDefinition[]
): { hits: RuleHit[]; notes: ScanNote[] } {
  const hits: RuleHit[] = [];
  const notes: ScanNote[] = [];
  for (const rule of rules) {
    const detector = rule.detector;
    if (detector.kind !== "line" && detector.kind !== "scan") continue;
    try {
      const matches = detector.kind === "line" ? matchLines(detector, ctx) : detector.scan(ctx);
      for (const match of matches) hits.push({ rule, match });
    } catch (err) {
      notes.push(analyzerErrorNote(ctx.unit, rule, err));
    }
  }
  return { hits, notes };
}

export const patternAnalyzer: Analyzer = {
  kind: "pattern",
  analyze(unit: SourceUnit, rules: RuleSet, options: AnalyzeOptions): AnalyzerResult {
    const lines = splitLines(unit.content);
    const ctx: PatternContext = { unit, lines, thresholds: options.thresholds };
    const { hits, notes } = evaluatePatternRules(ctx, rules.forLanguage(unit.language));
    return { issues: buildIssues(unit, lines, hits, options), notes };
  }
};
