import path from "node:path";
import { parse, simpleTraverse, type TSESTree } from "@typescript-eslint/typescript-estree";
import {
  analyzerErrorNote,
  buildIssues,
  splitLines,
  type AnalyzeOptions,
  type Analyzer,
  type AnalyzerResult,
  type RuleHit
} from "./analyzer.js";
import { evaluatePatternRules } from "./patternAnalyzer.js";
import type { RuleSet } from "./catalog/registry.js";
import type { PatternContext, RuleDefinition, StructuralContext } from "./catalog/types.js";
import type { ScanNote, SourceUnit } from "../types.js";

// Angle-bracket type assertions in .ts/.mts/.cts conflict with JSX parsing.
const NON_JSX_EXTENSIONS = new Set([".ts", ".mts", ".cts"]);

export type ParsedProgram = {
  ast: TSESTree.Program;
  nodes: TSESTree.Node[];
};

export function parseProgram(unit: Pick<SourceUnit, "path" | "content">): ParsedProgram {
  const ast = parse(unit.content, {
    loc: true,
    range: true,
    comment: true,
    jsx: !NON_JSX_EXTENSIONS.has(path.extname(unit.path).toLowerCase())
  });
  const nodes: TSESTree.Node[] = [];
  simpleTraverse(ast, { enter: (node) => nodes.push(node) }, true);
  return { ast, nodes };
}

function describeParseError(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err);
  return message.split("\n")[0];
}

/** Non-structural rules for the file's language plus the generic rules kept for unparsable files. */
function fallbackRules(rules: RuleSet, unit: SourceUnit): RuleDefinition[] {
  const scoped = rules.forLanguage(unit.language);
  return rules.rules.filter(
    (rule) => rule.detector.kind !== "structural" && (rule.parseFallback === true || scoped.includes(rule))
  );
}

export const structuralAnalyzer: Analyzer = {
  kind: "structural",
  analyze(unit: SourceUnit, rules: RuleSet, options: AnalyzeOptions): AnalyzerResult {
    const lines = splitLines(unit.content);
    const patternCtx: PatternContext = { unit, lines, thresholds: options.thresholds };

    let program: ParsedProgram;
    try {
      program = parseProgram(unit);
    } catch (err) {
      const fallback = evaluatePatternRules(patternCtx, fallbackRules(rules, unit));
      const note: ScanNote = {
        kind: "parse_fallback",
        path: unit.path,
        message: `Could not parse (${describeParseError(err)}); analyzed with pattern rules only.`
      };
      return {
        issues: buildIssues(unit, lines, fallback.hits, options),
        notes: [note, ...fallback.notes]
      };
    }

    const ctx: StructuralContext = { ...patternCtx, ast: program.ast, nodes: program.nodes };
    const scoped = rules.forLanguage(unit.language);
    const hits: RuleHit[] = [];
    const notes: ScanNote[] = [];
    for (const rule of scoped) {
      if (rule.detector.kind !== "structural") continue;
      try {
        for (const match of rule.detector.check(ctx)) hits.push({ rule, match });
      } catch (err) {
        notes.push(analyzerErrorNote(unit, rule, err));
      }
    }
    const textual = evaluatePatternRules(patternCtx, scoped);
    hits.push(...textual.hits);
    notes.push(...textual.notes);
    return { issues: buildIssues(unit, lines, hits, options), notes };
  }
};
