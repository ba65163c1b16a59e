import type { TSESTree } from "@typescript-eslint/typescript-estree";
import type { Language, Severity, SourceUnit } from "../../types.js";

export type RuleCategory =
  | "security"
  | "reliability"
  | "naming"
  | "complexity"
  | "coupling"
  | "style"
  | "duplication"
  | "infrastructure";

export type RuleThresholds = {
  maxLineLength: number;
  maxParams: number;
  maxFunctionLines: number;
  maxNesting: number;
  maxImports: number;
  maxMethods: number;
  minCohesion: number;
  maxTopLevelFunctions: number;
};

/** A rule hit before it becomes an Issue; severity and path are filled in centrally. */
export type RuleMatch = {
  line: number;
  column?: number;
  message?: string;
  snippet?: string;
};

export type PatternContext = {
  unit: SourceUnit;
  lines: string[];
  thresholds: RuleThresholds;
};

export type StructuralContext = PatternContext & {
  ast: TSESTree.Program;
  /** Every node of `ast` in traversal order, with parent pointers set. */
  nodes: readonly TSESTree.Node[];
};

export type LineDetector = {
  kind: "line";
  pattern: RegExp;
  skipComments?: boolean;
  unless?: (match: RegExpExecArray, line: string, ctx: PatternContext) => boolean;
  message?: (match: RegExpExecArray, line: string) => string;
};

export type ScanDetector = {
  kind: "scan";
  scan: (ctx: PatternContext) => RuleMatch[];
};

export type StructuralDetector = {
  kind: "structural";
  check: (ctx: StructuralContext) => RuleMatch[];
};

/** Evaluated once over every file by the duplicate detector, never per file. */
export type CrossFileDetector = {
  kind: "cross_file";
};

export type PatternDetector = LineDetector | ScanDetector;

export type RuleDetector = PatternDetector | StructuralDetector | CrossFileDetector;

export type RuleDefinition = {
  id: string;
  title: string;
  category: RuleCategory;
  description: string;
  severity: Severity;
  languages: readonly Language[] | "*";
  security: boolean;
  /** Also evaluated on a structurally analyzed file whose parse failed. */
  parseFallback?: boolean;
  detector: RuleDetector;
};

export function appliesTo(rule: RuleDefinition, language: Language): boolean {
  return rule.languages === "*" || rule.languages.includes(language);
}
