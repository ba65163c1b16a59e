import type { Language } from "../../types.js";
import type { PatternContext, RuleMatch } from "./types.js";

export const LOWER_CAMEL_CASE = /^[a-z][A-Za-z0-9]*$/;
export const UPPER_CAMEL_CASE = /^[A-Z][A-Za-z0-9]*$/;
export const UPPER_SNAKE_CASE = /^[A-Z][A-Z0-9_]*$/;
export const SNAKE_CASE = /^_{0,2}[a-z][a-z0-9_]*$/;

const MAX_SNIPPET_LENGTH = 140;

const HASH_COMMENT_LANGUAGES: ReadonlySet<Language> = new Set([
  "python",
  "yaml",
  "dockerfile",
  "shell",
  "toml",
  "ini",
  "ruby"
]);

const SLASH_COMMENT_LANGUAGES: ReadonlySet<Language> = new Set([
  "javascript",
  "java",
  "go",
  "kotlin",
  "csharp",
  "rust",
  "swift",
  "c",
  "cpp",
  "php"
]);

export function isCommentLine(line: string, language: Language): boolean {
  const trimmed = line.trim();
  if (!trimmed) return false;
  if (HASH_COMMENT_LANGUAGES.has(language)) return trimmed.startsWith("#");
  if (SLASH_COMMENT_LANGUAGES.has(language)) {
    return (
      trimmed.startsWith("//") ||
      trimmed.startsWith("/*") ||
      trimmed.startsWith("*") ||
      (language === "php" && trimmed.startsWith("#"))
    );
  }
  if (language === "sql") return trimmed.startsWith("--");
  if (language === "markdown" || language === "html" || language === "xml") {
    return trimmed.startsWith("<!--");
  }
  return false;
}

export function buildSnippet(line: string): string {
  const trimmed = line.trim();
  if (trimmed.length <= MAX_SNIPPET_LENGTH) return trimmed;
  return `${trimmed.slice(0, MAX_SNIPPET_LENGTH - 3)}...`;
}

/** Drops string/char literals and a trailing line comment so braces inside them are not counted. */
export function stripCodeNoise(line: string): string {
  return line
    .replace(/"(?:[^"\\]|\\.)*"/g, '""')
    .replace(/'(?:[^'\\]|\\.)*'/g, "''")
    .replace(/`[^`]*`/g, "``")
    .replace(/\/\/.*$/, "");
}

function countChar(text: string, char: string): number {
  let count = 0;
  for (const ch of text) {
    if (ch === char) count += 1;
  }
  return count;
}

/**
 * Returns the index of the line closing the block opened on `startIndex`,
 * or `startIndex` when that line does not open a block.
 */
export function findBlockEnd(lines: string[], startIndex: number): number {
  const first = stripCodeNoise(lines[startIndex] ?? "");
  let depth = countChar(first, "{") - countChar(first, "}");
  let end = startIndex;
  while (depth > 0 && end + 1 < lines.length) {
    end += 1;
    const current = stripCodeNoise(lines[end]);
    depth += countChar(current, "{");
    depth -= countChar(current, "}");
  }
  return end;
}

export type NestingPeak = {
  depth: number;
  lineIndex: number;
};

/** Brace nesting below the outermost block (a method body inside a class counts as depth 1). */
export function maxBraceNesting(lines: string[]): NestingPeak {
  let depth = 0;
  let peak: NestingPeak = { depth: 0, lineIndex: 0 };
  lines.forEach((raw, index) => {
    const line = stripCodeNoise(raw);
    depth += countChar(line, "{");
    const nested = Math.max(0, depth - 1);
    if (nested > peak.depth) {
      peak = { depth: nested, lineIndex: index };
    }
    depth -= countChar(line, "}");
  });
  return peak;
}

/** Splits on commas that are not nested inside brackets, generics or parentheses. */
export function splitTopLevel(text: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = "";
  for (const ch of text) {
    if (ch === "<" || ch === "(" || ch === "[" || ch === "{") depth += 1;
    if (ch === ">" || ch === ")" || ch === "]" || ch === "}") depth = Math.max(0, depth - 1);
    if (ch === "," && depth === 0) {
      parts.push(current);
      current = "";
      continue;
    }
    current += ch;
  }
  parts.push(current);
  return parts.map((part) => part.trim()).filter(Boolean);
}

export function scanBraceNesting({ lines, thresholds }: PatternContext): RuleMatch[] {
  const peak = maxBraceNesting(lines);
  if (peak.depth <= thresholds.maxNesting) return [];
  return [
    {
      line: peak.lineIndex + 1,
      message: `Maximum block nesting depth is ${peak.depth}; keep it at or below ${thresholds.maxNesting}.`
    }
  ];
}

export function countParameters(paramText: string): number {
  return splitTopLevel(paramText).length;
}

/** Average pairwise Jaccard similarity; null when fewer than three sets take part. */
export function averageJaccard(sets: ReadonlyArray<ReadonlySet<string>>): number | null {
  const populated = sets.filter((set) => set.size > 0);
  if (populated.length < 3) return null;
  let total = 0;
  let pairs = 0;
  for (let i = 0; i < populated.length; i += 1) {
    for (let j = i + 1; j < populated.length; j += 1) {
      const left = populated[i];
      const right = populated[j];
      let shared = 0;
      for (const item of left) {
        if (right.has(item)) shared += 1;
      }
      const union = left.size + right.size - shared;
      if (union === 0) continue;
      total += shared / union;
      pairs += 1;
    }
  }
  if (pairs === 0) return null;
  return total / pairs;
}

export function indentationOf(line: string): number {
  const match = /^[ \t]*/.exec(line);
  if (!match) return 0;
  let width = 0;
  for (const ch of match[0]) {
    width += ch === "\t" ? 4 : 1;
  }
  return width;
}

export const CODE_LANGUAGES: readonly Language[] = [
  "javascript",
  "python",
  "java",
  "go",
  "kotlin",
  "shell",
  "sql",
  "ruby",
  "php",
  "csharp",
  "rust",
  "swift",
  "c",
  "cpp"
];
