import type { Language, SuppressionDirective, SuppressionScope } from "../types.js";

export const SUPPRESSION_MARKER = "polygate:ignore";

const HASH = ["#"];
const SLASH = ["//", "/*"];

const COMMENT_MARKERS: Record<Language, readonly string[]> = {
  javascript: SLASH,
  java: SLASH,
  go: SLASH,
  kotlin: SLASH,
  csharp: SLASH,
  rust: SLASH,
  swift: SLASH,
  c: SLASH,
  cpp: SLASH,
  php: [...SLASH, "#"],
  python: HASH,
  yaml: HASH,
  dockerfile: HASH,
  shell: HASH,
  toml: HASH,
  ini: [...HASH, ";"],
  ruby: HASH,
  sql: ["--", "/*"],
  markdown: ["<!--"],
  html: ["<!--"],
  xml: ["<!--"],
  json: [],
  text: HASH
};

const RULE_ID = "[A-Za-z][A-Za-z0-9_-]*";
const DIRECTIVE_PATTERN = new RegExp(
  `^\\s*${SUPPRESSION_MARKER}(?:\\s+(${RULE_ID}(?:\\s*,\\s*${RULE_ID})*))?\\s*(?:\\*/|-->)?\\s*$`
);

/**
 * Reads a `polygate:ignore` directive from a whole-line or trailing comment.
 * Anything after the marker other than a rule id list makes the directive void.
 */
export function parseSuppression(lineText: string, language: Language): SuppressionScope | null {
  if (!lineText.includes(SUPPRESSION_MARKER)) return null;
  for (const marker of COMMENT_MARKERS[language]) {
    let from = lineText.indexOf(marker);
    while (from >= 0) {
      const match = DIRECTIVE_PATTERN.exec(lineText.slice(from + marker.length));
      if (match) {
        if (!match[1]) return "all";
        return new Set(match[1].split(",").map((id) => id.trim().toUpperCase()));
      }
      from = lineText.indexOf(marker, from + marker.length);
    }
  }
  return null;
}

export function collectSuppressions(lines: readonly string[], language: Language): Map<number, SuppressionDirective> {
  const directives = new Map<number, SuppressionDirective>();
  lines.forEach((text, index) => {
    const scope = parseSuppression(text, language);
    if (scope) directives.set(index + 1, { line: index + 1, scope });
  });
  return directives;
}

export function isSuppressed(scope: SuppressionScope | null, ruleId: string): boolean {
  if (!scope) return false;
  if (scope === "all") return true;
  return scope.has(ruleId.toUpperCase());
}

/** Returns the rule ids matched on `lineText` that its directive does not suppress. */
export function filterSuppressed(lineText: string, language: Language, ruleIds: readonly string[]): string[] {
  const scope = parseSuppression(lineText, language);
  return ruleIds.filter((id) => !isSuppressed(scope, id));
}
