import { LOWER_CAMEL_CASE, UPPER_CAMEL_CASE, countParameters, findBlockEnd, scanBraceNesting } from "./helpers.js";
import type { PatternContext, RuleDefinition, RuleMatch } from "./types.js";

const FUNCTION_PATTERN =
  /^\s*(?:(?:public|private|protected|internal|override|open|abstract|inline|suspend|operator|infix|tailrec|external)\s+)*fun\s+(?:<[^>]+>\s*)?(?:[\w.<>]+\.)?([A-Za-z_]\w*)\s*\(([^)]*)\)/;

function scanFunctionLength({ lines, thresholds }: PatternContext): RuleMatch[] {
  const matches: RuleMatch[] = [];
  let index = 0;
  while (index < lines.length) {
    const match = FUNCTION_PATTERN.exec(lines[index]);
    if (!match || !lines[index].includes("{")) {
      index += 1;
      continue;
    }
    const endIndex = findBlockEnd(lines, index);
    const length = endIndex - index + 1;
    if (length > thresholds.maxFunctionLines) {
      matches.push({
        line: index + 1,
        message: `Function '${match[1]}' spans ${length} lines; target at most ${thresholds.maxFunctionLines}.`
      });
    }
    index = endIndex + 1;
  }
  return matches;
}

export const KOTLIN_RULES: RuleDefinition[] = [
  {
    id: "PG501",
    title: "Package naming convention",
    category: "naming",
    description: "Kotlin packages should be lower-case and dot-separated.",
    severity: "low",
    languages: ["kotlin"],
    security: false,
    detector: {
      kind: "line",
      pattern: /^\s*package\s+([A-Za-z_][\w.]*)\s*$/,
      unless: (match) => /^[a-z][a-z0-9_]*(?:\.[a-z][a-z0-9_]*)*$/.test(match[1]),
      message: (match) => `Package '${match[1]}' should be lower-case and dot-separated.`
    }
  },
  {
    id: "PG502",
    title: "Type naming convention",
    category: "naming",
    description: "Classes, interfaces and objects should be UpperCamelCase.",
    severity: "medium",
    languages: ["kotlin"],
    security: false,
    detector: {
      kind: "line",
      pattern:
        /^\s*(?:(?:public|private|protected|internal|abstract|open|sealed|data|enum|annotation|inner|value)\s+)*(class|interface|object)\s+([A-Za-z_]\w*)/,
      skipComments: true,
      unless: (match) => UPPER_CAMEL_CASE.test(match[2]),
      message: (match) => `${match[1]} '${match[2]}' should be UpperCamelCase.`
    }
  },
  {
    id: "PG503",
    title: "Function naming convention",
    category: "naming",
    description: "Kotlin functions should be lowerCamelCase.",
    severity: "low",
    languages: ["kotlin"],
    security: false,
    detector: {
      kind: "line",
      pattern: FUNCTION_PATTERN,
      skipComments: true,
      // Composable functions are conventionally UpperCamelCase.
      unless: (match, _line, ctx) =>
        LOWER_CAMEL_CASE.test(match[1]) || ctx.unit.content.includes("@Composable"),
      message: (match) => `Function '${match[1]}' should be lowerCamelCase.`
    }
  },
  {
    id: "PG504",
    title: "Too many parameters",
    category: "complexity",
    description: "Functions with many parameters are hard to call correctly.",
    severity: "medium",
    languages: ["kotlin"],
    security: false,
    detector: {
      kind: "line",
      pattern: FUNCTION_PATTERN,
      skipComments: true,
      unless: (match, _line, ctx) => countParameters(match[2]) <= ctx.thresholds.maxParams,
      message: (match) => `Function '${match[1]}' has ${countParameters(match[2])} parameters.`
    }
  },
  {
    id: "PG505",
    title: "Function too long",
    category: "complexity",
    description: "Long functions are hard to read and test.",
    severity: "medium",
    languages: ["kotlin"],
    security: false,
    detector: { kind: "scan", scan: scanFunctionLength }
  },
  {
    id: "PG506",
    title: "Deep nesting",
    category: "complexity",
    description: "Deeply nested blocks.",
    severity: "medium",
    languages: ["kotlin"],
    security: false,
    detector: { kind: "scan", scan: scanBraceNesting }
  },
  {
    id: "PG507",
    title: "OS command execution",
    category: "security",
    description: "Runtime.exec and ProcessBuilder run operating system commands.",
    severity: "high",
    languages: ["kotlin"],
    security: true,
    detector: {
      kind: "line",
      pattern: /\bRuntime\s*\.\s*getRuntime\s*\(\s*\)\s*\.\s*exec\s*\(|\bProcessBuilder\s*\(/,
      skipComments: true,
      message: () => "Review OS command execution (Runtime.exec/ProcessBuilder) for injection risks."
    }
  }
];
