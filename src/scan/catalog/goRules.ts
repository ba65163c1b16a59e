import { countParameters, findBlockEnd, scanBraceNesting } from "./helpers.js";
import type { PatternContext, RuleDefinition, RuleMatch } from "./types.js";

const FUNC_PATTERN = /^\s*func\s+(?:\([^)]*\)\s*)?([A-Za-z_]\w*)\s*(?:\[[^\]]*\])?\s*\(([^)]*)\)/;
const IMPORT_SINGLE_PATTERN = /^\s*import\s+(?:[\w.]+\s+)?"([^"]+)"/;
const IMPORT_BLOCK_START = /^\s*import\s*\(\s*$/;
const IMPORT_BLOCK_ITEM = /^\s*(?:[\w.]+\s+)?"([^"]+)"/;

function scanFunctions({ lines, thresholds }: PatternContext, measure: "params" | "length"): RuleMatch[] {
  const matches: RuleMatch[] = [];
  let index = 0;
  while (index < lines.length) {
    const match = FUNC_PATTERN.exec(lines[index]);
    if (!match) {
      index += 1;
      continue;
    }
    const name = match[1];
    const endIndex = lines[index].includes("{") ? findBlockEnd(lines, index) : index;
    if (measure === "params") {
      // "a, b int" counts as two parameters.
      const count = countParameters(match[2]);
      if (count > thresholds.maxParams) {
        matches.push({
          line: index + 1,
          message: `Function '${name}' has ${count} parameters; target at most ${thresholds.maxParams}.`
        });
      }
    } else {
      const length = endIndex - index + 1;
      if (length > thresholds.maxFunctionLines) {
        matches.push({
          line: index + 1,
          message: `Function '${name}' spans ${length} lines; target at most ${thresholds.maxFunctionLines}.`
        });
      }
    }
    index = endIndex + 1;
  }
  return matches;
}

function scanImports({ lines, thresholds }: PatternContext): RuleMatch[] {
  const imports = new Set<string>();
  let inBlock = false;
  for (const line of lines) {
    if (inBlock) {
      if (/^\s*\)/.test(line)) {
        inBlock = false;
        continue;
      }
      const item = IMPORT_BLOCK_ITEM.exec(line);
      if (item) imports.add(item[1]);
      continue;
    }
    if (IMPORT_BLOCK_START.test(line)) {
      inBlock = true;
      continue;
    }
    const single = IMPORT_SINGLE_PATTERN.exec(line);
    if (single) imports.add(single[1]);
  }
  if (imports.size <= thresholds.maxImports) return [];
  return [
    {
      line: 1,
      message: `File imports ${imports.size} packages; target at most ${thresholds.maxImports}.`
    }
  ];
}

export const GO_RULES: RuleDefinition[] = [
  {
    id: "PG401",
    title: "Package naming convention",
    category: "naming",
    description: "Go package names should be short, lower-case, without underscores.",
    severity: "low",
    languages: ["go"],
    security: false,
    detector: {
      kind: "line",
      pattern: /^\s*package\s+([A-Za-z_]\w*)\s*$/,
      unless: (match) => /^[a-z][a-z0-9]*$/.test(match[1]) || match[1].endsWith("_test"),
      message: (match) => `Package '${match[1]}' should be lower-case without underscores.`
    }
  },
  {
    id: "PG402",
    title: "Function naming convention",
    category: "naming",
    description: "Go functions use MixedCaps, not underscores.",
    severity: "low",
    languages: ["go"],
    security: false,
    detector: {
      kind: "line",
      pattern: FUNC_PATTERN,
      unless: (match) => !match[1].includes("_") || /^(?:Test|Benchmark|Example|Fuzz)/.test(match[1]),
      message: (match) => `Function '${match[1]}' should use MixedCaps without underscores.`
    }
  },
  {
    id: "PG403",
    title: "Too many parameters",
    category: "complexity",
    description: "Functions with many parameters are hard to call correctly.",
    severity: "medium",
    languages: ["go"],
    security: false,
    detector: { kind: "scan", scan: (ctx) => scanFunctions(ctx, "params") }
  },
  {
    id: "PG404",
    title: "Function too long",
    category: "complexity",
    description: "Long functions are hard to read and test.",
    severity: "medium",
    languages: ["go"],
    security: false,
    detector: { kind: "scan", scan: (ctx) => scanFunctions(ctx, "length") }
  },
  {
    id: "PG405",
    title: "Deep nesting",
    category: "complexity",
    description: "Deeply nested blocks.",
    severity: "medium",
    languages: ["go"],
    security: false,
    detector: { kind: "scan", scan: scanBraceNesting }
  },
  {
    id: "PG406",
    title: "High import fan-out",
    category: "coupling",
    description: "The file depends on many packages.",
    severity: "medium",
    languages: ["go"],
    security: false,
    detector: { kind: "scan", scan: scanImports }
  },
  {
    id: "PG407",
    title: "TLS verification disabled",
    category: "security",
    description: "InsecureSkipVerify turns off certificate checks.",
    severity: "high",
    languages: ["go"],
    security: true,
    detector: {
      kind: "line",
      pattern: /\bInsecureSkipVerify\s*:\s*true\b/,
      skipComments: true,
      message: () => "tls.Config sets InsecureSkipVerify: true."
    }
  },
  {
    id: "PG408",
    title: "Shell command execution",
    category: "security",
    description: "exec.Command runs a shell with a command string.",
    severity: "high",
    languages: ["go"],
    security: true,
    detector: {
      kind: "line",
      pattern: /\bexec\.Command(?:Context)?\s*\((?:\s*ctx\s*,)?\s*"(?:sh|bash|\/bin\/sh|\/bin\/bash)"\s*,\s*"-c"/,
      skipComments: true,
      message: () => "Command runs through a shell; pass arguments directly to exec.Command."
    }
  }
];
