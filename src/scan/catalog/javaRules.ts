import path from "node:path";
import {
  LOWER_CAMEL_CASE,
  UPPER_CAMEL_CASE,
  UPPER_SNAKE_CASE,
  averageJaccard,
  countParameters,
  findBlockEnd,
  scanBraceNesting
} from "./helpers.js";
import type { PatternContext, RuleDefinition, RuleMatch } from "./types.js";

const PACKAGE_PATTERN = /^\s*package\s+([A-Za-z_][\w.]*)\s*;/;
const TYPE_PATTERN =
  /^\s*(?:(?:public|protected|private|abstract|final|sealed|non-sealed|static)\s+)*(class|interface|enum|record)\s+([A-Za-z_]\w*)\b/;
const METHOD_PATTERN =
  /^\s*(?:(?:public|protected|private|static|final|abstract|synchronized|native|strictfp|default)\s+)+(?:<[^>]+>\s+)?[\w<>[\], ?.]+?\s+([A-Za-z_]\w*)\s*\(([^;]*)\)\s*(?:\{|throws\b)/;
const CONSTANT_PATTERN = /\bstatic\s+final\s+[\w<>[\], ?.]+\s+([A-Za-z_]\w*)\s*[=;]/;
const IMPORT_PATTERN = /^\s*import\s+(?:static\s+)?([A-Za-z0-9_.*]+)\s*;/;
const KEYWORDS = new Set(["if", "for", "while", "switch", "catch", "return", "new", "synchronized"]);

type MethodRange = {
  name: string;
  params: string;
  startIndex: number;
  endIndex: number;
};

function fileStem(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

function collectMethods(lines: string[], from = 0, to = lines.length - 1): MethodRange[] {
  const methods: MethodRange[] = [];
  let index = from;
  while (index <= to) {
    const match = METHOD_PATTERN.exec(lines[index]);
    if (!match || KEYWORDS.has(match[1])) {
      index += 1;
      continue;
    }
    const endIndex = lines[index].includes("{") ? findBlockEnd(lines, index) : index;
    methods.push({ name: match[1], params: match[2], startIndex: index, endIndex });
    index = endIndex + 1;
  }
  return methods;
}

function scanPackageNaming({ lines }: PatternContext): RuleMatch[] {
  const matches: RuleMatch[] = [];
  lines.forEach((line, index) => {
    const match = PACKAGE_PATTERN.exec(line);
    if (!match) return;
    if (/^[a-z][a-z0-9_]*(?:\.[a-z][a-z0-9_]*)*$/.test(match[1])) return;
    matches.push({
      line: index + 1,
      column: line.indexOf(match[1]) + 1,
      message: `Package '${match[1]}' should be lower-case and dot-separated.`
    });
  });
  return matches;
}

function scanClassFileMismatch({ unit, lines }: PatternContext): RuleMatch[] {
  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index];
    const match = TYPE_PATTERN.exec(line);
    if (!match || match[1] !== "class") continue;
    if (!/^\s*public\s/.test(line)) continue;
    const stem = fileStem(unit.path);
    if (match[2] === stem) return [];
    return [
      {
        line: index + 1,
        column: line.indexOf(match[2]) + 1,
        message: `Public class '${match[2]}' should be declared in '${match[2]}.java'.`
      }
    ];
  }
  return [];
}

function scanMethodNaming({ unit, lines }: PatternContext): RuleMatch[] {
  const stem = fileStem(unit.path);
  return collectMethods(lines)
    .filter((method) => method.name !== stem && !LOWER_CAMEL_CASE.test(method.name))
    .map((method) => ({
      line: method.startIndex + 1,
      message: `Method '${method.name}' should be lowerCamelCase.`
    }));
}

function scanParameterCount({ lines, thresholds }: PatternContext): RuleMatch[] {
  const matches: RuleMatch[] = [];
  for (const method of collectMethods(lines)) {
    const count = countParameters(method.params);
    if (count <= thresholds.maxParams) continue;
    matches.push({
      line: method.startIndex + 1,
      message: `Method '${method.name}' has ${count} parameters; target at most ${thresholds.maxParams}.`
    });
  }
  return matches;
}

function scanMethodLength({ lines, thresholds }: PatternContext): RuleMatch[] {
  const matches: RuleMatch[] = [];
  for (const method of collectMethods(lines)) {
    const length = method.endIndex - method.startIndex + 1;
    if (length <= thresholds.maxFunctionLines) continue;
    matches.push({
      line: method.startIndex + 1,
      message: `Method '${method.name}' spans ${length} lines; target at most ${thresholds.maxFunctionLines}.`
    });
  }
  return matches;
}

function scanImportFanOut({ lines, thresholds }: PatternContext): RuleMatch[] {
  const imports = new Set<string>();
  for (const line of lines) {
    const match = IMPORT_PATTERN.exec(line);
    if (match) imports.add(match[1]);
  }
  if (imports.size <= thresholds.maxImports) return [];
  return [
    {
      line: 1,
      message: `File imports ${imports.size} dependencies; target at most ${thresholds.maxImports}.`
    }
  ];
}

type ClassRange = {
  name: string;
  startIndex: number;
  endIndex: number;
};

function collectClasses(lines: string[]): ClassRange[] {
  const classes: ClassRange[] = [];
  let index = 0;
  while (index < lines.length) {
    const match = TYPE_PATTERN.exec(lines[index]);
    if (!match || match[1] !== "class") {
      index += 1;
      continue;
    }
    let openIndex = index;
    while (openIndex < lines.length && !lines[openIndex].includes("{")) openIndex += 1;
    if (openIndex >= lines.length) break;
    const endIndex = findBlockEnd(lines, openIndex);
    classes.push({ name: match[2], startIndex: index, endIndex });
    index = openIndex + 1;
  }
  return classes;
}

function scanClassStructure(
  { lines, thresholds }: PatternContext,
  measure: "methods" | "cohesion"
): RuleMatch[] {
  const matches: RuleMatch[] = [];
  for (const range of collectClasses(lines)) {
    const methods = collectMethods(lines, range.startIndex + 1, range.endIndex).filter(
      (method) => method.name !== range.name
    );
    if (measure === "methods") {
      if (methods.length <= thresholds.maxMethods) continue;
      matches.push({
        line: range.startIndex + 1,
        message: `Class '${range.name}' declares ${methods.length} methods; target at most ${thresholds.maxMethods}.`
      });
      continue;
    }
    const fieldSets = methods.map((method) => {
      const body = lines.slice(method.startIndex, method.endIndex + 1).join("\n");
      return new Set(Array.from(body.matchAll(/\bthis\.([A-Za-z_]\w*)\b/g), (hit) => hit[1]));
    });
    const cohesion = averageJaccard(fieldSets);
    if (cohesion === null || cohesion >= thresholds.minCohesion) continue;
    matches.push({
      line: range.startIndex + 1,
      message: `Class '${range.name}' methods share little common state (cohesion ${cohesion.toFixed(2)}).`
    });
  }
  return matches;
}

export const JAVA_RULES: RuleDefinition[] = [
  {
    id: "PG301",
    title: "Package naming convention",
    category: "naming",
    description: "Java packages should be lower-case and dot-separated.",
    severity: "low",
    languages: ["java"],
    security: false,
    detector: { kind: "scan", scan: scanPackageNaming }
  },
  {
    id: "PG302",
    title: "Type naming convention",
    category: "naming",
    description: "Classes, interfaces, enums and records should be UpperCamelCase.",
    severity: "medium",
    languages: ["java"],
    security: false,
    detector: {
      kind: "line",
      pattern: TYPE_PATTERN,
      skipComments: true,
      unless: (match) => UPPER_CAMEL_CASE.test(match[2]),
      message: (match) => `${match[1]} '${match[2]}' should be UpperCamelCase.`
    }
  },
  {
    id: "PG303",
    title: "Class/file naming mismatch",
    category: "naming",
    description: "A public top-level class must live in a file of the same name.",
    severity: "medium",
    languages: ["java"],
    security: false,
    detector: { kind: "scan", scan: scanClassFileMismatch }
  },
  {
    id: "PG304",
    title: "Method naming convention",
    category: "naming",
    description: "Java methods should be lowerCamelCase.",
    severity: "low",
    languages: ["java"],
    security: false,
    detector: { kind: "scan", scan: scanMethodNaming }
  },
  {
    id: "PG305",
    title: "Constant naming convention",
    category: "naming",
    description: "static final constants should be UPPER_SNAKE_CASE.",
    severity: "low",
    languages: ["java"],
    security: false,
    detector: {
      kind: "line",
      pattern: CONSTANT_PATTERN,
      skipComments: true,
      unless: (match) => UPPER_SNAKE_CASE.test(match[1]) || match[1] === "serialVersionUID",
      message: (match) => `Constant '${match[1]}' should be UPPER_SNAKE_CASE.`
    }
  },
  {
    id: "PG306",
    title: "Too many parameters",
    category: "complexity",
    description: "Methods with many parameters are hard to call correctly.",
    severity: "medium",
    languages: ["java"],
    security: false,
    detector: { kind: "scan", scan: scanParameterCount }
  },
  {
    id: "PG307",
    title: "Method too long",
    category: "complexity",
    description: "Long methods are hard to read and test.",
    severity: "medium",
    languages: ["java"],
    security: false,
    detector: { kind: "scan", scan: scanMethodLength }
  },
  {
    id: "PG308",
    title: "Deep nesting",
    category: "complexity",
    description: "Deeply nested blocks.",
    severity: "medium",
    languages: ["java"],
    security: false,
    detector: { kind: "scan", scan: scanBraceNesting }
  },
  {
    id: "PG309",
    title: "Class has too many methods",
    category: "coupling",
    description: "Classes with many methods usually carry several responsibilities.",
    severity: "medium",
    languages: ["java"],
    security: false,
    detector: { kind: "scan", scan: (ctx) => scanClassStructure(ctx, "methods") }
  },
  {
    id: "PG310",
    title: "High import fan-out",
    category: "coupling",
    description: "The file depends on many other types.",
    severity: "medium",
    languages: ["java"],
    security: false,
    detector: { kind: "scan", scan: scanImportFanOut }
  },
  {
    id: "PG311",
    title: "Low class cohesion",
    category: "coupling",
    description: "Methods of the class touch mostly disjoint fields.",
    severity: "medium",
    languages: ["java"],
    security: false,
    detector: { kind: "scan", scan: (ctx) => scanClassStructure(ctx, "cohesion") }
  },
  {
    id: "PG312",
    title: "OS command execution",
    category: "security",
    description: "Runtime.exec and ProcessBuilder run operating system commands.",
    severity: "high",
    languages: ["java"],
    security: true,
    detector: {
      kind: "line",
      pattern: /\bRuntime\s*\.\s*getRuntime\s*\(\s*\)\s*\.\s*exec\s*\(|\bnew\s+ProcessBuilder\s*\(/,
      skipComments: true,
      message: () => "Review OS command execution (Runtime.exec/ProcessBuilder) for injection risks."
    }
  }
];
