import { SNAKE_CASE, UPPER_CAMEL_CASE, averageJaccard, indentationOf, splitTopLevel } from "./helpers.js";
import type { PatternContext, RuleDefinition, RuleMatch } from "./types.js";

const DEF_PATTERN = /^(\s*)(?:async\s+)?def\s+([A-Za-z_]\w*)\s*\(/;
const CLASS_PATTERN = /^(\s*)class\s+([A-Za-z_]\w*)/;
const CONTROL_PATTERN =
  /^\s*(?:if|elif|else|for|while|with|try|except|finally|match|case|async\s+for|async\s+with)\b.*:\s*(?:#.*)?$/;
const IMPORT_PATTERN = /^import\s+(.+)$/;
const FROM_IMPORT_PATTERN = /^from\s+(\.*[\w.]*)\s+import\b/;

type PythonFunction = {
  name: string;
  line: number;
  indent: number;
  params: string;
  endLine: number;
};

function isCodeLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.length > 0 && !trimmed.startsWith("#");
}

/** Collects the text between the parentheses opened on the def line, following continuation lines. */
function readSignature(lines: string[], startIndex: number): { params: string; endIndex: number } {
  let depth = 0;
  let params = "";
  let started = false;
  for (let index = startIndex; index < lines.length; index += 1) {
    for (const ch of lines[index]) {
      if (ch === "(") {
        depth += 1;
        if (!started) {
          started = true;
          continue;
        }
      } else if (ch === ")") {
        depth -= 1;
        if (started && depth === 0) return { params, endIndex: index };
      }
      if (started) params += ch;
    }
    if (started) params += " ";
  }
  return { params, endIndex: lines.length - 1 };
}

function collectFunctions(lines: string[]): PythonFunction[] {
  const functions: PythonFunction[] = [];
  lines.forEach((line, index) => {
    const match = DEF_PATTERN.exec(line);
    if (!match) return;
    const indent = indentationOf(match[1]);
    const signature = readSignature(lines, index);
    let endIndex = signature.endIndex;
    for (let cursor = signature.endIndex + 1; cursor < lines.length; cursor += 1) {
      const current = lines[cursor];
      if (!isCodeLine(current)) continue;
      if (indentationOf(current) <= indent) break;
      endIndex = cursor;
    }
    functions.push({ name: match[2], line: index + 1, indent, params: signature.params, endLine: endIndex + 1 });
  });
  return functions;
}

function countPythonParams(params: string): number {
  return splitTopLevel(params)
    .map((part) => part.split(/[:=]/)[0].trim())
    .filter((name) => name && name !== "*" && name !== "/" && name !== "self" && name !== "cls").length;
}

function scanParameterCount({ lines, thresholds }: PatternContext): RuleMatch[] {
  return collectFunctions(lines)
    .map((fn) => ({ fn, count: countPythonParams(fn.params) }))
    .filter(({ count }) => count > thresholds.maxParams)
    .map(({ fn, count }) => ({
      line: fn.line,
      message: `Function '${fn.name}' has ${count} parameters; target at most ${thresholds.maxParams}.`
    }));
}

function scanFunctionLength({ lines, thresholds }: PatternContext): RuleMatch[] {
  const matches: RuleMatch[] = [];
  for (const fn of collectFunctions(lines)) {
    const length = fn.endLine - fn.line + 1;
    if (length <= thresholds.maxFunctionLines) continue;
    matches.push({
      line: fn.line,
      message: `Function '${fn.name}' spans ${length} lines; target at most ${thresholds.maxFunctionLines}.`
    });
  }
  return matches;
}

function scanNestingDepth({ lines, thresholds }: PatternContext): RuleMatch[] {
  const stack: number[] = [];
  let peak = { depth: 0, line: 0 };
  lines.forEach((line, index) => {
    if (!isCodeLine(line)) return;
    const indent = indentationOf(line);
    while (stack.length && stack[stack.length - 1] >= indent) stack.pop();
    if (!CONTROL_PATTERN.test(line)) return;
    stack.push(indent);
    if (stack.length > peak.depth) peak = { depth: stack.length, line: index + 1 };
  });
  if (peak.depth <= thresholds.maxNesting) return [];
  return [
    {
      line: peak.line,
      message: `Maximum block nesting depth is ${peak.depth}; keep it at or below ${thresholds.maxNesting}.`
    }
  ];
}

function scanImportFanOut({ lines, thresholds }: PatternContext): RuleMatch[] {
  const modules = new Set<string>();
  for (const line of lines) {
    const fromMatch = FROM_IMPORT_PATTERN.exec(line);
    if (fromMatch) {
      const spec = fromMatch[1];
      modules.add(spec.startsWith(".") ? spec : spec.split(".")[0]);
      continue;
    }
    const importMatch = IMPORT_PATTERN.exec(line);
    if (!importMatch) continue;
    for (const part of importMatch[1].split(",")) {
      const name = part.trim().split(/\s+as\s+/)[0].split(".")[0].trim();
      if (name) modules.add(name);
    }
  }
  if (modules.size <= thresholds.maxImports) return [];
  return [
    {
      line: 1,
      message: `Module imports ${modules.size} distinct modules; target at most ${thresholds.maxImports}.`
    }
  ];
}

function scanTopLevelFunctions({ lines, thresholds }: PatternContext): RuleMatch[] {
  const count = collectFunctions(lines).filter((fn) => fn.indent === 0).length;
  if (count <= thresholds.maxTopLevelFunctions) return [];
  return [
    {
      line: 1,
      message: `Module defines ${count} top-level functions; target at most ${thresholds.maxTopLevelFunctions}.`
    }
  ];
}

function scanClassStructure({ lines, thresholds }: PatternContext, measure: "methods" | "cohesion"): RuleMatch[] {
  const functions = collectFunctions(lines);
  const matches: RuleMatch[] = [];
  lines.forEach((line, index) => {
    const match = CLASS_PATTERN.exec(line);
    if (!match) return;
    const classIndent = indentationOf(match[1]);
    let bodyIndent: number | null = null;
    let endLine = index + 1;
    for (let cursor = index + 1; cursor < lines.length; cursor += 1) {
      const current = lines[cursor];
      if (!isCodeLine(current)) continue;
      const indent = indentationOf(current);
      if (indent <= classIndent) break;
      if (bodyIndent === null) bodyIndent = indent;
      endLine = cursor + 1;
    }
    const methods = functions.filter(
      (fn) =>
        fn.line > index + 1 &&
        fn.line <= endLine &&
        fn.indent === bodyIndent &&
        !(fn.name.startsWith("__") && fn.name.endsWith("__"))
    );
    if (measure === "methods") {
      if (methods.length <= thresholds.maxMethods) return;
      matches.push({
        line: index + 1,
        message: `Class '${match[2]}' declares ${methods.length} methods; target at most ${thresholds.maxMethods}.`
      });
      return;
    }
    const fieldSets = methods.map((fn) => {
      const body = lines.slice(fn.line - 1, fn.endLine).join("\n");
      return new Set(Array.from(body.matchAll(/\bself\.([A-Za-z_]\w*)/g), (hit) => hit[1]));
    });
    const cohesion = averageJaccard(fieldSets);
    if (cohesion === null || cohesion >= thresholds.minCohesion) return;
    matches.push({
      line: index + 1,
      message: `Class '${match[2]}' methods share little common state (cohesion ${cohesion.toFixed(2)}).`
    });
  });
  return matches;
}

export const PYTHON_RULES: RuleDefinition[] = [
  {
    id: "PG201",
    title: "Dynamic code evaluation",
    category: "security",
    description: "eval()/exec() run strings as Python code.",
    severity: "high",
    languages: ["python"],
    security: true,
    detector: {
      kind: "line",
      pattern: /(?<![.\w])(eval|exec)\s*\(/,
      skipComments: true,
      message: (match) => `Avoid dynamic evaluation via ${match[1]}().`
    }
  },
  {
    id: "PG202",
    title: "Broad exception handler",
    category: "reliability",
    description: "Bare except or except Exception/BaseException hides unrelated failures.",
    severity: "medium",
    languages: ["python"],
    security: false,
    detector: {
      kind: "line",
      pattern: /^\s*except\s*(?::|\(?\s*(Exception|BaseException)\b)/,
      message: (match) =>
        match[1] ? `Catching ${match[1]} hides unrelated failures; catch specific exceptions.` : "Bare except catches everything, including KeyboardInterrupt."
    }
  },
  {
    id: "PG203",
    title: "Shell command execution",
    category: "security",
    description: "subprocess with shell=True, or os.system/os.popen, runs commands through a shell.",
    severity: "high",
    languages: ["python"],
    security: true,
    detector: {
      kind: "line",
      pattern: /\bsubprocess\.\w+\s*\(.*\bshell\s*=\s*True\b|\bos\.(?:system|popen)\s*\(/,
      skipComments: true,
      message: () => "Command runs through a shell; pass an argument list without shell=True."
    }
  },
  {
    id: "PG204",
    title: "Unsafe YAML load",
    category: "security",
    description: "yaml.load without SafeLoader can construct arbitrary objects.",
    severity: "high",
    languages: ["python"],
    security: true,
    detector: {
      kind: "line",
      pattern: /\byaml\.(?:load|load_all)\s*\(/,
      skipComments: true,
      unless: (_match, line) => /Loader\s*=\s*(?:yaml\.)?C?SafeLoader\b/.test(line),
      message: () => "yaml.load without SafeLoader; use yaml.safe_load."
    }
  },
  {
    id: "PG205",
    title: "Unsafe deserialization",
    category: "security",
    description: "pickle-style loaders execute code embedded in the payload.",
    severity: "high",
    languages: ["python"],
    security: true,
    detector: {
      kind: "line",
      pattern: /\b(pickle|cPickle|dill|marshal)\.loads?\s*\(/,
      skipComments: true,
      message: (match) => `${match[1]} deserialization of untrusted data can execute code.`
    }
  },
  {
    id: "PG206",
    title: "TLS verification disabled",
    category: "security",
    description: "verify=False turns off certificate checks.",
    severity: "high",
    languages: ["python"],
    security: true,
    detector: {
      kind: "line",
      pattern: /\bverify\s*=\s*False\b/,
      skipComments: true,
      message: () => "Certificate verification is disabled (verify=False)."
    }
  },
  {
    id: "PG207",
    title: "Function naming convention",
    category: "naming",
    description: "Python functions should be snake_case.",
    severity: "low",
    languages: ["python"],
    security: false,
    detector: {
      kind: "line",
      pattern: DEF_PATTERN,
      unless: (match) => SNAKE_CASE.test(match[2]),
      message: (match) => `Function '${match[2]}' should be snake_case.`
    }
  },
  {
    id: "PG208",
    title: "Class naming convention",
    category: "naming",
    description: "Python classes should be UpperCamelCase.",
    severity: "low",
    languages: ["python"],
    security: false,
    detector: {
      kind: "line",
      pattern: CLASS_PATTERN,
      unless: (match) => UPPER_CAMEL_CASE.test(match[2].replace(/^_+/, "")),
      message: (match) => `Class '${match[2]}' should be UpperCamelCase.`
    }
  },
  {
    id: "PG209",
    title: "Too many parameters",
    category: "complexity",
    description: "Functions with many parameters are hard to call correctly.",
    severity: "medium",
    languages: ["python"],
    security: false,
    detector: { kind: "scan", scan: scanParameterCount }
  },
  {
    id: "PG210",
    title: "Function too long",
    category: "complexity",
    description: "Long functions are hard to read and test.",
    severity: "medium",
    languages: ["python"],
    security: false,
    detector: { kind: "scan", scan: scanFunctionLength }
  },
  {
    id: "PG211",
    title: "Deep nesting",
    category: "complexity",
    description: "Deeply nested control flow.",
    severity: "medium",
    languages: ["python"],
    security: false,
    detector: { kind: "scan", scan: scanNestingDepth }
  },
  {
    id: "PG212",
    title: "High import fan-out",
    category: "coupling",
    description: "The module depends on many other modules.",
    severity: "medium",
    languages: ["python"],
    security: false,
    detector: { kind: "scan", scan: scanImportFanOut }
  },
  {
    id: "PG213",
    title: "Too many top-level functions",
    category: "coupling",
    description: "The module defines many top-level functions.",
    severity: "low",
    languages: ["python"],
    security: false,
    detector: { kind: "scan", scan: scanTopLevelFunctions }
  },
  {
    id: "PG214",
    title: "Class has too many methods",
    category: "coupling",
    description: "Classes with many methods usually carry several responsibilities.",
    severity: "medium",
    languages: ["python"],
    security: false,
    detector: { kind: "scan", scan: (ctx) => scanClassStructure(ctx, "methods") }
  },
  {
    id: "PG215",
    title: "Low class cohesion",
    category: "coupling",
    description: "Methods of the class touch mostly disjoint attributes of self.",
    severity: "medium",
    languages: ["python"],
    security: false,
    detector: { kind: "scan", scan: (ctx) => scanClassStructure(ctx, "cohesion") }
  }
];
