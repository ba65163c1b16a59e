import path from "node:path";
import { AST_NODE_TYPES, type TSESTree } from "@typescript-eslint/typescript-estree";
import { LOWER_CAMEL_CASE, UPPER_CAMEL_CASE, UPPER_SNAKE_CASE, averageJaccard } from "./helpers.js";
import {
  collectModuleBindings,
  enclosingFunction,
  functionName,
  isFunctionNode,
  memberName,
  propertyName,
  requiredModule,
  resolveCallee,
  startColumn,
  startLine,
  stringLiteralValue,
  type FunctionNode,
  type ModuleBinding
} from "./estree.js";
import type { RuleDefinition, RuleMatch, StructuralContext } from "./types.js";

const VM_EXEC_MEMBERS = new Set(["runInContext", "runInNewContext", "runInThisContext", "compileFunction"]);
const SHELL_EXEC_MEMBERS = new Set(["exec", "execSync"]);
const SPAWN_MEMBERS = new Set(["spawn", "spawnSync", "execFile", "execFileSync"]);
const DESERIALIZERS: Record<string, string> = {
  "node-serialize": "unserialize",
  "serialize-to-js": "deserialize"
};
const TLS_FLAGS = new Set(["rejectUnauthorized", "strictSSL"]);
const NESTING_TYPES: ReadonlySet<AST_NODE_TYPES> = new Set([
  AST_NODE_TYPES.IfStatement,
  AST_NODE_TYPES.ForStatement,
  AST_NODE_TYPES.ForInStatement,
  AST_NODE_TYPES.ForOfStatement,
  AST_NODE_TYPES.WhileStatement,
  AST_NODE_TYPES.DoWhileStatement,
  AST_NODE_TYPES.SwitchStatement,
  AST_NODE_TYPES.TryStatement
]);
const MODULE_FILE_PATTERN = /^[_$]?[A-Za-z][A-Za-z0-9]*(?:[.-][A-Za-z0-9]+)*$/;
const ROUTE_SEGMENT_PATTERN = /^\[{1,2}(?:\.\.\.)?[A-Za-z0-9_-]+\]{1,2}$/;

type ProgramFacts = {
  bindings: Map<string, ModuleBinding>;
  jsxFunctions: Set<FunctionNode>;
};

const factsCache = new WeakMap<TSESTree.Program, ProgramFacts>();

function programFacts(ctx: StructuralContext): ProgramFacts {
  const cached = factsCache.get(ctx.ast);
  if (cached) return cached;
  const jsxFunctions = new Set<FunctionNode>();
  for (const node of ctx.nodes) {
    if (node.type !== AST_NODE_TYPES.JSXElement && node.type !== AST_NODE_TYPES.JSXFragment) continue;
    const owner = enclosingFunction(node);
    if (owner) jsxFunctions.add(owner);
  }
  const facts = { bindings: collectModuleBindings(ctx.nodes), jsxFunctions };
  factsCache.set(ctx.ast, facts);
  return facts;
}

function at(node: TSESTree.Node, message: string): RuleMatch {
  return { line: startLine(node), column: startColumn(node), message };
}

function stripPrivatePrefix(name: string): string {
  return name.replace(/^[_$]+/, "");
}

function isGlobalObject(node: TSESTree.Node): boolean {
  return (
    node.type === AST_NODE_TYPES.Identifier &&
    (node.name === "window" || node.name === "globalThis" || node.name === "global" || node.name === "self")
  );
}

function checkDynamicExecution(ctx: StructuralContext): RuleMatch[] {
  const { bindings } = programFacts(ctx);
  const matches: RuleMatch[] = [];
  for (const node of ctx.nodes) {
    if (node.type !== AST_NODE_TYPES.CallExpression && node.type !== AST_NODE_TYPES.NewExpression) continue;
    const callee = node.callee;
    if (callee.type === AST_NODE_TYPES.Identifier) {
      if (callee.name === "eval" && node.type === AST_NODE_TYPES.CallExpression) {
        matches.push(at(node, "Avoid dynamic code execution via eval()."));
        continue;
      }
      if (callee.name === "Function") {
        matches.push(at(node, "Avoid dynamic code execution via the Function constructor."));
        continue;
      }
      if (
        (callee.name === "setTimeout" || callee.name === "setInterval") &&
        stringLiteralValue(node.arguments[0]) !== null
      ) {
        matches.push(at(node, `${callee.name}() with a string argument evaluates it as code.`));
        continue;
      }
    }
    if (callee.type === AST_NODE_TYPES.MemberExpression && isGlobalObject(callee.object)) {
      const member = memberName(callee);
      if (member === "eval" || member === "Function") {
        matches.push(at(node, `Avoid dynamic code execution via ${member}.`));
        continue;
      }
    }
    const resolved = resolveCallee(callee, bindings);
    if (!resolved || resolved.module !== "vm") continue;
    if (node.type === AST_NODE_TYPES.NewExpression && resolved.member === "Script") {
      matches.push(at(node, "vm.Script compiles a code string."));
    } else if (node.type === AST_NODE_TYPES.CallExpression && VM_EXEC_MEMBERS.has(resolved.member)) {
      matches.push(at(node, `vm.${resolved.member}() executes a code string.`));
    }
  }
  return matches;
}

function isNoopHandler(node: TSESTree.Node | undefined): boolean {
  if (!node) return false;
  if (node.type !== AST_NODE_TYPES.ArrowFunctionExpression && node.type !== AST_NODE_TYPES.FunctionExpression) {
    return false;
  }
  const body = node.body;
  if (body.type === AST_NODE_TYPES.BlockStatement) return body.body.length === 0;
  return (
    (body.type === AST_NODE_TYPES.Literal && body.value === null) ||
    (body.type === AST_NODE_TYPES.Identifier && body.name === "undefined")
  );
}

function checkSwallowedErrors(ctx: StructuralContext): RuleMatch[] {
  const comments = ctx.ast.comments ?? [];
  const hasComment = (range: TSESTree.Range) =>
    comments.some((comment) => comment.range[0] >= range[0] && comment.range[1] <= range[1]);
  const matches: RuleMatch[] = [];
  for (const node of ctx.nodes) {
    if (node.type === AST_NODE_TYPES.CatchClause) {
      if (node.body.body.length === 0 && !hasComment(node.body.range)) {
        matches.push(at(node, "Empty catch block swallows the error."));
      }
      continue;
    }
    if (node.type !== AST_NODE_TYPES.CallExpression || node.callee.type !== AST_NODE_TYPES.MemberExpression) continue;
    if (memberName(node.callee) !== "catch") continue;
    const handler = node.arguments[0];
    if (isNoopHandler(handler) && !hasComment(node.range)) {
      matches.push(at(node.callee.property, "Promise rejection is swallowed by a no-op .catch() handler."));
    }
  }
  return matches;
}

function hasShellOption(args: readonly TSESTree.Node[]): boolean {
  return args.some(
    (arg) =>
      arg.type === AST_NODE_TYPES.ObjectExpression &&
      arg.properties.some(
        (property) =>
          property.type === AST_NODE_TYPES.Property &&
          propertyName(property.key) === "shell" &&
          property.value.type === AST_NODE_TYPES.Literal &&
          property.value.value === true
      )
  );
}

function checkShellExecution(ctx: StructuralContext): RuleMatch[] {
  const { bindings } = programFacts(ctx);
  const matches: RuleMatch[] = [];
  for (const node of ctx.nodes) {
    if (node.type !== AST_NODE_TYPES.CallExpression) continue;
    const resolved = resolveCallee(node.callee, bindings);
    if (!resolved || resolved.module !== "child_process") continue;
    if (SHELL_EXEC_MEMBERS.has(resolved.member)) {
      matches.push(at(node, `child_process.${resolved.member}() runs a shell command string.`));
    } else if (SPAWN_MEMBERS.has(resolved.member) && hasShellOption(node.arguments)) {
      matches.push(at(node, `child_process.${resolved.member}() is called with shell: true.`));
    }
  }
  return matches;
}

function checkUnsafeDeserialization(ctx: StructuralContext): RuleMatch[] {
  const { bindings } = programFacts(ctx);
  const matches: RuleMatch[] = [];
  for (const node of ctx.nodes) {
    if (node.type !== AST_NODE_TYPES.CallExpression) continue;
    const resolved = resolveCallee(node.callee, bindings);
    if (!resolved) continue;
    if (DESERIALIZERS[resolved.module] === resolved.member) {
      matches.push(at(node, `${resolved.module}.${resolved.member}() can execute code embedded in the payload.`));
    }
  }
  return matches;
}

function isTlsEnvTarget(node: TSESTree.Node): boolean {
  if (node.type !== AST_NODE_TYPES.MemberExpression) return false;
  if (memberName(node) !== "NODE_TLS_REJECT_UNAUTHORIZED") return false;
  const env = node.object;
  return env.type === AST_NODE_TYPES.MemberExpression && memberName(env) === "env";
}

function checkTlsVerification(ctx: StructuralContext): RuleMatch[] {
  const matches: RuleMatch[] = [];
  for (const node of ctx.nodes) {
    if (node.type === AST_NODE_TYPES.Property) {
      const name = propertyName(node.key);
      if (name && TLS_FLAGS.has(name) && node.value.type === AST_NODE_TYPES.Literal && node.value.value === false) {
        matches.push(at(node, `${name}: false disables certificate verification.`));
      }
      continue;
    }
    if (node.type !== AST_NODE_TYPES.AssignmentExpression || !isTlsEnvTarget(node.left)) continue;
    const right = node.right;
    if (right.type === AST_NODE_TYPES.Literal && (right.value === "0" || right.value === 0)) {
      matches.push(at(node, "NODE_TLS_REJECT_UNAUTHORIZED=0 disables certificate verification for the process."));
    }
  }
  return matches;
}

type NamedFunction = {
  fn: FunctionNode;
  name: string;
  nameNode: TSESTree.Node;
};

/** Function declarations and function-valued variables; methods are checked separately. */
function namedFunctions(ctx: StructuralContext): NamedFunction[] {
  const results: NamedFunction[] = [];
  for (const node of ctx.nodes) {
    if (node.type === AST_NODE_TYPES.FunctionDeclaration && node.id) {
      results.push({ fn: node, name: node.id.name, nameNode: node.id });
      continue;
    }
    if (node.type !== AST_NODE_TYPES.VariableDeclarator || node.id.type !== AST_NODE_TYPES.Identifier) continue;
    const init = node.init;
    if (
      init &&
      (init.type === AST_NODE_TYPES.ArrowFunctionExpression || init.type === AST_NODE_TYPES.FunctionExpression)
    ) {
      results.push({ fn: init, name: node.id.name, nameNode: node.id });
    }
  }
  return results;
}

function checkFunctionNaming(ctx: StructuralContext, target: "function" | "component"): RuleMatch[] {
  const { jsxFunctions } = programFacts(ctx);
  const matches: RuleMatch[] = [];
  for (const { fn, name, nameNode } of namedFunctions(ctx)) {
    const isComponent = UPPER_CAMEL_CASE.test(name) || jsxFunctions.has(fn);
    if (isComponent) {
      if (target === "component" && !UPPER_CAMEL_CASE.test(name)) {
        matches.push(at(nameNode, `Component '${name}' should be UpperCamelCase.`));
      }
      continue;
    }
    if (target === "function" && !LOWER_CAMEL_CASE.test(stripPrivatePrefix(name))) {
      matches.push(at(nameNode, `Function '${name}' should be lowerCamelCase.`));
    }
  }
  if (target === "component") return matches;
  for (const node of ctx.nodes) {
    if (node.type !== AST_NODE_TYPES.MethodDefinition || node.kind !== "method" || node.computed) continue;
    const name = propertyName(node.key);
    if (name && !LOWER_CAMEL_CASE.test(stripPrivatePrefix(name))) {
      matches.push(at(node.key, `Method '${name}' should be lowerCamelCase.`));
    }
  }
  return matches;
}

function checkClassNaming(ctx: StructuralContext): RuleMatch[] {
  const matches: RuleMatch[] = [];
  for (const node of ctx.nodes) {
    if (node.type !== AST_NODE_TYPES.ClassDeclaration && node.type !== AST_NODE_TYPES.ClassExpression) continue;
    if (!node.id || UPPER_CAMEL_CASE.test(node.id.name)) continue;
    matches.push(at(node.id, `Class '${node.id.name}' should be UpperCamelCase.`));
  }
  return matches;
}

function isConstantInitializer(node: TSESTree.Node | null): boolean {
  if (!node) return false;
  if (node.type === AST_NODE_TYPES.Literal) return true;
  if (node.type === AST_NODE_TYPES.TemplateLiteral) return node.expressions.length === 0;
  if (node.type === AST_NODE_TYPES.UnaryExpression) return node.argument.type === AST_NODE_TYPES.Literal;
  return false;
}

function checkModuleConstantNaming(ctx: StructuralContext): RuleMatch[] {
  const matches: RuleMatch[] = [];
  for (const statement of ctx.ast.body) {
    const declaration =
      statement.type === AST_NODE_TYPES.ExportNamedDeclaration ? statement.declaration : statement;
    if (!declaration || declaration.type !== AST_NODE_TYPES.VariableDeclaration || declaration.kind !== "const") {
      continue;
    }
    for (const declarator of declaration.declarations) {
      if (declarator.id.type !== AST_NODE_TYPES.Identifier || !isConstantInitializer(declarator.init)) continue;
      const name = declarator.id.name;
      if (UPPER_SNAKE_CASE.test(name) || LOWER_CAMEL_CASE.test(stripPrivatePrefix(name))) continue;
      matches.push(at(declarator.id, `Module constant '${name}' should be UPPER_SNAKE_CASE or camelCase.`));
    }
  }
  return matches;
}

function checkModuleFileNaming(ctx: StructuralContext): RuleMatch[] {
  const base = path.basename(ctx.unit.path);
  const stem = base.slice(0, base.length - path.extname(base).length);
  if (MODULE_FILE_PATTERN.test(stem) || ROUTE_SEGMENT_PATTERN.test(stem)) return [];
  return [{ line: 1, message: `Module file name '${base}' should be camelCase, kebab-case or PascalCase.` }];
}

function describeFunction(fn: FunctionNode): string {
  const name = functionName(fn);
  return name ? `Function '${name}'` : "Anonymous function";
}

function checkParameterCount(ctx: StructuralContext): RuleMatch[] {
  const limit = ctx.thresholds.maxParams;
  const matches: RuleMatch[] = [];
  for (const node of ctx.nodes) {
    if (!isFunctionNode(node)) continue;
    const params = node.params.filter(
      (param) => !(param.type === AST_NODE_TYPES.Identifier && param.name === "this")
    );
    if (params.length <= limit) continue;
    matches.push(at(node, `${describeFunction(node)} has ${params.length} parameters; target at most ${limit}.`));
  }
  return matches;
}

function checkFunctionLength(ctx: StructuralContext): RuleMatch[] {
  const limit = ctx.thresholds.maxFunctionLines;
  const matches: RuleMatch[] = [];
  for (const node of ctx.nodes) {
    if (!isFunctionNode(node)) continue;
    const length = node.loc.end.line - node.loc.start.line + 1;
    if (length <= limit) continue;
    matches.push(at(node, `${describeFunction(node)} spans ${length} lines; target at most ${limit}.`));
  }
  return matches;
}

function nestingDepth(node: TSESTree.Node): number {
  let depth = 0;
  let current: TSESTree.Node | undefined = node;
  while (current) {
    const parent: TSESTree.Node | undefined = current.parent;
    const isElseIf =
      current.type === AST_NODE_TYPES.IfStatement &&
      parent?.type === AST_NODE_TYPES.IfStatement &&
      parent.alternate === current;
    if (NESTING_TYPES.has(current.type) && !isElseIf) depth += 1;
    current = parent;
  }
  return depth;
}

function checkNestingDepth(ctx: StructuralContext): RuleMatch[] {
  let deepest: { node: TSESTree.Node; depth: number } | null = null;
  for (const node of ctx.nodes) {
    if (!NESTING_TYPES.has(node.type)) continue;
    const depth = nestingDepth(node);
    if (!deepest || depth > deepest.depth) deepest = { node, depth };
  }
  const limit = ctx.thresholds.maxNesting;
  if (!deepest || deepest.depth <= limit) return [];
  return [at(deepest.node, `Maximum block nesting depth is ${deepest.depth}; keep it at or below ${limit}.`)];
}

function checkImportFanOut(ctx: StructuralContext): RuleMatch[] {
  const specifiers = new Set<string>();
  for (const node of ctx.nodes) {
    if (
      node.type === AST_NODE_TYPES.ImportDeclaration ||
      node.type === AST_NODE_TYPES.ExportAllDeclaration ||
      (node.type === AST_NODE_TYPES.ExportNamedDeclaration && node.source)
    ) {
      const source = stringLiteralValue(node.source ?? undefined);
      if (source !== null) specifiers.add(source);
      continue;
    }
    if (node.type === AST_NODE_TYPES.ImportExpression) {
      const source = stringLiteralValue(node.source);
      if (source !== null) specifiers.add(source);
      continue;
    }
    const required = requiredModule(node);
    if (required !== null) specifiers.add(required);
  }
  const limit = ctx.thresholds.maxImports;
  if (specifiers.size <= limit) return [];
  return [{ line: 1, message: `Module imports ${specifiers.size} distinct modules; target at most ${limit}.` }];
}

type ClassNode = TSESTree.ClassDeclaration | TSESTree.ClassExpression;

function classLabel(node: ClassNode): string {
  return node.id ? `Class '${node.id.name}'` : "Anonymous class";
}

function classMethods(node: ClassNode): TSESTree.MethodDefinition[] {
  return node.body.body.filter(
    (member): member is TSESTree.MethodDefinition =>
      member.type === AST_NODE_TYPES.MethodDefinition && member.kind !== "constructor"
  );
}

function checkClassMethodCount(ctx: StructuralContext): RuleMatch[] {
  const limit = ctx.thresholds.maxMethods;
  const matches: RuleMatch[] = [];
  for (const node of ctx.nodes) {
    if (node.type !== AST_NODE_TYPES.ClassDeclaration && node.type !== AST_NODE_TYPES.ClassExpression) continue;
    const count = classMethods(node).length;
    if (count <= limit) continue;
    matches.push(at(node, `${classLabel(node)} declares ${count} methods; target at most ${limit}.`));
  }
  return matches;
}

/** The method whose `this` a member expression refers to; arrow functions keep the outer `this`. */
function owningMethod(node: TSESTree.Node): TSESTree.MethodDefinition | null {
  let current = node.parent;
  while (current) {
    if (current.type === AST_NODE_TYPES.FunctionExpression || current.type === AST_NODE_TYPES.FunctionDeclaration) {
      const parent = current.parent;
      return parent?.type === AST_NODE_TYPES.MethodDefinition ? parent : null;
    }
    current = current.parent;
  }
  return null;
}

function checkClassCohesion(ctx: StructuralContext): RuleMatch[] {
  const fieldsByMethod = new Map<TSESTree.MethodDefinition, Set<string>>();
  for (const node of ctx.nodes) {
    if (node.type !== AST_NODE_TYPES.MemberExpression || node.object.type !== AST_NODE_TYPES.ThisExpression) continue;
    const field = memberName(node);
    const method = field ? owningMethod(node) : null;
    if (!field || !method) continue;
    const fields = fieldsByMethod.get(method) ?? new Set<string>();
    fields.add(field);
    fieldsByMethod.set(method, fields);
  }
  const limit = ctx.thresholds.minCohesion;
  const matches: RuleMatch[] = [];
  for (const node of ctx.nodes) {
    if (node.type !== AST_NODE_TYPES.ClassDeclaration && node.type !== AST_NODE_TYPES.ClassExpression) continue;
    const sets = classMethods(node)
      .filter((method) => !method.static)
      .map((method) => fieldsByMethod.get(method) ?? new Set<string>());
    const cohesion = averageJaccard(sets);
    if (cohesion === null || cohesion >= limit) continue;
    matches.push(
      at(node, `${classLabel(node)} methods share little common state (cohesion ${cohesion.toFixed(2)}).`)
    );
  }
  return matches;
}

function checkTopLevelFunctions(ctx: StructuralContext): RuleMatch[] {
  let count = 0;
  for (const statement of ctx.ast.body) {
    const declaration =
      statement.type === AST_NODE_TYPES.ExportNamedDeclaration ||
      statement.type === AST_NODE_TYPES.ExportDefaultDeclaration
        ? statement.declaration
        : statement;
    if (!declaration) continue;
    if (declaration.type === AST_NODE_TYPES.FunctionDeclaration) {
      count += 1;
      continue;
    }
    if (declaration.type !== AST_NODE_TYPES.VariableDeclaration) continue;
    for (const declarator of declaration.declarations) {
      const init = declarator.init;
      if (
        init &&
        (init.type === AST_NODE_TYPES.ArrowFunctionExpression || init.type === AST_NODE_TYPES.FunctionExpression)
      ) {
        count += 1;
      }
    }
  }
  const limit = ctx.thresholds.maxTopLevelFunctions;
  if (count <= limit) return [];
  return [{ line: 1, message: `Module defines ${count} top-level functions; target at most ${limit}.` }];
}

const JS_LANGUAGES = ["javascript"] as const;

export const JAVASCRIPT_RULES: RuleDefinition[] = [
  {
    id: "PG001",
    title: "Dynamic code execution",
    category: "security",
    description: "eval, the Function constructor, string timers and vm.run* execute strings as code.",
    severity: "high",
    languages: JS_LANGUAGES,
    security: true,
    detector: { kind: "structural", check: checkDynamicExecution }
  },
  {
    id: "PG002",
    title: "Swallowed exception",
    category: "reliability",
    description: "Empty catch blocks and no-op .catch() handlers hide failures.",
    severity: "medium",
    languages: JS_LANGUAGES,
    security: false,
    detector: { kind: "structural", check: checkSwallowedErrors }
  },
  {
    id: "PG003",
    title: "Shell command execution",
    category: "security",
    description: "child_process exec/execSync, or spawn/execFile with shell: true, run commands through a shell.",
    severity: "high",
    languages: JS_LANGUAGES,
    security: true,
    detector: { kind: "structural", check: checkShellExecution }
  },
  {
    id: "PG004",
    title: "Unsafe deserialization",
    category: "security",
    description: "Deserializers that revive functions can execute attacker-controlled code.",
    severity: "high",
    languages: JS_LANGUAGES,
    security: true,
    detector: { kind: "structural", check: checkUnsafeDeserialization }
  },
  {
    id: "PG005",
    title: "TLS verification disabled",
    category: "security",
    description: "rejectUnauthorized/strictSSL false or NODE_TLS_REJECT_UNAUTHORIZED=0 turn off certificate checks.",
    severity: "high",
    languages: JS_LANGUAGES,
    security: true,
    detector: { kind: "structural", check: checkTlsVerification }
  },
  {
    id: "PG010",
    title: "Function naming convention",
    category: "naming",
    description: "Functions and methods should be lowerCamelCase.",
    severity: "low",
    languages: JS_LANGUAGES,
    security: false,
    detector: { kind: "structural", check: (ctx) => checkFunctionNaming(ctx, "function") }
  },
  {
    id: "PG011",
    title: "Component naming convention",
    category: "naming",
    description: "Functions that render JSX should be UpperCamelCase.",
    severity: "low",
    languages: JS_LANGUAGES,
    security: false,
    detector: { kind: "structural", check: (ctx) => checkFunctionNaming(ctx, "component") }
  },
  {
    id: "PG012",
    title: "Class naming convention",
    category: "naming",
    description: "Classes should be UpperCamelCase.",
    severity: "low",
    languages: JS_LANGUAGES,
    security: false,
    detector: { kind: "structural", check: checkClassNaming }
  },
  {
    id: "PG013",
    title: "Constant naming convention",
    category: "naming",
    description: "Module-level literal constants should be UPPER_SNAKE_CASE or camelCase.",
    severity: "low",
    languages: JS_LANGUAGES,
    security: false,
    detector: { kind: "structural", check: checkModuleConstantNaming }
  },
  {
    id: "PG014",
    title: "Module file naming convention",
    category: "naming",
    description: "Module file names should be camelCase, kebab-case or PascalCase.",
    severity: "low",
    languages: JS_LANGUAGES,
    security: false,
    detector: { kind: "structural", check: checkModuleFileNaming }
  },
  {
    id: "PG020",
    title: "Too many parameters",
    category: "complexity",
    description: "Functions with many parameters are hard to call correctly.",
    severity: "medium",
    languages: JS_LANGUAGES,
    security: false,
    detector: { kind: "structural", check: checkParameterCount }
  },
  {
    id: "PG021",
    title: "Function too long",
    category: "complexity",
    description: "Long functions are hard to read and test.",
    severity: "medium",
    languages: JS_LANGUAGES,
    security: false,
    detector: { kind: "structural", check: checkFunctionLength }
  },
  {
    id: "PG022",
    title: "Deep nesting",
    category: "complexity",
    description: "Deeply nested control flow; else-if chains count as one level.",
    severity: "medium",
    languages: JS_LANGUAGES,
    security: false,
    detector: { kind: "structural", check: checkNestingDepth }
  },
  {
    id: "PG030",
    title: "High import fan-out",
    category: "coupling",
    description: "The module depends on many other modules.",
    severity: "medium",
    languages: JS_LANGUAGES,
    security: false,
    detector: { kind: "structural", check: checkImportFanOut }
  },
  {
    id: "PG031",
    title: "Class has too many methods",
    category: "coupling",
    description: "Classes with many methods usually carry several responsibilities.",
    severity: "medium",
    languages: JS_LANGUAGES,
    security: false,
    detector: { kind: "structural", check: checkClassMethodCount }
  },
  {
    id: "PG032",
    title: "Low class cohesion",
    category: "coupling",
    description: "Methods of the class touch mostly disjoint members of this.",
    severity: "medium",
    languages: JS_LANGUAGES,
    security: false,
    detector: { kind: "structural", check: checkClassCohesion }
  },
  {
    id: "PG033",
    title: "Too many top-level functions",
    category: "coupling",
    description: "The module defines many top-level functions.",
    severity: "low",
    languages: JS_LANGUAGES,
    security: false,
    detector: { kind: "structural", check: checkTopLevelFunctions }
  }
];
