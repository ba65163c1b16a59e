import { AST_NODE_TYPES, type TSESTree } from "@typescript-eslint/typescript-estree";

export type FunctionNode =
  | TSESTree.FunctionDeclaration
  | TSESTree.FunctionExpression
  | TSESTree.ArrowFunctionExpression;

export type ModuleBinding = {
  module: string;
  /** "*" for default, namespace and whole-module bindings. */
  imported: string;
};

export type ResolvedCallee = {
  module: string;
  member: string;
};

export function isFunctionNode(node: TSESTree.Node): node is FunctionNode {
  return (
    node.type === AST_NODE_TYPES.FunctionDeclaration ||
    node.type === AST_NODE_TYPES.FunctionExpression ||
    node.type === AST_NODE_TYPES.ArrowFunctionExpression
  );
}

export function propertyName(key: TSESTree.Node): string | null {
  if (key.type === AST_NODE_TYPES.Identifier || key.type === AST_NODE_TYPES.PrivateIdentifier) {
    return key.name;
  }
  if (key.type === AST_NODE_TYPES.Literal && typeof key.value === "string") return key.value;
  return null;
}

export function memberName(node: TSESTree.MemberExpression): string | null {
  if (!node.computed) return propertyName(node.property);
  const property = node.property;
  if (property.type === AST_NODE_TYPES.Literal && typeof property.value === "string") return property.value;
  return null;
}

export function stringLiteralValue(node: TSESTree.Node | undefined): string | null {
  if (!node) return null;
  if (node.type === AST_NODE_TYPES.Literal && typeof node.value === "string") return node.value;
  if (node.type === AST_NODE_TYPES.TemplateLiteral && node.expressions.length === 0) {
    return node.quasis.map((quasi) => quasi.value.cooked ?? quasi.value.raw).join("");
  }
  return null;
}

export function normalizeModule(source: string): string {
  return source.replace(/^node:/, "");
}

/** Module name for `require("x")`, otherwise null. */
export function requiredModule(node: TSESTree.Node): string | null {
  if (node.type !== AST_NODE_TYPES.CallExpression) return null;
  if (node.callee.type !== AST_NODE_TYPES.Identifier || node.callee.name !== "require") return null;
  const source = stringLiteralValue(node.arguments[0]);
  return source === null ? null : normalizeModule(source);
}

export function collectModuleBindings(nodes: readonly TSESTree.Node[]): Map<string, ModuleBinding> {
  const bindings = new Map<string, ModuleBinding>();
  for (const node of nodes) {
    if (node.type === AST_NODE_TYPES.ImportDeclaration) {
      const module = normalizeModule(node.source.value);
      for (const specifier of node.specifiers) {
        if (specifier.type === AST_NODE_TYPES.ImportSpecifier) {
          bindings.set(specifier.local.name, { module, imported: propertyName(specifier.imported) ?? "*" });
        } else {
          bindings.set(specifier.local.name, { module, imported: "*" });
        }
      }
      continue;
    }
    if (node.type !== AST_NODE_TYPES.VariableDeclarator || !node.init) continue;
    const module = requiredModule(node.init);
    if (!module) continue;
    if (node.id.type === AST_NODE_TYPES.Identifier) {
      bindings.set(node.id.name, { module, imported: "*" });
      continue;
    }
    if (node.id.type !== AST_NODE_TYPES.ObjectPattern) continue;
    for (const property of node.id.properties) {
      if (property.type !== AST_NODE_TYPES.Property) continue;
      const imported = propertyName(property.key);
      if (imported && property.value.type === AST_NODE_TYPES.Identifier) {
        bindings.set(property.value.name, { module, imported });
      }
    }
  }
  return bindings;
}

/** Resolves `exec`, `cp.exec` or `require("child_process").exec` to the module member it names. */
export function resolveCallee(
  callee: TSESTree.Node,
  bindings: ReadonlyMap<string, ModuleBinding>
): ResolvedCallee | null {
  if (callee.type === AST_NODE_TYPES.Identifier) {
    const binding = bindings.get(callee.name);
    if (!binding || binding.imported === "*") return null;
    return { module: binding.module, member: binding.imported };
  }
  if (callee.type !== AST_NODE_TYPES.MemberExpression) return null;
  const member = memberName(callee);
  if (!member) return null;
  const object = callee.object;
  if (object.type === AST_NODE_TYPES.Identifier) {
    const binding = bindings.get(object.name);
    if (!binding || binding.imported !== "*") return null;
    return { module: binding.module, member };
  }
  const module = requiredModule(object);
  return module ? { module, member } : null;
}

/** Name a function is known by: its id, the variable, property or method it is assigned to. */
export function functionName(node: FunctionNode): string | null {
  if (node.type !== AST_NODE_TYPES.ArrowFunctionExpression && node.id) return node.id.name;
  const parent = node.parent;
  if (!parent) return null;
  if (parent.type === AST_NODE_TYPES.VariableDeclarator && parent.id.type === AST_NODE_TYPES.Identifier) {
    return parent.id.name;
  }
  if (
    parent.type === AST_NODE_TYPES.MethodDefinition ||
    parent.type === AST_NODE_TYPES.Property ||
    parent.type === AST_NODE_TYPES.PropertyDefinition
  ) {
    return propertyName(parent.key);
  }
  return null;
}

export function enclosingFunction(node: TSESTree.Node): FunctionNode | null {
  let current = node.parent;
  while (current) {
    if (isFunctionNode(current)) return current;
    current = current.parent;
  }
  return null;
}

export function startLine(node: TSESTree.Node): number {
  return node.loc.start.line;
}

export function startColumn(node: TSESTree.Node): number {
  return node.loc.start.column + 1;
}
