import { createHash } from "node:crypto";
import { ConfigEmptyRuleSetError, ConfigInvalidRuleIdError } from "../../errors/config.errors.js";
import { GENERIC_RULES } from "./genericRules.js";
import { GO_RULES } from "./goRules.js";
import { INFRA_RULES } from "./infraRules.js";
import { JAVA_RULES } from "./javaRules.js";
import { JAVASCRIPT_RULES } from "./javascriptRules.js";
import { KOTLIN_RULES } from "./kotlinRules.js";
import { PYTHON_RULES } from "./pythonRules.js";
import { appliesTo, type RuleDefinition } from "./types.js";
import type { Language } from "../../types.js";

export type RuleRegistry = {
  readonly size: number;
  get: (id: string) => RuleDefinition | undefined;
  has: (id: string) => boolean;
  all: () => readonly RuleDefinition[];
  forLanguage: (language: Language) => readonly RuleDefinition[];
};

export type RuleSelection = {
  enabledRules?: readonly string[];
  disabledRules?: readonly string[];
  securityOnly?: boolean;
};

/** The rules active for one scan, ordered by id. */
export type RuleSet = {
  readonly rules: readonly RuleDefinition[];
  readonly fingerprint: string;
  has: (id: string) => boolean;
  forLanguage: (language: Language) => readonly RuleDefinition[];
};

const normalizeRuleId = (id: string): string => id.trim().toUpperCase();

function freezeRule(rule: RuleDefinition): RuleDefinition {
  const languages = rule.languages === "*" ? rule.languages : Object.freeze([...rule.languages]);
  return Object.freeze({ ...rule, languages, detector: Object.freeze({ ...rule.detector }) });
}

export function createRuleRegistry(definitions: readonly RuleDefinition[]): RuleRegistry {
  const byId = new Map<string, RuleDefinition>();
  for (const definition of definitions) {
    const id = normalizeRuleId(definition.id);
    if (byId.has(id)) {
      throw new Error(`Duplicate rule id in catalog: ${id}`);
    }
    byId.set(id, freezeRule({ ...definition, id }));
  }
  const ordered = Object.freeze([...byId.values()].sort((a, b) => a.id.localeCompare(b.id)));
  const languageCache = new Map<Language, readonly RuleDefinition[]>();

  return Object.freeze({
    size: ordered.length,
    get: (id: string) => byId.get(normalizeRuleId(id)),
    has: (id: string) => byId.has(normalizeRuleId(id)),
    all: () => ordered,
    forLanguage: (language: Language) => {
      const cached = languageCache.get(language);
      if (cached) return cached;
      const rules = Object.freeze(ordered.filter((rule) => appliesTo(rule, language)));
      languageCache.set(language, rules);
      return rules;
    }
  });
}

export const BUILTIN_RULES: readonly RuleDefinition[] = [
  ...JAVASCRIPT_RULES,
  ...GENERIC_RULES,
  ...INFRA_RULES,
  ...PYTHON_RULES,
  ...JAVA_RULES,
  ...GO_RULES,
  ...KOTLIN_RULES
];

let builtinRegistry: RuleRegistry | null = null;

export function defaultRegistry(): RuleRegistry {
  if (!builtinRegistry) {
    builtinRegistry = createRuleRegistry(BUILTIN_RULES);
  }
  return builtinRegistry;
}

export function ruleSetFingerprint(ruleIds: readonly string[]): string {
  const sorted = [...ruleIds].sort();
  return createHash("sha256").update(sorted.join(",")).digest("hex");
}

function checkIds(registry: RuleRegistry, ids: readonly string[], listName: string): string[] {
  const normalized = ids.map(normalizeRuleId).filter(Boolean);
  const unknown = normalized.filter((id) => !registry.has(id));
  if (unknown.length) {
    throw new ConfigInvalidRuleIdError([...new Set(unknown)], listName);
  }
  return normalized;
}

/**
 * Security-only mode keeps the security-tagged rules; an enabled list then narrows
 * within that subset, and disabled rules are removed last.
 */
export function resolveActiveRules(registry: RuleRegistry, selection: RuleSelection = {}): RuleSet {
  const enabled = checkIds(registry, selection.enabledRules ?? [], "enabledRules");
  const disabled = new Set(checkIds(registry, selection.disabledRules ?? [], "disabledRules"));
  const allow = enabled.length ? new Set(enabled) : null;

  const rules = registry
    .all()
    .filter((rule) => !selection.securityOnly || rule.security)
    .filter((rule) => !allow || allow.has(rule.id))
    .filter((rule) => !disabled.has(rule.id));
  if (!rules.length) {
    throw new ConfigEmptyRuleSetError();
  }

  const ids = new Set(rules.map((rule) => rule.id));
  const languageCache = new Map<Language, readonly RuleDefinition[]>();
  return Object.freeze({
    rules: Object.freeze(rules),
    fingerprint: ruleSetFingerprint([...ids]),
    has: (id: string) => ids.has(normalizeRuleId(id)),
    forLanguage: (language: Language) => {
      const cached = languageCache.get(language);
      if (cached) return cached;
      const scoped = Object.freeze(rules.filter((rule) => appliesTo(rule, language)));
      languageCache.set(language, scoped);
      return scoped;
    }
  });
}

export function securityRuleIds(registry: RuleRegistry = defaultRegistry()): string[] {
  return registry
    .all()
    .filter((rule) => rule.security)
    .map((rule) => rule.id);
}
