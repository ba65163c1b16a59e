import assert from "node:assert/strict";
import { test } from "node:test";
import {
  createRuleRegistry,
  defaultRegistry,
  resolveActiveRules,
  ruleSetFingerprint
} from "../catalog/registry.js";
import { ConfigEmptyRuleSetError, ConfigInvalidRuleIdError } from "../../errors/config.errors.js";
import type { RuleDefinition } from "../catalog/types.js";

test("lookups are case-insensitive", () => {
  const registry = defaultRegistry();
  assert.equal(registry.get("pg001")?.id, "PG001");
  assert.equal(registry.has("Pg109"), true);
  assert.equal(registry.has("PG999"), false);
});

test("rules are ordered by id", () => {
  const ids = defaultRegistry()
    .all()
    .map((rule) => rule.id);
  assert.deepEqual(ids, [...ids].sort((a, b) => a.localeCompare(b)));
});

test("forLanguage includes language rules and rules for every language", () => {
  const python = defaultRegistry()
    .forLanguage("python")
    .map((rule) => rule.id);
  assert.ok(python.includes("PG201"));
  assert.ok(python.includes("PG102"));
  assert.ok(!python.includes("PG001"));
});

test("security-only keeps only security rules", () => {
  const set = resolveActiveRules(defaultRegistry(), { securityOnly: true });
  assert.ok(set.rules.length > 0);
  assert.ok(set.rules.every((rule) => rule.security));
});

test("allowlist narrows within the security subset", () => {
  const set = resolveActiveRules(defaultRegistry(), { securityOnly: true, enabledRules: ["PG001", "PG104"] });
  assert.deepEqual(
    set.rules.map((rule) => rule.id),
    ["PG001"]
  );
});

test("disabled rules are removed after the allowlist", () => {
  const set = resolveActiveRules(defaultRegistry(), { enabledRules: ["pg001", "PG003"], disabledRules: ["PG003"] });
  assert.deepEqual(
    set.rules.map((rule) => rule.id),
    ["PG001"]
  );
  assert.equal(set.has("pg001"), true);
  assert.equal(set.has("PG003"), false);
});

test("unknown rule ids are rejected", () => {
  assert.throws(
    () => resolveActiveRules(defaultRegistry(), { disabledRules: ["PG999", "PG999"] }),
    (err: unknown) => err instanceof ConfigInvalidRuleIdError && err.ruleIds.join(",") === "PG999"
  );
});

test("an empty active set is a configuration error", () => {
  assert.throws(
    () => resolveActiveRules(defaultRegistry(), { securityOnly: true, enabledRules: ["PG104"] }),
    ConfigEmptyRuleSetError
  );
});

test("fingerprint does not depend on selection order", () => {
  const left = resolveActiveRules(defaultRegistry(), { enabledRules: ["PG003", "PG001"] });
  const right = resolveActiveRules(defaultRegistry(), { enabledRules: ["PG001", "PG003"] });
  assert.equal(left.fingerprint, right.fingerprint);
  assert.equal(ruleSetFingerprint(["b", "a"]), ruleSetFingerprint(["a", "b"]));
  assert.notEqual(left.fingerprint, resolveActiveRules(defaultRegistry()).fingerprint);
});

test("duplicate ids in a catalog are refused", () => {
  const rule: RuleDefinition = {
    id: "X1",
    title: "Example",
    category: "style",
    description: "Example rule.",
    severity: "low",
    languages: "*",
    security: false,
    detector: { kind: "line", pattern: /x/ }
  };
  assert.throws(() => createRuleRegistry([rule, { ...rule, id: "x1" }]), /Duplicate rule id in catalog: X1/);
});
