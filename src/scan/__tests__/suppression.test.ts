import assert from "node:assert/strict";
import { test } from "node:test";
import { collectSuppressions, filterSuppressed, isSuppressed, parseSuppression } from "../suppression.js";

test("bare directive in a trailing comment suppresses every rule", () => {
  assert.equal(parseSuppression("x = eval(y)  # polygate:ignore", "python"), "all");
});

test("directive with ids suppresses only those rules, case-insensitively", () => {
  const scope = parseSuppression("eval(x); // polygate:ignore PG001, pg003", "javascript");
  assert.ok(scope instanceof Set);
  assert.deepEqual([...scope].sort(), ["PG001", "PG003"]);
  assert.equal(isSuppressed(scope, "pg001"), true);
  assert.equal(isSuppressed(scope, "PG002"), false);
});

test("block comment directive is recognised", () => {
  const scope = parseSuppression("run(); /* polygate:ignore PG003 */", "javascript");
  assert.ok(scope instanceof Set);
  assert.deepEqual([...scope], ["PG003"]);
});

test("trailing free text voids the directive", () => {
  assert.equal(parseSuppression("eval(x) // polygate:ignore because legacy", "javascript"), null);
});

test("marker outside a comment is not a directive", () => {
  assert.equal(parseSuppression('const marker = "polygate:ignore";', "javascript"), null);
  assert.equal(parseSuppression('{"note": "polygate:ignore"}', "json"), null);
});

test("null scope suppresses nothing", () => {
  assert.equal(isSuppressed(null, "PG001"), false);
  assert.equal(isSuppressed("all", "PG109"), true);
});

test("collectSuppressions keys directives by 1-based line", () => {
  const lines = ["import os", "os.system(cmd)  # polygate:ignore PG203", "print(1)"];
  const directives = collectSuppressions(lines, "python");
  assert.deepEqual([...directives.keys()], [2]);
  assert.equal(directives.get(2)?.line, 2);
});

test("filterSuppressed keeps the ids the directive does not name", () => {
  const remaining = filterSuppressed("exec(cmd) // polygate:ignore PG001", "javascript", ["PG001", "PG003"]);
  assert.deepEqual(remaining, ["PG003"]);
});
