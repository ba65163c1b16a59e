import assert from "node:assert/strict";
import { test } from "node:test";
import os from "node:os";
import path from "node:path";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { issueFingerprint, loadBaseline, parseBaseline } from "../baseline.js";
import { ConfigBaselineMalformedError, ConfigBaselineMissingError } from "../../errors/config.errors.js";

const known = { ruleId: "PG201", path: "app.py", line: 3, severity: "high", message: "Avoid dynamic evaluation via eval()." };

const KNOWN_FINGERPRINT = '["PG201","app.py",3,"Avoid dynamic evaluation via eval()."]';

test("fingerprints encode rule, path, line and message", () => {
  assert.equal(issueFingerprint(known), KNOWN_FINGERPRINT);
});

test("separators inside fields do not make distinct issues collide", () => {
  const left = { ruleId: "PG104", path: "a|b.py", line: 1, message: "x" };
  const right = { ruleId: "PG104|a", path: "b.py", line: 1, message: "x" };
  assert.notEqual(issueFingerprint(left), issueFingerprint(right));
  assert.notEqual(
    issueFingerprint({ ruleId: "PG104", path: "a.py", line: 1, message: "x|2" }),
    issueFingerprint({ ruleId: "PG104", path: "a.py|1|x", line: 2, message: "" })
  );
});

test("a full JSON report and a bare issue array are both accepted", () => {
  const fromReport = parseBaseline(JSON.stringify({ summary: { total: 1 }, issues: [known] }), "base.json");
  const fromArray = parseBaseline(JSON.stringify([known]), "base.json");
  assert.deepEqual([...fromReport], [KNOWN_FINGERPRINT]);
  assert.deepEqual([...fromArray], [...fromReport]);
});

test("entries without fingerprint fields are skipped", () => {
  const baseline = parseBaseline(
    JSON.stringify({
      issues: [known, "PG104", { ruleId: "PG104", path: "a.py", message: "x" }, { ...known, line: "3" }, { ...known, line: 4.5 }]
    }),
    "base.json"
  );
  assert.equal(baseline.size, 1);
});

test("malformed baselines are rejected with the file path", () => {
  assert.throws(
    () => parseBaseline("{not json", "base.json"),
    (err: unknown) => err instanceof ConfigBaselineMalformedError && err.message.startsWith("Baseline report base.json is malformed: ")
  );
  assert.throws(
    () => parseBaseline(JSON.stringify({ findings: [] }), "base.json"),
    (err: unknown) =>
      err instanceof ConfigBaselineMalformedError &&
      err.message === 'Baseline report base.json is malformed: expected an "issues" array'
  );
});

test("loadBaseline reads from disk and reports a missing file", async (t) => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "polygate-baseline-"));
  t.after(() => rm(dir, { recursive: true, force: true }));
  const file = path.join(dir, "baseline.json");
  await writeFile(file, JSON.stringify([known]));

  assert.equal((await loadBaseline(file)).has(issueFingerprint(known)), true);
  await assert.rejects(loadBaseline(path.join(dir, "none.json")), ConfigBaselineMissingError);
});
