import assert from "node:assert/strict";
import { test } from "node:test";
import os from "node:os";
import path from "node:path";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { hasGeneratedHeader, runScan, scanSources, type ReadSource, type ScanSourcesOptions } from "../runScan.js";
import { createRuleRegistry, defaultRegistry, resolveActiveRules } from "../catalog/registry.js";
import { DEFAULT_THRESHOLDS } from "../../config/defaults.js";
import { ScanCancelledError } from "../../errors/scan.errors.js";
import type { ScanProgressEvent } from "../progress.js";
import type { Language, ScanCandidate } from "../../types.js";

for (const key of Object.keys(process.env)) {
  if (key.startsWith("POLYGATE_")) delete process.env[key];
}

const candidate = (filePath: string, sizeBytes = 100, language: Language = "python"): ScanCandidate => ({
  path: filePath,
  absolutePath: `/virtual/${filePath}`,
  language,
  sizeBytes
});

const fromMap =
  (files: Record<string, string | Buffer>): ReadSource =>
  async (file) => {
    const content = files[file.path];
    if (content === undefined) throw new Error(`ENOENT: no such file, open '${file.absolutePath}'`);
    return content;
  };

const baseOptions = (ruleIds: string[], overrides: Partial<ScanSourcesOptions> = {}): ScanSourcesOptions => ({
  rules: resolveActiveRules(defaultRegistry(), { enabledRules: ruleIds }),
  thresholds: DEFAULT_THRESHOLDS,
  inlineIgnore: true,
  minDuplicateLines: 6,
  maxFileSizeBytes: 1024 * 1024,
  now: () => new Date(0),
  ...overrides
});

test("generated header detection only looks at the first lines", () => {
  assert.equal(hasGeneratedHeader("// Code generated by protoc. DO NOT EDIT.\npackage api\n"), true);
  assert.equal(hasGeneratedHeader("a\nb\nc\nd\ne\n# @generated\n"), false);
});

test("skipped files become notes and do not count as scanned", async () => {
  const candidates = [
    candidate("big.py", 2 * 1024 * 1024),
    candidate("bin.dat", 3, "text"),
    candidate("gen.py"),
    candidate("missing.py"),
    candidate("ok.py")
  ];
  const report = await scanSources(
    candidates,
    baseOptions(["PG201"], {
      readSource: fromMap({
        "bin.dat": Buffer.from([0x50, 0x00, 0x01]),
        "gen.py": "# @generated by a tool\nx = eval(y)\n",
        "ok.py": "x = eval(y)\n"
      })
    })
  );

  assert.deepEqual(
    report.notes.map((note) => [note.kind, note.path, note.message]),
    [
      ["oversized", "big.py", "File is 2048 KB, above the 1024 KB limit; skipped."],
      ["binary", "bin.dat", "File looks binary; skipped."],
      ["generated", "gen.py", "File header marks it as generated; skipped."],
      ["unreadable", "missing.py", "Could not read file: ENOENT: no such file, open '/virtual/missing.py'"]
    ]
  );
  assert.equal(report.metadata.filesScanned, 1);
  assert.deepEqual(
    report.issues.map((issue) => `${issue.ruleId}:${issue.path}:${issue.line}`),
    ["PG201:ok.py:1"]
  );
  assert.equal(report.metadata.generatedAt, "1970-01-01T00:00:00.000Z");
});

test("generated files are analyzed when includeGenerated is set", async () => {
  const report = await scanSources(
    [candidate("gen.py")],
    baseOptions(["PG201"], {
      includeGenerated: true,
      readSource: fromMap({ "gen.py": "# @generated by a tool\nx = eval(y)\n" })
    })
  );
  assert.equal(report.notes.length, 0);
  assert.equal(report.summary.total, 1);
});

test("report is identical across runs and worker counts", async () => {
  const files: Record<string, string> = {
    "a.py": "import os\nos.system(cmd)\nresult = eval(expr)\n",
    "b.py": "value = eval(expr)\n# TODO: drop\n",
    "c.go": "package my_pkg\n",
    "d.js": "eval(input);\n"
  };
  const candidates = [candidate("d.js", 20, "javascript"), candidate("c.go", 20, "go"), candidate("b.py"), candidate("a.py")];
  const ruleIds = ["PG001", "PG104", "PG201", "PG203", "PG401"];

  const serial = await scanSources(candidates, baseOptions(ruleIds, { concurrency: 1, readSource: fromMap(files) }));
  const parallel = await scanSources(candidates, baseOptions(ruleIds, { concurrency: 4, readSource: fromMap(files) }));
  const again = await scanSources(candidates, baseOptions(ruleIds, { concurrency: 4, readSource: fromMap(files) }));

  assert.deepEqual(parallel, serial);
  assert.deepEqual(again, serial);
  assert.deepEqual(
    serial.issues.map((issue) => `${issue.path}:${issue.line}:${issue.ruleId}`),
    ["a.py:2:PG203", "a.py:3:PG201", "b.py:1:PG201", "b.py:2:PG104", "c.go:1:PG401", "d.js:1:PG001"]
  );
  assert.deepEqual(serial.summary.bySeverity, { low: 2, medium: 0, high: 4, critical: 0 });
  assert.equal(serial.summary.filesWithIssues, 4);
  assert.deepEqual(serial.summary.byRule, { PG203: 1, PG201: 2, PG104: 1, PG401: 1, PG001: 1 });
});

test("duplicate pass runs once over every worker's files", async () => {
  const block = [
    "def first(items):",
    "    total = 0",
    "    for item in items:",
    "        total += item.price",
    "        total -= item.discount",
    "    return total"
  ].join("\n");
  const report = await scanSources(
    [candidate("b.py"), candidate("a.py")],
    baseOptions(["PG109"], { concurrency: 2, readSource: fromMap({ "a.py": `${block}\n`, "b.py": `x = 1\n${block}\n` }) })
  );
  assert.deepEqual(
    report.issues.map((issue) => [issue.path, issue.line, issue.message]),
    [
      ["a.py", 1, "Duplicated block of 6 lines also found at b.py:2."],
      ["b.py", 2, "Duplicated block of 6 lines also found at a.py:1."]
    ]
  );
});

test("a failing rule costs only its own findings", async () => {
  const registry = createRuleRegistry([
    {
      id: "T1",
      title: "Always fails",
      category: "style",
      description: "Throws on every file.",
      severity: "low",
      languages: ["python"],
      security: false,
      detector: {
        kind: "scan",
        scan: () => {
          throw new Error("boom");
        }
      }
    },
    {
      id: "T2",
      title: "Eval call",
      category: "security",
      description: "Calls eval.",
      severity: "high",
      languages: ["python"],
      security: true,
      detector: { kind: "line", pattern: /eval\(/ }
    }
  ]);
  const report = await scanSources(
    [candidate("a.py")],
    baseOptions([], { rules: resolveActiveRules(registry), readSource: fromMap({ "a.py": "x = eval(y)\n" }) })
  );
  assert.deepEqual(
    report.issues.map((issue) => [issue.ruleId, issue.line, issue.message]),
    [["T2", 1, "Calls eval."]]
  );
  assert.deepEqual(report.notes, [
    { kind: "analyzer_error", path: "a.py", message: "Rule T1 failed on this file and was skipped: boom" }
  ]);
  assert.equal(report.metadata.filesScanned, 1);
});

test("an aborted signal stops the scan", async () => {
  const controller = new AbortController();
  controller.abort(new Error("stop requested"));
  await assert.rejects(
    scanSources([candidate("a.py")], baseOptions(["PG201"], { signal: controller.signal, readSource: fromMap({}) })),
    (err: unknown) => err instanceof ScanCancelledError && err.message === "Scan cancelled: stop requested"
  );
});

test("aborting mid-scan rejects instead of returning a partial report", async () => {
  const controller = new AbortController();
  const files: Record<string, string> = { "a.py": "x = 1\n", "b.py": "y = 2\n" };
  const readSource: ReadSource = async (file) => {
    controller.abort();
    return files[file.path] ?? "";
  };
  await assert.rejects(
    scanSources(
      [candidate("a.py"), candidate("b.py")],
      baseOptions(["PG201"], { concurrency: 1, signal: controller.signal, readSource })
    ),
    ScanCancelledError
  );
});

test("runScan evaluates the configured gate against a directory", async (t) => {
  const root = await mkdtemp(path.join(os.tmpdir(), "polygate-scan-"));
  t.after(() => rm(root, { recursive: true, force: true }));

  const lines = Array.from({ length: 9 }, (_, index) => `// setup step ${index + 1}`);
  lines.push("eval(input);");
  await writeFile(path.join(root, "app.js"), `${lines.join("\n")}\n`);
  await writeFile(path.join(root, "polygate.config.json"), JSON.stringify({ gate: { failOn: "high" } }));

  const events: ScanProgressEvent[] = [];
  const result = await runScan({ projectRoot: root, onProgress: (event) => events.push(event) });

  assert.deepEqual(
    result.report.issues.map((issue) => [issue.ruleId, issue.path, issue.line, issue.severity]),
    [["PG001", "app.js", 10, "high"]]
  );
  assert.equal(result.report.metadata.filesScanned, 2);
  assert.equal(result.gate.passed, false);
  assert.deepEqual(
    result.gate.violations.map((violation) => violation.message),
    ["Detected 1 issue with severity >= high"]
  );
  assert.deepEqual(
    events.filter((event) => event.phase === "analyze").map((event) => event.current),
    [1, 2]
  );
});
