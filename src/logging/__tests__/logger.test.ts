import assert from "node:assert/strict";
import { test } from "node:test";
import os from "node:os";
import path from "node:path";
import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { createAppLogger, withContext, type LogMeta, type Logger } from "../logger.js";

test("bound context is merged into every entry", () => {
  const calls: Array<[string, string, LogMeta | undefined]> = [];
  const record = (level: string) => (message: string, meta?: LogMeta) => {
    calls.push([level, message, meta]);
  };
  const base: Logger = { debug: record("debug"), info: record("info"), warn: record("warn"), error: record("error") };

  const log = withContext(base, { ruleSet: "abc", phase: "scan" });
  log.info("Scan finished", { phase: "report", issues: 2 });
  log.error("Analyzer failed");

  assert.deepEqual(calls, [
    ["info", "Scan finished", { ruleSet: "abc", phase: "report", issues: 2 }],
    ["error", "Analyzer failed", { ruleSet: "abc", phase: "scan" }]
  ]);
});

test("file logger writes json lines at or above its level", async (t) => {
  const stateDir = await mkdtemp(path.join(os.tmpdir(), "polygate-logs-"));
  t.after(() => rm(stateDir, { recursive: true, force: true }));

  const logger = await createAppLogger({ stateDir, label: "scan", minLevel: "info" });
  logger.debug("Skipped file", { path: "a.py" });
  logger.info("Discovered files", { count: 2 });
  logger.warn("Could not read file", {});
  await logger.close();
  logger.error("after close");

  const files = await readdir(path.join(stateDir, "logs"));
  assert.deepEqual(files, [path.basename(logger.path)]);
  assert.match(files[0], /^scan-.+\.jsonl$/);

  const records: unknown[] = (await readFile(logger.path, "utf-8"))
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line));
  assert.equal(records.length, 2);
  const [first, second] = records;
  assert.ok(typeof first === "object" && first !== null);
  assert.ok(typeof second === "object" && second !== null);
  assert.deepEqual({ ...first, timestamp: "" }, { timestamp: "", level: "info", message: "Discovered files", meta: { count: 2 } });
  assert.deepEqual({ ...second, timestamp: "" }, { timestamp: "", level: "warning", message: "Could not read file" });
});
