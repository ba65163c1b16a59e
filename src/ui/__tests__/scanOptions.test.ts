import assert from "node:assert/strict";
import { test } from "node:test";
import { InvalidArgumentError } from "commander";
import {
  collectList,
  describeCliError,
  parseIntegerOption,
  parseNumberOption,
  toConfigOverrides
} from "../scanOptions.js";
import { ConfigBaselineRequiredError } from "../../errors/config.errors.js";
import { normalizeExtension } from "../../fs/language.js";

test("integer options reject fractions and blanks", () => {
  assert.equal(parseIntegerOption("12"), 12);
  assert.equal(parseIntegerOption("0"), 0);
  assert.throws(() => parseIntegerOption("1.5"), InvalidArgumentError);
  assert.throws(() => parseIntegerOption(" "), InvalidArgumentError);
  assert.throws(() => parseIntegerOption("ten"), InvalidArgumentError);
});

test("number options accept decimals", () => {
  assert.equal(parseNumberOption("82.5"), 82.5);
  assert.throws(() => parseNumberOption(""), InvalidArgumentError);
  assert.throws(() => parseNumberOption("Infinity"), InvalidArgumentError);
});

test("list options repeat and split on commas", () => {
  assert.deepEqual(collectList("PG001, PG002,"), ["PG001", "PG002"]);
  assert.deepEqual(collectList("PG003", ["PG001"]), ["PG001", "PG003"]);
});

test("extensions gain a leading dot and lose case", () => {
  assert.equal(normalizeExtension("VUE"), ".vue");
  assert.equal(normalizeExtension(" .Svelte "), ".svelte");
});

test("flags map onto config overrides", () => {
  const overrides = toConfigOverrides(
    {
      includeExt: ["VUE", ".Svelte"],
      enableRule: ["pg001"],
      failOn: "high",
      maxIssues: 0,
      out: "reports/out.json",
      inlineIgnore: true,
      baselineReport: "base.json",
      gateNewOnly: true,
      concurrency: 2
    },
    "/work"
  );
  assert.deepEqual(overrides, {
    discovery: {},
    rules: {},
    scan: { concurrency: 2 },
    gate: { failOn: "high", maxIssues: 0, baselineReport: "/work/base.json", onlyNewIssues: true },
    output: { outPath: "/work/reports/out.json" },
    additions: {
      includeExtensions: [".vue", ".svelte"],
      includeFilenames: undefined,
      exclude: undefined,
      enabledRules: ["PG001"],
      disabledRules: undefined
    }
  });
});

test("negated and boolean flags only override when set", () => {
  const overrides = toConfigOverrides({ inlineIgnore: false, securityOnly: true, includeGenerated: false }, "/work");
  assert.deepEqual(overrides.rules, { securityOnly: true, inlineIgnore: false });
  assert.deepEqual(overrides.discovery, {});
});

test("configuration errors are labelled", () => {
  assert.equal(
    describeCliError(new ConfigBaselineRequiredError()),
    "Configuration error: only_new_issues requires a baseline report. Set baselineReport in polygate.config.json or pass --baseline-report."
  );
  assert.equal(describeCliError(new Error("disk full")), "disk full");
  assert.equal(describeCliError("stopped"), "stopped");
});
