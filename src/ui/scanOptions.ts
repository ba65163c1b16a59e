import path from "node:path";
import { InvalidArgumentError } from "commander";
import { setIfDefined, type ConfigOverrides, type GateConfig, type OutputFormat, type PolygateConfig } from "../config/loadConfig.js";
import { ConfigError } from "../errors/config.errors.js";
import { normalizeExtension } from "../fs/language.js";

export const EXIT_PASS = 0;
export const EXIT_GATE_FAILED = 1;
export const EXIT_ERROR = 2;

/** Options of `polygate scan` as commander hands them over. */
export type ScanCommandOptions = {
  config?: string;
  exclude?: string[];
  includeExt?: string[];
  includeFile?: string[];
  enableRule?: string[];
  disableRule?: string[];
  securityOnly?: boolean;
  inlineIgnore?: boolean;
  includeGenerated?: boolean;
  maxFileSizeKb?: number;
  format?: OutputFormat;
  out?: string;
  failOn?: string;
  maxIssues?: number;
  maxFilesWithIssues?: number;
  maxLow?: number;
  maxMedium?: number;
  maxHigh?: number;
  maxCritical?: number;
  coverageXml?: string;
  minCoverage?: number;
  baselineReport?: string;
  gateNewOnly?: boolean;
  concurrency?: number;
  minDuplicateLines?: number;
  debug?: boolean;
};

export function parseIntegerOption(value: string): number {
  const parsed = Number(value);
  if (!value.trim() || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Expected an integer.");
  }
  return parsed;
}

export function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (!value.trim() || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Expected a number.");
  }
  return parsed;
}

/** Repeatable option that also accepts comma-separated values. */
export function collectList(value: string, previous: string[] = []): string[] {
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
  return [...previous, ...items];
}

/** Maps CLI flags onto config overrides; list flags extend the configured lists. */
export function toConfigOverrides(options: ScanCommandOptions, cwd: string): ConfigOverrides {
  const resolve = (value: string | undefined) => (value ? path.resolve(cwd, value) : undefined);

  const discovery: Partial<PolygateConfig["discovery"]> = {};
  if (options.includeGenerated) discovery.includeGenerated = true;
  setIfDefined(discovery, "maxFileSizeKb", options.maxFileSizeKb);

  const rules: NonNullable<ConfigOverrides["rules"]> = {};
  if (options.securityOnly) rules.securityOnly = true;
  if (options.inlineIgnore === false) rules.inlineIgnore = false;
  setIfDefined(rules, "minDuplicateLines", options.minDuplicateLines);

  const scan: Partial<PolygateConfig["scan"]> = {};
  setIfDefined(scan, "concurrency", options.concurrency);

  const gate: Partial<GateConfig> = {};
  setIfDefined(gate, "failOn", options.failOn);
  setIfDefined(gate, "maxIssues", options.maxIssues);
  setIfDefined(gate, "maxFilesWithIssues", options.maxFilesWithIssues);
  setIfDefined(gate, "maxLow", options.maxLow);
  setIfDefined(gate, "maxMedium", options.maxMedium);
  setIfDefined(gate, "maxHigh", options.maxHigh);
  setIfDefined(gate, "maxCritical", options.maxCritical);
  setIfDefined(gate, "minCoverage", options.minCoverage);
  setIfDefined(gate, "coverageXml", resolve(options.coverageXml));
  setIfDefined(gate, "baselineReport", resolve(options.baselineReport));
  if (options.gateNewOnly) gate.onlyNewIssues = true;

  const output: Partial<PolygateConfig["output"]> = {};
  setIfDefined(output, "format", options.format);
  setIfDefined(output, "outPath", resolve(options.out));

  return {
    discovery,
    rules,
    scan,
    gate,
    output,
    additions: {
      includeExtensions: options.includeExt?.map(normalizeExtension),
      includeFilenames: options.includeFile,
      exclude: options.exclude,
      enabledRules: options.enableRule?.map((id) => id.toUpperCase()),
      disabledRules: options.disableRule?.map((id) => id.toUpperCase())
    }
  };
}

export function describeCliError(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err);
  return err instanceof ConfigError ? `Configuration error: ${message}` : message;
}
