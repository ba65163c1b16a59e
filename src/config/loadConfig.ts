import path from "node:path";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { readEnv, readEnvList, readEnvNumber } from "./env.js";
import { isIncludeGeneratedEnabled, isInlineIgnoreEnabled, isSecurityOnlyEnabled } from "./featureFlags.js";
import {
  CONFIG_FILE_NAMES,
  DEFAULT_CONCURRENCY,
  DEFAULT_EXCLUDES,
  DEFAULT_GENERATED_PATHS,
  DEFAULT_INCLUDE_EXTENSIONS,
  DEFAULT_INCLUDE_FILENAMES,
  DEFAULT_MAX_FILE_SIZE_KB,
  DEFAULT_MIN_DUPLICATE_LINES,
  DEFAULT_THRESHOLDS,
  STATE_DIR_NAME
} from "./defaults.js";
import { ConfigFileParseError, ConfigInvalidThresholdError } from "../errors/config.errors.js";
import { normalizeExtension } from "../fs/language.js";
import type { RuleThresholds } from "../scan/catalog/types.js";

export const OUTPUT_FORMATS = ["text", "json", "sarif"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface GateConfig {
  /** Severity name; any issue at or above it fails the gate. Validated by prepareGateInputs. */
  failOn: string | null;
  maxIssues: number | null;
  maxFilesWithIssues: number | null;
  maxLow: number | null;
  maxMedium: number | null;
  maxHigh: number | null;
  maxCritical: number | null;
  minCoverage: number | null;
  coverageXml: string | null;
  baselineReport: string | null;
  onlyNewIssues: boolean;
}

export interface PolygateConfig {
  projectRoot: string;
  stateDir: string;
  discovery: {
    includeExtensions: string[];
    includeFilenames: string[];
    exclude: string[];
    generatedPaths: string[];
    includeGenerated: boolean;
    maxFileSizeKb: number;
  };
  rules: {
    enabled: string[];
    disabled: string[];
    securityOnly: boolean;
    inlineIgnore: boolean;
    minDuplicateLines: number;
    thresholds: RuleThresholds;
  };
  scan: {
    concurrency: number;
  };
  gate: GateConfig;
  output: {
    format: OutputFormat;
    outPath: string | null;
  };
}

export type ConfigOverrides = {
  discovery?: Partial<PolygateConfig["discovery"]>;
  rules?: Partial<Omit<PolygateConfig["rules"], "thresholds">> & { thresholds?: Partial<RuleThresholds> };
  scan?: Partial<PolygateConfig["scan"]>;
  gate?: Partial<GateConfig>;
  output?: Partial<PolygateConfig["output"]>;
  /** Entries appended to the merged lists instead of replacing them. */
  additions?: {
    includeExtensions?: string[];
    includeFilenames?: string[];
    exclude?: string[];
    enabledRules?: string[];
    disabledRules?: string[];
  };
};

export interface LoadConfigParams {
  projectRoot: string;
  configPath?: string | null;
  overrides?: ConfigOverrides;
}

/** Sets `key` only when a value was given, so later layers never blank out earlier ones. */
export function setIfDefined<T extends object, K extends keyof T>(target: T, key: K, value: T[K] | undefined): void {
  if (value !== undefined) target[key] = value;
}

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

class ConfigFileReader {
  constructor(private readonly filePath: string) {}

  fail(detail: string): never {
    throw new ConfigFileParseError(this.filePath, detail);
  }

  section(root: JsonObject, key: string): JsonObject {
    const value = root[key];
    if (value === undefined) return {};
    if (!isJsonObject(value)) this.fail(`"${key}" must be an object`);
    return value;
  }

  string(obj: JsonObject, key: string, where: string): string | undefined {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (typeof value !== "string") this.fail(`"${where}.${key}" must be a string`);
    return value;
  }

  nullableString(obj: JsonObject, key: string, where: string): string | null | undefined {
    return obj[key] === null ? null : this.string(obj, key, where);
  }

  number(obj: JsonObject, key: string, where: string): number | undefined {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (typeof value !== "number" || !Number.isFinite(value)) this.fail(`"${where}.${key}" must be a number`);
    return value;
  }

  nullableNumber(obj: JsonObject, key: string, where: string): number | null | undefined {
    return obj[key] === null ? null : this.number(obj, key, where);
  }

  boolean(obj: JsonObject, key: string, where: string): boolean | undefined {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (typeof value !== "boolean") this.fail(`"${where}.${key}" must be true or false`);
    return value;
  }

  stringList(obj: JsonObject, key: string, where: string): string[] | undefined {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (!Array.isArray(value)) this.fail(`"${where}.${key}" must be an array of strings`);
    const items: string[] = [];
    for (const item of value) {
      if (typeof item !== "string") this.fail(`"${where}.${key}" must be an array of strings`);
      items.push(item);
    }
    return items;
  }
}

export function parseConfigFile(raw: string, filePath: string, projectRoot: string): ConfigOverrides {
  const reader: ConfigFileReader = new ConfigFileReader(filePath);
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    reader.fail(err instanceof Error ? err.message : String(err));
  }
  if (!isJsonObject(parsed)) reader.fail("top level must be an object");

  const discoveryJson = reader.section(parsed, "discovery");
  const discovery: Partial<PolygateConfig["discovery"]> = {};
  setIfDefined(
    discovery,
    "includeExtensions",
    reader.stringList(discoveryJson, "includeExtensions", "discovery")?.map(normalizeExtension)
  );
  setIfDefined(discovery, "includeFilenames", reader.stringList(discoveryJson, "includeFilenames", "discovery"));
  setIfDefined(discovery, "exclude", reader.stringList(discoveryJson, "exclude", "discovery"));
  setIfDefined(discovery, "generatedPaths", reader.stringList(discoveryJson, "generatedPaths", "discovery"));
  setIfDefined(discovery, "includeGenerated", reader.boolean(discoveryJson, "includeGenerated", "discovery"));
  setIfDefined(discovery, "maxFileSizeKb", reader.number(discoveryJson, "maxFileSizeKb", "discovery"));

  const rulesJson = reader.section(parsed, "rules");
  const thresholdsJson = reader.section(rulesJson, "thresholds");
  const thresholds: Partial<RuleThresholds> = {};
  for (const key of Object.keys(DEFAULT_THRESHOLDS)) {
    if (!isThresholdKey(key)) continue;
    setIfDefined(thresholds, key, reader.number(thresholdsJson, key, "rules.thresholds"));
  }
  const rules: NonNullable<ConfigOverrides["rules"]> = { thresholds };
  setIfDefined(rules, "enabled", reader.stringList(rulesJson, "enabled", "rules"));
  setIfDefined(rules, "disabled", reader.stringList(rulesJson, "disabled", "rules"));
  setIfDefined(rules, "securityOnly", reader.boolean(rulesJson, "securityOnly", "rules"));
  setIfDefined(rules, "inlineIgnore", reader.boolean(rulesJson, "inlineIgnore", "rules"));
  setIfDefined(rules, "minDuplicateLines", reader.number(rulesJson, "minDuplicateLines", "rules"));

  const scanJson = reader.section(parsed, "scan");
  const scan: Partial<PolygateConfig["scan"]> = {};
  setIfDefined(scan, "concurrency", reader.number(scanJson, "concurrency", "scan"));

  const gateJson = reader.section(parsed, "gate");
  const gate: Partial<GateConfig> = {};
  setIfDefined(gate, "failOn", reader.nullableString(gateJson, "failOn", "gate"));
  for (const key of ["maxIssues", "maxFilesWithIssues", "maxLow", "maxMedium", "maxHigh", "maxCritical", "minCoverage"] as const) {
    setIfDefined(gate, key, reader.nullableNumber(gateJson, key, "gate"));
  }
  // Report paths in the file are relative to the project root, not the working directory.
  const resolvePath = (value: string | null | undefined) =>
    value ? path.resolve(projectRoot, value) : value;
  setIfDefined(gate, "coverageXml", resolvePath(reader.nullableString(gateJson, "coverageXml", "gate")));
  setIfDefined(gate, "baselineReport", resolvePath(reader.nullableString(gateJson, "baselineReport", "gate")));
  setIfDefined(gate, "onlyNewIssues", reader.boolean(gateJson, "onlyNewIssues", "gate"));

  const outputJson = reader.section(parsed, "output");
  const output: Partial<PolygateConfig["output"]> = {};
  const format = reader.string(outputJson, "format", "output");
  if (format !== undefined) {
    if (!isOutputFormat(format)) reader.fail(`"output.format" must be one of ${OUTPUT_FORMATS.join(", ")}`);
    output.format = format;
  }
  setIfDefined(output, "outPath", resolvePath(reader.nullableString(outputJson, "outPath", "output")));

  return { discovery, rules, scan, gate, output };
}

function isThresholdKey(key: string): key is keyof RuleThresholds {
  return key in DEFAULT_THRESHOLDS;
}

async function loadConfigFile(projectRoot: string, configPath?: string | null): Promise<ConfigOverrides> {
  const candidates = configPath
    ? [path.resolve(projectRoot, configPath)]
    : CONFIG_FILE_NAMES.map((name) => path.resolve(projectRoot, name));

  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;
    const raw = await readFile(candidate, "utf-8");
    return parseConfigFile(raw, candidate, projectRoot);
  }

  if (configPath) {
    throw new ConfigFileParseError(candidates[0], "file not found");
  }
  return {};
}

function loadEnvOverrides(): ConfigOverrides {
  const discovery: Partial<PolygateConfig["discovery"]> = {};
  setIfDefined(discovery, "maxFileSizeKb", readEnvNumber("POLYGATE_MAX_FILE_SIZE_KB") ?? undefined);
  setIfDefined(discovery, "includeGenerated", isIncludeGeneratedEnabled() ?? undefined);

  const rules: NonNullable<ConfigOverrides["rules"]> = {};
  setIfDefined(rules, "securityOnly", isSecurityOnlyEnabled() ?? undefined);
  setIfDefined(rules, "inlineIgnore", isInlineIgnoreEnabled() ?? undefined);
  setIfDefined(rules, "minDuplicateLines", readEnvNumber("POLYGATE_MIN_DUPLICATE_LINES") ?? undefined);
  setIfDefined(rules, "enabled", readEnvList("POLYGATE_ENABLE_RULES") ?? undefined);
  setIfDefined(rules, "disabled", readEnvList("POLYGATE_DISABLE_RULES") ?? undefined);

  const scan: Partial<PolygateConfig["scan"]> = {};
  setIfDefined(scan, "concurrency", readEnvNumber("POLYGATE_CONCURRENCY") ?? undefined);

  const gate: Partial<GateConfig> = {};
  setIfDefined(gate, "failOn", readEnv("POLYGATE_FAIL_ON") ?? undefined);
  setIfDefined(gate, "minCoverage", readEnvNumber("POLYGATE_MIN_COVERAGE") ?? undefined);

  return { discovery, rules, scan, gate };
}

function requireInteger(setting: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigInvalidThresholdError(setting, value, `an integer >= ${min}`);
  }
}

function validateConfig(cfg: PolygateConfig): void {
  const { thresholds } = cfg.rules;
  requireInteger("rules.thresholds.maxLineLength", thresholds.maxLineLength, 1);
  requireInteger("rules.thresholds.maxParams", thresholds.maxParams, 0);
  requireInteger("rules.thresholds.maxFunctionLines", thresholds.maxFunctionLines, 1);
  requireInteger("rules.thresholds.maxNesting", thresholds.maxNesting, 1);
  requireInteger("rules.thresholds.maxImports", thresholds.maxImports, 0);
  requireInteger("rules.thresholds.maxMethods", thresholds.maxMethods, 0);
  requireInteger("rules.thresholds.maxTopLevelFunctions", thresholds.maxTopLevelFunctions, 0);
  if (thresholds.minCohesion < 0 || thresholds.minCohesion > 1) {
    throw new ConfigInvalidThresholdError("rules.thresholds.minCohesion", thresholds.minCohesion, "a ratio between 0 and 1");
  }
  requireInteger("rules.minDuplicateLines", cfg.rules.minDuplicateLines, 2);
  requireInteger("scan.concurrency", cfg.scan.concurrency, 1);
  if (!(cfg.discovery.maxFileSizeKb > 0)) {
    throw new ConfigInvalidThresholdError("discovery.maxFileSizeKb", cfg.discovery.maxFileSizeKb, "a positive number");
  }
}

export function defaultConfig(projectRoot: string): PolygateConfig {
  return {
    projectRoot,
    stateDir: path.join(projectRoot, STATE_DIR_NAME),
    discovery: {
      includeExtensions: DEFAULT_INCLUDE_EXTENSIONS,
      includeFilenames: DEFAULT_INCLUDE_FILENAMES,
      exclude: DEFAULT_EXCLUDES,
      generatedPaths: DEFAULT_GENERATED_PATHS,
      includeGenerated: false,
      maxFileSizeKb: DEFAULT_MAX_FILE_SIZE_KB
    },
    rules: {
      enabled: [],
      disabled: [],
      securityOnly: false,
      inlineIgnore: true,
      minDuplicateLines: DEFAULT_MIN_DUPLICATE_LINES,
      thresholds: { ...DEFAULT_THRESHOLDS }
    },
    scan: {
      concurrency: DEFAULT_CONCURRENCY
    },
    gate: {
      failOn: null,
      maxIssues: null,
      maxFilesWithIssues: null,
      maxLow: null,
      maxMedium: null,
      maxHigh: null,
      maxCritical: null,
      minCoverage: null,
      coverageXml: null,
      baselineReport: null,
      onlyNewIssues: false
    },
    output: {
      format: "text",
      outPath: null
    }
  };
}

/** Layers defaults, the config file, POLYGATE_* env and caller overrides, in that order. */
export async function loadConfig(params: LoadConfigParams): Promise<PolygateConfig> {
  const projectRoot = path.resolve(params.projectRoot);
  const layers = [
    await loadConfigFile(projectRoot, params.configPath),
    loadEnvOverrides(),
    params.overrides ?? {}
  ];

  const cfg = defaultConfig(projectRoot);
  for (const layer of layers) {
    cfg.discovery = { ...cfg.discovery, ...layer.discovery };
    const layerRules: NonNullable<ConfigOverrides["rules"]> = layer.rules ?? {};
    const { thresholds, ...rules } = layerRules;
    cfg.rules = { ...cfg.rules, ...rules, thresholds: { ...cfg.rules.thresholds, ...thresholds } };
    cfg.scan = { ...cfg.scan, ...layer.scan };
    cfg.gate = { ...cfg.gate, ...layer.gate };
    cfg.output = { ...cfg.output, ...layer.output };
  }

  const additions = params.overrides?.additions ?? {};
  const append = (base: string[], extra: string[] | undefined) => [...new Set([...base, ...(extra ?? [])])];
  cfg.discovery.includeExtensions = append(cfg.discovery.includeExtensions, additions.includeExtensions);
  cfg.discovery.includeFilenames = append(cfg.discovery.includeFilenames, additions.includeFilenames);
  cfg.discovery.exclude = append(cfg.discovery.exclude, additions.exclude);
  cfg.rules.enabled = append(cfg.rules.enabled, additions.enabledRules);
  cfg.rules.disabled = append(cfg.rules.disabled, additions.disabledRules);

  validateConfig(cfg);
  return cfg;
}
