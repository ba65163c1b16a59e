export * from "./scan/runScan.js";
export * from "./config/loadConfig.js";
export * from "./report/formatters.js";
export * from "./gate/qualityGate.js";
export * from "./gate/baseline.js";
export * from "./gate/coverage.js";
export * from "./errors/config.errors.js";
export * from "./errors/scan.errors.js";
export { defaultRegistry, resolveActiveRules, securityRuleIds, type RuleRegistry } from "./scan/catalog/registry.js";
export type { RuleDefinition, RuleThresholds } from "./scan/catalog/types.js";
export { SEVERITIES, parseSeverity, severityRank } from "./types/domain/severity.js";
export * from "./types.js";
