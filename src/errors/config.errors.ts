export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class ConfigFileParseError extends ConfigError {
  constructor(filePath: string, detail: string) {
    super(`Config file ${filePath} is not valid JSON: ${detail}`);
    this.name = "ConfigFileParseError";
  }
}

export class ConfigInvalidRuleIdError extends ConfigError {
  readonly ruleIds: string[];

  constructor(ruleIds: string[], listName: string) {
    super(`Unknown rule id(s) in ${listName}: ${ruleIds.join(", ")}. Run "polygate rules" to list available rules.`);
    this.name = "ConfigInvalidRuleIdError";
    this.ruleIds = ruleIds;
  }
}

export class ConfigEmptyRuleSetError extends ConfigError {
  constructor() {
    super("No rules are active after applying enabled, disabled and security-only settings.");
    this.name = "ConfigEmptyRuleSetError";
  }
}

export class ConfigInvalidSeverityError extends ConfigError {
  constructor(setting: string, value: string) {
    super(`Invalid severity for ${setting}: "${value}". Use low, medium, high or critical.`);
    this.name = "ConfigInvalidSeverityError";
  }
}

export class ConfigInvalidThresholdError extends ConfigError {
  constructor(setting: string, value: unknown, expected: string) {
    super(`Invalid value for ${setting}: ${String(value)} (expected ${expected}).`);
    this.name = "ConfigInvalidThresholdError";
  }
}

export class ConfigBaselineRequiredError extends ConfigError {
  constructor() {
    super("only_new_issues requires a baseline report. Set baselineReport in polygate.config.json or pass --baseline-report.");
    this.name = "ConfigBaselineRequiredError";
  }
}

export class ConfigBaselineMissingError extends ConfigError {
  constructor(filePath: string) {
    super(`Baseline report not found: ${filePath}`);
    this.name = "ConfigBaselineMissingError";
  }
}

export class ConfigBaselineMalformedError extends ConfigError {
  constructor(filePath: string, detail: string) {
    super(`Baseline report ${filePath} is malformed: ${detail}`);
    this.name = "ConfigBaselineMalformedError";
  }
}

export class ConfigCoverageMissingError extends ConfigError {
  constructor(filePath: string | null) {
    super(
      filePath
        ? `Coverage report not found: ${filePath}`
        : "min_coverage is set but no coverage report was given. Pass --coverage-xml or set coverageXml."
    );
    this.name = "ConfigCoverageMissingError";
  }
}

export class ConfigCoverageMalformedError extends ConfigError {
  constructor(filePath: string, detail: string) {
    super(`Coverage report ${filePath} is malformed: ${detail}`);
    this.name = "ConfigCoverageMalformedError";
  }
}
