#!/usr/bin/env node
import path from "node:path";
import { statSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { Command, Option } from "commander";
import pc from "picocolors";
import { OUTPUT_FORMATS } from "./config/loadConfig.js";
import { STATE_DIR_NAME } from "./config/defaults.js";
import { runScan } from "./scan/runScan.js";
import { defaultRegistry } from "./scan/catalog/registry.js";
import { formatReport } from "./report/formatters.js";
import { SEVERITIES } from "./types/domain/severity.js";
import { createAppLogger, noopLogger, type AppLogger, type Logger } from "./logging/logger.js";
import { createProgressReporter, formatDuration, Spinner } from "./ui/progress.js";
import {
  collectList,
  describeCliError,
  EXIT_ERROR,
  EXIT_GATE_FAILED,
  EXIT_PASS,
  parseIntegerOption,
  parseNumberOption,
  toConfigOverrides,
  type ScanCommandOptions
} from "./ui/scanOptions.js";
import { TOOL_NAME, TOOL_VERSION } from "./version.js";

const program = new Command();
type UiLogger = Logger & { pause: () => void };

function logCliError(logger: Logger, message: string): void {
  logger.error(`Error: ${message}`);
}

program
  .name(TOOL_NAME)
  .description("Polyglot static analysis with a CI quality gate")
  .version(TOOL_VERSION);

program
  .command("scan [target]")
  .description("Scan a directory (default: current directory) and evaluate the quality gate")
  .option("-c, --config <path>", "Path to polygate.config.json")
  .option("--exclude <pattern>", "Extra exclude pattern, gitignore syntax (repeatable)", collectList)
  .option("--include-ext <ext>", "Extra file extension to scan (repeatable)", collectList)
  .option("--include-file <name>", "Extra file name to scan, e.g. Jenkinsfile (repeatable)", collectList)
  .option("--enable-rule <id>", "Only run these rule ids (repeatable)", collectList)
  .option("--disable-rule <id>", "Skip these rule ids (repeatable)", collectList)
  .option("--security-only", "Run only security-tagged rules")
  .option("--no-inline-ignore", "Ignore polygate:ignore comments")
  .option("--include-generated", "Scan generated and build output too")
  .option("--max-file-size-kb <kb>", "Skip files larger than this", parseNumberOption)
  .addOption(new Option("-f, --format <format>", "Output format").choices([...OUTPUT_FORMATS]))
  .option("-o, --out <path>", "Write the report to a file instead of stdout")
  .addOption(new Option("--fail-on <severity>", "Fail on any issue at or above this severity").choices([...SEVERITIES]))
  .option("--max-issues <n>", "Fail when the issue count exceeds n", parseIntegerOption)
  .option("--max-files-with-issues <n>", "Fail when more than n files have issues", parseIntegerOption)
  .option("--max-low <n>", "Maximum low-severity issues", parseIntegerOption)
  .option("--max-medium <n>", "Maximum medium-severity issues", parseIntegerOption)
  .option("--max-high <n>", "Maximum high-severity issues", parseIntegerOption)
  .option("--max-critical <n>", "Maximum critical-severity issues", parseIntegerOption)
  .option("--coverage-xml <path>", "Cobertura coverage report")
  .option("--min-coverage <percent>", "Minimum line coverage, 0-100", parseNumberOption)
  .option("--baseline-report <path>", "Previous JSON report to compare against")
  .option("--gate-new-only", "Gate only on issues missing from the baseline report")
  .option("--concurrency <n>", "Files analyzed in parallel", parseIntegerOption)
  .option("--min-duplicate-lines <n>", "Shortest duplicated block reported", parseIntegerOption)
  .option("--debug", "Write debug entries to the log file")
  .action(async (target: string | undefined, options: ScanCommandOptions) => {
    const cwd = process.cwd();
    const scanTarget = path.resolve(cwd, target ?? ".");
    const projectRoot = isFile(scanTarget) ? path.dirname(scanTarget) : scanTarget;
    const spinner = process.stderr.isTTY ? new Spinner(process.stderr) : null;
    let progressMessage = "Running scan...";
    let loggerPaused = false;

    let appLogger: AppLogger | null = null;
    try {
      appLogger = await createAppLogger({
        stateDir: path.join(projectRoot, STATE_DIR_NAME),
        label: "scan",
        minLevel: options.debug ? "debug" : "info"
      });
    } catch (err) {
      console.error(pc.yellow(`Logging to file disabled: ${describeCliError(err)}`));
    }
    const appLog: Logger = appLogger ?? noopLogger;

    const uiLogger: UiLogger = {
      pause: () => {
        loggerPaused = true;
        spinner?.stop();
      },
      debug: (message) => appLog.debug(message),
      info: (message) => {
        appLog.info(message);
        spinner?.stop();
        console.error(message);
        if (spinner && !loggerPaused) spinner.start(progressMessage);
      },
      warn: (message) => {
        appLog.warn(message);
        spinner?.stop();
        console.error(pc.yellow(message));
        if (spinner && !loggerPaused) spinner.start(progressMessage);
      },
      error: (message) => {
        appLog.error(message);
        spinner?.stop();
        console.error(pc.red(message));
      }
    };

    const controller = new AbortController();
    const onSigint = () => controller.abort(new Error("interrupted"));
    process.once("SIGINT", onSigint);

    try {
      spinner?.start(progressMessage);
      const result = await runScan({
        projectRoot,
        target: scanTarget,
        configPath: options.config ?? null,
        overrides: toConfigOverrides(options, cwd),
        cwd,
        logger: appLog,
        signal: controller.signal,
        onProgress: createProgressReporter((message) => {
          progressMessage = message;
          spinner?.update(message);
        })
      });
      uiLogger.pause();

      const { config, report, gate } = result;
      for (const note of report.notes) {
        if (note.kind === "unreadable" || note.kind === "analyzer_error") {
          uiLogger.warn(`${note.path ?? ""}: ${note.message}`);
        }
      }

      const rendered = formatReport(config.output.format, report, {
        gate,
        color: config.output.outPath ? false : undefined
      });
      if (config.output.outPath) {
        await mkdir(path.dirname(config.output.outPath), { recursive: true });
        await writeFile(config.output.outPath, `${rendered}\n`, "utf-8");
        uiLogger.info(`Report written to ${config.output.outPath}`);
      } else {
        process.stdout.write(`${rendered}\n`);
      }

      const counts = report.summary.bySeverity;
      console.error(
        `[summary] files=${report.metadata.filesScanned} issues=${report.summary.total} ` +
          `low=${counts.low} medium=${counts.medium} high=${counts.high} critical=${counts.critical} ` +
          `gate=${gate.passed ? "passed" : "failed"} (${formatDuration(result.durationMs)})`
      );
      process.exitCode = gate.passed ? EXIT_PASS : EXIT_GATE_FAILED;
    } catch (err) {
      spinner?.stop();
      logCliError(uiLogger, describeCliError(err));
      process.exitCode = EXIT_ERROR;
    } finally {
      process.removeListener("SIGINT", onSigint);
      if (appLogger) {
        await appLogger.close();
      }
    }
  });

function isFile(target: string): boolean {
  return statSync(target, { throwIfNoEntry: false })?.isFile() ?? false;
}

program
  .command("rules")
  .description("List the rule catalog")
  .option("--security-only", "Only list security-tagged rules")
  .option("--json", "Print the catalog as JSON")
  .action((options: { securityOnly?: boolean; json?: boolean }) => {
    const rules = defaultRegistry()
      .all()
      .filter((rule) => !options.securityOnly || rule.security);
    if (options.json) {
      const payload = rules.map((rule) => ({
        id: rule.id,
        title: rule.title,
        category: rule.category,
        severity: rule.severity,
        security: rule.security,
        languages: rule.languages,
        description: rule.description
      }));
      process.stdout.write(`${JSON.stringify(payload, null, 2)}\n`);
      return;
    }
    for (const rule of rules) {
      const languages = rule.languages === "*" ? "all" : rule.languages.join(",");
      const tag = rule.security ? pc.magenta(" [security]") : "";
      process.stdout.write(`${pc.cyan(rule.id)} ${rule.severity.padEnd(8)} ${rule.title} (${languages})${tag}\n`);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(pc.red(`Error: ${describeCliError(err)}`));
  process.exitCode = EXIT_ERROR;
});
