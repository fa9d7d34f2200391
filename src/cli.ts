#!/usr/bin/env node
/**
 * Command-line scanner.
 *
 * Usage:
 *   pyperf-scan [--format text|json] [--config FILE] [--fail-on SEVERITY] <path...>
 *
 * Exit codes: 0 clean, 1 an issue met --fail-on, 2 usage error.
 */

import * as fs from "fs";
import * as path from "path";
import { parseArgs } from "util";

import { Severity, isSeverity, meetsSeverity } from "./checker/issues";
import { LoadedConfig, loadConfig, loadConfigFile } from "./config/loader";
import { config as env } from "./env";
import { UsageError, isAnalyzerError } from "./errors";
import { handlePerformanceCheck } from "./handler";
import { logger } from "./logger";
import { SummaryRecord, combineSummaryRecords } from "./report/serialize";
import { FileFailure, FileReport, formatTextReport } from "./report/text";

export const USAGE = `Usage: pyperf-scan [options] <path...>

Options:
  --format <text|json>   Output format (default: text)
  --config <file>        Config file (default: .pyperfscan.yml in the working directory)
  --fail-on <severity>   Exit with code 1 if an issue at or above this severity is found
  -h, --help             Show this help`;

const SKIPPED_DIRECTORIES = new Set(["node_modules", "__pycache__", "venv"]);

export interface CliOutput {
  stdout(text: string): void;
  stderr(text: string): void;
}

const processOutput: CliOutput = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

interface CliOptions {
  format: "text" | "json";
  configPath?: string;
  failOn?: Severity;
  help: boolean;
  paths: string[];
}

export function parseCliArgs(argv: string[]): CliOptions {
  let parsed: ReturnType<typeof parseCliValues>;
  try {
    parsed = parseCliValues(argv);
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
  const { values, positionals } = parsed;

  const format = values.format ?? "text";
  if (format !== "text" && format !== "json") {
    throw new UsageError(`Unknown format: ${format}`);
  }

  const failOnValue = values["fail-on"];
  let failOn: Severity | undefined;
  if (failOnValue !== undefined) {
    if (!isSeverity(failOnValue)) {
      throw new UsageError(`Unknown severity: ${failOnValue}`);
    }
    failOn = failOnValue;
  }

  const help = values.help ?? false;
  if (!help && positionals.length === 0) {
    throw new UsageError("No paths given");
  }

  return {
    format,
    configPath: values.config ?? env.PYPERF_CONFIG,
    failOn,
    help,
    paths: positionals,
  };
}

function parseCliValues(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      format: { type: "string" },
      config: { type: "string" },
      "fail-on": { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });
}

function walkDir(dir: string, fileList: string[] = []): string[] {
  const entries = fs.readdirSync(dir).sort();
  for (const entry of entries) {
    const entryPath = path.join(dir, entry);
    let stat: fs.Stats;
    try {
      stat = fs.statSync(entryPath);
    } catch (error) {
      // dangling symlinks and entries removed mid-walk
      logger.warn("Skipping unreadable path", {
        path: entryPath,
        error: error instanceof Error ? error.message : String(error),
      });
      continue;
    }
    if (stat.isDirectory()) {
      if (!entry.startsWith(".") && !SKIPPED_DIRECTORIES.has(entry)) {
        walkDir(entryPath, fileList);
      }
    } else if (entry.endsWith(".py")) {
      fileList.push(entryPath);
    }
  }
  return fileList;
}

/**
 * Python files named by the arguments. Directories are walked; files named
 * directly are taken as they are.
 */
export function collectPythonFiles(targets: readonly string[], config: LoadedConfig): string[] {
  const files: string[] = [];
  for (const target of targets) {
    if (!fs.existsSync(target)) {
      throw new UsageError(`Path not found: ${target}`);
    }
    if (fs.statSync(target).isDirectory()) {
      walkDir(target, files);
    } else {
      files.push(target);
    }
  }
  return files.filter((file) => !config.isFileIgnored(path.relative(process.cwd(), file)));
}

function resolveConfig(configPath: string | undefined): LoadedConfig {
  return configPath ? loadConfigFile(configPath) : loadConfig(process.cwd());
}

function scan(options: CliOptions, output: CliOutput): number {
  const config = resolveConfig(options.configPath);
  const files = collectPythonFiles(options.paths, config);
  logger.debug("Scanning files", { count: files.length });

  const reports: FileReport[] = [];
  const failures: FileFailure[] = [];
  const summaries: SummaryRecord[] = [];

  for (const file of files) {
    const response = handlePerformanceCheck({ file_path: file, config });
    if (response.success) {
      reports.push({ file, issues: response.issues });
      summaries.push(response.summary);
    } else {
      failures.push({ file, code: response.error.code, message: response.error.message });
    }
  }

  const summary = combineSummaryRecords(summaries);
  if (options.format === "json") {
    output.stdout(JSON.stringify({ files: reports, errors: failures, summary }, null, 2));
  } else {
    output.stdout(formatTextReport(reports, failures, summary));
  }

  const { failOn } = options;
  if (!failOn) return 0;
  const failed = reports.some((report) =>
    report.issues.some((issue) => meetsSeverity(issue.severity, failOn))
  );
  return failed ? 1 : 0;
}

/**
 * Run the scanner and return the process exit code.
 */
export function runCli(argv: string[], output: CliOutput = processOutput): number {
  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      output.stdout(USAGE);
      return 0;
    }
    return scan(options, output);
  } catch (err) {
    if (isAnalyzerError(err) && err.code === "USAGE_ERROR") {
      output.stderr(`Error: ${err.message}\n\n${USAGE}`);
      return 2;
    }
    throw err;
  }
}

if (require.main === module) {
  process.exitCode = runCli(process.argv.slice(2));
}
