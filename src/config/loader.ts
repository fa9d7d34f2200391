/**
 * Configuration loader.
 *
 * Loads and validates .pyperfscan.yml files, applying defaults and
 * handling per-path overrides. Anything that does not validate is logged
 * and left out, so a broken file degrades to the defaults.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { minimatch } from "minimatch";
import { DEFAULT_CATALOG, PatternCatalog, extendCatalog, readCatalogTables } from "../catalog";
import { IssueCategory, isSeverity } from "../checker/issues";
import {
  DEFAULT_RULE_CONFIG,
  RequiredRuleConfig,
  RuleConfig,
  RuleOverride,
  isValidCategory,
  mergeRuleConfig,
} from "../checker/rules";
import { UsageError } from "../errors";
import { logger } from "../logger";
import {
  CONFIG_FILE_NAME,
  DEFAULT_FILES_CONFIG,
  SUPPORTED_CONFIG_VERSION,
  ScanConfig,
} from "./schema";

/**
 * The loaded and resolved configuration with helper methods.
 */
export interface LoadedConfig {
  /**
   * The validated configuration (or defaults if no file was found).
   */
  raw: ScanConfig;

  /**
   * Check if a file should be skipped.
   * @param filePath - Path relative to the scan root
   */
  isFileIgnored(filePath: string): boolean;

  /**
   * Effective configuration for a rule, optionally for a specific file.
   * Merges defaults -> config.rules -> overrides in order.
   */
  getRuleConfig(category: IssueCategory, filePath?: string): RequiredRuleConfig;

  /**
   * Built-in catalog with the file's extra entries in front.
   */
  catalog: PatternCatalog;
}

const DEFAULT_CONFIG: ScanConfig = {
  version: SUPPORTED_CONFIG_VERSION,
  rules: {},
  files: DEFAULT_FILES_CONFIG,
  overrides: [],
};

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readStringList(value: unknown, field: string, origin: string): string[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    logger.warn("Expected a list of strings", { origin, field });
    return [];
  }
  return value.filter((item: unknown): item is string => {
    if (typeof item === "string") return true;
    logger.warn("Ignoring non-string list item", { origin, field });
    return false;
  });
}

function readRuleConfig(value: unknown, field: string, origin: string): RuleConfig | undefined {
  if (!isRecord(value)) {
    logger.warn("Ignoring rule config that is not a mapping", { origin, field });
    return undefined;
  }

  const config: RuleConfig = {};
  if (typeof value.enabled === "boolean") {
    config.enabled = value.enabled;
  } else if (value.enabled !== undefined) {
    logger.warn("Ignoring non-boolean 'enabled'", { origin, field });
  }
  if (isSeverity(value.severity)) {
    config.severity = value.severity;
  } else if (value.severity !== undefined) {
    logger.warn("Ignoring unknown severity", { origin, field, severity: String(value.severity) });
  }
  return config;
}

function readRules(value: unknown, field: string, origin: string): Partial<Record<IssueCategory, RuleConfig>> {
  const rules: Partial<Record<IssueCategory, RuleConfig>> = {};
  if (value === undefined || value === null) return rules;
  if (!isRecord(value)) {
    logger.warn("Ignoring rules section that is not a mapping", { origin, field });
    return rules;
  }

  for (const [key, ruleValue] of Object.entries(value)) {
    if (!isValidCategory(key)) {
      logger.warn("Ignoring unknown rule", { origin, field, rule: key });
      continue;
    }
    const config = readRuleConfig(ruleValue, `${field}.${key}`, origin);
    if (config) rules[key] = config;
  }
  return rules;
}

function readOverrides(value: unknown, origin: string): RuleOverride[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    logger.warn("Ignoring overrides section that is not a list", { origin });
    return [];
  }

  const overrides: RuleOverride[] = [];
  value.forEach((item: unknown, index: number) => {
    if (!isRecord(item)) {
      logger.warn("Ignoring override that is not a mapping", { origin, index });
      return;
    }
    overrides.push({
      patterns: readStringList(item.patterns, `overrides[${index}].patterns`, origin),
      rules: readRules(item.rules, `overrides[${index}].rules`, origin),
    });
  });
  return overrides;
}

/**
 * Validate parsed YAML into a ScanConfig.
 */
export function parseScanConfig(parsed: unknown, origin: string): ScanConfig {
  if (parsed === undefined || parsed === null) {
    return { ...DEFAULT_CONFIG };
  }
  if (!isRecord(parsed)) {
    logger.warn("Config is not a mapping, using defaults", { origin });
    return { ...DEFAULT_CONFIG };
  }

  let version = SUPPORTED_CONFIG_VERSION;
  if (typeof parsed.version === "number") {
    version = parsed.version;
    if (version !== SUPPORTED_CONFIG_VERSION) {
      logger.warn("Unsupported config version, reading it as version 1", { origin, version });
    }
  }

  const files = isRecord(parsed.files) ? parsed.files : {};

  return {
    version,
    rules: readRules(parsed.rules, "rules", origin),
    files: { ignore: readStringList(files.ignore, "files.ignore", origin) },
    overrides: readOverrides(parsed.overrides, origin),
    catalog: readCatalogTables(parsed.catalog, origin),
  };
}

function parseYaml(content: string, origin: string): ScanConfig {
  try {
    return parseScanConfig(yaml.load(content), origin);
  } catch (err) {
    logger.warn("Failed to parse config, using defaults", {
      origin,
      error: err instanceof Error ? err.message : String(err),
    });
    return { ...DEFAULT_CONFIG };
  }
}

/**
 * Check if a file matches any of the given glob patterns.
 */
function matchesAnyPattern(filePath: string, patterns: readonly string[]): boolean {
  const normalizedPath = filePath.replace(/\\/g, "/");
  return patterns.some((pattern) => minimatch(normalizedPath, pattern, { dot: true }));
}

/**
 * Build a LoadedConfig from a validated ScanConfig.
 */
export function buildLoadedConfig(rawConfig: ScanConfig): LoadedConfig {
  const ignorePatterns = rawConfig.files?.ignore ?? [];
  const catalog = rawConfig.catalog ? extendCatalog(DEFAULT_CATALOG, rawConfig.catalog) : DEFAULT_CATALOG;

  function isFileIgnored(filePath: string): boolean {
    return matchesAnyPattern(filePath, ignorePatterns);
  }

  function getRuleConfig(category: IssueCategory, filePath?: string): RequiredRuleConfig {
    let result: RequiredRuleConfig = { ...DEFAULT_RULE_CONFIG[category] };

    const globalRuleConfig = rawConfig.rules?.[category];
    if (globalRuleConfig) {
      result = mergeRuleConfig(result, globalRuleConfig);
    }

    if (filePath && rawConfig.overrides) {
      for (const override of rawConfig.overrides) {
        if (matchesAnyPattern(filePath, override.patterns)) {
          const overrideRuleConfig = override.rules[category];
          if (overrideRuleConfig) {
            result = mergeRuleConfig(result, overrideRuleConfig);
          }
        }
      }
    }

    return result;
  }

  return {
    raw: rawConfig,
    isFileIgnored,
    getRuleConfig,
    catalog,
  };
}

/**
 * Load configuration from a directory's .pyperfscan.yml, or defaults if it
 * has none.
 */
export function loadConfig(directory: string): LoadedConfig {
  const configPath = path.join(directory, CONFIG_FILE_NAME);
  if (!fs.existsSync(configPath)) {
    return createDefaultConfig();
  }
  return loadConfigFile(configPath);
}

/**
 * Load a config file named explicitly by the caller.
 *
 * @throws UsageError when the file does not exist
 */
export function loadConfigFile(configPath: string): LoadedConfig {
  let content: string;
  try {
    content = fs.readFileSync(configPath, "utf-8");
  } catch {
    throw new UsageError(`Config file not found: ${configPath}`);
  }
  logger.debug("Loaded config file", { path: configPath });
  return buildLoadedConfig(parseYaml(content, configPath));
}

/**
 * Load configuration from a YAML string. Does not touch the filesystem.
 */
export function loadConfigFromString(yamlContent: string): LoadedConfig {
  return buildLoadedConfig(parseYaml(yamlContent, "<string>"));
}

/**
 * Default configuration, for when no config file is in play.
 */
export function createDefaultConfig(): LoadedConfig {
  return buildLoadedConfig({ ...DEFAULT_CONFIG });
}
