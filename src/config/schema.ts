/**
 * Configuration schema types for .pyperfscan.yml files.
 *
 * The file can sit in the directory being scanned, or be named explicitly
 * with `--config` / PYPERF_CONFIG.
 */

import { CatalogExtension } from "../catalog";
import { IssueCategory } from "../checker/issues";
import { RuleConfig, RuleOverride } from "../checker/rules";

/**
 * File filtering configuration options.
 */
export interface ScanFilesConfig {
  /**
   * Glob patterns for files to skip entirely.
   * Example: ["migrations/**", "**\/test_*.py"]
   */
  ignore?: string[];
}

/**
 * Complete .pyperfscan.yml configuration schema.
 */
export interface ScanConfig {
  /**
   * Config file version. Currently only version 1 is supported.
   */
  version: number;

  /**
   * Rule-level configuration, keyed by issue category.
   */
  rules?: Partial<Record<IssueCategory, RuleConfig>>;

  files?: ScanFilesConfig;

  /**
   * Path-specific rule overrides.
   * Applied in order; later overrides take precedence.
   */
  overrides?: RuleOverride[];

  /**
   * Extra pattern catalog entries, tried before the built-in ones.
   */
  catalog?: CatalogExtension;
}

export interface RequiredFilesConfig {
  ignore: string[];
}

export const DEFAULT_FILES_CONFIG: RequiredFilesConfig = {
  ignore: [],
};

export const CONFIG_FILE_NAME = ".pyperfscan.yml";

export const SUPPORTED_CONFIG_VERSION = 1;
