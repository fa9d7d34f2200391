/**
 * Rule configuration types and defaults.
 *
 * Each issue category is produced by exactly one rule, so categories double
 * as rule ids in configuration files.
 */

import { IssueCategory, Severity } from "./issues";

/**
 * Configuration for a single rule.
 */
export interface RuleConfig {
  enabled?: boolean;
  severity?: Severity;
}

/**
 * Rule configuration that applies to files matching `patterns`.
 */
export interface RuleOverride {
  patterns: string[];
  rules: Partial<Record<IssueCategory, RuleConfig>>;
}

export interface RequiredRuleConfig {
  enabled: boolean;
  severity: Severity;
}

/**
 * The four core rules are on by default. The loop/global hygiene rules are
 * noisier and have to be switched on in `.pyperfscan.yml`.
 */
export const DEFAULT_RULE_CONFIG: Record<IssueCategory, RequiredRuleConfig> = {
  "repeated-query-in-loop": { enabled: true, severity: "high" },
  "blocking-io-in-async": { enabled: true, severity: "critical" },
  "inefficient-loop": { enabled: true, severity: "medium" },
  "memory-load": { enabled: true, severity: "medium" },

  "exception-in-loop": { enabled: false, severity: "medium" },
  "type-conversion-in-loop": { enabled: false, severity: "medium" },
  "global-mutation": { enabled: false, severity: "medium" },
};

export const ALL_CATEGORIES: readonly IssueCategory[] = [
  "repeated-query-in-loop",
  "blocking-io-in-async",
  "inefficient-loop",
  "memory-load",
  "exception-in-loop",
  "type-conversion-in-loop",
  "global-mutation",
];

export function isValidCategory(id: unknown): id is IssueCategory {
  return ALL_CATEGORIES.some((category) => category === id);
}

export function mergeRuleConfig(base: RequiredRuleConfig, override: RuleConfig): RequiredRuleConfig {
  return {
    enabled: override.enabled ?? base.enabled,
    severity: override.severity ?? base.severity,
  };
}
