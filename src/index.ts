/**
 * Public API.
 */

export { PerformanceChecker, PerformanceCheckerOptions } from "./checker/performance-checker";
export {
  IssueCategory,
  IssueSummary,
  PerformanceIssue,
  Severity,
  SEVERITIES,
  SEVERITY_RANK,
  compareIssues,
  sortIssues,
} from "./checker/issues";
export { DEFAULT_RULE_CONFIG, ALL_CATEGORIES, RuleConfig, RequiredRuleConfig } from "./checker/rules";

export { StructureAnalyzer } from "./analysis/structure-analyzer";
export { analyzeModule } from "./analysis/analyze";
export * from "./analysis/types";
export { parsePython, ParsedModule, SourceInput } from "./frontend/parser";

export * from "./catalog";

export {
  LoadedConfig,
  loadConfig,
  loadConfigFile,
  loadConfigFromString,
  createDefaultConfig,
} from "./config/loader";
export { ScanConfig } from "./config/schema";

export {
  handlePerformanceCheck,
  PerformanceCheckRequest,
  PerformanceCheckResponse,
} from "./handler";
export { toIssueRecord, toSummaryRecord, IssueRecord, SummaryRecord } from "./report/serialize";

export {
  AnalyzerError,
  AnalyzerErrorCode,
  UsageError,
  SourceNotFoundError,
  PythonSyntaxError,
  isAnalyzerError,
} from "./errors";
