/**
 * Request boundary for the performance check.
 *
 * Takes an already-validated request, runs the checker, and maps analyzer
 * errors to response codes. Failures never echo the analyzed source.
 */

import { PerformanceChecker } from "./checker/performance-checker";
import { LoadedConfig } from "./config/loader";
import { isAnalyzerError } from "./errors";
import { logger } from "./logger";
import { IssueRecord, SummaryRecord, toIssueRecord, toSummaryRecord } from "./report/serialize";

export interface PerformanceCheckRequest {
  source?: string;
  file_path?: string;
  /** Dotted module name, for anchoring relative imports */
  module_name?: string;
  config?: LoadedConfig;
}

export type ErrorCode = "USAGE_ERROR" | "NOT_FOUND" | "SYNTAX_ERROR" | "INTERNAL_ERROR";

export type PerformanceCheckResponse =
  | { success: true; issues: IssueRecord[]; summary: SummaryRecord }
  | { success: false; error: { code: ErrorCode; message: string } };

export function handlePerformanceCheck(request: PerformanceCheckRequest): PerformanceCheckResponse {
  try {
    const checker = new PerformanceChecker({
      source: request.source,
      filePath: request.file_path,
      moduleName: request.module_name,
      config: request.config,
    });

    return {
      success: true,
      issues: checker.checkAll().map(toIssueRecord),
      summary: toSummaryRecord(checker.getSummary()),
    };
  } catch (error) {
    if (isAnalyzerError(error)) {
      logger.debug("Performance check rejected", { code: error.code });
      return { success: false, error: { code: error.code, message: error.message } };
    }

    logger.error("Performance check failed", {
      error: error instanceof Error ? error.message : String(error),
    });
    return {
      success: false,
      error: { code: "INTERNAL_ERROR", message: "Internal error while analyzing source" },
    };
  }
}
