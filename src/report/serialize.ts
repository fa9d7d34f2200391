/**
 * Wire shapes for issues and summaries.
 *
 * Transports serialize these records as they are; absent optional fields
 * become explicit nulls.
 */

import { IssueCategory, IssueSummary, PerformanceIssue, SEVERITIES, Severity } from "../checker/issues";
import { ALL_CATEGORIES } from "../checker/rules";

export interface IssueRecord {
  category: IssueCategory;
  severity: Severity;
  line_number: number;
  end_line_number: number;
  description: string;
  suggestion: string;
  code_snippet: string | null;
  function_name: string | null;
}

export interface SummaryRecord {
  total_issues: number;
  by_severity: Record<Severity, number>;
  by_category: Record<IssueCategory, number>;
}

export function toIssueRecord(issue: PerformanceIssue): IssueRecord {
  return {
    category: issue.category,
    severity: issue.severity,
    line_number: issue.lineNumber,
    end_line_number: issue.endLineNumber,
    description: issue.description,
    suggestion: issue.suggestion,
    code_snippet: issue.codeSnippet ?? null,
    function_name: issue.functionName ?? null,
  };
}

export function toSummaryRecord(summary: IssueSummary): SummaryRecord {
  return {
    total_issues: summary.totalIssues,
    by_severity: { ...summary.bySeverity },
    by_category: { ...summary.byCategory },
  };
}

/**
 * Sum of several summaries (one per file in a multi-file scan).
 */
export function combineSummaryRecords(records: readonly SummaryRecord[]): SummaryRecord {
  const combined: SummaryRecord = {
    total_issues: 0,
    by_severity: { critical: 0, high: 0, medium: 0, low: 0 },
    by_category: {
      "repeated-query-in-loop": 0,
      "blocking-io-in-async": 0,
      "inefficient-loop": 0,
      "memory-load": 0,
      "exception-in-loop": 0,
      "type-conversion-in-loop": 0,
      "global-mutation": 0,
    },
  };

  for (const record of records) {
    combined.total_issues += record.total_issues;
    for (const severity of SEVERITIES) {
      combined.by_severity[severity] += record.by_severity[severity];
    }
    for (const category of ALL_CATEGORIES) {
      combined.by_category[category] += record.by_category[category];
    }
  }
  return combined;
}
