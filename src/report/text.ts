/**
 * Plain-text report for the command line.
 */

import { SEVERITIES } from "../checker/issues";
import { IssueRecord, SummaryRecord } from "./serialize";

export interface FileReport {
  file: string;
  issues: IssueRecord[];
}

export interface FileFailure {
  file: string;
  code: string;
  message: string;
}

const MAX_SNIPPET_LINES = 3;

function indent(text: string, prefix: string): string {
  return text
    .split("\n")
    .slice(0, MAX_SNIPPET_LINES)
    .map((line) => `${prefix}${line}`)
    .join("\n");
}

function formatIssue(file: string, issue: IssueRecord): string {
  const where = issue.function_name ? ` in ${issue.function_name}()` : "";
  const lines = [
    `${file}:${issue.line_number} [${issue.severity.toUpperCase()}] ${issue.category}${where}`,
    `  ${issue.description}`,
  ];
  if (issue.code_snippet) {
    lines.push(indent(issue.code_snippet, "    | "));
  }
  lines.push(`  Suggestion: ${issue.suggestion}`);
  return lines.join("\n");
}

function formatSummary(summary: SummaryRecord, filesScanned: number): string {
  const counts = SEVERITIES.map((severity) => `${summary.by_severity[severity]} ${severity}`).join(", ");
  return `Scanned ${filesScanned} file(s): ${summary.total_issues} issue(s) (${counts})`;
}

export function formatTextReport(
  reports: readonly FileReport[],
  failures: readonly FileFailure[],
  summary: SummaryRecord
): string {
  const sections: string[] = [];

  for (const report of reports) {
    for (const issue of report.issues) {
      sections.push(formatIssue(report.file, issue));
    }
  }
  for (const failure of failures) {
    sections.push(`${failure.file}: ${failure.code} ${failure.message}`);
  }

  sections.push(formatSummary(summary, reports.length + failures.length));
  return sections.join("\n\n");
}
