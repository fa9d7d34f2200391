/**
 * Issue types shared by the rules, the report layer and the CLI.
 */

/**
 * Severity levels, most severe first.
 */
export type Severity = "critical" | "high" | "medium" | "low";

export const SEVERITIES: readonly Severity[] = ["critical", "high", "medium", "low"];

/** Higher rank sorts first. */
export const SEVERITY_RANK: Record<Severity, number> = {
  critical: 4,
  high: 3,
  medium: 2,
  low: 1,
};

export function isSeverity(value: unknown): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}

/**
 * Every category a rule can report. Adding one is a schema change: the
 * summary, the config schema and the rule defaults all key on this union.
 */
export type IssueCategory =
  | "repeated-query-in-loop"
  | "blocking-io-in-async"
  | "inefficient-loop"
  | "memory-load"
  | "exception-in-loop"
  | "type-conversion-in-loop"
  | "global-mutation";

export interface PerformanceIssue {
  readonly category: IssueCategory;
  readonly severity: Severity;
  readonly lineNumber: number;
  readonly endLineNumber: number;
  readonly description: string;
  readonly suggestion: string;
  readonly codeSnippet?: string;
  /** Innermost enclosing function, if any */
  readonly functionName?: string;
}

export interface IssueSummary {
  totalIssues: number;
  bySeverity: Record<Severity, number>;
  byCategory: Record<IssueCategory, number>;
}

export function createIssue(fields: PerformanceIssue): PerformanceIssue {
  return Object.freeze({ ...fields });
}

/**
 * Most severe first, then by line. Stable for equal keys.
 */
export function compareIssues(a: PerformanceIssue, b: PerformanceIssue): number {
  const bySeverity = SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity];
  if (bySeverity !== 0) return bySeverity;
  return a.lineNumber - b.lineNumber;
}

export function sortIssues(issues: readonly PerformanceIssue[]): PerformanceIssue[] {
  return [...issues].sort(compareIssues);
}

/** Whether `severity` is at least as severe as `threshold`. */
export function meetsSeverity(severity: Severity, threshold: Severity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[threshold];
}
