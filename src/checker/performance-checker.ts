/**
 * Performance rule engine.
 *
 * Each `check*` method runs one rule over the analyzer's frozen collections
 * and returns that rule's issues. `checkAll` combines the rules enabled in
 * the configuration; it is computed once, in the constructor.
 */

import { StructureAnalyzer } from "../analysis/structure-analyzer";
import { CallInfo } from "../analysis/types";
import {
  PatternCatalog,
  classifyBlockingIo,
  classifyMemoryLoad,
  classifyOrmQuery,
  describeMemoryLoad,
  getMemoryOptimizationSuggestion,
  getOrmSuggestion,
  isTypeConversion,
} from "../catalog";
import { LoadedConfig, createDefaultConfig } from "../config/loader";
import { SourceInput } from "../frontend/parser";
import { logger } from "../logger";
import {
  IssueCategory,
  IssueSummary,
  PerformanceIssue,
  Severity,
  createIssue,
  sortIssues,
} from "./issues";
import { ALL_CATEGORIES, RequiredRuleConfig } from "./rules";

export interface PerformanceCheckerOptions extends SourceInput {
  config?: LoadedConfig;
}

/** Deep-loop threshold: a chain of this many nested loops is reported. */
const DEEP_NESTING_DEPTH = 3;

export class PerformanceChecker {
  readonly analyzer: StructureAnalyzer;
  private readonly config: LoadedConfig;
  private readonly catalog: PatternCatalog;
  private readonly issues: readonly PerformanceIssue[];

  /**
   * @throws UsageError, SourceNotFoundError or PythonSyntaxError
   */
  constructor(options: PerformanceCheckerOptions) {
    this.analyzer = new StructureAnalyzer({
      source: options.source,
      filePath: options.filePath,
      moduleName: options.moduleName,
    });
    this.config = options.config ?? createDefaultConfig();
    this.catalog = this.config.catalog;
    this.issues = Object.freeze(this.runEnabledRules());
  }

  private ruleConfig(category: IssueCategory): RequiredRuleConfig {
    return this.config.getRuleConfig(category, this.analyzer.filePath);
  }

  private severityOf(category: IssueCategory): Severity {
    return this.ruleConfig(category).severity;
  }

  private runEnabledRules(): PerformanceIssue[] {
    const rules: Record<IssueCategory, () => PerformanceIssue[]> = {
      "repeated-query-in-loop": () => this.checkRepeatedQueriesInLoops(),
      "blocking-io-in-async": () => this.checkBlockingIoInAsync(),
      "inefficient-loop": () => this.checkInefficientLoops(),
      "memory-load": () => this.checkMemoryLoads(),
      "exception-in-loop": () => this.checkExceptionsInLoops(),
      "type-conversion-in-loop": () => this.checkTypeConversionsInLoops(),
      "global-mutation": () => this.checkGlobalMutations(),
    };

    const issues: PerformanceIssue[] = [];
    for (const category of ALL_CATEGORIES) {
      if (this.ruleConfig(category).enabled) {
        issues.push(...rules[category]());
      }
    }

    logger.debug("Performance check complete", {
      module: this.analyzer.moduleName,
      issues: issues.length,
    });
    return sortIssues(issues);
  }

  private callIssue(
    call: CallInfo,
    category: IssueCategory,
    description: string,
    suggestion: string
  ): PerformanceIssue {
    return createIssue({
      category,
      severity: this.severityOf(category),
      lineNumber: call.lineNumber,
      endLineNumber: call.lineNumber,
      description,
      suggestion,
      codeSnippet: this.analyzer.sourceSegment(call.lineNumber, call.lineNumber),
      functionName: call.parentFunction,
    });
  }

  /**
   * ORM queries issued once per loop iteration (the N+1 pattern).
   */
  checkRepeatedQueriesInLoops(): PerformanceIssue[] {
    const issues: PerformanceIssue[] = [];
    for (const call of this.analyzer.calls()) {
      if (!call.isInLoop) continue;
      const framework = classifyOrmQuery(call.functionName, call.inferredCallable, this.catalog);
      if (!framework) continue;

      issues.push(
        this.callIssue(
          call,
          "repeated-query-in-loop",
          `Potential N+1 query: ${call.functionName} called inside a loop`,
          getOrmSuggestion(framework)
        )
      );
    }
    return issues;
  }

  /**
   * Blocking calls inside `async def`, which stall the event loop.
   */
  checkBlockingIoInAsync(): PerformanceIssue[] {
    const issues: PerformanceIssue[] = [];
    for (const call of this.analyzer.calls()) {
      if (!call.isInAsyncFunction) continue;
      const blocking = classifyBlockingIo(call.functionName, call.inferredCallable, this.catalog);
      if (!blocking) continue;

      const suggestion = blocking.alternative
        ? `Replace with ${blocking.alternative} and use await`
        : "Replace with async alternative";
      issues.push(
        this.callIssue(
          call,
          "blocking-io-in-async",
          `Blocking I/O call '${call.functionName}' in async function blocks event loop`,
          suggestion
        )
      );
    }
    return issues;
  }

  /**
   * String building by repeated concatenation, and loop chains nested
   * three or more deep (reported once, at the deepest loop).
   */
  checkInefficientLoops(): PerformanceIssue[] {
    const severity = this.severityOf("inefficient-loop");
    const issues: PerformanceIssue[] = [];

    for (const site of this.analyzer.concatenations()) {
      if (!site.isInLoop || !site.definedOutsideLoop || !site.isStringValued) continue;
      issues.push(
        createIssue({
          category: "inefficient-loop",
          severity,
          lineNumber: site.lineNumber,
          endLineNumber: site.lineNumber,
          description: "String concatenation in loop creates new string object each iteration",
          suggestion: "Use list.append() and ''.join(list) or io.StringIO for better performance",
          codeSnippet: this.analyzer.sourceSegment(site.lineNumber, site.lineNumber),
          functionName: site.parentFunction,
        })
      );
    }

    const loops = this.analyzer.loops();
    const hasNestedLoop = new Set<number>();
    for (const loop of loops) {
      if (loop.parentLoop !== undefined) hasNestedLoop.add(loop.parentLoop);
    }

    loops.forEach((loop, index) => {
      const depth = loop.nestingLevel + 1;
      if (depth < DEEP_NESTING_DEPTH || hasNestedLoop.has(index)) return;

      issues.push(
        createIssue({
          category: "inefficient-loop",
          severity,
          lineNumber: loop.lineNumber,
          endLineNumber: loop.endLineNumber,
          description: `Deeply nested loop (depth ${depth}) has O(n^${depth}) complexity`,
          suggestion: "Consider if the algorithm can be optimized with better data structures or caching",
          codeSnippet: this.analyzer.sourceSegment(
            loop.lineNumber,
            Math.min(loop.lineNumber + 2, loop.endLineNumber)
          ),
          functionName: loop.parentFunction,
        })
      );
    });

    return issues;
  }

  /**
   * Calls that pull a whole file or serialized object into memory.
   */
  checkMemoryLoads(): PerformanceIssue[] {
    const issues: PerformanceIssue[] = [];
    for (const call of this.analyzer.calls()) {
      const kind = classifyMemoryLoad(call.functionName, call.inferredCallable, this.catalog);
      if (!kind) continue;

      issues.push(
        this.callIssue(
          call,
          "memory-load",
          describeMemoryLoad(kind, call.functionName),
          getMemoryOptimizationSuggestion(kind)
        )
      );
    }
    return issues;
  }

  checkExceptionsInLoops(): PerformanceIssue[] {
    const severity = this.severityOf("exception-in-loop");
    return this.analyzer
      .tryStatements()
      .filter((statement) => statement.isInLoop)
      .map((statement) =>
        createIssue({
          category: "exception-in-loop",
          severity,
          lineNumber: statement.lineNumber,
          endLineNumber: statement.endLineNumber,
          description: "Try/except block inside loop incurs exception handling overhead on each iteration",
          suggestion: "Move try/except outside the loop, or use conditional checks (if/else) for expected cases",
          codeSnippet: this.analyzer.sourceSegment(
            statement.lineNumber,
            Math.min(statement.lineNumber + 3, statement.endLineNumber)
          ),
          functionName: statement.parentFunction,
        })
      );
  }

  checkTypeConversionsInLoops(): PerformanceIssue[] {
    return this.analyzer
      .calls()
      .filter((call) => call.isInLoop && isTypeConversion(call.functionName, call.inferredCallable, this.catalog))
      .map((call) =>
        this.callIssue(
          call,
          "type-conversion-in-loop",
          `Type conversion '${call.functionName}()' called inside loop creates new objects each iteration`,
          "If converting the same value repeatedly, move the conversion outside the loop"
        )
      );
  }

  /**
   * `global` declarations inside functions. Module-level ones are no-ops.
   */
  checkGlobalMutations(): PerformanceIssue[] {
    const severity = this.severityOf("global-mutation");
    return this.analyzer
      .globalStatements()
      .filter((statement) => statement.parentFunction !== undefined)
      .map((statement) =>
        createIssue({
          category: "global-mutation",
          severity,
          lineNumber: statement.lineNumber,
          endLineNumber: statement.lineNumber,
          description: `Function modifies global variable(s): ${statement.names.join(", ")}`,
          suggestion: "Pass values as parameters and return results instead of using global state",
          codeSnippet: this.analyzer.sourceSegment(statement.lineNumber, statement.lineNumber),
          functionName: statement.parentFunction,
        })
      );
  }

  /**
   * Issues from every enabled rule, most severe first, then by line.
   */
  checkAll(): PerformanceIssue[] {
    return [...this.issues];
  }

  getIssuesBySeverity(severity: Severity): PerformanceIssue[] {
    return this.issues.filter((issue) => issue.severity === severity);
  }

  getIssuesByCategory(category: IssueCategory): PerformanceIssue[] {
    return this.issues.filter((issue) => issue.category === category);
  }

  getCriticalIssues(): PerformanceIssue[] {
    return this.getIssuesBySeverity("critical");
  }

  hasIssues(): boolean {
    return this.issues.length > 0;
  }

  getSummary(): IssueSummary {
    const bySeverity: Record<Severity, number> = { critical: 0, high: 0, medium: 0, low: 0 };
    const byCategory: Record<IssueCategory, number> = {
      "repeated-query-in-loop": 0,
      "blocking-io-in-async": 0,
      "inefficient-loop": 0,
      "memory-load": 0,
      "exception-in-loop": 0,
      "type-conversion-in-loop": 0,
      "global-mutation": 0,
    };

    for (const issue of this.issues) {
      bySeverity[issue.severity] += 1;
      byCategory[issue.category] += 1;
    }

    return {
      totalIssues: this.issues.length,
      bySeverity,
      byCategory,
    };
  }
}
