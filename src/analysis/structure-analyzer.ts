/**
 * Structural model of one Python module.
 *
 * Parsing and extraction both happen in the constructor; every accessor
 * reads the frozen result, so repeated calls return the same arrays.
 */

import { DEFAULT_CATALOG, PatternCatalog, isBlockingIo } from "../catalog";
import { ParsedModule, SourceInput, parsePython } from "../frontend/parser";
import { analyzeModule } from "./analyze";
import {
  AnalysisResult,
  CallInfo,
  ConcatenationInfo,
  FunctionInfo,
  GlobalStatementInfo,
  ImportInfo,
  LoopInfo,
  TryStatementInfo,
} from "./types";

export class StructureAnalyzer {
  private readonly module: ParsedModule;
  private readonly result: AnalysisResult;

  /**
   * @throws UsageError, SourceNotFoundError or PythonSyntaxError from the parser
   */
  constructor(input: SourceInput) {
    this.module = parsePython(input);
    this.result = analyzeModule(this.module);
  }

  get moduleName(): string {
    return this.module.moduleName;
  }

  get filePath(): string | undefined {
    return this.module.filePath;
  }

  functions(): readonly FunctionInfo[] {
    return this.result.functions;
  }

  loops(): readonly LoopInfo[] {
    return this.result.loops;
  }

  imports(): readonly ImportInfo[] {
    return this.result.imports;
  }

  calls(): readonly CallInfo[] {
    return this.result.calls;
  }

  concatenations(): readonly ConcatenationInfo[] {
    return this.result.concatenations;
  }

  tryStatements(): readonly TryStatementInfo[] {
    return this.result.tryStatements;
  }

  globalStatements(): readonly GlobalStatementInfo[] {
    return this.result.globalStatements;
  }

  /**
   * Literal text of lines `start`..`end` (1-based, inclusive). Out-of-range
   * bounds are clamped; an empty range gives "".
   */
  sourceSegment(start: number, end: number): string {
    const first = Math.max(start, 1);
    const last = Math.min(end, this.module.lines.length);
    if (last < first) return "";
    return this.module.lines.slice(first - 1, last).join("\n");
  }

  asyncFunctions(): FunctionInfo[] {
    return this.result.functions.filter((fn) => fn.isAsync);
  }

  /** Functions whose whole body lies within lines `start`..`end`. */
  functionsInRange(start: number, end: number): FunctionInfo[] {
    return this.result.functions.filter((fn) => fn.lineNumber >= start && fn.endLineNumber <= end);
  }

  loopsInFunction(name: string): LoopInfo[] {
    return this.result.loops.filter((loop) => loop.parentFunction === name);
  }

  maxLoopNestingDepth(): number {
    return this.result.loops.reduce((max, loop) => Math.max(max, loop.nestingLevel), 0);
  }

  /** Whether any call inside an `async def` is blocking I/O according to `catalog`. */
  hasBlockingCallsInAsync(catalog: PatternCatalog = DEFAULT_CATALOG): boolean {
    return this.result.calls.some(
      (call) => call.isInAsyncFunction && isBlockingIo(call.functionName, call.inferredCallable, catalog)
    );
  }
}
