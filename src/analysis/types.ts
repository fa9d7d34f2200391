/**
 * Records produced by the structural extractor.
 *
 * Every record is derived from one parse of one source unit and frozen once
 * built. Line numbers are 1-based.
 */

/**
 * A `def` or `async def`.
 */
export interface FunctionInfo {
  name: string;
  /** Line of the `def` keyword (decorators sit above it) */
  lineNumber: number;
  endLineNumber: number;
  isAsync: boolean;
  parameters: readonly string[];
  decorators: readonly string[];
  returnAnnotation?: string;
  docstring?: string;
  /** Parameter name -> annotation, or the builtin type of a literal default */
  inferredTypes: Readonly<Record<string, string>>;
}

/**
 * Comprehensions and generator expressions count as loops for nesting.
 */
export type LoopType = "for" | "while" | "comprehension";

export interface LoopInfo {
  type: LoopType;
  lineNumber: number;
  endLineNumber: number;
  parentFunction?: string;
  /** Number of enclosing loops (0 for an outermost loop) */
  nestingLevel: number;
  isInAsyncFunction: boolean;
  /** Index in the loop list of the innermost enclosing loop */
  parentLoop?: number;
}

export interface ImportInfo {
  /** Dotted module path; relative imports keep their leading dots */
  module: string;
  names: readonly string[];
  lineNumber: number;
  isFromImport: boolean;
  /** Imported name -> alias */
  aliases: Readonly<Record<string, string>>;
  /** Absolute module path when it can be determined */
  resolvedModule?: string;
}

export interface CallInfo {
  /** Callee as written, e.g. `User.objects.filter` */
  functionName: string;
  lineNumber: number;
  parentFunction?: string;
  isInLoop: boolean;
  isInAsyncFunction: boolean;
  /** Fully-qualified callee when resolution succeeds, e.g. `time.sleep` */
  inferredCallable?: string;
}

/**
 * `s += x` or `s = s + x`.
 */
export interface ConcatenationInfo {
  target: string;
  form: "augmented" | "rebinding";
  lineNumber: number;
  parentFunction?: string;
  /** Inside a loop of the same function (or of the module body) */
  isInLoop: boolean;
  /** Start line of the innermost such loop */
  loopLineNumber?: number;
  definedOutsideLoop: boolean;
  isStringValued: boolean;
}

export interface TryStatementInfo {
  lineNumber: number;
  endLineNumber: number;
  parentFunction?: string;
  isInLoop: boolean;
}

export interface GlobalStatementInfo {
  names: readonly string[];
  lineNumber: number;
  parentFunction?: string;
}

/**
 * Everything extracted from one module, computed once.
 */
export interface AnalysisResult {
  readonly functions: readonly FunctionInfo[];
  readonly loops: readonly LoopInfo[];
  readonly imports: readonly ImportInfo[];
  readonly calls: readonly CallInfo[];
  readonly concatenations: readonly ConcatenationInfo[];
  readonly tryStatements: readonly TryStatementInfo[];
  readonly globalStatements: readonly GlobalStatementInfo[];
}
