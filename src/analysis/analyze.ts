import { ParsedModule } from "../frontend/parser";
import { ScopeTable } from "../frontend/scopes";
import { extractCalls } from "./extract/calls";
import { extractFunctions } from "./extract/functions";
import { extractImports } from "./extract/imports";
import { extractLoops } from "./extract/loops";
import { extractConcatenations, extractGlobalStatements, extractTryStatements } from "./extract/statements";
import { AnalysisResult } from "./types";

/**
 * Run every extraction pass once over a parsed module.
 */
export function analyzeModule(module: ParsedModule): AnalysisResult {
  const scopes = new ScopeTable(module);

  return Object.freeze({
    functions: Object.freeze(extractFunctions(module, scopes)),
    loops: Object.freeze(extractLoops(module, scopes)),
    imports: Object.freeze(extractImports(module, scopes)),
    calls: Object.freeze(extractCalls(module, scopes)),
    concatenations: Object.freeze(extractConcatenations(module, scopes)),
    tryStatements: Object.freeze(extractTryStatements(module, scopes)),
    globalStatements: Object.freeze(extractGlobalStatements(module, scopes)),
  });
}
